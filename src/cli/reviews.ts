import { Command } from 'commander';
import { config } from '../config.js';
import { createLogger } from '../logger.js';
import { runBatch } from '../scraper/batch.js';
import { createSessionPool } from '../scraper/browser.js';
import { createReviewsTarget } from '../scraper/reviews.js';
import { loadSelectors } from '../selectors-config.js';
import { toReviewsResponse } from '../server/serialize.js';
import {
  browserConfigFrom, isJsonMode, outputJson, outputTable, parsePositiveInt, truncate,
} from './helpers.js';
import type { BrowserOptions } from './helpers.js';

interface ReviewsOptions extends BrowserOptions {
  json?: boolean;
  selectors?: string;
  maxReviews?: string;
}

export const reviewsCommand = new Command('reviews')
  .description('Scrape reviews for one or more businesses')
  .argument('<names...>', 'Business names, searched in the given order')
  .option('--max-reviews <n>', 'Reviews kept per business')
  .option('--backend <backend>', 'Override browser backend: playwright, remote')
  .option('--browser-url <url>', 'Remote browser WebSocket URL')
  .option('--selectors <path>', 'Selector overrides YAML file')
  .option('--json', 'Force JSON output')
  .action(async (names: string[], opts: ReviewsOptions) => {
    const json = isJsonMode(opts);
    const log = createLogger(json ? 'error' : config.logLevel);
    const cfg = {
      ...config,
      ...(opts.maxReviews ? { maxReviews: parsePositiveInt(opts.maxReviews, '--max-reviews') } : {}),
    };
    const selectors = loadSelectors(opts.selectors);
    const pool = createSessionPool(browserConfigFrom(config, opts), log);

    const target = createReviewsTarget(selectors.reviews, cfg);
    const batch = await runBatch(names, target, { openSession: pool.openSession, log })
      .finally(() => pool.shutdown());
    const response = toReviewsResponse(batch);

    if (response.status === 'failure') process.exitCode = 1;

    if (json) {
      outputJson(response);
      return;
    }

    for (const business of response.data) {
      console.log(`\n${business.business_name}: ${business.status}${business.error ? ` (${business.error})` : ''}`);
      if (business.reviews.length === 0) {
        console.log('  No reviews.');
        continue;
      }
      outputTable(
        ['date', 'rating', 'author', 'text', 'response'],
        business.reviews.map(r => [
          r.date || '-',
          r.rating || '-',
          truncate(r.author, 20),
          truncate(r.text, 50),
          r.owner_response ? 'yes' : '',
        ]),
      );
      console.log(`${business.reviews.length} reviews`);
    }
    if (response.error) console.error(`\n${response.error}`);
  });
