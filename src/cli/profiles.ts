import { Command } from 'commander';
import { config } from '../config.js';
import { createLogger } from '../logger.js';
import { runBatch } from '../scraper/batch.js';
import { createSessionPool } from '../scraper/browser.js';
import { createProfilesTarget } from '../scraper/profiles.js';
import { loadSelectors } from '../selectors-config.js';
import { toProfilesResponse } from '../server/serialize.js';
import { browserConfigFrom, isJsonMode, outputJson, outputTable, truncate } from './helpers.js';
import type { BrowserOptions } from './helpers.js';

interface ProfilesOptions extends BrowserOptions {
  email?: string;
  password?: string;
  details?: boolean;
  json?: boolean;
  selectors?: string;
}

export const profilesCommand = new Command('profiles')
  .description('Scrape employee profiles from LinkedIn company people pages')
  .argument('<companies...>', 'Company URLs, slugs or names')
  .option('--email <email>', 'LinkedIn login email (default: LINKEDIN_EMAIL)')
  .option('--password <password>', 'LinkedIn password (default: LINKEDIN_PASSWORD)')
  .option('--details', 'Also visit each profile for location, about and latest job', false)
  .option('--backend <backend>', 'Override browser backend: playwright, remote')
  .option('--browser-url <url>', 'Remote browser WebSocket URL')
  .option('--selectors <path>', 'Selector overrides YAML file')
  .option('--json', 'Force JSON output')
  .action(async (companies: string[], opts: ProfilesOptions) => {
    const email = opts.email ?? config.linkedinEmail;
    const password = opts.password ?? config.linkedinPassword;
    if (!email || !password) {
      console.error('LinkedIn credentials are required: pass --email/--password or set LINKEDIN_EMAIL/LINKEDIN_PASSWORD.');
      process.exit(1);
    }

    const json = isJsonMode(opts);
    const log = createLogger(json ? 'error' : config.logLevel);
    const selectors = loadSelectors(opts.selectors);
    const pool = createSessionPool(browserConfigFrom(config, opts), log);
    const target = createProfilesTarget(selectors.profiles, config, {
      credentials: { email, password },
      includeDetails: opts.details === true,
    });

    const batch = await runBatch(companies, target, { openSession: pool.openSession, log })
      .finally(() => pool.shutdown());
    const response = toProfilesResponse(batch);

    if (response.status === 'failure') process.exitCode = 1;

    if (json) {
      outputJson(response);
      return;
    }

    for (const company of response.data) {
      console.log(`\n${company.company_name}: ${company.status}${company.error ? ` (${company.error})` : ''}`);
      if (company.profiles.length === 0) {
        console.log('  No profiles.');
        continue;
      }
      outputTable(
        ['name', 'subtitle', 'location', 'profile'],
        company.profiles.map(p => [
          truncate(p.name, 25),
          truncate(p.subtitle, 40),
          truncate(p.location, 20),
          p.profile_url,
        ]),
      );
      console.log(`${company.profiles.length} profiles`);
    }
    if (response.error) console.error(`\n${response.error}`);
  });
