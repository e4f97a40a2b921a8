import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { collectProfileUrls } from '../profile-urls.js';
import { outputJson } from './helpers.js';

export const profileUrlsCommand = new Command('profile-urls')
  .description('Extract clean profile URLs from a saved profiles response, ready for a bulk profile API')
  .argument('<file>', 'JSON file with a /linkedin-profiles response')
  .action((file: string) => {
    let doc: unknown;
    try {
      doc = JSON.parse(readFileSync(file, 'utf-8'));
    } catch (err) {
      console.error(`Could not read ${file}: ${err}`);
      process.exit(1);
    }

    const urls = collectProfileUrls(doc);
    if (urls.length === 0) {
      console.error('No profile URLs found.');
      process.exit(1);
    }
    outputJson(urls);
  });
