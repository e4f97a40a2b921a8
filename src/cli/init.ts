import { Command } from 'commander';
import { execSync } from 'node:child_process';
import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { config } from '../config.js';
import { DEFAULT_SELECTORS } from '../scraper/selectors.js';
import { selectorsToYaml } from '../selectors-config.js';

export const initCommand = new Command('init')
  .description('Install the Chromium build and write an editable selectors file')
  .option('--skip-browser', 'Do not install Chromium', false)
  .action((opts: { skipBrowser: boolean }) => {
    const selectorsPath = config.selectorsPath;
    if (existsSync(selectorsPath)) {
      console.log(`Selectors file already exists at ${selectorsPath}`);
    } else {
      mkdirSync(dirname(selectorsPath), { recursive: true });
      writeFileSync(selectorsPath, selectorsToYaml(DEFAULT_SELECTORS));
      console.log(`Selectors written to ${selectorsPath}`);
    }

    if (opts.skipBrowser || config.browserBackend === 'remote') {
      console.log('Skipping browser install.');
      return;
    }
    try {
      console.log('Installing Playwright Chromium...');
      execSync('npx playwright install chromium', { stdio: 'inherit' });
      console.log('Done. Run `bizscrape serve` to start the API.');
    } catch (err) {
      console.error(`Failed to install browser: ${err}`);
      process.exit(1);
    }
  });
