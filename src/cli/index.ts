import { Command } from 'commander';
import { version } from '../version.js';

import { serveCommand } from './serve.js';
import { reviewsCommand } from './reviews.js';
import { profilesCommand } from './profiles.js';
import { profileUrlsCommand } from './profile-urls.js';
import { selectorsCommand } from './selectors.js';
import { initCommand } from './init.js';

export const program = new Command();
program
  .name('bizscrape')
  .description('Business review and company people scraper (HTTP API and CLI)')
  .version(version);

program.addCommand(serveCommand);
program.addCommand(reviewsCommand);
program.addCommand(profilesCommand);
program.addCommand(profileUrlsCommand);
program.addCommand(selectorsCommand);
program.addCommand(initCommand);
