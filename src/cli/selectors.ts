import { Command } from 'commander';
import { DEFAULT_SELECTORS } from '../scraper/selectors.js';
import { getSelectorsPath, loadSelectors, selectorsToYaml } from '../selectors-config.js';

export const selectorsCommand = new Command('selectors')
  .description('Print the effective DOM selectors as YAML')
  .option('--file <path>', 'Selector overrides YAML file', getSelectorsPath())
  .option('--defaults', 'Print built-in defaults, ignoring overrides', false)
  .action((opts: { file: string; defaults: boolean }) => {
    const selectors = opts.defaults ? DEFAULT_SELECTORS : loadSelectors(opts.file);
    process.stdout.write(selectorsToYaml(selectors));
  });
