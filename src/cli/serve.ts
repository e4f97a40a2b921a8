import { Command } from 'commander';
import { serve } from '@hono/node-server';
import { config } from '../config.js';
import { getErrorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import { createSessionPool } from '../scraper/browser.js';
import { loadSelectors } from '../selectors-config.js';
import { createApp } from '../server/app.js';
import { browserConfigFrom, parsePositiveInt } from './helpers.js';
import type { BrowserOptions } from './helpers.js';

interface ServeOptions extends BrowserOptions {
  port: string;
  host: string;
  selectors?: string;
}

export const serveCommand = new Command('serve')
  .description('Start the HTTP API')
  .option('--port <port>', 'Port to listen on', String(config.port))
  .option('--host <host>', 'Interface to bind', config.host)
  .option('--backend <backend>', 'Override browser backend: playwright, remote')
  .option('--browser-url <url>', 'Remote browser WebSocket URL')
  .option('--selectors <path>', 'Selector overrides YAML file')
  .action(async (opts: ServeOptions) => {
    const log = createLogger(config.logLevel);
    const port = parsePositiveInt(opts.port, '--port');
    const selectors = loadSelectors(opts.selectors);
    const pool = createSessionPool(browserConfigFrom(config, opts), log);
    const app = createApp({ openSession: pool.openSession, selectors, cfg: config, log });

    const server = serve({ fetch: app.fetch, port, hostname: opts.host }, (info) => {
      log.info('API listening', { host: opts.host, port: info.port });
    });

    const shutdown = async (signal: string) => {
      log.info('Shutting down', { signal });
      server.close();
      await pool.shutdown();
      process.exit(0);
    };
    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      process.once(signal, () => {
        shutdown(signal).catch(err => {
          log.error('Shutdown failed', { error: getErrorMessage(err) });
          process.exit(1);
        });
      });
    }
  });
