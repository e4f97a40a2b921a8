import { config as dotenvLoad } from 'dotenv';
import { existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import type { BrowserBackend } from './types/index.js';
import { parseLogLevel } from './logger.js';

function expandTilde(p: string): string {
  if (p === '~' || p.startsWith('~/')) {
    return homedir() + p.slice(1);
  }
  return p;
}

function parseBackend(value: string | undefined): BrowserBackend {
  return value === 'remote' ? 'remote' : 'playwright';
}

/** A numeric env value, or `fallback` when unset; anything that is not a non-negative number is rejected. */
export function envNumber(name: string, fallback: number, env: NodeJS.ProcessEnv = process.env): number {
  const raw = env[name]?.trim();
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${name} must be a non-negative number, got "${raw}"`);
  }
  return value;
}

const envFile = process.env.BIZSCRAPE_ENV_FILE ?? join(process.cwd(), '.env');
if (existsSync(envFile)) {
  dotenvLoad({ path: envFile });
}

const DEFAULT_SELECTORS_PATH = join(homedir(), '.bizscrape', 'selectors.yaml');

export const config = {
  port:                 envNumber('PORT', 8000),
  host:                 process.env.HOST ?? '0.0.0.0',
  browserBackend:       parseBackend(process.env.BROWSER_BACKEND),
  browserWsUrl:         process.env.BROWSER_WS_URL,
  browserHeadless:      process.env.BROWSER_HEADLESS !== 'false',
  browserLocale:        process.env.BROWSER_LOCALE ?? 'en-US',
  pageTimeout:          envNumber('PAGE_TIMEOUT', 30000),
  markerTimeout:        envNumber('MARKER_TIMEOUT', 20000),
  searchTimeout:        envNumber('SEARCH_TIMEOUT', 15000),
  loginTimeout:         envNumber('LOGIN_TIMEOUT', 25000),
  requestDelay:         envNumber('REQUEST_DELAY', 2.0),
  typingDelay:          envNumber('TYPING_DELAY', 100),
  maxLoadActions:       envNumber('MAX_LOAD_ACTIONS', 10),
  stallLimit:           envNumber('STALL_LIMIT', 2),
  maxReviews:           envNumber('MAX_REVIEWS', 50),
  scraperRetries:       envNumber('SCRAPER_RETRIES', 3),
  scraperRetryDelay:    envNumber('SCRAPER_RETRY_DELAY', 2.0),
  selectorsPath:        expandTilde(process.env.BIZSCRAPE_SELECTORS ?? DEFAULT_SELECTORS_PATH),
  linkedinEmail:        process.env.LINKEDIN_EMAIL,
  linkedinPassword:     process.env.LINKEDIN_PASSWORD,
  logLevel:             parseLogLevel(process.env.LOG_LEVEL),
} as const;

export type Config = typeof config;

/** The subset of settings the scraping engine reads. */
export type ScrapeConfig = Pick<Config,
  | 'pageTimeout'
  | 'markerTimeout'
  | 'searchTimeout'
  | 'loginTimeout'
  | 'requestDelay'
  | 'typingDelay'
  | 'maxLoadActions'
  | 'stallLimit'
  | 'maxReviews'
  | 'scraperRetries'
  | 'scraperRetryDelay'
>;
