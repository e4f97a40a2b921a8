import type { Browser } from 'playwright';
import type { Config } from '../config.js';
import { SessionError, getErrorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import { PlaywrightSession } from './session.js';
import type { BrowserSession, ContextDriver, SessionFactory } from './session.js';
import { LAUNCH_ARGS, USER_AGENT } from './selectors.js';

export type BrowserConfig = Pick<Config, 'browserBackend' | 'browserWsUrl' | 'browserHeadless' | 'browserLocale'>;

export interface BrowserInstance {
  onDisconnect: (listener: () => void) => void;
  close: () => Promise<void>;
  newContext: () => Promise<ContextDriver>;
}

export type BrowserLauncher = (cfg: BrowserConfig) => Promise<BrowserInstance>;

async function importPlaywright(): Promise<typeof import('playwright')> {
  try {
    return await import('playwright');
  } catch {
    throw new Error(
      'Playwright is not installed. Run: npm install playwright && npx playwright install chromium'
    );
  }
}

export async function createBrowser(cfg: BrowserConfig): Promise<BrowserInstance> {
  const pw = await importPlaywright();
  let browser: Browser;

  if (cfg.browserBackend === 'remote') {
    if (!cfg.browserWsUrl) {
      throw new Error('BROWSER_WS_URL is required for remote backend');
    }
    browser = await pw.chromium.connectOverCDP(cfg.browserWsUrl);
  } else {
    browser = await pw.chromium.launch({
      headless: cfg.browserHeadless,
      args: LAUNCH_ARGS,
    });
  }

  return {
    onDisconnect: (listener) => { browser.on('disconnected', listener); },
    close: async () => { await browser.close(); },
    newContext: () => browser.newContext({
      locale: cfg.browserLocale,
      viewport: { width: 1920, height: 1080 },
      userAgent: USER_AGENT,
    }),
  };
}

export interface SessionPool {
  openSession: SessionFactory;
  shutdown: () => Promise<void>;
}

/**
 * Shares one browser process between requests and hands every caller
 * its own context. The browser is launched on first use and relaunched
 * after it disconnects.
 */
export function createSessionPool(
  cfg: BrowserConfig,
  log: Logger,
  launch: BrowserLauncher = createBrowser,
): SessionPool {
  let launching: Promise<BrowserInstance> | null = null;

  async function getBrowser(): Promise<BrowserInstance> {
    if (!launching) {
      launching = launch(cfg).then(instance => {
        instance.onDisconnect(() => {
          log.warn('Browser disconnected');
          launching = null;
        });
        log.info('Browser launched', { backend: cfg.browserBackend, headless: cfg.browserHeadless });
        return instance;
      });
    }
    try {
      return await launching;
    } catch (err) {
      launching = null;
      throw new SessionError(`Failed to start browser: ${getErrorMessage(err)}`, err);
    }
  }

  async function openSession(): Promise<BrowserSession> {
    const instance = await getBrowser();
    try {
      const context = await instance.newContext();
      return await PlaywrightSession.create(context);
    } catch (err) {
      throw new SessionError(`Failed to open browser context: ${getErrorMessage(err)}`, err);
    }
  }

  async function shutdown(): Promise<void> {
    if (!launching) return;
    const pending = launching;
    launching = null;
    try {
      const instance = await pending;
      await instance.close();
    } catch (err) {
      log.warn('Browser shutdown failed', { error: getErrorMessage(err) });
    }
  }

  return { openSession, shutdown };
}
