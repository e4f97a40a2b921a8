import type { ScrapeConfig } from '../config.js';
import { NavigationError, SessionError, getErrorMessage } from '../errors.js';
import type { BrowserSession } from './session.js';
import type { SelectorList } from './selectors.js';

export type NavigatorConfig = Pick<ScrapeConfig, 'pageTimeout' | 'markerTimeout' | 'scraperRetries' | 'scraperRetryDelay'>;

/**
 * Opens `url` and waits for one of the marker selectors.
 * Throws NavigationError when the page never loads or the marker never shows up.
 */
export async function openPage(
  session: BrowserSession,
  url: string,
  marker: SelectorList,
  cfg: NavigatorConfig,
): Promise<string> {
  if (session.currentUrl() !== url) {
    await navigateWithRetry(session, url, cfg);
  }

  const matched = await session.waitForAny(marker, cfg.markerTimeout);
  if (!matched) {
    throw new NavigationError(url, `none of [${marker.join(', ')}] appeared within ${cfg.markerTimeout}ms`);
  }
  return matched;
}

export async function navigateWithRetry(session: BrowserSession, url: string, cfg: NavigatorConfig): Promise<void> {
  const attempts = Math.max(1, cfg.scraperRetries);
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      await session.open(url, cfg.pageTimeout);
      return;
    } catch (err) {
      if (err instanceof SessionError) throw err;
      if (attempt < attempts) {
        await session.pause(cfg.scraperRetryDelay * attempt * 1000);
      } else {
        throw new NavigationError(url, `gave up after ${attempt} attempts: ${getErrorMessage(err)}`);
      }
    }
  }
}
