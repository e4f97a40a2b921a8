import type { ScrapeConfig } from '../config.js';
import { LoginError, SessionError, getErrorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { Credentials } from '../types/index.js';
import { navigateWithRetry } from './navigator.js';
import type { BrowserSession } from './session.js';
import { LINKEDIN_FEED_FRAGMENT, LINKEDIN_LOGIN_URL } from './selectors.js';
import type { ProfileSelectors, SelectorList } from './selectors.js';

export type LoginConfig = Pick<ScrapeConfig,
  'pageTimeout' | 'markerTimeout' | 'loginTimeout' | 'typingDelay' | 'scraperRetries' | 'scraperRetryDelay'>;

export async function isLoggedIn(session: BrowserSession, sel: ProfileSelectors): Promise<boolean> {
  if (session.currentUrl().includes(LINKEDIN_FEED_FRAGMENT)) return true;
  return (await session.waitForAny(sel.loggedInMarker, 0)) !== null;
}

async function clickFirst(session: BrowserSession, selectors: SelectorList): Promise<boolean> {
  for (const selector of selectors) {
    if (await session.click(selector)) return true;
  }
  return false;
}

/**
 * Signs in through the login form, typing like a person would.
 * Checkpoints, MFA and CAPTCHAs are not handled: they surface as a LoginError.
 */
export async function login(
  session: BrowserSession,
  creds: Credentials,
  sel: ProfileSelectors,
  cfg: LoginConfig,
  log?: Logger,
): Promise<void> {
  try {
    await navigateWithRetry(session, LINKEDIN_LOGIN_URL, cfg);
  } catch (err) {
    if (err instanceof SessionError) throw err;
    throw new LoginError(`Login page did not load: ${getErrorMessage(err)}`);
  }

  if (await isLoggedIn(session, sel)) {
    log?.info('Already logged in to LinkedIn');
    return;
  }

  const emailField = await session.waitForAny(sel.loginEmail, cfg.markerTimeout);
  if (!emailField) throw new LoginError('Login form not found');
  await session.type(emailField, creds.email, cfg.typingDelay);

  const passwordField = await session.waitForAny(sel.loginPassword, 0);
  if (!passwordField) throw new LoginError('Password field not found');
  await session.type(passwordField, creds.password, cfg.typingDelay);

  if (!(await clickFirst(session, sel.loginSubmit))) {
    throw new LoginError('Login submit button not found');
  }

  const reachedFeed = await session.waitForUrl(LINKEDIN_FEED_FRAGMENT, cfg.loginTimeout);
  if (!reachedFeed) {
    throw new LoginError('Login did not reach the feed; the account may need a manual checkpoint');
  }
  log?.info('Logged in to LinkedIn');
}
