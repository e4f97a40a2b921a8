import type { ScrapeConfig } from '../config.js';
import { SessionError, getErrorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { BrowserSession } from './session.js';
import type { SelectorList } from './selectors.js';

/** Triggers one "load more" step; resolves false when there was nothing to trigger. */
export type LoadAction = (session: BrowserSession) => Promise<boolean>;

export type StopReason = 'exhausted' | 'stalled' | 'cap' | 'limit' | 'error';

export interface PaginationOptions {
  countSelectors: SelectorList;
  action: LoadAction;
  maxActions: number;
  stallLimit: number;
  delayMs: number;
  maxItems?: number;
}

export interface PaginationOutcome {
  actions: number;
  count: number;
  reason: StopReason;
  error?: string;
}

export function paginationOptions(
  cfg: Pick<ScrapeConfig, 'maxLoadActions' | 'stallLimit' | 'requestDelay'>,
  countSelectors: SelectorList,
  action: LoadAction,
  maxItems?: number,
): PaginationOptions {
  return {
    countSelectors,
    action,
    maxActions: cfg.maxLoadActions,
    stallLimit: cfg.stallLimit,
    delayMs: cfg.requestDelay * 1000,
    maxItems,
  };
}

/** Count of the first selector that matches anything. */
export async function countItems(session: BrowserSession, selectors: SelectorList): Promise<number> {
  for (const selector of selectors) {
    const n = await session.count(selector);
    if (n > 0) return n;
  }
  return 0;
}

/**
 * Keeps triggering the load action until content stops growing.
 * Stops after `stallLimit` consecutive loads that add nothing, when the action has
 * nothing left to trigger, at `maxItems`, or after `maxActions` loads at most.
 * Only SessionError escapes; any other failure ends loading with reason "error".
 */
export async function loadAll(
  session: BrowserSession,
  opts: PaginationOptions,
  log?: Logger,
): Promise<PaginationOutcome> {
  let actions = 0;
  let strikes = 0;
  let count = 0;

  const done = (reason: StopReason, error?: string): PaginationOutcome => {
    const outcome: PaginationOutcome = { actions, count, reason, ...(error !== undefined ? { error } : {}) };
    log?.info('Pagination stopped', { ...outcome });
    return outcome;
  };

  try {
    count = await countItems(session, opts.countSelectors);
    if (reachedLimit(count, opts.maxItems)) return done('limit');

    while (actions < opts.maxActions) {
      const triggered = await opts.action(session);
      if (!triggered) return done('exhausted');
      actions++;

      await session.pause(opts.delayMs);
      const next = await countItems(session, opts.countSelectors);
      strikes = next > count ? 0 : strikes + 1;
      count = Math.max(count, next);
      log?.debug('Loaded more content', { actions, count, strikes });

      if (reachedLimit(count, opts.maxItems)) return done('limit');
      if (strikes >= opts.stallLimit) return done('stalled');
    }
    return done('cap');
  } catch (err) {
    if (err instanceof SessionError) throw err;
    return done('error', getErrorMessage(err));
  }
}

function reachedLimit(count: number, maxItems: number | undefined): boolean {
  return maxItems !== undefined && count >= maxItems;
}

// ── Load actions ──

export function scrollAction(containers: SelectorList): LoadAction {
  return async (session) => {
    await session.scrollToBottom(containers);
    return true;
  };
}

/**
 * Clicks the first present "load more" button, optionally after scrolling.
 * Not triggered when no button is present.
 */
export function clickAction(buttons: SelectorList, opts: { scrollFirst?: SelectorList } = {}): LoadAction {
  return async (session) => {
    if (opts.scrollFirst) {
      await session.scrollToBottom(opts.scrollFirst);
    }
    for (const selector of buttons) {
      if (await session.click(selector)) return true;
    }
    return false;
  };
}

/** Clicks a "load more" button when present, scrolls otherwise. Always triggered. */
export function clickOrScrollAction(buttons: SelectorList, containers: SelectorList): LoadAction {
  const click = clickAction(buttons);
  const scroll = scrollAction(containers);
  return async (session) => (await click(session)) || scroll(session);
}
