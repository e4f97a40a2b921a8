import type { ScrapeConfig } from '../config.js';
import { SessionError, getErrorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { OwnerResponse, ReviewRecord } from '../types/index.js';
import type { ScrapeTarget } from './batch.js';
import { extractItems, findAttr, findElement, findText, valueOr } from './extract.js';
import type { ExtractionOutcome, MissCounter } from './extract.js';
import { openPage } from './navigator.js';
import { clickOrScrollAction, loadAll, paginationOptions } from './pagination.js';
import type { PaginationOutcome } from './pagination.js';
import { resolveBusiness } from './search.js';
import type { ElementRef, BrowserSession } from './session.js';
import type { ReviewSelectors } from './selectors.js';

export async function parseReview(
  item: ElementRef,
  sel: ReviewSelectors,
  misses: MissCounter,
): Promise<ReviewRecord | null> {
  const author = misses.track('author', await findText(item, sel.author));
  const rating = misses.track('rating', await findAttr(item, sel.rating, 'aria-label'));
  const text = misses.track('text', await findText(item, sel.text));
  // Author, rating and text make a review; without any of them the item is skipped
  if (!author.found || !rating.found || !text.found) return null;

  const date = misses.track('date', await findText(item, sel.date));
  return {
    author: author.value,
    rating: rating.value,
    text: text.value,
    date: valueOr(date, ''),
    owner_response: await parseOwnerResponse(item, sel),
  };
}

async function parseOwnerResponse(item: ElementRef, sel: ReviewSelectors): Promise<OwnerResponse | null> {
  const block = await findElement(item, sel.ownerResponse);
  if (!block.found) return null;
  const text = await findText(block.value, sel.ownerResponseText);
  if (!text.found) return null;
  const date = await findText(block.value, sel.ownerResponseDate);
  return { text: text.value, date: valueOr(date, '') };
}

/**
 * Clicks every "More" button so truncated texts are read in full.
 * A button that fails to click leaves its review truncated; only a lost session escapes.
 */
export async function expandReviewTexts(
  session: BrowserSession,
  sel: ReviewSelectors,
  log?: Logger,
): Promise<number> {
  let expanded = 0;
  let failed = 0;
  for (const selector of sel.expandText) {
    for (const button of await session.findAll(selector)) {
      try {
        await button.click();
        expanded++;
      } catch (err) {
        if (err instanceof SessionError) throw err;
        failed++;
        log?.debug('Expand button click failed', { selector, error: getErrorMessage(err) });
      }
    }
  }
  if (failed > 0) {
    log?.warn('Some review texts stayed truncated', { expanded, failed });
  }
  return expanded;
}

export async function extractReviews(
  session: BrowserSession,
  sel: ReviewSelectors,
  opts: { limit?: number; log?: Logger } = {},
): Promise<ExtractionOutcome<ReviewRecord>> {
  await expandReviewTexts(session, sel, opts.log);
  return extractItems(session, sel.item, (item, misses) => parseReview(item, sel, misses), opts);
}

/** Opens the detail view and switches to its reviews tab when there is one. */
export async function openReviews(
  session: BrowserSession,
  url: string,
  sel: ReviewSelectors,
  cfg: ScrapeConfig,
  log?: Logger,
): Promise<void> {
  await openPage(session, url, sel.placeHeader, cfg);

  let tabClicked = false;
  for (const selector of sel.reviewsTab) {
    if (await session.click(selector)) {
      tabClicked = true;
      await session.pause(cfg.requestDelay * 1000);
      break;
    }
  }
  log?.debug(tabClicked ? 'Clicked reviews tab' : 'Reviews tab not found or already selected');

  // Reviews may be absent altogether; that is an empty result, not a failure
  await session.waitForAny(sel.item, cfg.markerTimeout);
}

export function loadReviews(
  session: BrowserSession,
  sel: ReviewSelectors,
  cfg: ScrapeConfig,
  log?: Logger,
): Promise<PaginationOutcome> {
  const action = clickOrScrollAction(sel.moreReviews, sel.scrollContainer);
  return loadAll(session, paginationOptions(cfg, sel.item, action, cfg.maxReviews), log);
}

export function createReviewsTarget(sel: ReviewSelectors, cfg: ScrapeConfig): ScrapeTarget<ReviewRecord> {
  return {
    kind: 'reviews',
    resolve: (session, query, log) => resolveBusiness(session, query, sel, cfg, log),
    open: (session, url, log) => openReviews(session, url, sel, cfg, log),
    load: (session, log) => loadReviews(session, sel, cfg, log),
    extract: (session, log) => extractReviews(session, sel, { limit: cfg.maxReviews, log }),
  };
}
