import type { ScrapeConfig } from '../config.js';
import { NotFoundError } from '../errors.js';
import type { Logger } from '../logger.js';
import { findItems } from './extract.js';
import { navigateWithRetry } from './navigator.js';
import type { BrowserSession } from './session.js';
import {
  LINKEDIN_BASE_URL,
  LINKEDIN_COMPANY_SEARCH_URL_TEMPLATE,
  LINKEDIN_PEOPLE_URL_TEMPLATE,
  MAPS_SEARCH_URL_TEMPLATE,
} from './selectors.js';
import type { ProfileSelectors, ReviewSelectors, SelectorList } from './selectors.js';

export type SearchConfig = Pick<ScrapeConfig,
  'pageTimeout' | 'markerTimeout' | 'searchTimeout' | 'scraperRetries' | 'scraperRetryDelay'>;

export interface SearchCandidate {
  label: string;
  href: string;
}

function normalize(s: string): string {
  return s.trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * The site ranks results; we only pick deterministically from what it rendered:
 * exact label match, then substring match either way, then the first result.
 * Ties go to render order.
 */
export function pickCandidate(query: string, candidates: readonly SearchCandidate[]): SearchCandidate | undefined {
  const q = normalize(query);
  return candidates.find(c => normalize(c.label) === q)
    ?? candidates.find(c => {
      const label = normalize(c.label);
      return label.length > 0 && (label.includes(q) || q.includes(label));
    })
    ?? candidates[0];
}

export async function collectCandidates(
  session: BrowserSession,
  selectors: SelectorList,
  baseUrl: string,
): Promise<SearchCandidate[]> {
  const items = await findItems(session, selectors);
  if (!items.found) return [];

  const candidates: SearchCandidate[] = [];
  for (const el of items.value) {
    const href = await el.attr('href');
    if (!href) continue;
    const label = (await el.attr('aria-label')) ?? (await el.text());
    candidates.push({ label: label.trim(), href: new URL(href, baseUrl).href });
  }
  return candidates;
}

// ── Google Maps ──

export function buildMapsSearchUrl(query: string): string {
  return MAPS_SEARCH_URL_TEMPLATE.replace('{query}', encodeURIComponent(query.trim()).replace(/%20/g, '+'));
}

/** Resolves a business name to the URL of its detail view. */
export async function resolveBusiness(
  session: BrowserSession,
  query: string,
  sel: ReviewSelectors,
  cfg: SearchConfig,
  log?: Logger,
): Promise<string> {
  const searchUrl = buildMapsSearchUrl(query);
  await navigateWithRetry(session, searchUrl, cfg);

  const matched = await session.waitForAny([...sel.placeHeader, ...sel.searchResult], cfg.searchTimeout);
  if (!matched) {
    throw new NotFoundError(query, `no search results within ${cfg.searchTimeout}ms`);
  }

  // The search jumped straight to a single place
  if (sel.placeHeader.includes(matched)) {
    log?.debug('Search opened detail view directly', { url: session.currentUrl() });
    return session.currentUrl();
  }

  const candidates = await collectCandidates(session, sel.searchResult, searchUrl);
  const pick = pickCandidate(query, candidates);
  if (!pick) {
    throw new NotFoundError(query, 'search results carried no links');
  }
  log?.debug('Picked search result', { label: pick.label, candidates: candidates.length });
  return pick.href;
}

// ── LinkedIn ──

export type CompanyRef =
  | { kind: 'slug'; slug: string }
  | { kind: 'name'; name: string }
  | { kind: 'unsupported-url'; url: string };

const COMPANY_URL = /linkedin\.com\/company\/([^/?#]+)/i;

/**
 * A company URL yields its slug, a single token is taken as the slug itself,
 * anything else is a name to search for.
 */
export function parseCompanyInput(input: string): CompanyRef {
  const trimmed = input.trim();
  if (/^https?:\/\//i.test(trimmed) || /linkedin\.com\//i.test(trimmed)) {
    const match = trimmed.match(COMPANY_URL);
    return match ? { kind: 'slug', slug: match[1] } : { kind: 'unsupported-url', url: trimmed };
  }
  if (/^\S+$/.test(trimmed)) {
    return { kind: 'slug', slug: encodeURIComponent(trimmed) };
  }
  return { kind: 'name', name: trimmed };
}

export function buildPeopleUrl(slug: string): string {
  return LINKEDIN_PEOPLE_URL_TEMPLATE.replace('{slug}', slug);
}

/** Resolves a company URL, slug or name to its people page. */
export async function resolveCompany(
  session: BrowserSession,
  identifier: string,
  sel: ProfileSelectors,
  cfg: SearchConfig,
  log?: Logger,
): Promise<string> {
  const ref = parseCompanyInput(identifier);
  if (ref.kind === 'slug') return buildPeopleUrl(ref.slug);
  if (ref.kind === 'unsupported-url') {
    throw new NotFoundError(identifier, 'not a LinkedIn company URL');
  }

  const searchUrl = LINKEDIN_COMPANY_SEARCH_URL_TEMPLATE.replace('{query}', encodeURIComponent(ref.name));
  await navigateWithRetry(session, searchUrl, cfg);
  const matched = await session.waitForAny(sel.companySearchResult, cfg.searchTimeout);
  if (!matched) {
    throw new NotFoundError(identifier, `no company search results within ${cfg.searchTimeout}ms`);
  }

  const candidates = (await collectCandidates(session, sel.companySearchResult, LINKEDIN_BASE_URL))
    .filter(c => COMPANY_URL.test(c.href));
  const pick = pickCandidate(ref.name, candidates);
  const slug = pick?.href.match(COMPANY_URL)?.[1];
  if (!pick || !slug) {
    throw new NotFoundError(identifier, 'company search returned no company links');
  }
  log?.debug('Picked company', { label: pick.label, slug });
  return buildPeopleUrl(slug);
}
