import type { ScrapeConfig } from '../config.js';
import { SessionError, getErrorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { Credentials, ProfileRecord } from '../types/index.js';
import type { EnrichOutcome, ScrapeTarget } from './batch.js';
import { extractItems, findAttr, findElement, findText, valueOr } from './extract.js';
import type { ExtractionOutcome, MissCounter } from './extract.js';
import { login } from './login.js';
import { openPage } from './navigator.js';
import { clickAction, loadAll, paginationOptions } from './pagination.js';
import type { PaginationOutcome } from './pagination.js';
import { resolveCompany } from './search.js';
import type { BrowserSession, ElementRef } from './session.js';
import { LINKEDIN_BASE_URL } from './selectors.js';
import type { ProfileSelectors } from './selectors.js';

type ProfileDetails = Pick<ProfileRecord, 'location' | 'about' | 'latest_job_title' | 'latest_job_company'>;

/** Profile URL without query string or fragment. */
export function cleanProfileUrl(url: string): string {
  const parsed = new URL(url, LINKEDIN_BASE_URL);
  parsed.search = '';
  parsed.hash = '';
  return parsed.href;
}

export async function parseProfileCard(
  card: ElementRef,
  sel: ProfileSelectors,
  misses: MissCounter,
): Promise<ProfileRecord | null> {
  const link = misses.track('profile_url', await findAttr(card, sel.cardLink, 'href'));
  const name = misses.track('name', await findText(card, sel.cardName));
  // Members hidden behind privacy settings have no link: nothing to identify them by
  if (!link.found || !name.found) return null;

  const subtitle = misses.track('subtitle', await findText(card, sel.cardSubtitle));
  return {
    name: name.value,
    subtitle: valueOr(subtitle, null),
    profile_url: cleanProfileUrl(link.value),
    location: null,
    about: null,
    latest_job_title: null,
    latest_job_company: null,
  };
}

export async function extractProfiles(
  session: BrowserSession,
  sel: ProfileSelectors,
  opts: { log?: Logger } = {},
): Promise<ExtractionOutcome<ProfileRecord>> {
  const outcome = await extractItems(session, sel.card, (card, misses) => parseProfileCard(card, sel, misses), opts);

  const seen = new Set<string>();
  const records = outcome.records.filter(profile => {
    if (seen.has(profile.profile_url)) return false;
    seen.add(profile.profile_url);
    return true;
  });
  return { ...outcome, records };
}

export function loadProfiles(
  session: BrowserSession,
  sel: ProfileSelectors,
  cfg: ScrapeConfig,
  log?: Logger,
): Promise<PaginationOutcome> {
  // Scroll first so lazily rendered cards and the button itself come into view
  const action = clickAction(sel.showMore, { scrollFirst: [] });
  return loadAll(session, paginationOptions(cfg, sel.card, action), log);
}

export async function scrapeProfileDetails(
  session: BrowserSession,
  profileUrl: string,
  sel: ProfileSelectors,
  cfg: ScrapeConfig,
): Promise<ProfileDetails> {
  await openPage(session, profileUrl, sel.profileHeader, cfg);

  const location = await findText(session, sel.location);

  for (const selector of sel.aboutExpand) {
    if (await session.click(selector)) break;
  }
  const about = await findText(session, sel.aboutText);

  const job = await findElement(session, sel.latestJob);
  const title = job.found ? await findText(job.value, sel.latestJobTitle) : job;
  const company = job.found ? await findText(job.value, sel.latestJobCompany) : job;

  return {
    location: valueOr(location, null),
    about: valueOr(about, null),
    latest_job_title: valueOr(title, null),
    latest_job_company: valueOr(company, null),
  };
}

/** Visits each profile page in turn; a page that fails to load keeps empty details. */
export async function enrichProfiles(
  session: BrowserSession,
  profiles: ProfileRecord[],
  sel: ProfileSelectors,
  cfg: ScrapeConfig,
  log?: Logger,
): Promise<EnrichOutcome<ProfileRecord>> {
  const records: ProfileRecord[] = [];
  let failures = 0;

  for (const [i, profile] of profiles.entries()) {
    if (i > 0) await session.pause(cfg.requestDelay * 1000);
    try {
      const details = await scrapeProfileDetails(session, profile.profile_url, sel, cfg);
      records.push({ ...profile, ...details });
    } catch (err) {
      if (err instanceof SessionError) throw err;
      failures++;
      log?.warn('Profile details unavailable', { profile_url: profile.profile_url, error: getErrorMessage(err) });
      records.push(profile);
    }
  }
  return { records, failures };
}

export interface ProfilesTargetOptions {
  credentials: Credentials;
  includeDetails?: boolean;
}

export function createProfilesTarget(
  sel: ProfileSelectors,
  cfg: ScrapeConfig,
  opts: ProfilesTargetOptions,
): ScrapeTarget<ProfileRecord> {
  return {
    kind: 'profiles',
    prepare: (session, log) => login(session, opts.credentials, sel, cfg, log),
    resolve: (session, identifier, log) => resolveCompany(session, identifier, sel, cfg, log),
    open: async (session, url) => { await openPage(session, url, sel.peopleMarker, cfg); },
    load: (session, log) => loadProfiles(session, sel, cfg, log),
    extract: (session, log) => extractProfiles(session, sel, { log }),
    ...(opts.includeDetails
      ? { enrich: (session: BrowserSession, records: ProfileRecord[], log: Logger) => enrichProfiles(session, records, sel, cfg, log) }
      : {}),
  };
}
