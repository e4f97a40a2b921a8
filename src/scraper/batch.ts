import { ScrapeError, SessionError, getErrorMessage } from '../errors.js';
import { logger as rootLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type {
  BatchResult, BatchStatus, EntityPhase, EntityResult, ScrapeKind,
} from '../types/index.js';
import type { ExtractionOutcome } from './extract.js';
import type { PaginationOutcome } from './pagination.js';
import type { BrowserSession, SessionFactory } from './session.js';

export interface EnrichOutcome<R> {
  records: R[];
  failures: number;
}

/**
 * One kind of scrape, split into the steps the orchestrator drives per entity.
 */
export interface ScrapeTarget<R> {
  readonly kind: ScrapeKind;
  /** Runs once per batch before any entity, e.g. a login. Failing it fails the batch. */
  prepare?(session: BrowserSession, log: Logger): Promise<void>;
  resolve(session: BrowserSession, identifier: string, log: Logger): Promise<string>;
  open(session: BrowserSession, url: string, log: Logger): Promise<void>;
  load(session: BrowserSession, log: Logger): Promise<PaginationOutcome>;
  extract(session: BrowserSession, log: Logger): Promise<ExtractionOutcome<R>>;
  enrich?(session: BrowserSession, records: R[], log: Logger): Promise<EnrichOutcome<R>>;
}

export interface BatchOptions {
  openSession: SessionFactory;
  log?: Logger;
}

const EMPTY_MESSAGES: Record<ScrapeKind, string> = {
  reviews: 'No reviews found for any of the businesses',
  profiles: 'No LinkedIn profiles found for any of the businesses',
};

export function describeFailure(err: unknown, phase?: EntityPhase): string {
  if (err instanceof ScrapeError) return `[${err.code}] ${err.message}`;
  const where = phase ? ` while ${phase}` : '';
  return `[UNEXPECTED] ${getErrorMessage(err)}${where}`;
}

function failed<R>(identifier: string, detail: string): EntityResult<R> {
  return { entity_identifier: identifier, records: [], status: 'failure', error_detail: detail };
}

export function batchStatus<R>(data: readonly EntityResult<R>[], fatal: boolean): BatchStatus {
  if (fatal) return 'failure';
  if (data.length > 0 && data.every(d => d.status === 'failure')) return 'failure';
  if (data.every(d => d.status === 'success')) return 'success';
  return 'partial';
}

/**
 * Scrapes every identifier in order against one browser session.
 * Entity failures are recorded and the loop moves on; losing the session
 * fails the current and all remaining entities. The session is always closed.
 */
export async function runBatch<R>(
  identifiers: readonly string[],
  target: ScrapeTarget<R>,
  opts: BatchOptions,
): Promise<BatchResult<R>> {
  const log = (opts.log ?? rootLogger).child({ kind: target.kind });
  const startedAt = Date.now();

  const finish = (data: EntityResult<R>[], fatal: string | null): BatchResult<R> => {
    const status = batchStatus(data, fatal !== null);
    const anyRecords = data.some(d => d.records.length > 0);
    const error = fatal ?? (anyRecords ? null : EMPTY_MESSAGES[target.kind]);
    log.info('Batch finished', {
      status,
      entities: data.length,
      records: data.reduce((sum, d) => sum + d.records.length, 0),
      duration_ms: Date.now() - startedAt,
    });
    return { status, data, error };
  };

  log.info('Batch started', { entities: identifiers.length });

  let session: BrowserSession;
  try {
    session = await opts.openSession();
  } catch (err) {
    const detail = describeFailure(err);
    log.error('Could not open browser session', { error: detail });
    return finish(identifiers.map(id => failed<R>(id, detail)), getErrorMessage(err));
  }

  try {
    if (target.prepare) {
      try {
        await target.prepare(session, log);
      } catch (err) {
        const detail = describeFailure(err);
        log.error('Batch preparation failed', { error: detail });
        return finish(identifiers.map(id => failed<R>(id, detail)), getErrorMessage(err));
      }
    }

    const data: EntityResult<R>[] = [];
    for (let i = 0; i < identifiers.length; i++) {
      const identifier = identifiers[i];
      try {
        data.push(await scrapeEntity(session, identifier, target, log.child({ entity: identifier })));
      } catch (err) {
        // scrapeEntity only lets session loss through
        const detail = describeFailure(err);
        log.error('Browser session lost, ending batch', { entity: identifier, error: detail });
        data.push(failed<R>(identifier, detail));
        for (const rest of identifiers.slice(i + 1)) {
          data.push(failed<R>(rest, '[SESSION_LOST] not processed: browser session was lost'));
        }
        return finish(data, getErrorMessage(err));
      }
    }
    return finish(data, null);
  } finally {
    try {
      await session.close();
    } catch (err) {
      log.warn('Failed to close browser session', { error: getErrorMessage(err) });
    }
  }
}

async function scrapeEntity<R>(
  session: BrowserSession,
  identifier: string,
  target: ScrapeTarget<R>,
  log: Logger,
): Promise<EntityResult<R>> {
  let phase: EntityPhase = 'pending';
  const enter = (next: EntityPhase) => {
    phase = next;
    log.debug('Entity phase', { phase });
  };

  try {
    enter('resolving');
    const url = await target.resolve(session, identifier, log);

    enter('loading');
    await target.open(session, url, log);
    const pagination = await target.load(session, log);

    enter('extracting');
    const extraction = await target.extract(session, log);
    let records = extraction.records;
    const problems: string[] = [];
    if (pagination.reason === 'error') {
      problems.push(`loading stopped early: ${pagination.error ?? 'unknown error'}`);
    }
    if (target.enrich && records.length > 0) {
      const enriched = await target.enrich(session, records, log);
      records = enriched.records;
      if (enriched.failures > 0) {
        problems.push(`${enriched.failures} of ${records.length} detail pages failed to load`);
      }
    }

    enter('done');
    const status = problems.length > 0 ? 'partial_failure' : 'success';
    log.info('Entity scraped', {
      url,
      status,
      records: records.length,
      skipped: extraction.skipped,
      load_actions: pagination.actions,
      stop_reason: pagination.reason,
    });
    return {
      entity_identifier: identifier,
      records,
      status,
      error_detail: problems.length > 0 ? problems.join('; ') : null,
    };
  } catch (err) {
    if (err instanceof SessionError) throw err;
    const failedIn = phase;
    enter('failed');
    const detail = describeFailure(err, failedIn);
    log.warn('Entity failed', { phase: failedIn, error: detail });
    return failed<R>(identifier, detail);
  }
}
