import { Hono } from 'hono';
import { randomUUID } from 'node:crypto';
import type { z } from 'zod';
import type { ScrapeConfig } from '../config.js';
import { ValidationError, getErrorMessage } from '../errors.js';
import { logger as rootLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { runBatch } from '../scraper/batch.js';
import { createProfilesTarget } from '../scraper/profiles.js';
import { createReviewsTarget } from '../scraper/reviews.js';
import type { SelectorConfig } from '../scraper/selectors.js';
import type { SessionFactory } from '../scraper/session.js';
import { version } from '../version.js';
import { profilesRequestSchema, reviewsRequestSchema } from './schemas.js';
import { toProfilesResponse, toReviewsResponse } from './serialize.js';

export interface AppDeps {
  openSession: SessionFactory;
  selectors: SelectorConfig;
  cfg: ScrapeConfig;
  log?: Logger;
}

async function parseBody<S extends z.ZodTypeAny>(schema: S, read: () => Promise<unknown>): Promise<z.output<S>> {
  let raw: unknown;
  try {
    raw = await read();
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.length > 0 ? i.path.join('.') : 'body'}: ${i.message}`);
    throw new ValidationError('Invalid request body', issues);
  }
  return result.data;
}

/**
 * HTTP surface. Every accepted request gets its own browser session and
 * answers 200 whatever happened to individual businesses.
 */
export function createApp(deps: AppDeps): Hono {
  const app = new Hono();
  const log = deps.log ?? rootLogger;

  app.get('/health', (c) => c.json({ status: 'ok', version }));

  app.post('/reviews', async (c) => {
    const body = await parseBody(reviewsRequestSchema, () => c.req.json());
    const reqLog = log.child({ request_id: randomUUID() });
    reqLog.info('Received reviews request', { businesses: body.business_names });

    const target = createReviewsTarget(deps.selectors.reviews, deps.cfg);
    const batch = await runBatch(body.business_names, target, { openSession: deps.openSession, log: reqLog });
    return c.json(toReviewsResponse(batch));
  });

  app.post('/linkedin-profiles', async (c) => {
    const body = await parseBody(profilesRequestSchema, () => c.req.json());
    const reqLog = log.child({ request_id: randomUUID() });
    reqLog.info('Received LinkedIn request', {
      businesses: body.business_names,
      include_details: body.include_details,
    });

    const target = createProfilesTarget(deps.selectors.profiles, deps.cfg, {
      credentials: { email: body.email, password: body.password },
      includeDetails: body.include_details,
    });
    const batch = await runBatch(body.business_names, target, { openSession: deps.openSession, log: reqLog });
    return c.json(toProfilesResponse(batch));
  });

  app.notFound((c) => c.json({ error: 'NOT_FOUND', message: `No route for ${c.req.method} ${c.req.path}` }, 404));

  app.onError((err, c) => {
    if (err instanceof ValidationError) {
      return c.json(err.toJSON(), 400);
    }
    log.error('Error processing request', { path: c.req.path, error: getErrorMessage(err) });
    return c.json({ error: 'INTERNAL_ERROR', message: getErrorMessage(err) }, 500);
  });

  return app;
}
