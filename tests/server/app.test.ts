import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SessionError } from '../../src/errors.js';
import { createApp } from '../../src/server/app.js';
import type { FakePage } from '../helpers.js';
import { FakeSession, placePage, silentLogger, testConfig, testSelectors } from '../helpers.js';

function appWith(pages: Record<string, FakePage>, sessions: FakeSession[] = []) {
  return createApp({
    openSession: async () => {
      const session = new FakeSession(pages);
      sessions.push(session);
      return session;
    },
    selectors: testSelectors,
    cfg: testConfig,
    log: silentLogger,
  });
}

function postJson(body: unknown): RequestInit {
  return { method: 'POST', headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(body) };
}

describe('GET /health', () => {
  it('reports ok with the package version', async () => {
    const res = await appWith({}).request('/health');
    assert.equal(res.status, 200);
    assert.deepEqual(await res.json(), { status: 'ok', version: '0.1.0' });
  });
});

describe('POST /reviews', () => {
  const pages = {
    'https://www.google.com/maps/search/Acme+Cafe': placePage('Acme Cafe', [
      { author: 'Ann Example', rating: '5 stars', text: 'Great coffee.', date: '2 weeks ago' },
    ]),
    'https://www.google.com/maps/search/Nowhere': { elements: {} },
  };

  it('returns reviews per business with a fresh session per request', async () => {
    const sessions: FakeSession[] = [];
    const app = appWith(pages, sessions);
    const res = await app.request('/reviews', postJson({ business_names: ['Acme Cafe', 'Nowhere'] }));

    assert.equal(res.status, 200);
    assert.deepEqual(await res.json(), {
      status: 'partial',
      error: null,
      data: [
        {
          business_name: 'Acme Cafe',
          status: 'success',
          error: null,
          reviews: [
            { author: 'Ann Example', rating: '5 stars', text: 'Great coffee.', date: '2 weeks ago', owner_response: null },
          ],
        },
        {
          business_name: 'Nowhere',
          status: 'failure',
          error: '[NOT_FOUND] No match for "Nowhere": no search results within 1000ms',
          reviews: [],
        },
      ],
    });

    await app.request('/reviews', postJson({ business_names: ['Acme Cafe'] }));
    assert.equal(sessions.length, 2);
    assert.equal(sessions.every(s => s.closed), true);
  });

  it('answers 200 with status failure when every business fails', async () => {
    const res = await appWith(pages).request('/reviews', postJson({ business_names: ['Nowhere'] }));
    assert.equal(res.status, 200);
    const body = await res.json();
    assert.equal(body.status, 'failure');
    assert.equal(body.error, 'No reviews found for any of the businesses');
  });

  it('answers 200 when the browser session is lost', async () => {
    const app = appWith({
      'https://www.google.com/maps/search/Acme+Cafe': { fail: new SessionError('Browser session is no longer usable') },
    });
    const res = await app.request('/reviews', postJson({ business_names: ['Acme Cafe', 'Other'] }));
    assert.equal(res.status, 200);
    const body = await res.json();
    assert.equal(body.status, 'failure');
    assert.equal(body.error, 'Browser session is no longer usable');
    assert.equal(body.data.length, 2);
  });

  it('rejects a body that is not JSON', async () => {
    const res = await appWith(pages).request('/reviews', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{not json',
    });
    assert.equal(res.status, 400);
    assert.deepEqual(await res.json(), {
      error: 'VALIDATION_ERROR',
      message: 'Request body must be valid JSON',
      issues: [],
    });
  });

  it('rejects a missing or empty business list', async () => {
    const missing = await appWith(pages).request('/reviews', postJson({}));
    assert.equal(missing.status, 400);
    assert.deepEqual(await missing.json(), {
      error: 'VALIDATION_ERROR',
      message: 'Invalid request body',
      issues: ['business_names: Required'],
    });

    const empty = await appWith(pages).request('/reviews', postJson({ business_names: [] }));
    assert.deepEqual((await empty.json()).issues, ['business_names: At least one business name is required']);

    const blank = await appWith(pages).request('/reviews', postJson({ business_names: ['  '] }));
    assert.deepEqual((await blank.json()).issues, ['business_names.0: Business name must not be empty']);
  });
});

describe('POST /linkedin-profiles', () => {
  it('requires credentials', async () => {
    const res = await appWith({}).request('/linkedin-profiles', postJson({ business_names: ['acme-corp'] }));
    assert.equal(res.status, 400);
    assert.deepEqual((await res.json()).issues, ['email: Required', 'password: Required']);
  });

  it('reports a failed login for every company', async () => {
    const app = appWith({ 'https://www.linkedin.com/login': { elements: {} } });
    const res = await app.request('/linkedin-profiles', postJson({
      business_names: ['acme-corp', 'globex'],
      email: 'user@example.test',
      password: 'test-secret',
    }));

    assert.equal(res.status, 200);
    assert.deepEqual(await res.json(), {
      status: 'failure',
      error: 'Login form not found',
      data: [
        { company_name: 'acme-corp', status: 'failure', error: '[LOGIN_FAILED] Login form not found', profiles: [] },
        { company_name: 'globex', status: 'failure', error: '[LOGIN_FAILED] Login form not found', profiles: [] },
      ],
    });
  });
});

describe('unknown routes', () => {
  it('answers 404 in the error format', async () => {
    const res = await appWith({}).request('/nope');
    assert.equal(res.status, 404);
    assert.deepEqual(await res.json(), { error: 'NOT_FOUND', message: 'No route for GET /nope' });
  });
});
