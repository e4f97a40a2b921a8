import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SessionError } from '../../src/errors.js';
import {
  clickAction, clickOrScrollAction, countItems, loadAll, paginationOptions, scrollAction,
} from '../../src/scraper/pagination.js';
import type { LoadAction } from '../../src/scraper/pagination.js';
import type { FakePage } from '../helpers.js';
import { FakeSession, captureLogger, growingPeoplePage, testConfig } from '../helpers.js';

const URL_LIST = 'https://example.test/list';

/** A page whose item count follows `counts`, advancing one step per scroll. */
function scrollingPage(counts: number[]): FakePage {
  let step = 0;
  return {
    elements: () => ({ 'li.item': Array.from({ length: counts[Math.min(step, counts.length - 1)] }, () => ({})) }),
    onScroll: () => { step++; },
  };
}

async function sessionOn(page: FakePage): Promise<FakeSession> {
  const session = new FakeSession({ [URL_LIST]: page });
  await session.open(URL_LIST);
  return session;
}

describe('loadAll', () => {
  it('issues exactly four loads for 50 cards shown ten more at a time', async () => {
    const session = await sessionOn(growingPeoplePage(50, 10, 10));
    const outcome = await loadAll(session, paginationOptions(testConfig, ['li.card'], clickAction(['button.show-more'])));

    assert.deepEqual(outcome, { actions: 4, count: 50, reason: 'exhausted' });
    assert.equal(session.clicks.length, 4);
  });

  it('stops after two consecutive loads that add nothing', async () => {
    const session = await sessionOn(scrollingPage([3]));
    const outcome = await loadAll(session, paginationOptions(testConfig, ['li.item'], scrollAction([])));

    assert.deepEqual(outcome, { actions: 2, count: 3, reason: 'stalled' });
  });

  it('keeps going while growth interrupts the strikes', async () => {
    // grows on every other scroll: one strike at a time, never two in a row
    const session = await sessionOn(scrollingPage([5, 5, 10, 10, 15, 15, 20]));
    const outcome = await loadAll(session, paginationOptions(testConfig, ['li.item'], scrollAction([])));

    assert.deepEqual(outcome, { actions: 8, count: 20, reason: 'stalled' });
  });

  it('never exceeds the action cap', async () => {
    for (const maxLoadActions of [1, 3, 7]) {
      const session = await sessionOn(scrollingPage(Array.from({ length: 20 }, (_, i) => i + 1)));
      const cfg = { ...testConfig, maxLoadActions };
      const outcome = await loadAll(session, paginationOptions(cfg, ['li.item'], scrollAction([])));

      assert.equal(outcome.reason, 'cap');
      assert.equal(outcome.actions, maxLoadActions);
      assert.equal(session.scrolls, maxLoadActions);
    }
  });

  it('stops once the item limit is reached', async () => {
    const session = await sessionOn(scrollingPage([10, 20, 30, 40]));
    const outcome = await loadAll(session, paginationOptions(testConfig, ['li.item'], scrollAction([]), 25));

    assert.deepEqual(outcome, { actions: 2, count: 30, reason: 'limit' });
  });

  it('does not load at all when the limit is already met', async () => {
    const session = await sessionOn(scrollingPage([30]));
    const outcome = await loadAll(session, paginationOptions(testConfig, ['li.item'], scrollAction([]), 25));

    assert.deepEqual(outcome, { actions: 0, count: 30, reason: 'limit' });
    assert.equal(session.scrolls, 0);
  });

  it('waits the configured delay after every load', async () => {
    const session = await sessionOn(scrollingPage([3]));
    const cfg = { ...testConfig, requestDelay: 1.5 };
    await loadAll(session, paginationOptions(cfg, ['li.item'], scrollAction([])));

    assert.deepEqual(session.pauses, [1500, 1500]);
  });

  it('ends with reason error when a load fails', async () => {
    const session = await sessionOn(scrollingPage([3, 6]));
    let calls = 0;
    const action: LoadAction = async (s) => {
      calls++;
      if (calls === 2) throw new Error('element is not attached to the DOM');
      await s.scrollToBottom([]);
      return true;
    };
    const { logger, entries } = captureLogger('info');
    const outcome = await loadAll(session, paginationOptions(testConfig, ['li.item'], action), logger);

    assert.deepEqual(outcome, { actions: 1, count: 6, reason: 'error', error: 'element is not attached to the DOM' });
    assert.equal(entries.at(-1)?.msg, 'Pagination stopped');
    assert.equal(entries.at(-1)?.reason, 'error');
  });

  it('lets a lost session through', async () => {
    const session = await sessionOn(scrollingPage([3]));
    const action: LoadAction = async () => {
      throw new SessionError('Browser session is no longer usable');
    };
    await assert.rejects(loadAll(session, paginationOptions(testConfig, ['li.item'], action)), SessionError);
  });
});

describe('countItems', () => {
  it('counts the first selector that matches', async () => {
    const session = await sessionOn({ elements: { 'li.b': [{}, {}], 'li.c': [{}] } });
    assert.equal(await countItems(session, ['li.a', 'li.b', 'li.c']), 2);
    assert.equal(await countItems(session, ['li.z']), 0);
  });
});

describe('load actions', () => {
  it('clickAction reports false when no button is present', async () => {
    const session = await sessionOn({ elements: {} });
    assert.equal(await clickAction(['button.more'])(session), false);
  });

  it('clickAction can scroll before looking for the button', async () => {
    const session = await sessionOn({ elements: { 'button.more': [{}] } });
    assert.equal(await clickAction(['button.more'], { scrollFirst: [] })(session), true);
    assert.equal(session.scrolls, 1);
    assert.deepEqual(session.clicks, ['button.more']);
  });

  it('clickOrScrollAction clicks when it can and scrolls otherwise', async () => {
    const withButton = await sessionOn({ elements: { 'button.more': [{}] } });
    assert.equal(await clickOrScrollAction(['button.more'], ['div.feed'])(withButton), true);
    assert.deepEqual(withButton.clicks, ['button.more']);
    assert.equal(withButton.scrolls, 0);

    const without = await sessionOn({ elements: {} });
    assert.equal(await clickOrScrollAction(['button.more'], ['div.feed'])(without), true);
    assert.equal(without.scrolls, 1);
  });
});
