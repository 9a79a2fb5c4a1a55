import { describe, it } from 'node:test';
import assert from 'node:assert';
import { DOM_IDS, createDashboard } from '../src/dashboard.js';
import { fmtClock } from '../src/lib/format.js';
import { CLOCK_INTERVAL_MS } from '../src/modules/clock.js';
import type { FetchLike } from '../src/modules/fetch.js';
import { POLL_INTERVAL_MS } from '../src/modules/stock-poller.js';
import { ManualScheduler, deferred, fetchReturning, jsonResponse, loadPage, nextOutcome, quote, renderedSymbols } from './helpers.js';

const FIXED_NOW = new Date(2026, 9, 18, 15, 4, 5);

function setup(fetchImpl: FetchLike = fetchReturning(async () => jsonResponse({ MSFT: quote('MSFT'), AAPL: quote('AAPL') })).fetchImpl) {
  const dom = loadPage();
  const doc = dom.window.document;
  const scheduler = new ManualScheduler();
  const calls: string[] = [];
  const stored = new Map<string, string>([['theme', 'dark']]);
  const clock = { now: FIXED_NOW };
  const dashboard = createDashboard({
    document: doc,
    storage: { getItem: (k) => stored.get(k) ?? null, setItem: (k, v) => { stored.set(k, v); } },
    fetchImpl: (url, init) => {
      calls.push(url);
      return fetchImpl(url, init);
    },
    scheduler,
    now: () => clock.now
  });
  const container = doc.getElementById(DOM_IDS.container);
  if (!container) throw new Error('page has no stock container');
  return { doc, scheduler, calls, dashboard, container, clock };
}

describe('createDashboard', () => {
  it('starts the clock, theme and poller together', async () => {
    const { doc, scheduler, calls, dashboard, container } = setup();
    const outcome = nextOutcome(dashboard.state);

    dashboard.start();

    assert.strictEqual(doc.getElementById(DOM_IDS.clock)?.textContent, fmtClock(FIXED_NOW));
    assert.ok(doc.body.classList.contains('dark-mode'));
    assert.deepStrictEqual(calls, ['/api/stocks']);
    assert.deepStrictEqual(scheduler.activeIntervals(), [CLOCK_INTERVAL_MS, POLL_INTERVAL_MS]);

    const snap = await outcome;
    assert.strictEqual(snap.status, 'rendered');
    assert.strictEqual(container.getAttribute('aria-busy'), 'false');
    assert.deepStrictEqual(renderedSymbols(container), ['AAPL', 'MSFT']);
  });

  it('re-renders the clock on every tick', () => {
    const { doc, scheduler, dashboard, clock } = setup();
    dashboard.start();
    const later = new Date(FIXED_NOW.getTime() + CLOCK_INTERVAL_MS);
    clock.now = later;

    scheduler.fire(CLOCK_INTERVAL_MS);

    assert.strictEqual(doc.getElementById(DOM_IDS.clock)?.textContent, fmtClock(later));
    assert.notStrictEqual(fmtClock(later), fmtClock(FIXED_NOW));
    dashboard.stop();
  });

  it('leaves no timers behind after stop', async () => {
    const { scheduler, dashboard } = setup();
    const outcome = nextOutcome(dashboard.state);
    dashboard.start();
    await outcome;

    dashboard.stop();

    assert.deepStrictEqual(scheduler.activeIntervals(), []);
    assert.strictEqual(dashboard.poller.running, false);
  });

  it('clears the busy flag when stop abandons a request', () => {
    const hanging: FetchLike = (_url, init) => new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
    });
    const { dashboard, container } = setup(hanging);
    dashboard.start();
    assert.strictEqual(container.getAttribute('aria-busy'), 'true');

    dashboard.stop();

    assert.strictEqual(container.getAttribute('aria-busy'), 'false');
    assert.strictEqual(dashboard.state.snapshot().status, 'idle');
  });

  it('stays busy while an overlapping poll is still in flight', async () => {
    const first = deferred<Response>();
    const second = deferred<Response>();
    const { fetchImpl } = fetchReturning(() => first.promise, () => second.promise);
    const { scheduler, dashboard, container } = setup(fetchImpl);
    dashboard.start();
    scheduler.fire(POLL_INTERVAL_MS);

    const one = nextOutcome(dashboard.state);
    first.resolve(jsonResponse({ AAPL: quote('AAPL') }));
    await one;
    assert.strictEqual(container.getAttribute('aria-busy'), 'true');

    const two = nextOutcome(dashboard.state);
    second.resolve(jsonResponse({ KO: quote('KO') }));
    await two;
    assert.strictEqual(container.getAttribute('aria-busy'), 'false');
    assert.deepStrictEqual(renderedSymbols(container), ['KO']);
    dashboard.stop();
  });

  it('refuses a page without the expected elements', () => {
    const dom = loadPage();
    dom.window.document.getElementById(DOM_IDS.container)?.remove();
    assert.throws(
      () => createDashboard({ document: dom.window.document, storage: null }),
      /Missing #stock-container/
    );
  });
});
