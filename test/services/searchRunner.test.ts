/**
 * ═══════════════════════════════════════════════════════════════════════════
 * SEARCH RUNNER TESTS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Full pipeline over a fake origin: throttled loop, failure isolation,
 * cancellation, geocoding and valuation.
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { RequestThrottle, type Listing } from '../../src/lib/listing-core/index.js';
import { runListingSearch, type SearchRunDeps } from '../../src/services/searchRunner.js';
import { createSearchRunsStore, getSearchRunLogs } from '../../src/store/searchRunsStore.js';
import { createFakeClock, createFakeFetch, loadFixture, nextDataPage } from '../support/fakes.js';

const PARIS = { latitude: 48.8566, longitude: 2.3522 };

function ids(listings: Listing[]): string[] {
  return listings.map(l => l.url.split('/').pop() ?? '');
}

function testDeps(fetchImpl: typeof fetch, extra: Partial<SearchRunDeps> = {}) {
  const clock = createFakeClock();
  const store = createSearchRunsStore();
  const deps: SearchRunDeps = {
    fetchImpl,
    throttle: new RequestThrottle(1200, clock),
    store,
    runId: 'run-1',
    ...extra,
  };
  return { deps, clock, store };
}

function html(body: string, status = 200): Response {
  return new Response(body, { status, headers: { 'Content-Type': 'text/html' } });
}

test('Runner - two queries over two pages with a duplicate and a failed page', async () => {
  const { fetchImpl, calls } = createFakeFetch(url => {
    const key = `${url.searchParams.get('text')}#${url.searchParams.get('page')}`;
    switch (key) {
      case 'rtx 3070#1':
        return html(nextDataPage([{ id: 1, price: 300 }, { id: 2 }, { id: 3, price: 120 }]));
      case 'rtx 3070#2':
        return html(nextDataPage([{ id: 3, price: 999 }, { id: 4, price: 80 }]));
      case 'rtx 3080#1':
        return html(nextDataPage([]));
      default:
        return html('Internal error', 500);
    }
  });
  const { deps, clock, store } = testDeps(fetchImpl);

  const result = await runListingSearch({ queries: ['rtx 3070', 'rtx 3080'], pages: 2 }, deps);

  assert.deepEqual(
    calls.map(c => {
      const url = new URL(c.url);
      return `${url.searchParams.get('text')}#${url.searchParams.get('page')}`;
    }),
    ['rtx 3070#1', 'rtx 3070#2', 'rtx 3080#1', 'rtx 3080#2']
  );
  assert.deepEqual(clock.sleeps, [1200, 1200, 1200], 'throttle consulted before every request');

  assert.equal(result.listings.length, 4);
  assert.deepEqual(ids(result.listings), ['4', '3', '1', '2']);
  assert.equal(result.listings[1]?.priceAmount, 120, 'earliest record of a duplicate is kept');
  assert.equal(result.listings[3]?.priceAmount, null);

  assert.deepEqual(result.batches.map(b => b.length), [3, 2, 0, 0]);
  assert.deepEqual(result.stats, { requested: 4, succeeded: 3, failed: 1, blocked: 0, parsed: 5, kept: 4 });
  assert.equal(result.status, 'SUCCESS');
  assert.equal(result.cancelled, false);
  assert.equal(result.geocode, 'not_requested');

  const run = store.getState().runs['run-1'];
  assert.equal(run?.stage, 'done');
  assert.equal(run?.status, 'SUCCESS');
  assert.equal(typeof run?.finishedAt, 'number');
});

test('Runner - slow pages still get the full pause before the next request', async () => {
  const clock = createFakeClock();
  const finishedAt: number[] = [];
  const startedAt: number[] = [];
  const { fetchImpl } = createFakeFetch(url => {
    const page = Number(url.searchParams.get('page'));
    startedAt.push(clock.now());
    clock.advance(3000);
    finishedAt.push(clock.now());
    return page === 2 ? html('Bad gateway', 502) : html(nextDataPage([{ id: page, price: 100 }]));
  });
  const { deps } = testDeps(fetchImpl, { throttle: new RequestThrottle(1200, clock) });

  const result = await runListingSearch({ queries: ['rtx 3070'], pages: 3 }, deps);

  assert.deepEqual(clock.sleeps, [1200, 1200]);
  assert.deepEqual(startedAt, [0, 4200, 8400]);
  assert.deepEqual(
    startedAt.slice(1).map((start, index) => start - (finishedAt[index] ?? 0)),
    [1200, 1200]
  );
  assert.equal(result.stats.failed, 1);
});

test('Runner - failed requests do not affect the others', async () => {
  const { fetchImpl } = createFakeFetch(url => {
    const page = Number(url.searchParams.get('page'));
    if (page === 2 || page === 4) return html('Bad gateway', 502);
    return html(nextDataPage([{ id: page, price: page * 100 }]));
  });
  const { deps, store } = testDeps(fetchImpl);

  const result = await runListingSearch({ queries: ['rtx 3070'], pages: 5 }, deps);

  assert.deepEqual(result.batches.map(ids), [['1'], [], ['3'], [], ['5']]);
  assert.deepEqual(ids(result.listings), ['1', '3', '5']);
  assert.deepEqual(
    result.failures.map(f => [f.reason, f.statusCode]),
    [
      ['http_status', 502],
      ['http_status', 502],
    ]
  );

  const warnings = getSearchRunLogs('run-1', store)
    .filter(event => event.message.startsWith('No content retrieved'))
    .map(event => event.message);
  assert.deepEqual(warnings, [
    'No content retrieved for page 2: HTTP 502',
    'No content retrieved for page 4: HTTP 502',
  ]);
});

test('Runner - reference point filters by radius and valuation sorts by margin', async () => {
  const { fetchImpl } = createFakeFetch(() =>
    html(
      nextDataPage([
        { id: 1, price: 500, body: 'RTX 3070 16 Go', lat: 48.8049, lng: 2.1204 },
        { id: 2, price: 100, body: 'RTX 3070', lat: 45.764, lng: 4.8357 },
        { id: 3, price: 400, body: 'rtx 3070 rtx 3070' },
      ])
    )
  );
  const { deps } = testDeps(fetchImpl, { geocode: async () => PARIS });

  const result = await runListingSearch(
    {
      queries: ['rtx 3070'],
      pages: 1,
      city: 'Paris',
      radiusKm: 50,
      valuation: {
        registry: {
          gpu_rtx_3070: { pattern: 'rtx\\s*3070', unitValue: 260 },
          ram_16gb: { pattern: '16\\s*go', unitValue: 35 },
        },
        negotiationPct: 10,
        dismantleBonusPct: 0,
      },
    },
    deps
  );

  assert.equal(result.geocode, 'resolved');
  assert.deepEqual(result.referencePoint, PARIS);
  assert.deepEqual(ids(result.listings), ['3', '1']);

  const [best, second] = result.listings;
  assert.deepEqual(best?.detectedAttributes, { gpu_rtx_3070: 2 });
  assert.deepEqual(best?.valuation, { attributeValueTotal: 520, negotiatedPrice: 360, estimatedMargin: 160 });
  assert.equal(best?.distanceKm, null);
  assert.deepEqual(second?.valuation, { attributeValueTotal: 295, negotiatedPrice: 450, estimatedMargin: -155 });
  assert.equal(second?.distanceKm, 17.9);
});

test('Runner - unknown city disables the radius filter', async () => {
  const { fetchImpl } = createFakeFetch(() =>
    html(nextDataPage([{ id: 1, price: 100, lat: 45.764, lng: 4.8357 }]))
  );
  const { deps, store } = testDeps(fetchImpl, { geocode: async () => null });

  const result = await runListingSearch(
    { queries: ['rtx'], pages: 1, city: 'Atlantis', radiusKm: 5 },
    deps
  );

  assert.equal(result.geocode, 'not_found');
  assert.equal(result.referencePoint, null);
  assert.equal(result.listings.length, 1);
  assert.ok(
    getSearchRunLogs('run-1', store).some(
      event => event.level === 'warning' && event.message === 'Could not geocode "Atlantis", distance filtering disabled'
    )
  );
});

test('Runner - cancellation stops between requests and keeps partial results', async () => {
  const controller = new AbortController();
  const { fetchImpl, calls } = createFakeFetch(url => {
    controller.abort();
    return html(nextDataPage([{ id: Number(url.searchParams.get('page')), price: 10 }]));
  });
  const { deps, store } = testDeps(fetchImpl, { signal: controller.signal });

  const result = await runListingSearch({ queries: ['rtx'], pages: 3 }, deps);

  assert.equal(calls.length, 1);
  assert.equal(result.cancelled, true);
  assert.equal(result.status, 'CANCELLED');
  assert.deepEqual(ids(result.listings), ['1']);
  assert.equal(store.getState().runs['run-1']?.stage, 'cancelled');
});

test('Runner - blocked pages are counted', async () => {
  const { fetchImpl } = createFakeFetch(() => html(loadFixture('blocked-page.html')));
  const { deps, store } = testDeps(fetchImpl);

  const result = await runListingSearch({ queries: ['rtx'], pages: 1 }, deps);

  assert.equal(result.stats.blocked, 1);
  assert.equal(result.status, 'NO_RESULTS');
  assert.equal(store.getState().runs['run-1']?.hasErrors, true);
});

test('Runner - every request failing is reported', async () => {
  const { fetchImpl } = createFakeFetch(() => html('Service unavailable', 503));
  const { deps } = testDeps(fetchImpl);

  const result = await runListingSearch({ queries: ['rtx'], pages: 2 }, deps);

  assert.equal(result.status, 'ALL_FAILED');
  assert.deepEqual(result.listings, []);
  assert.equal(result.stats.failed, 2);
});

test('Runner - blank queries are skipped and bad patterns reported', async () => {
  const { fetchImpl, calls } = createFakeFetch(() => html(nextDataPage([{ id: 1, price: 50, body: 'rtx 3070' }])));
  const { deps } = testDeps(fetchImpl);
  const events: string[] = [];

  const result = await runListingSearch(
    {
      queries: ['   ', 'rtx 3070'],
      pages: 1,
      valuation: {
        registry: {
          broken: { pattern: '[', unitValue: 5 },
          gpu_rtx_3070: { pattern: 'rtx\\s*3070', unitValue: 260 },
        },
      },
    },
    deps,
    event => events.push(event.label)
  );

  assert.equal(calls.length, 1);
  assert.deepEqual(result.rejectedQueries, ['   ']);
  assert.equal(result.patternErrors.length, 1);
  assert.equal(result.patternErrors[0]?.key, 'broken');
  assert.deepEqual(result.listings[0]?.detectedAttributes, { gpu_rtx_3070: 1 });
  assert.equal(result.listings[0]?.valuation?.negotiatedPrice, 45, 'default negotiation percentage applies');
  assert.deepEqual(events.slice(0, 2), ['Query skipped', 'Pattern skipped']);
  assert.equal(events.at(-1), 'Finished');
});
