/**
 * ═══════════════════════════════════════════════════════════════════════════
 * CONTENT RETRIEVAL TESTS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Network and browser are replaced by in-process fakes.
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import * as listingCore from '../../src/lib/listing-core/index.js';
import {
  DEFAULT_SEARCH_CONFIG,
  USER_AGENTS,
  buildSearchRequest,
  detectBlockedContent,
  pickUserAgent,
  retrieveContent,
} from '../../src/lib/listing-core/index.js';
import { createFakeBrowser, createFakeFetch, loadFixture } from '../support/fakes.js';

const request = buildSearchRequest('RTX 3070', { pageNumber: 2 });

test('Retrieval - HTTP success returns the page body', async () => {
  const { fetchImpl, calls } = createFakeFetch(() => new Response('<html>ok</html>', { status: 200 }));

  const result = await retrieveContent(request, 'http', { fetchImpl, random: () => 0 });

  assert.equal(result.ok, true);
  if (!result.ok) return;
  assert.equal(result.content.html, '<html>ok</html>');
  assert.equal(result.content.strategy, 'http');
  assert.equal(result.content.locator, request.locator);

  assert.equal(calls.length, 1);
  assert.equal(calls[0]?.url, request.locator);
  const headers = new Headers(calls[0]?.init?.headers);
  assert.equal(headers.get('User-Agent'), USER_AGENTS[0]);
  assert.equal(headers.get('Accept-Language'), 'fr-FR,fr;q=0.9,en-US;q=0.8,en;q=0.7');
});

test('Retrieval - non-2xx status is a failure', async () => {
  const { fetchImpl } = createFakeFetch(() => new Response('Forbidden', { status: 403 }));

  const result = await retrieveContent(request, 'http', { fetchImpl });

  assert.deepEqual(result, {
    ok: false,
    failure: {
      locator: request.locator,
      strategy: 'http',
      reason: 'http_status',
      message: 'HTTP 403',
      statusCode: 403,
    },
  });
});

test('Retrieval - transport errors do not throw', async () => {
  const { fetchImpl } = createFakeFetch(() => {
    throw new TypeError('fetch failed');
  });

  const result = await retrieveContent(request, 'http', { fetchImpl });

  assert.equal(result.ok, false);
  if (result.ok) return;
  assert.equal(result.failure.reason, 'transport');
  assert.equal(result.failure.message, 'fetch failed');
});

test('Retrieval - slow responses time out', async () => {
  const fetchImpl: typeof fetch = (_input, init) =>
    new Promise((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
    });

  const result = await retrieveContent(request, 'http', {
    fetchImpl,
    config: { ...DEFAULT_SEARCH_CONFIG, fetchTimeoutMs: 20 },
  });

  assert.equal(result.ok, false);
  if (result.ok) return;
  assert.equal(result.failure.reason, 'timeout');
});

test('Retrieval - cancelled before start never fetches', async () => {
  const { fetchImpl, calls } = createFakeFetch(() => new Response('unused'));
  const controller = new AbortController();
  controller.abort();

  const result = await retrieveContent(request, 'http', { fetchImpl, signal: controller.signal });

  assert.equal(result.ok, false);
  if (result.ok) return;
  assert.equal(result.failure.reason, 'cancelled');
  assert.equal(calls.length, 0);
});

test('Retrieval - browser session scrolls, waits for the marker and is disposed', async () => {
  const { factory, log, userAgents } = createFakeBrowser({ html: '<html>rendered</html>' });

  const result = await retrieveContent(request, 'browser', { browserFactory: factory, random: () => 0.99 });

  assert.equal(result.ok, true);
  if (!result.ok) return;
  assert.equal(result.content.html, '<html>rendered</html>');
  assert.equal(result.content.strategy, 'browser');

  assert.deepEqual(log.navigated, [request.locator]);
  assert.deepEqual(log.scrolls, new Array<number>(8).fill(1400));
  assert.deepEqual(log.pauses, new Array<number>(8).fill(500));
  assert.deepEqual(log.markerWaits, ["a[data-qa-id='aditem_container']"]);
  assert.equal(log.disposed, 1);
  assert.deepEqual(userAgents, [USER_AGENTS[2]]);
});

test('Retrieval - missing marker is tolerated', async () => {
  const { factory, log } = createFakeBrowser({ markerFound: false, html: '<html>late</html>' });

  const result = await retrieveContent(request, 'browser', { browserFactory: factory });

  assert.equal(result.ok, true);
  assert.equal(log.disposed, 1);
});

test('Retrieval - browser failure is reported and the session disposed', async () => {
  const { factory, log } = createFakeBrowser({ failOn: 'navigate' });

  const result = await retrieveContent(request, 'browser', { browserFactory: factory });

  assert.equal(result.ok, false);
  if (result.ok) return;
  assert.equal(result.failure.reason, 'session');
  assert.equal(result.failure.message, 'net::ERR_CONNECTION_REFUSED');
  assert.equal(log.disposed, 1);
});

test('Retrieval - cancellation during scrolling disposes the session', async () => {
  const controller = new AbortController();
  const { factory, log } = createFakeBrowser({
    onScroll: count => {
      if (count === 2) controller.abort();
    },
  });

  const result = await retrieveContent(request, 'browser', {
    browserFactory: factory,
    signal: controller.signal,
  });

  assert.equal(result.ok, false);
  if (result.ok) return;
  assert.equal(result.failure.reason, 'cancelled');
  assert.equal(log.scrolls.length, 2);
  assert.equal(log.disposed, 1);
});

test('Retrieval - a failing dispose does not change the result', async () => {
  const { factory, log } = createFakeBrowser({ failDispose: true, html: '<html>fine</html>' });

  const result = await retrieveContent(request, 'browser', { browserFactory: factory });

  assert.equal(result.ok, true);
  assert.equal(log.disposed, 1);
});

test('Retrieval - session factory errors are failures', async () => {
  const result = await retrieveContent(request, 'browser', {
    browserFactory: async () => {
      throw new Error('Executable does not exist');
    },
  });

  assert.equal(result.ok, false);
  if (result.ok) return;
  assert.equal(result.failure.reason, 'session');
});

test('Retrieval - browser strategy without a session factory fails', async () => {
  const result = await retrieveContent(request, 'browser');

  assert.equal(result.ok, false);
  if (result.ok) return;
  assert.equal(result.failure.reason, 'session');
  assert.equal(result.failure.message, 'No browser session factory configured');
});

test('Retrieval - the core surface carries no browser driver', () => {
  assert.equal('createPlaywrightSessionFactory' in listingCore, false);
  assert.equal('BROWSER_LAUNCH_ARGS' in listingCore, false);
});

test('Retrieval - user agent rotation stays within the pool', () => {
  assert.equal(pickUserAgent(USER_AGENTS, () => 0), USER_AGENTS[0]);
  assert.equal(pickUserAgent(USER_AGENTS, () => 0.5), USER_AGENTS[1]);
  assert.equal(pickUserAgent(USER_AGENTS, () => 0.9999), USER_AGENTS[2]);
  assert.equal(pickUserAgent([], () => 0.3), '');
});

test('Retrieval - anti-bot pages are recognised', () => {
  assert.deepEqual(detectBlockedContent(loadFixture('blocked-page.html')), {
    isBlocked: true,
    matchedKeyword: 'captcha-delivery',
  });
  assert.deepEqual(detectBlockedContent(loadFixture('leboncoin-markup.html')), {
    isBlocked: false,
    matchedKeyword: null,
  });
});
