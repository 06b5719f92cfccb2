/**
 * ═══════════════════════════════════════════════════════════════════════════
 * LISTING CORE - CONTENT RETRIEVAL
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Turns a SearchRequest into raw page HTML. Two interchangeable strategies:
 * - HTTP: a single GET with browser-like headers and a rotating User-Agent
 * - BROWSER: an isolated headless session that scrolls the page so lazily
 *   loaded cards render, then hands back the final document
 *
 * **CRITICAL:**
 * - `retrieveContent` never throws; failures come back as RetrievalFailure
 *   values.
 * - A browser session is disposed on every path, success or failure.
 * - No parsing happens here.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 */

import type { BrowserSession, BrowserSessionFactory } from './browser.js';
import { DEFAULT_SEARCH_CONFIG, type SearchConfig } from './config.js';
import type {
  RetrievalFailureReason,
  RetrievalResult,
  RetrievalStrategy,
  SearchRequest,
} from './types.js';

export interface RetrieverDeps {
  config?: SearchConfig;
  fetchImpl?: typeof fetch;
  /** Required by the browser strategy */
  browserFactory?: BrowserSessionFactory;
  /** Cancels an in-flight retrieval */
  signal?: AbortSignal;
  /** Source of randomness for User-Agent rotation */
  random?: () => number;
}

/**
 * Keywords that indicate an anti-bot or captcha page
 */
export const BLOCKED_KEYWORDS = [
  'captcha-delivery',
  'datadome',
  'captcha',
  'access denied',
  'unusual traffic',
  'not a robot',
  'verify you are human',
  'security check',
  'cloudflare',
];

/**
 * Detect an interstitial / challenge page. Diagnostic only: callers use it to
 * explain why a page produced zero listings.
 */
export function detectBlockedContent(html: string): {
  isBlocked: boolean;
  matchedKeyword: string | null;
} {
  const lowerHtml = html.toLowerCase();

  for (const keyword of BLOCKED_KEYWORDS) {
    if (lowerHtml.includes(keyword)) {
      return { isBlocked: true, matchedKeyword: keyword };
    }
  }

  return { isBlocked: false, matchedKeyword: null };
}

export function pickUserAgent(userAgents: string[], random: () => number = Math.random): string {
  if (userAgents.length === 0) return '';
  const index = Math.min(userAgents.length - 1, Math.floor(random() * userAgents.length));
  return userAgents[index] ?? '';
}

class RetrievalCancelledError extends Error {
  constructor() {
    super('Retrieval cancelled');
    this.name = 'RetrievalCancelledError';
  }
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new RetrievalCancelledError();
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function failure(
  request: SearchRequest,
  strategy: RetrievalStrategy,
  reason: RetrievalFailureReason,
  message: string,
  statusCode?: number
): RetrievalResult {
  return {
    ok: false,
    failure: {
      locator: request.locator,
      strategy,
      reason,
      message,
      ...(statusCode !== undefined ? { statusCode } : {}),
    },
  };
}

async function retrieveOverHttp(
  request: SearchRequest,
  config: SearchConfig,
  deps: RetrieverDeps
): Promise<RetrievalResult> {
  const fetchFn = deps.fetchImpl ?? fetch;
  const { signal } = deps;

  if (signal?.aborted) {
    return failure(request, 'http', 'cancelled', 'Retrieval cancelled before start');
  }

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, config.fetchTimeoutMs);
  const onAbort = () => controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const response = await fetchFn(request.locator, {
      method: 'GET',
      headers: {
        ...config.requestHeaders,
        'User-Agent': pickUserAgent(config.userAgents, deps.random),
      },
      redirect: 'follow',
      signal: controller.signal,
    });

    if (!response.ok) {
      console.error(`[LISTING_RETRIEVER] HTTP ${response.status} for ${request.locator}`);
      return failure(request, 'http', 'http_status', `HTTP ${response.status}`, response.status);
    }

    const html = await response.text();
    return {
      ok: true,
      content: { locator: request.locator, html, strategy: 'http', retrievedAt: Date.now() },
    };
  } catch (error) {
    if (signal?.aborted) {
      return failure(request, 'http', 'cancelled', 'Retrieval cancelled');
    }
    if (timedOut) {
      console.error(
        `[LISTING_RETRIEVER] Timed out after ${config.fetchTimeoutMs}ms: ${request.locator}`
      );
      return failure(request, 'http', 'timeout', `Timed out after ${config.fetchTimeoutMs}ms`);
    }
    console.error('[LISTING_RETRIEVER] Transport error:', error);
    return failure(request, 'http', 'transport', describeError(error));
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }
}

async function disposeSession(session: BrowserSession): Promise<void> {
  try {
    await session.dispose();
  } catch (error) {
    console.error('[LISTING_RETRIEVER] Failed to dispose browser session:', error);
  }
}

async function retrieveWithBrowser(
  request: SearchRequest,
  config: SearchConfig,
  deps: RetrieverDeps
): Promise<RetrievalResult> {
  const { signal, browserFactory } = deps;
  let session: BrowserSession | null = null;

  if (!browserFactory) {
    return failure(request, 'browser', 'session', 'No browser session factory configured');
  }

  try {
    throwIfCancelled(signal);

    session = await browserFactory({
      userAgent: pickUserAgent(config.userAgents, deps.random),
      viewport: config.viewport,
    });

    await session.navigate(request.locator, config.navigationTimeoutMs);

    for (let step = 0; step < config.scrollSteps; step++) {
      throwIfCancelled(signal);
      await session.scroll(config.scrollDeltaPx);
      await session.pause(config.scrollPauseMs);
    }

    throwIfCancelled(signal);
    const markerFound = await session.waitForMarker(
      config.listingMarkerSelector,
      config.markerWaitMs
    );
    if (!markerFound) {
      console.warn(`[LISTING_RETRIEVER] Listing marker not found on ${request.locator}`);
    }

    const html = await session.content();
    return {
      ok: true,
      content: { locator: request.locator, html, strategy: 'browser', retrievedAt: Date.now() },
    };
  } catch (error) {
    if (error instanceof RetrievalCancelledError) {
      return failure(request, 'browser', 'cancelled', error.message);
    }
    console.error('[LISTING_RETRIEVER] Browser session error:', error);
    return failure(request, 'browser', 'session', describeError(error));
  } finally {
    if (session) {
      await disposeSession(session);
    }
  }
}

/**
 * Retrieve the HTML behind a search request.
 *
 * @returns Content on success, or a failure describing what went wrong
 */
export async function retrieveContent(
  request: SearchRequest,
  strategy: RetrievalStrategy,
  deps: RetrieverDeps = {}
): Promise<RetrievalResult> {
  const config = deps.config ?? DEFAULT_SEARCH_CONFIG;

  if (config.debugLogging) {
    console.log(`[LISTING_RETRIEVER] ${strategy.toUpperCase()} ${request.locator}`);
  }

  return strategy === 'browser'
    ? retrieveWithBrowser(request, config, deps)
    : retrieveOverHttp(request, config, deps);
}
