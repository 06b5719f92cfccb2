/**
 * ═══════════════════════════════════════════════════════════════════════════
 * LISTING CORE - CONFIGURATION
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Defaults for every tunable of the pipeline, plus an environment overlay.
 * The env record is passed in by the caller: this module never reads
 * `process` itself so it stays usable outside Node.js.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 */

import type { RetrievalStrategy } from './types.js';

export interface SearchConfig {
  originUrl: string;
  searchPath: string;
  userAgents: string[];
  requestHeaders: Record<string, string>;
  fetchTimeoutMs: number;
  navigationTimeoutMs: number;
  scrollSteps: number;
  scrollDeltaPx: number;
  scrollPauseMs: number;
  listingMarkerSelector: string;
  markerWaitMs: number;
  viewport: { width: number; height: number };
  throttleMs: number;
  maxPages: number;
  defaultStrategy: RetrievalStrategy;
  negotiationPct: number;
  dismantleBonusPct: number;
  debugLogging: boolean;
}

export const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.0 Safari/605.1.15',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123 Safari/537.36',
];

export const THROTTLE_MIN_MS = 500;
export const THROTTLE_MAX_MS = 5000;

/**
 * Standard configuration used when nothing is overridden
 */
export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  originUrl: 'https://www.leboncoin.fr',
  searchPath: '/recherche/',
  userAgents: USER_AGENTS,
  requestHeaders: {
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
    'Accept-Language': 'fr-FR,fr;q=0.9,en-US;q=0.8,en;q=0.7',
    Connection: 'keep-alive',
  },
  fetchTimeoutMs: 25000,
  navigationTimeoutMs: 25000,
  scrollSteps: 8,
  scrollDeltaPx: 1400,
  scrollPauseMs: 500,
  listingMarkerSelector: "a[data-qa-id='aditem_container']",
  markerWaitMs: 5000,
  viewport: { width: 1280, height: 1800 },
  throttleMs: 1200,
  maxPages: 10,
  defaultStrategy: 'http',
  negotiationPct: 10,
  dismantleBonusPct: 0,
  debugLogging: false,
};

type EnvRecord = Record<string, string | undefined>;

function readNumber(
  env: EnvRecord,
  key: string,
  fallback: number,
  min: number,
  max: number
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < min || value > max) {
    console.warn(`[CONFIG] Ignoring ${key}="${raw}" (expected ${min}-${max}), using ${fallback}`);
    return fallback;
  }
  return value;
}

function readStrategy(env: EnvRecord, fallback: RetrievalStrategy): RetrievalStrategy {
  const raw = env.LISTING_STRATEGY?.trim().toLowerCase();
  if (!raw) return fallback;
  if (raw === 'http' || raw === 'browser') return raw;

  console.warn(`[CONFIG] Unknown LISTING_STRATEGY="${raw}", using ${fallback}`);
  return fallback;
}

/**
 * Build the effective configuration from environment variables.
 *
 * Supported keys: LISTING_ORIGIN_URL, LISTING_FETCH_TIMEOUT_MS,
 * LISTING_THROTTLE_MS, LISTING_MAX_PAGES, LISTING_SCROLL_STEPS,
 * LISTING_STRATEGY, LISTING_NEGOTIATION_PCT, LISTING_DISMANTLE_BONUS_PCT,
 * LISTING_DEBUG_LOGGING.
 */
export function getSearchConfig(env: EnvRecord = {}): SearchConfig {
  const base = DEFAULT_SEARCH_CONFIG;

  return {
    ...base,
    originUrl: env.LISTING_ORIGIN_URL?.trim().replace(/\/+$/, '') || base.originUrl,
    fetchTimeoutMs: readNumber(env, 'LISTING_FETCH_TIMEOUT_MS', base.fetchTimeoutMs, 1000, 120000),
    throttleMs: readNumber(env, 'LISTING_THROTTLE_MS', base.throttleMs, THROTTLE_MIN_MS, THROTTLE_MAX_MS),
    maxPages: readNumber(env, 'LISTING_MAX_PAGES', base.maxPages, 1, 50),
    scrollSteps: readNumber(env, 'LISTING_SCROLL_STEPS', base.scrollSteps, 1, 20),
    defaultStrategy: readStrategy(env, base.defaultStrategy),
    negotiationPct: readNumber(env, 'LISTING_NEGOTIATION_PCT', base.negotiationPct, 0, 100),
    dismantleBonusPct: readNumber(env, 'LISTING_DISMANTLE_BONUS_PCT', base.dismantleBonusPct, 0, 100),
    debugLogging: env.LISTING_DEBUG_LOGGING === 'true',
  };
}
