/**
 * ═══════════════════════════════════════════════════════════════════════════
 * LISTING CORE - SEARCH REQUEST BUILDER
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * PURE FUNCTIONS - NO I/O
 *
 * Locator format:
 *   <origin>/recherche/?text=<q>&page=<n>[&locations=<loc>][&price=<min>-<max>]
 *
 * An open price bound is written with the literal token `min` or `max`
 * (`price=min-500`, `price=200-max`). No `price` parameter is emitted when
 * neither bound is set.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 */

import { DEFAULT_SEARCH_CONFIG, type SearchConfig } from './config.js';
import { InvalidRequestError } from './errors.js';
import type { SearchRequest } from './types.js';

export interface SearchRequestOptions {
  locationFilter?: string | null;
  priceMin?: number | null;
  priceMax?: number | null;
  pageNumber?: number;
}

type LocatorConfig = Pick<SearchConfig, 'originUrl' | 'searchPath'>;

function normalizeBound(value: number | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (!Number.isFinite(value) || value < 0) return null;
  return value;
}

function normalizePage(pageNumber: number | undefined): number {
  if (pageNumber === undefined || !Number.isFinite(pageNumber)) return 1;
  return Math.max(1, Math.floor(pageNumber));
}

/**
 * Encode the price range token, or null when no bound is set
 */
export function encodePriceRange(priceMin: number | null, priceMax: number | null): string | null {
  if (priceMin === null && priceMax === null) return null;
  const low = priceMin === null ? 'min' : String(Math.floor(priceMin));
  const high = priceMax === null ? 'max' : String(Math.ceil(priceMax));
  return `${low}-${high}`;
}

/**
 * Build a search request for one (query, page) combination.
 *
 * @throws InvalidRequestError when the query text is empty after trimming
 */
export function buildSearchRequest(
  queryText: string,
  options: SearchRequestOptions = {},
  config: LocatorConfig = DEFAULT_SEARCH_CONFIG
): SearchRequest {
  const text = queryText.trim();
  if (!text) {
    throw new InvalidRequestError('Query text is empty');
  }

  const locationFilter = options.locationFilter?.trim() || null;
  const priceMin = normalizeBound(options.priceMin);
  const priceMax = normalizeBound(options.priceMax);
  const pageNumber = normalizePage(options.pageNumber);

  const params = new URLSearchParams();
  params.set('text', text);
  params.set('page', String(pageNumber));
  if (locationFilter) {
    params.set('locations', locationFilter);
  }
  const priceRange = encodePriceRange(priceMin, priceMax);
  if (priceRange) {
    params.set('price', priceRange);
  }

  return Object.freeze({
    queryText: text,
    locationFilter,
    priceMin,
    priceMax,
    pageNumber,
    locator: `${config.originUrl}${config.searchPath}?${params.toString()}`,
  });
}

export interface PlannedRequests {
  requests: SearchRequest[];
  rejected: Array<{ queryText: string; error: InvalidRequestError }>;
}

/**
 * Expand queries × pages into requests, query-major and pages ascending.
 * Invalid queries are reported, not thrown.
 */
export function buildSearchRequests(
  queries: string[],
  pages: number,
  options: Omit<SearchRequestOptions, 'pageNumber'> = {},
  config: LocatorConfig = DEFAULT_SEARCH_CONFIG
): PlannedRequests {
  const requests: SearchRequest[] = [];
  const rejected: PlannedRequests['rejected'] = [];
  const pageCount = normalizePage(pages);

  for (const queryText of queries) {
    try {
      for (let page = 1; page <= pageCount; page++) {
        requests.push(buildSearchRequest(queryText, { ...options, pageNumber: page }, config));
      }
    } catch (error) {
      if (error instanceof InvalidRequestError) {
        rejected.push({ queryText, error });
        continue;
      }
      throw error;
    }
  }

  return { requests, rejected };
}
