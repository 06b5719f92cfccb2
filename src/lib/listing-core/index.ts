/**
 * ═══════════════════════════════════════════════════════════════════════════
 * LISTING CORE - PUBLIC SURFACE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Environment-agnostic pipeline pieces. Services and the CLI compose them:
 *
 * ```typescript
 * import {
 *   buildSearchRequest,
 *   retrieveContent,
 *   parseListings,
 *   aggregateListings,
 * } from './listing-core/index.js';
 *
 * const request = buildSearchRequest('RTX 3070', { pageNumber: 1 });
 * const result = await retrieveContent(request, 'http');
 * if (result.ok) {
 *   const listings = parseListings(result.content);
 *   const ordered = aggregateListings([listings], { sortBy: 'price' });
 * }
 * ```
 *
 * No module here reads `process`, touches the filesystem or loads a browser
 * driver; browser sessions are injected as a `BrowserSessionFactory`.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 */

export type {
  SourceName,
  RetrievalStrategy,
  SearchRequest,
  RetrievedContent,
  RetrievalFailureReason,
  RetrievalFailure,
  RetrievalResult,
  ListingValuation,
  Listing,
  AttributePatternRule,
  AttributePatternRegistry,
  AttributeValueTable,
  GeoPoint,
  SortMode,
  AggregateFilters,
  ValuationParams,
} from './types.js';

export {
  DEFAULT_SEARCH_CONFIG,
  USER_AGENTS,
  THROTTLE_MIN_MS,
  THROTTLE_MAX_MS,
  getSearchConfig,
  type SearchConfig,
} from './config.js';

export { InvalidRequestError, PatternError } from './errors.js';

export {
  buildSearchRequest,
  buildSearchRequests,
  encodePriceRange,
  type SearchRequestOptions,
  type PlannedRequests,
} from './request.js';

export {
  retrieveContent,
  detectBlockedContent,
  pickUserAgent,
  BLOCKED_KEYWORDS,
  type RetrieverDeps,
} from './retrieval.js';

export type {
  BrowserSession,
  BrowserSessionFactory,
  BrowserSessionOptions,
} from './browser.js';

export * from './parsers/index.js';

export {
  compilePatternRegistry,
  detectAttributes,
  detectListingAttributes,
  type CompiledPattern,
  type CompiledRegistry,
} from './attributes.js';

export {
  clampPercent,
  roundCurrency,
  toValueTable,
  computeAttributeValueTotal,
  computeValuation,
  valuateListing,
} from './business-logic.js';

export { haversineKm } from './geo.js';

export {
  listingIdentity,
  dedupeListings,
  filterByPrice,
  filterByRadius,
  sortListings,
  aggregateListings,
} from './aggregation.js';

export {
  RequestThrottle,
  ThrottleAbortedError,
  SYSTEM_CLOCK,
  sleep,
  type ThrottleClock,
} from './throttle.js';
