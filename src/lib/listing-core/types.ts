/**
 * ═══════════════════════════════════════════════════════════════════════════
 * LISTING CORE - SHARED TYPE DEFINITIONS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Contract between the retrieval, parsing, valuation and aggregation stages.
 *
 * **CRITICAL:**
 * - Keep types simple and serializable (no DOM/environment-specific types)
 * - Absent values are `null`, never `0` or an empty string
 *
 * ═══════════════════════════════════════════════════════════════════════════
 */

/**
 * Constant identifying the origin marketplace
 */
export type SourceName = 'leboncoin';

/**
 * How page content is obtained
 */
export type RetrievalStrategy = 'http' | 'browser';

/**
 * A built search request. One instance per (query, page) combination.
 */
export interface SearchRequest {
  readonly queryText: string;
  readonly locationFilter: string | null;
  readonly priceMin: number | null;
  readonly priceMax: number | null;
  readonly pageNumber: number;
  /** Canonical URL the request is fetched from */
  readonly locator: string;
}

export interface RetrievedContent {
  locator: string;
  html: string;
  strategy: RetrievalStrategy;
  retrievedAt: number;
}

export type RetrievalFailureReason =
  | 'http_status'
  | 'timeout'
  | 'transport'
  | 'session'
  | 'cancelled';

export interface RetrievalFailure {
  locator: string;
  strategy: RetrievalStrategy;
  reason: RetrievalFailureReason;
  message: string;
  statusCode?: number;
}

export type RetrievalResult =
  | { ok: true; content: RetrievedContent }
  | { ok: false; failure: RetrievalFailure };

/**
 * Derived monetary fields. Always computed together by the valuation engine.
 */
export interface ListingValuation {
  attributeValueTotal: number;
  negotiatedPrice: number | null;
  estimatedMargin: number | null;
}

/**
 * A single normalized classified ad
 */
export interface Listing {
  sourceName: SourceName;
  /** Identity key, absolute */
  readonly url: string;
  title: string;
  description: string;
  /** Major currency units (euros) */
  priceAmount: number | null;
  locationLabel: string | null;
  latitude: number | null;
  longitude: number | null;
  distanceKm: number | null;
  /** Origin format, not reparsed */
  publishedAt: string | null;
  images: string[];
  detectedAttributes: Record<string, number>;
  valuation: ListingValuation | null;
}

export interface AttributePatternRule {
  pattern: string;
  unitValue: number;
  label?: string;
}

export type AttributePatternRegistry = Record<string, AttributePatternRule>;

export type AttributeValueTable = Record<string, number>;

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

export type SortMode = 'price' | 'margin';

export interface AggregateFilters {
  priceMin?: number | null;
  priceMax?: number | null;
  referencePoint?: GeoPoint | null;
  radiusKm?: number | null;
  sortBy: SortMode;
}

export interface ValuationParams {
  registry: AttributePatternRegistry;
  negotiationPct: number;
  dismantleBonusPct: number;
}
