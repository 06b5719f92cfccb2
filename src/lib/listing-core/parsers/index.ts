/**
 * ═══════════════════════════════════════════════════════════════════════════
 * PURE PARSER ORCHESTRATOR
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Single entry point for listing parsing. Two tiers tried in sequence:
 * 1. Structured data (__NEXT_DATA__)
 * 2. Markup cards, only when tier 1 yields zero listings
 *
 * Never throws: unparseable content yields an empty array.
 */

import type { Listing, RetrievedContent } from '../types.js';
import { parseMarkupListings } from './markup.js';
import { parseStructuredListings } from './structured.js';

export type ExtractionMethod = 'STRUCTURED' | 'MARKUP' | 'NONE';

export interface ParseResult {
  listings: Listing[];
  extractionMethod: ExtractionMethod;
}

/**
 * Extract origin from a locator, or the fallback when it is not a URL
 */
export function extractOrigin(locator: string, fallback: string): string {
  try {
    return new URL(locator).origin;
  } catch {
    return fallback;
  }
}

/**
 * Parse page HTML into listings and report which tier produced them
 */
export function parseSearchPage(html: string, origin: string): ParseResult {
  try {
    const structured = parseStructuredListings(html, origin);
    if (structured.ok && structured.listings.length > 0) {
      return { listings: structured.listings, extractionMethod: 'STRUCTURED' };
    }
    if (!structured.ok) {
      console.log(`[LISTING_PARSER] Structured data unavailable (${structured.reason}), trying markup`);
    }

    const cards = parseMarkupListings(html, origin);
    return { listings: cards, extractionMethod: cards.length > 0 ? 'MARKUP' : 'NONE' };
  } catch (error) {
    console.error('[LISTING_PARSER] Unexpected parser error:', error);
    return { listings: [], extractionMethod: 'NONE' };
  }
}

/**
 * Parse retrieved content into normalized listings
 */
export function parseListings(content: RetrievedContent, fallbackOrigin = 'https://www.leboncoin.fr'): Listing[] {
  return parseSearchPage(content.html, extractOrigin(content.locator, fallbackOrigin)).listings;
}

export { parseStructuredListings, type StructuredParseOutcome } from './structured.js';
export { parseMarkupListings, LISTING_CARD_SELECTORS } from './markup.js';
export {
  normalizeListingUrl,
  normalizePriceAmount,
  extractEuroPrice,
  createListing,
  toCoordinate,
  isRecord,
  MINOR_UNIT_THRESHOLD,
  UNTITLED,
} from './shared.js';
