/**
 * ═══════════════════════════════════════════════════════════════════════════
 * STRUCTURED-DATA TIER (__NEXT_DATA__)
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * PURE DETERMINISTIC PARSER - NO I/O, NO SIDE EFFECTS
 *
 * The search page is server-rendered by Next.js and embeds the full result
 * set as JSON in <script id="__NEXT_DATA__">. Ads live under
 * props.pageProps.searchData.ads.
 */

import * as cheerio from 'cheerio';
import type { Listing } from '../types.js';
import {
  UNTITLED,
  createListing,
  firstString,
  isRecord,
  normalizeListingUrl,
  normalizePriceAmount,
  toCoordinate,
} from './shared.js';

export type StructuredParseOutcome =
  | { ok: true; listings: Listing[] }
  | { ok: false; reason: 'no_data_block' | 'invalid_json' | 'missing_ads_path' };

/**
 * Read the embedded JSON block and return the raw ad records
 */
function locateAds(html: string): { ok: true; ads: unknown[] } | Extract<StructuredParseOutcome, { ok: false }> {
  const $ = cheerio.load(html);
  const jsonText = $('script#__NEXT_DATA__').first().text().trim();
  if (!jsonText) {
    return { ok: false, reason: 'no_data_block' };
  }

  let data: unknown;
  try {
    data = JSON.parse(jsonText);
  } catch {
    return { ok: false, reason: 'invalid_json' };
  }

  const pageProps = isRecord(data) && isRecord(data.props) ? data.props.pageProps : undefined;
  if (!isRecord(pageProps)) {
    return { ok: false, reason: 'missing_ads_path' };
  }

  const possiblePaths = [
    isRecord(pageProps.searchData) ? pageProps.searchData.ads : undefined,
    pageProps.ads,
  ];

  for (const path of possiblePaths) {
    if (Array.isArray(path)) {
      return { ok: true, ads: path };
    }
  }

  return { ok: false, reason: 'missing_ads_path' };
}

function extractImages(raw: unknown): string[] {
  const entries = isRecord(raw) && Array.isArray(raw.urls) ? raw.urls : raw;
  if (!Array.isArray(entries)) return [];

  const images: string[] = [];
  for (const entry of entries) {
    const url = typeof entry === 'string' ? entry : isRecord(entry) ? entry.url : null;
    if (typeof url === 'string' && url.trim() !== '') {
      images.push(url.trim());
    }
  }
  return images;
}

function toListing(ad: unknown, origin: string): Listing | null {
  if (!isRecord(ad)) return null;

  const rawUrl = firstString(ad.url, ad.shareLink);
  const url = rawUrl ? normalizeListingUrl(rawUrl, origin) : null;
  if (!url) return null;

  const location: Record<string, unknown> = isRecord(ad.location) ? ad.location : {};

  return createListing(url, {
    title: firstString(ad.subject, ad.title) ?? UNTITLED,
    description: firstString(ad.body, ad.description) ?? '',
    priceAmount: normalizePriceAmount(ad.price) ?? normalizePriceAmount(ad.priceCents),
    locationLabel: firstString(location.city, location.label),
    latitude: toCoordinate(location.lat ?? location.latitude),
    longitude: toCoordinate(location.lng ?? location.longitude),
    publishedAt: firstString(ad.index_date, ad.first_publication_date),
    images: extractImages(ad.images),
  });
}

/**
 * Parse listings from the embedded structured-data block.
 *
 * Never throws: a missing block, invalid JSON or a missing path is reported
 * as an unsuccessful outcome so the caller can fall through to markup.
 */
export function parseStructuredListings(html: string, origin: string): StructuredParseOutcome {
  const located = locateAds(html);
  if (!located.ok) {
    return located;
  }

  const listings: Listing[] = [];
  for (const ad of located.ads) {
    const listing = toListing(ad, origin);
    if (listing) {
      listings.push(listing);
    }
  }

  return { ok: true, listings };
}
