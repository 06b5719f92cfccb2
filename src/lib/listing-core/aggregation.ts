/**
 * ═══════════════════════════════════════════════════════════════════════════
 * LISTING CORE - RESULT AGGREGATION
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Steps, in order:
 * 1. Flatten batches (retrieval order kept)
 * 2. Deduplicate by URL, first occurrence wins
 * 3. Price range filter (unknown price passes)
 * 4. Radius filter, only with a reference point (no coordinates passes)
 * 5. Sort: price ascending, or estimated margin descending.
 *    Missing sort keys go last; ties keep retrieval order.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 */

import { haversineKm } from './geo.js';
import type { AggregateFilters, GeoPoint, Listing, SortMode } from './types.js';

/**
 * Identity key used for deduplication
 */
export function listingIdentity(url: string): string {
  try {
    const parsed = new URL(url.trim());
    parsed.hash = '';
    return parsed.toString();
  } catch {
    return url.trim();
  }
}

export function dedupeListings(listings: Listing[]): Listing[] {
  const seen = new Set<string>();
  const unique: Listing[] = [];

  for (const listing of listings) {
    const key = listingIdentity(listing.url);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(listing);
  }

  return unique;
}

export function filterByPrice(
  listings: Listing[],
  priceMin: number | null | undefined,
  priceMax: number | null | undefined
): Listing[] {
  const min = typeof priceMin === 'number' && Number.isFinite(priceMin) ? priceMin : null;
  const max = typeof priceMax === 'number' && Number.isFinite(priceMax) ? priceMax : null;
  if (min === null && max === null) return listings;

  return listings.filter(listing => {
    if (listing.priceAmount === null) return true;
    if (min !== null && listing.priceAmount < min) return false;
    if (max !== null && listing.priceAmount > max) return false;
    return true;
  });
}

/**
 * Annotate distances from the reference point and drop listings outside the
 * radius. Listings without coordinates are kept with a null distance.
 */
export function filterByRadius(
  listings: Listing[],
  referencePoint: GeoPoint,
  radiusKm: number | null | undefined
): Listing[] {
  const radius = typeof radiusKm === 'number' && Number.isFinite(radiusKm) ? radiusKm : null;
  const result: Listing[] = [];

  for (const listing of listings) {
    if (listing.latitude === null || listing.longitude === null) {
      result.push({ ...listing, distanceKm: null });
      continue;
    }

    const distance = haversineKm(referencePoint, {
      latitude: listing.latitude,
      longitude: listing.longitude,
    });
    if (radius !== null && distance > radius) continue;

    result.push({ ...listing, distanceKm: Math.round(distance * 10) / 10 });
  }

  return result;
}

function sortKey(listing: Listing, sortBy: SortMode): number | null {
  if (sortBy === 'price') return listing.priceAmount;
  return listing.valuation?.estimatedMargin ?? null;
}

export function sortListings(listings: Listing[], sortBy: SortMode): Listing[] {
  const direction = sortBy === 'price' ? 1 : -1;

  // Array.prototype.sort is stable, ties keep retrieval order
  return [...listings].sort((a, b) => {
    const keyA = sortKey(a, sortBy);
    const keyB = sortKey(b, sortBy);
    if (keyA === null && keyB === null) return 0;
    if (keyA === null) return 1;
    if (keyB === null) return -1;
    return (keyA - keyB) * direction;
  });
}

/**
 * Merge per-request batches into the final ordered result
 */
export function aggregateListings(batches: Listing[][], filters: AggregateFilters): Listing[] {
  let listings = dedupeListings(batches.flat());
  listings = filterByPrice(listings, filters.priceMin, filters.priceMax);

  if (filters.referencePoint) {
    listings = filterByRadius(listings, filters.referencePoint, filters.radiusKm);
  }

  return sortListings(listings, filters.sortBy);
}
