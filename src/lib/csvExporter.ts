import type { Listing } from './listing-core/index.js';

export const CSV_HEADERS = [
  'title',
  'price_eur',
  'negotiated_price_eur',
  'attribute_value_eur',
  'estimated_margin_eur',
  'location',
  'distance_km',
  'published_at',
  'url',
  'image',
  'detected_attributes',
];

function escapeCsvValue(value: string | number | null): string {
  if (value === null) return '';
  const str = String(value);
  return /[",\r\n]/.test(str) ? `"${str.replace(/"/g, '""')}"` : str;
}

/**
 * `gpu_rtx_3070:2;ram_16gb:1`
 */
export function formatDetectedAttributes(detected: Record<string, number>): string {
  return Object.entries(detected)
    .map(([key, count]) => `${key}:${count}`)
    .join(';');
}

/**
 * Render listings as CSV, one row per listing in the given order
 */
export function listingsToCsv(listings: Listing[]): string {
  const csvRows = [CSV_HEADERS.join(',')];

  for (const listing of listings) {
    const row = [
      listing.title,
      listing.priceAmount,
      listing.valuation?.negotiatedPrice ?? null,
      listing.valuation?.attributeValueTotal ?? null,
      listing.valuation?.estimatedMargin ?? null,
      listing.locationLabel,
      listing.distanceKm,
      listing.publishedAt,
      listing.url,
      listing.images[0] ?? null,
      formatDetectedAttributes(listing.detectedAttributes),
    ].map(escapeCsvValue);
    csvRows.push(row.join(','));
  }

  return csvRows.join('\n');
}
