/**
 * ═══════════════════════════════════════════════════════════════════════════
 * CSV EXPORT TESTS
 * ═══════════════════════════════════════════════════════════════════════════
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { CSV_HEADERS, formatDetectedAttributes, listingsToCsv } from '../../src/lib/csvExporter.js';
import { createListing } from '../../src/lib/listing-core/index.js';

test('CSV - one row per listing with escaped values', () => {
  const valued = createListing('https://www.leboncoin.fr/ad/1', {
    title: 'PC "Gamer", RTX 3070',
    priceAmount: 500,
    locationLabel: 'Paris',
    distanceKm: 17.9,
    publishedAt: '2026-10-01 10:00:00',
    images: ['https://img.leboncoin.fr/1.jpg', 'https://img.leboncoin.fr/1-b.jpg'],
    detectedAttributes: { gpu_rtx_3070: 2, ram_16gb: 1 },
    valuation: { attributeValueTotal: 555, negotiatedPrice: 450, estimatedMargin: 105 },
  });
  const bare = createListing('https://www.leboncoin.fr/ad/2');

  const lines = listingsToCsv([valued, bare]).split('\n');

  assert.deepEqual(lines, [
    CSV_HEADERS.join(','),
    '"PC ""Gamer"", RTX 3070",500,450,555,105,Paris,17.9,2026-10-01 10:00:00,https://www.leboncoin.fr/ad/1,https://img.leboncoin.fr/1.jpg,gpu_rtx_3070:2;ram_16gb:1',
    'Untitled,,,,,,,,https://www.leboncoin.fr/ad/2,,',
  ]);
});

test('CSV - line breaks inside values are quoted', () => {
  const csv = listingsToCsv([createListing('https://www.leboncoin.fr/ad/3', { title: 'Lot\nRAM' })]);
  assert.equal(csv.split('\n').length, 3);
  assert.ok(csv.endsWith('"Lot\nRAM",,,,,,,,https://www.leboncoin.fr/ad/3,,'));
});

test('CSV - empty input renders only the header', () => {
  assert.equal(listingsToCsv([]), CSV_HEADERS.join(','));
  assert.equal(formatDetectedAttributes({}), '');
});
