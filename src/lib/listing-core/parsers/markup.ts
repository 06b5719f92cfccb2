/**
 * ═══════════════════════════════════════════════════════════════════════════
 * MARKUP-PATTERN TIER (listing cards)
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * PURE DETERMINISTIC PARSER - NO I/O, NO SIDE EFFECTS
 * Best-effort fallback over the rendered ad cards. Missing fields default.
 */

import * as cheerio from 'cheerio';
import type { Listing } from '../types.js';
import { UNTITLED, createListing, extractEuroPrice, normalizeListingUrl } from './shared.js';

export const LISTING_CARD_SELECTORS = [
  "a[data-qa-id='aditem_container']",
  'a.AdCard__Link',
  'a.trackable',
];

const TITLE_SELECTOR = 'span, h2, h3';

/**
 * Parse listing cards from rendered markup
 *
 * @param html - Raw HTML from the search page
 * @param origin - Site origin used to absolutize relative URLs
 */
export function parseMarkupListings(html: string, origin: string): Listing[] {
  const $ = cheerio.load(html);
  const listings: Listing[] = [];

  $(LISTING_CARD_SELECTORS.join(', ')).each((_, anchor) => {
    const $card = $(anchor);

    const url = normalizeListingUrl($card.attr('href') ?? '', origin);
    if (!url) return;

    const title = $card.find(TITLE_SELECTOR).first().text().trim() || UNTITLED;

    // Separate every element's text so adjacent numbers do not run together
    const $flat = $card.clone();
    $flat.find('*').each((__, el) => {
      $(el).prepend(' ').append(' ');
    });
    const text = $flat.text().replace(/\s+/g, ' ').trim();

    const $img = $card.find('img').first();
    const src = $img.attr('src') || $img.attr('data-src') || '';
    const image = src && !src.startsWith('data:') ? normalizeListingUrl(src, origin) : null;

    listings.push(
      createListing(url, {
        title,
        priceAmount: extractEuroPrice(text),
        images: image ? [image] : [],
      })
    );
  });

  return listings;
}
