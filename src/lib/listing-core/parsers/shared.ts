/**
 * ═══════════════════════════════════════════════════════════════════════════
 * SHARED PURE EXTRACTION UTILITIES
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Pure functions for extracting data from text/JSON values.
 * NO I/O, NO side effects, NO environment variables.
 * Deterministic outputs only.
 */

import type { Listing } from '../types.js';

export const UNTITLED = 'Untitled';

/**
 * Numeric prices strictly above this are assumed to be in cents
 */
export const MINOR_UNIT_THRESHOLD = 10000;

/**
 * Normalize a raw price value to euros.
 *
 * Accepts a number, a numeric string, a one-element array (`[1500]`) or an
 * object with a `value` key. Zero and unparsable values give null. Only a
 * numeric value goes through the cents heuristic; a numeric string is taken
 * as euros.
 */
export function normalizePriceAmount(raw: unknown): number | null {
  let value: unknown = raw;

  if (Array.isArray(value)) {
    value = value[0];
  }
  if (isRecord(value)) {
    value = value.value;
  }

  let amount: number | null = null;
  if (typeof value === 'number') {
    amount = value;
  } else if (typeof value === 'string') {
    const cleaned = value.replace(/[\s\u00A0\u202F€]/g, '').replace(',', '.');
    amount = cleaned ? Number(cleaned) : null;
  }

  if (amount === null || !Number.isFinite(amount) || amount <= 0) {
    return null;
  }

  return typeof value === 'number' && amount > MINOR_UNIT_THRESHOLD ? amount / 100 : amount;
}

/**
 * Extract a euro price from flattened card text: a numeral immediately
 * before the € sign. Thousands groups separated by (narrow) spaces are joined.
 */
export function extractEuroPrice(text: string): number | null {
  if (!text) return null;

  const match = text.match(/(?<!\d)(\d{1,3}(?:[ \u00A0\u202F]\d{3})+|\d+)\s*€/);
  if (!match) return null;

  const price = Number(match[1].replace(/[ \u00A0\u202F]/g, ''));
  return Number.isFinite(price) ? price : null;
}

/**
 * Convert a coordinate-like value to a finite number
 */
export function toCoordinate(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Normalize listing URL to absolute form without fragment.
 * Returns null when the URL cannot be resolved.
 */
export function normalizeListingUrl(url: string, origin: string): string | null {
  const trimmed = url.trim();
  if (!trimmed || trimmed.startsWith('#') || trimmed.startsWith('javascript:')) {
    return null;
  }

  try {
    const resolved = new URL(trimmed, origin);
    resolved.hash = '';
    return resolved.toString();
  } catch {
    return null;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function firstString(...values: unknown[]): string | null {
  for (const value of values) {
    if (typeof value === 'string' && value.trim() !== '') {
      return value.trim();
    }
  }
  return null;
}

/**
 * Listing with every optional field empty
 */
export function createListing(url: string, fields: Partial<Omit<Listing, 'url'>> = {}): Listing {
  return {
    sourceName: 'leboncoin',
    url,
    title: UNTITLED,
    description: '',
    priceAmount: null,
    locationLabel: null,
    latitude: null,
    longitude: null,
    distanceKm: null,
    publishedAt: null,
    images: [],
    detectedAttributes: {},
    valuation: null,
    ...fields,
  };
}
