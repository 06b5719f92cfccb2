/**
 * ═══════════════════════════════════════════════════════════════════════════
 * LISTING CORE - VALUATION (SINGLE SOURCE OF TRUTH)
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * ALL margin calculations happen here.
 *
 *   attributeValueTotal = Σ count × unitValue
 *   negotiatedPrice     = priceAmount × (1 − negotiationPct / 100)
 *   estimatedMargin     = attributeValueTotal × (1 + dismantleBonusPct / 100) − negotiatedPrice
 *
 * Without a price there is no negotiated price and no margin (null, which is
 * not the same as a margin of zero).
 *
 * Percentages outside [0, 100] are clamped; non-finite values count as 0.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 */

import type {
  AttributePatternRegistry,
  AttributeValueTable,
  Listing,
  ListingValuation,
} from './types.js';

/**
 * Clamp a percentage into [0, 100]
 */
export function clampPercent(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(100, Math.max(0, value));
}

/**
 * Round a monetary amount to cents
 */
export function roundCurrency(amount: number): number {
  return Math.round(amount * 100) / 100;
}

/**
 * Extract the unit value table from a pattern registry
 */
export function toValueTable(registry: AttributePatternRegistry): AttributeValueTable {
  const table: AttributeValueTable = {};
  for (const [key, rule] of Object.entries(registry)) {
    table[key] = rule.unitValue;
  }
  return table;
}

/**
 * Sum of count × unit value; keys missing from the table are worth nothing
 */
export function computeAttributeValueTotal(
  detectedAttributes: Record<string, number>,
  valueTable: AttributeValueTable
): number {
  let total = 0;
  for (const [key, count] of Object.entries(detectedAttributes)) {
    const unitValue = valueTable[key];
    if (typeof unitValue === 'number' && Number.isFinite(unitValue)) {
      total += count * unitValue;
    }
  }
  return roundCurrency(total);
}

export function computeValuation(
  priceAmount: number | null,
  detectedAttributes: Record<string, number>,
  valueTable: AttributeValueTable,
  negotiationPct: number,
  dismantleBonusPct: number
): ListingValuation {
  const attributeValueTotal = computeAttributeValueTotal(detectedAttributes, valueTable);

  if (priceAmount === null) {
    return { attributeValueTotal, negotiatedPrice: null, estimatedMargin: null };
  }

  const negotiatedPrice = roundCurrency(priceAmount * (1 - clampPercent(negotiationPct) / 100));
  const resaleValue = attributeValueTotal * (1 + clampPercent(dismantleBonusPct) / 100);

  return {
    attributeValueTotal,
    negotiatedPrice,
    estimatedMargin: roundCurrency(resaleValue - negotiatedPrice),
  };
}

/**
 * Valuate a listing. Pure: returns an updated copy.
 *
 * @param listing - Listing with detected attributes
 * @param valueTable - Unit resale value per attribute key
 * @param negotiationPct - Expected discount on the asking price
 * @param dismantleBonusPct - Uplift from reselling parts separately
 */
export function valuateListing(
  listing: Listing,
  valueTable: AttributeValueTable,
  negotiationPct: number,
  dismantleBonusPct: number
): Listing {
  return {
    ...listing,
    valuation: computeValuation(
      listing.priceAmount,
      listing.detectedAttributes,
      valueTable,
      negotiationPct,
      dismantleBonusPct
    ),
  };
}
