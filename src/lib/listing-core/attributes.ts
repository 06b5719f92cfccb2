/**
 * ═══════════════════════════════════════════════════════════════════════════
 * LISTING CORE - ATTRIBUTE DETECTION
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Counts named product features (GPU model, RAM size...) in listing text.
 * The registry is plain data passed in by the caller.
 *
 * - Matching is case-insensitive and counts non-overlapping matches
 * - Keys with zero matches are omitted
 * - A malformed rule is skipped for its own key only
 *
 * ═══════════════════════════════════════════════════════════════════════════
 */

import { PatternError } from './errors.js';
import type { AttributePatternRegistry, Listing } from './types.js';

export interface CompiledPattern {
  key: string;
  regex: RegExp;
}

export interface CompiledRegistry {
  patterns: CompiledPattern[];
  errors: PatternError[];
}

/**
 * Compile every rule of the registry, collecting errors instead of throwing
 */
export function compilePatternRegistry(registry: AttributePatternRegistry): CompiledRegistry {
  const patterns: CompiledPattern[] = [];
  const errors: PatternError[] = [];

  for (const [key, rule] of Object.entries(registry)) {
    try {
      patterns.push({ key, regex: new RegExp(rule.pattern, 'gi') });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      errors.push(new PatternError(key, rule.pattern, message));
    }
  }

  return { patterns, errors };
}

function countMatches(text: string, regex: RegExp): number {
  let count = 0;
  for (const match of text.matchAll(regex)) {
    if (match[0].length > 0) count++;
  }
  return count;
}

/**
 * Count attribute matches in free text
 *
 * @returns attribute key → match count, zero counts omitted
 */
export function detectAttributes(
  text: string,
  registry: AttributePatternRegistry | CompiledRegistry
): Record<string, number> {
  const compiled = isCompiled(registry) ? registry : compilePatternRegistry(registry);
  const counts: Record<string, number> = {};

  if (!text) return counts;

  for (const { key, regex } of compiled.patterns) {
    const count = countMatches(text, regex);
    if (count > 0) {
      counts[key] = count;
    }
  }

  return counts;
}

/**
 * Detect attributes over title + description; returns an updated copy
 */
export function detectListingAttributes(
  listing: Listing,
  registry: AttributePatternRegistry | CompiledRegistry
): Listing {
  const text = `${listing.title} ${listing.description}`;
  return { ...listing, detectedAttributes: detectAttributes(text, registry) };
}

function isCompiled(registry: AttributePatternRegistry | CompiledRegistry): registry is CompiledRegistry {
  return Array.isArray(registry.patterns) && Array.isArray(registry.errors);
}
