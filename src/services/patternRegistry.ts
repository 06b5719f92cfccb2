import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import {
  compilePatternRegistry,
  isRecord,
  type AttributePatternRegistry,
  type AttributePatternRule,
} from '../lib/listing-core/index.js';

// Sources live at src/services, compiled output at dist/src/services
const DEFAULT_PATTERNS_CANDIDATES = [
  '../../data/attribute-patterns.json',
  '../../../data/attribute-patterns.json',
].map(relative => fileURLToPath(new URL(relative, import.meta.url)));

export const DEFAULT_PATTERNS_PATH =
  DEFAULT_PATTERNS_CANDIDATES.find(candidate => existsSync(candidate)) ??
  DEFAULT_PATTERNS_CANDIDATES[0];

export interface LoadedPatternRegistry {
  registry: AttributePatternRegistry;
  /** Entries dropped because their shape or regex is invalid */
  rejected: Array<{ key: string; message: string }>;
}

function toRule(value: unknown): AttributePatternRule | string {
  if (!isRecord(value)) return 'entry is not an object';
  if (typeof value.pattern !== 'string' || value.pattern === '') return 'missing "pattern"';
  if (typeof value.unitValue !== 'number' || !Number.isFinite(value.unitValue)) {
    return 'missing numeric "unitValue"';
  }

  const rule: AttributePatternRule = { pattern: value.pattern, unitValue: value.unitValue };
  if (typeof value.label === 'string') {
    rule.label = value.label;
  }
  return rule;
}

/**
 * Validate a raw registry object. Malformed entries and entries whose
 * regex does not compile are rejected individually.
 */
export function validatePatternRegistry(raw: unknown): LoadedPatternRegistry {
  const registry: AttributePatternRegistry = {};
  const rejected: LoadedPatternRegistry['rejected'] = [];

  if (!isRecord(raw)) {
    return { registry, rejected: [{ key: '*', message: 'registry is not an object' }] };
  }

  for (const [key, value] of Object.entries(raw)) {
    const rule = toRule(value);
    if (typeof rule === 'string') {
      rejected.push({ key, message: rule });
      continue;
    }
    registry[key] = rule;
  }

  for (const error of compilePatternRegistry(registry).errors) {
    delete registry[error.key];
    rejected.push({ key: error.key, message: error.message });
  }

  for (const { key, message } of rejected) {
    console.warn(`[PATTERN_REGISTRY] Skipping "${key}": ${message}`);
  }

  return { registry, rejected };
}

/**
 * Load and validate a pattern registry JSON file
 *
 * @throws when the file cannot be read or is not valid JSON
 */
export async function loadPatternRegistry(
  filePath: string = DEFAULT_PATTERNS_PATH
): Promise<LoadedPatternRegistry> {
  const text = await readFile(filePath, 'utf8');
  const raw: unknown = JSON.parse(text);
  const loaded = validatePatternRegistry(raw);

  console.log(
    `[PATTERN_REGISTRY] Loaded ${Object.keys(loaded.registry).length} patterns from ${filePath}`
  );
  return loaded;
}
