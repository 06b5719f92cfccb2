/**
 * ═══════════════════════════════════════════════════════════════════════════
 * LISTING SCOUT - COMMAND LINE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * I/O only: option parsing, env config, pattern file loading, CSV output.
 * Everything else goes through src/services/searchRunner.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 */

import { writeFile } from 'node:fs/promises';
import { Command, InvalidArgumentError, Option } from 'commander';
import {
  THROTTLE_MAX_MS,
  THROTTLE_MIN_MS,
  getSearchConfig,
  type Listing,
  type RetrievalStrategy,
  type SearchConfig,
} from '../src/lib/listing-core/index.js';
import { listingsToCsv } from '../src/lib/csvExporter.js';
import { loadPatternRegistry } from '../src/services/patternRegistry.js';
import { createPlaywrightSessionFactory } from '../src/services/playwrightSession.js';
import {
  runListingSearch,
  type SearchRunParams,
  type SearchRunResult,
} from '../src/services/searchRunner.js';

export interface SearchCommandOptions {
  location?: string;
  city?: string;
  radius?: number;
  pages: number;
  minPrice?: number;
  maxPrice?: number;
  mode?: RetrievalStrategy;
  throttle?: number;
  valuate?: boolean;
  negotiation?: number;
  dismantleBonus?: number;
  patterns?: string;
  csv?: string;
  browserPath?: string;
}

export interface CliDeps {
  env?: Record<string, string | undefined>;
  runSearch?: typeof runListingSearch;
  loadPatterns?: typeof loadPatternRegistry;
  writeOutput?: (filePath: string, content: string) => Promise<void>;
}

function parseNumber(label: string, min: number, max: number, integer = false) {
  return (raw: string): number => {
    const value = Number(raw);
    if (!Number.isFinite(value) || (integer && !Number.isInteger(value))) {
      throw new InvalidArgumentError(`${label} must be ${integer ? 'an integer' : 'a number'}.`);
    }
    if (value < min || value > max) {
      throw new InvalidArgumentError(`${label} must be between ${min} and ${max}.`);
    }
    return value;
  };
}

/**
 * Merge CLI flags over the environment configuration
 */
export function applyCliOverrides(config: SearchConfig, options: SearchCommandOptions): SearchConfig {
  return {
    ...config,
    ...(options.throttle !== undefined ? { throttleMs: options.throttle } : {}),
    ...(options.mode !== undefined ? { defaultStrategy: options.mode } : {}),
    ...(options.negotiation !== undefined ? { negotiationPct: options.negotiation } : {}),
    ...(options.dismantleBonus !== undefined ? { dismantleBonusPct: options.dismantleBonus } : {}),
  };
}

export function toSummaryRows(listings: Listing[], limit = 20) {
  return listings.slice(0, limit).map(listing => ({
    title: listing.title.length > 50 ? `${listing.title.slice(0, 47)}...` : listing.title,
    price: listing.priceAmount,
    margin: listing.valuation?.estimatedMargin ?? null,
    distance: listing.distanceKm,
    location: listing.locationLabel,
    url: listing.url,
  }));
}

function printSummary(result: SearchRunResult): void {
  const { stats } = result;
  console.log(
    `\n${result.status}: ${stats.kept} listings (${stats.parsed} parsed, ${stats.succeeded}/${stats.requested} pages ok, ${stats.failed} failed, ${stats.blocked} blocked)`
  );
  if (result.geocode === 'not_found') {
    console.log('City not found, distance filter was not applied.');
  }
  if (result.listings.length > 0) {
    console.table(toSummaryRows(result.listings));
  }
}

export function createCli(deps: CliDeps = {}): Command {
  const {
    env = {},
    runSearch = runListingSearch,
    loadPatterns = loadPatternRegistry,
    writeOutput = (filePath, content) => writeFile(filePath, content, 'utf8'),
  } = deps;

  const program = new Command();
  program
    .name('listing-scout')
    .description('Search classified listings, detect components and estimate resale margins');

  program
    .command('search')
    .description('Run a search for one or more queries (quote multi-word queries)')
    .argument('<queries...>', 'search terms, e.g. "RTX 3070"')
    .option('-l, --location <filter>', 'location filter passed to the marketplace')
    .option('-c, --city <name>', 'reference city for distance filtering')
    .option('-r, --radius <km>', 'maximum distance from the city', parseNumber('Radius', 1, 1000))
    .option('-p, --pages <n>', 'pages per query', parseNumber('Pages', 1, 50, true), 2)
    .option('--min-price <eur>', 'minimum price', parseNumber('Minimum price', 0, 10_000_000))
    .option('--max-price <eur>', 'maximum price', parseNumber('Maximum price', 0, 10_000_000))
    .addOption(new Option('-m, --mode <mode>', 'retrieval strategy').choices(['http', 'browser']))
    .option(
      '--throttle <ms>',
      'minimum delay between requests',
      parseNumber('Throttle', THROTTLE_MIN_MS, THROTTLE_MAX_MS, true)
    )
    .option('--valuate', 'detect attributes and estimate margins')
    .option('--negotiation <pct>', 'expected discount on asking prices', parseNumber('Negotiation', 0, 100))
    .option('--dismantle-bonus <pct>', 'uplift from selling parts separately', parseNumber('Dismantle bonus', 0, 100))
    .option('--patterns <file>', 'attribute pattern registry (JSON)')
    .option('--csv <file>', 'write results as CSV')
    .option('--browser-path <path>', 'Chromium executable for browser mode')
    .action(async (queries: string[], options: SearchCommandOptions) => {
      const config = applyCliOverrides(getSearchConfig(env), options);

      if (options.pages > config.maxPages) {
        console.warn(`[CLI] Limiting pages to ${config.maxPages}`);
      }

      const params: SearchRunParams = {
        queries,
        pages: Math.min(options.pages, config.maxPages),
        locationFilter: options.location ?? null,
        priceMin: options.minPrice ?? null,
        priceMax: options.maxPrice ?? null,
        city: options.city ?? null,
        radiusKm: options.radius ?? null,
        strategy: config.defaultStrategy,
        valuation: null,
      };

      if (options.valuate || options.patterns) {
        const { registry } = await loadPatterns(options.patterns);
        params.valuation = {
          registry,
          negotiationPct: config.negotiationPct,
          dismantleBonusPct: config.dismantleBonusPct,
        };
      }

      const controller = new AbortController();
      const onSigint = () => {
        console.warn('\n[CLI] Interrupt received, cancelling...');
        controller.abort();
      };
      process.once('SIGINT', onSigint);

      try {
        const result = await runSearch(params, {
          config,
          signal: controller.signal,
          browserFactory:
            config.defaultStrategy === 'browser'
              ? createPlaywrightSessionFactory(options.browserPath)
              : undefined,
        });

        printSummary(result);

        if (options.csv) {
          await writeOutput(options.csv, listingsToCsv(result.listings));
          console.log(`[CLI] Wrote ${result.listings.length} rows to ${options.csv}`);
        }
      } finally {
        process.removeListener('SIGINT', onSigint);
      }
    });

  return program;
}
