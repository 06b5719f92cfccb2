import { randomUUID } from 'node:crypto';
import {
  DEFAULT_SEARCH_CONFIG,
  RequestThrottle,
  ThrottleAbortedError,
  aggregateListings,
  buildSearchRequests,
  compilePatternRegistry,
  detectBlockedContent,
  detectListingAttributes,
  parseSearchPage,
  extractOrigin,
  retrieveContent,
  toValueTable,
  valuateListing,
  type AttributePatternRegistry,
  type BrowserSessionFactory,
  type GeoPoint,
  type Listing,
  type PatternError,
  type RetrievalFailure,
  type RetrievalResult,
  type RetrievalStrategy,
  type SearchConfig,
} from '../lib/listing-core/index.js';
import {
  searchRunsStore,
  type SearchRunProgressEvent,
  type SearchRunStatus,
  type SearchRunsStoreApi,
  type SearchStage,
} from '../store/searchRunsStore.js';
import { geocodeCity } from './geocoder.js';
import { createPlaywrightSessionFactory } from './playwrightSession.js';

export interface ValuationRequest {
  registry: AttributePatternRegistry;
  negotiationPct?: number;
  dismantleBonusPct?: number;
}

export interface SearchRunParams {
  queries: string[];
  pages: number;
  locationFilter?: string | null;
  priceMin?: number | null;
  priceMax?: number | null;
  /** City used as the reference point for the radius filter */
  city?: string | null;
  radiusKm?: number | null;
  strategy?: RetrievalStrategy;
  /** Attribute detection + valuation; omitted means listings keep `valuation: null` */
  valuation?: ValuationRequest | null;
}

export interface SearchRunDeps {
  config?: SearchConfig;
  fetchImpl?: typeof fetch;
  browserFactory?: BrowserSessionFactory;
  /** Shared rate limiter; pass the same instance to every concurrent run */
  throttle?: RequestThrottle;
  geocode?: (city: string) => Promise<GeoPoint | null>;
  store?: SearchRunsStoreApi;
  signal?: AbortSignal;
  runId?: string;
  random?: () => number;
}

export type GeocodeOutcome = 'not_requested' | 'resolved' | 'not_found';

export interface SearchRunStats {
  requested: number;
  succeeded: number;
  failed: number;
  blocked: number;
  parsed: number;
  kept: number;
}

export interface SearchRunResult {
  runId: string;
  status: SearchRunStatus;
  listings: Listing[];
  /** One batch per executed request, empty for failed requests */
  batches: Listing[][];
  referencePoint: GeoPoint | null;
  geocode: GeocodeOutcome;
  stats: SearchRunStats;
  cancelled: boolean;
  failures: RetrievalFailure[];
  patternErrors: PatternError[];
  rejectedQueries: string[];
}

type ProgressCallback = (event: SearchRunProgressEvent) => void;

function resolveStatus(
  cancelled: boolean,
  stats: SearchRunStats
): SearchRunStatus {
  if (cancelled) return 'CANCELLED';
  if (stats.requested > 0 && stats.succeeded === 0) return 'ALL_FAILED';
  if (stats.kept === 0) return 'NO_RESULTS';
  return 'SUCCESS';
}

async function resolveReferencePoint(
  city: string,
  deps: SearchRunDeps
): Promise<GeoPoint | null> {
  try {
    if (deps.geocode) {
      return await deps.geocode(city);
    }
    return await geocodeCity(city, { fetchImpl: deps.fetchImpl });
  } catch (error) {
    console.error(`[SEARCH_RUNNER] Geocoding "${city}" failed:`, error);
    return null;
  }
}

/**
 * Execute a full search: geocode, throttled retrieval loop, parsing,
 * detection + valuation, aggregation.
 *
 * Requests run strictly one after another, query-major with pages ascending.
 * A failed request contributes an empty batch; cancellation stops the loop
 * between requests and the partial results are still aggregated.
 */
export async function runListingSearch(
  params: SearchRunParams,
  deps: SearchRunDeps = {},
  onProgress?: ProgressCallback
): Promise<SearchRunResult> {
  const config = deps.config ?? DEFAULT_SEARCH_CONFIG;
  const store = deps.store ?? searchRunsStore;
  const throttle = deps.throttle ?? new RequestThrottle(config.throttleMs);
  const strategy = params.strategy ?? config.defaultStrategy;
  const browserFactory =
    deps.browserFactory ?? (strategy === 'browser' ? createPlaywrightSessionFactory() : undefined);
  const runId = deps.runId ?? randomUUID();
  const { signal } = deps;

  const { addRun, updateRun, addLog } = store.getState();

  const emitProgress = (
    stage: SearchStage,
    label: string,
    message: string,
    level: SearchRunProgressEvent['level'] = 'info'
  ) => {
    const event: SearchRunProgressEvent = {
      id: runId,
      label,
      message,
      stage,
      timestamp: Date.now(),
      level,
    };
    updateRun(runId, { stage, lastStage: stage });
    addLog(runId, event);
    onProgress?.(event);
  };

  addRun({ id: runId, queries: params.queries, stage: 'queued', startedAt: Date.now() });

  const stats: SearchRunStats = {
    requested: 0,
    succeeded: 0,
    failed: 0,
    blocked: 0,
    parsed: 0,
    kept: 0,
  };
  const batches: Listing[][] = [];
  const failures: RetrievalFailure[] = [];
  let cancelled = false;

  try {
    // Requests
    const { requests, rejected } = buildSearchRequests(
      params.queries,
      params.pages,
      {
        locationFilter: params.locationFilter,
        priceMin: params.priceMin,
        priceMax: params.priceMax,
      },
      config
    );
    for (const { queryText, error } of rejected) {
      emitProgress('queued', 'Query skipped', `"${queryText}": ${error.message}`, 'warning');
    }

    // Valuation inputs
    const compiled = params.valuation ? compilePatternRegistry(params.valuation.registry) : null;
    const valueTable = params.valuation ? toValueTable(params.valuation.registry) : null;
    const negotiationPct = params.valuation?.negotiationPct ?? config.negotiationPct;
    const dismantleBonusPct = params.valuation?.dismantleBonusPct ?? config.dismantleBonusPct;
    for (const patternError of compiled?.errors ?? []) {
      console.warn(`[SEARCH_RUNNER] ${patternError.message}`);
      emitProgress('queued', 'Pattern skipped', patternError.message, 'warning');
    }

    // Reference point
    let referencePoint: GeoPoint | null = null;
    let geocode: GeocodeOutcome = 'not_requested';
    const city = params.city?.trim();
    if (city) {
      emitProgress('geocoding', 'Geocoding', `Resolving "${city}"...`);
      referencePoint = await resolveReferencePoint(city, deps);
      geocode = referencePoint ? 'resolved' : 'not_found';
      if (!referencePoint) {
        emitProgress(
          'geocoding',
          'City not found',
          `Could not geocode "${city}", distance filtering disabled`,
          'warning'
        );
      }
    }

    // Retrieval loop
    for (const request of requests) {
      if (signal?.aborted) {
        cancelled = true;
        break;
      }

      try {
        await throttle.acquire(signal);
      } catch (error) {
        if (error instanceof ThrottleAbortedError) {
          cancelled = true;
          break;
        }
        throw error;
      }

      stats.requested++;
      emitProgress(
        'retrieving',
        `Page ${request.pageNumber}`,
        `Fetching "${request.queryText}" page ${request.pageNumber} (${strategy})`
      );

      let result: RetrievalResult;
      try {
        result = await retrieveContent(request, strategy, {
          config,
          fetchImpl: deps.fetchImpl,
          browserFactory,
          signal,
          random: deps.random,
        });
      } finally {
        throttle.release();
      }

      if (!result.ok) {
        if (result.failure.reason === 'cancelled') {
          cancelled = true;
          break;
        }
        stats.failed++;
        failures.push(result.failure);
        batches.push([]);
        emitProgress(
          'retrieving',
          `Page ${request.pageNumber}`,
          `No content retrieved for page ${request.pageNumber}: ${result.failure.message}`,
          'warning'
        );
        continue;
      }

      stats.succeeded++;
      const { listings: parsed, extractionMethod } = parseSearchPage(
        result.content.html,
        extractOrigin(result.content.locator, config.originUrl)
      );

      if (parsed.length === 0) {
        const blocked = detectBlockedContent(result.content.html);
        if (blocked.isBlocked) {
          stats.blocked++;
          emitProgress(
            'parsing',
            `Page ${request.pageNumber}`,
            `Page looks blocked (matched "${blocked.matchedKeyword}")`,
            'warning'
          );
        }
      }

      const batch =
        compiled && valueTable
          ? parsed.map(listing =>
              valuateListing(
                detectListingAttributes(listing, compiled),
                valueTable,
                negotiationPct,
                dismantleBonusPct
              )
            )
          : parsed;

      stats.parsed += batch.length;
      batches.push(batch);
      emitProgress(
        'parsing',
        `Page ${request.pageNumber}`,
        `${batch.length} listings extracted (${extractionMethod})`
      );
    }

    if (cancelled) {
      emitProgress('cancelled', 'Cancelled', 'Search cancelled, keeping partial results', 'warning');
    }

    // Aggregation
    const listings = aggregateListings(batches, {
      priceMin: params.priceMin,
      priceMax: params.priceMax,
      referencePoint,
      radiusKm: params.radiusKm,
      sortBy: params.valuation ? 'margin' : 'price',
    });
    stats.kept = listings.length;

    const status = resolveStatus(cancelled, stats);
    const finalStage: SearchStage = cancelled ? 'cancelled' : 'done';
    emitProgress(
      finalStage,
      'Finished',
      `${stats.kept} listings kept from ${stats.succeeded}/${stats.requested} pages`,
      status === 'SUCCESS' ? 'info' : 'warning'
    );
    updateRun(runId, { finishedAt: Date.now(), status });

    console.log(
      `[SEARCH_RUNNER] Run ${runId} finished with ${status}: ${stats.kept} listings, ${stats.failed} failed pages`
    );

    return {
      runId,
      status,
      listings,
      batches,
      referencePoint,
      geocode,
      stats,
      cancelled,
      failures,
      patternErrors: compiled?.errors ?? [],
      rejectedQueries: rejected.map(entry => entry.queryText),
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[SEARCH_RUNNER] Run ${runId} failed:`, error);
    emitProgress('error', 'Error', message, 'error');
    updateRun(runId, { finishedAt: Date.now(), errorMessage: message });
    throw error;
  }
}
