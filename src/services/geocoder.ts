import { isRecord, toCoordinate, type GeoPoint } from '../lib/listing-core/index.js';

export interface GeocodeResult extends GeoPoint {
  displayName: string;
}

export interface GeocodeOptions {
  fetchImpl?: typeof fetch;
  endpoint?: string;
  /** ISO 3166-1 alpha-2 codes, comma separated */
  countryCode?: string;
  timeoutMs?: number;
  userAgent?: string;
}

export const NOMINATIM_ENDPOINT = 'https://nominatim.openstreetmap.org/search';

/**
 * Resolve a city name to coordinates via Nominatim.
 *
 * @returns The best match, or null when nothing matched or the lookup failed
 */
export async function geocodeCity(
  city: string,
  options: GeocodeOptions = {}
): Promise<GeocodeResult | null> {
  const query = city.trim();
  if (!query) return null;

  const {
    fetchImpl = fetch,
    endpoint = NOMINATIM_ENDPOINT,
    countryCode = 'fr',
    timeoutMs = 15000,
    userAgent = 'listing-scout/1.0',
  } = options;

  const params = new URLSearchParams({
    q: query,
    format: 'json',
    limit: '1',
    countrycodes: countryCode,
  });

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchImpl(`${endpoint}?${params.toString()}`, {
      headers: { 'User-Agent': userAgent, Accept: 'application/json' },
      signal: controller.signal,
    });

    if (!response.ok) {
      console.warn(`[GEOCODER] HTTP ${response.status} for "${query}"`);
      return null;
    }

    const body: unknown = await response.json();
    if (!Array.isArray(body) || body.length === 0) {
      console.warn(`[GEOCODER] No match for "${query}"`);
      return null;
    }

    const first: unknown = body[0];
    if (!isRecord(first)) return null;

    const latitude = toCoordinate(first.lat);
    const longitude = toCoordinate(first.lon);
    if (latitude === null || longitude === null) {
      console.warn(`[GEOCODER] Match for "${query}" has no usable coordinates`);
      return null;
    }

    return {
      latitude,
      longitude,
      displayName: typeof first.display_name === 'string' ? first.display_name : query,
    };
  } catch (error) {
    console.error(`[GEOCODER] Lookup failed for "${query}":`, error);
    return null;
  } finally {
    clearTimeout(timer);
  }
}
