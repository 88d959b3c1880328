/**
 * GeoParser - Resolve coordinate-less records to coordinates
 *
 * Address-like fields are geocoded directly; free text goes through NLP place
 * extraction first. Results are cached in memory and requests are throttled
 * through a shared RateLimiter.
 */

import nlp from 'compromise';
import NodeGeocoder, { Entry } from 'node-geocoder';
import { RawRecord } from '../types/Location';
import { describeError } from '../types/errors';
import { hasCoordinates } from './LocationStandardizer';
import { RateLimiter } from './RateLimiter';
import { createLogger } from '../utils/logger';

const logger = createLogger({ component: 'GeoParser' });

// =============================================================================
// Types
// =============================================================================

export interface ParsedLocation {
  /** Text that was geocoded */
  text: string;
  latitude: number;
  longitude: number;
  formattedAddress?: string;
  city?: string;
  country?: string;
  /** 0-1 */
  confidence: number;
}

export interface GeoParserOptions {
  /** Geocoding provider (default: openstreetmap) */
  provider?: 'openstreetmap' | 'mapbox' | 'google';
  /** API key for paid providers */
  apiKey?: string;
  /** Cache TTL in milliseconds (default: 1 hour) */
  cacheTTL?: number;
  /** Max cached places; the oldest entry goes first (default: 1000) */
  maxCacheSize?: number;
  /** Max places geocoded per text (default: 3) */
  maxLocations?: number;
  /** Min length of an extracted place name (default: 2) */
  minLocationLength?: number;
  /** Min delay between geocoder requests in ms (default: 1100 for Nominatim, 0 disables) */
  rateLimitDelay?: number;
  /** Geocoder to use instead of one built from provider/apiKey */
  geocoder?: PlaceGeocoder;
}

export interface PlaceGeocoder {
  geocode(query: string): Promise<Entry[]>;
}

export interface EnrichResult {
  records: RawRecord[];
  resolved: number;
}

interface CacheEntry {
  result: ParsedLocation | null;
  timestamp: number;
}

/** Fields holding something an address geocoder can take as-is */
export const ADDRESS_FIELDS = ['address', 'location', 'place'] as const;
/** Fields holding free text that may mention places */
export const TEXT_FIELDS = ['content', 'text', 'context', 'description'] as const;

const COMMON_WORDS = new Set([
  'the', 'a', 'an', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for',
  'of', 'with', 'by', 'from', 'as', 'is', 'was', 'are', 'today',
  'yesterday', 'tomorrow', 'now', 'then', 'here', 'there', 'home', 'work',
  'news', 'update', 'live', 'new',
]);

function toStringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

// =============================================================================
// GeoParser Class
// =============================================================================

export class GeoParser {
  private readonly geocoder: PlaceGeocoder;
  private readonly cache = new Map<string, CacheEntry>();
  private readonly pendingRequests = new Map<string, Promise<ParsedLocation | null>>();
  private readonly limiter?: RateLimiter;
  private readonly cacheTTL: number;
  private readonly maxCacheSize: number;
  private readonly maxLocations: number;
  private readonly minLocationLength: number;

  constructor(options: GeoParserOptions = {}) {
    const provider = options.provider ?? 'openstreetmap';
    const apiKey = options.apiKey ?? '';
    this.cacheTTL = options.cacheTTL ?? 3600000;
    this.maxCacheSize = Math.max(1, options.maxCacheSize ?? 1000);
    this.maxLocations = options.maxLocations ?? 3;
    this.minLocationLength = options.minLocationLength ?? 2;

    const delay = options.rateLimitDelay ?? 1100;
    if (delay > 0) {
      this.limiter = new RateLimiter(1, delay / 1000);
    }

    if (options.geocoder) {
      this.geocoder = options.geocoder;
    } else if (provider === 'google' && apiKey) {
      this.geocoder = NodeGeocoder({ provider: 'google', apiKey });
    } else if (provider === 'mapbox' && apiKey) {
      this.geocoder = NodeGeocoder({ provider: 'mapbox', apiKey });
    } else {
      // OpenStreetMap needs no key
      this.geocoder = NodeGeocoder({ provider: 'openstreetmap' });
    }

    logger.info({ provider }, 'GeoParser initialized');
  }

  /**
   * Extract places from text and geocode them
   */
  async parseLocations(text: string): Promise<ParsedLocation[]> {
    if (!text || text.trim().length === 0) {
      return [];
    }

    const placeNames = this.extractPlaceNames(text);
    if (placeNames.length === 0) {
      return [];
    }
    logger.debug({ placeNames }, 'Extracted place names');

    const locations: ParsedLocation[] = [];
    for (const placeName of placeNames.slice(0, this.maxLocations)) {
      const location = await this.geocodePlace(placeName);
      if (location) {
        locations.push(location);
      }
    }
    return locations;
  }

  async parseBestLocation(text: string): Promise<ParsedLocation | null> {
    const locations = await this.parseLocations(text);
    return locations[0] ?? null;
  }

  /**
   * Add lat/lon to a record that has none. Records that already carry
   * coordinates, or that cannot be resolved, come back unchanged.
   */
  async resolveRecord(record: RawRecord): Promise<RawRecord> {
    if (hasCoordinates(record)) {
      return record;
    }

    let resolved: ParsedLocation | null = null;

    for (const field of ADDRESS_FIELDS) {
      const value = record[field];
      if (typeof value === 'string' && value.trim().length >= this.minLocationLength) {
        resolved = await this.geocodePlace(value.trim());
        if (resolved) break;
      }
    }

    if (!resolved) {
      for (const field of TEXT_FIELDS) {
        const value = record[field];
        if (typeof value === 'string' && value.trim().length > 0) {
          resolved = await this.parseBestLocation(value);
          if (resolved) break;
        }
      }
    }

    if (!resolved) {
      return record;
    }

    const enriched: RawRecord = {
      ...record,
      lat: resolved.latitude,
      lon: resolved.longitude,
      geocodedFrom: resolved.text,
      geocodeConfidence: resolved.confidence,
    };
    if (typeof record.address !== 'string' && resolved.formattedAddress) {
      enriched.address = resolved.formattedAddress;
    }
    return enriched;
  }

  /**
   * Resolve every record in order; returns how many gained coordinates.
   * Once shouldStop returns true the remaining records pass through as they are.
   */
  async enrich(records: RawRecord[], shouldStop: () => boolean = () => false): Promise<EnrichResult> {
    const output: RawRecord[] = [];
    let resolved = 0;
    for (const record of records) {
      if (shouldStop()) {
        output.push(record);
        continue;
      }
      const next = await this.resolveRecord(record);
      if (next !== record) {
        resolved += 1;
      }
      output.push(next);
    }
    return { records: output, resolved };
  }

  /**
   * Place names from text using NLP
   */
  private extractPlaceNames(text: string): string[] {
    const doc = nlp(text);
    const places = toStringList(doc.places().out('array'));
    const topics = toStringList(doc.topics().out('array'));

    return [...new Set([...places, ...topics])]
      .map(place => place.trim())
      .filter(place => place.length >= this.minLocationLength)
      .filter(place => !COMMON_WORDS.has(place.toLowerCase()))
      .filter(place => !this.isInvalidPlaceName(place));
  }

  private isInvalidPlaceName(name: string): boolean {
    if (name.startsWith('#') || name.startsWith('@')) return true;
    if (name.startsWith('http://') || name.startsWith('https://')) return true;
    if (/^\d+$/.test(name)) return true;

    const specialCharCount = (name.match(/[^\p{L}\s,.'-]/gu) ?? []).length;
    return specialCharCount > name.length * 0.3;
  }

  async geocodePlace(placeName: string): Promise<ParsedLocation | null> {
    const cacheKey = placeName.toLowerCase().trim();

    const cached = this.cache.get(cacheKey);
    if (cached && Date.now() - cached.timestamp < this.cacheTTL) {
      logger.debug({ placeName }, 'Geocode cache hit');
      return cached.result;
    }

    const pending = this.pendingRequests.get(cacheKey);
    if (pending) {
      return pending;
    }

    const request = this.doGeocode(placeName, cacheKey);
    this.pendingRequests.set(cacheKey, request);
    try {
      return await request;
    } finally {
      this.pendingRequests.delete(cacheKey);
    }
  }

  private async doGeocode(placeName: string, cacheKey: string): Promise<ParsedLocation | null> {
    if (this.limiter) {
      await this.limiter.waitIfNeeded();
    }

    try {
      const results = await this.geocoder.geocode(placeName);
      const best = results.find(entry => entry.latitude !== undefined && entry.longitude !== undefined);
      const location = best ? this.transformResult(placeName, best) : null;

      this.remember(cacheKey, location);
      logger.debug({ placeName, found: location !== null }, 'Geocoded');
      return location;
    } catch (error) {
      // Not cached: a transient failure may succeed later
      logger.warn({ placeName, error: describeError(error) }, 'Geocoding failed');
      return null;
    }
  }

  private remember(cacheKey: string, result: ParsedLocation | null): void {
    // Map keeps insertion order, so the first key is the oldest
    this.cache.delete(cacheKey);
    while (this.cache.size >= this.maxCacheSize) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
    this.cache.set(cacheKey, { result, timestamp: Date.now() });
  }

  private transformResult(text: string, result: Entry): ParsedLocation | null {
    const { latitude, longitude } = result;
    if (latitude === undefined || longitude === undefined) {
      return null;
    }
    return {
      text,
      latitude,
      longitude,
      formattedAddress: result.formattedAddress,
      city: result.city,
      country: result.country,
      confidence: this.calculateConfidence(result),
    };
  }

  private calculateConfidence(result: Entry): number {
    let confidence = 0.5;
    if (result.city) confidence += 0.2;
    if (result.country) confidence += 0.15;
    if (result.streetName) confidence += 0.15;
    return Math.min(confidence, 1);
  }

  clearCache(): void {
    this.cache.clear();
    logger.info('Geocode cache cleared');
  }

  getCacheStats(): { size: number } {
    return { size: this.cache.size };
  }
}
