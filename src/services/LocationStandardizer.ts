import { v4 as uuidv4 } from 'uuid';
import { RawRecord, StandardizedLocation } from '../types/Location';
import { parseTimestamp, toRfc3339 } from '../utils/dateUtils';

/**
 * LocationStandardizer - Normalize plugin records into StandardizedLocation
 *
 * Every alias list below is ordered; the first field that yields a usable
 * value wins. A record without usable coordinates is dropped (null), which is
 * filtering, not an error. Fields that are not mapped onto the canonical
 * model are carried through in `metadata`.
 */

export const COORDINATE_ALIASES = [
  ['lat', 'lon'],
  ['latitude', 'longitude'],
] as const;

export const NAME_FIELDS = ['name', 'title', 'location', 'place', 'address'] as const;
export const TIMESTAMP_FIELDS = ['timestamp', 'date', 'time', 'created', 'modified'] as const;
export const SOURCE_FIELDS = ['source', 'plugin', 'provider'] as const;
export const CONTEXT_FIELDS = ['context', 'description', 'content', 'text'] as const;
export const INFOWINDOW_FIELDS = ['infowindowHTML', 'infowindow', 'html'] as const;

export const DEFAULT_NAME = 'Unnamed Location';
export const DEFAULT_SOURCE = 'unknown';

export interface StandardizeOptions {
  /** Source used when the record names none (usually the plugin name) */
  defaultSource?: string;
  /** Clock used for records without a parseable timestamp */
  now?: () => Date;
  /** Id generator for records without an upstream id */
  generateId?: () => string;
}

export interface StandardizeAllResult {
  locations: StandardizedLocation[];
  dropped: number;
}

interface Coordinates {
  latitude: number;
  longitude: number;
  fields: string[];
}

function toCoordinate(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function extractCoordinates(record: RawRecord): Coordinates | null {
  for (const [latField, lonField] of COORDINATE_ALIASES) {
    const latitude = toCoordinate(record[latField]);
    const longitude = toCoordinate(record[lonField]);
    if (latitude !== null && longitude !== null) {
      return { latitude, longitude, fields: [latField, lonField] };
    }
  }

  // GeoJSON order: [lon, lat]
  const coordinates = record.coordinates;
  if (Array.isArray(coordinates) && coordinates.length >= 2) {
    const longitude = toCoordinate(coordinates[0]);
    const latitude = toCoordinate(coordinates[1]);
    if (latitude !== null && longitude !== null) {
      return { latitude, longitude, fields: ['coordinates'] };
    }
  }

  return null;
}

function isValidCoordinate(latitude: number, longitude: number): boolean {
  return latitude >= -90 && latitude <= 90 && longitude >= -180 && longitude <= 180;
}

/**
 * True when the record carries usable, in-range coordinates
 */
export function hasCoordinates(record: RawRecord): boolean {
  const coordinates = extractCoordinates(record);
  return coordinates !== null && isValidCoordinate(coordinates.latitude, coordinates.longitude);
}

function firstText(record: RawRecord, fields: readonly string[]): { field: string; value: string } | null {
  for (const field of fields) {
    const value = record[field];
    if ((typeof value === 'string' && value.trim() !== '') || typeof value === 'number') {
      return { field, value: String(value) };
    }
  }
  return null;
}

function firstTimestamp(record: RawRecord): { field: string; value: Date } | null {
  for (const field of TIMESTAMP_FIELDS) {
    if (!(field in record)) continue;
    const parsed = parseTimestamp(record[field]);
    if (parsed) {
      return { field, value: parsed };
    }
  }
  return null;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function buildInfowindow(shortName: string, context: string, timestampUTC: string, source: string): string {
  const parts = [`<strong>${escapeHtml(shortName)}</strong>`];
  if (context) {
    parts.push(`<p>${escapeHtml(context)}</p>`);
  }
  parts.push(`<small>${escapeHtml(source)} | ${timestampUTC}</small>`);
  return `<div class="location-info">${parts.join('')}</div>`;
}

/**
 * Normalize one record; null when it has no usable coordinates
 */
export function standardize(record: RawRecord, options: StandardizeOptions = {}): StandardizedLocation | null {
  const coordinates = extractCoordinates(record);
  if (!coordinates || !isValidCoordinate(coordinates.latitude, coordinates.longitude)) {
    return null;
  }

  const consumed = new Set<string>(coordinates.fields);

  const name = firstText(record, NAME_FIELDS);
  if (name) consumed.add(name.field);

  const timestamp = firstTimestamp(record);
  if (timestamp) consumed.add(timestamp.field);

  const source = firstText(record, SOURCE_FIELDS);
  if (source) consumed.add(source.field);

  const context = firstText(record, CONTEXT_FIELDS);
  if (context) consumed.add(context.field);

  const infowindow = firstText(record, INFOWINDOW_FIELDS);
  if (infowindow) consumed.add(infowindow.field);

  const address = typeof record.address === 'string' && record.address.trim() !== '' ? record.address : undefined;
  if (address !== undefined) consumed.add('address');

  const upstreamId = record.id;
  const hasUpstreamId =
    (typeof upstreamId === 'string' && upstreamId.trim() !== '') || typeof upstreamId === 'number';
  if (hasUpstreamId) consumed.add('id');

  const shortName = name?.value ?? DEFAULT_NAME;
  const timestampUTC = toRfc3339(timestamp?.value ?? (options.now ?? (() => new Date()))());
  const sourceName = source?.value ?? options.defaultSource ?? DEFAULT_SOURCE;
  const contextText = context?.value ?? '';

  const metadata: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (!consumed.has(key)) {
      metadata[key] = value;
    }
  }

  const location: StandardizedLocation = {
    id: hasUpstreamId ? String(upstreamId) : (options.generateId ?? uuidv4)(),
    latitude: coordinates.latitude,
    longitude: coordinates.longitude,
    timestampUTC,
    source: sourceName,
    context: contextText,
    infowindowHTML: infowindow?.value ?? buildInfowindow(shortName, contextText, timestampUTC, sourceName),
    shortName,
    metadata,
  };
  if (address !== undefined) {
    location.address = address;
  }
  return location;
}

/**
 * Normalize a batch, dropping records without coordinates
 */
export function standardizeAll(records: RawRecord[], options: StandardizeOptions = {}): StandardizeAllResult {
  const locations: StandardizedLocation[] = [];
  let dropped = 0;

  for (const record of records) {
    if (typeof record !== 'object' || record === null || Array.isArray(record)) {
      dropped += 1;
      continue;
    }
    const location = standardize(record, options);
    if (location) {
      locations.push(location);
    } else {
      dropped += 1;
    }
  }

  return { locations, dropped };
}
