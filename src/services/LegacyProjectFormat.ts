import initSqlJs, { type Database, type SqlJsStatic } from 'sql.js';
import { promises as fs } from 'fs';
import path from 'path';
import crypto from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { StandardizedLocation, Target } from '../types/Location';
import { Project } from '../types/Project';
import { PersistenceError } from '../types/errors';
import { parseTimestamp, toRfc3339 } from '../utils/dateUtils';
import { hasInvalidCoordinates } from '../utils/geoUtils';
import { createLogger } from '../utils/logger';

/**
 * Legacy project format
 *
 * A SQLite file with a single key/value table. Each key holds one JSON value.
 * Locations use the historical field names (plugin, datetime, infowindow).
 * Keys the historical layout lacks are written as extras so a modern
 * project survives the trip through this format unchanged. Fields this
 * module does not know are kept: on a location they move into metadata,
 * on a target they travel in its metadata and are written back beside it.
 */

const logger = createLogger({ component: 'LegacyProjectFormat' });

const TABLE = 'shelf';

export const LEGACY_KEYS = [
  'projectName',
  'projectKeywords',
  'projectDescription',
  'dateCreated',
  'dateEdited',
  'enabledPlugins',
  'selectedTargets',
  'locations',
  'viewSettings',
  'analysis',
] as const;

const EXTRA_KEYS = ['projectId', 'projectTarget', 'projectMetadata', 'pluginData'] as const;

type LegacyKey = (typeof LEGACY_KEYS)[number] | (typeof EXTRA_KEYS)[number];

interface LegacyLocation {
  id: string;
  shortName: string;
  latitude: number;
  longitude: number;
  datetime: string;
  context: string;
  plugin: string;
  infowindow: string;
  visible: boolean;
  address?: string;
  metadata?: Record<string, unknown>;
}

interface LegacyTarget {
  pluginName: string;
  targetId: string;
  targetName: string;
  targetPicture?: string;
  [extra: string]: unknown;
}

interface LegacyPluginEntry {
  pluginName: string;
  searchOptions: Record<string, unknown>;
}

const LOCATION_FIELDS = new Set([
  'id', 'shortName', 'latitude', 'longitude', 'datetime', 'context',
  'plugin', 'infowindow', 'visible', 'address', 'metadata',
]);

const TARGET_FIELDS = new Set([
  'pluginName', 'targetId', 'targetName', 'targetPicture',
  'externalId', 'displayName', 'avatarRef', 'metadata',
]);

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

function encodeLocation(location: StandardizedLocation): LegacyLocation {
  const legacy: LegacyLocation = {
    id: location.id,
    shortName: location.shortName,
    latitude: location.latitude,
    longitude: location.longitude,
    datetime: location.timestampUTC,
    context: location.context,
    plugin: location.source,
    infowindow: location.infowindowHTML,
    visible: location.visible ?? true,
    metadata: location.metadata,
  };
  if (location.address !== undefined) {
    legacy.address = location.address;
  }
  return legacy;
}

function encodeTarget(target: Target): LegacyTarget {
  const legacy: LegacyTarget = {
    ...target.metadata,
    pluginName: target.pluginName,
    targetId: target.externalId,
    targetName: target.displayName,
  };
  if (target.avatarRef !== undefined) {
    legacy.targetPicture = target.avatarRef;
  }
  return legacy;
}

function encodePlugins(project: Project): LegacyPluginEntry[] {
  return project.activePlugins.map(pluginName => {
    const data = project.pluginData[pluginName];
    const searchOptions = isRecord(data) && isRecord(data.searchOptions) ? data.searchOptions : {};
    return { pluginName, searchOptions };
  });
}

export function encodeLegacy(project: Project): Record<LegacyKey, unknown> {
  return {
    projectName: project.name,
    projectKeywords: project.tags,
    projectDescription: project.notes,
    dateCreated: project.createdAt.toISOString(),
    dateEdited: project.modifiedAt.toISOString(),
    enabledPlugins: encodePlugins(project),
    selectedTargets: project.selectedTargets.map(encodeTarget),
    locations: project.locations.map(encodeLocation),
    viewSettings: project.settings,
    analysis: project.analysis ?? null,
    projectId: project.id,
    projectTarget: project.target,
    projectMetadata: project.metadata,
    pluginData: project.pluginData,
  };
}

// ---------------------------------------------------------------------------
// Decoding (lenient: historical files vary)
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asString(value: unknown, fallback = ''): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return fallback;
}

function asStringList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string');
  }
  if (typeof value === 'string') {
    return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
  }
  return [];
}

function asNumber(value: unknown): number | null {
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  return typeof parsed === 'number' && Number.isFinite(parsed) ? parsed : null;
}

function extraFields(value: Record<string, unknown>, known: ReadonlySet<string>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([key]) => !known.has(key)));
}

function coordinate(value: unknown, limit: number): number | null {
  const parsed = asNumber(value);
  return parsed !== null && Math.abs(parsed) <= limit ? parsed : null;
}

/**
 * Locations keep their place in the list whatever they hold. Missing or
 * out-of-range coordinates become 0 and the stored values are recorded
 * under metadata.invalidCoordinates.
 */
function decodeLocation(value: unknown, fallbackTime: Date): StandardizedLocation {
  const fields = isRecord(value) ? value : {};

  const latitude = coordinate(fields.latitude, 90);
  const longitude = coordinate(fields.longitude, 180);
  const metadata: Record<string, unknown> = {
    ...extraFields(fields, LOCATION_FIELDS),
    ...(isRecord(fields.metadata) ? fields.metadata : {}),
  };
  if (latitude === null || longitude === null) {
    metadata.invalidCoordinates = {
      latitude: fields.latitude ?? null,
      longitude: fields.longitude ?? null,
    };
  }

  const timestamp = parseTimestamp(fields.datetime ?? fields.timestamp) ?? fallbackTime;
  const location: StandardizedLocation = {
    id: asString(fields.id) || uuidv4(),
    latitude: latitude ?? 0,
    longitude: longitude ?? 0,
    timestampUTC: toRfc3339(timestamp),
    source: asString(fields.plugin, 'unknown'),
    context: asString(fields.context),
    infowindowHTML: asString(fields.infowindow ?? fields.description),
    shortName: asString(fields.shortName ?? fields.name, 'Unnamed Location'),
    metadata,
  };
  if (typeof fields.address === 'string') {
    location.address = fields.address;
  }
  if (fields.visible === false) {
    location.visible = false;
  }
  return location;
}

function decodeTarget(value: unknown): Target | null {
  if (!isRecord(value)) return null;

  const pluginName = asString(value.pluginName);
  const externalId = asString(value.targetId ?? value.externalId);
  if (!pluginName || !externalId) return null;

  const target: Target = {
    pluginName,
    externalId,
    displayName: asString(value.targetName ?? value.displayName, externalId),
  };
  const avatar = value.targetPicture ?? value.avatarRef;
  if (typeof avatar === 'string') {
    target.avatarRef = avatar;
  }
  const extra = {
    ...(isRecord(value.metadata) ? value.metadata : {}),
    ...extraFields(value, TARGET_FIELDS),
  };
  if (Object.keys(extra).length > 0) {
    target.metadata = extra;
  }
  return target;
}

/**
 * enabledPlugins holds plugin names, or { pluginName, searchOptions } entries.
 * Search options land in pluginData[name].searchOptions unless pluginData
 * already carries them.
 */
function decodePlugins(
  value: unknown,
  pluginData: Record<string, unknown>
): { activePlugins: string[]; pluginData: Record<string, unknown> } {
  if (!Array.isArray(value)) {
    return { activePlugins: asStringList(value), pluginData };
  }

  const activePlugins: string[] = [];
  const merged: Record<string, unknown> = { ...pluginData };
  for (const entry of value) {
    if (typeof entry === 'string') {
      activePlugins.push(entry);
      continue;
    }
    if (!isRecord(entry)) continue;
    const name = asString(entry.pluginName);
    if (!name) continue;
    activePlugins.push(name);

    const { searchOptions } = entry;
    if (!isRecord(searchOptions) || Object.keys(searchOptions).length === 0) continue;
    const existing = merged[name];
    if (isRecord(existing)) {
      if (existing.searchOptions === undefined) {
        merged[name] = { ...existing, searchOptions };
      }
    } else if (existing === undefined) {
      merged[name] = { searchOptions };
    }
  }
  return { activePlugins, pluginData: merged };
}

export function decodeLegacy(values: ReadonlyMap<string, unknown>, filePath: string): Project {
  const now = new Date();
  const createdAt = parseTimestamp(values.get('dateCreated')) ?? now;
  const modifiedAt = parseTimestamp(values.get('dateEdited')) ?? createdAt;

  const rawLocations = values.get('locations');
  const locations = (Array.isArray(rawLocations) ? rawLocations : []).map(entry => decodeLocation(entry, createdAt));
  const invalid = locations.filter(hasInvalidCoordinates).length;
  if (invalid > 0) {
    logger.warn({ filePath, invalid }, 'Legacy locations without valid coordinates were placed at 0,0');
  }

  const rawTargets = values.get('selectedTargets');
  const selectedTargets = (Array.isArray(rawTargets) ? rawTargets : [])
    .map(decodeTarget)
    .filter((target): target is Target => target !== null);

  const settings = values.get('viewSettings');
  const metadata = values.get('projectMetadata');
  const storedPluginData = values.get('pluginData');
  const plugins = decodePlugins(values.get('enabledPlugins'), isRecord(storedPluginData) ? storedPluginData : {});

  return {
    id: asString(values.get('projectId')) || uuidv4(),
    name: asString(values.get('projectName')) || path.basename(filePath, path.extname(filePath)),
    target: asString(values.get('projectTarget')),
    notes: asString(values.get('projectDescription')),
    createdAt,
    modifiedAt,
    locations,
    tags: asStringList(values.get('projectKeywords')),
    settings: isRecord(settings) ? settings : {},
    activePlugins: plugins.activePlugins,
    selectedTargets,
    metadata: isRecord(metadata) ? metadata : {},
    pluginData: plugins.pluginData,
    analysis: values.get('analysis') ?? null,
    path: filePath,
    format: 'legacy',
  };
}

// ---------------------------------------------------------------------------
// File access
// ---------------------------------------------------------------------------

let sqlJs: Promise<SqlJsStatic> | undefined;

function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJs) {
    sqlJs = initSqlJs();
  }
  return sqlJs;
}

export async function readLegacy(filePath: string): Promise<Project> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(filePath);
  } catch (error) {
    throw new PersistenceError(filePath, 'legacy', 'Failed to open project store', error);
  }

  const SQL = await loadSqlJs();
  let db: Database;
  try {
    db = new SQL.Database(bytes);
  } catch (error) {
    throw new PersistenceError(filePath, 'legacy', 'Failed to open project store', error);
  }

  try {
    const values = new Map<string, unknown>();
    const [table] = db.exec(`SELECT key, value FROM ${TABLE}`);
    for (const [key, value] of table?.values ?? []) {
      if (typeof key !== 'string' || typeof value !== 'string') {
        throw new PersistenceError(filePath, 'legacy', `Unexpected row for key '${String(key)}'`);
      }
      try {
        values.set(key, JSON.parse(value));
      } catch (error) {
        throw new PersistenceError(filePath, 'legacy', `Corrupt value for key '${key}'`, error);
      }
    }
    return decodeLegacy(values, filePath);
  } catch (error) {
    if (error instanceof PersistenceError) throw error;
    throw new PersistenceError(filePath, 'legacy', 'Failed to read project store', error);
  } finally {
    db.close();
  }
}

/**
 * Build the store in memory, write it beside the destination and rename it into place
 */
export async function writeLegacy(project: Project, filePath: string): Promise<void> {
  const directory = path.dirname(filePath);
  const tempPath = path.join(directory, `.${path.basename(filePath)}.${crypto.randomBytes(6).toString('hex')}.tmp`);

  try {
    const SQL = await loadSqlJs();
    const db = new SQL.Database();
    let bytes: Uint8Array;
    try {
      db.run(`CREATE TABLE ${TABLE} (key TEXT PRIMARY KEY, value TEXT NOT NULL)`);
      const insert = db.prepare(`INSERT INTO ${TABLE} (key, value) VALUES (?, ?)`);
      try {
        for (const [key, value] of Object.entries(encodeLegacy(project))) {
          insert.run([key, JSON.stringify(value)]);
        }
      } finally {
        insert.free();
      }
      bytes = db.export();
    } finally {
      db.close();
    }

    await fs.mkdir(directory, { recursive: true });
    await fs.writeFile(tempPath, bytes);
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw new PersistenceError(filePath, 'legacy', 'Failed to write project store', error);
  }
}

/**
 * True when the file starts with the SQLite header
 */
export async function looksLikeLegacyStore(filePath: string): Promise<boolean> {
  const handle = await fs.open(filePath, 'r');
  try {
    const header = Buffer.alloc(16);
    const { bytesRead } = await handle.read(header, 0, 16, 0);
    return bytesRead === 16 && header.toString('latin1') === 'SQLite format 3\u0000';
  } finally {
    await handle.close();
  }
}
