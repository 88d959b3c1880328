import { promises as fs } from 'fs';
import path from 'path';
import { BasePlugin } from './BasePlugin';
import { RawRecord, Target } from '../types/Location';
import { ConfigurationStatus, LocationPage, PageRequest, PluginContext } from '../types/Plugin';
import { parseTimestamp } from '../utils/dateUtils';
import { isNotFound } from '../utils/fileUtils';

/**
 * Location history plugin
 * Reads JSON location-history exports from a configured directory. Each file
 * is a target; its samples are served in offset-based pages.
 *
 * Accepted layouts: { "locations": [...] }, { "history": [...] } or a bare
 * array. Samples use latitudeE7/longitudeE7 or plain lat/lng fields.
 */

interface LoadedFile {
  mtimeMs: number;
  samples: RawRecord[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickNumber(...values: unknown[]): number | undefined {
  for (const value of values) {
    const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    if (typeof parsed === 'number' && Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return undefined;
}

export class LocationHistoryPlugin extends BasePlugin {
  private readonly files = new Map<string, LoadedFile>();

  constructor(context: PluginContext) {
    super({
      name: 'LocationHistory',
      category: 'data_extraction',
      version: '1.0',
      description: 'Location history exports from a local directory',
      configSchema: [
        { name: 'data_directory', type: 'string', label: 'Data directory', required: true },
        { name: 'date_from', type: 'string', label: 'From date' },
        { name: 'date_to', type: 'string', label: 'To date' },
      ],
      defaultPageSize: 500,
    }, context);
  }

  async isConfigured(): Promise<ConfigurationStatus> {
    const status = await super.isConfigured();
    if (!status.configured) {
      return status;
    }

    const directory = await this.dataDirectory();
    try {
      const stat = await fs.stat(directory);
      if (!stat.isDirectory()) {
        return { configured: false, reason: `${directory} is not a directory` };
      }
    } catch (error) {
      if (!isNotFound(error)) throw error;
      return { configured: false, reason: `Data directory ${directory} does not exist` };
    }
    return status;
  }

  /**
   * Export files whose name contains the query; every file for an empty query
   */
  async searchForTargets(query: string): Promise<Target[]> {
    const directory = await this.dataDirectory();
    const needle = query.trim().toLowerCase();

    const names = await fs.readdir(directory);
    return names
      .filter(name => name.toLowerCase().endsWith('.json'))
      .filter(name => needle === '' || name.toLowerCase().includes(needle))
      .sort()
      .map(name => this.makeTarget(name, path.basename(name, path.extname(name))));
  }

  async fetchPage(target: Target, request: PageRequest): Promise<LocationPage> {
    const samples = await this.loadSamples(target.externalId);
    const start = request.offset;
    const end = start + request.pageSize;

    return {
      records: samples.slice(start, end),
      nextCursor: end < samples.length ? end : null,
      total: samples.length,
    };
  }

  deactivate(): void {
    this.files.clear();
  }

  private async dataDirectory(): Promise<string> {
    const directory = await this.getStringOption('data_directory');
    if (!directory) {
      throw new Error('Data directory is not configured');
    }
    return path.resolve(directory);
  }

  private async loadSamples(fileName: string): Promise<RawRecord[]> {
    if (path.basename(fileName) !== fileName) {
      throw new Error(`Invalid export file name: ${fileName}`);
    }
    const filePath = path.join(await this.dataDirectory(), fileName);

    const stat = await fs.stat(filePath);
    const cached = this.files.get(filePath);
    if (cached && cached.mtimeMs === stat.mtimeMs) {
      return cached.samples;
    }

    const payload: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    const candidates = Array.isArray(payload)
      ? payload
      : isRecord(payload) && Array.isArray(payload.locations)
        ? payload.locations
        : isRecord(payload) && Array.isArray(payload.history)
          ? payload.history
          : [];

    const from = parseTimestamp(await this.getStringOption('date_from'));
    const to = parseTimestamp(await this.getStringOption('date_to'));

    const samples: RawRecord[] = [];
    candidates.forEach((item: unknown, index: number) => {
      const sample = this.transformSample(item, `${fileName}:${index}`);
      if (!sample) return;

      const time = parseTimestamp(sample.timestamp);
      if (from && time && time < from) return;
      if (to && time && time > to) return;
      samples.push(sample);
    });

    this.files.set(filePath, { mtimeMs: stat.mtimeMs, samples });
    this.logger.info({ file: fileName, samples: samples.length }, 'Loaded location history export');
    return samples;
  }

  private transformSample(item: unknown, id: string): RawRecord | null {
    if (!isRecord(item)) return null;

    const latE7 = pickNumber(item.latitudeE7);
    const lonE7 = pickNumber(item.longitudeE7);
    const lat = latE7 !== undefined ? latE7 / 1e7 : pickNumber(item.lat, item.latitude);
    const lon = lonE7 !== undefined ? lonE7 / 1e7 : pickNumber(item.lon, item.lng, item.longitude);
    if (lat === undefined || lon === undefined) return null;

    const timestamp = item.timestamp ?? pickNumber(item.timestampMs) ?? item.time ?? item.date ?? item.created_at;

    const record: RawRecord = {
      id: typeof item.id === 'string' ? item.id : id,
      lat,
      lon,
      timestamp,
      name: typeof item.name === 'string' ? item.name : 'Location',
      source: this.name,
    };
    if (typeof item.context === 'string') record.context = item.context;
    if (item.accuracy !== undefined) record.accuracy = item.accuracy;
    // Export's own "source" (GPS, WIFI...) would shadow the plugin name
    if (typeof item.source === 'string') record.positionSource = item.source;
    return record;
  }
}
