import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { StandardizedLocation } from '../types/Location';
import { describeError } from '../types/errors';
import { generateCacheKey } from '../utils/hashUtils';
import { isNotFound, readJsonFile, writeFileAtomic } from '../utils/fileUtils';
import { createLogger } from '../utils/logger';
import { locationSchema } from '../utils/schemas';

/**
 * CacheManager - File-backed cache of standardized locations
 *
 * One JSON file per (plugin, target) under the cache root. Missing, corrupt
 * and expired entries are all misses; nothing here throws on read.
 */

const DEFAULT_TTL_SECONDS = 24 * 60 * 60;

const entrySchema = z.object({
  key: z.string(),
  pluginName: z.string(),
  targetKey: z.string(),
  createdAt: z.string().datetime(),
  locations: z.array(locationSchema),
});

type CacheEntry = z.infer<typeof entrySchema>;

export type CacheMissReason = 'missing' | 'corrupt' | 'expired';

export type CacheLookup =
  | { hit: true; locations: StandardizedLocation[]; createdAt: Date }
  | { hit: false; reason: CacheMissReason };

export interface CacheStats {
  entries: number;
  expired: number;
  totalLocations: number;
  sizeBytes: number;
}

export interface CacheManagerOptions {
  ttlSeconds?: number;
}

export class CacheManager {
  private readonly cacheDir: string;
  private readonly ttlMs: number;
  private readonly logger = createLogger({ component: 'CacheManager' });

  constructor(cacheDir: string, options: CacheManagerOptions = {}) {
    this.cacheDir = cacheDir;
    this.ttlMs = (options.ttlSeconds ?? DEFAULT_TTL_SECONDS) * 1000;
  }

  /**
   * Cached locations for a (plugin, target), or null on a miss
   */
  async get(pluginName: string, targetKey: string): Promise<StandardizedLocation[] | null> {
    const result = await this.lookup(pluginName, targetKey);
    return result.hit ? result.locations : null;
  }

  /**
   * Like get, but reports why a lookup missed
   */
  async lookup(pluginName: string, targetKey: string): Promise<CacheLookup> {
    const filePath = this.pathFor(pluginName, targetKey);
    const entry = await this.readEntry(filePath);
    if (entry === 'missing' || entry === 'corrupt') {
      return { hit: false, reason: entry };
    }

    const createdAt = new Date(entry.createdAt);
    if (this.isExpired(createdAt)) {
      this.logger.debug({ pluginName, targetKey }, 'Cache entry expired');
      return { hit: false, reason: 'expired' };
    }

    this.logger.debug({ pluginName, targetKey, count: entry.locations.length }, 'Cache hit');
    return { hit: true, locations: entry.locations, createdAt };
  }

  async put(pluginName: string, targetKey: string, locations: StandardizedLocation[]): Promise<void> {
    const key = generateCacheKey(pluginName, targetKey);
    const entry: CacheEntry = {
      key,
      pluginName,
      targetKey,
      createdAt: new Date().toISOString(),
      locations,
    };
    await writeFileAtomic(this.pathFor(pluginName, targetKey), JSON.stringify(entry, null, 2));
    this.logger.debug({ pluginName, targetKey, count: locations.length }, 'Cached locations');
  }

  /**
   * Remove one entry; true when a file was deleted
   */
  async invalidate(pluginName: string, targetKey: string): Promise<boolean> {
    try {
      await fs.unlink(this.pathFor(pluginName, targetKey));
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Remove every entry; with expiredOnly, only those past their TTL.
   * Returns the number of removed files.
   */
  async clear(expiredOnly = false): Promise<number> {
    let removed = 0;
    for (const filePath of await this.entryFiles()) {
      if (expiredOnly) {
        const entry = await this.readEntry(filePath);
        if (typeof entry !== 'string' && !this.isExpired(new Date(entry.createdAt))) {
          continue;
        }
      }
      await fs.rm(filePath, { force: true });
      removed += 1;
    }
    this.logger.info({ removed, expiredOnly }, 'Cache cleared');
    return removed;
  }

  async stats(): Promise<CacheStats> {
    const stats: CacheStats = { entries: 0, expired: 0, totalLocations: 0, sizeBytes: 0 };
    for (const filePath of await this.entryFiles()) {
      const entry = await this.readEntry(filePath);
      if (typeof entry === 'string') continue;

      stats.entries += 1;
      stats.totalLocations += entry.locations.length;
      if (this.isExpired(new Date(entry.createdAt))) {
        stats.expired += 1;
      }
      try {
        stats.sizeBytes += (await fs.stat(filePath)).size;
      } catch (error) {
        if (!isNotFound(error)) throw error;
      }
    }
    return stats;
  }

  private pathFor(pluginName: string, targetKey: string): string {
    return path.join(this.cacheDir, `${generateCacheKey(pluginName, targetKey)}.json`);
  }

  private isExpired(createdAt: Date): boolean {
    return Date.now() - createdAt.getTime() > this.ttlMs;
  }

  private async entryFiles(): Promise<string[]> {
    try {
      const names = await fs.readdir(this.cacheDir);
      return names
        .filter(name => /^[0-9a-f]{64}\.json$/.test(name))
        .map(name => path.join(this.cacheDir, name));
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }
  }

  private async readEntry(filePath: string): Promise<CacheEntry | 'missing' | 'corrupt'> {
    let raw: unknown;
    try {
      raw = await readJsonFile(filePath);
    } catch (error) {
      this.logger.warn({ filePath, error: describeError(error) }, 'Unreadable cache entry');
      return 'corrupt';
    }
    if (raw === undefined) {
      return 'missing';
    }

    const parsed = entrySchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn({ filePath }, 'Malformed cache entry');
      return 'corrupt';
    }
    return parsed.data;
  }
}
