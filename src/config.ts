import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

/**
 * Application configuration, read once from the environment
 */

export interface AppConfig {
  port: number;
  pluginDirs: string[];
  pluginConfigDir: string;
  cacheDir: string;
  cacheTtlSeconds: number;
  projectsDir: string;
  geocodeMissing: boolean;
  geocoderProvider: 'openstreetmap' | 'mapbox' | 'google';
  geocoderApiKey: string;
  rateLimit: {
    maxCalls: number;
    windowSeconds: number;
  };
}

type Env = Record<string, string | undefined>;

const positiveInt = z.coerce.number().int().positive();
const positiveNumber = z.coerce.number().finite().positive();

function parseWith(schema: z.ZodNumber, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = schema.safeParse(value.trim());
  return parsed.success ? parsed.data : fallback;
}

function parseInteger(value: string | undefined, fallback: number): number {
  return parseWith(positiveInt, value, fallback);
}

function parseNumber(value: string | undefined, fallback: number): number {
  return parseWith(positiveNumber, value, fallback);
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return ['true', '1', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return value.split(',').map(entry => entry.trim()).filter(entry => entry.length > 0);
}

function parseProvider(value: string | undefined): AppConfig['geocoderProvider'] {
  if (value === 'mapbox' || value === 'google') {
    return value;
  }
  return 'openstreetmap';
}

/**
 * Build the configuration from an environment map (process.env by default)
 */
export function loadConfig(env: Env = process.env, baseDir: string = process.cwd()): AppConfig {
  const resolve = (p: string) => path.resolve(baseDir, p);

  return {
    port: parseInteger(env.PORT, 3000),
    pluginDirs: parseList(env.PLUGIN_DIRS, ['./plugins']).map(resolve),
    pluginConfigDir: resolve(env.PLUGIN_CONFIG_DIR || './data/plugin-config'),
    cacheDir: resolve(env.CACHE_DIR || './data/cache'),
    cacheTtlSeconds: parseInteger(env.CACHE_TTL_SECONDS, 86400),
    projectsDir: resolve(env.PROJECTS_DIR || './data/projects'),
    geocodeMissing: parseBoolean(env.GEOCODE_MISSING, false),
    geocoderProvider: parseProvider(env.GEOCODER_PROVIDER),
    geocoderApiKey: env.GEOCODER_API_KEY ?? '',
    rateLimit: {
      maxCalls: parseInteger(env.RATE_LIMIT_MAX_CALLS, 10),
      windowSeconds: parseNumber(env.RATE_LIMIT_WINDOW_SECONDS, 60),
    },
  };
}

/**
 * Load .env into process.env, then read the configuration
 */
export function loadConfigFromEnvironment(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
