import { describe, it, expect } from 'vitest';
import path from 'path';
import { loadConfig } from '../config';

describe('loadConfig', () => {
  const baseDir = path.resolve('/srv/geotrail');

  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({}, baseDir);

    expect(config).toEqual({
      port: 3000,
      pluginDirs: [path.join(baseDir, 'plugins')],
      pluginConfigDir: path.join(baseDir, 'data', 'plugin-config'),
      cacheDir: path.join(baseDir, 'data', 'cache'),
      cacheTtlSeconds: 86400,
      projectsDir: path.join(baseDir, 'data', 'projects'),
      geocodeMissing: false,
      geocoderProvider: 'openstreetmap',
      geocoderApiKey: '',
      rateLimit: { maxCalls: 10, windowSeconds: 60 },
    });
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      PLUGIN_DIRS: 'extra, /opt/plugins ,',
      CACHE_TTL_SECONDS: '60',
      GEOCODE_MISSING: 'yes',
      GEOCODER_PROVIDER: 'mapbox',
      GEOCODER_API_KEY: 'test-key',
      RATE_LIMIT_MAX_CALLS: '5',
      RATE_LIMIT_WINDOW_SECONDS: '2',
    }, baseDir);

    expect(config.port).toBe(8080);
    expect(config.pluginDirs).toEqual([path.join(baseDir, 'extra'), path.resolve('/opt/plugins')]);
    expect(config.cacheTtlSeconds).toBe(60);
    expect(config.geocodeMissing).toBe(true);
    expect(config.geocoderProvider).toBe('mapbox');
    expect(config.geocoderApiKey).toBe('test-key');
    expect(config.rateLimit).toEqual({ maxCalls: 5, windowSeconds: 2 });
  });

  it('should ignore invalid numbers and unknown providers', () => {
    const config = loadConfig({
      PORT: 'abc',
      RATE_LIMIT_MAX_CALLS: '-3',
      GEOCODER_PROVIDER: 'bing',
    }, baseDir);

    expect(config.port).toBe(3000);
    expect(config.rateLimit.maxCalls).toBe(10);
    expect(config.geocoderProvider).toBe('openstreetmap');
  });

  it('should fall back when a count is not a whole number', () => {
    const config = loadConfig({
      PORT: '80.5',
      CACHE_TTL_SECONDS: '1e400',
      RATE_LIMIT_MAX_CALLS: '2.5',
      RATE_LIMIT_WINDOW_SECONDS: '0.5',
    }, baseDir);

    expect(config.port).toBe(3000);
    expect(config.cacheTtlSeconds).toBe(86400);
    expect(config.rateLimit).toEqual({ maxCalls: 10, windowSeconds: 0.5 });
  });
});
