import { AppConfig } from '../config';
import { builtinPlugins } from '../plugins';
import { CacheManager } from './CacheManager';
import { FetchOrchestrator } from './FetchOrchestrator';
import { GeoParser } from './GeoParser';
import { LocationAggregator } from './LocationAggregator';
import { PluginRegistry } from './PluginRegistry';
import { ProjectStore } from './ProjectStore';

/**
 * Explicitly constructed service graph shared by the HTTP server and the CLI
 */
export interface Services {
  config: AppConfig;
  registry: PluginRegistry;
  orchestrator: FetchOrchestrator;
  cache: CacheManager;
  projects: ProjectStore;
  geoParser?: GeoParser;
  aggregator: LocationAggregator;
}

export async function createServices(config: AppConfig): Promise<Services> {
  const registry = new PluginRegistry({
    configDir: config.pluginConfigDir,
    builtins: builtinPlugins,
  });
  await registry.discover(config.pluginDirs);

  const orchestrator = new FetchOrchestrator({ defaultRateLimit: config.rateLimit });
  const cache = new CacheManager(config.cacheDir, { ttlSeconds: config.cacheTtlSeconds });
  const projects = new ProjectStore(config.projectsDir);
  const geoParser = config.geocodeMissing
    ? new GeoParser({ provider: config.geocoderProvider, apiKey: config.geocoderApiKey })
    : undefined;

  const aggregator = new LocationAggregator({ registry, orchestrator, cache, projects, geoParser });

  return { config, registry, orchestrator, cache, projects, geoParser, aggregator };
}

/**
 * Stop running collections and deactivate plugins
 */
export async function shutdownServices(services: Services): Promise<void> {
  services.aggregator.stopAll();
  await services.registry.shutdown();
}
