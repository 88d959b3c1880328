import { EventEmitter } from 'node:events';
import { v4 as uuidv4 } from 'uuid';
import { RawRecord, StandardizedLocation, Target } from '../types/Location';
import { Plugin } from '../types/Plugin';
import { Project } from '../types/Project';
import { ConfigurationError, describeError, FetchError, UnknownPluginError } from '../types/errors';
import { CacheManager } from './CacheManager';
import { FetchOptions, FetchOrchestrator, FetchOutcome, FetchProgress, FetchRun } from './FetchOrchestrator';
import { GeoParser } from './GeoParser';
import { standardizeAll } from './LocationStandardizer';
import { PluginRegistry } from './PluginRegistry';
import { ProjectStore } from './ProjectStore';
import { createLogger } from '../utils/logger';

/**
 * Ties registry, orchestrator, standardizer, cache and projects together
 *
 * Events:
 * - 'collection-started' (CollectionHandle)
 * - 'collection-completed' (CollectionResult)
 */

export type CollectionStatus = 'cached' | FetchOutcome['status'];

export interface CollectOptions extends Omit<FetchOptions, 'rateLimiter'> {
  /** Serve from and write to the cache (default: true) */
  useCache?: boolean;
  /** Resolve coordinate-less records through the GeoParser (default: true when one is set) */
  geocode?: boolean;
  /** Append the collected locations to this project, saving it when it has a path */
  project?: Project;
}

export interface CollectionResult {
  collectionId: string;
  pluginName: string;
  targetId: string;
  status: CollectionStatus;
  locations: StandardizedLocation[];
  /** Records without usable coordinates */
  dropped: number;
  recordsFetched: number;
  pagesFetched: number;
  error?: FetchError;
  addedToProject?: number;
}

export interface CollectionHandle {
  id: string;
  pluginName: string;
  target: Target;
  startedAt: Date;
  /** Absent when served from the cache */
  run?: FetchRun;
  result: Promise<CollectionResult>;
}

export interface CollectionState {
  id: string;
  pluginName: string;
  targetId: string;
  startedAt: string;
  state: 'running' | 'finished' | 'errored';
  progress?: FetchProgress;
  result?: CollectionResult;
  error?: string;
}

export interface CollectRequest {
  pluginName: string;
  target: Target;
  options?: CollectOptions;
}

export interface CollectManyResult {
  results: CollectionResult[];
  failures: Array<{ pluginName: string; targetId: string; error: string }>;
}

export interface LocationAggregatorDeps {
  registry: PluginRegistry;
  orchestrator: FetchOrchestrator;
  cache: CacheManager;
  projects?: ProjectStore;
  geoParser?: GeoParser;
}

/** What a fetch run yields once geocoded, standardized and cached */
type ProcessedRun = Omit<CollectionResult, 'collectionId' | 'addedToProject'>;

interface TrackedCollection {
  handle: CollectionHandle;
  state: CollectionState['state'];
  result?: CollectionResult;
  error?: string;
}

export class LocationAggregator extends EventEmitter {
  private static readonly MAX_TRACKED_COLLECTIONS = 100;
  private readonly registry: PluginRegistry;
  private readonly orchestrator: FetchOrchestrator;
  private readonly cache: CacheManager;
  private readonly projects: ProjectStore;
  private readonly geoParser?: GeoParser;
  private readonly collections = new Map<string, TrackedCollection>();
  // One processing per fetch run, shared by every collection that joined it
  private readonly processed = new WeakMap<FetchRun, Promise<ProcessedRun>>();
  private readonly logger = createLogger({ component: 'LocationAggregator' });

  constructor(deps: LocationAggregatorDeps) {
    super();
    this.registry = deps.registry;
    this.orchestrator = deps.orchestrator;
    this.cache = deps.cache;
    this.projects = deps.projects ?? new ProjectStore();
    this.geoParser = deps.geoParser;
  }

  /**
   * Registered, configured plugin or a typed error
   */
  async requirePlugin(pluginName: string): Promise<Plugin> {
    const plugin = this.registry.get(pluginName);
    if (!plugin) {
      throw new UnknownPluginError(pluginName);
    }
    const status = await plugin.isConfigured();
    if (!status.configured) {
      throw new ConfigurationError(plugin.name, status.reason);
    }
    return plugin;
  }

  async searchTargets(pluginName: string, query: string): Promise<Target[]> {
    const plugin = await this.requirePlugin(pluginName);
    return plugin.searchForTargets(query);
  }

  /**
   * Start a collection and return immediately with its handle
   */
  async start(pluginName: string, target: Target, options: CollectOptions = {}): Promise<CollectionHandle> {
    const plugin = await this.requirePlugin(pluginName);
    const useCache = options.useCache ?? true;
    const id = uuidv4();
    const startedAt = new Date();

    if (useCache) {
      const cached = await this.cache.get(plugin.name, target.externalId);
      if (cached) {
        this.logger.info({ plugin: plugin.name, target: target.externalId, count: cached.length }, 'Served from cache');
        const result = this.appendToProject({
          collectionId: id,
          pluginName: plugin.name,
          targetId: target.externalId,
          status: 'cached',
          locations: cached,
          dropped: 0,
          recordsFetched: 0,
          pagesFetched: 0,
        }, options);
        return this.track({ id, pluginName: plugin.name, target, startedAt, result });
      }
    }

    const run = this.orchestrator.run(plugin, target, {
      maxItems: options.maxItems,
      pageSize: options.pageSize,
      params: options.params,
    });
    const result = this.processRun(run, plugin, target, options, useCache)
      .then(processed => this.appendToProject({ ...processed, collectionId: id }, options));
    return this.track({ id, pluginName: plugin.name, target, startedAt, run, result });
  }

  /**
   * Collect and wait for the result. Partial results of failed or
   * cancelled runs are returned, not discarded.
   */
  async collect(pluginName: string, target: Target, options: CollectOptions = {}): Promise<CollectionResult> {
    const handle = await this.start(pluginName, target, options);
    return handle.result;
  }

  /**
   * Run several collections concurrently; one failing request does not
   * affect the others
   */
  async collectMany(requests: CollectRequest[]): Promise<CollectManyResult> {
    const settled = await Promise.allSettled(
      requests.map(request => this.collect(request.pluginName, request.target, request.options))
    );

    const output: CollectManyResult = { results: [], failures: [] };
    settled.forEach((outcome, index) => {
      const request = requests[index];
      if (outcome.status === 'fulfilled') {
        output.results.push(outcome.value);
      } else {
        output.failures.push({
          pluginName: request.pluginName,
          targetId: request.target.externalId,
          error: describeError(outcome.reason),
        });
      }
    });

    this.logger.info(
      { requested: requests.length, succeeded: output.results.length, failed: output.failures.length },
      'Batch collection finished'
    );
    return output;
  }

  getCollection(id: string): CollectionState | undefined {
    const tracked = this.collections.get(id);
    if (!tracked) return undefined;

    const { handle } = tracked;
    return {
      id: handle.id,
      pluginName: handle.pluginName,
      targetId: handle.target.externalId,
      startedAt: handle.startedAt.toISOString(),
      state: tracked.state,
      progress: handle.run?.progress,
      result: tracked.result,
      error: tracked.error,
    };
  }

  getHandle(id: string): CollectionHandle | undefined {
    return this.collections.get(id)?.handle;
  }

  /**
   * Ask a running collection to stop; false when unknown or not running
   */
  stopCollection(id: string): boolean {
    const tracked = this.collections.get(id);
    if (!tracked || tracked.state !== 'running' || !tracked.handle.run) {
      return false;
    }
    tracked.handle.run.stop();
    return true;
  }

  stopAll(): void {
    this.orchestrator.stopAll();
  }

  /**
   * The first collection on a run decides its geocode and cache settings
   */
  private processRun(
    run: FetchRun,
    plugin: Plugin,
    target: Target,
    options: CollectOptions,
    useCache: boolean
  ): Promise<ProcessedRun> {
    const existing = this.processed.get(run);
    if (existing) {
      return existing;
    }
    const processing = run.result.then(outcome => this.process(run, plugin, target, outcome, options, useCache));
    this.processed.set(run, processing);
    return processing;
  }

  private async process(
    run: FetchRun,
    plugin: Plugin,
    target: Target,
    outcome: FetchOutcome,
    options: CollectOptions,
    useCache: boolean
  ): Promise<ProcessedRun> {
    let records: RawRecord[] = outcome.records;

    // A stopped run keeps what it has; nothing more is looked up for it
    if (this.geoParser && (options.geocode ?? true) && outcome.status !== 'cancelled') {
      const enriched = await this.geoParser.enrich(records, () => run.stopped);
      records = enriched.records;
      if (enriched.resolved > 0) {
        this.logger.info({ plugin: plugin.name, resolved: enriched.resolved }, 'Geocoded records without coordinates');
      }
    }

    const { locations, dropped } = standardizeAll(records, { defaultSource: plugin.name });
    if (dropped > 0) {
      this.logger.debug({ plugin: plugin.name, dropped }, 'Dropped records without coordinates');
    }

    // Stopped while geocoding: the locations are partial
    const status = outcome.status === 'completed' && run.stopped ? 'cancelled' : outcome.status;

    if (status === 'completed' && useCache) {
      try {
        await this.cache.put(plugin.name, target.externalId, locations);
      } catch (error) {
        this.logger.warn({ plugin: plugin.name, error: describeError(error) }, 'Failed to write cache entry');
      }
    }

    const processed: ProcessedRun = {
      pluginName: plugin.name,
      targetId: target.externalId,
      status,
      locations,
      dropped,
      recordsFetched: outcome.records.length,
      pagesFetched: outcome.pagesFetched,
    };
    if (outcome.status === 'failed') {
      processed.error = outcome.error;
    }
    return processed;
  }

  private async appendToProject(result: CollectionResult, options: CollectOptions): Promise<CollectionResult> {
    const { project } = options;
    if (!project) {
      return result;
    }

    result.addedToProject = this.projects.addLocations(project, result.locations);
    this.projects.addActivePlugin(project, result.pluginName);
    if (project.path) {
      await this.projects.save(project);
    }
    return result;
  }

  private track(handle: CollectionHandle): CollectionHandle {
    const tracked: TrackedCollection = { handle, state: 'running' };
    this.collections.set(handle.id, tracked);
    this.prune();
    this.emit('collection-started', handle);

    void handle.result.then(
      (result) => {
        tracked.state = 'finished';
        tracked.result = result;
        this.logger.info(
          { collectionId: handle.id, plugin: result.pluginName, status: result.status, locations: result.locations.length },
          'Collection completed'
        );
        this.emit('collection-completed', result);
      },
      (error: unknown) => {
        tracked.state = 'errored';
        tracked.error = describeError(error);
        this.logger.error({ collectionId: handle.id, error: tracked.error }, 'Collection failed');
      }
    );
    return handle;
  }

  /**
   * Forget the oldest finished collections beyond the tracking limit
   */
  private prune(): void {
    for (const [id, tracked] of this.collections) {
      if (this.collections.size <= LocationAggregator.MAX_TRACKED_COLLECTIONS) break;
      if (tracked.state !== 'running') {
        this.collections.delete(id);
      }
    }
  }
}
