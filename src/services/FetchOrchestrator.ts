import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { RawRecord, Target } from '../types/Location';
import { LocationPage, PageRequest, Plugin, RateLimitSettings } from '../types/Plugin';
import { describeError, FetchError } from '../types/errors';
import { RateLimiter } from './RateLimiter';
import { runKey } from '../utils/hashUtils';
import { createLogger } from '../utils/logger';

/**
 * FetchOrchestrator - Generic paginated retrieval loop
 *
 * Drives any plugin page by page under a rate limiter. Each run reports
 * progress after every page, honours a cooperative stop flag checked once
 * per iteration, and keeps whatever was fetched when a page fails.
 *
 * Events emitted by a FetchRun:
 * - 'progress' (FetchProgress)
 * - 'page' (records: RawRecord[], pageNumber: number)
 * - 'done' (FetchOutcome)
 */

const logger = createLogger({ component: 'FetchOrchestrator' });

export const DEFAULT_PAGE_SIZE = 50;

export interface FetchOptions {
  /** Soft cap: the loop stops after the page that reaches it */
  maxItems?: number;
  pageSize?: number;
  /** Overrides the limiter the orchestrator would pick */
  rateLimiter?: RateLimiter;
  /** Extra parameters passed through to returnLocations */
  params?: Record<string, unknown>;
}

export interface FetchProgress {
  percent: number;
  message: string;
  pagesFetched: number;
  itemsFetched: number;
}

interface OutcomeBase {
  records: RawRecord[];
  pagesFetched: number;
}

export type FetchOutcome =
  | (OutcomeBase & { status: 'completed' })
  | (OutcomeBase & { status: 'cancelled' })
  | (OutcomeBase & { status: 'failed'; error: FetchError });

export type FetchRunStatus = 'running' | FetchOutcome['status'];

export interface FetchRunSummary {
  id: string;
  pluginName: string;
  targetId: string;
  status: FetchRunStatus;
  progress: FetchProgress;
  startedAt: string;
}

export class FetchRun extends EventEmitter {
  readonly id = uuidv4();
  readonly pluginName: string;
  readonly target: Target;
  readonly startedAt = new Date();
  /** Settles once the loop ends; never rejects */
  readonly result: Promise<FetchOutcome>;

  private stopRequested = false;
  private currentStatus: FetchRunStatus = 'running';
  private lastProgress: FetchProgress = { percent: 0, message: 'Queued', pagesFetched: 0, itemsFetched: 0 };
  private readonly records: RawRecord[] = [];

  constructor(plugin: Plugin, target: Target, limiter: RateLimiter, options: FetchOptions = {}) {
    super();
    this.pluginName = plugin.name;
    this.target = target;
    // Deferred so listeners attached right after construction see every event
    this.result = Promise.resolve().then(() => this.execute(plugin, limiter, options));
  }

  /**
   * Ask the loop to stop; honoured before the next page request
   */
  stop(): void {
    this.stopRequested = true;
  }

  get stopped(): boolean {
    return this.stopRequested;
  }

  get status(): FetchRunStatus {
    return this.currentStatus;
  }

  get progress(): FetchProgress {
    return { ...this.lastProgress };
  }

  /**
   * Records accumulated so far
   */
  partialRecords(): RawRecord[] {
    return [...this.records];
  }

  summary(): FetchRunSummary {
    return {
      id: this.id,
      pluginName: this.pluginName,
      targetId: this.target.externalId,
      status: this.currentStatus,
      progress: this.progress,
      startedAt: this.startedAt.toISOString(),
    };
  }

  private async execute(plugin: Plugin, limiter: RateLimiter, options: FetchOptions): Promise<FetchOutcome> {
    let outcome: FetchOutcome;
    try {
      outcome = await this.loop(plugin, limiter, options);
    } catch (error) {
      // A throwing listener or limiter ends the run like a failed page
      outcome = this.failed(error);
    }

    this.currentStatus = outcome.status;
    logger.info(
      { runId: this.id, plugin: this.pluginName, target: this.target.externalId, status: outcome.status, records: outcome.records.length },
      'Fetch run finished'
    );
    try {
      this.emit('done', outcome);
    } catch (error) {
      // The outcome is settled; a listener cannot change it
      logger.error({ runId: this.id, error: describeError(error) }, 'done listener threw');
    }
    return outcome;
  }

  private async loop(plugin: Plugin, limiter: RateLimiter, options: FetchOptions): Promise<FetchOutcome> {
    const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    const { maxItems } = options;
    let cursor: string | number | undefined;
    let pagesFetched = 0;

    this.reportProgress(0, 'Starting');

    for (;;) {
      if (this.stopRequested) {
        return this.cancelled(pagesFetched);
      }

      await limiter.waitIfNeeded();
      if (this.stopRequested) {
        return this.cancelled(pagesFetched);
      }

      let page: LocationPage;
      try {
        page = await requestPage(plugin, this.target, { cursor, pageSize, offset: this.records.length }, options);
      } catch (error) {
        return this.failed(error, pagesFetched);
      }
      pagesFetched += 1;

      if (page.records.length === 0) {
        break;
      }

      this.records.push(...page.records);
      this.emit('page', page.records, pagesFetched);

      const next = page.nextCursor;
      const exhausted = next === undefined || next === null || next === cursor;
      const capped = maxItems !== undefined && this.records.length >= maxItems;

      this.reportProgress(
        estimatePercent(this.records.length, pagesFetched, page.total, maxItems),
        `Fetched page ${pagesFetched} (${this.records.length} records)`,
        pagesFetched
      );

      if (exhausted || capped) {
        break;
      }
      cursor = next;
    }

    this.reportProgress(100, `Completed with ${this.records.length} records`, pagesFetched);
    return { status: 'completed', records: [...this.records], pagesFetched };
  }

  private cancelled(pagesFetched: number): FetchOutcome {
    this.reportProgress(this.lastProgress.percent, 'Cancelled', pagesFetched);
    return { status: 'cancelled', records: [...this.records], pagesFetched };
  }

  private failed(cause: unknown, pagesFetched = this.lastProgress.pagesFetched): FetchOutcome {
    const error = cause instanceof FetchError
      ? cause
      : new FetchError(this.pluginName, this.target.externalId, [...this.records], pagesFetched, cause);
    logger.warn({ runId: this.id, plugin: this.pluginName, error: describeError(cause) }, 'Page request failed');
    return { status: 'failed', records: [...this.records], pagesFetched, error };
  }

  private reportProgress(percent: number, message: string, pagesFetched = 0): void {
    // Monotonic
    const next: FetchProgress = {
      percent: Math.max(this.lastProgress.percent, Math.min(100, percent)),
      message,
      pagesFetched,
      itemsFetched: this.records.length,
    };
    this.lastProgress = next;
    this.emit('progress', { ...next });
  }
}

/**
 * One page from a plugin; plugins without fetchPage yield everything at once
 */
async function requestPage(
  plugin: Plugin,
  target: Target,
  request: PageRequest,
  options: FetchOptions
): Promise<LocationPage> {
  if (plugin.fetchPage) {
    return plugin.fetchPage(target, request);
  }
  const records = await plugin.returnLocations(target, {
    ...options.params,
    maxItems: options.maxItems,
    pageSize: request.pageSize,
  });
  return { records, nextCursor: null };
}

/**
 * Below 100 until the loop finishes
 */
function estimatePercent(items: number, pages: number, total?: number, maxItems?: number): number {
  const bound = total !== undefined && total > 0 ? total : maxItems;
  const ratio = bound !== undefined && bound > 0 ? items / bound : pages / (pages + 1);
  return Math.min(99, Math.floor(ratio * 100));
}

export interface FetchOrchestratorOptions {
  /** Limits used for runs of plugins that declare none */
  defaultRateLimit?: RateLimitSettings;
}

export class FetchOrchestrator {
  private readonly active = new Map<string, FetchRun>();
  private readonly sharedLimiters = new Map<string, RateLimiter>();
  private readonly defaultRateLimit?: RateLimitSettings;

  constructor(options: FetchOrchestratorOptions = {}) {
    this.defaultRateLimit = options.defaultRateLimit;
  }

  /**
   * Start a run, or join the active run for the same (plugin, target)
   */
  run(plugin: Plugin, target: Target, options: FetchOptions = {}): FetchRun {
    const key = runKey(plugin.name, target.externalId);
    const existing = this.active.get(key);
    if (existing) {
      logger.debug({ plugin: plugin.name, target: target.externalId, runId: existing.id }, 'Joining active run');
      return existing;
    }

    const limiter = options.rateLimiter ?? this.limiterFor(plugin);
    const run = new FetchRun(plugin, target, limiter, options);
    this.active.set(key, run);
    logger.info({ plugin: plugin.name, target: target.externalId, runId: run.id }, 'Fetch run started');

    const release = () => {
      if (this.active.get(key) === run) {
        this.active.delete(key);
      }
    };
    void run.result.then(release, release);
    return run;
  }

  activeRuns(): FetchRun[] {
    return Array.from(this.active.values());
  }

  find(runId: string): FetchRun | undefined {
    return this.activeRuns().find(run => run.id === runId);
  }

  stopAll(): void {
    for (const run of this.active.values()) {
      run.stop();
    }
  }

  /**
   * Plugins with a declared quota share one limiter across all their runs
   */
  private limiterFor(plugin: Plugin): RateLimiter {
    if (plugin.rateLimit) {
      let limiter = this.sharedLimiters.get(plugin.name);
      if (!limiter) {
        limiter = new RateLimiter(plugin.rateLimit.maxCalls, plugin.rateLimit.windowSeconds);
        this.sharedLimiters.set(plugin.name, limiter);
      }
      return limiter;
    }
    return new RateLimiter(this.defaultRateLimit?.maxCalls, this.defaultRateLimit?.windowSeconds);
  }
}
