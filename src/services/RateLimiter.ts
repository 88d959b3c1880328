import { createLogger } from '../utils/logger';
import { sleep } from '../utils/fileUtils';

const logger = createLogger({ component: 'RateLimiter' });

/**
 * Sliding-window call throttle
 *
 * Keeps the timestamps of the calls issued within the trailing window. A caller
 * waits until issuing one more call keeps the window at or below maxCalls.
 *
 * Callers are served one at a time, in arrival order: the prune-check-record
 * sequence runs inside a promise chain, so several fetch loops can share one
 * limiter without bursting above maxCalls.
 */

export interface RateLimiterStats {
  maxCalls: number;
  windowSeconds: number;
  callsInWindow: number;
  totalCalls: number;
  totalWaitMs: number;
}

export class RateLimiter {
  static readonly DEFAULT_MAX_CALLS = 10;
  static readonly DEFAULT_WINDOW_SECONDS = 60;

  private readonly maxCalls: number;
  private readonly windowMs: number;
  private calls: number[] = [];
  private queue: Promise<void> = Promise.resolve();
  private totalCalls = 0;
  private totalWaitMs = 0;

  constructor(
    maxCalls: number = RateLimiter.DEFAULT_MAX_CALLS,
    windowSeconds: number = RateLimiter.DEFAULT_WINDOW_SECONDS
  ) {
    if (!Number.isInteger(maxCalls) || maxCalls < 1) {
      throw new RangeError(`maxCalls must be a positive integer, got ${maxCalls}`);
    }
    if (!(windowSeconds > 0)) {
      throw new RangeError(`windowSeconds must be positive, got ${windowSeconds}`);
    }
    this.maxCalls = maxCalls;
    this.windowMs = windowSeconds * 1000;
  }

  /**
   * Resolve once another call may be issued, and record that call
   */
  waitIfNeeded(): Promise<void> {
    const turn = this.queue.then(() => this.acquire());
    this.queue = turn.catch(() => undefined);
    return turn;
  }

  private async acquire(): Promise<void> {
    const startedAt = Date.now();

    for (;;) {
      const now = Date.now();
      this.prune(now);

      if (this.calls.length < this.maxCalls) {
        this.calls.push(now);
        this.totalCalls += 1;
        this.totalWaitMs += now - startedAt;
        return;
      }

      // Oldest call leaves the window at calls[0] + windowMs
      const waitMs = Math.max(1, this.calls[0] + this.windowMs - now);
      logger.debug({ waitMs, callsInWindow: this.calls.length }, 'Rate limit reached, waiting');
      await sleep(waitMs);
    }
  }

  private prune(now: number): void {
    const cutoff = now - this.windowMs;
    let expired = 0;
    while (expired < this.calls.length && this.calls[expired] <= cutoff) {
      expired += 1;
    }
    if (expired > 0) {
      this.calls = this.calls.slice(expired);
    }
  }

  getStats(): RateLimiterStats {
    this.prune(Date.now());
    return {
      maxCalls: this.maxCalls,
      windowSeconds: this.windowMs / 1000,
      callsInWindow: this.calls.length,
      totalCalls: this.totalCalls,
      totalWaitMs: this.totalWaitMs,
    };
  }

  /**
   * Forget all recorded calls
   */
  reset(): void {
    this.calls = [];
    this.totalCalls = 0;
    this.totalWaitMs = 0;
  }
}
