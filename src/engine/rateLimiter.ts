/**
 * Per-source rate limiting and exponential backoff.
 *
 * Each logical source key owns a rolling 60-second request window, a retry
 * counter and the current backoff. The limiter computes waits but never
 * sleeps inside the bookkeeping methods; `waitIfNeeded` and `acquire` are the
 * only suspension points.
 */

import type { Config } from '../shared/config.js';
import { RateLimitError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { sleep as defaultSleep } from '../shared/utils.js';

const WINDOW_SECONDS = 60;

export interface RateLimiterOptions {
  requestsPerMinute: number;
  maxRetries: number;
  backoffBase: number;
  /** Clock in milliseconds. */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface RateLimiterStats {
  sourceKey: string;
  requestsMade: number;
  requestsLimit: number;
  retryCount: number;
  currentBackoff: number;
  windowRemainingSeconds: number;
}

interface KeyState {
  requestsMade: number;
  windowStart: number;
  currentBackoff: number;
  retryCount: number;
  lastRequestTime: number;
}

export class RateLimiter {
  readonly requestsPerMinute: number;
  readonly maxRetries: number;
  readonly backoffBase: number;

  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly states = new Map<string, KeyState>();

  constructor(options: RateLimiterOptions) {
    this.requestsPerMinute = options.requestsPerMinute;
    this.maxRetries = options.maxRetries;
    this.backoffBase = options.backoffBase;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  static fromConfig(
    config: Config['rate_limit'],
    overrides: Pick<RateLimiterOptions, 'now' | 'sleep'> = {},
  ): RateLimiter {
    return new RateLimiter({
      requestsPerMinute: config.requests_per_minute,
      maxRetries: config.max_retries,
      backoffBase: config.backoff_base,
      ...overrides,
    });
  }

  private getState(sourceKey: string): KeyState {
    let state = this.states.get(sourceKey);
    if (!state) {
      state = {
        requestsMade: 0,
        windowStart: this.now(),
        currentBackoff: 0,
        retryCount: 0,
        lastRequestTime: 0,
      };
      this.states.set(sourceKey, state);
    }
    return state;
  }

  private elapsedSeconds(state: KeyState): number {
    return (this.now() - state.windowStart) / 1000;
  }

  private resetWindowIfNeeded(state: KeyState): void {
    if (this.elapsedSeconds(state) >= WINDOW_SECONDS) {
      state.requestsMade = 0;
      state.windowStart = this.now();
      state.retryCount = 0;
      state.currentBackoff = 0;
    }
  }

  /**
   * Seconds to wait before the next request for this key; 0 when admitted.
   */
  checkRateLimit(sourceKey: string): number {
    const state = this.getState(sourceKey);
    this.resetWindowIfNeeded(state);

    if (state.requestsMade >= this.requestsPerMinute) {
      return Math.max(0, WINDOW_SECONDS - this.elapsedSeconds(state));
    }
    return 0;
  }

  recordRequest(sourceKey: string): void {
    const state = this.getState(sourceKey);
    state.requestsMade++;
    state.lastRequestTime = this.now();

    logger.debug(
      { sourceKey, requestsMade: state.requestsMade, limit: this.requestsPerMinute },
      'Rate limiter request recorded',
    );
  }

  /**
   * Check and record in one step. Returns 0 when the request was admitted
   * (and counted), otherwise the seconds to wait. Runs without yielding, so
   * concurrent callers on the same key cannot both take the last slot.
   */
  tryAcquire(sourceKey: string): number {
    const wait = this.checkRateLimit(sourceKey);
    if (wait > 0) return wait;
    this.recordRequest(sourceKey);
    return 0;
  }

  /**
   * Suspend until a slot in the window is free, then take it.
   */
  async acquire(sourceKey: string): Promise<void> {
    for (;;) {
      const wait = this.tryAcquire(sourceKey);
      if (wait === 0) return;
      logger.info({ sourceKey, waitSeconds: Number(wait.toFixed(2)) }, 'Rate limit reached, waiting');
      await this.sleep(wait * 1000);
    }
  }

  /** Forgive any failure streak. */
  recordSuccess(sourceKey: string): void {
    const state = this.getState(sourceKey);
    state.retryCount = 0;
    state.currentBackoff = 0;
  }

  /**
   * Count a failed attempt and return the backoff in seconds
   * (`backoffBase ^ retryCount`). The caller does the waiting.
   *
   * @throws RateLimitError once the retry counter exceeds maxRetries
   */
  recordFailure(sourceKey: string): number {
    const state = this.getState(sourceKey);
    state.retryCount++;

    if (state.retryCount > this.maxRetries) {
      throw new RateLimitError(`Max retries (${this.maxRetries}) exceeded for ${sourceKey}`, sourceKey);
    }

    state.currentBackoff = this.backoffBase ** state.retryCount;

    logger.warn(
      {
        sourceKey,
        retry: state.retryCount,
        maxRetries: this.maxRetries,
        backoffSeconds: state.currentBackoff,
      },
      'Rate limiter backing off',
    );

    return state.currentBackoff;
  }

  async waitIfNeeded(sourceKey: string): Promise<void> {
    const wait = this.checkRateLimit(sourceKey);
    if (wait > 0) {
      logger.info({ sourceKey, waitSeconds: Number(wait.toFixed(2)) }, 'Rate limit reached, waiting');
      await this.sleep(wait * 1000);
    }
  }

  getStats(sourceKey: string): RateLimiterStats {
    const state = this.getState(sourceKey);
    return {
      sourceKey,
      requestsMade: state.requestsMade,
      requestsLimit: this.requestsPerMinute,
      retryCount: state.retryCount,
      currentBackoff: state.currentBackoff,
      windowRemainingSeconds: Math.max(0, WINDOW_SECONDS - this.elapsedSeconds(state)),
    };
  }

  /** Sleep through the limiter's sleeper (injectable in tests). */
  pause(seconds: number): Promise<void> {
    return this.sleep(seconds * 1000);
  }
}
