import { setTimeout as sleep } from 'timers/promises';

import { consoleLogger, describeError, type Logger } from '../logger.js';

export interface RateLimiter {
  acquire(): Promise<void>;
  onRemoteBackoff(durationMs: number): void;
}

export interface RateLimiterOptions {
  /** Permits per window; also the bucket capacity. */
  capacity: number;
  windowMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<unknown>;
  logger?: Logger;
}

export interface RateLimiterSnapshot {
  tokens: number;
  blockedUntil: number | null;
  pending: number;
  grantsInWindow: number;
}

/**
 * Token bucket refilled continuously at `capacity / windowMs`, backed by a log of
 * recent grants so that no rolling window ever holds more than `capacity` grants.
 *
 * Callers queue on a single promise chain and are served in arrival order. A remote
 * cooldown reported through {@link onRemoteBackoff} holds every caller until it ends.
 */
export class TokenBucketRateLimiter implements RateLimiter {
  private readonly capacity: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<unknown>;
  private readonly logger: Logger;

  private tokens: number;
  private lastRefill: number;
  private blockedUntil = 0;
  private readonly grants: number[] = [];
  private chain: Promise<void> = Promise.resolve();
  private pending = 0;

  constructor(options: RateLimiterOptions) {
    if (!Number.isFinite(options.capacity) || options.capacity < 1) {
      throw new RangeError(`capacity must be a positive number, received ${options.capacity}`);
    }
    if (!Number.isFinite(options.windowMs) || options.windowMs <= 0) {
      throw new RangeError(`windowMs must be a positive number, received ${options.windowMs}`);
    }

    this.capacity = Math.floor(options.capacity);
    this.windowMs = options.windowMs;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? ((ms: number) => sleep(ms));
    this.logger = options.logger ?? consoleLogger;
    this.tokens = this.capacity;
    this.lastRefill = this.now();
  }

  acquire(): Promise<void> {
    this.pending += 1;
    const turn = this.chain.then(() => this.waitForPermit());
    this.chain = turn.then(
      () => undefined,
      (err: unknown) => {
        this.logger.error('rate_limiter_wait_failed', describeError(err));
      }
    );
    return turn.finally(() => {
      this.pending -= 1;
    });
  }

  onRemoteBackoff(durationMs: number): void {
    if (!Number.isFinite(durationMs) || durationMs <= 0) return;
    const until = this.now() + durationMs;
    if (until > this.blockedUntil) {
      this.blockedUntil = until;
      this.logger.warn('rate_limit_remote_backoff', {
        durationMs,
        blockedUntil: new Date(until).toISOString(),
      });
    }
  }

  snapshot(): RateLimiterSnapshot {
    const now = this.now();
    this.refill(now);
    this.pruneGrants(now);
    return {
      tokens: this.tokens,
      blockedUntil: this.blockedUntil > now ? this.blockedUntil : null,
      pending: this.pending,
      grantsInWindow: this.grants.length,
    };
  }

  private async waitForPermit(): Promise<void> {
    for (;;) {
      const now = this.now();
      const waitMs = this.computeWait(now);
      if (waitMs === 0) {
        this.tokens -= 1;
        this.grants.push(now);
        return;
      }
      await this.sleep(waitMs);
    }
  }

  private computeWait(now: number): number {
    this.refill(now);
    this.pruneGrants(now);

    let waitMs = 0;
    if (this.blockedUntil > now) {
      waitMs = this.blockedUntil - now;
    }
    if (this.tokens < 1) {
      waitMs = Math.max(waitMs, ((1 - this.tokens) * this.windowMs) / this.capacity);
    }
    if (this.grants.length >= this.capacity) {
      waitMs = Math.max(waitMs, this.grants[0] + this.windowMs - now);
    }

    return waitMs > 0 ? Math.max(1, Math.ceil(waitMs)) : 0;
  }

  private refill(now: number) {
    const elapsed = now - this.lastRefill;
    if (elapsed <= 0) return;
    this.tokens = Math.min(this.capacity, this.tokens + (elapsed * this.capacity) / this.windowMs);
    this.lastRefill = now;
  }

  private pruneGrants(now: number) {
    const horizon = now - this.windowMs;
    while (this.grants.length && this.grants[0] <= horizon) {
      this.grants.shift();
    }
  }
}
