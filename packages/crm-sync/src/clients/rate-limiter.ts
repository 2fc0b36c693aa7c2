/**
 * Rate Limiter
 *
 * Sliding-window limiter applied before every outbound CRM request:
 * at most `requestsPerMinute` requests in any 60s window, and a minimum
 * gap between consecutive requests. State is per client instance.
 *
 * @module clients/rate-limiter
 */

import { systemClock, type Clock } from '@meetsync/lib';

export interface RateLimiterConfig {
  requestsPerMinute: number;
  /** Minimum spacing between consecutive requests */
  minIntervalMs: number;
  windowMs: number;
}

export const DEFAULT_RATE_LIMITER_CONFIG: RateLimiterConfig = {
  requestsPerMinute: 100,
  minIntervalMs: 100,
  windowMs: 60000,
};

export class RateLimiter {
  private readonly config: RateLimiterConfig;
  private readonly clock: Clock;
  private readonly onWait?: (waitMs: number) => void;
  private timestamps: number[] = [];
  private lastRequestAt: number | null = null;

  constructor(
    config: Partial<RateLimiterConfig> = {},
    deps: { clock?: Clock; onWait?: (waitMs: number) => void } = {}
  ) {
    this.config = { ...DEFAULT_RATE_LIMITER_CONFIG, ...config };
    this.clock = deps.clock ?? systemClock;
    this.onWait = deps.onWait;
  }

  /**
   * Wait until a request may be sent, then record it.
   */
  async acquire(): Promise<void> {
    this.prune(this.clock.now());

    if (this.timestamps.length >= this.config.requestsPerMinute) {
      const oldest = this.timestamps[0];
      const waitMs = oldest + this.config.windowMs - this.clock.now();
      if (waitMs > 0) {
        this.onWait?.(waitMs);
        await this.clock.sleep(waitMs);
      }
      this.prune(this.clock.now());
    }

    if (this.lastRequestAt !== null) {
      const sinceLast = this.clock.now() - this.lastRequestAt;
      if (sinceLast < this.config.minIntervalMs) {
        await this.clock.sleep(this.config.minIntervalMs - sinceLast);
      }
    }

    const now = this.clock.now();
    this.timestamps.push(now);
    this.lastRequestAt = now;
  }

  /** Requests recorded in the current window */
  inWindow(): number {
    this.prune(this.clock.now());
    return this.timestamps.length;
  }

  private prune(now: number): void {
    const cutoff = now - this.config.windowMs;
    while (this.timestamps.length > 0 && this.timestamps[0] <= cutoff) {
      this.timestamps.shift();
    }
  }
}
