/**
 * Rate Limit Manager
 * In-memory sliding window limiter shared by every request of one crawl
 */

import { RateLimitConfig, RateLimitResult, RateLimitStats } from './rate-limit.types';

export type Sleeper = (ms: number) => Promise<void>;

export const defaultSleep: Sleeper = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class RateLimitManager {
  private timestamps: number[] = [];
  private stats: RateLimitStats = {
    totalRequests: 0,
    delayedRequests: 0,
    totalWaitTime: 0,
  };

  constructor(
    private readonly config: RateLimitConfig,
    private readonly sleep: Sleeper = defaultSleep,
    private readonly now: () => number = Date.now
  ) {
    if (config.maxRequests < 1) {
      throw new Error(`maxRequests must be at least 1, got ${config.maxRequests}`);
    }
  }

  /**
   * Try to take a slot in the current window without waiting
   */
  checkLimit(): RateLimitResult {
    const now = this.now();
    const windowStart = now - this.config.windowMs;

    // Remove old timestamps outside window
    this.timestamps = this.timestamps.filter((ts) => ts > windowStart);

    if (this.timestamps.length < this.config.maxRequests) {
      this.timestamps.push(now);
      return {
        allowed: true,
        remaining: this.config.maxRequests - this.timestamps.length,
        retryAfter: 0,
        totalRequests: this.timestamps.length,
      };
    }

    const oldest = this.timestamps[0];
    return {
      allowed: false,
      remaining: 0,
      retryAfter: Math.max(1, oldest + this.config.windowMs - now),
      totalRequests: this.timestamps.length,
    };
  }

  /**
   * Wait until a slot is free, then take it
   */
  async acquire(): Promise<void> {
    this.stats.totalRequests++;
    let delayed = false;

    for (;;) {
      const result = this.checkLimit();
      if (result.allowed) {
        return;
      }

      if (!delayed) {
        delayed = true;
        this.stats.delayedRequests++;
      }
      this.stats.totalWaitTime += result.retryAfter;
      await this.sleep(result.retryAfter);
    }
  }

  getStats(): RateLimitStats {
    return { ...this.stats };
  }

  /**
   * Clear all recorded requests
   */
  reset(): void {
    this.timestamps = [];
    this.stats = {
      totalRequests: 0,
      delayedRequests: 0,
      totalWaitTime: 0,
    };
  }
}
