/**
 * Rate limiter for Finnhub API
 * Free tier: 60 requests per minute
 */

import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('rate_limiter');

export interface RateLimiterConfig {
  maxRequestsPerWindow: number;
  windowMs: number;
  maxConcurrent: number;
}

export class RateLimiter {
  private requestTimes: number[] = [];
  private activeRequests = 0;
  private waitQueue: Array<() => void> = [];
  private readonly config: RateLimiterConfig;

  constructor(config: Partial<RateLimiterConfig> = {}) {
    this.config = {
      maxRequestsPerWindow: config.maxRequestsPerWindow ?? 60,
      windowMs: config.windowMs ?? 60_000,
      maxConcurrent: config.maxConcurrent ?? 5,
    };
  }

  private cleanOldRequests(): void {
    const windowStart = Date.now() - this.config.windowMs;
    this.requestTimes = this.requestTimes.filter((t) => t > windowStart);
  }

  private async waitForWindow(): Promise<void> {
    this.cleanOldRequests();
    while (this.requestTimes.length >= this.config.maxRequestsPerWindow) {
      const waitTime = this.requestTimes[0] + this.config.windowMs - Date.now();
      if (waitTime > 0) {
        logger.debug({ waitTime }, 'Rate limit reached, waiting');
        await sleep(waitTime);
      }
      this.cleanOldRequests();
    }
    this.requestTimes.push(Date.now());
  }

  async acquire(): Promise<void> {
    while (this.activeRequests >= this.config.maxConcurrent) {
      await new Promise<void>((resolve) => {
        this.waitQueue.push(resolve);
      });
    }
    // Claim the slot before any await so concurrent callers see it
    this.activeRequests++;
    await this.waitForWindow();
  }

  release(): void {
    this.activeRequests = Math.max(0, this.activeRequests - 1);
    const next = this.waitQueue.shift();
    if (next) {
      next();
    }
  }

  /** Runs `fn` inside an acquired slot; the slot is released however `fn` settles. */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  getStats(): { requestsInWindow: number; activeRequests: number } {
    this.cleanOldRequests();
    return {
      requestsInWindow: this.requestTimes.length,
      activeRequests: this.activeRequests,
    };
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// Shared across clients so every Finnhub call counts against one budget
let globalRateLimiter: RateLimiter | null = null;

export function getRateLimiter(): RateLimiter {
  if (!globalRateLimiter) {
    globalRateLimiter = new RateLimiter();
  }
  return globalRateLimiter;
}
