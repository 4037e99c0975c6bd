/**
 * Finnhub API Client
 * Rate-limited with exponential backoff
 */

import { createChildLogger } from '@/utils/logger';
import { getRateLimiter, type RateLimiter } from './rate_limiter';
import type { FinnhubCandle } from './types';

const logger = createChildLogger('finnhub');

const BASE_URL = 'https://finnhub.io/api/v1';

export interface FetchOptions {
  maxRetries?: number;
  initialBackoffMs?: number;
  signal?: AbortSignal;
}

export class FinnhubHttpError extends Error {
  constructor(
    public status: number,
    statusText: string
  ) {
    super(`Finnhub API error: ${status} ${statusText}`);
    this.name = 'FinnhubHttpError';
  }
}

function isRetryable(error: Error): boolean {
  if (error.name === 'AbortError' || error.name === 'TimeoutError') return false;
  if (error instanceof FinnhubHttpError) return error.status >= 500;
  return true;
}

export class FinnhubClient {
  private requestCount = 0;

  constructor(
    private readonly apiKey: string,
    private readonly rateLimiter: RateLimiter = getRateLimiter(),
    private readonly defaults: Pick<FetchOptions, 'maxRetries' | 'initialBackoffMs'> = {}
  ) {}

  getRequestCount(): number {
    return this.requestCount;
  }

  private async fetchWithRetry<T>(
    endpoint: string,
    params: Record<string, string | number> = {},
    options: FetchOptions = {}
  ): Promise<T> {
    const {
      maxRetries = this.defaults.maxRetries ?? 3,
      initialBackoffMs = this.defaults.initialBackoffMs ?? 1000,
      signal,
    } = options;

    const url = new URL(`${BASE_URL}${endpoint}`);
    url.searchParams.set('token', this.apiKey);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, String(value));
    }

    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      const backoffMs = initialBackoffMs * Math.pow(2, attempt);
      try {
        const response = await this.rateLimiter.run(() => {
          this.requestCount++;
          return fetch(url.toString(), { signal });
        });

        if (response.status === 429) {
          logger.warn({ endpoint, attempt, backoffMs }, 'Rate limited by Finnhub, backing off');
          lastError = new FinnhubHttpError(429, 'Too Many Requests');
          if (attempt < maxRetries) await sleep(backoffMs);
          continue;
        }

        if (!response.ok) {
          throw new FinnhubHttpError(response.status, response.statusText);
        }

        return (await response.json()) as T;
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        if (!isRetryable(lastError)) break;

        if (attempt < maxRetries) {
          logger.warn(
            { endpoint, attempt, backoffMs, error: lastError.message },
            'Finnhub request failed, retrying'
          );
          await sleep(backoffMs);
        }
      }
    }

    throw lastError ?? new Error('Finnhub request failed after retries');
  }

  async fetchCandles(
    symbol: string,
    from: number,
    to: number,
    options: FetchOptions = {}
  ): Promise<FinnhubCandle> {
    return this.fetchWithRetry<FinnhubCandle>(
      '/stock/candle',
      { symbol, resolution: 'D', from, to },
      options
    );
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
