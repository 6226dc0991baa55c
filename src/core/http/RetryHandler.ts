// src/core/http/RetryHandler.ts

import type { RetryConfig } from './types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { CircuitBreaker } from './CircuitBreaker';
import { RateLimitError, RetriesExhaustedError, TransientFetchError } from '../../utils/errors';

export const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Parse a Retry-After header (delta seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(value: string | undefined, now = Date.now()): number | undefined {
  if (!value) return undefined;

  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }

  const date = new Date(value).getTime();
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

/**
 * Re-runs a task while it fails with a TransientFetchError. Anything else is
 * rethrown untouched; running out of attempts raises RetriesExhaustedError.
 */
export class RetryHandler {
  constructor(
    private config: RetryConfig,
    private logger: Logger,
    private metrics?: MetricsCollector,
    private circuitBreaker?: CircuitBreaker,
    private sleep: (ms: number) => Promise<void> = defaultSleep
  ) {}

  async execute<T>(task: () => Promise<T>, host: string): Promise<T> {
    let lastError: TransientFetchError | undefined;
    let attempts = 0;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      if (attempt > 0 && this.circuitBreaker && !this.circuitBreaker.canExecute(host)) {
        this.logger.warn('Circuit breaker open, skipping retry', { host, attempt });
        break;
      }

      attempts++;
      try {
        return await task();
      } catch (error: unknown) {
        if (!(error instanceof TransientFetchError)) {
          throw error;
        }
        lastError = error;

        if (attempt === this.config.maxRetries) {
          break;
        }

        const delay = this.computeDelay(error, attempt);
        const reason = error instanceof RateLimitError ? 'rate_limited' : error.code.toLowerCase();

        this.logger.warn('Retrying request', {
          host,
          attempt: attempt + 1,
          delay,
          reason,
          status: error.details?.status,
        });
        this.metrics?.incrementCounter('http_retries', { host, reason });

        await this.sleep(delay);
      }
    }

    throw new RetriesExhaustedError(`Retries exhausted for ${host}`, attempts, {
      host,
      status: lastError?.details?.status,
      cause: lastError?.message,
    });
  }

  private computeDelay(error: TransientFetchError, attempt: number): number {
    if (error instanceof RateLimitError) {
      return error.retryAfterMs ?? this.config.rateLimitDelay;
    }

    // Exponential backoff with jitter
    return Math.min(
      this.config.baseDelay * Math.pow(2, attempt) + Math.random() * this.config.baseDelay,
      this.config.maxDelay
    );
  }
}
