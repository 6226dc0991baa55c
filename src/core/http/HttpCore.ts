// src/core/http/HttpCore.ts

import axios, { AxiosInstance, isAxiosError } from 'axios';
import * as http from 'http';
import * as https from 'https';
import PQueue from 'p-queue';
import type { HttpCoreOptions, HttpRequestConfig, HttpResponse, RateLimitConfig, RetryConfig } from './types';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import { RetryHandler, parseRetryAfter } from './RetryHandler';
import { CircuitBreaker } from './CircuitBreaker';
import {
  CircuitBreakerOpenError,
  FatalFetchError,
  NetworkError,
  NetworkTimeoutError,
  RateLimitError,
  SyncError,
  TransientFetchError,
} from '../../utils/errors';
import { withHttpSpan } from '../../observability/tracing';

const RETRYABLE_NETWORK_CODES = ['ECONNRESET', 'ECONNREFUSED', 'EAI_AGAIN', 'EPIPE', 'ENOTFOUND'];

export class HttpCore {
  private axiosInstance: AxiosInstance;
  private rateLimiters: Map<string, PQueue> = new Map();
  private retryHandler: RetryHandler;
  private circuitBreaker: CircuitBreaker;

  constructor(
    private rateLimit: RateLimitConfig | undefined,
    private retryConfig: RetryConfig,
    private metrics: MetricsCollector,
    private logger: Logger,
    options: HttpCoreOptions = {}
  ) {
    this.circuitBreaker = new CircuitBreaker(logger);
    this.retryHandler = new RetryHandler(retryConfig, logger, metrics, this.circuitBreaker, options.sleep);

    const keepAlive = options.keepAlive ?? true;
    this.axiosInstance = axios.create({
      timeout: options.timeout ?? 30000,
      httpAgent: new http.Agent({ keepAlive }),
      httpsAgent: new https.Agent({ keepAlive }),
      headers: { 'User-Agent': options.userAgent ?? 'ticket-sheet-sync/1.0' },
    });
  }

  async get<T = unknown>(
    url: string,
    config: Omit<HttpRequestConfig, 'url' | 'method'> = {}
  ): Promise<HttpResponse<T>> {
    return this.request<T>({ ...config, url, method: 'GET' });
  }

  /**
   * Rate-limited request with transparent retry of transient failures.
   * Rejects with a FatalFetchError (or subclass) once the failure is final.
   */
  async request<T = unknown>(config: HttpRequestConfig): Promise<HttpResponse<T>> {
    const host = this.extractHost(config.url);
    const method = config.method ?? 'GET';
    const requestId = this.generateRequestId();

    this.logger.debug('HTTP request', {
      requestId,
      host,
      url: config.url,
      method,
      query: config.query,
    });

    if (!this.circuitBreaker.canExecute(host)) {
      throw new CircuitBreakerOpenError(`Circuit breaker open for ${host}`, { host });
    }

    const headers: Record<string, string> = {
      'X-Request-ID': requestId,
      Accept: 'application/json',
      ...config.headers,
    };

    const attempt = async () => {
      try {
        return await this.axiosInstance.request<T>({
          url: config.url,
          method,
          headers,
          params: config.query,
          data: config.body,
          timeout: config.timeout,
        });
      } catch (error: unknown) {
        throw this.transformError(error, host);
      }
    };

    const execute = async (): Promise<HttpResponse<T>> =>
      withHttpSpan(method, config.url, async () => {
        const startTime = Date.now();

        try {
          const response = await this.retryHandler.execute(attempt, host);

          this.circuitBreaker.recordSuccess(host);
          this.metrics.incrementCounter('http_requests_total', {
            host,
            method,
            status: response.status.toString(),
          });
          this.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
            host,
            status: response.status,
          });

          return {
            data: response.data,
            status: response.status,
            headers: this.toHeaderRecord(response.headers),
          };
        } catch (error: unknown) {
          const status = error instanceof FatalFetchError ? error.status : undefined;

          // Client errors say nothing about host health
          if (status === undefined || status >= 500 || status === 429) {
            this.circuitBreaker.recordFailure(host);
          }

          const label = String(status ?? 'error');
          this.metrics.incrementCounter('http_requests_total', { host, method, status: label });
          this.metrics.incrementCounter('http_errors', { host, status: label });
          throw error;
        }
      });

    return this.runThroughRateLimiter(host, config.skipRateLimit, execute);
  }

  private async runThroughRateLimiter<T>(
    host: string,
    skip: boolean | undefined,
    task: () => Promise<T>
  ): Promise<T> {
    const queue = skip ? undefined : this.getRateLimiter(host);
    if (!queue) {
      return task();
    }

    this.metrics.recordGauge('rate_limit_queue_size', queue.size + 1, { host });
    try {
      return await queue.add(task);
    } finally {
      this.metrics.recordGauge('rate_limit_queue_size', queue.size, { host });
    }
  }

  private getRateLimiter(host: string): PQueue | undefined {
    if (!this.rateLimit) return undefined;

    const existing = this.rateLimiters.get(host);
    if (existing) return existing;

    // Fractional QPS becomes one request per stretched interval
    const { qps, concurrency } = this.rateLimit;
    const intervalCap = qps >= 1 ? Math.floor(qps) : 1;
    const interval = qps >= 1 ? 1000 : Math.floor(1000 / qps);

    const queue = new PQueue({ intervalCap, interval, concurrency });
    this.rateLimiters.set(host, queue);

    this.logger.debug('Rate limiter initialized', { host, qps, intervalCap, interval, concurrency });
    return queue;
  }

  private extractHost(url: string): string {
    try {
      return new URL(url).host;
    } catch {
      return 'unknown';
    }
  }

  private generateRequestId(): string {
    return `req_${Date.now()}_${Math.random().toString(36).substring(7)}`;
  }

  private toHeaderRecord(headers: object): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      }
    }
    return record;
  }

  /**
   * Map one failed attempt onto the fetch error hierarchy: transient errors are
   * retried by the RetryHandler, fatal ones end the request.
   */
  private transformError(error: unknown, host: string): SyncError {
    if (error instanceof SyncError) return error;

    if (!isAxiosError(error)) {
      return new NetworkError('Network error', {
        host,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    if (error.response) {
      const status = error.response.status;

      this.logger.debug('HTTP error response', {
        host,
        status,
        statusText: error.response.statusText,
        data: error.response.data,
      });

      if (status === 429) {
        const header = error.response.headers['retry-after'];
        const retryAfterMs = parseRetryAfter(typeof header === 'string' ? header : undefined);
        if (retryAfterMs !== undefined) {
          this.logger.warn('Rate limited', { host, retryAfterMs });
        }
        return new RateLimitError('Rate limit exceeded', retryAfterMs, { host, status });
      }
      if (this.retryConfig.retryableStatusCodes.includes(status)) {
        return new TransientFetchError(`Server error: ${status}`, { host, status });
      }
      if (status >= 400 && status < 500) {
        return new FatalFetchError(`Client error: ${status}`, status, { host, response: error.response.data });
      }
      return new FatalFetchError(`Server error: ${status}`, status, { host });
    }

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new NetworkTimeoutError('Request timeout', { host });
    }
    if (error.code && RETRYABLE_NETWORK_CODES.includes(error.code)) {
      return new NetworkError('Network error', { host, cause: error.message });
    }
    return new FatalFetchError(`Request failed: ${error.message}`, undefined, { host, code: error.code });
  }
}
