// src/core/http/types.ts

export interface HttpRequestConfig {
  url: string;
  method?: 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean>;
  body?: unknown;
  timeout?: number;
  skipRateLimit?: boolean;
}

export interface HttpResponse<T = unknown> {
  data: T;
  status: number;
  headers: Record<string, string>;
}

export interface RateLimitConfig {
  qps: number; // Queries per second, per upstream host
  concurrency: number;
}

export interface RetryConfig {
  maxRetries: number;
  baseDelay: number; // milliseconds
  maxDelay: number;
  rateLimitDelay: number; // used for 429 responses without Retry-After
  retryableStatusCodes: number[];
}

export interface HttpCoreOptions {
  timeout?: number;
  keepAlive?: boolean;
  userAgent?: string;
  sleep?: (ms: number) => Promise<void>;
}
