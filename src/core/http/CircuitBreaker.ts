// src/core/http/CircuitBreaker.ts

import type { Logger } from '../../observability/Logger';

export interface CircuitBreakerOptions {
  threshold?: number;
  resetTimeoutMs?: number;
}

/**
 * Per-host breaker: after `threshold` consecutive failed requests the host is
 * refused until `resetTimeoutMs` has passed since the last failure.
 */
export class CircuitBreaker {
  private failures: Map<string, number> = new Map();
  private lastFailureTime: Map<string, number> = new Map();
  private threshold: number;
  private resetTimeout: number;

  constructor(
    private logger: Logger,
    options: CircuitBreakerOptions = {}
  ) {
    this.threshold = options.threshold ?? 5;
    this.resetTimeout = options.resetTimeoutMs ?? 60000;
  }

  canExecute(host: string): boolean {
    const failures = this.failures.get(host) ?? 0;
    const lastFailure = this.lastFailureTime.get(host) ?? 0;

    if (failures >= this.threshold) {
      if (Date.now() - lastFailure < this.resetTimeout) {
        this.logger.warn('Circuit breaker open', { host, failures });
        return false;
      }

      this.failures.set(host, 0);
    }

    return true;
  }

  recordSuccess(host: string): void {
    this.failures.set(host, 0);
  }

  recordFailure(host: string): void {
    this.failures.set(host, (this.failures.get(host) ?? 0) + 1);
    this.lastFailureTime.set(host, Date.now());
  }
}
