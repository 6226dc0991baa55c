// src/core/lock/DestinationLock.ts

import { Mutex, withTimeout, E_TIMEOUT, MutexInterface } from 'async-mutex';
import type { DistributedLock } from './DistributedLock';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { LockTimeoutError } from '../../utils/errors';

export interface DestinationLockOptions {
  acquireTimeoutMs?: number; // default 10 minutes
  leaseMs?: number; // TTL of the cross-process lease, default 30 minutes
}

/**
 * Serializes read-merge-write cycles per destination id. Within a process an
 * async-mutex per destination; across processes a Redis lease when a
 * DistributedLock is configured.
 */
export class DestinationLock {
  private mutexes: Map<string, MutexInterface> = new Map();
  private acquireTimeoutMs: number;
  private leaseMs: number;

  constructor(
    private logger: Logger,
    private metrics?: MetricsCollector,
    private distributed?: DistributedLock,
    options: DestinationLockOptions = {}
  ) {
    this.acquireTimeoutMs = options.acquireTimeoutMs ?? 10 * 60 * 1000;
    this.leaseMs = options.leaseMs ?? 30 * 60 * 1000;
  }

  async runExclusive<T>(destination: string, task: () => Promise<T>): Promise<T> {
    const startTime = Date.now();
    const mutex = this.mutexFor(destination);

    let release: MutexInterface.Releaser;
    try {
      release = await mutex.acquire();
    } catch (error: unknown) {
      if (error === E_TIMEOUT) {
        throw new LockTimeoutError(`Timed out waiting for destination ${destination}`, {
          destination,
          timeoutMs: this.acquireTimeoutMs,
        });
      }
      throw error;
    }

    try {
      await this.acquireDistributed(destination, startTime);

      const waited = Date.now() - startTime;
      this.metrics?.recordLatency('lock_wait_duration', waited, { destination });
      this.logger.debug('Destination lock acquired', { destination, waitedMs: waited });

      try {
        return await task();
      } finally {
        await this.distributed?.release(this.lockName(destination));
      }
    } finally {
      release();
    }
  }

  isLocked(destination: string): boolean {
    return this.mutexes.get(destination)?.isLocked() ?? false;
  }

  private async acquireDistributed(destination: string, startTime: number): Promise<void> {
    if (!this.distributed) return;

    const name = this.lockName(destination);
    while (!(await this.distributed.tryAcquire(name, this.leaseMs))) {
      const remaining = this.acquireTimeoutMs - (Date.now() - startTime);
      if (remaining <= 0 || !(await this.distributed.waitForRelease(name, remaining))) {
        throw new LockTimeoutError(`Timed out waiting for destination ${destination}`, {
          destination,
          timeoutMs: this.acquireTimeoutMs,
          scope: 'distributed',
        });
      }
    }
  }

  private mutexFor(destination: string): MutexInterface {
    let mutex = this.mutexes.get(destination);
    if (!mutex) {
      mutex = withTimeout(new Mutex(), this.acquireTimeoutMs);
      this.mutexes.set(destination, mutex);
    }
    return mutex;
  }

  private lockName(destination: string): string {
    return `destination:${destination}`;
  }
}
