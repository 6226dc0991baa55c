// src/core/lock/DistributedLock.ts

import { createClient } from 'redis';
import { randomUUID } from 'crypto';
import type { Logger } from '../../observability/Logger';
import { errorMessage } from '../../utils/errors';

type RedisClient = ReturnType<typeof createClient>;

export interface DistributedLockOptions {
  keyPrefix?: string;
  pollIntervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

// Delete the key only while it still holds our token
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0`;

/**
 * Redis `SET NX PX` lock shared by every process pointed at the same Redis.
 * Without a Redis URL (or after a failed connection) every acquire succeeds
 * and callers fall back to their in-process guards.
 */
export class DistributedLock {
  private redis?: RedisClient;
  private ready: Promise<void>;
  private connected = false;
  private owned: Map<string, string> = new Map();
  private keyPrefix: string;
  private pollIntervalMs: number;
  private sleep: (ms: number) => Promise<void>;

  constructor(
    redisUrl: string | undefined,
    private logger: Logger,
    options: DistributedLockOptions = {}
  ) {
    this.keyPrefix = options.keyPrefix ?? 'ticket-sync:lock:';
    this.pollIntervalMs = options.pollIntervalMs ?? 100;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));

    if (!redisUrl) {
      this.ready = Promise.resolve();
      return;
    }

    const client = createClient({
      url: redisUrl,
      socket: {
        reconnectStrategy: (retries) => {
          if (retries > 10) {
            this.logger.error('Redis reconnect failed after 10 attempts');
            return new Error('Max reconnect attempts reached');
          }
          return Math.min(retries * 100, 3000);
        },
      },
    });

    client.on('error', (err: Error) => {
      this.logger.error('Redis client error', { error: err.message });
      this.connected = false;
    });
    client.on('ready', () => {
      this.connected = true;
    });
    client.on('end', () => {
      this.logger.warn('Redis disconnected');
      this.connected = false;
    });

    this.redis = client;
    this.ready = client
      .connect()
      .then(() => {
        this.connected = true;
        this.logger.info('Distributed lock ready');
      })
      .catch((err: unknown) => {
        this.logger.error('Failed to connect to Redis for distributed locks', { error: errorMessage(err) });
        this.logger.warn('Distributed locks disabled, running in local-only mode');
        this.redis = undefined;
      });
  }

  /**
   * Must be awaited once before the first acquire.
   */
  async initialize(): Promise<void> {
    await this.ready;
  }

  getConnectionStatus(): { connected: boolean; mode: 'distributed' | 'local-only'; healthy: boolean } {
    return {
      connected: this.connected && this.redis !== undefined,
      mode: this.redis !== undefined ? 'distributed' : 'local-only',
      healthy: this.redis !== undefined ? this.connected : true,
    };
  }

  async tryAcquire(name: string, ttlMs: number): Promise<boolean> {
    const redis = this.activeClient();
    if (!redis) return true;

    const key = this.keyPrefix + name;
    const token = randomUUID();

    try {
      const result = await redis.set(key, token, { PX: ttlMs, NX: true });
      const acquired = result === 'OK';
      if (acquired) {
        this.owned.set(name, token);
      }
      this.logger.debug(acquired ? 'Acquired distributed lock' : 'Distributed lock already held', { lock: name });
      return acquired;
    } catch (error: unknown) {
      // Redis trouble must not block work; in-process guards still apply
      this.logger.error('Failed to acquire distributed lock', { lock: name, error: errorMessage(error) });
      return true;
    }
  }

  /**
   * Poll until `name` is free or `timeoutMs` elapses. Resolves true when the
   * lock was seen released.
   */
  async waitForRelease(name: string, timeoutMs: number): Promise<boolean> {
    const redis = this.activeClient();
    if (!redis) return true;

    const key = this.keyPrefix + name;
    const deadline = Date.now() + timeoutMs;

    try {
      while (Date.now() < deadline) {
        if ((await redis.exists(key)) === 0) {
          return true;
        }
        await this.sleep(this.pollIntervalMs);
      }
    } catch (error: unknown) {
      this.logger.error('Error waiting for distributed lock', { lock: name, error: errorMessage(error) });
      return true;
    }

    this.logger.warn('Timeout waiting for distributed lock release', { lock: name, timeoutMs });
    return false;
  }

  async release(name: string): Promise<void> {
    const token = this.owned.get(name);
    this.owned.delete(name);

    const redis = this.activeClient();
    if (!redis || !token) return;

    try {
      await redis.eval(RELEASE_SCRIPT, { keys: [this.keyPrefix + name], arguments: [token] });
      this.logger.debug('Released distributed lock', { lock: name });
    } catch (error: unknown) {
      // The key still expires on its own after its TTL
      this.logger.error('Failed to release distributed lock', { lock: name, error: errorMessage(error) });
    }
  }

  async disconnect(): Promise<void> {
    const redis = this.redis;
    if (!redis || !this.connected) return;
    try {
      await redis.quit();
      this.logger.info('Distributed lock disconnected');
    } catch (error: unknown) {
      this.logger.error('Error disconnecting Redis', { error: errorMessage(error) });
    }
  }

  private activeClient(): RedisClient | undefined {
    if (!this.redis) return undefined;
    if (!this.connected) {
      this.logger.warn('Redis not connected, skipping distributed lock');
      return undefined;
    }
    return this.redis;
  }
}
