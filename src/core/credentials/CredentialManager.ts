// src/core/credentials/CredentialManager.ts

import { EventEmitter } from 'events';
import type { AuthorizationRequest, CredentialSet, CredentialState, TokenExchanger } from './types';
import type { CredentialStore } from './CredentialStore';
import type { DistributedLock } from '../lock/DistributedLock';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import {
  CredentialError,
  CredentialNotFoundError,
  CredentialRefreshError,
  RefreshTokenRejectedError,
  errorCode,
  errorMessage,
} from '../../utils/errors';
import { withCredentialSpan } from '../../observability/tracing';

export interface CredentialManagerOptions {
  preRefreshMarginMs?: number; // default 5 minutes
  refreshLockTtlMs?: number;
  refreshWaitTimeoutMs?: number;
  now?: () => number;
}

/**
 * Lifecycle of the one connected delegated identity: authorize, hand out
 * access tokens (refreshing before expiry), disconnect.
 *
 * At most one refresh runs per process; with a DistributedLock, at most one
 * across processes. Callers arriving during a refresh share its outcome.
 */
export class CredentialManager extends EventEmitter {
  private inFlightRefresh?: Promise<CredentialSet>;
  private revoked = false;
  // Bumped by disconnect; a refresh started under an older value is discarded
  private generation = 0;
  private preRefreshMarginMs: number;
  private refreshLockTtlMs: number;
  private refreshWaitTimeoutMs: number;
  private now: () => number;

  constructor(
    private identity: string,
    private store: CredentialStore,
    private exchanger: TokenExchanger,
    private logger: Logger,
    private metrics: MetricsCollector,
    private refreshLock?: DistributedLock,
    options: CredentialManagerOptions = {}
  ) {
    super();
    this.preRefreshMarginMs = options.preRefreshMarginMs ?? 5 * 60 * 1000;
    this.refreshLockTtlMs = options.refreshLockTtlMs ?? 10000;
    this.refreshWaitTimeoutMs = options.refreshWaitTimeoutMs ?? 10000;
    this.now = options.now ?? Date.now;
  }

  async getState(): Promise<CredentialState> {
    const stored = await this.store.get(this.identity);
    if (!stored) {
      return this.revoked ? 'revoked' : 'unauthenticated';
    }
    const expiresAt = stored.credentials.expiresAt;
    return expiresAt && expiresAt.getTime() <= this.now() ? 'expired' : 'authenticated';
  }

  createAuthorizationUrl(opts?: { loginHint?: string }): AuthorizationRequest {
    const request = this.exchanger.createAuthorizationUrl(opts);
    this.logger.info('Authorization initiated', { identity: this.identity });
    return request;
  }

  async completeAuthorization(code: string, state: string): Promise<CredentialSet> {
    const credentials = await this.exchanger.exchangeCode(code, state);
    await this.store.set(this.identity, credentials);
    this.revoked = false;

    this.logger.info('Identity connected', { identity: this.identity });
    this.emit('connected', { identity: this.identity });
    return credentials;
  }

  /**
   * A usable access token, refreshed first when it is expired or inside the
   * pre-refresh margin.
   */
  async getAccessToken(): Promise<string> {
    const stored = await this.store.get(this.identity);
    if (!stored) {
      throw new CredentialNotFoundError('No connected identity, authorization required', {
        identity: this.identity,
      });
    }

    const credentials = stored.credentials;
    if (!this.needsRefresh(credentials)) {
      return credentials.accessToken;
    }

    if (!credentials.refreshToken) {
      if (this.isExpired(credentials)) {
        throw new CredentialError('Access token expired and no refresh token is stored, reauthorization required', {
          identity: this.identity,
        });
      }
      return credentials.accessToken;
    }

    this.logger.info('Auto-refreshing access token', {
      identity: this.identity,
      expiresAt: credentials.expiresAt?.toISOString(),
      expired: this.isExpired(credentials),
    });

    const refreshed = await this.refreshWithDedup(credentials.refreshToken);
    return refreshed.accessToken;
  }

  /**
   * Best-effort revoke at the provider, then erase the stored set. A refresh
   * still in flight finishes without storing its result.
   */
  async disconnect(): Promise<void> {
    this.generation++;
    const stored = await this.store.get(this.identity);
    if (stored) {
      const token = stored.credentials.refreshToken ?? stored.credentials.accessToken;
      try {
        await this.exchanger.revoke(token);
      } catch (error: unknown) {
        this.logger.warn('Token revocation failed', { identity: this.identity, error: errorMessage(error) });
      }
      await this.store.delete(this.identity);
    }

    this.revoked = true;
    this.logger.info('Identity disconnected', { identity: this.identity });
    this.emit('disconnected', { identity: this.identity });
  }

  private needsRefresh(credentials: CredentialSet): boolean {
    return (
      credentials.expiresAt !== undefined &&
      credentials.expiresAt.getTime() <= this.now() + this.preRefreshMarginMs
    );
  }

  private isExpired(credentials: CredentialSet): boolean {
    return credentials.expiresAt !== undefined && credentials.expiresAt.getTime() <= this.now();
  }

  private refreshWithDedup(refreshToken: string): Promise<CredentialSet> {
    if (this.inFlightRefresh) {
      this.metrics.incrementCounter('token_refresh_dedup_local');
      this.logger.debug('Refresh already in progress, waiting', { identity: this.identity });
      return this.inFlightRefresh;
    }

    // Registered before the first await so concurrent callers find it
    const refresh = this.coordinateRefresh(refreshToken).finally(() => {
      this.inFlightRefresh = undefined;
    });
    this.inFlightRefresh = refresh;
    return refresh;
  }

  private async coordinateRefresh(refreshToken: string): Promise<CredentialSet> {
    if (!this.refreshLock) {
      return this.executeRefresh(refreshToken);
    }

    const lockName = `refresh:${this.identity}`;
    const acquired = await this.refreshLock.tryAcquire(lockName, this.refreshLockTtlMs);
    if (!acquired) {
      this.logger.debug('Another instance refreshing, waiting', { identity: this.identity });
      this.metrics.incrementCounter('token_refresh_dedup_distributed');

      await this.refreshLock.waitForRelease(lockName, this.refreshWaitTimeoutMs);
      const stored = await this.store.get(this.identity);
      if (stored && !this.needsRefresh(stored.credentials)) {
        return stored.credentials;
      }
      throw new CredentialRefreshError('Refresh by another instance did not complete', {
        identity: this.identity,
      });
    }

    try {
      return await this.executeRefresh(refreshToken);
    } finally {
      await this.refreshLock.release(lockName);
    }
  }

  private async executeRefresh(refreshToken: string): Promise<CredentialSet> {
    const generation = this.generation;
    return withCredentialSpan('refresh', this.identity, async () => {
      const startTime = this.now();

      try {
        const credentials = await this.exchanger.refresh(refreshToken);
        if (generation !== this.generation) {
          await this.discard(credentials);
          throw new CredentialError('Identity was disconnected during refresh, reauthorization required', {
            identity: this.identity,
          });
        }
        await this.store.set(this.identity, credentials);

        this.metrics.recordLatency('token_refresh_duration', this.now() - startTime, { status: 'success' });
        this.metrics.incrementCounter('token_refresh_total', { status: 'success' });
        this.emit('refreshed', { identity: this.identity });
        return credentials;
      } catch (error: unknown) {
        this.metrics.recordLatency('token_refresh_duration', this.now() - startTime, { status: 'failed' });
        this.metrics.incrementCounter('token_refresh_total', { status: 'failed' });
        this.logger.error('Token refresh failed', {
          identity: this.identity,
          error: errorMessage(error),
          code: errorCode(error),
        });

        if (error instanceof RefreshTokenRejectedError) {
          await this.store.delete(this.identity);
          this.emit('reauthorizationRequired', { identity: this.identity });
          throw error;
        }
        if (error instanceof CredentialError) {
          throw error;
        }
        throw new CredentialRefreshError('Failed to refresh access token', {
          identity: this.identity,
          cause: errorMessage(error),
        });
      }
    });
  }

  private async discard(credentials: CredentialSet): Promise<void> {
    try {
      await this.exchanger.revoke(credentials.refreshToken ?? credentials.accessToken);
    } catch (error: unknown) {
      this.logger.warn('Token revocation failed', { identity: this.identity, error: errorMessage(error) });
    }
  }
}
