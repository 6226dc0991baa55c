// tests/unit/CredentialManager.test.ts

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { CredentialManager } from '../../src/core/credentials/CredentialManager';
import { CredentialStore } from '../../src/core/credentials/CredentialStore';
import { DistributedLock } from '../../src/core/lock/DistributedLock';
import type { CredentialSet, TokenExchanger } from '../../src/core/credentials/types';
import {
  CredentialError,
  CredentialNotFoundError,
  CredentialRefreshError,
  RefreshTokenRejectedError,
} from '../../src/utils/errors';
import { createTestLogger, createTestMetrics } from '../helpers/mocks';

const NOW = Date.parse('2024-05-01T12:00:00.000Z');

function credentialsExpiringIn(ms: number, overrides: Partial<CredentialSet> = {}): CredentialSet {
  return {
    accessToken: 'test-access',
    refreshToken: 'test-refresh',
    expiresAt: new Date(NOW + ms),
    tokenType: 'Bearer',
    ...overrides,
  };
}

function fakeExchanger(): TokenExchanger & {
  refresh: Mock<[string], Promise<CredentialSet>>;
  revoke: Mock<[string], Promise<void>>;
} {
  return {
    createAuthorizationUrl: vi.fn(() => ({ url: 'https://accounts.test/auth?state=s1', state: 's1' })),
    exchangeCode: vi.fn(async () => credentialsExpiringIn(3600 * 1000, { accessToken: 'test-exchanged' })),
    refresh: vi.fn(async (_refreshToken: string) =>
      credentialsExpiringIn(3600 * 1000, { accessToken: 'test-refreshed' })
    ),
    revoke: vi.fn<[string], Promise<void>>(async (_token: string) => undefined),
  };
}

describe('CredentialManager', () => {
  let logger: ReturnType<typeof createTestLogger>;
  let metrics: ReturnType<typeof createTestMetrics>;
  let store: CredentialStore;
  let exchanger: ReturnType<typeof fakeExchanger>;

  function manager(refreshLock?: DistributedLock): CredentialManager {
    return new CredentialManager('default', store, exchanger, logger, metrics, refreshLock, {
      preRefreshMarginMs: 5 * 60 * 1000,
      now: () => NOW,
    });
  }

  beforeEach(() => {
    logger = createTestLogger();
    metrics = createTestMetrics();
    store = new CredentialStore({ backend: 'memory' }, logger);
    exchanger = fakeExchanger();
  });

  describe('getState', () => {
    it('should report each lifecycle state', async () => {
      const credentials = manager();
      await expect(credentials.getState()).resolves.toBe('unauthenticated');

      await store.set('default', credentialsExpiringIn(60 * 1000));
      await expect(credentials.getState()).resolves.toBe('authenticated');

      await store.set('default', credentialsExpiringIn(-10 * 1000));
      await expect(credentials.getState()).resolves.toBe('expired');

      await credentials.disconnect();
      await expect(credentials.getState()).resolves.toBe('revoked');
    });
  });

  describe('completeAuthorization', () => {
    it('should store the exchanged set and emit connected', async () => {
      const credentials = manager();
      const connected = vi.fn();
      credentials.on('connected', connected);

      await credentials.completeAuthorization('auth-code', 's1');

      expect(exchanger.exchangeCode).toHaveBeenCalledWith('auth-code', 's1');
      expect((await store.get('default'))?.credentials.accessToken).toBe('test-exchanged');
      expect(connected).toHaveBeenCalledWith({ identity: 'default' });
    });
  });

  describe('getAccessToken', () => {
    it('should raise CredentialNotFoundError without a connected identity', async () => {
      await expect(manager().getAccessToken()).rejects.toBeInstanceOf(CredentialNotFoundError);
    });

    it('should return the stored token while it is outside the margin', async () => {
      await store.set('default', credentialsExpiringIn(30 * 60 * 1000));

      await expect(manager().getAccessToken()).resolves.toBe('test-access');
      expect(exchanger.refresh).not.toHaveBeenCalled();
    });

    it('should refresh a token inside the pre-refresh margin', async () => {
      await store.set('default', credentialsExpiringIn(2 * 60 * 1000));

      await expect(manager().getAccessToken()).resolves.toBe('test-refreshed');
      expect(exchanger.refresh).toHaveBeenCalledWith('test-refresh');
      expect((await store.get('default'))?.credentials.accessToken).toBe('test-refreshed');
    });

    it('should refresh once for concurrent callers of an expired token', async () => {
      await store.set('default', credentialsExpiringIn(-10 * 1000));
      const credentials = manager();

      const tokens = await Promise.all([credentials.getAccessToken(), credentials.getAccessToken()]);

      expect(tokens).toEqual(['test-refreshed', 'test-refreshed']);
      expect(exchanger.refresh).toHaveBeenCalledTimes(1);
      expect(metrics.incrementCounter).toHaveBeenCalledWith('token_refresh_dedup_local');
      expect(metrics.incrementCounter).toHaveBeenCalledWith('token_refresh_total', { status: 'success' });
    });

    it('should keep returning an unexpired token that has no refresh token', async () => {
      await store.set('default', credentialsExpiringIn(60 * 1000, { refreshToken: undefined }));

      await expect(manager().getAccessToken()).resolves.toBe('test-access');
    });

    it('should require reauthorization for an expired token without a refresh token', async () => {
      await store.set('default', credentialsExpiringIn(-1000, { refreshToken: undefined }));

      await expect(manager().getAccessToken()).rejects.toThrow(
        'Access token expired and no refresh token is stored, reauthorization required'
      );
    });

    it('should erase the stored set when the refresh token is rejected', async () => {
      await store.set('default', credentialsExpiringIn(-10 * 1000));
      exchanger.refresh.mockRejectedValueOnce(new RefreshTokenRejectedError('Refresh token rejected'));
      const credentials = manager();
      const reauthorizationRequired = vi.fn();
      credentials.on('reauthorizationRequired', reauthorizationRequired);

      await expect(credentials.getAccessToken()).rejects.toBeInstanceOf(RefreshTokenRejectedError);

      await expect(store.get('default')).resolves.toBeNull();
      expect(reauthorizationRequired).toHaveBeenCalledWith({ identity: 'default' });
      await expect(credentials.getState()).resolves.toBe('unauthenticated');
    });

    it('should wrap a transient refresh failure and keep the stored set', async () => {
      await store.set('default', credentialsExpiringIn(-10 * 1000));
      exchanger.refresh.mockRejectedValueOnce(new Error('socket hang up'));

      const error = await manager()
        .getAccessToken()
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CredentialRefreshError);
      expect(error).toMatchObject({ details: { identity: 'default', cause: 'socket hang up' } });
      expect((await store.get('default'))?.credentials.accessToken).toBe('test-access');
      expect(metrics.incrementCounter).toHaveBeenCalledWith('token_refresh_total', { status: 'failed' });
    });

    it('should hold the distributed refresh lock around the refresh', async () => {
      await store.set('default', credentialsExpiringIn(-10 * 1000));
      const lock = new DistributedLock(undefined, logger);
      const tryAcquire = vi.spyOn(lock, 'tryAcquire');
      const release = vi.spyOn(lock, 'release');

      await expect(manager(lock).getAccessToken()).resolves.toBe('test-refreshed');

      expect(tryAcquire).toHaveBeenCalledWith('refresh:default', 10000);
      expect(release).toHaveBeenCalledWith('refresh:default');
    });

    it('should use the set refreshed by another instance', async () => {
      await store.set('default', credentialsExpiringIn(-10 * 1000));
      const lock = new DistributedLock(undefined, logger);
      vi.spyOn(lock, 'tryAcquire').mockResolvedValue(false);
      vi.spyOn(lock, 'waitForRelease').mockImplementation(async () => {
        await store.set('default', credentialsExpiringIn(3600 * 1000, { accessToken: 'test-from-peer' }));
        return true;
      });

      await expect(manager(lock).getAccessToken()).resolves.toBe('test-from-peer');
      expect(exchanger.refresh).not.toHaveBeenCalled();
    });

    it('should fail when another instance never finishes its refresh', async () => {
      await store.set('default', credentialsExpiringIn(-10 * 1000));
      const lock = new DistributedLock(undefined, logger);
      vi.spyOn(lock, 'tryAcquire').mockResolvedValue(false);
      vi.spyOn(lock, 'waitForRelease').mockResolvedValue(false);

      await expect(manager(lock).getAccessToken()).rejects.toThrow('Refresh by another instance did not complete');
    });
  });

  describe('disconnect', () => {
    it('should revoke the refresh token and erase the stored set', async () => {
      await store.set('default', credentialsExpiringIn(60 * 1000));
      const credentials = manager();
      const disconnected = vi.fn();
      credentials.on('disconnected', disconnected);

      await credentials.disconnect();

      expect(exchanger.revoke).toHaveBeenCalledWith('test-refresh');
      await expect(store.get('default')).resolves.toBeNull();
      expect(disconnected).toHaveBeenCalledWith({ identity: 'default' });
    });

    it('should erase the stored set even when revocation fails', async () => {
      await store.set('default', credentialsExpiringIn(60 * 1000));
      exchanger.revoke.mockRejectedValueOnce(new Error('revocation endpoint unavailable'));

      await manager().disconnect();

      await expect(store.get('default')).resolves.toBeNull();
      expect(logger.warn).toHaveBeenCalledWith('Token revocation failed', {
        identity: 'default',
        error: 'revocation endpoint unavailable',
      });
    });

    it('should not restore the set when a refresh finishes after disconnect', async () => {
      await store.set('default', credentialsExpiringIn(-10 * 1000));
      let finishRefresh: (credentials: CredentialSet) => void = () => undefined;
      exchanger.refresh.mockImplementationOnce(
        () =>
          new Promise<CredentialSet>((resolve) => {
            finishRefresh = resolve;
          })
      );
      const credentials = manager();

      const pending = credentials.getAccessToken();
      await vi.waitFor(() => expect(exchanger.refresh).toHaveBeenCalledWith('test-refresh'));
      await credentials.disconnect();
      finishRefresh(credentialsExpiringIn(3600 * 1000, { accessToken: 'test-late', refreshToken: 'test-late-refresh' }));

      await expect(pending).rejects.toThrow('Identity was disconnected during refresh, reauthorization required');
      await expect(store.get('default')).resolves.toBeNull();
      await expect(credentials.getState()).resolves.toBe('revoked');
      expect(exchanger.revoke.mock.calls).toEqual([['test-refresh'], ['test-late-refresh']]);
    });

    it('should surface credential errors after disconnect', async () => {
      const credentials = manager();
      await credentials.disconnect();

      await expect(credentials.getAccessToken()).rejects.toBeInstanceOf(CredentialError);
    });
  });
});
