// src/core/credentials/CredentialStore.ts

import Keyv from 'keyv';
import KeyvRedis from '@keyv/redis';
import KeyvPostgres from '@keyv/postgres';
import { EventEmitter } from 'events';
import { z } from 'zod';
import type { CredentialSet, CredentialStoreConfig, StoredCredential } from './types';
import { TokenEncryption } from './TokenEncryption';
import { FileStore } from './FileStore';
import type { Logger } from '../../observability/Logger';
import { withCredentialSpan } from '../../observability/tracing';
import { ConfigError, CredentialError } from '../../utils/errors';

export const DEFAULT_CREDENTIAL_FILE = 'data/credentials.json';

const StoredCredentialSchema = z.object({
  identity: z.string(),
  credentials: z.object({
    accessToken: z.string(),
    refreshToken: z.string().optional(),
    expiresAt: z.coerce.date().optional(),
    scope: z.string().optional(),
    tokenType: z.string().optional(),
  }),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

/**
 * Single-writer persistence for the connected identity's CredentialSet.
 * Values are JSON strings, encrypted when a key is configured. No TTL is set:
 * an expired access token must survive for its refresh token to be used.
 */
export class CredentialStore extends EventEmitter {
  private store: Keyv<string>;
  private encryption?: TokenEncryption;

  constructor(
    config: CredentialStoreConfig,
    private logger: Logger
  ) {
    super();
    this.store = new Keyv<string>({ store: CredentialStore.createBackend(config), namespace: 'credentials' });
    this.store.on('error', (error: unknown) => {
      this.logger.error('Credential store backend error', {
        backend: config.backend,
        error: error instanceof Error ? error.message : String(error),
      });
    });

    if (config.encryption) {
      this.encryption = new TokenEncryption(config.encryption.key, config.encryption.previousKeys);
    }
  }

  async get(identity: string): Promise<StoredCredential | null> {
    const raw = await this.store.get(this.createKey(identity));
    if (raw === undefined) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(this.encryption ? this.encryption.decrypt(raw) : raw);
    } catch (error: unknown) {
      throw new CredentialError('Stored credentials are unreadable', {
        identity,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const result = StoredCredentialSchema.safeParse(parsed);
    if (!result.success) {
      throw new CredentialError('Stored credentials are malformed', { identity });
    }
    return result.data;
  }

  async set(identity: string, credentials: CredentialSet): Promise<void> {
    return withCredentialSpan('store', identity, async () => {
      const existing = await this.get(identity).catch((error: unknown) => {
        // Overwriting an unreadable entry is how it gets repaired
        this.logger.warn('Replacing unreadable stored credentials', {
          identity,
          error: error instanceof Error ? error.message : String(error),
        });
        return null;
      });
      const now = new Date();

      const stored: StoredCredential = {
        identity,
        credentials,
        createdAt: existing?.createdAt ?? now,
        updatedAt: now,
      };

      const json = JSON.stringify(stored);
      await this.store.set(this.createKey(identity), this.encryption ? this.encryption.encrypt(json) : json);

      this.logger.info('Credentials saved', {
        identity,
        expiresAt: credentials.expiresAt?.toISOString(),
        hasRefreshToken: credentials.refreshToken !== undefined,
      });
      this.emit(existing ? 'credentialsUpdated' : 'credentialsSaved', { identity });
    });
  }

  async delete(identity: string): Promise<boolean> {
    const deleted = await this.store.delete(this.createKey(identity));
    this.logger.info('Credentials deleted', { identity, deleted });
    this.emit('credentialsDeleted', { identity });
    return deleted;
  }

  private createKey(identity: string): string {
    return `credential:${identity}`;
  }

  private static createBackend(config: CredentialStoreConfig): Keyv.Store<string | undefined> | undefined {
    switch (config.backend) {
      case 'memory':
        return undefined;
      case 'file':
        return new FileStore(config.path ?? DEFAULT_CREDENTIAL_FILE);
      case 'redis':
        if (!config.url) throw new ConfigError('Redis credential store requires a url');
        return new KeyvRedis(config.url);
      case 'postgres':
        if (!config.url) throw new ConfigError('Postgres credential store requires a url');
        return new KeyvPostgres({ uri: config.url });
    }
  }
}
