// src/config/env.ts

import dotenv from 'dotenv';
import { validateConfigSafe, type ValidatedConfig } from './ConfigValidator';
import { DEFAULT_CREDENTIAL_FILE } from '../core/credentials/CredentialStore';
import { SHEETS_SCOPE } from '../sinks/SpreadsheetApi';
import { ConfigError } from '../utils/errors';

type Env = Record<string, string | undefined>;

export interface LoadEnvOptions {
  env?: Env;
  /**
   * Path of the .env file merged into process.env first; false skips it.
   */
  envFile?: string | false;
}

function optionalNumber(env: Env, key: string): number | undefined {
  const value = env[key];
  if (value === undefined || value === '') return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`${key} must be a number`, { key, value });
  }
  return parsed;
}

function flag(env: Env, key: string): boolean | undefined {
  const value = env[key];
  if (value === undefined || value === '') return undefined;
  return value === '1' || value.toLowerCase() === 'true';
}

function ticketApiBaseUrl(env: Env): string | undefined {
  if (env.TICKET_API_BASE_URL) return env.TICKET_API_BASE_URL;
  if (env.ZENDESK_SUBDOMAIN) return `https://${env.ZENDESK_SUBDOMAIN}.zendesk.com`;
  return undefined;
}

/**
 * Build the SDK configuration from environment variables (and `.env`).
 *
 * @throws {ConfigError} listing every invalid or missing setting
 */
export function loadConfigFromEnv(options: LoadEnvOptions = {}): ValidatedConfig {
  if (options.envFile !== false) {
    dotenv.config(options.envFile ? { path: options.envFile } : undefined);
  }
  const env = options.env ?? process.env;

  const baseUrl = env.BASE_URL ?? 'http://localhost:8000';
  const googleOAuth =
    env.GOOGLE_OAUTH_CLIENT_ID && env.GOOGLE_OAUTH_CLIENT_SECRET
      ? {
          clientId: env.GOOGLE_OAUTH_CLIENT_ID,
          clientSecret: env.GOOGLE_OAUTH_CLIENT_SECRET,
          redirectUri: `${baseUrl.replace(/\/+$/, '')}/oauth/callback`,
          scopes: [SHEETS_SCOPE],
        }
      : undefined;

  const encryptionKey = env.ENCRYPTION_KEY;
  const previousKeys = env.ENCRYPTION_PREVIOUS_KEYS?.split(',')
    .map((key) => key.trim())
    .filter((key) => key.length > 0);

  const raw = {
    ticketApi: {
      baseUrl: ticketApiBaseUrl(env),
      auth: env.TICKET_API_BEARER_TOKEN
        ? { kind: 'bearer', accessToken: env.TICKET_API_BEARER_TOKEN }
        : { kind: 'token', email: env.ZENDESK_EMAIL, apiToken: env.ZENDESK_API_TOKEN },
      pageSize: optionalNumber(env, 'TICKET_API_PAGE_SIZE'),
    },
    http: {
      timeout: optionalNumber(env, 'HTTP_TIMEOUT_MS'),
      rateLimit: env.TICKET_API_QPS
        ? {
            qps: optionalNumber(env, 'TICKET_API_QPS'),
            concurrency: optionalNumber(env, 'TICKET_API_CONCURRENCY') ?? 2,
          }
        : undefined,
    },
    sinks: {
      local: {
        directory: env.EXPORT_OUTPUT_DIR ?? 'exports',
        prefix: env.EXPORT_FILE_PREFIX,
      },
      sheets: env.GOOGLE_SHEET_ID
        ? {
            spreadsheetId: env.GOOGLE_SHEET_ID,
            tab: env.GOOGLE_SHEET_NAME ?? 'Tickets',
            auth: env.GOOGLE_SHEETS_CREDENTIALS_PATH ? 'serviceAccount' : 'delegated',
            keyFile: env.GOOGLE_SHEETS_CREDENTIALS_PATH,
          }
        : undefined,
    },
    credentials: {
      identity: env.SYNC_IDENTITY ?? 'default',
      store: {
        backend: env.CREDENTIAL_STORE_BACKEND ?? 'file',
        url: env.CREDENTIAL_STORE_URL,
        path: env.OAUTH_DATA_FILE ?? DEFAULT_CREDENTIAL_FILE,
        encryption: encryptionKey ? { key: encryptionKey, previousKeys } : undefined,
      },
      google: googleOAuth,
    },
    lock: { redisUrl: env.REDIS_URL },
    sync: {
      mergeBatchSize: optionalNumber(env, 'SYNC_MERGE_BATCH_SIZE'),
      gapFillMaxIds: optionalNumber(env, 'SYNC_GAP_FILL_MAX_IDS'),
    },
    metrics: {
      enabled: flag(env, 'METRICS_ENABLED'),
      port: optionalNumber(env, 'METRICS_PORT'),
    },
    logging: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
    },
  };

  const result = validateConfigSafe(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${result.errors.join('; ')}`, { errors: result.errors });
  }
  return result.data;
}
