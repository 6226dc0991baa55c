// src/config/ConfigValidator.ts

import { z } from 'zod';

const EncryptionKeySchema = z
  .string()
  .length(64, 'Encryption key must be exactly 64 characters')
  .regex(/^[0-9a-f]{64}$/i, 'Encryption key must be a valid 32-byte hexadecimal string (0-9, a-f)');

// Ticket API Configuration Schema
const TicketApiAuthSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('token'),
    email: z.string().email(),
    apiToken: z.string().min(1),
  }),
  z.object({
    kind: z.literal('bearer'),
    accessToken: z.string().min(1),
  }),
]);

const TicketApiConfigSchema = z.object({
  baseUrl: z.string().url(),
  auth: TicketApiAuthSchema,
  pageSize: z.number().int().min(1).max(100).optional(),
});

// Credential Store Configuration Schema
const CredentialStoreConfigSchema = z
  .object({
    backend: z.enum(['memory', 'file', 'redis', 'postgres'], {
      errorMap: () => ({ message: "Credential store backend must be 'memory', 'file', 'redis', or 'postgres'" }),
    }),
    url: z.string().url().optional(),
    path: z.string().min(1).optional(),
    encryption: z
      .object({
        key: EncryptionKeySchema,
        previousKeys: z.array(EncryptionKeySchema).optional(),
      })
      .optional(),
  })
  .refine((data) => (data.backend === 'redis' || data.backend === 'postgres' ? Boolean(data.url) : true), {
    message: "Redis and Postgres backends require 'url' configuration",
  });

const GoogleOAuthConfigSchema = z.object({
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  redirectUri: z.string().url(),
  scopes: z.array(z.string().min(1)).min(1),
  authorizationEndpoint: z.string().url().optional(),
  tokenEndpoint: z.string().url().optional(),
  revocationEndpoint: z.string().url().optional(),
});

const CredentialsConfigSchema = z.object({
  identity: z.string().min(1).default('default'),
  store: CredentialStoreConfigSchema,
  google: GoogleOAuthConfigSchema.optional(),
  preRefreshMarginMinutes: z.number().min(1).max(60).optional(),
});

// Retry Configuration Schema
const RetryConfigSchema = z
  .object({
    maxRetries: z.number().int().min(0).max(10),
    baseDelay: z.number().positive(),
    maxDelay: z.number().positive(),
    rateLimitDelay: z.number().positive(),
    retryableStatusCodes: z.array(z.number().int().min(100).max(599)),
  })
  .refine((data) => data.maxDelay >= data.baseDelay, {
    message: 'maxDelay must be greater than or equal to baseDelay',
  });

// Rate Limit Configuration Schema
const RateLimitConfigSchema = z.object({
  qps: z.number().positive(),
  concurrency: z.number().int().positive(),
});

const HttpConfigSchema = z.object({
  timeout: z.number().positive().optional(),
  keepAlive: z.boolean().optional(),
  retry: RetryConfigSchema.default({
    maxRetries: 5,
    baseDelay: 1000,
    maxDelay: 60000,
    rateLimitDelay: 60000,
    retryableStatusCodes: [429, 500, 502, 503, 504],
  }),
  rateLimit: RateLimitConfigSchema.optional(),
});

// Destination Configuration Schemas
const LocalSinkConfigSchema = z.object({
  directory: z.string().min(1).default('exports'),
  prefix: z
    .string()
    .regex(/^[\w.-]+$/, 'File prefix may only contain letters, digits, dot, dash and underscore')
    .optional(),
  batchSize: z.number().int().positive().optional(),
});

const SheetsSinkConfigSchema = z
  .object({
    spreadsheetId: z.string().min(1),
    tab: z.string().min(1).max(100).optional(),
    batchSize: z.number().int().positive().optional(),
    auth: z.enum(['delegated', 'serviceAccount']),
    keyFile: z.string().min(1).optional(),
  })
  .refine((data) => data.auth !== 'serviceAccount' || Boolean(data.keyFile), {
    message: "Service account access requires 'keyFile'",
  });

const LockConfigSchema = z
  .object({
    redisUrl: z.string().url().optional(),
    acquireTimeoutMs: z.number().int().positive().optional(),
    leaseMs: z.number().int().positive().optional(),
  })
  .optional();

const SyncConfigSchema = z
  .object({
    mergeBatchSize: z.number().int().positive().optional(),
    gapFillMaxIds: z.number().int().positive().optional(),
  })
  .optional();

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
  })
  .optional();

// Metrics Configuration Schema
const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    port: z.number().int().min(1024).max(65535).optional(),
    path: z.string().startsWith('/').optional(),
  })
  .optional();

// Complete Init Configuration Schema
export const InitConfigSchema = z
  .object({
    ticketApi: TicketApiConfigSchema,
    http: HttpConfigSchema.default({}),
    sinks: z
      .object({
        local: LocalSinkConfigSchema.optional(),
        sheets: SheetsSinkConfigSchema.optional(),
      })
      .default({}),
    credentials: CredentialsConfigSchema.optional(),
    lock: LockConfigSchema,
    sync: SyncConfigSchema,
    metrics: MetricsConfigSchema,
    logging: LoggerConfigSchema,
  })
  .refine((data) => data.sinks.sheets?.auth !== 'delegated' || Boolean(data.credentials?.google), {
    message: 'Delegated spreadsheet access requires credentials.google',
    path: ['credentials', 'google'],
  });

/**
 * Configuration accepted by `TicketSyncSDK.init()`; omitted sections take
 * their defaults.
 */
export type InitConfig = z.input<typeof InitConfigSchema>;

export type ValidatedConfig = z.output<typeof InitConfigSchema>;

/**
 * Validate SDK initialization configuration
 *
 * @param config - Configuration object to validate
 * @returns Validated configuration with defaults applied
 * @throws {z.ZodError} If configuration is invalid with detailed error messages
 */
export function validateConfig(config: unknown): ValidatedConfig {
  return InitConfigSchema.parse(config);
}

/**
 * Validate configuration and return user-friendly errors
 */
export function validateConfigSafe(
  config: unknown
): { success: true; data: ValidatedConfig } | { success: false; errors: string[] } {
  const result = InitConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
  };
}
