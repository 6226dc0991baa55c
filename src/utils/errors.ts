// src/utils/errors.ts

export class SyncError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends SyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
  }
}

// Fetch errors: transient ones are retried by the HTTP core, fatal ones end the run
export class TransientFetchError extends SyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TRANSIENT_FETCH_ERROR', details);
  }
}

export class RateLimitError extends TransientFetchError {
  constructor(
    message: string = 'Rate limit exceeded',
    public retryAfterMs?: number,
    details?: Record<string, unknown>
  ) {
    super(message, { ...details, retryAfterMs });
    this.code = 'RATE_LIMIT_EXCEEDED';
  }
}

export class NetworkError extends TransientFetchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_ERROR';
  }
}

export class NetworkTimeoutError extends NetworkError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_TIMEOUT';
  }
}

export class FatalFetchError extends SyncError {
  constructor(
    message: string,
    public status?: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'FATAL_FETCH_ERROR', { ...details, status });
  }
}

export class RetriesExhaustedError extends FatalFetchError {
  constructor(
    message: string,
    public attempts: number,
    details?: Record<string, unknown>
  ) {
    super(message, typeof details?.status === 'number' ? details.status : undefined, {
      ...details,
      attempts,
    });
    this.code = 'RETRIES_EXHAUSTED';
  }
}

export class CircuitBreakerOpenError extends FatalFetchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, undefined, details);
    this.code = 'CIRCUIT_BREAKER_OPEN';
  }
}

// Per-record: skipped and counted, never aborts a batch
export class MalformedRecordError extends SyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'MALFORMED_RECORD', details);
  }
}

export class SinkWriteError extends SyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SINK_WRITE_FAILED', details);
  }
}

export class LockTimeoutError extends SyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'LOCK_TIMEOUT', details);
  }
}

// Credential errors surface to callers as "reauthorization required"
export class CredentialError extends SyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CREDENTIAL_ERROR', details);
  }
}

export class CredentialNotFoundError extends CredentialError {
  constructor(message: string = 'No connected identity', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'CREDENTIAL_NOT_FOUND';
  }
}

export class CredentialRefreshError extends CredentialError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'CREDENTIAL_REFRESH_FAILED';
  }
}

// invalid_grant: the stored refresh token can never be used again
export class RefreshTokenRejectedError extends CredentialError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'REFRESH_TOKEN_REJECTED';
  }
}

export class OAuthError extends SyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'OAUTH_ERROR', details);
  }
}

export class OAuthConfigError extends OAuthError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'OAUTH_CONFIG_ERROR';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string {
  return error instanceof SyncError ? error.code : 'UNKNOWN';
}
