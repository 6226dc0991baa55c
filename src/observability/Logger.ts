// src/observability/Logger.ts

import winston from 'winston';

export interface LoggerConfig {
  level?: 'debug' | 'info' | 'warn' | 'error';
  format?: 'json' | 'pretty';
}

const SECRET_KEYS = ['accessToken', 'refreshToken', 'idToken', 'apiToken', 'clientSecret', 'encryptionKey'];
const NESTED_KEYS = ['credentials', 'tokenSet'];

export class Logger {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}) {
    const format =
      config.format === 'pretty'
        ? winston.format.combine(winston.format.colorize(), winston.format.simple())
        : winston.format.combine(winston.format.timestamp(), winston.format.json());

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      format,
      transports: [new winston.transports.Console()],
    });
  }

  private redactSensitive(obj: Record<string, unknown>): Record<string, unknown> {
    const redacted: Record<string, unknown> = { ...obj };

    for (const key of SECRET_KEYS) {
      if (key in redacted) redacted[key] = '[REDACTED]';
    }

    for (const key of NESTED_KEYS) {
      const nested = redacted[key];
      if (nested && typeof nested === 'object' && !Array.isArray(nested)) {
        const copy: Record<string, unknown> = { ...nested };
        for (const secret of SECRET_KEYS) {
          if (secret in copy) copy[secret] = '[REDACTED]';
        }
        redacted[key] = copy;
      }
    }

    // Error instances lose their message under JSON serialization
    if (redacted.error instanceof Error) {
      redacted.error = redacted.error.message;
    }

    return redacted;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta ? this.redactSensitive(meta) : {});
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta ? this.redactSensitive(meta) : {});
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta ? this.redactSensitive(meta) : {});
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta ? this.redactSensitive(meta) : {});
  }
}
