// src/observability/Logger.ts

import winston from 'winston';

export interface LoggerConfig {
  level?: 'debug' | 'info' | 'warn' | 'error';
  format?: 'json' | 'pretty';
  silent?: boolean;
}

const REDACTED = '[REDACTED]';
const SENSITIVE_KEYS = new Set([
  'token',
  'githubToken',
  'apiKey',
  'authorization',
  'Authorization',
  'webhookUrl',
]);

export class Logger {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}, base?: winston.Logger) {
    if (base) {
      this.logger = base;
      return;
    }

    const format =
      config.format === 'pretty'
        ? winston.format.combine(
            winston.format.colorize(),
            winston.format.timestamp(),
            winston.format.simple()
          )
        : winston.format.combine(winston.format.timestamp(), winston.format.json());

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      format,
      silent: config.silent ?? false,
      transports: [new winston.transports.Console()],
    });
  }

  /**
   * Logger that stamps `meta` (run id, lane, ...) onto every line it writes.
   */
  child(meta: Record<string, unknown>): Logger {
    return new Logger({}, this.logger.child(this.redactSensitive(meta)));
  }

  private redactSensitive(obj: Record<string, unknown>): Record<string, unknown> {
    const redacted: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(obj)) {
      if (SENSITIVE_KEYS.has(key) && value !== undefined && value !== null) {
        redacted[key] = REDACTED;
      } else if (isPlainObject(value)) {
        // one level is enough for settings blocks and request headers
        const nested: Record<string, unknown> = {};
        for (const [nestedKey, nestedValue] of Object.entries(value)) {
          nested[nestedKey] =
            SENSITIVE_KEYS.has(nestedKey) && nestedValue !== undefined && nestedValue !== null
              ? REDACTED
              : nestedValue;
        }
        redacted[key] = nested;
      } else {
        redacted[key] = value;
      }
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

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
