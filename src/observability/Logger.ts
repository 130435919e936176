// src/observability/Logger.ts

import winston from 'winston';

export interface LoggerConfig {
  level?: 'debug' | 'info' | 'warn' | 'error';
  format?: 'json' | 'pretty';
}

const REDACTED = '[REDACTED]';

const SENSITIVE_KEYS = [
  'accessTokenKey',
  'accessTokenSecret',
  'consumerKey',
  'consumerSecret',
  'tokenSecret',
  'oauth_signature',
];

export class Logger {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}) {
    const format =
      config.format === 'pretty'
        ? winston.format.combine(winston.format.colorize(), winston.format.simple())
        : winston.format.json();

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      format,
      transports: [new winston.transports.Console()],
    });
  }

  private redactSensitive(obj: unknown): unknown {
    if (!obj || typeof obj !== 'object') return obj;

    const redacted: Record<string, unknown> = { ...obj };

    for (const key of SENSITIVE_KEYS) {
      if (key in redacted) redacted[key] = REDACTED;
    }

    // Signed requests carry the OAuth header
    const headers = redacted.headers;
    if (headers && typeof headers === 'object') {
      const copy: Record<string, unknown> = { ...headers };
      for (const name of Object.keys(copy)) {
        if (name.toLowerCase() === 'authorization') copy[name] = REDACTED;
      }
      redacted.headers = copy;
    }

    return redacted;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.debug(message, sanitized);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.info(message, sanitized);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.warn(message, sanitized);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.redactSensitive(meta) : {};
    this.logger.error(message, sanitized);
  }
}
