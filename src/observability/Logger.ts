// src/observability/Logger.ts

import winston from 'winston';

export interface LoggerConfig {
  level?: 'debug' | 'info' | 'warn' | 'error';
  format?: 'json' | 'pretty';
}

const SECRET_KEYS = ['accessToken', 'refreshToken', 'clientSecret', 'code'] as const;

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
      defaultMeta: { service: 'saved-hub' },
      transports: [new winston.transports.Console()],
    });
  }

  private redactSensitive(meta: Record<string, unknown>): Record<string, unknown> {
    const redacted = { ...meta };

    for (const key of SECRET_KEYS) {
      if (key in redacted) redacted[key] = '[REDACTED]';
    }

    // Redact nested credential
    const credential = redacted.credential;
    if (credential && typeof credential === 'object') {
      const copy: Record<string, unknown> = { ...credential };
      if ('accessToken' in copy) copy.accessToken = '[REDACTED]';
      if ('refreshToken' in copy) copy.refreshToken = '[REDACTED]';
      redacted.credential = copy;
    }

    // Errors don't survive JSON serialization
    const error = redacted.error;
    if (error instanceof Error) {
      redacted.error = { name: error.name, message: error.message };
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
