/**
 * shared/logger.ts — Structured logging via Pino
 *
 * Development: pino-pretty (colorized, human-readable)
 * Production:  JSON lines
 * Tests:       LOG_LEVEL=silent from vitest.config.ts
 *
 * Modules take a child logger bound to their name:
 *   const log = childLogger({ module: 'navigation' });
 */
import pino from 'pino';
import { env } from '../config/env.ts';

export const logger = pino({
  level: env.LOG_LEVEL,
  transport: env.NODE_ENV === 'development'
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'HH:MM:ss', ignore: 'pid,hostname,service' } }
    : undefined, // JSON otherwise
  base: {
    service: 'gap-collector',
    version: process.env.npm_package_version || '1.0.0',
    env: env.NODE_ENV,
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
  redact: {
    // Broker phone numbers end up in detail logs at trace level
    paths: ['*.phone1', '*.phone2'],
    censor: '[REDACTED]',
  },
});

export type Logger = pino.Logger;

/**
 * Create a child logger with additional context.
 * Usage: const log = childLogger({ module: 'scheduler', listingId });
 */
export function childLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
