/**
 * Pino root logger and per-module children.
 */

import pino, { type Logger } from 'pino';
import { loadEnvConfig } from '@/core/env';

const env = loadEnvConfig();

// The fiat provider key travels in the request path, so URLs are redacted too
const redactPaths = [
  'apiKey',
  'exchangeRateApiKey',
  'url',
  '*.apiKey',
  '*.exchangeRateApiKey',
  '*.url',
  'headers.authorization',
];

export const logger: Logger = pino({
  level: env.logLevel,
  base: { service: 'fx-ledger' },
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
  transport:
    env.nodeEnv === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname,service',
          },
        }
      : undefined,
});

export function createChildLogger(module: string, bindings: Record<string, string> = {}): Logger {
  return logger.child({ module, ...bindings });
}
