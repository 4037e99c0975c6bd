/**
 * Logging with Pino - provider keys are redacted.
 * Logs go to stderr so the report on stdout stays clean.
 */

import pino from 'pino';

const redactPaths = [
  'apiKey',
  'api_key',
  'finnhubApiKey',
  'authorization',
  'Authorization',
  'token',
  '*.apiKey',
  '*.token',
  'headers.authorization',
];

const options: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || 'info',
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
};

const usePretty =
  process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

export const logger = usePretty
  ? pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  : pino(options, pino.destination(2));

export type Logger = pino.Logger;

export function createChildLogger(name: string): Logger {
  return logger.child({ module: name });
}
