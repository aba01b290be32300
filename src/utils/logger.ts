/**
 * Logging with Pino - API keys are redacted
 */

import pino from 'pino';

const redactPaths = [
  'apiKey',
  'api_key',
  'access_key',
  'authorization',
  'Authorization',
  'password',
  'secret',
  'token',
  '*.apiKey',
  '*.api_key',
  '*.access_key',
  'headers.authorization',
  'headers.Authorization',
];

const nodeEnv = process.env.NODE_ENV;

export const logger = pino({
  // Tests stay quiet unless a level is asked for explicitly
  level: process.env.LOG_LEVEL || (nodeEnv === 'test' ? 'silent' : 'info'),
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
  transport:
    nodeEnv !== 'production' && nodeEnv !== 'test'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

export function createChildLogger(name: string) {
  return logger.child({ module: name });
}
