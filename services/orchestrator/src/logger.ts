import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { config } from './config';

export type { Logger };

// Paths that may carry the upstream bearer credential.
export const REDACT_PATHS = [
  'req.headers.authorization',
  'headers.authorization',
  'headers.Authorization',
  'credential',
  '*.credential',
];

export function loggerOptions(): LoggerOptions {
  return {
    level: config.log.level,
    redact: { paths: REDACT_PATHS, censor: '[redacted]' },
    transport: config.log.pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname',
            singleLine: true,
          },
        }
      : undefined,
  };
}

export const logger: Logger = pino(loggerOptions());
