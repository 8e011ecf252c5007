/**
 * pino logger for the CLI.
 *
 * Human-readable output through the pino-pretty transport by default,
 * newline-delimited JSON with `--log-format json`.
 */

import { pino } from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import type { BackupConfig } from '@rrf-backup/file-sync';

export function buildLoggerOptions(config: Pick<BackupConfig, 'verbose' | 'logFormat'>): LoggerOptions {
  return {
    name: 'rrf-backup',
    level: config.verbose ? 'debug' : 'info',
    transport:
      config.logFormat === 'pretty'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              ignore: 'pid,hostname,name',
              translateTime: 'SYS:HH:MM:ss',
            },
          }
        : undefined,
  };
}

export function createLogger(config: Pick<BackupConfig, 'verbose' | 'logFormat'>): Logger {
  return pino(buildLoggerOptions(config));
}
