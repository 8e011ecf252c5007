/**
 * rrf-backup backup command
 *
 * Mirrors a directory of a RepRapFirmware controller into a local folder.
 * Exit status: 0 on success or when the controller is unreachable,
 * 1 when the sync fails, 2 for invalid configuration.
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import type { Logger } from 'pino';
import {
  ConfigError,
  DEFAULT_REMOTE_DIR,
  SyncError,
  buildBackupConfig,
  runBackup,
} from '@rrf-backup/file-sync';
import type { BackupConfig, LogFormat, RemoteFileManager, SyncStats } from '@rrf-backup/file-sync';
import { createLogger } from '../utils/logger.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIG_ERROR = 2;

/** Options as parsed by commander */
interface BackupCommandOptions {
  domain?: string;
  port?: number;
  password?: string;
  dirToBackup?: string;
  outDir?: string;
  exclude: string[];
  removeLocal?: boolean;
  atomicWrites: boolean;
  verbose?: boolean;
  logFormat?: LogFormat;
}

/** Collaborators that tests replace */
export interface BackupDependencies {
  remote?: RemoteFileManager;
  logger?: Logger;
  print?: (line: string) => void;
  printError?: (line: string) => void;
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}

export function parseLogFormat(value: string): LogFormat {
  if (value === 'pretty' || value === 'json') {
    return value;
  }
  throw new InvalidArgumentError('Log format must be "pretty" or "json".');
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(2))} ${sizes[i] ?? 'B'}`;
}

export function formatSummary(stats: SyncStats): string {
  const parts = [
    `${stats.filesAdded} added`,
    `${stats.filesUpdated} updated`,
    `${stats.filesUpToDate} up-to-date`,
  ];
  if (stats.filesExcluded > 0) parts.push(`${stats.filesExcluded} excluded`);
  if (stats.entriesRemoved > 0) parts.push(`${stats.entriesRemoved} removed`);

  const dirs = stats.directoriesVisited === 1 ? 'directory' : 'directories';
  return `${parts.join(', ')} across ${stats.directoriesVisited} ${dirs} (${formatBytes(stats.bytesDownloaded)} downloaded)`;
}

/**
 * Turn commander options into config overrides. Only values given on the
 * command line override the environment.
 */
export function toConfigOverrides(options: BackupCommandOptions, command: Command): Partial<BackupConfig> {
  const fromCli = (key: keyof BackupCommandOptions): boolean =>
    command.getOptionValueSource(key) === 'cli';

  const overrides: Partial<BackupConfig> = {};
  if (options.domain !== undefined) overrides.domain = options.domain;
  if (options.port !== undefined) overrides.port = options.port;
  if (options.password !== undefined) overrides.password = options.password;
  if (options.dirToBackup !== undefined) overrides.dirToBackup = options.dirToBackup;
  if (options.outDir !== undefined) overrides.outDir = options.outDir;
  if (options.exclude.length > 0) overrides.excludes = options.exclude;
  if (options.removeLocal !== undefined) overrides.removeLocal = options.removeLocal;
  if (fromCli('atomicWrites')) overrides.atomicWrites = options.atomicWrites;
  if (options.verbose !== undefined) overrides.verbose = options.verbose;
  if (options.logFormat !== undefined) overrides.logFormat = options.logFormat;
  return overrides;
}

/**
 * Run a backup and return the process exit status.
 */
export async function executeBackup(
  overrides: Partial<BackupConfig>,
  deps: BackupDependencies = {}
): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));
  const printError = deps.printError ?? ((line: string) => console.error(line));

  const config = buildBackupConfig(overrides);
  const logger = deps.logger ?? createLogger(config);

  try {
    const result = await runBackup(config, logger, deps.remote);

    if (result.status === 'unavailable') {
      print(chalk.yellow(`Controller ${config.domain} currently not available`));
      return EXIT_OK;
    }

    print(chalk.green(`✓ ${formatSummary(result.stats)}`));
    return EXIT_OK;
  } catch (err) {
    if (err instanceof ConfigError) {
      for (const error of err.errors) {
        printError(chalk.red(`✗ ${error}`));
      }
      return EXIT_CONFIG_ERROR;
    }

    const message = err instanceof Error ? err.message : String(err);
    logger.error(
      err instanceof SyncError
        ? { error: message, operation: err.operation, path: err.path }
        : { error: message },
      'Backup failed'
    );
    printError(chalk.red(`✗ Backup failed: ${message}`));
    return EXIT_FAILURE;
  }
}

export function registerBackupCommand(program: Command): void {
  program
    .command('backup', { isDefault: true })
    .description('Back up a controller directory into a local folder')
    .option('-d, --domain <host>', 'Host name or IP address of the controller')
    .option('-p, --port <port>', 'HTTP port of the controller (default: 80)', parsePort)
    .option('--password <password>', 'Connection password (default: reprap)')
    .option('--dir-to-backup <dir>', `Directory on the controller to back up (default: ${DEFAULT_REMOTE_DIR})`)
    .option('-o, --out-dir <dir>', 'Output directory of the backup')
    .option(
      '-e, --exclude <prefix>',
      'Exclude remote paths starting with this string (repeatable)',
      collect,
      []
    )
    .option('--remove-local', 'Remove local files that have been deleted on the controller')
    .option('--no-atomic-writes', 'Write downloads in place instead of via a temporary file')
    .option('-v, --verbose', 'Log every file decision')
    .option('--log-format <format>', 'pretty or json (default: pretty)', parseLogFormat)
    .action(async (options: BackupCommandOptions, command: Command) => {
      process.exitCode = await executeBackup(toConfigOverrides(options, command));
    });
}
