/**
 * Backup configuration builder.
 *
 * Reads from environment variables with sensible defaults.
 * All values can be overridden programmatically (the CLI passes its flags
 * as overrides).
 */

import { cleanPath } from '../exclude/exclusion-set.js';
import type { BackupConfig, LogFormat } from './types.js';
import { DEFAULT_BACKUP_CONFIG } from './types.js';

function getEnv(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

/** Unparseable values become NaN so validation can reject them */
function getEnvNumber(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  return Number(raw);
}

function getEnvBoolean(key: string, fallback: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  return raw.trim().toLowerCase() === 'true';
}

const VALID_LOG_FORMATS: LogFormat[] = ['pretty', 'json'];

function isLogFormat(value: string): value is LogFormat {
  return VALID_LOG_FORMATS.some((format) => format === value);
}

/**
 * Build backup config from environment variables and optional overrides.
 *
 * Environment variables:
 * - RRF_BACKUP_DOMAIN: Controller host name or IP (required unless overridden)
 * - RRF_BACKUP_PORT: Controller HTTP port (default: 80)
 * - RRF_BACKUP_PASSWORD: Connection password (default: reprap)
 * - RRF_BACKUP_DIR: Remote directory to back up (default: 0:/sys)
 * - RRF_BACKUP_OUT_DIR: Local output directory (required unless overridden)
 * - RRF_BACKUP_EXCLUDE: Comma-separated exclusion prefixes
 * - RRF_BACKUP_REMOVE_LOCAL: Remove files deleted on the controller (true|false)
 * - RRF_BACKUP_ATOMIC_WRITES: Write via temp file + rename (default: true)
 * - RRF_BACKUP_VERBOSE: Log every file decision (true|false)
 * - RRF_BACKUP_LOG_FORMAT: pretty|json (default: pretty)
 */
export function buildBackupConfig(overrides?: Partial<BackupConfig>): BackupConfig {
  const envExclude = process.env['RRF_BACKUP_EXCLUDE'];
  const excludes =
    overrides?.excludes ??
    (envExclude
      ? envExclude
          .split(',')
          .map((prefix) => prefix.trim())
          .filter((prefix) => prefix !== '')
      : [...DEFAULT_BACKUP_CONFIG.excludes]);

  const envLogFormat = getEnv('RRF_BACKUP_LOG_FORMAT', DEFAULT_BACKUP_CONFIG.logFormat);
  const logFormat =
    overrides?.logFormat ??
    (isLogFormat(envLogFormat) ? envLogFormat : DEFAULT_BACKUP_CONFIG.logFormat);

  return {
    domain: overrides?.domain ?? getEnv('RRF_BACKUP_DOMAIN', ''),
    port: overrides?.port ?? getEnvNumber('RRF_BACKUP_PORT', DEFAULT_BACKUP_CONFIG.port),
    password: overrides?.password ?? getEnv('RRF_BACKUP_PASSWORD', DEFAULT_BACKUP_CONFIG.password),
    dirToBackup: overrides?.dirToBackup ?? getEnv('RRF_BACKUP_DIR', DEFAULT_BACKUP_CONFIG.dirToBackup),
    outDir: overrides?.outDir ?? getEnv('RRF_BACKUP_OUT_DIR', ''),
    excludes,
    removeLocal:
      overrides?.removeLocal ?? getEnvBoolean('RRF_BACKUP_REMOVE_LOCAL', DEFAULT_BACKUP_CONFIG.removeLocal),
    atomicWrites:
      overrides?.atomicWrites ?? getEnvBoolean('RRF_BACKUP_ATOMIC_WRITES', DEFAULT_BACKUP_CONFIG.atomicWrites),
    verbose: overrides?.verbose ?? getEnvBoolean('RRF_BACKUP_VERBOSE', DEFAULT_BACKUP_CONFIG.verbose),
    logFormat,
  };
}

/**
 * Validate a backup configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateBackupConfig(config: BackupConfig): string[] {
  const errors: string[] = [];

  if (!config.domain) {
    errors.push('domain is required');
  }

  if (!config.outDir) {
    errors.push('outDir is required');
  }

  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    errors.push(`port must be an integer between 1 and 65535 (got ${String(config.port)})`);
  }

  if (cleanPath(config.dirToBackup) === '') {
    errors.push('dirToBackup must not be empty');
  }

  for (const prefix of config.excludes) {
    if (cleanPath(prefix) === '') {
      errors.push(`exclude prefix ${JSON.stringify(prefix)} would exclude everything`);
    }
  }

  if (!VALID_LOG_FORMATS.includes(config.logFormat)) {
    errors.push(`logFormat must be one of: ${VALID_LOG_FORMATS.join(', ')}`);
  }

  return errors;
}
