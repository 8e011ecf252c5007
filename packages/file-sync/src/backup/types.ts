/**
 * Types for a complete backup run: connect to the controller, then mirror
 * one remote directory into one local directory.
 */

import type { SyncStats } from '../sync/types.js';

/** Default remote directory: the controller's system configuration */
export const DEFAULT_REMOTE_DIR = '0:/sys';

export type LogFormat = 'pretty' | 'json';

export interface BackupConfig {
  /** Host name or IP address of the controller */
  domain: string;

  /** HTTP port of the controller */
  port: number;

  /** Password passed to rr_connect */
  password: string;

  /** Remote directory to back up */
  dirToBackup: string;

  /** Local output directory */
  outDir: string;

  /** Raw exclusion prefixes, normalized when the ExclusionSet is built */
  excludes: string[];

  /** Remove local files that no longer exist on the controller */
  removeLocal: boolean;

  /** Write downloads via temp file + rename */
  atomicWrites: boolean;

  /** Log every file decision */
  verbose: boolean;

  logFormat: LogFormat;
}

export const DEFAULT_BACKUP_CONFIG: Omit<BackupConfig, 'domain' | 'outDir'> = {
  port: 80,
  password: 'reprap',
  dirToBackup: DEFAULT_REMOTE_DIR,
  excludes: [],
  removeLocal: false,
  atomicWrites: true,
  verbose: false,
  logFormat: 'pretty',
};

/** Outcome of a backup run that did not fail */
export type BackupResult =
  | { status: 'completed'; stats: SyncStats }
  | { status: 'unavailable'; reason: string };
