/**
 * Runs one backup: validate config, check the controller is reachable,
 * then mirror the configured remote directory into the output directory.
 */

import * as path from 'node:path';
import type { Logger } from 'pino';
import { ExclusionSet, cleanPath } from '../exclude/exclusion-set.js';
import { RrfFileManager } from '../remote/rrf-client.js';
import type { RemoteFileManager } from '../remote/types.js';
import { ConfigError } from '../sync/errors.js';
import { SyncEngine } from '../sync/sync-engine.js';
import { validateBackupConfig } from './config.js';
import type { BackupConfig, BackupResult } from './types.js';

/**
 * Rejects with ConfigError before any network activity when the config is
 * invalid. A controller that cannot be reached is not an error: the result
 * has status 'unavailable'. Sync failures propagate.
 */
export async function runBackup(
  config: BackupConfig,
  logger: Logger,
  remote?: RemoteFileManager
): Promise<BackupResult> {
  const errors = validateBackupConfig(config);
  if (errors.length > 0) {
    throw new ConfigError(errors);
  }

  const log = logger.child({ component: 'backup' });
  const rfm = remote ?? new RrfFileManager({ domain: config.domain, port: config.port });

  log.debug({ domain: config.domain, port: config.port }, 'Trying to connect');
  try {
    await rfm.connect(config.password);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    log.info({ reason }, 'Controller currently not available');
    return { status: 'unavailable', reason };
  }

  const engine = new SyncEngine(rfm, logger, { atomicWrites: config.atomicWrites });
  const stats = await engine.syncFolder(
    cleanPath(config.dirToBackup),
    path.resolve(config.outDir),
    ExclusionSet.from(config.excludes),
    config.removeLocal
  );

  log.info({ ...stats }, 'Backup complete');
  return { status: 'completed', stats };
}
