/**
 * SyncEngine - mirrors a remote directory tree into a local directory.
 *
 * For every directory it visits, strictly in this order:
 * 1. Skip the whole subtree if the remote path is excluded
 * 2. Fetch the remote listing
 * 3. Create the local directory if needed and (re)write its ownership marker
 * 4. Download files that are missing locally or older than the remote copy,
 *    then set their mtime to the remote timestamp
 * 5. Optionally remove local orphans (files and managed directories only)
 * 6. Recurse into each subdirectory, one subtree at a time
 *
 * Any error aborts the whole run. Files written before the failure stay
 * on disk.
 */

import * as fs from 'node:fs/promises';
import type { Stats } from 'node:fs';
import * as path from 'node:path';
import type { Logger } from 'pino';
import type { ExclusionSet } from '../exclude/exclusion-set.js';
import { checkEntryName } from '../remote/listing.js';
import { RemoteError } from '../remote/types.js';
import type { RemoteEntry, RemoteFileManager, RemoteListing } from '../remote/types.js';
import { withContext } from './errors.js';
import {
  OWNERSHIP_MARKER,
  ensureManagedDirectory,
  isManagedDirectory,
  isNotFound,
} from './ownership.js';
import type { FileOutcome, SyncEngineOptions, SyncStats } from './types.js';
import { emptySyncStats } from './types.js';

/** Suffix of the temporary file a download is written to before the rename */
export const PARTIAL_DOWNLOAD_SUFFIX = '.rrf-backup-partial';

export class SyncEngine {
  private readonly remote: RemoteFileManager;
  private readonly logger: Logger;
  private readonly atomicWrites: boolean;

  constructor(remote: RemoteFileManager, logger: Logger, options?: SyncEngineOptions) {
    this.remote = remote;
    this.logger = logger.child({ component: 'sync-engine' });
    this.atomicWrites = options?.atomicWrites ?? true;
  }

  /**
   * Synchronize `remotePath` and everything below it into `localPath`.
   *
   * @param removeOrphans - delete local entries that no longer exist remotely
   * @returns counters for the run; rejects with the first error encountered
   */
  async syncFolder(
    remotePath: string,
    localPath: string,
    exclusions: ExclusionSet,
    removeOrphans: boolean
  ): Promise<SyncStats> {
    const startTime = Date.now();
    const stats = emptySyncStats();

    await this.syncDirectory(remotePath, localPath, exclusions, removeOrphans, stats);

    stats.durationMs = Date.now() - startTime;
    return stats;
  }

  private async syncDirectory(
    remotePath: string,
    localPath: string,
    exclusions: ExclusionSet,
    removeOrphans: boolean,
    stats: SyncStats
  ): Promise<void> {
    if (exclusions.contains(remotePath)) {
      this.logger.info({ remotePath }, 'Excluding directory');
      stats.directoriesExcluded++;
      return;
    }

    this.logger.info({ remotePath }, 'Fetching file list');
    const listing = await this.remote.listDirectory(remotePath);
    assertSafeNames(listing);

    const localDir = await ensureManagedDirectory(localPath);
    if (localDir.created) {
      this.logger.debug({ localPath: localDir.path }, 'Created directory');
    }
    stats.directoriesVisited++;

    this.logger.info(
      { remotePath, localPath: localDir.path },
      'Downloading new/changed files'
    );
    for (const entry of listing.entries) {
      if (entry.kind === 'directory') {
        continue;
      }
      const outcome = await this.reconcileFile(remotePath, localDir.path, entry, exclusions, stats);
      this.count(outcome, stats);
    }

    if (removeOrphans) {
      this.logger.info({ localPath: localDir.path }, 'Removing no longer existing files');
      await this.removeOrphans(listing, localDir.path, stats);
    }

    for (const entry of listing.entries) {
      if (entry.kind !== 'directory') {
        continue;
      }
      await this.syncDirectory(
        `${remotePath}/${entry.name}`,
        path.join(localDir.path, entry.name),
        exclusions,
        removeOrphans,
        stats
      );
    }
  }

  private async reconcileFile(
    remoteDir: string,
    localDir: string,
    entry: RemoteEntry,
    exclusions: ExclusionSet,
    stats: SyncStats
  ): Promise<FileOutcome> {
    const remoteFile = `${remoteDir}/${entry.name}`;

    if (exclusions.contains(remoteFile)) {
      this.logger.debug({ remoteFile }, 'Excluding');
      return 'excluded';
    }

    const localFile = path.join(localDir, entry.name);
    const localStats = await this.statIfExists(localFile);

    if (localStats && !isOutdated(localStats, entry)) {
      this.logger.debug({ remoteFile }, 'Up-to-date');
      return 'up-to-date';
    }

    const { data, durationMs } = await this.remote.fetchFile(remoteFile);
    await this.writeFile(localFile, data, entry.modifiedAt);
    stats.bytesDownloaded += data.length;

    const outcome: FileOutcome = localStats ? 'updated' : 'added';
    this.logger.debug(
      {
        remoteFile,
        size: data.length,
        kibPerSecond: durationMs > 0 ? Number((data.length / 1024 / (durationMs / 1000)).toFixed(1)) : null,
      },
      outcome === 'added' ? 'Added' : 'Updated'
    );
    return outcome;
  }

  private async statIfExists(localFile: string): Promise<Stats | null> {
    return withContext('stat', localFile, async () => {
      try {
        return await fs.stat(localFile);
      } catch (err) {
        if (isNotFound(err)) {
          return null;
        }
        throw err;
      }
    });
  }

  /**
   * Write a download and align its timestamps with the remote entry, which
   * is what makes a second run over an unchanged tree download nothing.
   */
  private async writeFile(localFile: string, data: Buffer, modifiedAt: Date): Promise<void> {
    if (!this.atomicWrites) {
      await withContext('write', localFile, () => fs.writeFile(localFile, data));
      await withContext('utimes', localFile, () => fs.utimes(localFile, modifiedAt, modifiedAt));
      return;
    }

    const partialFile = path.join(
      path.dirname(localFile),
      `.${path.basename(localFile)}${PARTIAL_DOWNLOAD_SUFFIX}`
    );
    try {
      await withContext('write', partialFile, () => fs.writeFile(partialFile, data));
      await withContext('utimes', partialFile, () => fs.utimes(partialFile, modifiedAt, modifiedAt));
      await withContext('write', localFile, () => fs.rename(partialFile, localFile));
    } catch (err) {
      await fs.rm(partialFile, { force: true }).catch((cleanupErr: unknown) => {
        this.logger.warn(
          { path: partialFile, error: cleanupErr instanceof Error ? cleanupErr.message : String(cleanupErr) },
          'Failed to remove partial download'
        );
      });
      throw err;
    }
  }

  /**
   * Delete local children missing from the remote listing. Directories
   * without the ownership marker are left alone.
   */
  private async removeOrphans(listing: RemoteListing, localDir: string, stats: SyncStats): Promise<void> {
    const remoteNames = new Set(listing.entries.map((entry) => entry.name));
    const children = await withContext('readdir', localDir, () =>
      fs.readdir(localDir, { withFileTypes: true })
    );

    for (const child of children) {
      if (remoteNames.has(child.name) || child.name === OWNERSHIP_MARKER) {
        continue;
      }

      const isDirectory = child.isDirectory();
      if (isDirectory && !(await isManagedDirectory(localDir, child.name))) {
        this.logger.debug({ localDir, name: child.name }, 'Keeping unmanaged directory');
        continue;
      }

      const childPath = path.join(localDir, child.name);
      await withContext('remove', childPath, () => fs.rm(childPath, { recursive: isDirectory }));
      stats.entriesRemoved++;
      this.logger.debug({ localPath: childPath }, 'Removed');
    }
  }

  private count(outcome: FileOutcome, stats: SyncStats): void {
    switch (outcome) {
      case 'added':
        stats.filesAdded++;
        break;
      case 'updated':
        stats.filesUpdated++;
        break;
      case 'up-to-date':
        stats.filesUpToDate++;
        break;
      case 'excluded':
        stats.filesExcluded++;
        break;
    }
  }
}

/**
 * Reject a listing before anything is written if any entry name could
 * resolve outside its local directory.
 */
function assertSafeNames(listing: RemoteListing): void {
  for (const entry of listing.entries) {
    const problem = checkEntryName(entry.name);
    if (problem) {
      throw new RemoteError(`Invalid file list for ${listing.directoryPath}: ${problem}`, listing.directoryPath);
    }
  }
}

/**
 * A local copy is outdated only if its mtime is strictly before the remote
 * timestamp; equal timestamps count as up to date.
 */
export function isOutdated(localStats: Pick<Stats, 'mtime'>, entry: Pick<RemoteEntry, 'modifiedAt'>): boolean {
  return localStats.mtime.getTime() < entry.modifiedAt.getTime();
}
