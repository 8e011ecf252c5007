// Exclusion module
export { ExclusionSet, cleanPath } from './exclude/exclusion-set.js';

// Remote module
export { RrfFileManager } from './remote/rrf-client.js';
export {
  parseRrfTimestamp,
  formatRrfTimestamp,
  sortEntries,
  checkEntryName,
  parseFileListPage,
} from './remote/listing.js';
export { RemoteError } from './remote/types.js';

export type { FileListPage } from './remote/listing.js';
export type {
  RemoteEntry,
  RemoteEntryKind,
  RemoteListing,
  DownloadedFile,
  RemoteFileManager,
  RrfFileManagerOptions,
} from './remote/types.js';

// Sync module
export { SyncEngine, isOutdated, PARTIAL_DOWNLOAD_SUFFIX } from './sync/sync-engine.js';
export { OWNERSHIP_MARKER, ensureManagedDirectory, isManagedDirectory } from './sync/ownership.js';
export { SyncError, ConfigError } from './sync/errors.js';
export { emptySyncStats } from './sync/types.js';

export type { EnsuredDirectory } from './sync/ownership.js';
export type { SyncOperation } from './sync/errors.js';
export type { SyncEngineOptions, SyncStats, FileOutcome } from './sync/types.js';

// Backup module
export { runBackup } from './backup/backup-runner.js';
export { buildBackupConfig, validateBackupConfig } from './backup/config.js';
export { DEFAULT_BACKUP_CONFIG, DEFAULT_REMOTE_DIR } from './backup/types.js';

export type { BackupConfig, BackupResult, LogFormat } from './backup/types.js';
