/**
 * Types for the sync engine module.
 */

/** Options for constructing a SyncEngine */
export interface SyncEngineOptions {
  /**
   * Write downloads to a temporary sibling and rename it into place, so a
   * failed download never leaves a truncated file behind (default: true)
   */
  atomicWrites?: boolean;
}

/** What a reconciled file ended up as */
export type FileOutcome = 'added' | 'updated' | 'up-to-date' | 'excluded';

/** Counters for a completed sync run */
export interface SyncStats {
  /** Directories listed and written into */
  directoriesVisited: number;

  /** Directories skipped because of an exclusion prefix */
  directoriesExcluded: number;

  /** Files that did not exist locally */
  filesAdded: number;

  /** Files whose local copy was older than the remote one */
  filesUpdated: number;

  filesUpToDate: number;
  filesExcluded: number;

  /** Local files and managed directories deleted by the orphan pass */
  entriesRemoved: number;

  bytesDownloaded: number;

  /** Duration of the whole run in milliseconds */
  durationMs: number;
}

export function emptySyncStats(): SyncStats {
  return {
    directoriesVisited: 0,
    directoriesExcluded: 0,
    filesAdded: 0,
    filesUpdated: 0,
    filesUpToDate: 0,
    filesExcluded: 0,
    entriesRemoved: 0,
    bytesDownloaded: 0,
    durationMs: 0,
  };
}
