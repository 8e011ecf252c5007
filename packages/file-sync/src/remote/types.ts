/**
 * Types for the remote file manager module.
 *
 * The remote side is a RepRapFirmware controller exposing its SD card
 * through the `rr_*` HTTP endpoints. The sync engine only depends on the
 * {@link RemoteFileManager} interface so tests can swap in a fake.
 */

/** Kind of a remote file-system node */
export type RemoteEntryKind = 'file' | 'directory';

/** A remote file-system node as returned by a directory listing */
export interface RemoteEntry {
  kind: RemoteEntryKind;

  /** Base name, unique within its parent listing */
  name: string;

  /** Size in bytes (meaningful for files only) */
  size: number;

  /** Last modification time, already resolved to the local time zone */
  modifiedAt: Date;
}

/** Snapshot of the immediate children of one remote directory */
export interface RemoteListing {
  /** The remote path that was queried */
  directoryPath: string;

  /** Directories first, then files, each group ordered by name */
  entries: readonly RemoteEntry[];
}

/** Contents of a downloaded file */
export interface DownloadedFile {
  data: Buffer;

  /** Wall-clock time the download took, including connection setup */
  durationMs: number;
}

/**
 * Operations the sync engine consumes from the remote side.
 */
export interface RemoteFileManager {
  /** Check reachability and authenticate. Rejects when the remote is unavailable. */
  connect(password: string): Promise<void>;

  /** Full listing of a directory, merged across pages and sorted. */
  listDirectory(path: string): Promise<RemoteListing>;

  /** Download a file. */
  fetchFile(path: string): Promise<DownloadedFile>;
}

/** Options for constructing an RrfFileManager */
export interface RrfFileManagerOptions {
  /** Host name or IP address of the controller */
  domain: string;

  /** HTTP port (default: 80) */
  port?: number;

  /** Custom fetch implementation (for testing). Default: global fetch */
  fetchFn?: typeof fetch;

  /** Safety limit on listing pages fetched for a single directory (default: 1000) */
  maxListPages?: number;
}

/** Error raised for failed or malformed exchanges with the controller */
export class RemoteError extends Error {
  /** HTTP status, or null when no response was received */
  public readonly statusCode: number | null;

  /** Request URL, or the remote path when a received listing is rejected */
  public readonly url: string;

  constructor(message: string, url: string, statusCode: number | null = null, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RemoteError';
    this.url = url;
    this.statusCode = statusCode;
  }
}
