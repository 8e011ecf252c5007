/** Local filesystem operations the sync engine reports failures for */
export type SyncOperation = 'stat' | 'mkdir' | 'mark' | 'write' | 'utimes' | 'readdir' | 'remove';

/**
 * A local filesystem failure during a sync run.
 * The original error is kept as `cause`.
 */
export class SyncError extends Error {
  public readonly operation: SyncOperation;
  public readonly path: string;

  constructor(operation: SyncOperation, path: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${operation} failed for ${path}: ${detail}`, { cause });
    this.name = 'SyncError';
    this.operation = operation;
    this.path = path;
  }
}

/** Invalid backup configuration, rejected before any network activity */
export class ConfigError extends Error {
  public readonly errors: readonly string[];

  constructor(errors: readonly string[]) {
    super(`Invalid backup config: ${errors.join('; ')}`);
    this.name = 'ConfigError';
    this.errors = errors;
  }
}

/**
 * Run a filesystem operation, converting any failure into a SyncError.
 */
export async function withContext<T>(
  operation: SyncOperation,
  path: string,
  fn: () => Promise<T>
): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof SyncError) {
      throw err;
    }
    throw new SyncError(operation, path, err);
  }
}
