/**
 * Ownership markers.
 *
 * Every local directory the engine writes into gets a zero-byte marker
 * file. Only directories carrying the marker are ever removed by the
 * orphan pass; anything else next to a managed tree belongs to the user.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { withContext } from './errors.js';

/** Reserved name of the marker file, shared with existing backup trees */
export const OWNERSHIP_MARKER = '.duetbackup';

const DIRECTORY_MODE = 0o755;

export interface EnsuredDirectory {
  /** Absolute path of the directory */
  path: string;

  /** Whether the directory had to be created */
  created: boolean;
}

/**
 * Make sure `localPath` exists and carries the marker. The marker is
 * (re)written even when the directory already existed, which adopts a
 * user-created directory into the managed tree.
 */
export async function ensureManagedDirectory(localPath: string): Promise<EnsuredDirectory> {
  const absolutePath = path.resolve(localPath);

  const exists = await withContext('stat', absolutePath, async () => {
    try {
      await fs.stat(absolutePath);
      return true;
    } catch (err) {
      if (isNotFound(err)) {
        return false;
      }
      throw err;
    }
  });

  if (!exists) {
    await withContext('mkdir', absolutePath, () =>
      fs.mkdir(absolutePath, { recursive: true, mode: DIRECTORY_MODE })
    );
  }

  const markerPath = path.join(absolutePath, OWNERSHIP_MARKER);
  await withContext('mark', markerPath, () => fs.writeFile(markerPath, ''));

  return { path: absolutePath, created: !exists };
}

/**
 * True iff `childName` below `parentPath` is a directory containing the
 * marker. Any filesystem error yields false.
 */
export async function isManagedDirectory(parentPath: string, childName: string): Promise<boolean> {
  const childPath = path.join(parentPath, childName);
  try {
    const stats = await fs.lstat(childPath);
    if (!stats.isDirectory()) {
      return false;
    }
    await fs.stat(path.join(childPath, OWNERSHIP_MARKER));
    return true;
  } catch {
    return false;
  }
}

export function isNotFound(err: unknown): boolean {
  return (
    err instanceof Error &&
    'code' in err &&
    err.code === 'ENOENT'
  );
}
