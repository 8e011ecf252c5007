/**
 * Helpers for the rr_filelist wire format.
 *
 * RepRapFirmware reports timestamps as `YYYY-MM-DDTHH:mm:ss` without any
 * offset; they are interpreted in the local time zone of this machine.
 */

import type { RemoteEntry, RemoteEntryKind } from './types.js';

/** One page of an rr_filelist response */
export interface FileListPage {
  dir: string;
  first: number;
  files: RemoteEntry[];
  /** Index of the first entry on the next page, 0 when complete */
  next: number;
}

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/;

const TYPE_DIRECTORY = 'd';
const TYPE_FILE = 'f';

/**
 * Parse an RRF timestamp in local time. Returns null for malformed input.
 */
export function parseRrfTimestamp(value: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const [year, month, day, hour, minute, second] = match.slice(1).map((part) => parseInt(part, 10));
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hour === undefined ||
    minute === undefined ||
    second === undefined
  ) {
    return null;
  }

  if (hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  const date = new Date(year, month - 1, day, hour, minute, second);

  // Reject dates the Date constructor silently rolled over (e.g. month 13)
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }

  return date;
}

/**
 * Format a date the way RRF expects it in rr_connect and rr_upload.
 */
export function formatRrfTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Stable sort: directories before files, each group by the UTF-8 bytes of
 * the name.
 */
export function sortEntries(entries: readonly RemoteEntry[]): RemoteEntry[] {
  return [...entries].sort((a, b) => {
    if (a.kind === b.kind) {
      return Buffer.compare(Buffer.from(a.name, 'utf-8'), Buffer.from(b.name, 'utf-8'));
    }
    return a.kind === 'directory' ? -1 : 1;
  });
}

const PATH_SEPARATOR_OR_NUL = /[/\\\0]/;

/**
 * Why `name` is not usable as a single local path segment, or null if it is.
 * Entry names are joined onto local directories, so anything that could
 * step outside the parent is refused.
 */
export function checkEntryName(name: string): string | null {
  if (name === '') {
    return 'file entry has no name';
  }
  if (name === '.' || name === '..' || PATH_SEPARATOR_OR_NUL.test(name)) {
    return `unsafe entry name ${JSON.stringify(name)}`;
  }
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function parseEntry(raw: unknown): RemoteEntry | string {
  if (!isRecord(raw)) {
    return 'file entry is not an object';
  }

  const { type, name, size, date } = raw;

  let kind: RemoteEntryKind;
  if (type === TYPE_DIRECTORY) {
    kind = 'directory';
  } else if (type === TYPE_FILE) {
    kind = 'file';
  } else {
    return `unknown entry type ${JSON.stringify(type)}`;
  }

  if (typeof name !== 'string') {
    return 'file entry has no name';
  }
  const nameProblem = checkEntryName(name);
  if (nameProblem) {
    return nameProblem;
  }

  let modifiedAt = new Date(0);
  if (date !== undefined) {
    const parsed = typeof date === 'string' ? parseRrfTimestamp(date) : null;
    if (!parsed) {
      return `invalid date ${JSON.stringify(date)} for ${name}`;
    }
    modifiedAt = parsed;
  }

  return {
    kind,
    name,
    size: typeof size === 'number' ? size : 0,
    modifiedAt,
  };
}

/**
 * Validate and convert one decoded rr_filelist body.
 * Returns an error message instead of a page when the body is unusable.
 */
export function parseFileListPage(body: unknown): FileListPage | string {
  if (!isRecord(body)) {
    return 'response is not a JSON object';
  }

  if ('err' in body) {
    return `controller reported error ${JSON.stringify(body['err'])}`;
  }

  const { dir, first, files, next } = body;
  if (typeof dir !== 'string' || !Array.isArray(files)) {
    return 'response is missing "dir" or "files"';
  }

  const entries: RemoteEntry[] = [];
  for (const raw of files) {
    const entry = parseEntry(raw);
    if (typeof entry === 'string') {
      return entry;
    }
    entries.push(entry);
  }

  return {
    dir,
    first: typeof first === 'number' ? first : 0,
    files: entries,
    next: typeof next === 'number' ? next : 0,
  };
}
