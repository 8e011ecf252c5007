import { describe, it, expect } from 'vitest';
import {
  checkEntryName,
  formatRrfTimestamp,
  parseFileListPage,
  parseRrfTimestamp,
  sortEntries,
} from '../remote/listing.js';
import type { RemoteEntry } from '../remote/types.js';

function entry(kind: RemoteEntry['kind'], name: string): RemoteEntry {
  return { kind, name, size: 0, modifiedAt: new Date(0) };
}

describe('parseRrfTimestamp', () => {
  it('should parse a timestamp in local time', () => {
    const date = parseRrfTimestamp('2024-01-15T10:30:05');
    expect(date?.getTime()).toBe(new Date(2024, 0, 15, 10, 30, 5).getTime());
  });

  it('should reject malformed input', () => {
    expect(parseRrfTimestamp('garbage')).toBeNull();
    expect(parseRrfTimestamp('2024-01-15 10:30:05')).toBeNull();
    expect(parseRrfTimestamp('2024-01-15T10:30:05Z')).toBeNull();
  });

  it('should reject out-of-range fields', () => {
    expect(parseRrfTimestamp('2024-13-01T00:00:00')).toBeNull();
    expect(parseRrfTimestamp('2023-02-29T00:00:00')).toBeNull();
    expect(parseRrfTimestamp('2024-01-01T24:00:00')).toBeNull();
    expect(parseRrfTimestamp('2024-01-01T00:60:00')).toBeNull();
  });
});

describe('formatRrfTimestamp', () => {
  it('should zero-pad every field', () => {
    expect(formatRrfTimestamp(new Date(2024, 0, 5, 3, 4, 5))).toBe('2024-01-05T03:04:05');
  });
});

describe('sortEntries', () => {
  it('should put directories first and order each group by name', () => {
    const sorted = sortEntries([
      entry('file', 'b'),
      entry('directory', 'a'),
      entry('file', 'a'),
      entry('directory', 'z'),
    ]);

    expect(sorted.map((e) => `${e.kind}:${e.name}`)).toEqual([
      'directory:a',
      'directory:z',
      'file:a',
      'file:b',
    ]);
  });

  it('should compare names by UTF-8 bytes', () => {
    const sorted = sortEntries([entry('file', 'b'), entry('file', 'B'), entry('file', 'a')]);
    expect(sorted.map((e) => e.name)).toEqual(['B', 'a', 'b']);
  });

  it('should order astral characters after the private use area', () => {
    const sorted = sortEntries([entry('file', '\u{1F600}.g'), entry('file', '\uE000.g')]);
    expect(sorted.map((e) => e.name)).toEqual(['\uE000.g', '\u{1F600}.g']);
  });

  it('should not modify its input', () => {
    const input = [entry('file', 'b'), entry('directory', 'a')];
    sortEntries(input);
    expect(input.map((e) => e.name)).toEqual(['b', 'a']);
  });
});

describe('checkEntryName', () => {
  it('should accept plain names', () => {
    expect(checkEntryName('config.g')).toBeNull();
    expect(checkEntryName('.duetbackup')).toBeNull();
    expect(checkEntryName('...')).toBeNull();
  });

  it('should refuse names that leave the parent directory', () => {
    expect(checkEntryName('.')).toBe('unsafe entry name "."');
    expect(checkEntryName('..')).toBe('unsafe entry name ".."');
    expect(checkEntryName('../escape.txt')).toBe('unsafe entry name "../escape.txt"');
    expect(checkEntryName('a\\b')).toBe('unsafe entry name "a\\\\b"');
    expect(checkEntryName('a\0b')).toBe('unsafe entry name "a\\u0000b"');
  });
});

describe('parseFileListPage', () => {
  it('should convert entries', () => {
    const page = parseFileListPage({
      dir: '0:/sys',
      first: 0,
      files: [
        { type: 'd', name: 'macros', size: 0, date: '2024-01-15T10:30:00' },
        { type: 'f', name: 'config.g', size: 1234, date: '2024-01-15T10:31:00' },
      ],
      next: 0,
    });

    expect(page).toEqual({
      dir: '0:/sys',
      first: 0,
      files: [
        { kind: 'directory', name: 'macros', size: 0, modifiedAt: new Date(2024, 0, 15, 10, 30, 0) },
        { kind: 'file', name: 'config.g', size: 1234, modifiedAt: new Date(2024, 0, 15, 10, 31, 0) },
      ],
      next: 0,
    });
  });

  it('should default a missing date to the epoch and a missing size to zero', () => {
    const page = parseFileListPage({ dir: '0:/sys', files: [{ type: 'f', name: 'a.g' }] });
    expect(page).toEqual({
      dir: '0:/sys',
      first: 0,
      files: [{ kind: 'file', name: 'a.g', size: 0, modifiedAt: new Date(0) }],
      next: 0,
    });
  });

  it('should report a controller error body', () => {
    expect(parseFileListPage({ err: 2 })).toBe('controller reported error 2');
  });

  it('should report missing fields', () => {
    expect(parseFileListPage({ dir: '0:/sys' })).toBe('response is missing "dir" or "files"');
    expect(parseFileListPage([])).toBe('response is not a JSON object');
  });

  it('should report bad entries', () => {
    expect(parseFileListPage({ dir: '0:/sys', files: [{ type: 'x', name: 'a' }] })).toBe(
      'unknown entry type "x"'
    );
    expect(parseFileListPage({ dir: '0:/sys', files: [{ type: 'f', name: '' }] })).toBe(
      'file entry has no name'
    );
    expect(parseFileListPage({ dir: '0:/sys', files: [{ type: 'f', name: '../escape.txt' }] })).toBe(
      'unsafe entry name "../escape.txt"'
    );
    expect(parseFileListPage({ dir: '0:/sys', files: [{ type: 'd', name: '..' }] })).toBe(
      'unsafe entry name ".."'
    );
    expect(
      parseFileListPage({ dir: '0:/sys', files: [{ type: 'f', name: 'a.g', date: 'yesterday' }] })
    ).toBe('invalid date "yesterday" for a.g');
  });
});
