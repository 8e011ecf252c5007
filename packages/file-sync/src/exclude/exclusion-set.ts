/**
 * Prefix-based exclusion of remote paths.
 *
 * Matching is a plain, case-sensitive string prefix test and is not aware
 * of path segments: an excluded `0:/sys/a` also excludes `0:/sys/abc`.
 * Existing configurations rely on this, so it is kept as is.
 */

const MULTI_SLASH = /\/{2,}/g;

/**
 * Collapse runs of slashes into one and strip a single trailing slash.
 */
export function cleanPath(path: string): string {
  const collapsed = path.replace(MULTI_SLASH, '/');
  return collapsed.endsWith('/') ? collapsed.slice(0, -1) : collapsed;
}

export class ExclusionSet {
  private readonly prefixes: string[] = [];

  static from(rawPrefixes: Iterable<string>): ExclusionSet {
    const set = new ExclusionSet();
    for (const prefix of rawPrefixes) {
      set.add(prefix);
    }
    return set;
  }

  /** Number of stored prefixes */
  get size(): number {
    return this.prefixes.length;
  }

  /**
   * Normalize and store a prefix. An empty result matches every path;
   * callers that accept user input should reject it beforehand.
   */
  add(rawPrefix: string): void {
    this.prefixes.push(cleanPath(rawPrefix));
  }

  /** True iff `path` starts with any stored prefix. */
  contains(path: string): boolean {
    return this.prefixes.some((prefix) => path.startsWith(prefix));
  }

  values(): readonly string[] {
    return this.prefixes;
  }

  toString(): string {
    return this.prefixes.join(',');
  }
}
