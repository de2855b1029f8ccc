/**
 * Kiln Kernel: Content Hash Cache
 *
 * Value files are memoized by the SHA-256 of their bytes. Hashing large
 * inputs on every staleness check would dominate no-op builds, so digests
 * are cached per resolved path together with the mtime they were computed
 * at. An entry is trusted only while the file's current mtime equals the
 * recorded one; otherwise that entry alone is recomputed.
 *
 * The cache is an explicit object. A RuleStore owns one for its lifetime;
 * callers that want per-build lifetime inject a fresh cache.
 *
 * All access happens on the orchestrating event loop. Worker processes never
 * read or write the cache.
 */

import { createHash } from 'node:crypto';
import type { BuildFs } from '../adapters/index.js';

interface CacheEntry {
  readonly mtimeMs: number;
  readonly hash: string;
}

export class ContentHashCache {
  private readonly entries = new Map<string, CacheEntry>();

  /**
   * Content hash (base64 SHA-256) of the file at `path`.
   *
   * @throws Error if the file does not exist
   */
  hash(fs: BuildFs, path: string): string {
    const stat = fs.stat(path);
    if (stat === null) {
      throw new Error(`Cannot hash missing file: ${path}`);
    }
    const cached = this.entries.get(path);
    if (cached !== undefined && cached.mtimeMs === stat.mtimeMs) {
      return cached.hash;
    }

    const content = fs.readFile(path);
    if (content === null) {
      throw new Error(`Cannot hash missing file: ${path}`);
    }
    const hash = createHash('sha256').update(content).digest('base64');
    this.entries.set(path, { mtimeMs: stat.mtimeMs, hash });
    return hash;
  }

  /** Drop the entry for `path`, or every entry. */
  invalidate(path?: string): void {
    if (path === undefined) {
      this.entries.clear();
    } else {
      this.entries.delete(path);
    }
  }

  get size(): number {
    return this.entries.size;
  }
}
