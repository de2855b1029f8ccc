/**
 * Kiln Runtime Host: Filesystem Adapter Implementation
 *
 * Implements the BuildFs interface from @kiln/kernel with synchronous
 * node:fs calls. The kernel defines the interface; this package owns the
 * only implementation that touches the disk.
 *
 * Staleness checks stat many files per rule and run between two awaits of
 * the scheduler, so every call here is synchronous.
 *
 * "Absent" is reported as null (stat, readFile) rather than as an error.
 * ENOTDIR counts as absent too: a path below a regular file cannot exist.
 */

import {
  closeSync,
  mkdirSync,
  openSync,
  readFileSync,
  realpathSync,
  rmSync,
  statSync,
  utimesSync,
  writeFileSync,
} from 'node:fs';
import type { BuildFs, FileStat } from '@kiln/kernel';

// ---------------------------------------------------------------------------
// Path safety helpers
// ---------------------------------------------------------------------------

/** Null bytes are never valid in filesystem paths. */
function assertSafePath(path: string): void {
  if (path.includes('\0')) {
    throw new Error(`Invalid path: null byte detected in path: ${JSON.stringify(path)}`);
  }
}

function isNodeError(err: unknown, ...codes: ReadonlyArray<string>): boolean {
  if (typeof err !== 'object' || err === null || !('code' in err)) {
    return false;
  }
  const { code } = err;
  return typeof code === 'string' && codes.includes(code);
}

// ---------------------------------------------------------------------------
// NodeBuildFs
// ---------------------------------------------------------------------------

export class NodeBuildFs implements BuildFs {
  stat(path: string): FileStat | null {
    assertSafePath(path);
    try {
      const stats = statSync(path, { throwIfNoEntry: false });
      return stats === undefined ? null : { mtimeMs: stats.mtimeMs, isFile: stats.isFile() };
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOTDIR')) {
        return null;
      }
      throw err;
    }
  }

  readFile(path: string): Uint8Array | null {
    assertSafePath(path);
    try {
      const buffer = readFileSync(path);
      return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT', 'ENOTDIR')) {
        return null;
      }
      throw err;
    }
  }

  writeFile(path: string, content: Uint8Array | string): void {
    assertSafePath(path);
    writeFileSync(path, content);
  }

  mkdirp(path: string): void {
    assertSafePath(path);
    mkdirSync(path, { recursive: true });
  }

  setMtime(path: string, mtimeMs: number): void {
    assertSafePath(path);
    const { atime } = statSync(path);
    utimesSync(path, atime, new Date(mtimeMs));
  }

  createEmpty(path: string): void {
    assertSafePath(path);
    // Append mode creates the file without truncating an existing one.
    closeSync(openSync(path, 'a'));
  }

  remove(path: string): void {
    assertSafePath(path);
    rmSync(path, { force: true });
  }

  /**
   * Resolve symlinks. A path that does not exist yet is returned as given.
   */
  realpath(path: string): string {
    assertSafePath(path);
    try {
      return realpathSync(path);
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return path;
      }
      throw err;
    }
  }
}
