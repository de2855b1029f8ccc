/**
 * Kiln Kernel: File Handles
 *
 * A BuildFile names a path that a rule reads or writes, tagged with how its
 * staleness is judged:
 *
 *   plain: modification time only. An input newer than the oldest output
 *           makes the rule stale.
 *   value: modification time and content hash. Touching a value file without
 *           changing its bytes does not make the rule stale; changing the
 *           bytes does, even when the mtime is unchanged.
 *
 * BuildFile leaves are recognised once, when a rule's arguments are
 * normalized (memo/args.ts). After that the engine pattern-matches on the
 * normalized tree and never inspects argument types again.
 */

export enum FileKind {
  Plain = 'plain',
  Value = 'value',
}

export class BuildFile {
  constructor(
    /** Path as written by the caller; resolved against the rule store root. */
    readonly path: string,
    readonly kind: FileKind = FileKind.Plain,
  ) {
    if (path === '') {
      throw new TypeError('BuildFile path must not be empty');
    }
  }

  get isValueFile(): boolean {
    return this.kind === FileKind.Value;
  }

  toString(): string {
    return this.path;
  }
}

/** A file whose staleness is judged by modification time. */
export function file(path: string): BuildFile {
  return new BuildFile(path, FileKind.Plain);
}

/** A file whose staleness is judged by modification time and content hash. */
export function valueFile(path: string): BuildFile {
  return new BuildFile(path, FileKind.Value);
}
