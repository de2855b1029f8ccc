/**
 * Kiln Kernel: Rule
 *
 * A Rule is one node of the build graph: an action that reads input files
 * and writes output files, plus the memo of the arguments it last ran with.
 *
 * Staleness (checkUpdate) is an ordered sequence of checks; the first
 * decisive one wins:
 *
 *   1. an input is missing or invalid (mtime 0)      → Infeasible
 *      (tolerated in dry runs for inputs another rule produces)
 *   2. an output is missing or invalid               → Necessary
 *   3. dry run and a dependency would be rebuilt     → PossiblyNecessary
 *   4. a plain-file input is newer than the oldest output → Necessary
 *   5. the memo record is absent or does not match   → Necessary
 *   6.                                               → UpToDate
 *
 * Modification time 0 (the epoch) is the invalid-output sentinel. A failed
 * action stamps its outputs with it so the next run rebuilds them whatever
 * the inputs' times say.
 *
 * All filesystem access goes through the injected BuildFs.
 */

import { basename, dirname, join } from 'node:path';
import type { BuildFs } from '../adapters/index.js';
import { OutputMissingError } from '../errors.js';
import { callAction, loadAction, type RuleAction } from '../types/action.js';
import type { BuildFile } from '../types/file.js';
import type { BuildRule } from '../types/rule.js';
import {
  infeasible,
  Necessary,
  PossiblyNecessary,
  UpToDate,
  type UpdateResult,
} from '../types/update.js';
import { memoValue, realValue, type ArgNode } from '../memo/args.js';
import type { ContentHashCache } from '../memo/hash-cache.js';
import { parseMemoRecord, serializeMemoRecord, type MemoFactory, type RuleMemo } from '../memo/memo.js';

/** Directory, next to each primary output, holding memo records. */
export const MEMO_DIR_NAME = '.kiln';

/**
 * Subdirectory of MEMO_DIR_NAME for the records. The project root's
 * `.kiln` doubles as the default state directory, whose `logs` must not
 * collide with the record of an output named `logs`.
 */
export const MEMO_SUBDIR_NAME = 'memo';

/** Epoch-zero modification time marking an output as invalid. */
export const INVALID_MTIME = 0;

export type ListArgNode = Extract<ArgNode, { kind: 'list' }>;

export interface RuleInput {
  /** Resolved absolute path. */
  readonly path: string;
  /** Not produced by any rule of the store. */
  readonly isOriginal: boolean;
  readonly isValueFile: boolean;
}

/** Services shared by every rule of a store. */
export interface RuleContext {
  readonly fs: BuildFs;
  readonly hashCache: ContentHashCache;
  readonly memoFactory: MemoFactory;
  resolve(file: BuildFile): string;
}

export interface RuleInit {
  readonly id: number;
  readonly name: string;
  readonly outputs: ReadonlyArray<BuildFile>;
  readonly inputs: ReadonlyArray<RuleInput>;
  readonly deps: ReadonlySet<number>;
  readonly action: RuleAction;
  readonly args: ListArgNode;
}

export interface TouchOptions {
  /** Set the outputs' modification time. Default true. */
  readonly files?: boolean;
  /** Write the memo record for the current arguments. Default true. */
  readonly memo?: boolean;
  /** Create missing outputs as empty files. Default true. */
  readonly create?: boolean;
  /** Modification time in ms. Default: now. */
  readonly time?: number;
}

export function metadataPathFor(primaryOutput: string): string {
  return join(dirname(primaryOutput), MEMO_DIR_NAME, MEMO_SUBDIR_NAME, basename(primaryOutput));
}

export class Rule implements BuildRule {
  readonly id: number;
  readonly name: string;
  readonly deps: ReadonlySet<number>;
  readonly action: RuleAction;
  readonly args: ListArgNode;
  /** Resolved absolute output paths. The first one is the primary output. */
  readonly outputs: ReadonlyArray<string>;
  readonly outputFiles: ReadonlyArray<BuildFile>;
  readonly inputs: ReadonlyArray<RuleInput>;
  readonly metadataPath: string;
  readonly memo: RuleMemo;

  private readonly ctx: RuleContext;

  /**
   * @throws MemoSerializationError if the arguments cannot be memoized
   */
  constructor(init: RuleInit, ctx: RuleContext) {
    const [primary] = init.outputs;
    if (primary === undefined) {
      throw new TypeError(`Rule '${init.name}' must have at least one output`);
    }
    this.id = init.id;
    this.name = init.name;
    this.deps = init.deps;
    this.action = init.action;
    this.args = init.args;
    this.outputFiles = init.outputs;
    this.outputs = init.outputs.map((f) => ctx.resolve(f));
    this.inputs = init.inputs;
    this.metadataPath = metadataPathFor(ctx.resolve(primary));
    this.ctx = ctx;

    const outputSet = new Set(this.outputs);
    this.memo = ctx.memoFactory.create(
      memoValue(init.args, (f) => {
        if (!f.isValueFile) {
          return null;
        }
        const path = ctx.resolve(f);
        if (outputSet.has(path)) {
          return null;
        }
        return () => ctx.hashCache.hash(ctx.fs, path);
      }),
    );
  }

  // -------------------------------------------------------------------------
  // Staleness
  // -------------------------------------------------------------------------

  checkUpdate(parentUpdated: boolean, dryRun: boolean): UpdateResult {
    const { fs } = this.ctx;

    let pendingInput = false;
    for (const input of this.inputs) {
      const stat = fs.stat(input.path);
      if (stat !== null && stat.mtimeMs !== INVALID_MTIME) {
        continue;
      }
      if (!dryRun || input.isOriginal) {
        return infeasible(
          stat === null
            ? `Input file ${input.path} is missing`
            : `Input file ${input.path} has mtime of 0. Input files with mtime of 0 are considered to be invalid.`,
        );
      }
      pendingInput = true;
    }

    let oldestOutput = Number.POSITIVE_INFINITY;
    for (const output of this.outputs) {
      const stat = fs.stat(output);
      if (stat === null || stat.mtimeMs === INVALID_MTIME) {
        return Necessary;
      }
      oldestOutput = Math.min(oldestOutput, stat.mtimeMs);
    }

    if (dryRun && (parentUpdated || pendingInput)) {
      return PossiblyNecessary;
    }

    for (const input of this.inputs) {
      if (input.isValueFile) {
        continue;
      }
      const stat = fs.stat(input.path);
      if (stat !== null && stat.mtimeMs > oldestOutput) {
        return Necessary;
      }
    }

    if (!this.memoMatches()) {
      return Necessary;
    }
    return UpToDate;
  }

  private memoMatches(): boolean {
    const content = this.ctx.fs.readFile(this.metadataPath);
    if (content === null) {
      return false;
    }
    const record = parseMemoRecord(new TextDecoder().decode(content));
    if (record === null) {
      return false;
    }
    return this.memo.matches(record, this.metadataPath);
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  preprocess(): void {
    const { fs } = this.ctx;
    for (const output of this.outputs) {
      const dir = dirname(output);
      try {
        fs.mkdirp(dir);
      } catch (err) {
        // Another process may have created it concurrently.
        if (fs.stat(dir)?.isFile !== false) {
          throw err;
        }
      }
    }
  }

  async invoke(): Promise<void> {
    const fn = await loadAction(this.action);
    await callAction(fn, this.realArgs());
  }

  realArgs(): ReadonlyArray<unknown> {
    return this.args.items.map((item) => realValue(item, (f) => this.ctx.resolve(f)));
  }

  postprocess(success: boolean): void {
    if (!success) {
      this.invalidate();
      return;
    }

    const missing = this.outputs.filter((output) => this.ctx.fs.stat(output)?.isFile !== true);
    if (missing.length > 0) {
      this.invalidate();
      throw new OutputMissingError(missing);
    }
    this.writeMemo();
  }

  /** Stamp existing outputs with the invalid mtime and drop the memo record. */
  private invalidate(): void {
    const { fs } = this.ctx;
    for (const output of this.outputs) {
      if (fs.stat(output) !== null) {
        fs.setMtime(output, INVALID_MTIME);
      }
    }
    fs.remove(this.metadataPath);
  }

  private writeMemo(): void {
    const { fs } = this.ctx;
    fs.mkdirp(dirname(this.metadataPath));
    fs.writeFile(this.metadataPath, serializeMemoRecord(this.memo.toRecord()));
  }

  // -------------------------------------------------------------------------
  // Maintenance
  // -------------------------------------------------------------------------

  /**
   * Mark the rule as up to date without running its action.
   *
   * Value-file inputs must exist when the memo is written, since their
   * content hashes are part of it.
   */
  touch(options: TouchOptions = {}): void {
    const { fs } = this.ctx;
    const time = options.time ?? Date.now();

    if (options.files ?? true) {
      for (const output of this.outputs) {
        if (fs.stat(output) === null) {
          if (!(options.create ?? true)) {
            continue;
          }
          fs.mkdirp(dirname(output));
          fs.createEmpty(output);
        }
        fs.setMtime(output, time);
      }
    }
    if (options.memo ?? true) {
      this.writeMemo();
    }
  }

  /** Delete existing outputs and the memo record. */
  clean(): void {
    const { fs } = this.ctx;
    for (const output of this.outputs) {
      fs.remove(output);
    }
    fs.remove(this.metadataPath);
  }
}
