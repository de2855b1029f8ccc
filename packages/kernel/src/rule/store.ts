/**
 * Kiln Kernel: Rule Store
 *
 * The RuleStore is the flat build graph: rules in registration order, each
 * identified by its index. Registration validates the graph incrementally,
 * so a store that exists is always well-formed:
 *
 *   - every rule has at least one output, and every output appears among
 *     the rule's bound arguments
 *   - no path is produced by two rules
 *   - no path is produced after an earlier rule used it as an original input
 *   - no path is registered both as a file and as a directory
 *   - a path has one file kind (plain or value) across all rules
 *   - rule names are unique
 *
 * A dependency edge exists from rule B to rule A when B reads a file A
 * produces. Because producers must be registered before their consumers,
 * ids are already a topological order of the store.
 *
 * Registration is atomic: a rejected rule leaves the store unchanged.
 */

import { dirname, resolve as resolvePath } from 'node:path';
import type { BuildFs } from '../adapters/index.js';
import { GraphConfigError } from '../errors.js';
import { toRuleAction, type ActionFunction, type RuleAction } from '../types/action.js';
import { BuildFile, FileKind } from '../types/file.js';
import { collectFiles, normalizeArgs } from '../memo/args.js';
import { ContentHashCache } from '../memo/hash-cache.js';
import { createMemoFactory, type MemoFactory } from '../memo/memo.js';
import { Rule, type RuleContext, type RuleInput } from './rule.js';

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

export interface RuleSpec {
  /** Unique rule name. Defaults to the primary output's path as written. */
  readonly name?: string;
  /** Output files. Strings are plain files. */
  readonly outputs: ReadonlyArray<BuildFile | string>;
  readonly action: ActionFunction | RuleAction;
  /** Positional arguments passed to the action. Every output must appear here. */
  readonly args: ReadonlyArray<unknown>;
}

export interface RuleStoreOptions {
  /** Directory that relative file paths are resolved against. */
  readonly root: string;
  readonly fs: BuildFs;
  /** Memo encoding for every rule of the store. Defaults to str-hash. */
  readonly memoFactory?: MemoFactory;
  /** Content-hash cache. Defaults to one owned by the store. */
  readonly hashCache?: ContentHashCache;
}

/** A named selection of rules of one store. */
export class RuleGroup {
  constructor(
    readonly store: RuleStore,
    readonly name: string,
    readonly members: ReadonlyArray<Rule>,
  ) {}
}

/** Anything that can be a build target. A store means all of its rules. */
export type RuleSource = Rule | RuleGroup | RuleStore;

/** The default export of a build file. */
export type BuildDefinition = (store: RuleStore) => void | Promise<void>;

/** Identity helper giving build files a typed default export. */
export function defineBuild(definition: BuildDefinition): BuildDefinition {
  return definition;
}

// Rules do not know their store; ownership is tracked here for target
// assembly.
const owners = new WeakMap<Rule, RuleStore>();

/** The store a rule was registered in. */
export function ownerOf(rule: Rule): RuleStore | undefined {
  return owners.get(rule);
}

function globToRegExp(pattern: string): RegExp {
  const escaped = pattern
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${escaped}$`);
}

// ---------------------------------------------------------------------------
// RuleStore
// ---------------------------------------------------------------------------

export class RuleStore {
  readonly root: string;
  readonly fs: BuildFs;
  readonly hashCache: ContentHashCache;
  readonly memoFactory: MemoFactory;

  private readonly _rules: Rule[] = [];
  private readonly byName = new Map<string, Rule>();
  private readonly groups = new Map<string, RuleGroup>();
  /** Output path → producing rule id. */
  private readonly producers = new Map<string, number>();
  /** Paths used as original inputs. */
  private readonly originals = new Set<string>();
  /** Every registered file path and its kind. */
  private readonly kinds = new Map<string, FileKind>();
  /** Every ancestor directory of a registered file path. */
  private readonly directories = new Set<string>();
  private readonly ctx: RuleContext;

  constructor(options: RuleStoreOptions) {
    this.fs = options.fs;
    this.root = options.fs.realpath(resolvePath(options.root));
    this.hashCache = options.hashCache ?? new ContentHashCache();
    this.memoFactory = options.memoFactory ?? createMemoFactory();
    this.ctx = {
      fs: this.fs,
      hashCache: this.hashCache,
      memoFactory: this.memoFactory,
      resolve: (f) => this.resolve(f),
    };
  }

  get rules(): ReadonlyArray<Rule> {
    return this._rules;
  }

  resolve(file: BuildFile | string): string {
    return resolvePath(this.root, typeof file === 'string' ? file : file.path);
  }

  /**
   * Register a rule.
   *
   * @throws GraphConfigError if the rule would make the graph malformed
   * @throws MemoSerializationError if its arguments cannot be memoized
   */
  add(spec: RuleSpec): Rule {
    const outputs = spec.outputs.map((o) => (typeof o === 'string' ? new BuildFile(o) : o));
    const [primary] = outputs;
    if (primary === undefined) {
      throw new GraphConfigError(`Rule '${spec.name ?? '<unnamed>'}' declares no outputs`);
    }
    const name = spec.name ?? primary.path;
    if (this.byName.has(name) || this.groups.has(name)) {
      throw new GraphConfigError(`Duplicate rule name '${name}'`);
    }

    const args = normalizeArgs([...spec.args]);
    if (args.kind !== 'list') {
      throw new GraphConfigError(`Rule '${name}' arguments must be a list`);
    }
    const argFiles = collectFiles(args);

    // Kinds seen within this rule, checked against the store below.
    const localKinds = new Map<string, FileKind>();
    for (const f of [...outputs, ...argFiles]) {
      const path = this.resolve(f);
      const known = localKinds.get(path) ?? this.kinds.get(path);
      if (known !== undefined && known !== f.kind) {
        throw new GraphConfigError(
          `Path ${path} is used as both a ${known} file and a ${f.kind} file`,
        );
      }
      localKinds.set(path, f.kind);
    }

    const outputPaths = new Set<string>();
    for (const output of outputs) {
      const path = this.resolve(output);
      if (outputPaths.has(path)) {
        throw new GraphConfigError(`Rule '${name}' declares output ${path} twice`);
      }
      const producer = this.producers.get(path);
      if (producer !== undefined) {
        throw new GraphConfigError(
          `Output ${path} of rule '${name}' is already produced by rule '${this.nameOf(producer)}'`,
        );
      }
      if (this.originals.has(path)) {
        throw new GraphConfigError(
          `Output ${path} of rule '${name}' is already used as an original input of an earlier rule`,
        );
      }
      outputPaths.add(path);
    }

    const argPaths = new Set(argFiles.map((f) => this.resolve(f)));
    for (const path of outputPaths) {
      if (!argPaths.has(path)) {
        throw new GraphConfigError(
          `Output ${path} of rule '${name}' does not appear among its arguments`,
        );
      }
    }

    const newPaths = [...localKinds.keys()];
    this.checkDirectoryCollisions(newPaths);

    const inputs: RuleInput[] = [];
    const deps = new Set<number>();
    const seenInputs = new Set<string>();
    for (const f of argFiles) {
      const path = this.resolve(f);
      if (outputPaths.has(path) || seenInputs.has(path)) {
        continue;
      }
      seenInputs.add(path);
      const producer = this.producers.get(path);
      if (producer !== undefined) {
        deps.add(producer);
      }
      inputs.push({ path, isOriginal: producer === undefined, isValueFile: f.isValueFile });
    }

    const rule = new Rule(
      {
        id: this._rules.length,
        name,
        outputs,
        inputs,
        deps,
        action: toRuleAction(spec.action),
        args,
      },
      this.ctx,
    );

    // Commit.
    this._rules.push(rule);
    this.byName.set(name, rule);
    owners.set(rule, this);
    for (const path of outputPaths) {
      this.producers.set(path, rule.id);
    }
    for (const input of inputs) {
      if (input.isOriginal) {
        this.originals.add(input.path);
      }
    }
    for (const [path, kind] of localKinds) {
      this.kinds.set(path, kind);
      for (const dir of ancestors(path)) {
        this.directories.add(dir);
      }
    }
    return rule;
  }

  private checkDirectoryCollisions(paths: ReadonlyArray<string>): void {
    const dirs = new Set(paths.flatMap((p) => ancestors(p)));
    for (const path of paths) {
      if (this.directories.has(path) || dirs.has(path)) {
        throw new GraphConfigError(`Path ${path} is used both as a file and as a directory`);
      }
    }
    for (const dir of dirs) {
      if (this.kinds.has(dir)) {
        throw new GraphConfigError(`Path ${dir} is used both as a file and as a directory`);
      }
    }
  }

  private nameOf(id: number): string {
    return this._rules[id]?.name ?? `#${id}`;
  }

  /** Look up a rule by name. */
  get(name: string): Rule | undefined {
    return this.byName.get(name);
  }

  /**
   * Rules whose names match a glob pattern (`*` matches any run of
   * characters), in id order.
   */
  select(pattern: string): Rule[] {
    const re = globToRegExp(pattern);
    return this._rules.filter((rule) => re.test(rule.name));
  }

  /**
   * Define a named group of rules. Members may be rules, groups or rule
   * names (glob patterns allowed).
   *
   * @throws GraphConfigError if the name is taken, a member belongs to
   *   another store, or a pattern matches nothing
   */
  group(name: string, members: ReadonlyArray<Rule | RuleGroup | string>): RuleGroup {
    if (this.byName.has(name) || this.groups.has(name)) {
      throw new GraphConfigError(`Duplicate group name '${name}'`);
    }
    const rules: Rule[] = [];
    for (const member of members) {
      if (typeof member === 'string') {
        const matched = this.select(member);
        if (matched.length === 0) {
          throw new GraphConfigError(`Group '${name}': no rule matches '${member}'`);
        }
        rules.push(...matched);
      } else if (member instanceof RuleGroup) {
        if (member.store !== this) {
          throw new GraphConfigError(`Group '${name}': member '${member.name}' belongs to another store`);
        }
        rules.push(...member.members);
      } else {
        if (ownerOf(member) !== this) {
          throw new GraphConfigError(`Group '${name}': rule '${member.name}' belongs to another store`);
        }
        rules.push(member);
      }
    }
    const group = new RuleGroup(this, name, [...new Set(rules)]);
    this.groups.set(name, group);
    return group;
  }

  getGroup(name: string): RuleGroup | undefined {
    return this.groups.get(name);
  }

  /**
   * Resolve target names to rule sources: a group name, a rule name, or a
   * glob over rule names. No names means the whole store.
   *
   * @throws GraphConfigError if a name matches nothing
   */
  resolveTargets(names: ReadonlyArray<string>): RuleSource[] {
    if (names.length === 0) {
      return [this];
    }
    return names.flatMap((targetName): RuleSource[] => {
      const group = this.groups.get(targetName);
      if (group !== undefined) {
        return [group];
      }
      const rule = this.byName.get(targetName);
      if (rule !== undefined) {
        return [rule];
      }
      const matched = this.select(targetName);
      if (matched.length === 0) {
        throw new GraphConfigError(`Unknown target '${targetName}'`);
      }
      return matched;
    });
  }
}

/** Proper ancestor directories of an absolute path, excluding the filesystem root. */
function ancestors(path: string): string[] {
  const out: string[] = [];
  let dir = dirname(path);
  while (dir !== dirname(dir)) {
    out.push(dir);
    dir = dirname(dir);
  }
  return out;
}
