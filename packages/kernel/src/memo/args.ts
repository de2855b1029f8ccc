/**
 * Kiln Kernel: Argument Model
 *
 * A rule's bound arguments are walked exactly once, at rule construction,
 * and turned into an ArgNode tree. The tree is a closed tagged variant:
 *
 *   leaves:     value (scalar), file (BuildFile), atom (Atom wrapper)
 *   containers: list (array), record (plain object), map (Map), set (Set)
 *
 * Everything downstream (real argument values, memo projection, file
 * collection) is a fold over this tree. No other module inspects raw
 * argument values.
 *
 * Every node carries its deep key: the path from the root, segments joined
 * with '.'. Lazy memo entries are keyed by it.
 */

import { Atom } from '../types/atom.js';
import { BuildFile } from '../types/file.js';
import { MemoSerializationError } from '../errors.js';
import { stringify } from './stringify.js';

// ---------------------------------------------------------------------------
// Memo data
// ---------------------------------------------------------------------------

export type MemoScalar =
  | null
  | undefined
  | boolean
  | number
  | bigint
  | string
  | Uint8Array;

/** Scalars usable as Map keys. */
export type MapKey = Exclude<MemoScalar, Uint8Array>;

export interface MemoRecordData {
  readonly [key: string]: MemoData;
}

/** What the memo records: scalars and containers only. */
export type MemoData =
  | MemoScalar
  | ReadonlyArray<MemoData>
  | MemoRecordData
  | ReadonlyMap<MapKey, MemoData>
  | ReadonlySet<MemoData>;

// ---------------------------------------------------------------------------
// Argument tree
// ---------------------------------------------------------------------------

export type ArgNode =
  | { readonly kind: 'value'; readonly key: string; readonly value: MemoScalar }
  | { readonly kind: 'file'; readonly key: string; readonly file: BuildFile }
  | { readonly kind: 'atom'; readonly key: string; readonly real: unknown; readonly memo: MemoData }
  | { readonly kind: 'list'; readonly key: string; readonly items: ReadonlyArray<ArgNode> }
  | {
      readonly kind: 'record';
      readonly key: string;
      readonly entries: ReadonlyArray<readonly [string, ArgNode]>;
    }
  | {
      readonly kind: 'map';
      readonly key: string;
      readonly entries: ReadonlyArray<readonly [MapKey, ArgNode]>;
    }
  | { readonly kind: 'set'; readonly key: string; readonly items: ReadonlyArray<ArgNode> };

/**
 * A memo value computed only when the eager part of the memo already
 * matched. Used for value-file content hashes.
 */
export interface LazyMemoValue {
  readonly key: string;
  evaluate(): string;
}

export interface MemoProjection {
  /** Memo value with every lazy position replaced by null. */
  readonly eager: MemoData;
  readonly lazy: ReadonlyArray<LazyMemoValue>;
}

// ---------------------------------------------------------------------------
// Classification helpers
// ---------------------------------------------------------------------------

function isScalar(value: unknown): value is MemoScalar {
  switch (typeof value) {
    case 'undefined':
    case 'boolean':
    case 'number':
    case 'bigint':
    case 'string':
      return true;
    case 'object':
      return value === null || value instanceof Uint8Array;
    default:
      return false;
  }
}

function isMapKey(value: unknown): value is MapKey {
  return isScalar(value) && !(value instanceof Uint8Array);
}

function isPlainRecord(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function describe(value: unknown): string {
  if (typeof value === 'function') {
    return `function ${value.name === '' ? '<anonymous>' : value.name}`;
  }
  if (typeof value === 'object' && value !== null) {
    return `instance of ${value.constructor.name}`;
  }
  return typeof value;
}

function childKey(parent: string, segment: string): string {
  return parent === '' ? segment : `${parent}.${segment}`;
}

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

/**
 * Walk a bound argument structure into an ArgNode tree.
 *
 * @throws MemoSerializationError on unsupported leaves and cyclic structures
 */
export function normalizeArgs(value: unknown): ArgNode {
  return normalizeNode(value, '', new Set<object>());
}

function normalizeNode(value: unknown, key: string, path: Set<object>): ArgNode {
  if (isScalar(value)) {
    return { kind: 'value', key, value };
  }
  if (value instanceof BuildFile) {
    return { kind: 'file', key, file: value };
  }
  if (value instanceof Atom) {
    return { kind: 'atom', key, real: value.real, memo: normalizeMemo(value.memo, key, new Set()) };
  }
  if (typeof value !== 'object' || value === null) {
    throw new MemoSerializationError(
      `Unsupported argument at '${key}': ${describe(value)}. Wrap it with atom() or nomem().`,
    );
  }

  enter(value, key, path);
  let node: ArgNode;
  if (Array.isArray(value)) {
    const items: ArgNode[] = [];
    value.forEach((item: unknown, i) => {
      items.push(normalizeNode(item, childKey(key, String(i)), path));
    });
    node = { kind: 'list', key, items };
  } else if (value instanceof Map) {
    const entries: Array<readonly [MapKey, ArgNode]> = [];
    for (const [k, v] of value) {
      if (!isMapKey(k)) {
        throw new MemoSerializationError(`Map key at '${key}' must be a scalar, got ${describe(k)}`);
      }
      entries.push([k, normalizeNode(v, childKey(key, stringify(k)), path)]);
    }
    node = { kind: 'map', key, entries };
  } else if (value instanceof Set) {
    const items: ArgNode[] = [];
    let i = 0;
    for (const item of value) {
      items.push(normalizeNode(item, childKey(key, String(i)), path));
      i += 1;
    }
    node = { kind: 'set', key, items };
  } else if (isPlainRecord(value)) {
    const entries: Array<readonly [string, ArgNode]> = [];
    for (const k of Object.keys(value)) {
      entries.push([k, normalizeNode(value[k], childKey(key, k), path)]);
    }
    node = { kind: 'record', key, entries };
  } else {
    throw new MemoSerializationError(
      `Unsupported argument at '${key}': ${describe(value)}. Wrap it with atom() or nomem().`,
    );
  }
  path.delete(value);
  return node;
}

function enter(container: object, key: string, path: Set<object>): void {
  if (path.has(container)) {
    throw new MemoSerializationError(`Cyclic structure in arguments at '${key}'`);
  }
  path.add(container);
}

/**
 * Validate and copy an atom's memo value. Files and nested atoms are not
 * allowed inside memo values.
 */
function normalizeMemo(value: unknown, key: string, path: Set<object>): MemoData {
  if (isScalar(value)) {
    return value;
  }
  if (typeof value !== 'object' || value === null || value instanceof BuildFile || value instanceof Atom) {
    throw new MemoSerializationError(
      `Unsupported memo value at '${key}': ${describe(value)}`,
    );
  }

  enter(value, key, path);
  let data: MemoData;
  if (Array.isArray(value)) {
    data = value.map((item: unknown) => normalizeMemo(item, key, path));
  } else if (value instanceof Map) {
    const copy = new Map<MapKey, MemoData>();
    for (const [k, v] of value) {
      if (!isMapKey(k)) {
        throw new MemoSerializationError(`Map key in memo value at '${key}' must be a scalar`);
      }
      copy.set(k, normalizeMemo(v, key, path));
    }
    data = copy;
  } else if (value instanceof Set) {
    const copy = new Set<MemoData>();
    for (const item of value) {
      copy.add(normalizeMemo(item, key, path));
    }
    data = copy;
  } else if (isPlainRecord(value)) {
    const copy: Record<string, MemoData> = {};
    for (const k of Object.keys(value)) {
      copy[k] = normalizeMemo(value[k], key, path);
    }
    data = copy;
  } else {
    throw new MemoSerializationError(
      `Unsupported memo value at '${key}': ${describe(value)}`,
    );
  }
  path.delete(value);
  return data;
}

// ---------------------------------------------------------------------------
// Projections
// ---------------------------------------------------------------------------

/** The value handed to the action. Files become resolved path strings. */
export function realValue(node: ArgNode, resolvePath: (file: BuildFile) => string): unknown {
  switch (node.kind) {
    case 'value':
      return node.value;
    case 'file':
      return resolvePath(node.file);
    case 'atom':
      return node.real;
    case 'list':
      return node.items.map((item) => realValue(item, resolvePath));
    case 'record': {
      const out: Record<string, unknown> = {};
      for (const [k, v] of node.entries) {
        out[k] = realValue(v, resolvePath);
      }
      return out;
    }
    case 'map':
      return new Map(node.entries.map(([k, v]) => [k, realValue(v, resolvePath)]));
    case 'set':
      return new Set(node.items.map((item) => realValue(item, resolvePath)));
  }
}

/**
 * The memo projection of an argument tree.
 *
 * @param lazyFor - for each file leaf, the lazy evaluator of its memo value,
 *   or null when the file contributes nothing (plain files, own outputs)
 */
export function memoValue(
  node: ArgNode,
  lazyFor: (file: BuildFile) => (() => string) | null,
): MemoProjection {
  const lazy: LazyMemoValue[] = [];

  const project = (n: ArgNode): MemoData => {
    switch (n.kind) {
      case 'value':
        return n.value;
      case 'file': {
        const evaluate = lazyFor(n.file);
        if (evaluate !== null) {
          lazy.push({ key: n.key, evaluate });
        }
        return null;
      }
      case 'atom':
        return n.memo;
      case 'list':
        return n.items.map(project);
      case 'record': {
        const out: Record<string, MemoData> = {};
        for (const [k, v] of n.entries) {
          out[k] = project(v);
        }
        return out;
      }
      case 'map':
        return new Map(n.entries.map(([k, v]) => [k, project(v)]));
      case 'set':
        return new Set(n.items.map(project));
    }
  };

  const eager = project(node);
  return { eager, lazy };
}

/** Evaluate every lazy entry into a record keyed by deep key. */
export function evaluateLazy(lazy: ReadonlyArray<LazyMemoValue>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const entry of lazy) {
    out[entry.key] = entry.evaluate();
  }
  return out;
}

/** Every BuildFile leaf, in traversal order. Atoms are opaque. */
export function collectFiles(node: ArgNode): BuildFile[] {
  const files: BuildFile[] = [];
  const visit = (n: ArgNode): void => {
    switch (n.kind) {
      case 'file':
        files.push(n.file);
        return;
      case 'list':
      case 'set':
        n.items.forEach(visit);
        return;
      case 'record':
      case 'map':
        for (const [, v] of n.entries) {
          visit(v);
        }
        return;
      default:
        return;
    }
  };
  visit(node);
  return files;
}
