/**
 * Kiln Kernel: Rule Store Tests
 *
 * store/register: graph validation at registration time.
 * store/edges: dependency edges and original inputs.
 * store/select: globs, groups and target names.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  GraphConfigError,
  MemoSerializationError,
  RuleGroup,
  RuleStore,
  file,
  ownerOf,
  valueFile,
  type RuleSpec,
} from '../src/index.js';
import { MemoryBuildFs } from './support/memory-fs.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

let fs: MemoryBuildFs;
let store: RuleStore;

beforeEach(() => {
  fs = new MemoryBuildFs();
  fs.mkdirp('/proj');
  store = new RuleStore({ root: '/proj', fs });
});

const noop = (): void => undefined;

/** Rule producing `output` from `inputs`, all plain files. */
function spec(output: string, inputs: ReadonlyArray<string> = [], name?: string): RuleSpec {
  const base = { outputs: [output], action: noop, args: [file(output), ...inputs.map(file)] };
  return name === undefined ? base : { ...base, name };
}

// ---------------------------------------------------------------------------
// store/register
// ---------------------------------------------------------------------------

describe('store/register: graph validation', () => {
  it('assigns ids in registration order and names rules after their primary output', () => {
    const a = store.add(spec('a.txt'));
    const b = store.add(spec('b.txt', [], 'bee'));
    expect([a.id, b.id]).toEqual([0, 1]);
    expect(a.name).toBe('a.txt');
    expect(b.name).toBe('bee');
    expect(store.get('bee')).toBe(b);
    expect(ownerOf(a)).toBe(store);
  });

  it('resolves paths against the store root', () => {
    const rule = store.add(spec('sub/a.txt'));
    expect(rule.outputs).toEqual(['/proj/sub/a.txt']);
  });

  it('rejects a rule without outputs', () => {
    expect(() => store.add({ name: 'empty', outputs: [], action: noop, args: [] })).toThrow(
      "Rule 'empty' declares no outputs",
    );
  });

  it('rejects a duplicate rule name', () => {
    store.add(spec('a.txt', [], 'same'));
    expect(() => store.add(spec('b.txt', [], 'same'))).toThrow("Duplicate rule name 'same'");
  });

  it('rejects a path used with two file kinds', () => {
    store.add({ outputs: [valueFile('a')], action: noop, args: [valueFile('a')] });
    expect(() => store.add(spec('b', ['a']))).toThrow(
      'Path /proj/a is used as both a value file and a plain file',
    );
  });

  it('rejects an output declared twice by one rule', () => {
    expect(() =>
      store.add({ name: 'twice', outputs: ['a', 'a'], action: noop, args: [file('a')] }),
    ).toThrow("Rule 'twice' declares output /proj/a twice");
  });

  it('rejects an output already produced by another rule', () => {
    store.add(spec('a', [], 'first'));
    expect(() => store.add(spec('a', [], 'second'))).toThrow(
      "Output /proj/a of rule 'second' is already produced by rule 'first'",
    );
  });

  it('rejects producing a file an earlier rule used as an original input', () => {
    store.add(spec('a', ['src']));
    expect(() => store.add(spec('src', [], 'late'))).toThrow(
      "Output /proj/src of rule 'late' is already used as an original input of an earlier rule",
    );
  });

  it('rejects an output missing from the arguments', () => {
    expect(() =>
      store.add({ name: 'hidden', outputs: ['a'], action: noop, args: [file('b')] }),
    ).toThrow("Output /proj/a of rule 'hidden' does not appear among its arguments");
  });

  it('rejects a path used as both a file and a directory', () => {
    store.add(spec('out'));
    expect(() => store.add(spec('out/x'))).toThrow(
      'Path /proj/out is used both as a file and as a directory',
    );
  });

  it('rejects arguments that cannot be memoized', () => {
    expect(() =>
      store.add({ outputs: ['a'], action: noop, args: [file('a'), new Date(0)] }),
    ).toThrow(MemoSerializationError);
  });

  it('leaves the store unchanged when a registration is rejected', () => {
    store.add(spec('a', [], 'first'));
    expect(() =>
      store.add({ name: 'bad', outputs: ['b', 'a'], action: noop, args: [file('b'), file('a')] }),
    ).toThrow(GraphConfigError);
    expect(store.rules).toHaveLength(1);
    expect(store.get('bad')).toBeUndefined();
    // b was never claimed by the rejected rule
    expect(store.add(spec('b', [], 'bad')).id).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// store/edges
// ---------------------------------------------------------------------------

describe('store/edges: dependencies and inputs', () => {
  it('links a consumer to the producer of each input', () => {
    const a = store.add(spec('a', ['src']));
    const b = store.add(spec('b', ['a', 'src', 'a']));
    expect([...a.deps]).toEqual([]);
    expect([...b.deps]).toEqual([0]);
    expect(b.inputs).toEqual([
      { path: '/proj/a', isOriginal: false, isValueFile: false },
      { path: '/proj/src', isOriginal: true, isValueFile: false },
    ]);
  });

  it('does not list a rule\'s outputs among its inputs', () => {
    const rule = store.add({
      outputs: ['a', 'b'],
      action: noop,
      args: [{ out: [file('a'), file('b')], src: valueFile('v') }],
    });
    expect(rule.inputs).toEqual([{ path: '/proj/v', isOriginal: true, isValueFile: true }]);
  });
});

// ---------------------------------------------------------------------------
// store/select
// ---------------------------------------------------------------------------

describe('store/select: globs, groups and targets', () => {
  beforeEach(() => {
    store.add(spec('a', [], 'compile-a'));
    store.add(spec('b', [], 'compile-b'));
    store.add(spec('c', [], 'link'));
  });

  it('selects rules by glob in id order', () => {
    expect(store.select('compile-*').map((r) => r.name)).toEqual(['compile-a', 'compile-b']);
    expect(store.select('*')).toHaveLength(3);
    expect(store.select('compile.a')).toEqual([]);
  });

  it('builds groups from names, patterns, rules and other groups', () => {
    const compile = store.group('compile', ['compile-*']);
    const all = store.group('all', [compile, ...store.select('link'), 'compile-a']);
    expect(all).toBeInstanceOf(RuleGroup);
    expect(all.members.map((r) => r.name)).toEqual(['compile-a', 'compile-b', 'link']);
    expect(store.getGroup('all')).toBe(all);
  });

  it('rejects a group name that is taken or a pattern that matches nothing', () => {
    store.group('g', ['link']);
    expect(() => store.group('g', ['link'])).toThrow("Duplicate group name 'g'");
    expect(() => store.group('link', ['compile-a'])).toThrow("Duplicate group name 'link'");
    expect(() => store.group('none', ['nothing-*'])).toThrow(
      "Group 'none': no rule matches 'nothing-*'",
    );
  });

  it('rejects group members from another store', () => {
    const other = new RuleStore({ root: '/proj', fs });
    const foreign = other.add(spec('z'));
    expect(() => store.group('mixed', [foreign])).toThrow(
      "Group 'mixed': rule 'z' belongs to another store",
    );
  });

  it('resolves target names to groups, rules and glob matches', () => {
    const group = store.group('compile', ['compile-*']);
    expect(store.resolveTargets([])).toEqual([store]);
    expect(store.resolveTargets(['compile'])).toEqual([group]);
    expect(store.resolveTargets(['link'])).toEqual([store.get('link')]);
    expect(store.resolveTargets(['compile-*'])).toEqual(store.select('compile-*'));
    expect(() => store.resolveTargets(['missing'])).toThrow("Unknown target 'missing'");
  });
});
