/**
 * Kiln Kernel: Graph Assembly Tests
 *
 * graph/targets: flattening targets into ids of one store.
 * graph/order: dependency-first ordering and cycle detection.
 * graph/closure: reverse-dependency edges.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  assembleTargets,
  collectClosure,
  CrossStoreError,
  DependencyCycleError,
  file,
  GraphConfigError,
  RuleStore,
  topologicalSort,
} from '../src/index.js';
import { MemoryBuildFs } from './support/memory-fs.js';
import { MockRule } from './support/mock-rule.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

let fs: MemoryBuildFs;
let store: RuleStore;

beforeEach(() => {
  fs = new MemoryBuildFs();
  fs.mkdirp('/proj');
  store = new RuleStore({ root: '/proj', fs });
  // a ← b ← c, a ← d
  const chain: ReadonlyArray<readonly [string, ReadonlyArray<string>]> = [
    ['a', []],
    ['b', ['a']],
    ['c', ['b']],
    ['d', ['a']],
  ];
  for (const [out, ins] of chain) {
    store.add({
      name: out,
      outputs: [out],
      action: () => undefined,
      args: [file(out), ...ins.map((i) => file(i))],
    });
  }
});

function mockGraph(edges: ReadonlyArray<ReadonlyArray<number>>): MockRule[] {
  const journal: string[] = [];
  return edges.map((deps, id) => new MockRule(id, deps, journal));
}

// ---------------------------------------------------------------------------
// graph/targets
// ---------------------------------------------------------------------------

describe('graph/targets: assembleTargets', () => {
  it('expands a store to all of its rules', () => {
    const { store: owner, ids } = assembleTargets([store]);
    expect(owner).toBe(store);
    expect(ids).toEqual([0, 1, 2, 3]);
  });

  it('removes duplicates and keeps first-seen order', () => {
    const group = store.group('leaves', ['c', 'd']);
    const { ids } = assembleTargets(store.resolveTargets(['d', 'leaves', 'a']));
    expect(ids).toEqual([3, 2, 0]);
    expect(assembleTargets([group]).ids).toEqual([2, 3]);
  });

  it('rejects an empty target list', () => {
    expect(() => assembleTargets([])).toThrow(GraphConfigError);
  });

  it('rejects targets from different stores', () => {
    const other = new RuleStore({ root: '/other', fs });
    const foreign = other.add({ outputs: ['x'], action: () => undefined, args: [file('x')] });
    expect(() => assembleTargets(store.resolveTargets(['a']).concat([foreign]))).toThrow(
      CrossStoreError,
    );
  });
});

// ---------------------------------------------------------------------------
// graph/order
// ---------------------------------------------------------------------------

describe('graph/order: topologicalSort', () => {
  it('puts every rule after its dependencies', () => {
    expect(topologicalSort(store.rules, [2])).toEqual([0, 1, 2]);
    expect(topologicalSort(store.rules, [3, 2])).toEqual([0, 3, 1, 2]);
  });

  it('visits dependencies in ascending id order', () => {
    const rules = mockGraph([[], [], [1, 0]]);
    expect(topologicalSort(rules, [2])).toEqual([0, 1, 2]);
  });

  it('reports the path of a dependency cycle', () => {
    const rules = mockGraph([[1], [2], [0]]);
    let caught: unknown;
    try {
      topologicalSort(rules, [0]);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(DependencyCycleError);
    expect(caught instanceof DependencyCycleError ? caught.cycle : []).toEqual([0, 1, 2, 0]);
  });

  it('rejects a dependency on an unknown id', () => {
    expect(() => topologicalSort(mockGraph([[5]]), [0])).toThrow('Unknown rule id 5');
  });
});

// ---------------------------------------------------------------------------
// graph/closure
// ---------------------------------------------------------------------------

describe('graph/closure: collectClosure', () => {
  it('collects the closure with dependents restricted to it', () => {
    const { ids, dependents } = collectClosure(store.rules, [2]);
    expect(ids).toEqual([0, 1, 2]);
    expect(dependents.get(0)).toEqual([1]);
    expect(dependents.get(1)).toEqual([2]);
    expect(dependents.get(2)).toEqual([]);
    expect(dependents.has(3)).toBe(false);
  });

  it('lists every dependent of a shared dependency', () => {
    const { dependents } = collectClosure(store.rules, [0, 1, 2, 3]);
    expect(dependents.get(0)).toEqual([1, 3]);
  });
});
