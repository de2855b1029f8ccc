/**
 * Kiln Kernel: Argument Model Tests
 *
 * args/normalize: supported structures become ArgNode trees; anything else
 *   is rejected at construction.
 * args/projections: real values, memo projection and file collection.
 */

import { describe, it, expect } from 'vitest';
import {
  atom,
  collectFiles,
  file,
  memoValue,
  memstr,
  MemoSerializationError,
  nomem,
  normalizeArgs,
  realValue,
  stringify,
  valueFile,
  type BuildFile,
} from '../src/index.js';

const resolve = (f: BuildFile): string => `/root/${f.path}`;

// ---------------------------------------------------------------------------
// args/normalize
// ---------------------------------------------------------------------------

describe('args/normalize: argument trees', () => {
  it('tags leaves and containers', () => {
    const node = normalizeArgs([1, file('a.txt'), atom(() => 1, 'fn'), { k: [true] }, new Map([['m', 2]]), new Set(['s'])]);
    expect(node.kind).toBe('list');
    if (node.kind !== 'list') {
      return;
    }
    expect(node.items.map((n) => n.kind)).toEqual(['value', 'file', 'atom', 'record', 'map', 'set']);
  });

  it('assigns dotted deep keys', () => {
    const node = normalizeArgs([0, { src: valueFile('in.txt') }]);
    const lazy = memoValue(node, () => () => 'h').lazy;
    expect(lazy.map((entry) => entry.key)).toEqual(['1.src']);
  });

  it('keys map children by their stringified key', () => {
    const node = normalizeArgs([new Map([['x', valueFile('v')]])]);
    const lazy = memoValue(node, () => () => 'h').lazy;
    expect(lazy.map((entry) => entry.key)).toEqual(['0."x"']);
  });

  it('rejects functions that are not wrapped in an atom', () => {
    expect(() => normalizeArgs([() => 1])).toThrow(MemoSerializationError);
  });

  it('rejects class instances', () => {
    class Opaque {}
    expect(() => normalizeArgs([new Opaque()])).toThrow(/instance of Opaque/);
  });

  it('rejects cyclic arguments', () => {
    const cyclic: unknown[] = [];
    cyclic.push(cyclic);
    expect(() => normalizeArgs(cyclic)).toThrow(/Cyclic structure/);
  });

  it('rejects atom memo values that contain files', () => {
    expect(() => normalizeArgs([atom(1, [file('x')])])).toThrow(MemoSerializationError);
  });

  it('accepts objects with a null prototype as records', () => {
    const record: Record<string, unknown> = Object.create(null);
    record['a'] = 1;
    expect(normalizeArgs(record).kind).toBe('record');
  });
});

// ---------------------------------------------------------------------------
// args/projections
// ---------------------------------------------------------------------------

describe('args/projections: real values, memo values, files', () => {
  const fn = (): number => 42;
  const node = normalizeArgs([
    file('out.txt'),
    valueFile('in.txt'),
    atom(fn, 'answer'),
    memstr(7),
    nomem('ignored'),
    { n: 1n },
  ]);

  it('hands the action resolved paths and real atom values', () => {
    expect(realValue(node, resolve)).toEqual([
      '/root/out.txt',
      '/root/in.txt',
      fn,
      7,
      'ignored',
      { n: 1n },
    ]);
  });

  it('memoizes plain files as null and atoms by their memo', () => {
    const projection = memoValue(node, (f) => (f.isValueFile ? () => `hash:${f.path}` : null));
    expect(stringify(projection.eager)).toBe('[None,None,"answer","7",None,{"n":b:1,},]');
    expect(projection.lazy.map((entry) => [entry.key, entry.evaluate()])).toEqual([
      ['1', 'hash:in.txt'],
    ]);
  });

  it('does not evaluate lazy values during projection', () => {
    let evaluated = 0;
    memoValue(node, () => () => {
      evaluated += 1;
      return 'h';
    });
    expect(evaluated).toBe(0);
  });

  it('collects files in traversal order, skipping atoms', () => {
    const nested = normalizeArgs([{ b: file('b') }, [file('a')], atom(file('hidden'), null)]);
    expect(collectFiles(nested).map((f) => f.path)).toEqual(['b', 'a']);
  });
});
