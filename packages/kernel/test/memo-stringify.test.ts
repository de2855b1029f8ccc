/**
 * Kiln Kernel: Canonical Stringification Tests
 *
 * stringify/tags: every scalar type has a distinct, stable text form.
 * stringify/order: records, maps and sets are order-independent.
 * stringify/cycles: cyclic structures are rejected.
 */

import { describe, it, expect } from 'vitest';
import { MemoSerializationError, stringify, type MemoData } from '../src/index.js';

// ---------------------------------------------------------------------------
// stringify/tags
// ---------------------------------------------------------------------------

describe('stringify/tags: scalars are type-tagged', () => {
  it.each<[MemoData, string]>([
    [null, 'None'],
    [undefined, 'Undefined'],
    [true, 'True'],
    [false, 'False'],
    [1, 'n:1'],
    [1.5, 'n:1.5'],
    [-0, 'n:-0'],
    [Number.NaN, 'n:NaN'],
    [Number.POSITIVE_INFINITY, 'n:Infinity'],
    [10n, 'b:10'],
    ['a"b', '"a\\"b"'],
    [new Uint8Array([0, 15, 255]), "x'000fff'"],
  ])('stringify(%s) is %s', (value, expected) => {
    expect(stringify(value)).toBe(expected);
  });

  it('distinguishes values JSON would conflate', () => {
    const forms = [1, 1n, '1', true].map((v) => stringify(v));
    expect(new Set(forms).size).toBe(4);
    expect(stringify(0)).not.toBe(stringify(-0));
    expect(stringify(null)).not.toBe(stringify(undefined));
    expect(stringify([1, 2])).not.toBe(stringify(new Uint8Array([1, 2])));
  });

  it('writes containers with trailing separators', () => {
    expect(stringify([1, 'a', [null]])).toBe('[n:1,"a",[None,],]');
    expect(stringify({ b: 2, a: 1 })).toBe('{"a":n:1,"b":n:2,}');
    expect(stringify(new Map([['k', true]]))).toBe('M{"k":True,}');
    expect(stringify(new Set([2, 1]))).toBe('S{n:1,n:2,}');
    expect(stringify([])).toBe('[]');
  });
});

// ---------------------------------------------------------------------------
// stringify/order
// ---------------------------------------------------------------------------

describe('stringify/order: containers are insertion-order independent', () => {
  it('sorts record keys', () => {
    expect(stringify({ x: 1, y: { q: 1, p: 2 } })).toBe(stringify({ y: { p: 2, q: 1 }, x: 1 }));
  });

  it('sorts map entries by stringified key', () => {
    const a = new Map<string | number, MemoData>([['b', 1], [3, 2]]);
    const b = new Map<string | number, MemoData>([[3, 2], ['b', 1]]);
    expect(stringify(a)).toBe(stringify(b));
  });

  it('sorts set elements by stringified value', () => {
    expect(stringify(new Set(['z', 'a', 1]))).toBe(stringify(new Set([1, 'a', 'z'])));
  });

  it('keeps array order significant', () => {
    expect(stringify([1, 2])).not.toBe(stringify([2, 1]));
  });
});

// ---------------------------------------------------------------------------
// stringify/cycles
// ---------------------------------------------------------------------------

describe('stringify/cycles: re-entered containers are rejected', () => {
  it('throws MemoSerializationError on a self-referencing array', () => {
    const cyclic: MemoData[] = [];
    cyclic.push(cyclic);
    expect(() => stringify(cyclic)).toThrow(MemoSerializationError);
  });

  it('accepts the same container referenced twice without a cycle', () => {
    const shared = [1];
    expect(stringify([shared, shared])).toBe('[[n:1,],[n:1,],]');
  });
});
