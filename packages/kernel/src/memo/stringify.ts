/**
 * Kiln Kernel: Canonical Stringification
 *
 * Produces the deterministic, type-tagged text form of a memo value. Two
 * memo values are considered equal exactly when their stringified forms are
 * equal, so the encoding must:
 *
 *   - distinguish types that JSON would conflate (1 vs 1n vs '1', -0 vs 0,
 *     null vs undefined, bytes vs arrays)
 *   - be independent of insertion order for records, maps and sets
 *
 * Format:
 *
 *   null → None        undefined → Undefined     true/false → True/False
 *   number → n:<repr>  bigint → b:<decimal>       string → JSON literal
 *   bytes → x'<hex>'
 *   array → [e1,e2,]   record → {"k":v,}          map → M{k:v,}   set → S{v,}
 *
 * Records are sorted by key, maps by stringified key, sets by stringified
 * element.
 */

import { MemoSerializationError } from '../errors.js';
import type { MapKey, MemoData, MemoRecordData } from './args.js';

export function stringify(value: MemoData): string {
  const out: string[] = [];
  write(value, out, new Set<object>());
  return out.join('');
}

function write(value: MemoData, out: string[], path: Set<object>): void {
  if (value === null) {
    out.push('None');
    return;
  }
  switch (typeof value) {
    case 'undefined':
      out.push('Undefined');
      return;
    case 'boolean':
      out.push(value ? 'True' : 'False');
      return;
    case 'number':
      out.push(`n:${Object.is(value, -0) ? '-0' : String(value)}`);
      return;
    case 'bigint':
      out.push(`b:${value.toString()}`);
      return;
    case 'string':
      out.push(JSON.stringify(value));
      return;
    default:
      break;
  }

  if (value instanceof Uint8Array) {
    out.push(`x'${toHex(value)}'`);
    return;
  }

  if (path.has(value)) {
    throw new MemoSerializationError('Cannot stringify a cyclic structure');
  }
  path.add(value);

  if (isArray(value)) {
    out.push('[');
    for (const item of value) {
      write(item, out, path);
      out.push(',');
    }
    out.push(']');
  } else if (isMap(value)) {
    out.push('M{');
    const entries = [...value.entries()]
      .map(([k, v]): [string, MemoData] => [stringify(k), v])
      .sort(([a], [b]) => compare(a, b));
    for (const [k, v] of entries) {
      out.push(k, ':');
      write(v, out, path);
      out.push(',');
    }
    out.push('}');
  } else if (isSet(value)) {
    out.push('S{');
    const items = [...value].map((item) => subString(item, path)).sort(compare);
    for (const item of items) {
      out.push(item, ',');
    }
    out.push('}');
  } else {
    writeRecord(value, out, path);
  }

  path.delete(value);
}

function writeRecord(value: MemoRecordData, out: string[], path: Set<object>): void {
  out.push('{');
  for (const key of Object.keys(value).sort(compare)) {
    out.push(JSON.stringify(key), ':');
    write(value[key], out, path);
    out.push(',');
  }
  out.push('}');
}

/** Stringify a nested value while keeping the cycle guard of the enclosing walk. */
function subString(value: MemoData, path: Set<object>): string {
  const out: string[] = [];
  write(value, out, path);
  return out.join('');
}

function isArray(value: MemoData): value is ReadonlyArray<MemoData> {
  return Array.isArray(value);
}

function isMap(value: MemoData): value is ReadonlyMap<MapKey, MemoData> {
  return value instanceof Map;
}

function isSet(value: MemoData): value is ReadonlySet<MemoData> {
  return value instanceof Set;
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function toHex(bytes: Uint8Array): string {
  let hex = '';
  for (const byte of bytes) {
    hex += byte.toString(16).padStart(2, '0');
  }
  return hex;
}

