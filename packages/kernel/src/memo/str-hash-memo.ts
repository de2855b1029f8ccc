/**
 * Kiln Kernel: String-Hash Memo
 *
 * The default memo encoding. The eager part is the canonical stringified
 * memo value; texts longer than MAX_RAW_REPRESENTATION_LEN are replaced by
 * their SHA-256 hex digest so that sidecar files stay small while short
 * memos remain human-readable.
 */

import { createHash } from 'node:crypto';
import { MemoFormatError } from '../errors.js';
import { evaluateLazy, type LazyMemoValue, type MemoProjection } from './args.js';
import type { MemoRecord, RuleMemo, StrHashRecord } from './memo.js';
import { stringify } from './stringify.js';

export const MAX_RAW_REPRESENTATION_LEN = 1000;

/** Canonical text of a memo value, digested when it exceeds the raw limit. */
export function encodeText(text: string): string {
  if (text.length > MAX_RAW_REPRESENTATION_LEN) {
    return createHash('sha256').update(text, 'utf8').digest('hex');
  }
  return text;
}

export class StrHashMemo implements RuleMemo {
  readonly encoding = 'str-hash';
  private readonly code: string;
  private readonly lazy: ReadonlyArray<LazyMemoValue>;

  constructor(projection: MemoProjection) {
    this.code = encodeText(stringify(projection.eager));
    this.lazy = projection.lazy;
  }

  matches(record: MemoRecord, source: string): boolean {
    if (record.encoding !== this.encoding) {
      throw new MemoFormatError(source, record.encoding, this.encoding);
    }
    if (record.args !== this.code) {
      return false;
    }
    return stringify(evaluateLazy(this.lazy)) === stringify(record.values);
  }

  toRecord(): StrHashRecord {
    return { encoding: this.encoding, args: this.code, values: evaluateLazy(this.lazy) };
  }
}
