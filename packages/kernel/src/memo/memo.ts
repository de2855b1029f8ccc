/**
 * Kiln Kernel: Memo Contract
 *
 * A memo is the persisted summary of the arguments a rule last ran with. It
 * has two parts:
 *
 *   args:   eager: derived from the argument tree at rule construction
 *   values: lazy: content hashes of value-file inputs, computed only when
 *            the eager part already matched
 *
 * Two encodings exist, selected per store through a MemoFactory:
 *
 *   str-hash:       canonical type-tagged text, digested when long
 *   authenticated:  V8 structured serialization plus HMAC-SHA256
 *
 * The persisted record is JSON in a sidecar file next to the rule's primary
 * output (see rule/rule.ts). This module defines its shape and validates it
 * on load; a record that fails validation is treated as absent.
 */

import { MemoConfigError } from '../errors.js';
import type { MemoProjection } from './args.js';
import { AuthenticatedMemo, normalizeKey } from './authenticated-memo.js';
import { StrHashMemo } from './str-hash-memo.js';

// ---------------------------------------------------------------------------
// Persisted records
// ---------------------------------------------------------------------------

export type MemoEncoding = 'str-hash' | 'authenticated';

export const MEMO_ENCODINGS: ReadonlyArray<MemoEncoding> = ['str-hash', 'authenticated'];

export interface StrHashRecord {
  readonly encoding: 'str-hash';
  /** Canonical text of the eager part, or its SHA-256 hex digest when long. */
  readonly args: string;
  /** Deep key → content hash of each value-file input. */
  readonly values: Readonly<Record<string, string>>;
}

/** Serialized bytes plus their HMAC, both hex. */
export interface SealedPayload {
  readonly payload: string;
  readonly mac: string;
}

export interface AuthenticatedRecord {
  readonly encoding: 'authenticated';
  readonly args: SealedPayload;
  readonly values: SealedPayload;
}

export type MemoRecord = StrHashRecord | AuthenticatedRecord;

// ---------------------------------------------------------------------------
// Memo objects
// ---------------------------------------------------------------------------

export interface RuleMemo {
  readonly encoding: MemoEncoding;

  /**
   * Whether a persisted record was produced from the same arguments and the
   * same value-file contents. Lazy values are evaluated only if the eager
   * part matched.
   *
   * @param source - path of the record, for error messages
   * @throws MemoFormatError if the record uses another encoding
   * @throws MemoAuthenticationError if an authenticated record fails verification
   */
  matches(record: MemoRecord, source: string): boolean;

  /** The record for the current arguments. Evaluates every lazy value. */
  toRecord(): MemoRecord;
}

export interface MemoFactory {
  readonly encoding: MemoEncoding;
  /** @throws MemoSerializationError if the eager part cannot be encoded */
  create(projection: MemoProjection): RuleMemo;
}

export interface MemoOptions {
  readonly encoding?: MemoEncoding;
  /** HMAC key for the authenticated encoding: bytes or a hex string. */
  readonly key?: Uint8Array | string;
}

/**
 * Build the memo factory for a store.
 *
 * @throws MemoConfigError if the authenticated encoding is selected without
 *   a usable key
 */
export function createMemoFactory(options: MemoOptions = {}): MemoFactory {
  const encoding = options.encoding ?? 'str-hash';
  switch (encoding) {
    case 'str-hash':
      return {
        encoding,
        create: (projection) => new StrHashMemo(projection),
      };
    case 'authenticated': {
      if (options.key === undefined) {
        throw new MemoConfigError(
          "The 'authenticated' memo encoding requires a key (set KILN_MEMO_KEY or pass memo.key)",
        );
      }
      const key = normalizeKey(options.key);
      return {
        encoding,
        create: (projection) => new AuthenticatedMemo(projection, key),
      };
    }
  }
}

// ---------------------------------------------------------------------------
// Record validation
// ---------------------------------------------------------------------------

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return isObject(value) && Object.values(value).every((v) => typeof v === 'string');
}

function isSealed(value: unknown): value is SealedPayload {
  return isObject(value) && typeof value['payload'] === 'string' && typeof value['mac'] === 'string';
}

/**
 * Parse the JSON text of a memo sidecar file. Returns null when the text is
 * not JSON or does not have the shape of any known encoding.
 */
export function parseMemoRecord(text: string): MemoRecord | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isObject(raw)) {
    return null;
  }

  const { encoding, args, values } = raw;
  if (encoding === 'str-hash' && typeof args === 'string' && isStringRecord(values)) {
    return { encoding, args, values };
  }
  if (encoding === 'authenticated' && isSealed(args) && isSealed(values)) {
    return {
      encoding,
      args: { payload: args.payload, mac: args.mac },
      values: { payload: values.payload, mac: values.mac },
    };
  }
  return null;
}

export function serializeMemoRecord(record: MemoRecord): string {
  return JSON.stringify(record);
}
