/**
 * Kiln Kernel: Authenticated Memo
 *
 * Memo values are encoded with the V8 structured serializer, which keeps
 * the distinctions the text encoding has to spell out (bigint, -0, Map,
 * Set, bytes). Deserializing attacker-controlled bytes is not something the
 * engine should ever do, so every payload is sealed with HMAC-SHA256 and
 * verified before it is deserialized.
 *
 * Rules:
 * - At construction the eager value must survive a serialize/deserialize
 *   round trip unchanged (util.isDeepStrictEqual). Otherwise the rule cannot
 *   be registered.
 * - Verification failures raise MemoAuthenticationError. A tampered record
 *   is never reported as merely stale.
 * - Equality after verification is structural (isDeepStrictEqual), so
 *   record key order and Map / Set insertion order do not matter.
 */

import { createHmac, timingSafeEqual } from 'node:crypto';
import { isDeepStrictEqual } from 'node:util';
import { deserialize, serialize } from 'node:v8';
import { MemoAuthenticationError, MemoConfigError, MemoFormatError, MemoSerializationError } from '../errors.js';
import { evaluateLazy, type LazyMemoValue, type MemoData, type MemoProjection } from './args.js';
import type { AuthenticatedRecord, MemoRecord, RuleMemo, SealedPayload } from './memo.js';

/**
 * Accept a key as bytes or as a hex string.
 *
 * @throws MemoConfigError if the key is empty or not valid hex
 */
export function normalizeKey(key: Uint8Array | string): Uint8Array {
  if (typeof key !== 'string') {
    if (key.length === 0) {
      throw new MemoConfigError('Memo key must not be empty');
    }
    return key;
  }
  if (key.length === 0 || key.length % 2 !== 0 || !/^[0-9a-fA-F]+$/.test(key)) {
    throw new MemoConfigError('Memo key must be a non-empty, even-length hex string');
  }
  return Buffer.from(key, 'hex');
}

function mac(key: Uint8Array, bytes: Uint8Array): Buffer {
  return createHmac('sha256', key).update(bytes).digest();
}

function seal(key: Uint8Array, bytes: Uint8Array): SealedPayload {
  return { payload: Buffer.from(bytes).toString('hex'), mac: mac(key, bytes).toString('hex') };
}

function verified(key: Uint8Array, sealed: SealedPayload): Buffer | null {
  const bytes = Buffer.from(sealed.payload, 'hex');
  const expected = mac(key, bytes);
  const actual = Buffer.from(sealed.mac, 'hex');
  if (actual.length !== expected.length || !timingSafeEqual(actual, expected)) {
    return null;
  }
  return bytes;
}

function roundTrip(value: MemoData): { bytes: Buffer; restored: unknown } {
  try {
    const bytes = serialize(value);
    return { bytes, restored: deserialize(bytes) };
  } catch (err) {
    throw new MemoSerializationError('Memo value cannot be serialized', { cause: err });
  }
}

/**
 * Serialize the eager memo value and check that it round-trips.
 *
 * @throws MemoSerializationError
 */
function encodeEager(value: MemoData): Buffer {
  const { bytes, restored } = roundTrip(value);
  if (!isDeepStrictEqual(restored, value)) {
    throw new MemoSerializationError(
      'Memo value does not survive serialization unchanged. ' +
        'Wrap the offending argument with atom() and give it a plain memo value.',
    );
  }
  return bytes;
}

export class AuthenticatedMemo implements RuleMemo {
  readonly encoding = 'authenticated';
  private readonly bytes: Buffer;
  private readonly eager: MemoData;
  private readonly lazy: ReadonlyArray<LazyMemoValue>;

  constructor(
    projection: MemoProjection,
    private readonly key: Uint8Array,
  ) {
    this.eager = projection.eager;
    this.lazy = projection.lazy;
    this.bytes = encodeEager(this.eager);
  }

  matches(record: MemoRecord, source: string): boolean {
    if (record.encoding !== this.encoding) {
      throw new MemoFormatError(source, record.encoding, this.encoding);
    }
    const args = verified(this.key, record.args);
    const values = verified(this.key, record.values);
    if (args === null || values === null) {
      throw new MemoAuthenticationError(source);
    }

    if (!isDeepStrictEqual(deserialize(args), this.eager)) {
      return false;
    }
    return isDeepStrictEqual(deserialize(values), evaluateLazy(this.lazy));
  }

  toRecord(): AuthenticatedRecord {
    return {
      encoding: this.encoding,
      args: seal(this.key, this.bytes),
      values: seal(this.key, serialize(evaluateLazy(this.lazy))),
    };
  }
}
