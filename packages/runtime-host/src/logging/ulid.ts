/**
 * Kiln Runtime Host: ULID Generator
 *
 * 26-character, lexicographically sortable identifiers (Crockford Base32):
 * 10 characters of millisecond timestamp followed by 16 characters of
 * randomness. Used as event_id in the JSONL build log so that entries can
 * be deduplicated when logs are merged.
 *
 * Identifiers from one generator are strictly increasing: within the same
 * millisecond the random part of the previous identifier is incremented
 * instead of redrawn.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

const ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';
const TIME_LEN = 10;
const RANDOM_LEN = 16;
const RANDOM_BYTES = 10;
const RANDOM_MAX = (1n << 80n) - 1n;

function encode(value: bigint, length: number): string {
  let out = '';
  let rest = value;
  for (let i = 0; i < length; i++) {
    out = `${ALPHABET.charAt(Number(rest & 31n))}${out}`;
    rest >>= 5n;
  }
  return out;
}

function toBigInt(bytes: Uint8Array): bigint {
  return bytes.reduce((acc, byte) => (acc << 8n) | BigInt(byte), 0n);
}

export interface UlidSource {
  readonly now?: () => number;
  readonly random?: (size: number) => Uint8Array;
}

/** A ULID generator with its own monotonic state. */
export function createUlidGenerator(source: UlidSource = {}): () => string {
  const now = source.now ?? Date.now;
  const random = source.random ?? randomBytes;
  let lastTime = -1;
  let lastRandom = 0n;

  return () => {
    const time = now();
    if (time === lastTime && lastRandom < RANDOM_MAX) {
      lastRandom += 1n;
    } else {
      lastTime = time;
      lastRandom = toBigInt(random(RANDOM_BYTES));
    }
    return encode(BigInt(time), TIME_LEN) + encode(lastRandom, RANDOM_LEN);
  };
}

/** Process-wide generator. */
export const ulid = createUlidGenerator();
