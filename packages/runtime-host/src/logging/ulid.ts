/**
 * Plainsh Runtime Host — ULID Generator
 *
 * 26 characters of Crockford Base32: a 48-bit millisecond timestamp (10
 * chars) followed by 80 random bits (16 chars). History entry ids and
 * session event ids are ULIDs, so ids sort in creation order.
 *
 * Within one millisecond a generator increments the random part instead of
 * drawing a new one, so ids from one generator are strictly increasing.
 *
 * @see https://github.com/ulid/spec
 */

import { randomBytes } from 'node:crypto';

const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';
const TIME_CHARS = 10;
const RANDOM_CHARS = 16;
const RANDOM_MAX = (1n << 80n) - 1n;

function encodeCrockford(value: bigint, length: number): string {
  let out = '';
  let v = value;
  for (let i = 0; i < length; i++) {
    out = CROCKFORD_ALPHABET.charAt(Number(v & 31n)) + out;
    v >>= 5n;
  }
  return out;
}

function randomPart(): bigint {
  let value = 0n;
  for (const byte of randomBytes(10)) {
    value = (value << 8n) | BigInt(byte);
  }
  return value;
}

/** A ULID factory. `now` is injectable for tests. */
export type UlidGenerator = () => string;

export function createUlidGenerator(now: () => number = Date.now): UlidGenerator {
  let lastTime = -1;
  let lastRandom = 0n;

  return () => {
    const time = Math.max(now(), lastTime);
    if (time === lastTime && lastRandom < RANDOM_MAX) {
      lastRandom += 1n;
    } else {
      lastRandom = randomPart();
    }
    lastTime = time;
    return encodeCrockford(BigInt(time), TIME_CHARS) + encodeCrockford(lastRandom, RANDOM_CHARS);
  };
}

/** Process-wide generator. */
export const ulid: UlidGenerator = createUlidGenerator();

/** Whether `value` has the shape of a ULID. */
export function isUlid(value: string): boolean {
  return /^[0-9A-HJKMNP-TV-Z]{26}$/.test(value);
}
