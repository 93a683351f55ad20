/**
 * Entropy for secret generation, hints and commitment salts.
 *
 * The engine never touches a global random source; every session is handed
 * one of these, so a test can pin down exactly what gets drawn.
 */

import { randomBytes } from '@noble/hashes/utils.js';

export interface RandomSource {
  /** Uniform integer in `[0, maxExclusive)`. */
  nextInt(maxExclusive: number): number;
  bytes(length: number): Uint8Array;
}

const UINT32_RANGE = 0x1_0000_0000;

function checkBound(maxExclusive: number): void {
  if (!Number.isInteger(maxExclusive) || maxExclusive < 1 || maxExclusive > UINT32_RANGE) {
    throw new RangeError(`maxExclusive must be an integer in [1, 2^32], got ${maxExclusive}`);
  }
}

/** Backed by the platform CSPRNG. Rejection sampling keeps `nextInt` unbiased. */
export const cryptoRandomSource: RandomSource = {
  nextInt(maxExclusive) {
    checkBound(maxExclusive);
    const limit = UINT32_RANGE - (UINT32_RANGE % maxExclusive);
    for (;;) {
      const buf = randomBytes(4);
      const value = new DataView(buf.buffer, buf.byteOffset, 4).getUint32(0);
      if (value < limit) return value % maxExclusive;
    }
  },
  bytes(length) {
    return randomBytes(length);
  },
};

/**
 * Deterministic source (mulberry32). Same seed, same draws; good enough for
 * games and tests, not for anything adversarial.
 */
export function seededRandomSource(seed: number): RandomSource {
  let state = seed >>> 0;

  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / UINT32_RANGE;
  };

  return {
    nextInt(maxExclusive) {
      checkBound(maxExclusive);
      return Math.floor(next() * maxExclusive);
    },
    bytes(length) {
      const out = new Uint8Array(length);
      for (let i = 0; i < length; i++) out[i] = Math.floor(next() * 256);
      return out;
    },
  };
}

/**
 * Replays `values` in order, each reduced modulo the bound asked for, and
 * throws once the script runs out. Only integer draws are scripted: byte
 * requests return zeros and leave the script where it is.
 *
 * For tests and replays only. A session built on it commits under an
 * all-zero salt, and the commitment of a short code can then be reversed by
 * hashing every possible code; real games use `cryptoRandomSource`.
 */
export function scriptedRandomSource(values: readonly number[]): RandomSource {
  for (const v of values) {
    if (!Number.isInteger(v) || v < 0) {
      throw new RangeError(`scripted values must be non-negative integers, got ${v}`);
    }
  }

  let cursor = 0;
  return {
    nextInt(maxExclusive) {
      checkBound(maxExclusive);
      if (cursor >= values.length) {
        throw new Error(`scripted random source exhausted after ${values.length} draws`);
      }
      return values[cursor++] % maxExclusive;
    },
    bytes(length) {
      return new Uint8Array(length);
    },
  };
}
