/**
 * Hash commitment to a secret code.
 *
 * A session publishes the commitment as soon as the code is drawn and hands
 * out the salt only when the game is over, so a driver can check afterwards
 * that the code it was scored against never changed.
 */

import { sha256 } from '@noble/hashes/sha2.js';
import { bytesToHex } from '@noble/hashes/utils.js';
import type { Color } from './mastermind';

export const SALT_LENGTH = 16;
const FIELD_BYTES = 32;

/**
 * sha256(salt || field(i0) || field(i1) ...), where each palette index is a
 * 32-byte big-endian field element.
 */
export function computeCommitment(secretIndices: readonly number[], salt: Uint8Array): string {
  const data = new Uint8Array(salt.length + secretIndices.length * FIELD_BYTES);
  data.set(salt, 0);

  secretIndices.forEach((index, i) => {
    if (!Number.isInteger(index) || index < 0 || index > 0xffff_ffff) {
      throw new RangeError(`Palette index out of range: ${index}`);
    }
    const view = new DataView(data.buffer, salt.length + (i + 1) * FIELD_BYTES - 4, 4);
    view.setUint32(0, index);
  });

  return bytesToHex(sha256(data));
}

export function paletteIndices<C extends Color>(palette: readonly C[], code: readonly C[]): number[] {
  return code.map((color) => {
    const index = palette.indexOf(color);
    if (index === -1) throw new Error(`Color ${String(color)} is not in the palette`);
    return index;
  });
}

export function verifyCommitment<C extends Color>(
  commitment: string,
  palette: readonly C[],
  secret: readonly C[],
  salt: Uint8Array,
): boolean {
  if (secret.some((color) => !palette.includes(color))) return false;
  return computeCommitment(paletteIndices(palette, secret), salt) === commitment.toLowerCase();
}
