/**
 * Byte and limb conversions
 *
 * All wire integers are big-endian unsigned magnitudes. Limb vectors are
 * little-endian arrays of 64-bit words.
 */

import { serializationError } from '../errors.js';

const LIMB_MASK = (1n << 64n) - 1n;

/**
 * Convert bytes to bigint (big-endian)
 */
export function bytesToBigintBE(bytes: Uint8Array): bigint {
  let result = 0n;
  for (const byte of bytes) {
    result = (result << 8n) | BigInt(byte);
  }
  return result;
}

/**
 * Convert a non-negative bigint to exactly `length` big-endian bytes
 *
 * @throws PairingCodecError if the value does not fit
 */
export function bigintToBytesBE(value: bigint, length: number): Uint8Array {
  if (value < 0n) {
    throw serializationError('serialize', 'value must be non-negative');
  }
  const bytes = new Uint8Array(length);
  let v = value;
  for (let i = length - 1; i >= 0; i--) {
    bytes[i] = Number(v & 0xffn);
    v >>= 8n;
  }
  if (v !== 0n) {
    throw serializationError('serialize', `value does not fit into ${length} bytes`);
  }
  return bytes;
}

/**
 * Number of significant bits of a non-negative bigint
 */
export function bitLengthOf(value: bigint): number {
  return value === 0n ? 0 : value.toString(2).length;
}

/**
 * Number of 64-bit limbs needed for a value (zero needs none)
 */
export function limbCountFor(value: bigint): number {
  return Math.ceil(bitLengthOf(value) / 64);
}

/**
 * Convert a bigint value to limbs (little-endian)
 */
export function bigintToLimbs(value: bigint, limbCount: number): BigUint64Array {
  const limbs = new BigUint64Array(limbCount);

  let v = value;
  for (let i = 0; i < limbCount; i++) {
    limbs[i] = v & LIMB_MASK;
    v >>= 64n;
  }

  return limbs;
}

/**
 * Limbs of a value as a frozen copy, safe to share
 */
export function frozenLimbs(value: bigint, limbCount: number): readonly bigint[] {
  return Object.freeze(Array.from(bigintToLimbs(value, limbCount)));
}

/**
 * Convert limbs to bigint (little-endian)
 */
export function limbsToBigint(limbs: ArrayLike<bigint>): bigint {
  let result = 0n;
  for (let i = limbs.length - 1; i >= 0; i--) {
    result = (result << 64n) | limbs[i];
  }
  return result;
}

/**
 * Concatenate byte arrays
 */
export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const result = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}
