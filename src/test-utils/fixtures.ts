/**
 * Wire-format builders for tests
 */

import { bigintToBytesBE, bitLengthOf, concatBytes } from '../encoding/bytes.js';
import { PairingCodecError } from '../errors.js';

/**
 * `[len][value]` with the minimal big-endian length (or an explicit one)
 */
export function lengthPrefixed(value: bigint, length: number = Math.ceil(bitLengthOf(value) / 8)): Uint8Array {
  return concatBytes(Uint8Array.of(length), bigintToBytesBE(value, length));
}

export function bytes(...values: number[]): Uint8Array {
  return Uint8Array.from(values);
}

/**
 * Run `fn`, require it to throw a PairingCodecError and return the error
 */
export function catchCodecError(fn: () => unknown): PairingCodecError {
  try {
    fn();
  } catch (error) {
    if (error instanceof PairingCodecError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a PairingCodecError to be thrown');
}
