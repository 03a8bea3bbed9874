/**
 * Prime Field Construction
 *
 * Builds the immutable PrimeField context from a parsed modulus. The limb
 * representation is chosen here from the modulus bit length.
 */

import type { LimbCount, PrimeField } from '../types.js';
import { getConfig } from '../config.js';
import { unexpectedZeroError, unsupportedModulusError } from '../errors.js';
import { bitLengthOf, limbCountFor } from '../encoding/bytes.js';
import { createDebugLogger } from '../debug.js';

const debugLog = createDebugLogger('field');

const SUPPORTED_LIMB_COUNTS: readonly LimbCount[] = [
  1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15, 16,
];

/**
 * Type guard for the closed set of limb representations
 */
export function isSupportedLimbCount(count: number): count is LimbCount {
  return SUPPORTED_LIMB_COUNTS.some((supported) => supported === count);
}

/**
 * Narrow a limb count that the length limits already bound to 1..16
 *
 * @throws RangeError if the count is outside the supported set
 */
export function assertLimbCount(count: number): LimbCount {
  if (!isSupportedLimbCount(count)) {
    throw new RangeError(`Unsupported limb count ${count}`);
  }
  return count;
}

/**
 * Compute a^-1 mod m using the extended Euclidean algorithm
 *
 * @returns The inverse, or undefined when gcd(a, m) != 1
 */
export function modInverse(a: bigint, modulus: bigint): bigint | undefined {
  let [oldR, newR] = [((a % modulus) + modulus) % modulus, modulus];
  let [oldS, s] = [1n, 0n];

  while (newR !== 0n) {
    const quotient = oldR / newR;
    [oldR, newR] = [newR, oldR - quotient * newR];
    [oldS, s] = [s, oldS - quotient * s];
  }

  if (oldR !== 1n) {
    return undefined;
  }
  return ((oldS % modulus) + modulus) % modulus;
}

/**
 * Create a prime field from its modulus
 *
 * @param modulus - The field modulus (assumed prime; primality is not tested)
 * @param byteLength - Byte length of the modulus on the wire; every element
 *   of this field is encoded with exactly this many bytes
 * @throws PairingCodecError UNEXPECTED_ZERO for a zero modulus,
 *   UNSUPPORTED_MODULUS when no field can be built
 */
export function createPrimeField(modulus: bigint, byteLength: number): PrimeField {
  if (modulus === 0n) {
    throw unexpectedZeroError('Modulus');
  }

  const { maxModulusByteLength } = getConfig();
  if (byteLength > maxModulusByteLength) {
    throw unsupportedModulusError(`modulus length ${byteLength} exceeds ${maxModulusByteLength} bytes`, {
      byteLength,
      limit: maxModulusByteLength,
    });
  }

  if (modulus < 3n) {
    throw unsupportedModulusError('modulus must be at least 3', { modulus: modulus.toString() });
  }

  const bitLength = bitLengthOf(modulus);
  if (bitLength > byteLength * 8) {
    throw unsupportedModulusError('modulus does not fit into its declared length', {
      byteLength,
      bitLength,
    });
  }

  // p is taken to be prime; no even number above 2 is
  if (modulus % 2n === 0n) {
    throw unsupportedModulusError('modulus must be odd', { modulus: modulus.toString() });
  }

  // byteLength <= 128 bounds the count to 16
  const limbCount = assertLimbCount(limbCountFor(modulus));

  debugLog('Created prime field', { bitLength, byteLength, limbCount });

  return Object.freeze({ modulus, byteLength, bitLength, limbCount });
}
