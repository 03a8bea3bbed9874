/**
 * Property-based testing configuration and utilities
 *
 * Shared fast-check settings and arbitraries. All property tests should use
 * these configurations to keep run counts consistent across the suite.
 */

import * as fc from 'fast-check';

/**
 * Standard configuration for property-based tests
 */
export const PROPERTY_TEST_CONFIG: fc.Parameters<unknown> = {
  numRuns: 100,
  verbose: true,
  seed: Date.now(), // Can be overridden for reproducibility
  endOnFailure: false,
};

/**
 * Configuration for expensive properties (large exponentiations)
 */
export const FAST_PROPERTY_TEST_CONFIG: fc.Parameters<unknown> = {
  numRuns: 20,
  verbose: false,
  seed: Date.now(),
};

/**
 * BN254 base field modulus (p ≡ 3 mod 4, p ≡ 1 mod 3)
 */
export const BN254_BASE_MODULUS =
  21888242871839275222246405745257275088696311157297823662689037894645226208583n;

/**
 * BN254 scalar field modulus (group order)
 */
export const BN254_SCALAR_MODULUS =
  21888242871839275222246405745257275088548364400416034343698204186575808495617n;

/**
 * BLS12-381 base field modulus
 */
export const BLS12_381_BASE_MODULUS =
  4002409555221667393417789825735904156556882819939007885332058136124031650490837864442687629129015664037894272559787n;

/**
 * Largest prime below 2^16
 */
export const PRIME_16_BIT = 65521n;

/**
 * Small odd primes for exhaustive checks
 */
export const SMALL_ODD_PRIMES: readonly bigint[] = [
  3n, 5n, 7n, 11n, 13n, 17n, 19n, 23n, 29n, 31n, 37n, 41n, 43n, 47n, 53n, 59n, 61n, 67n, 71n, 73n,
];

/**
 * Arbitrary generator for field values in [0, modulus)
 */
export function arbitraryFieldValue(modulus: bigint): fc.Arbitrary<bigint> {
  return fc.bigInt({ min: 0n, max: modulus - 1n });
}

/**
 * Arbitrary generator for field values in [1, modulus)
 */
export function arbitraryNonZeroFieldValue(modulus: bigint): fc.Arbitrary<bigint> {
  return fc.bigInt({ min: 1n, max: modulus - 1n });
}

/**
 * Arbitrary generator for byte arrays
 */
export function arbitraryBytes(minLength: number = 0, maxLength: number = 64): fc.Arbitrary<Uint8Array> {
  return fc.uint8Array({ minLength, maxLength });
}

/**
 * Modular exponentiation on plain bigints, independent of the library
 */
export function modPow(base: bigint, exp: bigint, modulus: bigint): bigint {
  let result = 1n;
  let b = ((base % modulus) + modulus) % modulus;
  let e = exp;
  while (e > 0n) {
    if (e & 1n) {
      result = (result * b) % modulus;
    }
    b = (b * b) % modulus;
    e >>= 1n;
  }
  return result;
}

/**
 * Whether `a` is a nonzero square modulo a small prime, by exhaustive search
 */
export function isSquareBySearch(a: bigint, p: bigint): boolean {
  for (let x = 1n; x < p; x++) {
    if ((x * x) % p === a % p) {
      return true;
    }
  }
  return false;
}
