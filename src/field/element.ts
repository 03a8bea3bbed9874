/**
 * Field Element Implementation
 *
 * Field elements are stored as canonical values in little-endian 64-bit
 * limbs, sized by the owning field's limb count. Elements and their limbs
 * are frozen.
 */

import type { PrimeField, FieldElement } from '../types.js';
import { frozenLimbs, limbsToBigint } from '../encoding/bytes.js';
import { invalidFieldElementError } from '../errors.js';

/**
 * Create a field element from a bigint value
 *
 * The value is reduced modulo the field modulus. Use
 * {@link createCanonicalFieldElement} for untrusted values.
 */
export function createFieldElement(value: bigint, field: PrimeField): FieldElement {
  let reduced = value % field.modulus;
  if (reduced < 0n) {
    reduced += field.modulus;
  }

  return Object.freeze({ limbs: frozenLimbs(reduced, field.limbCount), field });
}

/**
 * Create a field element from a value that must already be canonical
 *
 * @param what - Optional name of the element for error messages
 * @throws PairingCodecError if the value is negative or not below the modulus
 */
export function createCanonicalFieldElement(
  value: bigint,
  field: PrimeField,
  what?: string
): FieldElement {
  if (value < 0n || value >= field.modulus) {
    throw invalidFieldElementError(value.toString(), field.modulus.toString(), what);
  }
  return Object.freeze({ limbs: frozenLimbs(value, field.limbCount), field });
}

/**
 * Create the zero element for a field
 */
export function createZeroFieldElement(field: PrimeField): FieldElement {
  return Object.freeze({ limbs: frozenLimbs(0n, field.limbCount), field });
}

/**
 * Create the one element (multiplicative identity) for a field
 */
export function createOneFieldElement(field: PrimeField): FieldElement {
  return Object.freeze({ limbs: frozenLimbs(1n, field.limbCount), field });
}

/**
 * Get the bigint value of a field element
 */
export function getFieldElementValue(element: FieldElement): bigint {
  return limbsToBigint(element.limbs);
}

/**
 * Check if a field element is zero
 */
export function isZeroFieldElement(element: FieldElement): boolean {
  return element.limbs.every((limb) => limb === 0n);
}

/**
 * Check if a field element is one
 */
export function isOneFieldElement(element: FieldElement): boolean {
  return limbsToBigint(element.limbs) === 1n;
}

/**
 * Check if two field elements are equal
 */
export function fieldElementsEqual(a: FieldElement, b: FieldElement): boolean {
  if (a.field.modulus !== b.field.modulus) {
    return false;
  }

  if (a.limbs.length !== b.limbs.length) {
    return false;
  }

  for (let i = 0; i < a.limbs.length; i++) {
    if (a.limbs[i] !== b.limbs[i]) {
      return false;
    }
  }

  return true;
}
