/**
 * Field Arithmetic Operations
 *
 * Base-field arithmetic needed to validate extension parameters (Legendre
 * symbol, Frobenius coefficients) and to check curve membership. Plain
 * modular arithmetic on bigint values; elements of different fields never
 * mix.
 */

import type { FieldElement } from '../types.js';
import { LegendreSymbol } from '../types.js';
import { divisionByZeroError, fieldMismatchError } from '../errors.js';
import {
  createFieldElement,
  createZeroFieldElement,
  getFieldElementValue,
  isOneFieldElement,
  isZeroFieldElement,
} from './element.js';
import { modInverse } from './prime-field.js';

function assertSameField(a: FieldElement, b: FieldElement): void {
  if (a.field !== b.field && a.field.modulus !== b.field.modulus) {
    throw fieldMismatchError(a.field.modulus.toString(), b.field.modulus.toString());
  }
}

/**
 * Field addition: (a + b) mod p
 */
export function fieldAdd(a: FieldElement, b: FieldElement): FieldElement {
  assertSameField(a, b);

  let sum = getFieldElementValue(a) + getFieldElementValue(b);
  if (sum >= a.field.modulus) {
    sum -= a.field.modulus;
  }

  return createFieldElement(sum, a.field);
}

/**
 * Field subtraction: (a - b) mod p
 */
export function fieldSub(a: FieldElement, b: FieldElement): FieldElement {
  assertSameField(a, b);

  let diff = getFieldElementValue(a) - getFieldElementValue(b);
  if (diff < 0n) {
    diff += a.field.modulus;
  }

  return createFieldElement(diff, a.field);
}

/**
 * Field negation: -a mod p
 */
export function fieldNeg(a: FieldElement): FieldElement {
  if (isZeroFieldElement(a)) {
    return createZeroFieldElement(a.field);
  }

  return createFieldElement(a.field.modulus - getFieldElementValue(a), a.field);
}

/**
 * Field multiplication: (a * b) mod p
 */
export function fieldMul(a: FieldElement, b: FieldElement): FieldElement {
  assertSameField(a, b);

  const product = (getFieldElementValue(a) * getFieldElementValue(b)) % a.field.modulus;
  return createFieldElement(product, a.field);
}

/**
 * Field squaring: a² mod p
 */
export function fieldSquare(a: FieldElement): FieldElement {
  const aVal = getFieldElementValue(a);
  return createFieldElement((aVal * aVal) % a.field.modulus, a.field);
}

/**
 * Field inversion: a^(-1) mod p
 *
 * @throws PairingCodecError if a is zero or has no inverse
 */
export function fieldInv(a: FieldElement): FieldElement {
  if (isZeroFieldElement(a)) {
    throw divisionByZeroError();
  }

  const inv = modInverse(getFieldElementValue(a), a.field.modulus);
  if (inv === undefined) {
    throw divisionByZeroError();
  }

  return createFieldElement(inv, a.field);
}

/**
 * Field exponentiation: a^exp mod p (square-and-multiply)
 *
 * @param exp - Non-negative exponent
 */
export function fieldPow(a: FieldElement, exp: bigint): FieldElement {
  if (exp < 0n) {
    throw new RangeError('Exponent must be non-negative');
  }

  const modulus = a.field.modulus;
  let result = 1n;
  let base = getFieldElementValue(a);
  let e = exp;

  while (e > 0n) {
    if (e & 1n) {
      result = (result * base) % modulus;
    }
    base = (base * base) % modulus;
    e >>= 1n;
  }

  return createFieldElement(result, a.field);
}

/**
 * Legendre symbol of `a` computed as a^exponent
 *
 * With exponent (p - 1) / 2 this is Euler's criterion: one means residue,
 * zero means a is zero, anything else (p - 1 for a prime p) is a
 * non-residue.
 */
export function legendreSymbol(a: FieldElement, exponent: bigint): LegendreSymbol {
  const power = fieldPow(a, exponent);
  if (isZeroFieldElement(power)) {
    return LegendreSymbol.Zero;
  }
  if (isOneFieldElement(power)) {
    return LegendreSymbol.QuadraticResidue;
  }
  return LegendreSymbol.QuadraticNonResidue;
}
