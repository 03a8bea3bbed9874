/**
 * Quadratic Extension Field
 *
 * F_p2 = F_p[u] / (u² - β) for a quadratic non-residue β. Elements are
 * c0 + c1·u and are encoded as c0 ‖ c1.
 */

import type { FieldElement, Fp2Element, Fp2Extension } from '../types.js';
import { fieldMismatchError, unknownParameterError } from '../errors.js';
import {
  createFieldElement,
  createOneFieldElement,
  createZeroFieldElement,
  fieldElementsEqual,
  getFieldElementValue,
  isZeroFieldElement,
} from '../field/element.js';
import { fieldAdd, fieldMul, fieldNeg, fieldPow, fieldSub } from '../field/operations.js';
import { decodeFp, encodeFp } from '../field/serialization.js';
import { concatBytes } from '../encoding/bytes.js';

/**
 * Derive the Frobenius coefficients β^((p^i - 1) / 2), i = 0, 1
 *
 * @throws PairingCodecError UNKNOWN_PARAMETER if p - 1 is not even
 */
export function calculateFp2FrobeniusCoeffs(
  nonResidue: FieldElement,
  modulus: bigint
): [FieldElement, FieldElement] {
  const power = modulus - 1n;
  if (power % 2n !== 0n) {
    throw unknownParameterError('Failed to calculate Frobenius coeffs for Fp2', {
      modulus: modulus.toString(),
    });
  }

  return [createOneFieldElement(nonResidue.field), fieldPow(nonResidue, power / 2n)];
}

/**
 * Build a quadratic extension over the non-residue's field
 *
 * The non-residue is not validated here; {@link createFp2Extension} does
 * that for wire input.
 */
export function createFp2ExtensionField(nonResidue: FieldElement, modulus: bigint): Fp2Extension {
  const frobeniusCoeffsC1: readonly [FieldElement, FieldElement] = calculateFp2FrobeniusCoeffs(
    nonResidue,
    modulus
  );
  Object.freeze(frobeniusCoeffsC1);
  const extension: Fp2Extension = {
    degree: 2,
    field: nonResidue.field,
    nonResidue,
    frobeniusCoeffsC1,
  };
  return Object.freeze(extension);
}

function assertSameExtension(a: Fp2Element, b: Fp2Element): void {
  if (a.extension === b.extension) {
    return;
  }
  if (
    a.extension.field.modulus !== b.extension.field.modulus ||
    !fieldElementsEqual(a.extension.nonResidue, b.extension.nonResidue)
  ) {
    throw fieldMismatchError(
      a.extension.field.modulus.toString(),
      b.extension.field.modulus.toString()
    );
  }
}

/**
 * Create an Fp2 element from integer components (reduced modulo p)
 */
export function createFp2Element(c0: bigint, c1: bigint, extension: Fp2Extension): Fp2Element {
  return {
    c0: createFieldElement(c0, extension.field),
    c1: createFieldElement(c1, extension.field),
    extension,
  };
}

export function fp2Zero(extension: Fp2Extension): Fp2Element {
  const zero = createZeroFieldElement(extension.field);
  return { c0: zero, c1: zero, extension };
}

export function fp2One(extension: Fp2Extension): Fp2Element {
  return {
    c0: createOneFieldElement(extension.field),
    c1: createZeroFieldElement(extension.field),
    extension,
  };
}

export function fp2IsZero(a: Fp2Element): boolean {
  return isZeroFieldElement(a.c0) && isZeroFieldElement(a.c1);
}

export function fp2Equals(a: Fp2Element, b: Fp2Element): boolean {
  return fieldElementsEqual(a.c0, b.c0) && fieldElementsEqual(a.c1, b.c1);
}

export function fp2Add(a: Fp2Element, b: Fp2Element): Fp2Element {
  assertSameExtension(a, b);
  return { c0: fieldAdd(a.c0, b.c0), c1: fieldAdd(a.c1, b.c1), extension: a.extension };
}

export function fp2Sub(a: Fp2Element, b: Fp2Element): Fp2Element {
  assertSameExtension(a, b);
  return { c0: fieldSub(a.c0, b.c0), c1: fieldSub(a.c1, b.c1), extension: a.extension };
}

export function fp2Neg(a: Fp2Element): Fp2Element {
  return { c0: fieldNeg(a.c0), c1: fieldNeg(a.c1), extension: a.extension };
}

/**
 * (a0 + a1·u)(b0 + b1·u) = (a0·b0 + β·a1·b1) + (a0·b1 + a1·b0)·u
 */
export function fp2Mul(a: Fp2Element, b: Fp2Element): Fp2Element {
  assertSameExtension(a, b);
  const { nonResidue } = a.extension;
  const c0 = fieldAdd(fieldMul(a.c0, b.c0), fieldMul(nonResidue, fieldMul(a.c1, b.c1)));
  const c1 = fieldAdd(fieldMul(a.c0, b.c1), fieldMul(a.c1, b.c0));
  return { c0, c1, extension: a.extension };
}

export function fp2Square(a: Fp2Element): Fp2Element {
  return fp2Mul(a, a);
}

/**
 * Exponentiation by a non-negative integer (square-and-multiply)
 */
export function fp2Pow(a: Fp2Element, exp: bigint): Fp2Element {
  if (exp < 0n) {
    throw new RangeError('Exponent must be non-negative');
  }
  let result = fp2One(a.extension);
  let base = a;
  let e = exp;
  while (e > 0n) {
    if (e & 1n) {
      result = fp2Mul(result, base);
    }
    base = fp2Square(base);
    e >>= 1n;
  }
  return result;
}

/**
 * Raise to the p^power using the precomputed Frobenius coefficients
 */
export function fp2FrobeniusMap(a: Fp2Element, power: number): Fp2Element {
  if (!Number.isInteger(power) || power < 0) {
    throw new RangeError('Frobenius power must be a non-negative integer');
  }
  const coeff = a.extension.frobeniusCoeffsC1[power % 2];
  return { c0: a.c0, c1: fieldMul(a.c1, coeff), extension: a.extension };
}

/**
 * Integer components, useful for logging and tests
 */
export function fp2ToBigints(a: Fp2Element): [bigint, bigint] {
  return [getFieldElementValue(a.c0), getFieldElementValue(a.c1)];
}

/**
 * Decode c0 ‖ c1, each exactly `byteLength` bytes
 */
export function decodeFp2(
  bytes: Uint8Array,
  byteLength: number,
  extension: Fp2Extension,
  what: string = 'Fp2'
): { element: Fp2Element; rest: Uint8Array } {
  const { element: c0, rest: afterC0 } = decodeFp(bytes, byteLength, extension.field, `${what}.c0`);
  const { element: c1, rest } = decodeFp(afterC0, byteLength, extension.field, `${what}.c1`);
  return { element: { c0, c1, extension }, rest };
}

/**
 * Encode c0 ‖ c1 with `byteLength` bytes per component
 */
export function encodeFp2(element: Fp2Element, byteLength: number): Uint8Array {
  return concatBytes(encodeFp(element.c0, byteLength), encodeFp(element.c1, byteLength));
}
