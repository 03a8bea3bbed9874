/**
 * Cubic Extension Field
 *
 * F_p3 = F_p[u] / (u³ - β). Elements are c0 + c1·u + c2·u² and are encoded
 * as c0 ‖ c1 ‖ c2.
 */

import type { FieldElement, Fp3Element, Fp3Extension } from '../types.js';
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

export type Fp3Coeffs = [FieldElement, FieldElement, FieldElement];

/**
 * Derive β^((p^i - 1) / 3) and β^((2p^i - 2) / 3) for i = 0, 1, 2
 *
 * @throws PairingCodecError UNKNOWN_PARAMETER unless p ≡ 1 (mod 3)
 */
export function calculateFp3FrobeniusCoeffs(
  nonResidue: FieldElement,
  modulus: bigint
): { c1: Fp3Coeffs; c2: Fp3Coeffs } {
  const one = createOneFieldElement(nonResidue.field);
  const c1: FieldElement[] = [one];
  const c2: FieldElement[] = [one];

  let qPower = 1n;
  for (let i = 1; i < 3; i++) {
    qPower *= modulus;
    const power = qPower - 1n;
    if (power % 3n !== 0n) {
      throw unknownParameterError('Failed to calculate Frobenius coeffs for Fp3', {
        modulus: modulus.toString(),
        power: i,
      });
    }
    c1.push(fieldPow(nonResidue, power / 3n));
    c2.push(fieldPow(nonResidue, (2n * power) / 3n));
  }

  return {
    c1: [c1[0], c1[1], c1[2]],
    c2: [c2[0], c2[1], c2[2]],
  };
}

/**
 * Build a cubic extension over the non-residue's field
 */
export function createFp3ExtensionField(nonResidue: FieldElement, modulus: bigint): Fp3Extension {
  const { c1, c2 } = calculateFp3FrobeniusCoeffs(nonResidue, modulus);
  Object.freeze(c1);
  Object.freeze(c2);
  const extension: Fp3Extension = {
    degree: 3,
    field: nonResidue.field,
    nonResidue,
    frobeniusCoeffsC1: c1,
    frobeniusCoeffsC2: c2,
  };
  return Object.freeze(extension);
}

function assertSameExtension(a: Fp3Element, b: Fp3Element): void {
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
 * Create an Fp3 element from integer components (reduced modulo p)
 */
export function createFp3Element(
  c0: bigint,
  c1: bigint,
  c2: bigint,
  extension: Fp3Extension
): Fp3Element {
  return {
    c0: createFieldElement(c0, extension.field),
    c1: createFieldElement(c1, extension.field),
    c2: createFieldElement(c2, extension.field),
    extension,
  };
}

export function fp3Zero(extension: Fp3Extension): Fp3Element {
  const zero = createZeroFieldElement(extension.field);
  return { c0: zero, c1: zero, c2: zero, extension };
}

export function fp3One(extension: Fp3Extension): Fp3Element {
  const zero = createZeroFieldElement(extension.field);
  return { c0: createOneFieldElement(extension.field), c1: zero, c2: zero, extension };
}

export function fp3IsZero(a: Fp3Element): boolean {
  return isZeroFieldElement(a.c0) && isZeroFieldElement(a.c1) && isZeroFieldElement(a.c2);
}

export function fp3Equals(a: Fp3Element, b: Fp3Element): boolean {
  return (
    fieldElementsEqual(a.c0, b.c0) && fieldElementsEqual(a.c1, b.c1) && fieldElementsEqual(a.c2, b.c2)
  );
}

export function fp3Add(a: Fp3Element, b: Fp3Element): Fp3Element {
  assertSameExtension(a, b);
  return {
    c0: fieldAdd(a.c0, b.c0),
    c1: fieldAdd(a.c1, b.c1),
    c2: fieldAdd(a.c2, b.c2),
    extension: a.extension,
  };
}

export function fp3Sub(a: Fp3Element, b: Fp3Element): Fp3Element {
  assertSameExtension(a, b);
  return {
    c0: fieldSub(a.c0, b.c0),
    c1: fieldSub(a.c1, b.c1),
    c2: fieldSub(a.c2, b.c2),
    extension: a.extension,
  };
}

export function fp3Neg(a: Fp3Element): Fp3Element {
  return { c0: fieldNeg(a.c0), c1: fieldNeg(a.c1), c2: fieldNeg(a.c2), extension: a.extension };
}

/**
 * Schoolbook product reduced with u³ = β
 */
export function fp3Mul(a: Fp3Element, b: Fp3Element): Fp3Element {
  assertSameExtension(a, b);
  const { nonResidue } = a.extension;

  const c0 = fieldAdd(
    fieldMul(a.c0, b.c0),
    fieldMul(nonResidue, fieldAdd(fieldMul(a.c1, b.c2), fieldMul(a.c2, b.c1)))
  );
  const c1 = fieldAdd(
    fieldAdd(fieldMul(a.c0, b.c1), fieldMul(a.c1, b.c0)),
    fieldMul(nonResidue, fieldMul(a.c2, b.c2))
  );
  const c2 = fieldAdd(
    fieldAdd(fieldMul(a.c0, b.c2), fieldMul(a.c1, b.c1)),
    fieldMul(a.c2, b.c0)
  );

  return { c0, c1, c2, extension: a.extension };
}

export function fp3Square(a: Fp3Element): Fp3Element {
  return fp3Mul(a, a);
}

export function fp3Pow(a: Fp3Element, exp: bigint): Fp3Element {
  if (exp < 0n) {
    throw new RangeError('Exponent must be non-negative');
  }
  let result = fp3One(a.extension);
  let base = a;
  let e = exp;
  while (e > 0n) {
    if (e & 1n) {
      result = fp3Mul(result, base);
    }
    base = fp3Square(base);
    e >>= 1n;
  }
  return result;
}

/**
 * Raise to the p^power using the precomputed Frobenius coefficients
 */
export function fp3FrobeniusMap(a: Fp3Element, power: number): Fp3Element {
  if (!Number.isInteger(power) || power < 0) {
    throw new RangeError('Frobenius power must be a non-negative integer');
  }
  const index = power % 3;
  return {
    c0: a.c0,
    c1: fieldMul(a.c1, a.extension.frobeniusCoeffsC1[index]),
    c2: fieldMul(a.c2, a.extension.frobeniusCoeffsC2[index]),
    extension: a.extension,
  };
}

export function fp3ToBigints(a: Fp3Element): [bigint, bigint, bigint] {
  return [getFieldElementValue(a.c0), getFieldElementValue(a.c1), getFieldElementValue(a.c2)];
}

/**
 * Decode c0 ‖ c1 ‖ c2, each exactly `byteLength` bytes
 */
export function decodeFp3(
  bytes: Uint8Array,
  byteLength: number,
  extension: Fp3Extension,
  what: string = 'Fp3'
): { element: Fp3Element; rest: Uint8Array } {
  const { field } = extension;
  const { element: c0, rest: afterC0 } = decodeFp(bytes, byteLength, field, `${what}.c0`);
  const { element: c1, rest: afterC1 } = decodeFp(afterC0, byteLength, field, `${what}.c1`);
  const { element: c2, rest } = decodeFp(afterC1, byteLength, field, `${what}.c2`);
  return { element: { c0, c1, c2, extension }, rest };
}

/**
 * Encode c0 ‖ c1 ‖ c2 with `byteLength` bytes per component
 */
export function encodeFp3(element: Fp3Element, byteLength: number): Uint8Array {
  return concatBytes(
    encodeFp(element.c0, byteLength),
    encodeFp(element.c1, byteLength),
    encodeFp(element.c2, byteLength)
  );
}
