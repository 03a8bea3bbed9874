/**
 * Property-Based Tests for Field Arithmetic
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  FAST_PROPERTY_TEST_CONFIG,
  PROPERTY_TEST_CONFIG,
  BN254_BASE_MODULUS,
  SMALL_ODD_PRIMES,
  arbitraryFieldValue,
  arbitraryNonZeroFieldValue,
  isSquareBySearch,
  modPow,
} from '../test-utils/property-test-config.js';
import { catchCodecError } from '../test-utils/fixtures.js';
import { ErrorCode } from '../errors.js';
import { LegendreSymbol } from '../types.js';
import { createPrimeField } from './prime-field.js';
import { createFieldElement, createZeroFieldElement, getFieldElementValue } from './element.js';
import {
  fieldAdd,
  fieldInv,
  fieldMul,
  fieldNeg,
  fieldPow,
  fieldSquare,
  fieldSub,
  legendreSymbol,
} from './operations.js';

describe('Legendre Symbol', () => {
  it('should agree with an exhaustive search for small primes', () => {
    for (const p of SMALL_ODD_PRIMES) {
      const field = createPrimeField(p, 1);
      const exponent = (p - 1n) >> 1n;
      for (let a = 0n; a < p; a++) {
        const expected =
          a === 0n
            ? LegendreSymbol.Zero
            : isSquareBySearch(a, p)
              ? LegendreSymbol.QuadraticResidue
              : LegendreSymbol.QuadraticNonResidue;
        expect(legendreSymbol(createFieldElement(a, field), exponent)).toBe(expected);
      }
    }
  });

  it('should classify squares as residues in BN254', () => {
    const field = createPrimeField(BN254_BASE_MODULUS, 32);
    const exponent = (BN254_BASE_MODULUS - 1n) >> 1n;
    fc.assert(
      fc.property(arbitraryNonZeroFieldValue(BN254_BASE_MODULUS), (value) => {
        const square = fieldSquare(createFieldElement(value, field));
        expect(legendreSymbol(square, exponent)).toBe(LegendreSymbol.QuadraticResidue);
      }),
      FAST_PROPERTY_TEST_CONFIG
    );
  });

  it('should classify -1 as a non-residue when p ≡ 3 (mod 4)', () => {
    const field = createPrimeField(BN254_BASE_MODULUS, 32);
    const minusOne = createFieldElement(BN254_BASE_MODULUS - 1n, field);
    expect(legendreSymbol(minusOne, (BN254_BASE_MODULUS - 1n) >> 1n)).toBe(
      LegendreSymbol.QuadraticNonResidue
    );
  });
});

describe('Field Arithmetic', () => {
  const modulus = BN254_BASE_MODULUS;
  const field = createPrimeField(modulus, 32);
  const element = (value: bigint) => createFieldElement(value, field);

  it('should match bigint arithmetic modulo p', () => {
    fc.assert(
      fc.property(arbitraryFieldValue(modulus), arbitraryFieldValue(modulus), (a, b) => {
        expect(getFieldElementValue(fieldAdd(element(a), element(b)))).toBe((a + b) % modulus);
        expect(getFieldElementValue(fieldSub(element(a), element(b)))).toBe(
          (((a - b) % modulus) + modulus) % modulus
        );
        expect(getFieldElementValue(fieldMul(element(a), element(b)))).toBe((a * b) % modulus);
        expect(getFieldElementValue(fieldNeg(element(a)))).toBe((modulus - a) % modulus);
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should satisfy a · a⁻¹ = 1', () => {
    fc.assert(
      fc.property(arbitraryNonZeroFieldValue(modulus), (a) => {
        expect(getFieldElementValue(fieldMul(element(a), fieldInv(element(a))))).toBe(1n);
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  it('should satisfy Fermat: a^(p-1) = 1', () => {
    fc.assert(
      fc.property(arbitraryNonZeroFieldValue(modulus), (a) => {
        expect(getFieldElementValue(fieldPow(element(a), modulus - 1n))).toBe(1n);
      }),
      FAST_PROPERTY_TEST_CONFIG
    );
  });

  it('should agree with plain modular exponentiation', () => {
    fc.assert(
      fc.property(arbitraryFieldValue(modulus), fc.bigInt({ min: 0n, max: 1n << 80n }), (a, e) => {
        expect(getFieldElementValue(fieldPow(element(a), e))).toBe(modPow(a, e, modulus));
      }),
      FAST_PROPERTY_TEST_CONFIG
    );
  });

  it('should reject the inverse of zero', () => {
    expect(catchCodecError(() => fieldInv(createZeroFieldElement(field))).code).toBe(
      ErrorCode.DIVISION_BY_ZERO
    );
  });

  it('should reject negative exponents', () => {
    expect(() => fieldPow(element(2n), -1n)).toThrow(RangeError);
  });

  it('should reject elements of different fields', () => {
    const other = createFieldElement(1n, createPrimeField(23n, 1));
    expect(catchCodecError(() => fieldAdd(element(1n), other)).code).toBe(ErrorCode.FIELD_MISMATCH);
    expect(catchCodecError(() => fieldMul(element(1n), other)).code).toBe(ErrorCode.FIELD_MISMATCH);
  });
});
