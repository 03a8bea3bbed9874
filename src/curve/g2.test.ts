/**
 * Tests for G2 point decoding and encoding
 */

import { describe, it, expect } from 'vitest';
import { ErrorCode } from '../errors.js';
import { bytes, catchCodecError } from '../test-utils/fixtures.js';
import { createPrimeField } from '../field/prime-field.js';
import { createFieldElement } from '../field/element.js';
import { createFp2Element, createFp2ExtensionField, fp2ToBigints } from '../extension/fp2.js';
import { createFp3Element, createFp3ExtensionField, fp3ToBigints } from '../extension/fp3.js';
import {
  createG2InfinityFp2,
  createG2InfinityFp3,
  createTwistCurveFp2,
  createTwistCurveFp3,
  decodeG2PointInFp2,
  decodeG2PointInFp3,
  isOnCurveG2Fp2,
  isOnCurveG2Fp3,
  serializeG2PointInFp2,
  serializeG2PointInFp3,
} from './g2.js';

const F23 = createPrimeField(23n, 1);
const fp2 = createFp2ExtensionField(createFieldElement(22n, F23), 23n);
const twist2 = createTwistCurveFp2(createFp2Element(1n, 0n, fp2), createFp2Element(1n, 0n, fp2));

const F7 = createPrimeField(7n, 1);
const fp3 = createFp3ExtensionField(createFieldElement(3n, F7), 7n);
const twist3 = createTwistCurveFp3(createFp3Element(0n, 0n, 0n, fp3), createFp3Element(3n, 0n, 0n, fp3));

describe('G2 points over Fp2', () => {
  it('should decode X ‖ Y in tower order and re-encode identically', () => {
    const input = bytes(3, 0, 10, 0);
    const { point, rest } = decodeG2PointInFp2(input, 1, twist2);
    expect(fp2ToBigints(point.x)).toEqual([3n, 0n]);
    expect(fp2ToBigints(point.y)).toEqual([10n, 0n]);
    expect(rest.length).toBe(0);
    expect(isOnCurveG2Fp2(point)).toBe(true);
    expect(Array.from(serializeG2PointInFp2(1, point))).toEqual([3, 0, 10, 0]);
  });

  it('should reject a point off the twist', () => {
    const { point } = decodeG2PointInFp2(bytes(3, 0, 10, 1), 1, twist2);
    expect(isOnCurveG2Fp2(point)).toBe(false);
  });

  it('should name the missing component', () => {
    const error = catchCodecError(() => decodeG2PointInFp2(bytes(3, 0, 10), 1, twist2));
    expect(error.code).toBe(ErrorCode.INPUT_TOO_SHORT);
    expect(error.details).toEqual({ what: 'Y.c1', needed: 1, available: 0 });
  });

  it('should name the non-canonical component', () => {
    const error = catchCodecError(() => decodeG2PointInFp2(bytes(3, 23, 10, 0), 1, twist2));
    expect(error.details).toEqual({ value: '23', modulus: '23', what: 'X.c1' });
  });

  it('should encode infinity as zeros', () => {
    const infinity = createG2InfinityFp2(twist2);
    expect(isOnCurveG2Fp2(infinity)).toBe(true);
    expect(Array.from(serializeG2PointInFp2(1, infinity))).toEqual([0, 0, 0, 0]);
    expect(decodeG2PointInFp2(bytes(0, 0, 0, 0), 1, twist2).point.isInfinity).toBe(true);
  });
});

describe('G2 points over Fp3', () => {
  it('should decode six components and re-encode identically', () => {
    const { point, rest } = decodeG2PointInFp3(bytes(1, 2, 3, 4, 5, 6, 7), 1, twist3);
    expect(fp3ToBigints(point.x)).toEqual([1n, 2n, 3n]);
    expect(fp3ToBigints(point.y)).toEqual([4n, 5n, 6n]);
    expect(Array.from(rest)).toEqual([7]);
    expect(Array.from(serializeG2PointInFp3(1, point))).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('should check membership on y² = x³ + 3', () => {
    expect(isOnCurveG2Fp3(decodeG2PointInFp3(bytes(1, 0, 0, 2, 0, 0), 1, twist3).point)).toBe(true);
    expect(isOnCurveG2Fp3(decodeG2PointInFp3(bytes(1, 0, 0, 3, 0, 0), 1, twist3).point)).toBe(false);
  });

  it('should name the missing component', () => {
    const error = catchCodecError(() => decodeG2PointInFp3(bytes(1, 2, 3, 4, 5), 1, twist3));
    expect(error.details).toEqual({ what: 'Y.c2', needed: 1, available: 0 });
  });

  it('should encode infinity as zeros', () => {
    const infinity = createG2InfinityFp3(twist3);
    expect(isOnCurveG2Fp3(infinity)).toBe(true);
    expect(Array.from(serializeG2PointInFp3(1, infinity))).toEqual([0, 0, 0, 0, 0, 0]);
  });
});
