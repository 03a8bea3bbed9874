/**
 * Tests for full operation input decoding
 */

import { describe, it, expect } from 'vitest';
import { ErrorCode } from './errors.js';
import { bytes, catchCodecError } from './test-utils/fixtures.js';
import { getFieldElementValue } from './field/element.js';
import { fp2ToBigints } from './extension/fp2.js';
import { fp3ToBigints } from './extension/fp3.js';
import { isOnCurveG1 } from './curve/g1.js';
import { isOnCurveG2Fp2, isOnCurveG2Fp3 } from './curve/g2.js';
import {
  decodeG1MulOperands,
  decodeG2MulOperandsInFp2,
  decodeG2MulOperandsInFp3,
  parseG1CurveParameters,
  parseG2CurveParametersInFp2,
  parseG2CurveParametersInFp3,
} from './session.js';

// y² = x³ + x + 1 over F23 has 28 points
const G1_INPUT = [1, 23, 1, 1, 1, 28, 3, 10, 5];
// the same curve seen as a twist over F23[u]/(u² + 1)
const G2_FP2_INPUT = [1, 23, 2, 22, 1, 0, 1, 0, 1, 28, 3, 0, 10, 0, 5];
// y² = x³ + 3 over F7 has 13 points, cubic extension by β = 3
const G2_FP3_INPUT = [1, 7, 3, 3, 0, 0, 0, 3, 0, 0, 1, 13, 1, 0, 0, 2, 0, 0, 12];

describe('G1 multiplication input', () => {
  it('should decode curve, point and scalar in order', () => {
    const params = parseG1CurveParameters(bytes(...G1_INPUT));
    expect(params.curve.field.modulus).toBe(23n);
    expect(params.modulusByteLength).toBe(1);
    expect(params.order.value).toBe(28n);
    expect(params.curve.order).toBe(params.order);

    const { point, scalar, rest } = decodeG1MulOperands(params.rest, params);
    expect(getFieldElementValue(point.x)).toBe(3n);
    expect(getFieldElementValue(point.y)).toBe(10n);
    expect(isOnCurveG1(point)).toBe(true);
    expect(scalar.value).toBe(5n);
    expect(rest.length).toBe(0);
  });

  it('should reject a scalar equal to the group order', () => {
    const input = bytes(...G1_INPUT.slice(0, -1), 28);
    const params = parseG1CurveParameters(input);
    expect(catchCodecError(() => decodeG1MulOperands(params.rest, params)).code).toBe(
      ErrorCode.SCALAR_OUT_OF_RANGE
    );
  });

  it('should report every truncation as short input', () => {
    for (let length = 0; length < G1_INPUT.length; length++) {
      const error = catchCodecError(() => {
        const params = parseG1CurveParameters(bytes(...G1_INPUT.slice(0, length)));
        return decodeG1MulOperands(params.rest, params);
      });
      expect(error.code).toBe(ErrorCode.INPUT_TOO_SHORT);
    }
  });
});

describe('G2 multiplication input over Fp2', () => {
  it('should decode curve, point and scalar in order', () => {
    const params = parseG2CurveParametersInFp2(bytes(...G2_FP2_INPUT));
    expect(getFieldElementValue(params.curve.extension.nonResidue)).toBe(22n);
    expect(fp2ToBigints(params.curve.b)).toEqual([1n, 0n]);

    const { point, scalar, rest } = decodeG2MulOperandsInFp2(params.rest, params);
    expect(fp2ToBigints(point.x)).toEqual([3n, 0n]);
    expect(isOnCurveG2Fp2(point)).toBe(true);
    expect(scalar.value).toBe(5n);
    expect(rest.length).toBe(0);
  });

  it('should reject a quadratic residue as non-residue', () => {
    const input = [...G2_FP2_INPUT];
    input[3] = 2;
    expect(catchCodecError(() => parseG2CurveParametersInFp2(bytes(...input))).code).toBe(
      ErrorCode.NON_RESIDUE_EXPECTED
    );
  });

  it('should reject a cubic degree tag', () => {
    const input = [...G2_FP2_INPUT];
    input[2] = 3;
    expect(catchCodecError(() => parseG2CurveParametersInFp2(bytes(...input))).code).toBe(
      ErrorCode.UNKNOWN_PARAMETER
    );
  });

  it('should report every truncation as short input', () => {
    for (let length = 0; length < G2_FP2_INPUT.length; length++) {
      const error = catchCodecError(() => {
        const params = parseG2CurveParametersInFp2(bytes(...G2_FP2_INPUT.slice(0, length)));
        return decodeG2MulOperandsInFp2(params.rest, params);
      });
      expect(error.code).toBe(ErrorCode.INPUT_TOO_SHORT);
    }
  });
});

describe('G2 multiplication input over Fp3', () => {
  it('should decode curve, point and scalar in order', () => {
    const params = parseG2CurveParametersInFp3(bytes(...G2_FP3_INPUT));
    expect(params.order.value).toBe(13n);
    expect(fp3ToBigints(params.curve.b)).toEqual([3n, 0n, 0n]);

    const { point, scalar, rest } = decodeG2MulOperandsInFp3(params.rest, params);
    expect(fp3ToBigints(point.y)).toEqual([2n, 0n, 0n]);
    expect(isOnCurveG2Fp3(point)).toBe(true);
    expect(scalar.value).toBe(12n);
    expect(rest.length).toBe(0);
  });

  it('should reject a scalar above the group order', () => {
    const params = parseG2CurveParametersInFp3(bytes(...G2_FP3_INPUT.slice(0, -1), 13));
    const error = catchCodecError(() => decodeG2MulOperandsInFp3(params.rest, params));
    expect(error.code).toBe(ErrorCode.SCALAR_OUT_OF_RANGE);
    expect(error.details).toEqual({ value: '13', order: '13' });
  });

  it('should report every truncation as short input', () => {
    for (let length = 0; length < G2_FP3_INPUT.length; length++) {
      const error = catchCodecError(() => {
        const params = parseG2CurveParametersInFp3(bytes(...G2_FP3_INPUT.slice(0, length)));
        return decodeG2MulOperandsInFp3(params.rest, params);
      });
      expect(error.code).toBe(ErrorCode.INPUT_TOO_SHORT);
    }
  });
});
