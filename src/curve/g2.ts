/**
 * G2 Point Decoding and Encoding
 *
 * Points on a quadratic or cubic twist: X ‖ Y where each coordinate is an
 * extension element encoded component by component in tower order.
 */

import type {
  Fp2Element,
  Fp3Element,
  G2PointFp2,
  G2PointFp3,
  GroupOrder,
  TwistCurveFp2,
  TwistCurveFp3,
} from '../types.js';
import { concatBytes } from '../encoding/bytes.js';
import {
  decodeFp2,
  encodeFp2,
  fp2Add,
  fp2Equals,
  fp2IsZero,
  fp2Mul,
  fp2Square,
  fp2Zero,
} from '../extension/fp2.js';
import {
  decodeFp3,
  encodeFp3,
  fp3Add,
  fp3Equals,
  fp3IsZero,
  fp3Mul,
  fp3Square,
  fp3Zero,
} from '../extension/fp3.js';

export interface DecodedG2Point<P> {
  readonly point: P;
  readonly rest: Uint8Array;
}

// ============================================================================
// Quadratic twist
// ============================================================================

export function createTwistCurveFp2(a: Fp2Element, b: Fp2Element, order?: GroupOrder): TwistCurveFp2 {
  const curve: TwistCurveFp2 =
    order === undefined
      ? { extension: a.extension, a, b }
      : { extension: a.extension, a, b, order };
  return Object.freeze(curve);
}

export function createG2PointFp2(x: Fp2Element, y: Fp2Element, curve: TwistCurveFp2): G2PointFp2 {
  return { x, y, isInfinity: fp2IsZero(x) && fp2IsZero(y), curve };
}

export function createG2InfinityFp2(curve: TwistCurveFp2): G2PointFp2 {
  const zero = fp2Zero(curve.extension);
  return { x: zero, y: zero, isInfinity: true, curve };
}

/**
 * Decode X ‖ Y with Fp2 coordinates (4 × `fieldByteLength` bytes)
 */
export function decodeG2PointInFp2(
  bytes: Uint8Array,
  fieldByteLength: number,
  curve: TwistCurveFp2
): DecodedG2Point<G2PointFp2> {
  const { element: x, rest: afterX } = decodeFp2(bytes, fieldByteLength, curve.extension, 'X');
  const { element: y, rest } = decodeFp2(afterX, fieldByteLength, curve.extension, 'Y');
  return { point: createG2PointFp2(x, y, curve), rest };
}

export function serializeG2PointInFp2(modulusByteLength: number, point: G2PointFp2): Uint8Array {
  if (point.isInfinity) {
    return new Uint8Array(4 * modulusByteLength);
  }
  return concatBytes(encodeFp2(point.x, modulusByteLength), encodeFp2(point.y, modulusByteLength));
}

export function isOnCurveG2Fp2(point: G2PointFp2): boolean {
  if (point.isInfinity) {
    return true;
  }
  const { a, b } = point.curve;
  const lhs = fp2Square(point.y);
  const rhs = fp2Add(fp2Add(fp2Mul(fp2Square(point.x), point.x), fp2Mul(a, point.x)), b);
  return fp2Equals(lhs, rhs);
}

// ============================================================================
// Cubic twist
// ============================================================================

export function createTwistCurveFp3(a: Fp3Element, b: Fp3Element, order?: GroupOrder): TwistCurveFp3 {
  const curve: TwistCurveFp3 =
    order === undefined
      ? { extension: a.extension, a, b }
      : { extension: a.extension, a, b, order };
  return Object.freeze(curve);
}

export function createG2PointFp3(x: Fp3Element, y: Fp3Element, curve: TwistCurveFp3): G2PointFp3 {
  return { x, y, isInfinity: fp3IsZero(x) && fp3IsZero(y), curve };
}

export function createG2InfinityFp3(curve: TwistCurveFp3): G2PointFp3 {
  const zero = fp3Zero(curve.extension);
  return { x: zero, y: zero, isInfinity: true, curve };
}

/**
 * Decode X ‖ Y with Fp3 coordinates (6 × `fieldByteLength` bytes)
 */
export function decodeG2PointInFp3(
  bytes: Uint8Array,
  fieldByteLength: number,
  curve: TwistCurveFp3
): DecodedG2Point<G2PointFp3> {
  const { element: x, rest: afterX } = decodeFp3(bytes, fieldByteLength, curve.extension, 'X');
  const { element: y, rest } = decodeFp3(afterX, fieldByteLength, curve.extension, 'Y');
  return { point: createG2PointFp3(x, y, curve), rest };
}

export function serializeG2PointInFp3(modulusByteLength: number, point: G2PointFp3): Uint8Array {
  if (point.isInfinity) {
    return new Uint8Array(6 * modulusByteLength);
  }
  return concatBytes(encodeFp3(point.x, modulusByteLength), encodeFp3(point.y, modulusByteLength));
}

export function isOnCurveG2Fp3(point: G2PointFp3): boolean {
  if (point.isInfinity) {
    return true;
  }
  const { a, b } = point.curve;
  const lhs = fp3Square(point.y);
  const rhs = fp3Add(fp3Add(fp3Mul(fp3Square(point.x), point.x), fp3Mul(a, point.x)), b);
  return fp3Equals(lhs, rhs);
}
