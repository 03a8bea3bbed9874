/**
 * G1 Point Decoding and Encoding
 *
 * Points are affine X ‖ Y over the base field. The all-zero encoding is
 * the point at infinity. Decoding does not check curve membership; callers
 * that need it use {@link isOnCurveG1}.
 */

import type { FieldElement, G1Point, GroupOrder, WeierstrassCurve } from '../types.js';
import { fieldMismatchError, inputTooShortError } from '../errors.js';
import { concatBytes } from '../encoding/bytes.js';
import {
  createZeroFieldElement,
  fieldElementsEqual,
  isZeroFieldElement,
} from '../field/element.js';
import { fieldAdd, fieldMul, fieldSquare } from '../field/operations.js';
import { decodeFp, encodeFp } from '../field/serialization.js';

export interface DecodedG1Point {
  readonly point: G1Point;
  readonly rest: Uint8Array;
}

/**
 * Create a curve y² = x³ + a·x + b over the coefficients' field
 */
export function createWeierstrassCurve(
  a: FieldElement,
  b: FieldElement,
  order?: GroupOrder
): WeierstrassCurve {
  if (a.field.modulus !== b.field.modulus) {
    throw fieldMismatchError(a.field.modulus.toString(), b.field.modulus.toString());
  }
  const curve: WeierstrassCurve = order === undefined ? { field: a.field, a, b } : { field: a.field, a, b, order };
  return Object.freeze(curve);
}

/**
 * Create an affine point; (0, 0) becomes the point at infinity
 */
export function createG1Point(x: FieldElement, y: FieldElement, curve: WeierstrassCurve): G1Point {
  for (const coordinate of [x, y]) {
    if (coordinate.field.modulus !== curve.field.modulus) {
      throw fieldMismatchError(curve.field.modulus.toString(), coordinate.field.modulus.toString());
    }
  }
  return {
    x,
    y,
    isInfinity: isZeroFieldElement(x) && isZeroFieldElement(y),
    curve,
  };
}

/**
 * Create the point at infinity for a curve
 */
export function createG1Infinity(curve: WeierstrassCurve): G1Point {
  const zero = createZeroFieldElement(curve.field);
  return { x: zero, y: zero, isInfinity: true, curve };
}

/**
 * Decode X ‖ Y, each exactly `fieldByteLength` bytes
 *
 * @throws PairingCodecError INPUT_TOO_SHORT naming the short coordinate, or
 *   INVALID_FIELD_ELEMENT naming the coordinate that is not below p
 */
export function decodeG1Point(
  bytes: Uint8Array,
  fieldByteLength: number,
  curve: WeierstrassCurve
): DecodedG1Point {
  if (bytes.length < 2 * fieldByteLength) {
    const coordinate = bytes.length < fieldByteLength ? 'X' : 'Y';
    const needed = coordinate === 'X' ? fieldByteLength : 2 * fieldByteLength;
    throw inputTooShortError(coordinate, needed, bytes.length);
  }

  const { element: x, rest: afterX } = decodeFp(bytes, fieldByteLength, curve.field, 'X');
  const { element: y, rest } = decodeFp(afterX, fieldByteLength, curve.field, 'Y');

  return { point: createG1Point(x, y, curve), rest };
}

/**
 * Encode X ‖ Y with `modulusByteLength` bytes per coordinate
 */
export function serializeG1Point(modulusByteLength: number, point: G1Point): Uint8Array {
  if (point.isInfinity) {
    return new Uint8Array(2 * modulusByteLength);
  }
  return concatBytes(encodeFp(point.x, modulusByteLength), encodeFp(point.y, modulusByteLength));
}

/**
 * Check y² = x³ + a·x + b (the point at infinity is always on the curve)
 */
export function isOnCurveG1(point: G1Point): boolean {
  if (point.isInfinity) {
    return true;
  }
  const { a, b } = point.curve;
  const lhs = fieldSquare(point.y);
  const rhs = fieldAdd(fieldAdd(fieldMul(fieldSquare(point.x), point.x), fieldMul(a, point.x)), b);
  return fieldElementsEqual(lhs, rhs);
}
