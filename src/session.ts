/**
 * Curve Parameter Sessions
 *
 * Chains the individual parsers in the order an operation's input carries
 * them. Each function consumes exactly the bytes it describes and returns
 * the remainder for the next decode.
 *
 * G1 layout: `[len][modulus] a b [len][order]`
 * G2 layout: `[len][modulus] [degree][non-residue] a b [len][order]`
 */

import type {
  G1Point,
  GroupOrder,
  G2PointFp2,
  G2PointFp3,
  Scalar,
  TwistCurveFp2,
  TwistCurveFp3,
  WeierstrassCurve,
} from './types.js';
import { parseAbInBaseField, parseBaseFieldFromEncoding } from './field/parse.js';
import { createFp2Extension, createFp3Extension, parseAbInFp2, parseAbInFp3 } from './extension/parse.js';
import { decodeScalar, parseGroupOrderFromEncoding } from './scalar/group-order.js';
import { createWeierstrassCurve, decodeG1Point } from './curve/g1.js';
import {
  createTwistCurveFp2,
  createTwistCurveFp3,
  decodeG2PointInFp2,
  decodeG2PointInFp3,
} from './curve/g2.js';

export interface CurveParameters<C> {
  readonly curve: C;
  readonly modulusByteLength: number;
  readonly order: GroupOrder;
  readonly rest: Uint8Array;
}

export interface MulOperands<P> {
  readonly point: P;
  readonly scalar: Scalar;
  readonly rest: Uint8Array;
}

/**
 * Parse modulus, a, b and group order for a base-field curve
 */
export function parseG1CurveParameters(bytes: Uint8Array): CurveParameters<WeierstrassCurve> {
  const { field, modulusByteLength, rest: afterField } = parseBaseFieldFromEncoding(bytes);
  const { a, b, rest: afterAb } = parseAbInBaseField(afterField, modulusByteLength, field);
  const { order, rest } = parseGroupOrderFromEncoding(afterAb);
  return { curve: createWeierstrassCurve(a, b, order), modulusByteLength, order, rest };
}

/**
 * Parse modulus, quadratic extension, a, b and group order for a twist
 */
export function parseG2CurveParametersInFp2(bytes: Uint8Array): CurveParameters<TwistCurveFp2> {
  const { field, modulusByteLength, modulus, rest: afterField } = parseBaseFieldFromEncoding(bytes);
  const { extension, rest: afterExtension } = createFp2Extension(
    afterField,
    modulus,
    modulusByteLength,
    field
  );
  const { a, b, rest: afterAb } = parseAbInFp2(afterExtension, modulusByteLength, extension);
  const { order, rest } = parseGroupOrderFromEncoding(afterAb);
  return { curve: createTwistCurveFp2(a, b, order), modulusByteLength, order, rest };
}

/**
 * Parse modulus, cubic extension, a, b and group order for a twist
 */
export function parseG2CurveParametersInFp3(bytes: Uint8Array): CurveParameters<TwistCurveFp3> {
  const { field, modulusByteLength, modulus, rest: afterField } = parseBaseFieldFromEncoding(bytes);
  const { extension, rest: afterExtension } = createFp3Extension(
    afterField,
    modulus,
    modulusByteLength,
    field
  );
  const { a, b, rest: afterAb } = parseAbInFp3(afterExtension, modulusByteLength, extension);
  const { order, rest } = parseGroupOrderFromEncoding(afterAb);
  return { curve: createTwistCurveFp3(a, b, order), modulusByteLength, order, rest };
}

function decodeMulScalar<P>(point: P, bytes: Uint8Array, order: GroupOrder): MulOperands<P> {
  const { scalar, rest } = decodeScalar(bytes, order);
  return { point, scalar, rest };
}

/**
 * Decode a point followed by a scalar for base-field multiplication
 */
export function decodeG1MulOperands(
  bytes: Uint8Array,
  params: CurveParameters<WeierstrassCurve>
): MulOperands<G1Point> {
  const { point, rest } = decodeG1Point(bytes, params.modulusByteLength, params.curve);
  return decodeMulScalar(point, rest, params.order);
}

/**
 * Decode a quadratic-twist point followed by a scalar
 */
export function decodeG2MulOperandsInFp2(
  bytes: Uint8Array,
  params: CurveParameters<TwistCurveFp2>
): MulOperands<G2PointFp2> {
  const { point, rest } = decodeG2PointInFp2(bytes, params.modulusByteLength, params.curve);
  return decodeMulScalar(point, rest, params.order);
}

/**
 * Decode a cubic-twist point followed by a scalar
 */
export function decodeG2MulOperandsInFp3(
  bytes: Uint8Array,
  params: CurveParameters<TwistCurveFp3>
): MulOperands<G2PointFp3> {
  const { point, rest } = decodeG2PointInFp3(bytes, params.modulusByteLength, params.curve);
  return decodeMulScalar(point, rest, params.order);
}
