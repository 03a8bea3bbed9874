/**
 * Tests for group order and scalar parsing
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { configure, resetConfig } from '../config.js';
import { ErrorCode } from '../errors.js';
import { bigintToBytesBE } from '../encoding/bytes.js';
import { bytes, catchCodecError, lengthPrefixed } from '../test-utils/fixtures.js';
import { PROPERTY_TEST_CONFIG, BN254_SCALAR_MODULUS } from '../test-utils/property-test-config.js';
import { createGroupOrder, decodeScalar, parseGroupOrderFromEncoding } from './group-order.js';

describe('parseGroupOrderFromEncoding', () => {
  afterEach(() => {
    resetConfig();
  });

  it('should parse the order and return the remainder', () => {
    const { order, rest } = parseGroupOrderFromEncoding(bytes(0x01, 0x0b, 0x0f));
    expect(order.value).toBe(11n);
    expect(order.byteLength).toBe(1);
    expect(Array.from(order.limbs)).toEqual([11n]);
    expect(Array.from(rest)).toEqual([0x0f]);
  });

  it('should reject a zero order', () => {
    const error = catchCodecError(() => parseGroupOrderFromEncoding(bytes(0x01, 0x00)));
    expect(error.code).toBe(ErrorCode.UNEXPECTED_ZERO);
    expect(error.message).toBe('Group order can not be zero');
    expect(catchCodecError(() => parseGroupOrderFromEncoding(bytes(0x00))).code).toBe(
      ErrorCode.UNEXPECTED_ZERO
    );
  });

  it('should reject a zero order before checking its length', () => {
    const zeroOrder = bytes(129, ...new Array<number>(129).fill(0));
    const error = catchCodecError(() => parseGroupOrderFromEncoding(zeroOrder));
    expect(error.code).toBe(ErrorCode.UNEXPECTED_ZERO);
    expect(error.message).toBe('Group order can not be zero');
    expect(catchCodecError(() => createGroupOrder(0n, 129)).code).toBe(ErrorCode.UNEXPECTED_ZERO);
  });

  it('should report a truncated order', () => {
    const error = catchCodecError(() => parseGroupOrderFromEncoding(bytes(0x02, 0x01)));
    expect(error.code).toBe(ErrorCode.INPUT_TOO_SHORT);
    expect(error.details).toEqual({ what: 'group order', needed: 2, available: 1 });
  });

  it('should honour the configured order length limit', () => {
    configure({ maxGroupOrderByteLength: 1 });
    const error = catchCodecError(() => parseGroupOrderFromEncoding(bytes(0x02, 0x00, 0x0b)));
    expect(error.code).toBe(ErrorCode.UNSUPPORTED_GROUP_ORDER);
    expect(error.details).toEqual({ byteLength: 2, limit: 1 });
  });

  it('should reject orders longer than 16 limbs', () => {
    expect(catchCodecError(() => createGroupOrder(1n, 129)).code).toBe(ErrorCode.UNSUPPORTED_GROUP_ORDER);
  });
});

describe('decodeScalar', () => {
  const order11 = createGroupOrder(11n, 1);

  it('should reject a scalar above the order', () => {
    const { order, rest } = parseGroupOrderFromEncoding(bytes(0x01, 0x0b, 0x0f));
    const error = catchCodecError(() => decodeScalar(rest, order));
    expect(error.code).toBe(ErrorCode.SCALAR_OUT_OF_RANGE);
    expect(error.details).toEqual({ value: '15', order: '11' });
  });

  it('should reject a scalar equal to the order', () => {
    expect(catchCodecError(() => decodeScalar(bytes(0x0b), order11)).code).toBe(
      ErrorCode.SCALAR_OUT_OF_RANGE
    );
  });

  it('should accept zero and the largest valid scalar', () => {
    expect(decodeScalar(bytes(0x00), order11).scalar.value).toBe(0n);
    const { scalar, rest } = decodeScalar(bytes(0x0a, 0x01), order11);
    expect(scalar.value).toBe(10n);
    expect(scalar.order).toBe(order11);
    expect(Array.from(rest)).toEqual([0x01]);
  });

  it('should report a truncated scalar', () => {
    const order = createGroupOrder(256n, 2);
    const error = catchCodecError(() => decodeScalar(bytes(0x01), order));
    expect(error.code).toBe(ErrorCode.INPUT_TOO_SHORT);
    expect(error.details).toEqual({ what: 'scalar', needed: 2, available: 1 });
  });

  it('should widen scalar limbs to the order limb count', () => {
    const order = createGroupOrder((1n << 64n) + 1n, 9);
    expect(Array.from(order.limbs)).toEqual([1n, 1n]);
    const { scalar } = decodeScalar(bigintToBytesBE(5n, 9), order);
    expect(Array.from(scalar.limbs)).toEqual([5n, 0n]);
  });

  it('should hand out frozen orders and scalars', () => {
    const { scalar } = decodeScalar(bytes(0x07), order11);
    expect(Object.isFrozen(order11.limbs)).toBe(true);
    expect(Object.isFrozen(scalar)).toBe(true);
    expect(Reflect.set(scalar.limbs, 0, 9n)).toBe(false);
    expect(scalar.limbs[0]).toBe(7n);
  });

  it('should decode every scalar below the BN254 group order', () => {
    const { order } = parseGroupOrderFromEncoding(lengthPrefixed(BN254_SCALAR_MODULUS, 32));
    fc.assert(
      fc.property(fc.bigInt({ min: 0n, max: BN254_SCALAR_MODULUS - 1n }), (value) => {
        const { scalar, rest } = decodeScalar(bigintToBytesBE(value, 32), order);
        expect(scalar.value).toBe(value);
        expect(scalar.limbs.length).toBe(4);
        expect(rest.length).toBe(0);
      }),
      PROPERTY_TEST_CONFIG
    );
  });
});
