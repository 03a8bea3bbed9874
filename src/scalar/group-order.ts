/**
 * Group Order and Scalar Parsing
 *
 * The group order is read once per operation; every scalar that follows is
 * encoded with the order's byte length and must be strictly below it.
 * Multiplication code downstream assumes reduced scalars, so the bound check
 * here is what keeps non-canonical values out.
 */

import type { GroupOrder, Scalar } from '../types.js';
import { getConfig } from '../config.js';
import { bytesToBigintBE, frozenLimbs, limbCountFor } from '../encoding/bytes.js';
import { readLengthPrefixed, splitBytes } from '../encoding/length-prefixed.js';
import {
  scalarOutOfRangeError,
  unexpectedZeroError,
  unsupportedGroupOrderError,
} from '../errors.js';
import { createDebugLogger } from '../debug.js';

const debugLog = createDebugLogger('scalar');

export interface ParsedGroupOrder {
  readonly order: GroupOrder;
  readonly rest: Uint8Array;
}

export interface DecodedScalar {
  readonly scalar: Scalar;
  readonly rest: Uint8Array;
}

/**
 * Build a GroupOrder from its value and wire length
 *
 * @throws PairingCodecError UNEXPECTED_ZERO or UNSUPPORTED_GROUP_ORDER
 */
export function createGroupOrder(value: bigint, byteLength: number): GroupOrder {
  if (value === 0n) {
    throw unexpectedZeroError('Group order');
  }
  const { maxGroupOrderByteLength } = getConfig();
  if (byteLength > maxGroupOrderByteLength) {
    throw unsupportedGroupOrderError(byteLength, maxGroupOrderByteLength);
  }
  return Object.freeze({
    value,
    byteLength,
    limbs: frozenLimbs(value, limbCountFor(value)),
  });
}

/**
 * Parse `[len][order]`
 */
export function parseGroupOrderFromEncoding(bytes: Uint8Array): ParsedGroupOrder {
  const { payload, length, rest } = readLengthPrefixed(bytes, 'group order');
  const value = bytesToBigintBE(payload);
  if (value === 0n) {
    debugLog('Rejected zero group order', { byteLength: length });
    throw unexpectedZeroError('Group order');
  }
  return { order: createGroupOrder(value, length), rest };
}

/**
 * Decode a scalar of exactly `order.byteLength` bytes
 *
 * @throws PairingCodecError INPUT_TOO_SHORT or SCALAR_OUT_OF_RANGE
 *
 * @example
 * ```typescript
 * const { scalar } = decodeScalar(Uint8Array.from([0x07]), order11);
 * scalar.value; // 7n
 * ```
 */
export function decodeScalar(bytes: Uint8Array, order: GroupOrder): DecodedScalar {
  const { head, rest } = splitBytes(bytes, order.byteLength, 'scalar');
  const value = bytesToBigintBE(head);
  if (value >= order.value) {
    debugLog('Rejected scalar outside the group order', { byteLength: order.byteLength });
    throw scalarOutOfRangeError(value.toString(), order.value.toString());
  }

  const limbCount = Math.max(limbCountFor(value), order.limbs.length);
  return {
    scalar: Object.freeze({ value, limbs: frozenLimbs(value, limbCount), order }),
    rest,
  };
}
