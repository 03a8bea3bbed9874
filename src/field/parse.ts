/**
 * Base Field Parsing
 *
 * Reads the length-prefixed modulus at the head of an operation's input and
 * builds the prime field every later decode refers to.
 */

import type { PrimeField, FieldElement } from '../types.js';
import { bytesToBigintBE } from '../encoding/bytes.js';
import { readLengthPrefixed } from '../encoding/length-prefixed.js';
import { inputTooShortError, unexpectedZeroError } from '../errors.js';
import { createDebugLogger } from '../debug.js';
import { createPrimeField } from './prime-field.js';
import { decodeFp } from './serialization.js';

const debugLog = createDebugLogger('field');

export interface ParsedBaseField {
  readonly field: PrimeField;
  readonly modulusByteLength: number;
  readonly modulus: bigint;
  readonly rest: Uint8Array;
}

export interface ParsedCoefficients<T> {
  readonly a: T;
  readonly b: T;
  readonly rest: Uint8Array;
}

/**
 * Parse `[len][modulus]` and build the prime field
 *
 * Also requires that at least one element's worth of bytes follows, so a
 * caller never starts decoding elements from a buffer that cannot hold one.
 *
 * @example
 * ```typescript
 * const { field, modulusByteLength, rest } = parseBaseFieldFromEncoding(
 *   Uint8Array.from([0x01, 0x17, 0x03, 0x05])
 * );
 * // field.modulus === 23n, modulusByteLength === 1, rest = [0x03, 0x05]
 * ```
 */
export function parseBaseFieldFromEncoding(bytes: Uint8Array): ParsedBaseField {
  const { payload, length: modulusByteLength, rest } = readLengthPrefixed(bytes, 'modulus');
  const modulus = bytesToBigintBE(payload);
  if (modulus === 0n) {
    debugLog('Rejected zero modulus', { modulusByteLength });
    throw unexpectedZeroError('Modulus');
  }

  const field = createPrimeField(modulus, modulusByteLength);
  if (rest.length < modulusByteLength) {
    throw inputTooShortError('field element', modulusByteLength, rest.length);
  }

  return { field, modulusByteLength, modulus, rest };
}

/**
 * Decode curve coefficients a and b in the base field
 */
export function parseAbInBaseField(
  bytes: Uint8Array,
  modulusByteLength: number,
  field: PrimeField
): ParsedCoefficients<FieldElement> {
  const { element: a, rest: afterA } = decodeFp(bytes, modulusByteLength, field, 'A');
  const { element: b, rest } = decodeFp(afterA, modulusByteLength, field, 'B');
  return { a, b, rest };
}
