/**
 * Length-Prefixed Reader
 *
 * Cursor primitives shared by every parser. Input is never copied or
 * mutated: each step returns views into the original buffer, and `rest` is
 * the unconsumed suffix the next step starts from.
 */

import { inputTooShortError } from '../errors.js';

/**
 * Bytes used to encode a length prefix
 */
export const BYTES_FOR_LENGTH_ENCODING = 1;

export interface LengthPrefixed {
  readonly payload: Uint8Array;
  readonly length: number;
  readonly rest: Uint8Array;
}

export interface SplitBytes {
  readonly head: Uint8Array;
  readonly rest: Uint8Array;
}

/**
 * Split off exactly `length` bytes
 *
 * @param what - Name of the item, used in the error message
 * @throws PairingCodecError (INPUT_TOO_SHORT) if fewer bytes remain
 */
export function splitBytes(bytes: Uint8Array, length: number, what: string): SplitBytes {
  if (bytes.length < length) {
    throw inputTooShortError(what, length, bytes.length);
  }
  return {
    head: bytes.subarray(0, length),
    rest: bytes.subarray(length),
  };
}

/**
 * Read a single byte, e.g. an extension degree tag
 */
export function readByte(bytes: Uint8Array, what: string): { value: number; rest: Uint8Array } {
  const { head, rest } = splitBytes(bytes, 1, what);
  return { value: head[0], rest };
}

/**
 * Read a `[1-byte length L][L bytes payload]` blob
 *
 * @param what - Name of the payload, e.g. "modulus"
 */
export function readLengthPrefixed(bytes: Uint8Array, what: string): LengthPrefixed {
  const header = splitBytes(bytes, BYTES_FOR_LENGTH_ENCODING, `${what} length`);
  const length = header.head[0];
  const { head: payload, rest } = splitBytes(header.rest, length, what);
  return { payload, length, rest };
}
