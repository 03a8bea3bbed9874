/**
 * Field Element Serialization
 *
 * Canonical fixed-length big-endian codec for base-field elements. The
 * encoded length is the modulus length declared on the wire, not the
 * minimal length of the modulus, so leading zero bytes are expected.
 */

import type { PrimeField, FieldElement } from '../types.js';
import { bigintToBytesBE, bytesToBigintBE } from '../encoding/bytes.js';
import { splitBytes } from '../encoding/length-prefixed.js';
import { createCanonicalFieldElement, getFieldElementValue } from './element.js';

export interface DecodedFp {
  readonly element: FieldElement;
  readonly rest: Uint8Array;
}

/**
 * Decode one field element of exactly `byteLength` bytes
 *
 * @param what - Name of the element for error messages (default "Fp")
 * @throws PairingCodecError INPUT_TOO_SHORT or INVALID_FIELD_ELEMENT
 */
export function decodeFp(
  bytes: Uint8Array,
  byteLength: number,
  field: PrimeField,
  what: string = 'Fp'
): DecodedFp {
  const { head, rest } = splitBytes(bytes, byteLength, what);
  const element = createCanonicalFieldElement(bytesToBigintBE(head), field, what);
  return { element, rest };
}

/**
 * Encode a field element as exactly `byteLength` big-endian bytes
 */
export function encodeFp(element: FieldElement, byteLength: number): Uint8Array {
  return bigintToBytesBE(getFieldElementValue(element), byteLength);
}

/**
 * Serialize a field element to a hex string of its field's byte length
 *
 * @param prefix - Whether to include '0x' prefix
 */
export function fieldElementToHex(element: FieldElement, prefix: boolean = true): string {
  const hex = getFieldElementValue(element)
    .toString(16)
    .padStart(element.field.byteLength * 2, '0');
  return prefix ? '0x' + hex : hex;
}

/**
 * Deserialize a hex string to a field element
 *
 * @throws PairingCodecError if the value is not below the modulus
 */
export function fieldElementFromHex(hex: string, field: PrimeField): FieldElement {
  const cleanHex = hex.startsWith('0x') ? hex.slice(2) : hex;
  const value = cleanHex.length === 0 ? 0n : BigInt('0x' + cleanHex);
  return createCanonicalFieldElement(value, field);
}
