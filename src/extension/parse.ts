/**
 * Extension Field Parsing
 *
 * Wire form: `[degree tag][non-residue: one Fp element]`, once per
 * extension. The tag is checked before any non-residue byte is read.
 */

import type { Fp2Element, Fp2Extension, Fp3Element, Fp3Extension, PrimeField } from '../types.js';
import { LegendreSymbol } from '../types.js';
import { getConfig } from '../config.js';
import { readByte } from '../encoding/length-prefixed.js';
import {
  nonResidueError,
  unexpectedZeroError,
  unknownParameterError,
} from '../errors.js';
import { getFieldElementValue, isOneFieldElement, isZeroFieldElement } from '../field/element.js';
import { legendreSymbol } from '../field/operations.js';
import { decodeFp } from '../field/serialization.js';
import type { ParsedCoefficients } from '../field/parse.js';
import { createDebugLogger } from '../debug.js';
import { createFp2ExtensionField, decodeFp2 } from './fp2.js';
import { createFp3ExtensionField, decodeFp3 } from './fp3.js';

const debugLog = createDebugLogger('extension');

export const EXTENSION_DEGREE_2 = 2;
export const EXTENSION_DEGREE_3 = 3;

export interface ParsedExtension<E> {
  readonly extension: E;
  readonly rest: Uint8Array;
}

function readDegreeTag(bytes: Uint8Array, expected: number): Uint8Array {
  const { value: degree, rest } = readByte(bytes, 'extension degree');
  if (degree !== expected) {
    debugLog('Rejected extension degree tag', { degree, expected });
    throw unknownParameterError(`Extension degree expected to be ${expected}`, {
      degree,
      expected,
    });
  }
  return rest;
}

/**
 * Parse a quadratic extension: degree tag 2, then a quadratic non-residue
 *
 * @param modulus - Base field modulus, used for the Legendre symbol and the
 *   Frobenius coefficients
 * @throws PairingCodecError UNKNOWN_PARAMETER, UNEXPECTED_ZERO,
 *   NON_RESIDUE_EXPECTED, INPUT_TOO_SHORT or INVALID_FIELD_ELEMENT
 */
export function createFp2Extension(
  bytes: Uint8Array,
  modulus: bigint,
  fieldByteLength: number,
  field: PrimeField
): ParsedExtension<Fp2Extension> {
  const afterTag = readDegreeTag(bytes, EXTENSION_DEGREE_2);

  const { element: nonResidue, rest } = decodeFp(afterTag, fieldByteLength, field, 'Fp2 non-residue');
  if (isZeroFieldElement(nonResidue)) {
    throw unexpectedZeroError('Fp2 non-residue');
  }

  const symbol = legendreSymbol(nonResidue, (modulus - 1n) >> 1n);
  if (symbol === LegendreSymbol.QuadraticResidue || symbol === LegendreSymbol.Zero) {
    debugLog('Rejected quadratic residue used as Fp2 non-residue');
    throw nonResidueError('Fp2', getFieldElementValue(nonResidue).toString());
  }

  const extension = createFp2ExtensionField(nonResidue, modulus);
  debugLog('Created Fp2 extension', { fieldByteLength });
  return { extension, rest };
}

/**
 * Parse a cubic extension: degree tag 3, then a non-residue
 *
 * No residuosity test is applied unless `requireCubicNonResidue` is
 * configured; then β^((p-1)/3) = 1 (a cubic residue) is rejected.
 */
export function createFp3Extension(
  bytes: Uint8Array,
  modulus: bigint,
  fieldByteLength: number,
  field: PrimeField
): ParsedExtension<Fp3Extension> {
  const afterTag = readDegreeTag(bytes, EXTENSION_DEGREE_3);

  const { element: nonResidue, rest } = decodeFp(afterTag, fieldByteLength, field, 'Fp3 non-residue');
  if (isZeroFieldElement(nonResidue)) {
    throw unexpectedZeroError('Fp3 non-residue');
  }

  const extension = createFp3ExtensionField(nonResidue, modulus);
  if (getConfig().requireCubicNonResidue && isOneFieldElement(extension.frobeniusCoeffsC1[1])) {
    debugLog('Rejected cubic residue used as Fp3 non-residue');
    throw nonResidueError('Fp3', getFieldElementValue(nonResidue).toString());
  }

  debugLog('Created Fp3 extension', { fieldByteLength });
  return { extension, rest };
}

/**
 * Decode curve coefficients a and b in Fp2
 */
export function parseAbInFp2(
  bytes: Uint8Array,
  modulusByteLength: number,
  extension: Fp2Extension
): ParsedCoefficients<Fp2Element> {
  const { element: a, rest: afterA } = decodeFp2(bytes, modulusByteLength, extension, 'A');
  const { element: b, rest } = decodeFp2(afterA, modulusByteLength, extension, 'B');
  return { a, b, rest };
}

/**
 * Decode curve coefficients a and b in Fp3
 */
export function parseAbInFp3(
  bytes: Uint8Array,
  modulusByteLength: number,
  extension: Fp3Extension
): ParsedCoefficients<Fp3Element> {
  const { element: a, rest: afterA } = decodeFp3(bytes, modulusByteLength, extension, 'A');
  const { element: b, rest } = decodeFp3(afterA, modulusByteLength, extension, 'B');
  return { a, b, rest };
}
