/**
 * Error handling for pairing-input-codec
 *
 * Every decoder in this package fails fast with a PairingCodecError. Errors
 * are terminal for the current request: they describe malformed or
 * adversarial input, never a transient condition, so callers should discard
 * the whole decode attempt and map the error to a protocol-level failure.
 */

/**
 * Error codes for decode and encode operations
 *
 * These codes allow programmatic handling of specific error conditions.
 */
export enum ErrorCode {
  // Input shape errors
  /** A declared or fixed length exceeds the bytes that remain */
  INPUT_TOO_SHORT = 'INPUT_TOO_SHORT',
  /** Modulus, group order or non-residue decoded to zero */
  UNEXPECTED_ZERO = 'UNEXPECTED_ZERO',
  /** Degree tag mismatch, or Frobenius coefficients cannot be derived */
  UNKNOWN_PARAMETER = 'UNKNOWN_PARAMETER',

  // Value errors
  /** Supplied extension non-residue is a residue (or zero) */
  NON_RESIDUE_EXPECTED = 'NON_RESIDUE_EXPECTED',
  /** Scalar is not below the group order */
  SCALAR_OUT_OF_RANGE = 'SCALAR_OUT_OF_RANGE',
  /** Field element encoding is not below the modulus */
  INVALID_FIELD_ELEMENT = 'INVALID_FIELD_ELEMENT',
  /** A prime field cannot be built for this modulus */
  UNSUPPORTED_MODULUS = 'UNSUPPORTED_MODULUS',
  /** Group order encoding exceeds the supported length */
  UNSUPPORTED_GROUP_ORDER = 'UNSUPPORTED_GROUP_ORDER',

  // Arithmetic errors
  /** Elements belong to different fields or extensions */
  FIELD_MISMATCH = 'FIELD_MISMATCH',
  /** Attempted inverse of zero */
  DIVISION_BY_ZERO = 'DIVISION_BY_ZERO',

  // Encoding errors
  /** Value does not fit into the requested fixed-length encoding */
  SERIALIZATION_ERROR = 'SERIALIZATION_ERROR',

  // Configuration errors
  /** Invalid configuration option provided */
  INVALID_CONFIG = 'INVALID_CONFIG',
}

/**
 * Base error class for pairing-input-codec
 *
 * @example
 * ```typescript
 * try {
 *   const { field, rest } = parseBaseFieldFromEncoding(input);
 * } catch (error) {
 *   if (isPairingCodecError(error) && error.code === ErrorCode.UNEXPECTED_ZERO) {
 *     return failureResponse(error.message);
 *   }
 *   throw error;
 * }
 * ```
 */
export class PairingCodecError extends Error {
  /**
   * @param message - Human-readable error message
   * @param code - Error code for programmatic handling
   * @param details - Optional context (lengths, offending values)
   */
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PairingCodecError';
    Object.setPrototypeOf(this, PairingCodecError.prototype);
  }

  /**
   * Create a string representation of the error including details
   */
  override toString(): string {
    let str = `${this.name} [${this.code}]: ${this.message}`;
    if (this.details) {
      str += ` (${JSON.stringify(this.details)})`;
    }
    return str;
  }

  /**
   * Convert error to a plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Type guard to check if an error is a PairingCodecError
 */
export function isPairingCodecError(error: unknown): error is PairingCodecError {
  return error instanceof PairingCodecError;
}

// ============================================================================
// Error Factory Functions
// ============================================================================

/**
 * Create an error for truncated input
 *
 * @param what - Name of the item that could not be read (e.g. "modulus", "Y")
 * @param needed - Number of bytes the item requires
 * @param available - Number of bytes that remain
 */
export function inputTooShortError(
  what: string,
  needed: number,
  available: number
): PairingCodecError {
  return new PairingCodecError(
    `Input is not long enough to get ${what}`,
    ErrorCode.INPUT_TOO_SHORT,
    { what, needed, available }
  );
}

/**
 * Create an error for a value that must not be zero
 *
 * @param what - Name of the value (e.g. "Modulus", "Fp2 non-residue")
 */
export function unexpectedZeroError(what: string): PairingCodecError {
  return new PairingCodecError(`${what} can not be zero`, ErrorCode.UNEXPECTED_ZERO, { what });
}

/**
 * Create an error for an unknown or unsupported parameter
 */
export function unknownParameterError(
  message: string,
  details?: Record<string, unknown>
): PairingCodecError {
  return new PairingCodecError(message, ErrorCode.UNKNOWN_PARAMETER, details);
}

/**
 * Create an error for a non-residue that is in fact a residue
 *
 * @param extension - 'Fp2' or 'Fp3'
 * @param nonResidue - The offending value as string
 */
export function nonResidueError(extension: 'Fp2' | 'Fp3', nonResidue: string): PairingCodecError {
  return new PairingCodecError(
    `Non-residue for ${extension} is actually a residue`,
    ErrorCode.NON_RESIDUE_EXPECTED,
    { extension, nonResidue }
  );
}

/**
 * Create an error for a scalar that is not below the group order
 */
export function scalarOutOfRangeError(value: string, order: string): PairingCodecError {
  return new PairingCodecError(
    'Scalar is not smaller than the group order',
    ErrorCode.SCALAR_OUT_OF_RANGE,
    { value, order }
  );
}

/**
 * Create an error for a non-canonical field element
 *
 * @param value - The decoded value as string
 * @param modulus - The field modulus as string
 * @param what - Optional name of the element (e.g. "X", "non-residue")
 */
export function invalidFieldElementError(
  value: string,
  modulus: string,
  what?: string
): PairingCodecError {
  const details: Record<string, unknown> = { value, modulus };
  if (what !== undefined) {
    details['what'] = what;
  }
  return new PairingCodecError(
    what === undefined ? 'Field element exceeds modulus' : `Failed to parse ${what}: value exceeds modulus`,
    ErrorCode.INVALID_FIELD_ELEMENT,
    details
  );
}

/**
 * Create an error for a modulus no prime field can be built from
 */
export function unsupportedModulusError(
  reason: string,
  details?: Record<string, unknown>
): PairingCodecError {
  return new PairingCodecError(
    `Failed to create prime field from modulus: ${reason}`,
    ErrorCode.UNSUPPORTED_MODULUS,
    details
  );
}

/**
 * Create an error for a group order encoding above the supported length
 */
export function unsupportedGroupOrderError(byteLength: number, limit: number): PairingCodecError {
  return new PairingCodecError(
    `Group order length ${byteLength} exceeds the supported ${limit} bytes`,
    ErrorCode.UNSUPPORTED_GROUP_ORDER,
    { byteLength, limit }
  );
}

/**
 * Create an error for elements from different fields
 */
export function fieldMismatchError(expectedModulus: string, actualModulus: string): PairingCodecError {
  return new PairingCodecError(
    'Field elements must be from the same field',
    ErrorCode.FIELD_MISMATCH,
    { expectedModulus, actualModulus }
  );
}

/**
 * Create an error for division by zero
 */
export function divisionByZeroError(): PairingCodecError {
  return new PairingCodecError('Cannot compute inverse of zero element', ErrorCode.DIVISION_BY_ZERO);
}

/**
 * Create an error for serialization failures
 *
 * @param operation - 'serialize' or 'deserialize'
 * @param reason - Reason for the failure
 */
export function serializationError(
  operation: 'serialize' | 'deserialize',
  reason: string
): PairingCodecError {
  return new PairingCodecError(
    `Failed to ${operation}: ${reason}`,
    ErrorCode.SERIALIZATION_ERROR,
    { operation, reason }
  );
}

/**
 * Create an error for invalid configuration
 *
 * @param option - Name of the invalid option
 * @param value - The invalid value
 * @param validValues - Optional description of valid values
 */
export function invalidConfigError(
  option: string,
  value: unknown,
  validValues?: unknown
): PairingCodecError {
  const details: Record<string, unknown> = { option, value };
  if (validValues !== undefined) {
    details['validValues'] = validValues;
  }
  return new PairingCodecError(
    `Invalid configuration option '${option}': ${String(value)}`,
    ErrorCode.INVALID_CONFIG,
    details
  );
}
