/**
 * pairing-input-codec
 *
 * Validating decoder and encoder for the parameters and operands of a
 * pairing-curve engine: moduli, quadratic and cubic extensions, group
 * orders, scalars and points. Every decoder consumes a prefix of an
 * untrusted byte buffer and returns the parsed value together with the
 * unconsumed remainder.
 *
 * @example
 * ```typescript
 * import { parseG1CurveParameters, decodeG1MulOperands } from 'pairing-input-codec';
 *
 * const params = parseG1CurveParameters(input);
 * const { point, scalar, rest } = decodeG1MulOperands(params.rest, params);
 * ```
 *
 * @packageDocumentation
 */

export * from './types.js';
export * from './errors.js';
export { configure, getConfig, resetConfig, MAX_SUPPORTED_BYTE_LENGTH, type CodecConfig } from './config.js';
export * from './encoding/index.js';
export * from './field/index.js';
export * from './extension/index.js';
export * from './scalar/index.js';
export * from './curve/index.js';
export * from './session.js';
