/**
 * Library configuration
 *
 * Limits applied to untrusted encodings and opt-in validation switches.
 * Configuration is read at the start of each parse, so changing it never
 * affects fields or extensions that were already built.
 */

import { invalidConfigError } from './errors.js';

/**
 * Largest modulus and group order encoding supported (16 limbs of 64 bits)
 */
export const MAX_SUPPORTED_BYTE_LENGTH = 128;

/**
 * Global configuration options
 *
 * @example
 * ```typescript
 * import { configure } from 'pairing-input-codec';
 *
 * configure({
 *   maxModulusByteLength: 48,
 *   requireCubicNonResidue: true,
 * });
 * ```
 */
export interface CodecConfig {
  /** Longest accepted modulus encoding in bytes (default: 128) */
  maxModulusByteLength?: number;
  /** Longest accepted group order encoding in bytes (default: 128) */
  maxGroupOrderByteLength?: number;
  /** Reject Fp3 non-residues that are cubic residues (default: false) */
  requireCubicNonResidue?: boolean;
  /** Enable debug logging (default: false) */
  debug?: boolean;
}

const DEFAULT_CONFIG: Required<CodecConfig> = {
  maxModulusByteLength: MAX_SUPPORTED_BYTE_LENGTH,
  maxGroupOrderByteLength: MAX_SUPPORTED_BYTE_LENGTH,
  requireCubicNonResidue: false,
  debug: false,
};

let globalConfig: Required<CodecConfig> = { ...DEFAULT_CONFIG };

function validateByteLimit(option: string, value: number | undefined): void {
  if (value === undefined) {
    return;
  }
  if (!Number.isInteger(value) || value < 1 || value > MAX_SUPPORTED_BYTE_LENGTH) {
    throw invalidConfigError(option, value, `integer in [1, ${MAX_SUPPORTED_BYTE_LENGTH}]`);
  }
}

/**
 * Configure global library settings
 *
 * @param config - Configuration options to set
 * @throws PairingCodecError if a limit is outside [1, 128]
 */
export function configure(config: CodecConfig): void {
  validateByteLimit('maxModulusByteLength', config.maxModulusByteLength);
  validateByteLimit('maxGroupOrderByteLength', config.maxGroupOrderByteLength);
  globalConfig = {
    maxModulusByteLength: config.maxModulusByteLength ?? globalConfig.maxModulusByteLength,
    maxGroupOrderByteLength: config.maxGroupOrderByteLength ?? globalConfig.maxGroupOrderByteLength,
    requireCubicNonResidue: config.requireCubicNonResidue ?? globalConfig.requireCubicNonResidue,
    debug: config.debug ?? globalConfig.debug,
  };
}

/**
 * Get the current library configuration
 */
export function getConfig(): Readonly<Required<CodecConfig>> {
  return { ...globalConfig };
}

/**
 * Reset configuration to defaults
 */
export function resetConfig(): void {
  globalConfig = { ...DEFAULT_CONFIG };
}
