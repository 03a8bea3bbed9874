/**
 * Debug logging
 *
 * Logs only when DEBUG contains "pairing-codec", PAIRING_CODEC_DEBUG is set
 * to 1 or true, or the library was configured with `debug: true`.
 */

import { getConfig } from './config.js';

export type DebugLogger = (message: string, data?: Record<string, unknown>) => void;

function isDebugEnabled(): boolean {
  const debugEnv = process.env['DEBUG'] ?? '';
  const codecDebugEnv = process.env['PAIRING_CODEC_DEBUG'] ?? '';
  return (
    debugEnv.includes('pairing-codec') ||
    codecDebugEnv === '1' ||
    codecDebugEnv === 'true' ||
    getConfig().debug
  );
}

/**
 * Create a debug logger for one module
 *
 * @param scope - Module name shown in the prefix, e.g. "field"
 */
export function createDebugLogger(scope: string): DebugLogger {
  return (message, data) => {
    if (!isDebugEnabled()) {
      return;
    }
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [pairing-codec:${scope}]`;
    if (data) {
      // eslint-disable-next-line no-console
      console.debug(`${prefix} ${message}`, data);
    } else {
      // eslint-disable-next-line no-console
      console.debug(`${prefix} ${message}`);
    }
  };
}
