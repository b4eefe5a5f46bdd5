/**
 * Debug logging
 *
 * Output goes through console.debug and is only produced when `debug` is set
 * via {@link configure}, DEBUG contains "secp256k1-algebra", or
 * SECP256K1_DEBUG is "1" or "true".
 */

import { getConfig } from './config.js';

export type DebugLogger = (message: string, data?: Record<string, unknown>) => void;

/**
 * Check whether debug output is currently enabled
 */
export function isDebugEnabled(): boolean {
  if (getConfig().debug) {
    return true;
  }
  const debugEnv = process.env['DEBUG'];
  const libDebugEnv = process.env['SECP256K1_DEBUG'];
  return (
    debugEnv?.includes('secp256k1-algebra') === true ||
    libDebugEnv === '1' ||
    libDebugEnv === 'true'
  );
}

/**
 * Create a logger whose lines are prefixed with a timestamp and scope
 *
 * @param scope - Module name shown in the prefix
 */
export function createDebugLogger(scope: string): DebugLogger {
  return (message, data) => {
    if (!isDebugEnabled()) {
      return;
    }
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [secp256k1-algebra:${scope}]`;
    if (data) {
      console.debug(`${prefix} ${message}`, data);
    } else {
      console.debug(`${prefix} ${message}`);
    }
  };
}
