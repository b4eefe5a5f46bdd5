/**
 * Global library configuration
 *
 * @example
 * ```typescript
 * import { configure } from 'secp256k1-algebra';
 *
 * configure({ debug: true, verifyResults: true });
 * ```
 */

export interface Secp256k1Config {
  /** Enable debug logging (default: false) */
  debug?: boolean;
  /** Re-check every point produced by the group law against the curve equation (default: false) */
  verifyResults?: boolean;
}

const defaultConfig: Required<Secp256k1Config> = {
  debug: false,
  verifyResults: false,
};

let globalConfig: Required<Secp256k1Config> = { ...defaultConfig };

/**
 * Configure global library settings
 *
 * @param config - Options to merge into the current configuration
 */
export function configure(config: Secp256k1Config): void {
  globalConfig = { ...globalConfig, ...config };
}

/**
 * Get the current library configuration
 */
export function getConfig(): Readonly<Required<Secp256k1Config>> {
  return Object.freeze({ ...globalConfig });
}

/**
 * Reset configuration to defaults
 */
export function resetConfig(): void {
  globalConfig = { ...defaultConfig };
}
