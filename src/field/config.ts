/**
 * Field Configuration for secp256k1
 *
 * The base field F_p holds point coordinates. The scalar field F_N is
 * described here only so that its modulus (the group order) sits beside p;
 * scalars themselves are plain bigints.
 */

import type { FieldConfig } from '../types.js';

/**
 * secp256k1 base field
 *
 * p = 2^256 - 2^32 - 977
 *   = 0xfffffffffffffffffffffffffffffffffffffffffffffffffffffffefffffc2f
 */
export const SECP256K1_FIELD: FieldConfig = Object.freeze({
  modulus: 2n ** 256n - 2n ** 32n - 977n,
  hexLength: 64,
});

/**
 * secp256k1 scalar field (group order N)
 */
export const SECP256K1_SCALAR_FIELD: FieldConfig = Object.freeze({
  modulus: 0xfffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141n,
  hexLength: 64,
});

/**
 * Validate that a field configuration is usable by the field layer
 *
 * The modulus must be odd and greater than 3, and must fit in `hexLength`
 * hex digits.
 */
export function validateFieldConfig(config: FieldConfig): boolean {
  if (config.modulus <= 3n || config.modulus % 2n === 0n) {
    return false;
  }
  return config.modulus.toString(16).length <= config.hexLength;
}
