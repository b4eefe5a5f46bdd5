/**
 * Curve Configuration for secp256k1
 *
 * y² = x³ + 7 over F_p (a = 0, b = 7), generator G of prime order N.
 *
 * The doubling and addition formulas in this package assume the field
 * characteristic is odd and not 3. That holds for secp256k1 and is asserted
 * when this module loads; it is not a general-purpose curve guarantee.
 */

import type { CurveConfig, CoordinatesPoint, FieldElement } from '../types.js';
import { internalError } from '../errors.js';
import { SECP256K1_FIELD, SECP256K1_SCALAR_FIELD, validateFieldConfig } from '../field/config.js';
import { createFieldElement, createFieldElementFromHex } from '../field/element.js';

if (!validateFieldConfig(SECP256K1_FIELD)) {
  throw internalError('secp256k1 base field does not satisfy the curve formula preconditions');
}

/** Curve coefficient b = 7 */
export const CURVE_B: FieldElement = createFieldElement(7n);

/** Field constant 2, used in the doubling slope denominator */
export const FIELD_TWO: FieldElement = createFieldElement(2n);

/** Field constant 3, used in the doubling slope numerator */
export const FIELD_THREE: FieldElement = createFieldElement(3n);

/**
 * Standard secp256k1 generator
 */
export const SECP256K1_GENERATOR: CoordinatesPoint = Object.freeze({
  kind: 'coordinates',
  x: createFieldElementFromHex('79be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798'),
  y: createFieldElementFromHex('483ada7726a3c4655da4fbfc0e1108a8fd17b448a68554199c47d08ffb10d4b8'),
});

/** Group order N */
export const SECP256K1_ORDER: bigint = SECP256K1_SCALAR_FIELD.modulus;

/**
 * secp256k1 curve configuration
 */
export const SECP256K1_CURVE: CurveConfig = Object.freeze({
  name: 'secp256k1',
  field: SECP256K1_FIELD,
  a: createFieldElement(0n),
  b: CURVE_B,
  generator: SECP256K1_GENERATOR,
  order: SECP256K1_ORDER,
});
