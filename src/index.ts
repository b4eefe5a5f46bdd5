/**
 * secp256k1-algebra
 *
 * Prime-field and elliptic-curve group arithmetic for secp256k1:
 * - Field elements modulo p = 2^256 - 2^32 - 977
 * - Points on y² = x³ + 7, with the full group law
 * - Double-and-add scalar multiplication modulo the group order N
 *
 * @example
 * ```typescript
 * import {
 *   SECP256K1_GENERATOR,
 *   pointAdd,
 *   scalarMul,
 *   formatPoint,
 * } from 'secp256k1-algebra';
 *
 * const twoG = pointAdd(SECP256K1_GENERATOR, SECP256K1_GENERATOR);
 * const threeG = scalarMul(SECP256K1_GENERATOR, 3n);
 * console.log(formatPoint(threeG));
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Configuration and diagnostics
// ============================================================================

export { configure, getConfig, resetConfig, type Secp256k1Config } from './config.js';
export { createDebugLogger, isDebugEnabled, type DebugLogger } from './debug.js';

// ============================================================================
// Errors
// ============================================================================

export {
  ErrorCode,
  Secp256k1Error,
  isSecp256k1Error,
  attempt,
  type Secp256k1Result,
} from './errors.js';

// ============================================================================
// Types
// ============================================================================

export type {
  FieldConfig,
  FieldElement,
  InfinityPoint,
  CoordinatesPoint,
  Point,
  CurveConfig,
} from './types.js';

// ============================================================================
// Finite field
// ============================================================================

export { SECP256K1_FIELD, SECP256K1_SCALAR_FIELD } from './field/config.js';
export {
  createFieldElement,
  tryCreateFieldElement,
  createFieldElementFromHex,
  createZeroFieldElement,
  createOneFieldElement,
  getFieldPrime,
  getFieldElementValue,
  isZeroFieldElement,
  isOneFieldElement,
  fieldElementsEqual,
  formatFieldElement,
} from './field/element.js';
export {
  fieldAdd,
  fieldSub,
  fieldNeg,
  fieldMul,
  fieldSquare,
  fieldScalarMul,
  fieldInv,
  tryFieldInv,
  fieldDiv,
  tryFieldDiv,
  fieldPow,
} from './field/operations.js';

// ============================================================================
// Curve group
// ============================================================================

export {
  SECP256K1_CURVE,
  SECP256K1_GENERATOR,
  SECP256K1_ORDER,
  CURVE_B,
} from './curve/config.js';
export { evaluateCurveEquation, isOnCurve, type CurveEquationSides } from './curve/equation.js';
export {
  createPoint,
  tryCreatePoint,
  createPointFromValues,
  createInfinityPoint,
  isInfinity,
  isCoordinatesPoint,
  pointsEqual,
  formatPoint,
} from './curve/point.js';
export {
  pointNegate,
  pointDouble,
  pointAdd,
  pointSub,
  reduceScalar,
  scalarMul,
  scalarMulBase,
} from './curve/operations.js';
