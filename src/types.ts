/**
 * Core type definitions for secp256k1-algebra
 *
 * This module defines the value types shared by the field and curve layers.
 * All values are immutable; operations return new instances.
 *
 * @module types
 */

/**
 * Prime field parameters
 *
 * @example
 * ```typescript
 * const field: FieldConfig = {
 *   modulus: 2n ** 256n - 2n ** 32n - 977n,
 *   hexLength: 64,
 * };
 * ```
 */
export interface FieldConfig {
  /** The prime modulus p of the field F_p */
  readonly modulus: bigint;
  /** Number of hex digits used when rendering elements of this field */
  readonly hexLength: number;
}

/**
 * Element of the secp256k1 base field
 *
 * `num` always lies in [0, p). The modulus is implicit: every element in this
 * library belongs to the same field.
 *
 * @example
 * ```typescript
 * import { createFieldElement, fieldAdd } from 'secp256k1-algebra';
 *
 * const a = createFieldElement(100n);
 * const b = createFieldElement(200n);
 * fieldAdd(a, b).num; // 300n
 * ```
 */
export interface FieldElement {
  /** Canonical representative in [0, p) */
  readonly num: bigint;
}

/**
 * The group identity (point at infinity)
 */
export interface InfinityPoint {
  readonly kind: 'infinity';
}

/**
 * An affine point satisfying y² = x³ + 7
 */
export interface CoordinatesPoint {
  readonly kind: 'coordinates';
  readonly x: FieldElement;
  readonly y: FieldElement;
}

/**
 * Element of the secp256k1 group
 *
 * Either the identity or an affine point on the curve. A point with only one
 * coordinate cannot be expressed.
 *
 * @example
 * ```typescript
 * import { SECP256K1_GENERATOR, scalarMul, isInfinity } from 'secp256k1-algebra';
 *
 * const p = scalarMul(SECP256K1_GENERATOR, 3n);
 * if (!isInfinity(p)) {
 *   console.log(p.x.num, p.y.num);
 * }
 * ```
 */
export type Point = InfinityPoint | CoordinatesPoint;

/**
 * Short Weierstrass curve parameters: y² = x³ + ax + b
 */
export interface CurveConfig {
  /** Curve name */
  readonly name: 'secp256k1';
  /** Base field */
  readonly field: FieldConfig;
  /** Curve coefficient a */
  readonly a: FieldElement;
  /** Curve coefficient b */
  readonly b: FieldElement;
  /** Generator of the prime-order group */
  readonly generator: CoordinatesPoint;
  /** Group order N */
  readonly order: bigint;
}
