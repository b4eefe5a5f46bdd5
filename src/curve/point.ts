/**
 * Point Construction and Inspection
 *
 * Points are either the identity or affine coordinates on y² = x³ + 7.
 * Coordinates are validated once here; every point produced by the group law
 * in operations.ts is on the curve by construction.
 */

import type { CoordinatesPoint, FieldElement, InfinityPoint, Point } from '../types.js';
import {
  attempt,
  mismatchedCoordinatesError,
  notOnCurveError,
  outOfRangeError,
  toPaddedHex,
  type Secp256k1Result,
} from '../errors.js';
import { createDebugLogger } from '../debug.js';
import { createFieldElement, fieldElementsEqual, getFieldPrime } from '../field/element.js';
import { evaluateCurveEquation } from './equation.js';

const debugLog = createDebugLogger('point');

const INFINITY: InfinityPoint = Object.freeze({ kind: 'infinity' });

/**
 * Type guard for the identity
 */
export function isInfinity(point: Point): point is InfinityPoint {
  return point.kind === 'infinity';
}

/**
 * Type guard for an affine point
 */
export function isCoordinatesPoint(point: Point): point is CoordinatesPoint {
  return point.kind === 'coordinates';
}

/**
 * Get the identity (point at infinity)
 */
export function createInfinityPoint(): InfinityPoint {
  return INFINITY;
}

/**
 * Create a point from optional coordinates
 *
 * - both null: the identity
 * - both present: range-checked, then validated against y² = x³ + 7
 * - exactly one present: rejected
 *
 * @throws Secp256k1Error (OUT_OF_RANGE) if a coordinate is not in [0, p)
 * @throws Secp256k1Error (NOT_ON_CURVE) if the coordinates fail the curve equation
 * @throws Secp256k1Error (MISMATCHED_COORDINATES) if only one coordinate is given
 */
export function createPoint(x: FieldElement | null, y: FieldElement | null): Point {
  if (x === null && y === null) {
    return INFINITY;
  }
  if (x === null || y === null) {
    const present = x === null ? 'y' : 'x';
    debugLog('Rejected point with a single coordinate', { present });
    throw mismatchedCoordinatesError(present);
  }

  const prime = getFieldPrime();
  for (const coordinate of [x, y]) {
    if (coordinate.num < 0n || coordinate.num >= prime) {
      debugLog('Rejected point with an unreduced coordinate', { value: coordinate.num.toString() });
      throw outOfRangeError(coordinate.num, prime);
    }
  }

  const { lhs, rhs } = evaluateCurveEquation(x, y);
  if (!fieldElementsEqual(lhs, rhs)) {
    debugLog('Rejected point not on curve', { x: toPaddedHex(x.num), y: toPaddedHex(y.num) });
    throw notOnCurveError(x.num, y.num, lhs.num, rhs.num);
  }

  return { kind: 'coordinates', x, y };
}

/**
 * Create a point, returning the validation failure instead of throwing
 */
export function tryCreatePoint(x: FieldElement | null, y: FieldElement | null): Secp256k1Result<Point> {
  return attempt(() => createPoint(x, y));
}

/**
 * Create an affine point from raw coordinate values
 *
 * @throws Secp256k1Error (OUT_OF_RANGE) if a coordinate is not in [0, p)
 * @throws Secp256k1Error (NOT_ON_CURVE) if the coordinates fail the curve equation
 */
export function createPointFromValues(x: bigint, y: bigint): Point {
  return createPoint(createFieldElement(x), createFieldElement(y));
}

/**
 * Check if two points are equal
 */
export function pointsEqual(a: Point, b: Point): boolean {
  if (a.kind === 'infinity' || b.kind === 'infinity') {
    return a.kind === b.kind;
  }
  return fieldElementsEqual(a.x, b.x) && fieldElementsEqual(a.y, b.y);
}

/**
 * Render a point for diagnostics
 *
 * `(Infinity)` for the identity, otherwise `(x=0x…, y=0x…)` with each
 * coordinate padded to 64 hex digits.
 */
export function formatPoint(point: Point): string {
  if (point.kind === 'infinity') {
    return '(Infinity)';
  }
  return `(x=${toPaddedHex(point.x.num)}, y=${toPaddedHex(point.y.num)})`;
}
