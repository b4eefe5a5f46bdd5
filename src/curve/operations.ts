/**
 * Elliptic Curve Operations
 *
 * Group law on secp256k1 in affine coordinates: negation, doubling,
 * addition and double-and-add scalar multiplication.
 *
 * Addition and doubling only divide once the case analysis has shown the
 * denominator is non-zero (x2 ≠ x1, or y ≠ 0), so none of these functions
 * raises a field error.
 */

import type { CoordinatesPoint, FieldElement, Point } from '../types.js';
import { internalError, toPaddedHex } from '../errors.js';
import { getConfig } from '../config.js';
import { createDebugLogger, isDebugEnabled } from '../debug.js';
import { fieldElementsEqual, isZeroFieldElement } from '../field/element.js';
import {
  fieldDiv,
  fieldMul,
  fieldNeg,
  fieldScalarMul,
  fieldSquare,
  fieldSub,
} from '../field/operations.js';
import { FIELD_THREE, FIELD_TWO, SECP256K1_GENERATOR, SECP256K1_ORDER } from './config.js';
import { isOnCurve } from './equation.js';
import { createInfinityPoint, formatPoint } from './point.js';

const debugLog = createDebugLogger('curve');

/**
 * Build a group-law result, re-checking it when verifyResults is configured
 */
function coordinatesResult(x: FieldElement, y: FieldElement, operation: string): CoordinatesPoint {
  const point: CoordinatesPoint = { kind: 'coordinates', x, y };
  if (getConfig().verifyResults && !isOnCurve(point)) {
    throw internalError(`${operation} produced a point off the curve`, {
      operation,
      point: formatPoint(point),
    });
  }
  return point;
}

/**
 * Negate a point: (x, y) → (x, -y)
 */
export function pointNegate(point: Point): Point {
  if (point.kind === 'infinity') {
    return createInfinityPoint();
  }
  return { kind: 'coordinates', x: point.x, y: fieldNeg(point.y) };
}

/**
 * Point doubling
 *
 *   s  = 3x² / 2y
 *   x3 = s² - 2x
 *   y3 = s(x - x3) - y
 *
 * A point with y = 0 has a vertical tangent and doubles to the identity.
 */
export function pointDouble(point: Point): Point {
  if (point.kind === 'infinity' || isZeroFieldElement(point.y)) {
    return createInfinityPoint();
  }

  const { x, y } = point;

  const numerator = fieldMul(FIELD_THREE, fieldSquare(x));
  const denominator = fieldMul(FIELD_TWO, y);
  const s = fieldDiv(numerator, denominator);

  const x3 = fieldSub(fieldSquare(s), fieldScalarMul(2n, x));
  const y3 = fieldSub(fieldMul(s, fieldSub(x, x3)), y);

  return coordinatesResult(x3, y3, 'pointDouble');
}

/**
 * Point addition
 *
 * Handles every case of the group law:
 * - identity on either side
 * - equal points (doubling)
 * - a point and its inverse (identity)
 * - distinct x: s = (y2 - y1)/(x2 - x1), x3 = s² - x1 - x2, y3 = s(x1 - x3) - y1
 */
export function pointAdd(p1: Point, p2: Point): Point {
  if (p1.kind === 'infinity') {
    return p2;
  }
  if (p2.kind === 'infinity') {
    return p1;
  }

  if (fieldElementsEqual(p1.x, p2.x)) {
    if (fieldElementsEqual(p1.y, p2.y)) {
      return pointDouble(p1);
    }
    // y2 = -y1
    return createInfinityPoint();
  }

  const s = fieldDiv(fieldSub(p2.y, p1.y), fieldSub(p2.x, p1.x));
  const x3 = fieldSub(fieldSub(fieldSquare(s), p1.x), p2.x);
  const y3 = fieldSub(fieldMul(s, fieldSub(p1.x, x3)), p1.y);

  return coordinatesResult(x3, y3, 'pointAdd');
}

/**
 * Point subtraction: p1 - p2
 */
export function pointSub(p1: Point, p2: Point): Point {
  return pointAdd(p1, pointNegate(p2));
}

/**
 * Reduce a scalar into [0, N)
 */
export function reduceScalar(scalar: bigint): bigint {
  const reduced = scalar % SECP256K1_ORDER;
  return reduced < 0n ? reduced + SECP256K1_ORDER : reduced;
}

/**
 * Scalar multiplication: scalar · point
 *
 * The scalar is reduced modulo N first, so negative scalars act as their
 * positive representative and N·P is the identity. Bits are consumed from
 * least to most significant.
 *
 * @param point - Base point
 * @param scalar - Any integer
 */
export function scalarMul(point: Point, scalar: bigint): Point {
  const k = reduceScalar(scalar);

  if (isDebugEnabled()) {
    debugLog('Scalar multiplication', {
      negative: scalar < 0n,
      reducedBits: k === 0n ? 0 : k.toString(2).length,
      point: point.kind === 'infinity' ? 'infinity' : toPaddedHex(point.x.num),
    });
  }

  let result: Point = createInfinityPoint();
  let current: Point = point;
  let remaining = k;

  while (remaining > 0n) {
    if ((remaining & 1n) === 1n) {
      result = pointAdd(result, current);
    }
    current = pointDouble(current);
    remaining >>= 1n;
  }

  return result;
}

/**
 * Multiply the generator: scalar · G
 */
export function scalarMulBase(scalar: bigint): Point {
  return scalarMul(SECP256K1_GENERATOR, scalar);
}
