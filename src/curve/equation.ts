/**
 * Curve equation checks
 */

import type { FieldElement, Point } from '../types.js';
import { fieldElementsEqual } from '../field/element.js';
import { fieldAdd, fieldMul, fieldSquare } from '../field/operations.js';
import { CURVE_B } from './config.js';

/**
 * Both sides of y² = x³ + b for the given coordinates
 */
export interface CurveEquationSides {
  /** y² */
  readonly lhs: FieldElement;
  /** x³ + b */
  readonly rhs: FieldElement;
}

/**
 * Evaluate both sides of the curve equation
 */
export function evaluateCurveEquation(x: FieldElement, y: FieldElement): CurveEquationSides {
  const lhs = fieldSquare(y);
  const x3 = fieldMul(fieldSquare(x), x);
  const rhs = fieldAdd(x3, CURVE_B);
  return { lhs, rhs };
}

/**
 * Check if a point is on the curve
 *
 * The identity is always on the curve.
 */
export function isOnCurve(point: Point): boolean {
  if (point.kind === 'infinity') {
    return true;
  }
  const { lhs, rhs } = evaluateCurveEquation(point.x, point.y);
  return fieldElementsEqual(lhs, rhs);
}
