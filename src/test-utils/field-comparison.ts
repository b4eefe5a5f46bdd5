/**
 * Assertion helpers for field elements and curve points
 */

import { expect } from 'vitest';
import type * as fc from 'fast-check';
import type { FieldElement, Point } from '../types.js';
import { createFieldElement } from '../field/element.js';
import { isCoordinatesPoint } from '../curve/point.js';
import { arbitraryFieldValue, arbitraryNonZeroFieldValue } from './property-test-config.js';

/**
 * Arbitrary generator for field elements
 */
export function arbitraryFieldElement(): fc.Arbitrary<FieldElement> {
  return arbitraryFieldValue().map((value) => createFieldElement(value));
}

/**
 * Arbitrary generator for non-zero field elements
 */
export function arbitraryNonZeroFieldElement(): fc.Arbitrary<FieldElement> {
  return arbitraryNonZeroFieldValue().map((value) => createFieldElement(value));
}

/**
 * Assert a field element holds the expected value
 */
export function expectFieldValue(actual: FieldElement, expected: bigint): void {
  expect(actual.num).toBe(expected);
}

/**
 * Assert a point is the affine point (x, y)
 */
export function expectCoordinates(actual: Point, x: bigint, y: bigint): void {
  expect(actual.kind).toBe('coordinates');
  if (isCoordinatesPoint(actual)) {
    expect(actual.x.num).toBe(x);
    expect(actual.y.num).toBe(y);
  }
}

/**
 * Assert a point is the identity
 */
export function expectInfinity(actual: Point): void {
  expect(actual.kind).toBe('infinity');
}
