/**
 * Property-based testing configuration and utilities
 *
 * Shared fast-check settings, arbitraries and plain-bigint reference
 * arithmetic for the property tests.
 */

import * as fc from 'fast-check';

/**
 * Standard configuration for property-based tests
 */
export const PROPERTY_TEST_CONFIG: fc.Parameters<unknown> = {
  numRuns: 100,
  verbose: true,
  seed: Date.now(), // Can be overridden for reproducibility
  endOnFailure: false,
};

/**
 * Configuration for properties that run full 256-bit scalar multiplications
 */
export const FAST_PROPERTY_TEST_CONFIG: fc.Parameters<unknown> = {
  numRuns: 10,
  verbose: false,
  seed: Date.now(),
};

/**
 * secp256k1 base field modulus p
 */
export const SECP256K1_P =
  0xfffffffffffffffffffffffffffffffffffffffffffffffffffffffefffffc2fn;

/**
 * secp256k1 group order N
 */
export const SECP256K1_N =
  0xfffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141n;

/**
 * Arbitrary generator for field values in [0, p)
 */
export function arbitraryFieldValue(modulus: bigint = SECP256K1_P): fc.Arbitrary<bigint> {
  return fc.bigInt({ min: 0n, max: modulus - 1n });
}

/**
 * Arbitrary generator for non-zero field values in [1, p)
 */
export function arbitraryNonZeroFieldValue(modulus: bigint = SECP256K1_P): fc.Arbitrary<bigint> {
  return fc.bigInt({ min: 1n, max: modulus - 1n });
}

/**
 * Arbitrary generator for values outside [0, p)
 */
export function arbitraryOutOfRangeValue(modulus: bigint = SECP256K1_P): fc.Arbitrary<bigint> {
  return fc.oneof(
    fc.bigInt({ min: -(2n ** 300n), max: -1n }),
    fc.bigInt({ min: modulus, max: 2n ** 300n })
  );
}

/**
 * Arbitrary generator for full-width scalars, including negative and
 * super-order values
 */
export function arbitraryScalar(): fc.Arbitrary<bigint> {
  return fc.bigInt({ min: -(2n * SECP256K1_N), max: 2n * SECP256K1_N });
}

/**
 * Arbitrary generator for small scalars (fast point generation)
 */
export function arbitrarySmallScalar(): fc.Arbitrary<bigint> {
  return fc.bigInt({ min: 1n, max: 1000n });
}

/**
 * Modular reduction into [0, modulus)
 */
export function modReduce(value: bigint, modulus: bigint): bigint {
  return ((value % modulus) + modulus) % modulus;
}

/**
 * Reference modular inverse via the extended Euclidean algorithm
 */
export function modInverse(a: bigint, modulus: bigint): bigint {
  let [oldR, r] = [modReduce(a, modulus), modulus];
  let [oldS, s] = [1n, 0n];

  while (r !== 0n) {
    const quotient = oldR / r;
    [oldR, r] = [r, oldR - quotient * r];
    [oldS, s] = [s, oldS - quotient * s];
  }

  if (oldR !== 1n) {
    throw new Error('Modular inverse does not exist');
  }

  return modReduce(oldS, modulus);
}
