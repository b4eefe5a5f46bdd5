/**
 * Field Arithmetic Operations
 *
 * Addition, subtraction, multiplication, negation, exponentiation, inversion
 * and division over the secp256k1 base field. Inputs are always reduced, so
 * addition and subtraction need at most one correction by p.
 *
 * Inversion uses Fermat's little theorem (a^(p-2)) rather than the extended
 * Euclidean algorithm.
 */

import type { FieldElement } from '../types.js';
import { attempt, divisionByZeroError, type Secp256k1Result } from '../errors.js';
import { SECP256K1_FIELD } from './config.js';
import { fieldElementFromReduced, isZeroFieldElement } from './element.js';

const P = SECP256K1_FIELD.modulus;

/**
 * Reduce an arbitrary bigint into [0, modulus)
 */
export function mod(value: bigint, modulus: bigint): bigint {
  const reduced = value % modulus;
  return reduced < 0n ? reduced + modulus : reduced;
}

/**
 * Square-and-multiply modular exponentiation
 *
 * @param base - Value in [0, modulus)
 * @param exp - Non-negative exponent
 */
export function modPow(base: bigint, exp: bigint, modulus: bigint): bigint {
  let result = 1n;
  let b = base;
  let e = exp;

  while (e > 0n) {
    if ((e & 1n) === 1n) {
      result = (result * b) % modulus;
    }
    b = (b * b) % modulus;
    e >>= 1n;
  }

  return result;
}

/**
 * Field addition: (a + b) mod p
 */
export function fieldAdd(a: FieldElement, b: FieldElement): FieldElement {
  let sum = a.num + b.num;
  if (sum >= P) {
    sum -= P;
  }
  return fieldElementFromReduced(sum);
}

/**
 * Field subtraction: (a - b) mod p
 */
export function fieldSub(a: FieldElement, b: FieldElement): FieldElement {
  let diff = a.num - b.num;
  if (diff < 0n) {
    diff += P;
  }
  return fieldElementFromReduced(diff);
}

/**
 * Field negation: -a mod p
 */
export function fieldNeg(a: FieldElement): FieldElement {
  if (isZeroFieldElement(a)) {
    return fieldElementFromReduced(0n);
  }
  return fieldElementFromReduced(P - a.num);
}

/**
 * Field multiplication: (a * b) mod p
 */
export function fieldMul(a: FieldElement, b: FieldElement): FieldElement {
  return fieldElementFromReduced((a.num * b.num) % P);
}

/**
 * Field squaring: a² mod p
 */
export function fieldSquare(a: FieldElement): FieldElement {
  return fieldElementFromReduced((a.num * a.num) % P);
}

/**
 * Multiply a field element by a plain integer coefficient
 *
 * Used for the small constants in the curve formulas. `k` may be negative or
 * larger than p.
 *
 * @param k - Integer coefficient
 * @param a - Field element
 * @returns (k * a) mod p
 */
export function fieldScalarMul(k: bigint, a: FieldElement): FieldElement {
  return fieldElementFromReduced(mod(k * a.num, P));
}

/**
 * Field inversion: a^(-1) mod p
 *
 * Computed as a^(p-2) mod p.
 *
 * @param a - The operand (must be non-zero)
 * @throws Secp256k1Error (DIVISION_BY_ZERO) if a is zero
 */
export function fieldInv(a: FieldElement): FieldElement {
  if (isZeroFieldElement(a)) {
    throw divisionByZeroError('inverse');
  }
  return fieldElementFromReduced(modPow(a.num, P - 2n, P));
}

/**
 * Field inversion returning the failure as a result
 */
export function tryFieldInv(a: FieldElement): Secp256k1Result<FieldElement> {
  return attempt(() => fieldInv(a));
}

/**
 * Field division: a / b mod p
 *
 * @param a - Numerator
 * @param b - Denominator (must be non-zero)
 * @throws Secp256k1Error (DIVISION_BY_ZERO) from fieldInv if b is zero
 */
export function fieldDiv(a: FieldElement, b: FieldElement): FieldElement {
  return fieldMul(a, fieldInv(b));
}

/**
 * Field division returning the failure as a result
 */
export function tryFieldDiv(a: FieldElement, b: FieldElement): Secp256k1Result<FieldElement> {
  return attempt(() => fieldDiv(a, b));
}

/**
 * Field exponentiation: a^exp mod p
 *
 * Non-negative exponents are reduced modulo p - 1 first (Fermat), so a reduced
 * exponent of zero yields one, including for a = 0. A negative exponent raises
 * the inverse of a to |exp|, and therefore fails for a = 0.
 *
 * @param a - The base
 * @param exp - Any integer exponent
 * @throws Secp256k1Error (DIVISION_BY_ZERO) if exp < 0 and a is zero
 */
export function fieldPow(a: FieldElement, exp: bigint): FieldElement {
  if (exp < 0n) {
    return fieldPow(fieldInv(a), -exp);
  }

  const e = exp % (P - 1n);
  return fieldElementFromReduced(modPow(a.num, e, P));
}
