/**
 * Field Element Implementation
 *
 * This module provides field element creation, inspection and formatting.
 * Elements wrap a bigint in [0, p); construction rejects anything outside
 * that range rather than reducing it.
 */

import type { FieldElement } from '../types.js';
import {
  attempt,
  invalidHexError,
  outOfRangeError,
  toPaddedHex,
  type Secp256k1Result,
} from '../errors.js';
import { SECP256K1_FIELD } from './config.js';

const HEX_PATTERN = /^[0-9a-fA-F]+$/;

/**
 * Create a field element from a bigint value
 *
 * @param num - Value in [0, p)
 * @returns A new field element
 * @throws Secp256k1Error (OUT_OF_RANGE) if num < 0 or num >= p
 */
export function createFieldElement(num: bigint): FieldElement {
  if (num < 0n || num >= SECP256K1_FIELD.modulus) {
    throw outOfRangeError(num, SECP256K1_FIELD.modulus);
  }
  return { num };
}

/**
 * Create a field element, returning the validation failure instead of throwing
 */
export function tryCreateFieldElement(num: bigint): Secp256k1Result<FieldElement> {
  return attempt(() => createFieldElement(num));
}

/**
 * Create a field element from a hex string
 *
 * @param hex - The hex string (with or without '0x' prefix)
 * @throws Secp256k1Error (INVALID_HEX) if the string is not hexadecimal
 * @throws Secp256k1Error (OUT_OF_RANGE) if the value is not below p
 */
export function createFieldElementFromHex(hex: string): FieldElement {
  const cleanHex = hex.startsWith('0x') || hex.startsWith('0X') ? hex.slice(2) : hex;
  if (!HEX_PATTERN.test(cleanHex)) {
    throw invalidHexError(hex);
  }
  return createFieldElement(BigInt('0x' + cleanHex));
}

/**
 * Wrap a value already known to lie in [0, p)
 *
 * Used by the arithmetic layer after its own reduction step.
 */
export function fieldElementFromReduced(num: bigint): FieldElement {
  return { num };
}

/**
 * Create the zero element
 */
export function createZeroFieldElement(): FieldElement {
  return { num: 0n };
}

/**
 * Create the one element (multiplicative identity)
 */
export function createOneFieldElement(): FieldElement {
  return { num: 1n };
}

/**
 * Get the field prime p
 */
export function getFieldPrime(): bigint {
  return SECP256K1_FIELD.modulus;
}

/**
 * Get the bigint value of a field element
 */
export function getFieldElementValue(element: FieldElement): bigint {
  return element.num;
}

export function isZeroFieldElement(element: FieldElement): boolean {
  return element.num === 0n;
}

export function isOneFieldElement(element: FieldElement): boolean {
  return element.num === 1n;
}

/**
 * Check if two field elements are equal
 */
export function fieldElementsEqual(a: FieldElement, b: FieldElement): boolean {
  return a.num === b.num;
}

/**
 * Render a field element together with the modulus
 *
 * @example
 * ```typescript
 * formatFieldElement(createFieldElement(255n));
 * // 'FieldElement_0x00…00ff_(mod 0xff…fc2f)'
 * ```
 */
export function formatFieldElement(element: FieldElement): string {
  const { modulus, hexLength } = SECP256K1_FIELD;
  return `FieldElement_${toPaddedHex(element.num, hexLength)}_(mod ${toPaddedHex(modulus, hexLength)})`;
}
