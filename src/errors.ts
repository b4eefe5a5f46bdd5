/**
 * Error handling for secp256k1-algebra
 *
 * Every failure raised by the library is a Secp256k1Error carrying an
 * ErrorCode and a details object of strings. Callers that prefer explicit
 * results over exceptions can wrap an operation with {@link attempt}.
 */

/**
 * Error codes for field and curve operations
 */
export enum ErrorCode {
  /** Field element value is negative or not below the field modulus */
  OUT_OF_RANGE = 'OUT_OF_RANGE',
  /** Coordinates do not satisfy y² = x³ + 7 */
  NOT_ON_CURVE = 'NOT_ON_CURVE',
  /** Exactly one of the two point coordinates was supplied */
  MISMATCHED_COORDINATES = 'MISMATCHED_COORDINATES',
  /** Inversion or division by the zero element */
  DIVISION_BY_ZERO = 'DIVISION_BY_ZERO',
  /** Input string is not hexadecimal */
  INVALID_HEX = 'INVALID_HEX',
  /** An internal invariant was violated */
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Base error class for secp256k1-algebra
 *
 * @example
 * ```typescript
 * try {
 *   createPoint(createFieldElement(1n), createFieldElement(2n));
 * } catch (error) {
 *   if (error instanceof Secp256k1Error && error.code === ErrorCode.NOT_ON_CURVE) {
 *     console.error(error.details);
 *   }
 * }
 * ```
 */
export class Secp256k1Error extends Error {
  /**
   * @param message - Human-readable error message
   * @param code - Error code for programmatic handling
   * @param details - Optional context; bigint values are rendered as hex strings
   */
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, string>
  ) {
    super(message);
    this.name = 'Secp256k1Error';
    Object.setPrototypeOf(this, Secp256k1Error.prototype);
  }

  override toString(): string {
    let str = `${this.name} [${this.code}]: ${this.message}`;
    if (this.details) {
      str += ` (${JSON.stringify(this.details)})`;
    }
    return str;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Type guard to check if an error is a Secp256k1Error
 */
export function isSecp256k1Error(error: unknown): error is Secp256k1Error {
  return error instanceof Secp256k1Error;
}

/**
 * Outcome of a fallible operation, for callers that do not want exceptions
 */
export type Secp256k1Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: Secp256k1Error };

/**
 * Run an operation and capture a Secp256k1Error as a failed result
 *
 * Errors of any other type are rethrown unchanged.
 *
 * @example
 * ```typescript
 * const result = attempt(() => fieldInv(a));
 * if (!result.ok) {
 *   console.warn(result.error.code);
 * }
 * ```
 */
export function attempt<T>(operation: () => T): Secp256k1Result<T> {
  try {
    return { ok: true, value: operation() };
  } catch (error) {
    if (isSecp256k1Error(error)) {
      return { ok: false, error };
    }
    throw error;
  }
}

/**
 * Render a bigint as 0x-prefixed, zero-padded hex
 */
export function toPaddedHex(value: bigint, hexLength: number = 64): string {
  return `0x${value.toString(16).padStart(hexLength, '0')}`;
}

// ============================================================================
// Error Factory Functions
// ============================================================================

/**
 * Create an error for a field value outside [0, p)
 *
 * @param value - The rejected value
 * @param modulus - The field modulus
 */
export function outOfRangeError(value: bigint, modulus: bigint): Secp256k1Error {
  return new Secp256k1Error(
    `Number ${value} not in the field range 0 to ${modulus - 1n}`,
    ErrorCode.OUT_OF_RANGE,
    { value: value.toString(), modulus: toPaddedHex(modulus) }
  );
}

/**
 * Create an error for coordinates that fail the curve equation
 *
 * @param x - X coordinate value
 * @param y - Y coordinate value
 * @param lhs - Computed y²
 * @param rhs - Computed x³ + b
 */
export function notOnCurveError(x: bigint, y: bigint, lhs: bigint, rhs: bigint): Secp256k1Error {
  return new Secp256k1Error(
    `Point (${toPaddedHex(x)}, ${toPaddedHex(y)}) is not on the secp256k1 curve: ` +
      `${toPaddedHex(lhs)} != ${toPaddedHex(rhs)}`,
    ErrorCode.NOT_ON_CURVE,
    { x: toPaddedHex(x), y: toPaddedHex(y), lhs: toPaddedHex(lhs), rhs: toPaddedHex(rhs) }
  );
}

/**
 * Create an error for a point with exactly one coordinate
 *
 * @param present - Which coordinate was supplied
 */
export function mismatchedCoordinatesError(present: 'x' | 'y'): Secp256k1Error {
  return new Secp256k1Error(
    'Invalid point: both coordinates must be present or both must be absent',
    ErrorCode.MISMATCHED_COORDINATES,
    { present }
  );
}

/**
 * Create an error for division by zero
 *
 * @param operation - Name of the operation that needed the inverse
 */
export function divisionByZeroError(operation: string = 'inverse'): Secp256k1Error {
  return new Secp256k1Error(
    'Cannot compute inverse of zero element',
    ErrorCode.DIVISION_BY_ZERO,
    { operation }
  );
}

/**
 * Create an error for malformed hex input
 *
 * @param input - The rejected string
 */
export function invalidHexError(input: string): Secp256k1Error {
  return new Secp256k1Error(`Invalid hex string: '${input}'`, ErrorCode.INVALID_HEX, { input });
}

/**
 * Create an internal error
 *
 * @param message - Error message
 * @param details - Optional details
 */
export function internalError(message: string, details?: Record<string, string>): Secp256k1Error {
  return new Secp256k1Error(message, ErrorCode.INTERNAL_ERROR, details);
}
