/**
 * uint256 String Formatting Error Classes
 *
 * The formatter has no failure path for in-range values. These errors guard
 * the boundary where a plain `bigint` or `number` enters the uint256 domain.
 */

/**
 * Base class for all errors raised by this package
 */
export class Uint256StringsError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'Uint256StringsError';
    this.cause = cause;
  }
}

/**
 * Value is negative or exceeds 2^256 - 1.
 */
export class Uint256RangeError extends Uint256StringsError {
  constructor(public readonly value: bigint) {
    super(`Value ${value < 0n ? 'is negative' : 'exceeds 2^256 - 1'}: ${value}`);
    this.name = 'Uint256RangeError';
  }
}

/**
 * Textual or numeric input could not be read as a uint256.
 */
export class Uint256ParseError extends Uint256StringsError {
  constructor(
    public readonly input: string,
    public readonly reason: string,
    cause?: unknown
  ) {
    super(`Cannot parse "${input}" as uint256: ${reason}`, cause);
    this.name = 'Uint256ParseError';
  }
}

/**
 * Minimum digit count is not an integer in 0 .. maxDigits.
 */
export class InvalidDigitWidthError extends Uint256StringsError {
  constructor(
    public readonly minDigits: number,
    public readonly maxDigits: number
  ) {
    super(`minDigits must be an integer from 0 to ${maxDigits}, got ${minDigits}`);
    this.name = 'InvalidDigitWidthError';
  }
}

/**
 * A digit outside the radix reached the alphabet lookup.
 *
 * Internal invariant violation; digit extraction only ever yields remainders
 * below the radix.
 */
export class DigitEncodingError extends Uint256StringsError {
  constructor(
    public readonly digit: number,
    public readonly radix: number
  ) {
    super(`Digit ${digit} is not valid in base ${radix}`);
    this.name = 'DigitEncodingError';
  }
}
