/**
 * uint256 string formatting
 *
 * Renders uint256 values exactly as the on-chain `Strings` library does:
 * - toDecimalString(uint256)
 * - toHexString(uint256)
 * - toHexString(uint256, length), except that values wider than `length`
 *   are emitted in full rather than rejected
 *
 * All functions are pure and synchronous.
 */

import { InvalidDigitWidthError } from '../../errors.js';
import { significantDigits } from '../digits.js';

const HEX_PREFIX = '0x';

/**
 * Largest `minDigits` accepted by {@link toHexStringFixed}
 *
 * V8 caps strings at 2^29 - 24 characters; the prefix takes two of them.
 */
export const MAX_FIXED_HEX_DIGITS = 2 ** 29 - 24 - HEX_PREFIX.length;

/**
 * Format a uint256 as a base-10 string
 *
 * @param value - uint256 value
 * @returns Decimal digits with no leading zeros ("0" for zero)
 * @throws Uint256RangeError if value is outside the uint256 range
 *
 * @example
 * toDecimalString(12345n); // '12345'
 * toDecimalString(0n);     // '0'
 */
export function toDecimalString(value: bigint): string {
  const digits = significantDigits(value, 10);
  return digits === '' ? '0' : digits;
}

/**
 * Format a uint256 as a minimal 0x-prefixed lowercase hex string
 *
 * @param value - uint256 value
 * @returns Hex string with no leading zero digits ("0x0" for zero)
 * @throws Uint256RangeError if value is outside the uint256 range
 *
 * @example
 * toHexString(255n); // '0xff'
 * toHexString(256n); // '0x100'
 * toHexString(0n);   // '0x0'
 */
export function toHexString(value: bigint): string {
  const digits = significantDigits(value, 16);
  return HEX_PREFIX + (digits === '' ? '0' : digits);
}

/**
 * Format a uint256 as a 0x-prefixed hex string with at least `minDigits` digits
 *
 * Shorter values are left-padded with zeros. Longer values are never
 * truncated: `minDigits` is a lower bound only.
 *
 * Zero renders as exactly `minDigits` zeros, so `toHexStringFixed(0n, 0)`
 * returns the bare prefix "0x".
 *
 * @param value - uint256 value
 * @param minDigits - Minimum number of hex digits after "0x"
 * @returns Zero-padded hex string
 * @throws Uint256RangeError if value is outside the uint256 range
 * @throws InvalidDigitWidthError if minDigits is not an integer in 0 .. MAX_FIXED_HEX_DIGITS
 *
 * @example
 * toHexStringFixed(255n, 4);     // '0x00ff'
 * toHexStringFixed(0n, 8);       // '0x00000000'
 * toHexStringFixed(0x12345n, 2); // '0x12345'
 */
export function toHexStringFixed(value: bigint, minDigits: number): string {
  if (!Number.isInteger(minDigits) || minDigits < 0 || minDigits > MAX_FIXED_HEX_DIGITS) {
    throw new InvalidDigitWidthError(minDigits, MAX_FIXED_HEX_DIGITS);
  }

  return HEX_PREFIX + significantDigits(value, 16).padStart(minDigits, '0');
}
