/**
 * Digit extraction for uint256 values
 *
 * Converts a uint256 to its significant digits in base 10 or 16 using only
 * division and remainder by the radix. Digits are produced least-significant
 * first and written backwards from the end of a fixed-size buffer, so the
 * filled tail is already in most-significant-first order.
 */

import { DigitEncodingError } from '../errors.js';
import { assertUint256 } from '../types/uint256.js';

/**
 * Supported output bases
 */
export type DigitRadix = 10 | 16;

const ASCII_ZERO = 0x30;
const ASCII_LOWER_A = 0x61;

/**
 * Digit count of 2^256 - 1 in each radix
 */
const MAX_DIGITS: Record<DigitRadix, number> = {
  10: 78,
  16: 64,
};

/**
 * Map a single digit to its ASCII code (lowercase for a-f)
 *
 * @throws DigitEncodingError if the digit is not below the radix
 */
export function digitToCharCode(digit: number, radix: DigitRadix): number {
  if (!Number.isInteger(digit) || digit < 0 || digit >= radix) {
    throw new DigitEncodingError(digit, radix);
  }
  return digit < 10 ? ASCII_ZERO + digit : ASCII_LOWER_A + (digit - 10);
}

/**
 * Extract the significant digits of a uint256
 *
 * Zero has no significant digits and yields an empty string; callers decide
 * how zero is rendered.
 *
 * @param value - uint256 value
 * @param radix - 10 or 16
 * @returns Digits most-significant first, without prefix or leading zeros
 * @throws Uint256RangeError if value is outside the uint256 range
 *
 * @example
 * significantDigits(255n, 16); // 'ff'
 * significantDigits(0n, 10);   // ''
 */
export function significantDigits(value: bigint, radix: DigitRadix): string {
  assertUint256(value);

  const base = BigInt(radix);
  const buffer = new Uint8Array(MAX_DIGITS[radix]);
  let cursor = buffer.length;
  let remaining = value;

  while (remaining !== 0n) {
    const digit = Number(remaining % base);
    cursor -= 1;
    buffer[cursor] = digitToCharCode(digit, radix);
    remaining /= base;
  }

  return String.fromCharCode(...buffer.subarray(cursor));
}
