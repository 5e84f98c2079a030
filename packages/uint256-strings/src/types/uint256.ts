/**
 * uint256 Value Types and Schemas
 *
 * A uint256 is carried as a plain `bigint` constrained to 0 .. 2^256 - 1,
 * matching how EVM word values surface in TypeScript.
 */

import { z } from 'zod';
import { Uint256ParseError, Uint256RangeError } from '../errors.js';

/**
 * Largest value representable in 256 bits (2^256 - 1)
 */
export const MAX_UINT256 = 2n ** 256n - 1n;

/**
 * A bigint within the uint256 range
 */
export type Uint256 = bigint;

/**
 * Accepted raw inputs for {@link parseUint256}
 */
export type Uint256Input = bigint | number | string;

/**
 * Check whether a bigint lies within 0 .. 2^256 - 1
 */
export function isUint256(value: bigint): value is Uint256 {
  return value >= 0n && value <= MAX_UINT256;
}

/**
 * Throw {@link Uint256RangeError} unless the value is a uint256
 */
export function assertUint256(value: bigint): asserts value is Uint256 {
  if (!isUint256(value)) {
    throw new Uint256RangeError(value);
  }
}

/**
 * Zod schema for uint256 values
 *
 * Accepts:
 * - bigint values
 * - Non-negative safe integers (e.g., 42)
 * - Decimal digit strings (e.g., "12345")
 * - 0x-prefixed hex strings, either case (e.g., "0xff", "0XFF")
 *
 * Output is a range-checked bigint.
 *
 * @example
 * ```typescript
 * Uint256Schema.parse('0xff');   // ✅ 255n
 * Uint256Schema.parse(42);       // ✅ 42n
 * Uint256Schema.parse(-1n);      // ❌ throws
 * Uint256Schema.parse('1.5');    // ❌ throws
 * ```
 */
export const Uint256Schema = z
  .union([
    z.bigint(),
    z
      .number()
      .int('value must be an integer')
      .nonnegative('value must be non-negative')
      .max(Number.MAX_SAFE_INTEGER, 'value exceeds MAX_SAFE_INTEGER; pass a bigint or string'),
    z
      .string()
      .trim()
      .regex(
        /^(?:[0-9]+|0[xX][0-9a-fA-F]+)$/,
        'value must be a decimal or 0x-prefixed hex string'
      ),
  ])
  .transform((input) => (typeof input === 'bigint' ? input : BigInt(input)))
  .refine(isUint256, { message: 'value is outside the uint256 range' });

/**
 * Parse raw input into a uint256
 *
 * @throws Uint256RangeError if a bigint input is out of range
 * @throws Uint256ParseError for any other rejected input
 */
export function parseUint256(input: Uint256Input): Uint256 {
  if (typeof input === 'bigint') {
    assertUint256(input);
    return input;
  }

  const result = Uint256Schema.safeParse(input);
  if (!result.success) {
    // Refinements also run on input that already failed; keep the first issue
    const [firstIssue] = result.error.issues;
    const reason = firstIssue ? firstIssue.message : 'invalid uint256';
    throw new Uint256ParseError(String(input), reason, result.error);
  }
  return result.data;
}
