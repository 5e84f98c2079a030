/**
 * @uint256-strings/core
 *
 * Decimal and hexadecimal formatting of uint256 values, matching the
 * output of the on-chain Strings library byte for byte.
 */

// Export value types and schemas
export * from './types/index.js';

// Export formatting utilities
export * from './utils/index.js';

// Export error classes
export * from './errors.js';
