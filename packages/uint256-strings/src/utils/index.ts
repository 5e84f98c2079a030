/**
 * Utility functions for uint256 string formatting
 */

// Digit extraction
export * from './digits.js';

// Formatting
export * from './format/index.js';
