/**
 * Format utilities for rendering uint256 values as text
 */

export * from './uint256-format.js';
