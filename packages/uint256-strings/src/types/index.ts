export * from './uint256.js';
