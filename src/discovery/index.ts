export * from './types.js';
export * from './exclusions.js';
export * from './scanner.js';
