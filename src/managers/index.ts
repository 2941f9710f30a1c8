export * from './types.js';
export * from './adapter-loader.js';
export * from './vector-store-manager.js';
export * from './context-manager.js';
