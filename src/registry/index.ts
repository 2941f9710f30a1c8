export * from './types.js';
export * from './project-registry.js';
