/**
 * Storage module
 * Provides vector storage using LanceDB
 */

export * from './types.js';
export * from './lancedb.js';
