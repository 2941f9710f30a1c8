/**
 * Types for vector storage providers
 */

import type { CodeChunk, SearchFilters } from '../types/index.js';

export interface VectorStorageProvider {
  readonly name: string;

  /**
   * Initialize the storage (create database, tables, etc.)
   */
  initialize(storagePath: string): Promise<void>;

  /**
   * Store code chunks with their embeddings
   */
  store(chunks: CodeChunkWithEmbedding[]): Promise<void>;

  /**
   * Search for similar chunks
   */
  search(
    queryVector: readonly number[],
    limit: number,
    filters?: SearchFilters
  ): Promise<VectorSearchResult[]>;

  /**
   * Clear all stored data
   */
  clear(): Promise<void>;

  /**
   * Get count of stored chunks
   */
  count(): Promise<number>;

  /**
   * Release the connection. The provider cannot be used afterwards.
   */
  close(): Promise<void>;
}

export interface CodeChunkWithEmbedding extends CodeChunk {
  embedding: readonly number[];
}

export interface VectorSearchResult {
  chunk: CodeChunk;
  score: number;
  distance: number;
}

export type StorageFactory = (storagePath: string) => Promise<VectorStorageProvider>;
