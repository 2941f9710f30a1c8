/**
 * Types for embedding providers
 */

import { z } from 'zod';

export type Vector = readonly number[];

export interface EmbeddingProvider {
  readonly name: string;
  readonly modelName: string;

  /**
   * Vector width, known after the first successful call (0 before).
   */
  readonly dimensions: number;

  /**
   * Validate configuration and reach the backend if needed
   */
  initialize(): Promise<void>;

  /**
   * Generate embedding for a single text
   */
  embed(text: string): Promise<number[]>;

  /**
   * Generate embeddings for multiple texts (batch)
   */
  embedBatch(texts: string[]): Promise<number[][]>;

  /**
   * Check if provider is ready
   */
  isReady(): boolean;
}

export const EMBEDDING_PROVIDERS = ['ollama', 'openai'] as const;
export type EmbeddingProviderName = (typeof EMBEDDING_PROVIDERS)[number];

export const EmbeddingConfigSchema = z.object({
  provider: z.enum(EMBEDDING_PROVIDERS),
  model: z.string().min(1),
  apiKey: z.string().min(1).optional(),
  apiEndpoint: z.string().url().optional(),
  batchSize: z.number().int().min(1).max(256),
  requestTimeoutMs: z.number().int().positive()
});

export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>;

export const DEFAULT_ENDPOINTS: Record<EmbeddingProviderName, string> = {
  ollama: 'http://localhost:11434/v1',
  openai: 'https://api.openai.com/v1'
};

export const DEFAULT_MODELS: Record<EmbeddingProviderName, string> = {
  ollama: 'nomic-embed-text',
  openai: 'text-embedding-3-small'
};

export const DEFAULT_EMBEDDING_CONFIG: EmbeddingConfig = {
  provider: 'ollama',
  model: DEFAULT_MODELS.ollama,
  batchSize: 32,
  requestTimeoutMs: 30000
};
