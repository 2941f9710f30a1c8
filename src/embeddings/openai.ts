import { z } from 'zod';

import { EmbeddingProvider } from './types.js';

const EmbeddingResponseSchema = z.object({
  data: z
    .array(z.object({ index: z.number().int().nonnegative().optional(), embedding: z.array(z.number()) }))
    .min(1)
});

export interface OpenAICompatibleOptions {
  name: string;
  modelName: string;
  apiEndpoint: string;
  apiKey?: string;
  requireApiKey: boolean;
  requestTimeoutMs: number;
  fetchImpl?: typeof fetch;
}

/**
 * Embedding provider for any OpenAI-compatible /embeddings endpoint
 * (OpenAI itself, or a local Ollama server under /v1).
 * Uses native fetch to avoid adding the heavy openai npm package dependency.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name: string;
  readonly modelName: string;
  private _dimensions = 0;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: OpenAICompatibleOptions) {
    this.name = options.name;
    this.modelName = options.modelName;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  get dimensions(): number {
    return this._dimensions;
  }

  async initialize(): Promise<void> {
    if (this.options.requireApiKey && !this.options.apiKey) {
      throw new Error(
        `${this.name} API key is missing. Set EMBEDDING_API_KEY or switch EMBEDDING_PROVIDER to ollama.`
      );
    }
  }

  isReady(): boolean {
    return !this.options.requireApiKey || !!this.options.apiKey;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    if (!vector) {
      throw new Error(`${this.name} returned no embedding`);
    }
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (!texts.length) return [];

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }

    const response = await this.fetchImpl(`${this.options.apiEndpoint.replace(/\/+$/, '')}/embeddings`, {
      method: 'POST',
      headers,
      body: JSON.stringify({
        model: this.modelName,
        input: texts,
        encoding_format: 'float'
      }),
      signal: AbortSignal.timeout(this.options.requestTimeoutMs)
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`${this.name} embeddings API error ${response.status}: ${error}`);
    }

    const parsed = EmbeddingResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`${this.name} embeddings API returned an unexpected payload`);
    }
    if (parsed.data.data.length !== texts.length) {
      throw new Error(
        `${this.name} returned ${parsed.data.data.length} embeddings for ${texts.length} inputs`
      );
    }

    // Order by index when the server reports it
    const items = [...parsed.data.data].sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
    const vectors = items.map((item) => item.embedding);
    const first = vectors[0];
    if (first) this._dimensions = first.length;
    return vectors;
  }
}
