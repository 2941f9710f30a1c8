import type { EmbeddingCache } from './cache.js';
import { computeFingerprint, type BackendIdentity } from './fingerprint.js';
import type { EmbeddingProvider, Vector } from './types.js';

export const DEFAULT_EMBED_BATCH_SIZE = 32;

export interface CachedEmbedderOptions {
  cache: EmbeddingCache;
  identity: BackendIdentity;
  /** Resolved lazily so that a cache hit never reaches the backend. */
  provider: () => Promise<EmbeddingProvider>;
  /** Most texts sent to the backend in one request. */
  batchSize?: number;
}

/**
 * Routes text through the embedding cache for one backend identity.
 */
export class CachedEmbedder {
  private readonly batchSize: number;

  constructor(private readonly options: CachedEmbedderOptions) {
    this.batchSize = options.batchSize ?? DEFAULT_EMBED_BATCH_SIZE;
    if (!Number.isInteger(this.batchSize) || this.batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${this.batchSize}`);
    }
  }

  get identity(): BackendIdentity {
    return this.options.identity;
  }

  fingerprint(text: string): string {
    return computeFingerprint(text, this.options.identity);
  }

  async embedText(text: string): Promise<Vector> {
    return this.options.cache.getOrCompute(this.fingerprint(text), async () => {
      const provider = await this.options.provider();
      return provider.embed(text);
    });
  }

  /**
   * Embeds texts in order. Cached texts are served from the cache; the rest
   * go to the backend in batches of `batchSize`, one request per batch.
   */
  async embedMany(texts: readonly string[]): Promise<Vector[]> {
    const { cache } = this.options;
    const fingerprints = texts.map((text) => this.fingerprint(text));

    const found = new Map<string, Vector>();
    const missing = new Map<string, string>();
    for (const [index, fingerprint] of fingerprints.entries()) {
      if (found.has(fingerprint) || missing.has(fingerprint)) continue;
      const cached = await cache.peek(fingerprint);
      if (cached) found.set(fingerprint, cached);
      else missing.set(fingerprint, texts[index]);
    }

    const pending = [...missing];
    for (let start = 0; start < pending.length; start += this.batchSize) {
      const group = pending.slice(start, start + this.batchSize);
      let request: Promise<number[][]> | null = null;
      const batch = (): Promise<number[][]> => {
        if (!request) request = this.requestBatch(group.map(([, text]) => text));
        return request;
      };

      const vectors = await Promise.all(
        group.map(([fingerprint], index) =>
          cache.getOrCompute(fingerprint, async () => {
            const vector = (await batch())[index];
            if (!vector) throw new Error(`Embedding backend returned no vector for batch entry ${index}`);
            return vector;
          })
        )
      );
      group.forEach(([fingerprint], index) => found.set(fingerprint, vectors[index]));
    }

    return fingerprints.map((fingerprint) => {
      const vector = found.get(fingerprint);
      if (!vector) throw new Error(`No embedding for fingerprint ${fingerprint}`);
      return vector;
    });
  }

  private async requestBatch(texts: string[]): Promise<number[][]> {
    const provider = await this.options.provider();
    const vectors = await provider.embedBatch(texts);
    if (vectors.length !== texts.length) {
      throw new Error(`Embedding backend returned ${vectors.length} vectors for ${texts.length} texts`);
    }
    return vectors;
  }
}
