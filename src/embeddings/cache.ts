import { createLogger, type Logger } from '../utils/logger.js';
import { errorMessage } from '../errors/index.js';
import type { EmbeddingStore } from './disk-store.js';
import type { Vector } from './types.js';

export type ComputeFn = () => Promise<readonly number[]>;

export interface EmbeddingCacheStats {
  memoryEntries: number;
  diskEntries: number;
  hits: { memory: number; disk: number };
  misses: number;
  computeFailures: number;
  inFlight: number;
}

export interface EmbeddingCacheOptions {
  store: EmbeddingStore;
  maxMemoryEntries?: number;
  logger?: Logger;
}

export const DEFAULT_MAX_MEMORY_ENTRIES = 1000;

function toVector(value: readonly number[]): Vector {
  if (value.length === 0 || !value.every((n) => typeof n === 'number' && Number.isFinite(n))) {
    throw new TypeError('Embedding backend returned an empty or non-numeric vector');
  }
  return Object.freeze([...value]);
}

/**
 * Two-tier embedding cache: bounded in-memory LRU in front of a persistent store.
 *
 * Concurrent requests for the same fingerprint share one computation.
 * Failures propagate to every waiting caller and leave nothing behind,
 * so the next request computes again.
 */
export class EmbeddingCache {
  private readonly memory = new Map<string, Vector>();
  private readonly inFlight = new Map<string, Promise<Vector>>();
  private readonly store: EmbeddingStore;
  private readonly maxMemoryEntries: number;
  private readonly logger: Logger;

  private memoryHits = 0;
  private diskHits = 0;
  private misses = 0;
  private computeFailures = 0;
  // bumped by clear(); loads started before it must not write back
  private generation = 0;

  constructor(options: EmbeddingCacheOptions) {
    this.store = options.store;
    this.maxMemoryEntries = options.maxMemoryEntries ?? DEFAULT_MAX_MEMORY_ENTRIES;
    if (!Number.isInteger(this.maxMemoryEntries) || this.maxMemoryEntries < 1) {
      throw new RangeError(`maxMemoryEntries must be a positive integer, got ${this.maxMemoryEntries}`);
    }
    this.logger = options.logger ?? createLogger('embedding-cache');
  }

  async getOrCompute(fingerprint: string, computeFn: ComputeFn): Promise<Vector> {
    const cached = this.fromMemory(fingerprint);
    if (cached) return cached;

    const pending = this.inFlight.get(fingerprint);
    if (pending) return pending;

    const promise = this.load(fingerprint, computeFn);
    this.inFlight.set(fingerprint, promise);
    try {
      return await promise;
    } finally {
      if (this.inFlight.get(fingerprint) === promise) {
        this.inFlight.delete(fingerprint);
      }
    }
  }

  /**
   * Looks a fingerprint up in memory, then on disk. Never computes.
   */
  async peek(fingerprint: string): Promise<Vector | null> {
    const cached = this.fromMemory(fingerprint);
    if (cached) return cached;

    const generation = this.generation;
    const fromDisk = await this.readDisk(fingerprint);
    if (!fromDisk) return null;
    this.diskHits++;
    if (generation === this.generation) this.remember(fingerprint, fromDisk);
    return fromDisk;
  }

  private fromMemory(fingerprint: string): Vector | undefined {
    const cached = this.memory.get(fingerprint);
    if (!cached) return undefined;
    // refresh recency
    this.memory.delete(fingerprint);
    this.memory.set(fingerprint, cached);
    this.memoryHits++;
    return cached;
  }

  private async load(fingerprint: string, computeFn: ComputeFn): Promise<Vector> {
    const generation = this.generation;
    const fromDisk = await this.readDisk(fingerprint);
    if (fromDisk) {
      this.diskHits++;
      if (generation === this.generation) this.remember(fingerprint, fromDisk);
      return fromDisk;
    }

    this.misses++;
    let vector: Vector;
    try {
      vector = toVector(await computeFn());
    } catch (error) {
      this.computeFailures++;
      throw error;
    }

    if (generation !== this.generation) {
      this.logger.debug('Cache cleared during computation; not storing result', { fingerprint });
      return vector;
    }

    try {
      await this.store.write(fingerprint, vector);
    } catch (error) {
      this.logger.warn('Failed to persist embedding; keeping it in memory only', {
        fingerprint,
        error: errorMessage(error)
      });
    }
    if (generation === this.generation) this.remember(fingerprint, vector);
    return vector;
  }

  private async readDisk(fingerprint: string): Promise<Vector | null> {
    try {
      return await this.store.read(fingerprint);
    } catch (error) {
      this.logger.warn('Disk cache read failed; treating as a miss', {
        fingerprint,
        error: errorMessage(error)
      });
      return null;
    }
  }

  private remember(fingerprint: string, vector: Vector): void {
    this.memory.delete(fingerprint);
    this.memory.set(fingerprint, vector);
    while (this.memory.size > this.maxMemoryEntries) {
      const oldest = this.memory.keys().next();
      if (oldest.done) break;
      this.memory.delete(oldest.value);
    }
  }

  has(fingerprint: string): boolean {
    return this.memory.has(fingerprint);
  }

  async stats(): Promise<EmbeddingCacheStats> {
    return {
      memoryEntries: this.memory.size,
      diskEntries: await this.store.count(),
      hits: { memory: this.memoryHits, disk: this.diskHits },
      misses: this.misses,
      computeFailures: this.computeFailures,
      inFlight: this.inFlight.size
    };
  }

  async clear(): Promise<void> {
    this.generation++;
    this.inFlight.clear();
    this.memory.clear();
    await this.store.clear();
    this.logger.info('Embedding cache cleared');
  }
}
