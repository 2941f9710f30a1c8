import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';

import { CACHE_ENTRY_VERSION } from '../constants/switchboard.js';
import { hasErrorCode, pathExists, writeJsonAtomic } from '../utils/atomic-write.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { isFingerprint } from './fingerprint.js';
import type { Vector } from './types.js';

export const CacheEntrySchema = z.object({
  version: z.literal(CACHE_ENTRY_VERSION),
  key: z.string().regex(/^[0-9a-f]{64}$/),
  vector: z.array(z.number().finite()).min(1),
  createdAt: z.string().datetime(),
  size: z.number().int().positive()
});

export type CacheEntry = z.infer<typeof CacheEntrySchema>;

/**
 * Persistent tier of the embedding cache. Entries are immutable once written.
 */
export interface EmbeddingStore {
  read(fingerprint: string): Promise<Vector | null>;
  write(fingerprint: string, vector: Vector): Promise<void>;
  count(): Promise<number>;
  clear(): Promise<void>;
}

/**
 * One JSON file per fingerprint, fanned out by the first two hex characters.
 */
export class DiskEmbeddingStore implements EmbeddingStore {
  private readonly logger: Logger;

  constructor(
    private readonly cacheDir: string,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('embedding-cache');
  }

  entryPath(fingerprint: string): string {
    if (!isFingerprint(fingerprint)) {
      throw new TypeError(`Invalid fingerprint: ${fingerprint}`);
    }
    return path.join(this.cacheDir, fingerprint.slice(0, 2), `${fingerprint}.json`);
  }

  async read(fingerprint: string): Promise<Vector | null> {
    const entryPath = this.entryPath(fingerprint);
    let raw: string;
    try {
      raw = await fs.readFile(entryPath, 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return null;
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      this.logger.warn('Ignoring unparseable cache entry', { path: entryPath });
      return null;
    }

    const parsed = CacheEntrySchema.safeParse(json);
    if (!parsed.success || parsed.data.key !== fingerprint || parsed.data.size !== parsed.data.vector.length) {
      this.logger.warn('Ignoring invalid cache entry', { path: entryPath });
      return null;
    }
    return Object.freeze(parsed.data.vector);
  }

  async write(fingerprint: string, vector: Vector): Promise<void> {
    const entryPath = this.entryPath(fingerprint);
    if (await pathExists(entryPath)) return;

    const entry: CacheEntry = {
      version: CACHE_ENTRY_VERSION,
      key: fingerprint,
      vector: [...vector],
      createdAt: new Date().toISOString(),
      size: vector.length
    };
    await writeJsonAtomic(entryPath, entry, 0);
  }

  async count(): Promise<number> {
    let shards: string[];
    try {
      shards = await fs.readdir(this.cacheDir);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return 0;
      throw error;
    }

    let total = 0;
    for (const shard of shards) {
      if (!/^[0-9a-f]{2}$/.test(shard)) continue;
      const files = await fs.readdir(path.join(this.cacheDir, shard));
      total += files.filter((name) => name.endsWith('.json')).length;
    }
    return total;
  }

  async clear(): Promise<void> {
    await fs.rm(this.cacheDir, { recursive: true, force: true });
  }
}
