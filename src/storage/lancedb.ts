/**
 * LanceDB Storage Provider
 * Embedded vector database holding one project's code embeddings
 */

import { promises as fs } from 'fs';
import type { Connection, Table } from '@lancedb/lancedb';
import { z } from 'zod';

import type { VectorStorageProvider, CodeChunkWithEmbedding, VectorSearchResult } from './types.js';
import type { SearchFilters } from '../types/index.js';
import { IndexCorruptedError, errorMessage } from '../errors/index.js';
import { VECTOR_TABLE_NAME } from '../constants/switchboard.js';
import { createLogger, type Logger } from '../utils/logger.js';

const SearchRowSchema = z.object({
  id: z.string(),
  projectId: z.string(),
  content: z.string(),
  filePath: z.string(),
  relativePath: z.string(),
  startLine: z.number(),
  endLine: z.number(),
  language: z.string(),
  _distance: z.number().optional()
});

function quote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function isCorruptionMessage(message: string): boolean {
  const lower = message.toLowerCase();
  return (
    lower.includes('no vector column') ||
    lower.includes('not found') ||
    lower.includes('does not exist') ||
    lower.includes('corrupted') ||
    lower.includes('schema')
  );
}

export class LanceDBStorageProvider implements VectorStorageProvider {
  readonly name = 'lancedb';

  private db: Connection | null = null;
  private table: Table | null = null;
  private storagePath = '';
  private initialized = false;
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('lancedb');
  }

  /**
   * Initialize the storage provider at the given path.
   */
  async initialize(storagePath: string): Promise<void> {
    if (this.initialized) return;

    try {
      this.storagePath = storagePath;
      await fs.mkdir(storagePath, { recursive: true });

      const lancedb = await import('@lancedb/lancedb');
      this.db = await lancedb.connect(storagePath);

      const tableNames = await this.db.tableNames();
      if (tableNames.includes(VECTOR_TABLE_NAME)) {
        this.table = await this.db.openTable(VECTOR_TABLE_NAME);

        const schema = await this.table.schema();
        const hasVectorColumn = schema.fields.some((field) => field.name === 'vector');
        if (!hasVectorColumn) {
          throw new IndexCorruptedError('LanceDB index corrupted: missing vector column');
        }
      } else {
        this.table = null;
      }

      this.initialized = true;
      this.logger.debug('LanceDB opened', { storagePath, hasTable: this.table !== null });
    } catch (error) {
      if (error instanceof IndexCorruptedError) {
        throw error;
      }
      // Connection/open failures fail closed
      throw new IndexCorruptedError(`LanceDB initialization failed: ${errorMessage(error)}`);
    }
  }

  private requireDb(): Connection {
    if (!this.initialized || !this.db) {
      throw new Error('Storage not initialized');
    }
    return this.db;
  }

  async store(chunks: CodeChunkWithEmbedding[]): Promise<void> {
    const db = this.requireDb();
    if (chunks.length === 0) return;

    const records = chunks.map((chunk) => ({
      id: chunk.id,
      projectId: chunk.projectId,
      vector: [...chunk.embedding],
      content: chunk.content,
      filePath: chunk.filePath,
      relativePath: chunk.relativePath,
      startLine: chunk.startLine,
      endLine: chunk.endLine,
      language: chunk.language
    }));

    if (this.table) {
      await this.table.add(records);
    } else {
      this.table = await db.createTable(VECTOR_TABLE_NAME, records, { mode: 'overwrite' });
    }
    this.logger.debug('Stored chunks', { storagePath: this.storagePath, count: chunks.length });
  }

  async search(
    queryVector: readonly number[],
    limit: number,
    filters?: SearchFilters
  ): Promise<VectorSearchResult[]> {
    if (!this.initialized) {
      throw new IndexCorruptedError('LanceDB index corrupted: storage not initialized (rebuild required)');
    }
    // Nothing indexed yet
    if (!this.table) return [];

    try {
      let query = this.table.vectorSearch([...queryVector]).distanceType('cosine').limit(limit);

      const whereConditions: string[] = [];
      if (filters?.language) {
        whereConditions.push(`language = ${quote(filters.language)}`);
      }
      if (filters?.pathPrefix) {
        whereConditions.push(`"relativePath" LIKE ${quote(`${filters.pathPrefix}%`)}`);
      }
      if (whereConditions.length > 0) {
        query = query.where(whereConditions.join(' AND '));
      }

      const rows: unknown[] = await query.toArray();
      const results: VectorSearchResult[] = [];
      for (const row of rows) {
        const parsed = SearchRowSchema.safeParse(row);
        if (!parsed.success) {
          throw new IndexCorruptedError('LanceDB index corrupted: unexpected row shape (rebuild required)');
        }
        const { _distance, ...chunk } = parsed.data;
        const distance = _distance ?? 0;
        results.push({
          chunk,
          // cosine distance -> similarity, clamped to [0, 1]
          score: Math.max(0, 1 - distance),
          distance
        });
      }
      return results;
    } catch (error) {
      if (error instanceof IndexCorruptedError) throw error;
      const message = errorMessage(error);
      if (isCorruptionMessage(message)) {
        throw new IndexCorruptedError(`LanceDB query failed (rebuild required): ${message}`);
      }
      // Transient errors degrade to no results instead of forcing a rebuild
      this.logger.warn('Search error', { storagePath: this.storagePath, error: message });
      return [];
    }
  }

  async clear(): Promise<void> {
    if (!this.initialized) return;
    const db = this.requireDb();

    const tableNames = await db.tableNames();
    if (tableNames.includes(VECTOR_TABLE_NAME)) {
      await db.dropTable(VECTOR_TABLE_NAME);
    }
    this.table = null;
  }

  async count(): Promise<number> {
    if (!this.initialized || !this.table) {
      return 0;
    }
    return this.table.countRows();
  }

  async close(): Promise<void> {
    const { table, db } = this;
    this.table = null;
    this.db = null;
    this.initialized = false;
    table?.close();
    db?.close();
  }
}

/**
 * Create a LanceDB storage provider
 */
export async function createLanceDBStorage(storagePath: string): Promise<LanceDBStorageProvider> {
  const provider = new LanceDBStorageProvider();
  await provider.initialize(storagePath);
  return provider;
}
