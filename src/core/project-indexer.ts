import { promises as fs } from 'fs';

import { scanDirectory } from '../discovery/scanner.js';
import type { DiscoveryResult, ProgressSink } from '../discovery/types.js';
import type { CachedEmbedder } from '../embeddings/cached-embedder.js';
import { NoActiveProjectError, errorMessage } from '../errors/index.js';
import type { VectorStoreManager } from '../managers/vector-store-manager.js';
import type { ProjectRegistry } from '../registry/project-registry.js';
import type { CodeChunkWithEmbedding, VectorSearchResult } from '../storage/types.js';
import type { CodeChunk, SearchFilters } from '../types/index.js';
import { createLineChunks, type ChunkingOptions } from '../utils/chunking.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { SwitchOrchestrator } from './switch-orchestrator.js';

export const DEFAULT_MAX_INDEXED_FILE_SIZE = 1024 * 1024;
const STORE_BATCH_SIZE = 100;

export interface ProjectIndexerOptions {
  orchestrator: Pick<SwitchOrchestrator, 'currentProjectId'>;
  registry: Pick<ProjectRegistry, 'require' | 'updateMetadata'>;
  vectorStore: VectorStoreManager;
  embedder: CachedEmbedder;
  discoveryTimeoutMs: number;
  chunking?: ChunkingOptions;
  maxFileSize?: number;
  logger?: Logger;
}

export interface IndexRunOptions {
  timeoutMs?: number;
  progress?: ProgressSink;
}

export interface IndexSummary {
  projectId: string;
  filesIndexed: number;
  filesSkipped: number;
  chunks: number;
  language: string;
  durationMs: number;
}

export interface ProjectSearchResult {
  projectId: string;
  query: string;
  results: VectorSearchResult[];
}

function dominantLanguage(scan: DiscoveryResult): string {
  const counts = new Map<string, number>();
  for (const file of scan.files) {
    if (file.language === 'plaintext') continue;
    counts.set(file.language, (counts.get(file.language) ?? 0) + 1);
  }
  let best = 'unknown';
  let bestCount = 0;
  for (const [language, count] of counts) {
    if (count > bestCount) {
      best = language;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Scan -> chunk -> embed (through the cache) -> store, for the active project only.
 */
export class ProjectIndexer {
  private readonly logger: Logger;

  constructor(private readonly options: ProjectIndexerOptions) {
    this.logger = options.logger ?? createLogger('indexer');
  }

  async indexActiveProject(run: IndexRunOptions = {}): Promise<IndexSummary> {
    const projectId = this.requireActive('index');
    const record = await this.options.registry.require(projectId);
    const startedAt = Date.now();

    const scan = await scanDirectory(
      record.sourcePath,
      {
        timeoutMs: run.timeoutMs ?? this.options.discoveryTimeoutMs,
        progress: run.progress,
        sourceOnly: true,
        maxFileSize: this.options.maxFileSize ?? DEFAULT_MAX_INDEXED_FILE_SIZE
      },
      this.logger.child('discovery', { projectId })
    );

    const { vectorStore, embedder } = this.options;

    const chunks: CodeChunk[] = [];
    let filesIndexed = 0;
    let filesSkipped = scan.skipped;

    for (const file of scan.files) {
      let content: string;
      try {
        content = await fs.readFile(file.path, 'utf-8');
      } catch (error) {
        filesSkipped++;
        this.logger.warn('Skipping unreadable file', { projectId, file: file.relativePath, error: errorMessage(error) });
        continue;
      }

      chunks.push(
        ...createLineChunks(
          content,
          { projectId, filePath: file.path, relativePath: file.relativePath, language: file.language },
          this.options.chunking
        )
      );
      filesIndexed++;
    }

    // The store is cleared only once every chunk has a vector
    const vectors = await embedder.embedMany(chunks.map((chunk) => chunk.content));
    const rows: CodeChunkWithEmbedding[] = chunks.map((chunk, index) => ({ ...chunk, embedding: vectors[index] }));

    await vectorStore.clear(projectId);
    for (let start = 0; start < rows.length; start += STORE_BATCH_SIZE) {
      await vectorStore.store(projectId, rows.slice(start, start + STORE_BATCH_SIZE));
    }
    const chunkCount = rows.length;

    const language = dominantLanguage(scan);
    await this.options.registry.updateMetadata(projectId, { fileCount: filesIndexed, language });

    const summary: IndexSummary = {
      projectId,
      filesIndexed,
      filesSkipped,
      chunks: chunkCount,
      language,
      durationMs: Date.now() - startedAt
    };
    this.logger.info('Project indexed', { ...summary });
    return summary;
  }

  async searchActiveProject(query: string, limit = 5, filters?: SearchFilters): Promise<ProjectSearchResult> {
    const projectId = this.requireActive('search');
    const vector = await this.options.embedder.embedText(query);
    const results = await this.options.vectorStore.search(projectId, vector, limit, filters);
    return { projectId, query, results };
  }

  private requireActive(operation: string): string {
    const projectId = this.options.orchestrator.currentProjectId();
    if (!projectId) throw new NoActiveProjectError(operation);
    return projectId;
  }
}
