import type { ArtifactPaths } from '../config/settings.js';
import { ProjectMismatchError, errorMessage } from '../errors/index.js';
import { createLanceDBStorage } from '../storage/lancedb.js';
import type {
  CodeChunkWithEmbedding,
  StorageFactory,
  VectorSearchResult,
  VectorStorageProvider
} from '../storage/types.js';
import type { SearchFilters } from '../types/index.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { assertProjectId, type ManagerStatus, type ResourceManager } from './types.js';

export interface VectorStoreManagerOptions {
  paths: ArtifactPaths;
  storageFactory?: StorageFactory;
  logger?: Logger;
}

/**
 * Holds at most one open vector store: the current project's.
 * Reads and writes name the project they expect, so a caller racing a switch
 * gets ProjectMismatchError instead of touching the wrong index.
 */
export class VectorStoreManager implements ResourceManager {
  readonly name = 'vectorStore' as const;

  private readonly paths: ArtifactPaths;
  private readonly storageFactory: StorageFactory;
  private readonly logger: Logger;

  private provider: VectorStorageProvider | null = null;
  private currentProjectId: string | null = null;
  private currentStatus: ManagerStatus = 'unloaded';
  private error: string | null = null;
  private opens = 0;

  constructor(options: VectorStoreManagerOptions) {
    this.paths = options.paths;
    this.storageFactory = options.storageFactory ?? createLanceDBStorage;
    this.logger = options.logger ?? createLogger('vector-store');
  }

  async switchProject(projectId: string): Promise<boolean> {
    assertProjectId(projectId);
    if (this.currentProjectId === projectId && this.currentStatus === 'loaded' && this.provider) {
      return true;
    }

    await this.closeCurrent();
    this.currentProjectId = projectId;

    try {
      this.provider = await this.storageFactory(this.paths.vectorStore(projectId));
      this.opens++;
      this.currentStatus = 'loaded';
      this.error = null;
      this.logger.info('Vector store opened', { projectId });
      return true;
    } catch (error) {
      this.provider = null;
      this.currentStatus = 'error';
      this.error = errorMessage(error);
      this.logger.warn('Vector store open failed', { projectId, error: this.error });
      return false;
    }
  }

  current(): string | null {
    return this.currentProjectId;
  }

  status(): ManagerStatus {
    return this.currentStatus;
  }

  lastError(): string | null {
    return this.error;
  }

  openCount(): number {
    return this.opens;
  }

  async store(projectId: string, chunks: CodeChunkWithEmbedding[]): Promise<void> {
    await this.requireStore(projectId).store(chunks);
  }

  async search(
    projectId: string,
    queryVector: readonly number[],
    limit: number,
    filters?: SearchFilters
  ): Promise<VectorSearchResult[]> {
    return this.requireStore(projectId).search(queryVector, limit, filters);
  }

  async clear(projectId: string): Promise<void> {
    await this.requireStore(projectId).clear();
  }

  async count(): Promise<number> {
    return this.provider ? this.provider.count() : 0;
  }

  async unload(): Promise<void> {
    await this.closeCurrent();
    this.currentProjectId = null;
    this.currentStatus = 'unloaded';
    this.error = null;
  }

  private requireStore(projectId: string): VectorStorageProvider {
    if (projectId !== this.currentProjectId || !this.provider) {
      throw new ProjectMismatchError(projectId, this.provider ? this.currentProjectId : null);
    }
    return this.provider;
  }

  private async closeCurrent(): Promise<void> {
    const previous = this.provider;
    this.provider = null;
    if (!previous) return;
    try {
      await previous.close();
    } catch (error) {
      this.logger.warn('Closing previous vector store failed', {
        projectId: this.currentProjectId,
        error: errorMessage(error)
      });
    }
  }
}
