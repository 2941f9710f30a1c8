import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';

import { ADAPTER_METADATA_FILENAME } from '../constants/switchboard.js';
import type { ArtifactPaths } from '../config/settings.js';
import { errorMessage } from '../errors/index.js';
import { hasErrorCode } from '../utils/atomic-write.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { assertProjectId, type ManagerStatus, type ResourceManager } from './types.js';

export const AdapterMetadataSchema = z.object({
  baseModel: z.string().min(1),
  rank: z.number().int().positive().optional(),
  alpha: z.number().positive().optional(),
  trainedAt: z.string().datetime().optional(),
  description: z.string().optional()
});

export type AdapterMetadata = z.infer<typeof AdapterMetadataSchema>;

export interface LoadedAdapter {
  projectId: string;
  path: string;
  metadata: AdapterMetadata | null;
  files: string[];
  loadedAt: Date;
}

export interface AdapterLoaderOptions {
  paths: ArtifactPaths;
  maxLoadedAdapters?: number;
  logger?: Logger;
}

export const DEFAULT_MAX_LOADED_ADAPTERS = 2;

/**
 * Resolves a project's trained adapter from its artifact directory.
 * Recently used adapters stay resident so switching back to them is free.
 */
export class AdapterLoader implements ResourceManager {
  readonly name = 'adapterLoader' as const;

  private readonly paths: ArtifactPaths;
  private readonly maxLoaded: number;
  private readonly logger: Logger;
  private readonly loaded = new Map<string, LoadedAdapter>();

  private currentProjectId: string | null = null;
  private currentStatus: ManagerStatus = 'unloaded';
  private error: string | null = null;
  private loads = 0;
  private cacheHits = 0;

  constructor(options: AdapterLoaderOptions) {
    this.paths = options.paths;
    this.maxLoaded = Math.max(1, options.maxLoadedAdapters ?? DEFAULT_MAX_LOADED_ADAPTERS);
    this.logger = options.logger ?? createLogger('adapter-loader');
  }

  async switchProject(projectId: string): Promise<boolean> {
    assertProjectId(projectId);
    if (this.currentProjectId === projectId && this.currentStatus === 'loaded') {
      return true;
    }

    this.currentProjectId = projectId;
    const cached = this.loaded.get(projectId);
    if (cached) {
      this.touch(projectId, cached);
      this.cacheHits++;
      this.markLoaded();
      return true;
    }

    try {
      const adapter = await this.load(projectId);
      if (!adapter) {
        this.markError(`No adapter artifact for project ${projectId}`);
        return false;
      }
      this.touch(projectId, adapter);
      this.loads++;
      this.markLoaded();
      this.logger.info('Adapter loaded', { projectId, files: adapter.files.length });
      return true;
    } catch (error) {
      this.markError(errorMessage(error));
      this.logger.warn('Adapter load failed', { projectId, error: errorMessage(error) });
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

  getActiveAdapter(): LoadedAdapter | null {
    if (this.currentStatus !== 'loaded' || !this.currentProjectId) return null;
    return this.loaded.get(this.currentProjectId) ?? null;
  }

  stats(): { loads: number; cacheHits: number; loaded: string[] } {
    return { loads: this.loads, cacheHits: this.cacheHits, loaded: [...this.loaded.keys()] };
  }

  async unload(): Promise<void> {
    this.loaded.clear();
    this.currentProjectId = null;
    this.currentStatus = 'unloaded';
    this.error = null;
  }

  forget(projectId: string): void {
    if (projectId === this.currentProjectId) return;
    this.loaded.delete(projectId);
  }

  private async load(projectId: string): Promise<LoadedAdapter | null> {
    const adapterPath = this.paths.adapter(projectId);
    let entries: string[];
    try {
      entries = await fs.readdir(adapterPath);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT', 'ENOTDIR')) return null;
      throw error;
    }
    if (entries.length === 0) return null;

    return {
      projectId,
      path: adapterPath,
      metadata: await this.readMetadata(adapterPath, entries),
      files: entries.sort(),
      loadedAt: new Date()
    };
  }

  private async readMetadata(adapterPath: string, entries: string[]): Promise<AdapterMetadata | null> {
    if (!entries.includes(ADAPTER_METADATA_FILENAME)) return null;

    const raw = await fs.readFile(path.join(adapterPath, ADAPTER_METADATA_FILENAME), 'utf-8');
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new Error(`${ADAPTER_METADATA_FILENAME} is not valid JSON: ${errorMessage(error)}`);
    }
    const parsed = AdapterMetadataSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`${ADAPTER_METADATA_FILENAME} is invalid: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private touch(projectId: string, adapter: LoadedAdapter): void {
    this.loaded.delete(projectId);
    this.loaded.set(projectId, adapter);
    while (this.loaded.size > this.maxLoaded) {
      const oldest = this.loaded.keys().next();
      if (oldest.done) break;
      this.logger.debug('Evicting adapter', { projectId: oldest.value });
      this.loaded.delete(oldest.value);
    }
  }

  private markLoaded(): void {
    this.currentStatus = 'loaded';
    this.error = null;
  }

  private markError(message: string): void {
    this.currentStatus = 'error';
    this.error = message;
  }
}
