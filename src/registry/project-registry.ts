import { promises as fs } from 'fs';
import path from 'path';
import { Mutex } from 'async-mutex';
import { v4 as uuidv4 } from 'uuid';

import { REGISTRY_FORMAT_VERSION } from '../constants/switchboard.js';
import {
  InvalidTransitionError,
  ProjectInUseError,
  ProjectNotFoundError,
  ProjectRegistryError,
  errorMessage
} from '../errors/index.js';
import type { ProjectMetadataUpdate, ProjectRecord, TrainingStatus } from '../types/index.js';
import { hasErrorCode, readJsonFile, writeJsonAtomic } from '../utils/atomic-write.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { INVALID_NAME_CHARS, RegistryFileSchema, canTransition, type RegistryFile } from './types.js';

export interface ProjectRegistryOptions {
  registryPath: string;
  logger?: Logger;
  now?: () => Date;
}

function emptyRegistry(): RegistryFile {
  return { version: REGISTRY_FORMAT_VERSION, activeProjectId: null, projects: [] };
}

/**
 * Durable catalogue of projects, persisted as a single JSON document.
 *
 * Every call re-reads the file so that edits by another process are picked up;
 * mutations are serialized in-process and published with an atomic rename.
 */
export class ProjectRegistry {
  readonly registryPath: string;
  private readonly mutex = new Mutex();
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: ProjectRegistryOptions) {
    this.registryPath = path.resolve(options.registryPath);
    this.logger = options.logger ?? createLogger('registry');
    this.now = options.now ?? (() => new Date());
  }

  async register(name: string, sourcePath: string, language = 'unknown'): Promise<ProjectRecord> {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new ProjectRegistryError('Project name cannot be empty');
    }
    if (INVALID_NAME_CHARS.test(trimmed)) {
      throw new ProjectRegistryError(`Project name contains invalid characters: ${trimmed}`);
    }

    const resolvedSource = path.resolve(sourcePath);
    try {
      await fs.stat(resolvedSource);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT', 'ENOTDIR')) {
        throw new ProjectRegistryError(`Source path does not exist: ${resolvedSource}`);
      }
      throw new ProjectRegistryError(`Cannot access source path ${resolvedSource}: ${errorMessage(error)}`);
    }

    return this.mutate((data) => {
      const lower = trimmed.toLowerCase();
      if (data.projects.some((project) => project.name.toLowerCase() === lower)) {
        throw new ProjectRegistryError(`A project named "${trimmed}" already exists`);
      }

      const timestamp = this.now().toISOString();
      const record: ProjectRecord = {
        id: uuidv4(),
        name: trimmed,
        sourcePath: resolvedSource,
        createdAt: timestamp,
        updatedAt: timestamp,
        trainingStatus: 'pending',
        language: language.trim() || 'unknown',
        fileCount: 0
      };
      data.projects.push(record);
      this.logger.info('Registered project', { projectId: record.id, name: record.name });
      return { result: { ...record }, changed: true };
    });
  }

  async get(projectId: string): Promise<ProjectRecord | null> {
    const data = await this.mutex.runExclusive(() => this.load());
    const record = data.projects.find((project) => project.id === projectId);
    return record ? { ...record } : null;
  }

  async require(projectId: string): Promise<ProjectRecord> {
    const record = await this.get(projectId);
    if (!record) throw new ProjectNotFoundError(projectId);
    return record;
  }

  async list(): Promise<ProjectRecord[]> {
    const data = await this.mutex.runExclusive(() => this.load());
    return data.projects.map((project) => ({ ...project }));
  }

  async listByStatus(status: TrainingStatus): Promise<ProjectRecord[]> {
    return (await this.list()).filter((project) => project.trainingStatus === status);
  }

  /**
   * Applies a forward training-status transition. Re-applying the current status is a no-op.
   * @throws InvalidTransitionError on a backwards or terminal-to-terminal move; nothing is written
   */
  async updateStatus(projectId: string, status: TrainingStatus): Promise<ProjectRecord> {
    return this.mutate((data) => {
      const record = this.find(data, projectId);
      if (record.trainingStatus === status) {
        return { result: { ...record }, changed: false };
      }
      if (!canTransition(record.trainingStatus, status)) {
        throw new InvalidTransitionError(projectId, record.trainingStatus, status);
      }

      const previous = record.trainingStatus;
      record.trainingStatus = status;
      record.updatedAt = this.now().toISOString();
      this.logger.info('Training status changed', { projectId, from: previous, to: status });
      return { result: { ...record }, changed: true };
    });
  }

  async updateMetadata(projectId: string, update: ProjectMetadataUpdate): Promise<ProjectRecord> {
    if (update.fileCount !== undefined && (!Number.isInteger(update.fileCount) || update.fileCount < 0)) {
      throw new ProjectRegistryError(`fileCount must be a non-negative integer, got ${update.fileCount}`);
    }

    return this.mutate((data) => {
      const record = this.find(data, projectId);
      if (update.fileCount !== undefined) record.fileCount = update.fileCount;
      if (update.language !== undefined && update.language.trim()) record.language = update.language.trim();
      record.updatedAt = this.now().toISOString();
      return { result: { ...record }, changed: true };
    });
  }

  /**
   * @throws ProjectInUseError when the project is the persisted active project
   */
  async remove(projectId: string): Promise<ProjectRecord> {
    return this.mutate((data) => {
      const record = this.find(data, projectId);
      if (data.activeProjectId === projectId) {
        throw new ProjectInUseError(projectId);
      }
      data.projects = data.projects.filter((project) => project.id !== projectId);
      this.logger.info('Removed project', { projectId, name: record.name });
      return { result: { ...record }, changed: true };
    });
  }

  async getActive(): Promise<ProjectRecord | null> {
    const data = await this.mutex.runExclusive(() => this.load());
    if (!data.activeProjectId) return null;
    const record = data.projects.find((project) => project.id === data.activeProjectId);
    return record ? { ...record } : null;
  }

  async setActive(projectId: string | null): Promise<void> {
    await this.mutate((data) => {
      if (projectId !== null) this.find(data, projectId);
      if (data.activeProjectId === projectId) return { result: undefined, changed: false };
      data.activeProjectId = projectId;
      return { result: undefined, changed: true };
    });
  }

  /**
   * Reads the backing file; used by health checks.
   */
  async ping(): Promise<{ projectCount: number }> {
    const data = await this.mutex.runExclusive(() => this.load());
    return { projectCount: data.projects.length };
  }

  private find(data: RegistryFile, projectId: string): ProjectRecord {
    const record = data.projects.find((project) => project.id === projectId);
    if (!record) throw new ProjectNotFoundError(projectId);
    return record;
  }

  private async mutate<T>(
    change: (data: RegistryFile) => { result: T; changed: boolean }
  ): Promise<T> {
    return this.mutex.runExclusive(async () => {
      const data = await this.load();
      const { result, changed } = change(data);
      if (changed) {
        try {
          await writeJsonAtomic(this.registryPath, data);
        } catch (error) {
          throw new ProjectRegistryError(`Failed to write registry: ${errorMessage(error)}`);
        }
      }
      return result;
    });
  }

  private async load(): Promise<RegistryFile> {
    let json: unknown;
    try {
      json = await readJsonFile(this.registryPath);
    } catch (error) {
      if (error instanceof SyntaxError) {
        return this.recoverFromCorruption(error.message);
      }
      throw new ProjectRegistryError(`Failed to read registry: ${errorMessage(error)}`);
    }
    if (json === null) return emptyRegistry();

    const parsed = RegistryFileSchema.safeParse(json);
    if (!parsed.success) {
      return this.recoverFromCorruption(parsed.error.message);
    }
    return parsed.data;
  }

  private async recoverFromCorruption(reason: string): Promise<RegistryFile> {
    const backupPath = `${this.registryPath}.backup`;
    try {
      await fs.rename(this.registryPath, backupPath);
    } catch (error) {
      throw new ProjectRegistryError(`Registry is corrupt and could not be backed up: ${errorMessage(error)}`);
    }
    this.logger.error('Registry file was corrupt; moved aside and starting empty', {
      registryPath: this.registryPath,
      backupPath,
      reason
    });
    return emptyRegistry();
  }
}
