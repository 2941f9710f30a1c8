import { promises as fs } from 'fs';

import type { ArtifactPaths } from '../config/settings.js';
import type { EmbeddingCacheStats } from '../embeddings/cache.js';
import { ProjectInUseError, errorMessage } from '../errors/index.js';
import type { ManagerName, ManagerStatus, ResourceManager } from '../managers/types.js';
import type { ProjectRegistry } from '../registry/project-registry.js';
import type { ProjectRecord } from '../types/index.js';
import { createLogger, type Logger } from '../utils/logger.js';
import {
  ActiveProjectState,
  unloadedManagers,
  type ActiveProjectSnapshot,
  type ManagerStatusMap
} from './active-project-state.js';

export interface SwitchResult {
  success: boolean;
  /** The switch committed but at least one manager is in error */
  degraded: boolean;
  projectId: string;
  message: string;
  managers: ManagerStatusMap;
  /** Managers that were (re)loaded by this call */
  reloaded: ManagerName[];
  /** Managers that failed during this call */
  failed: ManagerName[];
}

export type HealthStatus = 'healthy' | 'degraded' | 'unavailable';

export interface ManagerHealth {
  status: ManagerStatus;
  projectId: string | null;
  error?: string;
}

export interface HealthReport {
  status: HealthStatus;
  currentProjectId: string | null;
  managers: Partial<Record<ManagerName, ManagerHealth>>;
  registry: { reachable: boolean; projectCount: number; error?: string };
  cache?: EmbeddingCacheStats;
  checkedAt: string;
}

export type ProjectDirectory = Pick<ProjectRegistry, 'get' | 'getActive' | 'setActive' | 'remove' | 'ping'>;

export interface SwitchOrchestratorOptions {
  registry: ProjectDirectory;
  /** Switched in array order */
  managers: ResourceManager[];
  state?: ActiveProjectState;
  /** When set, removeProject also deletes the project's artifact directory */
  paths?: ArtifactPaths;
  cacheStats?: () => Promise<EmbeddingCacheStats>;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Moves every resource manager to a new project as one serialized step.
 *
 * A switch succeeds once the registry knows the project, even if some managers
 * fail to load their artifacts; those are reported as degraded and retried on the
 * next switch to the same project. Nothing is rolled back.
 */
export class SwitchOrchestrator {
  readonly state: ActiveProjectState;

  private readonly registry: ProjectDirectory;
  private readonly managers: ResourceManager[];
  private readonly paths?: ArtifactPaths;
  private readonly cacheStats?: () => Promise<EmbeddingCacheStats>;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private registryError: string | null = null;

  constructor(options: SwitchOrchestratorOptions) {
    const names = new Set(options.managers.map((manager) => manager.name));
    if (names.size !== options.managers.length) {
      throw new Error('Each manager name may be registered only once');
    }
    this.registry = options.registry;
    this.managers = [...options.managers];
    this.state = options.state ?? new ActiveProjectState(options.now);
    this.paths = options.paths;
    this.cacheStats = options.cacheStats;
    this.logger = options.logger ?? createLogger('orchestrator');
    this.now = options.now ?? (() => new Date());
  }

  async switchProject(projectId: string): Promise<SwitchResult> {
    return this.state.update(async (writer) => {
      const before = writer.snapshot();
      const failure = (message: string): SwitchResult => ({
        success: false,
        degraded: false,
        projectId,
        message,
        managers: before.managers,
        reloaded: [],
        failed: []
      });

      let record: ProjectRecord | null;
      try {
        record = await this.registry.get(projectId);
        this.registryError = null;
      } catch (error) {
        this.registryError = errorMessage(error);
        this.logger.error('Registry lookup failed; switch aborted', { projectId, error: this.registryError });
        return failure(`Registry unavailable: ${this.registryError}`);
      }
      if (!record) {
        return failure(`Project not found: ${projectId}`);
      }

      const sameProject = before.currentProjectId === projectId;
      const targets = sameProject
        ? this.managers.filter((manager) => before.managers[manager.name] === 'error')
        : this.managers;

      if (sameProject && targets.length === 0) {
        return {
          success: true,
          degraded: false,
          projectId,
          message: `Project "${record.name}" is already active`,
          managers: before.managers,
          reloaded: [],
          failed: []
        };
      }

      const managers: Record<ManagerName, ManagerStatus> = sameProject
        ? { ...before.managers }
        : unloadedManagers();
      const errors: Partial<Record<ManagerName, string>> = sameProject ? { ...before.errors } : {};
      const reloaded: ManagerName[] = [];
      const failed: ManagerName[] = [];

      for (const manager of targets) {
        let loaded = false;
        let error: string | null = null;
        try {
          loaded = await manager.switchProject(projectId);
          if (!loaded) error = manager.lastError() ?? 'failed to load';
        } catch (thrown) {
          error = errorMessage(thrown);
        }

        if (loaded) {
          managers[manager.name] = 'loaded';
          delete errors[manager.name];
          reloaded.push(manager.name);
        } else {
          managers[manager.name] = 'error';
          errors[manager.name] = error ?? 'failed to load';
          failed.push(manager.name);
          this.logger.warn('Manager failed to switch', { projectId, manager: manager.name, error });
        }
      }

      const committed = writer.commit({ currentProjectId: projectId, managers, errors });

      try {
        await this.registry.setActive(projectId);
      } catch (error) {
        this.logger.warn('Could not persist active project', { projectId, error: errorMessage(error) });
      }

      const degradedManagers = this.managers
        .map((manager) => manager.name)
        .filter((name) => committed.managers[name] === 'error');
      const degraded = degradedManagers.length > 0;
      const message = degraded
        ? `Switched to "${record.name}" (degraded: ${degradedManagers.join(', ')})`
        : `Switched to "${record.name}"`;

      this.logger.info(degraded ? 'Switched project (degraded)' : 'Switched project', {
        projectId,
        reloaded: reloaded.join(','),
        failed: failed.join(',') || undefined
      });

      return {
        success: true,
        degraded,
        projectId,
        message,
        managers: committed.managers,
        reloaded,
        failed
      };
    });
  }

  /**
   * Re-activates the project persisted by the previous process, if any.
   */
  async restoreActiveProject(): Promise<SwitchResult | null> {
    let active: ProjectRecord | null;
    try {
      active = await this.registry.getActive();
    } catch (error) {
      this.logger.warn('Could not read persisted active project', { error: errorMessage(error) });
      return null;
    }
    if (!active) return null;
    return this.switchProject(active.id);
  }

  currentProjectId(): string | null {
    return this.state.snapshot().currentProjectId;
  }

  async currentProject(): Promise<ProjectRecord | null> {
    const projectId = this.currentProjectId();
    return projectId ? this.registry.get(projectId) : null;
  }

  snapshot(): ActiveProjectSnapshot {
    return this.state.snapshot();
  }

  /**
   * @throws ProjectInUseError when `projectId` is the current project
   */
  async removeProject(projectId: string): Promise<ProjectRecord> {
    return this.state.update(async (writer) => {
      if (writer.snapshot().currentProjectId === projectId) {
        throw new ProjectInUseError(projectId);
      }

      const removed = await this.registry.remove(projectId);
      for (const manager of this.managers) {
        manager.forget?.(projectId);
      }
      if (this.paths) {
        await fs.rm(this.paths.projectDir(projectId), { recursive: true, force: true });
      }
      this.logger.info('Project removed', { projectId, name: removed.name });
      return removed;
    });
  }

  /**
   * Unloads every manager. The persisted active project is kept for the next start.
   */
  async shutdown(): Promise<void> {
    await this.state.update(async (writer) => {
      for (const manager of [...this.managers].reverse()) {
        try {
          await manager.unload();
        } catch (error) {
          this.logger.warn('Manager unload failed', { manager: manager.name, error: errorMessage(error) });
        }
      }
      writer.commit({ currentProjectId: null, managers: unloadedManagers(), errors: {} });
    });
  }

  async health(): Promise<HealthReport> {
    const snapshot = this.state.snapshot();

    const registry: HealthReport['registry'] = { reachable: true, projectCount: 0 };
    try {
      registry.projectCount = (await this.registry.ping()).projectCount;
      this.registryError = null;
    } catch (error) {
      this.registryError = errorMessage(error);
    }
    if (this.registryError) {
      registry.reachable = false;
      registry.error = this.registryError;
    }

    const managers: Partial<Record<ManagerName, ManagerHealth>> = {};
    for (const manager of this.managers) {
      const error = snapshot.errors[manager.name];
      managers[manager.name] = {
        status: snapshot.managers[manager.name],
        projectId: snapshot.currentProjectId,
        ...(error ? { error } : {})
      };
    }

    let cache: EmbeddingCacheStats | undefined;
    if (this.cacheStats) {
      try {
        cache = await this.cacheStats();
      } catch (error) {
        this.logger.warn('Cache stats unavailable', { error: errorMessage(error) });
      }
    }

    const anyError = Object.values(snapshot.managers).some((status) => status === 'error');
    const status: HealthStatus = !registry.reachable ? 'unavailable' : anyError ? 'degraded' : 'healthy';

    return {
      status,
      currentProjectId: snapshot.currentProjectId,
      managers,
      registry,
      ...(cache ? { cache } : {}),
      checkedAt: this.now().toISOString()
    };
  }
}
