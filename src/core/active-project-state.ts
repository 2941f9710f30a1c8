import { Mutex } from 'async-mutex';

import type { ManagerName, ManagerStatus } from '../managers/types.js';

export type ManagerStatusMap = Readonly<Record<ManagerName, ManagerStatus>>;
export type ManagerErrorMap = Readonly<Partial<Record<ManagerName, string>>>;

export interface ActiveProjectSnapshot {
  readonly currentProjectId: string | null;
  readonly managers: ManagerStatusMap;
  readonly errors: ManagerErrorMap;
  readonly updatedAt: string;
}

export interface StateChange {
  currentProjectId: string | null;
  managers: Record<ManagerName, ManagerStatus>;
  errors: Partial<Record<ManagerName, string>>;
}

/**
 * Write access handed out for the duration of one exclusive section.
 */
export interface StateWriter {
  snapshot(): ActiveProjectSnapshot;
  commit(change: StateChange): ActiveProjectSnapshot;
}

export function unloadedManagers(): Record<ManagerName, ManagerStatus> {
  return { vectorStore: 'unloaded', adapterLoader: 'unloaded', context: 'unloaded' };
}

function freeze(change: StateChange, updatedAt: string): ActiveProjectSnapshot {
  return Object.freeze({
    currentProjectId: change.currentProjectId,
    managers: Object.freeze({ ...change.managers }),
    errors: Object.freeze({ ...change.errors }),
    updatedAt
  });
}

/**
 * Which project is active and how each manager fared loading it.
 * Readers get frozen snapshots; writers must go through update(), one at a time.
 */
export class ActiveProjectState {
  private readonly mutex = new Mutex();
  private current: ActiveProjectSnapshot;

  constructor(private readonly now: () => Date = () => new Date()) {
    this.current = freeze(
      { currentProjectId: null, managers: unloadedManagers(), errors: {} },
      now().toISOString()
    );
  }

  snapshot(): ActiveProjectSnapshot {
    return this.current;
  }

  isBusy(): boolean {
    return this.mutex.isLocked();
  }

  async update<T>(work: (writer: StateWriter) => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(async () => {
      let open = true;
      const writer: StateWriter = {
        snapshot: () => this.current,
        commit: (change) => {
          if (!open) {
            throw new Error('State writer used after its exclusive section ended');
          }
          this.current = freeze(change, this.now().toISOString());
          return this.current;
        }
      };
      try {
        return await work(writer);
      } finally {
        open = false;
      }
    });
  }
}
