/**
 * Shared contract for per-project resource managers.
 */

export const MANAGER_NAMES = ['vectorStore', 'adapterLoader', 'context'] as const;
export type ManagerName = (typeof MANAGER_NAMES)[number];

export type ManagerStatus = 'loaded' | 'unloaded' | 'error';

export interface ResourceManager {
  readonly name: ManagerName;

  /**
   * Point this manager at `projectId`, releasing whatever it held before.
   * Returns true without reloading when the project is already current and loaded.
   * Returns false when the project's artifacts cannot be loaded; status() is then 'error'.
   * @throws TypeError for an empty or malformed project id
   */
  switchProject(projectId: string): Promise<boolean>;

  /** The project last given to switchProject, loaded or not. Null after unload(). */
  current(): string | null;

  status(): ManagerStatus;

  lastError(): string | null;

  unload(): Promise<void>;

  /** Drop anything cached for a project that no longer exists. */
  forget?(projectId: string): void;
}

export function assertProjectId(projectId: unknown): asserts projectId is string {
  if (typeof projectId !== 'string' || projectId.trim() === '') {
    throw new TypeError('Project id must be a non-empty string');
  }
}
