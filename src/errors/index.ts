/**
 * Thrown when the LanceDB index is corrupted or has a schema mismatch.
 * This error signals that re-indexing is required for semantic search to work.
 */
export class IndexCorruptedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IndexCorruptedError';
  }
}

/**
 * Thrown when a directory scan exceeds its deadline.
 * No partial result accompanies it: "found nothing" and "ran out of time" stay distinguishable.
 */
export class DiscoveryTimeoutError extends Error {
  constructor(
    readonly rootPath: string,
    readonly timeoutMs: number,
    readonly filesVisited: number
  ) {
    super(
      `File discovery in ${rootPath} exceeded ${timeoutMs}ms (visited ${filesVisited} files before the deadline)`
    );
    this.name = 'DiscoveryTimeoutError';
  }
}

/** Invalid discovery input (missing or non-directory root) or an unrecoverable traversal failure. */
export class FileUtilityError extends Error {
  constructor(
    message: string,
    readonly targetPath: string
  ) {
    super(message);
    this.name = 'FileUtilityError';
  }
}

export class ProjectRegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProjectRegistryError';
  }
}

export class ProjectNotFoundError extends ProjectRegistryError {
  constructor(readonly projectId: string) {
    super(`Project not found: ${projectId}`);
    this.name = 'ProjectNotFoundError';
  }
}

/** Rejected training status change. The registry is left untouched. */
export class InvalidTransitionError extends ProjectRegistryError {
  constructor(
    readonly projectId: string,
    readonly from: string,
    readonly to: string
  ) {
    super(`Invalid training status transition for ${projectId}: ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export class ProjectInUseError extends ProjectRegistryError {
  constructor(readonly projectId: string) {
    super(`Project ${projectId} is the active project and cannot be removed`);
    this.name = 'ProjectInUseError';
  }
}

/** A manager was asked to act for a project other than the one it currently holds. */
export class ProjectMismatchError extends Error {
  constructor(
    readonly requestedProjectId: string,
    readonly currentProjectId: string | null
  ) {
    super(
      `Requested project ${requestedProjectId} but the active project is ${currentProjectId ?? 'none'}`
    );
    this.name = 'ProjectMismatchError';
  }
}

export class NoActiveProjectError extends Error {
  constructor(operation: string) {
    super(`No active project: ${operation} requires a loaded project (use switch_project first)`);
    this.name = 'NoActiveProjectError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
