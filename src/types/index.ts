/**
 * Shared types for project-switchboard
 */

// ============================================================================
// CHUNKS
// ============================================================================

export interface CodeChunk {
  id: string;
  projectId: string;
  content: string;
  filePath: string;
  relativePath: string;
  startLine: number;
  endLine: number;
  language: string;
}

export interface SearchFilters {
  language?: string;
  /** Only chunks whose relative path starts with this prefix */
  pathPrefix?: string;
}

// ============================================================================
// PROJECTS
// ============================================================================

export const TRAINING_STATUSES = ['pending', 'training', 'completed', 'failed'] as const;
export type TrainingStatus = (typeof TRAINING_STATUSES)[number];

export interface ProjectRecord {
  id: string;
  name: string;
  sourcePath: string;
  createdAt: string;
  updatedAt: string;
  trainingStatus: TrainingStatus;
  language: string;
  fileCount: number;
}

export interface ProjectMetadataUpdate {
  fileCount?: number;
  language?: string;
}
