import { z } from 'zod';

import { REGISTRY_FORMAT_VERSION } from '../constants/switchboard.js';
import { TRAINING_STATUSES, type TrainingStatus } from '../types/index.js';

export const ProjectRecordSchema = z.object({
  id: z.string().uuid(),
  name: z.string().min(1),
  sourcePath: z.string().min(1),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
  trainingStatus: z.enum(TRAINING_STATUSES),
  language: z.string().min(1).default('unknown'),
  fileCount: z.number().int().nonnegative().default(0)
});

export const RegistryFileSchema = z.object({
  version: z.literal(REGISTRY_FORMAT_VERSION),
  activeProjectId: z.string().nullable().default(null),
  projects: z.array(ProjectRecordSchema)
});

export type RegistryFile = z.infer<typeof RegistryFileSchema>;

const STATUS_RANK: Record<TrainingStatus, number> = {
  pending: 0,
  training: 1,
  completed: 2,
  failed: 2
};

/**
 * Forward-only: the target must rank strictly higher than the current status.
 * completed and failed share the top rank, so both are terminal.
 */
export function canTransition(from: TrainingStatus, to: TrainingStatus): boolean {
  return STATUS_RANK[to] > STATUS_RANK[from];
}

export function isTerminalStatus(status: TrainingStatus): boolean {
  return STATUS_RANK[status] === 2;
}

export const INVALID_NAME_CHARS = /[<>:"/\\|?*]/;
