/**
 * Runtime settings.
 * Values come from SWITCHBOARD_* / EMBEDDING_* environment variables, validated with zod,
 * with explicit overrides taking precedence (tests, programmatic use).
 */

import os from 'os';
import path from 'path';
import { z } from 'zod';

import {
  ADAPTER_DIRNAME,
  CONTEXT_FILENAME,
  DATA_DIRNAME,
  EMBEDDING_CACHE_DIRNAME,
  PROJECTS_DIRNAME,
  REGISTRY_FILENAME,
  VECTOR_STORE_DIRNAME
} from '../constants/switchboard.js';
import {
  DEFAULT_EMBEDDING_CONFIG,
  DEFAULT_MODELS,
  EMBEDDING_PROVIDERS,
  EmbeddingConfigSchema,
  type EmbeddingConfig
} from '../embeddings/types.js';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export const SettingsSchema = z.object({
  dataDir: z.string().min(1),
  discoveryTimeoutMs: z.number().int().nonnegative(),
  embeddingCacheSize: z.number().int().min(1).max(100000),
  /** Bumped by the operator whenever backend options change; part of every cache fingerprint. */
  embeddingConfigVersion: z.string().min(1),
  maxLoadedAdapters: z.number().int().min(1),
  maxActiveContexts: z.number().int().min(1),
  maxContextMessages: z.number().int().min(1),
  logLevel: z.enum(LOG_LEVELS),
  embedding: EmbeddingConfigSchema
});

export type Settings = z.infer<typeof SettingsSchema>;

export type SettingsOverrides = Partial<Omit<Settings, 'embedding'>> & {
  embedding?: Partial<EmbeddingConfig>;
};

export const DEFAULT_SETTINGS: Omit<Settings, 'dataDir'> = {
  discoveryTimeoutMs: 30000,
  embeddingCacheSize: 1000,
  embeddingConfigVersion: '1',
  maxLoadedAdapters: 2,
  maxActiveContexts: 10,
  maxContextMessages: 50,
  logLevel: 'info',
  embedding: DEFAULT_EMBEDDING_CONFIG
};

const optionalInt = z.coerce.number().int().optional();

const EnvSchema = z.object({
  SWITCHBOARD_DATA_DIR: z.string().min(1).optional(),
  SWITCHBOARD_DISCOVERY_TIMEOUT_MS: optionalInt,
  SWITCHBOARD_EMBEDDING_CACHE_SIZE: optionalInt,
  SWITCHBOARD_EMBEDDING_CONFIG_VERSION: z.string().min(1).optional(),
  SWITCHBOARD_MAX_LOADED_ADAPTERS: optionalInt,
  SWITCHBOARD_MAX_ACTIVE_CONTEXTS: optionalInt,
  SWITCHBOARD_MAX_CONTEXT_MESSAGES: optionalInt,
  SWITCHBOARD_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  EMBEDDING_PROVIDER: z.enum(EMBEDDING_PROVIDERS).optional(),
  EMBEDDING_MODEL: z.string().min(1).optional(),
  EMBEDDING_API_KEY: z.string().min(1).optional(),
  EMBEDDING_API_ENDPOINT: z.string().url().optional(),
  EMBEDDING_BATCH_SIZE: optionalInt,
  EMBEDDING_TIMEOUT_MS: optionalInt
});

/** Drops empty strings so `FOO=` behaves like an unset variable. */
function nonEmptyEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === 'string' && value.trim() !== '') out[key] = value.trim();
  }
  return out;
}

export function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
  overrides: SettingsOverrides = {}
): Settings {
  const parsedEnv = EnvSchema.safeParse(nonEmptyEnv(env));
  if (!parsedEnv.success) {
    throw new Error(`Invalid environment configuration: ${parsedEnv.error.message}`);
  }
  const e = parsedEnv.data;
  const o = overrides;
  const oe = overrides.embedding ?? {};

  const provider = oe.provider ?? e.EMBEDDING_PROVIDER ?? DEFAULT_EMBEDDING_CONFIG.provider;
  const embedding: EmbeddingConfig = {
    provider,
    model: oe.model ?? e.EMBEDDING_MODEL ?? DEFAULT_MODELS[provider],
    apiKey: oe.apiKey ?? e.EMBEDDING_API_KEY,
    apiEndpoint: oe.apiEndpoint ?? e.EMBEDDING_API_ENDPOINT,
    batchSize: oe.batchSize ?? e.EMBEDDING_BATCH_SIZE ?? DEFAULT_EMBEDDING_CONFIG.batchSize,
    requestTimeoutMs:
      oe.requestTimeoutMs ?? e.EMBEDDING_TIMEOUT_MS ?? DEFAULT_EMBEDDING_CONFIG.requestTimeoutMs
  };

  const d = DEFAULT_SETTINGS;
  const candidate: Settings = {
    dataDir: o.dataDir ?? e.SWITCHBOARD_DATA_DIR ?? path.join(os.homedir(), DATA_DIRNAME),
    discoveryTimeoutMs:
      o.discoveryTimeoutMs ?? e.SWITCHBOARD_DISCOVERY_TIMEOUT_MS ?? d.discoveryTimeoutMs,
    embeddingCacheSize:
      o.embeddingCacheSize ?? e.SWITCHBOARD_EMBEDDING_CACHE_SIZE ?? d.embeddingCacheSize,
    embeddingConfigVersion:
      o.embeddingConfigVersion ?? e.SWITCHBOARD_EMBEDDING_CONFIG_VERSION ?? d.embeddingConfigVersion,
    maxLoadedAdapters: o.maxLoadedAdapters ?? e.SWITCHBOARD_MAX_LOADED_ADAPTERS ?? d.maxLoadedAdapters,
    maxActiveContexts: o.maxActiveContexts ?? e.SWITCHBOARD_MAX_ACTIVE_CONTEXTS ?? d.maxActiveContexts,
    maxContextMessages:
      o.maxContextMessages ?? e.SWITCHBOARD_MAX_CONTEXT_MESSAGES ?? d.maxContextMessages,
    logLevel: o.logLevel ?? e.SWITCHBOARD_LOG_LEVEL ?? d.logLevel,
    embedding
  };

  const result = SettingsSchema.safeParse(candidate);
  if (!result.success) {
    throw new Error(`Invalid settings: ${result.error.message}`);
  }
  return { ...result.data, dataDir: path.resolve(result.data.dataDir) };
}

const PROJECT_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

/**
 * Per-project artifact locations. Project ids become directory names,
 * so anything outside [A-Za-z0-9_-] is rejected as a programmer error.
 */
export interface ArtifactPaths {
  readonly dataDir: string;
  readonly registry: string;
  readonly embeddingCache: string;
  projectDir(projectId: string): string;
  adapter(projectId: string): string;
  vectorStore(projectId: string): string;
  context(projectId: string): string;
}

export function assertSafeProjectId(projectId: string): void {
  if (!PROJECT_ID_PATTERN.test(projectId)) {
    throw new TypeError(`Invalid project id: ${JSON.stringify(projectId)}`);
  }
}

export function createArtifactPaths(dataDir: string): ArtifactPaths {
  const root = path.resolve(dataDir);
  const projectDir = (projectId: string): string => {
    assertSafeProjectId(projectId);
    return path.join(root, PROJECTS_DIRNAME, projectId);
  };

  return {
    dataDir: root,
    registry: path.join(root, REGISTRY_FILENAME),
    embeddingCache: path.join(root, EMBEDDING_CACHE_DIRNAME),
    projectDir,
    adapter: (projectId) => path.join(projectDir(projectId), ADAPTER_DIRNAME),
    vectorStore: (projectId) => path.join(projectDir(projectId), VECTOR_STORE_DIRNAME),
    context: (projectId) => path.join(projectDir(projectId), CONTEXT_FILENAME)
  };
}
