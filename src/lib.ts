/**
 * Library entry point for project-switchboard
 *
 * This module exports the public API for programmatic use.
 * For the MCP server, import from 'project-switchboard/server' or run the CLI.
 *
 * @example
 * ```typescript
 * import { createSwitchboard, loadSettings } from 'project-switchboard';
 *
 * const app = createSwitchboard(loadSettings());
 * const project = await app.registry.register('billing', '/path/to/billing');
 * const result = await app.orchestrator.switchProject(project.id);
 * if (result.degraded) console.error(result.message);
 *
 * await app.indexer.indexActiveProject();
 * const { results } = await app.indexer.searchActiveProject('where are invoices rendered?');
 * await app.shutdown();
 * ```
 */

// Wiring
export { createSwitchboard, type Switchboard, type SwitchboardDependencies } from './core/app.js';
export {
  loadSettings,
  createArtifactPaths,
  DEFAULT_SETTINGS,
  type Settings,
  type SettingsOverrides,
  type ArtifactPaths
} from './config/settings.js';

// Orchestration
export {
  SwitchOrchestrator,
  type SwitchResult,
  type HealthReport,
  type HealthStatus,
  type ManagerHealth,
  type SwitchOrchestratorOptions
} from './core/switch-orchestrator.js';
export {
  ActiveProjectState,
  type ActiveProjectSnapshot,
  type ManagerStatusMap
} from './core/active-project-state.js';
export { ProjectIndexer, type IndexSummary, type ProjectSearchResult } from './core/project-indexer.js';

// Registry
export { ProjectRegistry, canTransition, isTerminalStatus } from './registry/index.js';

// Resource managers
export {
  AdapterLoader,
  ContextManager,
  VectorStoreManager,
  type ResourceManager,
  type ManagerName,
  type ManagerStatus
} from './managers/index.js';

// Embeddings
export {
  EmbeddingCache,
  CachedEmbedder,
  DiskEmbeddingStore,
  computeFingerprint,
  normalizeContent,
  getEmbeddingProvider,
  OpenAIEmbeddingProvider,
  type EmbeddingProvider,
  type EmbeddingConfig,
  type EmbeddingStore,
  type EmbeddingCacheStats,
  type BackendIdentity,
  DEFAULT_EMBEDDING_CONFIG
} from './embeddings/index.js';

// Storage providers
export {
  LanceDBStorageProvider,
  createLanceDBStorage,
  type VectorStorageProvider,
  type CodeChunkWithEmbedding,
  type VectorSearchResult,
  type StorageFactory
} from './storage/index.js';

// Discovery
export { scanDirectory, type DiscoveryResult, type FileDescriptor, type ScanOptions } from './discovery/index.js';

// Utilities
export {
  isCodeFile,
  isBinaryFile,
  detectLanguage,
  detectFileType,
  getSupportedExtensions
} from './utils/language-detection.js';
export { createLineChunks, type ChunkingOptions } from './utils/chunking.js';

// Errors
export * from './errors/index.js';

// Types
export type { CodeChunk, ProjectRecord, TrainingStatus, SearchFilters } from './types/index.js';
