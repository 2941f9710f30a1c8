import { createArtifactPaths, type ArtifactPaths, type Settings } from '../config/settings.js';
import { EmbeddingCache } from '../embeddings/cache.js';
import { CachedEmbedder } from '../embeddings/cached-embedder.js';
import { DiskEmbeddingStore, type EmbeddingStore } from '../embeddings/disk-store.js';
import { getEmbeddingProvider } from '../embeddings/index.js';
import type { EmbeddingProvider } from '../embeddings/types.js';
import { AdapterLoader } from '../managers/adapter-loader.js';
import { ContextManager } from '../managers/context-manager.js';
import { VectorStoreManager } from '../managers/vector-store-manager.js';
import { ProjectRegistry } from '../registry/project-registry.js';
import type { StorageFactory } from '../storage/types.js';
import { createLogger, setLogLevel, type Logger } from '../utils/logger.js';
import { ProjectIndexer } from './project-indexer.js';
import { SwitchOrchestrator } from './switch-orchestrator.js';

export interface SwitchboardDependencies {
  storageFactory?: StorageFactory;
  embeddingProvider?: () => Promise<EmbeddingProvider>;
  embeddingStore?: EmbeddingStore;
  logger?: Logger;
  now?: () => Date;
}

export interface Switchboard {
  settings: Settings;
  paths: ArtifactPaths;
  registry: ProjectRegistry;
  adapterLoader: AdapterLoader;
  vectorStore: VectorStoreManager;
  context: ContextManager;
  orchestrator: SwitchOrchestrator;
  cache: EmbeddingCache;
  embedder: CachedEmbedder;
  indexer: ProjectIndexer;
  shutdown(): Promise<void>;
}

/**
 * Wires settings, registry, managers, cache and orchestrator together.
 * Nothing touches the disk until the first operation runs.
 */
export function createSwitchboard(settings: Settings, deps: SwitchboardDependencies = {}): Switchboard {
  setLogLevel(settings.logLevel);
  const logger = deps.logger ?? createLogger('switchboard');
  const paths = createArtifactPaths(settings.dataDir);

  const registry = new ProjectRegistry({
    registryPath: paths.registry,
    logger: logger.child('registry'),
    now: deps.now
  });

  const vectorStore = new VectorStoreManager({
    paths,
    storageFactory: deps.storageFactory,
    logger: logger.child('vector-store')
  });
  const adapterLoader = new AdapterLoader({
    paths,
    maxLoadedAdapters: settings.maxLoadedAdapters,
    logger: logger.child('adapter-loader')
  });
  const context = new ContextManager({
    paths,
    maxMessages: settings.maxContextMessages,
    maxActiveContexts: settings.maxActiveContexts,
    logger: logger.child('context'),
    now: deps.now
  });

  const cache = new EmbeddingCache({
    store: deps.embeddingStore ?? new DiskEmbeddingStore(paths.embeddingCache, logger.child('embedding-cache')),
    maxMemoryEntries: settings.embeddingCacheSize,
    logger: logger.child('embedding-cache')
  });
  const embedder = new CachedEmbedder({
    cache,
    identity: {
      provider: settings.embedding.provider,
      model: settings.embedding.model,
      configVersion: settings.embeddingConfigVersion
    },
    provider: deps.embeddingProvider ?? (() => getEmbeddingProvider(settings.embedding)),
    batchSize: settings.embedding.batchSize
  });

  const orchestrator = new SwitchOrchestrator({
    registry,
    managers: [vectorStore, adapterLoader, context],
    paths,
    cacheStats: () => cache.stats(),
    logger: logger.child('orchestrator'),
    now: deps.now
  });

  const indexer = new ProjectIndexer({
    orchestrator,
    registry,
    vectorStore,
    embedder,
    discoveryTimeoutMs: settings.discoveryTimeoutMs,
    logger: logger.child('indexer')
  });

  return {
    settings,
    paths,
    registry,
    adapterLoader,
    vectorStore,
    context,
    orchestrator,
    cache,
    embedder,
    indexer,
    shutdown: () => orchestrator.shutdown()
  };
}
