// Centralized constants for on-disk switchboard artifacts.
// Keep this module dependency-free to avoid import cycles.

export const DATA_DIRNAME = '.project-switchboard' as const;

export const REGISTRY_FILENAME = 'registry.json' as const;

/** Schema version for `registry.json`. */
export const REGISTRY_FORMAT_VERSION = 1 as const;

export const PROJECTS_DIRNAME = 'projects' as const;
export const ADAPTER_DIRNAME = 'adapter' as const;
export const ADAPTER_METADATA_FILENAME = 'adapter.json' as const;
export const VECTOR_STORE_DIRNAME = 'vector-store' as const;
export const CONTEXT_FILENAME = 'context.json' as const;

/** Schema version for per-project `context.json`. */
export const CONTEXT_FORMAT_VERSION = 1 as const;

export const EMBEDDING_CACHE_DIRNAME = 'embedding-cache' as const;

/**
 * On-disk embedding cache entry format.
 *
 * Bump when the entry layout changes. The fingerprint itself is unaffected:
 * entries with another version are read as misses and recomputed.
 */
export const CACHE_ENTRY_VERSION = 1 as const;

export const VECTOR_TABLE_NAME = 'code_chunks' as const;
