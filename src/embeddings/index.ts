export * from './types.js';
export * from './fingerprint.js';
export * from './disk-store.js';
export * from './cache.js';
export * from './cached-embedder.js';

import { DEFAULT_ENDPOINTS, type EmbeddingProvider, type EmbeddingConfig } from './types.js';
import { OpenAIEmbeddingProvider } from './openai.js';

export { OpenAIEmbeddingProvider } from './openai.js';

let cachedProvider: EmbeddingProvider | null = null;
let cachedProviderKey: string | null = null;

export async function getEmbeddingProvider(
  config: EmbeddingConfig,
  fetchImpl?: typeof fetch
): Promise<EmbeddingProvider> {
  const apiEndpoint = config.apiEndpoint ?? DEFAULT_ENDPOINTS[config.provider];
  const providerKey = `${config.provider}:${config.model}:${apiEndpoint}`;

  if (cachedProvider && cachedProviderKey === providerKey && !fetchImpl) {
    return cachedProvider;
  }

  const provider = new OpenAIEmbeddingProvider({
    name: config.provider,
    modelName: config.model,
    apiEndpoint,
    apiKey: config.apiKey,
    requireApiKey: config.provider === 'openai',
    requestTimeoutMs: config.requestTimeoutMs,
    fetchImpl
  });
  await provider.initialize();

  if (!fetchImpl) {
    cachedProvider = provider;
    cachedProviderKey = providerKey;
  }
  return provider;
}

export function resetEmbeddingProvider(): void {
  cachedProvider = null;
  cachedProviderKey = null;
}
