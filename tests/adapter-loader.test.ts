import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';

import { createArtifactPaths, type ArtifactPaths } from '../src/config/settings.js';
import { AdapterLoader } from '../src/managers/adapter-loader.js';
import { makeTempDir, recordingLogger, rmWithRetries } from './test-helpers.js';

describe('AdapterLoader', () => {
  let dataDir: string;
  let paths: ArtifactPaths;
  let loader: AdapterLoader;

  async function writeAdapter(projectId: string, files: Record<string, string>): Promise<void> {
    const dir = paths.adapter(projectId);
    await fs.mkdir(dir, { recursive: true });
    for (const [name, content] of Object.entries(files)) {
      await fs.writeFile(path.join(dir, name), content);
    }
  }

  beforeEach(async () => {
    dataDir = await makeTempDir('adapters');
    paths = createArtifactPaths(dataDir);
    loader = new AdapterLoader({ paths, logger: recordingLogger() });
  });

  afterEach(async () => {
    await rmWithRetries(dataDir);
  });

  it('loads an adapter directory with its metadata', async () => {
    await writeAdapter('alpha', {
      'adapter_model.safetensors': 'weights',
      'adapter.json': JSON.stringify({ baseModel: 'tiny-base', rank: 8, alpha: 16 })
    });

    expect(await loader.switchProject('alpha')).toBe(true);
    expect(loader.status()).toBe('loaded');
    expect(loader.lastError()).toBeNull();

    const adapter = loader.getActiveAdapter();
    expect(adapter).toMatchObject({
      projectId: 'alpha',
      path: paths.adapter('alpha'),
      metadata: { baseModel: 'tiny-base', rank: 8, alpha: 16 },
      files: ['adapter.json', 'adapter_model.safetensors']
    });
  });

  it('accepts an adapter without a metadata file', async () => {
    await writeAdapter('alpha', { 'weights.bin': 'w' });
    expect(await loader.switchProject('alpha')).toBe(true);
    expect(loader.getActiveAdapter()?.metadata).toBeNull();
  });

  it('reports a missing or empty adapter as an error but still tracks the project', async () => {
    expect(await loader.switchProject('alpha')).toBe(false);
    expect(loader.current()).toBe('alpha');
    expect(loader.status()).toBe('error');
    expect(loader.lastError()).toBe('No adapter artifact for project alpha');
    expect(loader.getActiveAdapter()).toBeNull();

    await fs.mkdir(paths.adapter('beta'), { recursive: true });
    expect(await loader.switchProject('beta')).toBe(false);
    expect(loader.lastError()).toBe('No adapter artifact for project beta');
  });

  it('reports unreadable or invalid metadata', async () => {
    await writeAdapter('alpha', { 'adapter.json': '{ not json' });
    expect(await loader.switchProject('alpha')).toBe(false);
    expect(loader.lastError()).toMatch(/^adapter\.json is not valid JSON: /);

    await writeAdapter('beta', { 'adapter.json': JSON.stringify({ rank: 8 }) });
    expect(await loader.switchProject('beta')).toBe(false);
    expect(loader.lastError()).toMatch(/^adapter\.json is invalid: /);
  });

  it('does nothing when the project is already loaded', async () => {
    await writeAdapter('alpha', { 'weights.bin': 'w' });
    await loader.switchProject('alpha');
    await loader.switchProject('alpha');
    expect(loader.stats()).toEqual({ loads: 1, cacheHits: 0, loaded: ['alpha'] });
  });

  it('keeps recently used adapters resident and evicts the oldest', async () => {
    for (const id of ['a1', 'b2', 'c3']) await writeAdapter(id, { 'weights.bin': id });

    await loader.switchProject('a1');
    await loader.switchProject('b2');
    await loader.switchProject('a1');
    expect(loader.stats()).toEqual({ loads: 2, cacheHits: 1, loaded: ['b2', 'a1'] });

    await loader.switchProject('c3');
    expect(loader.stats()).toEqual({ loads: 3, cacheHits: 1, loaded: ['a1', 'c3'] });
  });

  it('retries a failed project once its artifact appears', async () => {
    expect(await loader.switchProject('alpha')).toBe(false);
    await writeAdapter('alpha', { 'weights.bin': 'w' });
    expect(await loader.switchProject('alpha')).toBe(true);
    expect(loader.status()).toBe('loaded');
  });

  it('forgets projects other than the current one', async () => {
    for (const id of ['a1', 'b2']) await writeAdapter(id, { 'weights.bin': id });
    await loader.switchProject('a1');
    await loader.switchProject('b2');

    loader.forget('b2');
    loader.forget('a1');
    expect(loader.stats().loaded).toEqual(['b2']);
  });

  it('unloads everything', async () => {
    await writeAdapter('alpha', { 'weights.bin': 'w' });
    await loader.switchProject('alpha');
    await loader.unload();

    expect(loader.current()).toBeNull();
    expect(loader.status()).toBe('unloaded');
    expect(loader.stats().loaded).toEqual([]);
  });

  it('rejects an empty project id', async () => {
    await expect(loader.switchProject('  ')).rejects.toBeInstanceOf(TypeError);
  });
});
