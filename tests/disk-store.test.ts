import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';

import { DiskEmbeddingStore } from '../src/embeddings/disk-store.js';
import { makeTempDir, recordingLogger, rmWithRetries, type RecordedLog } from './test-helpers.js';

const KEY = 'ab' + 'c'.repeat(62);
const OTHER_KEY = 'ab' + 'd'.repeat(62);

describe('DiskEmbeddingStore', () => {
  let dir: string;
  let records: RecordedLog[];
  let store: DiskEmbeddingStore;

  beforeEach(async () => {
    dir = await makeTempDir('disk-store');
    records = [];
    store = new DiskEmbeddingStore(dir, recordingLogger(records));
  });

  afterEach(async () => {
    await rmWithRetries(dir);
  });

  it('shards entries by the first two characters of the fingerprint', () => {
    expect(store.entryPath(KEY)).toBe(path.join(dir, 'ab', `${KEY}.json`));
  });

  it('refuses malformed fingerprints', () => {
    expect(() => store.entryPath('../../etc/passwd')).toThrow(TypeError);
  });

  it('writes a versioned entry and reads it back', async () => {
    await store.write(KEY, [0.5, -1]);

    const raw = JSON.parse(await fs.readFile(store.entryPath(KEY), 'utf-8'));
    expect(raw.version).toBe(1);
    expect(raw.key).toBe(KEY);
    expect(raw.vector).toEqual([0.5, -1]);
    expect(raw.size).toBe(2);
    expect(typeof raw.createdAt).toBe('string');

    expect(await store.read(KEY)).toEqual([0.5, -1]);
  });

  it('returns null for a missing entry', async () => {
    expect(await store.read(KEY)).toBeNull();
  });

  it('never overwrites an existing entry', async () => {
    await store.write(KEY, [1]);
    await store.write(KEY, [2]);
    expect(await store.read(KEY)).toEqual([1]);
  });

  it('treats unparseable JSON as a miss', async () => {
    await fs.mkdir(path.join(dir, 'ab'), { recursive: true });
    await fs.writeFile(store.entryPath(KEY), '{"version":1,"key":');

    expect(await store.read(KEY)).toBeNull();
    expect(records.map((r) => r.message)).toEqual(['Ignoring unparseable cache entry']);
  });

  it('treats an entry stored under the wrong key as a miss', async () => {
    await store.write(OTHER_KEY, [1, 2]);
    await fs.rename(store.entryPath(OTHER_KEY), store.entryPath(KEY));

    expect(await store.read(KEY)).toBeNull();
    expect(records.map((r) => r.message)).toEqual(['Ignoring invalid cache entry']);
  });

  it('treats a size mismatch as a miss', async () => {
    await fs.mkdir(path.join(dir, 'ab'), { recursive: true });
    const entry = { version: 1, key: KEY, vector: [1, 2, 3], createdAt: new Date().toISOString(), size: 2 };
    await fs.writeFile(store.entryPath(KEY), JSON.stringify(entry));

    expect(await store.read(KEY)).toBeNull();
  });

  it('counts entries across shards and clears them', async () => {
    await store.write(KEY, [1]);
    await store.write('ff' + '0'.repeat(62), [2]);
    await fs.writeFile(path.join(dir, 'README'), 'not an entry');

    expect(await store.count()).toBe(2);
    await store.clear();
    expect(await store.count()).toBe(0);
  });
});
