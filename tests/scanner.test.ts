import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';

import { scanDirectory } from '../src/discovery/scanner.js';
import { DiscoveryTimeoutError, FileUtilityError } from '../src/errors/index.js';
import { makeTempDir, recordingLogger, rmWithRetries, writeTree } from './test-helpers.js';

const PROJECT_FILES: Record<string, string> = {
  'src/main.py': 'def main():\n    return 1\n',
  'src/utils.js': 'export const id = (x) => x;\n',
  'src/app.ts': 'export function run(): void {}\n',
  'README.md': '# Demo\n',
  'notes.txt': 'remember the milk\n',
  'data.csv': 'a,b\n1,2\n',
  'logo.png': 'not really a png',
  'manual.pdf': '%PDF-1.4',
  'bundle.zip': 'PK',
  LICENSE: 'Permission is hereby granted\n'
};

describe('scanDirectory', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir('scan');
  });

  afterEach(async () => {
    vi.useRealTimers();
    await rmWithRetries(root);
  });

  it('classifies every file and skips excluded and hidden entries', async () => {
    await writeTree(root, {
      ...PROJECT_FILES,
      'node_modules/pkg/index.js': 'module.exports = 1;',
      'build/out.js': 'compiled',
      'src/__pycache__/main.cpython-311.pyc': 'bytecode',
      'debug.log': 'noise',
      '.hidden/secret.py': 'TOKEN = "test-secret"',
      '.env': 'KEY=test-secret'
    });

    const result = await scanDirectory(root, { timeoutMs: 5000 }, recordingLogger());

    expect(result.rootPath).toBe(path.resolve(root));
    expect(result.files.map((f) => f.relativePath)).toEqual([
      'LICENSE',
      'README.md',
      'bundle.zip',
      'data.csv',
      'logo.png',
      'manual.pdf',
      'notes.txt',
      'src/app.ts',
      'src/main.py',
      'src/utils.js'
    ]);
    expect(Object.fromEntries(result.files.map((f) => [f.relativePath, f.detectedType]))).toEqual({
      LICENSE: 'text',
      'README.md': 'source_code',
      'bundle.zip': 'archive',
      'data.csv': 'text',
      'logo.png': 'image',
      'manual.pdf': 'document',
      'notes.txt': 'text',
      'src/app.ts': 'source_code',
      'src/main.py': 'source_code',
      'src/utils.js': 'source_code'
    });
    expect(result.files.filter((f) => f.isSource)).toHaveLength(4);
    expect(result.visited).toBe(10);
    expect(result.skipped).toBe(0);

    const main = result.files.find((f) => f.relativePath === 'src/main.py');
    expect(main).toMatchObject({
      path: path.join(path.resolve(root), 'src', 'main.py'),
      language: 'python',
      size: Buffer.byteLength(PROJECT_FILES['src/main.py'])
    });
  });

  it('returns only source files when asked', async () => {
    await writeTree(root, PROJECT_FILES);
    const result = await scanDirectory(root, { timeoutMs: 5000, sourceOnly: true }, recordingLogger());
    expect(result.files.map((f) => f.relativePath)).toEqual(['README.md', 'src/app.ts', 'src/main.py', 'src/utils.js']);
  });

  it('reports start, periodic and completion progress', async () => {
    const files: Record<string, string> = {};
    for (let i = 0; i < 120; i++) files[`pkg/mod_${String(i).padStart(3, '0')}.py`] = `x = ${i}\n`;
    await writeTree(root, files);

    const messages: string[] = [];
    await scanDirectory(root, { timeoutMs: 10000, progress: { onProgress: (m) => messages.push(m) } }, recordingLogger());

    expect(messages).toEqual([
      `Scanning directory: ${path.resolve(root)}`,
      'Scanned 50 entries, 49 files kept',
      'Scanned 100 entries, 99 files kept',
      'Completed: found 120 source files in 120 total files'
    ]);
  });

  it('keeps scanning when the progress sink throws', async () => {
    await writeTree(root, { 'a.py': 'a = 1' });
    const logger = recordingLogger();
    const result = await scanDirectory(
      root,
      {
        timeoutMs: 5000,
        progress: {
          onProgress: () => {
            throw new Error('sink broke');
          }
        }
      },
      logger
    );

    expect(result.files).toHaveLength(1);
    expect(logger.records.filter((r) => r.message === 'Progress sink threw; continuing scan')).toHaveLength(2);
  });

  it('honours .gitignore and extra exclusions', async () => {
    await writeTree(root, {
      '.gitignore': 'generated/\n*.secret\n',
      'generated/api.py': 'x = 1',
      'keys.secret': 'test-secret',
      'docs/guide.md': '# Guide',
      'tests/test_app.py': 'def test(): pass',
      'app.py': 'print(1)'
    });

    const result = await scanDirectory(root, { timeoutMs: 5000, exclude: ['tests/**'] }, recordingLogger());
    expect(result.files.map((f) => f.relativePath)).toEqual(['app.py', 'docs/guide.md']);

    const unfiltered = await scanDirectory(root, { timeoutMs: 5000, respectGitignore: false }, recordingLogger());
    expect(unfiltered.files.map((f) => f.relativePath)).toEqual([
      'app.py',
      'docs/guide.md',
      'generated/api.py',
      'keys.secret',
      'tests/test_app.py'
    ]);
  });

  it('skips files above the size limit and counts them', async () => {
    await writeTree(root, { 'small.py': 'x = 1', 'large.py': 'y'.repeat(2048) });
    const result = await scanDirectory(root, { timeoutMs: 5000, maxFileSize: 1024 }, recordingLogger());

    expect(result.files.map((f) => f.relativePath)).toEqual(['small.py']);
    expect(result.skipped).toBe(1);
    expect(result.visited).toBe(2);
  });

  it('skips a dangling symlink and counts it', async () => {
    await writeTree(root, { 'ok.py': 'x = 1' });
    await fs.symlink(path.join(root, 'gone.py'), path.join(root, 'missing.py'));

    const result = await scanDirectory(root, { timeoutMs: 5000 }, recordingLogger());

    expect(result.files.map((f) => f.relativePath)).toEqual(['ok.py']);
    expect(result.visited).toBe(2);
    expect(result.skipped).toBe(1);
  });

  it.skipIf(process.getuid?.() === 0)('skips entries it has no permission to read', async () => {
    await writeTree(root, {
      'ok.py': 'x = 1',
      'locked/inner.py': 'y = 2',
      'sealed.secret': 'test-secret'
    });
    await fs.symlink(path.join(root, 'gone.py'), path.join(root, 'missing.py'));
    const locked = path.join(root, 'locked');
    const sealed = path.join(root, 'sealed.secret');
    await fs.chmod(locked, 0o000);
    await fs.chmod(sealed, 0o000);

    try {
      const result = await scanDirectory(root, { timeoutMs: 5000 }, recordingLogger());

      expect(result.files.map((f) => f.relativePath)).toEqual(['ok.py']);
      // the unreadable directory yields no entries; the sealed file and the symlink are skipped
      expect(result.visited).toBe(3);
      expect(result.skipped).toBe(2);
    } finally {
      await fs.chmod(locked, 0o755);
      await fs.chmod(sealed, 0o644);
    }
  });

  it('returns an empty result for an empty directory', async () => {
    const result = await scanDirectory(root, { timeoutMs: 5000 }, recordingLogger());
    expect(result.files).toEqual([]);
    expect(result.visited).toBe(0);
  });

  it('times out immediately with a zero budget', async () => {
    await writeTree(root, PROJECT_FILES);
    const error = await scanDirectory(root, { timeoutMs: 0 }, recordingLogger()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DiscoveryTimeoutError);
    expect(error).toMatchObject({ timeoutMs: 0, filesVisited: 0, rootPath: path.resolve(root) });
  });

  it('throws instead of returning a partial result when the deadline passes', async () => {
    await writeTree(root, PROJECT_FILES);
    vi.useFakeTimers({ toFake: ['Date'] });

    const scan = scanDirectory(
      root,
      {
        timeoutMs: 1000,
        progress: {
          onProgress: (message) => {
            if (message.startsWith('Scanning directory')) vi.setSystemTime(Date.now() + 5000);
          }
        }
      },
      recordingLogger()
    );

    await expect(scan).rejects.toBeInstanceOf(DiscoveryTimeoutError);
  });

  it('rejects a missing root', async () => {
    const missing = path.join(root, 'nope');
    await expect(scanDirectory(missing, { timeoutMs: 1000 })).rejects.toThrow(
      new FileUtilityError(`Directory does not exist: ${missing}`, missing)
    );
  });

  it('rejects a root that is a file', async () => {
    await writeTree(root, { 'file.py': 'x = 1' });
    const file = path.join(root, 'file.py');
    const error = await scanDirectory(file, { timeoutMs: 1000 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FileUtilityError);
    expect(error).toMatchObject({ message: `Not a directory: ${file}`, targetPath: file });
  });
});
