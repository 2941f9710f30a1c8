import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';

import {
  classifyByExtension,
  detectFileType,
  detectLanguage,
  getSupportedExtensions,
  isBinaryFile,
  isCodeFile,
  looksBinary,
  sniffFileType
} from '../src/utils/language-detection.js';
import { makeTempDir, rmWithRetries } from './test-helpers.js';

describe('language detection', () => {
  it('maps extensions to languages case-insensitively', () => {
    expect(detectLanguage('src/app.ts')).toBe('typescript');
    expect(detectLanguage('lib/Main.PY')).toBe('python');
    expect(detectLanguage('schema.graphql')).toBe('graphql');
    expect(detectLanguage('Makefile')).toBe('plaintext');
  });

  it('classifies by extension', () => {
    expect(classifyByExtension('a.py')).toBe('source_code');
    expect(classifyByExtension('README.md')).toBe('source_code');
    expect(classifyByExtension('config.yaml')).toBe('source_code');
    expect(classifyByExtension('notes.txt')).toBe('text');
    expect(classifyByExtension('yarn.lock')).toBe('text');
    expect(classifyByExtension('logo.png')).toBe('image');
    expect(classifyByExtension('spec.pdf')).toBe('document');
    expect(classifyByExtension('release.zip')).toBe('archive');
    expect(classifyByExtension('tool.exe')).toBe('binary');
    expect(classifyByExtension('LICENSE')).toBe('unknown');
  });

  it('reports code and binary files', () => {
    expect(isCodeFile('component.vue')).toBe(true);
    expect(isCodeFile('notes.txt')).toBe(false);
    expect(isBinaryFile('font.woff2')).toBe(true);
    expect(isBinaryFile('photo.jpg')).toBe(true);
    expect(isBinaryFile('main.go')).toBe(false);
  });

  it('lists supported source extensions', () => {
    const extensions = getSupportedExtensions();
    expect(extensions).toContain('.py');
    expect(extensions).toContain('.tsx');
    expect(extensions).not.toContain('.txt');
  });

  it('treats a NUL byte as binary', () => {
    expect(looksBinary(new Uint8Array([72, 105, 0, 33]))).toBe(true);
    expect(looksBinary(Buffer.from('plain text'))).toBe(false);
  });

  describe('content sniffing', () => {
    let dir: string;

    beforeAll(async () => {
      dir = await makeTempDir('sniff');
      await fs.writeFile(path.join(dir, 'LICENSE'), 'Permission is hereby granted');
      await fs.writeFile(path.join(dir, 'blob'), Buffer.from([0x7f, 0x45, 0x00, 0x01]));
      await fs.writeFile(path.join(dir, 'empty'), '');
      // NUL after the sniff window does not count
      await fs.writeFile(path.join(dir, 'late-nul'), Buffer.concat([Buffer.alloc(2048, 0x61), Buffer.from([0])]));
    });

    afterAll(async () => {
      await rmWithRetries(dir);
    });

    it('sniffs extensionless files', async () => {
      expect(await sniffFileType(path.join(dir, 'LICENSE'))).toBe('text');
      expect(await sniffFileType(path.join(dir, 'blob'))).toBe('binary');
      expect(await sniffFileType(path.join(dir, 'empty'))).toBe('text');
      expect(await sniffFileType(path.join(dir, 'late-nul'))).toBe('text');
    });

    it('prefers the extension over the content', async () => {
      await fs.writeFile(path.join(dir, 'weird.py'), Buffer.from([0]));
      expect(await detectFileType(path.join(dir, 'weird.py'))).toBe('source_code');
      expect(await detectFileType(path.join(dir, 'blob'))).toBe('binary');
    });
  });
});
