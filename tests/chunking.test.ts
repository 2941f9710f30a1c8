import { describe, it, expect } from 'vitest';

import { createLineChunks } from '../src/utils/chunking.js';

const source = {
  projectId: 'p1',
  filePath: '/repo/src/big.py',
  relativePath: 'src/big.py',
  language: 'python'
};

function numberedLines(count: number): string {
  return Array.from({ length: count }, (_, i) => `line ${i + 1}`).join('\n') + '\n';
}

describe('createLineChunks', () => {
  it('returns a single chunk for short content', () => {
    const chunks = createLineChunks('a = 1\nb = 2\n', source);

    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toMatchObject({
      projectId: 'p1',
      content: 'a = 1\nb = 2',
      filePath: '/repo/src/big.py',
      relativePath: 'src/big.py',
      startLine: 1,
      endLine: 2,
      language: 'python'
    });
    expect(chunks[0].id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('splits long content into overlapping windows', () => {
    const chunks = createLineChunks(numberedLines(25), source, { maxChunkSize: 10, overlapSize: 2 });

    expect(chunks.map((c) => [c.startLine, c.endLine])).toEqual([
      [1, 10],
      [9, 18],
      [17, 25]
    ]);
    expect(chunks[1].content.split('\n')[0]).toBe('line 9');
    expect(chunks[2].content.split('\n').at(-1)).toBe('line 25');
  });

  it('uses 100-line windows with 10 lines of overlap by default', () => {
    const chunks = createLineChunks(numberedLines(150), source);
    expect(chunks.map((c) => [c.startLine, c.endLine])).toEqual([
      [1, 100],
      [91, 150]
    ]);
  });

  it('clamps an overlap that would stall the window', () => {
    const chunks = createLineChunks(numberedLines(4), source, { maxChunkSize: 2, overlapSize: 5 });
    expect(chunks.map((c) => [c.startLine, c.endLine])).toEqual([
      [1, 2],
      [2, 3],
      [3, 4]
    ]);
  });

  it('normalizes CRLF line endings', () => {
    const chunks = createLineChunks('a\r\nb\r\n', source);
    expect(chunks[0].content).toBe('a\nb');
  });

  it('returns nothing for blank content', () => {
    expect(createLineChunks('', source)).toEqual([]);
    expect(createLineChunks('  \n\n\t\n', source)).toEqual([]);
  });

  it('drops whitespace-only windows', () => {
    const content = 'x = 1\n' + '\n'.repeat(5) + 'y = 2';
    const chunks = createLineChunks(content, source, { maxChunkSize: 2, overlapSize: 0 });
    expect(chunks.map((c) => c.content)).toEqual(['x = 1\n', 'y = 2']);
  });
});
