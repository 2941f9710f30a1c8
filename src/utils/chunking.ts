/**
 * Code Chunking Utilities
 * Fixed-size line windows with overlap, so context spanning a boundary appears in both chunks
 */

import { v4 as uuidv4 } from 'uuid';
import type { CodeChunk } from '../types/index.js';

export interface ChunkingOptions {
  maxChunkSize?: number; // Max lines per chunk
  overlapSize?: number; // Lines of overlap between chunks
}

export const DEFAULT_CHUNKING_OPTIONS: Required<ChunkingOptions> = {
  maxChunkSize: 100,
  overlapSize: 10
};

export interface ChunkSource {
  projectId: string;
  filePath: string;
  relativePath: string;
  language: string;
}

/**
 * Create chunks based on line windows. Whitespace-only windows are dropped.
 */
export function createLineChunks(
  content: string,
  source: ChunkSource,
  options: ChunkingOptions = {}
): CodeChunk[] {
  const maxChunkSize = Math.max(1, options.maxChunkSize ?? DEFAULT_CHUNKING_OPTIONS.maxChunkSize);
  const overlapSize = Math.min(
    Math.max(0, options.overlapSize ?? DEFAULT_CHUNKING_OPTIONS.overlapSize),
    maxChunkSize - 1
  );

  const normalized = content.replace(/\r\n?/g, '\n').replace(/\n$/, '');
  if (normalized.trim() === '') return [];

  const chunks: CodeChunk[] = [];
  const lines = normalized.split('\n');
  let startLine = 0;

  while (startLine < lines.length) {
    const endLine = Math.min(startLine + maxChunkSize, lines.length);
    const chunkContent = lines.slice(startLine, endLine).join('\n');

    if (chunkContent.trim() !== '') {
      chunks.push({
        id: uuidv4(),
        projectId: source.projectId,
        content: chunkContent,
        filePath: source.filePath,
        relativePath: source.relativePath,
        startLine: startLine + 1,
        endLine,
        language: source.language
      });
    }

    if (endLine >= lines.length) break;
    // Move to next chunk with overlap
    startLine = endLine - overlapSize;
  }

  return chunks;
}
