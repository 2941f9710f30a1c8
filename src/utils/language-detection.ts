/**
 * Language Detection Utilities
 * Determines file types and languages based on extension and content
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';

import fileTypeTable from './file-types.json' with { type: 'json' };

export const FILE_TYPES = [
  'source_code',
  'text',
  'binary',
  'image',
  'document',
  'archive',
  'unknown'
] as const;

export type FileType = (typeof FILE_TYPES)[number];

const FileTypeTableSchema = z.object({
  languages: z.record(z.string()),
  sourceCode: z.array(z.string()),
  text: z.array(z.string()),
  image: z.array(z.string()),
  document: z.array(z.string()),
  archive: z.array(z.string()),
  binary: z.array(z.string())
});

const table = FileTypeTableSchema.parse(fileTypeTable);

const extensionToLanguage = new Map(Object.entries(table.languages));

const extensionToType = new Map<string, FileType>([
  ...table.binary.map((ext): [string, FileType] => [ext, 'binary']),
  ...table.archive.map((ext): [string, FileType] => [ext, 'archive']),
  ...table.document.map((ext): [string, FileType] => [ext, 'document']),
  ...table.image.map((ext): [string, FileType] => [ext, 'image']),
  ...table.text.map((ext): [string, FileType] => [ext, 'text']),
  ...table.sourceCode.map((ext): [string, FileType] => [ext, 'source_code'])
]);

export const SNIFF_BYTES = 1024;

/**
 * Detect language from file path
 */
export function detectLanguage(filePath: string): string {
  const ext = path.extname(filePath).toLowerCase();
  return extensionToLanguage.get(ext) ?? 'plaintext';
}

/**
 * Classify by extension alone. `unknown` means the content has to decide.
 */
export function classifyByExtension(filePath: string): FileType {
  const ext = path.extname(filePath).toLowerCase();
  return extensionToType.get(ext) ?? 'unknown';
}

/**
 * Check if a file is a code file
 */
export function isCodeFile(filePath: string): boolean {
  return classifyByExtension(filePath) === 'source_code';
}

/**
 * Check if a file is binary by extension (binary, image, document or archive)
 */
export function isBinaryFile(filePath: string): boolean {
  const type = classifyByExtension(filePath);
  return type === 'binary' || type === 'image' || type === 'document' || type === 'archive';
}

export function looksBinary(sample: Uint8Array): boolean {
  return sample.includes(0);
}

/**
 * Reads at most SNIFF_BYTES. A NUL byte means binary, anything else text.
 */
export async function sniffFileType(filePath: string): Promise<FileType> {
  const handle = await fs.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(SNIFF_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, SNIFF_BYTES, 0);
    return looksBinary(buffer.subarray(0, bytesRead)) ? 'binary' : 'text';
  } finally {
    await handle.close();
  }
}

export async function detectFileType(filePath: string): Promise<FileType> {
  const byExtension = classifyByExtension(filePath);
  return byExtension === 'unknown' ? sniffFileType(filePath) : byExtension;
}

/**
 * Get all supported source extensions
 */
export function getSupportedExtensions(): string[] {
  return [...table.sourceCode];
}
