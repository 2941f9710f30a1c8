import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  return isErrnoException(error) && typeof error.code === 'string' && codes.includes(error.code);
}

export function tempPathFor(targetPath: string): string {
  return `${targetPath}.${process.pid}.${randomUUID().slice(0, 8)}.tmp`;
}

/**
 * Write-then-publish: content lands in a sibling temp file and is renamed into place,
 * so readers never observe a partially written file.
 */
export async function writeFileAtomic(targetPath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(targetPath), { recursive: true });
  const tempPath = tempPathFor(targetPath);
  try {
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, targetPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

export async function writeJsonAtomic(
  targetPath: string,
  value: unknown,
  indent: number | undefined = 2
): Promise<void> {
  await writeFileAtomic(targetPath, JSON.stringify(value, null, indent));
}

/** Reads and JSON-parses a file. Returns null when the file does not exist. */
export async function readJsonFile(targetPath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(targetPath, 'utf-8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return null;
    throw error;
  }
  return JSON.parse(raw);
}

export async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await fs.access(targetPath);
    return true;
  } catch {
    return false;
  }
}
