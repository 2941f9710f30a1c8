import type { FileType } from '../utils/language-detection.js';

/**
 * Receives human-readable progress lines. Implementations should not throw;
 * if they do, the scan logs and carries on.
 */
export interface ProgressSink {
  onProgress(message: string): void;
}

export interface FileDescriptor {
  /** Absolute path */
  path: string;
  /** POSIX-style path relative to the scan root */
  relativePath: string;
  detectedType: FileType;
  isSource: boolean;
  language: string;
  size: number;
}

export interface DiscoveryResult {
  rootPath: string;
  files: FileDescriptor[];
  /** Entries the walker produced, including ones later skipped */
  visited: number;
  skipped: number;
  durationMs: number;
}

export interface ScanOptions {
  timeoutMs: number;
  progress?: ProgressSink;
  /** Only return files classified as source code */
  sourceOnly?: boolean;
  /** Extra glob patterns, relative to the root */
  exclude?: string[];
  respectGitignore?: boolean;
  /** Files larger than this are skipped */
  maxFileSize?: number;
}
