import { promises as fs, type Stats } from 'fs';
import path from 'path';
import { globIterate } from 'glob';
import ignore from 'ignore';

import { DiscoveryTimeoutError, FileUtilityError, errorMessage } from '../errors/index.js';
import { hasErrorCode } from '../utils/atomic-write.js';
import { detectFileType, detectLanguage } from '../utils/language-detection.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { defaultIgnorePatterns } from './exclusions.js';
import type { DiscoveryResult, FileDescriptor, ProgressSink, ScanOptions } from './types.js';

export const PROGRESS_INTERVAL = 50;

// setTimeout clamps anything larger to 1ms
const MAX_TIMER_MS = 2 ** 31 - 1;

const TIMED_OUT = Symbol('timed-out');

type Gitignore = ReturnType<typeof ignore.default>;

interface ScanCounters {
  visited: number;
  skipped: number;
}

function report(progress: ProgressSink | undefined, message: string, logger: Logger): void {
  if (!progress) return;
  try {
    progress.onProgress(message);
  } catch (error) {
    logger.warn('Progress sink threw; continuing scan', { error: errorMessage(error) });
  }
}

async function validateRoot(rootPath: string): Promise<void> {
  let stats: Stats;
  try {
    stats = await fs.stat(rootPath);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT', 'ENOTDIR')) {
      throw new FileUtilityError(`Directory does not exist: ${rootPath}`, rootPath);
    }
    throw new FileUtilityError(`Cannot access ${rootPath}: ${errorMessage(error)}`, rootPath);
  }
  if (!stats.isDirectory()) {
    throw new FileUtilityError(`Not a directory: ${rootPath}`, rootPath);
  }
}

async function loadGitignore(rootPath: string, logger: Logger): Promise<Gitignore | null> {
  try {
    const content = await fs.readFile(path.join(rootPath, '.gitignore'), 'utf-8');
    return ignore.default().add(content);
  } catch (error) {
    if (!hasErrorCode(error, 'ENOENT')) {
      logger.warn('Could not read .gitignore; ignoring it', { rootPath, error: errorMessage(error) });
    }
    return null;
  }
}

async function describe(
  rootPath: string,
  relativePath: string,
  maxFileSize: number | undefined
): Promise<FileDescriptor | null> {
  const absolutePath = path.join(rootPath, relativePath);
  // lstat: a symlink is never followed out of the tree
  const stats = await fs.lstat(absolutePath);
  if (!stats.isFile()) return null;
  if (maxFileSize !== undefined && stats.size > maxFileSize) return null;

  const detectedType = await detectFileType(absolutePath);
  return {
    path: absolutePath,
    relativePath,
    detectedType,
    isSource: detectedType === 'source_code',
    language: detectLanguage(absolutePath),
    size: stats.size
  };
}

/**
 * Walks `rootPath` and classifies every non-hidden file under a wall-clock deadline.
 *
 * The result is all-or-nothing: when the deadline passes the walk is aborted and
 * DiscoveryTimeoutError is thrown. Entries that cannot be read are counted in
 * `skipped` and left out.
 */
export async function scanDirectory(
  rootPath: string,
  options: ScanOptions,
  logger: Logger = createLogger('discovery')
): Promise<DiscoveryResult> {
  const root = path.resolve(rootPath);
  await validateRoot(root);

  const { timeoutMs, progress } = options;
  const counters: ScanCounters = { visited: 0, skipped: 0 };
  if (!(timeoutMs > 0)) {
    throw new DiscoveryTimeoutError(root, timeoutMs, 0);
  }

  const startedAt = Date.now();
  const deadline = startedAt + timeoutMs;
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve(TIMED_OUT);
    }, Math.min(timeoutMs, MAX_TIMER_MS));
  });

  const timedOut = (): DiscoveryTimeoutError => {
    logger.warn('Discovery deadline exceeded', { rootPath: root, timeoutMs, visited: counters.visited });
    return new DiscoveryTimeoutError(root, timeoutMs, counters.visited);
  };

  // Awaited values race against the deadline; a losing promise may still settle later
  const withDeadline = async <T>(work: Promise<T>): Promise<T> => {
    work.catch((error: unknown) => {
      logger.debug('Abandoned discovery step settled with an error', { error: errorMessage(error) });
    });
    const outcome = await Promise.race([work, expired]);
    if (outcome === TIMED_OUT) throw timedOut();
    return outcome;
  };

  try {
    report(progress, `Scanning directory: ${root}`, logger);

    const gitignore = options.respectGitignore === false ? null : await withDeadline(loadGitignore(root, logger));
    const files: FileDescriptor[] = [];
    const walker = globIterate('**/*', {
      cwd: root,
      nodir: true,
      dot: false,
      follow: false,
      posix: true,
      ignore: [...defaultIgnorePatterns(), ...(options.exclude ?? [])],
      signal: controller.signal
    });
    const iterator = walker[Symbol.asyncIterator]();

    for (;;) {
      if (Date.now() >= deadline) throw timedOut();

      let step: IteratorResult<string>;
      try {
        step = await withDeadline(iterator.next());
      } catch (error) {
        if (error instanceof DiscoveryTimeoutError) throw error;
        throw new FileUtilityError(`Directory traversal failed: ${errorMessage(error)}`, root);
      }
      if (step.done) break;

      const relativePath = step.value;
      counters.visited++;
      if (counters.visited % PROGRESS_INTERVAL === 0) {
        report(progress, `Scanned ${counters.visited} entries, ${files.length} files kept`, logger);
      }

      if (gitignore?.ignores(relativePath)) continue;

      let descriptor: FileDescriptor | null;
      try {
        descriptor = await withDeadline(describe(root, relativePath, options.maxFileSize));
      } catch (error) {
        if (error instanceof DiscoveryTimeoutError) throw error;
        counters.skipped++;
        logger.debug('Skipping unreadable entry', { relativePath, error: errorMessage(error) });
        continue;
      }

      if (!descriptor) {
        counters.skipped++;
        continue;
      }
      if (options.sourceOnly && !descriptor.isSource) continue;
      files.push(descriptor);
    }

    files.sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0));

    const sourceCount = files.filter((file) => file.isSource).length;
    report(progress, `Completed: found ${sourceCount} source files in ${files.length} total files`, logger);

    return {
      rootPath: root,
      files,
      visited: counters.visited,
      skipped: counters.skipped,
      durationMs: Date.now() - startedAt
    };
  } finally {
    clearTimeout(timer);
    controller.abort();
  }
}
