/**
 * Directories and file globs never worth embedding.
 * Hidden entries (.git, .venv, .idea, ...) are already skipped by the walker.
 */
export const EXCLUDED_DIRECTORIES = [
  'node_modules',
  '__pycache__',
  'venv',
  'env',
  'vendor',
  'target',
  'build',
  'dist',
  'site-packages',
  'coverage'
] as const;

export const EXCLUDED_FILE_GLOBS = [
  '*.swp',
  '*.swo',
  '*~',
  '*.pyc',
  '*.pyo',
  '*.class',
  '*.o',
  '*.so',
  '*.dll',
  '*.exe',
  '*.log',
  '*.tmp',
  '*.temp'
] as const;

export function defaultIgnorePatterns(): string[] {
  return [
    ...EXCLUDED_DIRECTORIES.map((dir) => `**/${dir}/**`),
    ...EXCLUDED_FILE_GLOBS.map((pattern) => `**/${pattern}`)
  ];
}
