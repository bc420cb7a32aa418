/**
 * Changed-file filter
 * Applies include/exclude globs and drops files that are never worth scanning
 */

import { minimatch } from 'minimatch';

/**
 * Lockfiles are generated and never hand-edited
 */
const LOCKFILES = ['package-lock.json', 'yarn.lock', 'pnpm-lock.yaml', 'Cargo.lock', 'poetry.lock'];

/**
 * Binary/image file extensions to exclude
 */
const BINARY_EXTENSIONS = [
  '.png',
  '.jpg',
  '.jpeg',
  '.gif',
  '.ico',
  '.webp',
  '.pdf',
  '.zip',
  '.gz',
  '.tar',
  '.woff',
  '.woff2',
  '.ttf',
  '.exe',
  '.dll',
  '.so',
  '.dylib',
  '.wasm',
];

/**
 * Build output and dependency directories, matched at any depth
 */
export const DEFAULT_EXCLUDES = [
  'target/**',
  '**/node_modules/**',
  'dist/**',
  'build/**',
  'coverage/**',
  '**/*.lock',
  '**/*.log',
  '**/*.min.js',
];

export interface FileFilterOptions {
  /** When non-empty, a file must match at least one of these */
  include?: readonly string[];
  /** A file matching any of these is dropped */
  exclude?: readonly string[];
  /** Also apply DEFAULT_EXCLUDES, lockfiles and binary extensions (default: true) */
  defaultExcludes?: boolean;
}

const GLOB_OPTIONS = { dot: true } as const;

/**
 * Build a predicate deciding whether a repository-relative path is scanned
 *
 * A file is kept iff it matches at least one include glob (when any are
 * given) and matches no exclude glob.
 */
export function createFileFilter(options: FileFilterOptions = {}): (path: string) => boolean {
  const include = options.include ?? [];
  const defaultExcludes = options.defaultExcludes ?? true;
  const exclude = defaultExcludes ? [...DEFAULT_EXCLUDES, ...(options.exclude ?? [])] : [...(options.exclude ?? [])];

  return (path: string): boolean => {
    if (include.length > 0 && !include.some((glob) => minimatch(path, glob, GLOB_OPTIONS))) {
      return false;
    }

    if (exclude.some((glob) => minimatch(path, glob, GLOB_OPTIONS))) {
      return false;
    }

    if (defaultExcludes && (isLockfile(path) || isBinaryFile(path))) {
      return false;
    }

    return true;
  };
}

/**
 * Check if file is a lockfile
 */
function isLockfile(path: string): boolean {
  const fileName = path.split('/').pop() || '';
  return LOCKFILES.includes(fileName);
}

/**
 * Check if file is a binary/image file
 */
function isBinaryFile(path: string): boolean {
  const lower = path.toLowerCase();
  return BINARY_EXTENSIONS.some((ext) => lower.endsWith(ext));
}
