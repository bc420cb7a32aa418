/**
 * Diff Locator
 *
 * Turns two revisions into a ChangeSet: the files touched between them, each
 * with the target line numbers that were added or altered.
 */

import { classifyLanguage } from '../language/classifier.js';
import { createFileFilter, type FileFilterOptions } from '../git/filter.js';
import type {
  BlobRevision,
  ChangeSet,
  ChangedFileEntry,
  FileChange,
  GitProvider,
  SkippedFile,
} from '../git/type.js';
import { IoError } from '../git/type.js';
import type { LineDiffer } from './line-diff.js';

export interface LocateOptions extends FileFilterOptions {
  /** Baseline ref (default: main) */
  sourceRef?: string;
  /** Ref containing the changes (default: HEAD) */
  targetRef?: string;
  /** Log per-file decisions */
  verbose?: boolean;
}

/**
 * Target ref under which staged, unstaged and untracked files are included
 */
export const WORKTREE_REF = 'HEAD';

/**
 * Content that cannot be scanned line by line
 */
export function isBinaryContent(content: string): boolean {
  return content.includes('\0');
}

/**
 * Where the target version of a file with the given status lives
 */
export function targetRevision(entry: ChangedFileEntry, targetSha: string): BlobRevision {
  switch (entry.status) {
    case 'modified':
      return { kind: 'worktree' };
    case 'staged':
      return { kind: 'index' };
    case 'committed':
      return { kind: 'commit', sha: targetSha };
  }
}

/**
 * Code-unit order, independent of locale
 */
export function comparePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Locate changed lines between two refs
 *
 * @throws {RepositoryError} If either ref cannot be resolved
 */
export async function locateChanges(
  provider: GitProvider,
  differ: LineDiffer,
  options: LocateOptions = {}
): Promise<ChangeSet> {
  const sourceRef = options.sourceRef ?? 'main';
  const targetRef = options.targetRef ?? WORKTREE_REF;
  const verbose = options.verbose ?? false;

  const source = await provider.resolveRef(sourceRef);
  const target = await provider.resolveRef(targetRef);

  const keep = createFileFilter(options);
  const entries = (await provider.listChangedFiles(source, target, targetRef === WORKTREE_REF))
    .filter((entry) => {
      const kept = keep(entry.path);
      if (!kept && verbose) console.error(`[Locator] Filtered out ${entry.path}`);
      return kept;
    })
    .sort((a, b) => comparePaths(a.path, b.path));

  const files: FileChange[] = [];
  const skipped: SkippedFile[] = [];

  for (const entry of entries) {
    const revision = targetRevision(entry, target);
    try {
      const after = await provider.readBlob(revision, entry.path);
      if (after === undefined) {
        if (verbose) console.error(`[Locator] ${entry.path} deleted in target`);
        continue;
      }
      if (isBinaryContent(after)) {
        if (verbose) console.error(`[Locator] ${entry.path} is binary`);
        continue;
      }

      const before = (await provider.readBlob({ kind: 'commit', sha: source }, entry.path)) ?? '';
      const changedLines = differ.changedLines(before, after);
      if (changedLines.length === 0) {
        if (verbose) console.error(`[Locator] ${entry.path} has no changed lines`);
        continue;
      }

      files.push({
        path: entry.path,
        status: entry.status,
        changedLines,
        language: classifyLanguage(entry.path),
        revision,
        contents: after,
      });
    } catch (error: unknown) {
      if (!(error instanceof IoError)) throw error;
      if (verbose) console.warn(`[Locator] Skipping ${entry.path}: ${error.message}`);
      skipped.push({ path: entry.path, reason: error.message });
    }
  }

  return Object.freeze({
    source,
    target,
    files: Object.freeze(files),
    skipped: Object.freeze(skipped),
  });
}
