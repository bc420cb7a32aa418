/**
 * Type definitions for Git operations
 */

import type { Language } from '../language/classifier.js';

/**
 * Where a file's change lives relative to the commit graph
 */
export type ChangeStatus = 'committed' | 'staged' | 'modified';

/**
 * Precedence used when a file is in more than one state at once
 * (e.g. staged and then edited again): the most local state wins.
 */
export const CHANGE_STATUS_PRECEDENCE: Record<ChangeStatus, number> = {
  modified: 2,
  staged: 1,
  committed: 0,
};

/**
 * Location of a file's content
 */
export type BlobRevision =
  | { kind: 'commit'; sha: string }
  | { kind: 'index' }
  | { kind: 'worktree' };

/**
 * A file touched between two revisions, as listed by the provider
 */
export interface ChangedFileEntry {
  path: string;
  status: ChangeStatus;
}

/**
 * Access to a repository's history and working tree
 */
export interface GitProvider {
  /** Resolve a ref to a commit id. Throws RepositoryError when it does not exist. */
  resolveRef(ref: string): Promise<string>;
  /**
   * List files that differ between two resolved revisions.
   * When `includeUncommitted` is set, staged, unstaged and untracked files are
   * listed too.
   */
  listChangedFiles(
    source: string,
    target: string,
    includeUncommitted: boolean
  ): Promise<ChangedFileEntry[]>;
  /** Read a file at a revision. Resolves `undefined` when the file does not exist there. */
  readBlob(revision: BlobRevision, path: string): Promise<string | undefined>;
}

/**
 * A file with at least one added or altered line in the target revision
 */
export interface FileChange {
  path: string;
  status: ChangeStatus;
  /** 1-based, strictly increasing, never empty */
  changedLines: readonly number[];
  language: Language;
  /** Where the target content of this file is read from */
  revision: BlobRevision;
  /**
   * Target content `changedLines` were computed from. When present the
   * analyzer uses it instead of reading `revision` again, so a working tree
   * edited mid-run cannot shift lines under the diff.
   */
  contents?: string;
}

export interface SkippedFile {
  path: string;
  reason: string;
}

/**
 * Files changed between two revisions for one analysis run
 */
export interface ChangeSet {
  source: string;
  target: string;
  files: readonly FileChange[];
  /** Files dropped because their content could not be read */
  skipped: readonly SkippedFile[];
}

/**
 * Thrown when a ref cannot be resolved or the repository is unusable.
 * Fatal: raised before any analysis starts.
 */
export class RepositoryError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly stderr?: string
  ) {
    super(message);
    this.name = 'RepositoryError';
  }
}

/**
 * Thrown when a single file cannot be read. Recovered per file.
 */
export class IoError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'IoError';
  }
}
