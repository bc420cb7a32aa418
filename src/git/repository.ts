/**
 * Git provider backed by the `git` executable
 */

import { execFile, execFileSync } from 'node:child_process';
import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { promisify } from 'node:util';
import type { BlobRevision, ChangeStatus, ChangedFileEntry, GitProvider } from './type.js';
import { CHANGE_STATUS_PRECEDENCE, IoError, RepositoryError } from './type.js';

const execFileAsync = promisify(execFile);

/** 64MB: blobs and name lists of large repositories */
const MAX_BUFFER = 64 * 1024 * 1024;

// ============================================================================
// Common Utilities
// ============================================================================

/**
 * Pull stderr out of a failed child_process call
 */
function stderrOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'stderr' in error) {
    const { stderr } = error;
    if (typeof stderr === 'string') return stderr.trim();
    if (Buffer.isBuffer(stderr)) return stderr.toString('utf-8').trim();
  }
  return error instanceof Error ? error.message : undefined;
}

/**
 * Exit status of a failed child_process call
 */
function exitCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return undefined;
}

/**
 * Validate that a path lies inside a git work tree
 *
 * Git reports paths relative to the top level, so a subdirectory resolves to
 * the top level of its work tree.
 *
 * @returns Absolute path of the work tree's top level
 * @throws {RepositoryError} If path doesn't exist or isn't a git repository
 */
export function validateGitRepository(repoPath: string): string {
  const absolutePath = resolve(repoPath);

  if (!existsSync(absolutePath)) {
    throw new RepositoryError(`Repository path does not exist: ${absolutePath}`, 'REPO_NOT_FOUND');
  }

  try {
    const topLevel = execFileSync('git', ['rev-parse', '--show-toplevel'], {
      cwd: absolutePath,
      encoding: 'utf-8',
      stdio: 'pipe',
    });
    return topLevel.trim();
  } catch (error: unknown) {
    throw new RepositoryError(
      `Not a git repository: ${absolutePath}`,
      'NOT_GIT_REPO',
      stderrOf(error)
    );
  }
}

/**
 * Split NUL-terminated `-z` output into paths
 */
export function splitNulList(output: string): string[] {
  return output.split('\0').filter((entry) => entry.length > 0);
}

/**
 * Merge entries for the same path, keeping the highest-precedence status
 */
export function mergeChangedEntries(entries: Iterable<ChangedFileEntry>): ChangedFileEntry[] {
  const byPath = new Map<string, ChangeStatus>();
  for (const { path, status } of entries) {
    const current = byPath.get(path);
    if (current === undefined || CHANGE_STATUS_PRECEDENCE[status] > CHANGE_STATUS_PRECEDENCE[current]) {
      byPath.set(path, status);
    }
  }
  return [...byPath.entries()].map(([path, status]) => ({ path, status }));
}

// ============================================================================
// Provider
// ============================================================================

/**
 * Reads history, index and working tree of a local repository
 */
export class GitRepository implements GitProvider {
  readonly repoPath: string;

  constructor(repoPath: string) {
    this.repoPath = validateGitRepository(repoPath);
  }

  private async git(args: string[]): Promise<string> {
    const { stdout } = await execFileAsync('git', args, {
      cwd: this.repoPath,
      encoding: 'utf-8',
      maxBuffer: MAX_BUFFER,
    });
    return stdout;
  }

  async resolveRef(ref: string): Promise<string> {
    try {
      const sha = await this.git(['rev-parse', '--verify', '--quiet', `${ref}^{commit}`]);
      return sha.trim();
    } catch (error: unknown) {
      throw new RepositoryError(`Cannot resolve ref: ${ref}`, 'REF_NOT_FOUND', stderrOf(error));
    }
  }

  async listChangedFiles(
    source: string,
    target: string,
    includeUncommitted: boolean
  ): Promise<ChangedFileEntry[]> {
    try {
      const entries: ChangedFileEntry[] = [];
      const committed = await this.git(['diff', '--name-only', '-z', '--no-renames', source, target]);
      for (const path of splitNulList(committed)) entries.push({ path, status: 'committed' });

      if (includeUncommitted) {
        const staged = await this.git(['diff', '--cached', '--name-only', '-z', '--no-renames']);
        for (const path of splitNulList(staged)) entries.push({ path, status: 'staged' });

        const unstaged = await this.git(['diff', '--name-only', '-z', '--no-renames']);
        for (const path of splitNulList(unstaged)) entries.push({ path, status: 'modified' });

        const untracked = await this.git(['ls-files', '--others', '--exclude-standard', '-z']);
        for (const path of splitNulList(untracked)) entries.push({ path, status: 'modified' });
      }

      return mergeChangedEntries(entries);
    } catch (error: unknown) {
      throw new RepositoryError(
        `Failed to list changes between ${source} and ${target}`,
        'DIFF_FAILED',
        stderrOf(error)
      );
    }
  }

  async readBlob(revision: BlobRevision, path: string): Promise<string | undefined> {
    if (revision.kind === 'worktree') {
      const absolute = join(this.repoPath, path);
      if (!existsSync(absolute)) return undefined;
      try {
        return await readFile(absolute, 'utf-8');
      } catch (error: unknown) {
        throw new IoError(`Failed to read ${path} from working tree`, path, { cause: error });
      }
    }

    const spec = revision.kind === 'commit' ? `${revision.sha}:${path}` : `:${path}`;
    let objectId: string;
    try {
      objectId = (await this.git(['rev-parse', '--verify', '--quiet', spec])).trim();
    } catch (error: unknown) {
      // --quiet turns "no such path" into a silent exit 1; anything else is a broken read
      if (exitCodeOf(error) === 1) return undefined;
      throw new IoError(`Failed to resolve ${spec}`, path, { cause: error });
    }

    try {
      return await this.git(['cat-file', 'blob', objectId]);
    } catch (error: unknown) {
      throw new IoError(`Failed to read ${spec}`, path, { cause: error });
    }
  }
}
