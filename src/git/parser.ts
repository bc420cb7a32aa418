/**
 * Unified diff parser
 *
 * Lets a patch file stand in for a repository: changed lines come straight
 * from the `+` lines of each hunk and file contents are rebuilt from the
 * lines the hunks carry.
 */

import { classifyLanguage } from '../language/classifier.js';
import { comparePaths } from '../diff/locator.js';
import { createFileFilter, type FileFilterOptions } from './filter.js';
import type { BlobRevision, ChangeSet, ChangedFileEntry, FileChange, GitProvider } from './type.js';
import { RepositoryError } from './type.js';

/**
 * Parsed diff hunk information
 */
export interface DiffHunk {
  /** Starting line in old file */
  oldStart: number;
  /** Number of lines in old file */
  oldCount: number;
  /** Starting line in new file */
  newStart: number;
  /** Number of lines in new file */
  newCount: number;
  /** Lines in this hunk */
  lines: HunkLine[];
}

/**
 * A single line in a diff hunk
 */
export interface HunkLine {
  type: 'context' | 'added' | 'removed';
  /** Line content (without the +/- prefix) */
  content: string;
  /** Line number in old file (for context and removed lines) */
  oldLineNumber?: number;
  /** Line number in new file (for context and added lines) */
  newLineNumber?: number;
}

/**
 * Parsed diff file information
 */
export interface DiffFile {
  path: string;
  type: 'add' | 'delete' | 'modify';
  hunks: DiffHunk[];
  /** Lines with '+' prefix, as line numbers in the new file */
  changedLines: number[];
}

/**
 * Parse git diff output into structured file changes
 *
 * @param raw - Output of `git diff` or `git format-patch`
 */
export function parseDiff(raw: string): DiffFile[] {
  if (!raw || !raw.trim()) {
    return [];
  }

  const files: DiffFile[] = [];

  // Split by "diff --git" to get individual file diffs
  const chunks = raw.split(/^diff --git /m).slice(1);

  for (const chunk of chunks) {
    const diffFile = parseFileDiff(chunk);
    if (diffFile) {
      files.push(diffFile);
    }
  }

  return files;
}

/**
 * Strip the `a/` or `b/` prefix git puts on header paths
 */
function headerPath(line: string | undefined, prefix: string): string | undefined {
  if (line === undefined) return undefined;
  const value = line.slice(4).replace(/\t.*$/, '');
  if (value === '/dev/null') return value;
  return value.startsWith(prefix) ? value.slice(prefix.length) : value;
}

/**
 * Parse a single file diff chunk
 *
 * @returns Parsed diff file or null if the chunk has no usable header
 */
function parseFileDiff(chunk: string): DiffFile | null {
  const firstHunk = chunk.search(/^@@ /m);
  const headerLines = (firstHunk === -1 ? chunk : chunk.slice(0, firstHunk)).split('\n');
  const oldPath = headerPath(headerLines.find((line) => line.startsWith('--- ')), 'a/');
  const newPath = headerPath(headerLines.find((line) => line.startsWith('+++ ')), 'b/');

  // Header paths are missing for mode-only or binary changes; fall back to the first line
  const firstLine = chunk.split('\n')[0] ?? '';
  const pathMatch = firstLine.match(/^a\/(.+?)\s+b\/(.+?)$/);

  let type: DiffFile['type'];
  let path: string | undefined;

  if (chunk.includes('\nnew file mode') || oldPath === '/dev/null') {
    type = 'add';
    path = newPath ?? pathMatch?.[2];
  } else if (chunk.includes('\ndeleted file mode') || newPath === '/dev/null') {
    type = 'delete';
    path = oldPath ?? pathMatch?.[1];
  } else {
    type = 'modify';
    path = newPath ?? pathMatch?.[2];
  }

  if (path === undefined || path === '/dev/null') {
    return null;
  }

  const hunks = parseHunks(chunk);
  return { path, type, hunks, changedLines: getChangedLineNumbers(hunks) };
}

/**
 * Parse hunks from a diff chunk
 *
 * @param chunk - Full diff chunk for a single file
 */
export function parseHunks(chunk: string): DiffHunk[] {
  const hunks: DiffHunk[] = [];

  // Match hunk headers: @@ -oldStart,oldCount +newStart,newCount @@
  const hunkHeaderRegex = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@.*$/gm;
  const positions = [...chunk.matchAll(hunkHeaderRegex)].map((match) => ({
    start: match.index ?? 0,
    header: match[0],
    oldStart: parseInt(match[1] ?? '1', 10),
    oldCount: match[2] ? parseInt(match[2], 10) : 1,
    newStart: parseInt(match[3] ?? '1', 10),
    newCount: match[4] ? parseInt(match[4], 10) : 1,
  }));

  positions.forEach((pos, i) => {
    const hunkEnd = positions[i + 1]?.start ?? chunk.length;
    const rawLines = chunk.slice(pos.start + pos.header.length, hunkEnd).split('\n');

    const lines: HunkLine[] = [];
    let oldLine = pos.oldStart;
    let newLine = pos.newStart;

    for (const rawLine of rawLines) {
      if (rawLine === '') continue;

      const prefix = rawLine[0];
      const content = rawLine.slice(1);

      if (prefix === ' ') {
        lines.push({ type: 'context', content, oldLineNumber: oldLine, newLineNumber: newLine });
        oldLine++;
        newLine++;
      } else if (prefix === '-') {
        lines.push({ type: 'removed', content, oldLineNumber: oldLine });
        oldLine++;
      } else if (prefix === '+') {
        lines.push({ type: 'added', content, newLineNumber: newLine });
        newLine++;
      }
      // "\ No newline at end of file" and similar markers carry no line
    }

    hunks.push({
      oldStart: pos.oldStart,
      oldCount: pos.oldCount,
      newStart: pos.newStart,
      newCount: pos.newCount,
      lines,
    });
  });

  return hunks;
}

/**
 * Extract all changed line numbers from hunks
 *
 * These are lines with '+' prefix in the diff: newly added lines and the new
 * version of modified lines.
 */
export function getChangedLineNumbers(hunks: DiffHunk[]): number[] {
  const changedLines = new Set<number>();

  for (const hunk of hunks) {
    for (const line of hunk.lines) {
      if (line.type === 'added' && line.newLineNumber !== undefined) {
        changedLines.add(line.newLineNumber);
      }
    }
  }

  return [...changedLines].sort((a, b) => a - b);
}

/**
 * Rebuild the parts of the new file a diff reveals. Lines the hunks do not
 * cover are left empty so line numbers stay aligned.
 */
export function reconstructContent(file: DiffFile): string {
  const known = new Map<number, string>();
  let last = 0;

  for (const hunk of file.hunks) {
    for (const line of hunk.lines) {
      const lineNumber = line.newLineNumber;
      if (lineNumber === undefined) continue;
      known.set(lineNumber, line.content);
      last = Math.max(last, lineNumber);
    }
  }

  const lines: string[] = [];
  for (let n = 1; n <= last; n++) {
    lines.push(known.get(n) ?? '');
  }
  return lines.length > 0 ? lines.join('\n') + '\n' : '';
}

/**
 * Revision label used for both sides of a patch
 */
export const PATCH_REVISION = 'patch';

/**
 * Read-only provider over a parsed patch
 */
export class PatchProvider implements GitProvider {
  private readonly files: ReadonlyMap<string, DiffFile>;

  constructor(patch: string) {
    this.files = new Map(parseDiff(patch).map((file): [string, DiffFile] => [file.path, file]));
  }

  async resolveRef(ref: string): Promise<string> {
    if (ref !== PATCH_REVISION) {
      throw new RepositoryError(`Patch input has no ref named ${ref}`, 'REF_NOT_FOUND');
    }
    return PATCH_REVISION;
  }

  async listChangedFiles(): Promise<ChangedFileEntry[]> {
    return [...this.files.values()]
      .filter((file) => file.type !== 'delete')
      .map((file): ChangedFileEntry => ({ path: file.path, status: 'committed' }));
  }

  async readBlob(revision: BlobRevision, path: string): Promise<string | undefined> {
    const file = this.files.get(path);
    if (file === undefined) return undefined;
    if (revision.kind === 'commit' && revision.sha === PATCH_REVISION) {
      return file.type === 'delete' ? undefined : reconstructContent(file);
    }
    return undefined;
  }

  /**
   * Build the ChangeSet directly from hunk line numbers
   */
  async locate(options: FileFilterOptions = {}): Promise<ChangeSet> {
    const keep = createFileFilter(options);
    const files: FileChange[] = [...this.files.values()]
      .filter((file) => file.type !== 'delete' && file.changedLines.length > 0 && keep(file.path))
      .sort((a, b) => comparePaths(a.path, b.path))
      .map((file): FileChange => ({
        path: file.path,
        status: 'committed',
        changedLines: file.changedLines,
        language: classifyLanguage(file.path),
        revision: { kind: 'commit', sha: PATCH_REVISION },
      }));

    return Object.freeze({
      source: PATCH_REVISION,
      target: PATCH_REVISION,
      files: Object.freeze(files),
      skipped: Object.freeze([]),
    });
  }
}
