import { describe, it, expect, afterEach, vi } from 'vitest';
import { locateChanges, targetRevision, isBinaryContent } from '../../src/diff/locator.js';
import { MyersLineDiffer } from '../../src/diff/line-diff.js';
import { RepositoryError } from '../../src/git/type.js';
import { MemoryGitProvider } from '../helpers/memory-provider.js';

const differ = new MyersLineDiffer();

function repository(): MemoryGitProvider {
  return new MemoryGitProvider({
    refs: { main: 'c1', feature: 'c2', HEAD: 'c2' },
    commits: {
      c1: {
        'src/app.ts': 'const a = 1;\nconst b = 2;\n',
        'src/gone.rs': 'fn main() {}\n',
        'README.md': '# Title\n',
      },
      c2: {
        'src/app.ts': 'const a = 1;\nconst b = 3;\nconst c = 4;\n',
        'lib/new.py': 'import os\n',
        'README.md': '# Title\n',
        'assets/raw.dat': 'GIF89a\0\0',
        'dist/out.js': 'x();\n',
      },
    },
  });
}

describe('locateChanges', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should resolve both refs and list changed lines per file in path order', async () => {
    const changeSet = await locateChanges(repository(), differ, { sourceRef: 'main', targetRef: 'feature' });

    expect(changeSet.source).toBe('c1');
    expect(changeSet.target).toBe('c2');
    expect(changeSet.files).toEqual([
      {
        path: 'lib/new.py',
        status: 'committed',
        changedLines: [1],
        language: 'python',
        revision: { kind: 'commit', sha: 'c2' },
        contents: 'import os\n',
      },
      {
        path: 'src/app.ts',
        status: 'committed',
        changedLines: [2, 3],
        language: 'typescript',
        revision: { kind: 'commit', sha: 'c2' },
        contents: 'const a = 1;\nconst b = 3;\nconst c = 4;\n',
      },
    ]);
    expect(changeSet.skipped).toEqual([]);
  });

  it('should drop deleted, binary and filtered files', async () => {
    const changeSet = await locateChanges(repository(), differ, { sourceRef: 'main', targetRef: 'feature' });
    const paths = changeSet.files.map((f) => f.path);

    expect(paths).not.toContain('src/gone.rs');
    expect(paths).not.toContain('assets/raw.dat');
    expect(paths).not.toContain('dist/out.js');
  });

  it('should keep default-excluded paths when default exclusions are off', async () => {
    const changeSet = await locateChanges(repository(), differ, {
      sourceRef: 'main',
      targetRef: 'feature',
      defaultExcludes: false,
    });

    expect(changeSet.files.map((f) => f.path)).toEqual(['dist/out.js', 'lib/new.py', 'src/app.ts']);
  });

  it('should produce an empty change set for identical revisions', async () => {
    const changeSet = await locateChanges(repository(), differ, { sourceRef: 'feature', targetRef: 'feature' });

    expect(changeSet.files).toEqual([]);
    expect(changeSet.skipped).toEqual([]);
  });

  it('should apply include and exclude globs', async () => {
    const changeSet = await locateChanges(repository(), differ, {
      sourceRef: 'main',
      targetRef: 'feature',
      include: ['src/**', 'lib/**'],
      exclude: ['lib/**'],
    });

    expect(changeSet.files.map((f) => f.path)).toEqual(['src/app.ts']);
  });

  it('should fail on an unknown ref', async () => {
    await expect(
      locateChanges(repository(), differ, { sourceRef: 'nope', targetRef: 'feature' })
    ).rejects.toBeInstanceOf(RepositoryError);
  });

  it('should record unreadable files as skipped and continue', async () => {
    const provider = new MemoryGitProvider({
      refs: { main: 'c1', feature: 'c2' },
      commits: {
        c1: {},
        c2: { 'a.js': 'eval(x);\n', 'b.js': 'ok();\n' },
      },
      unreadable: ['a.js'],
    });

    const changeSet = await locateChanges(provider, differ, { sourceRef: 'main', targetRef: 'feature' });

    expect(changeSet.files.map((f) => f.path)).toEqual(['b.js']);
    expect(changeSet.skipped).toEqual([{ path: 'a.js', reason: 'Permission denied: a.js' }]);
  });

  it('should include uncommitted work only when the target is HEAD', async () => {
    const state = {
      refs: { main: 'c1', HEAD: 'c1', feature: 'c1' },
      commits: { c1: { 'src/a.rs': 'fn a() {}\n', 'src/b.rs': 'fn b() {}\n' } },
      index: { 'src/a.rs': 'fn a() {}\nfn staged() {}\n' },
      worktree: {
        'src/a.rs': 'fn a() {}\nfn staged() {}\nfn edited() {}\n',
        'src/b.rs': 'fn b() {}\n',
        'notes.txt': 'todo\n',
      },
      uncommitted: [
        { path: 'src/a.rs', status: 'staged' as const },
        { path: 'src/a.rs', status: 'modified' as const },
        { path: 'notes.txt', status: 'modified' as const },
      ],
    };

    const atHead = await locateChanges(new MemoryGitProvider(state), differ, { sourceRef: 'main' });

    expect(atHead.files.map((f) => [f.path, f.status, f.changedLines])).toEqual([
      ['notes.txt', 'modified', [1]],
      ['src/a.rs', 'modified', [2, 3]],
    ]);
    expect(atHead.files[1].revision).toEqual({ kind: 'worktree' });

    const atRef = await locateChanges(new MemoryGitProvider(state), differ, {
      sourceRef: 'main',
      targetRef: 'feature',
    });
    expect(atRef.files).toEqual([]);
  });

  it('should write verbose diagnostics to stderr, never stdout', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    await locateChanges(repository(), differ, { sourceRef: 'main', targetRef: 'feature', verbose: true });

    expect(error).toHaveBeenCalledWith('[Locator] Filtered out dist/out.js');
    expect(error).toHaveBeenCalledWith('[Locator] src/gone.rs deleted in target');
    expect(log).not.toHaveBeenCalled();
  });

  it('should return frozen results', async () => {
    const changeSet = await locateChanges(repository(), differ, { sourceRef: 'main', targetRef: 'feature' });

    expect(Object.isFrozen(changeSet)).toBe(true);
    expect(Object.isFrozen(changeSet.files)).toBe(true);
  });
});

describe('targetRevision', () => {
  it('should read each status from where its content lives', () => {
    expect(targetRevision({ path: 'a', status: 'committed' }, 'abc')).toEqual({ kind: 'commit', sha: 'abc' });
    expect(targetRevision({ path: 'a', status: 'staged' }, 'abc')).toEqual({ kind: 'index' });
    expect(targetRevision({ path: 'a', status: 'modified' }, 'abc')).toEqual({ kind: 'worktree' });
  });
});

describe('isBinaryContent', () => {
  it('should flag content with NUL bytes', () => {
    expect(isBinaryContent('abc\0def')).toBe(true);
    expect(isBinaryContent('plain text\n')).toBe(false);
  });
});
