import { describe, it, expect } from 'vitest';
import {
  parseHunks,
  parseDiff,
  getChangedLineNumbers,
  reconstructContent,
  PatchProvider,
  PATCH_REVISION,
} from '../../src/git/parser.js';
import { RepositoryError } from '../../src/git/type.js';

// ============================================================================
// parseHunks tests
// ============================================================================

describe('parseHunks', () => {
  it('should parse a single hunk correctly', () => {
    const chunk = `a/src/index.ts b/src/index.ts
index abc123..def456 100644
--- a/src/index.ts
+++ b/src/index.ts
@@ -1,3 +1,4 @@
 import { foo } from './foo';
+import { bar } from './bar';

 export function main() {`;

    const hunks = parseHunks(chunk);

    expect(hunks).toHaveLength(1);
    expect(hunks[0].oldStart).toBe(1);
    expect(hunks[0].oldCount).toBe(3);
    expect(hunks[0].newStart).toBe(1);
    expect(hunks[0].newCount).toBe(4);
  });

  it('should parse multiple hunks', () => {
    const chunk = `a/src/file.ts b/src/file.ts
--- a/src/file.ts
+++ b/src/file.ts
@@ -1,3 +1,4 @@
 line 1
+added line
 line 2
 line 3
@@ -10,3 +11,4 @@
 line 10
+another added
 line 11
 line 12`;

    const hunks = parseHunks(chunk);

    expect(hunks).toHaveLength(2);
    expect(hunks[0].oldStart).toBe(1);
    expect(hunks[0].newStart).toBe(1);
    expect(hunks[1].oldStart).toBe(10);
    expect(hunks[1].newStart).toBe(11);
  });

  it('should correctly track line numbers for added, removed, and context lines', () => {
    const chunk = `a/file.ts b/file.ts
@@ -5,5 +5,6 @@
 context line 5
-removed line 6
+added line 6
+extra added line
 context line 7
 context line 8`;

    const hunks = parseHunks(chunk);
    const lines = hunks[0].lines;

    // Context line at old:5, new:5
    expect(lines[0].type).toBe('context');
    expect(lines[0].oldLineNumber).toBe(5);
    expect(lines[0].newLineNumber).toBe(5);

    // Removed line at old:6
    expect(lines[1].type).toBe('removed');
    expect(lines[1].oldLineNumber).toBe(6);
    expect(lines[1].newLineNumber).toBeUndefined();

    // Added lines at new:6 and new:7
    expect(lines[2].type).toBe('added');
    expect(lines[2].newLineNumber).toBe(6);
    expect(lines[2].oldLineNumber).toBeUndefined();

    expect(lines[3].type).toBe('added');
    expect(lines[3].newLineNumber).toBe(7);

    // Context lines at old:7/new:8 and old:8/new:9
    expect(lines[4].type).toBe('context');
    expect(lines[4].oldLineNumber).toBe(7);
    expect(lines[4].newLineNumber).toBe(8);
  });

  it('should handle hunk with only count of 1 (no comma)', () => {
    const chunk = `a/file.ts b/file.ts
@@ -1 +1 @@
-old line
+new line`;

    const hunks = parseHunks(chunk);

    expect(hunks).toHaveLength(1);
    expect(hunks[0].oldCount).toBe(1);
    expect(hunks[0].newCount).toBe(1);
  });

  it('should return empty array for content without hunks', () => {
    const chunk = `a/file.ts b/file.ts
--- a/file.ts
+++ b/file.ts
Binary files differ`;

    const hunks = parseHunks(chunk);

    expect(hunks).toHaveLength(0);
  });
});

// ============================================================================
// parseDiff tests
// ============================================================================

const PATCH = `diff --git a/src/app.ts b/src/app.ts
index 1111111..2222222 100644
--- a/src/app.ts
+++ b/src/app.ts
@@ -1,3 +1,4 @@
 const a = 1;
-const b = 2;
+const b = 3;
+const key = "sk-12345";
 export { a, b };
diff --git a/lib/new.py b/lib/new.py
new file mode 100644
index 0000000..3333333
--- /dev/null
+++ b/lib/new.py
@@ -0,0 +1,2 @@
+import os
+os.system(cmd)
diff --git a/old.rs b/old.rs
deleted file mode 100644
index 4444444..0000000
--- a/old.rs
+++ /dev/null
@@ -1 +0,0 @@
-fn main() {}
diff --git a/test_files/fixture.js b/test_files/fixture.js
--- a/test_files/fixture.js
+++ b/test_files/fixture.js
@@ -10,2 +10,3 @@
 one();
+eval(input);
 two();
`;

describe('parseDiff', () => {
  it('should return an empty list for empty input', () => {
    expect(parseDiff('')).toEqual([]);
    expect(parseDiff('   \n')).toEqual([]);
  });

  it('should classify added, deleted and modified files', () => {
    const files = parseDiff(PATCH);

    expect(files.map((f) => [f.path, f.type])).toEqual([
      ['src/app.ts', 'modify'],
      ['lib/new.py', 'add'],
      ['old.rs', 'delete'],
      ['test_files/fixture.js', 'modify'],
    ]);
  });

  it('should collect target line numbers of added lines', () => {
    const files = parseDiff(PATCH);

    expect(files[0].changedLines).toEqual([2, 3]);
    expect(files[1].changedLines).toEqual([1, 2]);
    expect(files[2].changedLines).toEqual([]);
    expect(files[3].changedLines).toEqual([11]);
  });

  it('should fall back to the diff header when ---/+++ lines are missing', () => {
    const files = parseDiff(`diff --git a/bin/tool b/bin/tool
old mode 100644
new mode 100755
`);

    expect(files).toHaveLength(1);
    expect(files[0].path).toBe('bin/tool');
    expect(files[0].type).toBe('modify');
    expect(files[0].hunks).toEqual([]);
  });
});

describe('getChangedLineNumbers', () => {
  it('should dedupe and sort line numbers across hunks', () => {
    const hunks = parseHunks(`a/f.ts b/f.ts
@@ -8,1 +8,2 @@
 x
+y
@@ -1,1 +1,2 @@
+first
 second`);

    expect(getChangedLineNumbers(hunks)).toEqual([1, 9]);
  });
});

describe('reconstructContent', () => {
  it('should place hunk lines at their target line numbers and blank the gaps', () => {
    const [, , , fixture] = parseDiff(PATCH);

    const lines = reconstructContent(fixture).split('\n');

    expect(lines).toHaveLength(13);
    expect(lines[8]).toBe('');
    expect(lines[9]).toBe('one();');
    expect(lines[10]).toBe('eval(input);');
    expect(lines[11]).toBe('two();');
    expect(lines[12]).toBe('');
  });
});

// ============================================================================
// PatchProvider tests
// ============================================================================

describe('PatchProvider', () => {
  it('should only resolve the patch revision', async () => {
    const provider = new PatchProvider(PATCH);

    await expect(provider.resolveRef(PATCH_REVISION)).resolves.toBe(PATCH_REVISION);
    await expect(provider.resolveRef('main')).rejects.toBeInstanceOf(RepositoryError);
  });

  it('should list every file except deletions as committed', async () => {
    const provider = new PatchProvider(PATCH);

    const entries = await provider.listChangedFiles();

    expect(entries).toEqual([
      { path: 'src/app.ts', status: 'committed' },
      { path: 'lib/new.py', status: 'committed' },
      { path: 'test_files/fixture.js', status: 'committed' },
    ]);
  });

  it('should read reconstructed content only at the patch revision', async () => {
    const provider = new PatchProvider(PATCH);

    await expect(provider.readBlob({ kind: 'commit', sha: PATCH_REVISION }, 'lib/new.py')).resolves.toBe(
      'import os\nos.system(cmd)\n'
    );
    await expect(provider.readBlob({ kind: 'index' }, 'lib/new.py')).resolves.toBeUndefined();
    await expect(provider.readBlob({ kind: 'commit', sha: PATCH_REVISION }, 'old.rs')).resolves.toBeUndefined();
    await expect(provider.readBlob({ kind: 'commit', sha: PATCH_REVISION }, 'missing.ts')).resolves.toBeUndefined();
  });

  it('should locate a sorted, filtered change set', async () => {
    const provider = new PatchProvider(PATCH);

    const changeSet = await provider.locate({ exclude: ['test_files/**'] });

    expect(changeSet.source).toBe(PATCH_REVISION);
    expect(changeSet.target).toBe(PATCH_REVISION);
    expect(changeSet.skipped).toEqual([]);
    expect(changeSet.files.map((f) => f.path)).toEqual(['lib/new.py', 'src/app.ts']);
    expect(changeSet.files[0]).toEqual({
      path: 'lib/new.py',
      status: 'committed',
      changedLines: [1, 2],
      language: 'python',
      revision: { kind: 'commit', sha: PATCH_REVISION },
    });
    expect(Object.isFrozen(changeSet)).toBe(true);
  });
});
