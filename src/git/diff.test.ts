import { describe, it, expect } from 'vitest';
import {
  parseDiffLine,
  parseHunkHeader,
  hashHunk,
  parseFileDiff,
  parseFileDiffs,
  diffPath,
  buildUntrackedDiff,
} from './diff.js';

describe('parseDiffLine', () => {
  it('parses diff --git header', () => {
    const result = parseDiffLine('diff --git a/file.ts b/file.ts');
    expect(result.type).toBe('header');
    expect(result.content).toBe('diff --git a/file.ts b/file.ts');
  });

  it('parses --- and +++ headers', () => {
    expect(parseDiffLine('--- a/file.ts').type).toBe('header');
    expect(parseDiffLine('+++ b/file.ts').type).toBe('header');
  });

  it('parses hunk header', () => {
    const result = parseDiffLine('@@ -1,5 +1,7 @@');
    expect(result.type).toBe('hunk');
  });

  it('parses addition, deletion and context lines', () => {
    expect(parseDiffLine('+const x = 1;').type).toBe('addition');
    expect(parseDiffLine('-const x = 1;').type).toBe('deletion');
    expect(parseDiffLine(' const y = 2;').type).toBe('context');
    expect(parseDiffLine('').type).toBe('context');
  });
});

describe('parseHunkHeader', () => {
  it('parses standard hunk header with counts', () => {
    expect(parseHunkHeader('@@ -1,5 +1,7 @@')).toEqual({
      oldStart: 1,
      oldLines: 5,
      newStart: 1,
      newLines: 7,
    });
  });

  it('defaults omitted counts to 1', () => {
    expect(parseHunkHeader('@@ -10 +12 @@')).toEqual({
      oldStart: 10,
      oldLines: 1,
      newStart: 12,
      newLines: 1,
    });
  });

  it('parses hunk header with function context', () => {
    expect(parseHunkHeader('@@ -3,2 +3,0 @@ function test() {')).toEqual({
      oldStart: 3,
      oldLines: 2,
      newStart: 3,
      newLines: 0,
    });
  });

  it('returns null for non-hunk lines', () => {
    expect(parseHunkHeader('+const x = 1;')).toBeNull();
    expect(parseHunkHeader('diff --git a/file.ts b/file.ts')).toBeNull();
    expect(parseHunkHeader('@@@ -1,2 -1,2 +1,3 @@@')).toBeNull();
  });
});

describe('hashHunk', () => {
  it('is stable for identical bodies and differs otherwise', () => {
    expect(hashHunk(['+a', ' b'])).toBe(hashHunk(['+a', ' b']));
    expect(hashHunk(['+a', ' b'])).not.toBe(hashHunk(['+a', ' c']));
    expect(hashHunk(['+a'])).toMatch(/^[0-9a-f]{40}$/);
  });
});

const MODIFIED = `diff --git a/src/app.ts b/src/app.ts
index 1111111..2222222 100644
--- a/src/app.ts
+++ b/src/app.ts
@@ -1,3 +1,4 @@
 one
+two
 three
 four
@@ -10,2 +11,2 @@ function x() {
 ten
-eleven
+ELEVEN
`;

describe('parseFileDiff', () => {
  it('separates headers from lines starting at the first hunk', () => {
    const diff = parseFileDiff(MODIFIED);
    expect(diff.headers).toEqual([
      'diff --git a/src/app.ts b/src/app.ts',
      'index 1111111..2222222 100644',
      '--- a/src/app.ts',
      '+++ b/src/app.ts',
    ]);
    expect(diff.lines[0]).toBe('@@ -1,3 +1,4 @@');
    expect(diff.lines).toHaveLength(9);
    expect(diff.oldPath).toBe('src/app.ts');
    expect(diff.newPath).toBe('src/app.ts');
  });

  it('indexes hunks by their position in lines', () => {
    const diff = parseFileDiff(MODIFIED);
    expect(diff.hunks).toHaveLength(2);
    expect(diff.hunks[0]).toMatchObject({
      diffFrom: 0,
      diffTo: 4,
      oldStart: 1,
      oldLines: 3,
      newStart: 1,
      newLines: 4,
    });
    expect(diff.hunks[1]).toMatchObject({
      diffFrom: 5,
      diffTo: 8,
      oldStart: 10,
      newStart: 11,
    });
    expect(diff.hunks[0].hash).toBe(hashHunk([' one', '+two', ' three', ' four']));
  });

  it('counts additions and deletions', () => {
    expect(parseFileDiff(MODIFIED).stats).toEqual({ additions: 2, deletions: 1 });
  });

  it('maps /dev/null to a null path', () => {
    const diff = parseFileDiff(`diff --git a/gone.txt b/gone.txt
deleted file mode 100644
index 3333333..0000000
--- a/gone.txt
+++ /dev/null
@@ -1 +0,0 @@
-bye
`);
    expect(diff.oldPath).toBe('gone.txt');
    expect(diff.newPath).toBeNull();
    expect(diff.hunks[0]).toMatchObject({ oldStart: 1, oldLines: 1, newStart: 0, newLines: 0 });
  });

  it('numbers hunks with identical bodies in file order', () => {
    const diff = parseFileDiff(`diff --git a/twin.txt b/twin.txt
--- a/twin.txt
+++ b/twin.txt
@@ -1,2 +1,2 @@
 ctx
-old
+new
@@ -20,2 +20,2 @@
 ctx
-old
+new`);
    const hash = hashHunk([' ctx', '-old', '+new']);
    expect(diff.hunks.map((h) => h.hash)).toEqual([hash, `${hash}#1`]);
  });

  it('takes paths from rename headers when there are no hunks', () => {
    const diff = parseFileDiff(`diff --git a/old.ts b/new.ts
similarity index 100%
rename from old.ts
rename to new.ts
`);
    expect(diff.oldPath).toBe('old.ts');
    expect(diff.newPath).toBe('new.ts');
    expect(diff.lines).toEqual([]);
    expect(diff.hunks).toEqual([]);
  });

  it('takes paths from the diff --git line for binary files', () => {
    const diff = parseFileDiff(`diff --git a/logo.png b/logo.png
index 4444444..5555555 100644
Binary files a/logo.png and b/logo.png differ
`);
    expect(diff.oldPath).toBe('logo.png');
    expect(diff.newPath).toBe('logo.png');
  });

  it('treats an empty new file as having no old path', () => {
    const diff = parseFileDiff(`diff --git a/empty.txt b/empty.txt
new file mode 100644
index 0000000..e69de29
`);
    expect(diff.oldPath).toBeNull();
    expect(diff.newPath).toBe('empty.txt');
  });

  it('strips the trailing tab git adds after paths with spaces', () => {
    const diff = parseFileDiff(`diff --git a/my file.txt b/my file.txt
--- a/my file.txt\t
+++ b/my file.txt\t
@@ -1 +1 @@
-a
+b
`);
    expect(diff.oldPath).toBe('my file.txt');
    expect(diff.newPath).toBe('my file.txt');
  });
});

describe('parseFileDiffs', () => {
  it('splits output per file and skips combined diffs', () => {
    const raw =
      MODIFIED +
      `diff --cc conflict.txt
index 1,2..3
--- a/conflict.txt
+++ b/conflict.txt
@@@ -1,1 -1,1 +1,5 @@@
++<<<<<<< HEAD
` +
      `diff --git a/README.md b/README.md
--- a/README.md
+++ b/README.md
@@ -1 +1,2 @@
 title
+more
`;
    const diffs = parseFileDiffs(raw);
    expect(diffs.map(diffPath)).toEqual(['src/app.ts', 'README.md']);
  });

  it('returns nothing for empty output', () => {
    expect(parseFileDiffs('')).toEqual([]);
  });
});

describe('buildUntrackedDiff', () => {
  it('adds every line of the file as one hunk', () => {
    const diff = buildUntrackedDiff('notes.txt', 'a\nb\nc\n');
    expect(diff.headers).toEqual([
      'diff --git a/notes.txt b/notes.txt',
      'new file mode 100644',
      '--- /dev/null',
      '+++ b/notes.txt',
    ]);
    expect(diff.lines).toEqual(['@@ -0,0 +1,3 @@', '+a', '+b', '+c']);
    expect(diff.hunks).toEqual([
      {
        hash: hashHunk(['+a', '+b', '+c']),
        diffFrom: 0,
        diffTo: 3,
        oldStart: 0,
        oldLines: 0,
        newStart: 1,
        newLines: 3,
      },
    ]);
    expect(diff.oldPath).toBeNull();
    expect(diff.newPath).toBe('notes.txt');
    expect(diff.stats).toEqual({ additions: 3, deletions: 0 });
  });

  it('marks a missing final newline', () => {
    const diff = buildUntrackedDiff('x', 'one\ntwo');
    expect(diff.lines).toEqual(['@@ -0,0 +1,2 @@', '+one', '+two', '\\ No newline at end of file']);
    expect(diff.hunks[0].diffTo).toBe(3);
  });

  it('gives binary and empty files no hunks', () => {
    expect(buildUntrackedDiff('bin', 'a\0b').hunks).toEqual([]);
    expect(buildUntrackedDiff('bin', 'a\0b').headers[2]).toBe('Binary files /dev/null and b/bin differ');
    expect(buildUntrackedDiff('empty', '').lines).toEqual([]);
  });
});
