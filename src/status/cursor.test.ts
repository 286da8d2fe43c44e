import { describe, it, expect } from 'vitest';
import { emptyTree } from './types.js';
import { buildStatusTree } from './StatusTreeBuilder.js';
import { restoreCursorLocation, saveCursorLocation } from './cursor.js';
import { fileEntry, sampleSnapshot, testConfig } from './test-helpers.js';

const ONLY_SECOND_HUNK = `diff --git a/src/a.ts b/src/a.ts
--- a/src/a.ts
+++ b/src/a.ts
@@ -10,2 +10,3 @@
 x
+y
 z
`;

function render(snapshot = sampleSnapshot()) {
  return buildStatusTree(null, snapshot, { config: testConfig() }).tree;
}

describe('saveCursorLocation', () => {
  it('records section, item and hunk keys with the hunk extent', () => {
    const tree = render();
    const location = saveCursorLocation(tree, 16);
    const item = tree.sections[2].items[0];
    if (item.type !== 'file') throw new Error('expected a file');
    expect(location).toEqual({
      section: { index: 2, name: 'unstaged' },
      item: { index: 0, name: 'src/a.ts' },
      hunk: { index: 0, hash: item.hunks[0].hash },
      first: 14,
      last: 19,
    });
  });

  it('records only the section on a section header', () => {
    expect(saveCursorLocation(render(), 3)).toEqual({
      section: { index: 1, name: 'untracked' },
      first: 3,
      last: 10,
    });
  });

  it('records nothing on a blank line', () => {
    expect(saveCursorLocation(render(), 11)).toEqual({});
  });
});

describe('restoreCursorLocation', () => {
  it('returns to the same hunk after an identical rebuild', () => {
    const location = saveCursorLocation(render(), 21);
    expect(restoreCursorLocation(render(), location)).toBe(20);
  });

  it('follows a hunk that moved', () => {
    const location = saveCursorLocation(render(), 21);
    const snapshot = sampleSnapshot();
    snapshot.untracked.items = [];
    // untracked section gone: unstaged starts at line 3, item 4, first hunk 5..10, second 11
    expect(restoreCursorLocation(render(snapshot), location)).toBe(11);
  });

  it('falls back to the item when the hunk is gone', () => {
    const location = saveCursorLocation(render(), 16);
    const snapshot = sampleSnapshot();
    snapshot.unstaged.items = [fileEntry('src/a.ts', 'M', ONLY_SECOND_HUNK)];
    expect(restoreCursorLocation(render(snapshot), location)).toBe(13);
  });

  it('falls back to the section when the item is gone', () => {
    const location = saveCursorLocation(render(), 16);
    const snapshot = sampleSnapshot();
    snapshot.unstaged.items = [fileEntry('src/other.ts', 'M', ONLY_SECOND_HUNK)];
    expect(restoreCursorLocation(render(snapshot), location)).toBe(12);
  });

  it('uses the section at the same index when the section is gone', () => {
    const location = saveCursorLocation(render(), 16);
    const snapshot = sampleSnapshot();
    snapshot.unstaged.items = [];
    // sections are now [head, untracked]; index 2 clamps to untracked
    expect(restoreCursorLocation(render(snapshot), location)).toBe(3);
  });

  it('goes to the first list section when nothing was saved', () => {
    expect(restoreCursorLocation(render(), {})).toBe(3);
  });

  it('returns line 1 for an empty tree', () => {
    expect(restoreCursorLocation(emptyTree(), { section: { index: 4, name: 'staged' } })).toBe(1);
  });
});
