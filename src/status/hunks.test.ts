import { describe, it, expect } from 'vitest';
import { buildStatusTree } from './StatusTreeBuilder.js';
import { getItemHunks } from './hunks.js';
import type { FileItem } from './types.js';
import { fileEntry, sampleSnapshot, testConfig } from './test-helpers.js';

function items() {
  const { tree } = buildStatusTree(null, sampleSnapshot(), { config: testConfig() });
  const untracked = tree.sections[1].items[0];
  const modified = tree.sections[2].items[0];
  if (untracked.type !== 'file' || modified.type !== 'file') throw new Error('expected files');
  return { untracked, modified };
}

describe('getItemHunks', () => {
  it('selects the whole body when not partial', () => {
    const [selected, ...rest] = getItemHunks(items().modified, 16, 16, false);
    expect(rest).toEqual([]);
    expect(selected.from).toBe(1);
    expect(selected.to).toBe(5);
    expect(selected.lines).toEqual([' a', '-b', ' c', '+D', ' d']);
  });

  it('clips a partial range to the lines under it', () => {
    const { modified } = items();
    const selected = getItemHunks(modified, 15, 21, true);
    expect(selected.map((s) => [s.hunk.first, s.from, s.to])).toEqual([
      [14, 1, 5],
      [20, 7, 7],
    ]);
    expect(selected[1].lines).toEqual([' x']);
  });

  it('takes two added lines from the middle of a new file', () => {
    // hunk header on line 5, body lines 6..10
    const [selected] = getItemHunks(items().untracked, 7, 8, true);
    expect(selected.from).toBe(2);
    expect(selected.to).toBe(3);
    expect(selected.lines).toEqual(['+two', '+three']);
  });

  it('selects the whole body from the hunk header alone', () => {
    const [selected] = getItemHunks(items().modified, 14, 14, true);
    expect([selected.from, selected.to]).toEqual([1, 5]);
  });

  it('selects the whole body of a folded hunk', () => {
    const { modified } = items();
    const hunk = modified.hunks[1];
    hunk.folded = true;
    hunk.last = hunk.first;
    const [selected] = getItemHunks(modified, 20, 20, true);
    expect([selected.from, selected.to]).toEqual([7, 9]);
  });

  it('returns nothing outside every hunk', () => {
    expect(getItemHunks(items().modified, 13, 13, true)).toEqual([]);
  });

  it('returns nothing for an item without a diff', () => {
    const entry = fileEntry('bin.dat', 'M');
    const item: FileItem = {
      type: 'file',
      name: entry.name,
      first: 1,
      last: 1,
      folded: false,
      absolutePath: entry.absolutePath,
      diff: null,
      hunks: [],
    };
    expect(getItemHunks(item, 1, 1, true)).toEqual([]);
  });
});
