import { resolveLine } from './lineIndex.js';
import type { SectionName, StatusTree } from './types.js';

/**
 * Where the cursor was, by key rather than line number, so it can be found
 * again after the tree is rebuilt.
 */
export interface CursorLocation {
  section?: { index: number; name: SectionName };
  item?: { index: number; name: string };
  hunk?: { index: number; hash: string };
  /** Extent of the innermost node under the cursor when saved. */
  first?: number;
  last?: number;
}

export function saveCursorLocation(tree: StatusTree, line: number): CursorLocation {
  const { section, item, hunk } = resolveLine(tree, line);
  if (!section) return {};

  const location: CursorLocation = {
    section: { index: tree.sections.indexOf(section), name: section.name },
    first: section.first,
    last: section.last,
  };
  if (!item) return location;

  location.item = { index: section.items.indexOf(item), name: item.name };
  location.first = item.first;
  location.last = item.last;
  if (!hunk || item.type !== 'file') return location;

  location.hunk = { index: item.hunks.indexOf(hunk), hash: hunk.hash };
  location.first = hunk.first;
  location.last = hunk.last;
  return location;
}

/**
 * Line to put the cursor on in `tree` for a saved location. Keys that no
 * longer exist fall back to the nearest surviving ancestor.
 */
export function restoreCursorLocation(tree: StatusTree, location: CursorLocation): number {
  const { sections } = tree;
  if (sections.length === 0) return 1;

  if (!location.section) {
    const firstList = sections.find((s) => !s.ignoreSign);
    return firstList ? firstList.first : 1;
  }

  const saved = location.section;
  const section = sections.find((s) => s.name === saved.name);
  if (!section) {
    return sections[Math.min(saved.index, sections.length - 1)].first;
  }

  const savedItem = location.item;
  if (!savedItem) return section.first;
  const item = section.items.find((i) => i.name === savedItem.name);
  if (!item) return section.first;

  const savedHunk = location.hunk;
  if (!savedHunk || item.type !== 'file') return item.first;
  const hunk = item.hunks.find((h) => h.hash === savedHunk.hash);
  return hunk ? hunk.first : item.first;
}
