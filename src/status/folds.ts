import { getItemHunks } from './hunks.js';
import type { Selection } from './selection.js';
import type { FoldDepths } from './types.js';

/**
 * Fold flags for [sections, items, hunks] at each depth key.
 */
export const FOLD_DEPTHS: Record<1 | 2 | 3 | 4, FoldDepths> = {
  1: [true, true, false],
  2: [false, true, false],
  3: [false, false, true],
  4: [false, false, false],
};

/**
 * Flip the fold of the innermost thing under the selection: the hunks it
 * touches, else the focal item, else the section. Returns the line the
 * cursor should move to, or null to leave it.
 */
export function toggleFold(selection: Selection): number | null {
  const { item, section } = selection;

  if (item?.type === 'file') {
    const hunks = getItemHunks(item, selection.firstLine, selection.lastLine, false);
    if (hunks.length > 0) {
      for (const { hunk } of hunks) hunk.folded = !hunk.folded;
      return hunks[0].hunk.first;
    }
  }

  if (item) {
    item.folded = !item.folded;
    return null;
  }

  if (section) {
    section.folded = !section.folded;
  }
  return null;
}
