import type { FileItem, Hunk } from './types.js';

export interface SelectedHunk {
  hunk: Hunk;
  /** First selected index into `Diff.lines`. */
  from: number;
  /** Last selected index into `Diff.lines`, inclusive. */
  to: number;
  lines: string[];
}

/**
 * Hunks of `item` whose rendered extent meets the buffer range `first..last`.
 *
 * With `partial` the selected lines are clipped to the range, translated by
 * the fixed offset between a hunk's rendered lines and its diff lines. A range
 * touching only the hunk header, or a folded hunk, selects the whole body.
 */
export function getItemHunks(
  item: FileItem,
  first: number,
  last: number,
  partial: boolean
): SelectedHunk[] {
  const diff = item.diff;
  if (!diff) return [];

  const selected: SelectedHunk[] = [];
  for (const hunk of item.hunks) {
    if (hunk.last < first || hunk.first > last) continue;

    let from = hunk.diffFrom + 1;
    let to = hunk.diffTo;
    const bodySelected = Math.min(last, hunk.last) > hunk.first;
    if (partial && !hunk.folded && bodySelected) {
      const offset = hunk.diffFrom - hunk.first;
      from = Math.max(first, hunk.first + 1) + offset;
      to = Math.min(last, hunk.last) + offset;
    }

    selected.push({ hunk, from, to, lines: diff.lines.slice(from, to + 1) });
  }
  return selected;
}
