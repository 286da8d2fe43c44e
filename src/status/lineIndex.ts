import type { Hunk, LineRange, Section, StatusItem, StatusTree } from './types.js';

/**
 * Binary search for the node whose range contains `line`.
 * `nodes` must be sorted and non-overlapping, as every level of a StatusTree is.
 */
export function findContaining<T extends LineRange>(nodes: readonly T[], line: number): T | undefined {
  let lo = 0;
  let hi = nodes.length - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    const node = nodes[mid];
    if (line < node.first) {
      hi = mid - 1;
    } else if (line > node.last) {
      lo = mid + 1;
    } else {
      return node;
    }
  }
  return undefined;
}

export interface LineLocation {
  section?: Section;
  item?: StatusItem;
  hunk?: Hunk;
}

/**
 * Resolve a 1-based buffer line to the section, item and hunk containing it.
 * Stops at the first level without a match, so header and gap lines give
 * partial results.
 */
export function resolveLine(tree: StatusTree, line: number): LineLocation {
  const section = findContaining(tree.sections, line);
  if (!section) return {};

  const item = findContaining(section.items, line);
  if (!item) return { section };

  if (item.type !== 'file') return { section, item };
  const hunk = findContaining(item.hunks, line);
  return hunk ? { section, item, hunk } : { section, item };
}

/** The smallest node containing `line`. */
export function innermostNode(tree: StatusTree, line: number): LineRange | undefined {
  const { section, item, hunk } = resolveLine(tree, line);
  return hunk ?? item ?? section;
}
