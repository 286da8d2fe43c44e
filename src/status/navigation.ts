import { resolveLine } from './lineIndex.js';
import type { Selection } from './selection.js';
import type { StatusTree } from './types.js';

export type EditTarget =
  | {
      type: 'file';
      path: string;
      absolutePath: string;
      /** 1-based line in the worktree file, when the cursor is inside a hunk. */
      line?: number;
      /** 0-based column, diff prefix removed. */
      column?: number;
      submodule: boolean;
    }
  | { type: 'commit'; ref: string };

/** First line of every rendered hunk, in buffer order. */
export function hunkHeaderLines(tree: StatusTree): number[] {
  const lines: number[] = [];
  for (const section of tree.sections) {
    for (const item of section.items) {
      if (item.type !== 'file') continue;
      for (const hunk of item.hunks) lines.push(hunk.first);
    }
  }
  return lines;
}

export function nextHunkHeader(tree: StatusTree, line: number): number | null {
  return hunkHeaderLines(tree).find((l) => l > line) ?? null;
}

export function previousHunkHeader(tree: StatusTree, line: number): number | null {
  const before = hunkHeaderLines(tree).filter((l) => l < line);
  return before.length > 0 ? before[before.length - 1] : null;
}

/**
 * What to open for the cursor position: a worktree file (at the line the
 * cursor maps to on disk), a commit, or the ref a header row names.
 */
export function goToFile(
  tree: StatusTree,
  lines: readonly string[],
  cursorLine: number,
  cursorColumn: number
): EditTarget | null {
  const { section, item, hunk } = resolveLine(tree, cursorLine);
  if (!section) return null;

  if (section.kind === 'header') {
    const ref = section.ref ?? section.commit?.oid;
    return ref ? { type: 'commit', ref } : null;
  }

  if (!item) return null;

  if (item.type === 'commit') {
    return { type: 'commit', ref: item.commit.ref ?? item.oid };
  }

  const target: EditTarget = {
    type: 'file',
    path: item.name,
    absolutePath: item.absolutePath,
    submodule: item.submodule !== undefined,
  };
  if (!hunk) return target;

  // Deleted lines up to and including the cursor do not exist in the
  // worktree; on a deleted line this lands on the line before it
  let removed = 0;
  for (let l = hunk.first + 1; l <= cursorLine; l++) {
    if ((lines[l - 1] ?? '').startsWith('-')) removed++;
  }
  const row = hunk.newStart + (cursorLine - hunk.first) - 1 - removed;
  return { ...target, line: Math.max(1, row), column: Math.max(0, cursorColumn - 1) };
}

/**
 * Text to copy for a selection: the focal item's oid (commits) or name
 * (files), else the section's ref or commit.
 */
export function yankTarget(selection: Selection): string | null {
  const { item, commit, section } = selection;
  if (item) return item.type === 'commit' ? item.oid : item.name;
  if (commit) return commit.oid;
  if (section?.ref) return section.ref;
  return section?.commit?.oid ?? null;
}
