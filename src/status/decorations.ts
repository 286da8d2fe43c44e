import { innermostNode } from './lineIndex.js';
import type { RenderedStatus, StatusTree } from './types.js';

export type Highlight = 'hunkHeader' | 'cursorLine' | 'diffAdd' | 'diffDelete' | 'diffContext';

export type FoldMarker = 'open' | 'closed' | 'done';

export interface LineDecoration {
  line: number;
  highlight?: Highlight;
  /** Inside the innermost node under the cursor. */
  context: boolean;
}

export interface DecorationOptions {
  disableContextHighlighting?: boolean;
}

/**
 * Highlights for the visible window `first..last` (1-based, inclusive).
 */
export function decorateLines(
  status: RenderedStatus,
  cursorLine: number,
  window: { first: number; last: number },
  options: DecorationOptions = {}
): LineDecoration[] {
  const node = options.disableContextHighlighting ? undefined : innermostNode(status.tree, cursorLine);

  const decorations: LineDecoration[] = [];
  const last = Math.min(window.last, status.lines.length);
  for (let line = Math.max(1, window.first); line <= last; line++) {
    const { tag } = status.lines[line - 1];
    let highlight: Highlight | undefined;
    if (tag === 'hunk-header') highlight = 'hunkHeader';
    else if (line === cursorLine) highlight = 'cursorLine';
    else if (tag === 'add') highlight = 'diffAdd';
    else if (tag === 'delete') highlight = 'diffDelete';
    else if (tag === 'context') highlight = 'diffContext';

    const context = node !== undefined && line >= node.first && line <= node.last;
    decorations.push(highlight ? { line, highlight, context } : { line, context });
  }
  return decorations;
}

/**
 * Fold markers keyed by line. Sections with `ignoreSign` get none; finished
 * rebase steps are marked done.
 */
export function foldMarkers(tree: StatusTree, disableSigns: boolean = false): Map<number, FoldMarker> {
  const markers = new Map<number, FoldMarker>();
  if (disableSigns) return markers;

  const mark = (line: number, folded: boolean) => markers.set(line, folded ? 'closed' : 'open');

  for (const section of tree.sections) {
    if (section.ignoreSign) continue;
    mark(section.first, section.folded);
    for (const item of section.items) {
      if (item.type === 'commit') {
        if (item.commit.done) markers.set(item.first, 'done');
        else mark(item.first, item.folded);
        continue;
      }
      mark(item.first, item.folded);
      for (const hunk of item.hunks) mark(hunk.first, hunk.folded);
    }
  }
  return markers;
}
