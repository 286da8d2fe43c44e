import type { DiffHunk } from '../git/types.js';
import { toRawText } from '../git/encoding.js';
import type { FileItem } from './types.js';

function side(prefix: 'a' | 'b', file: string | null, fallback: string, count: number): string {
  if (file === null && count === 0) return '/dev/null';
  return `${prefix}/${file ?? fallback}`;
}

interface PatchLine {
  op: ' ' | '-' | '+';
  text: string;
  /** Followed by a no-newline marker in the source diff. */
  noEol: boolean;
}

const NO_EOL = '\\ No newline at end of file';

/**
 * Emit patch lines with no-newline markers placed by side: a line keeps its
 * marker only where it is still the last line of that side. A context line
 * that ends the old side but not the new one is split into `-`/`+` so the
 * new side gains the newline.
 */
function renderBody(entries: PatchLine[]): string[] {
  let lastOld = -1;
  let lastNew = -1;
  entries.forEach((entry, i) => {
    if (entry.op !== '+') lastOld = i;
    if (entry.op !== '-') lastNew = i;
  });

  const body: string[] = [];
  entries.forEach((entry, i) => {
    const oldMarker = entry.noEol && i === lastOld;
    const newMarker = entry.noEol && i === lastNew;

    if (entry.op === '-') {
      body.push('-' + entry.text);
      if (oldMarker) body.push(NO_EOL);
    } else if (entry.op === '+') {
      body.push('+' + entry.text);
      if (newMarker) body.push(NO_EOL);
    } else if (oldMarker === newMarker) {
      body.push(' ' + entry.text);
      if (oldMarker) body.push(NO_EOL);
    } else {
      body.push('-' + entry.text);
      if (oldMarker) body.push(NO_EOL);
      body.push('+' + entry.text);
      if (newMarker) body.push(NO_EOL);
    }
  });
  return body;
}

/**
 * Build a standalone patch for the diff lines `from..to` of one hunk.
 *
 * Lines outside the range that exist on the side being patched become
 * context, the rest are dropped, and the `@@` counts are recomputed to match.
 * With `reverse` the text is already inverted (`+` and `-` swapped, ranges
 * taken from the new side), so the result is applied forward to undo the
 * selected change.
 */
export function generatePatch(
  item: FileItem,
  hunk: DiffHunk,
  from: number,
  to: number,
  reverse: boolean = false
): string {
  const diff = item.diff;
  if (!diff) {
    throw new Error(`No diff for ${item.name}`);
  }

  const entries: PatchLine[] = [];
  let oldCount = 0;
  let newCount = 0;

  for (let i = hunk.diffFrom + 1; i <= hunk.diffTo; i++) {
    const line = diff.lines[i];
    const op = line.charAt(0);
    if (op === '\\') continue;

    const text = line.slice(1);
    const selected = i >= from && i <= to;
    const noEol = i < hunk.diffTo && diff.lines[i + 1].startsWith('\\');
    const adds = reverse ? op === '-' : op === '+';
    const removes = reverse ? op === '+' : op === '-';

    if (adds) {
      if (!selected) continue;
      entries.push({ op: '+', text, noEol });
      newCount++;
    } else if (removes && selected) {
      entries.push({ op: '-', text, noEol });
      oldCount++;
    } else {
      entries.push({ op: ' ', text, noEol });
      oldCount++;
      newCount++;
    }
  }

  const body = renderBody(entries);

  const start = reverse ? hunk.newStart : hunk.oldStart;
  const newStart = oldCount === 0 ? start + 1 : newCount === 0 ? start - 1 : start;

  const current = diff.newPath ?? diff.oldPath ?? toRawText(item.name);
  const oldFile = reverse ? diff.newPath : diff.oldPath;
  const newFile = reverse ? (diff.oldPath === null ? null : current) : diff.newPath;

  return [
    `--- ${side('a', oldFile, current, oldCount)}`,
    `+++ ${side('b', newFile, current, newCount)}`,
    `@@ -${start},${oldCount} +${newStart},${newCount} @@`,
    ...body,
  ].join('\n') + '\n';
}
