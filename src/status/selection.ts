import { getItemHunks } from './hunks.js';
import type {
  CommitItem,
  Section,
  SectionKind,
  SectionName,
  StatusItem,
  StatusTree,
} from './types.js';

export interface SectionSelection {
  section: Section;
  name: SectionName;
  kind: SectionKind;
  /** Rendered items meeting the range, or all of them for a whole section. */
  items: StatusItem[];
  /** The range is exactly the section's header line. */
  wholeSection: boolean;
}

export interface Selection {
  firstLine: number;
  lastLine: number;
  sections: SectionSelection[];
  /** The only section touched, when there is exactly one. */
  section?: Section;
  /** First item whose range contains the whole selection. */
  item?: StatusItem;
  commit?: CommitItem;
  items: StatusItem[];
  commits: CommitItem[];
}

/**
 * Resolve a line range (cursor or visual selection) to the sections and
 * items it touches.
 */
export function getSelection(tree: StatusTree, start: number, end: number): Selection {
  const firstLine = Math.min(start, end);
  const lastLine = Math.max(start, end);
  const selection: Selection = { firstLine, lastLine, sections: [], items: [], commits: [] };

  for (const section of tree.sections) {
    if (section.last < firstLine) continue;
    if (section.first > lastLine) break;

    const wholeSection = section.first === firstLine && section.first === lastLine;
    const items = wholeSection
      ? [...section.items]
      : section.items.filter((i) => i.last >= firstLine && i.first <= lastLine);

    selection.sections.push({ section, name: section.name, kind: section.kind, items, wholeSection });

    for (const item of items) {
      selection.items.push(item);
      if (item.type === 'commit') selection.commits.push(item);
    }

    if (!selection.item) {
      const focal = section.items.find((i) => i.first <= firstLine && i.last >= lastLine);
      if (focal) selection.item = focal;
    }
  }

  if (selection.sections.length === 1) {
    selection.section = selection.sections[0].section;
  }
  if (selection.item?.type === 'commit') {
    selection.commit = selection.item;
  }
  return selection;
}

export function isEmptySelection(selection: Selection): boolean {
  return selection.sections.length === 0;
}

/**
 * Render a selection as text, for debugging.
 */
export function formatSelection(selection: Selection): string {
  const out = [`Selection ${selection.firstLine}..${selection.lastLine}`];
  for (const s of selection.sections) {
    out.push(`  ${s.name} [${s.kind}]${s.wholeSection ? ' (whole section)' : ''}`);
    for (const item of s.items) {
      const marker = item === selection.item ? '*' : '-';
      out.push(`    ${marker} ${item.name} ${item.first}..${item.last}`);
      if (item.type !== 'file') continue;
      for (const h of getItemHunks(item, selection.firstLine, selection.lastLine, true)) {
        out.push(`      hunk ${h.hunk.first}..${h.hunk.last} diff ${h.from}..${h.to}`);
        for (const line of h.lines) out.push(`        ${line}`);
      }
    }
  }
  return out.join('\n');
}
