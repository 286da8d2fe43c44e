import type {
  CommitEntry,
  Diff,
  DiffHunk,
  SubmoduleStatus,
} from '../git/types.js';

export type HeaderSectionName =
  | 'headBranchHeader'
  | 'upstreamHeader'
  | 'pushBranchHeader'
  | 'tagHeader';

export type ListSectionName =
  | 'rebase'
  | 'sequencer'
  | 'untracked'
  | 'unstaged'
  | 'staged'
  | 'stashes'
  | 'unpulledPushRemote'
  | 'unmergedPushRemote'
  | 'unpulledUpstream'
  | 'unmergedUpstream'
  | 'recent';

export type SectionName = HeaderSectionName | ListSectionName;

export const LIST_SECTION_NAMES: readonly ListSectionName[] = [
  'rebase',
  'sequencer',
  'untracked',
  'unstaged',
  'staged',
  'stashes',
  'unpulledPushRemote',
  'unmergedPushRemote',
  'unpulledUpstream',
  'unmergedUpstream',
  'recent',
];

/**
 * What a section holds, decided once when the tree is built:
 * header rows (Head/Merge/Push/Tag), files with diffs, or commit-like entries.
 */
export type SectionKind = 'header' | 'diff' | 'commits';

/** An inclusive, 1-based range of rendered buffer lines. */
export interface LineRange {
  first: number;
  last: number;
}

export interface Hunk extends DiffHunk, LineRange {
  folded: boolean;
}

export interface FileItem extends LineRange {
  type: 'file';
  name: string;
  folded: boolean;
  mode?: string;
  originalName?: string;
  submodule?: SubmoduleStatus;
  absolutePath: string;
  diff: Diff | null;
  /** Rendered hunks; empty while the item is folded or has no diff. */
  hunks: Hunk[];
}

export interface CommitItem extends LineRange {
  type: 'commit';
  name: string;
  folded: boolean;
  oid: string;
  commit: CommitEntry;
}

export type StatusItem = FileItem | CommitItem;

export interface Section extends LineRange {
  name: SectionName;
  kind: SectionKind;
  label: string;
  folded: boolean;
  ignoreSign: boolean;
  /** Rendered items; empty while the section is folded. */
  items: StatusItem[];
  /** Names of every item in the section, rendered or not. */
  itemNames: string[];
  /** Commit a header row points at. */
  commit?: { oid: string };
  /** Ref a header row names (branch, upstream branch, tag, push remote). */
  ref?: string;
}

export interface StatusTree {
  sections: Section[];
  /** Fold flags of nodes hidden under a folded ancestor, keyed by `nodeKey()`. */
  hiddenFolds: Map<string, boolean>;
  lineCount: number;
}

export type LineTag =
  | 'hint'
  | 'blank'
  | 'header'
  | 'section'
  | 'item'
  | 'hunk-header'
  | 'add'
  | 'delete'
  | 'context';

export interface RenderedLine {
  text: string;
  tag: LineTag;
}

export interface RenderedStatus {
  tree: StatusTree;
  lines: RenderedLine[];
}

/** Fold flags for every section, item and hunk, used by the depth commands. */
export type FoldDepths = readonly [sections: boolean, items: boolean, hunks: boolean];

export function emptyTree(): StatusTree {
  return { sections: [], hiddenFolds: new Map(), lineCount: 0 };
}

/**
 * Key identifying a node across rebuilds: section name, item name, hunk hash.
 */
export function nodeKey(section: string, item?: string, hunk?: string): string {
  const parts = [section];
  if (item !== undefined) parts.push(item);
  if (hunk !== undefined) parts.push(hunk);
  return parts.join('\u0000');
}
