import type { Config } from '../config.js';
import { parseDiffLine } from '../git/diff.js';
import { displayText } from '../git/encoding.js';
import type {
  CommitEntry,
  FileStatusEntry,
  RepositorySnapshot,
  SectionData,
} from '../git/types.js';
import type {
  CommitItem,
  FileItem,
  FoldDepths,
  HeaderSectionName,
  Hunk,
  LineTag,
  ListSectionName,
  RenderedLine,
  RenderedStatus,
  Section,
  SectionKind,
  StatusTree,
} from './types.js';
import { nodeKey } from './types.js';

export interface BuildOptions {
  config: Config;
  /** Terminal width; mode labels are trimmed below 120 columns. */
  columns?: number;
  /** Hint line text, rendered unless `config.disableHint`. */
  hint?: string;
  /** Fold every section, item and hunk to the given depth flags. */
  foldOverride?: FoldDepths;
}

const MODE_TEXT = new Map<string, string>([
  ['M', 'Modified'],
  ['N', 'New file'],
  ['A', 'Added'],
  ['D', 'Deleted'],
  ['C', 'Copied'],
  ['U', 'Updated'],
  ['UU', 'Both Modified'],
  ['R', 'Renamed'],
]);

const MODE_WIDTH = 'Modified by us'.length;

const NARROW_COLUMNS = 120;

export function modeLabel(mode: string): string {
  const known = MODE_TEXT.get(mode);
  if (known) return known;
  const first = MODE_TEXT.get(mode[0]);
  if (mode.length === 2 && first) return `${first} by us`;
  return mode;
}

export function formatFileItem(entry: FileStatusEntry, columns: number = NARROW_COLUMNS): string {
  let text = entry.name;
  if (entry.mode) {
    let label = modeLabel(entry.mode).padEnd(MODE_WIDTH);
    if (columns < NARROW_COLUMNS) label = label.trimEnd();
    text = entry.originalName
      ? `${label} ${entry.originalName} -> ${entry.name}`
      : `${label} ${entry.name}`;
  }

  if (entry.submodule) {
    const notes: string[] = [];
    if (entry.submodule.commitChanged) notes.push('new commits');
    if (entry.submodule.hasTrackedChanges) notes.push('modified content');
    if (entry.submodule.hasUntrackedChanges) notes.push('untracked content');
    text += notes.length > 0 ? ` (${notes.join(', ')})` : ' (malformed submodule)';
  }
  return text;
}

function lineTag(line: string): LineTag {
  switch (parseDiffLine(line).type) {
    case 'hunk':
      return 'hunk-header';
    case 'addition':
      return 'add';
    case 'deletion':
      return 'delete';
    default:
      return 'context';
  }
}

/**
 * Fold flags of every node in a tree, hidden ones included.
 */
export function collectFolds(tree: StatusTree | null): Map<string, boolean> {
  const folds = new Map<string, boolean>();
  if (!tree) return folds;
  for (const [key, folded] of tree.hiddenFolds) folds.set(key, folded);
  for (const section of tree.sections) {
    folds.set(nodeKey(section.name), section.folded);
    for (const item of section.items) {
      folds.set(nodeKey(section.name, item.name), item.folded);
      if (item.type !== 'file') continue;
      for (const hunk of item.hunks) {
        folds.set(nodeKey(section.name, item.name, hunk.hash), hunk.folded);
      }
    }
  }
  return folds;
}

type Depth = 0 | 1 | 2;

class StatusRenderer {
  readonly lines: RenderedLine[] = [];
  readonly sections: Section[] = [];
  readonly hiddenFolds = new Map<string, boolean>();

  constructor(
    private folds: Map<string, boolean>,
    private options: BuildOptions
  ) {}

  private push(text: string, tag: LineTag): number {
    this.lines.push({ text, tag });
    return this.lines.length;
  }

  private foldFor(key: string, fallback: boolean, depth: Depth): boolean {
    if (this.options.foldOverride) return this.options.foldOverride[depth];
    return this.folds.get(key) ?? fallback;
  }

  private hide(key: string, fallback: boolean, depth: Depth): void {
    this.hiddenFolds.set(key, this.foldFor(key, fallback, depth));
  }

  hint(text: string): void {
    this.push(text, 'hint');
    this.push('', 'blank');
  }

  header(name: HeaderSectionName, label: string, text: string, oid: string | null, ref?: string): void {
    const line = this.push(text, 'header');
    this.sections.push({
      name,
      kind: 'header',
      label,
      first: line,
      last: line,
      folded: false,
      ignoreSign: true,
      items: [],
      itemNames: [],
      ...(oid ? { commit: { oid } } : {}),
      ...(ref ? { ref } : {}),
    });
  }

  blank(): void {
    this.push('', 'blank');
  }

  private openSection(
    name: ListSectionName,
    kind: SectionKind,
    label: string,
    data: SectionData<{ name: string }>
  ): Section {
    const count = data.items.length;
    const title =
      data.current !== undefined ? `${label} (${data.current}/${count})` : `${label} (${count})`;
    const first = this.push(title, 'section');
    const section: Section = {
      name,
      kind,
      label,
      first,
      last: first,
      folded: this.foldFor(nodeKey(name), this.options.config.sections[name].folded, 0),
      ignoreSign: false,
      items: [],
      itemNames: data.items.map((i) => i.name),
    };
    this.sections.push(section);
    return section;
  }

  private closeSection(section: Section): void {
    section.last = this.lines.length;
    if (!section.folded) this.blank();
  }

  diffSection(name: ListSectionName, label: string, data: SectionData<FileStatusEntry>): void {
    const section = this.openSection(name, 'diff', label, data);
    for (const entry of data.items) {
      if (section.folded) {
        this.hideFileItem(name, entry);
      } else {
        section.items.push(this.fileItem(name, entry));
      }
    }
    this.closeSection(section);
  }

  commitSection(name: ListSectionName, label: string, data: SectionData<CommitEntry>): void {
    const section = this.openSection(name, 'commits', label, data);
    for (const entry of data.items) {
      const key = nodeKey(name, entry.name);
      if (section.folded) {
        this.hide(key, this.options.config.itemsFolded, 1);
        continue;
      }
      const line = this.push(entry.name, 'item');
      const item: CommitItem = {
        type: 'commit',
        name: entry.name,
        first: line,
        last: line,
        folded: this.foldFor(key, this.options.config.itemsFolded, 1),
        oid: entry.oid,
        commit: entry,
      };
      section.items.push(item);
    }
    this.closeSection(section);
  }

  private hideFileItem(section: ListSectionName, entry: FileStatusEntry): void {
    this.hide(nodeKey(section, entry.name), this.options.config.itemsFolded, 1);
    for (const hunk of entry.diff?.hunks ?? []) {
      this.hide(nodeKey(section, entry.name, hunk.hash), false, 2);
    }
  }

  private fileItem(section: ListSectionName, entry: FileStatusEntry): FileItem {
    const first = this.push(formatFileItem(entry, this.options.columns), 'item');
    const folded = this.foldFor(nodeKey(section, entry.name), this.options.config.itemsFolded, 1);
    const diff = entry.diff ?? null;
    const hunks: Hunk[] = [];

    for (const hunk of diff?.hunks ?? []) {
      const key = nodeKey(section, entry.name, hunk.hash);
      if (folded || !diff) {
        this.hide(key, false, 2);
        continue;
      }
      const hunkFirst = this.push(displayText(diff.lines[hunk.diffFrom]), 'hunk-header');
      const hunkFolded = this.foldFor(key, false, 2);
      if (!hunkFolded) {
        for (let i = hunk.diffFrom + 1; i <= hunk.diffTo; i++) {
          this.push(displayText(diff.lines[i]), lineTag(diff.lines[i]));
        }
      }
      hunks.push({ ...hunk, first: hunkFirst, last: this.lines.length, folded: hunkFolded });
    }

    return {
      type: 'file',
      name: entry.name,
      first,
      last: this.lines.length,
      folded,
      ...(entry.mode !== undefined && { mode: entry.mode }),
      ...(entry.originalName !== undefined && { originalName: entry.originalName }),
      ...(entry.submodule && { submodule: entry.submodule }),
      absolutePath: entry.absolutePath,
      diff,
      hunks,
    };
  }
}

function headerRows(renderer: StatusRenderer, snapshot: RepositorySnapshot): void {
  const { head, upstream, pushRemote, tag } = snapshot;
  const join = (...parts: (string | null)[]) => parts.filter((p): p is string => !!p).join(' ');

  renderer.header(
    'headBranchHeader',
    'Head',
    `Head:     ${join(head.abbrev, head.branch, head.commitMessage ?? '(no commits)')}`,
    head.oid,
    head.detached ? undefined : head.branch
  );

  if (!head.detached && upstream.ref) {
    renderer.header(
      'upstreamHeader',
      'Merge',
      `Merge:    ${join(upstream.abbrev, upstream.ref, upstream.commitMessage ?? '(no commits)')}`,
      upstream.oid,
      upstream.ref
    );
  }

  if (!head.detached && pushRemote.ref && pushRemote.abbrev) {
    renderer.header(
      'pushBranchHeader',
      'Push',
      `Push:     ${join(pushRemote.abbrev, pushRemote.ref, pushRemote.commitMessage ?? '(does not exist)')}`,
      pushRemote.oid,
      pushRemote.ref
    );
  }

  if (tag.name) {
    renderer.header(
      'tagHeader',
      'Tag',
      `Tag:      ${tag.name} (${tag.distance ?? 0})`,
      tag.oid,
      tag.name
    );
  }

  renderer.blank();
}

/**
 * Render a snapshot into buffer lines and the tree that addresses them.
 *
 * Fold state is carried over from `previous` by node key (section name,
 * item name, hunk hash); nodes seen for the first time take the configured
 * defaults. Hidden sections and empty lists are skipped.
 */
export function buildStatusTree(
  previous: StatusTree | null,
  snapshot: RepositorySnapshot,
  options: BuildOptions
): RenderedStatus {
  const { config } = options;
  const renderer = new StatusRenderer(collectFolds(previous), options);

  if (!config.disableHint && options.hint) {
    renderer.hint(options.hint);
  }

  headerRows(renderer, snapshot);

  const visible = (name: ListSectionName, data: SectionData<unknown>) =>
    !config.sections[name].hidden && data.items.length > 0;

  if (snapshot.rebase.head) {
    if (visible('rebase', snapshot.rebase)) {
      renderer.commitSection('rebase', `Rebasing: ${snapshot.rebase.head}`, snapshot.rebase);
    }
  } else if (snapshot.sequencer.head && visible('sequencer', snapshot.sequencer)) {
    const label = snapshot.sequencer.head === 'REVERT_HEAD' ? 'Reverting' : 'Picking';
    renderer.commitSection('sequencer', label, snapshot.sequencer);
  }

  const diffSections: [ListSectionName, string, SectionData<FileStatusEntry>][] = [
    ['untracked', 'Untracked files', snapshot.untracked],
    ['unstaged', 'Unstaged changes', snapshot.unstaged],
    ['staged', 'Staged changes', snapshot.staged],
  ];
  for (const [name, label, data] of diffSections) {
    if (visible(name, data)) renderer.diffSection(name, label, data);
  }

  const commitSections: [ListSectionName, string, SectionData<CommitEntry>][] = [
    ['stashes', 'Stashes', snapshot.stashes],
  ];

  const pushRef = snapshot.pushRemote.ref;
  const upstreamRef = snapshot.upstream.ref;
  if (pushRef && pushRef !== upstreamRef) {
    commitSections.push(
      ['unpulledPushRemote', `Unpulled from ${pushRef}`, snapshot.pushRemote.unpulled],
      ['unmergedPushRemote', `Unpushed to ${pushRef}`, snapshot.pushRemote.unmerged]
    );
  }
  if (upstreamRef) {
    commitSections.push(
      ['unpulledUpstream', `Unpulled from ${upstreamRef}`, snapshot.upstream.unpulled],
      ['unmergedUpstream', `Unmerged into ${upstreamRef}`, snapshot.upstream.unmerged]
    );
  }
  commitSections.push(['recent', 'Recent commits', snapshot.recent]);

  for (const [name, label, data] of commitSections) {
    if (visible(name, data)) renderer.commitSection(name, label, data);
  }

  return {
    tree: {
      sections: renderer.sections,
      hiddenFolds: renderer.hiddenFolds,
      lineCount: renderer.lines.length,
    },
    lines: renderer.lines,
  };
}
