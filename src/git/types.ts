/**
 * Repository data consumed by the status tree builder.
 *
 * Everything here is produced by the git layer (`snapshot.ts`, `diff.ts`) on
 * each refresh and treated as immutable afterwards.
 */

export interface DiffHunk {
  /** SHA-1 of the hunk body; stable while the hunk's content is unchanged. */
  hash: string;
  /** Index of the `@@` line in `Diff.lines`. */
  diffFrom: number;
  /** Index of the hunk's last body line in `Diff.lines`. */
  diffTo: number;
  oldStart: number;
  oldLines: number;
  /** First line of the hunk on the new side (worktree or index). */
  newStart: number;
  newLines: number;
}

/**
 * One file's diff. Paths and lines are raw byte text (see `encoding.ts`);
 * decode with `displayText()` before showing them.
 */
export interface Diff {
  /** File header lines (`diff --git`, `index`, `---`, `+++`, mode lines). */
  headers: string[];
  /** Path on the old side, or null for `/dev/null`. */
  oldPath: string | null;
  /** Path on the new side, or null for `/dev/null`. */
  newPath: string | null;
  /** Every line from the first `@@` onwards. */
  lines: string[];
  hunks: DiffHunk[];
  stats: { additions: number; deletions: number };
}

export interface SubmoduleStatus {
  commitChanged: boolean;
  hasTrackedChanges: boolean;
  hasUntrackedChanges: boolean;
}

export interface FileStatusEntry {
  name: string;
  /** Status letter(s) such as `M`, `N`, `R` or `UU`; absent for untracked files. */
  mode?: string;
  originalName?: string;
  submodule?: SubmoduleStatus;
  absolutePath: string;
  diff?: Diff;
}

export interface CommitEntry {
  /** Text rendered for the item, e.g. `abc1234 Fix parser`. */
  name: string;
  oid: string;
  abbrev: string;
  subject: string;
  /** Ref to open for this entry when it is not the oid, e.g. `stash@{0}`. */
  ref?: string;
  /** Rebase step already applied. */
  done?: boolean;
}

export interface SectionData<T> {
  items: T[];
  /** Position within the list for sections that track progress (rebase). */
  current?: number;
}

export interface HeadInfo {
  branch: string;
  detached: boolean;
  oid: string | null;
  abbrev: string | null;
  commitMessage: string | null;
}

export interface UpstreamInfo {
  ref: string | null;
  branch: string | null;
  oid: string | null;
  abbrev: string | null;
  commitMessage: string | null;
  unpulled: SectionData<CommitEntry>;
  unmerged: SectionData<CommitEntry>;
}

export interface PushRemoteInfo {
  ref: string | null;
  oid: string | null;
  abbrev: string | null;
  commitMessage: string | null;
  unpulled: SectionData<CommitEntry>;
  unmerged: SectionData<CommitEntry>;
}

export interface TagInfo {
  name: string | null;
  distance: number | null;
  oid: string | null;
}

export type SequencerHead = 'REVERT_HEAD' | 'CHERRY_PICK_HEAD';

export interface RepositorySnapshot {
  head: HeadInfo;
  upstream: UpstreamInfo;
  pushRemote: PushRemoteInfo;
  tag: TagInfo;
  rebase: SectionData<CommitEntry> & { head: string | null };
  sequencer: SectionData<CommitEntry> & { head: SequencerHead | null };
  untracked: SectionData<FileStatusEntry>;
  unstaged: SectionData<FileStatusEntry>;
  staged: SectionData<FileStatusEntry>;
  stashes: SectionData<CommitEntry>;
  recent: SectionData<CommitEntry>;
}

export interface ApplyOptions {
  /** Apply to the index only (`--cached`). */
  cached?: boolean;
  /** Apply to both index and worktree (`--index`). */
  index?: boolean;
  reverse?: boolean;
}

/**
 * Repository operations the status buffer depends on.
 * `GitRepository` implements this against a real git checkout.
 */
export interface StatusRepository {
  readonly root: string;
  loadSnapshot(): Promise<RepositorySnapshot>;
  stageFiles(files: string[]): Promise<void>;
  unstageFiles(files: string[]): Promise<void>;
  checkoutFiles(files: string[]): Promise<void>;
  resetFiles(files: string[]): Promise<void>;
  removeFiles(files: string[]): Promise<void>;
  /** `patch` is raw byte text, as produced by `generatePatch()`. */
  applyPatch(patch: string, options: ApplyOptions): Promise<void>;
  stageModified(): Promise<void>;
  stageAll(): Promise<void>;
  unstageAll(): Promise<void>;
}

export function emptySectionData<T>(): SectionData<T> {
  return { items: [] };
}

export function emptySnapshot(): RepositorySnapshot {
  return {
    head: { branch: 'HEAD', detached: false, oid: null, abbrev: null, commitMessage: null },
    upstream: {
      ref: null,
      branch: null,
      oid: null,
      abbrev: null,
      commitMessage: null,
      unpulled: emptySectionData(),
      unmerged: emptySectionData(),
    },
    pushRemote: {
      ref: null,
      oid: null,
      abbrev: null,
      commitMessage: null,
      unpulled: emptySectionData(),
      unmerged: emptySectionData(),
    },
    tag: { name: null, distance: null, oid: null },
    rebase: { head: null, items: [] },
    sequencer: { head: null, items: [] },
    untracked: emptySectionData(),
    unstaged: emptySectionData(),
    staged: emptySectionData(),
    stashes: emptySectionData(),
    recent: emptySectionData(),
  };
}
