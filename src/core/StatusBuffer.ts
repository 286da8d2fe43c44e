import { EventEmitter } from 'node:events';
import type { Config } from '../config.js';
import type { ApplyOptions, RepositorySnapshot, StatusRepository } from '../git/types.js';
import * as logger from '../utils/logger.js';
import { buildStatusTree } from '../status/StatusTreeBuilder.js';
import type { CursorLocation } from '../status/cursor.js';
import { restoreCursorLocation, saveCursorLocation } from '../status/cursor.js';
import { toggleFold } from '../status/folds.js';
import type { SelectedHunk } from '../status/hunks.js';
import { getItemHunks } from '../status/hunks.js';
import type { EditTarget } from '../status/navigation.js';
import { goToFile, nextHunkHeader, previousHunkHeader, yankTarget } from '../status/navigation.js';
import { generatePatch } from '../status/patch.js';
import type { Selection } from '../status/selection.js';
import { getSelection, isEmptySelection } from '../status/selection.js';
import type { FileItem, FoldDepths, RenderedStatus, SectionName } from '../status/types.js';
import { RefreshLock } from './RefreshLock.js';

/**
 * The terminal surface a buffer draws into. The view owns the cursor and the
 * visual selection; the buffer only reads and moves them.
 */
export interface StatusViewport {
  getCursor(): { line: number; column: number };
  setCursorLine(line: number): void;
  /** Current range, or the cursor line twice outside visual mode. */
  getSelectionRange(): { start: number; end: number; visual: boolean };
}

export interface Disposable {
  dispose(): void | Promise<void>;
}

export interface StatusBufferOptions {
  repository: StatusRepository;
  viewport: StatusViewport;
  config: Config;
  /** Ask the user to confirm a destructive command. */
  confirm: (message: string) => Promise<boolean>;
  hint?: string;
  columns?: number;
  lock?: RefreshLock;
}

type StatusBufferEventMap = {
  render: [RenderedStatus];
  refreshed: [];
  error: [string];
  close: [];
};

/** A file action the selection resolved to: some of its hunks, or the whole file. */
interface FileTarget {
  section: SectionName;
  name: string;
  item?: FileItem;
  hunks: SelectedHunk[];
}

/**
 * Status buffer for one repository: owns the current tree, refreshes it under
 * the refresh lock and runs the stage, unstage and discard commands against
 * the selection.
 */
export class StatusBuffer extends EventEmitter<StatusBufferEventMap> {
  readonly repository: StatusRepository;
  private viewport: StatusViewport;
  private config: Config;
  private confirm: (message: string) => Promise<boolean>;
  private hint: string | undefined;
  private columns: number | undefined;
  private lock: RefreshLock;

  private snapshot: RepositorySnapshot | null = null;
  private _status: RenderedStatus | null = null;
  private pendingLocation: CursorLocation | null = null;
  private disposables: Disposable[] = [];
  private disposed = false;

  constructor(options: StatusBufferOptions) {
    super();
    this.repository = options.repository;
    this.viewport = options.viewport;
    this.config = options.config;
    this.confirm = options.confirm;
    this.hint = options.hint;
    this.columns = options.columns;
    this.lock = options.lock ?? new RefreshLock();
  }

  get root(): string {
    return this.repository.root;
  }

  /** Last completed render; never a tree that is still being built. */
  get status(): RenderedStatus | null {
    return this._status;
  }

  get isRefreshing(): boolean {
    return this.lock.isLocked();
  }

  attach(disposable: Disposable): void {
    this.disposables.push(disposable);
  }

  // --- Refresh ---

  /**
   * Reload the repository and rebuild the tree, keeping folds and the cursor.
   * Returns false when the refresh was dropped or failed. With
   * `retryWhenBusy` a dropped refresh is issued again once the running one
   * releases the lock.
   */
  async refresh(reason: string = 'manual', options: { retryWhenBusy?: boolean } = {}): Promise<boolean> {
    if (this.disposed) return false;

    const permit = this.lock.tryAcquire(reason);
    if (!permit) {
      // The running refresh may have read the repository before a change
      if (options.retryWhenBusy) this.lock.whenFree(() => this.dispatchRefresh(reason));
      return false;
    }

    try {
      const location = this.cursorLocation();
      const snapshot = await this.repository.loadSnapshot();
      if (this.disposed) return false;

      this.snapshot = snapshot;
      this.render(location);
      logger.debug(`Refreshed ${this.root} (${reason})`);
      this.emit('refreshed');
      return true;
    } catch (err) {
      logger.error(`Refresh failed for ${this.root}`, err);
      this.emit('error', `Refresh failed: ${logger.formatError(err)}`);
      return false;
    } finally {
      permit.release();
    }
  }

  /** Fire-and-forget refresh for watchers and timers. */
  dispatchRefresh(reason: string): void {
    this.refresh(reason).catch((err) => {
      logger.error(`Refresh (${reason}) threw`, err);
    });
  }

  /** Rebuild from the last snapshot without touching the repository. */
  redraw(): void {
    if (!this.snapshot) return;
    this.render(this.cursorLocation());
  }

  /** Forget the tree, folds included, and reload when auto-refresh is on. */
  async reset(): Promise<void> {
    this.pendingLocation = this.cursorLocation();
    this._status = null;
    this.snapshot = null;
    if (this.config.autoRefresh) {
      await this.refresh('reset');
    }
  }

  setColumns(columns: number): void {
    if (columns === this.columns) return;
    this.columns = columns;
    this.redraw();
  }

  /**
   * Cursor position by node key, for restoring after a rebuild or reopen.
   */
  cursorLocation(): CursorLocation | null {
    if (!this._status) return this.pendingLocation;
    return saveCursorLocation(this._status.tree, this.viewport.getCursor().line);
  }

  /** Move the cursor to a saved location now, or after the first refresh. */
  restoreCursor(location: CursorLocation): void {
    if (!this._status) {
      this.pendingLocation = location;
      return;
    }
    this.viewport.setCursorLine(restoreCursorLocation(this._status.tree, location));
  }

  private render(location: CursorLocation | null, foldOverride?: FoldDepths): void {
    if (!this.snapshot) return;
    const status = buildStatusTree(this._status?.tree ?? null, this.snapshot, {
      config: this.config,
      ...(this.columns !== undefined && { columns: this.columns }),
      ...(this.hint !== undefined && { hint: this.hint }),
      ...(foldOverride && { foldOverride }),
    });
    this._status = status;
    this.pendingLocation = null;
    this.emit('render', status);
    if (location) {
      this.viewport.setCursorLine(restoreCursorLocation(status.tree, location));
    }
  }

  // --- Folding and navigation ---

  toggle(): void {
    if (!this._status) return;
    const { line } = this.viewport.getCursor();
    const target = toggleFold(getSelection(this._status.tree, line, line));
    const location = this.cursorLocation();
    this.render(location);
    if (target !== null) this.viewport.setCursorLine(target);
  }

  setFolds(depths: FoldDepths): void {
    if (!this._status) return;
    this.render(this.cursorLocation(), depths);
  }

  nextHunk(): void {
    if (!this._status) return;
    const line = nextHunkHeader(this._status.tree, this.viewport.getCursor().line);
    if (line !== null) this.viewport.setCursorLine(line);
  }

  previousHunk(): void {
    if (!this._status) return;
    const line = previousHunkHeader(this._status.tree, this.viewport.getCursor().line);
    if (line !== null) this.viewport.setCursorLine(line);
  }

  goToFile(): EditTarget | null {
    if (!this._status) return null;
    const { line, column } = this.viewport.getCursor();
    const texts = this._status.lines.map((l) => l.text);
    return goToFile(this._status.tree, texts, line, column);
  }

  yank(): string | null {
    const selection = this.selection();
    return selection ? yankTarget(selection) : null;
  }

  /** Selection under the viewport's range, or null when it is empty. */
  selection(): Selection | null {
    if (!this._status) return null;
    const { start, end } = this.viewport.getSelectionRange();
    const selection = getSelection(this._status.tree, start, end);
    return isEmptySelection(selection) ? null : selection;
  }

  // --- Commands ---

  /**
   * Run a mutating command, then refresh whatever happened. A command
   * returning false did nothing and skips the refresh.
   */
  private async runOperation(name: string, operation: () => Promise<boolean>): Promise<void> {
    try {
      if (!(await operation())) return;
    } catch (err) {
      logger.error(`${name} failed in ${this.root}`, err);
      this.emit('error', `${name} failed: ${logger.formatError(err)}`);
    }
    await this.refresh(name.toLowerCase(), { retryWhenBusy: true });
  }

  /**
   * Resolve the selection in the given sections to per-file targets. Items
   * whose hunks meet the range act on those hunks; the rest, and every item
   * of a whole-section selection, act on the whole file.
   */
  private fileTargets(selection: Selection, sections: readonly SectionName[]): FileTarget[] {
    const { visual } = this.viewport.getSelectionRange();
    const targets: FileTarget[] = [];

    for (const s of selection.sections) {
      if (s.kind !== 'diff' || !sections.includes(s.name)) {
        logger.debug(`Nothing to do in ${s.name}`);
        continue;
      }
      if (s.wholeSection) {
        for (const name of s.section.itemNames) targets.push({ section: s.name, name, hunks: [] });
        continue;
      }
      for (const item of s.items) {
        if (item.type !== 'file') continue;
        const hunks = getItemHunks(item, selection.firstLine, selection.lastLine, visual);
        targets.push({ section: s.name, name: item.name, item, hunks });
      }
    }
    return targets;
  }

  /**
   * Apply one patch per selected hunk. Hunks go bottom-up so the line numbers
   * of the ones above stay valid.
   */
  private async applyHunks(target: FileTarget, reverse: boolean, options: ApplyOptions): Promise<void> {
    const { item } = target;
    if (!item) return;
    for (const selected of [...target.hunks].reverse()) {
      const patch = generatePatch(item, selected.hunk, selected.from, selected.to, reverse);
      logger.debug(`Applying patch to ${item.name}:\n${patch}`);
      await this.repository.applyPatch(patch, options);
    }
  }

  async stage(): Promise<void> {
    await this.runOperation('Stage', async () => {
      const selection = this.selection();
      if (!selection) return false;

      const targets = this.fileTargets(selection, ['untracked', 'unstaged']);
      if (targets.length === 0) return false;

      const files: string[] = [];
      for (const target of targets) {
        if (target.hunks.length > 0) {
          await this.applyHunks(target, false, { cached: true });
        } else {
          files.push(target.name);
        }
      }
      if (files.length > 0) await this.repository.stageFiles(files);
      return true;
    });
  }

  async unstage(): Promise<void> {
    await this.runOperation('Unstage', async () => {
      const selection = this.selection();
      if (!selection) return false;

      const targets = this.fileTargets(selection, ['staged']);
      if (targets.length === 0) return false;

      const files: string[] = [];
      for (const target of targets) {
        if (target.hunks.length > 0) {
          await this.applyHunks(target, true, { cached: true });
        } else {
          files.push(target.name);
        }
      }
      if (files.length > 0) await this.repository.unstageFiles(files);
      return true;
    });
  }

  /**
   * Throw away the selected changes after confirmation. Staged hunks are
   * undone in both the index and the worktree, other hunks in the worktree
   * only.
   */
  async discard(): Promise<void> {
    await this.runOperation('Discard', async () => {
      const selection = this.selection();
      if (!selection) return false;

      const targets = this.fileTargets(selection, ['untracked', 'unstaged', 'staged']);
      if (targets.length === 0) return false;

      if (!(await this.confirm(discardMessage(targets)))) {
        logger.debug('Discard cancelled');
        return false;
      }

      const untracked: string[] = [];
      const unstaged: string[] = [];
      const staged: string[] = [];
      for (const target of targets) {
        if (target.hunks.length > 0) {
          await this.applyHunks(target, true, target.section === 'staged' ? { index: true } : {});
        } else if (target.section === 'untracked') {
          untracked.push(target.name);
        } else if (target.section === 'unstaged') {
          unstaged.push(target.name);
        } else {
          staged.push(target.name);
        }
      }

      if (untracked.length > 0) await this.repository.removeFiles(untracked);
      if (unstaged.length > 0) await this.repository.checkoutFiles(unstaged);
      if (staged.length > 0) {
        await this.repository.resetFiles(staged);
        await this.repository.checkoutFiles(staged);
      }
      return true;
    });
  }

  async stageModified(): Promise<void> {
    await this.runOperation('Stage', async () => {
      await this.repository.stageModified();
      return true;
    });
  }

  async stageAll(): Promise<void> {
    await this.runOperation('Stage', async () => {
      await this.repository.stageAll();
      return true;
    });
  }

  async unstageAll(): Promise<void> {
    await this.runOperation('Unstage', async () => {
      await this.repository.unstageAll();
      return true;
    });
  }

  // --- Lifecycle ---

  close(): void {
    this.emit('close');
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    const disposables = this.disposables;
    this.disposables = [];
    for (const disposable of disposables) {
      try {
        await disposable.dispose();
      } catch (err) {
        logger.warn(`Failed to dispose resource for ${this.root}: ${logger.formatError(err)}`);
      }
    }
    this.removeAllListeners();
  }
}

export function discardMessage(targets: readonly { name: string; hunks: readonly SelectedHunk[] }[]): string {
  const hunks = targets.reduce((n, t) => n + t.hunks.length, 0);
  const files = targets.filter((t) => t.hunks.length === 0);

  if (hunks > 0 && files.length > 0) return 'Discard selection?';
  if (hunks > 0) return hunks === 1 ? 'Discard hunk?' : `Discard ${hunks} hunks?`;
  if (files.length === 1) return `Discard "${files[0].name}"?`;
  return `Discard ${files.length} files?`;
}
