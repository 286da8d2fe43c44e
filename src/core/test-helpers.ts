import type { ApplyOptions, RepositorySnapshot, StatusRepository } from '../git/types.js';
import { ROOT, sampleSnapshot } from '../status/test-helpers.js';
import type { StatusViewport } from './StatusBuffer.js';

/**
 * In-memory repository recording every mutation it is asked for.
 */
export class FakeRepository implements StatusRepository {
  snapshot: RepositorySnapshot = sampleSnapshot();
  calls: string[] = [];
  patches: { patch: string; options: ApplyOptions }[] = [];
  failApply = false;
  loads = 0;

  constructor(readonly root: string = ROOT) {}

  async loadSnapshot(): Promise<RepositorySnapshot> {
    this.loads++;
    return this.snapshot;
  }
  async stageFiles(files: string[]): Promise<void> {
    this.calls.push(`stage ${files.join(',')}`);
  }
  async unstageFiles(files: string[]): Promise<void> {
    this.calls.push(`unstage ${files.join(',')}`);
  }
  async checkoutFiles(files: string[]): Promise<void> {
    this.calls.push(`checkout ${files.join(',')}`);
  }
  async resetFiles(files: string[]): Promise<void> {
    this.calls.push(`reset ${files.join(',')}`);
  }
  async removeFiles(files: string[]): Promise<void> {
    this.calls.push(`remove ${files.join(',')}`);
  }
  async applyPatch(patch: string, options: ApplyOptions): Promise<void> {
    if (this.failApply) throw new Error('patch does not apply');
    this.patches.push({ patch, options });
  }
  async stageModified(): Promise<void> {
    this.calls.push('add -u');
  }
  async stageAll(): Promise<void> {
    this.calls.push('add -A');
  }
  async unstageAll(): Promise<void> {
    this.calls.push('reset');
  }
}

/** Cursor and visual range without a terminal. */
export class FakeViewport implements StatusViewport {
  line = 1;
  column = 0;
  anchor: number | null = null;

  getCursor() {
    return { line: this.line, column: this.column };
  }
  setCursorLine(line: number): void {
    this.line = line;
  }
  getSelectionRange() {
    if (this.anchor === null) return { start: this.line, end: this.line, visual: false };
    return { start: this.anchor, end: this.line, visual: true };
  }
  select(start: number, end: number): void {
    this.anchor = start;
    this.line = end;
  }
}
