import * as fs from 'node:fs';
import * as path from 'node:path';
import { simpleGit, SimpleGit } from 'simple-git';
import * as logger from '../utils/logger.js';
import { runGit } from './exec.js';
import { loadSnapshot } from './snapshot.js';
import type { ApplyOptions, RepositorySnapshot, StatusRepository } from './types.js';

/**
 * Build the argument list for `git apply`, reading the patch from stdin.
 */
export function applyArgs(options: ApplyOptions): string[] {
  const args = ['apply'];
  if (options.cached) args.push('--cached');
  if (options.index) args.push('--index');
  if (options.reverse) args.push('--reverse');
  args.push('-');
  return args;
}

/**
 * StatusRepository backed by a git checkout on disk.
 */
export class GitRepository implements StatusRepository {
  readonly root: string;
  private git: SimpleGit;

  constructor(root: string) {
    this.root = root;
    this.git = simpleGit(root);
  }

  /**
   * Resolve the top level of the repository containing `dir`.
   */
  static async open(dir: string): Promise<GitRepository> {
    const top = (await simpleGit(dir).revparse(['--show-toplevel'])).trim();
    return new GitRepository(top);
  }

  loadSnapshot(): Promise<RepositorySnapshot> {
    return loadSnapshot(this.root);
  }

  async stageFiles(files: string[]): Promise<void> {
    if (files.length === 0) return;
    await this.git.add(files);
  }

  async unstageFiles(files: string[]): Promise<void> {
    if (files.length === 0) return;
    try {
      await this.git.reset(['HEAD', '--', ...files]);
    } catch (err) {
      // No HEAD yet: drop the paths from the index instead
      logger.debug(`reset failed, falling back to rm --cached: ${logger.formatError(err)}`);
      await this.git.raw(['rm', '--cached', '-r', '-q', '--', ...files]);
    }
  }

  async checkoutFiles(files: string[]): Promise<void> {
    if (files.length === 0) return;
    await this.git.checkout(['--', ...files]);
  }

  async resetFiles(files: string[]): Promise<void> {
    if (files.length === 0) return;
    await this.git.reset(['--', ...files]);
  }

  async removeFiles(files: string[]): Promise<void> {
    await Promise.all(
      files.map((file) => fs.promises.rm(path.join(this.root, file), { recursive: true, force: true }))
    );
  }

  async applyPatch(patch: string, options: ApplyOptions): Promise<void> {
    logger.debug(`git ${applyArgs(options).join(' ')}\n${patch}`);
    await runGit(this.root, applyArgs(options), Buffer.from(patch, 'latin1'));
  }

  async stageModified(): Promise<void> {
    await this.git.add(['-u']);
  }

  async stageAll(): Promise<void> {
    await this.git.add('-A');
  }

  async unstageAll(): Promise<void> {
    await this.git.reset(['HEAD']);
  }
}
