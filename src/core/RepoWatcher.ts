import * as path from 'node:path';
import * as fs from 'node:fs';
import { execFileSync } from 'node:child_process';
import { watch, FSWatcher } from 'chokidar';
import ignore, { Ignore } from 'ignore';
import * as logger from '../utils/logger.js';

export const WATCH_DEBOUNCE_MS = 150;

/**
 * Ignore rules per directory (relative to the root, '' for the root itself),
 * from .gitignore files, .git/info/exclude and a built-in rule for .git.
 */
export function loadIgnorers(root: string): Map<string, Ignore> {
  const ignorers = new Map<string, Ignore>();

  const rootIg = ignore();
  rootIg.add('.git');

  const rootGitignorePath = path.join(root, '.gitignore');
  if (fs.existsSync(rootGitignorePath)) {
    rootIg.add(fs.readFileSync(rootGitignorePath, 'utf-8'));
  }

  const excludePath = path.join(root, '.git', 'info', 'exclude');
  if (fs.existsSync(excludePath)) {
    rootIg.add(fs.readFileSync(excludePath, 'utf-8'));
  }

  ignorers.set('', rootIg);

  let listing: string;
  try {
    listing = execFileSync('git', ['ls-files', '-z', '--cached', '--others', '**/.gitignore'], {
      cwd: root,
      encoding: 'utf-8',
    });
  } catch (err) {
    logger.debug(`Nested .gitignore lookup failed in ${root}: ${logger.formatError(err)}`);
    return ignorers;
  }

  for (const entry of listing.split('\0')) {
    if (!entry || entry === '.gitignore' || !entry.endsWith('.gitignore')) continue;
    const absPath = path.join(root, entry);
    try {
      ignorers.set(path.dirname(entry), ignore().add(fs.readFileSync(absPath, 'utf-8')));
    } catch (err) {
      logger.warn(`Failed to read ${absPath}: ${logger.formatError(err)}`);
    }
  }

  return ignorers;
}

/**
 * Whether any ignorer from the root down to the file's directory excludes it.
 */
export function isIgnored(ignorers: Map<string, Ignore>, root: string, filePath: string): boolean {
  const relativePath = path.relative(root, filePath);
  if (!relativePath || relativePath.startsWith('..')) return false;

  const parts = relativePath.split(path.sep);
  for (let depth = 0; depth < parts.length; depth++) {
    const dir = depth === 0 ? '' : parts.slice(0, depth).join('/');
    const ig = ignorers.get(dir);
    if (ig && ig.ignores(parts.slice(depth).join('/'))) return true;
  }
  return false;
}

/**
 * Watches a repository's git metadata and worktree and calls `onChange`
 * once per burst of events.
 */
export class RepoWatcher {
  private gitWatcher: FSWatcher | null = null;
  private workingDirWatcher: FSWatcher | null = null;
  private ignorers: Map<string, Ignore> = new Map();
  private debounceTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    private root: string,
    private onChange: () => void,
    private onError: (message: string) => void,
    private debounceMs: number = WATCH_DEBOUNCE_MS
  ) {}

  start(): void {
    const gitDir = path.join(this.root, '.git');
    if (!fs.existsSync(gitDir)) {
      logger.debug(`No .git directory in ${this.root}, not watching`);
      return;
    }

    const gitignorePath = path.join(this.root, '.gitignore');
    this.gitWatcher = watch(
      [path.join(gitDir, 'index'), path.join(gitDir, 'HEAD'), path.join(gitDir, 'refs'), gitignorePath],
      {
        persistent: true,
        ignoreInitial: true,
        usePolling: true,
        interval: 100,
      }
    );

    this.ignorers = loadIgnorers(this.root);

    this.workingDirWatcher = watch(this.root, {
      persistent: true,
      ignoreInitial: true,
      ignored: (filePath: string) => isIgnored(this.ignorers, this.root, filePath),
      awaitWriteFinish: {
        stabilityThreshold: 100,
        pollInterval: 50,
      },
    });

    const schedule = () => this.schedule();

    this.gitWatcher.on('change', (filePath) => {
      if (filePath === gitignorePath) {
        this.ignorers = loadIgnorers(this.root);
      }
      schedule();
    });
    this.gitWatcher.on('add', schedule);
    this.gitWatcher.on('unlink', schedule);
    this.gitWatcher.on('error', (err: unknown) => {
      this.onError(`Git watcher error: ${logger.formatError(err)}`);
    });

    this.workingDirWatcher.on('change', schedule);
    this.workingDirWatcher.on('add', schedule);
    this.workingDirWatcher.on('unlink', schedule);
    this.workingDirWatcher.on('error', (err: unknown) => {
      this.onError(`Working dir watcher error: ${logger.formatError(err)}`);
    });

    logger.debug(`Watching ${this.root}`);
  }

  /** Coalesce events arriving within the debounce window into one call. */
  schedule(): void {
    if (this.debounceTimer) clearTimeout(this.debounceTimer);
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      this.onChange();
    }, this.debounceMs);
  }

  async dispose(): Promise<void> {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
    const watchers = [this.gitWatcher, this.workingDirWatcher];
    this.gitWatcher = null;
    this.workingDirWatcher = null;
    await Promise.all(watchers.map((w) => w?.close()));
  }
}
