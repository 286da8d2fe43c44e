import * as fs from 'node:fs';
import * as path from 'node:path';
import { simpleGit, SimpleGit } from 'simple-git';
import * as logger from '../utils/logger.js';
import { buildUntrackedDiff, getFileDiffs } from './diff.js';
import type {
  CommitEntry,
  Diff,
  FileStatusEntry,
  RepositorySnapshot,
  SequencerHead,
  SubmoduleStatus,
  TagInfo,
} from './types.js';
import { emptySnapshot } from './types.js';

export interface BranchStatus {
  oid: string | null;
  head: string | null;
  upstream: string | null;
  ahead: number;
  behind: number;
}

export interface PorcelainStatus {
  branch: BranchStatus;
  untracked: FileStatusEntry[];
  unstaged: FileStatusEntry[];
  staged: FileStatusEntry[];
}

function parseSubmodule(field: string): SubmoduleStatus | undefined {
  if (!field.startsWith('S')) return undefined;
  return {
    commitChanged: field[1] === 'C',
    hasTrackedChanges: field[2] === 'M',
    hasUntrackedChanges: field[3] === 'U',
  };
}

/**
 * Parse `git status --porcelain=v2 --branch -z`.
 *
 * Records are NUL separated; a rename record (`2`) is followed by a second
 * field holding the original path.
 */
export function parsePorcelainStatus(output: string, root: string): PorcelainStatus {
  const result: PorcelainStatus = {
    branch: { oid: null, head: null, upstream: null, ahead: 0, behind: 0 },
    untracked: [],
    unstaged: [],
    staged: [],
  };
  const fields = output.split('\0');

  const entry = (name: string, extra: Partial<FileStatusEntry> = {}): FileStatusEntry => ({
    name,
    absolutePath: path.join(root, name),
    ...extra,
  });

  for (let i = 0; i < fields.length; i++) {
    const record = fields[i];
    if (record === '') continue;

    if (record.startsWith('# ')) {
      const [key, ...rest] = record.slice(2).split(' ');
      const value = rest.join(' ');
      switch (key) {
        case 'branch.oid':
          result.branch.oid = value === '(initial)' ? null : value;
          break;
        case 'branch.head':
          result.branch.head = value;
          break;
        case 'branch.upstream':
          result.branch.upstream = value;
          break;
        case 'branch.ab': {
          const match = /^\+(\d+) -(\d+)$/.exec(value);
          if (match) {
            result.branch.ahead = parseInt(match[1], 10);
            result.branch.behind = parseInt(match[2], 10);
          }
          break;
        }
      }
      continue;
    }

    const parts = record.split(' ');
    switch (parts[0]) {
      case '1':
      case '2': {
        const [, xy, sub] = parts;
        const renamed = parts[0] === '2';
        const name = parts.slice(renamed ? 9 : 8).join(' ');
        const originalName = renamed ? fields[++i] : undefined;
        const submodule = parseSubmodule(sub);
        const x = xy[0];
        const y = xy[1];
        if (x !== '.') {
          result.staged.push(
            entry(name, {
              mode: x === 'A' ? 'N' : x,
              ...(originalName !== undefined && { originalName }),
              ...(submodule && { submodule }),
            })
          );
        }
        if (y !== '.') {
          result.unstaged.push(
            entry(name, {
              mode: y,
              ...(originalName !== undefined && y === 'R' && { originalName }),
              ...(submodule && { submodule }),
            })
          );
        }
        break;
      }
      case 'u': {
        const name = parts.slice(10).join(' ');
        result.unstaged.push(entry(name, { mode: parts[1] }));
        break;
      }
      case '?':
        result.untracked.push(entry(record.slice(2)));
        break;
      default:
        // '!' (ignored) and anything unrecognised
        break;
    }
  }

  return result;
}

export const LOG_FORMAT = '--format=%H%x1f%h%x1f%s';
export const STASH_FORMAT = '--format=%gd%x1f%H%x1f%h%x1f%gs';

/**
 * Parse log output written with `LOG_FORMAT`.
 */
export function parseLog(output: string): CommitEntry[] {
  const commits: CommitEntry[] = [];
  for (const line of output.split('\n')) {
    if (!line) continue;
    const [oid, abbrev, subject = ''] = line.split('\x1f');
    if (!oid || !abbrev) continue;
    commits.push({ name: `${abbrev} ${subject}`, oid, abbrev, subject });
  }
  return commits;
}

/**
 * Parse `git stash list` output written with `STASH_FORMAT`.
 */
export function parseStashList(output: string): CommitEntry[] {
  const stashes: CommitEntry[] = [];
  for (const line of output.split('\n')) {
    if (!line) continue;
    const [ref, oid, abbrev, subject = ''] = line.split('\x1f');
    if (!ref || !oid || !abbrev) continue;
    stashes.push({ name: `${ref} ${subject}`, oid, abbrev, subject, ref });
  }
  return stashes;
}

/**
 * Parse `git describe --tags --long`, e.g. `v1.2.0-3-gabc1234`.
 */
export function parseDescribe(output: string): TagInfo {
  const match = /^(.+)-(\d+)-g([0-9a-f]+)$/.exec(output.trim());
  if (!match) return { name: null, distance: null, oid: null };
  return { name: match[1], distance: parseInt(match[2], 10), oid: null };
}

/**
 * Parse one line of a rebase or sequencer todo list (`pick <oid> <subject>`).
 * Comment and blank lines give null.
 */
export function parseTodoLine(line: string, done: boolean): CommitEntry | null {
  const trimmed = line.trim();
  if (trimmed === '' || trimmed.startsWith('#')) return null;

  const match = /^(\S+)\s+([0-9a-f]{4,40})\s*(.*)$/.exec(trimmed);
  if (!match) {
    return { name: trimmed, oid: '', abbrev: '', subject: trimmed, done };
  }
  const [, action, oid, subject] = match;
  const abbrev = oid.slice(0, 7);
  return { name: `${action} ${abbrev} ${subject}`.trimEnd(), oid, abbrev, subject, done };
}

export function parseTodo(content: string, done: boolean): CommitEntry[] {
  const entries: CommitEntry[] = [];
  for (const line of content.split('\n')) {
    const parsed = parseTodoLine(line, done);
    if (parsed) entries.push(parsed);
  }
  return entries;
}

async function readOptional(file: string): Promise<string | null> {
  try {
    return await fs.promises.readFile(file, 'utf-8');
  } catch {
    return null;
  }
}

/**
 * Rebase progress from `.git/rebase-merge` or `.git/rebase-apply`.
 */
export async function readRebaseState(
  gitDir: string
): Promise<RepositorySnapshot['rebase']> {
  for (const dir of ['rebase-merge', 'rebase-apply']) {
    const base = path.join(gitDir, dir);
    const headName = await readOptional(path.join(base, 'head-name'));
    if (headName === null) continue;

    const done = parseTodo((await readOptional(path.join(base, 'done'))) ?? '', true);
    const todo = parseTodo((await readOptional(path.join(base, 'git-rebase-todo'))) ?? '', false);
    return {
      head: headName.trim().replace(/^refs\/heads\//, ''),
      items: [...done, ...todo],
      current: done.length,
    };
  }
  return { head: null, items: [] };
}

/**
 * Revert or cherry-pick in progress, from `REVERT_HEAD`/`CHERRY_PICK_HEAD`
 * and `sequencer/todo`.
 */
export async function readSequencerState(
  gitDir: string
): Promise<RepositorySnapshot['sequencer']> {
  const heads: SequencerHead[] = ['REVERT_HEAD', 'CHERRY_PICK_HEAD'];
  for (const head of heads) {
    const oid = await readOptional(path.join(gitDir, head));
    if (oid === null) continue;

    const todo = parseTodo((await readOptional(path.join(gitDir, 'sequencer', 'todo'))) ?? '', false);
    const current = oid.trim();
    const action = head === 'REVERT_HEAD' ? 'revert' : 'pick';
    const items = todo.some((t) => t.oid === current)
      ? todo
      : [{ name: `${action} ${current.slice(0, 7)}`, oid: current, abbrev: current.slice(0, 7), subject: '' }, ...todo];
    return { head, items };
  }
  return { head: null, items: [] };
}

async function logEntries(git: SimpleGit, args: string[]): Promise<CommitEntry[]> {
  try {
    return parseLog(await git.raw(['log', LOG_FORMAT, ...args]));
  } catch (err) {
    logger.debug(`git log ${args.join(' ')} failed: ${logger.formatError(err)}`);
    return [];
  }
}

async function tryRaw(git: SimpleGit, args: string[]): Promise<string | null> {
  try {
    const out = (await git.raw(args)).trim();
    return out === '' ? null : out;
  } catch {
    return null;
  }
}

async function readUntrackedDiff(root: string, file: FileStatusEntry): Promise<Diff | undefined> {
  // Untracked directories are listed with a trailing slash
  if (file.name.endsWith('/')) return undefined;
  try {
    const content = await fs.promises.readFile(path.join(root, file.name));
    return buildUntrackedDiff(file.name, content.toString('latin1'));
  } catch (err) {
    logger.debug(`Cannot read untracked ${file.name}: ${logger.formatError(err)}`);
    return undefined;
  }
}

/**
 * Load everything the status buffer renders in one pass.
 */
export async function loadSnapshot(repoPath: string): Promise<RepositorySnapshot> {
  const git = simpleGit({ baseDir: repoPath, config: ['core.quotePath=false'] });
  const snapshot = emptySnapshot();

  const gitDir = (await git.raw(['rev-parse', '--absolute-git-dir'])).trim();
  const statusOutput = await git.raw(['status', '--porcelain=v2', '--branch', '-z']);
  const status = parsePorcelainStatus(statusOutput, repoPath);

  const [worktreeDiffs, indexDiffs] = await Promise.all([
    getFileDiffs(repoPath, false),
    getFileDiffs(repoPath, true),
  ]);

  for (const file of status.unstaged) {
    const diff = worktreeDiffs.get(file.name);
    if (diff) file.diff = diff;
  }
  for (const file of status.staged) {
    const diff = indexDiffs.get(file.name);
    if (diff) file.diff = diff;
  }
  await Promise.all(
    status.untracked.map(async (file) => {
      const diff = await readUntrackedDiff(repoPath, file);
      if (diff) file.diff = diff;
    })
  );

  snapshot.untracked.items = status.untracked;
  snapshot.unstaged.items = status.unstaged;
  snapshot.staged.items = status.staged;

  // Head
  const detached = status.branch.head === '(detached)';
  snapshot.head.branch = status.branch.head ?? 'HEAD';
  snapshot.head.detached = detached;
  if (status.branch.oid) {
    const [head] = await logEntries(git, ['-1', status.branch.oid]);
    if (head) {
      snapshot.head.oid = head.oid;
      snapshot.head.abbrev = head.abbrev;
      snapshot.head.commitMessage = head.subject;
    }
    snapshot.recent.items = await logEntries(git, ['-n', '10']);
  }

  // Upstream
  const upstream = status.branch.upstream;
  if (upstream) {
    snapshot.upstream.ref = upstream;
    const slash = upstream.indexOf('/');
    snapshot.upstream.branch = slash === -1 ? upstream : upstream.slice(slash + 1);
    const [commit] = await logEntries(git, ['-1', upstream]);
    if (commit) {
      snapshot.upstream.oid = commit.oid;
      snapshot.upstream.abbrev = commit.abbrev;
      snapshot.upstream.commitMessage = commit.subject;
    }
    if (status.branch.oid) {
      snapshot.upstream.unpulled.items = await logEntries(git, [`HEAD..${upstream}`]);
      snapshot.upstream.unmerged.items = await logEntries(git, [`${upstream}..HEAD`]);
    }
  }

  // Push remote
  if (!detached && status.branch.oid) {
    const pushRef = await tryRaw(git, ['rev-parse', '--abbrev-ref', '--symbolic-full-name', '@{push}']);
    if (pushRef) {
      snapshot.pushRemote.ref = pushRef;
      const [commit] = await logEntries(git, ['-1', pushRef]);
      if (commit) {
        snapshot.pushRemote.oid = commit.oid;
        snapshot.pushRemote.abbrev = commit.abbrev;
        snapshot.pushRemote.commitMessage = commit.subject;
      }
      snapshot.pushRemote.unpulled.items = await logEntries(git, [`HEAD..${pushRef}`]);
      snapshot.pushRemote.unmerged.items = await logEntries(git, [`${pushRef}..HEAD`]);
    }
  }

  // Tag
  if (status.branch.oid) {
    const described = await tryRaw(git, ['describe', '--tags', '--long']);
    if (described) {
      snapshot.tag = parseDescribe(described);
      if (snapshot.tag.name) {
        snapshot.tag.oid = await tryRaw(git, ['rev-list', '-n', '1', snapshot.tag.name]);
      }
    }
  }

  // Stashes
  const stashes = await tryRaw(git, ['stash', 'list', STASH_FORMAT]);
  if (stashes) snapshot.stashes.items = parseStashList(stashes);

  snapshot.rebase = await readRebaseState(gitDir);
  snapshot.sequencer = await readSequencerState(gitDir);

  return snapshot;
}
