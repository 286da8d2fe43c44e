import { describe, it, expect, beforeEach, afterAll } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { applyArgs, GitRepository } from './repository.js';
import { buildStatusTree } from '../status/StatusTreeBuilder.js';
import { generatePatch } from '../status/patch.js';
import type { FileItem, ListSectionName } from '../status/types.js';
import { testConfig } from '../status/test-helpers.js';
import {
  createFixtureRepo,
  gitExec,
  indexBytes,
  readFixtureFile,
  removeFixtureRepo,
  writeFixtureFile,
} from './test-helpers.js';

describe('applyArgs', () => {
  it('reads the patch from stdin with no flags by default', () => {
    expect(applyArgs({})).toEqual(['apply', '-']);
  });

  it('applies to the index only when cached', () => {
    expect(applyArgs({ cached: true })).toEqual(['apply', '--cached', '-']);
  });

  it('passes index and reverse through', () => {
    expect(applyArgs({ index: true, reverse: true })).toEqual(['apply', '--index', '--reverse', '-']);
  });
});

async function findFile(repo: GitRepository, section: ListSectionName, name: string): Promise<FileItem> {
  const { tree } = buildStatusTree(null, await repo.loadSnapshot(), { config: testConfig() });
  const item = tree.sections.find((s) => s.name === section)?.items.find((i) => i.name === name);
  if (item?.type !== 'file') throw new Error(`${name} is not in ${section}`);
  return item;
}

/** Apply the patch for the single diff line `text` of the item's first hunk. */
async function applyLine(
  repo: GitRepository,
  item: FileItem,
  text: string,
  reverse: boolean,
  cached: boolean
): Promise<void> {
  const line = item.diff?.lines.indexOf(text) ?? -1;
  if (line === -1) throw new Error(`${text} is not in the diff of ${item.name}`);
  await repo.applyPatch(generatePatch(item, item.hunks[0], line, line, reverse), cached ? { cached: true } : {});
}

describe('GitRepository (fixture)', () => {
  const FIXTURE = 'repository';
  let repoPath: string;
  let repo: GitRepository;

  beforeEach(() => {
    repoPath = createFixtureRepo(FIXTURE);
    writeFixtureFile(repoPath, 'a.txt', 'a\nb\nc\nd\n');
    writeFixtureFile(repoPath, 'staged.txt', 's\n');
    gitExec(repoPath, 'add .');
    gitExec(repoPath, 'commit -m "initial"');
    writeFixtureFile(repoPath, 'a.txt', 'a\nc\nD\nd\n');
    repo = new GitRepository(repoPath);
  });

  afterAll(() => {
    removeFixtureRepo(FIXTURE);
  });

  describe('loadSnapshot', () => {
    it('sorts staged, unstaged and untracked files with their diffs', async () => {
      writeFixtureFile(repoPath, 'staged.txt', 's2\n');
      gitExec(repoPath, 'add staged.txt');
      writeFixtureFile(repoPath, 'new.txt', 'one\ntwo\n');

      const snapshot = await repo.loadSnapshot();

      expect(snapshot.head).toMatchObject({ branch: 'main', detached: false, commitMessage: 'initial' });
      expect(snapshot.recent.items.map((c) => c.subject)).toEqual(['initial']);

      expect(snapshot.unstaged.items.map((f) => [f.name, f.mode])).toEqual([['a.txt', 'M']]);
      expect(snapshot.unstaged.items[0].absolutePath).toBe(path.join(repoPath, 'a.txt'));
      expect(snapshot.unstaged.items[0].diff?.lines).toEqual([
        '@@ -1,4 +1,4 @@',
        ' a',
        '-b',
        ' c',
        '+D',
        ' d',
      ]);

      expect(snapshot.staged.items.map((f) => [f.name, f.mode])).toEqual([['staged.txt', 'M']]);
      expect(snapshot.staged.items[0].diff?.lines).toEqual(['@@ -1 +1 @@', '-s', '+s2']);

      expect(snapshot.untracked.items.map((f) => f.name)).toEqual(['new.txt']);
      expect(snapshot.untracked.items[0].diff?.lines).toEqual(['@@ -0,0 +1,2 @@', '+one', '+two']);
    });

    it('reports an unborn branch with no commits', async () => {
      const fresh = createFixtureRepo(`${FIXTURE}-unborn`);
      try {
        writeFixtureFile(fresh, 'x.txt', 'x\n');
        const snapshot = await new GitRepository(fresh).loadSnapshot();
        expect(snapshot.head).toMatchObject({ branch: 'main', oid: null });
        expect(snapshot.untracked.items.map((f) => f.name)).toEqual(['x.txt']);
      } finally {
        removeFixtureRepo(`${FIXTURE}-unborn`);
      }
    });
  });

  describe('partial patches', () => {
    it('stages one added line into the index', async () => {
      await applyLine(repo, await findFile(repo, 'unstaged', 'a.txt'), '+D', false, true);
      expect(gitExec(repoPath, 'show :a.txt')).toBe('a\nb\nc\nD\nd\n');
      expect(readFixtureFile(repoPath, 'a.txt')).toBe('a\nc\nD\nd\n');
    });

    it('unstages the same line back to the committed content', async () => {
      await applyLine(repo, await findFile(repo, 'unstaged', 'a.txt'), '+D', false, true);
      await applyLine(repo, await findFile(repo, 'staged', 'a.txt'), '+D', true, true);
      expect(gitExec(repoPath, 'show :a.txt')).toBe('a\nb\nc\nd\n');
    });

    it('discards one removed line from the worktree', async () => {
      await applyLine(repo, await findFile(repo, 'unstaged', 'a.txt'), '-b', true, false);
      expect(readFixtureFile(repoPath, 'a.txt')).toBe('a\nb\nc\nD\nd\n');
      expect(gitExec(repoPath, 'show :a.txt')).toBe('a\nb\nc\nd\n');
    });

    it('stages part of an untracked file as a new file', async () => {
      writeFixtureFile(repoPath, 'new.txt', 'one\ntwo\nthree\n');
      await applyLine(repo, await findFile(repo, 'untracked', 'new.txt'), '+two', false, true);
      expect(gitExec(repoPath, 'show :new.txt')).toBe('two\n');
    });

    it('stages a line added after a last line without a newline', async () => {
      writeFixtureFile(repoPath, 'tail.txt', 'a\nold');
      gitExec(repoPath, 'add tail.txt');
      gitExec(repoPath, 'commit -m "tail"');
      writeFixtureFile(repoPath, 'tail.txt', 'a\nnew');

      await applyLine(repo, await findFile(repo, 'unstaged', 'tail.txt'), '+new', false, true);
      expect(gitExec(repoPath, 'show :tail.txt')).toBe('a\nold\nnew');
    });

    it('unstages a removal at the end of a file without a newline', async () => {
      writeFixtureFile(repoPath, 'tail.txt', 'a\nold');
      gitExec(repoPath, 'add tail.txt');
      gitExec(repoPath, 'commit -m "tail"');
      writeFixtureFile(repoPath, 'tail.txt', 'a\nnew');
      gitExec(repoPath, 'add tail.txt');

      await applyLine(repo, await findFile(repo, 'staged', 'tail.txt'), '-old', true, true);
      expect(gitExec(repoPath, 'show :tail.txt')).toBe('a\nold\nnew');
    });

    it('keeps bytes that are not UTF-8 in an untracked file', async () => {
      writeFixtureFile(repoPath, 'latin.txt', Buffer.from('caf\xe9\nb\n', 'latin1'));
      await applyLine(repo, await findFile(repo, 'untracked', 'latin.txt'), '+caf\xe9', false, true);
      expect(indexBytes(repoPath, 'latin.txt')).toEqual(Buffer.from([0x63, 0x61, 0x66, 0xe9, 0x0a]));
    });

    it('keeps bytes that are not UTF-8 in a tracked file', async () => {
      writeFixtureFile(repoPath, 'staged.txt', Buffer.from('s\ncaf\xe9\nb\n', 'latin1'));
      await applyLine(repo, await findFile(repo, 'unstaged', 'staged.txt'), '+caf\xe9', false, true);
      expect(indexBytes(repoPath, 'staged.txt')).toEqual(Buffer.from('s\ncaf\xe9\n', 'latin1'));
    });
  });

  describe('whole files', () => {
    it('stages and unstages files', async () => {
      await repo.stageFiles(['a.txt']);
      expect(gitExec(repoPath, 'show :a.txt')).toBe('a\nc\nD\nd\n');
      await repo.unstageFiles(['a.txt']);
      expect(gitExec(repoPath, 'show :a.txt')).toBe('a\nb\nc\nd\n');
    });

    it('unstages a new file before the first commit', async () => {
      const fresh = createFixtureRepo(`${FIXTURE}-unstage-unborn`);
      try {
        writeFixtureFile(fresh, 'x.txt', 'x\n');
        const unborn = new GitRepository(fresh);
        await unborn.stageFiles(['x.txt']);
        await unborn.unstageFiles(['x.txt']);
        expect(gitExec(fresh, 'status --porcelain')).toBe('?? x.txt\n');
      } finally {
        removeFixtureRepo(`${FIXTURE}-unstage-unborn`);
      }
    });

    it('checks out worktree files from the index', async () => {
      await repo.checkoutFiles(['a.txt']);
      expect(readFixtureFile(repoPath, 'a.txt')).toBe('a\nb\nc\nd\n');
    });

    it('resets the index entry and leaves the worktree', async () => {
      gitExec(repoPath, 'add a.txt');
      await repo.resetFiles(['a.txt']);
      expect(gitExec(repoPath, 'show :a.txt')).toBe('a\nb\nc\nd\n');
      expect(readFixtureFile(repoPath, 'a.txt')).toBe('a\nc\nD\nd\n');
    });

    it('removes untracked files and directories', async () => {
      writeFixtureFile(repoPath, 'junk/one.txt', '1\n');
      writeFixtureFile(repoPath, 'two.txt', '2\n');
      await repo.removeFiles(['junk/', 'two.txt']);
      expect(fs.existsSync(path.join(repoPath, 'junk'))).toBe(false);
      expect(fs.existsSync(path.join(repoPath, 'two.txt'))).toBe(false);
    });

    it('stages modified files only, then everything, then nothing', async () => {
      writeFixtureFile(repoPath, 'new.txt', 'n\n');

      await repo.stageModified();
      expect(gitExec(repoPath, 'status --porcelain')).toBe('M  a.txt\n?? new.txt\n');

      await repo.stageAll();
      expect(gitExec(repoPath, 'status --porcelain')).toBe('M  a.txt\nA  new.txt\n');

      await repo.unstageAll();
      expect(gitExec(repoPath, 'status --porcelain')).toBe(' M a.txt\n?? new.txt\n');
    });

    it('rejects a patch that does not apply', async () => {
      await expect(
        repo.applyPatch('--- a/a.txt\n+++ b/a.txt\n@@ -1,1 +1,1 @@\n-zzz\n+yyy\n', { cached: true })
      ).rejects.toThrow('git apply --cached - failed');
    });
  });
});
