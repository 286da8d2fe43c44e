import * as path from 'node:path';
import type { Config } from '../config.js';
import { defaultConfig } from '../config.js';
import { buildUntrackedDiff, parseFileDiff } from '../git/diff.js';
import type { CommitEntry, FileStatusEntry, RepositorySnapshot } from '../git/types.js';
import { emptySnapshot } from '../git/types.js';

export const ROOT = '/work/repo';

/**
 * Default config with items unfolded and no hint, so fixtures render fully.
 */
export function testConfig(overrides: Partial<Config> = {}): Config {
  return { ...defaultConfig(), itemsFolded: false, ...overrides };
}

export const MODIFIED_DIFF = `diff --git a/src/a.ts b/src/a.ts
index 1111111..2222222 100644
--- a/src/a.ts
+++ b/src/a.ts
@@ -1,4 +1,4 @@
 a
-b
 c
+D
 d
@@ -10,2 +10,3 @@
 x
+y
 z
`;

export const UNTRACKED_CONTENT = 'one\ntwo\nthree\nfour\nfive\n';

export function fileEntry(name: string, mode?: string, rawDiff?: string): FileStatusEntry {
  return {
    name,
    absolutePath: path.join(ROOT, name),
    ...(mode !== undefined && { mode }),
    ...(rawDiff !== undefined && { diff: parseFileDiff(rawDiff) }),
  };
}

export function untrackedEntry(name: string, content: string): FileStatusEntry {
  return { name, absolutePath: path.join(ROOT, name), diff: buildUntrackedDiff(name, content) };
}

export function commitEntry(oid: string, subject: string, extra: Partial<CommitEntry> = {}): CommitEntry {
  const abbrev = oid.slice(0, 7);
  return { name: `${abbrev} ${subject}`, oid, abbrev, subject, ...extra };
}

/**
 * One untracked file with a single 5-line hunk and one modified file with
 * two hunks. Rendered with `testConfig()` the buffer is:
 *
 *   1  Head:     abc1234 main Initial
 *   2
 *   3  Untracked files (1)          4 new.txt, 5..10 hunk
 *  11
 *  12  Unstaged changes (1)         13 src/a.ts, 14..19 hunk, 20..23 hunk
 *  24
 */
export function sampleSnapshot(): RepositorySnapshot {
  const snapshot = emptySnapshot();
  snapshot.head = {
    branch: 'main',
    detached: false,
    oid: 'abc1234def567890',
    abbrev: 'abc1234',
    commitMessage: 'Initial',
  };
  snapshot.untracked.items = [untrackedEntry('new.txt', UNTRACKED_CONTENT)];
  snapshot.unstaged.items = [fileEntry('src/a.ts', 'M', MODIFIED_DIFF)];
  return snapshot;
}
