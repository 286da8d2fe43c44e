import { createHash } from 'node:crypto';
import { spawn } from 'node:child_process';
import { displayText, toRawText } from './encoding.js';
import { runGit } from './exec.js';
import type { Diff, DiffHunk } from './types.js';

export interface DiffLine {
  type: 'header' | 'hunk' | 'addition' | 'deletion' | 'context';
  content: string;
}

export interface HunkRange {
  oldStart: number;
  oldLines: number;
  newStart: number;
  newLines: number;
}

export function parseDiffLine(line: string): DiffLine {
  if (line.startsWith('diff --git') || line.startsWith('index ') ||
      line.startsWith('---') || line.startsWith('+++') ||
      line.startsWith('new file') || line.startsWith('deleted file')) {
    return { type: 'header', content: line };
  }
  if (line.startsWith('@@')) {
    return { type: 'hunk', content: line };
  }
  if (line.startsWith('+')) {
    return { type: 'addition', content: line };
  }
  if (line.startsWith('-')) {
    return { type: 'deletion', content: line };
  }
  return { type: 'context', content: line };
}

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;

/**
 * Parse a unified hunk header. Omitted counts default to 1.
 */
export function parseHunkHeader(line: string): HunkRange | null {
  const match = HUNK_HEADER.exec(line);
  if (!match) return null;
  return {
    oldStart: parseInt(match[1], 10),
    oldLines: match[2] === undefined ? 1 : parseInt(match[2], 10),
    newStart: parseInt(match[3], 10),
    newLines: match[4] === undefined ? 1 : parseInt(match[4], 10),
  };
}

/**
 * Identity of a hunk across refreshes: the SHA-1 of its body lines.
 */
export function hashHunk(body: string[]): string {
  return createHash('sha1').update(body.join('\n')).digest('hex');
}

function stripPrefix(value: string, prefix: 'a/' | 'b/'): string | null {
  // git appends a tab after paths containing spaces
  const trimmed = value.replace(/\t$/, '');
  if (trimmed === '/dev/null') return null;
  return trimmed.startsWith(prefix) ? trimmed.slice(prefix.length) : trimmed;
}

function collectHunks(lines: string[]): DiffHunk[] {
  const hunks: DiffHunk[] = [];
  const seen = new Map<string, number>();
  let start = -1;
  let range: HunkRange | null = null;

  const close = (end: number) => {
    if (range === null || start < 0) return;
    const hash = hashHunk(lines.slice(start + 1, end + 1));
    // Hunks with identical bodies are numbered in file order
    const occurrence = seen.get(hash) ?? 0;
    seen.set(hash, occurrence + 1);
    hunks.push({
      hash: occurrence === 0 ? hash : `${hash}#${occurrence}`,
      diffFrom: start,
      diffTo: end,
      ...range,
    });
  };

  for (let i = 0; i < lines.length; i++) {
    if (!lines[i].startsWith('@@')) continue;
    close(i - 1);
    start = i;
    range = parseHunkHeader(lines[i]);
  }
  close(lines.length - 1);
  return hunks;
}

/**
 * Parse one file's section of `git diff` output.
 */
export function parseFileDiff(chunk: string): Diff {
  const rawLines = chunk.split('\n');
  if (rawLines.length > 0 && rawLines[rawLines.length - 1] === '') rawLines.pop();

  const firstHunk = rawLines.findIndex((l) => l.startsWith('@@'));
  const headers = firstHunk === -1 ? rawLines : rawLines.slice(0, firstHunk);
  const lines = firstHunk === -1 ? [] : rawLines.slice(firstHunk);

  let oldPath: string | null | undefined;
  let newPath: string | null | undefined;
  let renameFrom: string | undefined;
  let renameTo: string | undefined;
  let created = false;
  let deleted = false;

  for (const header of headers) {
    if (header.startsWith('--- ')) oldPath = stripPrefix(header.slice(4), 'a/');
    else if (header.startsWith('+++ ')) newPath = stripPrefix(header.slice(4), 'b/');
    else if (header.startsWith('rename from ')) renameFrom = header.slice('rename from '.length);
    else if (header.startsWith('rename to ')) renameTo = header.slice('rename to '.length);
    else if (header.startsWith('new file mode')) created = true;
    else if (header.startsWith('deleted file mode')) deleted = true;
  }

  // Binary, mode-only and pure renames carry no ---/+++ lines
  if (oldPath === undefined || newPath === undefined) {
    const gitLine = /^diff --git a\/(.+) b\/(.+)$/.exec(headers[0] ?? '');
    const fromGit = gitLine ? gitLine[1] : null;
    const toGit = gitLine ? gitLine[2] : null;
    if (oldPath === undefined) oldPath = created ? null : (renameFrom ?? fromGit);
    if (newPath === undefined) newPath = deleted ? null : (renameTo ?? toGit);
  }

  let additions = 0;
  let deletions = 0;
  for (const line of lines) {
    if (line.startsWith('+')) additions++;
    else if (line.startsWith('-')) deletions++;
  }

  return {
    headers,
    oldPath,
    newPath,
    lines,
    hunks: collectHunks(lines),
    stats: { additions, deletions },
  };
}

/**
 * Split `git diff` output into per-file diffs. Combined (merge) diffs are skipped.
 */
export function parseFileDiffs(raw: string): Diff[] {
  return raw
    .split(/(?=^diff --(?:git|cc) )/m)
    .filter((chunk) => chunk.startsWith('diff --git '))
    .map(parseFileDiff);
}

/** Path a diff is filed under in the status: the new side, else the old. */
export function diffPath(diff: Diff): string | null {
  return diff.newPath ?? diff.oldPath;
}

/**
 * Synthesize the diff of an untracked file against /dev/null. `content` is
 * raw byte text. Binary and empty files get no hunks.
 */
export function buildUntrackedDiff(name: string, content: string): Diff {
  const file = toRawText(name);
  const gitLine = `diff --git a/${file} b/${file}`;
  const empty = { oldPath: null, newPath: file, lines: [], hunks: [], stats: { additions: 0, deletions: 0 } };

  if (content.includes('\0')) {
    return {
      ...empty,
      headers: [gitLine, 'new file mode 100644', `Binary files /dev/null and b/${file} differ`],
    };
  }
  if (content === '') {
    return { ...empty, headers: [gitLine, 'new file mode 100644'] };
  }

  const endsWithNewline = content.endsWith('\n');
  const body = (endsWithNewline ? content.slice(0, -1) : content).split('\n');
  const lines = [`@@ -0,0 +1,${body.length} @@`, ...body.map((l) => '+' + l)];
  if (!endsWithNewline) lines.push('\\ No newline at end of file');

  return {
    headers: [gitLine, 'new file mode 100644', '--- /dev/null', `+++ b/${file}`],
    oldPath: null,
    newPath: file,
    lines,
    hunks: [
      {
        hash: hashHunk(lines.slice(1)),
        diffFrom: 0,
        diffTo: lines.length - 1,
        oldStart: 0,
        oldLines: 0,
        newStart: 1,
        newLines: body.length,
      },
    ],
    stats: { additions: body.length, deletions: 0 },
  };
}

/**
 * Diffs of the worktree against the index, or of the index against HEAD
 * when `staged`, keyed by path as `git status` reports it. Diff text is raw
 * byte text.
 */
export async function getFileDiffs(
  repoPath: string,
  staged: boolean = false
): Promise<Map<string, Diff>> {
  const args = ['-c', 'core.quotePath=false', 'diff', '--no-ext-diff', '--no-color'];
  if (staged) {
    args.push('--cached');
  }

  // Bytes are kept as is; see encoding.ts
  const raw = (await runGit(repoPath, args)).toString('latin1');
  const diffs = new Map<string, Diff>();
  for (const diff of parseFileDiffs(raw)) {
    const file = diffPath(diff);
    if (file !== null) diffs.set(displayText(file), diff);
  }
  return diffs;
}

/**
 * Pipe text through the user's pager and resolve once it exits.
 */
export function spawnPager(pager: string, text: string): Promise<void> {
  const [cmd, ...args] = pager.split(' ');
  return new Promise((resolve, reject) => {
    const proc = spawn(cmd, args, {
      stdio: ['pipe', 'inherit', 'inherit'],
    });
    proc.on('error', reject);
    proc.on('close', () => resolve());
    proc.stdin.write(text);
    proc.stdin.end();
  });
}
