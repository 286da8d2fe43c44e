import { execFileSync, execSync } from 'node:child_process';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

const FIXTURES_DIR = fileURLToPath(new URL('../../test-fixtures', import.meta.url));

const GIT_ENV = { ...process.env, GIT_TERMINAL_PROMPT: '0' };

/**
 * Create an empty fixture git repo with an identity configured.
 */
export function createFixtureRepo(name: string): string {
  const repoPath = path.join(FIXTURES_DIR, name);
  fs.rmSync(repoPath, { recursive: true, force: true });
  fs.mkdirSync(repoPath, { recursive: true });
  gitExec(repoPath, 'init --initial-branch=main');
  gitExec(repoPath, 'config user.email "test@test.com"');
  gitExec(repoPath, 'config user.name "Test User"');
  gitExec(repoPath, 'config commit.gpgsign false');
  return repoPath;
}

export function removeFixtureRepo(name: string): void {
  fs.rmSync(path.join(FIXTURES_DIR, name), { recursive: true, force: true });
}

/**
 * Write a file inside a fixture repo, creating parent directories as needed.
 */
export function writeFixtureFile(repoPath: string, filePath: string, content: string | Buffer): void {
  const fullPath = path.join(repoPath, filePath);
  fs.mkdirSync(path.dirname(fullPath), { recursive: true });
  fs.writeFileSync(fullPath, content);
}

export function readFixtureFile(repoPath: string, filePath: string): string {
  return fs.readFileSync(path.join(repoPath, filePath), 'utf-8');
}

/**
 * Run a git command in a fixture repo.
 */
export function gitExec(repoPath: string, command: string): string {
  return execSync(`git ${command}`, {
    cwd: repoPath,
    encoding: 'utf-8',
    env: GIT_ENV,
  });
}

/**
 * Bytes of a file as recorded in the index.
 */
export function indexBytes(repoPath: string, filePath: string): Buffer {
  return execFileSync('git', ['show', `:${filePath}`], { cwd: repoPath, env: GIT_ENV });
}
