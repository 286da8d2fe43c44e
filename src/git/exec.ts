import { spawn } from 'node:child_process';

/**
 * Run git in `cwd` and resolve with its stdout as raw bytes, writing
 * `input` to stdin when given. Rejects with git's stderr on a non-zero exit.
 */
export function runGit(cwd: string, args: string[], input?: Buffer): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const proc = spawn('git', args, {
      cwd,
      stdio: ['pipe', 'pipe', 'pipe'],
      env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
    });
    const stdout: Buffer[] = [];
    let stderr = '';
    proc.stdout.on('data', (chunk: Buffer) => {
      stdout.push(chunk);
    });
    proc.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    proc.on('error', reject);
    proc.on('close', (code) => {
      if (code === 0) {
        resolve(Buffer.concat(stdout));
      } else {
        reject(new Error(`git ${args.join(' ')} failed: ${stderr.trim() || `exit code ${code}`}`));
      }
    });
    proc.stdin.end(input);
  });
}
