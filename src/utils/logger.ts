/**
 * Lightweight structured logger writing to stderr.
 *
 * - `debug()` and `info()` are gated by `setDebug(true)` (set from the --debug flag)
 * - `warn()` and `error()` always write to stderr
 */

let debugEnabled = false;

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

function timestamp(): string {
  return new Date().toISOString();
}

export function debug(message: string): void {
  if (debugEnabled) {
    process.stderr.write(`[hunkwise ${timestamp()}] ${message}\n`);
  }
}

export function info(message: string): void {
  if (debugEnabled) {
    process.stderr.write(`[hunkwise info ${timestamp()}] ${message}\n`);
  }
}

export function warn(message: string): void {
  process.stderr.write(`[hunkwise warn] ${message}\n`);
}

export function formatError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (err) return String(err);
  return '';
}

export function error(message: string, err?: unknown): void {
  const detail = err ? `: ${formatError(err)}` : '';
  process.stderr.write(`[hunkwise error] ${message}${detail}\n`);
}
