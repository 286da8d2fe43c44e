import { isUtf8 } from 'node:buffer';

/**
 * Diff text is carried as raw bytes, one char per byte (latin1), from git
 * output to `git apply` so that files in any encoding round-trip exactly.
 * These helpers convert at the edges.
 */

const ASCII = /^[\x00-\x7f]*$/;

/** Raw byte text of a UTF-8 string, e.g. a path from `git status`. */
export function toRawText(text: string): string {
  if (ASCII.test(text)) return text;
  return Buffer.from(text, 'utf8').toString('latin1');
}

/**
 * Text for the screen: valid UTF-8 is decoded, anything else is shown
 * byte for byte as latin1.
 */
export function displayText(raw: string): string {
  if (ASCII.test(raw)) return raw;
  const bytes = Buffer.from(raw, 'latin1');
  return isUtf8(bytes) ? bytes.toString('utf8') : raw;
}
