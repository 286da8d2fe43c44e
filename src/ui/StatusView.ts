import blessed from 'neo-blessed';
import type { Widgets } from 'blessed';
import type { StatusViewport } from '../core/StatusBuffer.js';
import type { FoldMarker, Highlight, LineDecoration } from '../status/decorations.js';
import { decorateLines, foldMarkers } from '../status/decorations.js';
import type { LineTag, RenderedLine, RenderedStatus } from '../status/types.js';

const MARKERS: Record<FoldMarker, string> = {
  open: '▾ ',
  closed: '▸ ',
  done: '✓ ',
};

const HIGHLIGHT_TAGS: Record<Highlight, string> = {
  hunkHeader: 'cyan-fg',
  cursorLine: 'bold',
  diffAdd: 'green-fg',
  diffDelete: 'red-fg',
  diffContext: '',
};

const LINE_TAGS: Partial<Record<LineTag, string>> = {
  hint: 'gray-fg',
  section: 'magenta-fg',
  header: 'white-fg',
};

const CONTEXT_BG = '#262626-bg';

/**
 * Escape blessed tags in content.
 */
export function escapeContent(content: string): string {
  return content.replace(/\{/g, '{{').replace(/\}/g, '}}');
}

function wrapTag(tag: string, content: string): string {
  return tag ? `{${tag}}${content}{/${tag}}` : content;
}

export interface LineStyle {
  decoration: LineDecoration;
  marker?: FoldMarker;
  cursor: boolean;
  /** Inside the visual selection. */
  selected: boolean;
  /** Draw the fold gutter. */
  gutter: boolean;
}

/**
 * Format one buffer line as a blessed-tagged string.
 */
export function formatStatusLine(line: RenderedLine, style: LineStyle): string {
  const gutter = style.gutter ? (style.marker ? MARKERS[style.marker] : '  ') : '';
  const { highlight, context } = style.decoration;

  let content = escapeContent(line.text);
  const color = highlight ? HIGHLIGHT_TAGS[highlight] : (LINE_TAGS[line.tag] ?? '');
  content = wrapTag(color, content);
  if (line.tag === 'section') content = wrapTag('bold', content);
  if (context && !style.cursor && !style.selected) content = wrapTag(CONTEXT_BG, content);

  let row = gutter + content;
  if (style.selected) row = wrapTag('blue-bg', row);
  if (style.cursor) row = wrapTag('inverse', row);
  return row;
}

export interface StatusViewOptions {
  disableSigns: boolean;
  disableContextHighlighting: boolean;
}

/**
 * Scrolling box that draws a status buffer and owns its cursor and visual
 * selection.
 */
export class StatusView implements StatusViewport {
  readonly box: Widgets.BoxElement;
  private status: RenderedStatus | null = null;
  private cursor = 1;
  private top = 1;
  private anchor: number | null = null;

  constructor(
    private screen: Widgets.Screen,
    private options: StatusViewOptions
  ) {
    this.box = blessed.box({
      parent: screen,
      top: 0,
      left: 0,
      width: '100%',
      height: '100%-1',
      tags: true,
    });
  }

  get lineCount(): number {
    return this.status?.lines.length ?? 0;
  }

  get visualActive(): boolean {
    return this.anchor !== null;
  }

  private get height(): number {
    const h = this.box.height;
    return typeof h === 'number' ? Math.max(1, h) : Math.max(1, this.screen.rows - 1);
  }

  setStatus(status: RenderedStatus): void {
    this.status = status;
    this.cursor = this.clamp(this.cursor);
    if (this.anchor !== null) this.anchor = this.clamp(this.anchor);
    this.scrollIntoView();
    this.draw();
  }

  // --- StatusViewport ---

  getCursor(): { line: number; column: number } {
    return { line: this.cursor, column: 0 };
  }

  setCursorLine(line: number): void {
    this.cursor = this.clamp(line);
    this.scrollIntoView();
    this.draw();
  }

  getSelectionRange(): { start: number; end: number; visual: boolean } {
    if (this.anchor === null) return { start: this.cursor, end: this.cursor, visual: false };
    return { start: this.anchor, end: this.cursor, visual: true };
  }

  // --- Motion ---

  moveCursor(delta: number): void {
    this.setCursorLine(this.cursor + delta);
  }

  page(direction: 1 | -1): void {
    this.moveCursor(direction * Math.max(1, this.height - 2));
  }

  toggleVisual(): void {
    this.anchor = this.anchor === null ? this.cursor : null;
    this.draw();
  }

  cancelVisual(): void {
    if (this.anchor === null) return;
    this.anchor = null;
    this.draw();
  }

  private clamp(line: number): number {
    return Math.min(Math.max(1, line), Math.max(1, this.lineCount));
  }

  private scrollIntoView(): void {
    const height = this.height;
    if (this.cursor < this.top) this.top = this.cursor;
    if (this.cursor > this.top + height - 1) this.top = this.cursor - height + 1;
    this.top = Math.max(1, Math.min(this.top, Math.max(1, this.lineCount - height + 1)));
  }

  draw(): void {
    const status = this.status;
    if (!status) {
      this.box.setContent('{gray-fg}Loading...{/gray-fg}');
      this.screen.render();
      return;
    }

    const window = { first: this.top, last: this.top + this.height - 1 };
    const markers = foldMarkers(status.tree, this.options.disableSigns);
    const decorations = decorateLines(status, this.cursor, window, {
      disableContextHighlighting: this.options.disableContextHighlighting,
    });

    const { start, end } = this.getSelectionRange();
    const low = Math.min(start, end);
    const high = Math.max(start, end);

    const rows = decorations.map((decoration) =>
      formatStatusLine(status.lines[decoration.line - 1], {
        decoration,
        marker: markers.get(decoration.line),
        cursor: decoration.line === this.cursor,
        selected: this.anchor !== null && decoration.line >= low && decoration.line <= high,
        gutter: !this.options.disableSigns,
      })
    );

    this.box.setContent(rows.join('\n'));
    this.screen.render();
  }
}
