import blessed from 'neo-blessed';
import type { Widgets } from 'blessed';
import { escapeContent } from '../StatusView.js';

const MIN_WIDTH = 40;
const MAX_WIDTH = 72;

/**
 * Shorten a prompt from the left, keeping the trailing question mark and
 * as much of the path before it as fits.
 */
export function fitMessage(message: string, maxLength: number): string {
  if (message.length <= maxLength) return message;
  if (maxLength <= 3) return message.slice(-maxLength);
  return '...' + message.slice(-(maxLength - 3));
}

/**
 * Yes/no dialog shown before a discard. Settles exactly once: `y` answers
 * true, `n`, `q` or Esc answer false, and so does the box being destroyed
 * from outside (screen teardown).
 */
export class DiscardConfirm {
  private box: Widgets.BoxElement;
  private settled = false;
  readonly answer: Promise<boolean>;
  private resolve: (confirmed: boolean) => void = () => {};

  constructor(
    private screen: Widgets.Screen,
    message: string
  ) {
    const width = Math.min(MAX_WIDTH, Math.max(MIN_WIDTH, message.length + 8), screen.cols);

    this.answer = new Promise((resolve) => {
      this.resolve = resolve;
    });

    this.box = blessed.box({
      parent: screen,
      top: 'center',
      left: 'center',
      width,
      height: 5,
      border: { type: 'line' },
      style: { border: { fg: 'red' } },
      tags: true,
      keys: true,
    });

    this.box.setContent(
      [
        `{bold}${escapeContent(fitMessage(message, width - 4))}{/bold}`,
        '{green-fg}y{/green-fg} discard  {red-fg}n{/red-fg}/Esc keep',
      ].join('\n')
    );

    this.box.key(['y', 'Y'], () => this.settle(true));
    this.box.key(['n', 'N', 'q', 'escape'], () => this.settle(false));
    this.box.on('destroy', () => this.settle(false));

    this.box.focus();
    screen.render();
  }

  private settle(confirmed: boolean): void {
    if (this.settled) return;
    this.settled = true;
    this.box.destroy();
    this.screen.render();
    this.resolve(confirmed);
  }
}
