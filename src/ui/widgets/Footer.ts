import { escapeContent } from '../StatusView.js';

export interface FooterState {
  /** Repository root as shown to the user. */
  root: string;
  visual: boolean;
  refreshing: boolean;
  /** Other open repositories. */
  others: number;
  message: { text: string; kind: 'info' | 'error' } | null;
}

/**
 * Calculate visible length by stripping blessed tags.
 */
function calculateVisibleLength(content: string): number {
  return content.replace(/\{\{|\}\}/g, '_').replace(/\{[^{}]+\}/g, '').length;
}

/**
 * Format footer content as blessed-compatible tagged string: mode and
 * message on the left, repository on the right.
 */
export function formatFooter(state: FooterState, width: number): string {
  const parts: string[] = [];
  if (state.visual) parts.push('{yellow-fg}-- VISUAL --{/yellow-fg}');
  if (state.refreshing) parts.push('{gray-fg}refreshing{/gray-fg}');
  if (state.message) {
    const color = state.message.kind === 'error' ? 'red-fg' : 'green-fg';
    parts.push(`{${color}}${escapeContent(state.message.text)}{/${color}}`);
  }
  const leftContent = parts.join(' ');

  const others = state.others > 0 ? ` {gray-fg}+${state.others}{/gray-fg}` : '';
  const rightContent = `{cyan-fg}${escapeContent(state.root)}{/cyan-fg}${others}`;

  const leftLen = calculateVisibleLength(leftContent);
  const rightLen = calculateVisibleLength(rightContent);
  const padding = Math.max(1, width - leftLen - rightLen);

  return leftContent + ' '.repeat(padding) + rightContent;
}
