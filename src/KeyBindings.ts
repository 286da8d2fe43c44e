import type { Widgets } from 'blessed';
import type { KeyMappings, StatusAction } from './keymap.js';
import { STATUS_ACTIONS } from './keymap.js';
import * as logger from './utils/logger.js';

/**
 * Actions that keyboard bindings can trigger.
 * App implements this interface and passes itself.
 */
export interface KeyBindingActions {
  exit(): void;
  cursorDown(): void;
  cursorUp(): void;
  pageDown(): void;
  pageUp(): void;
  cursorTop(): void;
  cursorBottom(): void;
  toggleVisual(): void;
  cancelVisual(): void;
  runAction(action: StatusAction): void;
}

/**
 * Read-only context needed by keyboard handlers to make decisions.
 */
export interface KeyBindingContext {
  hasActiveModal(): boolean;
  mappings: KeyMappings;
}

type MotionKey = Exclude<keyof KeyBindingActions, 'runAction' | 'exit'>;

/** Cursor keys that are always bound unless a mapping takes the key. */
const MOTION_KEYS: [string[], MotionKey][] = [
  [['j', 'down'], 'cursorDown'],
  [['k', 'up'], 'cursorUp'],
  [['pagedown', 'C-f'], 'pageDown'],
  [['pageup', 'C-b'], 'pageUp'],
  [['g', 'home'], 'cursorTop'],
  [['S-g', 'end'], 'cursorBottom'],
  [['v', 'S-v'], 'toggleVisual'],
  [['escape'], 'cancelVisual'],
];

/**
 * Key to action table for the configured mappings. A key claimed by more
 * than one action keeps the first and logs the rest.
 */
export function buildKeyTable(mappings: KeyMappings): Map<string, StatusAction> {
  const table = new Map<string, StatusAction>();
  for (const action of STATUS_ACTIONS) {
    for (const key of mappings[action]) {
      const existing = table.get(key);
      if (existing) {
        logger.warn(`Key ${key} is mapped to both ${existing} and ${action}; keeping ${existing}`);
        continue;
      }
      table.set(key, action);
    }
  }
  return table;
}

/**
 * Register all keyboard bindings on the blessed screen.
 */
export function setupKeyBindings(
  screen: Widgets.Screen,
  actions: KeyBindingActions,
  ctx: KeyBindingContext
): void {
  screen.key(['C-c'], () => {
    actions.exit();
  });

  const table = buildKeyTable(ctx.mappings);

  for (const [key, action] of table) {
    screen.key([key], () => {
      if (ctx.hasActiveModal()) return;
      actions.runAction(action);
    });
  }

  for (const [keys, motion] of MOTION_KEYS) {
    const free = keys.filter((k) => !table.has(k));
    if (free.length === 0) continue;
    screen.key(free, () => {
      if (ctx.hasActiveModal()) return;
      actions[motion]();
    });
  }
}
