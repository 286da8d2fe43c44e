import { describe, it, expect } from 'vitest';
import { DEFAULT_MAPPINGS, formatHint, isStatusAction, STATUS_ACTIONS } from './keymap.js';

describe('formatHint', () => {
  it('lists the default keys', () => {
    expect(formatHint(DEFAULT_MAPPINGS)).toBe(
      'Hint: [tab] toggle diff | [s] stage | [u] unstage | [x] discard | [C-r] refresh | [q] close'
    );
  });

  it('joins several keys and marks unmapped actions', () => {
    const mappings = { ...DEFAULT_MAPPINGS, Stage: ['s', 'a'], Discard: [] };
    expect(formatHint(mappings)).toBe(
      'Hint: [tab] toggle diff | [s a] stage | [u] unstage | [<unmapped>] discard | [C-r] refresh | [q] close'
    );
  });
});

describe('isStatusAction', () => {
  it('accepts known actions only', () => {
    expect(isStatusAction('Stage')).toBe(true);
    expect(isStatusAction('Commit')).toBe(false);
    expect(isStatusAction('toString')).toBe(false);
  });

  it('lists every action once', () => {
    expect(STATUS_ACTIONS).toHaveLength(17);
    expect(new Set(STATUS_ACTIONS).size).toBe(17);
  });
});
