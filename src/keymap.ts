/**
 * Status buffer actions and their default keys.
 *
 * Key names use blessed's notation (`S-` shift, `C-` control) so the same
 * strings can be passed straight to `screen.key()`.
 */

export type StatusAction =
  | 'Toggle'
  | 'Stage'
  | 'StageUnstaged'
  | 'StageAll'
  | 'Unstage'
  | 'UnstageStaged'
  | 'Discard'
  | 'Depth1'
  | 'Depth2'
  | 'Depth3'
  | 'Depth4'
  | 'GoToFile'
  | 'GoToNextHunkHeader'
  | 'GoToPreviousHunkHeader'
  | 'RefreshBuffer'
  | 'YankSelected'
  | 'Close';

export type KeyMappings = Record<StatusAction, string[]>;

export const DEFAULT_MAPPINGS: KeyMappings = {
  Toggle: ['tab'],
  Stage: ['s'],
  StageUnstaged: ['S-s'],
  StageAll: ['C-s'],
  Unstage: ['u'],
  UnstageStaged: ['S-u'],
  Discard: ['x'],
  Depth1: ['1'],
  Depth2: ['2'],
  Depth3: ['3'],
  Depth4: ['4'],
  GoToFile: ['enter'],
  GoToNextHunkHeader: ['n'],
  GoToPreviousHunkHeader: ['S-n'],
  RefreshBuffer: ['C-r'],
  YankSelected: ['y'],
  Close: ['q'],
};

export const STATUS_ACTIONS = Object.keys(DEFAULT_MAPPINGS).filter(isStatusAction);

export function isStatusAction(value: string): value is StatusAction {
  return Object.prototype.hasOwnProperty.call(DEFAULT_MAPPINGS, value);
}

const HINT_ACTIONS: [StatusAction, string][] = [
  ['Toggle', 'toggle diff'],
  ['Stage', 'stage'],
  ['Unstage', 'unstage'],
  ['Discard', 'discard'],
  ['RefreshBuffer', 'refresh'],
  ['Close', 'close'],
];

/**
 * Build the hint line shown at the top of the buffer.
 */
export function formatHint(mappings: KeyMappings): string {
  const parts = HINT_ACTIONS.map(([action, label]) => {
    const keys = mappings[action];
    const shown = keys.length > 0 ? keys.join(' ') : '<unmapped>';
    return `[${shown}] ${label}`;
  });
  return `Hint: ${parts.join(' | ')}`;
}
