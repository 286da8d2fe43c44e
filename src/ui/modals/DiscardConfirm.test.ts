import { describe, it, expect } from 'vitest';
import { fitMessage } from './DiscardConfirm.js';

describe('fitMessage', () => {
  it('keeps a prompt that fits', () => {
    expect(fitMessage('Discard hunk?', 20)).toBe('Discard hunk?');
  });

  it('cuts from the left so the file name stays visible', () => {
    expect(fitMessage('Discard "src/deep/path/file.ts"?', 16)).toBe('...ath/file.ts"?');
  });

  it('drops the ellipsis when there is no room for it', () => {
    expect(fitMessage('Discard?', 3)).toBe('rd?');
  });
});
