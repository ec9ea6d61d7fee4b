import { describe, expect, it, vi } from 'vitest';
import { SeedPattern } from '../types/particle';
import { handleKey, ShortcutActions } from './shortcuts';

function mockActions() {
  return {
    togglePause: vi.fn(),
    reset: vi.fn(),
    cycleSeed: vi.fn(),
    selectSeed: vi.fn(),
    cycleColorScheme: vi.fn(),
    cycleColorMode: vi.fn(),
    toggleColorByAge: vi.fn(),
    toggleInvert: vi.fn(),
    cycleNeighborhood: vi.fn(),
    cycleBoundary: vi.fn(),
    cycleSpawnMode: vi.fn(),
    adjustHighlight: vi.fn(),
    adjustSpeed: vi.fn(),
    exportConfig: vi.fn(),
    quit: vi.fn(),
  } satisfies ShortcutActions;
}

describe('handleKey', () => {
  it('toggles pause on space', () => {
    const actions = mockActions();
    expect(handleKey(' ', { name: 'space' }, actions)).toBe(true);
    expect(actions.togglePause).toHaveBeenCalledTimes(1);
  });

  it('selects seeds by digit', () => {
    const actions = mockActions();
    handleKey('3', { name: '3' }, actions);
    handleKey('0', { name: '0' }, actions);
    expect(actions.selectSeed.mock.calls).toEqual([[SeedPattern.CROSS], [SeedPattern.SCATTER]]);
  });

  it('quits on q and Ctrl+C', () => {
    const actions = mockActions();
    handleKey('q', { name: 'q' }, actions);
    handleKey('\u0003', { name: 'c', ctrl: true }, actions);
    expect(actions.quit).toHaveBeenCalledTimes(2);
    expect(actions.cycleColorScheme).not.toHaveBeenCalled();
  });

  it('maps letters case-insensitively', () => {
    const actions = mockActions();
    handleKey('N', { name: 'n', shift: true }, actions);
    handleKey('p', { name: 'p' }, actions);
    handleKey('c', { name: 'c' }, actions);
    handleKey('e', { name: 'e' }, actions);
    expect(actions.cycleSeed.mock.calls).toEqual([[1], [-1]]);
    expect(actions.cycleColorScheme).toHaveBeenCalledTimes(1);
    expect(actions.exportConfig).toHaveBeenCalledTimes(1);
  });

  it('adjusts speed with +/- and their unshifted keys', () => {
    const actions = mockActions();
    for (const ch of ['+', '=', '-', '_']) handleKey(ch, undefined, actions);
    expect(actions.adjustSpeed.mock.calls).toEqual([[1], [1], [-1], [-1]]);
  });

  it('ignores unmapped keys', () => {
    const actions = mockActions();
    expect(handleKey('x', { name: 'x' }, actions)).toBe(false);
    expect(handleKey(undefined, { name: 'up' }, actions)).toBe(false);
  });
});
