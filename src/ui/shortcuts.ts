/**
 * @fileoverview 키보드 단축키 모듈
 * Space: 재생/일시정지 토글
 * R: 리셋, N/P: 다음/이전 시드, 1-0: 시드 직접 선택
 * C: 색 구성표, M: 색 모드, +/-: 속도, E: 설정 내보내기
 * Q, Ctrl+C: 종료
 */

import { emitKeypressEvents, Key } from 'node:readline';
import { SeedPattern, SeedPatternType } from '../types/particle';

export interface ShortcutActions {
  togglePause(): void;
  reset(): void;
  cycleSeed(direction: 1 | -1): void;
  selectSeed(pattern: SeedPatternType): void;
  cycleColorScheme(): void;
  cycleColorMode(): void;
  toggleColorByAge(): void;
  toggleInvert(): void;
  cycleNeighborhood(): void;
  cycleBoundary(): void;
  cycleSpawnMode(): void;
  adjustHighlight(delta: number): void;
  adjustSpeed(delta: number): void;
  exportConfig(): void;
  quit(): void;
}

export interface Shortcuts {
  destroy(): void;
}

// 숫자키 → 시드 패턴
export const DIGIT_SEEDS: Partial<Record<string, SeedPatternType>> = {
  '1': SeedPattern.POINT,
  '2': SeedPattern.LINE,
  '3': SeedPattern.CROSS,
  '4': SeedPattern.CIRCLE,
  '5': SeedPattern.RING,
  '6': SeedPattern.BLOCK,
  '7': SeedPattern.MULTI_POINT,
  '8': SeedPattern.STARBURST,
  '9': SeedPattern.NOISE_PATCH,
  '0': SeedPattern.SCATTER,
};

/**
 * 키 하나 처리. 처리했으면 true
 */
export function handleKey(str: string | undefined, key: Key | undefined, actions: ShortcutActions): boolean {
  if (key?.ctrl && key.name === 'c') {
    actions.quit();
    return true;
  }
  if (key?.ctrl || key?.meta) return false;

  if (key?.name === 'space' || str === ' ') {
    actions.togglePause();
    return true;
  }

  const ch = str?.toLowerCase();
  if (ch === undefined) return false;

  const seed = DIGIT_SEEDS[ch];
  if (seed !== undefined) {
    actions.selectSeed(seed);
    return true;
  }

  switch (ch) {
    case 'q': actions.quit(); break;
    case 'r': actions.reset(); break;
    case 'n': actions.cycleSeed(1); break;
    case 'p': actions.cycleSeed(-1); break;
    case 'c': actions.cycleColorScheme(); break;
    case 'm': actions.cycleColorMode(); break;
    case 'a': actions.toggleColorByAge(); break;
    case 'i': actions.toggleInvert(); break;
    case 'h': actions.cycleNeighborhood(); break;
    case 'b': actions.cycleBoundary(); break;
    case 's': actions.cycleSpawnMode(); break;
    case '[': actions.adjustHighlight(-5); break;
    case ']': actions.adjustHighlight(5); break;
    case '+':
    case '=': actions.adjustSpeed(1); break;
    case '-':
    case '_': actions.adjustSpeed(-1); break;
    case 'e': actions.exportConfig(); break;
    default:
      return false;
  }
  return true;
}

export function createShortcuts(
  input: NodeJS.ReadStream,
  actions: ShortcutActions
): Shortcuts {
  function onKeypress(str: string | undefined, key: Key | undefined): void {
    handleKey(str, key, actions);
  }

  emitKeypressEvents(input);
  if (input.isTTY) input.setRawMode(true);
  input.on('keypress', onKeypress);
  input.resume();

  function destroy(): void {
    input.off('keypress', onKeypress);
    if (input.isTTY) input.setRawMode(false);
    input.pause();
  }

  return { destroy };
}
