/**
 * @fileoverview 입자 및 시드 패턴 타입 정의
 */

import { cycleValue } from './settings';

/**
 * 부착된 입자 하나의 메타데이터 (기록 후 불변)
 */
export interface ParticleData {
  age: number;            // 부착 순서 (0부터, 시드는 모두 0)
  distance: number;       // 부착 시점의 중심 거리
  direction: number;      // 접근 방향 (라디안)
  neighborCount: number;  // 부착 시점의 이웃 수
}

// 초기 구조물 형태
export const SeedPattern = {
  POINT: 'Point',
  LINE: 'Line',
  CROSS: 'Cross',
  CIRCLE: 'Circle',
  RING: 'Ring',
  BLOCK: 'Block',
  NOISE_PATCH: 'NoisePatch',
  SCATTER: 'Scatter',
  MULTI_POINT: 'MultiPoint',
  STARBURST: 'Starburst',
} as const;

export type SeedPatternType = typeof SeedPattern[keyof typeof SeedPattern];

export const SEED_PATTERN_ORDER: readonly SeedPatternType[] = Object.values(SeedPattern);

export const SEED_PATTERN_LABELS: Record<SeedPatternType, string> = {
  Point: 'Point',
  Line: 'Line',
  Cross: 'Cross',
  Circle: 'Circle',
  Ring: 'Ring',
  Block: 'Block',
  NoisePatch: 'Noise Patch',
  Scatter: 'Scatter',
  MultiPoint: 'Multi-Point',
  Starburst: 'Starburst',
};

export function nextSeedPattern(pattern: SeedPatternType): SeedPatternType {
  return cycleValue(SEED_PATTERN_ORDER, pattern, 1);
}

export function prevSeedPattern(pattern: SeedPatternType): SeedPatternType {
  return cycleValue(SEED_PATTERN_ORDER, pattern, -1);
}

/**
 * CLI 이름 → 시드 패턴 (모르는 이름은 Point)
 */
export function parseSeedPattern(name: string): SeedPatternType {
  switch (name.toLowerCase()) {
    case 'line':
      return SeedPattern.LINE;
    case 'cross':
      return SeedPattern.CROSS;
    case 'circle':
      return SeedPattern.CIRCLE;
    case 'ring':
      return SeedPattern.RING;
    case 'block':
    case 'filled':
      return SeedPattern.BLOCK;
    case 'noise':
    case 'noise-patch':
      return SeedPattern.NOISE_PATCH;
    case 'scatter':
      return SeedPattern.SCATTER;
    case 'multipoint':
    case 'multi-point':
      return SeedPattern.MULTI_POINT;
    case 'starburst':
    case 'spokes':
    case 'star':
      return SeedPattern.STARBURST;
    default:
      return SeedPattern.POINT;
  }
}
