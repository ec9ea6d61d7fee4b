/**
 * @fileoverview 앱 설정 타입 정의 (내보내기/가져오기 단위)
 */

import { ColorSchemeType, DEFAULT_COLOR_SCHEME } from '../render/color';
import { SeedPattern, SeedPatternType } from './particle';
import { SimulationSettings, createDefaultSettings } from './settings';

export const CONFIG_VERSION = 1;

export interface AppConfig {
  version: number;
  settings: SimulationSettings;
  seedPattern: SeedPatternType;
  stickiness: number;      // 기본 부착률 (시뮬레이션 단위)
  numParticles: number;

  // 앱 단위
  colorScheme: ColorSchemeType;
  stepsPerFrame: number;
  colorByAge: boolean;
}

export const MIN_STEPS_PER_FRAME = 1;
export const MAX_STEPS_PER_FRAME = 50;

export function createDefaultAppConfig(): AppConfig {
  return {
    version: CONFIG_VERSION,
    settings: createDefaultSettings(),
    seedPattern: SeedPattern.POINT,
    stickiness: 1.0,
    numParticles: 5000,
    colorScheme: DEFAULT_COLOR_SCHEME,
    stepsPerFrame: 5,
    colorByAge: true,
  };
}

/**
 * I/O 결과. 실패는 사람이 읽을 문자열로 전달한다.
 */
export type Result<T> = { ok: true; value: T } | { ok: false; error: string };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T>(error: string): Result<T> {
  return { ok: false, error };
}
