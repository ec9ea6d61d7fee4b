/**
 * @fileoverview 색상 스킴과 룩업 테이블
 */

import { cycleValue, clamp } from '../types/settings';

export interface RGB {
  r: number;
  g: number;
  b: number;
}

export const ColorScheme = {
  ICE: 'Ice',
  FIRE: 'Fire',
  PLASMA: 'Plasma',
  VIRIDIS: 'Viridis',
  RAINBOW: 'Rainbow',
  GRAYSCALE: 'Grayscale',
  NEON: 'Neon',
} as const;

export type ColorSchemeType = typeof ColorScheme[keyof typeof ColorScheme];

export const COLOR_SCHEME_ORDER: readonly ColorSchemeType[] = Object.values(ColorScheme);

export const DEFAULT_COLOR_SCHEME: ColorSchemeType = ColorScheme.ICE;

export const LUT_SIZE = 256;

export const WHITE: RGB = { r: 255, g: 255, b: 255 };

// 그래디언트 정지점 (t = 0 → 1 균등 간격)
const SCHEME_STOPS: Record<ColorSchemeType, readonly string[]> = {
  [ColorScheme.ICE]: ['#0b1d51', '#1f6fb2', '#67c8e6', '#e8fbff'],
  [ColorScheme.FIRE]: ['#3b0000', '#b31d00', '#ff8c00', '#fff5a0'],
  [ColorScheme.PLASMA]: ['#0d0887', '#7e03a8', '#cc4778', '#f89540', '#f0f921'],
  [ColorScheme.VIRIDIS]: ['#440154', '#3b528b', '#21918c', '#5ec962', '#fde725'],
  [ColorScheme.RAINBOW]: ['#ff0000', '#ffa500', '#ffff00', '#00c000', '#0080ff', '#8000ff'],
  [ColorScheme.GRAYSCALE]: ['#303030', '#ffffff'],
  [ColorScheme.NEON]: ['#ff00ff', '#00ffff', '#39ff14'],
};

export function hexToRgb(hex: string): RGB {
  const result = /^#?([a-f\d]{2})([a-f\d]{2})([a-f\d]{2})$/i.exec(hex);
  return result ? {
    r: parseInt(result[1], 16),
    g: parseInt(result[2], 16),
    b: parseInt(result[3], 16),
  } : { r: 0, g: 0, b: 0 };
}

export function lerpColor(c1: RGB, c2: RGB, t: number): RGB {
  return {
    r: Math.round(c1.r + (c2.r - c1.r) * t),
    g: Math.round(c1.g + (c2.g - c1.g) * t),
    b: Math.round(c1.b + (c2.b - c1.b) * t),
  };
}

export function nextColorScheme(scheme: ColorSchemeType): ColorSchemeType {
  return cycleValue(COLOR_SCHEME_ORDER, scheme, 1);
}

export function prevColorScheme(scheme: ColorSchemeType): ColorSchemeType {
  return cycleValue(COLOR_SCHEME_ORDER, scheme, -1);
}

/**
 * 스킴의 그래디언트를 LUT_SIZE 단계로 이산화
 */
export function buildLut(scheme: ColorSchemeType): readonly RGB[] {
  const stops = SCHEME_STOPS[scheme].map(hexToRgb);
  const segments = stops.length - 1;
  const lut: RGB[] = [];

  for (let i = 0; i < LUT_SIZE; i++) {
    const t = i / (LUT_SIZE - 1);
    const pos = t * segments;
    const seg = Math.min(Math.floor(pos), segments - 1);
    lut.push(lerpColor(stops[seg], stops[seg + 1], pos - seg));
  }

  return lut;
}

export function mapFromLut(lut: readonly RGB[], t: number): RGB {
  const index = Math.round(clamp(t, 0, 1) * (lut.length - 1));
  return lut[index];
}
