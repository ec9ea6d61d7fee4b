/**
 * @fileoverview 점자(Braille) 렌더러
 * 글리프 하나 = 2x4 점. 그리드를 최근접 샘플링해 색이 있는 글리프 셀 목록을 만든다.
 *
 * 점 위치와 비트:
 *   (0,0)=0x01  (1,0)=0x08
 *   (0,1)=0x02  (1,1)=0x10
 *   (0,2)=0x04  (1,2)=0x20
 *   (0,3)=0x40  (1,3)=0x80
 */

import { ParticleGrid } from '../core/grid';
import { RenderSource } from '../core/simulation';
import { ColorMode, ColorModeType } from '../types/settings';
import { RGB, WHITE, mapFromLut } from './color';

export const BRAILLE_BASE = 0x2800;

// [열][행] → 비트
export const BRAILLE_DOTS: readonly (readonly number[])[] = [
  [0x01, 0x02, 0x04, 0x40],
  [0x08, 0x10, 0x20, 0x80],
];

export const DOTS_X = 2;
export const DOTS_Y = 4;

// 최근 입자 강조색
export const HIGHLIGHT_COLOR: RGB = WHITE;

export interface BrailleCell {
  x: number;
  y: number;
  pattern: number;   // 1..255
  char: string;
  color: RGB;
}

export interface RenderOptions {
  colorMode: ColorModeType;
  highlightRecent: number;
  invertColors: boolean;
  colorByAge: boolean;   // false면 모두 흰색
}

export function brailleChar(pattern: number): string {
  return String.fromCharCode(BRAILLE_BASE + pattern);
}

/**
 * 캔버스(글리프 단위)에 맞춘 시뮬레이션 그리드 크기. 점 하나 ≈ 셀 하나.
 */
export function calculateSimulationSize(canvasWidth: number, canvasHeight: number): [number, number] {
  return [Math.max(canvasWidth * DOTS_X, 64), Math.max(canvasHeight * DOTS_Y, 64)];
}

/**
 * 그리드를 읽기만 한다. 그리드가 캔버스 해상도보다 크면 고립된 입자는 건너뛸 수 있다.
 */
export function renderToBraille(
  source: RenderSource,
  canvasWidth: number,
  canvasHeight: number,
  lut: readonly RGB[],
  options: RenderOptions
): BrailleCell[] {
  const { grid, numParticles } = source;
  const { width: simWidth, height: simHeight, occupied } = grid;

  const scaleX = simWidth / (canvasWidth * DOTS_X);
  const scaleY = simHeight / (canvasHeight * DOTS_Y);

  const invNumParticles = 1.0 / Math.max(numParticles, 1);
  const maxRadius = Math.max(grid.maxRadius, 1.0);
  const particlesStuck = grid.particlesStuck;
  const { colorMode, highlightRecent, invertColors, colorByAge } = options;

  const cells: BrailleCell[] = [];

  for (let cy = 0; cy < canvasHeight; cy++) {
    for (let cx = 0; cx < canvasWidth; cx++) {
      let pattern = 0;
      let totalValue = 0;
      let dotCount = 0;
      let isRecent = false;

      for (let dx = 0; dx < DOTS_X; dx++) {
        const simX = Math.floor((cx * DOTS_X + dx) * scaleX);
        if (simX >= simWidth) continue;

        for (let dy = 0; dy < DOTS_Y; dy++) {
          const simY = Math.floor((cy * DOTS_Y + dy) * scaleY);
          if (simY >= simHeight) continue;

          const idx = simY * simWidth + simX;
          if (occupied[idx] === 0) continue;

          pattern |= BRAILLE_DOTS[dx][dy];
          dotCount++;

          const age = grid.age[idx];
          if (highlightRecent > 0 && age + highlightRecent >= particlesStuck) {
            isRecent = true;
          }

          totalValue += sampleValue(colorMode, grid, idx, invNumParticles, maxRadius);
        }
      }

      if (pattern === 0) continue;

      let color: RGB;
      if (isRecent) {
        color = HIGHLIGHT_COLOR;
      } else if (colorByAge) {
        const avg = totalValue / dotCount;
        color = mapFromLut(lut, invertColors ? 1.0 - avg : avg);
      } else {
        color = WHITE;
      }

      cells.push({ x: cx, y: cy, pattern, char: brailleChar(pattern), color });
    }
  }

  return cells;
}

function sampleValue(
  mode: ColorModeType,
  grid: ParticleGrid,
  idx: number,
  invNumParticles: number,
  maxRadius: number
): number {
  switch (mode) {
    case ColorMode.AGE:
      return grid.age[idx] * invNumParticles;
    case ColorMode.DISTANCE:
      return grid.distance[idx] / maxRadius;
    case ColorMode.DENSITY:
      return grid.neighborCount[idx] / 8.0;
    case ColorMode.DIRECTION:
      // -π..π → 0..1
      return (grid.direction[idx] + Math.PI) / (Math.PI * 2);
  }
}
