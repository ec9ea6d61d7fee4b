/**
 * @fileoverview 보행 정책: 스폰 위치, 경계 처리, 방향 편향
 * 그리드 상태와 무관한 순수 함수들
 */

import { Random } from '../core/random';
import {
  BoundaryBehavior,
  BoundaryBehaviorType,
  SimulationSettings,
  SpawnMode,
  SpawnModeType,
  clamp,
} from '../types/settings';

export const BOUNDARY_MARGIN = 1.0;

// Random 스폰 모드의 최대 재추첨 횟수 (반경이 그리드보다 크면 조건을 만족할 수 없음)
export const MAX_RANDOM_SPAWN_ATTEMPTS = 1000;

export interface Point {
  x: number;
  y: number;
}

export interface SpawnArea {
  width: number;
  height: number;
  centerX: number;
  centerY: number;
  spawnRadius: number;
}

export function spawnParticle(mode: SpawnModeType, area: SpawnArea, random: Random): Point {
  const { width: w, height: h, centerX, centerY, spawnRadius } = area;

  switch (mode) {
    case SpawnMode.CIRCLE: {
      const angle = random.range(0, Math.PI * 2);
      return {
        x: clamp(centerX + spawnRadius * Math.cos(angle), 1.0, w - 2.0),
        y: clamp(centerY + spawnRadius * Math.sin(angle), 1.0, h - 2.0),
      };
    }
    case SpawnMode.EDGES: {
      switch (random.int(0, 3)) {
        case 0:
          return { x: random.range(1.0, w - 1.0), y: 1.0 };
        case 1:
          return { x: random.range(1.0, w - 1.0), y: h - 2.0 };
        case 2:
          return { x: 1.0, y: random.range(1.0, h - 1.0) };
        default:
          return { x: w - 2.0, y: random.range(1.0, h - 1.0) };
      }
    }
    case SpawnMode.CORNERS:
      return randomCorner(w, h, random);
    case SpawnMode.RANDOM: {
      const minDistSq = spawnRadius * spawnRadius * 0.5;
      for (let attempt = 0; attempt < MAX_RANDOM_SPAWN_ATTEMPTS; attempt++) {
        const x = random.range(1.0, w - 1.0);
        const y = random.range(1.0, h - 1.0);
        const dx = x - centerX;
        const dy = y - centerY;
        if (dx * dx + dy * dy > minDistSq) {
          return { x, y };
        }
      }
      return randomCorner(w, h, random);
    }
    case SpawnMode.TOP:
      return { x: random.range(1.0, w - 1.0), y: 1.0 };
    case SpawnMode.BOTTOM:
      return { x: random.range(1.0, w - 1.0), y: h - 2.0 };
    case SpawnMode.LEFT:
      return { x: 1.0, y: random.range(1.0, h - 1.0) };
    case SpawnMode.RIGHT:
      return { x: w - 2.0, y: random.range(1.0, h - 1.0) };
  }
}

function randomCorner(w: number, h: number, random: Random): Point {
  switch (random.int(0, 3)) {
    case 0:
      return { x: 1.0, y: 1.0 };
    case 1:
      return { x: w - 2.0, y: 1.0 };
    case 2:
      return { x: 1.0, y: h - 2.0 };
    default:
      return { x: w - 2.0, y: h - 2.0 };
  }
}

/**
 * 이동 후 위치에 경계 규칙 적용
 * Stick/Absorb는 여기서는 Clamp와 같다. Absorb의 재스폰은 보행 루프가 처리한다.
 */
export function applyBoundary(
  behavior: BoundaryBehaviorType,
  x: number,
  y: number,
  xMax: number,
  yMax: number
): Point {
  switch (behavior) {
    case BoundaryBehavior.WRAP: {
      const width = xMax - BOUNDARY_MARGIN;
      const height = yMax - BOUNDARY_MARGIN;
      if (x < BOUNDARY_MARGIN) x += width;
      else if (x > xMax) x -= width;
      if (y < BOUNDARY_MARGIN) y += height;
      else if (y > yMax) y -= height;
      return { x, y };
    }
    case BoundaryBehavior.BOUNCE: {
      if (x < BOUNDARY_MARGIN) x = BOUNDARY_MARGIN + (BOUNDARY_MARGIN - x);
      else if (x > xMax) x = xMax - (x - xMax);
      if (y < BOUNDARY_MARGIN) y = BOUNDARY_MARGIN + (BOUNDARY_MARGIN - y);
      else if (y > yMax) y = yMax - (y - yMax);
      return { x, y };
    }
    case BoundaryBehavior.CLAMP:
    case BoundaryBehavior.STICK:
    case BoundaryBehavior.ABSORB:
      return {
        x: clamp(x, BOUNDARY_MARGIN, xMax),
        y: clamp(y, BOUNDARY_MARGIN, yMax),
      };
  }
}

export function isOnAbsorbingEdge(x: number, y: number, xMax: number, yMax: number): boolean {
  return x <= BOUNDARY_MARGIN || x >= xMax || y <= BOUNDARY_MARGIN || y >= yMax;
}

/**
 * 균등 추첨한 각도에 방향 편향과 방사 편향을 더한다 (대체가 아닌 보정)
 */
export function applyWalkBias(
  settings: SimulationSettings,
  baseAngle: number,
  x: number,
  y: number,
  centerX: number,
  centerY: number
): number {
  let angle = baseAngle;

  if (settings.walkBiasStrength > 0) {
    const biasAngleRad = (settings.walkBiasAngle * Math.PI) / 180;
    angle += settings.walkBiasStrength * Math.sin(biasAngleRad - baseAngle);
  }

  if (Math.abs(settings.radialBias) > 0.001) {
    const radialAngle = Math.atan2(y - centerY, x - centerX);
    // 양수 = 중심 쪽, 음수 = 바깥 쪽
    const targetAngle = settings.radialBias > 0 ? radialAngle + Math.PI : radialAngle;
    angle += Math.abs(settings.radialBias) * Math.sin(targetAngle - angle);
  }

  return angle;
}
