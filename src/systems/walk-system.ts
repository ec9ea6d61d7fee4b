/**
 * @fileoverview 보행 시스템
 * 입자 하나를 스폰 → 랜덤 워크 → 부착 또는 폐기. 호출당 그리드 변경은 최대 1셀.
 */

import { ParticleGrid } from '../core/grid';
import { Random } from '../core/random';
import { BoundaryBehavior, SimulationSettings } from '../types/settings';
import { countNeighbors } from './neighborhood';
import { effectiveStickiness } from './stickiness';
import {
  BOUNDARY_MARGIN,
  applyBoundary,
  applyWalkBias,
  isOnAbsorbingEdge,
  spawnParticle,
} from './walk-policy';

// 한 번의 보행 결과
export const WalkOutcome = {
  STUCK: 'stuck',          // 부착 성공
  ESCAPED: 'escaped',      // 탈출 반경 초과
  ABSORBED: 'absorbed',    // Absorb 경계에 닿음
  TIMED_OUT: 'timedOut',   // 반복 한도 소진
} as const;

export type WalkOutcomeType = typeof WalkOutcome[keyof typeof WalkOutcome];

export interface WalkSystem {
  walk(grid: ParticleGrid, settings: SimulationSettings, baseStickiness: number): WalkOutcomeType;
}

export function createWalkSystem(random: Random): WalkSystem {
  function walk(
    grid: ParticleGrid,
    settings: SimulationSettings,
    baseStickiness: number
  ): WalkOutcomeType {
    const { width, height } = grid;
    const centerX = width / 2;
    const centerY = height / 2;

    // 구조물 바깥에서 스폰
    const spawnRadius = Math.max(grid.maxRadius + settings.spawnRadiusOffset, settings.minSpawnRadius);
    const escapeDist = spawnRadius * settings.escapeMultiplier;
    const escapeDistSq = escapeDist * escapeDist;

    const xMax = width - BOUNDARY_MARGIN - 1;
    const yMax = height - BOUNDARY_MARGIN - 1;
    const absorb = settings.boundaryBehavior === BoundaryBehavior.ABSORB;

    let { x, y } = spawnParticle(
      settings.spawnMode,
      { width, height, centerX, centerY, spawnRadius },
      random
    );

    // 접근 방향 (색상 모드용)
    let lastDx = x - centerX;
    let lastDy = y - centerY;

    for (let i = 0; i < settings.maxWalkIterations; i++) {
      const dx = x - centerX;
      const dy = y - centerY;
      const distSq = dx * dx + dy * dy;

      if (distSq > escapeDistSq) {
        return WalkOutcome.ESCAPED;
      }

      const ix = Math.trunc(x);
      const iy = Math.trunc(y);

      if (ix > 0 && ix < width - 1 && iy > 0 && iy < height - 1) {
        const { count, hasAny } = countNeighbors(grid, ix, iy, settings.neighborhood);

        if (hasAny && count >= settings.multiContactMin) {
          const distance = Math.sqrt(distSq);
          const threshold = effectiveStickiness(settings, count, distance, baseStickiness);

          // 셀이 이미 차 있으면 부착하지 않고 계속 걷는다
          if (random.next() < threshold) {
            const placed = grid.place(ix, iy, {
              age: grid.particlesStuck,
              distance,
              direction: Math.atan2(lastDy, lastDx),
              neighborCount: count,
            });
            if (placed) {
              grid.raiseMaxRadius(distance);
              return WalkOutcome.STUCK;
            }
          }
        }
      }

      lastDx = dx;
      lastDy = dy;

      const baseAngle = random.range(0, Math.PI * 2);
      const angle = applyWalkBias(settings, baseAngle, x, y, centerX, centerY);
      const stepLength = settings.walkStepSize;

      ({ x, y } = applyBoundary(
        settings.boundaryBehavior,
        x + stepLength * Math.cos(angle),
        y + stepLength * Math.sin(angle),
        xMax,
        yMax
      ));

      // Absorb: 가장자리에 닿으면 재스폰
      if (absorb && isOnAbsorbingEdge(x, y, xMax, yMax)) {
        return WalkOutcome.ABSORBED;
      }
    }

    return WalkOutcome.TIMED_OUT;
  }

  return { walk };
}
