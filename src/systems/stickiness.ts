/**
 * @fileoverview 부착 확률 모델
 * 가지 끝(이웃 적음)과 옆면(이웃 많음)을 보간하고 중심 거리 그래디언트를 곱한다.
 */

import { SimulationSettings, clamp } from '../types/settings';
import { maxNeighbors } from './neighborhood';

export function effectiveStickiness(
  settings: SimulationSettings,
  neighborCount: number,
  distanceFromCenter: number,
  baseStickiness: number
): number {
  const ratio = neighborCount / maxNeighbors(settings.neighborhood);

  const directional =
    settings.tipStickiness * (1.0 - ratio) + settings.sideStickiness * ratio;

  // 100 단위 거리당 stickinessGradient 만큼 변화
  const gradientFactor = 1.0 + (distanceFromCenter / 100.0) * settings.stickinessGradient;

  return clamp(baseStickiness * directional * gradientFactor, 0.0, 1.0);
}
