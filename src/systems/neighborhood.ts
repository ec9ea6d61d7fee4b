/**
 * @fileoverview 이웃 판정 정책
 */

import { ParticleGrid } from '../core/grid';
import { Neighborhood, NeighborhoodType } from '../types/settings';

export type Offset = readonly [number, number];

const VON_NEUMANN_OFFSETS: readonly Offset[] = [
  [-1, 0], [1, 0], [0, -1], [0, 1],
];

const MOORE_OFFSETS: readonly Offset[] = [
  [-1, -1], [0, -1], [1, -1],
  [-1, 0],           [1, 0],
  [-1, 1],  [0, 1],  [1, 1],
];

// 5x5 블록에서 중심 제외
const EXTENDED_OFFSETS: readonly Offset[] = [
  [-2, -2], [-1, -2], [0, -2], [1, -2], [2, -2],
  [-2, -1], [-1, -1], [0, -1], [1, -1], [2, -1],
  [-2, 0],  [-1, 0],           [1, 0],  [2, 0],
  [-2, 1],  [-1, 1],  [0, 1],  [1, 1],  [2, 1],
  [-2, 2],  [-1, 2],  [0, 2],  [1, 2],  [2, 2],
];

export const NEIGHBOR_OFFSETS: Record<NeighborhoodType, readonly Offset[]> = {
  [Neighborhood.VON_NEUMANN]: VON_NEUMANN_OFFSETS,
  [Neighborhood.MOORE]: MOORE_OFFSETS,
  [Neighborhood.EXTENDED]: EXTENDED_OFFSETS,
};

export function maxNeighbors(neighborhood: NeighborhoodType): number {
  return NEIGHBOR_OFFSETS[neighborhood].length;
}

export interface NeighborCount {
  count: number;
  hasAny: boolean;
}

export function countNeighbors(
  grid: ParticleGrid,
  x: number,
  y: number,
  neighborhood: NeighborhoodType
): NeighborCount {
  const { width, height, occupied } = grid;
  let count = 0;

  for (const [dx, dy] of NEIGHBOR_OFFSETS[neighborhood]) {
    const nx = x + dx;
    const ny = y + dy;
    if (nx >= 0 && nx < width && ny >= 0 && ny < height && occupied[ny * width + nx] === 1) {
      count++;
    }
  }

  return { count, hasAny: count > 0 };
}
