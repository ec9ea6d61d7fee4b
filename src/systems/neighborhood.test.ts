import { describe, expect, it } from 'vitest';
import { createParticleGrid } from '../core/grid';
import { Neighborhood } from '../types/settings';
import { NEIGHBOR_OFFSETS, countNeighbors, maxNeighbors } from './neighborhood';

const seed = { age: 0, distance: 0, direction: 0, neighborCount: 0 };

describe('neighborhood', () => {
  it('has 4, 8 and 24 offsets', () => {
    expect(maxNeighbors(Neighborhood.VON_NEUMANN)).toBe(4);
    expect(maxNeighbors(Neighborhood.MOORE)).toBe(8);
    expect(maxNeighbors(Neighborhood.EXTENDED)).toBe(24);
  });

  it('never includes the center offset', () => {
    for (const offsets of Object.values(NEIGHBOR_OFFSETS)) {
      expect(offsets.some(([dx, dy]) => dx === 0 && dy === 0)).toBe(false);
    }
  });

  it('counts occupied cells per neighborhood', () => {
    const grid = createParticleGrid(10, 10);
    grid.place(5, 4, seed);   // 위
    grid.place(6, 6, seed);   // 대각
    grid.place(7, 5, seed);   // 거리 2

    expect(countNeighbors(grid, 5, 5, Neighborhood.VON_NEUMANN)).toEqual({ count: 1, hasAny: true });
    expect(countNeighbors(grid, 5, 5, Neighborhood.MOORE)).toEqual({ count: 2, hasAny: true });
    expect(countNeighbors(grid, 5, 5, Neighborhood.EXTENDED)).toEqual({ count: 3, hasAny: true });
  });

  it('ignores offsets outside the grid', () => {
    const grid = createParticleGrid(4, 4);
    expect(countNeighbors(grid, 0, 0, Neighborhood.EXTENDED)).toEqual({ count: 0, hasAny: false });
  });
});
