import { describe, expect, it } from 'vitest';
import { createParticleGrid } from './grid';

const particle = { age: 3, distance: 2.5, direction: 0.5, neighborCount: 2 };

describe('ParticleGrid', () => {
  it('places into empty cells only', () => {
    const grid = createParticleGrid(8, 4);
    expect(grid.place(2, 1, particle)).toBe(true);
    expect(grid.place(2, 1, particle)).toBe(false);
    expect(grid.particlesStuck).toBe(1);
    expect(grid.occupied[1 * 8 + 2]).toBe(1);
  });

  it('returns particle data for occupied cells', () => {
    const grid = createParticleGrid(8, 4);
    grid.place(5, 3, particle);
    expect(grid.get(5, 3)).toEqual(particle);
    expect(grid.get(4, 3)).toBeUndefined();
  });

  it('treats out-of-range and fractional coordinates as absent', () => {
    const grid = createParticleGrid(8, 4);
    expect(grid.get(-1, 0)).toBeUndefined();
    expect(grid.get(8, 0)).toBeUndefined();
    expect(grid.get(0, 4)).toBeUndefined();
    expect(grid.get(1.5, 1)).toBeUndefined();
    expect(grid.place(8, 0, particle)).toBe(false);
    expect(grid.isOccupied(-1, -1)).toBe(false);
  });

  it('only raises maxRadius', () => {
    const grid = createParticleGrid(8, 8);
    grid.raiseMaxRadius(4);
    grid.raiseMaxRadius(2);
    expect(grid.maxRadius).toBe(4);
  });

  it('clear empties cells and resets counters', () => {
    const grid = createParticleGrid(8, 8);
    grid.place(1, 1, particle);
    grid.setMaxRadius(6);
    grid.clear();
    expect(grid.particlesStuck).toBe(0);
    expect(grid.maxRadius).toBe(1);
    expect(grid.isOccupied(1, 1)).toBe(false);
  });
});
