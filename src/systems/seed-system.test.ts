import { describe, expect, it } from 'vitest';
import { createParticleGrid, ParticleGrid } from '../core/grid';
import { createRandom, fromSource } from '../core/random';
import { SEED_PATTERN_ORDER, SeedPattern } from '../types/particle';
import { seedGrid } from './seed-system';

function occupiedCount(grid: ParticleGrid): number {
  return grid.occupied.reduce((sum, v) => sum + v, 0);
}

describe('seedGrid', () => {
  it.each(SEED_PATTERN_ORDER)('%s: count matches occupied cells', (pattern) => {
    for (const [w, h] of [[64, 64], [160, 48]]) {
      const grid = createParticleGrid(w, h);
      seedGrid(grid, pattern, createRandom(`seed-${pattern}`));
      expect(grid.particlesStuck).toBeGreaterThanOrEqual(1);
      expect(grid.particlesStuck).toBe(occupiedCount(grid));
      expect(grid.maxRadius).toBeGreaterThan(0);
    }
  });

  it('Point places the center cell with radius 1', () => {
    const grid = createParticleGrid(64, 64);
    seedGrid(grid, SeedPattern.POINT, createRandom('p'));
    expect(grid.particlesStuck).toBe(1);
    expect(grid.isOccupied(32, 32)).toBe(true);
    expect(grid.maxRadius).toBe(1);
  });

  it('Line spans half-length on each side', () => {
    const grid = createParticleGrid(64, 64);
    seedGrid(grid, SeedPattern.LINE, createRandom('l'));
    expect(grid.particlesStuck).toBe(32);
    expect(grid.maxRadius).toBe(16);
  });

  it('Cross counts the shared center once', () => {
    const grid = createParticleGrid(64, 64);
    seedGrid(grid, SeedPattern.CROSS, createRandom('c'));
    // armLen 8: 중심 1 + 팔 4 * 7
    expect(grid.particlesStuck).toBe(29);
    expect(grid.maxRadius).toBe(8);
  });

  it('Block fills a square', () => {
    const grid = createParticleGrid(64, 64);
    seedGrid(grid, SeedPattern.BLOCK, createRandom('b'));
    expect(grid.particlesStuck).toBe(17 * 17);
  });

  it('MultiPoint places five centers', () => {
    const grid = createParticleGrid(64, 64);
    seedGrid(grid, SeedPattern.MULTI_POINT, createRandom('m'));
    expect(grid.particlesStuck).toBe(5);
    expect(grid.isOccupied(20, 32)).toBe(true);
    expect(grid.maxRadius).toBe(12);
  });

  it('NoisePatch keeps its center when every cell is rejected', () => {
    const grid = createParticleGrid(64, 64);
    // 모든 부착 판정 실패, 지터는 +5 → 중심 (26, 26)
    seedGrid(grid, SeedPattern.NOISE_PATCH, fromSource(() => 1));
    expect(grid.particlesStuck).toBe(1);
    expect(occupiedCount(grid)).toBe(1);
    expect(grid.isOccupied(26, 26)).toBe(true);
    expect(grid.maxRadius).toBeCloseTo(Math.sqrt(72));
  });

  it('clears the previous structure', () => {
    const grid = createParticleGrid(64, 64);
    const random = createRandom('r');
    seedGrid(grid, SeedPattern.BLOCK, random);
    seedGrid(grid, SeedPattern.POINT, random);
    expect(grid.particlesStuck).toBe(1);
    expect(occupiedCount(grid)).toBe(1);
  });
});
