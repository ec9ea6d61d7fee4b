import { describe, expect, it } from 'vitest';
import { fromSource } from '../core/random';
import { BoundaryBehavior, SpawnMode, createDefaultSettings } from '../types/settings';
import {
  applyBoundary,
  applyWalkBias,
  isOnAbsorbingEdge,
  spawnParticle,
} from './walk-policy';

// 64x64 그리드: xMax = yMax = 62
const MAX = 62;

describe('applyBoundary', () => {
  it('wraps across the playable area', () => {
    expect(applyBoundary(BoundaryBehavior.WRAP, 0.5, 30, MAX, MAX)).toEqual({ x: 61.5, y: 30 });
    expect(applyBoundary(BoundaryBehavior.WRAP, 63, 30, MAX, MAX)).toEqual({ x: 2, y: 30 });
    expect(applyBoundary(BoundaryBehavior.WRAP, 30, 0, MAX, MAX)).toEqual({ x: 30, y: 61 });
  });

  it('reflects off the edges when bouncing', () => {
    expect(applyBoundary(BoundaryBehavior.BOUNCE, 0.5, 30, MAX, MAX)).toEqual({ x: 1.5, y: 30 });
    expect(applyBoundary(BoundaryBehavior.BOUNCE, 30, 63, MAX, MAX)).toEqual({ x: 30, y: 61 });
  });

  it('clamps for Clamp, Stick and Absorb alike', () => {
    for (const behavior of [BoundaryBehavior.CLAMP, BoundaryBehavior.STICK, BoundaryBehavior.ABSORB]) {
      expect(applyBoundary(behavior, -3, 70, MAX, MAX)).toEqual({ x: 1, y: 62 });
    }
  });

  it('detects the absorbing edge inclusively', () => {
    expect(isOnAbsorbingEdge(1, 30, MAX, MAX)).toBe(true);
    expect(isOnAbsorbingEdge(30, 62, MAX, MAX)).toBe(true);
    expect(isOnAbsorbingEdge(30, 30, MAX, MAX)).toBe(false);
  });
});

describe('spawnParticle', () => {
  const area = { width: 64, height: 64, centerX: 32, centerY: 32, spawnRadius: 20 };

  it('spawns on the circle around the center', () => {
    expect(spawnParticle(SpawnMode.CIRCLE, area, fromSource(() => 0))).toEqual({ x: 52, y: 32 });
  });

  it('spawns along the requested edge', () => {
    expect(spawnParticle(SpawnMode.TOP, area, fromSource(() => 0.5))).toEqual({ x: 32, y: 1 });
    expect(spawnParticle(SpawnMode.RIGHT, area, fromSource(() => 0.5))).toEqual({ x: 62, y: 32 });
  });

  it('falls back to a corner when Random mode cannot be satisfied', () => {
    const huge = { ...area, spawnRadius: 1000 };
    expect(spawnParticle(SpawnMode.RANDOM, huge, fromSource(() => 0.5))).toEqual({ x: 1, y: 62 });
  });
});

describe('applyWalkBias', () => {
  it('leaves the angle alone without bias', () => {
    expect(applyWalkBias(createDefaultSettings(), 1.25, 10, 10, 32, 32)).toBe(1.25);
  });

  it('turns toward the bias direction given in degrees', () => {
    const settings = { ...createDefaultSettings(), walkBiasStrength: 0.3, walkBiasAngle: 90 };
    // 0.3 * sin(π/2 - 0)
    expect(applyWalkBias(settings, 0, 10, 10, 32, 32)).toBeCloseTo(0.3);
    // 이미 편향 방향이면 그대로
    expect(applyWalkBias(settings, Math.PI / 2, 10, 10, 32, 32)).toBeCloseTo(Math.PI / 2);
  });

  it('turns toward the center for positive radial bias and away for negative', () => {
    // (42, 32)에서 중심은 -x 방향(π)
    const inward = { ...createDefaultSettings(), radialBias: 0.1 };
    expect(applyWalkBias(inward, Math.PI / 2, 42, 32, 32, 32)).toBeCloseTo(Math.PI / 2 + 0.1);

    const outward = { ...createDefaultSettings(), radialBias: -0.1 };
    expect(applyWalkBias(outward, Math.PI / 2, 42, 32, 32, 32)).toBeCloseTo(Math.PI / 2 - 0.1);
  });

  it('ignores radial bias below the threshold', () => {
    const settings = { ...createDefaultSettings(), radialBias: 0.0005 };
    expect(applyWalkBias(settings, 1.0, 42, 32, 32, 32)).toBe(1.0);
  });
});
