import { describe, expect, it } from 'vitest';
import { Neighborhood, createDefaultSettings } from '../types/settings';
import { effectiveStickiness } from './stickiness';

describe('effectiveStickiness', () => {
  it('interpolates between tip and side values', () => {
    const settings = { ...createDefaultSettings(), tipStickiness: 1.0, sideStickiness: 0.2 };
    // VonNeumann: 2/4 → 0.5 * 1.0 + 0.5 * 0.2
    expect(effectiveStickiness(settings, 2, 0, 1.0)).toBeCloseTo(0.6);
    expect(effectiveStickiness(settings, 0, 0, 1.0)).toBeCloseTo(1.0);
  });

  it('scales with base stickiness and distance gradient', () => {
    const settings = { ...createDefaultSettings(), stickinessGradient: -0.5 };
    // 1 + (100 / 100) * -0.5
    expect(effectiveStickiness(settings, 1, 100, 0.8)).toBeCloseTo(0.4);
  });

  it('stays within [0, 1]', () => {
    const settings = {
      ...createDefaultSettings(),
      neighborhood: Neighborhood.EXTENDED,
      stickinessGradient: 0.5,
    };
    for (const distance of [0, 50, 500, 5000]) {
      for (let count = 0; count <= 24; count++) {
        const value = effectiveStickiness(settings, count, distance, 1.0);
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThanOrEqual(1);
      }
    }
    const negative = { ...settings, stickinessGradient: -0.5 };
    expect(effectiveStickiness(negative, 1, 1000, 1.0)).toBe(0);
  });
});
