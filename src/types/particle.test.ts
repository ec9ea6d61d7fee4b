import { describe, expect, it } from 'vitest';
import {
  SEED_PATTERN_ORDER,
  SeedPattern,
  nextSeedPattern,
  parseSeedPattern,
  prevSeedPattern,
} from './particle';

describe('seed patterns', () => {
  it('cycles through all ten patterns', () => {
    expect(SEED_PATTERN_ORDER).toHaveLength(10);
    expect(nextSeedPattern(SeedPattern.STARBURST)).toBe(SeedPattern.POINT);
    expect(prevSeedPattern(SeedPattern.POINT)).toBe(SeedPattern.STARBURST);
    expect(nextSeedPattern(SeedPattern.POINT)).toBe(SeedPattern.LINE);
  });

  it('parses names and aliases', () => {
    expect(parseSeedPattern('filled')).toBe(SeedPattern.BLOCK);
    expect(parseSeedPattern('Noise-Patch')).toBe(SeedPattern.NOISE_PATCH);
    expect(parseSeedPattern('multi-point')).toBe(SeedPattern.MULTI_POINT);
    expect(parseSeedPattern('spokes')).toBe(SeedPattern.STARBURST);
    expect(parseSeedPattern('RING')).toBe(SeedPattern.RING);
  });

  it('falls back to Point for unknown names', () => {
    expect(parseSeedPattern('spiral')).toBe(SeedPattern.POINT);
  });
});
