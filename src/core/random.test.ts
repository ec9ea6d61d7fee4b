import { describe, expect, it } from 'vitest';
import { createRandom, fromSource } from './random';

describe('Random', () => {
  it('repeats the sequence for the same seed', () => {
    const a = createRandom('test-seed');
    const b = createRandom('test-seed');
    const seqA = Array.from({ length: 5 }, () => a.next());
    const seqB = Array.from({ length: 5 }, () => b.next());
    expect(seqA).toEqual(seqB);
  });

  it('keeps draws inside their ranges', () => {
    const random = createRandom('range-check');
    for (let i = 0; i < 200; i++) {
      const r = random.range(2, 5);
      expect(r).toBeGreaterThanOrEqual(2);
      expect(r).toBeLessThan(5);

      const n = random.int(-1, 1);
      expect(Number.isInteger(n)).toBe(true);
      expect(n).toBeGreaterThanOrEqual(-1);
      expect(n).toBeLessThanOrEqual(1);
    }
  });

  it('int is inclusive at both ends', () => {
    expect(fromSource(() => 0).int(0, 3)).toBe(0);
    expect(fromSource(() => 0.999).int(0, 3)).toBe(3);
    expect(fromSource(() => 0.5).range(10, 20)).toBe(15);
  });
});
