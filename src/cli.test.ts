import { describe, expect, it } from 'vitest';
import { parseCliArgs } from './cli';
import { SeedPattern } from './types/particle';

describe('parseCliArgs', () => {
  it('parses every flag', () => {
    const result = parseCliArgs([
      '-p', '2000',
      '-s', '0.5',
      '--seed', 'star',
      '--speed', '10',
      '--preset', 'Coral',
      '--config', 'my.json',
      '--lang', 'ko',
      '--seed-rng', 'abc',
    ]);

    expect(result).toEqual({
      ok: true,
      value: {
        particles: 2000,
        stickiness: 0.5,
        seed: SeedPattern.STARBURST,
        speed: 10,
        preset: 'Coral',
        config: 'my.json',
        lang: 'ko',
        seedRng: 'abc',
        help: false,
      },
    });
  });

  it('leaves unset flags undefined', () => {
    expect(parseCliArgs([])).toEqual({ ok: true, value: { help: false } });
  });

  it('rejects non-numeric values', () => {
    expect(parseCliArgs(['--particles', 'many'])).toEqual({
      ok: false,
      error: "invalid value for --particles: 'many'",
    });
  });

  it('rejects unknown languages and options', () => {
    expect(parseCliArgs(['--lang', 'fr'])).toEqual({ ok: false, error: "invalid value for --lang: 'fr'" });
    expect(parseCliArgs(['--bogus']).ok).toBe(false);
  });
});
