/**
 * @fileoverview 명령줄 인자
 */

import { parseArgs } from 'node:util';
import { err, ok, Result } from './types/config';
import { parseSeedPattern, SeedPatternType } from './types/particle';
import { isLanguage, Language } from './i18n';

export interface CliOptions {
  particles?: number;
  stickiness?: number;
  seed?: SeedPatternType;
  speed?: number;
  preset?: string;
  config?: string;
  lang?: Language;
  seedRng?: string;
  help: boolean;
}

export const USAGE = `Usage: dla-terminal [options]

Options:
  -p, --particles <n>     Number of particles (capped to the grid size)
  -s, --stickiness <f>    Stickiness factor (0.1-1.0)
      --seed <name>       Initial seed pattern (point, line, cross, circle, ring,
                          block, noise, scatter, multipoint, starburst)
      --speed <n>         Steps per frame (1-50)
      --preset <name>     Start from a built-in or user preset
      --config <path>     Load an exported config file
      --lang <en|ko>      Interface language
      --seed-rng <s>      Seed for the random number generator
  -h, --help              Show this help`;

function parseNumber(name: string, value: string | undefined): Result<number | undefined> {
  if (value === undefined) return ok(undefined);
  const n = Number(value);
  return Number.isFinite(n) ? ok(n) : err(`invalid value for --${name}: '${value}'`);
}

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      particles: { type: 'string', short: 'p' },
      stickiness: { type: 'string', short: 's' },
      seed: { type: 'string' },
      speed: { type: 'string' },
      preset: { type: 'string' },
      config: { type: 'string' },
      lang: { type: 'string' },
      'seed-rng': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
  });
}

export function parseCliArgs(argv: string[]): Result<CliOptions> {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (error) {
    return err(error instanceof Error ? error.message : String(error));
  }
  const { values } = parsed;

  const particles = parseNumber('particles', values.particles);
  if (!particles.ok) return particles;
  const stickiness = parseNumber('stickiness', values.stickiness);
  if (!stickiness.ok) return stickiness;
  const speed = parseNumber('speed', values.speed);
  if (!speed.ok) return speed;

  let lang: Language | undefined;
  if (values.lang !== undefined) {
    if (!isLanguage(values.lang)) return err(`invalid value for --lang: '${values.lang}'`);
    lang = values.lang;
  }

  return ok({
    particles: particles.value,
    stickiness: stickiness.value,
    seed: values.seed === undefined ? undefined : parseSeedPattern(values.seed),
    speed: speed.value,
    preset: values.preset,
    config: values.config,
    lang,
    seedRng: values['seed-rng'],
    help: values.help ?? false,
  });
}
