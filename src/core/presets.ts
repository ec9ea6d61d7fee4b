/**
 * @fileoverview 프리셋 관리
 * 내장 프리셋 + 사용자 프리셋 (설정 디렉토리의 JSON 파일)
 */

import { mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { Simulation } from './simulation';
import { isObject, settingsFromJson, settingsToJson } from './config-store';
import { Result, err, ok } from '../types/config';
import { SEED_PATTERN_ORDER, SeedPattern, SeedPatternType } from '../types/particle';
import {
  BoundaryBehavior,
  Neighborhood,
  SimulationSettings,
  SpawnMode,
  createDefaultSettings,
} from '../types/settings';

export interface Preset {
  name: string;
  description: string;
  settings: SimulationSettings;
  seedPattern: SeedPatternType;
  baseStickiness: number;
  numParticles: number;
}

function preset(
  name: string,
  description: string,
  overrides: Partial<SimulationSettings>,
  seedPattern: SeedPatternType,
  baseStickiness: number,
  numParticles = 5000
): Preset {
  return {
    name,
    description,
    settings: { ...createDefaultSettings(), ...overrides },
    seedPattern,
    baseStickiness,
    numParticles,
  };
}

export const BUILTIN_PRESETS: readonly Preset[] = [
  preset('Classic', 'Standard DLA with default settings', {}, SeedPattern.POINT, 1.0),
  preset('Dense', 'Compact structures with multiple contact requirement', {
    walkStepSize: 1.0,
    multiContactMin: 2,
    neighborhood: Neighborhood.MOORE,
  }, SeedPattern.POINT, 1.0),
  preset('Dendritic', 'Thin, branching dendrite patterns', {
    walkStepSize: 3.0,
    tipStickiness: 1.0,
    sideStickiness: 0.3,
  }, SeedPattern.POINT, 0.3),
  preset('Snowflake', 'Symmetric snowflake-like growth', {
    walkStepSize: 2.0,
    neighborhood: Neighborhood.VON_NEUMANN,
  }, SeedPattern.CROSS, 0.8),
  preset('Coral', 'Thick, coral-like structures', {
    walkStepSize: 1.5,
    tipStickiness: 0.5,
    sideStickiness: 1.0,
    neighborhood: Neighborhood.MOORE,
  }, SeedPattern.RING, 0.7),
  preset('Wind-swept', 'Asymmetric growth with directional bias', {
    walkBiasAngle: 45.0,
    walkBiasStrength: 0.3,
  }, SeedPattern.POINT, 0.8),
  preset('Fractal Forest', 'Multiple growth centers competing', {
    walkStepSize: 2.5,
    escapeMultiplier: 3.0,
  }, SeedPattern.SCATTER, 0.4, 8000),
  preset('Edge Growth', 'Particles spawn from grid edges', {
    spawnMode: SpawnMode.EDGES,
    boundaryBehavior: BoundaryBehavior.BOUNCE,
  }, SeedPattern.POINT, 0.9),
  preset('Angular', 'Sharp, angular growth patterns', {
    neighborhood: Neighborhood.VON_NEUMANN,
    walkStepSize: 1.5,
  }, SeedPattern.POINT, 1.0),
  preset('Blob', 'Dense, blob-like structures', {
    neighborhood: Neighborhood.EXTENDED,
    multiContactMin: 3,
    walkStepSize: 1.0,
  }, SeedPattern.BLOCK, 1.0),
  preset('Gradient', 'Dense core with sparse edges', {
    stickinessGradient: -0.3,
  }, SeedPattern.POINT, 1.0),
  preset('Rain', 'Particles fall from top edge', {
    spawnMode: SpawnMode.TOP,
    radialBias: 0.1,
  }, SeedPattern.LINE, 0.8),
];

export function defaultPresetsDir(): string {
  const configHome = process.env.XDG_CONFIG_HOME ?? join(homedir(), '.config');
  return join(configHome, 'dla-terminal', 'presets');
}

/**
 * 파일 이름에 쓸 수 없는 문자는 '_'로
 */
export function presetFileName(name: string): string {
  return `${name.replace(/[^A-Za-z0-9_-]/g, '_')}.json`;
}

export function presetToJson(p: Preset): Record<string, unknown> {
  return {
    name: p.name,
    description: p.description,
    settings: settingsToJson(p.settings),
    seed_pattern: p.seedPattern,
    base_stickiness: p.baseStickiness,
    num_particles: p.numParticles,
  };
}

export function presetFromJson(json: unknown): Result<Preset> {
  if (!isObject(json)) {
    return err('expected a JSON object');
  }

  const { name, description, seed_pattern, base_stickiness, num_particles } = json;
  const settings = settingsFromJson(json.settings);
  if (!settings.ok) return settings;

  if (typeof name !== 'string') return err(`missing or invalid field 'name'`);
  if (typeof description !== 'string') return err(`missing or invalid field 'description'`);
  const seedPattern = SEED_PATTERN_ORDER.find((p) => p === seed_pattern);
  if (seedPattern === undefined) return err(`missing or invalid field 'seed_pattern'`);
  if (typeof base_stickiness !== 'number') return err(`missing or invalid field 'base_stickiness'`);
  if (typeof num_particles !== 'number') return err(`missing or invalid field 'num_particles'`);

  return ok({
    name,
    description,
    settings: settings.value,
    seedPattern,
    baseStickiness: base_stickiness,
    numParticles: num_particles,
  });
}

export interface PresetManager {
  readonly builtin: readonly Preset[];
  readonly user: readonly Preset[];

  /** 디렉토리의 *.json 을 읽는다. 읽을 수 없거나 잘못된 파일은 건너뛴다. */
  loadUserPresets(): Promise<void>;
  savePreset(preset: Preset): Promise<Result<string>>;
  deletePreset(name: string): Promise<Result<void>>;
  allPresets(): Preset[];
  find(name: string): Preset | undefined;
  presetNames(): string[];
}

export function createPresetManager(dir: string = defaultPresetsDir()): PresetManager {
  const user: Preset[] = [];

  async function loadUserPresets(): Promise<void> {
    user.length = 0;

    let entries: string[];
    try {
      entries = await readdir(dir);
    } catch {
      // 디렉토리가 없으면 사용자 프리셋 없음
      return;
    }

    for (const entry of entries.filter((e) => e.endsWith('.json')).sort()) {
      try {
        const loaded = presetFromJson(JSON.parse(await readFile(join(dir, entry), 'utf8')));
        if (loaded.ok) {
          user.push(loaded.value);
        } else {
          console.warn(`Skipping preset ${entry}: ${loaded.error}`);
        }
      } catch (error) {
        console.warn(`Skipping preset ${entry}:`, error);
      }
    }
  }

  async function savePreset(p: Preset): Promise<Result<string>> {
    try {
      await mkdir(dir, { recursive: true });
    } catch (error) {
      return err(`Failed to create presets directory: ${String(error)}`);
    }

    const path = join(dir, presetFileName(p.name));
    try {
      await writeFile(path, JSON.stringify(presetToJson(p), null, 2), 'utf8');
    } catch (error) {
      return err(`Failed to write preset file: ${String(error)}`);
    }

    if (!user.some((u) => u.name === p.name)) {
      user.push(p);
    }
    return ok(path);
  }

  async function deletePreset(name: string): Promise<Result<void>> {
    const index = user.findIndex((u) => u.name === name);
    if (index >= 0) user.splice(index, 1);

    try {
      await rm(join(dir, presetFileName(name)), { force: true });
    } catch (error) {
      return err(`Failed to delete preset file: ${String(error)}`);
    }
    return ok(undefined);
  }

  function allPresets(): Preset[] {
    return [...BUILTIN_PRESETS, ...user];
  }

  function find(name: string): Preset | undefined {
    const lower = name.toLowerCase();
    return allPresets().find((p) => p.name.toLowerCase() === lower);
  }

  function presetNames(): string[] {
    return allPresets().map((p) => p.name);
  }

  return {
    builtin: BUILTIN_PRESETS,
    user,
    loadUserPresets,
    savePreset,
    deletePreset,
    allPresets,
    find,
    presetNames,
  };
}

/**
 * 프리셋을 적용하고 해당 시드로 리셋
 */
export function applyPreset(simulation: Simulation, p: Preset): void {
  simulation.updateSettings({ ...p.settings });
  simulation.setStickiness(p.baseStickiness);
  simulation.setNumParticles(p.numParticles);
  simulation.resetWithSeed(p.seedPattern);
}
