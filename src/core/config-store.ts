/**
 * @fileoverview 설정 내보내기/가져오기
 * 파일 포맷은 snake_case 키의 버전 있는 JSON. 실패는 예외 대신 Result 문자열로 반환한다.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { Simulation } from './simulation';
import { COLOR_SCHEME_ORDER, ColorSchemeType } from '../render/color';
import {
  AppConfig,
  CONFIG_VERSION,
  MAX_STEPS_PER_FRAME,
  MIN_STEPS_PER_FRAME,
  Result,
  err,
  ok,
} from '../types/config';
import { SEED_PATTERN_ORDER } from '../types/particle';
import {
  BOUNDARY_ORDER,
  COLOR_MODE_ORDER,
  NEIGHBORHOOD_ORDER,
  SPAWN_MODE_ORDER,
  SimulationSettings,
  clamp,
} from '../types/settings';

export type JsonObject = Record<string, unknown>;

export function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTag<T extends string>(values: readonly T[], value: unknown): value is T {
  return values.some((v) => v === value);
}

/**
 * 필드 판독기. 첫 번째로 실패한 필드 경로를 기억하고 자리표시 값을 돌려준다.
 */
function createFieldReader(json: JsonObject, path: string) {
  let error: string | undefined;

  function fail(key: string): void {
    error ??= `missing or invalid field '${path}${key}'`;
  }

  function number(key: string): number {
    const value = json[key];
    if (typeof value === 'number' && Number.isFinite(value)) return value;
    fail(key);
    return 0;
  }

  // 개수/반복 횟수: 0 이상의 정수
  function integer(key: string): number {
    const value = json[key];
    if (typeof value === 'number' && Number.isInteger(value) && value >= 0) return value;
    fail(key);
    return 0;
  }

  function boolean(key: string): boolean {
    const value = json[key];
    if (typeof value === 'boolean') return value;
    fail(key);
    return false;
  }

  function tag<T extends string>(key: string, values: readonly T[]): T {
    const value = json[key];
    if (isTag(values, value)) return value;
    fail(key);
    return values[0];
  }

  return { number, integer, boolean, tag, error: () => error };
}

export function settingsToJson(settings: SimulationSettings): JsonObject {
  return {
    walk_step_size: settings.walkStepSize,
    walk_bias_angle: settings.walkBiasAngle,
    walk_bias_strength: settings.walkBiasStrength,
    radial_bias: settings.radialBias,
    adaptive_step: settings.adaptiveStep,
    adaptive_step_factor: settings.adaptiveStepFactor,
    lattice_walk: settings.latticeWalk,
    neighborhood: settings.neighborhood,
    multi_contact_min: settings.multiContactMin,
    tip_stickiness: settings.tipStickiness,
    side_stickiness: settings.sideStickiness,
    stickiness_gradient: settings.stickinessGradient,
    spawn_mode: settings.spawnMode,
    boundary_behavior: settings.boundaryBehavior,
    spawn_radius_offset: settings.spawnRadiusOffset,
    escape_multiplier: settings.escapeMultiplier,
    min_spawn_radius: settings.minSpawnRadius,
    max_walk_iterations: settings.maxWalkIterations,
    color_mode: settings.colorMode,
    highlight_recent: settings.highlightRecent,
    invert_colors: settings.invertColors,
  };
}

/**
 * JSON 객체 → 설정. 누락되거나 타입이 맞지 않는 첫 필드를 오류로 돌려준다.
 */
export function settingsFromJson(json: unknown, path = 'settings'): Result<SimulationSettings> {
  if (!isObject(json)) {
    return err(`missing or invalid field '${path}'`);
  }

  const read = createFieldReader(json, `${path}.`);
  const settings: SimulationSettings = {
    walkStepSize: read.number('walk_step_size'),
    walkBiasAngle: read.number('walk_bias_angle'),
    walkBiasStrength: read.number('walk_bias_strength'),
    radialBias: read.number('radial_bias'),
    adaptiveStep: read.boolean('adaptive_step'),
    adaptiveStepFactor: read.number('adaptive_step_factor'),
    latticeWalk: read.boolean('lattice_walk'),
    neighborhood: read.tag('neighborhood', NEIGHBORHOOD_ORDER),
    multiContactMin: read.integer('multi_contact_min'),
    tipStickiness: read.number('tip_stickiness'),
    sideStickiness: read.number('side_stickiness'),
    stickinessGradient: read.number('stickiness_gradient'),
    spawnMode: read.tag('spawn_mode', SPAWN_MODE_ORDER),
    boundaryBehavior: read.tag('boundary_behavior', BOUNDARY_ORDER),
    spawnRadiusOffset: read.number('spawn_radius_offset'),
    escapeMultiplier: read.number('escape_multiplier'),
    minSpawnRadius: read.number('min_spawn_radius'),
    maxWalkIterations: read.integer('max_walk_iterations'),
    colorMode: read.tag('color_mode', COLOR_MODE_ORDER),
    highlightRecent: read.integer('highlight_recent'),
    invertColors: read.boolean('invert_colors'),
  };

  const error = read.error();
  return error === undefined ? ok(settings) : err(error);
}

export function appConfigToJson(config: AppConfig): JsonObject {
  return {
    version: config.version,
    settings: settingsToJson(config.settings),
    seed_pattern: config.seedPattern,
    stickiness: config.stickiness,
    num_particles: config.numParticles,
    color_scheme: config.colorScheme,
    steps_per_frame: config.stepsPerFrame,
    color_by_age: config.colorByAge,
  };
}

export function appConfigFromJson(json: unknown): Result<AppConfig> {
  if (!isObject(json)) {
    return err('expected a JSON object');
  }

  const settings = settingsFromJson(json.settings);
  if (!settings.ok) return settings;

  const read = createFieldReader(json, '');
  const config: AppConfig = {
    version: read.number('version'),
    settings: settings.value,
    seedPattern: read.tag('seed_pattern', SEED_PATTERN_ORDER),
    stickiness: read.number('stickiness'),
    numParticles: read.integer('num_particles'),
    colorScheme: read.tag('color_scheme', COLOR_SCHEME_ORDER),
    stepsPerFrame: read.integer('steps_per_frame'),
    colorByAge: read.boolean('color_by_age'),
  };

  const error = read.error();
  return error === undefined ? ok(config) : err(error);
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function serializeAppConfig(config: AppConfig): Result<string> {
  try {
    return ok(JSON.stringify(appConfigToJson(config), null, 2));
  } catch (error) {
    return err(`Failed to serialize config: ${describe(error)}`);
  }
}

export function parseAppConfig(text: string): Result<AppConfig> {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    return err(`Failed to parse config file: ${describe(error)}`);
  }

  const config = appConfigFromJson(json);
  if (!config.ok) {
    return err(`Failed to parse config file: ${config.error}`);
  }
  return config;
}

export async function saveAppConfig(path: string, config: AppConfig): Promise<Result<string>> {
  const json = serializeAppConfig(config);
  if (!json.ok) return json;

  try {
    await writeFile(path, json.value, 'utf8');
  } catch (error) {
    return err(`Failed to write config file: ${describe(error)}`);
  }
  return ok(path);
}

export async function loadAppConfig(path: string): Promise<Result<AppConfig>> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    return err(`Failed to read config file: ${describe(error)}`);
  }
  return parseAppConfig(text);
}

/**
 * 앱 단위 상태 (시뮬레이션 밖에 있는 값)
 */
export interface ViewState {
  colorScheme: ColorSchemeType;
  stepsPerFrame: number;
  colorByAge: boolean;
}

export function toAppConfig(simulation: Simulation, view: ViewState): AppConfig {
  return {
    version: CONFIG_VERSION,
    settings: { ...simulation.getSettings() },
    seedPattern: simulation.getSeedPattern(),
    stickiness: simulation.getStickiness(),
    numParticles: simulation.getNumParticles(),
    colorScheme: view.colorScheme,
    stepsPerFrame: view.stepsPerFrame,
    colorByAge: view.colorByAge,
  };
}

/**
 * 설정을 시뮬레이션에 반영하고 앱 단위 값을 돌려준다. 시드 패턴이 바뀌므로 리셋한다.
 */
export function applyAppConfig(simulation: Simulation, config: AppConfig): ViewState {
  simulation.updateSettings({ ...config.settings });
  simulation.setStickiness(config.stickiness);
  simulation.setNumParticles(config.numParticles);
  simulation.resetWithSeed(config.seedPattern);

  return {
    colorScheme: config.colorScheme,
    stepsPerFrame: clamp(config.stepsPerFrame, MIN_STEPS_PER_FRAME, MAX_STEPS_PER_FRAME),
    colorByAge: config.colorByAge,
  };
}
