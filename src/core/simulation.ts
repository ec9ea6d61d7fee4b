/**
 * @fileoverview DLA 시뮬레이션 인스턴스
 * 그리드, 설정, 난수 핸들을 소유하고 step/reset/resize를 제공한다.
 */

import { createParticleGrid, ParticleGrid } from './grid';
import { createRandom, Random } from './random';
import { createWalkSystem, WalkOutcome, WalkOutcomeType, WalkSystem } from '../systems/walk-system';
import { seedGrid } from '../systems/seed-system';
import { ParticleData, SeedPattern, SeedPatternType } from '../types/particle';
import { SimulationSettings, clamp, createDefaultSettings } from '../types/settings';

export const DEFAULT_NUM_PARTICLES = 5000;
export const DEFAULT_STICKINESS = 1.0;
export const MIN_PARTICLES = 100;

export interface SimulationOptions {
  random?: Random;
  settings?: Partial<SimulationSettings>;
  seedPattern?: SeedPatternType;
  numParticles?: number;   // 클램프 없이 그대로 사용
  stickiness?: number;
}

export interface SimulationStats {
  gridWidth: number;
  gridHeight: number;
  particlesStuck: number;
  numParticles: number;
  maxRadius: number;
  progress: number;
  paused: boolean;
  complete: boolean;

  // 현재 그리드에서의 보행 결과 누계
  attempts: number;
  stuck: number;
  escaped: number;
  absorbed: number;
  timedOut: number;
}

/**
 * 렌더러가 읽는 스냅샷. reset/resize 이후에는 다시 받아야 한다.
 */
export interface RenderSource {
  grid: ParticleGrid;
  numParticles: number;
}

export interface Simulation {
  /** 입자 하나 처리. 일시정지 또는 완료면 false */
  step(): boolean;
  getParticle(x: number, y: number): ParticleData | undefined;
  progress(): number;
  isComplete(): boolean;
  reset(): void;
  resetWithSeed(pattern: SeedPatternType): void;
  resize(width: number, height: number): void;
  maxParticles(): number;

  adjustParticles(delta: number): void;
  setNumParticles(count: number): void;
  adjustStickiness(delta: number): void;
  setStickiness(value: number): void;

  pause(): void;
  resume(): void;
  togglePause(): void;
  isPaused(): boolean;

  /** 살아 있는 설정 객체 (adjustSetting 등으로 직접 조정) */
  getSettings(): SimulationSettings;
  updateSettings(settings: Partial<SimulationSettings>): void;
  getSeedPattern(): SeedPatternType;
  getNumParticles(): number;
  getStickiness(): number;

  getGrid(): ParticleGrid;
  getRenderSource(): RenderSource;
  getStats(): SimulationStats;
}

export function createSimulation(
  width: number,
  height: number,
  options: SimulationOptions = {}
): Simulation {
  const random = options.random ?? createRandom();
  const settings: SimulationSettings = { ...createDefaultSettings(), ...options.settings };
  const walkSystem: WalkSystem = createWalkSystem(random);

  let grid: ParticleGrid = createParticleGrid(width, height);
  let seedPattern: SeedPatternType = options.seedPattern ?? SeedPattern.POINT;
  let numParticles = options.numParticles ?? DEFAULT_NUM_PARTICLES;
  let stickiness = options.stickiness ?? DEFAULT_STICKINESS;
  let paused = false;

  const counters: Record<WalkOutcomeType, number> = {
    [WalkOutcome.STUCK]: 0,
    [WalkOutcome.ESCAPED]: 0,
    [WalkOutcome.ABSORBED]: 0,
    [WalkOutcome.TIMED_OUT]: 0,
  };
  let attempts = 0;

  function resetCounters(): void {
    attempts = 0;
    counters[WalkOutcome.STUCK] = 0;
    counters[WalkOutcome.ESCAPED] = 0;
    counters[WalkOutcome.ABSORBED] = 0;
    counters[WalkOutcome.TIMED_OUT] = 0;
  }

  function step(): boolean {
    if (paused || grid.particlesStuck >= numParticles) {
      return false;
    }

    const outcome = walkSystem.walk(grid, settings, stickiness);
    attempts++;
    counters[outcome]++;
    return true;
  }

  function getParticle(x: number, y: number): ParticleData | undefined {
    return grid.get(x, y);
  }

  function progress(): number {
    return grid.particlesStuck / numParticles;
  }

  function isComplete(): boolean {
    return grid.particlesStuck >= numParticles;
  }

  function reset(): void {
    resetWithSeed(seedPattern);
  }

  function resetWithSeed(pattern: SeedPatternType): void {
    seedPattern = pattern;
    seedGrid(grid, pattern, random);
    resetCounters();
    paused = false;
  }

  function resize(newWidth: number, newHeight: number): void {
    if (newWidth !== grid.width || newHeight !== grid.height) {
      grid = createParticleGrid(newWidth, newHeight);
      // 새 그리드 상한으로 입자 수 제한
      numParticles = Math.min(numParticles, maxParticles());
    }
    reset();
  }

  /**
   * 그리드 면적의 75%까지 (최소 100)
   */
  function maxParticles(): number {
    return Math.max(Math.floor((grid.width * grid.height * 3) / 4), MIN_PARTICLES);
  }

  function setNumParticles(count: number): void {
    numParticles = clamp(Math.round(count), MIN_PARTICLES, maxParticles());
  }

  function adjustParticles(delta: number): void {
    setNumParticles(numParticles + delta);
  }

  function setStickiness(value: number): void {
    stickiness = clamp(value, 0.1, 1.0);
  }

  function adjustStickiness(delta: number): void {
    setStickiness(stickiness + delta);
  }

  function pause(): void {
    paused = true;
  }

  function resume(): void {
    paused = false;
  }

  function togglePause(): void {
    paused = !paused;
  }

  function updateSettings(newSettings: Partial<SimulationSettings>): void {
    Object.assign(settings, newSettings);
  }

  function getStats(): SimulationStats {
    return {
      gridWidth: grid.width,
      gridHeight: grid.height,
      particlesStuck: grid.particlesStuck,
      numParticles,
      maxRadius: grid.maxRadius,
      progress: progress(),
      paused,
      complete: isComplete(),
      attempts,
      stuck: counters[WalkOutcome.STUCK],
      escaped: counters[WalkOutcome.ESCAPED],
      absorbed: counters[WalkOutcome.ABSORBED],
      timedOut: counters[WalkOutcome.TIMED_OUT],
    };
  }

  reset();

  return {
    step,
    getParticle,
    progress,
    isComplete,
    reset,
    resetWithSeed,
    resize,
    maxParticles,
    adjustParticles,
    setNumParticles,
    adjustStickiness,
    setStickiness,
    pause,
    resume,
    togglePause,
    isPaused: () => paused,
    getSettings: () => settings,
    updateSettings,
    getSeedPattern: () => seedPattern,
    getNumParticles: () => numParticles,
    getStickiness: () => stickiness,
    getGrid: () => grid,
    getRenderSource: () => ({ grid, numParticles }),
    getStats,
  };
}
