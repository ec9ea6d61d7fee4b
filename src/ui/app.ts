/**
 * @fileoverview 터미널 앱
 * 프레임 루프 (setInterval), 단축키 동작, 리사이즈, 설정 내보내기
 */

import { saveAppConfig, toAppConfig, ViewState } from '../core/config-store';
import { Simulation } from '../core/simulation';
import { calculateSimulationSize, renderToBraille } from '../render/braille-renderer';
import { buildLut, nextColorScheme, RGB } from '../render/color';
import { MAX_STEPS_PER_FRAME, MIN_STEPS_PER_FRAME } from '../types/config';
import { nextSeedPattern, prevSeedPattern, SeedPatternType } from '../types/particle';
import { adjustSetting, clamp, cycleSetting, toggleSetting } from '../types/settings';
import { t } from '../i18n';
import { ShortcutActions } from './shortcuts';
import { formatStatusLines } from './stats';
import { Terminal } from './terminal';

// ~60fps
export const FRAME_INTERVAL_MS = 16;

export const DEFAULT_EXPORT_PATH = 'dla_config.json';

export interface AppOptions {
  simulation: Simulation;
  terminal: Terminal;
  view: ViewState;
  exportPath?: string;
  onQuit?: () => void;
}

export interface App extends ShortcutActions {
  start(): void;
  stop(): void;
  /** 한 프레임: stepsPerFrame 만큼 진행 후 그리기 */
  tick(): void;
  draw(): void;
  /** 터미널 크기에 맞춰 시뮬레이션 그리드를 다시 만든다 */
  handleResize(): void;
  exportConfigAsync(): Promise<void>;
  getView(): Readonly<ViewState>;
  getMessage(): string | undefined;
  isRunning(): boolean;
}

export function createApp(options: AppOptions): App {
  const { simulation, terminal } = options;
  const exportPath = options.exportPath ?? DEFAULT_EXPORT_PATH;
  const view: ViewState = { ...options.view };

  let lut: readonly RGB[] = buildLut(view.colorScheme);
  let message: string | undefined;
  let timer: ReturnType<typeof setInterval> | null = null;

  function advance(): void {
    if (simulation.isPaused()) return;
    for (let i = 0; i < view.stepsPerFrame; i++) {
      if (!simulation.step()) break;
    }
  }

  function draw(): void {
    const { columns, rows } = terminal.canvasSize();
    const settings = simulation.getSettings();
    const cells = renderToBraille(simulation.getRenderSource(), columns, rows, lut, {
      colorMode: settings.colorMode,
      highlightRecent: settings.highlightRecent,
      invertColors: settings.invertColors,
      colorByAge: view.colorByAge,
    });

    const lines = formatStatusLines(simulation.getStats(), {
      seedPattern: simulation.getSeedPattern(),
      colorScheme: view.colorScheme,
      colorMode: settings.colorMode,
      stepsPerFrame: view.stepsPerFrame,
      message,
    });
    terminal.drawFrame(cells, lines);
  }

  function tick(): void {
    advance();
    draw();
  }

  function start(): void {
    if (timer !== null) return;
    timer = setInterval(tick, FRAME_INTERVAL_MS);
  }

  function stop(): void {
    if (timer === null) return;
    clearInterval(timer);
    timer = null;
  }

  function handleResize(): void {
    const { columns, rows } = terminal.canvasSize();
    const [width, height] = calculateSimulationSize(columns, rows);
    simulation.resize(width, height);
    message = `${t('messages.resized')} ${width}x${height}`;
  }

  async function exportConfigAsync(): Promise<void> {
    const result = await saveAppConfig(exportPath, toAppConfig(simulation, view));
    message = result.ok ? `${t('messages.exported')} ${result.value}` : result.error;
  }

  function selectSeed(pattern: SeedPatternType): void {
    simulation.resetWithSeed(pattern);
    message = undefined;
  }

  function quit(): void {
    stop();
    options.onQuit?.();
  }

  return {
    start,
    stop,
    tick,
    draw,
    handleResize,
    exportConfigAsync,
    getView: () => view,
    getMessage: () => message,
    isRunning: () => timer !== null,

    togglePause: () => simulation.togglePause(),
    reset: () => {
      simulation.reset();
      message = undefined;
    },
    cycleSeed: (direction) => {
      const current = simulation.getSeedPattern();
      selectSeed(direction === 1 ? nextSeedPattern(current) : prevSeedPattern(current));
    },
    selectSeed,
    cycleColorScheme: () => {
      view.colorScheme = nextColorScheme(view.colorScheme);
      lut = buildLut(view.colorScheme);
    },
    cycleColorMode: () => cycleSetting(simulation.getSettings(), 'colorMode'),
    toggleColorByAge: () => {
      view.colorByAge = !view.colorByAge;
    },
    toggleInvert: () => toggleSetting(simulation.getSettings(), 'invertColors'),
    cycleNeighborhood: () => cycleSetting(simulation.getSettings(), 'neighborhood'),
    cycleBoundary: () => cycleSetting(simulation.getSettings(), 'boundaryBehavior'),
    cycleSpawnMode: () => cycleSetting(simulation.getSettings(), 'spawnMode'),
    adjustHighlight: (delta) => adjustSetting(simulation.getSettings(), 'highlightRecent', delta),
    adjustSpeed: (delta) => {
      view.stepsPerFrame = clamp(view.stepsPerFrame + delta, MIN_STEPS_PER_FRAME, MAX_STEPS_PER_FRAME);
    },
    exportConfig: () => {
      exportConfigAsync().catch((error: unknown) => {
        console.error('Failed to export config:', error);
      });
    },
    quit,
  };
}
