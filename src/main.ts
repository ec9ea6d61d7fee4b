/**
 * @fileoverview 메인 엔트리포인트
 * 터미널 DLA 시뮬레이션
 */

import { USAGE, parseCliArgs, CliOptions } from './cli';
import { applyAppConfig, loadAppConfig, ViewState } from './core/config-store';
import { applyPreset, createPresetManager } from './core/presets';
import { createRandom } from './core/random';
import { createSimulation, Simulation } from './core/simulation';
import { calculateSimulationSize } from './render/braille-renderer';
import { MAX_STEPS_PER_FRAME, MIN_STEPS_PER_FRAME, createDefaultAppConfig } from './types/config';
import { clamp } from './types/settings';
import { initLanguage, t } from './i18n';
import { createApp } from './ui/app';
import { createShortcuts } from './ui/shortcuts';
import { createTerminal } from './ui/terminal';

/**
 * --config > --preset 순으로 적용하고, 명시된 플래그로 덮어쓴다
 */
async function configure(simulation: Simulation, cli: CliOptions): Promise<ViewState> {
  const defaults = createDefaultAppConfig();
  let view: ViewState = {
    colorScheme: defaults.colorScheme,
    stepsPerFrame: defaults.stepsPerFrame,
    colorByAge: defaults.colorByAge,
  };

  if (cli.config !== undefined) {
    const config = await loadAppConfig(cli.config);
    if (!config.ok) throw new Error(config.error);
    view = applyAppConfig(simulation, config.value);
  } else if (cli.preset !== undefined) {
    const presets = createPresetManager();
    await presets.loadUserPresets();
    const preset = presets.find(cli.preset);
    if (preset === undefined) {
      throw new Error(`Unknown preset '${cli.preset}'. Available: ${presets.presetNames().join(', ')}`);
    }
    applyPreset(simulation, preset);
  }

  // 그리드 기준 상한으로 입자 수 제한
  simulation.setNumParticles(cli.particles ?? simulation.getNumParticles());
  if (cli.stickiness !== undefined) simulation.setStickiness(cli.stickiness);
  if (cli.speed !== undefined) {
    view.stepsPerFrame = clamp(Math.round(cli.speed), MIN_STEPS_PER_FRAME, MAX_STEPS_PER_FRAME);
  }
  if (cli.seed !== undefined) simulation.resetWithSeed(cli.seed);

  return view;
}

async function main(): Promise<void> {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(parsed.error);
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }
  const cli = parsed.value;
  if (cli.help) {
    console.log(USAGE);
    return;
  }

  initLanguage(cli.lang);

  const terminal = createTerminal(process.stdout);
  const { columns, rows } = terminal.canvasSize();
  const [width, height] = calculateSimulationSize(columns, rows);

  const simulation = createSimulation(width, height, { random: createRandom(cli.seedRng) });
  const view = await configure(simulation, cli);

  const app = createApp({ simulation, terminal, view, onQuit: shutdown });
  terminal.enter();
  const shortcuts = createShortcuts(process.stdin, app);
  const offResize = terminal.onResize(() => app.handleResize());

  function shutdown(): void {
    app.stop();
    offResize();
    shortcuts.destroy();
    terminal.leave();

    const stats = simulation.getStats();
    console.log(`${t('messages.stopped')}: ${stats.particlesStuck}/${stats.numParticles}`);
  }

  process.once('SIGTERM', () => app.quit());

  app.start();
}

// 시작
main().catch((error: unknown) => {
  console.error('Failed to initialize:', error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
