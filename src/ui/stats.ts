/**
 * @fileoverview 상태 표시줄
 */

import { t } from '../i18n';
import { SimulationStats } from '../core/simulation';
import { SEED_PATTERN_LABELS, SeedPatternType } from '../types/particle';
import { ColorModeType } from '../types/settings';
import { ColorSchemeType } from '../render/color';

export interface StatusView {
  seedPattern: SeedPatternType;
  colorScheme: ColorSchemeType;
  colorMode: ColorModeType;
  stepsPerFrame: number;
  message?: string;   // 내보내기 결과 등 1회성 메시지
}

export function formatStatusLine(stats: SimulationStats, view: StatusView): string {
  const percent = (stats.progress * 100).toFixed(1);
  const parts = [
    `${t('status.particles')}: ${stats.particlesStuck.toLocaleString('en-US')}/${stats.numParticles.toLocaleString('en-US')} (${percent}%)`,
    `${t('status.radius')}: ${stats.maxRadius.toFixed(1)}`,
    `${t('status.seed')}: ${SEED_PATTERN_LABELS[view.seedPattern]}`,
    `${t('status.speed')}: ${view.stepsPerFrame}`,
    `${t('status.scheme')}: ${view.colorScheme}`,
    `${t('status.mode')}: ${view.colorMode}`,
  ];

  if (stats.complete) {
    parts.push(t('status.complete'));
  } else if (stats.paused) {
    parts.push(t('status.paused'));
  }

  return parts.join(' │ ');
}

export function formatStatusLines(stats: SimulationStats, view: StatusView): string[] {
  return [formatStatusLine(stats, view), view.message ?? t('keys.help')];
}
