import { describe, expect, it } from 'vitest';
import {
  BoundaryBehavior,
  ColorMode,
  Neighborhood,
  SpawnMode,
  adjustSetting,
  createDefaultSettings,
  cycleSetting,
  cycleValue,
  toggleSetting,
} from './settings';

describe('adjustSetting', () => {
  it('clamps to the range', () => {
    const settings = createDefaultSettings();
    adjustSetting(settings, 'walkStepSize', 10);
    expect(settings.walkStepSize).toBe(5.0);
    adjustSetting(settings, 'walkStepSize', -10);
    expect(settings.walkStepSize).toBe(0.5);
  });

  it('wraps the bias angle into [0, 360)', () => {
    const settings = createDefaultSettings();
    settings.walkBiasAngle = 350;
    adjustSetting(settings, 'walkBiasAngle', 15);
    expect(settings.walkBiasAngle).toBe(5);

    settings.walkBiasAngle = 0;
    adjustSetting(settings, 'walkBiasAngle', -15);
    expect(settings.walkBiasAngle).toBe(345);
  });

  it('rounds integer fields', () => {
    const settings = createDefaultSettings();
    adjustSetting(settings, 'multiContactMin', 0.6);
    expect(settings.multiContactMin).toBe(2);
    adjustSetting(settings, 'multiContactMin', 10);
    expect(settings.multiContactMin).toBe(4);
  });

  it('pulls minSpawnRadius into range on first adjustment', () => {
    const settings = createDefaultSettings();
    expect(settings.minSpawnRadius).toBe(15);
    adjustSetting(settings, 'minSpawnRadius', 0);
    expect(settings.minSpawnRadius).toBe(20);
  });
});

describe('toggleSetting', () => {
  it('flips booleans', () => {
    const settings = createDefaultSettings();
    expect(settings.latticeWalk).toBe(true);
    toggleSetting(settings, 'latticeWalk');
    expect(settings.latticeWalk).toBe(false);
    toggleSetting(settings, 'adaptiveStep');
    expect(settings.adaptiveStep).toBe(true);
  });
});

describe('cycleSetting', () => {
  it('cycles forward and backward with wraparound', () => {
    const settings = createDefaultSettings();
    cycleSetting(settings, 'neighborhood');
    expect(settings.neighborhood).toBe(Neighborhood.MOORE);
    cycleSetting(settings, 'neighborhood', -1);
    cycleSetting(settings, 'neighborhood', -1);
    expect(settings.neighborhood).toBe(Neighborhood.EXTENDED);

    cycleSetting(settings, 'boundaryBehavior');
    expect(settings.boundaryBehavior).toBe(BoundaryBehavior.CLAMP);

    cycleSetting(settings, 'spawnMode', -1);
    expect(settings.spawnMode).toBe(SpawnMode.RIGHT);

    cycleSetting(settings, 'colorMode');
    expect(settings.colorMode).toBe(ColorMode.DISTANCE);
  });

  it('cycleValue returns to the start after a full loop', () => {
    const order = ['a', 'b', 'c'];
    let value = 'a';
    for (let i = 0; i < order.length; i++) value = cycleValue(order, value);
    expect(value).toBe('a');
  });
});

describe('defaults', () => {
  it('returns independent copies', () => {
    const a = createDefaultSettings();
    const b = createDefaultSettings();
    a.walkStepSize = 3;
    expect(b.walkStepSize).toBe(1.0);
  });
});
