/**
 * @fileoverview 시뮬레이션 설정 타입 정의
 * 이동/부착/스폰/경계/시각화 파라미터와 각 파라미터의 허용 범위
 */

// 이웃 판정 방식
export const Neighborhood = {
  VON_NEUMANN: 'VonNeumann',  // 4방향 - 각진 십자형 패턴
  MOORE: 'Moore',             // 8방향 - 자연스러운 프랙탈
  EXTENDED: 'Extended',       // 반경 2 (24칸) - 뭉툭한 덩어리
} as const;

export type NeighborhoodType = typeof Neighborhood[keyof typeof Neighborhood];

// 입자 스폰 위치
export const SpawnMode = {
  CIRCLE: 'Circle',
  EDGES: 'Edges',
  CORNERS: 'Corners',
  RANDOM: 'Random',
  TOP: 'Top',
  BOTTOM: 'Bottom',
  LEFT: 'Left',
  RIGHT: 'Right',
} as const;

export type SpawnModeType = typeof SpawnMode[keyof typeof SpawnMode];

// 그리드 가장자리 처리
export const BoundaryBehavior = {
  CLAMP: 'Clamp',
  WRAP: 'Wrap',       // 토러스
  BOUNCE: 'Bounce',
  STICK: 'Stick',
  ABSORB: 'Absorb',   // 가장자리에 닿으면 폐기 후 재스폰
} as const;

export type BoundaryBehaviorType = typeof BoundaryBehavior[keyof typeof BoundaryBehavior];

// 색상 결정 기준
export const ColorMode = {
  AGE: 'Age',
  DISTANCE: 'Distance',
  DENSITY: 'Density',
  DIRECTION: 'Direction',
} as const;

export type ColorModeType = typeof ColorMode[keyof typeof ColorMode];

export const NEIGHBORHOOD_ORDER: readonly NeighborhoodType[] = Object.values(Neighborhood);
export const SPAWN_MODE_ORDER: readonly SpawnModeType[] = Object.values(SpawnMode);
export const BOUNDARY_ORDER: readonly BoundaryBehaviorType[] = Object.values(BoundaryBehavior);
export const COLOR_MODE_ORDER: readonly ColorModeType[] = Object.values(ColorMode);

/**
 * 순환 목록에서 다음(+1) 또는 이전(-1) 값
 */
export function cycleValue<T>(order: readonly T[], current: T, direction: 1 | -1 = 1): T {
  const index = order.indexOf(current);
  const next = (index + direction + order.length) % order.length;
  return order[next];
}

export interface SimulationSettings {
  // 이동
  walkStepSize: number;        // 한 스텝 이동 거리
  walkBiasAngle: number;       // 편향 방향 (도 단위)
  walkBiasStrength: number;    // 편향 세기 (0 = 등방성)
  radialBias: number;          // 양수 = 중심 쪽, 음수 = 바깥 쪽
  adaptiveStep: boolean;       // 저장/토글만 됨, 보행에는 영향 없음
  adaptiveStepFactor: number;
  latticeWalk: boolean;        // 저장/토글만 됨, 보행에는 영향 없음

  // 부착
  neighborhood: NeighborhoodType;
  multiContactMin: number;     // 부착에 필요한 최소 이웃 수
  tipStickiness: number;       // 이웃이 적을 때 (가지 끝)
  sideStickiness: number;      // 이웃이 많을 때 (가지 옆면)
  stickinessGradient: number;  // 중심 거리 100당 부착률 변화

  // 스폰/경계
  spawnMode: SpawnModeType;
  boundaryBehavior: BoundaryBehaviorType;
  spawnRadiusOffset: number;
  escapeMultiplier: number;
  minSpawnRadius: number;
  maxWalkIterations: number;

  // 시각화
  colorMode: ColorModeType;
  highlightRecent: number;
  invertColors: boolean;
}

export const DEFAULT_SETTINGS: SimulationSettings = {
  walkStepSize: 1.0,
  walkBiasAngle: 0.0,
  walkBiasStrength: 0.0,
  radialBias: 0.0,
  adaptiveStep: false,
  adaptiveStepFactor: 3.0,
  latticeWalk: true,

  neighborhood: Neighborhood.VON_NEUMANN,
  multiContactMin: 1,
  tipStickiness: 1.0,
  sideStickiness: 1.0,
  stickinessGradient: 0.0,

  spawnMode: SpawnMode.CIRCLE,
  boundaryBehavior: BoundaryBehavior.ABSORB,
  spawnRadiusOffset: 10.0,
  escapeMultiplier: 3.0,
  minSpawnRadius: 15.0,        // 조정 범위(20~)보다 낮음: 작은 클러스터 수렴용
  maxWalkIterations: 10000,

  colorMode: ColorMode.AGE,
  highlightRecent: 0,
  invertColors: false,
};

export function createDefaultSettings(): SimulationSettings {
  return { ...DEFAULT_SETTINGS };
}

type KeysOfType<T, V> = { [K in keyof T]: T[K] extends V ? K : never }[keyof T];

export type NumericSettingKey = KeysOfType<SimulationSettings, number>;
export type BooleanSettingKey = KeysOfType<SimulationSettings, boolean>;

/**
 * 수치 파라미터 범위 정의
 * step: UI에서 한 번 조정할 때의 증감량
 */
export interface SettingRange {
  min: number;
  max: number;
  step: number;
  integer: boolean;
  wrap: boolean;     // true면 [min, max) 순환
}

export const SETTING_RANGES: Record<NumericSettingKey, SettingRange> = {
  walkStepSize:       { min: 0.5,  max: 5.0,   step: 0.5,  integer: false, wrap: false },
  walkBiasAngle:      { min: 0,    max: 360,   step: 15,   integer: false, wrap: true },
  walkBiasStrength:   { min: 0.0,  max: 0.5,   step: 0.05, integer: false, wrap: false },
  radialBias:         { min: -0.3, max: 0.3,   step: 0.05, integer: false, wrap: false },
  adaptiveStepFactor: { min: 1.0,  max: 10.0,  step: 0.5,  integer: false, wrap: false },
  multiContactMin:    { min: 1,    max: 4,     step: 1,    integer: true,  wrap: false },
  tipStickiness:      { min: 0.1,  max: 1.0,   step: 0.1,  integer: false, wrap: false },
  sideStickiness:     { min: 0.1,  max: 1.0,   step: 0.1,  integer: false, wrap: false },
  stickinessGradient: { min: -0.5, max: 0.5,   step: 0.1,  integer: false, wrap: false },
  spawnRadiusOffset:  { min: 5.0,  max: 50.0,  step: 5.0,  integer: false, wrap: false },
  escapeMultiplier:   { min: 2.0,  max: 6.0,   step: 0.5,  integer: false, wrap: false },
  minSpawnRadius:     { min: 20.0, max: 100.0, step: 10.0, integer: false, wrap: false },
  maxWalkIterations:  { min: 1000, max: 50000, step: 1000, integer: true,  wrap: false },
  highlightRecent:    { min: 0,    max: 50,    step: 5,    integer: true,  wrap: false },
};

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * 수치 파라미터를 delta만큼 조정 (범위 클램프 / 각도는 순환)
 */
export function adjustSetting(
  settings: SimulationSettings,
  key: NumericSettingKey,
  delta: number
): void {
  const range = SETTING_RANGES[key];
  let value = settings[key] + delta;

  if (range.wrap) {
    const span = range.max - range.min;
    value = range.min + (((value - range.min) % span) + span) % span;
  } else {
    if (range.integer) value = Math.round(value);
    value = clamp(value, range.min, range.max);
  }

  settings[key] = value;
}

export function toggleSetting(settings: SimulationSettings, key: BooleanSettingKey): void {
  settings[key] = !settings[key];
}

export function cycleNeighborhood(settings: SimulationSettings, direction: 1 | -1 = 1): void {
  settings.neighborhood = cycleValue(NEIGHBORHOOD_ORDER, settings.neighborhood, direction);
}

export function cycleSpawnMode(settings: SimulationSettings, direction: 1 | -1 = 1): void {
  settings.spawnMode = cycleValue(SPAWN_MODE_ORDER, settings.spawnMode, direction);
}

export function cycleBoundary(settings: SimulationSettings, direction: 1 | -1 = 1): void {
  settings.boundaryBehavior = cycleValue(BOUNDARY_ORDER, settings.boundaryBehavior, direction);
}

export function cycleColorMode(settings: SimulationSettings, direction: 1 | -1 = 1): void {
  settings.colorMode = cycleValue(COLOR_MODE_ORDER, settings.colorMode, direction);
}

export type CycleSettingKey = 'neighborhood' | 'spawnMode' | 'boundaryBehavior' | 'colorMode';

export function cycleSetting(
  settings: SimulationSettings,
  key: CycleSettingKey,
  direction: 1 | -1 = 1
): void {
  switch (key) {
    case 'neighborhood':
      cycleNeighborhood(settings, direction);
      break;
    case 'spawnMode':
      cycleSpawnMode(settings, direction);
      break;
    case 'boundaryBehavior':
      cycleBoundary(settings, direction);
      break;
    case 'colorMode':
      cycleColorMode(settings, direction);
      break;
  }
}
