/**
 * @fileoverview 시드 생성기
 * 빈 그리드에 초기 구조물을 배치하고 maxRadius를 설정한다.
 * particlesStuck은 그리드가 실제 배치 수로 센다.
 */

import { ParticleGrid } from '../core/grid';
import { Random } from '../core/random';
import { ParticleData, SeedPattern, SeedPatternType } from '../types/particle';
import { clamp } from '../types/settings';

const SEED_PARTICLE: ParticleData = {
  age: 0,
  distance: 0,
  direction: 0,
  neighborCount: 0,
};

const DEG_TO_RAD = Math.PI / 180;

type SeedFn = (grid: ParticleGrid, random: Random) => void;

const SEEDERS: Record<SeedPatternType, SeedFn> = {
  [SeedPattern.POINT]: seedPoint,
  [SeedPattern.LINE]: seedLine,
  [SeedPattern.CROSS]: seedCross,
  [SeedPattern.CIRCLE]: seedCircle,
  [SeedPattern.RING]: seedRing,
  [SeedPattern.BLOCK]: seedBlock,
  [SeedPattern.NOISE_PATCH]: seedNoisePatch,
  [SeedPattern.SCATTER]: seedScatter,
  [SeedPattern.MULTI_POINT]: seedMultiPoint,
  [SeedPattern.STARBURST]: seedStarburst,
};

/**
 * 그리드를 비우고 패턴으로 다시 채운다
 */
export function seedGrid(grid: ParticleGrid, pattern: SeedPatternType, random: Random): void {
  grid.clear();
  SEEDERS[pattern](grid, random);
}

function seedPoint(grid: ParticleGrid): void {
  grid.place(Math.floor(grid.width / 2), Math.floor(grid.height / 2), SEED_PARTICLE);
  // 거리 0이지만 반경은 1로 고정
  grid.setMaxRadius(1.0);
}

function seedLine(grid: ParticleGrid): void {
  const cy = Math.floor(grid.height / 2);
  const halfLen = Math.min(20, Math.floor(grid.width / 4));
  const startX = Math.floor(grid.width / 2) - halfLen;
  const endX = Math.floor(grid.width / 2) + halfLen;

  for (let x = startX; x < endX; x++) {
    grid.place(x, cy, SEED_PARTICLE);
  }
  grid.setMaxRadius(halfLen);
}

function seedCross(grid: ParticleGrid): void {
  const cx = Math.floor(grid.width / 2);
  const cy = Math.floor(grid.height / 2);
  const armLen = Math.min(10, Math.floor(grid.width / 8), Math.floor(grid.height / 8));

  for (let i = 0; i < armLen; i++) {
    grid.place(cx - i, cy, SEED_PARTICLE);
    grid.place(cx + i, cy, SEED_PARTICLE);
    grid.place(cx, cy - i, SEED_PARTICLE);
    grid.place(cx, cy + i, SEED_PARTICLE);
  }
  grid.setMaxRadius(armLen);
}

function seedCircle(grid: ParticleGrid): void {
  const cx = grid.width / 2;
  const cy = grid.height / 2;
  const radius = Math.min(15, Math.floor(grid.width / 8), Math.floor(grid.height / 8));

  for (let deg = 0; deg < 360; deg++) {
    const angle = deg * DEG_TO_RAD;
    grid.place(
      Math.floor(cx + radius * Math.cos(angle)),
      Math.floor(cy + radius * Math.sin(angle)),
      SEED_PARTICLE
    );
  }
  grid.setMaxRadius(radius);
}

function seedRing(grid: ParticleGrid): void {
  const cx = grid.width / 2;
  const cy = grid.height / 2;
  const minDim = Math.min(grid.width, grid.height);
  const radius = clamp(minDim * 0.3, 6.0, minDim * 0.45);
  const thickness = 2.5;

  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      const dx = x - cx;
      const dy = y - cy;
      const dist = Math.sqrt(dx * dx + dy * dy);
      if (dist >= radius - thickness && dist <= radius + thickness) {
        grid.place(x, y, SEED_PARTICLE);
      }
    }
  }
  grid.setMaxRadius(radius + thickness);
}

function seedBlock(grid: ParticleGrid): void {
  const cx = Math.floor(grid.width / 2);
  const cy = Math.floor(grid.height / 2);
  const halfSize = Math.max(Math.floor(Math.min(grid.width, grid.height) / 8), 4);
  const startX = Math.max(cx - halfSize, 0);
  const endX = Math.min(cx + halfSize, grid.width - 1);
  const startY = Math.max(cy - halfSize, 0);
  const endY = Math.min(cy + halfSize, grid.height - 1);

  for (let y = startY; y <= endY; y++) {
    for (let x = startX; x <= endX; x++) {
      grid.place(x, y, SEED_PARTICLE);
    }
  }
  grid.setMaxRadius(halfSize * 1.414);
}

/**
 * 중심에서 벗어난 (W/3, H/3) 근처의 노이즈 덩어리. 비대칭 성장용.
 */
function seedNoisePatch(grid: ParticleGrid, random: Random): void {
  const gridCx = grid.width / 2;
  const gridCy = grid.height / 2;
  const minDim = Math.min(grid.width, grid.height);
  const radius = clamp(minDim * 0.22, 6.0, 30.0);
  const radiusI = Math.trunc(radius);
  const jitter = Math.max(Math.trunc(radiusI / 3), 1);

  const patchCx = clamp(
    Math.trunc(grid.width / 3) + random.int(-jitter, jitter),
    1,
    grid.width - 2
  );
  const patchCy = clamp(
    Math.trunc(grid.height / 3) + random.int(-jitter, jitter),
    1,
    grid.height - 2
  );

  let maxDist = 1.0;

  const yStart = Math.max(patchCy - radiusI, 1);
  const yEnd = Math.min(patchCy + radiusI, grid.height - 2);
  const xStart = Math.max(patchCx - radiusI, 1);
  const xEnd = Math.min(patchCx + radiusI, grid.width - 2);

  for (let y = yStart; y <= yEnd; y++) {
    for (let x = xStart; x <= xEnd; x++) {
      const dx = x - patchCx;
      const dy = y - patchCy;
      const dist = Math.sqrt(dx * dx + dy * dy);
      if (dist > radius) continue;

      // 중심은 조밀하게, 가장자리는 성기게
      const falloff = 1.0 - dist / radius;
      const stickProb = 0.35 + falloff * 0.65;
      if (random.next() < stickProb && grid.place(x, y, SEED_PARTICLE)) {
        const gdx = x - gridCx;
        const gdy = y - gridCy;
        maxDist = Math.max(maxDist, Math.sqrt(gdx * gdx + gdy * gdy));
      }
    }
  }

  if (grid.particlesStuck === 0) {
    // 최소 1개 보장
    grid.place(patchCx, patchCy, SEED_PARTICLE);
    const gdx = patchCx - gridCx;
    const gdy = patchCy - gridCy;
    maxDist = Math.sqrt(gdx * gdx + gdy * gdy);
  }

  grid.setMaxRadius(maxDist);
}

function seedScatter(grid: ParticleGrid, random: Random): void {
  const cx = Math.floor(grid.width / 2);
  const cy = Math.floor(grid.height / 2);
  const scatterRadius = Math.min(20, Math.floor(grid.width / 6), Math.floor(grid.height / 6));
  const numSeeds = 15;

  for (let i = 0; i < numSeeds; i++) {
    const angle = random.range(0, Math.PI * 2);
    const r = random.range(0, scatterRadius);
    grid.place(
      Math.floor(cx + r * Math.cos(angle)),
      Math.floor(cy + r * Math.sin(angle)),
      SEED_PARTICLE
    );
  }
  grid.setMaxRadius(scatterRadius);
}

function seedMultiPoint(grid: ParticleGrid): void {
  const cx = Math.floor(grid.width / 2);
  const cy = Math.floor(grid.height / 2);
  const spread = Math.min(25, Math.floor(grid.width / 5), Math.floor(grid.height / 5));

  const points: ReadonlyArray<readonly [number, number]> = [
    [cx, cy],
    [cx - spread, cy],
    [cx + spread, cy],
    [cx, cy - spread],
    [cx, cy + spread],
  ];

  for (const [px, py] of points) {
    grid.place(px, py, SEED_PARTICLE);
  }
  grid.setMaxRadius(spread);
}

/**
 * 중심 허브 + 8개 방사 스포크 + 4도 간격의 얇은 테두리
 */
function seedStarburst(grid: ParticleGrid): void {
  const cx = grid.width / 2;
  const cy = grid.height / 2;
  const minDim = Math.min(grid.width, grid.height);
  const spokeLen = clamp(minDim * 0.35, 8.0, 40.0);
  const spokes = 8;

  const isInterior = (x: number, y: number): boolean =>
    x > 0 && x < grid.width - 1 && y > 0 && y < grid.height - 1;

  grid.place(Math.floor(cx), Math.floor(cy), SEED_PARTICLE);

  for (let s = 0; s < spokes; s++) {
    const angle = s * ((Math.PI * 2) / spokes);
    for (let step = 1; step <= Math.trunc(spokeLen); step++) {
      const x = Math.round(cx + step * Math.cos(angle));
      const y = Math.round(cy + step * Math.sin(angle));
      if (isInterior(x, y)) {
        grid.place(x, y, SEED_PARTICLE);
      }
    }
  }

  for (let deg = 0; deg < 360; deg += 4) {
    const angle = deg * DEG_TO_RAD;
    const x = Math.trunc(cx + spokeLen * Math.cos(angle));
    const y = Math.trunc(cy + spokeLen * Math.sin(angle));
    if (isInterior(x, y)) {
      grid.place(x, y, SEED_PARTICLE);
    }
  }

  grid.setMaxRadius(spokeLen);
}
