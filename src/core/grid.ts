/**
 * @fileoverview 입자 그리드
 * y * width + x 로 인덱싱하는 밀집 배열. 셀별 데이터는 필드마다 별도 타입 배열에 저장한다.
 */

import { ParticleData } from '../types/particle';

export interface ParticleGrid {
  readonly width: number;
  readonly height: number;

  // 셀별 데이터 (읽기 전용으로 취급, occupied[idx] === 1 인 셀만 유효)
  readonly occupied: Uint8Array;
  readonly age: Uint32Array;
  readonly distance: Float32Array;
  readonly direction: Float32Array;
  readonly neighborCount: Uint8Array;

  readonly particlesStuck: number;
  readonly maxRadius: number;

  get(x: number, y: number): ParticleData | undefined;
  isOccupied(x: number, y: number): boolean;
  /** 빈 셀에만 기록, 성공 여부 반환 */
  place(x: number, y: number, data: ParticleData): boolean;
  raiseMaxRadius(distance: number): void;
  setMaxRadius(radius: number): void;
  clear(): void;
}

export function createParticleGrid(width: number, height: number): ParticleGrid {
  const size = width * height;

  const occupied = new Uint8Array(size);
  const age = new Uint32Array(size);
  const distance = new Float32Array(size);
  const direction = new Float32Array(size);
  const neighborCount = new Uint8Array(size);

  let particlesStuck = 0;
  let maxRadius = 1.0;

  function inBounds(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && x < width && y >= 0 && y < height;
  }

  function get(x: number, y: number): ParticleData | undefined {
    if (!inBounds(x, y)) return undefined;
    const idx = y * width + x;
    if (occupied[idx] === 0) return undefined;
    return {
      age: age[idx],
      distance: distance[idx],
      direction: direction[idx],
      neighborCount: neighborCount[idx],
    };
  }

  function isOccupied(x: number, y: number): boolean {
    return inBounds(x, y) && occupied[y * width + x] === 1;
  }

  function place(x: number, y: number, data: ParticleData): boolean {
    if (!inBounds(x, y)) return false;
    const idx = y * width + x;
    if (occupied[idx] === 1) return false;

    occupied[idx] = 1;
    age[idx] = data.age;
    distance[idx] = data.distance;
    direction[idx] = data.direction;
    neighborCount[idx] = data.neighborCount;
    particlesStuck++;
    return true;
  }

  function raiseMaxRadius(value: number): void {
    maxRadius = Math.max(maxRadius, value);
  }

  function setMaxRadius(radius: number): void {
    maxRadius = radius;
  }

  function clear(): void {
    occupied.fill(0);
    age.fill(0);
    distance.fill(0);
    direction.fill(0);
    neighborCount.fill(0);
    particlesStuck = 0;
    maxRadius = 1.0;
  }

  return {
    width,
    height,
    occupied,
    age,
    distance,
    direction,
    neighborCount,
    get particlesStuck() {
      return particlesStuck;
    },
    get maxRadius() {
      return maxRadius;
    },
    get,
    isOccupied,
    place,
    raiseMaxRadius,
    setMaxRadius,
    clear,
  };
}
