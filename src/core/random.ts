/**
 * @fileoverview 난수 소스
 * 모든 추첨(스폰 각도, 보행 각도, 부착 판정, 시드 배치)은 이 핸들 하나를 거친다.
 */

import seedrandom from 'seedrandom';

export interface Random {
  /** [0, 1) 균등 분포 */
  next(): number;
  /** [min, max) 균등 분포 */
  range(min: number, max: number): number;
  /** [min, max] 정수 */
  int(min: number, max: number): number;
}

/**
 * @param seed 지정하면 재현 가능한 수열, 생략하면 엔트로피 기반
 */
export function createRandom(seed?: string): Random {
  const prng = seed === undefined ? seedrandom() : seedrandom(seed);
  return fromSource(() => prng.double());
}

/**
 * [0, 1) 함수를 Random 핸들로 감싼다 (테스트용 고정 수열 등)
 */
export function fromSource(source: () => number): Random {
  function next(): number {
    return source();
  }

  function range(min: number, max: number): number {
    return min + source() * (max - min);
  }

  function int(min: number, max: number): number {
    return min + Math.floor(source() * (max - min + 1));
  }

  return { next, range, int };
}
