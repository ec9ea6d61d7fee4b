import { Translations } from '../index';

export const ko: Translations = {
  status: {
    particles: '입자',
    radius: '반경',
    seed: '시드',
    speed: '속도',
    scheme: '색상',
    mode: '모드',
    paused: '일시정지',
    complete: '완료',
  },
  keys: {
    help: 'space 일시정지 · r 리셋 · n/p 시드 · 1-0 시드 선택 · c 색상 · m 모드 · +/- 속도 · e 내보내기 · q 종료',
  },
  messages: {
    exported: '설정 내보냄:',
    resized: '시뮬레이션 크기 변경:',
    stopped: '시뮬레이션 종료',
  },
};
