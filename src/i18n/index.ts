/**
 * @fileoverview i18n (국제화) 시스템
 * 한국어/영어 언어 전환 지원
 */

import { en } from './translations/en';
import { ko } from './translations/ko';

export type Language = 'en' | 'ko';
export type Translations = typeof en;

const translations: Record<Language, Translations> = { en, ko };

let currentLanguage: Language = 'en';

function lookup(table: Translations, path: readonly string[]): string | undefined {
  let value: unknown = table;
  for (const k of path) {
    if (typeof value !== 'object' || value === null) return undefined;
    value = Reflect.get(value, k);
  }
  return typeof value === 'string' ? value : undefined;
}

/**
 * 번역 키로 현재 언어의 텍스트를 가져옴. 없으면 영어, 그래도 없으면 키 자체.
 * @param key 점(.)으로 구분된 키 (예: 'status.seed')
 */
export function t(key: string): string {
  const path = key.split('.');
  const text = lookup(translations[currentLanguage], path) ?? lookup(translations.en, path);
  if (text === undefined) {
    console.warn(`Missing translation: ${key}`);
    return key;
  }
  return text;
}

export function isLanguage(value: string): value is Language {
  return value === 'en' || value === 'ko';
}

/**
 * 언어 변경
 */
export function setLanguage(lang: Language): void {
  currentLanguage = lang;
}

/**
 * 명시적 지정 > LANG 환경 변수 (예: ko_KR.UTF-8) 순으로 언어 결정
 */
export function initLanguage(explicit?: string): void {
  const candidate = explicit ?? process.env.LANG?.slice(0, 2);
  if (candidate && isLanguage(candidate)) {
    setLanguage(candidate);
  }
}
