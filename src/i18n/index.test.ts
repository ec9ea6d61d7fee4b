import { afterEach, describe, expect, it, vi } from 'vitest';
import { initLanguage, isLanguage, setLanguage, t } from './index';

describe('i18n', () => {
  afterEach(() => {
    setLanguage('en');
    vi.restoreAllMocks();
  });

  it('looks up nested keys', () => {
    expect(t('status.seed')).toBe('Seed');
    setLanguage('ko');
    expect(t('status.seed')).toBe('시드');
  });

  it('falls back to the key when missing', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    expect(t('status.nope')).toBe('status.nope');
    expect(t('status')).toBe('status');
    expect(warn).toHaveBeenCalledWith('Missing translation: status.nope');
  });

  it('prefers an explicit language', () => {
    initLanguage('ko');
    expect(t('status.seed')).toBe('시드');
    initLanguage('xx');
    expect(t('status.seed')).toBe('시드');
  });

  it('switches back on setLanguage', () => {
    setLanguage('ko');
    setLanguage('en');
    expect(t('status.seed')).toBe('Seed');
  });

  it('accepts only known language codes', () => {
    expect(isLanguage('ko')).toBe(true);
    expect(isLanguage('de')).toBe(false);
  });
});
