import { describe, expect, it } from 'vitest';
import { DEFAULT_SETTINGS, resolveSettings } from '../config/settings.js';

describe('resolveSettings', () => {
  it('uses the defaults when nothing is set', () => {
    const settings = resolveSettings({});

    expect(settings).toMatchObject(DEFAULT_SETTINGS);
    expect(settings.apiKey).toBeUndefined();
  });

  it('reads models, limits and credentials from the environment', () => {
    const settings = resolveSettings({
      REGAUDIT_MODEL_JUDGE: 'judge-model',
      REGAUDIT_TOP_K: '7',
      REGAUDIT_RETRY_ATTEMPTS: '5',
      OPENAI_API_KEY: 'test-secret',
    });

    expect(settings.models.judge).toBe('judge-model');
    expect(settings.models.needCheck).toBe(DEFAULT_SETTINGS.models.needCheck);
    expect(settings.topK).toBe(7);
    expect(settings.retry.attempts).toBe(5);
    expect(settings.apiKey).toBe('test-secret');
  });

  it('lets explicit overrides win over the environment', () => {
    const settings = resolveSettings({ REGAUDIT_TOP_K: '7', REGAUDIT_CONCURRENCY: '3' }, { topK: 9 });

    expect(settings.topK).toBe(9);
    expect(settings.concurrency).toBe(3);
  });

  it('ignores blank variables', () => {
    expect(resolveSettings({ REGAUDIT_TOP_K: '  ', REGAUDIT_MODEL_JUDGE: '' }).topK).toBe(DEFAULT_SETTINGS.topK);
  });

  it('rejects a non-integer variable', () => {
    expect(() => resolveSettings({ REGAUDIT_TOP_K: 'five' })).toThrow('REGAUDIT_TOP_K must be an integer, got "five"');
  });

  it('rejects values outside their bounds', () => {
    expect(() => resolveSettings({}, { concurrency: 0 })).toThrow('Invalid settings: concurrency:');
  });

  it('returns a frozen object', () => {
    const settings = resolveSettings({});

    expect(Object.isFrozen(settings)).toBe(true);
    expect(Object.isFrozen(settings.models)).toBe(true);
  });
});
