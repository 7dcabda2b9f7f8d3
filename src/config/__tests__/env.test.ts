import { describe, expect, test } from 'vitest';
import { parseEnv } from '../env';

describe('parseEnv', () => {
  test('applies defaults', () => {
    expect(parseEnv({})).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      TAXONOMY_PATH: 'taxonomy_release.txt',
      LLM_PROVIDER: 'gemini',
      GEMINI_MODEL: 'gemini-2.5-flash',
      LLM_TIMEOUT_MS: 30000,
      LLM_CONCURRENCY: 4,
    });
  });

  test('coerces numeric settings', () => {
    const parsed = parseEnv({ LLM_TIMEOUT_MS: '5000', LLM_CONCURRENCY: '8', GEMINI_API_KEY: 'test-key' });
    expect(parsed.LLM_TIMEOUT_MS).toBe(5000);
    expect(parsed.LLM_CONCURRENCY).toBe(8);
    expect(parsed.GEMINI_API_KEY).toBe('test-key');
  });

  test('rejects invalid values', () => {
    expect(() => parseEnv({ LLM_CONCURRENCY: '0' })).toThrow('Environment validation failed');
    expect(() => parseEnv({ LLM_PROVIDER: 'openai' })).toThrow('LLM_PROVIDER');
  });
});
