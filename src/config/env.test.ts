import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { loadEnv } from './env';

const REQUIRED = {
  SUPABASE_URL: 'http://localhost:54321',
  SUPABASE_ANON_KEY: 'test-anon-key',
};

describe('loadEnv', () => {
  it('fills in defaults', () => {
    const env = loadEnv(REQUIRED);

    expect(env).toEqual({
      ...REQUIRED,
      SUPABASE_HISTORY_TABLE: 'scan_history',
      GEMINI_MODEL: 'gemini-2.5-flash',
      VISION_PROVIDER: 'mock',
      CAPTURE_DIR: path.join(os.tmpdir(), 'nutriscan-captures'),
      SESSION_FILE: path.join(os.tmpdir(), 'nutriscan-session.json'),
      NODE_ENV: 'development',
    });
    expect(Object.isFrozen(env)).toBe(true);
  });

  it('picks Gemini when a key is present', () => {
    expect(loadEnv({ ...REQUIRED, GEMINI_API_KEY: 'test-secret' }).VISION_PROVIDER).toBe('gemini');
  });

  it('lets VISION_PROVIDER override the key-based default', () => {
    expect(loadEnv({ ...REQUIRED, GEMINI_API_KEY: 'test-secret', VISION_PROVIDER: 'mock' }).VISION_PROVIDER).toBe(
      'mock',
    );
  });

  it('names every invalid value', () => {
    expect(() => loadEnv({ SUPABASE_URL: 'not a url', VISION_PROVIDER: 'other' })).toThrow(
      /^Invalid environment: SUPABASE_URL: .+; SUPABASE_ANON_KEY: .+; VISION_PROVIDER: .+$/,
    );
  });
});
