/**
 * Environment configuration for NutriScan.
 *
 * Values come from process.env (or any record passed to loadEnv) and are
 * validated once. Supabase keys are required; Gemini is optional and the
 * vision provider falls back to the mock service without a key.
 */
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

const EnvSchema = z.object({
  // Supabase
  SUPABASE_URL: z.string().url(),
  SUPABASE_ANON_KEY: z.string().min(1),
  SUPABASE_HISTORY_TABLE: z.string().min(1).default('scan_history'),

  // Gemini
  GEMINI_API_KEY: z.string().min(1).optional(),
  GEMINI_MODEL: z.string().min(1).default('gemini-2.5-flash'),
  VISION_PROVIDER: z.enum(['gemini', 'mock']).optional(),

  // Local files
  CAPTURE_DIR: z.string().min(1).default(path.join(os.tmpdir(), 'nutriscan-captures')),
  SESSION_FILE: z.string().min(1).default(path.join(os.tmpdir(), 'nutriscan-session.json')),

  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = Omit<z.infer<typeof EnvSchema>, 'VISION_PROVIDER'> & {
  VISION_PROVIDER: 'gemini' | 'mock';
};

export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${problems}`);
  }
  const env = parsed.data;
  return Object.freeze({
    ...env,
    VISION_PROVIDER: env.VISION_PROVIDER ?? (env.GEMINI_API_KEY ? 'gemini' : 'mock'),
  });
}

/**
 * Verbose logging switch. Starts from the process environment and follows
 * the loaded Env once createNutriScanApp applies it.
 */
export let __DEV__ = process.env.NODE_ENV !== 'production';

export function applyLogLevel(env: Pick<Env, 'NODE_ENV'>): void {
  __DEV__ = env.NODE_ENV !== 'production';
}
