/**
 * Supabase client factory for NutriScan.
 */
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { Env } from '../config/env';
import { FileSessionStorage } from './sessionStorage';

export function createSupabaseClient(env: Env): SupabaseClient {
  return createClient(env.SUPABASE_URL, env.SUPABASE_ANON_KEY, {
    auth: {
      storage: new FileSessionStorage(env.SESSION_FILE),
      autoRefreshToken: true,
      persistSession: true,
      detectSessionInUrl: false,
    },
  });
}
