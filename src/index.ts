export { createNutriScanApp, type NutriScanApp, type NutriScanAppOptions } from './app';
export { loadEnv, type Env } from './config/env';
export * from './types/models';
export * from './services/auth';
export * from './services/camera';
export * from './services/history';
export * from './services/vision';
export { ScanSession, type ScanPhase, type ScanSessionState } from './services/scanSession';
export { FileSessionStorage } from './services/sessionStorage';
export { createSupabaseClient } from './services/supabaseClient';
export { displayLabel, extractFoodLabel, formatScanDate, truncateText } from './utils/helpers';
