/**
 * createNutriScanApp — builds one of each service and wires them together.
 *
 * Anything not passed in is built from env: Supabase for identity and
 * history, the vision provider named by VISION_PROVIDER, and JPEG copies
 * of captures under CAPTURE_DIR.
 */
import type { SupabaseClient } from '@supabase/supabase-js';
import { applyLogLevel, type Env } from './config/env';
import { SupabaseIdentityProvider } from './services/auth/SupabaseIdentityProvider';
import type { IdentityProvider } from './services/auth/IdentityProvider';
import type { CameraDevice } from './services/camera/CameraDevice';
import { CaptureSessionManager } from './services/camera/CaptureSessionManager';
import { createFrameWriter, type FrameWriter } from './services/camera/frameStorage';
import type { HistoryStore } from './services/history/HistoryStore';
import { HistorySyncService } from './services/history/HistorySyncService';
import { SupabaseHistoryStore } from './services/history/SupabaseHistoryStore';
import { ScanSession } from './services/scanSession';
import { createSupabaseClient } from './services/supabaseClient';
import { createVisionService, type FoodVisionService } from './services/vision';

export interface NutriScanAppOptions {
  env: Env;
  camera: CameraDevice;
  identity?: IdentityProvider;
  historyStore?: HistoryStore;
  vision?: FoodVisionService;
  /** null disables local copies of captured frames. */
  frameWriter?: FrameWriter | null;
}

export interface NutriScanApp {
  identity: IdentityProvider;
  history: HistorySyncService;
  capture: CaptureSessionManager;
  vision: FoodVisionService;
  scan: ScanSession;
  /** Restore the session and start following the signed-in user's history. */
  start(): Promise<void>;
  dispose(): Promise<void>;
}

export function createNutriScanApp(options: NutriScanAppOptions): NutriScanApp {
  const { env, camera } = options;
  applyLogLevel(env);

  let client: SupabaseClient | null = null;
  const supabase = (): SupabaseClient => {
    client ??= createSupabaseClient(env);
    return client;
  };

  const identity = options.identity ?? new SupabaseIdentityProvider(supabase());
  const historyStore = options.historyStore ?? new SupabaseHistoryStore(supabase(), env.SUPABASE_HISTORY_TABLE);
  const vision = options.vision ?? createVisionService(env);
  const frameWriter = options.frameWriter === undefined ? createFrameWriter(env.CAPTURE_DIR) : options.frameWriter;

  const history = new HistorySyncService(identity, historyStore);
  const capture = new CaptureSessionManager(camera, frameWriter);
  const scan = new ScanSession(capture, vision, history, identity);

  let unbind: (() => void) | null = null;

  return {
    identity,
    history,
    capture,
    vision,
    scan,

    async start() {
      if (identity instanceof SupabaseIdentityProvider) await identity.init();
      unbind ??= history.bindToIdentity();
      await history.subscribe();
    },

    async dispose() {
      unbind?.();
      unbind = null;
      await history.dispose();
      await capture.stop();
      if (identity instanceof SupabaseIdentityProvider) identity.dispose();
    },
  };
}
