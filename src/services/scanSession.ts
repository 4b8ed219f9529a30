/**
 * ScanSession — capture → analyze → save, for one captured frame at a time.
 *
 * reset() retires the running analysis or save; its result is dropped
 * when it lands.
 */
import { createStore, type StoreApi } from 'zustand/vanilla';
import { __DEV__ } from '../config/env';
import { errorMessage, extractFoodLabel } from '../utils/helpers';
import type { IdentityProvider } from './auth/IdentityProvider';
import type { CaptureSessionManager } from './camera/CaptureSessionManager';
import type { HistorySyncService } from './history/HistorySyncService';
import type { FoodVisionService } from './vision/FoodVisionService';

export type ScanPhase = 'idle' | 'analyzing' | 'analyzed' | 'saving' | 'saved';

export interface ScanSessionState {
  phase: ScanPhase;
  analysisText: string | null;
  label: string | null;
  errorMessage: string | null;
  saveError: string | null;
  savedEntryId: string | null;
}

const INITIAL_STATE: ScanSessionState = {
  phase: 'idle',
  analysisText: null,
  label: null,
  errorMessage: null,
  saveError: null,
  savedEntryId: null,
};

export class ScanSession {
  readonly state: StoreApi<ScanSessionState>;
  private run = 0;

  constructor(
    private readonly capture: CaptureSessionManager,
    private readonly vision: FoodVisionService,
    private readonly history: HistorySyncService,
    private readonly identity: IdentityProvider,
  ) {
    this.state = createStore<ScanSessionState>()(() => INITIAL_STATE);
  }

  /** Analyze the captured frame. Resolves once the state reflects the outcome. */
  async analyze(): Promise<void> {
    const frame = this.capture.state.getState().capturedFrame;
    if (!frame) {
      this.state.setState({ errorMessage: 'No captured frame yet. Try again.' });
      return;
    }

    const run = ++this.run;
    this.state.setState({ ...INITIAL_STATE, phase: 'analyzing' });

    try {
      const text = await this.vision.analyzeImage(frame);
      if (run !== this.run) return;
      const label = extractFoodLabel(text);
      this.state.setState({ phase: 'analyzed', analysisText: text, label });
      if (__DEV__) console.log(`[Scan] Analysis ready (${label ?? 'no label'})`);
    } catch (e) {
      if (run !== this.run) return;
      console.error('[Scan] Analysis failed:', errorMessage(e));
      this.state.setState({ phase: 'idle', errorMessage: errorMessage(e) });
    }
  }

  /** Save the current analysis to the signed-in user's history. */
  async save(): Promise<void> {
    const { phase, analysisText, label } = this.state.getState();
    if (phase === 'saving' || phase === 'saved') return;
    if (!analysisText) {
      this.state.setState({ saveError: 'No analysis result to save.' });
      return;
    }
    const userId = this.identity.currentIdentity();
    if (!userId) {
      this.state.setState({ saveError: 'Cannot save history: not signed in.' });
      return;
    }

    const run = this.run;
    this.state.setState({ phase: 'saving', saveError: null });
    const result = await this.history.create(userId, label, analysisText);
    if (run !== this.run) return;

    if (result.ok) {
      this.state.setState({ phase: 'saved', savedEntryId: result.value });
    } else {
      this.state.setState({ phase: 'analyzed', saveError: `Failed to save: ${result.message}` });
    }
  }

  /** Start over: drop the analysis and the captured frame. */
  reset(): void {
    this.run++;
    this.capture.clearCapture();
    this.state.setState(INITIAL_STATE);
  }
}
