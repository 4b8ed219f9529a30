import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { historyNamespace, type CaptureFrame } from '../types/models';
import { MemoryIdentityProvider } from './auth/MemoryIdentityProvider';
import type { CameraDevice, FrameHandler } from './camera/CameraDevice';
import { CaptureSessionManager } from './camera/CaptureSessionManager';
import { HistorySyncService } from './history/HistorySyncService';
import { MemoryHistoryStore } from './history/MemoryHistoryStore';
import { ScanSession } from './scanSession';
import { VisionError } from './vision/types';

const ANALYSIS = 'Apple\n- Per 100 g: 52 kcal';

class StillCamera implements CameraDevice {
  private onFrame: FrameHandler | null = null;
  getPermission = async () => ({ status: 'granted' as const, granted: true, canAskAgain: true });
  requestPermission = this.getPermission;
  startStream = async (onFrame: FrameHandler) => {
    this.onFrame = onFrame;
  };
  stopStream = async () => {};

  emit(frame: CaptureFrame): void {
    this.onFrame?.(frame);
  }
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('ScanSession', () => {
  let camera: StillCamera;
  let capture: CaptureSessionManager;
  let identity: MemoryIdentityProvider;
  let store: MemoryHistoryStore;
  let history: HistorySyncService;
  let analyzeImage: Mock<(frame: CaptureFrame, prompt?: string) => Promise<string>>;
  let session: ScanSession;

  async function captureFrame(): Promise<CaptureFrame | null> {
    await capture.start();
    camera.emit({ data: Buffer.alloc(12, 5), width: 2, height: 2, channels: 3, capturedAt: 100 });
    return capture.captureCurrentFrame();
  }

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    camera = new StillCamera();
    capture = new CaptureSessionManager(camera);
    identity = new MemoryIdentityProvider('user-1');
    store = new MemoryHistoryStore({ now: () => new Date('2024-05-01T10:00:00Z'), idFactory: () => 'entry-1' });
    history = new HistorySyncService(identity, store);
    analyzeImage = vi.fn(async (_frame: CaptureFrame, _prompt?: string) => ANALYSIS);
    session = new ScanSession(capture, { analyzeImage }, history, identity);
  });

  it('asks to retry when nothing was captured', async () => {
    await session.analyze();

    expect(analyzeImage).not.toHaveBeenCalled();
    expect(session.state.getState()).toMatchObject({
      phase: 'idle',
      errorMessage: 'No captured frame yet. Try again.',
    });
  });

  it('analyzes the captured frame and extracts the label', async () => {
    const frame = await captureFrame();
    await session.analyze();

    expect(analyzeImage).toHaveBeenCalledWith(frame);
    expect(session.state.getState()).toMatchObject({
      phase: 'analyzed',
      analysisText: ANALYSIS,
      label: 'Apple',
      errorMessage: null,
    });
  });

  it('returns to idle with the error message when analysis fails', async () => {
    analyzeImage.mockRejectedValueOnce(new VisionError('no_text_response'));
    await captureFrame();
    await session.analyze();

    expect(session.state.getState()).toMatchObject({
      phase: 'idle',
      analysisText: null,
      errorMessage: 'The analysis finished but returned no text.',
    });
  });

  it('refuses to save without an analysis', async () => {
    await session.save();

    expect(session.state.getState().saveError).toBe('No analysis result to save.');
    expect(store.snapshot(historyNamespace('user-1'))).toEqual([]);
  });

  it('refuses to save when signed out', async () => {
    await captureFrame();
    await session.analyze();
    identity.setIdentity(null);
    await session.save();

    expect(session.state.getState()).toMatchObject({
      phase: 'analyzed',
      saveError: 'Cannot save history: not signed in.',
    });
  });

  it('saves the analysis into the synchronized history', async () => {
    await history.subscribe();
    await captureFrame();
    await session.analyze();
    await session.save();
    await flush();

    expect(session.state.getState()).toMatchObject({ phase: 'saved', savedEntryId: 'entry-1', saveError: null });
    expect(history.getEntries()).toEqual([
      {
        id: 'entry-1',
        ownerId: 'user-1',
        createdAt: new Date('2024-05-01T10:00:00Z'),
        label: 'Apple',
        analysisText: ANALYSIS,
      },
    ]);
    await history.dispose();
  });

  it('keeps the analysis and reports the store error when saving fails', async () => {
    store.setOffline(new Error('network down'));
    await captureFrame();
    await session.analyze();
    await session.save();

    expect(session.state.getState()).toMatchObject({
      phase: 'analyzed',
      analysisText: ANALYSIS,
      saveError: 'Failed to save: network down',
    });
  });

  it('drops an analysis that lands after reset', async () => {
    let finish: (text: string) => void = () => {};
    analyzeImage.mockImplementationOnce(
      () => new Promise<string>((resolve) => {
        finish = resolve;
      }),
    );
    await captureFrame();

    const analyzing = session.analyze();
    expect(session.state.getState().phase).toBe('analyzing');
    session.reset();
    finish(ANALYSIS);
    await analyzing;

    expect(session.state.getState()).toMatchObject({ phase: 'idle', analysisText: null, label: null });
    expect(capture.state.getState().capturedFrame).toBeNull();
  });
});
