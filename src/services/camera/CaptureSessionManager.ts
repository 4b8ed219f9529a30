/**
 * CaptureSessionManager — one live camera session plus the live and
 * captured frame buffers.
 *
 * Every start() opens a new session number; stop() retires it, so a frame
 * or a permission answer that belongs to an older session is ignored.
 * Opens run one after another: a start() issued while a retired open is
 * still talking to the device waits for it to finish.
 */
import { createStore, type StoreApi } from 'zustand/vanilla';
import { __DEV__ } from '../../config/env';
import type { CameraStatus, CaptureFrame } from '../../types/models';
import { errorMessage } from '../../utils/helpers';
import type { CameraDevice } from './CameraDevice';
import type { FrameWriter } from './frameStorage';

export interface CaptureState {
  status: CameraStatus;
  liveFrame: CaptureFrame | null;
  capturedFrame: CaptureFrame | null;
}

export class CaptureSessionManager {
  readonly state: StoreApi<CaptureState>;

  private session = 0;
  private running = false;
  private starting: { session: number; promise: Promise<void> } | null = null;
  /** Settles once the most recent open is done with the device. */
  private opening: Promise<void> = Promise.resolve();

  constructor(
    private readonly camera: CameraDevice,
    private readonly writeFrame: FrameWriter | null = null,
  ) {
    this.state = createStore<CaptureState>()(() => ({
      status: 'idle',
      liveFrame: null,
      capturedFrame: null,
    }));
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Ask for permission if it was never asked, then start streaming.
   * Denial leaves the state `unavailable` and is only logged.
   */
  start(): Promise<void> {
    if (this.running) return Promise.resolve();
    if (this.starting?.session === this.session) return this.starting.promise;

    const session = ++this.session;
    this.state.setState({ status: 'starting' });
    const promise = this.opening
      .then(() => this.open(session))
      .finally(() => {
        if (this.starting?.session === session) this.starting = null;
      });
    this.opening = promise;
    this.starting = { session, promise };
    return promise;
  }

  async stop(): Promise<void> {
    this.session++;
    const wasRunning = this.running;
    this.running = false;
    this.state.setState({ status: 'idle' });
    if (!wasRunning) return;

    try {
      await this.camera.stopStream();
      if (__DEV__) console.log('[Capture] Session stopped');
    } catch (e) {
      console.warn('[Capture] Stopping the camera failed:', errorMessage(e));
    }
  }

  /**
   * Freeze the current live frame as the captured one.
   * Returns null when no frame has arrived yet; callers may simply retry.
   */
  captureCurrentFrame(): CaptureFrame | null {
    const live = this.state.getState().liveFrame;
    if (!live) {
      if (__DEV__) console.log('[Capture] No live frame yet; nothing captured');
      return null;
    }

    const captured: CaptureFrame = { ...live, data: Buffer.from(live.data) };
    this.state.setState({ capturedFrame: captured });

    if (this.writeFrame) {
      this.writeFrame(captured).then(
        (file) => {
          if (__DEV__) console.log(`[Capture] Saved frame to ${file}`);
        },
        (e: unknown) => console.warn('[Capture] Could not save frame locally:', errorMessage(e)),
      );
    }
    return captured;
  }

  clearCapture(): void {
    this.state.setState({ capturedFrame: null });
  }

  private async open(session: number): Promise<void> {
    if (session !== this.session) return;
    try {
      let permission = await this.camera.getPermission();
      if (permission.status === 'undetermined') {
        permission = await this.camera.requestPermission();
      }
      if (session !== this.session) return;

      if (!permission.granted) {
        console.warn('[Capture] Camera permission denied; camera unavailable');
        this.state.setState({ status: 'unavailable' });
        return;
      }

      await this.camera.startStream((frame) => this.receiveFrame(session, frame));
      if (session !== this.session) {
        // stop() landed while the stream was starting.
        await this.camera.stopStream();
        return;
      }

      this.running = true;
      this.state.setState({ status: 'running' });
      if (__DEV__) console.log('[Capture] Session running');
    } catch (e) {
      console.error('[Capture] Could not start the camera:', errorMessage(e));
      if (session === this.session) this.state.setState({ status: 'unavailable' });
    }
  }

  private receiveFrame(session: number, frame: CaptureFrame): void {
    if (session !== this.session) return;
    const live = this.state.getState().liveFrame;
    if (live && frame.capturedAt < live.capturedAt) return;
    this.state.setState({ liveFrame: frame });
  }
}
