import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import type { CaptureFrame } from '../../types/models';
import type { CameraDevice, CameraPermission, FrameHandler } from './CameraDevice';
import { CaptureSessionManager } from './CaptureSessionManager';

const GRANTED: CameraPermission = { status: 'granted', granted: true, canAskAgain: true };
const DENIED: CameraPermission = { status: 'denied', granted: false, canAskAgain: false };
const UNDETERMINED: CameraPermission = { status: 'undetermined', granted: false, canAskAgain: true };

class FakeCamera implements CameraDevice {
  permission: CameraPermission = GRANTED;
  answer: CameraPermission = GRANTED;
  streaming = false;
  private onFrame: FrameHandler | null = null;

  getPermission = vi.fn(async () => this.permission);
  requestPermission = vi.fn(async () => {
    this.permission = this.answer;
    return this.answer;
  });
  startStream = vi.fn(async (onFrame: FrameHandler) => {
    this.onFrame = onFrame;
    this.streaming = true;
  });
  stopStream = vi.fn(async () => {
    this.streaming = false;
  });

  emit(frame: CaptureFrame): void {
    this.onFrame?.(frame);
  }
}

const frame = (capturedAt: number, fill = 1): CaptureFrame => ({
  data: Buffer.alloc(12, fill),
  width: 2,
  height: 2,
  channels: 3,
  capturedAt,
});

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('CaptureSessionManager', () => {
  let camera: FakeCamera;
  let writer: Mock<(frame: CaptureFrame) => Promise<string>>;
  let manager: CaptureSessionManager;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    camera = new FakeCamera();
    writer = vi.fn(async (_frame: CaptureFrame) => '/tmp/captures/frame.jpg');
    manager = new CaptureSessionManager(camera, writer);
  });

  it('captures nothing before the first frame arrives', () => {
    expect(() => manager.captureCurrentFrame()).not.toThrow();
    expect(manager.captureCurrentFrame()).toBeNull();
    expect(manager.state.getState().capturedFrame).toBeNull();
    expect(writer).not.toHaveBeenCalled();
  });

  it('starts streaming when permission is already granted', async () => {
    await manager.start();

    expect(camera.requestPermission).not.toHaveBeenCalled();
    expect(camera.startStream).toHaveBeenCalledTimes(1);
    expect(manager.isRunning).toBe(true);
    expect(manager.state.getState().status).toBe('running');
  });

  it('asks for permission when it was never asked', async () => {
    camera.permission = UNDETERMINED;
    await manager.start();

    expect(camera.requestPermission).toHaveBeenCalledTimes(1);
    expect(manager.state.getState().status).toBe('running');
  });

  it('shows the camera as unavailable when permission is denied', async () => {
    camera.permission = UNDETERMINED;
    camera.answer = DENIED;
    await manager.start();

    expect(camera.startStream).not.toHaveBeenCalled();
    expect(manager.state.getState().status).toBe('unavailable');
    expect(console.warn).toHaveBeenCalledWith('[Capture] Camera permission denied; camera unavailable');
  });

  it('does not open a second stream while one is running or starting', async () => {
    const first = manager.start();
    const second = manager.start();
    await Promise.all([first, second]);
    await manager.start();

    expect(camera.startStream).toHaveBeenCalledTimes(1);
  });

  it('always exposes the latest frame', async () => {
    await manager.start();
    camera.emit(frame(100, 1));
    camera.emit(frame(200, 2));
    camera.emit(frame(150, 3));

    expect(manager.state.getState().liveFrame?.capturedAt).toBe(200);
  });

  it('freezes a copy of the live frame and saves it locally', async () => {
    await manager.start();
    const live = frame(100, 7);
    camera.emit(live);

    const captured = manager.captureCurrentFrame();
    live.data.fill(0);

    expect(captured?.capturedAt).toBe(100);
    expect(manager.state.getState().capturedFrame).toBe(captured);
    expect(captured?.data[0]).toBe(7);
    expect(writer).toHaveBeenCalledWith(captured);
  });

  it('keeps the capture when saving it locally fails', async () => {
    writer.mockRejectedValueOnce(new Error('disk full'));
    await manager.start();
    camera.emit(frame(100));

    const captured = manager.captureCurrentFrame();
    await flush();

    expect(captured).not.toBeNull();
    expect(manager.state.getState().capturedFrame).toBe(captured);
    expect(console.warn).toHaveBeenCalledWith('[Capture] Could not save frame locally:', 'disk full');
  });

  it('drops frames delivered after stop', async () => {
    await manager.start();
    camera.emit(frame(100));
    await manager.stop();
    camera.emit(frame(200));

    expect(manager.state.getState().liveFrame?.capturedAt).toBe(100);
    expect(manager.state.getState().status).toBe('idle');
  });

  it('is safe to stop more than once', async () => {
    await manager.stop();
    await manager.start();
    await manager.stop();
    await manager.stop();

    expect(camera.stopStream).toHaveBeenCalledTimes(1);
    expect(manager.isRunning).toBe(false);
  });

  it('does not start the stream when stopped while waiting for permission', async () => {
    let answer: (permission: CameraPermission) => void = () => {};
    camera.getPermission.mockImplementationOnce(
      () => new Promise<CameraPermission>((resolve) => {
        answer = resolve;
      }),
    );

    const starting = manager.start();
    await manager.stop();
    answer(GRANTED);
    await starting;

    expect(camera.startStream).not.toHaveBeenCalled();
    expect(manager.state.getState().status).toBe('idle');
  });

  it('lets a retired start finish with the device before opening the next stream', async () => {
    let finishFirst: () => void = () => {};
    camera.startStream.mockImplementationOnce(
      () => new Promise<void>((resolve) => {
        finishFirst = () => {
          camera.streaming = true;
          resolve();
        };
      }),
    );

    const first = manager.start();
    await flush();
    expect(camera.startStream).toHaveBeenCalledTimes(1);

    await manager.stop();
    const second = manager.start();
    await flush();
    expect(camera.startStream).toHaveBeenCalledTimes(1);

    finishFirst();
    await Promise.all([first, second]);

    expect(camera.startStream).toHaveBeenCalledTimes(2);
    expect(camera.stopStream).toHaveBeenCalledTimes(1);
    expect(camera.streaming).toBe(true);
    expect(manager.isRunning).toBe(true);
    expect(manager.state.getState().status).toBe('running');
  });

  it('can start again after a stop', async () => {
    await manager.start();
    await manager.stop();
    await manager.start();

    expect(camera.startStream).toHaveBeenCalledTimes(2);
    expect(manager.isRunning).toBe(true);
  });

  it('clears the captured frame on retake', async () => {
    await manager.start();
    camera.emit(frame(100));
    manager.captureCurrentFrame();
    manager.clearCapture();

    expect(manager.state.getState().capturedFrame).toBeNull();
  });
});
