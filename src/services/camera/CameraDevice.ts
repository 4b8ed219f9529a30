/**
 * CameraDevice — the platform camera the capture manager drives.
 *
 * Permission results follow the expo-camera PermissionResponse shape.
 * Frames are delivered already decoded; the device drops late frames
 * instead of queueing them.
 */
import type { CaptureFrame } from '../../types/models';

export type CameraPermissionStatus = 'granted' | 'denied' | 'undetermined';

export interface CameraPermission {
  status: CameraPermissionStatus;
  granted: boolean;
  canAskAgain: boolean;
}

export type FrameHandler = (frame: CaptureFrame) => void;

export interface CameraDevice {
  getPermission(): Promise<CameraPermission>;
  requestPermission(): Promise<CameraPermission>;
  /** Begin streaming; resolves once the session is running. */
  startStream(onFrame: FrameHandler): Promise<void>;
  stopStream(): Promise<void>;
}
