export type { CameraDevice, CameraPermission, CameraPermissionStatus, FrameHandler } from './CameraDevice';
export { CaptureSessionManager, type CaptureState } from './CaptureSessionManager';
export { createFrameWriter, type FrameWriter } from './frameStorage';
