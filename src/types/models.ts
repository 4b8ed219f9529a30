// ===== SCAN HISTORY =====

/** A persisted scan record, as decoded from a store snapshot. */
export interface HistoryEntry {
  id: string;
  ownerId: string;
  /** Server-assigned; the only sort key (newest first). */
  createdAt: Date;
  label: string | null;
  analysisText: string;
}

/** A record that has not been persisted yet: no id, no timestamp. */
export interface NewHistoryRecord {
  ownerId: string;
  label: string | null;
  analysisText: string;
}

/** Per-user scope under which history records live. */
export interface HistoryNamespace {
  userId: string;
}

export function historyNamespace(userId: string): HistoryNamespace {
  return { userId };
}

export function namespacePath(ns: HistoryNamespace): string {
  return `users/${ns.userId}/history`;
}

// ===== RESULTS =====

export type HistoryErrorCode = 'invalid_argument' | 'unauthorized' | 'transport_failure';

export type HistoryResult<T> =
  | { ok: true; value: T }
  | { ok: false; code: HistoryErrorCode; message: string };

// ===== CAMERA =====

/** Raw pixels of one decoded camera frame. */
export interface CaptureFrame {
  data: Buffer;
  width: number;
  height: number;
  channels: 3 | 4;
  /** Epoch ms at which the frame was decoded. */
  capturedAt: number;
}

export type CameraStatus = 'idle' | 'starting' | 'running' | 'unavailable';
