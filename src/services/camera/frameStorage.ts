/**
 * Best-effort local copies of captured frames (JPEG, quality 80).
 */
import { randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { CaptureFrame } from '../../types/models';
import { encodeJpeg } from '../vision/imageCompress';

const CAPTURE_JPEG_QUALITY = 80;

/** Writes a frame somewhere and resolves with where it went. */
export type FrameWriter = (frame: CaptureFrame) => Promise<string>;

export function createFrameWriter(dir: string): FrameWriter {
  return async (frame) => {
    const jpeg = await encodeJpeg(frame, CAPTURE_JPEG_QUALITY);
    await fs.mkdir(dir, { recursive: true });
    const file = path.join(dir, `${randomUUID()}.jpg`);
    await fs.writeFile(file, jpeg);
    return file;
  };
}
