/**
 * Image encoding for the vision pipeline and for local capture copies.
 *
 * compressImage resizes so the longest side is at most 768 px and encodes
 * JPEG at quality 65, which keeps request payloads small.
 */
import sharp from 'sharp';
import type { CaptureFrame } from '../../types/models';

const MAX_SIDE = 768;
const JPEG_QUALITY = 65;

export interface CompressedImage {
  buffer: Buffer;
  mimeType: 'image/jpeg';
  width: number;
  height: number;
}

function fromFrame(frame: CaptureFrame): sharp.Sharp {
  return sharp(frame.data, {
    raw: { width: frame.width, height: frame.height, channels: frame.channels },
  });
}

/** Encode a frame as JPEG at its full size. */
export function encodeJpeg(frame: CaptureFrame, quality: number): Promise<Buffer> {
  return fromFrame(frame).jpeg({ quality }).toBuffer();
}

export async function compressImage(frame: CaptureFrame): Promise<CompressedImage> {
  const { data, info } = await fromFrame(frame)
    .resize({ width: MAX_SIDE, height: MAX_SIDE, fit: 'inside', withoutEnlargement: true })
    .jpeg({ quality: JPEG_QUALITY })
    .toBuffer({ resolveWithObject: true });

  return { buffer: data, mimeType: 'image/jpeg', width: info.width, height: info.height };
}
