/**
 * Copying captured samples into frame buffers.
 */

import type { ByteBuffer } from '../buffer/byte-buffer.ts';
import type { SampleBuffer } from './types.ts';

export interface FrameGeometry {
  /** Width of the Y plane in pixels */
  readonly width: number;
  /** Height of the Y plane in pixels */
  readonly height: number;
  /** Bytes copied, both planes including row padding */
  readonly frameSize: number;
}

/**
 * Copy the Y and UV planes of a bi-planar sample into `buffer`, Y first.
 *
 * Returns null without touching `buffer` when the sample holds anything but
 * exactly one ready, valid image, its memory cannot be locked, or a plane is
 * shorter than its rows.
 */
export function copySampleToBuffer(
  sample: SampleBuffer,
  buffer: ByteBuffer
): FrameGeometry | null {
  if (sample.sampleCount !== 1 || !sample.isValid || !sample.isDataReady) {
    return null;
  }
  const planes = sample.planes;
  if (planes === null) {
    return null;
  }
  if (!sample.lock()) {
    return null;
  }

  try {
    const [yPlane, uvPlane] = planes;
    const ySize = yPlane.bytesPerRow * yPlane.height;
    const uvSize = uvPlane.bytesPerRow * uvPlane.height;
    if (yPlane.bytes.byteLength < ySize || uvPlane.bytes.byteLength < uvSize) {
      return null;
    }
    const frameSize = ySize + uvSize;

    buffer.ensureCapacity(frameSize);
    buffer.setData(yPlane.bytes, ySize);
    buffer.appendData(uvPlane.bytes, uvSize);

    return { width: yPlane.width, height: yPlane.height, frameSize };
  } finally {
    sample.unlock();
  }
}
