/**
 * Tests for copying samples into frame buffers.
 */

import { describe, it, expect, vi } from 'vitest';
import { ByteBuffer } from '../buffer/byte-buffer.ts';
import { copySampleToBuffer } from './frame.ts';
import type { PixelPlane } from './types.ts';

function makePlane(width: number, height: number, bytesPerRow: number, fill: number): PixelPlane {
  return {
    bytes: new Uint8Array(bytesPerRow * height).fill(fill),
    width,
    height,
    bytesPerRow,
  };
}

function makeSample(yPlane: PixelPlane, uvPlane: PixelPlane) {
  return {
    sampleCount: 1,
    isValid: true,
    isDataReady: true,
    planes: [yPlane, uvPlane] as const,
    lock: vi.fn(() => true),
    unlock: vi.fn(),
  };
}

describe('copySampleToBuffer', () => {
  it('should copy the Y plane followed by the UV plane', () => {
    const sample = makeSample(makePlane(4, 2, 4, 1), makePlane(4, 1, 4, 2));
    const buffer = new ByteBuffer();

    const geometry = copySampleToBuffer(sample, buffer);

    expect(geometry).toEqual({ width: 4, height: 2, frameSize: 12 });
    expect([...buffer]).toEqual([1, 1, 1, 1, 1, 1, 1, 1, 2, 2, 2, 2]);
    expect(buffer.capacity).toBe(12);
    expect(sample.lock).toHaveBeenCalledTimes(1);
    expect(sample.unlock).toHaveBeenCalledTimes(1);
  });

  it('should include row padding', () => {
    const sample = makeSample(makePlane(4, 2, 6, 1), makePlane(4, 1, 6, 2));
    const buffer = new ByteBuffer();

    expect(copySampleToBuffer(sample, buffer)).toEqual({ width: 4, height: 2, frameSize: 18 });
    expect(buffer.size).toBe(18);
  });

  it('should reuse buffer storage across frames of the same size', () => {
    const buffer = new ByteBuffer();
    copySampleToBuffer(makeSample(makePlane(4, 2, 4, 1), makePlane(4, 1, 4, 2)), buffer);
    const storage = buffer.data()?.buffer;

    copySampleToBuffer(makeSample(makePlane(4, 2, 4, 3), makePlane(4, 1, 4, 4)), buffer);

    expect(buffer.data()?.buffer).toBe(storage);
    expect([...buffer]).toEqual([3, 3, 3, 3, 3, 3, 3, 3, 4, 4, 4, 4]);
  });

  it('should reject samples that do not hold exactly one ready image', () => {
    const buffer = ByteBuffer.from([9]);
    const base = makeSample(makePlane(2, 1, 2, 1), makePlane(2, 1, 2, 2));

    expect(copySampleToBuffer({ ...base, sampleCount: 2 }, buffer)).toBeNull();
    expect(copySampleToBuffer({ ...base, isValid: false }, buffer)).toBeNull();
    expect(copySampleToBuffer({ ...base, isDataReady: false }, buffer)).toBeNull();
    expect(copySampleToBuffer({ ...base, planes: null }, buffer)).toBeNull();

    expect(base.lock).not.toHaveBeenCalled();
    expect([...buffer]).toEqual([9]);
  });

  it('should skip samples whose memory cannot be locked', () => {
    const sample = makeSample(makePlane(2, 1, 2, 1), makePlane(2, 1, 2, 2));
    sample.lock.mockReturnValue(false);
    const buffer = new ByteBuffer();

    expect(copySampleToBuffer(sample, buffer)).toBeNull();
    expect(sample.unlock).not.toHaveBeenCalled();
    expect(buffer.size).toBe(0);
  });

  it('should skip samples whose planes are shorter than their rows', () => {
    const buffer = ByteBuffer.from([9, 9]);
    const shortY = { ...makePlane(4, 2, 4, 1), bytes: new Uint8Array(4) };
    const shortUv = { ...makePlane(4, 1, 4, 2), bytes: new Uint8Array(3) };
    const first = makeSample(shortY, makePlane(4, 1, 4, 2));
    const second = makeSample(makePlane(4, 2, 4, 1), shortUv);

    expect(copySampleToBuffer(first, buffer)).toBeNull();
    expect(copySampleToBuffer(second, buffer)).toBeNull();

    expect(first.unlock).toHaveBeenCalledTimes(1);
    expect(second.unlock).toHaveBeenCalledTimes(1);
    expect([...buffer]).toEqual([9, 9]);
    expect(buffer.capacity).toBe(2);
  });
});
