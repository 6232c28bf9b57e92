/**
 * Views over raw storage.
 *
 * Buffers never expose their storage as an owner; they hand out typed views
 * bounded to the region a caller may touch.
 */

import type { ByteOffset } from '../types/branded.ts';
import { elementsToBytes } from '../types/branded.ts';
import type { ElementArray, ElementType } from '../types/elements.ts';
import { check, checkCount } from './errors.ts';

/**
 * External memory a buffer can copy from.
 *
 * Plain arrays are read as byte values, one element per byte.
 */
export type ByteSource = ArrayBufferView | ArrayBuffer | readonly number[];

const EMPTY_STORAGE = new ArrayBuffer(0);

/**
 * Create a view of `length` elements of `type` starting at `offset` bytes
 * into `storage`. A null storage is only valid for an empty view.
 */
export function createView<V extends ElementArray>(
  type: ElementType<V>,
  storage: ArrayBuffer | null,
  offset: ByteOffset,
  length: number
): V {
  checkCount(length, 'view length');
  check(
    offset % type.BYTES_PER_ELEMENT === 0,
    `view at byte offset ${offset} is not aligned to ${type.BYTES_PER_ELEMENT}-byte elements`
  );
  const target = storage ?? EMPTY_STORAGE;
  check(
    offset + elementsToBytes(length, type.BYTES_PER_ELEMENT) <= target.byteLength,
    `view of ${length} elements at byte offset ${offset} exceeds storage of ${target.byteLength} bytes`
  );
  return new type(target, offset, length);
}

/**
 * Size of one element of `source`, in bytes.
 */
export function bytesPerElement(source: ByteSource): number {
  if (ArrayBuffer.isView(source) && 'BYTES_PER_ELEMENT' in source) {
    const size = source.BYTES_PER_ELEMENT;
    if (typeof size === 'number') {
      return size;
    }
  }
  return 1;
}

/**
 * Byte view over the first `length` elements of `source`.
 * Typed arrays and DataViews are viewed in place; plain arrays are copied.
 * Defaults to every element of the source.
 */
export function bytesOf(source: ByteSource, length?: number): Uint8Array {
  const bytes = wholeBytesOf(source);
  if (length === undefined) {
    return bytes;
  }
  checkCount(length, 'length');
  const byteCount = elementsToBytes(length, bytesPerElement(source));
  check(
    byteCount <= bytes.byteLength,
    `length ${length} exceeds source of ${bytes.byteLength} bytes`
  );
  return bytes.subarray(0, byteCount);
}

function wholeBytesOf(source: ByteSource): Uint8Array {
  if (source instanceof ArrayBuffer) {
    return new Uint8Array(source);
  }
  if (ArrayBuffer.isView(source)) {
    return new Uint8Array(source.buffer, source.byteOffset, source.byteLength);
  }
  return Uint8Array.from(source);
}
