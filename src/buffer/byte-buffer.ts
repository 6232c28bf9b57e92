/**
 * Growable single-owner byte buffer.
 *
 * Bytes in [0, size) are valid; bytes in [size, capacity) are unspecified.
 * Growth is exact-fit: storage is reallocated only when a request exceeds
 * the current capacity, and then to exactly the requested byte count.
 * Capacity never shrinks while the buffer keeps its storage.
 *
 * Storage is null exactly when capacity is 0. Transferring storage out of
 * a buffer (`take`, `moveFrom`) leaves it empty and ready for reuse.
 */

import type { ByteLength } from '../types/branded.ts';
import {
  byteLength,
  byteOffset,
  bytesToElements,
  elementsToBytes,
  ZERO_BYTE_OFFSET,
} from '../types/branded.ts';
import type { ElementArray, ElementType, Writer } from '../types/elements.ts';
import { BufferContractError, check, checkCount } from './errors.ts';
import { bytesOf, createView, type ByteSource } from './view.ts';

/**
 * Anything a buffer can copy bytes from, including another buffer.
 */
export type ByteInput = ByteSource | ByteBuffer;

export class ByteBuffer {
  private storage: ArrayBuffer | null = null;
  private length = 0;

  /**
   * Create an empty buffer (size 0, capacity 0, no storage).
   */
  static empty(): ByteBuffer {
    return new ByteBuffer();
  }

  /**
   * Create a buffer of `size` bytes backed by exactly `capacity` bytes.
   * Contents are unspecified.
   */
  static withSize(size: number, capacity: number = size): ByteBuffer {
    checkCount(size, 'size');
    checkCount(capacity, 'capacity');
    check(capacity >= size, `capacity ${capacity} is smaller than size ${size}`);
    const buffer = new ByteBuffer();
    buffer.storage = allocate(capacity);
    buffer.length = size;
    return buffer;
  }

  /**
   * Create a buffer holding a copy of the first `length` elements of
   * `source` (all of them by default), backed by `capacity` bytes
   * (the copied byte count by default).
   */
  static from(source: ByteInput, length?: number, capacity?: number): ByteBuffer {
    const bytes = inputBytes(source, length);
    const buffer = ByteBuffer.withSize(bytes.byteLength, capacity ?? bytes.byteLength);
    if (buffer.storage !== null) {
      new Uint8Array(buffer.storage).set(bytes);
    }
    return buffer;
  }

  /**
   * Deep copy of `source`, with the same capacity.
   */
  static copyOf(source: ByteBuffer): ByteBuffer {
    const buffer = new ByteBuffer();
    buffer.copyFrom(source);
    return buffer;
  }

  /**
   * Take over the storage of `source` without copying. `source` is left empty.
   */
  static take(source: ByteBuffer): ByteBuffer {
    const buffer = new ByteBuffer();
    buffer.moveFrom(source);
    return buffer;
  }

  // ===========================================================================
  // Accessors
  // ===========================================================================

  /** Number of valid bytes */
  get size(): ByteLength {
    return byteLength(this.length);
  }

  /** Number of allocated bytes */
  get capacity(): ByteLength {
    return byteLength(this.storage?.byteLength ?? 0);
  }

  get isEmpty(): boolean {
    return this.length === 0;
  }

  /**
   * Byte view over [0, size) of the storage, or null when nothing is allocated.
   * The view aliases the buffer; its `.buffer` identifies the storage region.
   */
  data(): Uint8Array | null {
    return this.dataAs<Uint8Array>(Uint8Array);
  }

  /**
   * The valid bytes reinterpreted as `type`.
   * Size must be a whole number of elements.
   */
  dataAs<V extends ElementArray>(type: ElementType<V>): V | null {
    if (this.storage === null) {
      return null;
    }
    check(
      this.length % type.BYTES_PER_ELEMENT === 0,
      `size ${this.length} is not a multiple of ${type.BYTES_PER_ELEMENT}-byte elements`
    );
    return createView(
      type,
      this.storage,
      ZERO_BYTE_OFFSET,
      bytesToElements(this.length, type.BYTES_PER_ELEMENT)
    );
  }

  /**
   * Byte at `index`, which must be below size.
   */
  at(index: number): number {
    checkCount(index, 'index');
    check(index < this.length, `index ${index} is out of range for size ${this.length}`);
    return this.bytes()[index];
  }

  [Symbol.iterator](): IterableIterator<number> {
    return this.bytes().values();
  }

  /**
   * Copy of the valid bytes, detached from the buffer.
   */
  toUint8Array(): Uint8Array {
    return this.bytes().slice();
  }

  /**
   * Equal sizes and equal valid bytes. Capacity is not compared.
   */
  equals(other: ByteBuffer): boolean {
    if (this.length !== other.length) {
      return false;
    }
    const a = this.bytes();
    const b = other.bytes();
    for (let i = 0; i < a.length; i++) {
      if (a[i] !== b[i]) {
        return false;
      }
    }
    return true;
  }

  clone(): ByteBuffer {
    return ByteBuffer.copyOf(this);
  }

  // ===========================================================================
  // Assignment
  // ===========================================================================

  /**
   * Replace this buffer with a deep copy of `source`, including its capacity.
   */
  copyFrom(source: ByteBuffer): void {
    if (source === this) {
      return;
    }
    const storage = allocate(source.capacity);
    if (storage !== null) {
      new Uint8Array(storage).set(source.bytes());
    }
    this.storage = storage;
    this.length = source.length;
  }

  /**
   * Release this buffer's storage and take over the storage of `source`.
   * `source` is left empty.
   */
  moveFrom(source: ByteBuffer): void {
    if (source === this) {
      return;
    }
    this.storage = source.storage;
    this.length = source.length;
    source.storage = null;
    source.length = 0;
  }

  /**
   * Exchange contents with `other` without copying.
   */
  swap(other: ByteBuffer): void {
    const storage = this.storage;
    const length = this.length;
    this.storage = other.storage;
    this.length = other.length;
    other.storage = storage;
    other.length = length;
  }

  // ===========================================================================
  // Size and Capacity
  // ===========================================================================

  /**
   * Set size to `size`. Grows storage to exactly `size` bytes when it does
   * not fit, keeping the valid bytes. Never shrinks storage.
   */
  setSize(size: number): void {
    checkCount(size, 'size');
    this.ensureCapacity(size);
    this.length = size;
  }

  /**
   * Grow storage to exactly `capacity` bytes if it is currently smaller.
   * Otherwise nothing changes, storage included.
   */
  ensureCapacity(capacity: number): void {
    checkCount(capacity, 'capacity');
    if (capacity > this.capacity) {
      this.reallocate(capacity);
    }
  }

  /**
   * Set size to 0, keeping storage for reuse.
   */
  clear(): void {
    this.length = 0;
  }

  // ===========================================================================
  // Writing
  // ===========================================================================

  /**
   * Replace the contents with the first `length` elements of `source`.
   */
  setData(source: ByteInput, length?: number): void;
  /**
   * Replace the contents by letting `writer` fill up to `maxLength` bytes in
   * place. Returns the number of bytes written.
   */
  setData(maxLength: number, writer: Writer<Uint8Array>): number;
  setData(first: ByteInput | number, second?: number | Writer<Uint8Array>): number | void {
    if (typeof first === 'number') {
      return this.setDataAs<Uint8Array>(Uint8Array, first, writerArgument(second));
    }
    const bytes = inputBytes(first, lengthArgument(second));
    this.length = 0;
    this.appendBytes(bytes);
  }

  /**
   * Append the first `length` elements of `source`.
   */
  appendData(source: ByteInput, length?: number): void;
  /**
   * Let `writer` fill up to `maxLength` bytes in place after the current
   * contents. Returns the number of bytes written.
   */
  appendData(maxLength: number, writer: Writer<Uint8Array>): number;
  appendData(first: ByteInput | number, second?: number | Writer<Uint8Array>): number | void {
    if (typeof first === 'number') {
      return this.appendDataAs<Uint8Array>(Uint8Array, first, writerArgument(second));
    }
    this.appendBytes(inputBytes(first, lengthArgument(second)));
  }

  /**
   * `setData` with a writer that sees the storage as elements of `type`.
   * `maxLength` and the returned count are in elements.
   */
  setDataAs<V extends ElementArray>(
    type: ElementType<V>,
    maxLength: number,
    writer: Writer<V>
  ): number {
    this.length = 0;
    return this.appendDataAs(type, maxLength, writer);
  }

  /**
   * `appendData` with a writer that sees the storage as elements of `type`.
   * `maxLength` and the returned count are in elements.
   */
  appendDataAs<V extends ElementArray>(
    type: ElementType<V>,
    maxLength: number,
    writer: Writer<V>
  ): number {
    checkCount(maxLength, 'maxLength');
    const oldSize = this.length;
    check(
      oldSize % type.BYTES_PER_ELEMENT === 0,
      `size ${oldSize} is not aligned to ${type.BYTES_PER_ELEMENT}-byte elements`
    );
    const end = oldSize + elementsToBytes(maxLength, type.BYTES_PER_ELEMENT);
    this.ensureCapacity(end);
    const view = createView(type, this.storage, byteOffset(oldSize), maxLength);

    const written = writer(view);
    if (!Number.isInteger(written) || written < 0 || written > maxLength) {
      throw new BufferContractError(
        `writer reported ${written} elements written, expected 0 to ${maxLength}`
      );
    }
    this.length = oldSize + elementsToBytes(written, type.BYTES_PER_ELEMENT);
    return written;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private bytes(): Uint8Array {
    if (this.storage === null) {
      return new Uint8Array(0);
    }
    return new Uint8Array(this.storage, 0, this.length);
  }

  private appendBytes(bytes: Uint8Array): void {
    const oldSize = this.length;
    this.ensureCapacity(oldSize + bytes.byteLength);
    if (this.storage !== null) {
      new Uint8Array(this.storage).set(bytes, oldSize);
    }
    this.length = oldSize + bytes.byteLength;
  }

  private reallocate(capacity: number): void {
    const storage = new ArrayBuffer(capacity);
    new Uint8Array(storage).set(this.bytes());
    this.storage = storage;
  }
}

function allocate(capacity: number): ArrayBuffer | null {
  return capacity === 0 ? null : new ArrayBuffer(capacity);
}

function inputBytes(source: ByteInput, length?: number): Uint8Array {
  if (source instanceof ByteBuffer) {
    const bytes = source.data() ?? new Uint8Array(0);
    return length === undefined ? bytes : bytesOf(bytes, length);
  }
  return bytesOf(source, length);
}

function writerArgument(value: number | Writer<Uint8Array> | undefined): Writer<Uint8Array> {
  if (typeof value !== 'function') {
    throw new BufferContractError('a writer callback is required when a maximum length is given');
  }
  return value;
}

function lengthArgument(value: number | Writer<Uint8Array> | undefined): number | undefined {
  if (typeof value === 'function') {
    throw new BufferContractError('a writer callback requires a maximum length, not a source');
  }
  return value;
}
