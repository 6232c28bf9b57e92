/**
 * Branded types for byte counts and positions.
 *
 * Branded types (also called "opaque types" or "nominal types") prevent
 * accidentally mixing up different kinds of numeric values. A byte length
 * reported by a buffer should not be confused with an element count of a
 * typed view over the same storage when the element is wider than a byte.
 *
 * Usage:
 * ```typescript
 * const size: ByteLength = buffer.size;
 * const count: ElementCount = elementCount(size / 4);
 *
 * // Type error: can't assign ElementCount to ByteLength
 * const wrong: ByteLength = count;
 * ```
 */

// =============================================================================
// Brand Symbol
// =============================================================================

/**
 * Unique symbol used for branding types.
 * This symbol is never used at runtime - it only exists for the type system.
 */
declare const brand: unique symbol;

interface Brand<B> {
  readonly [brand]: B;
}

type Branded<T, B> = T & Brand<B>;

// =============================================================================
// Byte Types
// =============================================================================

/**
 * Byte offset into buffer storage.
 * Typed views over the storage must start at an offset aligned to their
 * element size.
 */
export type ByteOffset = Branded<number, 'ByteOffset'>;

/**
 * Byte length (size/count of bytes).
 *
 * Semantically distinct from ByteOffset: an offset is a position,
 * a length is a size/count.
 */
export type ByteLength = Branded<number, 'ByteLength'>;

/**
 * Number of elements of a typed view.
 * Equal to a ByteLength only for one-byte element types.
 */
export type ElementCount = Branded<number, 'ElementCount'>;

// =============================================================================
// Constructor Functions
// =============================================================================

/**
 * Create a ByteOffset from a number.
 */
export function byteOffset(value: number): ByteOffset {
  return value as ByteOffset;
}

/**
 * Create a ByteLength from a number.
 */
export function byteLength(value: number): ByteLength {
  return value as ByteLength;
}

/**
 * Create an ElementCount from a number.
 */
export function elementCount(value: number): ElementCount {
  return value as ElementCount;
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if a value is a valid count or offset (non-negative integer).
 */
export function isValidCount(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

// =============================================================================
// Conversions
// =============================================================================

/**
 * Byte length spanned by `count` elements of `bytesPerElement` bytes each.
 */
export function elementsToBytes(count: number, bytesPerElement: number): ByteLength {
  return (count * bytesPerElement) as ByteLength;
}

/**
 * Number of whole elements of `bytesPerElement` bytes that fit in `length`.
 */
export function bytesToElements(length: number, bytesPerElement: number): ElementCount {
  return Math.floor(length / bytesPerElement) as ElementCount;
}

// =============================================================================
// Zero Constants
// =============================================================================

export const ZERO_BYTE_OFFSET: ByteOffset = 0 as ByteOffset;

export const ZERO_BYTE_LENGTH: ByteLength = 0 as ByteLength;
