/**
 * Type exports for bytebuf.
 */

// Branded byte types
export type {
  ByteOffset,
  ByteLength,
  ElementCount,
} from './branded.ts';

export {
  byteOffset,
  byteLength,
  elementCount,
  isValidCount,
  elementsToBytes,
  bytesToElements,
  ZERO_BYTE_OFFSET,
  ZERO_BYTE_LENGTH,
} from './branded.ts';

// Element types
export type {
  ElementArray,
  ElementType,
  Writer,
} from './elements.ts';
