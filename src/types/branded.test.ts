/**
 * Tests for branded byte types.
 */

import { describe, it, expect } from 'vitest';
import {
  byteOffset,
  byteLength,
  elementCount,
  isValidCount,
  elementsToBytes,
  bytesToElements,
  ZERO_BYTE_OFFSET,
  ZERO_BYTE_LENGTH,
  type ByteLength,
} from './branded.ts';

describe('Branded Types', () => {
  describe('constructor functions', () => {
    it('should create ByteOffset from number', () => {
      expect(byteOffset(42)).toBe(42);
    });

    it('should create ByteLength from number', () => {
      expect(byteLength(16)).toBe(16);
    });

    it('should create ElementCount from number', () => {
      expect(elementCount(4)).toBe(4);
    });
  });

  describe('validation', () => {
    it('should accept non-negative integers', () => {
      expect(isValidCount(0)).toBe(true);
      expect(isValidCount(100)).toBe(true);
      expect(isValidCount(1000000)).toBe(true);
    });

    it('should reject everything else', () => {
      expect(isValidCount(-1)).toBe(false);
      expect(isValidCount(1.5)).toBe(false);
      expect(isValidCount(NaN)).toBe(false);
      expect(isValidCount(Infinity)).toBe(false);
      expect(isValidCount(2 ** 53)).toBe(false);
    });
  });

  describe('conversions', () => {
    it('should convert element counts to bytes', () => {
      expect(elementsToBytes(3, 1)).toBe(3);
      expect(elementsToBytes(3, 4)).toBe(12);
    });

    it('should convert bytes to whole elements', () => {
      expect(bytesToElements(12, 4)).toBe(3);
      expect(bytesToElements(13, 4)).toBe(3);
      expect(bytesToElements(1, 8)).toBe(0);
    });
  });

  describe('constants', () => {
    it('should be zero', () => {
      expect(ZERO_BYTE_OFFSET).toBe(0);
      expect(ZERO_BYTE_LENGTH).toBe(0);
    });

    it('should stay assignable to number', () => {
      const length: ByteLength = byteLength(8);
      const plain: number = length;
      expect(plain + 1).toBe(9);
    });
  });
});
