/**
 * Contract checks for buffer operations.
 *
 * Violations are programming errors, not recoverable conditions: callers
 * are expected to let them propagate.
 */

import { isValidCount } from '../types/branded.ts';

/**
 * Thrown when a caller breaks a buffer's contract, e.g. a writer callback
 * reports more elements than it was offered.
 */
export class BufferContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BufferContractError';
  }
}

/**
 * Assert that a condition holds.
 */
export function check(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new BufferContractError(message);
  }
}

/**
 * Assert that `value` is usable as a size, capacity or element count.
 */
export function checkCount(value: number, name: string): void {
  check(isValidCount(value), `${name} must be a non-negative integer, got ${value}`);
}
