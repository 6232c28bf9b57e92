/**
 * Buffer module exports.
 */

export { ByteBuffer } from './byte-buffer.ts';
export type { ByteInput } from './byte-buffer.ts';

export { BufferContractError } from './errors.ts';

export { createView, bytesOf, bytesPerElement } from './view.ts';
export type { ByteSource } from './view.ts';
