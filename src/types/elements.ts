/**
 * Element types for typed views over buffer storage.
 *
 * Any typed array constructor can serve as an element type: the view it
 * produces only changes how the bytes are read and written, never the
 * bytes themselves.
 */

/**
 * Typed views a buffer can hand out.
 */
export type ElementArray =
  | Uint8Array
  | Int8Array
  | Uint8ClampedArray
  | Uint16Array
  | Int16Array
  | Uint32Array
  | Int32Array
  | Float32Array
  | Float64Array
  | BigUint64Array
  | BigInt64Array;

/**
 * Constructor of a typed view, e.g. `Uint8Array` or `Int8Array`.
 */
export interface ElementType<V extends ElementArray> {
  readonly BYTES_PER_ELEMENT: number;
  new (buffer: ArrayBuffer, byteOffset: number, length: number): V;
}

/**
 * Writer callback for in-place fills.
 *
 * Receives a view of exactly the requested number of elements over buffer
 * storage and returns how many of them it wrote, starting at index 0.
 */
export type Writer<V extends ElementArray = Uint8Array> = (view: V) => number;
