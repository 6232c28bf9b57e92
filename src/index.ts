/**
 * bytebuf - Growable byte buffers and a frame capture adapter built on them
 *
 * Main entry point exporting core types, buffers, and capture utilities.
 */

// =============================================================================
// Types
// =============================================================================

export type {
  ByteOffset,
  ByteLength,
  ElementCount,
  ElementArray,
  ElementType,
  Writer,
} from './types/index.ts';

export {
  byteOffset,
  byteLength,
  elementCount,
  isValidCount,
  elementsToBytes,
  bytesToElements,
  ZERO_BYTE_OFFSET,
  ZERO_BYTE_LENGTH,
} from './types/index.ts';

// =============================================================================
// Buffer
// =============================================================================

export {
  ByteBuffer,
  BufferContractError,
  createView,
  bytesOf,
  bytesPerElement,
} from './buffer/index.ts';
export type { ByteInput, ByteSource } from './buffer/index.ts';

// =============================================================================
// Capture
// =============================================================================

export {
  createVideoCapturer,
  copySampleToBuffer,
  mapDeviceOrientation,
  createCaptureEventEmitter,
  fourcc,
  fpsToInterval,
  isSameFormat,
  FOURCC_NV12,
  DEFAULT_CAPTURE_FORMAT,
  DEFAULT_CAPTURE_PRESET,
} from './capture/index.ts';
export type {
  VideoCapturer,
  FrameGeometry,
  CaptureEventMap,
  AnyCaptureEvent,
  FrameCapturedEvent,
  FrameDroppedEvent,
  StateChangeEvent,
  SessionErrorEvent,
  EventHandler,
  Unsubscribe,
  CaptureEventEmitter,
  VideoFormat,
  CaptureState,
  CameraPosition,
  DeviceOrientation,
  VideoOrientation,
  PixelPlane,
  SampleBuffer,
  CapturedFrame,
  CaptureDevice,
  CaptureSession,
  OrientationSource,
  Dispatcher,
  ExecutionContext,
  CapturePorts,
  VideoCapturerConfig,
} from './capture/index.ts';
