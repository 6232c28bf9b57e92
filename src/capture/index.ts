/**
 * Capture module exports.
 */

export { createVideoCapturer } from './video-capturer.ts';
export type { VideoCapturer } from './video-capturer.ts';

export { copySampleToBuffer } from './frame.ts';
export type { FrameGeometry } from './frame.ts';

export { mapDeviceOrientation } from './orientation.ts';

export {
  createCaptureEventEmitter,
  createFrameCapturedEvent,
  createFrameDroppedEvent,
  createStateChangeEvent,
  createSessionErrorEvent,
} from './events.ts';
export type {
  CaptureEvent,
  FrameCapturedEvent,
  FrameDroppedEvent,
  StateChangeEvent,
  SessionErrorEvent,
  AnyCaptureEvent,
  CaptureEventMap,
  EventHandler,
  Unsubscribe,
  CaptureEventEmitter,
} from './events.ts';

export {
  fourcc,
  fpsToInterval,
  isSameFormat,
  FOURCC_NV12,
  DEFAULT_CAPTURE_FORMAT,
  DEFAULT_CAPTURE_PRESET,
} from './types.ts';
export type {
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
} from './types.ts';
