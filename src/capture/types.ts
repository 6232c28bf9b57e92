/**
 * Types for frame capture.
 *
 * The platform owns the capture session, device orientation notifications
 * and the queues frames arrive on. The capturer only sees them through the
 * ports declared here.
 */

// =============================================================================
// Formats
// =============================================================================

/**
 * Pack a four-character code, first character in the lowest byte.
 */
export function fourcc(code: string): number {
  return (
    (code.charCodeAt(0) |
      (code.charCodeAt(1) << 8) |
      (code.charCodeAt(2) << 16) |
      (code.charCodeAt(3) << 24)) >>>
    0
  );
}

/** Bi-planar 4:2:0: a full-resolution Y plane followed by an interleaved UV plane */
export const FOURCC_NV12 = fourcc('NV12');

const NANOS_PER_SECOND = 1e9;

/**
 * Frame interval in nanoseconds for a frame rate.
 */
export function fpsToInterval(fps: number): number {
  return fps > 0 ? Math.floor(NANOS_PER_SECOND / fps) : 0;
}

export interface VideoFormat {
  readonly width: number;
  readonly height: number;
  /** Nanoseconds between frames */
  readonly interval: number;
  readonly fourcc: number;
}

export const DEFAULT_CAPTURE_FORMAT: VideoFormat = Object.freeze({
  width: 640,
  height: 480,
  interval: fpsToInterval(30),
  fourcc: FOURCC_NV12,
});

export const DEFAULT_CAPTURE_PRESET = '640x480';

export function isSameFormat(a: VideoFormat, b: VideoFormat): boolean {
  return (
    a.width === b.width &&
    a.height === b.height &&
    a.interval === b.interval &&
    a.fourcc === b.fourcc
  );
}

// =============================================================================
// State
// =============================================================================

export type CaptureState = 'stopped' | 'starting' | 'running' | 'failed';

export type CameraPosition = 'front' | 'back';

export type DeviceOrientation =
  | 'portrait'
  | 'portrait-upside-down'
  | 'landscape-left'
  | 'landscape-right'
  | 'face-up'
  | 'face-down'
  | 'unknown';

export type VideoOrientation =
  | 'portrait'
  | 'portrait-upside-down'
  | 'landscape-left'
  | 'landscape-right';

// =============================================================================
// Samples and Frames
// =============================================================================

export interface PixelPlane {
  readonly bytes: Uint8Array;
  readonly width: number;
  readonly height: number;
  readonly bytesPerRow: number;
}

/**
 * A sample delivered by the capture session.
 * Plane memory may only be read between a successful `lock()` and `unlock()`.
 */
export interface SampleBuffer {
  readonly sampleCount: number;
  readonly isValid: boolean;
  readonly isDataReady: boolean;
  /** Y and UV planes, or null when the sample carries no image */
  readonly planes: readonly [PixelPlane, PixelPlane] | null;
  lock(): boolean;
  unlock(): void;
}

/**
 * A captured frame handed to listeners.
 *
 * `data` views the capturer's frame buffer, shared by every listener and
 * overwritten by the next frame. Listeners that keep the bytes copy them,
 * e.g. with `ByteBuffer.from(frame.data)`.
 */
export interface CapturedFrame {
  readonly width: number;
  readonly height: number;
  readonly pixelWidth: number;
  readonly pixelHeight: number;
  readonly fourcc: number;
  readonly timestampNs: number;
  readonly data: Uint8Array;
}

// =============================================================================
// Ports
// =============================================================================

export interface CaptureDevice {
  readonly id: string;
  readonly position: CameraPosition;
}

/**
 * Platform capture session.
 */
export interface CaptureSession {
  canSetPreset(preset: string): boolean;
  setPreset(preset: string): void;
  canAddOutput(): boolean;
  addOutput(): void;
  devices(): readonly CaptureDevice[];
  canAddInput(device: CaptureDevice): boolean;
  addInput(device: CaptureDevice): void;
  /** No-op for a device that is not attached */
  removeInput(device: CaptureDevice): void;
  beginConfiguration(): void;
  commitConfiguration(): void;
  startRunning(): void;
  stopRunning(): void;
  supportsVideoOrientation(): boolean;
  setVideoOrientation(orientation: VideoOrientation): void;
}

export interface OrientationSource {
  current(): DeviceOrientation;
  beginNotifications(): void;
  endNotifications(): void;
}

/**
 * Queue that runs session start/stop off the caller's context.
 */
export interface Dispatcher {
  dispatchAsync(block: () => void): void;
}

/**
 * Context frames are delivered on: the one `start` was called from.
 */
export interface ExecutionContext {
  isCurrent(): boolean;
  /** Run `block` on this context and wait for it to finish */
  invoke(block: () => void): void;
}

export interface CapturePorts {
  readonly session: CaptureSession;
  readonly orientation: OrientationSource;
  readonly dispatcher: Dispatcher;
  /** Context of the caller */
  currentContext(): ExecutionContext;
}

// =============================================================================
// Configuration
// =============================================================================

export interface VideoCapturerConfig {
  /** The only format `start` accepts (default: 640x480 at 30 fps, NV12) */
  format: VideoFormat;
  /** Session preset matching `format` (default: '640x480') */
  preset: string;
  /** Capture from the back camera (default: false) */
  useBackCamera: boolean;
  /** Monotonic clock in nanoseconds used to stamp frames */
  clock: () => number;
}
