/**
 * Video capturer built on a platform capture session.
 * Factory function that creates a VideoCapturer with encapsulated state.
 */

import { ByteBuffer } from '../buffer/byte-buffer.ts';
import {
  createCaptureEventEmitter,
  createFrameCapturedEvent,
  createFrameDroppedEvent,
  createSessionErrorEvent,
  createStateChangeEvent,
  type CaptureEventMap,
  type EventHandler,
  type Unsubscribe,
} from './events.ts';
import { copySampleToBuffer } from './frame.ts';
import { mapDeviceOrientation } from './orientation.ts';
import {
  DEFAULT_CAPTURE_FORMAT,
  DEFAULT_CAPTURE_PRESET,
  isSameFormat,
  type CaptureDevice,
  type CapturePorts,
  type CaptureState,
  type CapturedFrame,
  type ExecutionContext,
  type SampleBuffer,
  type VideoCapturerConfig,
  type VideoFormat,
} from './types.ts';

export interface VideoCapturer {
  /**
   * Start capturing in `format`, which must be the configured format.
   * Returns 'starting' once the session has been asked to run, 'failed', or
   * 'stopped' when a state-change listener stopped the capturer meanwhile.
   */
  start(format: VideoFormat): CaptureState;

  /** Stop capturing. No-op when not running. */
  stop(): void;

  readonly state: CaptureState;
  readonly isRunning: boolean;
  /** Format passed to the running `start`, or null when stopped */
  readonly captureFormat: VideoFormat | null;
  readonly supportedFormats: readonly VideoFormat[];
  useBackCamera: boolean;

  /** Session delegate: a sample was captured. */
  handleSample(sample: SampleBuffer): void;
  /** Session delegate: a sample was dropped. */
  handleDroppedSample(): void;
  /** Orientation notification. */
  handleOrientationChange(): void;
  /** Session runtime error notification. */
  handleSessionError(detail: unknown): void;

  addEventListener<K extends keyof CaptureEventMap>(
    type: K,
    handler: EventHandler<CaptureEventMap[K]>
  ): Unsubscribe;
  removeEventListener<K extends keyof CaptureEventMap>(
    type: K,
    handler: EventHandler<CaptureEventMap[K]>
  ): void;

  /** Stop and drop all listeners. */
  dispose(): void;
}

interface SessionInputs {
  front: CaptureDevice;
  back: CaptureDevice;
}

function monotonicNanos(): number {
  return Math.round(performance.now() * 1e6);
}

/**
 * Factory function to create a VideoCapturer.
 *
 * The session is configured immediately: preset, output, and the front and
 * back camera inputs. If any of that is unsupported the capturer is still
 * returned, but every `start` fails.
 *
 * @param ports - Platform session, orientation source and queues
 * @param config - Optional configuration for the capturer
 */
export function createVideoCapturer(
  ports: CapturePorts,
  config: Partial<VideoCapturerConfig> = {}
): VideoCapturer {
  const { session, orientation, dispatcher } = ports;
  const format = config.format ?? DEFAULT_CAPTURE_FORMAT;
  const preset = config.preset ?? DEFAULT_CAPTURE_PRESET;
  const clock = config.clock ?? monotonicNanos;

  // Internal mutable state
  const emitter = createCaptureEventEmitter();
  const frameBuffer = new ByteBuffer();
  let state: CaptureState = 'stopped';
  let useBackCamera = config.useBackCamera ?? false;
  let orientationHasChanged = false;
  let captureFormat: VideoFormat | null = null;
  let startContext: ExecutionContext | null = null;

  function setupSession(): SessionInputs | null {
    if (!session.canSetPreset(preset)) {
      console.error(`Capture preset unsupported: ${preset}`);
      return null;
    }
    session.setPreset(preset);

    if (!session.canAddOutput()) {
      console.error('Capture output unsupported');
      return null;
    }
    session.addOutput();

    let front: CaptureDevice | undefined;
    let back: CaptureDevice | undefined;
    for (const device of session.devices()) {
      if (device.position === 'front') front = device;
      if (device.position === 'back') back = device;
    }
    if (!front || !back) {
      console.error('Failed to find front and back capture devices');
      return null;
    }

    if (!session.canAddInput(front) || !session.canAddInput(back)) {
      console.error('Session does not support capture inputs');
      return null;
    }
    return { front, back };
  }

  function updateOrientation(): void {
    if (!session.supportsVideoOrientation()) {
      return;
    }
    const next = mapDeviceOrientation(orientation.current(), orientationHasChanged);
    if (next !== null) {
      session.setVideoOrientation(next);
    }
  }

  function updateSessionInput(devices: SessionInputs): void {
    session.beginConfiguration();
    const oldInput = useBackCamera ? devices.front : devices.back;
    const newInput = useBackCamera ? devices.back : devices.front;
    session.removeInput(oldInput);
    session.addInput(newInput);
    updateOrientation();
    session.commitConfiguration();
  }

  function isRunning(): boolean {
    return state === 'running';
  }

  function setState(next: CaptureState): void {
    const previous = state;
    state = next;
    emitter.emit('state-change', createStateChangeEvent(next, previous));
  }

  function deliver(frame: CapturedFrame, context: ExecutionContext): void {
    const emitFrame = (): void => {
      emitter.emit('frame-captured', createFrameCapturedEvent(frame));
    };
    if (context.isCurrent()) {
      emitFrame();
    } else {
      context.invoke(emitFrame);
    }
  }

  const inputs = setupSession();
  if (inputs) {
    updateSessionInput(inputs);
  }

  function stop(): void {
    if (!isRunning()) {
      return;
    }
    dispatcher.dispatchAsync(() => session.stopRunning());
    orientation.endNotifications();
    captureFormat = null;
    startContext = null;
    setState('stopped');
  }

  return {
    start(requested: VideoFormat): CaptureState {
      if (!inputs) {
        console.error('Failed to create capture session');
        return 'failed';
      }
      if (isRunning()) {
        console.error('The capturer is already running');
        return 'failed';
      }
      if (!isSameFormat(requested, format)) {
        console.error('Unsupported format provided:', requested);
        return 'failed';
      }

      // Frames are delivered on the context capture started on.
      startContext = ports.currentContext();
      captureFormat = requested;
      orientationHasChanged = false;
      orientation.beginNotifications();
      dispatcher.dispatchAsync(() => session.startRunning());
      setState('running');
      // A state-change listener may have stopped the capturer already.
      return isRunning() ? 'starting' : 'stopped';
    },

    stop,

    get state(): CaptureState {
      return state;
    },

    get isRunning(): boolean {
      return isRunning();
    },

    get captureFormat(): VideoFormat | null {
      return captureFormat;
    },

    get supportedFormats(): readonly VideoFormat[] {
      return [format];
    },

    get useBackCamera(): boolean {
      return useBackCamera;
    },

    set useBackCamera(value: boolean) {
      if (value === useBackCamera) {
        return;
      }
      useBackCamera = value;
      if (inputs) {
        updateSessionInput(inputs);
      }
    },

    handleSample(sample: SampleBuffer): void {
      if (!isRunning() || startContext === null || captureFormat === null) {
        return;
      }
      const geometry = copySampleToBuffer(sample, frameBuffer);
      if (geometry === null) {
        return;
      }
      const frame: CapturedFrame = Object.freeze({
        width: geometry.width,
        height: geometry.height,
        pixelWidth: 1,
        pixelHeight: 1,
        fourcc: captureFormat.fourcc,
        timestampNs: clock(),
        data: frameBuffer.data() ?? new Uint8Array(0),
      });
      deliver(frame, startContext);
    },

    handleDroppedSample(): void {
      console.warn('Dropped sample buffer');
      emitter.emit('frame-dropped', createFrameDroppedEvent());
    },

    handleOrientationChange(): void {
      orientationHasChanged = true;
      updateOrientation();
    },

    handleSessionError(detail: unknown): void {
      console.error('Capture session error:', detail);
      emitter.emit('session-error', createSessionErrorEvent(detail));
    },

    addEventListener<K extends keyof CaptureEventMap>(
      type: K,
      handler: EventHandler<CaptureEventMap[K]>
    ): Unsubscribe {
      return emitter.addEventListener(type, handler);
    },

    removeEventListener<K extends keyof CaptureEventMap>(
      type: K,
      handler: EventHandler<CaptureEventMap[K]>
    ): void {
      emitter.removeEventListener(type, handler);
    },

    dispose(): void {
      stop();
      emitter.removeAllListeners();
    },
  };
}
