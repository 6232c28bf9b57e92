/**
 * Event system for frame capture.
 * Provides a pub/sub mechanism for captured frames and capturer state.
 */

import type { CaptureState, CapturedFrame } from './types.ts';

// =============================================================================
// Event Types
// =============================================================================

/**
 * Base event interface.
 */
export interface CaptureEvent {
  readonly type: string;
  readonly timestamp: number;
}

/**
 * Fired on the start context for every frame copied out of a sample.
 */
export interface FrameCapturedEvent extends CaptureEvent {
  readonly type: 'frame-captured';
  readonly frame: CapturedFrame;
}

/**
 * Fired when the session drops a sample before it reaches the capturer.
 */
export interface FrameDroppedEvent extends CaptureEvent {
  readonly type: 'frame-dropped';
}

/**
 * Fired when the capturer starts or stops.
 */
export interface StateChangeEvent extends CaptureEvent {
  readonly type: 'state-change';
  readonly state: CaptureState;
  readonly previous: CaptureState;
}

/**
 * Fired when the session reports a runtime error.
 */
export interface SessionErrorEvent extends CaptureEvent {
  readonly type: 'session-error';
  /** Whatever the platform reported */
  readonly detail: unknown;
}

export type AnyCaptureEvent =
  | FrameCapturedEvent
  | FrameDroppedEvent
  | StateChangeEvent
  | SessionErrorEvent;

export interface CaptureEventMap {
  'frame-captured': FrameCapturedEvent;
  'frame-dropped': FrameDroppedEvent;
  'state-change': StateChangeEvent;
  'session-error': SessionErrorEvent;
}

// =============================================================================
// Event Handler Types
// =============================================================================

export type EventHandler<T extends AnyCaptureEvent> = (event: T) => void;

/**
 * Unsubscribe function returned by addEventListener.
 */
export type Unsubscribe = () => void;

// =============================================================================
// Event Emitter
// =============================================================================

export interface CaptureEventEmitter {
  /**
   * Add an event listener for a specific event type.
   * @returns Unsubscribe function
   */
  addEventListener<K extends keyof CaptureEventMap>(
    type: K,
    handler: EventHandler<CaptureEventMap[K]>
  ): Unsubscribe;

  removeEventListener<K extends keyof CaptureEventMap>(
    type: K,
    handler: EventHandler<CaptureEventMap[K]>
  ): void;

  /**
   * Emit an event to all registered handlers.
   * A throwing handler is logged and does not stop delivery to the others.
   */
  emit<K extends keyof CaptureEventMap>(type: K, event: CaptureEventMap[K]): void;

  removeAllListeners(): void;

  listenerCount(type: keyof CaptureEventMap): number;
}

type HandlerSets = {
  [K in keyof CaptureEventMap]: Set<EventHandler<CaptureEventMap[K]>>;
};

/**
 * Create a new capture event emitter.
 */
export function createCaptureEventEmitter(): CaptureEventEmitter {
  const handlers: HandlerSets = {
    'frame-captured': new Set(),
    'frame-dropped': new Set(),
    'state-change': new Set(),
    'session-error': new Set(),
  };

  return {
    addEventListener<K extends keyof CaptureEventMap>(
      type: K,
      handler: EventHandler<CaptureEventMap[K]>
    ): Unsubscribe {
      const typeHandlers: HandlerSets[K] = handlers[type];
      typeHandlers.add(handler);
      return () => {
        typeHandlers.delete(handler);
      };
    },

    removeEventListener<K extends keyof CaptureEventMap>(
      type: K,
      handler: EventHandler<CaptureEventMap[K]>
    ): void {
      const typeHandlers: HandlerSets[K] = handlers[type];
      typeHandlers.delete(handler);
    },

    emit<K extends keyof CaptureEventMap>(type: K, event: CaptureEventMap[K]): void {
      const typeHandlers: HandlerSets[K] = handlers[type];
      for (const handler of [...typeHandlers]) {
        try {
          handler(event);
        } catch (error) {
          console.error(`Capture event handler error for '${type}':`, error);
        }
      }
    },

    removeAllListeners(): void {
      handlers['frame-captured'].clear();
      handlers['frame-dropped'].clear();
      handlers['state-change'].clear();
      handlers['session-error'].clear();
    },

    listenerCount(type: keyof CaptureEventMap): number {
      return handlers[type].size;
    },
  };
}

// =============================================================================
// Event Helpers
// =============================================================================

export function createFrameCapturedEvent(frame: CapturedFrame): FrameCapturedEvent {
  return Object.freeze({
    type: 'frame-captured' as const,
    timestamp: Date.now(),
    frame,
  });
}

export function createFrameDroppedEvent(): FrameDroppedEvent {
  return Object.freeze({
    type: 'frame-dropped' as const,
    timestamp: Date.now(),
  });
}

export function createStateChangeEvent(
  state: CaptureState,
  previous: CaptureState
): StateChangeEvent {
  return Object.freeze({
    type: 'state-change' as const,
    timestamp: Date.now(),
    state,
    previous,
  });
}

export function createSessionErrorEvent(detail: unknown): SessionErrorEvent {
  return Object.freeze({
    type: 'session-error' as const,
    timestamp: Date.now(),
    detail,
  });
}
