/**
 * Tests for the capture event system.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  createCaptureEventEmitter,
  createFrameCapturedEvent,
  createFrameDroppedEvent,
  createSessionErrorEvent,
  createStateChangeEvent,
} from './events.ts';
import { FOURCC_NV12, type CapturedFrame } from './types.ts';

const frame: CapturedFrame = {
  width: 2,
  height: 2,
  pixelWidth: 1,
  pixelHeight: 1,
  fourcc: FOURCC_NV12,
  timestampNs: 100,
  data: Uint8Array.of(1, 2, 3, 4, 5, 6),
};

describe('createCaptureEventEmitter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should deliver events to handlers of their type only', () => {
    const emitter = createCaptureEventEmitter();
    const onFrame = vi.fn();
    const onDrop = vi.fn();
    emitter.addEventListener('frame-captured', onFrame);
    emitter.addEventListener('frame-dropped', onDrop);

    const event = createFrameCapturedEvent(frame);
    emitter.emit('frame-captured', event);

    expect(onFrame).toHaveBeenCalledWith(event);
    expect(onDrop).not.toHaveBeenCalled();
  });

  it('should stop delivering after unsubscribe', () => {
    const emitter = createCaptureEventEmitter();
    const handler = vi.fn();
    const unsubscribe = emitter.addEventListener('frame-dropped', handler);

    unsubscribe();
    emitter.emit('frame-dropped', createFrameDroppedEvent());

    expect(handler).not.toHaveBeenCalled();
    expect(emitter.listenerCount('frame-dropped')).toBe(0);
  });

  it('should remove a listener', () => {
    const emitter = createCaptureEventEmitter();
    const handler = vi.fn();
    emitter.addEventListener('state-change', handler);
    emitter.removeEventListener('state-change', handler);

    emitter.emit('state-change', createStateChangeEvent('running', 'stopped'));

    expect(handler).not.toHaveBeenCalled();
  });

  it('should log handler errors and keep delivering', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const emitter = createCaptureEventEmitter();
    const failure = new Error('Handler error');
    const after = vi.fn();
    emitter.addEventListener('session-error', () => {
      throw failure;
    });
    emitter.addEventListener('session-error', after);

    emitter.emit('session-error', createSessionErrorEvent('lost device'));

    expect(errorSpy).toHaveBeenCalledWith(
      "Capture event handler error for 'session-error':",
      failure
    );
    expect(after).toHaveBeenCalledTimes(1);
  });

  it('should let a handler unsubscribe while events are delivered', () => {
    const emitter = createCaptureEventEmitter();
    const second = vi.fn();
    const unsubscribe = emitter.addEventListener('frame-dropped', () => {
      unsubscribe();
    });
    emitter.addEventListener('frame-dropped', second);

    emitter.emit('frame-dropped', createFrameDroppedEvent());
    emitter.emit('frame-dropped', createFrameDroppedEvent());

    expect(second).toHaveBeenCalledTimes(2);
    expect(emitter.listenerCount('frame-dropped')).toBe(1);
  });

  it('should remove all listeners', () => {
    const emitter = createCaptureEventEmitter();
    emitter.addEventListener('frame-captured', vi.fn());
    emitter.addEventListener('state-change', vi.fn());

    emitter.removeAllListeners();

    expect(emitter.listenerCount('frame-captured')).toBe(0);
    expect(emitter.listenerCount('state-change')).toBe(0);
  });
});

describe('event helpers', () => {
  it('should create frozen events', () => {
    const event = createStateChangeEvent('stopped', 'running');
    expect(event.type).toBe('state-change');
    expect(event.state).toBe('stopped');
    expect(event.previous).toBe('running');
    expect(typeof event.timestamp).toBe('number');
    expect(Object.isFrozen(event)).toBe(true);
  });

  it('should carry the frame and error detail', () => {
    expect(createFrameCapturedEvent(frame).frame).toBe(frame);
    expect(createSessionErrorEvent({ code: 7 }).detail).toEqual({ code: 7 });
    expect(createFrameDroppedEvent().type).toBe('frame-dropped');
  });
});
