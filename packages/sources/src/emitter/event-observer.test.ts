import { EventEmitter } from 'node:events';
import { ResumableObserver, SelectorInvalidError, callbackSink } from '@kvobserve/core';
import { describe, expect, it, vi } from 'vitest';
import { eventEmitterAdapter } from './event-emitter-adapter.js';
import { EventObserver } from './event-observer.js';

describe('EventObserver', () => {
  it('should pass every event argument through', () => {
    const emitter = new EventEmitter();
    const onEvent = vi.fn();
    const observer = new EventObserver(emitter, 'progress', onEvent);

    emitter.emit('progress', 'upload', 42);

    expect(onEvent).toHaveBeenCalledWith('upload', 42);
    observer.destroy();
  });

  it('should detach its listener while paused and after destroy', () => {
    const emitter = new EventEmitter();
    const onEvent = vi.fn();
    const observer = new EventObserver(emitter, 'data', onEvent);

    observer.pause();
    emitter.emit('data', 1);
    expect(emitter.listenerCount('data')).toBe(0);

    observer.resume();
    emitter.emit('data', 2);
    observer.destroy();
    emitter.emit('data', 3);

    expect(onEvent).toHaveBeenCalledTimes(1);
    expect(onEvent).toHaveBeenCalledWith(2);
    expect(emitter.listenerCount('data')).toBe(0);
  });

  it('should reject a sender filter', () => {
    expect(
      () =>
        new ResumableObserver({
          adapter: eventEmitterAdapter,
          source: new EventEmitter(),
          selector: { event: 'data', sender: {} },
          sink: callbackSink(() => undefined),
        })
    ).toThrow(SelectorInvalidError);
  });
});
