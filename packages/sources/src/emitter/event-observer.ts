import type { EventEmitter } from 'node:events';
import { CallbackSink, type ObserverConfig, ResumableObserver } from '@kvobserve/core';
import { type EventSelector, eventEmitterAdapter } from './event-emitter-adapter.js';

/**
 * Calls `onEvent` with the arguments of every `event` emitted by `emitter`.
 *
 * @example
 * ```typescript
 * const observer = new EventObserver(socket, 'data', (chunk) => parser.push(chunk));
 * observer.pause(); // back-pressure
 * observer.resume();
 * ```
 */
export class EventObserver extends ResumableObserver<EventEmitter, EventSelector, unknown[]> {
  constructor(
    emitter: EventEmitter,
    event: string | symbol,
    onEvent: (...args: unknown[]) => void,
    config: ObserverConfig = {}
  ) {
    super({
      ...config,
      adapter: eventEmitterAdapter,
      source: emitter,
      selector: { event },
      sink: new CallbackSink((args: unknown[]) => onEvent(...args)),
    });
  }
}
