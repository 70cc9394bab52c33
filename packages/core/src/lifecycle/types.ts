/**
 * Capability types shared by the lifecycle core and every event source
 * adapter.
 *
 * @module lifecycle/types
 */

import type { SchedulerLike } from 'rxjs';
import type { ObserveLogger } from '../observability/logger.js';

/**
 * Identifies what to watch on a source.
 *
 * Adapters extend this with their own addressing (a property key, an event
 * name). `sender` restricts delivery to events whose origin is the same
 * object (`Object.is`), never to payloads that merely compare equal. The
 * adapter applies the filter, not the core.
 */
export interface Selector {
  readonly sender?: unknown;
}

/**
 * Opaque registration returned by an adapter. Only the adapter that issued
 * it knows what it refers to.
 */
export interface RegistrationToken {
  readonly adapter: string;
  readonly id: number;
}

/**
 * The single capability the lifecycle core needs from a change-notification
 * mechanism.
 *
 * @typeParam TSource - Object being watched
 * @typeParam TSelector - What to watch on it
 * @typeParam TValue - Value handed to the handler for each matching event
 */
export interface EventSourceAdapter<TSource extends object, TSelector extends Selector, TValue> {
  /** Short name used in errors and logs */
  readonly kind: string;

  /**
   * Reject sources or selectors that can never be observed. Throws
   * `SourceInvalidError` or `SelectorInvalidError`.
   */
  validate?(source: TSource, selector: TSelector): void;

  /**
   * Start delivering matching events to `handler` until the token is
   * unregistered.
   */
  register(source: TSource, selector: TSelector, handler: (value: TValue) => void): RegistrationToken;

  /**
   * Stop delivery. Idempotent; once it returns, `handler` is not called
   * again for this token.
   */
  unregister(token: RegistrationToken): void;
}

/**
 * Where delivered values go: one callback, or a multicast channel.
 */
export interface DeliverySink<TValue> {
  deliver(value: TValue): void;
  /** Called once when the owning observer is destroyed */
  close(): void;
}

/** Lifecycle state of an observer. `destroyed` is terminal. */
export type ObserverState = 'running' | 'paused' | 'destroyed';

/**
 * Options shared by every observer and publisher.
 */
export interface ObserverConfig {
  /** Label for log entries. @default adapter kind */
  name?: string;
  /**
   * Scheduler on which deliveries run. Without one, delivery happens
   * synchronously inside the emitting call.
   */
  scheduler?: SchedulerLike;
  /** Logger for lifecycle transitions and callback failures */
  logger?: ObserveLogger;
  /** Receives errors thrown by the delivery sink */
  onError?: (error: Error) => void;
  /**
   * Cancel the registration when the observer is garbage-collected without
   * being destroyed. @default true
   */
  finalize?: boolean;
}

/**
 * Anything with a terminal `destroy()`.
 */
export interface Destroyable {
  destroy(): void;
  /**
   * Run `listener` once when this object is destroyed. Returns a function
   * that removes the listener.
   */
  onDestroy?(listener: () => void): () => void;
}
