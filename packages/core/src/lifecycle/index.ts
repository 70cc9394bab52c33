/**
 * Lifecycle core: subscription handles, the resumable observer state
 * machine, delivery sinks and the broadcast publisher built on it.
 *
 * ```
 *   source ──adapter.register──▶ SubscriptionHandle.guard ──▶ [scheduler] ──▶ DeliverySink
 *                                       ▲                                       │
 *                    pause()/destroy() flips live=false            CallbackSink │ MulticastSink
 *                                                                         callback   rxjs Subject
 * ```
 *
 * @module lifecycle
 */
export {
  BroadcastPublisher,
  createBroadcastPublisher,
  type BroadcastPublisherOptions,
} from './broadcast-publisher.js';
export { ObserverScope, createObserverScope, type ExitSignalSource } from './observer-scope.js';
export {
  ResumableObserver,
  createObserver,
  type ResumableObserverOptions,
} from './resumable-observer.js';
export { CallbackSink, MulticastSink, callbackSink } from './sinks.js';
export { SubscriptionHandle } from './subscription-handle.js';
export type {
  DeliverySink,
  Destroyable,
  EventSourceAdapter,
  ObserverConfig,
  ObserverState,
  RegistrationToken,
  Selector,
} from './types.js';
export { weakCallback } from './weak-callback.js';
