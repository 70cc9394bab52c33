/**
 * @kvobserve/core - Lifecycle-managed change observation
 *
 * A {@link ResumableObserver} binds one (source, selector) pair to a
 * delivery sink through an {@link EventSourceAdapter}. It starts on
 * construction, pauses and resumes idempotently, and stops for good on
 * `destroy()`. {@link BroadcastPublisher} is the same state machine feeding
 * an rxjs multicast channel.
 *
 * @example
 * ```typescript
 * import { ObserverScope, createObserver } from '@kvobserve/core';
 *
 * const scope = new ObserverScope().bindToProcess();
 * scope.track(createObserver(adapter, source, { name: 'ready' }, onReady));
 * ```
 *
 * @packageDocumentation
 */

export * from './errors/index.js';
export * from './lifecycle/index.js';
export * from './observability/index.js';
