import type { Observable, Observer, Subscription } from 'rxjs';
import { ResumableObserver } from './resumable-observer.js';
import { MulticastSink } from './sinks.js';
import type { EventSourceAdapter, ObserverConfig, Selector } from './types.js';

/**
 * Options for constructing a {@link BroadcastPublisher}.
 */
export interface BroadcastPublisherOptions<
  TSource extends object,
  TSelector extends Selector,
  TValue,
> extends ObserverConfig {
  adapter: EventSourceAdapter<TSource, TSelector, TValue>;
  source: TSource;
  selector: TSelector;
}

/**
 * A {@link ResumableObserver} that multicasts to any number of rxjs
 * subscribers over a single upstream registration.
 *
 * - Subscribers receive only events delivered after they subscribed.
 * - Subscribing or unsubscribing never touches the upstream registration;
 *   only {@link pause}, {@link resume} and {@link destroy} do.
 * - {@link destroy} completes every subscriber.
 *
 * @example
 * ```typescript
 * const publisher = new BroadcastPublisher({
 *   adapter: notificationCenterAdapter,
 *   source: NotificationCenter.default,
 *   selector: { name: 'cart.updated' },
 * });
 *
 * const badge = publisher.subscribe((n) => renderBadge(n.userInfo));
 * const total = publisher.values$.pipe(map((n) => n.userInfo)).subscribe(renderTotal);
 *
 * badge.unsubscribe(); // publisher keeps running for `total`
 * publisher.destroy(); // `total` completes
 * ```
 */
export class BroadcastPublisher<
  TSource extends object,
  TSelector extends Selector,
  TValue,
> extends ResumableObserver<TSource, TSelector, TValue> {
  private readonly multicast: MulticastSink<TValue>;

  /** Values observed after subscription; completes on destroy */
  readonly values$: Observable<TValue>;

  constructor(options: BroadcastPublisherOptions<TSource, TSelector, TValue>) {
    const multicast = new MulticastSink<TValue>();
    super({ ...options, sink: multicast });
    this.multicast = multicast;
    this.values$ = multicast.values$;
  }

  /** Number of subscribers currently attached */
  get consumerCount(): number {
    return this.multicast.consumerCount;
  }

  /**
   * Attach a consumer. Unsubscribe the returned subscription to detach.
   */
  subscribe(observerOrNext?: Partial<Observer<TValue>> | ((value: TValue) => void)): Subscription {
    return this.values$.subscribe(observerOrNext);
  }
}

/**
 * Create a {@link BroadcastPublisher}.
 */
export function createBroadcastPublisher<TSource extends object, TSelector extends Selector, TValue>(
  adapter: EventSourceAdapter<TSource, TSelector, TValue>,
  source: TSource,
  selector: TSelector,
  config: ObserverConfig = {}
): BroadcastPublisher<TSource, TSelector, TValue> {
  return new BroadcastPublisher({ ...config, adapter, source, selector });
}
