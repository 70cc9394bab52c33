import { BroadcastPublisher, type ObserverConfig, defaultLogger } from '@kvobserve/core';
import { type Observable, map } from 'rxjs';
import {
  type PropertyChange,
  PropertyChangeAdapter,
  type PropertySelector,
} from './property-change-adapter.js';

/**
 * Multicasts assignments to one property of an `observable()` object.
 *
 * Subscribers see assignments made after they subscribed; there is no
 * replay of the current value.
 *
 * @example
 * ```typescript
 * const player = observable({ volume: 5 });
 * const volume = new PropertyPublisher(player, 'volume');
 *
 * volume.value.subscribe((v) => slider.set(v));
 * volume.value.pipe(filter((v) => v === 0)).subscribe(showMuted);
 * ```
 */
export class PropertyPublisher<T extends object, K extends keyof T> extends BroadcastPublisher<
  T,
  PropertySelector<T, K>,
  PropertyChange<T, K>
> {
  /** New values of the property; completes on destroy */
  readonly value: Observable<T[K]>;

  constructor(target: T, key: K, config: ObserverConfig = {}) {
    super({
      ...config,
      adapter: new PropertyChangeAdapter<T, K>((config.logger ?? defaultLogger).child('property')),
      source: target,
      selector: { key },
    });
    this.value = this.values$.pipe(map((change) => change.newValue));
  }
}
