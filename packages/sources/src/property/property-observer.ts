import { CallbackSink, type ObserverConfig, ResumableObserver, defaultLogger } from '@kvobserve/core';
import {
  type PropertyChange,
  PropertyChangeAdapter,
  type PropertySelector,
} from './property-change-adapter.js';

/**
 * Configuration for {@link PropertyObserver}.
 */
export interface PropertyObserverConfig extends ObserverConfig {
  /**
   * Deliver the current value when the observer starts and again on every
   * `resume()`.
   * @default false
   */
  initial?: boolean;
}

/**
 * Calls `onChange` with the new value of one property of an
 * `observable()` object, every time it is assigned.
 *
 * @example
 * ```typescript
 * const cart = observable({ items: 0 });
 * const observer = new PropertyObserver(cart, 'items', (items) => {
 *   badge.textContent = String(items);
 * }, { initial: true });
 *
 * cart.items = 3;
 * observer.destroy();
 * ```
 */
export class PropertyObserver<T extends object, K extends keyof T> extends ResumableObserver<
  T,
  PropertySelector<T, K>,
  PropertyChange<T, K>
> {
  constructor(
    target: T,
    key: K,
    onChange: (value: T[K], change: PropertyChange<T, K>) => void,
    config: PropertyObserverConfig = {}
  ) {
    const { initial = false, ...observerConfig } = config;
    super({
      ...observerConfig,
      adapter: new PropertyChangeAdapter<T, K>((config.logger ?? defaultLogger).child('property')),
      source: target,
      selector: { key, initial },
      sink: new CallbackSink((change: PropertyChange<T, K>) => onChange(change.newValue, change)),
    });
  }
}
