import { DoubleRegistrationError, UseAfterTeardownError } from '../errors/observe-error.js';
import type { ObserveLogger } from '../observability/logger.js';
import type { EventSourceAdapter, RegistrationToken, Selector } from './types.js';

type HandleState = 'idle' | 'live' | 'cancelled';

/**
 * One registration with an event source.
 *
 * A handle is single-use: it goes `idle -> live -> cancelled` and is never
 * reopened. Every function it hands to the adapter is wrapped by
 * {@link SubscriptionHandle.guard}, so nothing reaches the observer once
 * {@link SubscriptionHandle.cancel} has started, even when the adapter (or a
 * scheduler) still calls the wrapped function afterwards.
 *
 * @example
 * ```typescript
 * const handle = new SubscriptionHandle(adapter, logger);
 * handle.open(source, { key: 'count' }, (value) => console.log(value));
 * // ...
 * handle.cancel();
 * ```
 */
export class SubscriptionHandle<TSource extends object, TSelector extends Selector, TValue> {
  private state: HandleState = 'idle';
  private token: RegistrationToken | null = null;
  private dropped = 0;

  constructor(
    private readonly adapter: EventSourceAdapter<TSource, TSelector, TValue>,
    private readonly logger: ObserveLogger
  ) {}

  /** Whether the registration is currently delivering */
  get live(): boolean {
    return this.state === 'live';
  }

  /** Deliveries discarded because they arrived after cancellation */
  get droppedDeliveries(): number {
    return this.dropped;
  }

  /**
   * Register with the adapter.
   *
   * @throws DoubleRegistrationError if this handle was opened before
   */
  open(source: TSource, selector: TSelector, deliver: (value: TValue) => void): void {
    if (this.state !== 'idle') {
      throw new DoubleRegistrationError({ adapter: this.adapter.kind, state: this.state });
    }

    // Live before register: adapters may deliver synchronously from inside
    // register(), and that delivery may cancel this handle.
    this.state = 'live';
    let token: RegistrationToken;
    try {
      token = this.adapter.register(source, selector, this.guard(deliver));
    } catch (error) {
      this.state = 'cancelled';
      throw error;
    }

    if (this.state === 'cancelled') {
      this.adapter.unregister(token);
      return;
    }
    this.token = token;
  }

  /**
   * Cancel the registration. Idempotent.
   */
  cancel(): void {
    if (this.state === 'cancelled') return;

    const token = this.token;
    this.state = 'cancelled';
    this.token = null;

    if (token) {
      this.adapter.unregister(token);
    }
  }

  /**
   * Wrap `deliver` so it only runs while this handle is live.
   */
  guard(deliver: (value: TValue) => void): (value: TValue) => void {
    return (value: TValue) => {
      if (this.state !== 'live') {
        this.dropped++;
        if (this.logger.isEnabled('debug')) {
          const dropped = new UseAfterTeardownError({ adapter: this.adapter.kind });
          this.logger.debug(dropped.message, { code: dropped.code, dropped: this.dropped });
        }
        return;
      }
      deliver(value);
    };
  }
}
