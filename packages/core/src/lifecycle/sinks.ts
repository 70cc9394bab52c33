import { Observable, Subject } from 'rxjs';
import type { DeliverySink } from './types.js';

/**
 * Delivers each value to a single callback. Ignores values after close.
 */
export class CallbackSink<TValue> implements DeliverySink<TValue> {
  private closed = false;

  constructor(private readonly callback: (value: TValue) => void) {}

  deliver(value: TValue): void {
    if (this.closed) return;
    this.callback(value);
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * Fans values out to any number of rxjs subscribers.
 *
 * Subscribers only see values delivered after they subscribed. Closing the
 * sink completes every subscriber, and later subscribers complete
 * immediately.
 */
export class MulticastSink<TValue> implements DeliverySink<TValue> {
  private readonly subject = new Subject<TValue>();
  private consumers = 0;
  private completed = false;

  /** Stream of delivered values; completes when the sink closes */
  readonly values$: Observable<TValue> = new Observable<TValue>((subscriber) => {
    this.consumers++;
    const subscription = this.subject.subscribe(subscriber);
    return () => {
      this.consumers--;
      subscription.unsubscribe();
    };
  });

  /** Number of subscribers currently attached */
  get consumerCount(): number {
    return this.consumers;
  }

  /** Whether the sink has been closed */
  get closed(): boolean {
    return this.completed;
  }

  deliver(value: TValue): void {
    this.subject.next(value);
  }

  close(): void {
    if (this.completed) return;
    this.completed = true;
    this.subject.complete();
  }
}

/** Create a sink that calls `callback` for every delivered value */
export function callbackSink<TValue>(callback: (value: TValue) => void): CallbackSink<TValue> {
  return new CallbackSink(callback);
}
