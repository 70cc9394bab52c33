import { Subject, type Subscription, filter } from 'rxjs';

/**
 * A posted notification.
 */
export interface Notification {
  readonly name: string;
  /** Object that posted the notification, or `null` */
  readonly sender: unknown;
  readonly userInfo: Readonly<Record<string, unknown>> | undefined;
}

/** Identifies an observer added with {@link NotificationCenter.addObserver} */
export type NotificationObserverToken = number;

interface ObserverEntry {
  name: string;
  subscription: Subscription;
}

/**
 * In-process named broadcast bus.
 *
 * Observers register for a name and, optionally, a sender. A `null` or
 * `undefined` sender matches every poster; any other sender matches only
 * notifications posted by that exact object (`Object.is`).
 *
 * @example
 * ```typescript
 * const center = new NotificationCenter();
 * const token = center.addObserver('cart.updated', null, (n) => console.log(n.userInfo));
 * center.post('cart.updated', cart, { items: 3 });
 * center.removeObserver(token);
 * ```
 */
export class NotificationCenter {
  private static shared: NotificationCenter | null = null;

  /** Process-wide center */
  static get default(): NotificationCenter {
    if (!NotificationCenter.shared) {
      NotificationCenter.shared = new NotificationCenter();
    }
    return NotificationCenter.shared;
  }

  private readonly bus = new Subject<Notification>();
  private readonly observers = new Map<NotificationObserverToken, ObserverEntry>();
  private nextToken = 1;

  /**
   * Deliver a notification synchronously to every matching observer.
   */
  post(name: string, sender: unknown = null, userInfo?: Readonly<Record<string, unknown>>): void {
    this.bus.next({ name, sender, userInfo });
  }

  addObserver(
    name: string,
    sender: unknown,
    handler: (notification: Notification) => void
  ): NotificationObserverToken {
    const subscription = this.bus
      .pipe(
        filter(
          (notification) => notification.name === name && matchesSender(sender, notification.sender)
        )
      )
      .subscribe(handler);

    const token = this.nextToken++;
    this.observers.set(token, { name, subscription });
    return token;
  }

  /** Remove an observer. Unknown or already removed tokens are ignored. */
  removeObserver(token: NotificationObserverToken): void {
    const entry = this.observers.get(token);
    if (!entry) return;
    this.observers.delete(token);
    entry.subscription.unsubscribe();
  }

  /** Number of observers, optionally only those for `name` */
  observerCount(name?: string): number {
    if (name === undefined) return this.observers.size;
    let count = 0;
    for (const entry of this.observers.values()) {
      if (entry.name === name) count++;
    }
    return count;
  }
}

function matchesSender(wanted: unknown, actual: unknown): boolean {
  if (wanted === null || wanted === undefined) return true;
  return Object.is(wanted, actual);
}
