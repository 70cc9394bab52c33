import {
  type EventSourceAdapter,
  type RegistrationToken,
  type Selector,
  SelectorInvalidError,
  SourceInvalidError,
} from '@kvobserve/core';
import {
  type Notification,
  NotificationCenter,
  type NotificationObserverToken,
} from './notification-center.js';

/**
 * Which notifications to watch. `sender` of `null` or `undefined` matches
 * any poster.
 */
export interface NotificationSelector extends Selector {
  readonly name: string;
}

interface Registration {
  center: WeakRef<NotificationCenter>;
  token: NotificationObserverToken;
}

/**
 * Adapter over {@link NotificationCenter}.
 */
export class NotificationCenterAdapter
  implements EventSourceAdapter<NotificationCenter, NotificationSelector, Notification>
{
  readonly kind = 'notification';
  private readonly registrations = new Map<number, Registration>();
  private nextId = 1;

  get registrationCount(): number {
    return this.registrations.size;
  }

  validate(source: NotificationCenter, selector: NotificationSelector): void {
    if (!(source instanceof NotificationCenter)) {
      throw new SourceInvalidError(this.kind, 'source is not a NotificationCenter');
    }
    if (typeof selector.name !== 'string' || selector.name.length === 0) {
      throw new SelectorInvalidError(this.kind, 'notification name must be a non-empty string');
    }
  }

  register(
    source: NotificationCenter,
    selector: NotificationSelector,
    handler: (value: Notification) => void
  ): RegistrationToken {
    const token = source.addObserver(selector.name, selector.sender ?? null, handler);
    const id = this.nextId++;
    this.registrations.set(id, { center: new WeakRef(source), token });
    return { adapter: this.kind, id };
  }

  unregister(token: RegistrationToken): void {
    const registration = this.registrations.get(token.id);
    if (!registration) return;
    this.registrations.delete(token.id);
    registration.center.deref()?.removeObserver(registration.token);
  }
}

/** Shared adapter used by the notification observers and publishers */
export const notificationCenterAdapter = new NotificationCenterAdapter();
