import { CallbackSink, type ObserverConfig, ResumableObserver } from '@kvobserve/core';
import { type Notification, NotificationCenter } from './notification-center.js';
import { type NotificationSelector, notificationCenterAdapter } from './notification-center-adapter.js';

/**
 * What a notification observer or publisher watches, plus its config.
 */
export interface NotificationObserverOptions extends ObserverConfig {
  name: string;
  /** Only notifications posted by this object. `null` means any sender. */
  sender?: unknown;
  /** @default NotificationCenter.default */
  center?: NotificationCenter;
}

/**
 * Calls `onNotify` for every matching notification.
 *
 * @example
 * ```typescript
 * const observer = new NotificationObserver({ name: 'session.expired' }, () => signOut());
 * NotificationCenter.default.post('session.expired');
 * observer.destroy();
 * ```
 */
export class NotificationObserver extends ResumableObserver<
  NotificationCenter,
  NotificationSelector,
  Notification
> {
  constructor(options: NotificationObserverOptions, onNotify: (notification: Notification) => void) {
    const { name, sender, center = NotificationCenter.default, ...config } = options;
    super({
      ...config,
      adapter: notificationCenterAdapter,
      source: center,
      selector: { name, sender },
      sink: new CallbackSink(onNotify),
    });
  }
}
