import { BroadcastPublisher } from '@kvobserve/core';
import type { Observable } from 'rxjs';
import { type Notification, NotificationCenter } from './notification-center.js';
import { type NotificationSelector, notificationCenterAdapter } from './notification-center-adapter.js';
import type { NotificationObserverOptions } from './notification-observer.js';

/**
 * Multicasts matching notifications over one center registration.
 */
export class NotificationPublisher extends BroadcastPublisher<
  NotificationCenter,
  NotificationSelector,
  Notification
> {
  /** Matching notifications; completes on destroy */
  readonly notification: Observable<Notification>;

  constructor(options: NotificationObserverOptions) {
    const { name, sender, center = NotificationCenter.default, ...config } = options;
    super({
      ...config,
      adapter: notificationCenterAdapter,
      source: center,
      selector: { name, sender },
    });
    this.notification = this.values$;
  }
}
