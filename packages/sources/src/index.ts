/**
 * @kvobserve/sources - Event source adapters and ready-made observers
 *
 * @packageDocumentation
 */

export { EventEmitterAdapter, eventEmitterAdapter, type EventSelector } from './emitter/event-emitter-adapter.js';
export { EventObserver } from './emitter/event-observer.js';

export {
  NotificationCenter,
  type Notification,
  type NotificationObserverToken,
} from './notification/notification-center.js';
export {
  NotificationCenterAdapter,
  notificationCenterAdapter,
  type NotificationSelector,
} from './notification/notification-center-adapter.js';
export {
  NotificationObserver,
  type NotificationObserverOptions,
} from './notification/notification-observer.js';
export { NotificationPublisher } from './notification/notification-publisher.js';

export {
  isObservable,
  isWritableProperty,
  listenToProperty,
  observable,
  propertyListenerCount,
} from './property/observable-object.js';
export {
  PropertyChangeAdapter,
  type PropertyChange,
  type PropertySelector,
} from './property/property-change-adapter.js';
export { PropertyObserver, type PropertyObserverConfig } from './property/property-observer.js';
export { PropertyPublisher } from './property/property-publisher.js';
