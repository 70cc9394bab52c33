import type { SchedulerLike, Subscription } from 'rxjs';
import {
  type ObserveError,
  SourceInvalidError,
  ensureObserveError,
} from '../errors/observe-error.js';
import { type ObserveLogger, defaultLogger } from '../observability/logger.js';
import { CallbackSink } from './sinks.js';
import { SubscriptionHandle } from './subscription-handle.js';
import type {
  DeliverySink,
  Destroyable,
  EventSourceAdapter,
  ObserverConfig,
  ObserverState,
  Selector,
} from './types.js';

/**
 * Options for constructing a {@link ResumableObserver}.
 */
export interface ResumableObserverOptions<
  TSource extends object,
  TSelector extends Selector,
  TValue,
> extends ObserverConfig {
  adapter: EventSourceAdapter<TSource, TSelector, TValue>;
  source: TSource;
  selector: TSelector;
  sink: DeliverySink<TValue>;
}

/**
 * State reachable from the finalizer. It must never point back at the
 * observer, or the observer could not be collected.
 */
interface TeardownRecord {
  handle: { cancel(): void } | null;
  sink: { close(): void };
}

const finalizer = new FinalizationRegistry<TeardownRecord>((record) => {
  record.handle?.cancel();
  record.handle = null;
  record.sink.close();
});

/**
 * Watches one (source, selector) pair and forwards matching events to a
 * {@link DeliverySink}, with pause/resume and a terminal destroy.
 *
 * The observer starts running as soon as it is constructed. `pause()` and
 * `resume()` are idempotent; `destroy()` pauses and makes every later
 * `resume()` a no-op. No delivery begins once `pause()` or `destroy()` has
 * returned, including deliveries already queued on a scheduler.
 *
 * The source is held through a `WeakRef`, and the handler registered with
 * the adapter never references the observer, so neither the observer nor
 * the adapter keeps the other side alive. If an observer is dropped without
 * `destroy()`, a finalizer cancels its registration when it is collected;
 * call `destroy()` for timely teardown.
 *
 * @typeParam TSource - Object being watched
 * @typeParam TSelector - Adapter-specific description of what to watch
 * @typeParam TValue - Value delivered for each matching event
 *
 * @example
 * ```typescript
 * const observer = new ResumableObserver({
 *   adapter: propertyChangeAdapter,
 *   source: settings,
 *   selector: { key: 'theme' },
 *   sink: callbackSink((change) => applyTheme(change.newValue)),
 * });
 *
 * observer.pause();
 * settings.theme = 'dark'; // not delivered
 * observer.resume();
 * settings.theme = 'light'; // delivered
 *
 * observer.destroy();
 * ```
 */
export class ResumableObserver<TSource extends object, TSelector extends Selector, TValue>
  implements Destroyable
{
  protected readonly logger: ObserveLogger;
  private readonly adapter: EventSourceAdapter<TSource, TSelector, TValue>;
  private readonly sourceRef: WeakRef<TSource>;
  private readonly selector: TSelector;
  private readonly scheduler: SchedulerLike | undefined;
  private readonly deliver: (value: TValue) => void;
  private readonly record: TeardownRecord;
  private readonly finalize: boolean;
  private currentHandle: SubscriptionHandle<TSource, TSelector, TValue> | null = null;
  private currentState: ObserverState = 'paused';
  private readonly destroyListeners = new Set<() => void>();

  constructor(options: ResumableObserverOptions<TSource, TSelector, TValue>) {
    const { adapter, source, selector, sink } = options;

    if ((typeof source !== 'object' && typeof source !== 'function') || source === null) {
      throw new SourceInvalidError(adapter.kind, 'source must be an object', {
        sourceType: source === null ? 'null' : typeof source,
      });
    }

    this.adapter = adapter;
    this.selector = selector;
    this.scheduler = options.scheduler;
    this.finalize = options.finalize ?? true;
    this.logger = (options.logger ?? defaultLogger).child(options.name ?? adapter.kind);
    this.deliver = createDelivery(sink, this.logger, options.onError);
    this.record = { handle: null, sink };

    adapter.validate?.(source, selector);
    this.sourceRef = new WeakRef(source);

    this.resume();

    if (this.finalize) {
      finalizer.register(this, this.record, this.record);
    }
  }

  /**
   * Current lifecycle state. A running observer whose source has been
   * garbage-collected reports `paused`: nothing can reach it any more.
   */
  get state(): ObserverState {
    if (this.currentState === 'running' && this.sourceRef.deref() === undefined) {
      return 'paused';
    }
    return this.currentState;
  }

  /** Whether events are currently being delivered */
  get isRunning(): boolean {
    return this.state === 'running';
  }

  /**
   * Start delivering again. No-op when running or destroyed, and when the
   * source has already been garbage-collected.
   */
  resume(): void {
    if (this.currentState === 'destroyed') {
      this.logger.debug('resume ignored', { code: 'OBSERVE_L202', ...this.describe() });
      return;
    }
    if (this.currentHandle) return;

    const source = this.sourceRef.deref();
    if (source === undefined) {
      this.logger.debug('resume ignored, source collected', this.describe());
      return;
    }

    const handle = new SubscriptionHandle(this.adapter, this.logger);
    const run = handle.guard(this.deliver);
    const scheduler = this.scheduler;
    const handler = scheduler
      ? (value: TValue): void => {
          scheduler.schedule(() => run(value));
        }
      : run;

    this.currentHandle = handle;
    this.record.handle = handle;
    this.currentState = 'running';

    try {
      handle.open(source, this.selector, handler);
    } catch (error) {
      this.clearHandle(handle);
      throw error;
    }

    this.logger.debug('resumed', this.describe());
  }

  /**
   * Stop delivering. No-op unless running.
   */
  pause(): void {
    const handle = this.currentHandle;
    if (!handle) return;

    this.clearHandle(handle);
    handle.cancel();

    this.logger.debug('paused', this.describe());
  }

  /**
   * Pause permanently and close the sink. Idempotent.
   */
  destroy(): void {
    if (this.currentState === 'destroyed') return;

    this.pause();
    this.currentState = 'destroyed';

    if (this.finalize) {
      finalizer.unregister(this.record);
    }
    this.record.sink.close();

    const listeners = [...this.destroyListeners];
    this.destroyListeners.clear();
    for (const listener of listeners) {
      listener();
    }

    this.logger.debug('destroyed', this.describe());
  }

  /**
   * Run `listener` once when the observer is destroyed, or right away if it
   * already is. Returns a function that removes the listener.
   */
  onDestroy(listener: () => void): () => void {
    if (this.currentState === 'destroyed') {
      listener();
      return () => undefined;
    }
    this.destroyListeners.add(listener);
    return () => {
      this.destroyListeners.delete(listener);
    };
  }

  /**
   * Destroy this observer when `subscription` is unsubscribed.
   *
   * @example
   * ```typescript
   * const subscriptions = new Subscription();
   * new PropertyObserver(model, 'count', render).addTo(subscriptions);
   * // later
   * subscriptions.unsubscribe();
   * ```
   */
  addTo(subscription: Subscription): this {
    subscription.add(() => this.destroy());
    return this;
  }

  private clearHandle(handle: SubscriptionHandle<TSource, TSelector, TValue>): void {
    if (this.currentHandle !== handle) return;
    this.currentHandle = null;
    this.record.handle = null;
    if (this.currentState === 'running') {
      this.currentState = 'paused';
    }
  }

  private describe(): Record<string, unknown> {
    return { adapter: this.adapter.kind, selector: describeSelector(this.selector) };
  }
}

/**
 * Build the delivery function. It closes over the sink and logger only,
 * never over the observer.
 */
function createDelivery<TValue>(
  sink: DeliverySink<TValue>,
  logger: ObserveLogger,
  onError: ((error: Error) => void) | undefined
): (value: TValue) => void {
  return (value: TValue) => {
    try {
      sink.deliver(value);
    } catch (error) {
      const failure = ensureObserveError(error, 'OBSERVE_D300');
      logger.error('observer callback threw', failure);
      if (!onError) {
        reportUnhandled(failure, logger);
        return;
      }
      try {
        onError(failure);
      } catch (hookError) {
        const hookFailure = ensureObserveError(hookError, 'OBSERVE_D300');
        logger.error('onError hook threw', hookFailure);
        reportUnhandled(hookFailure, logger);
      }
    }
  };
}

/**
 * Last-resort output for a delivery failure nobody else will see.
 */
function reportUnhandled(failure: ObserveError, logger: ObserveLogger): void {
  if (logger.isSilent) {
    console.error(`[${logger.module}] ${failure.format()}`);
  }
}

function describeSelector(selector: Selector): Record<string, unknown> {
  const description: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(selector)) {
    if (typeof value === 'function') {
      description[key] = '[function]';
    } else if (typeof value === 'object' && value !== null) {
      description[key] = '[object]';
    } else {
      description[key] = value;
    }
  }
  return description;
}

/**
 * Create an observer that calls `callback` for every matching event.
 *
 * @example
 * ```typescript
 * const observer = createObserver(
 *   notificationCenterAdapter,
 *   NotificationCenter.default,
 *   { name: 'session.expired' },
 *   (notification) => signOut(notification.userInfo)
 * );
 * ```
 */
export function createObserver<TSource extends object, TSelector extends Selector, TValue>(
  adapter: EventSourceAdapter<TSource, TSelector, TValue>,
  source: TSource,
  selector: TSelector,
  callback: (value: TValue) => void,
  config: ObserverConfig = {}
): ResumableObserver<TSource, TSelector, TValue> {
  return new ResumableObserver({
    ...config,
    adapter,
    source,
    selector,
    sink: new CallbackSink(callback),
  });
}
