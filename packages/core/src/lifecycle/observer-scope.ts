import { Subscription } from 'rxjs';
import type { Destroyable } from './types.js';

/** Emitter a scope can bind its teardown to; `process` by default */
export interface ExitSignalSource {
  once(event: 'exit', listener: () => void): unknown;
  off(event: 'exit', listener: () => void): unknown;
}

/**
 * Owns a group of observers and destroys them together.
 *
 * Give each object that creates observers one scope and destroy it from the
 * object's own teardown path. {@link bindToProcess} covers process shutdown.
 *
 * @example
 * ```typescript
 * class SettingsPanel {
 *   private readonly scope = new ObserverScope();
 *
 *   constructor(settings: Settings) {
 *     this.scope.track(new PropertyObserver(settings, 'theme', (t) => this.render(t)));
 *     this.scope.track(new NotificationObserver({ name: 'locale.changed' }, () => this.render()));
 *   }
 *
 *   dispose(): void {
 *     this.scope.destroy();
 *   }
 * }
 * ```
 */
export class ObserverScope implements Destroyable {
  private readonly subscription = new Subscription();
  private readonly members = new Set<Destroyable>();

  /** Number of observers currently tracked */
  get size(): number {
    return this.members.size;
  }

  /** Whether {@link destroy} has run */
  get destroyed(): boolean {
    return this.subscription.closed;
  }

  /**
   * Track `observer` and return it. On a destroyed scope the observer is
   * destroyed immediately. An observer that supports `onDestroy` is released
   * from the scope as soon as it is destroyed elsewhere.
   */
  track<T extends Destroyable>(observer: T): T {
    if (this.subscription.closed) {
      observer.destroy();
      return observer;
    }

    const teardown = (): void => {
      this.members.delete(observer);
      observer.destroy();
    };
    this.members.add(observer);
    this.subscription.add(teardown);

    // Observers destroyed on their own leave the scope.
    observer.onDestroy?.(() => {
      this.members.delete(observer);
      this.subscription.remove(teardown);
    });
    return observer;
  }

  /**
   * Destroy the scope when `source` emits `'exit'`.
   */
  bindToProcess(source: ExitSignalSource = process): this {
    if (this.subscription.closed) return this;

    const onExit = (): void => this.destroy();
    source.once('exit', onExit);
    this.subscription.add(() => {
      source.off('exit', onExit);
    });
    return this;
  }

  /**
   * Destroy every tracked observer. Idempotent.
   */
  destroy(): void {
    this.subscription.unsubscribe();
  }
}

/** Create an {@link ObserverScope} */
export function createObserverScope(): ObserverScope {
  return new ObserverScope();
}
