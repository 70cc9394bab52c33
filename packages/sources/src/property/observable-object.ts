/**
 * Property change notification for plain objects.
 *
 * {@link observable} wraps an object in a Proxy that reports every property
 * assignment made through it. Assignments made directly on the original,
 * unwrapped object are not seen.
 *
 * @module property/observable-object
 */

type PropertyListener = () => void;

/**
 * Per-object listener table, keyed by property.
 */
class PropertyNotifier {
  private readonly listeners = new Map<PropertyKey, Set<PropertyListener>>();

  listen(key: PropertyKey, listener: PropertyListener): () => void {
    let set = this.listeners.get(key);
    if (!set) {
      set = new Set();
      this.listeners.set(key, set);
    }
    set.add(listener);

    return () => {
      const current = this.listeners.get(key);
      if (!current) return;
      current.delete(listener);
      if (current.size === 0) {
        this.listeners.delete(key);
      }
    };
  }

  notify(key: PropertyKey): void {
    const set = this.listeners.get(key);
    if (!set) return;
    for (const listener of [...set]) {
      listener();
    }
  }

  count(key?: PropertyKey): number {
    if (key !== undefined) {
      return this.listeners.get(key)?.size ?? 0;
    }
    let total = 0;
    for (const set of this.listeners.values()) {
      total += set.size;
    }
    return total;
  }
}

const notifiers = new WeakMap<object, PropertyNotifier>();
const proxies = new WeakMap<object, object>();

function isProxyOf<T extends object>(value: object | undefined, target: T): value is T {
  return value !== undefined && proxies.get(target) === value;
}

/**
 * Make `target` observable. Returns a Proxy; keep using the proxy, not the
 * original object. Wrapping an already observable object, or wrapping the
 * same object again, returns the existing proxy.
 *
 * Every assignment through the proxy notifies, including one that stores
 * the value the property already had.
 *
 * @example
 * ```typescript
 * const settings = observable({ theme: 'light', fontSize: 14 });
 * const observer = new PropertyObserver(settings, 'theme', (theme) => {
 *   document.body.dataset.theme = theme;
 * });
 * settings.theme = 'dark';
 * ```
 */
export function observable<T extends object>(target: T): T {
  if (notifiers.has(target)) return target;
  const existing = proxies.get(target);
  if (isProxyOf(existing, target)) return existing;

  const notifier = new PropertyNotifier();
  const proxy = new Proxy(target, {
    set(obj, key, value, receiver) {
      const stored = Reflect.set(obj, key, value, receiver);
      if (stored) {
        notifier.notify(key);
      }
      return stored;
    },
  });

  notifiers.set(proxy, notifier);
  proxies.set(target, proxy);
  return proxy;
}

/** Whether `value` was created by {@link observable} */
export function isObservable(value: unknown): boolean {
  return typeof value === 'object' && value !== null && notifiers.has(value);
}

/**
 * Listen for assignments to `key` on an observable object. Returns the
 * function that stops listening, or `null` if `target` is not observable.
 */
export function listenToProperty(
  target: object,
  key: PropertyKey,
  listener: () => void
): (() => void) | null {
  const notifier = notifiers.get(target);
  if (!notifier) return null;
  return notifier.listen(key, listener);
}

/** Number of listeners attached to `target`, optionally for one key */
export function propertyListenerCount(target: object, key?: PropertyKey): number {
  return notifiers.get(target)?.count(key) ?? 0;
}

/**
 * Whether assignments to `key` can ever succeed: false for getter-only
 * accessors and non-writable data properties.
 */
export function isWritableProperty(target: object, key: PropertyKey): boolean {
  let current: object | null = target;
  while (current !== null) {
    const descriptor = Object.getOwnPropertyDescriptor(current, key);
    if (descriptor) {
      if ('value' in descriptor) {
        return descriptor.writable === true;
      }
      return descriptor.set !== undefined;
    }
    current = Object.getPrototypeOf(current);
  }
  return true;
}
