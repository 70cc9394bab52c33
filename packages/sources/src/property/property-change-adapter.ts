import {
  type EventSourceAdapter,
  type ObserveLogger,
  type RegistrationToken,
  type Selector,
  SelectorInvalidError,
  SourceInvalidError,
  defaultLogger,
} from '@kvobserve/core';
import { isObservable, isWritableProperty, listenToProperty } from './observable-object.js';

/**
 * Which property to watch.
 */
export interface PropertySelector<T extends object, K extends keyof T = keyof T> extends Selector {
  readonly key: K;
  /** Also deliver the current value when the registration starts */
  readonly initial?: boolean;
}

/**
 * One observed assignment.
 */
export interface PropertyChange<T extends object, K extends keyof T = keyof T> {
  readonly target: T;
  readonly key: K;
  /** Value read back from the object after the assignment */
  readonly newValue: T[K];
  /**
   * Value seen by this registration before the assignment; `undefined` for
   * the initial delivery.
   */
  readonly oldValue: T[K] | undefined;
  /** True for the delivery made when the registration starts */
  readonly initial: boolean;
}

/**
 * Adapter over objects created with `observable()`.
 *
 * The registration keeps only a `WeakRef` to the object. A property that can
 * never be assigned (getter without setter, non-writable) is accepted but
 * never fires; a warning is logged when such a selector is validated.
 */
export class PropertyChangeAdapter<T extends object, K extends keyof T>
  implements EventSourceAdapter<T, PropertySelector<T, K>, PropertyChange<T, K>>
{
  readonly kind = 'property';
  private readonly registrations = new Map<number, () => void>();
  private nextId = 1;

  constructor(private readonly logger: ObserveLogger = defaultLogger.child('property')) {}

  /** Number of live registrations made through this adapter */
  get registrationCount(): number {
    return this.registrations.size;
  }

  validate(source: T, selector: PropertySelector<T, K>): void {
    if (!isObservable(source)) {
      throw new SourceInvalidError(this.kind, 'object is not observable; wrap it with observable()');
    }
    if (selector.sender !== undefined) {
      throw new SelectorInvalidError(this.kind, 'property changes have no sender to filter on', {
        key: String(selector.key),
      });
    }
    if (!(selector.key in source)) {
      throw new SelectorInvalidError(this.kind, `property "${String(selector.key)}" does not exist`, {
        key: String(selector.key),
      });
    }
    if (!isWritableProperty(source, selector.key)) {
      this.logger.warn('property is read-only and will never notify', { key: String(selector.key) });
    }
  }

  register(
    source: T,
    selector: PropertySelector<T, K>,
    handler: (value: PropertyChange<T, K>) => void
  ): RegistrationToken {
    const { key } = selector;
    const ref = new WeakRef(source);
    let previous: T[K] = source[key];

    const unlisten = listenToProperty(source, key, () => {
      const target = ref.deref();
      if (target === undefined) return;
      const newValue = target[key];
      const oldValue = previous;
      previous = newValue;
      handler({ target, key, newValue, oldValue, initial: false });
    });
    if (!unlisten) {
      throw new SourceInvalidError(this.kind, 'object is not observable; wrap it with observable()');
    }

    const id = this.nextId++;
    this.registrations.set(id, unlisten);

    if (selector.initial) {
      handler({ target: source, key, newValue: previous, oldValue: undefined, initial: true });
    }

    return { adapter: this.kind, id };
  }

  unregister(token: RegistrationToken): void {
    const unlisten = this.registrations.get(token.id);
    if (!unlisten) return;
    this.registrations.delete(token.id);
    unlisten();
  }
}
