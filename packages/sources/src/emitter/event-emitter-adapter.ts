import { EventEmitter } from 'node:events';
import {
  type EventSourceAdapter,
  type RegistrationToken,
  type Selector,
  SelectorInvalidError,
  SourceInvalidError,
} from '@kvobserve/core';

/**
 * Which event to watch. Node events carry no sender, so `sender` is
 * rejected.
 */
export interface EventSelector extends Selector {
  readonly event: string | symbol;
}

interface Registration {
  emitter: WeakRef<EventEmitter>;
  event: string | symbol;
  listener: (...args: unknown[]) => void;
}

/**
 * Adapter over Node.js `EventEmitter`. The handler receives each event's
 * argument list.
 */
export class EventEmitterAdapter implements EventSourceAdapter<EventEmitter, EventSelector, unknown[]> {
  readonly kind = 'emitter';
  private readonly registrations = new Map<number, Registration>();
  private nextId = 1;

  get registrationCount(): number {
    return this.registrations.size;
  }

  validate(source: EventEmitter, selector: EventSelector): void {
    if (!(source instanceof EventEmitter)) {
      throw new SourceInvalidError(this.kind, 'source is not an EventEmitter');
    }
    if (selector.sender !== undefined) {
      throw new SelectorInvalidError(this.kind, 'EventEmitter events have no sender to filter on', {
        event: String(selector.event),
      });
    }
  }

  register(
    source: EventEmitter,
    selector: EventSelector,
    handler: (value: unknown[]) => void
  ): RegistrationToken {
    const listener = (...args: unknown[]): void => handler(args);
    source.on(selector.event, listener);

    const id = this.nextId++;
    this.registrations.set(id, { emitter: new WeakRef(source), event: selector.event, listener });
    return { adapter: this.kind, id };
  }

  unregister(token: RegistrationToken): void {
    const registration = this.registrations.get(token.id);
    if (!registration) return;
    this.registrations.delete(token.id);
    registration.emitter.deref()?.off(registration.event, registration.listener);
  }
}

export const eventEmitterAdapter = new EventEmitterAdapter();
