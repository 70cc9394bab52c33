import { type LogEntry, SelectorInvalidError, SourceInvalidError, createLogger } from '@kvobserve/core';
import { describe, expect, it, vi } from 'vitest';
import { observable, propertyListenerCount } from './observable-object.js';
import type { PropertyChange } from './property-change-adapter.js';
import { PropertyObserver } from './property-observer.js';

class Temperature {
  celsius = 20;

  get fahrenheit(): number {
    return (this.celsius * 9) / 5 + 32;
  }
}

describe('PropertyObserver', () => {
  it('should deliver every assignment, including repeated values', () => {
    const model = observable({ count: 0 });
    const values: number[] = [];
    const observer = new PropertyObserver(model, 'count', (value) => values.push(value));

    model.count = 1;
    model.count = 1;
    model.count = 2;

    expect(values).toEqual([1, 1, 2]);
    observer.destroy();
  });

  it('should see assignments made through a second observable() of the same object', () => {
    const raw = { count: 0 };
    const watched = observable(raw);
    const values: number[] = [];
    const observer = new PropertyObserver(watched, 'count', (value) => values.push(value));

    observable(raw).count = 5;

    expect(values).toEqual([5]);
    observer.destroy();
  });

  it('should report the previous value with each change', () => {
    const model = observable({ count: 0 });
    const changes: PropertyChange<{ count: number }, 'count'>[] = [];
    const observer = new PropertyObserver(model, 'count', (_value, change) => changes.push(change));

    model.count = 5;
    model.count = 7;

    expect(changes).toHaveLength(2);
    expect(changes[1]?.target).toBe(model);
    expect(changes[1]?.key).toBe('count');
    expect(changes[1]?.oldValue).toBe(5);
    expect(changes[1]?.newValue).toBe(7);
    expect(changes[1]?.initial).toBe(false);
    observer.destroy();
  });

  it('should ignore other properties and assignments to the unwrapped object', () => {
    const raw = { count: 0, label: 'a' };
    const model = observable(raw);
    const onChange = vi.fn();
    const observer = new PropertyObserver(model, 'count', onChange);

    model.label = 'b';
    raw.count = 9;

    expect(onChange).not.toHaveBeenCalled();
    observer.destroy();
  });

  it('should deliver the current value at start and on every resume when initial is set', () => {
    const model = observable({ count: 0 });
    const values: number[] = [];
    const observer = new PropertyObserver(model, 'count', (value) => values.push(value), {
      initial: true,
    });

    observer.pause();
    model.count = 2;
    observer.resume();
    model.count = 3;

    expect(values).toEqual([0, 2, 3]);
    observer.destroy();
  });

  it('should hold one listener while running and none when paused or destroyed', () => {
    const model = observable({ count: 0 });
    const observer = new PropertyObserver(model, 'count', () => undefined);

    expect(propertyListenerCount(model, 'count')).toBe(1);
    observer.pause();
    expect(propertyListenerCount(model, 'count')).toBe(0);
    observer.resume();
    expect(propertyListenerCount(model, 'count')).toBe(1);
    observer.destroy();
    expect(propertyListenerCount(model)).toBe(0);
  });

  it('should reject objects that were not made observable', () => {
    expect(() => new PropertyObserver({ count: 0 }, 'count', () => undefined)).toThrow(
      SourceInvalidError
    );
  });

  it('should reject keys the object does not have', () => {
    const model = observable<{ count: number; label?: string }>({ count: 0 });

    expect(() => new PropertyObserver(model, 'label', () => undefined)).toThrow(
      SelectorInvalidError
    );
  });

  it('should accept a getter-only property, warn, and never fire', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ handler: (entry) => entries.push(entry) });
    const reading = observable(new Temperature());
    const onChange = vi.fn();

    const observer = new PropertyObserver(reading, 'fahrenheit', onChange, { logger });
    reading.celsius = 100;

    expect(observer.isRunning).toBe(true);
    expect(onChange).not.toHaveBeenCalled();
    expect(entries).toHaveLength(1);
    expect(entries[0]?.level).toBe('warn');
    expect(entries[0]?.module).toBe('kvobserve:property');
    expect(entries[0]?.message).toBe('property is read-only and will never notify');
    expect(entries[0]?.context).toEqual({ key: 'fahrenheit' });
    observer.destroy();
  });
});
