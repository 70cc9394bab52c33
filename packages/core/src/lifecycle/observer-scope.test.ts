import { EventEmitter } from 'node:events';
import { describe, expect, it, vi } from 'vitest';
import { FakeAdapter, type FakeEvent, FakeSource } from '../__tests__/fake-source.js';
import { ObserverScope, createObserverScope } from './observer-scope.js';
import { createObserver } from './resumable-observer.js';

describe('ObserverScope', () => {
  it('should destroy every tracked observer once', () => {
    const scope = createObserverScope();
    const adapter = new FakeAdapter();
    const source = new FakeSource();
    const values: number[] = [];
    const record = (event: FakeEvent): void => {
      values.push(event.value);
    };

    const first = scope.track(createObserver(adapter, source, { channel: 'counter' }, record));
    const second = scope.track(createObserver(adapter, source, { channel: 'counter' }, record));
    expect(scope.size).toBe(2);

    scope.destroy();
    scope.destroy();
    source.emit('counter', 1);

    expect(values).toEqual([]);
    expect(first.state).toBe('destroyed');
    expect(second.state).toBe('destroyed');
    expect(adapter.unregisterCount).toBe(2);
    expect(scope.size).toBe(0);
    expect(scope.destroyed).toBe(true);
  });

  it('should release observers destroyed outside the scope', () => {
    const scope = new ObserverScope();
    const adapter = new FakeAdapter();
    const source = new FakeSource();

    for (let i = 0; i < 100; i++) {
      scope.track(createObserver(adapter, source, { channel: 'counter' }, () => undefined)).destroy();
    }
    const kept = scope.track(createObserver(adapter, source, { channel: 'counter' }, () => undefined));

    expect(scope.size).toBe(1);
    expect(adapter.unregisterCount).toBe(100);

    scope.destroy();

    expect(kept.state).toBe('destroyed');
    expect(adapter.unregisterCount).toBe(101);
    expect(scope.size).toBe(0);
  });

  it('should destroy observers tracked after the scope was destroyed', () => {
    const scope = new ObserverScope();
    scope.destroy();
    const observer = { destroy: vi.fn() };

    expect(scope.track(observer)).toBe(observer);
    expect(observer.destroy).toHaveBeenCalledTimes(1);
    expect(scope.size).toBe(0);
  });

  it('should destroy the scope when the process exits', () => {
    const proc = new EventEmitter();
    const scope = new ObserverScope().bindToProcess(proc);
    const observer = scope.track({ destroy: vi.fn() });

    proc.emit('exit', 0);

    expect(observer.destroy).toHaveBeenCalledTimes(1);
    expect(scope.destroyed).toBe(true);
    expect(proc.listenerCount('exit')).toBe(0);
  });

  it('should remove its exit listener when destroyed first', () => {
    const proc = new EventEmitter();
    const scope = new ObserverScope().bindToProcess(proc);
    expect(proc.listenerCount('exit')).toBe(1);

    scope.destroy();

    expect(proc.listenerCount('exit')).toBe(0);
  });
});
