import { SelectorInvalidError } from '@kvobserve/core';
import { VirtualTimeScheduler } from 'rxjs';
import { describe, expect, it, vi } from 'vitest';
import { type Notification, NotificationCenter } from './notification-center.js';
import { NotificationObserver } from './notification-observer.js';
import { NotificationPublisher } from './notification-publisher.js';

describe('NotificationObserver', () => {
  it('should deliver userInfo of matching notifications', () => {
    const center = new NotificationCenter();
    const received: Notification[] = [];
    const observer = new NotificationObserver({ name: 'cart.updated', center }, (n) =>
      received.push(n)
    );

    center.post('cart.updated', null, { items: 3 });

    expect(received).toHaveLength(1);
    expect(received[0]?.userInfo).toEqual({ items: 3 });
    observer.destroy();
  });

  it('should apply the sender filter', () => {
    const center = new NotificationCenter();
    const cart = { id: 'cart-1' };
    const onNotify = vi.fn();
    const observer = new NotificationObserver({ name: 'cart.updated', sender: cart, center }, onNotify);

    center.post('cart.updated', { id: 'cart-1' });
    center.post('cart.updated', cart);

    expect(onNotify).toHaveBeenCalledTimes(1);
    observer.destroy();
  });

  it('should remove its center registration while paused', () => {
    const center = new NotificationCenter();
    const observer = new NotificationObserver({ name: 'tick', center }, () => undefined);

    expect(center.observerCount('tick')).toBe(1);
    observer.pause();
    expect(center.observerCount('tick')).toBe(0);
    observer.resume();
    expect(center.observerCount('tick')).toBe(1);
    observer.destroy();
    observer.resume();
    expect(center.observerCount('tick')).toBe(0);
  });

  it('should reject an empty name', () => {
    expect(
      () => new NotificationObserver({ name: '', center: new NotificationCenter() }, () => undefined)
    ).toThrow(SelectorInvalidError);
  });

  it('should drop scheduled deliveries that run after pause', () => {
    const center = new NotificationCenter();
    const scheduler = new VirtualTimeScheduler();
    const onNotify = vi.fn();
    const observer = new NotificationObserver({ name: 'tick', center, scheduler }, onNotify);

    center.post('tick');
    expect(onNotify).not.toHaveBeenCalled();
    scheduler.flush();
    expect(onNotify).toHaveBeenCalledTimes(1);

    center.post('tick');
    observer.pause();
    scheduler.flush();
    expect(onNotify).toHaveBeenCalledTimes(1);
  });
});

describe('NotificationPublisher', () => {
  it('should multicast over one center registration', () => {
    const center = new NotificationCenter();
    const publisher = new NotificationPublisher({ name: 'saved', center });
    const first = vi.fn();
    const second = vi.fn();

    publisher.notification.subscribe(first);
    publisher.notification.subscribe(second);
    center.post('saved', null, { id: 'doc-1' });

    expect(center.observerCount('saved')).toBe(1);
    expect(first).toHaveBeenCalledTimes(1);
    expect(second).toHaveBeenCalledWith({ name: 'saved', sender: null, userInfo: { id: 'doc-1' } });
    publisher.destroy();
    expect(center.observerCount('saved')).toBe(0);
  });
});
