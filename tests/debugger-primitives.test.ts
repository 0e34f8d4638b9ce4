import { describe, it, expect } from 'vitest';
import { LineChannel } from '../src/server/debugger/channel.js';
import { Mutex } from '../src/server/debugger/mutex.js';

describe('LineChannel', () => {
  it('delivers buffered lines in order', async () => {
    const channel = new LineChannel(5);
    channel.push('one');
    channel.push('two');

    expect(await channel.next()).toEqual({ value: 'one', done: false });
    expect(await channel.next()).toEqual({ value: 'two', done: false });
  });

  it('hands a line straight to a waiting reader', async () => {
    const channel = new LineChannel(1);
    const pending = channel.next();
    expect(channel.push('direct')).toBe(true);
    expect(await pending).toEqual({ value: 'direct', done: false });
  });

  it('drops lines when the buffer is full', () => {
    const channel = new LineChannel(2);
    expect(channel.push('a')).toBe(true);
    expect(channel.push('b')).toBe(true);
    expect(channel.push('c')).toBe(false);
    expect(channel.dropped).toBe(1);
  });

  it('drains buffered lines after close, then ends', async () => {
    const channel = new LineChannel(5);
    channel.push('last');
    channel.close();

    expect(channel.push('late')).toBe(false);
    expect(await channel.next()).toEqual({ value: 'last', done: false });
    expect((await channel.next()).done).toBe(true);
  });

  it('ends a pending read on close', async () => {
    const channel = new LineChannel(5);
    const pending = channel.next();
    channel.close();
    expect((await pending).done).toBe(true);
  });
});

describe('Mutex', () => {
  it('grants the lock in request order', async () => {
    const mutex = new Mutex();
    const order: string[] = [];

    const first = await mutex.acquire(100);
    const second = mutex.acquire(100).then(release => {
      order.push('second');
      release?.();
    });
    const third = mutex.acquire(100).then(release => {
      order.push('third');
      release?.();
    });

    order.push('first');
    first?.();
    await Promise.all([second, third]);

    expect(order).toEqual(['first', 'second', 'third']);
    expect(mutex.isLocked).toBe(false);
  });

  it('gives up after the timeout without blocking later waiters', async () => {
    const mutex = new Mutex();
    const held = await mutex.acquire(100);

    expect(await mutex.acquire(10)).toBeUndefined();

    const later = mutex.acquire(100);
    held?.();
    const release = await later;
    expect(release).toBeTypeOf('function');
    release?.();
    expect(mutex.isLocked).toBe(false);
  });

  it('stops waiting when the signal aborts', async () => {
    const mutex = new Mutex();
    const held = await mutex.acquire(100);
    const controller = new AbortController();

    const waiting = mutex.acquire(5000, controller.signal);
    controller.abort();

    expect(await waiting).toBeUndefined();
    held?.();
    expect(mutex.isLocked).toBe(false);
  });

  it('refuses an already aborted signal even when free', async () => {
    const mutex = new Mutex();

    expect(await mutex.acquire(100, AbortSignal.abort())).toBeUndefined();
    expect(mutex.isLocked).toBe(false);
  });

  it('ignores a second release', async () => {
    const mutex = new Mutex();
    const release = await mutex.acquire(100);
    release?.();
    const next = await mutex.acquire(100);
    release?.();
    expect(mutex.isLocked).toBe(true);
    next?.();
  });
});
