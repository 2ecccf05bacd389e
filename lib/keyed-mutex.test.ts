import { describe, expect, it } from 'vitest';
import { KeyedMutex } from './keyed-mutex';

const tick = () => new Promise<void>(resolve => setTimeout(resolve, 0));

describe('KeyedMutex', () => {
  it('runs tasks under one key one at a time, in order', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const task = (name: string) => async () => {
      events.push(`${name}:start`);
      await tick();
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([
      mutex.runExclusive('chat-1', task('a')),
      mutex.runExclusive('chat-1', task('b')),
    ]);

    expect(results).toEqual(['a', 'b']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    expect(mutex.isLocked('chat-1')).toBe(false);
  });

  it('lets different keys overlap', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const task = (name: string) => async () => {
      events.push(`${name}:start`);
      await tick();
      events.push(`${name}:end`);
    };

    await Promise.all([mutex.runExclusive('chat-1', task('a')), mutex.runExclusive('chat-2', task('b'))]);

    expect(events.slice(0, 2)).toEqual(['a:start', 'b:start']);
  });

  it('releases the key when a task fails', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('chat-1', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    await expect(mutex.runExclusive('chat-1', async () => 'next')).resolves.toBe('next');
    expect(mutex.isLocked('chat-1')).toBe(false);
  });
});
