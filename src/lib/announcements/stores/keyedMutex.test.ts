// src/lib/announcements/stores/keyedMutex.test.ts
import { describe, it, expect } from 'vitest';
import { KeyedMutex } from './keyedMutex';

function deferred() {
  let release: () => void = () => {};
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { gate, release };
}

describe('KeyedMutex', () => {
  it('runs tasks for the same key one after another', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const first = deferred();

    const a = mutex.run('abc', async () => {
      events.push('a:start');
      await first.gate;
      events.push('a:end');
    });
    const b = mutex.run('abc', async () => {
      events.push('b:start');
    });

    await Promise.resolve();
    expect(events).toEqual(['a:start']);

    first.release();
    await Promise.all([a, b]);
    expect(events).toEqual(['a:start', 'a:end', 'b:start']);
  });

  it('does not make different keys wait on each other', async () => {
    const mutex = new KeyedMutex();
    const blocked = deferred();
    const events: string[] = [];

    const slow = mutex.run('one', async () => {
      await blocked.gate;
      events.push('one');
    });
    await mutex.run('two', async () => {
      events.push('two');
    });

    expect(events).toEqual(['two']);
    blocked.release();
    await slow;
    expect(events).toEqual(['two', 'one']);
  });

  it('keeps the chain going after a failed task and forgets idle keys', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.run('abc', async () => {
        throw new Error('write failed');
      }),
    ).rejects.toThrow('write failed');
    expect(await mutex.run('abc', async () => 'next')).toBe('next');
    expect(mutex.size).toBe(0);
  });

  it('counts keys with pending work', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();

    const pending = mutex.run('abc', () => gate.gate);
    expect(mutex.size).toBe(1);

    gate.release();
    await pending;
    expect(mutex.size).toBe(0);
  });
});
