import { describe, it, expect } from 'vitest';
import { KeyedMutex } from './sessionLock';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('KeyedMutex', () => {
  it('should run calls on one key in order, one at a time', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const task = (name: string, ms: number) =>
      mutex.lock('a', async () => {
        events.push(`${name} start`);
        await delay(ms);
        events.push(`${name} end`);
        return name;
      });

    const results = await Promise.all([task('first', 20), task('second', 5), task('third', 0)]);

    expect(results).toEqual(['first', 'second', 'third']);
    expect(events).toEqual([
      'first start',
      'first end',
      'second start',
      'second end',
      'third start',
      'third end',
    ]);
  });

  it('should not hold up other keys', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const slow = mutex.lock('a', async () => {
      await delay(20);
      events.push('a');
    });
    const fast = mutex.lock('b', async () => {
      events.push('b');
    });
    await Promise.all([slow, fast]);

    expect(events).toEqual(['b', 'a']);
  });

  it('should release the key when a call throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.lock('a', async () => {
        throw new Error('edit failed');
      })
    ).rejects.toThrow('edit failed');

    expect(mutex.isLocked('a')).toBe(false);
    await expect(mutex.lock('a', async () => 'next')).resolves.toBe('next');
    expect(mutex.isLocked('a')).toBe(false);
  });
});
