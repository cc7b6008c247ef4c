import { describe, expect, it } from 'vitest';
import { joinWithTimeout } from './async';

describe('joinWithTimeout', () => {
  it('returns the value when the task settles in time', async () => {
    await expect(joinWithTimeout(Promise.resolve(42), 1000)).resolves.toEqual({ kind: 'settled', value: 42 });
  });

  it('reports a timeout and leaves the task running', async () => {
    let finish: (value: string) => void = () => undefined;
    const task = new Promise<string>((resolve) => {
      finish = resolve;
    });

    await expect(joinWithTimeout(task, 5)).resolves.toEqual({ kind: 'timeout' });

    finish('done');
    await expect(task).resolves.toBe('done');
  });

  it('propagates a rejection that arrives before the deadline', async () => {
    await expect(joinWithTimeout(Promise.reject(new Error('boom')), 1000)).rejects.toThrow('boom');
  });
});
