import { describe, it, expect } from 'vitest';
import { SerialQueue } from '../src/core/serial-queue.js';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 5));

describe('SerialQueue', () => {
  it('runs tasks one at a time in submission order', async () => {
    const queue = new SerialQueue();
    const log: string[] = [];

    const slow = queue.run(async () => {
      log.push('slow:start');
      await tick();
      log.push('slow:end');
      return 1;
    });
    const fast = queue.run(() => {
      log.push('fast');
      return 2;
    });

    expect(await Promise.all([slow, fast])).toEqual([1, 2]);
    expect(log).toEqual(['slow:start', 'slow:end', 'fast']);
  });

  it('keeps going after a task fails', async () => {
    const queue = new SerialQueue();
    const failed = queue.run(() => {
      throw new Error('boom');
    });
    const next = queue.run(() => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('tracks pending tasks and drains', async () => {
    const queue = new SerialQueue();
    void queue.run(tick);
    void queue.run(tick);
    expect(queue.depth).toBe(2);
    await queue.drain();
    expect(queue.depth).toBe(0);
  });
});
