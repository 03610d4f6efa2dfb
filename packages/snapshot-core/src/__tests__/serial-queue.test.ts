import { describe, it, expect } from 'vitest';
import { SerialQueue } from '../utils/serial-queue.js';

describe('SerialQueue', () => {
  it('should run tasks one at a time in submission order', async () => {
    const queue = new SerialQueue();
    const events: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = queue.run(async () => {
      events.push('first:start');
      await firstGate;
      events.push('first:end');
      return 1;
    });
    const second = queue.run(async () => {
      events.push('second:start');
      return 2;
    });

    await Promise.resolve();
    expect(queue.size).toBe(2);
    expect(events).toEqual(['first:start']);

    releaseFirst();
    await expect(first).resolves.toBe(1);
    await expect(second).resolves.toBe(2);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
    expect(queue.size).toBe(0);
  });

  it('should keep going after a failed task', async () => {
    const queue = new SerialQueue();

    const failing = queue.run(async () => {
      throw new Error('boom');
    });
    const next = queue.run(async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('should drain after every submitted task settles', async () => {
    const queue = new SerialQueue();
    const done: number[] = [];

    void queue.run(async () => {
      done.push(1);
    });
    queue.run(async () => {
      throw new Error('ignored');
    }).catch(() => undefined);

    await queue.drain();
    expect(done).toEqual([1]);
  });
});
