import { describe, expect, it } from 'vitest';
import { SerialLanes } from './SerialLanes.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe('SerialLanes', () => {
  it('runs tasks on one key in call order', async () => {
    const lanes = new SerialLanes();
    const order: string[] = [];
    const gate = deferred();

    const first = lanes.run('a', async () => {
      await gate.promise;
      order.push('first');
    });
    const second = lanes.run('a', () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(order).toEqual([]);
    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first', 'second']);
  });

  it('does not block other keys', async () => {
    const lanes = new SerialLanes();
    const gate = deferred();
    const blocked = lanes.run('a', () => gate.promise);

    await expect(lanes.run('b', () => 42)).resolves.toBe(42);
    gate.resolve();
    await blocked;
  });

  it('keeps the lane usable after a task throws', async () => {
    const lanes = new SerialLanes();
    const failed = lanes.run('a', () => {
      throw new Error('boom');
    });
    await expect(failed).rejects.toThrow('boom');
    await expect(lanes.run('a', () => 'next')).resolves.toBe('next');
  });

  it('idle waits for queued work', async () => {
    const lanes = new SerialLanes();
    const gate = deferred();
    let done = false;
    void lanes.run('a', async () => {
      await gate.promise;
      done = true;
    });

    const idle = lanes.idle('a');
    gate.resolve();
    await idle;
    expect(done).toBe(true);
    await expect(lanes.idle('unused')).resolves.toBeUndefined();
  });
});
