/**
 * Tests for the intent queue
 */

import { describe, it, expect } from 'vitest';
import { IntentQueue } from '../../../src/orchestrator/queue.js';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('IntentQueue', () => {
  it('runs work one at a time in arrival order', async () => {
    const queue = new IntentQueue(8);
    const order: string[] = [];
    const gate = deferred<void>();

    const first = queue.enqueue(async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
      return 1;
    }, () => -1);
    const second = queue.enqueue(async () => {
      order.push('second');
      return 2;
    }, () => -1);

    await Promise.resolve();
    expect(order).toEqual(['first:start']);
    expect(queue.length).toBe(1);

    gate.resolve();
    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('refuses work beyond its bound without blocking', async () => {
    const queue = new IntentQueue(1);
    const gate = deferred<void>();

    const running = queue.enqueue(() => gate.promise.then(() => 'ran'), () => 'cancelled');
    const waiting = queue.enqueue(async () => 'ran', () => 'cancelled');
    const refused = queue.enqueue(async () => 'ran', () => 'cancelled');

    expect(running).not.toBeNull();
    expect(waiting).not.toBeNull();
    expect(refused).toBeNull();

    gate.resolve();
    expect(await waiting).toBe('ran');
  });

  it('rejects the caller when work throws and keeps going', async () => {
    const queue = new IntentQueue(4);

    const failing = queue.enqueue(async () => {
      throw new Error('boom');
    }, () => 'cancelled');
    const next = queue.enqueue(async () => 'after', () => 'cancelled');

    await expect(failing).rejects.toThrow('boom');
    expect(await next).toBe('after');
  });

  it('cancels queued work on close and waits for the running one', async () => {
    const queue = new IntentQueue(4);
    const gate = deferred<void>();
    let finished = false;

    const running = queue.enqueue(async () => {
      await gate.promise;
      finished = true;
      return 'done';
    }, () => 'cancelled');
    const queued = queue.enqueue(async () => 'ran', () => 'cancelled');

    const closing = queue.close();
    expect(await queued).toBe('cancelled');
    expect(finished).toBe(false);

    gate.resolve();
    await closing;
    expect(finished).toBe(true);
    expect(await running).toBe('done');
    expect(queue.enqueue(async () => 'late', () => 'cancelled')).toBeNull();
    expect(queue.isClosed).toBe(true);
  });
});
