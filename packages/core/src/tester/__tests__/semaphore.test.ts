/**
 * Semaphore Tests
 *
 * @module packages/core/tester/__tests__/semaphore.test
 */

import { describe, it, expect } from 'vitest';

import { Semaphore } from '../semaphore.js';

describe('Semaphore', () => {
  it('grants up to the permit count immediately', async () => {
    const semaphore = new Semaphore(2);

    const a = await semaphore.acquire();
    const b = await semaphore.acquire();

    expect(a).not.toBeNull();
    expect(b).not.toBeNull();
    expect(semaphore.free).toBe(0);
  });

  it('hands a released permit to the next waiter', async () => {
    const semaphore = new Semaphore(1);
    const first = await semaphore.acquire();
    const order: string[] = [];

    const waiting = semaphore.acquire().then((release) => {
      order.push('second');
      return release;
    });
    order.push('released');
    first?.();
    first?.();

    const second = await waiting;
    expect(order).toEqual(['released', 'second']);
    expect(semaphore.free).toBe(0);

    second?.();
    expect(semaphore.free).toBe(1);
  });

  it('resolves a waiter with null when aborted', async () => {
    const semaphore = new Semaphore(1);
    await semaphore.acquire();
    const controller = new AbortController();

    const waiting = semaphore.acquire(controller.signal);
    controller.abort();

    await expect(waiting).resolves.toBeNull();
    await expect(semaphore.acquire(controller.signal)).resolves.toBeNull();
  });

  it('treats fewer than one permit as one', async () => {
    const semaphore = new Semaphore(0);

    expect(semaphore.free).toBe(1);
  });
});
