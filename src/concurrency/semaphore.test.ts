import { describe, expect, it } from 'vitest';
import { InMemorySemaphore } from './semaphore.js';

describe('InMemorySemaphore', () => {
  it('rejects a non-positive size', () => {
    expect(() => new InMemorySemaphore(0)).toThrow('Semaphore maxPermits must be a positive integer');
  });

  it('hands permits to waiters in arrival order', async () => {
    const semaphore = new InMemorySemaphore(1);
    const order: string[] = [];

    await semaphore.acquire();
    const first = semaphore.acquire().then(() => order.push('first'));
    const second = semaphore.acquire().then(() => order.push('second'));
    expect(semaphore.getWaiting()).toBe(2);

    semaphore.release();
    await first;
    semaphore.release();
    await second;

    expect(order).toEqual(['first', 'second']);
    expect(semaphore.getInFlight()).toBe(1);
  });

  it('releases the permit when the task throws', async () => {
    const semaphore = new InMemorySemaphore(1);

    await expect(semaphore.withPermit(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(semaphore.getAvailable()).toBe(1);
    expect(semaphore.tryAcquire()).toBe(true);
    expect(semaphore.tryAcquire()).toBe(false);
  });
});
