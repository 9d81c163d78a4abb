import { describe, it, expect } from 'vitest';
import { Semaphore, AsyncMutex } from '../../../src/main/utils/concurrency';

describe('concurrency', () => {
  describe('Semaphore', () => {
    it('should reject fewer than one permit', () => {
      expect(() => new Semaphore(0)).toThrow(RangeError);
      expect(() => new Semaphore(1.5)).toThrow(RangeError);
    });

    it('should hand out permits until none are left', async () => {
      const semaphore = new Semaphore(2);
      await semaphore.acquire();
      await semaphore.acquire();
      expect(semaphore.availablePermits).toBe(0);

      let acquired = false;
      const waiting = semaphore.acquire().then(() => {
        acquired = true;
      });
      await Promise.resolve();
      expect(acquired).toBe(false);
      expect(semaphore.pendingCount).toBe(1);

      semaphore.release();
      await waiting;
      expect(acquired).toBe(true);
      expect(semaphore.availablePermits).toBe(0);
    });

    it('should release waiters in FIFO order', async () => {
      const semaphore = new Semaphore(1);
      await semaphore.acquire();
      const order: number[] = [];
      const first = semaphore.acquire().then(() => order.push(1));
      const second = semaphore.acquire().then(() => order.push(2));

      semaphore.release();
      await first;
      semaphore.release();
      await second;

      expect(order).toEqual([1, 2]);
    });

    it('should release the permit when a task throws', async () => {
      const semaphore = new Semaphore(1);
      await expect(
        semaphore.run(async () => {
          throw new Error('boom');
        }),
      ).rejects.toThrow('boom');
      expect(semaphore.availablePermits).toBe(1);
    });

    it('should never exceed the permit count', async () => {
      const semaphore = new Semaphore(2);
      let active = 0;
      let peak = 0;
      const task = async (): Promise<void> => {
        active++;
        peak = Math.max(peak, active);
        await new Promise<void>((resolve) => setTimeout(resolve, 5));
        active--;
      };

      await Promise.all([1, 2, 3, 4, 5].map(() => semaphore.run(task)));
      expect(peak).toBe(2);
    });
  });

  describe('AsyncMutex', () => {
    it('should run tasks one at a time in order', async () => {
      const mutex = new AsyncMutex();
      const events: string[] = [];

      const slow = mutex.runExclusive(async () => {
        events.push('slow:start');
        await new Promise<void>((resolve) => setTimeout(resolve, 5));
        events.push('slow:end');
      });
      const fast = mutex.runExclusive(() => {
        events.push('fast');
        return 'done';
      });

      expect(mutex.isLocked).toBe(true);
      await slow;
      expect(await fast).toBe('done');
      expect(events).toEqual(['slow:start', 'slow:end', 'fast']);
      expect(mutex.isLocked).toBe(false);
    });
  });
});
