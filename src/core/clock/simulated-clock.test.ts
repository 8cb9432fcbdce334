/**
 * SimulatedClock Unit Tests
 *
 * Uses an in-memory ClockStateStore so persistence behaviour can be checked
 * without a database.
 */

import { describe, it, expect, vi } from 'vitest';
import { SimulatedClock, type ClockStateStore } from './simulated-clock';
import { PersistenceError } from '../errors';

function createMemoryStore(initial: number | null = null): ClockStateStore & {
  saved: number | null;
} {
  const store = {
    saved: initial,
    async loadCurrentDay() {
      return store.saved;
    },
    async saveCurrentDay(day: number) {
      store.saved = day;
    },
  };
  return store;
}

describe('SimulatedClock', () => {
  it('starts at day 0 by default', () => {
    expect(new SimulatedClock().today()).toBe(0);
  });

  it('rejects a negative or fractional starting day', () => {
    expect(() => new SimulatedClock(-1)).toThrow('non-negative integer');
    expect(() => new SimulatedClock(1.5)).toThrow('non-negative integer');
  });

  it('advances by exactly one day per call', async () => {
    const clock = new SimulatedClock(3);

    expect(await clock.advanceDay()).toBe(4);
    expect(await clock.advanceDay()).toBe(5);
    expect(clock.today()).toBe(5);
  });

  it('applies concurrent advances one at a time', async () => {
    const clock = new SimulatedClock();

    const results = await Promise.all(
      Array.from({ length: 10 }, () => clock.advanceDay())
    );

    expect(results).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(clock.today()).toBe(10);
  });

  describe('persistence', () => {
    it('initialises storage to day 0 on first load', async () => {
      const store = createMemoryStore();

      const clock = await SimulatedClock.load(store);

      expect(clock.today()).toBe(0);
      expect(store.saved).toBe(0);
    });

    it('resumes from the persisted day', async () => {
      const store = createMemoryStore(12);

      const clock = await SimulatedClock.load(store);

      expect(clock.today()).toBe(12);
    });

    it('persists each advance', async () => {
      const store = createMemoryStore(2);
      const clock = await SimulatedClock.load(store);

      await clock.advanceDay();

      expect(store.saved).toBe(3);
      const reloaded = await SimulatedClock.load(store);
      expect(reloaded.today()).toBe(3);
    });

    it('leaves the day unchanged when the write fails', async () => {
      const store = createMemoryStore(7);
      const clock = await SimulatedClock.load(store);
      store.saveCurrentDay = vi.fn().mockRejectedValue(new Error('disk full'));

      await expect(clock.advanceDay()).rejects.toBeInstanceOf(PersistenceError);

      expect(clock.today()).toBe(7);
      expect(store.saved).toBe(7);
    });
  });
});
