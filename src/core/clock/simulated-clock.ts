/**
 * Simulated Clock
 *
 * The whole application runs on an integer day counter instead of wall-clock
 * time. The counter starts at 0 on first run and only moves forward, one day
 * per explicit `advanceDay()` call. Everything that needs "today" (the due
 * query, the scheduler, new card records) reads it from here.
 *
 * The current day survives restarts through a ClockStateStore. The new value
 * is written to the store before the in-memory counter changes, so a failed
 * write leaves the clock where it was.
 */

import { PersistenceError } from '../errors';
import { SerialExecutor } from '../utils/serial-executor';

/**
 * Persistence for the current simulated day.
 */
export interface ClockStateStore {
  /** Returns the persisted day, or null if none was ever saved */
  loadCurrentDay(): Promise<number | null>;

  /** Persists the current day, replacing any previous value */
  saveCurrentDay(day: number): Promise<void>;
}

/**
 * Read-only view of the clock handed to components that only need "today".
 */
export interface DayProvider {
  today(): number;
}

/**
 * Monotonic day counter.
 *
 * @example
 * ```typescript
 * const clock = await SimulatedClock.load(appStateRepo);
 * clock.today();            // 0 on a fresh database
 * await clock.advanceDay(); // 1, and persisted
 * ```
 */
export class SimulatedClock implements DayProvider {
  private currentDay: number;
  private readonly store: ClockStateStore | null;
  private readonly executor = new SerialExecutor();

  /**
   * @param initialDay - Day to start from (default 0)
   * @param store - Optional persistence; without one the clock lives only in memory
   */
  constructor(initialDay: number = 0, store: ClockStateStore | null = null) {
    if (!Number.isInteger(initialDay) || initialDay < 0) {
      throw new Error(`Initial day must be a non-negative integer, got ${initialDay}`);
    }
    this.currentDay = initialDay;
    this.store = store;
  }

  /**
   * Creates a clock from the persisted day, initialising storage to day 0 on
   * first run.
   */
  static async load(store: ClockStateStore): Promise<SimulatedClock> {
    const persisted = await store.loadCurrentDay();
    if (persisted === null) {
      await store.saveCurrentDay(0);
      return new SimulatedClock(0, store);
    }
    return new SimulatedClock(persisted, store);
  }

  /**
   * The current simulated day.
   */
  today(): number {
    return this.currentDay;
  }

  /**
   * Moves the clock forward by exactly one day and returns the new day.
   *
   * Concurrent calls are applied one at a time, so N calls always advance
   * the clock by N.
   *
   * @throws PersistenceError if the new day cannot be stored; the clock is
   *         left unchanged
   */
  advanceDay(): Promise<number> {
    return this.executor.run(async () => {
      const nextDay = this.currentDay + 1;

      if (this.store) {
        try {
          await this.store.saveCurrentDay(nextDay);
        } catch (error) {
          throw new PersistenceError(
            `Failed to persist simulated day ${nextDay}`,
            [],
            error
          );
        }
      }

      this.currentDay = nextDay;
      return nextDay;
    });
  }
}
