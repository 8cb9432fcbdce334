/**
 * App State Repository
 *
 * Key/value access to the app_state table. Also the SQLite ClockStateStore:
 * the simulated day is stored under 'current_day'.
 */

import { eq } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { appState } from '../schema';
import type { ClockStateStore } from '@/core/clock/simulated-clock';

/** Key under which the simulated clock's day is stored */
export const CURRENT_DAY_KEY = 'current_day';

export class AppStateRepository implements ClockStateStore {
  constructor(private readonly db: AppDatabase) {}

  /**
   * Reads a value, or null if the key was never set.
   */
  async get(key: string): Promise<string | null> {
    const result = await this.db
      .select()
      .from(appState)
      .where(eq(appState.key, key))
      .limit(1);

    return result.length === 0 ? null : result[0].value;
  }

  /**
   * Inserts or replaces a value.
   */
  async set(key: string, value: string): Promise<void> {
    await this.db
      .insert(appState)
      .values({ key, value })
      .onConflictDoUpdate({ target: appState.key, set: { value } });
  }

  /**
   * @throws Error if the stored value is not a non-negative integer
   */
  async loadCurrentDay(): Promise<number | null> {
    const raw = await this.get(CURRENT_DAY_KEY);
    if (raw === null) {
      return null;
    }

    const day = Number(raw);
    if (!Number.isInteger(day) || day < 0) {
      throw new Error(`Stored ${CURRENT_DAY_KEY} is not a valid day: '${raw}'`);
    }
    return day;
  }

  async saveCurrentDay(day: number): Promise<void> {
    await this.set(CURRENT_DAY_KEY, String(day));
  }
}
