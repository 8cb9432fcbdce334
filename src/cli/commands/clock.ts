/**
 * Clock commands: `day` prints the simulated day, `next-day` advances it.
 */

import type { SimulatedClock } from '../../core/clock';
import { bold, dim } from '../utils/terminal';

export function printDay(clock: SimulatedClock): void {
  console.log(`Today is day ${bold(clock.today().toString())}.`);
}

export async function advanceDay(clock: SimulatedClock): Promise<void> {
  const day = await clock.advanceDay();
  console.log(`Advanced to day ${bold(day.toString())}.`);
  console.log(dim('Run "list" to see which decks have cards due.'));
}
