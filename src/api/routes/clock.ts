/**
 * Clock API Routes
 *
 * - GET  /         - { today }
 * - POST /advance  - advance the simulated clock by one day, returns { today }
 */

import { Hono } from 'hono';
import type { SimulatedClock } from '@/core/clock';
import { success } from '../utils/response';

export interface ClockData {
  today: number;
}

export function clockRoutes(clock: SimulatedClock): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const data: ClockData = { today: clock.today() };
    return success(c, data);
  });

  router.post('/advance', async (c) => {
    const data: ClockData = { today: await clock.advanceDay() };
    console.log(`[Clock] Advanced to day ${data.today}`);
    return success(c, data);
  });

  return router;
}
