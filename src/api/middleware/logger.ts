/**
 * Request Logger Middleware
 *
 * One line per handled request, written after the response is ready:
 * ```
 * [API] GET /api/decks 200 - 4ms
 * [API] POST /api/session/rate 409 - 2ms
 * ```
 */

import type { MiddlewareHandler } from 'hono';

export interface RequestLoggerOptions {
  /** Color the status code (green, yellow for 4xx, red for 5xx) */
  colorize?: boolean;
  /** Path prefixes that are not logged */
  skipPaths?: string[];
  write?: (line: string) => void;
}

const RESET = '\x1b[0m';

function statusColor(status: number): string {
  if (status >= 500) return '\x1b[31m';
  if (status >= 400) return '\x1b[33m';
  return '\x1b[32m';
}

/**
 * Creates the request logger. `/health` is skipped unless `skipPaths` says
 * otherwise.
 *
 * @example
 * ```typescript
 * app.use('*', loggerMiddleware({ colorize: false }));
 * ```
 */
export function loggerMiddleware(options: RequestLoggerOptions = {}): MiddlewareHandler {
  const {
    colorize = false,
    skipPaths = ['/health'],
    write = (line: string) => console.log(line),
  } = options;

  return async (c, next) => {
    const path = c.req.path;
    if (skipPaths.some((skip) => path.startsWith(skip))) {
      return next();
    }

    const startTime = performance.now();
    await next();
    const elapsed = Math.round(performance.now() - startTime);

    const status = c.res.status;
    const statusText = colorize ? `${statusColor(status)}${status}${RESET}` : String(status);

    write(`[API] ${c.req.method} ${path} ${statusText} - ${elapsed}ms`);
  };
}
