/**
 * Request Logger Tests
 */

import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { loggerMiddleware, type RequestLoggerOptions } from '../../src/api/middleware';

function createLoggedApp(options: RequestLoggerOptions = {}): { app: Hono; lines: string[] } {
  const lines: string[] = [];
  const app = new Hono();
  app.use('*', loggerMiddleware({ ...options, write: (line) => lines.push(line) }));
  app.get('/health', (c) => c.text('ok'));
  app.get('/api/decks', (c) => c.json([]));
  app.post('/api/decks', (c) => c.json({ message: 'bad' }, 400));
  return { app, lines };
}

describe('loggerMiddleware', () => {
  it('writes method, path, status and elapsed time', async () => {
    const { app, lines } = createLoggedApp();

    await app.request('/api/decks');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[API\] GET \/api\/decks 200 - \d+ms$/);
  });

  it('logs the status of unmatched routes', async () => {
    const { app, lines } = createLoggedApp();

    await app.request('/api/missing', { method: 'DELETE' });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[API\] DELETE \/api\/missing 404 - \d+ms$/);
  });

  it('skips health checks by default', async () => {
    const { app, lines } = createLoggedApp();

    await app.request('/health');

    expect(lines).toEqual([]);
  });

  it('logs paths once they are no longer skipped', async () => {
    const { app, lines } = createLoggedApp({ skipPaths: [] });

    await app.request('/health');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[API\] GET \/health 200 - \d+ms$/);
  });

  it('colors client errors yellow when colorize is on', async () => {
    const { app, lines } = createLoggedApp({ colorize: true });

    await app.request('/api/decks', { method: 'POST' });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[API\] POST \/api\/decks \x1b\[33m400\x1b\[0m - \d+ms$/);
  });
});
