/**
 * Spaced Review API Server
 *
 * Serves the Hono app on Node through @hono/node-server.
 *
 * Usage:
 *   npm start
 *
 * Environment Variables:
 *   PORT - Port to listen on (default: 3000)
 *   HOST - Interface to bind (default: 0.0.0.0)
 *   DATABASE_PATH - SQLite file (default: spaced-review.db)
 *   NODE_ENV - development | production | test
 *   LOG_REQUESTS - Set to false to silence the request log
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { getConfig, validateConfig } from '@/config';
import { openServices } from '@/services';
import { createApp } from './app';

/**
 * Loads configuration, opens the database and starts listening.
 *
 * Closes the HTTP server and the database on SIGINT/SIGTERM.
 */
async function startServer(): Promise<void> {
  const config = getConfig();
  validateConfig(config);

  const services = await openServices(config.database.path);
  const app = createApp(services, config);

  const server = serve(
    {
      fetch: app.fetch,
      port: config.server.port,
      hostname: config.server.host,
    },
    (info) => {
      console.log('');
      console.log('[Server] Spaced Review API');
      console.log(`[Server] Listening on http://${info.address}:${info.port}`);
      console.log(`[Server] Environment: ${config.server.nodeEnv}`);
      console.log(`[Server] Database: ${config.database.path}`);
      console.log(`[Server] Simulated day: ${services.clock.today()}`);
      console.log('');
    }
  );

  const shutdown = (signal: string) => {
    console.log(`\n[Server] Received ${signal}, shutting down...`);
    server.close(() => {
      services.connection.sqlite.close();
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

startServer().catch((error: unknown) => {
  console.error('[Server] Failed to start:', error);
  process.exit(1);
});
