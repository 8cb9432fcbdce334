/**
 * CLI Entry Point for Spaced Review
 *
 * Opens the database named by DATABASE_PATH, runs one command and closes
 * the database again.
 *
 * Usage:
 * ```bash
 * npm run cli -- list
 * npm run cli -- study "Spanish Basics"
 * npm run cli -- next-day
 * ```
 */

import 'dotenv/config';
import { getConfig } from '../config';
import { DomainError } from '../core/errors';
import { openServices } from '../services';
import { runCli } from './program';
import { dim, red } from './utils/terminal';

async function main(): Promise<number> {
  const config = getConfig();
  const services = await openServices(config.database.path);

  try {
    return await runCli(services, process.argv.slice(2));
  } finally {
    services.connection.sqlite.close();
  }
}

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    if (error instanceof DomainError) {
      console.error(red(`Error: ${error.message}`));
    } else {
      console.error(red('\nFatal error:'));
      console.error(dim(error instanceof Error ? error.message : String(error)));
      if (process.env.DEBUG && error instanceof Error) {
        console.error(dim(error.stack || ''));
      }
    }
    process.exitCode = 1;
  });
