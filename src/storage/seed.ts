/**
 * Database Seed Runner
 *
 * Usage:
 *   npm run db:seed           # Seeds only decks that do not exist yet
 *   npm run db:seed -- --force  # Replaces existing sample decks
 */

import 'dotenv/config';
import { getConfig } from '../config';
import { openServices } from '../services';
import { seedSampleDecks } from './seeds';

async function main(): Promise<void> {
  const force = process.argv.slice(2).includes('--force');
  const config = getConfig();

  console.log(`Seeding ${config.database.path}...`);
  if (force) {
    console.log('(--force enabled: will reseed existing decks)');
  }

  const services = await openServices(config.database.path);
  try {
    const { seeded, skipped } = await seedSampleDecks(services, { force });
    console.log('');
    console.log('Seeding complete!');
    console.log(`  Decks seeded: ${seeded.length}`);
    console.log(`  Decks skipped: ${skipped.length}`);
  } finally {
    services.connection.sqlite.close();
  }
}

main().catch((error: unknown) => {
  console.error('Seeding failed:', error);
  process.exitCode = 1;
});
