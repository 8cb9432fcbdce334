/**
 * Application Services
 *
 * Builds every repository and service over one database connection. The CLI,
 * the API server and the integration tests all start from here, so they
 * share a single clock and a single session engine per process.
 *
 * @example
 * ```typescript
 * const services = await createServices(createConnection(':memory:'));
 * const deck = await services.deckService.createDeck('Spanish Basics');
 * await services.sessionEngine.startSession(deck.id);
 * ```
 */

import { createConnection, type DatabaseConnection } from './storage/db';
import {
  AppStateRepository,
  DeckRepository,
  FlashcardRepository,
} from './storage/repositories';
import { SM2Scheduler } from './core/sm2';
import { SimulatedClock } from './core/clock';
import { SessionEngine } from './core/session';
import { DeckService } from './core/decks';
import { ExportService } from './core/export';

export interface AppServices {
  connection: DatabaseConnection;
  deckRepo: DeckRepository;
  cardRepo: FlashcardRepository;
  appStateRepo: AppStateRepository;
  scheduler: SM2Scheduler;
  clock: SimulatedClock;
  deckService: DeckService;
  exportService: ExportService;
  sessionEngine: SessionEngine;
}

/**
 * Wires the services over an open connection. The clock is restored from
 * the app_state table, starting at day 0 on a fresh database.
 */
export async function createServices(connection: DatabaseConnection): Promise<AppServices> {
  const { db } = connection;

  const deckRepo = new DeckRepository(db);
  const cardRepo = new FlashcardRepository(db);
  const appStateRepo = new AppStateRepository(db);

  const scheduler = new SM2Scheduler();
  const clock = await SimulatedClock.load(appStateRepo);

  return {
    connection,
    deckRepo,
    cardRepo,
    appStateRepo,
    scheduler,
    clock,
    deckService: new DeckService(deckRepo, cardRepo, scheduler, clock),
    exportService: new ExportService(deckRepo, cardRepo, scheduler, clock),
    sessionEngine: new SessionEngine({ scheduler, clock, store: cardRepo }),
  };
}

/**
 * Opens the database file and wires the services over it.
 */
export async function openServices(databasePath: string): Promise<AppServices> {
  return createServices(createConnection(databasePath));
}
