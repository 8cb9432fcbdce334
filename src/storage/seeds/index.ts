/**
 * Seeds the sample decks into a database.
 *
 * Idempotent: a deck whose name already exists is skipped unless `force`
 * is set, in which case it is replaced along with its review history.
 */

import type { AppServices } from '../../services';
import type { DeckExport } from '../../core/export';
import { sampleDecks } from './sample-decks';

export { sampleDecks, spanishBasicsDeck, frenchBasicsDeck } from './sample-decks';

export interface SeedOptions {
  /** Replace sample decks that already exist */
  force?: boolean;
  /** Decks to seed. Default: the sample decks */
  decks?: DeckExport[];
}

export interface SeedResult {
  seeded: string[];
  skipped: string[];
}

export async function seedSampleDecks(
  services: Pick<AppServices, 'deckRepo' | 'exportService'>,
  options: SeedOptions = {}
): Promise<SeedResult> {
  const { force = false, decks = sampleDecks } = options;
  const result: SeedResult = { seeded: [], skipped: [] };

  for (const document of decks) {
    const existing = await services.deckRepo.findByName(document.name);
    if (existing && !force) {
      console.log(`[Seed] Skipping "${document.name}" - already exists (use --force to reseed)`);
      result.skipped.push(document.name);
      continue;
    }

    const { deck, cardCount } = await services.exportService.importDeck(document, {
      replaceExisting: force,
    });
    console.log(`[Seed] ${existing ? 'Replaced' : 'Created'} "${deck.name}" with ${cardCount} card(s) (${deck.id})`);
    result.seeded.push(deck.name);
  }

  return result;
}
