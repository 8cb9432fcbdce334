/**
 * Sample Deck Seed Data
 *
 * Two small vocabulary decks for trying out the CLI and the API. They use
 * the deck export format, so seeding goes through the same validation as
 * any import; cards carry no review record and start out due on the day
 * they are seeded.
 */

import type { DeckExport } from '../../core/export';

export const spanishBasicsDeck: DeckExport = {
  version: 1,
  name: 'Spanish Basics',
  flashcards: [
    { term: 'hola', definition: 'hello' },
    { term: 'gracias', definition: 'thank you' },
    { term: 'por favor', definition: 'please' },
    { term: 'adiós', definition: 'goodbye' },
    { term: 'buenos días', definition: 'good morning' },
    { term: 'perdón', definition: 'excuse me' },
  ],
};

export const frenchBasicsDeck: DeckExport = {
  version: 1,
  name: 'French Basics',
  flashcards: [
    { term: 'bonjour', definition: 'hello' },
    { term: 'merci', definition: 'thank you' },
    { term: "s'il vous plaît", definition: 'please' },
    { term: 'au revoir', definition: 'goodbye' },
  ],
};

export const sampleDecks: DeckExport[] = [spanishBasicsDeck, frenchBasicsDeck];
