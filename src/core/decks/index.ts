export { DeckService, generateId } from './deck-service';
export type { DeckCatalog, CardCatalog, NewDeck, NewFlashcard } from './types';
