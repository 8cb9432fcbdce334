/**
 * Deck Service
 *
 * Business rules for decks and cards that sit above the repositories:
 * - names, terms and definitions are trimmed and must not be empty
 * - deck names are unique ignoring case, terms are unique within a deck
 * - new cards get the initial SM-2 record, due on the current simulated day
 * - deck listings carry total and due counts for today
 */

import { randomUUID } from 'node:crypto';
import type { Deck, DeckWithSummary, Flashcard } from '../models';
import type { SM2Scheduler } from '../sm2/scheduler';
import type { DayProvider } from '../clock/simulated-clock';
import { ConflictError, NotFoundError, ValidationError } from '../errors';
import type { CardCatalog, DeckCatalog } from './types';

/**
 * Generates a unique ID with a prefix, e.g. 'deck_3f2a...'.
 */
export function generateId(prefix: string): string {
  return `${prefix}_${randomUUID()}`;
}

function requireText(value: string, field: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ValidationError(`${field} must not be empty`);
  }
  return trimmed;
}

/**
 * Deck and card management.
 *
 * @example
 * ```typescript
 * const service = new DeckService(deckRepo, cardRepo, scheduler, clock);
 *
 * const deck = await service.createDeck('Spanish Basics');
 * await service.addCard(deck.id, 'hola', 'hello');
 *
 * const [listing] = await service.listDecks();
 * // listing.summary => { totalCards: 1, dueCards: 1 }
 * ```
 */
export class DeckService {
  constructor(
    private readonly deckRepo: DeckCatalog,
    private readonly cardRepo: CardCatalog,
    private readonly scheduler: SM2Scheduler,
    private readonly clock: DayProvider
  ) {}

  /**
   * @throws ValidationError if the name is blank
   * @throws ConflictError if a deck with this name (ignoring case) exists
   */
  async createDeck(name: string): Promise<Deck> {
    const deckName = requireText(name, 'Deck name');

    const existing = await this.deckRepo.findByName(deckName);
    if (existing) {
      throw new ConflictError(`A deck named '${existing.name}' already exists`);
    }

    return this.deckRepo.create({ id: generateId('deck'), name: deckName });
  }

  /**
   * @throws NotFoundError if the deck does not exist
   */
  async getDeck(deckId: string): Promise<Deck> {
    const deck = await this.deckRepo.findById(deckId);
    if (!deck) {
      throw new NotFoundError('Deck', deckId);
    }
    return deck;
  }

  /**
   * Looks a deck up by id first, then by name ignoring case. Used where the
   * user types a deck reference.
   *
   * @throws NotFoundError if neither matches
   */
  async resolveDeck(idOrName: string): Promise<Deck> {
    const deck =
      (await this.deckRepo.findById(idOrName)) ?? (await this.deckRepo.findByName(idOrName));
    if (!deck) {
      throw new NotFoundError('Deck', idOrName);
    }
    return deck;
  }

  async getDeckWithSummary(deckId: string): Promise<DeckWithSummary> {
    const deck = await this.getDeck(deckId);
    return this.withSummary(deck);
  }

  /**
   * All decks ordered by name, with total and due card counts for today.
   */
  async listDecks(): Promise<DeckWithSummary[]> {
    const decks = await this.deckRepo.findAll();
    return Promise.all(decks.map((deck) => this.withSummary(deck)));
  }

  /**
   * Deletes a deck together with all its cards.
   *
   * @throws NotFoundError if the deck does not exist
   */
  async deleteDeck(deckId: string): Promise<void> {
    await this.deckRepo.delete(deckId);
  }

  /**
   * Adds a card whose first review is due today.
   *
   * @throws ValidationError if the term or definition is blank
   * @throws NotFoundError if the deck does not exist
   * @throws ConflictError if the deck already has the term
   */
  async addCard(deckId: string, term: string, definition: string): Promise<Flashcard> {
    const cardTerm = requireText(term, 'Term');
    const cardDefinition = requireText(definition, 'Definition');
    await this.getDeck(deckId);

    const existing = await this.cardRepo.findByTerm(deckId, cardTerm);
    if (existing) {
      throw new ConflictError(`The deck already has a card with the term '${cardTerm}'`);
    }

    return this.cardRepo.create({
      id: generateId('card'),
      deckId,
      term: cardTerm,
      definition: cardDefinition,
      review: this.scheduler.createInitialRecord(this.clock.today()),
    });
  }

  /**
   * All cards of a deck in the order they were added.
   *
   * @throws NotFoundError if the deck does not exist
   */
  async listCards(deckId: string): Promise<Flashcard[]> {
    await this.getDeck(deckId);
    return this.cardRepo.findByDeckId(deckId);
  }

  /**
   * Cards due today, in the order a session would present them.
   *
   * @throws NotFoundError if the deck does not exist
   */
  async getDueCards(deckId: string): Promise<Flashcard[]> {
    await this.getDeck(deckId);
    return this.cardRepo.findDueCards(deckId, this.clock.today());
  }

  private async withSummary(deck: Deck): Promise<DeckWithSummary> {
    const counts = await this.cardRepo.countByDeck(deck.id, this.clock.today());
    return {
      ...deck,
      summary: { totalCards: counts.total, dueCards: counts.due },
    };
  }
}
