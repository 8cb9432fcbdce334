/**
 * Deck Export Service for Spaced Review
 *
 * Converts decks to and from the JSON document described in ./types. Exports
 * carry every review record verbatim, and imports write them back verbatim,
 * so export -> import round trips without loss. Imports are validated in full
 * before anything is written, and the deck with all its cards is created in
 * one transaction.
 *
 * @example
 * ```typescript
 * const exportService = new ExportService(deckRepo, cardRepo, scheduler, clock);
 *
 * const json = exportService.serialize(await exportService.exportDeck(deck.id));
 * await writeFile('spanish.json', json);
 *
 * const { deck } = await exportService.importDeck(await readFile('spanish.json', 'utf8'));
 * ```
 */

import type { ZodError } from 'zod';
import type { CardCatalog, DeckCatalog } from '../decks/types';
import type { SM2Scheduler } from '../sm2/scheduler';
import type { DayProvider } from '../clock/simulated-clock';
import { ConflictError, ImportValidationError, NotFoundError, type ImportIssue } from '../errors';
import { generateId } from '../decks/deck-service';
import {
  DECK_EXPORT_VERSION,
  deckExportSchema,
  type DeckExport,
  type ImportOptions,
  type ImportResult,
} from './types';

function toImportIssues(error: ZodError): ImportIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Service for exporting and importing decks as JSON documents.
 */
export class ExportService {
  constructor(
    private readonly deckRepo: Pick<DeckCatalog, 'findById' | 'findByName' | 'createWithCards'>,
    private readonly cardRepo: Pick<CardCatalog, 'findByDeckId'>,
    private readonly scheduler: SM2Scheduler,
    private readonly clock: DayProvider
  ) {}

  /**
   * Builds the export document for a deck, cards in the order they were added.
   *
   * @throws NotFoundError if the deck does not exist
   */
  async exportDeck(deckId: string): Promise<DeckExport> {
    const deck = await this.deckRepo.findById(deckId);
    if (!deck) {
      throw new NotFoundError('Deck', deckId);
    }

    const cards = await this.cardRepo.findByDeckId(deckId);

    return {
      version: DECK_EXPORT_VERSION,
      name: deck.name,
      flashcards: cards.map((card) => ({
        term: card.term,
        definition: card.definition,
        review: { ...card.review },
      })),
    };
  }

  /**
   * Pretty-prints a document with two-space indentation and a trailing newline.
   */
  serialize(document: DeckExport): string {
    return `${JSON.stringify(document, null, 2)}\n`;
  }

  /**
   * Validates a document given as JSON text or as an already-parsed value.
   *
   * @throws ImportValidationError listing every problem found
   */
  parseDocument(input: unknown): DeckExport {
    let value = input;

    if (typeof input === 'string') {
      try {
        value = JSON.parse(input);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ImportValidationError([{ path: '', message: `not valid JSON (${reason})` }]);
      }
    }

    const result = deckExportSchema.safeParse(value);
    if (!result.success) {
      throw new ImportValidationError(toImportIssues(result.error));
    }
    return result.data;
  }

  /**
   * Creates a deck from a document. Cards without a review record get the
   * initial record, due today.
   *
   * @param input - JSON text or a parsed document
   * @throws ImportValidationError if the document is malformed; nothing is written
   * @throws ConflictError if a deck with the same name exists and
   *         `replaceExisting` is not set
   */
  async importDeck(input: unknown, options: ImportOptions = {}): Promise<ImportResult> {
    const document = this.parseDocument(input);

    const existing = await this.deckRepo.findByName(document.name);
    if (existing && !options.replaceExisting) {
      throw new ConflictError(`A deck named '${existing.name}' already exists`);
    }

    const today = this.clock.today();
    const cards = document.flashcards.map((card) => ({
      id: generateId('card'),
      term: card.term,
      definition: card.definition,
      review: card.review ?? this.scheduler.createInitialRecord(today),
    }));

    const created = await this.deckRepo.createWithCards(
      { id: generateId('deck'), name: document.name },
      cards,
      existing?.id
    );

    return {
      deck: created.deck,
      cardCount: created.cards.length,
      replaced: existing !== null,
    };
  }
}
