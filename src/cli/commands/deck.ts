/**
 * Deck Commands
 *
 * `list` prints every deck with its card counts for the current day.
 * `deck ...` manages decks and their cards:
 *
 * ```bash
 * npm run cli -- deck create "Spanish Basics"
 * npm run cli -- deck add "Spanish Basics" hola hello
 * npm run cli -- deck show "Spanish Basics"
 * npm run cli -- deck remove "Spanish Basics"
 * ```
 *
 * Decks can be named by id or by name (ignoring case) everywhere.
 */

import { Command } from 'commander';
import type { AppServices } from '../../services';
import type { Flashcard } from '../../core/models';
import {
  bold,
  cyan,
  dim,
  formatSeparator,
  green,
  printBlankLine,
  red,
  yellow,
} from '../utils/terminal';

export type DeckCommandServices = Pick<AppServices, 'deckService' | 'clock'>;

/**
 * Prints all decks with total and due card counts.
 */
export async function printDeckList(services: DeckCommandServices): Promise<void> {
  const decks = await services.deckService.listDecks();

  printBlankLine();
  console.log(bold(`Decks (day ${services.clock.today()}):`));
  console.log(formatSeparator(60));

  if (decks.length === 0) {
    console.log(yellow('  No decks found.'));
    console.log(dim('  Create one with: deck create "<name>", or run "npm run db:seed".'));
  } else {
    for (const deck of decks) {
      const due = deck.summary.dueCards > 0 ? green(`${deck.summary.dueCards} due`) : dim('0 due');
      console.log(`  ${bold(deck.name)} ${dim(`(${deck.id})`)}`);
      console.log(`    ${deck.summary.totalCards} card(s), ${due}`);
    }
  }

  console.log(formatSeparator(60));
  printBlankLine();
}

/**
 * One card with its review record, e.g.
 * "  hola: hello  ef 2.50, interval 1d, reps 1, due day 1".
 */
export function formatCardLine(card: Flashcard, today: number): string {
  const { easinessFactor, intervalDays, repetitions, nextReviewDay } = card.review;
  const due = nextReviewDay <= today ? green(`due day ${nextReviewDay}`) : `due day ${nextReviewDay}`;
  return (
    `  ${cyan(card.term)}: ${card.definition}  ` +
    dim(`ef ${easinessFactor.toFixed(2)}, interval ${intervalDays}d, reps ${repetitions}, `) +
    due
  );
}

/**
 * Builds the `deck` command tree.
 */
export function createDeckCommand(services: DeckCommandServices): Command {
  const { deckService, clock } = services;

  const deckCmd = new Command('deck').description('Create, inspect and delete decks');

  deckCmd
    .command('create <name>')
    .description('Create an empty deck')
    .action(async (name: string) => {
      const deck = await deckService.createDeck(name);
      console.log(green(`Created deck "${deck.name}" (${deck.id}).`));
    });

  deckCmd
    .command('add <deck> <term> <definition>')
    .description('Add a card to a deck; it is due today')
    .action(async (deckRef: string, term: string, definition: string) => {
      const deck = await deckService.resolveDeck(deckRef);
      const card = await deckService.addCard(deck.id, term, definition);
      console.log(green(`Added "${card.term}" to "${deck.name}".`));
    });

  deckCmd
    .command('show <deck>')
    .description('List the cards of a deck with their review records')
    .action(async (deckRef: string) => {
      const deck = await deckService.resolveDeck(deckRef);
      const cards = await deckService.listCards(deck.id);
      const today = clock.today();

      printBlankLine();
      console.log(bold(deck.name));
      console.log(formatSeparator(60));
      if (cards.length === 0) {
        console.log(yellow('  No cards yet.'));
      }
      for (const card of cards) {
        console.log(formatCardLine(card, today));
      }
      console.log(formatSeparator(60));
      printBlankLine();
    });

  deckCmd
    .command('remove <deck>')
    .alias('rm')
    .description('Delete a deck and all of its cards')
    .action(async (deckRef: string) => {
      const deck = await deckService.resolveDeck(deckRef);
      await deckService.deleteDeck(deck.id);
      console.log(red(`Deleted deck "${deck.name}".`));
    });

  return deckCmd;
}
