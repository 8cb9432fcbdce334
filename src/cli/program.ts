/**
 * CLI Command Router
 *
 * Routes `process.argv`-style arguments to the command handlers. Kept apart
 * from the entry point so the whole CLI can be driven against in-memory
 * services.
 *
 * Available Commands:
 * - `list` - List decks with their due counts
 * - `deck ...` - Create, inspect and delete decks and cards
 * - `study <deck>` - Run an interactive review session
 * - `day` / `next-day` - Show or advance the simulated day
 * - `export <deck>` / `import <file>` - Move decks in and out as JSON
 * - `seed [--force]` - Add the sample decks
 * - (no args) - Show help
 */

import type { Command } from 'commander';
import type { AppServices } from '../services';
import { seedSampleDecks } from '../storage/seeds';
import { createDeckCommand, printDeckList } from './commands/deck';
import { createExportCommand, createImportCommand } from './commands/transfer';
import { advanceDay, printDay } from './commands/clock';
import { runStudyCommand } from './commands/study';
import { bold, dim, green, printBlankLine, red, yellow } from './utils/terminal';

/**
 * Runs one CLI command.
 *
 * @param args - Arguments after the script path
 * @returns The process exit code
 */
export async function runCli(services: AppServices, args: string[]): Promise<number> {
  const command: string | undefined = args[0];

  switch (command) {
    case 'list':
    case 'ls':
      await printDeckList(services);
      return 0;

    case 'deck':
      await parseSubcommand(createDeckCommand(services), args);
      return 0;

    case 'study':
    case 's': {
      const deckRef = args.slice(1).join(' ');
      if (!deckRef) {
        console.log(red('Error: Deck name or id is required.'));
        console.log(dim('Usage: npm run cli -- study <deck>'));
        return 1;
      }
      await runStudyCommand(services, deckRef);
      return 0;
    }

    case 'day':
      printDay(services.clock);
      return 0;

    case 'next-day':
      await advanceDay(services.clock);
      return 0;

    case 'export':
      await parseSubcommand(createExportCommand(services), args);
      return 0;

    case 'import':
      await parseSubcommand(createImportCommand(services), args);
      return 0;

    case 'seed':
      await seedSampleDecks(services, { force: args.includes('--force') });
      return 0;

    case 'help':
    case '--help':
    case '-h':
    case undefined:
      printHelp();
      return 0;

    default:
      console.log(red(`Unknown command: ${command}`));
      printBlankLine();
      printHelp();
      return 1;
  }
}

/**
 * Hands the arguments after the command name to a commander command.
 * Commander's own usage errors print and exit the process.
 */
async function parseSubcommand(cmd: Command, args: string[]): Promise<void> {
  await cmd.parseAsync(args.slice(1), { from: 'user' });
}

export function printHelp(): void {
  printBlankLine();
  console.log(bold('Spaced Review CLI'));
  console.log(dim('SM-2 flashcard reviews on a simulated calendar'));
  printBlankLine();
  console.log(bold('Usage:'));
  console.log('  npm run cli -- <command> [options]');
  printBlankLine();
  console.log(bold('Commands:'));
  console.log(`  ${green('list')}                           List decks and due cards`);
  console.log(`  ${green('deck create <name>')}             Create a deck`);
  console.log(`  ${green('deck add <deck> <term> <def>')}   Add a card`);
  console.log(`  ${green('deck show <deck>')}               Show cards and review records`);
  console.log(`  ${green('deck remove <deck>')}             Delete a deck`);
  console.log(`  ${green('study <deck>')}                   Review the cards due today`);
  console.log(`  ${green('day')}                            Show the current day`);
  console.log(`  ${green('next-day')}                       Advance to the next day`);
  console.log(`  ${green('export <deck> [-o file]')}        Export a deck as JSON`);
  console.log(`  ${green('import <file> [--replace]')}      Import a deck from JSON`);
  console.log(`  ${green('seed [--force]')}                 Add the sample decks`);
  console.log(`  ${green('help')}                           Show this help message`);
  printBlankLine();
  console.log(bold('Study Commands:'));
  console.log(`  ${yellow('/quit')}     Save progress and exit`);
  console.log(`  ${yellow('/status')}   Show session progress`);
  console.log(`  ${yellow('/retry')}    Retry failed saves`);
  console.log(`  ${yellow('/help')}     Show commands and the rating scale`);
  printBlankLine();
  console.log(bold('Environment Variables:'));
  console.log(`  ${green('DATABASE_PATH')}  Path to the SQLite database (default spaced-review.db)`);
  printBlankLine();
}
