/**
 * Export and Import Commands
 *
 * ```bash
 * # Print a deck as JSON, or write it to a file
 * npm run cli -- export "Spanish Basics"
 * npm run cli -- export "Spanish Basics" --output spanish.json
 *
 * # Import a deck, replacing one with the same name
 * npm run cli -- import spanish.json --replace
 * ```
 */

import { Command } from 'commander';
import { readFile, writeFile } from 'fs/promises';
import type { AppServices } from '../../services';
import { dim, green } from '../utils/terminal';

export type TransferServices = Pick<AppServices, 'deckService' | 'exportService'>;

interface ExportOptions {
  output?: string;
}

interface ImportOptions {
  replace?: boolean;
}

export function createExportCommand(services: TransferServices): Command {
  return new Command('export')
    .description('Export a deck with its review records as JSON')
    .argument('<deck>', 'Deck id or name')
    .option('-o, --output <file>', 'Write to a file instead of stdout')
    .action(async (deckRef: string, options: ExportOptions) => {
      const deck = await services.deckService.resolveDeck(deckRef);
      const document = await services.exportService.exportDeck(deck.id);
      const json = services.exportService.serialize(document);

      if (!options.output) {
        console.log(json);
        return;
      }

      await writeFile(options.output, json + '\n', 'utf8');
      console.log(green(`Exported "${deck.name}" (${document.flashcards.length} cards) to ${options.output}`));
    });
}

export function createImportCommand(services: TransferServices): Command {
  return new Command('import')
    .description('Import a deck from a JSON export')
    .argument('<file>', 'Path to the JSON file')
    .option('--replace', 'Replace an existing deck with the same name', false)
    .action(async (file: string, options: ImportOptions) => {
      const text = await readFile(file, 'utf8');
      const result = await services.exportService.importDeck(text, {
        replaceExisting: options.replace === true,
      });

      console.log(
        green(`${result.replaced ? 'Replaced' : 'Imported'} deck "${result.deck.name}" with ${result.cardCount} card(s).`)
      );
      console.log(dim(`Deck id: ${result.deck.id}`));
    });
}
