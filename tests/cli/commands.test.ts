/**
 * CLI Tests: Command Routing
 *
 * Runs whole command lines through runCli against an in-memory database.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { runCli } from '../../src/cli/program';
import { NotFoundError } from '../../src/core/errors';
import { createTestContext, cleanupTestContext, type TestContext } from '../setup';
import { captureConsole, createTestDeck, type CapturedOutput } from '../helpers';

describe('runCli', () => {
  let ctx: TestContext;
  let output: CapturedOutput;

  beforeEach(async () => {
    ctx = await createTestContext();
    output = captureConsole();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    cleanupTestContext(ctx);
  });

  describe('deck commands', () => {
    it('creates a deck, adds a card and shows it', async () => {
      expect(await runCli(ctx, ['deck', 'create', 'French Basics'])).toBe(0);
      expect(await runCli(ctx, ['deck', 'add', 'french basics', 'merci', 'thank you'])).toBe(0);
      expect(await runCli(ctx, ['deck', 'show', 'French Basics'])).toBe(0);

      const [deck] = await ctx.deckService.listDecks();
      expect(output.lines()).toContain(`Created deck "French Basics" (${deck.id}).`);
      expect(output.lines()).toContain('Added "merci" to "French Basics".');
      expect(output.lines()).toContain('  merci: thank you  ef 2.50, interval 0d, reps 0, due day 0');
    });

    it('lists decks with their due counts', async () => {
      const { deck } = await createTestDeck(ctx, 'Spanish Basics', [
        ['hola', 'hello'],
        ['gracias', 'thank you'],
      ]);

      await runCli(ctx, ['list']);

      expect(output.lines()).toEqual(
        expect.arrayContaining(['Decks (day 0):', `  Spanish Basics (${deck.id})`, '    2 card(s), 2 due'])
      );
    });

    it('tells the user how to add a deck when there are none', async () => {
      await runCli(ctx, ['ls']);

      expect(output.lines()).toContain('  No decks found.');
    });

    it('removes a deck by name', async () => {
      await createTestDeck(ctx, 'Spanish Basics', [['hola', 'hello']]);

      await runCli(ctx, ['deck', 'remove', 'Spanish Basics']);

      expect(await ctx.deckService.listDecks()).toEqual([]);
      expect(output.lines()).toContain('Deleted deck "Spanish Basics".');
    });

    it('propagates NotFoundError for an unknown deck', async () => {
      await expect(runCli(ctx, ['deck', 'show', 'Klingon'])).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('clock commands', () => {
    it('advances and reports the simulated day', async () => {
      await runCli(ctx, ['next-day']);
      await runCli(ctx, ['day']);

      expect(ctx.clock.today()).toBe(1);
      expect(output.lines()).toContain('Advanced to day 1.');
      expect(output.lines()).toContain('Today is day 1.');
      expect(await ctx.appStateRepo.loadCurrentDay()).toBe(1);
    });
  });

  describe('export and import', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'spaced-review-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('prints the export document to stdout', async () => {
      const { deck } = await createTestDeck(ctx, 'Spanish Basics', [['hola', 'hello']]);

      await runCli(ctx, ['export', 'Spanish Basics']);

      const expected = ctx.exportService.serialize(await ctx.exportService.exportDeck(deck.id));
      expect(output.lines()).toEqual([expected]);
    });

    it('writes an export file that imports into another database', async () => {
      await createTestDeck(ctx, 'Spanish Basics', [
        ['hola', 'hello'],
        ['gracias', 'thank you'],
      ]);
      const file = join(dir, 'spanish.json');

      await runCli(ctx, ['export', 'Spanish Basics', '--output', file]);
      expect(output.lines()).toContain(`Exported "Spanish Basics" (2 cards) to ${file}`);

      const other = await createTestContext();
      try {
        expect(await runCli(other, ['import', file])).toBe(0);

        const [imported] = await other.deckService.listDecks();
        expect(imported.name).toBe('Spanish Basics');
        expect((await other.deckService.listCards(imported.id)).map((card) => card.term)).toEqual([
          'hola',
          'gracias',
        ]);
        expect(output.lines()).toContain('Imported deck "Spanish Basics" with 2 card(s).');
      } finally {
        cleanupTestContext(other);
      }
    });

    it('replaces an existing deck only with --replace', async () => {
      await createTestDeck(ctx, 'Spanish Basics', [['hola', 'hello']]);
      const file = join(dir, 'spanish.json');
      await writeFile(
        file,
        JSON.stringify({ version: 1, name: 'Spanish Basics', flashcards: [{ term: 'adiós', definition: 'goodbye' }] }),
        'utf8'
      );

      await expect(runCli(ctx, ['import', file])).rejects.toThrow("A deck named 'Spanish Basics' already exists");

      await runCli(ctx, ['import', file, '--replace']);

      const [deck] = await ctx.deckService.listDecks();
      expect((await ctx.deckService.listCards(deck.id)).map((card) => card.term)).toEqual(['adiós']);
      expect(output.lines()).toContain('Replaced deck "Spanish Basics" with 1 card(s).');
    });
  });

  describe('seed', () => {
    it('adds the sample decks once', async () => {
      await runCli(ctx, ['seed']);
      await runCli(ctx, ['seed']);

      const decks = await ctx.deckService.listDecks();
      expect(decks.map((deck) => [deck.name, deck.summary.totalCards])).toEqual([
        ['French Basics', 4],
        ['Spanish Basics', 6],
      ]);
      expect(output.lines()).toContain('[Seed] Skipping "Spanish Basics" - already exists (use --force to reseed)');
    });
  });

  describe('usage', () => {
    it('prints help with no arguments', async () => {
      expect(await runCli(ctx, [])).toBe(0);

      expect(output.lines()).toContain('Spaced Review CLI');
    });

    it('returns 1 for an unknown command', async () => {
      expect(await runCli(ctx, ['frobnicate'])).toBe(1);

      expect(output.lines()).toContain('Unknown command: frobnicate');
    });

    it('returns 1 when study has no deck', async () => {
      expect(await runCli(ctx, ['study'])).toBe(1);

      expect(output.lines()).toContain('Error: Deck name or id is required.');
    });
  });
});
