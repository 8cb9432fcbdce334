/**
 * Study Command Implementation
 *
 * Runs an interactive review session in the terminal:
 * 1. The term of the current card is shown
 * 2. Enter reveals the definition
 * 3. The learner types a rating from 0 to 5
 * 4. Cards rated below 3 come back later in the same session
 *
 * Slash commands work at any prompt: /quit saves what has been rated and
 * ends the session, /status shows progress, /retry re-sends reviews that
 * failed to save, /help lists commands and the rating scale.
 *
 * The terminal loop (runStudyCommand) only feeds lines to a StudyController,
 * which holds all the logic and can be driven directly in tests.
 *
 * @example
 * ```typescript
 * await runStudyCommand(services, 'Spanish Basics');
 * ```
 */

import * as readline from 'node:readline';
import type { AppServices } from '../../services';
import type { Deck, Flashcard } from '../../core/models';
import { PersistenceError } from '../../core/errors';
import { isQualityRating } from '../../core/sm2';
import {
  bold,
  cyan,
  dim,
  formatDays,
  formatProgress,
  green,
  printBlankLine,
  printCommandsHelp,
  printRatingScale,
  printSessionSummary,
  printStudyBanner,
  red,
  yellow,
} from '../utils/terminal';

export type StudyServices = Pick<AppServices, 'deckService' | 'sessionEngine' | 'clock'>;

/**
 * 'reveal': the term is shown and Enter reveals the definition.
 * 'rate': the definition is shown and a rating is expected.
 * 'done': the session is over.
 */
export type StudyStep = 'reveal' | 'rate' | 'done';

/**
 * Turns lines of user input into session operations and terminal output.
 */
export class StudyController {
  private step: StudyStep = 'done';
  private deck: Deck | null = null;
  private currentCard: Flashcard | null = null;

  constructor(private readonly services: StudyServices) {}

  getStep(): StudyStep {
    return this.step;
  }

  /**
   * Starts a session over the deck's due cards and shows the first term.
   *
   * @param deckRef - Deck id or name
   * @returns The step after starting; 'done' when nothing is due
   * @throws NotFoundError if the deck does not exist
   */
  async start(deckRef: string): Promise<StudyStep> {
    const { deckService, sessionEngine, clock } = this.services;

    this.deck = await deckService.resolveDeck(deckRef);
    const state = await sessionEngine.startSession(this.deck.id);

    if (state.status === 'complete') {
      console.log(yellow(`\nNo cards are due in "${this.deck.name}" on day ${clock.today()}.`));
      console.log(dim('Advance the clock with "next-day" to make more cards due.'));
      this.step = 'done';
      return this.step;
    }

    printStudyBanner(this.deck.name, state.totalCards, state.day);
    this.presentNextCard();
    return this.step;
  }

  /**
   * Handles one line of input.
   *
   * @returns The step after the input
   */
  async handleInput(input: string): Promise<StudyStep> {
    const trimmed = input.trim();

    if (this.step === 'done') {
      return this.step;
    }

    if (trimmed.startsWith('/')) {
      await this.handleSlashCommand(trimmed);
      return this.step;
    }

    if (this.step === 'reveal') {
      this.revealDefinition();
      return this.step;
    }

    await this.handleRating(trimmed);
    return this.step;
  }

  /**
   * Ends the session early, saving the latest record of every rated card.
   */
  async quit(): Promise<void> {
    if (this.step === 'done') {
      return;
    }
    this.step = 'done';

    try {
      printSessionSummary(await this.services.sessionEngine.abortSession());
      console.log(dim('Progress on rated cards has been saved.'));
    } catch (error) {
      if (!(error instanceof PersistenceError)) {
        throw error;
      }
      console.log(red(`\n${error.message}`));
      const summary = this.services.sessionEngine.getSummary();
      if (summary) {
        printSessionSummary(summary);
      }
    }
  }

  // ============================================================================
  // Steps
  // ============================================================================

  private presentNextCard(): void {
    const card = this.services.sessionEngine.getCurrentCard();
    const state = this.services.sessionEngine.getSessionState();

    if (!card || !state) {
      this.currentCard = null;
      this.step = 'done';
      return;
    }

    this.currentCard = card;
    this.step = 'reveal';

    printBlankLine();
    console.log(`${formatProgress(state.masteredCount, state.totalCards)} ${dim(state.phaseMessage)}`);
    console.log(`${bold('Term:')} ${cyan(card.term)}`);
    console.log(dim('(press Enter to reveal)'));
  }

  private revealDefinition(): void {
    if (!this.currentCard) {
      return;
    }
    console.log(`${bold('Definition:')} ${this.currentCard.definition}`);
    console.log(dim('How well did you recall it? (0-5, /help for the scale)'));
    this.step = 'rate';
  }

  private async handleRating(input: string): Promise<void> {
    const card = this.currentCard;
    if (!card) {
      return;
    }

    const quality = /^[0-5]$/.test(input) ? Number(input) : Number.NaN;
    if (!isQualityRating(quality)) {
      console.log(yellow('Please enter a whole number from 0 to 5:'));
      printRatingScale();
      return;
    }

    try {
      const result = await this.services.sessionEngine.rateCard(card.id, quality);
      if (result.passed) {
        console.log(
          green(`Passed. Next review on day ${result.record.nextReviewDay} (${formatDays(result.record.intervalDays)}).`)
        );
      } else {
        console.log(yellow('Not yet. This card will come back later in the session.'));
      }
    } catch (error) {
      if (!(error instanceof PersistenceError)) {
        throw error;
      }
      console.log(red(`${error.message}. Type /retry to try saving again.`));
    }

    const summary = this.services.sessionEngine.getSummary();
    if (this.services.sessionEngine.getStatus() === 'complete' && summary) {
      this.step = 'done';
      printSessionSummary(summary);
      return;
    }

    this.presentNextCard();
  }

  // ============================================================================
  // Slash Commands
  // ============================================================================

  private async handleSlashCommand(command: string): Promise<void> {
    const normalizedCommand = command.toLowerCase().split(' ')[0];

    switch (normalizedCommand) {
      case '/quit':
      case '/exit':
      case '/q':
        await this.quit();
        return;

      case '/help':
      case '/h':
      case '/?':
        printCommandsHelp();
        return;

      case '/status':
      case '/s':
        this.printStatus();
        return;

      case '/retry':
        await this.retrySaves();
        return;

      default:
        console.log(yellow(`Unknown command: ${command}`));
        console.log(dim('Type /help to see available commands.'));
    }
  }

  private printStatus(): void {
    const state = this.services.sessionEngine.getSessionState();
    if (!state || !this.deck) {
      console.log(red('No active session.'));
      return;
    }

    printBlankLine();
    console.log(bold('Session Status:'));
    console.log(`  Deck: ${this.deck.name}`);
    console.log(`  Day: ${state.day}`);
    console.log(`  Progress: ${formatProgress(state.masteredCount, state.totalCards)}`);
    console.log(`  ${state.phaseMessage}`);
    console.log(`  Still to see: ${state.primaryQueue.length}, to retry: ${state.recycleQueue.length}`);
    if (state.pendingSaveCardIds.length > 0) {
      console.log(red(`  Unsaved reviews: ${state.pendingSaveCardIds.length}`));
    }
    printBlankLine();
  }

  private async retrySaves(): Promise<void> {
    try {
      const saved = await this.services.sessionEngine.retryPendingSaves();
      console.log(
        saved.length === 0 ? dim('Nothing to save.') : green(`Saved ${saved.length} review(s).`)
      );
    } catch (error) {
      if (!(error instanceof PersistenceError)) {
        throw error;
      }
      console.log(red(error.message));
    }
  }
}

/**
 * Runs a study session on stdin/stdout until it completes or the learner
 * quits. Ctrl+C and closing the input save progress like /quit.
 */
export async function runStudyCommand(services: StudyServices, deckRef: string): Promise<void> {
  const controller = new StudyController(services);

  if ((await controller.start(deckRef)) === 'done') {
    return;
  }

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: bold('> '),
  });

  // Lines are handled one at a time; input typed meanwhile waits its turn
  let queue: Promise<void> = Promise.resolve();
  let failure: unknown = null;

  const finish = () => {
    queue = queue.then(() => controller.quit());
  };

  rl.on('line', (line: string) => {
    queue = queue
      .then(async () => {
        const step = await controller.handleInput(line);
        if (step === 'done') {
          rl.close();
        } else {
          rl.prompt();
        }
      })
      .catch((error: unknown) => {
        failure = error;
        rl.close();
      });
  });

  rl.on('SIGINT', () => {
    console.log(dim('\n\nReceived Ctrl+C, saving progress...'));
    rl.close();
  });

  rl.prompt();

  await new Promise<void>((resolve) => {
    rl.on('close', () => {
      // Input closed before the session finished (Ctrl+C, Ctrl+D, end of pipe)
      if (controller.getStep() !== 'done') {
        finish();
      }
      resolve();
    });
  });

  await queue;
  if (failure !== null) {
    throw failure;
  }
}
