/**
 * Terminal Utilities for CLI Output Formatting
 *
 * ANSI escape code wrappers and the formatted blocks the CLI prints: deck
 * tables, the study banner, rating scale and session summaries.
 *
 * Usage:
 * ```typescript
 * import { bold, green, yellow } from './terminal';
 *
 * console.log(bold('Spanish Basics'));
 * console.log(green('Passed'));
 * console.log(yellow('No cards are due today'));
 * ```
 *
 * In non-TTY environments, the codes pass through harmlessly.
 */

import { QUALITY_RATINGS, QUALITY_RATING_DESCRIPTIONS } from '../../core/sm2';
import type { SessionSummary } from '../../core/session';

// =============================================================================
// Text Styles and Colors
// =============================================================================

export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;

export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;

export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;

export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;

export const cyan = (s: string): string => `\x1b[36m${s}\x1b[0m`;

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

/**
 * Removes ANSI escape codes, e.g. to measure or compare printed text.
 */
export function stripAnsi(s: string): string {
  return s.replace(ANSI_PATTERN, '');
}

// =============================================================================
// Formatters
// =============================================================================

/**
 * Session progress, e.g. "[2 of 5 mastered]".
 */
export function formatProgress(mastered: number, total: number): string {
  return dim(`[${mastered} of ${total} mastered]`);
}

/**
 * A dim horizontal line.
 */
export function formatSeparator(width: number = 50): string {
  return dim('─'.repeat(width));
}

/**
 * One line of command help: "  /quit      - Abort the session".
 */
export function formatCommandHelp(command: string, description: string): string {
  return `  ${yellow(command.padEnd(10))} - ${dim(description)}`;
}

/**
 * "in 1 day" / "in 6 days".
 */
export function formatDays(days: number): string {
  return `in ${days} ${days === 1 ? 'day' : 'days'}`;
}

// =============================================================================
// Printed Blocks
// =============================================================================

export function printBlankLine(): void {
  console.log();
}

/**
 * Printed when a study session starts.
 */
export function printStudyBanner(deckName: string, cardCount: number, day: number): void {
  printBlankLine();
  console.log(formatSeparator(60));
  console.log(bold('  Spaced Review - Study Session'));
  console.log(formatSeparator(60));
  console.log(`  Deck: ${green(deckName)}`);
  console.log(`  Cards due: ${yellow(cardCount.toString())}`);
  console.log(`  Day: ${day}`);
  console.log(formatSeparator(60));
  printBlankLine();
  console.log(dim('  Press Enter to reveal a definition, then rate your recall 0-5.'));
  console.log(dim('  Commands: /quit (save and exit) | /status | /help'));
  printBlankLine();
}

/**
 * The SM-2 grade scale.
 */
export function printRatingScale(): void {
  for (const quality of QUALITY_RATINGS) {
    console.log(`  ${bold(quality.toString())} ${dim(QUALITY_RATING_DESCRIPTIONS[quality])}`);
  }
}

/**
 * Commands available while studying.
 */
export function printCommandsHelp(): void {
  printBlankLine();
  console.log(bold('Available Commands:'));
  console.log(formatCommandHelp('/quit', 'Save progress and end the session'));
  console.log(formatCommandHelp('/status', 'Show session progress'));
  console.log(formatCommandHelp('/retry', 'Retry saving reviews that failed to save'));
  console.log(formatCommandHelp('/help', 'Show this help message'));
  printBlankLine();
  console.log(bold('Ratings:'));
  printRatingScale();
  printBlankLine();
}

/**
 * Totals printed when a session completes or is aborted.
 */
export function printSessionSummary(summary: SessionSummary): void {
  printBlankLine();
  console.log(formatSeparator(60));
  console.log(
    summary.aborted ? yellow(bold('  Session ended early')) : green(bold('  Session Complete!'))
  );
  console.log(`  Mastered: ${yellow(`${summary.masteredCards} of ${summary.totalCards}`)} card(s)`);
  console.log(`  Ratings: ${summary.totalAttempts} (${summary.failedAttempts} to retry)`);
  if (summary.unsavedCardIds.length > 0) {
    console.log(red(`  ${summary.unsavedCardIds.length} review(s) could not be saved`));
  }
  console.log(formatSeparator(60));
  printBlankLine();
}
