/**
 * Session Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { SessionEngine, type DeckStore } from '@/core/session';
 *
 * const engine = new SessionEngine({ scheduler, clock, store });
 * await engine.startSession(deckId);
 * ```
 */

// Main SessionEngine class
export { SessionEngine } from './session-engine';

// Type exports
export type {
  DeckStore,
  SessionStatus,
  SessionPhase,
  SessionEventType,
  SessionEventData,
  SessionEvent,
  SessionEventListener,
  SessionEngineDependencies,
  RateCardResult,
  SessionState,
  SessionSummary,
} from './types';
