/**
 * Game phase and state types for the memory-match engine.
 *
 * GamePhase represents the high-level lifecycle of a round.
 * GameState tracks the phase together with the round's counters.
 */

/**
 * High-level phases of a round.
 *
 * - `setup`   -- Board dealt, cards being previewed; no flips yet.
 * - `playing` -- Active gameplay; the player flips pairs.
 * - `ended`   -- Every pair has been found.
 */
export type GamePhase = 'setup' | 'playing' | 'ended';

/**
 * Mutable state of a single round.
 */
export interface GameState {
  /** Current high-level phase. */
  phase: GamePhase;
  /** Number of completed flip-two-and-evaluate cycles. */
  turnNumber: number;
  /** Number of pairs found so far. */
  matchesFound: number;
  /** Number of pairs on the board. */
  readonly totalPairs: number;
}

/**
 * Options for creating a new GameState.
 */
export interface GameStateOptions {
  /** Number of pairs on the board (must be at least 1). */
  totalPairs: number;
  /** Starting phase (defaults to 'setup'). */
  initialPhase?: GamePhase;
  /** Turns already taken, e.g. when restoring a save (defaults to 0). */
  turnNumber?: number;
  /** Pairs already found, e.g. when restoring a save (defaults to 0). */
  matchesFound?: number;
}

/**
 * Create a new GameState from options.
 *
 * @throws If `totalPairs` is less than 1.
 * @throws If a counter is negative or `matchesFound` exceeds `totalPairs`.
 */
export function createGameState(options: GameStateOptions): GameState {
  const {
    totalPairs,
    initialPhase = 'setup',
    turnNumber = 0,
    matchesFound = 0,
  } = options;

  if (!Number.isInteger(totalPairs) || totalPairs < 1) {
    throw new Error(`A round requires at least 1 pair, got ${totalPairs}`);
  }

  if (turnNumber < 0 || matchesFound < 0) {
    throw new Error(
      `Counters must not be negative (turns ${turnNumber}, matches ${matchesFound})`,
    );
  }

  if (matchesFound > totalPairs) {
    throw new Error(
      `matchesFound ${matchesFound} exceeds the ${totalPairs} pairs on the board`,
    );
  }

  return {
    phase: initialPhase,
    turnNumber,
    matchesFound,
    totalPairs,
  };
}
