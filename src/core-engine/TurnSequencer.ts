/**
 * Turn sequencer for the memory-match engine.
 *
 * Provides functions to manage phase transitions and the turn and
 * match counters within a GameState. Operates on the GameState
 * directly (mutation-based).
 */

import type { GamePhase, GameState } from './GameState';

// ── Query functions ─────────────────────────────────────────

/**
 * Whether the round has ended.
 */
export function isGameOver(state: GameState): boolean {
  return state.phase === 'ended';
}

/**
 * Whether the round is in the active playing phase.
 */
export function isPlaying(state: GameState): boolean {
  return state.phase === 'playing';
}

/**
 * Whether every pair on the board has been found.
 */
export function allPairsFound(state: GameState): boolean {
  return state.matchesFound >= state.totalPairs;
}

// ── Mutation functions ──────────────────────────────────────

/**
 * Count one completed flip-two-and-evaluate cycle.
 *
 * @returns The new turn count.
 * @throws If the round is not in the `playing` phase.
 */
export function completeTurn(state: GameState): number {
  if (state.phase !== 'playing') {
    throw new Error(`Cannot complete a turn during the "${state.phase}" phase`);
  }
  state.turnNumber++;
  return state.turnNumber;
}

/**
 * Count one found pair.
 *
 * @returns The new match count.
 * @throws If the round is not in the `playing` phase.
 * @throws If every pair has already been found.
 */
export function recordMatch(state: GameState): number {
  if (state.phase !== 'playing') {
    throw new Error(`Cannot record a match during the "${state.phase}" phase`);
  }
  if (allPairsFound(state)) {
    throw new Error(`All ${state.totalPairs} pairs have already been found`);
  }
  state.matchesFound++;
  return state.matchesFound;
}

/**
 * Transition the round to a new phase.
 *
 * Valid transitions:
 * - `setup`   -> `playing`
 * - `playing` -> `ended`
 * - `setup`   -> `ended` (e.g. a restored save with every pair found)
 *
 * @throws If the transition is invalid (e.g. `ended` -> `playing`).
 * @throws If transitioning to the same phase.
 */
export function transitionTo(state: GameState, newPhase: GamePhase): void {
  const current = state.phase;

  if (current === newPhase) {
    throw new Error(`Game is already in phase "${current}"`);
  }

  const allowed = VALID_TRANSITIONS[current];
  if (!allowed.includes(newPhase)) {
    throw new Error(
      `Invalid phase transition: "${current}" -> "${newPhase}". ` +
        `Allowed transitions from "${current}": ${allowed.join(', ') || 'none'}`,
    );
  }

  state.phase = newPhase;
}

/** Map of valid phase transitions. */
const VALID_TRANSITIONS: Record<GamePhase, GamePhase[]> = {
  setup: ['playing', 'ended'],
  playing: ['ended'],
  ended: [],
};

// ── Convenience ─────────────────────────────────────────────

/**
 * Start the round (transition from setup to playing).
 */
export function startGame(state: GameState): void {
  transitionTo(state, 'playing');
}

/**
 * End the round (transition from playing or setup to ended).
 */
export function endGame(state: GameState): void {
  transitionTo(state, 'ended');
}
