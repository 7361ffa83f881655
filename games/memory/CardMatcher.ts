/**
 * CardMatcher -- the two-card flip state machine.
 *
 * Collects flipped cards until two are pending, then evaluates them:
 * wait for both flips to settle, hold them up briefly, and either
 * mark them matched or turn them back over. At most two cards are
 * pending at any time, and no card is accepted while an evaluation
 * runs.
 *
 * Every timed step goes through a {@link Scheduler}. A call to
 * {@link CardMatcher.initialize} invalidates work still in flight
 * from the previous board, so a restart or load never sees a stale
 * evaluation land on the new one.
 */

import type { MemoryCard } from '../../src/card-system/Card';
import type { GameEventEmitter } from '../../src/core-engine/GameEventEmitter';
import type { GameState } from '../../src/core-engine/GameState';
import type { Scheduler } from '../../src/core-engine/Scheduler';
import { timerScheduler } from '../../src/core-engine/Scheduler';
import {
  allPairsFound,
  completeTurn,
  endGame,
  isPlaying,
  recordMatch,
} from '../../src/core-engine/TurnSequencer';
import type { MemoryBoard } from './MemoryBoard';

// ── Timings ─────────────────────────────────────────────────

/** Durations (ms) of the timed steps of a round. */
export interface MatcherTimings {
  /** How long a flip to the front takes to settle. */
  flipDurationMs: number;
  /** Pause with both cards face-up before they are compared. */
  revealDelayMs: number;
  /** Extra pause before a mismatched pair turns back over. */
  mismatchDelayMs: number;
  /** Pause before the start-of-round preview. */
  previewDelayMs: number;
  /** How long the preview shows every card. */
  previewDurationMs: number;
}

export const DEFAULT_TIMINGS: MatcherTimings = {
  flipDurationMs: 150,
  revealDelayMs: 250,
  mismatchDelayMs: 500,
  previewDelayMs: 200,
  previewDurationMs: 1000,
};

// ── Results ─────────────────────────────────────────────────

/** Outcome of one evaluated pair. */
export interface TurnResult {
  readonly cards: readonly [MemoryCard, MemoryCard];
  readonly matched: boolean;
  readonly turnsTaken: number;
  readonly matchesFound: number;
  /** Whether this turn found the last pair. */
  readonly gameOver: boolean;
}

interface PendingFlip {
  readonly card: MemoryCard;
  readonly settled: Promise<void>;
}

// ── Matcher ─────────────────────────────────────────────────

export class CardMatcher {
  private readonly timings: MatcherTimings;
  private board: MemoryBoard | null = null;
  private state: GameState | null = null;
  private pending: PendingFlip[] = [];
  private checking = false;
  private generation = 0;

  constructor(
    private readonly events: GameEventEmitter,
    private readonly scheduler: Scheduler = timerScheduler,
    timings: Partial<MatcherTimings> = {},
  ) {
    this.timings = { ...DEFAULT_TIMINGS, ...timings };
  }

  /**
   * Attach the matcher to a board and its round state, dropping any
   * pending cards and cancelling in-flight evaluations.
   */
  initialize(board: MemoryBoard, state: GameState): void {
    this.generation++;
    this.board = board;
    this.state = state;
    this.pending = [];
    this.checking = false;
  }

  /** Cancel in-flight work without attaching a new board. */
  cancel(): void {
    this.generation++;
    this.pending = [];
    this.checking = false;
  }

  /** Whether a pair is currently being evaluated. */
  get isChecking(): boolean {
    return this.checking;
  }

  /** Cards flipped this turn and not yet evaluated. */
  get pendingCards(): readonly MemoryCard[] {
    return this.pending.map((p) => p.card);
  }

  /** A card is locked while it is pending or a pair is being evaluated. */
  isCardLocked(card: MemoryCard): boolean {
    return this.checking || this.pending.some((p) => p.card === card);
  }

  /**
   * Flip `card` and, if it is the second card of the turn, evaluate
   * the pair.
   *
   * Ignored (resolves `null`) while an evaluation runs, when the card
   * is already pending, or outside the `playing` phase.
   *
   * @returns The evaluated turn for the second card, `null` otherwise.
   */
  async handleCardFlipped(card: MemoryCard): Promise<TurnResult | null> {
    const state = this.state;
    if (!state || !isPlaying(state)) return null;
    if (this.isCardLocked(card)) return null;

    const generation = this.generation;
    card.flipFront();
    this.pending.push({ card, settled: this.settleFlip(card, generation) });
    this.events.emit('card-flipped', {
      boardIndex: card.boardIndex,
      typeId: card.typeId,
    });

    if (this.pending.length < 2) return null;

    this.checking = true;
    this.events.emit('interaction-locked', { reason: 'evaluating' });
    return this.checkMatch(state, generation);
  }

  /**
   * Show every card for a moment at the start of a round, then turn
   * the unmatched ones back over. Interaction is locked meanwhile.
   *
   * @returns `false` if the board was replaced before the preview
   *          finished.
   */
  async showAllCardsTemporarily(): Promise<boolean> {
    const board = this.board;
    if (!board) return false;
    const generation = this.generation;
    const cardCount = board.cardCount;

    this.events.emit('interaction-locked', { reason: 'preview' });
    this.events.emit('preview-started', { cardCount });

    await this.scheduler.delay(this.timings.previewDelayMs);
    if (generation !== this.generation) return false;
    for (const card of board.allCards()) {
      card.flipFront();
      card.completeFlip();
    }
    this.events.emit('cards-revealed', {
      boardIndices: board.allCards().map((c) => c.boardIndex),
    });

    await this.scheduler.delay(this.timings.previewDurationMs);
    if (generation !== this.generation) return false;
    for (const card of board.allCards()) {
      if (!card.isMatched) card.flipBack();
    }

    this.events.emit('preview-ended', { cardCount });
    this.events.emit('interaction-unlocked', { reason: 'preview' });
    return true;
  }

  // ── Internals ───────────────────────────────────────────

  private async settleFlip(card: MemoryCard, generation: number): Promise<void> {
    await this.scheduler.delay(this.timings.flipDurationMs);
    if (generation === this.generation) card.completeFlip();
  }

  private async checkMatch(
    state: GameState,
    generation: number,
  ): Promise<TurnResult | null> {
    const [first, second] = this.pending;

    await Promise.all([first.settled, second.settled]);
    if (generation !== this.generation) return null;
    this.events.emit('cards-revealed', {
      boardIndices: [first.card.boardIndex, second.card.boardIndex],
    });

    await this.scheduler.delay(this.timings.revealDelayMs);
    if (generation !== this.generation) return null;

    const cards = [first.card, second.card] as const;
    const boardIndices = [first.card.boardIndex, second.card.boardIndex] as const;
    const matched = first.card.typeId === second.card.typeId;

    if (matched) {
      for (const c of cards) c.setMatched(true);
      const matchesFound = recordMatch(state);
      this.events.emit('pair-matched', {
        boardIndices,
        typeId: first.card.typeId,
        matchesFound,
      });
    } else {
      this.events.emit('pair-mismatched', {
        boardIndices,
        typeIds: [first.card.typeId, second.card.typeId],
      });
      await this.scheduler.delay(this.timings.mismatchDelayMs);
      if (generation !== this.generation) return null;
      for (const c of cards) c.flipBack();
    }

    const turnsTaken = completeTurn(state);
    const gameOver = allPairsFound(state);
    if (gameOver) endGame(state);

    this.pending = [];
    this.checking = false;

    this.events.emit('turn-completed', {
      turnsTaken,
      matched,
      phase: state.phase,
    });

    if (gameOver) {
      this.events.emit('game-ended', {
        turnsTaken,
        matchesFound: state.matchesFound,
      });
      this.events.emit('interaction-locked', { reason: 'game-over' });
    } else {
      this.events.emit('interaction-unlocked', { reason: 'evaluating' });
    }

    return {
      cards,
      matched,
      turnsTaken,
      matchesFound: state.matchesFound,
      gameOver,
    };
  }
}
