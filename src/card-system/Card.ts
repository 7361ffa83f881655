/**
 * Card model for the memory-match engine.
 *
 * A MemoryCard is one slot on the board. Its `typeId` (the face it
 * shows) and `boardIndex` are fixed at creation; the face-up, flip and
 * matched flags change as the game is played.
 */

/**
 * Persisted form of a single card.
 *
 * `boardIndex` is the card's position in row-major traversal order.
 */
export interface CardState {
  readonly boardIndex: number;
  readonly typeId: number;
  readonly isMatched: boolean;
}

/**
 * Visual flip state of a card.
 *
 * - `back`     -- face-down.
 * - `flipping` -- a flip to the front has started but not settled.
 * - `front`    -- face-up and fully flipped.
 */
export type FlipState = 'back' | 'flipping' | 'front';

export class MemoryCard {
  private _flipState: FlipState = 'back';
  private _isMatched = false;

  constructor(
    readonly typeId: number,
    readonly boardIndex: number,
  ) {}

  get flipState(): FlipState {
    return this._flipState;
  }

  /** Whether the card currently shows its face (settled or not). */
  get faceUp(): boolean {
    return this._flipState !== 'back';
  }

  /** True once a flip to the front has settled. */
  get isFullyFlipped(): boolean {
    return this._flipState === 'front';
  }

  get isMatched(): boolean {
    return this._isMatched;
  }

  /** Start turning the card face-up. */
  flipFront(): void {
    if (this._flipState === 'back') {
      this._flipState = 'flipping';
    }
  }

  /** Settle a pending flip. No-op when the card is face-down. */
  completeFlip(): void {
    if (this._flipState === 'flipping') {
      this._flipState = 'front';
    }
  }

  /** Turn the card face-down. Matched cards stay face-up. */
  flipBack(): void {
    if (this._isMatched) return;
    this._flipState = 'back';
  }

  /**
   * Set the matched flag. A matched card is shown face-up
   * immediately, with no flip in between.
   */
  setMatched(matched: boolean): void {
    this._isMatched = matched;
    if (matched) {
      this._flipState = 'front';
    }
  }

  snapshot(): CardState {
    return {
      boardIndex: this.boardIndex,
      typeId: this.typeId,
      isMatched: this._isMatched,
    };
  }
}

/**
 * Create a face-down card from its persisted state.
 */
export function createCardFromState(state: CardState): MemoryCard {
  const card = new MemoryCard(state.typeId, state.boardIndex);
  card.setMatched(state.isMatched);
  return card;
}
