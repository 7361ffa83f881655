/**
 * MemoryBoard -- the rectangular grid of memory cards.
 *
 * Cards are stored in row-major order: index = row * cols + col.
 * An odd-sized grid deals one card fewer than it has cells, leaving
 * the last cell empty.
 */

import { MemoryCard, createCardFromState } from '../../src/card-system/Card';
import type { CardState } from '../../src/card-system/Card';
import { createPairedTypeIds, pairedCardCount } from '../../src/card-system/Deck';

// ── Grid size ───────────────────────────────────────────────

/** Board dimensions in cells. */
export interface GridSize {
  readonly cols: number;
  readonly rows: number;
}

/** A cell position on the board. */
export interface BoardPosition {
  readonly row: number;
  readonly col: number;
}

/** Board size used when no preference has been stored. */
export const DEFAULT_GRID_SIZE: GridSize = { cols: 4, rows: 3 };

/**
 * @throws If either dimension is not a positive integer.
 * @throws If the grid has fewer than two cells (no pair fits).
 */
export function validateGridSize(size: GridSize): void {
  for (const [label, value] of [
    ['cols', size.cols],
    ['rows', size.rows],
  ] as const) {
    if (!Number.isInteger(value) || value < 1) {
      throw new Error(`Grid ${label} must be a positive integer, got ${value}`);
    }
  }
  if (size.cols * size.rows < 2) {
    throw new Error(`A ${size.cols}x${size.rows} grid cannot hold a pair`);
  }
}

/**
 * First type id that appears on an odd number of cards, or on an odd
 * number of matched cards; `null` when every card has a partner.
 */
function findUnpairedTypeId(states: readonly CardState[]): number | null {
  const counts = new Map<number, { cards: number; matched: number }>();
  for (const { typeId, isMatched } of states) {
    const count = counts.get(typeId) ?? { cards: 0, matched: 0 };
    count.cards++;
    if (isMatched) count.matched++;
    counts.set(typeId, count);
  }
  for (const [typeId, { cards, matched }] of counts) {
    if (cards % 2 !== 0 || matched % 2 !== 0) return typeId;
  }
  return null;
}

// ── Board ───────────────────────────────────────────────────

export class MemoryBoard {
  private constructor(
    readonly gridSize: GridSize,
    private readonly cards: readonly MemoryCard[],
  ) {}

  /**
   * Deal a new board with freshly shuffled pairs.
   *
   * @param faceCount  Number of distinct faces available.
   * @param rng        Random source in [0, 1) (default Math.random).
   */
  static create(
    gridSize: GridSize,
    faceCount: number,
    rng: () => number = Math.random,
  ): MemoryBoard {
    validateGridSize(gridSize);
    const ids = createPairedTypeIds(gridSize.cols * gridSize.rows, faceCount, rng);
    return new MemoryBoard(
      gridSize,
      ids.map((typeId, i) => new MemoryCard(typeId, i)),
    );
  }

  /**
   * Rebuild a board from saved card states.
   *
   * States are placed by `boardIndex`. Returns `null` when they do not
   * describe a complete board for `gridSize` (wrong card count, or
   * duplicate or out-of-range indices) or one that cannot be won: a
   * type id on an odd number of cards, or a matched card whose partner
   * is not matched.
   */
  static fromCardStates(
    gridSize: GridSize,
    states: readonly CardState[],
  ): MemoryBoard | null {
    validateGridSize(gridSize);
    const expected = pairedCardCount(gridSize.cols * gridSize.rows);
    const ordered = [...states].sort((a, b) => a.boardIndex - b.boardIndex);
    const complete =
      ordered.length === expected &&
      ordered.every((state, i) => state.boardIndex === i);

    if (!complete) {
      console.warn(
        `[MemoryBoard] Saved layout has ${states.length} cards, expected ${expected} for a ${gridSize.cols}x${gridSize.rows} grid.`,
      );
      return null;
    }

    const unpaired = findUnpairedTypeId(ordered);
    if (unpaired !== null) {
      console.warn(`[MemoryBoard] Saved layout cannot be completed: type ${unpaired} is not paired.`);
      return null;
    }

    console.log(`[MemoryBoard] Spawning ${expected} cards from provided saved states.`);
    return new MemoryBoard(gridSize, ordered.map(createCardFromState));
  }

  /** Number of dealt cards. */
  get cardCount(): number {
    return this.cards.length;
  }

  /** Number of pairs on the board. */
  get totalPairs(): number {
    return Math.floor(this.cards.length / 2);
  }

  /** Number of pairs already found. */
  get matchedPairs(): number {
    return Math.floor(this.cards.filter((c) => c.isMatched).length / 2);
  }

  /** All cards in board order. */
  allCards(): readonly MemoryCard[] {
    return this.cards;
  }

  /** The card at `index`, or `undefined` for an empty or out-of-range cell. */
  cardAt(index: number): MemoryCard | undefined {
    return this.cards[index];
  }

  /**
   * @throws If the index is outside the grid.
   */
  positionOf(index: number): BoardPosition {
    const { cols, rows } = this.gridSize;
    if (!Number.isInteger(index) || index < 0 || index >= cols * rows) {
      throw new Error(`Board index ${index} is outside the ${cols}x${rows} grid`);
    }
    return { row: Math.floor(index / cols), col: index % cols };
  }

  /**
   * @throws If the position is outside the grid.
   */
  indexOf(row: number, col: number): number {
    const { cols, rows } = this.gridSize;
    if (
      !Number.isInteger(row) ||
      !Number.isInteger(col) ||
      row < 0 ||
      row >= rows ||
      col < 0 ||
      col >= cols
    ) {
      throw new Error(`Position (${row}, ${col}) is outside the ${cols}x${rows} grid`);
    }
    return row * cols + col;
  }

  /** Persisted form of every card, in board order. */
  snapshot(): CardState[] {
    return this.cards.map((c) => c.snapshot());
  }
}
