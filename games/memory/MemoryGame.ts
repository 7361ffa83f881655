/**
 * Memory game orchestration -- ties together the board, the matcher,
 * the round state, the saved-game store and the preferences into a
 * playable game.
 *
 * Provides:
 *   - Game start (new board with preview, or a save requested by the menu)
 *   - Card flips, gated by the global interaction lock
 *   - Restart, save and load
 *
 * The global interaction lock is held during the start-of-round
 * preview, while a pair is evaluated, and once every pair is found.
 */

import type { MemoryCard } from '../../src/card-system/Card';
import { GameEventEmitter } from '../../src/core-engine/GameEventEmitter';
import type { GamePhase, GameState } from '../../src/core-engine/GameState';
import { createGameState } from '../../src/core-engine/GameState';
import type { SavedGameState, SaveGameStore } from '../../src/core-engine/SaveGameStore';
import type { Scheduler } from '../../src/core-engine/Scheduler';
import { timerScheduler } from '../../src/core-engine/Scheduler';
import { errorMessage } from '../../src/core-engine/errors';
import { allPairsFound, endGame, startGame } from '../../src/core-engine/TurnSequencer';
import { CARD_FACES } from './CardFaces';
import { CardMatcher } from './CardMatcher';
import type { MatcherTimings, TurnResult } from './CardMatcher';
import { DEFAULT_GRID_SIZE, MemoryBoard, validateGridSize } from './MemoryBoard';
import type { GridSize } from './MemoryBoard';
import {
  PREF_GRID_COLUMNS,
  PREF_GRID_ROWS,
  PREF_LOAD_FILE_NAME,
  PREF_LOAD_ON_START,
} from './PreferenceKeys';
import type { GamePreferences } from './PreferenceKeys';

// ── Options ─────────────────────────────────────────────────

export interface MemoryGameOptions {
  /** Where saves are written to and read from. */
  saveStore: SaveGameStore;
  /** Board-size preference and menu hand-off keys. */
  preferences: GamePreferences;
  /** Event bus shared with sound and scenes (default: a new emitter). */
  events?: GameEventEmitter;
  /** Timer source for the timed steps (default: real timers). */
  scheduler?: Scheduler;
  /** Overrides for the matcher's step durations. */
  timings?: Partial<MatcherTimings>;
  /** RNG for dealing (default Math.random). */
  rng?: () => number;
  /** Number of distinct card faces (default: the face catalogue size). */
  faceCount?: number;
  /** Board size when no preference is stored (default 4x3). */
  defaultGridSize?: GridSize;
}

// ── Game ────────────────────────────────────────────────────

export class MemoryGame {
  readonly events: GameEventEmitter;
  private readonly saveStore: SaveGameStore;
  private readonly preferences: GamePreferences;
  private readonly matcher: CardMatcher;
  private readonly rng: () => number;
  private readonly faceCount: number;
  private readonly defaultGridSize: GridSize;
  private readonly unsubs: Array<() => void> = [];

  private _gridSize: GridSize;
  private board: MemoryBoard | null = null;
  private state: GameState | null = null;
  private interactionLocked = true;

  constructor(options: MemoryGameOptions) {
    this.events = options.events ?? new GameEventEmitter();
    this.saveStore = options.saveStore;
    this.preferences = options.preferences;
    this.rng = options.rng ?? Math.random;
    this.faceCount = options.faceCount ?? CARD_FACES.length;
    this.defaultGridSize = options.defaultGridSize ?? DEFAULT_GRID_SIZE;
    this._gridSize = this.defaultGridSize;
    this.matcher = new CardMatcher(
      this.events,
      options.scheduler ?? timerScheduler,
      options.timings,
    );

    this.unsubs.push(
      this.events.on('interaction-locked', ({ reason }) => {
        this.interactionLocked = true;
        console.log(`[MemoryGame] Global Interaction Locked (${reason})`);
      }),
      this.events.on('interaction-unlocked', ({ reason }) => {
        this.interactionLocked = false;
        console.log(`[MemoryGame] Global Interaction Unlocked (${reason})`);
      }),
      this.events.on('preview-ended', () => {
        if (this.state?.phase === 'setup') startGame(this.state);
      }),
    );
  }

  // ── Queries ─────────────────────────────────────────────

  get gridSize(): GridSize {
    return this._gridSize;
  }

  get currentBoard(): MemoryBoard | null {
    return this.board;
  }

  get matchesFound(): number {
    return this.state?.matchesFound ?? 0;
  }

  get turnsTaken(): number {
    return this.state?.turnNumber ?? 0;
  }

  get totalPairs(): number {
    return this.board?.totalPairs ?? 0;
  }

  get phase(): GamePhase {
    return this.state?.phase ?? 'setup';
  }

  get isInteractionLocked(): boolean {
    return this.interactionLocked;
  }

  /** Whether `card` may not be flipped right now. */
  isCardLocked(card: MemoryCard): boolean {
    if (this.interactionLocked || card.isMatched) return true;
    return this.matcher.isCardLocked(card);
  }

  // ── Lifecycle ───────────────────────────────────────────

  /**
   * Start the game: open the save the main menu asked for, or deal a
   * new board at the preferred size and preview it.
   */
  async start(): Promise<void> {
    this._gridSize = this.readPreferredGridSize();

    const shouldLoad = this.preferences.getInt(PREF_LOAD_ON_START, 0) === 1;
    const fileName = this.preferences.getItem(PREF_LOAD_FILE_NAME) ?? '';

    if (shouldLoad && fileName.length > 0) {
      console.log(`[MemoryGame] Starting with load game flag for ${fileName}`);
      this.preferences.removeItem(PREF_LOAD_ON_START);
      this.preferences.removeItem(PREF_LOAD_FILE_NAME);
      await this.loadGame(fileName);
    } else {
      console.log('[MemoryGame] Starting a new game.');
      await this.dealNewRound();
    }
  }

  /** Deal a fresh board at the current size, resetting the counters. */
  async restart(): Promise<void> {
    console.log('[MemoryGame] Restarting Game');
    await this.dealNewRound();
  }

  /**
   * Stop reacting to timers and events; call when leaving the game.
   */
  stop(): void {
    console.log('[MemoryGame] Returning to Main Menu');
    this.matcher.cancel();
    for (const unsub of this.unsubs) unsub();
    this.unsubs.length = 0;
  }

  // ── Play ────────────────────────────────────────────────

  /**
   * Flip the card at `boardIndex`.
   *
   * Refused (resolves `null`) for an empty cell, while interaction is
   * locked, or for a matched or pending card.
   *
   * @returns The evaluated turn when this was the second card.
   */
  async flipCard(boardIndex: number): Promise<TurnResult | null> {
    const card = this.board?.cardAt(boardIndex);
    if (!card) {
      console.warn(`[MemoryGame] No card at board index ${boardIndex}.`);
      return null;
    }
    if (this.interactionLocked) {
      console.log(`[MemoryGame] Cannot flip card ${card.boardIndex} due to global lock.`);
      return null;
    }
    if (this.isCardLocked(card)) return null;

    return this.matcher.handleCardFlipped(card);
  }

  // ── Persistence ─────────────────────────────────────────

  /** The current game in its persisted form, or `null` before a deal. */
  snapshot(): SavedGameState | null {
    if (!this.board || !this.state) return null;
    return {
      matchesFound: this.state.matchesFound,
      turnsTaken: this.state.turnNumber,
      gridSizeX: this._gridSize.cols,
      gridSizeY: this._gridSize.rows,
      cardStates: this.board.snapshot(),
    };
  }

  /**
   * Save the current game under `saveName`.
   *
   * @returns Whether the save was written.
   */
  async saveGame(saveName: string): Promise<boolean> {
    const state = this.snapshot();
    if (!state) {
      console.warn('[MemoryGame] Nothing to save yet.');
      return false;
    }

    const saved = await this.saveStore.save(state, saveName);
    if (saved) this.events.emit('game-saved', { saveName });
    return saved;
  }

  /**
   * Replace the current game with the save stored under `saveName`.
   *
   * When the save is missing or unusable the current board stays in
   * play; if there is no board yet a new one is dealt.
   *
   * @returns Whether the save was applied.
   */
  async loadGame(saveName: string): Promise<boolean> {
    console.log(`[MemoryGame] Executing in-game Load from: ${saveName}`);
    const saved = await this.saveStore.load(saveName);
    const board = saved ? this.restoreBoard(saved) : null;

    if (!saved || !board) {
      console.warn(
        `[MemoryGame] Load failed for '${saveName}' or file not found. Starting a new game.`,
      );
      if (!this.board) await this.dealNewRound();
      return false;
    }

    const matchesFound = board.matchedPairs;
    if (matchesFound !== saved.matchesFound) {
      console.warn(
        `[MemoryGame] Save reports ${saved.matchesFound} matches but ${matchesFound} pairs are matched; using the board.`,
      );
    }

    const state = createGameState({
      totalPairs: board.totalPairs,
      turnNumber: saved.turnsTaken,
      matchesFound,
    });

    this._gridSize = board.gridSize;
    this.board = board;
    this.state = state;
    this.matcher.initialize(board, state);

    this.events.emit('game-started', {
      cols: board.gridSize.cols,
      rows: board.gridSize.rows,
      source: 'load',
    });

    if (allPairsFound(state)) {
      endGame(state);
      this.interactionLocked = true;
    } else {
      startGame(state);
      this.interactionLocked = false;
    }

    this.events.emit('game-loaded', { saveName });
    return true;
  }

  // ── Internals ───────────────────────────────────────────

  private readPreferredGridSize(): GridSize {
    const size: GridSize = {
      cols: this.preferences.getInt(PREF_GRID_COLUMNS, this.defaultGridSize.cols),
      rows: this.preferences.getInt(PREF_GRID_ROWS, this.defaultGridSize.rows),
    };
    try {
      validateGridSize(size);
      return size;
    } catch (e) {
      console.warn(`[MemoryGame] Ignoring stored board size: ${errorMessage(e)}`);
      return this.defaultGridSize;
    }
  }

  private restoreBoard(saved: SavedGameState): MemoryBoard | null {
    const gridSize: GridSize = { cols: saved.gridSizeX, rows: saved.gridSizeY };
    try {
      return MemoryBoard.fromCardStates(gridSize, saved.cardStates);
    } catch (e) {
      console.warn(`[MemoryGame] Saved board is unusable: ${errorMessage(e)}`);
      return null;
    }
  }

  private async dealNewRound(): Promise<void> {
    const board = MemoryBoard.create(this._gridSize, this.faceCount, this.rng);
    console.log(`[MemoryGame] Spawning ${board.cardCount} cards with new shuffled states.`);

    this.state = createGameState({ totalPairs: board.totalPairs });
    this.board = board;
    this.interactionLocked = true;
    this.matcher.initialize(board, this.state);

    this.events.emit('game-started', {
      cols: board.gridSize.cols,
      rows: board.gridSize.rows,
      source: 'new',
    });

    await this.matcher.showAllCardsTemporarily();
  }
}
