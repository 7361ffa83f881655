/**
 * Tests for MemoryGame -- start, flips, restart, save and load.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SaveGameStore } from '../../src/core-engine/SaveGameStore';
import type { SavedGameState } from '../../src/core-engine/SaveGameStore';
import { MemoryGame } from '../../games/memory/MemoryGame';
import type { MemoryGameOptions } from '../../games/memory/MemoryGame';
import type { MemoryBoard } from '../../games/memory/MemoryBoard';
import {
  PREF_GRID_COLUMNS,
  PREF_GRID_ROWS,
  PREF_LOAD_FILE_NAME,
  PREF_LOAD_ON_START,
} from '../../games/memory/PreferenceKeys';
import {
  MemoryPreferences,
  cardStates,
  createTestRng,
  findMismatch,
  findPair,
  immediateScheduler,
  silenceConsole,
} from './helpers';

function requireBoard(game: MemoryGame): MemoryBoard {
  const board = game.currentBoard;
  if (!board) throw new Error('Game has no board');
  return board;
}

async function flipPair(game: MemoryGame, [a, b]: [number, number]) {
  await game.flipCard(a);
  return game.flipCard(b);
}

async function solve(game: MemoryGame): Promise<void> {
  const board = requireBoard(game);
  while (board.matchedPairs < board.totalPairs) {
    await flipPair(game, findPair(board));
  }
}

/** 2x2 save with indices 0 and 2 matched. */
function halfSolvedSave(overrides: Partial<SavedGameState> = {}): SavedGameState {
  return {
    matchesFound: 1,
    turnsTaken: 4,
    gridSizeX: 2,
    gridSizeY: 2,
    cardStates: cardStates([0, 1, 0, 1], [0, 2]),
    ...overrides,
  };
}

describe('MemoryGame', () => {
  let root: string;
  let saveStore: SaveGameStore;
  let preferences: MemoryPreferences;

  function createGame(options: Partial<MemoryGameOptions> = {}): MemoryGame {
    return new MemoryGame({
      saveStore,
      preferences,
      scheduler: immediateScheduler,
      rng: createTestRng(),
      ...options,
    });
  }

  beforeEach(() => {
    silenceConsole();
    root = mkdtempSync(join(tmpdir(), 'memory-game-'));
    saveStore = new SaveGameStore({ directory: join(root, 'SaveGames') });
    preferences = new MemoryPreferences();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
    rmSync(root, { recursive: true, force: true });
  });

  // ── Start ───────────────────────────────────────────────

  describe('start', () => {
    it('deals the default 4x3 board when no size is stored', async () => {
      const game = createGame();
      await game.start();

      expect(game.gridSize).toEqual({ cols: 4, rows: 3 });
      expect(game.totalPairs).toBe(6);
      expect(game.phase).toBe('playing');
      expect(game.isInteractionLocked).toBe(false);
      expect(requireBoard(game).allCards().every((c) => c.flipState === 'back')).toBe(true);
    });

    it('uses the board size chosen on the menu', async () => {
      preferences.setInt(PREF_GRID_COLUMNS, 2);
      preferences.setInt(PREF_GRID_ROWS, 3);
      const game = createGame();
      await game.start();

      expect(game.gridSize).toEqual({ cols: 2, rows: 3 });
      expect(requireBoard(game).cardCount).toBe(6);
    });

    it('falls back to the default size when the stored one is invalid', async () => {
      preferences.setInt(PREF_GRID_COLUMNS, 0);
      const game = createGame();
      await game.start();

      expect(game.gridSize).toEqual({ cols: 4, rows: 3 });
      expect(console.warn).toHaveBeenCalledWith(
        '[MemoryGame] Ignoring stored board size: Grid cols must be a positive integer, got 0',
      );
    });

    it('holds the interaction lock for the preview', async () => {
      vi.useFakeTimers();
      const game = createGame({ scheduler: undefined });
      const started = game.start();

      expect(game.isInteractionLocked).toBe(true);
      expect(game.phase).toBe('setup');
      expect(await game.flipCard(0)).toBeNull();
      expect(requireBoard(game).cardAt(0)?.flipState).toBe('back');

      await vi.advanceTimersByTimeAsync(1200);
      await started;

      expect(game.isInteractionLocked).toBe(false);
      expect(game.phase).toBe('playing');
    });

    it('emits game-started for a new board', async () => {
      const game = createGame();
      const started = vi.fn();
      game.events.on('game-started', started);
      await game.start();

      expect(started).toHaveBeenCalledWith({ cols: 4, rows: 3, source: 'new' });
    });

    it('opens the save requested by the menu and clears the request', async () => {
      await saveStore.save(halfSolvedSave(), 'slot-a');
      preferences.setInt(PREF_LOAD_ON_START, 1);
      preferences.setItem(PREF_LOAD_FILE_NAME, 'slot-a');
      const game = createGame();
      await game.start();

      expect(game.matchesFound).toBe(1);
      expect(game.turnsTaken).toBe(4);
      expect(game.gridSize).toEqual({ cols: 2, rows: 2 });
      expect(preferences.getItem(PREF_LOAD_ON_START)).toBeNull();
      expect(preferences.getItem(PREF_LOAD_FILE_NAME)).toBeNull();
    });

    it('deals a new board when the requested save is missing', async () => {
      preferences.setInt(PREF_LOAD_ON_START, 1);
      preferences.setItem(PREF_LOAD_FILE_NAME, 'ghost');
      const game = createGame();
      await game.start();

      expect(requireBoard(game).cardCount).toBe(12);
      expect(game.turnsTaken).toBe(0);
      expect(preferences.getItem(PREF_LOAD_ON_START)).toBeNull();
    });

    it('ignores the load flag without a file name', async () => {
      preferences.setInt(PREF_LOAD_ON_START, 1);
      const game = createGame();
      await game.start();

      expect(requireBoard(game).cardCount).toBe(12);
    });
  });

  // ── Play ────────────────────────────────────────────────

  describe('flipCard', () => {
    it('counts a turn for a mismatched pair', async () => {
      const game = createGame();
      await game.start();
      const pair = findMismatch(requireBoard(game));

      const result = await flipPair(game, pair);

      expect(result).toMatchObject({ matched: false, turnsTaken: 1 });
      expect(game.turnsTaken).toBe(1);
      expect(game.matchesFound).toBe(0);
      expect(game.isInteractionLocked).toBe(false);
    });

    it('counts a match for a matching pair', async () => {
      const game = createGame();
      await game.start();

      const result = await flipPair(game, findPair(requireBoard(game)));

      expect(result).toMatchObject({ matched: true, turnsTaken: 1, matchesFound: 1 });
      expect(game.matchesFound).toBe(1);
    });

    it('refuses a matched card', async () => {
      const game = createGame();
      await game.start();
      const [a] = findPair(requireBoard(game));
      await flipPair(game, findPair(requireBoard(game)));

      expect(await game.flipCard(a)).toBeNull();
      expect(game.turnsTaken).toBe(1);
    });

    it('reports matched cards as locked while play is open', async () => {
      await saveStore.save(halfSolvedSave(), 'slot-a');
      const game = createGame();
      await game.loadGame('slot-a');
      const board = requireBoard(game);

      expect(game.isInteractionLocked).toBe(false);
      expect(game.isCardLocked(board.allCards()[0])).toBe(true);
      expect(game.isCardLocked(board.allCards()[1])).toBe(false);
    });

    it('refuses the card already flipped this turn', async () => {
      const game = createGame();
      await game.start();
      const flipped = vi.fn();
      game.events.on('card-flipped', flipped);

      await game.flipCard(0);
      expect(await game.flipCard(0)).toBeNull();
      expect(flipped).toHaveBeenCalledOnce();
      expect(game.isCardLocked(requireBoard(game).allCards()[0])).toBe(true);
    });

    it('refuses an empty cell', async () => {
      preferences.setInt(PREF_GRID_COLUMNS, 3);
      preferences.setInt(PREF_GRID_ROWS, 3);
      const game = createGame();
      await game.start();

      expect(await game.flipCard(8)).toBeNull();
      expect(console.warn).toHaveBeenCalledWith('[MemoryGame] No card at board index 8.');
    });

    it('ends and locks the game once every pair is found', async () => {
      const game = createGame();
      await game.start();
      const ended = vi.fn();
      game.events.on('game-ended', ended);

      await solve(game);

      expect(game.phase).toBe('ended');
      expect(game.matchesFound).toBe(6);
      expect(game.isInteractionLocked).toBe(true);
      expect(ended).toHaveBeenCalledWith({ turnsTaken: 6, matchesFound: 6 });
    });
  });

  // ── Restart ─────────────────────────────────────────────

  describe('restart', () => {
    it('deals a fresh board at the same size with reset counters', async () => {
      const game = createGame();
      await game.start();
      const before = game.currentBoard;
      await flipPair(game, findPair(requireBoard(game)));

      await game.restart();

      expect(game.currentBoard).not.toBe(before);
      expect(game.gridSize).toEqual({ cols: 4, rows: 3 });
      expect(game.turnsTaken).toBe(0);
      expect(game.matchesFound).toBe(0);
      expect(game.phase).toBe('playing');
    });

    it('starts over after the game has ended', async () => {
      const game = createGame();
      await game.start();
      await solve(game);

      await game.restart();

      expect(game.phase).toBe('playing');
      expect(game.isInteractionLocked).toBe(false);
    });
  });

  // ── Persistence ─────────────────────────────────────────

  describe('saveGame', () => {
    it('writes the board and counters', async () => {
      const game = createGame();
      await game.start();
      await flipPair(game, findPair(requireBoard(game)));
      const saved = vi.fn();
      game.events.on('game-saved', saved);

      expect(await game.saveGame('slot-a')).toBe(true);

      const state = await saveStore.load('slot-a');
      expect(state).toEqual({
        matchesFound: 1,
        turnsTaken: 1,
        gridSizeX: 4,
        gridSizeY: 3,
        cardStates: requireBoard(game).snapshot(),
      });
      expect(saved).toHaveBeenCalledWith({ saveName: 'slot-a' });
    });

    it('refuses to save before a board is dealt', async () => {
      expect(await createGame().saveGame('slot-a')).toBe(false);
      expect(await saveStore.list()).toEqual([]);
    });

    it('reports a rejected name', async () => {
      const game = createGame();
      await game.start();
      expect(await game.saveGame('  ')).toBe(false);
    });
  });

  describe('loadGame', () => {
    it('restores the saved board, counters and matched cards', async () => {
      await saveStore.save(halfSolvedSave(), 'slot-a');
      const game = createGame();
      await game.start();
      const loaded = vi.fn();
      const started = vi.fn();
      game.events.on('game-loaded', loaded);
      game.events.on('game-started', started);

      expect(await game.loadGame('slot-a')).toBe(true);

      const board = requireBoard(game);
      expect(board.snapshot()).toEqual(cardStates([0, 1, 0, 1], [0, 2]));
      expect(board.cardAt(0)?.flipState).toBe('front');
      expect(board.cardAt(1)?.flipState).toBe('back');
      expect(game.matchesFound).toBe(1);
      expect(game.turnsTaken).toBe(4);
      expect(game.phase).toBe('playing');
      expect(game.isInteractionLocked).toBe(false);
      expect(started).toHaveBeenCalledWith({ cols: 2, rows: 2, source: 'load' });
      expect(loaded).toHaveBeenCalledWith({ saveName: 'slot-a' });
    });

    it('plays on from the restored state', async () => {
      await saveStore.save(halfSolvedSave(), 'slot-a');
      const game = createGame();
      await game.loadGame('slot-a');

      const result = await flipPair(game, [1, 3]);

      expect(result).toMatchObject({ matched: true, turnsTaken: 5, matchesFound: 2, gameOver: true });
      expect(game.phase).toBe('ended');
    });

    it('keeps the current board when the save is missing', async () => {
      const game = createGame();
      await game.start();
      const before = game.currentBoard;

      expect(await game.loadGame('ghost')).toBe(false);
      expect(game.currentBoard).toBe(before);
      expect(console.warn).toHaveBeenCalledWith(
        "[MemoryGame] Load failed for 'ghost' or file not found. Starting a new game.",
      );
    });

    it('deals a new board when the save is missing and nothing is in play', async () => {
      const game = createGame();
      expect(await game.loadGame('ghost')).toBe(false);
      expect(requireBoard(game).cardCount).toBe(12);
      expect(game.phase).toBe('playing');
    });

    it('rejects a save whose cards do not fit its grid', async () => {
      await saveStore.save(halfSolvedSave({ gridSizeX: 4, gridSizeY: 3 }), 'slot-a');
      const game = createGame();
      await game.start();
      const before = game.currentBoard;

      expect(await game.loadGame('slot-a')).toBe(false);
      expect(game.currentBoard).toBe(before);
    });

    it('rejects a save that can never be completed', async () => {
      await saveStore.save(halfSolvedSave({ matchesFound: 0, cardStates: cardStates([0, 1, 2, 3]) }), 'slot-a');
      const game = createGame();
      await game.start();
      const before = game.currentBoard;

      expect(await game.loadGame('slot-a')).toBe(false);
      expect(game.currentBoard).toBe(before);
    });

    it('trusts the matched cards over the stored match count', async () => {
      await saveStore.save(halfSolvedSave({ matchesFound: 0 }), 'slot-a');
      const game = createGame();

      await game.loadGame('slot-a');

      expect(game.matchesFound).toBe(1);
      expect(console.warn).toHaveBeenCalledWith(
        '[MemoryGame] Save reports 0 matches but 1 pairs are matched; using the board.',
      );
    });

    it('opens a finished save as an ended, locked game', async () => {
      const finished = halfSolvedSave({
        matchesFound: 2,
        cardStates: cardStates([0, 1, 0, 1], [0, 1, 2, 3]),
      });
      await saveStore.save(finished, 'done');
      const game = createGame();

      expect(await game.loadGame('done')).toBe(true);
      expect(game.phase).toBe('ended');
      expect(game.isInteractionLocked).toBe(true);
      expect(await game.flipCard(0)).toBeNull();
    });

    it('abandons an evaluation that was running when the save loaded', async () => {
      vi.useFakeTimers();
      await saveStore.save(halfSolvedSave(), 'slot-a');
      const game = createGame({ scheduler: undefined });
      const started = game.start();
      await vi.advanceTimersByTimeAsync(1200);
      await started;

      const turnCompleted = vi.fn();
      game.events.on('turn-completed', turnCompleted);
      const [a, b] = findMismatch(requireBoard(game));
      void game.flipCard(a);
      const pending = game.flipCard(b);
      await game.loadGame('slot-a');
      await vi.advanceTimersByTimeAsync(1000);

      expect(await pending).toBeNull();
      expect(turnCompleted).not.toHaveBeenCalled();
      expect(game.turnsTaken).toBe(4);
    });
  });

  // ── Stop ────────────────────────────────────────────────

  describe('stop', () => {
    it('cancels pending work and stops tracking the lock', async () => {
      vi.useFakeTimers();
      const game = createGame({ scheduler: undefined });
      const started = game.start();
      await vi.advanceTimersByTimeAsync(1200);
      await started;

      const [a, b] = findPair(requireBoard(game));
      void game.flipCard(a);
      const pending = game.flipCard(b);
      game.stop();
      await vi.advanceTimersByTimeAsync(1000);

      expect(await pending).toBeNull();
      expect(game.matchesFound).toBe(0);
      expect(game.isInteractionLocked).toBe(true);
    });
  });
});
