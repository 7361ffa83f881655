/**
 * SaveGameStore -- file-backed persistence for saved games.
 *
 * Each save is one pretty-printed JSON document in a dedicated
 * directory. The save name maps 1:1 to a file name: characters that
 * are invalid in file names are replaced with `_` and the `.json`
 * extension is implicit.
 *
 * Errors never escape the store. A failed write, read, or delete is
 * logged and reported as `null`, `[]`, `false`, or a no-op.
 */

import { mkdir, readFile, readdir, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { CardState } from '../card-system/Card';
import { errorMessage } from './errors';

// ── Types ──────────────────────────────────────────────────

/** Full state of a game as written to disk. */
export interface SavedGameState {
  matchesFound: number;
  turnsTaken: number;
  gridSizeX: number;
  gridSizeY: number;
  /** One entry per card, in board order. */
  cardStates: CardState[];
}

export interface SaveGameStoreOptions {
  /** Directory holding the save files. Created on first use. */
  directory: string;
}

// ── Constants ──────────────────────────────────────────────

export const SAVE_FILE_EXTENSION = '.json';

/** Characters that may not appear in a file name on common filesystems. */
const INVALID_FILE_NAME_CHARS = /[<>:"/\\|?*\u0000-\u001f]/g;

// ── Helpers ────────────────────────────────────────────────

/**
 * Replace every file-name-invalid character with an underscore.
 */
export function sanitizeSaveName(name: string): string {
  return name.replace(INVALID_FILE_NAME_CHARS, '_');
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function isPositiveInteger(value: unknown): value is number {
  return isNonNegativeInteger(value) && value > 0;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseCardState(value: unknown): CardState | null {
  if (!isRecord(value)) return null;
  const { boardIndex, typeId, isMatched } = value;
  if (!isNonNegativeInteger(boardIndex) || !isNonNegativeInteger(typeId)) {
    return null;
  }
  if (typeof isMatched !== 'boolean') return null;
  return { boardIndex, typeId, isMatched };
}

/**
 * Check the shape of a parsed save document.
 *
 * @returns The typed state, or `null` if any field is missing or has
 *          the wrong type.
 */
export function parseSavedGameState(value: unknown): SavedGameState | null {
  if (!isRecord(value)) return null;
  const { matchesFound, turnsTaken, gridSizeX, gridSizeY, cardStates } = value;

  if (!isNonNegativeInteger(matchesFound) || !isNonNegativeInteger(turnsTaken)) {
    return null;
  }
  if (!isPositiveInteger(gridSizeX) || !isPositiveInteger(gridSizeY)) {
    return null;
  }
  if (!Array.isArray(cardStates)) return null;

  const cards: CardState[] = [];
  for (const entry of cardStates) {
    const card = parseCardState(entry);
    if (!card) return null;
    cards.push(card);
  }

  return { matchesFound, turnsTaken, gridSizeX, gridSizeY, cardStates: cards };
}

// ── SaveGameStore ──────────────────────────────────────────

/**
 * Directory-backed store of saved games keyed by save name.
 *
 * Usage:
 *   const store = new SaveGameStore({ directory: '/home/me/.memory-match/SaveGames' });
 *   await store.save(state, 'before lunch');
 *   const names = await store.list();
 */
export class SaveGameStore {
  readonly directory: string;
  private initPromise: Promise<boolean> | null = null;

  constructor(options: SaveGameStoreOptions) {
    this.directory = options.directory;
  }

  /**
   * Create the save directory if missing. Called automatically on
   * first operation; resolves to whether the directory is usable.
   */
  private init(): Promise<boolean> {
    if (this.initPromise) return this.initPromise;

    this.initPromise = (async () => {
      try {
        await mkdir(this.directory, { recursive: true });
        console.log(`[SaveGameStore] Game Save Directory: ${this.directory}`);
        return true;
      } catch (e) {
        console.error(
          `[SaveGameStore] Could not create save directory ${this.directory}:`,
          e,
        );
        this.initPromise = null;
        return false;
      }
    })();

    return this.initPromise;
  }

  /**
   * Full path of the file backing `name`, or `null` for a blank name.
   */
  resolvePath(name: string): string | null {
    if (name.trim().length === 0) {
      console.error('[SaveGameStore] Save filename cannot be empty or blank.');
      return null;
    }
    return join(this.directory, sanitizeSaveName(name) + SAVE_FILE_EXTENSION);
  }

  /**
   * Write a game state under `name`, replacing any previous save of
   * the same name.
   *
   * @returns Whether the file was written.
   */
  async save(state: SavedGameState, name: string): Promise<boolean> {
    const fullPath = this.resolvePath(name);
    if (fullPath === null) return false;
    if (!(await this.init())) return false;

    try {
      await writeFile(fullPath, JSON.stringify(state, null, 2));
      console.log(`[SaveGameStore] Game Saved Successfully to: ${name}`);
      return true;
    } catch (e) {
      console.error(`[SaveGameStore] Failed to save game to ${name}: ${errorMessage(e)}`);
      return false;
    }
  }

  /**
   * Read the save stored under `name`.
   *
   * @returns The saved state, or `null` if the save does not exist,
   *          cannot be read, or is not a valid save document.
   */
  async load(name: string): Promise<SavedGameState | null> {
    const fullPath = this.resolvePath(name);
    if (fullPath === null) return null;
    if (!(await this.fileExists(fullPath))) {
      console.warn(`[SaveGameStore] Save file not found: ${name}`);
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(await readFile(fullPath, 'utf-8'));
      const state = parseSavedGameState(parsed);
      if (!state) {
        console.error(`[SaveGameStore] Save file ${name} is not a valid game state.`);
        return null;
      }
      console.log(`[SaveGameStore] Game Loaded Successfully from: ${name}`);
      return state;
    } catch (e) {
      console.error(`[SaveGameStore] Failed to load game from ${name}: ${errorMessage(e)}`);
      return null;
    }
  }

  /**
   * Delete the save stored under `name`. Deleting a missing save
   * only logs a warning.
   */
  async delete(name: string): Promise<void> {
    const fullPath = this.resolvePath(name);
    if (fullPath === null) return;

    if (!(await this.fileExists(fullPath))) {
      console.warn(`[SaveGameStore] Attempted to delete non-existent save file: ${name}`);
      return;
    }

    try {
      await rm(fullPath);
      console.log(`[SaveGameStore] Save game '${name}' deleted successfully.`);
    } catch (e) {
      console.error(`[SaveGameStore] Failed to delete save game '${name}': ${errorMessage(e)}`);
    }
  }

  /**
   * Names of all saves (without extension), sorted.
   */
  async list(): Promise<string[]> {
    if (!(await this.init())) return [];

    try {
      const entries = await readdir(this.directory, { withFileTypes: true });
      return entries
        .filter((e) => e.isFile() && e.name.endsWith(SAVE_FILE_EXTENSION))
        .map((e) => e.name.slice(0, -SAVE_FILE_EXTENSION.length))
        .sort();
    } catch (e) {
      console.error(`[SaveGameStore] Failed to get save files: ${errorMessage(e)}`);
      return [];
    }
  }

  /** Whether a save exists under `name`. */
  async has(name: string): Promise<boolean> {
    const fullPath = this.resolvePath(name);
    if (fullPath === null) return false;
    return this.fileExists(fullPath);
  }

  /** Whether at least one save exists. */
  async hasAny(): Promise<boolean> {
    return (await this.list()).length > 0;
  }

  private async fileExists(fullPath: string): Promise<boolean> {
    try {
      return (await stat(fullPath)).isFile();
    } catch {
      return false;
    }
  }
}
