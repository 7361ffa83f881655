/**
 * MainMenu -- model of the main menu and its two panels.
 *
 * The main menu offers New Game (opens the board-size panel), Load
 * Game (opens the load panel; enabled only when saves exist) and Quit.
 * Choosing a board size or confirming a load leaves the hand-off keys
 * in the preferences and asks for the game scene.
 */

import type { BoardSizeOption } from './BoardSizes';
import { boardSizeOptions } from './BoardSizes';
import type { GridSize } from './MemoryBoard';
import { validateGridSize } from './MemoryBoard';
import {
  PREF_GRID_COLUMNS,
  PREF_GRID_ROWS,
  PREF_LOAD_FILE_NAME,
  PREF_LOAD_ON_START,
} from './PreferenceKeys';
import type { GamePreferences } from './PreferenceKeys';
import { SaveBrowser } from './SaveBrowser';
import type { SaveCatalog } from './SaveBrowser';

/** Which part of the menu is showing. */
export type MenuPanel = 'main' | 'board-size' | 'load';

/** Where the menu wants to go next. */
export type MenuNavigation = 'start-game' | 'quit';

export class MainMenu {
  readonly saves: SaveBrowser;
  private _panel: MenuPanel = 'main';
  private _loadEnabled = false;

  constructor(
    private readonly catalog: SaveCatalog,
    private readonly preferences: GamePreferences,
  ) {
    this.saves = new SaveBrowser(catalog);
  }

  get panel(): MenuPanel {
    return this._panel;
  }

  /** Whether the Load Game button is enabled. */
  get loadEnabled(): boolean {
    return this._loadEnabled;
  }

  /** Prepare the menu for display. */
  async open(): Promise<void> {
    this._panel = 'main';
    await this.updateLoadButtonState();
  }

  async updateLoadButtonState(): Promise<void> {
    this._loadEnabled = (await this.catalog.list()).length > 0;
  }

  // ── New game ────────────────────────────────────────────

  /** Open the board-size panel and return its options. */
  newGame(): BoardSizeOption[] {
    console.log('[MainMenu] Starting New Game...');
    this._panel = 'board-size';
    return boardSizeOptions();
  }

  closeBoardSizePanel(): void {
    this._panel = 'main';
  }

  /**
   * Remember the chosen size and ask for the game scene.
   *
   * @throws If the size is not a valid grid.
   */
  selectBoardSize(size: GridSize): MenuNavigation {
    validateGridSize(size);
    console.log(`[MainMenu] Selected board size: ${size.cols} x ${size.rows}`);

    this.preferences.setInt(PREF_GRID_COLUMNS, size.cols);
    this.preferences.setInt(PREF_GRID_ROWS, size.rows);
    this.preferences.removeItem(PREF_LOAD_ON_START);
    this.preferences.removeItem(PREF_LOAD_FILE_NAME);

    this._panel = 'main';
    return 'start-game';
  }

  // ── Load game ───────────────────────────────────────────

  async showLoadPanel(): Promise<void> {
    this._panel = 'load';
    await this.saves.refresh();
  }

  async hideLoadPanel(): Promise<void> {
    this._panel = 'main';
    this.saves.clear();
    await this.updateLoadButtonState();
  }

  selectLoadFile(name: string): boolean {
    return this.saves.select(name);
  }

  async deleteSaveFile(name: string): Promise<void> {
    console.log(`[MainMenu] Attempting to delete save file from Main Menu: ${name}`);
    await this.saves.remove(name);
    await this.updateLoadButtonState();
  }

  /**
   * Ask the game scene to open the selected save.
   *
   * @returns `null` when nothing is selected.
   */
  confirmLoad(): MenuNavigation | null {
    const name = this.saves.selected;
    if (name === null) {
      console.warn('[MainMenu] No save file selected!');
      return null;
    }

    this.preferences.setInt(PREF_LOAD_ON_START, 1);
    this.preferences.setItem(PREF_LOAD_FILE_NAME, name);
    this.saves.clear();
    this._panel = 'main';
    return 'start-game';
  }

  quit(): MenuNavigation {
    console.log('[MainMenu] Quitting Game...');
    return 'quit';
  }
}
