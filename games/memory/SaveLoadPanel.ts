/**
 * SaveLoadPanel -- model of the in-game save and load panels.
 *
 * The save panel proposes a timestamped name and accepts any name
 * that is not blank once trimmed. The load panel is a
 * {@link SaveBrowser}. Confirming either panel hides it and hands the
 * chosen name back to the caller, which performs the save or load.
 */

import { format } from 'date-fns';
import { SaveBrowser } from './SaveBrowser';
import type { SaveCatalog } from './SaveBrowser';

/** Default save name for a moment in time: `SaveGame_yyyyMMdd_HHmmss`. */
export function defaultSaveName(now: Date): string {
  return `SaveGame_${format(now, 'yyyyMMdd_HHmmss')}`;
}

export class SaveLoadPanel {
  readonly saves: SaveBrowser;
  private _saveName = '';
  private _savePanelVisible = false;
  private _loadPanelVisible = false;

  constructor(
    catalog: SaveCatalog,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.saves = new SaveBrowser(catalog);
  }

  get savePanelVisible(): boolean {
    return this._savePanelVisible;
  }

  get loadPanelVisible(): boolean {
    return this._loadPanelVisible;
  }

  // ── Save panel ──────────────────────────────────────────

  /** Text currently in the save-name field. */
  get saveName(): string {
    return this._saveName;
  }

  /** Whether the confirm-save button is enabled. */
  get canConfirmSave(): boolean {
    return this._saveName.trim().length > 0;
  }

  /** Show the save panel with a timestamped default name. */
  showSavePanel(): string {
    this._savePanelVisible = true;
    this._saveName = defaultSaveName(this.now());
    return this._saveName;
  }

  setSaveName(text: string): void {
    this._saveName = text;
  }

  hideSavePanel(): void {
    this._savePanelVisible = false;
  }

  /**
   * Confirm the save panel.
   *
   * @returns The trimmed save name, or `null` if it is blank (the
   *          panel then stays open).
   */
  confirmSave(): string | null {
    const name = this._saveName.trim();
    if (name.length === 0) {
      console.warn('[SaveLoadPanel] Save file name cannot be empty!');
      return null;
    }
    this.hideSavePanel();
    return name;
  }

  // ── Load panel ──────────────────────────────────────────

  async showLoadPanel(): Promise<void> {
    this._loadPanelVisible = true;
    await this.saves.refresh();
  }

  hideLoadPanel(): void {
    this._loadPanelVisible = false;
    this.saves.clear();
  }

  selectLoadFile(name: string): boolean {
    return this.saves.select(name);
  }

  async deleteSaveFile(name: string): Promise<void> {
    await this.saves.remove(name);
  }

  /**
   * Confirm the load panel.
   *
   * @returns The selected save name, or `null` if nothing is selected
   *          (the panel then stays open).
   */
  confirmLoad(): string | null {
    const name = this.saves.selected;
    if (name === null) {
      console.warn('[SaveLoadPanel] No save file selected to load!');
      return null;
    }
    this.hideLoadPanel();
    return name;
  }
}
