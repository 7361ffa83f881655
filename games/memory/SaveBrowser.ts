/**
 * SaveBrowser -- model of the load panel's list of saves.
 *
 * Shared by the main menu and the in-game save/load panel: it lists
 * the saves, tracks the selected entry, and deletes entries. Loading
 * can be confirmed only while an entry is selected.
 */

/** The part of the saved-game store the browser needs. */
export interface SaveCatalog {
  list(): Promise<string[]>;
  delete(name: string): Promise<void>;
}

export class SaveBrowser {
  private _entries: string[] = [];
  private _selected = '';

  constructor(private readonly catalog: SaveCatalog) {}

  /** Save names currently listed, sorted. */
  get entries(): readonly string[] {
    return this._entries;
  }

  /** Whether the "no saves found" message should show. */
  get isEmpty(): boolean {
    return this._entries.length === 0;
  }

  /** The selected save name, or `null`. */
  get selected(): string | null {
    return this._selected === '' ? null : this._selected;
  }

  /** Whether the load button is enabled. */
  get canConfirm(): boolean {
    return this._selected !== '';
  }

  isSelected(name: string): boolean {
    return this._selected !== '' && this._selected === name;
  }

  /** Re-read the list of saves and clear the selection. */
  async refresh(): Promise<void> {
    this._entries = await this.catalog.list();
    this._selected = '';
  }

  /**
   * Select a listed save.
   *
   * @returns `false` if `name` is not in the list.
   */
  select(name: string): boolean {
    if (!this._entries.includes(name)) {
      console.warn(`[SaveBrowser] No save named '${name}' is listed.`);
      return false;
    }
    this._selected = name;
    console.log(`[SaveBrowser] Selected save file: ${name}`);
    return true;
  }

  /** Delete a save, then refresh the list. */
  async remove(name: string): Promise<void> {
    console.log(`[SaveBrowser] Deleting save file: ${name}`);
    await this.catalog.delete(name);
    await this.refresh();
  }

  /** Drop the listed entries and the selection. */
  clear(): void {
    this._entries = [];
    this._selected = '';
  }
}
