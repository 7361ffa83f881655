/**
 * Preference keys shared by the main menu and the game scene.
 *
 * The menu writes these before switching scenes; the game reads
 * (and clears the load keys) when it starts.
 */

/** Board width chosen on the board-size panel. */
export const PREF_GRID_COLUMNS = 'GridColumns';

/** Board height chosen on the board-size panel. */
export const PREF_GRID_ROWS = 'GridRows';

/** `1` when the game should open a save instead of dealing a new board. */
export const PREF_LOAD_ON_START = 'LoadGameOnStart';

/** Save name to open when {@link PREF_LOAD_ON_START} is set. */
export const PREF_LOAD_FILE_NAME = 'LoadFileName';

/**
 * The subset of {@link PreferencesStore} the game flow uses.
 */
export interface GamePreferences {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
  getInt(key: string, fallback: number): number;
  setInt(key: string, value: number): void;
}
