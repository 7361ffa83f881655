/**
 * Factory that wires the memory game's stores, sound and scenes into a
 * {@link SceneManager}. Used by main.ts and the scene tests.
 */
import { join } from 'node:path';
import { PreferencesStore } from '../../src/core-engine/PreferencesStore';
import { SaveGameStore } from '../../src/core-engine/SaveGameStore';
import type { SoundPlayer } from '../../src/core-engine/SoundManager';
import { SoundManager } from '../../src/core-engine/SoundManager';
import { SceneManager } from '../../src/ui/SceneManager';
import type { Screen } from '../../src/ui/Screen';
import type { MemoryGameOptions } from './MemoryGame';
import { MAIN_MENU_SCENE_KEY, MainMenuScene } from './scenes/MainMenuScene';
import { MEMORY_GAME_SCENE_KEY, MemoryGameScene } from './scenes/MemoryGameScene';

/** Directory under the data directory holding the saves. */
export const SAVE_DIRECTORY_NAME = 'SaveGames';

/** Preferences file under the data directory. */
export const PREFERENCES_FILE_NAME = 'prefs.json';

export interface MemoryAppOptions {
  /** Root directory for saves and preferences. */
  dataDir: string;
  screen: Screen;
  /** Audio backend for the game's sounds. */
  player: SoundPlayer;
  /** Scheduler, timings and RNG for each game. */
  gameOptions?: Pick<MemoryGameOptions, 'scheduler' | 'timings' | 'rng'>;
  /** Clock for default save names. */
  now?: () => Date;
}

export interface MemoryApp {
  readonly scenes: SceneManager;
  readonly saveStore: SaveGameStore;
  readonly preferences: PreferencesStore;
  readonly sound: SoundManager;
  /** Run from the main menu until the player quits. */
  run(): Promise<void>;
}

export function createMemoryGame(options: MemoryAppOptions): MemoryApp {
  const { dataDir, screen } = options;

  const preferences = new PreferencesStore({ filePath: join(dataDir, PREFERENCES_FILE_NAME) });
  const saveStore = new SaveGameStore({ directory: join(dataDir, SAVE_DIRECTORY_NAME) });

  const sound = new SoundManager(options.player, { storage: preferences });

  const scenes = new SceneManager();
  scenes.register(
    new MainMenuScene(screen, {
      saveStore,
      preferences,
      gameSceneKey: MEMORY_GAME_SCENE_KEY,
    }),
  );
  scenes.register(
    new MemoryGameScene(screen, {
      saveStore,
      preferences,
      sound,
      menuSceneKey: MAIN_MENU_SCENE_KEY,
      gameOptions: options.gameOptions,
      now: options.now,
    }),
  );

  return {
    scenes,
    saveStore,
    preferences,
    sound,
    run: () => scenes.start(MAIN_MENU_SCENE_KEY),
  };
}
