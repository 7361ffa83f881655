import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MainMenuScene } from '../../games/memory/scenes/MainMenuScene';
import {
  PREF_GRID_COLUMNS,
  PREF_GRID_ROWS,
  PREF_LOAD_FILE_NAME,
  PREF_LOAD_ON_START,
} from '../../games/memory/PreferenceKeys';
import { FakeCatalog, FakeScreen, MemoryPreferences, silenceConsole } from './helpers';

const GAME_KEY = 'MemoryGameScene';

describe('MainMenuScene', () => {
  let preferences: MemoryPreferences;

  function createScene(screen: FakeScreen, saves: string[] = []): MainMenuScene {
    return new MainMenuScene(screen, {
      saveStore: new FakeCatalog(saves),
      preferences,
      gameSceneKey: GAME_KEY,
    });
  }

  beforeEach(() => {
    silenceConsole();
    preferences = new MemoryPreferences();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the menu', async () => {
    const screen = new FakeScreen(['3']);
    await createScene(screen).run();
    expect(screen.lines).toEqual([
      '',
      '=== MEMORY MATCH ===',
      '  1) New Game',
      '  2) Load Game (no saves)',
      '  3) Quit',
    ]);
  });

  it('quits on 3 or at end of input', async () => {
    expect(await createScene(new FakeScreen(['quit'])).run()).toBeNull();
    expect(await createScene(new FakeScreen([])).run()).toBeNull();
  });

  it('starts a new game at the chosen size', async () => {
    const screen = new FakeScreen(['1', '1']);

    expect(await createScene(screen).run()).toBe(GAME_KEY);
    expect(preferences.getItem(PREF_GRID_COLUMNS)).toBe('2');
    expect(preferences.getItem(PREF_GRID_ROWS)).toBe('2');
    expect(screen.lines).toContain('  1) 2 x 2');
    expect(screen.lines).toContain('  16) 5 x 6');
  });

  it('asks again for a size that is not listed', async () => {
    const screen = new FakeScreen(['new', '0', '17', '3']);

    expect(await createScene(screen).run()).toBe(GAME_KEY);
    expect(screen.lines).toContain('No board size numbered 0.');
    expect(screen.lines).toContain('No board size numbered 17.');
    expect(preferences.getItem(PREF_GRID_COLUMNS)).toBe('2');
    expect(preferences.getItem(PREF_GRID_ROWS)).toBe('4');
  });

  it('goes back to the menu from the size list', async () => {
    const screen = new FakeScreen(['1', '', '3']);
    expect(await createScene(screen).run()).toBeNull();
    expect(screen.lines.filter((l) => l === '=== MEMORY MATCH ===')).toHaveLength(2);
  });

  it('refuses to open the load list without saves', async () => {
    const screen = new FakeScreen(['2', '3']);
    expect(await createScene(screen).run()).toBeNull();
    expect(screen.lines).toContain('No saved games yet.');
  });

  it('requests the chosen save and starts the game', async () => {
    const screen = new FakeScreen(['load', '2']);

    expect(await createScene(screen, ['slot-a', 'slot-b']).run()).toBe(GAME_KEY);
    expect(screen.lines).toContain('  2) Load Game');
    expect(preferences.getItem(PREF_LOAD_ON_START)).toBe('1');
    expect(preferences.getItem(PREF_LOAD_FILE_NAME)).toBe('slot-b');
  });

  it('returns to the menu when the load list is cancelled', async () => {
    const screen = new FakeScreen(['2', '', '3']);
    expect(await createScene(screen, ['slot-a']).run()).toBeNull();
    expect(preferences.getItem(PREF_LOAD_ON_START)).toBeNull();
  });

  it('reports an unknown choice', async () => {
    const screen = new FakeScreen(['9', '3']);
    await createScene(screen).run();
    expect(screen.lines).toContain('Unknown choice: 9');
  });
});
