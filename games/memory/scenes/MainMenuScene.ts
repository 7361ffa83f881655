/**
 * MainMenuScene -- text front end for the {@link MainMenu} model.
 *
 *   1) New Game   -> board-size list -> game scene
 *   2) Load Game  -> save list       -> game scene (opens that save)
 *   3) Quit
 */

import type { Scene } from '../../../src/ui/SceneManager';
import type { Screen } from '../../../src/ui/Screen';
import type { GamePreferences } from '../PreferenceKeys';
import { MainMenu } from '../MainMenu';
import type { MenuNavigation } from '../MainMenu';
import type { SaveCatalog } from '../SaveBrowser';
import { promptForSave } from './promptForSave';

export const MAIN_MENU_SCENE_KEY = 'MainMenuScene';

export interface MainMenuSceneOptions {
  saveStore: SaveCatalog;
  preferences: GamePreferences;
  /** Key of the scene to switch to when a game should start. */
  gameSceneKey: string;
}

export class MainMenuScene implements Scene {
  readonly key = MAIN_MENU_SCENE_KEY;
  private readonly menu: MainMenu;
  private readonly gameSceneKey: string;

  constructor(
    private readonly screen: Screen,
    options: MainMenuSceneOptions,
  ) {
    this.menu = new MainMenu(options.saveStore, options.preferences);
    this.gameSceneKey = options.gameSceneKey;
  }

  async run(): Promise<string | null> {
    await this.menu.open();

    for (;;) {
      this.printMenu();
      const answer = await this.screen.prompt('> ');
      if (answer === null) return this.navigate(this.menu.quit());

      const choice = answer.trim().toLowerCase();
      let navigation: MenuNavigation | null = null;
      switch (choice) {
        case '1':
        case 'new':
          navigation = await this.chooseBoardSize();
          break;
        case '2':
        case 'load':
          navigation = await this.chooseSave();
          break;
        case '3':
        case 'quit':
          navigation = this.menu.quit();
          break;
        case '':
          break;
        default:
          this.screen.print(`Unknown choice: ${choice}`);
      }
      if (navigation !== null) return this.navigate(navigation);
    }
  }

  private navigate(navigation: MenuNavigation): string | null {
    return navigation === 'start-game' ? this.gameSceneKey : null;
  }

  private printMenu(): void {
    this.screen.print('');
    this.screen.print('=== MEMORY MATCH ===');
    this.screen.print('  1) New Game');
    this.screen.print(this.menu.loadEnabled ? '  2) Load Game' : '  2) Load Game (no saves)');
    this.screen.print('  3) Quit');
  }

  private async chooseBoardSize(): Promise<MenuNavigation | null> {
    const options = this.menu.newGame();
    options.forEach((option, i) => this.screen.print(`  ${i + 1}) ${option.label}`));

    for (;;) {
      const answer = await this.screen.prompt('Board size (number, blank to go back) ');
      const text = answer?.trim() ?? '';
      if (text === '') {
        this.menu.closeBoardSizePanel();
        return null;
      }
      const option = /^\d+$/.test(text) ? options.at(Number(text) - 1) : undefined;
      if (option === undefined || Number(text) < 1) {
        this.screen.print(`No board size numbered ${text}.`);
        continue;
      }
      return this.menu.selectBoardSize(option.size);
    }
  }

  private async chooseSave(): Promise<MenuNavigation | null> {
    if (!this.menu.loadEnabled) {
      this.screen.print('No saved games yet.');
      return null;
    }

    await this.menu.showLoadPanel();
    const name = await promptForSave(this.screen, this.menu.saves, (n) =>
      this.menu.deleteSaveFile(n),
    );
    if (name === null) {
      await this.menu.hideLoadPanel();
      return null;
    }
    return this.menu.confirmLoad();
  }
}
