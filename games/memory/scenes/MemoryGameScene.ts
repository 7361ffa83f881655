/**
 * MemoryGameScene -- plays one memory game in the terminal.
 *
 * Renders the board and HUD after every command and reports game
 * events as they happen. Commands:
 *
 *   flip <row> <col>  (or just `<row> <col>`)
 *   save [name] | load | restart | mute | menu | help | quit
 */

import type { SaveGameStore } from '../../../src/core-engine/SaveGameStore';
import type { SoundManager } from '../../../src/core-engine/SoundManager';
import type { Scene } from '../../../src/ui/SceneManager';
import type { Screen } from '../../../src/ui/Screen';
import type { MemoryGameOptions } from '../MemoryGame';
import { MemoryGame } from '../MemoryGame';
import type { GamePreferences } from '../PreferenceKeys';
import { SaveLoadPanel } from '../SaveLoadPanel';
import { renderBoard, renderHud } from './BoardView';
import { promptForSave } from './promptForSave';

export const MEMORY_GAME_SCENE_KEY = 'MemoryGameScene';

const HELP_LINES: readonly string[] = [
  'Commands:',
  '  flip <row> <col>   turn a card over (or just "<row> <col>")',
  '  save [name]        save the game',
  '  load               load a saved game',
  '  restart            deal a new board of the same size',
  '  mute               toggle sound',
  '  menu               back to the main menu',
  '  quit               leave the game',
];

const FLIP_PATTERN = /^(?:flip\s+)?(\d+)\s+(\d+)$/i;

export interface MemoryGameSceneOptions {
  saveStore: SaveGameStore;
  preferences: GamePreferences;
  sound: SoundManager;
  /** Key of the scene `menu` returns to. */
  menuSceneKey: string;
  /** Scheduler, timings and RNG passed to each game. */
  gameOptions?: Pick<MemoryGameOptions, 'scheduler' | 'timings' | 'rng'>;
  /** Clock for the default save name. */
  now?: () => Date;
}

/** What to do after a command: stay, or leave for a scene (`null` quits). */
type CommandOutcome = { leave: false } | { leave: true; next: string | null };

const STAY: CommandOutcome = { leave: false };

export class MemoryGameScene implements Scene {
  readonly key = MEMORY_GAME_SCENE_KEY;

  constructor(
    private readonly screen: Screen,
    private readonly options: MemoryGameSceneOptions,
  ) {}

  async run(): Promise<string | null> {
    const { saveStore, preferences, sound } = this.options;
    const game = new MemoryGame({ saveStore, preferences, ...this.options.gameOptions });
    const panel = new SaveLoadPanel(saveStore, this.options.now);
    const unsubs = this.reportEvents(game);
    const detachSound = sound.attach(game.events);

    try {
      await game.start();

      for (;;) {
        this.printGame(game);
        const answer = await this.screen.prompt('> ');
        if (answer === null) return null;
        const outcome = await this.execute(answer.trim(), game, panel);
        if (outcome.leave) return outcome.next;
      }
    } finally {
      game.stop();
      detachSound();
      for (const unsub of unsubs) unsub();
    }
  }

  // ── Output ──────────────────────────────────────────────

  private printGame(game: MemoryGame): void {
    const board = game.currentBoard;
    if (!board) return;
    this.screen.print('');
    for (const line of renderBoard(board)) this.screen.print(line);
    this.screen.print(renderHud(game).join('   '));
  }

  private reportEvents(game: MemoryGame): Array<() => void> {
    const events = game.events;
    return [
      events.on('preview-started', () => this.screen.print('Memorise the cards...')),
      // Redraw while the revealed cards are still face-up.
      events.on('cards-revealed', () => this.printGame(game)),
      events.on('pair-matched', () => this.screen.print('Match!')),
      events.on('pair-mismatched', () => this.screen.print('No match.')),
      events.on('turn-completed', ({ turnsTaken, phase }) => {
        if (phase === 'playing') this.screen.print(`Turn ${turnsTaken} done. Pick the next card.`);
      }),
      events.on('game-ended', ({ turnsTaken }) =>
        this.screen.print(`All pairs found in ${turnsTaken} turns!`),
      ),
      events.on('game-saved', ({ saveName }) => this.screen.print(`Saved as ${saveName}.`)),
      events.on('game-loaded', ({ saveName }) => this.screen.print(`Loaded ${saveName}.`)),
    ];
  }

  // ── Commands ────────────────────────────────────────────

  private async execute(
    command: string,
    game: MemoryGame,
    panel: SaveLoadPanel,
  ): Promise<CommandOutcome> {
    const flip = FLIP_PATTERN.exec(command);
    if (flip) {
      await this.flip(game, Number(flip[1]), Number(flip[2]));
      return STAY;
    }

    const [verb, ...rest] = command.split(/\s+/);
    switch (verb.toLowerCase()) {
      case '':
        return STAY;
      case 'save':
        return this.save(game, panel, rest.join(' '));
      case 'load':
        return this.load(game, panel);
      case 'restart':
        await game.restart();
        return STAY;
      case 'mute':
        this.screen.print(this.options.sound.toggleMute() ? 'Sound off.' : 'Sound on.');
        return STAY;
      case 'help':
        for (const line of HELP_LINES) this.screen.print(line);
        return STAY;
      case 'menu':
        return { leave: true, next: this.options.menuSceneKey };
      case 'quit':
        return { leave: true, next: null };
      default:
        this.screen.print(`Unknown command: ${verb}. Type "help" for commands.`);
        return STAY;
    }
  }

  private async flip(game: MemoryGame, row: number, col: number): Promise<void> {
    const board = game.currentBoard;
    if (!board) return;
    const { cols, rows } = board.gridSize;
    if (row < 1 || row > rows || col < 1 || col > cols) {
      this.screen.print(`No cell at row ${row}, column ${col}.`);
      return;
    }
    if (game.phase === 'ended') {
      this.screen.print('The game is over. Type "restart" to play again.');
      return;
    }
    await game.flipCard(board.indexOf(row - 1, col - 1));
  }

  private async save(
    game: MemoryGame,
    panel: SaveLoadPanel,
    typedName: string,
  ): Promise<CommandOutcome> {
    const suggested = panel.showSavePanel();
    let name = typedName;
    if (name.trim() === '') {
      const answer = await this.screen.prompt(`Save name (blank for ${suggested}) `);
      if (answer === null) {
        panel.hideSavePanel();
        return { leave: true, next: null };
      }
      name = answer.trim() === '' ? suggested : answer;
    }

    panel.setSaveName(name);
    const confirmed = panel.confirmSave();
    if (confirmed === null) {
      panel.hideSavePanel();
      return STAY;
    }
    if (!(await game.saveGame(confirmed))) {
      this.screen.print('The game could not be saved.');
    }
    return STAY;
  }

  private async load(game: MemoryGame, panel: SaveLoadPanel): Promise<CommandOutcome> {
    await panel.showLoadPanel();
    const name = await promptForSave(this.screen, panel.saves, (n) => panel.deleteSaveFile(n));
    if (name === null) {
      panel.hideLoadPanel();
      return STAY;
    }

    const confirmed = panel.confirmLoad();
    if (confirmed !== null && !(await game.loadGame(confirmed))) {
      this.screen.print(`Could not load ${confirmed}.`);
    }
    return STAY;
  }
}
