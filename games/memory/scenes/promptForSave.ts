/**
 * Interactive load list shared by the main menu and the game scene.
 */

import type { Screen } from '../../../src/ui/Screen';
import type { SaveBrowser } from '../SaveBrowser';

const DELETE_PATTERN = /^d(?:elete)?\s+(\d+)$/i;

function entryAt(saves: SaveBrowser, text: string): string | undefined {
  if (!/^\d+$/.test(text)) return undefined;
  const index = Number(text) - 1;
  return index >= 0 ? saves.entries.at(index) : undefined;
}

/**
 * List the saves in `saves` and let the player pick one to load or
 * delete some.
 *
 * @returns The selected save name, or `null` when the player cancels,
 *          input ends, or no saves remain.
 */
export async function promptForSave(
  screen: Screen,
  saves: SaveBrowser,
  deleteSave: (name: string) => Promise<void>,
): Promise<string | null> {
  for (;;) {
    if (saves.isEmpty) {
      screen.print('No save files found.');
      return null;
    }

    saves.entries.forEach((name, i) => screen.print(`  ${i + 1}) ${name}`));
    const answer = await screen.prompt(
      'Load which save? (number, "d <number>" to delete, blank to cancel) ',
    );
    if (answer === null) return null;
    const text = answer.trim();
    if (text === '') return null;

    const deletion = DELETE_PATTERN.exec(text);
    if (deletion) {
      const name = entryAt(saves, deletion[1]);
      if (name === undefined) {
        screen.print(`No save numbered ${deletion[1]}.`);
      } else {
        await deleteSave(name);
        screen.print(`Deleted ${name}.`);
      }
      continue;
    }

    const name = entryAt(saves, text);
    if (name === undefined) {
      screen.print(`No save numbered ${text}.`);
      continue;
    }
    saves.select(name);
    return name;
  }
}
