/**
 * Memory Match -- terminal entry point.
 *
 * Saves and preferences live under the data directory, taken from
 * MEMORY_MATCH_DATA_DIR or defaulting to ~/.memory-match.
 */
import { homedir } from 'node:os';
import { join } from 'node:path';
import { createMemoryGame } from './games/memory/createMemoryGame';
import { errorMessage } from './src/core-engine/errors';
import { ReadlineScreen } from './src/ui/Screen';
import { TerminalBellPlayer } from './src/ui/TerminalBellPlayer';

const dataDir = process.env.MEMORY_MATCH_DATA_DIR || join(homedir(), '.memory-match');

const screen = new ReadlineScreen(process.stdin, process.stdout);
const app = createMemoryGame({
  dataDir,
  screen,
  player: new TerminalBellPlayer(process.stdout),
});

void app
  .run()
  .catch((e: unknown) => {
    console.error(`[main] ${errorMessage(e)}`);
    process.exitCode = 1;
  })
  .finally(() => screen.close());
