/**
 * UI Module
 *
 * Terminal building blocks shared by games: the screen abstraction,
 * the scene manager, and a bell-based sound player.
 */
export const UI_VERSION = '0.1.0';

export type { Screen } from './Screen';
export { ReadlineScreen } from './Screen';

export type { Scene } from './SceneManager';
export { SceneManager } from './SceneManager';

export { TerminalBellPlayer } from './TerminalBellPlayer';
