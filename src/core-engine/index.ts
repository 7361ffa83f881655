/**
 * Core Engine Module
 *
 * Provides foundational framework functionalities: round state and
 * turn sequencing, the typed event system, timed delays, sound,
 * preferences, and saved-game persistence.
 */
export const ENGINE_VERSION = '0.1.0';

// Game state types and factory
export type { GamePhase, GameState, GameStateOptions } from './GameState';
export { createGameState } from './GameState';

// Turn sequencer functions
export {
  isGameOver,
  isPlaying,
  allPairsFound,
  completeTurn,
  recordMatch,
  transitionTo,
  startGame,
  endGame,
} from './TurnSequencer';

// Error helpers
export { errorMessage } from './errors';

// Game event system
export type {
  CardFlippedPayload,
  CardsRevealedPayload,
  PairMatchedPayload,
  PairMismatchedPayload,
  TurnCompletedPayload,
  InteractionLockReason,
  InteractionLockPayload,
  PreviewPayload,
  GameStartedPayload,
  GameEndedPayload,
  PersistencePayload,
  GameEventMap,
  GameEventName,
  EventListener,
  GameEventListener,
} from './GameEventEmitter';
export { GAME_EVENT_NAMES, TypedEventEmitter, GameEventEmitter } from './GameEventEmitter';

// Timed delays
export type { Scheduler } from './Scheduler';
export { timerScheduler } from './Scheduler';

// Sound management
export type {
  SoundPlayer,
  MemorySound,
  EventSoundMapping,
  StorageLike,
  SoundManagerOptions,
} from './SoundManager';
export {
  SoundManager,
  DEFAULT_EVENT_SOUNDS,
  SOUND_FLIP,
  SOUND_MATCH,
  SOUND_MISMATCH,
  SOUND_GAME_OVER,
} from './SoundManager';

// Preferences
export type { PreferencesStoreOptions } from './PreferencesStore';
export { PreferencesStore } from './PreferencesStore';

// Saved-game persistence
export type { SavedGameState, SaveGameStoreOptions } from './SaveGameStore';
export {
  SaveGameStore,
  SAVE_FILE_EXTENSION,
  sanitizeSaveName,
  parseSavedGameState,
} from './SaveGameStore';
