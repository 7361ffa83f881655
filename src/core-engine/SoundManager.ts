/**
 * SoundManager -- plays the memory game's four sounds in response to
 * game events.
 *
 * The audio backend is a {@link SoundPlayer} (the terminal bell in the
 * app, a mock in tests). The mute setting survives restarts through a
 * {@link StorageLike}.
 */

import { GAME_EVENT_NAMES } from './GameEventEmitter';
import type { GameEventEmitter, GameEventName } from './GameEventEmitter';

const STORAGE_KEY_MUTE = 'memory-sound-muted';

/** Audio backend the manager drives. */
export interface SoundPlayer {
  play(sound: MemorySound): void;
  setMute(muted: boolean): void;
}

export const SOUND_FLIP = 'flip';
export const SOUND_MATCH = 'match';
export const SOUND_MISMATCH = 'mismatch';
export const SOUND_GAME_OVER = 'game-over';

export type MemorySound =
  | typeof SOUND_FLIP
  | typeof SOUND_MATCH
  | typeof SOUND_MISMATCH
  | typeof SOUND_GAME_OVER;

/** Which sound, if any, each game event plays. */
export type EventSoundMapping = Partial<Record<GameEventName, MemorySound>>;

export const DEFAULT_EVENT_SOUNDS: EventSoundMapping = {
  'card-flipped': SOUND_FLIP,
  'pair-matched': SOUND_MATCH,
  'pair-mismatched': SOUND_MISMATCH,
  'game-ended': SOUND_GAME_OVER,
};

/** The slice of the Storage API the manager persists through. */
export interface StorageLike {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
}

export interface SoundManagerOptions {
  /** Where the mute setting is kept; `null` keeps it in memory only. */
  storage?: StorageLike | null;
  /** Event-to-sound wiring used by {@link SoundManager.attach}. */
  mapping?: EventSoundMapping;
}

export class SoundManager {
  private readonly storage: StorageLike | null;
  private readonly mapping: EventSoundMapping;
  private _muted: boolean;

  constructor(
    private readonly player: SoundPlayer,
    options: SoundManagerOptions = {},
  ) {
    this.storage = options.storage ?? null;
    this.mapping = options.mapping ?? DEFAULT_EVENT_SOUNDS;
    this._muted = this.storage?.getItem(STORAGE_KEY_MUTE) === 'true';
    this.player.setMute(this._muted);
  }

  get muted(): boolean {
    return this._muted;
  }

  /** Flip the mute setting and persist it. Returns the new setting. */
  toggleMute(): boolean {
    this._muted = !this._muted;
    this.player.setMute(this._muted);
    try {
      this.storage?.setItem(STORAGE_KEY_MUTE, String(this._muted));
    } catch (e) {
      console.warn('[SoundManager] Could not persist the mute setting:', e);
    }
    return this._muted;
  }

  play(sound: MemorySound): void {
    if (this._muted) return;
    this.player.play(sound);
  }

  /**
   * Play the mapped sound whenever one of the game's events fires.
   *
   * @returns A function that detaches every listener added here.
   */
  attach(events: GameEventEmitter): () => void {
    const unsubs: Array<() => void> = [];
    for (const event of GAME_EVENT_NAMES) {
      const sound = this.mapping[event];
      if (sound === undefined) continue;
      unsubs.push(events.on(event, () => this.play(sound)));
    }
    return () => {
      for (const unsub of unsubs.splice(0)) unsub();
    };
  }
}
