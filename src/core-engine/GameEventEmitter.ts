/**
 * Typed Event Emitter for the memory-match engine.
 *
 * Provides a type-safe, zero-dependency event emitter. The generic
 * {@link TypedEventEmitter} works over any event map; the
 * {@link GameEventEmitter} specialisation carries the game lifecycle
 * events that the matcher, the game, the sound manager and the
 * terminal scenes exchange.
 */

import type { GamePhase } from './GameState';

// ── Event Payloads ──────────────────────────────────────────

/**
 * Emitted when a card starts turning face-up.
 */
export interface CardFlippedPayload {
  readonly boardIndex: number;
  readonly typeId: number;
}

/**
 * Emitted when the two pending cards share a type id.
 */
export interface PairMatchedPayload {
  /** Board indices of the two cards, in flip order. */
  readonly boardIndices: readonly [number, number];
  readonly typeId: number;
  /** Pairs found so far, including this one. */
  readonly matchesFound: number;
}

/**
 * Emitted when the two pending cards differ.
 */
export interface PairMismatchedPayload {
  /** Board indices of the two cards, in flip order. */
  readonly boardIndices: readonly [number, number];
  readonly typeIds: readonly [number, number];
}

/**
 * Emitted once cards have settled face-up: the two cards of a turn
 * before they are compared, or the whole board during the preview.
 */
export interface CardsRevealedPayload {
  readonly boardIndices: readonly number[];
}

/**
 * Emitted when a flip-two-and-evaluate cycle has finished.
 */
export interface TurnCompletedPayload {
  /** Turns taken so far, including this one. */
  readonly turnsTaken: number;
  /** Whether the turn found a pair. */
  readonly matched: boolean;
  /** Phase after the turn. */
  readonly phase: GamePhase;
}

/** Why interaction was locked or unlocked. */
export type InteractionLockReason = 'preview' | 'evaluating' | 'game-over';

export interface InteractionLockPayload {
  readonly reason: InteractionLockReason;
}

/**
 * Emitted around the start-of-round preview where every card is
 * shown briefly.
 */
export interface PreviewPayload {
  readonly cardCount: number;
}

/**
 * Emitted when a round begins, either freshly dealt or restored.
 */
export interface GameStartedPayload {
  readonly cols: number;
  readonly rows: number;
  readonly source: 'new' | 'load';
}

/**
 * Emitted when every pair has been found.
 */
export interface GameEndedPayload {
  readonly turnsTaken: number;
  readonly matchesFound: number;
}

/**
 * Emitted after a save or load went through.
 */
export interface PersistencePayload {
  readonly saveName: string;
}

// ── Event Map ───────────────────────────────────────────────

/**
 * Maps game event names to their payload types.
 *
 * Subscribing to an event name not in this map produces a
 * compile-time TypeScript error.
 */
export interface GameEventMap {
  'card-flipped': CardFlippedPayload;
  'cards-revealed': CardsRevealedPayload;
  'pair-matched': PairMatchedPayload;
  'pair-mismatched': PairMismatchedPayload;
  'turn-completed': TurnCompletedPayload;
  'interaction-locked': InteractionLockPayload;
  'interaction-unlocked': InteractionLockPayload;
  'preview-started': PreviewPayload;
  'preview-ended': PreviewPayload;
  'game-started': GameStartedPayload;
  'game-ended': GameEndedPayload;
  'game-saved': PersistencePayload;
  'game-loaded': PersistencePayload;
}

/** Union of all valid game event names. */
export type GameEventName = keyof GameEventMap;

/** Every game event name, in lifecycle order. */
export const GAME_EVENT_NAMES: readonly GameEventName[] = [
  'game-started',
  'preview-started',
  'preview-ended',
  'interaction-locked',
  'interaction-unlocked',
  'card-flipped',
  'cards-revealed',
  'pair-matched',
  'pair-mismatched',
  'turn-completed',
  'game-ended',
  'game-saved',
  'game-loaded',
];

// ── Listener types ──────────────────────────────────────────

/** A callback for a specific event of map `M`. */
export type EventListener<M, K extends keyof M> = (payload: M[K]) => void;

/** A callback for a specific game event. */
export type GameEventListener<K extends GameEventName> = EventListener<
  GameEventMap,
  K
>;

// ── Emitter ─────────────────────────────────────────────────

/**
 * A minimal, typed event emitter over an event map `M`.
 *
 * Usage:
 * ```ts
 * interface TimerEvents { tick: number }
 * const emitter = new TypedEventEmitter<TimerEvents>();
 * emitter.on('tick', (ms) => console.log(`Elapsed ${ms}ms`));
 * emitter.emit('tick', 250);
 * ```
 */
export class TypedEventEmitter<M> {
  private listeners: {
    [K in keyof M]?: Array<EventListener<M, K>>;
  } = {};

  /**
   * Subscribe to an event. Returns an unsubscribe function.
   */
  on<K extends keyof M>(event: K, listener: EventListener<M, K>): () => void {
    let list = this.listeners[event];
    if (!list) {
      list = [];
      this.listeners[event] = list;
    }
    list.push(listener);

    return () => this.off(event, listener);
  }

  /**
   * Subscribe to an event for a single emission only.
   * Returns an unsubscribe function (in case you want to
   * cancel before it fires).
   */
  once<K extends keyof M>(event: K, listener: EventListener<M, K>): () => void {
    const wrapper: EventListener<M, K> = (payload) => {
      this.off(event, wrapper);
      listener(payload);
    };

    return this.on(event, wrapper);
  }

  /**
   * Remove a specific listener for an event.
   */
  off<K extends keyof M>(event: K, listener: EventListener<M, K>): void {
    const list = this.listeners[event];
    if (!list) return;

    const index = list.indexOf(listener);
    if (index !== -1) {
      list.splice(index, 1);
    }
  }

  /**
   * Emit an event with the given payload.
   * Listeners are called synchronously in registration order.
   */
  emit<K extends keyof M>(event: K, payload: M[K]): void {
    const list = this.listeners[event];
    if (!list || list.length === 0) return;

    // Copy the array so listeners can safely unsubscribe during emission
    const snapshot = [...list];
    for (const fn of snapshot) {
      fn(payload);
    }
  }

  /**
   * Remove all listeners, optionally for a specific event only.
   */
  removeAllListeners(event?: keyof M): void {
    if (event !== undefined) {
      delete this.listeners[event];
    } else {
      this.listeners = {};
    }
  }

  /**
   * Return the number of listeners for a given event.
   */
  listenerCount(event: keyof M): number {
    const list = this.listeners[event];
    return list ? list.length : 0;
  }
}

/**
 * Emitter for the memory-match game lifecycle events.
 */
export class GameEventEmitter extends TypedEventEmitter<GameEventMap> {}
