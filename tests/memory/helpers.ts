/**
 * Shared fakes for the memory game tests.
 */
import { vi } from 'vitest';
import type { CardState } from '../../src/card-system/Card';
import type { Scheduler } from '../../src/core-engine/Scheduler';
import type { SoundPlayer } from '../../src/core-engine/SoundManager';
import type { Screen } from '../../src/ui/Screen';
import { MemoryBoard } from '../../games/memory/MemoryBoard';
import type { GridSize } from '../../games/memory/MemoryBoard';
import type { GamePreferences } from '../../games/memory/PreferenceKeys';
import type { SaveCatalog } from '../../games/memory/SaveBrowser';

// Deterministic RNG for testing (simple LCG)
export function createTestRng(seed: number = 42): () => number {
  let s = seed;
  return () => {
    s = (s * 1664525 + 1013904223) % 4294967296;
    return s / 4294967296;
  };
}

/** Scheduler whose delays resolve on the next microtask. */
export const immediateScheduler: Scheduler = {
  delay: () => Promise.resolve(),
};

/** Silence the tagged console output of the code under test. */
export function silenceConsole(): void {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
}

/** Card states for a board laid out with the given type ids. */
export function cardStates(typeIds: number[], matched: number[] = []): CardState[] {
  return typeIds.map((typeId, boardIndex) => ({
    boardIndex,
    typeId,
    isMatched: matched.includes(boardIndex),
  }));
}

/** A board with a known layout. */
export function boardOf(gridSize: GridSize, typeIds: number[], matched: number[] = []): MemoryBoard {
  const board = MemoryBoard.fromCardStates(gridSize, cardStates(typeIds, matched));
  if (!board) throw new Error('Test layout does not fit the grid');
  return board;
}

/** Indices of two unmatched cards sharing a face. */
export function findPair(board: MemoryBoard): [number, number] {
  const cards = board.allCards().filter((c) => !c.isMatched);
  for (const a of cards) {
    const b = cards.find((c) => c !== a && c.typeId === a.typeId);
    if (b) return [a.boardIndex, b.boardIndex];
  }
  throw new Error('No unmatched pair left');
}

/** Indices of two unmatched cards with different faces. */
export function findMismatch(board: MemoryBoard): [number, number] {
  const cards = board.allCards().filter((c) => !c.isMatched);
  for (const a of cards) {
    const b = cards.find((c) => c.typeId !== a.typeId);
    if (b) return [a.boardIndex, b.boardIndex];
  }
  throw new Error('No mismatched pair left');
}

/** In-memory preferences. */
export class MemoryPreferences implements GamePreferences {
  readonly values = new Map<string, string>();

  getItem(key: string): string | null {
    return this.values.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.values.set(key, value);
  }

  removeItem(key: string): void {
    this.values.delete(key);
  }

  getInt(key: string, fallback: number): number {
    const parsed = Number(this.getItem(key) ?? Number.NaN);
    return Number.isInteger(parsed) ? parsed : fallback;
  }

  setInt(key: string, value: number): void {
    this.setItem(key, String(value));
  }
}

/** In-memory list of save names. */
export class FakeCatalog implements SaveCatalog {
  readonly names: string[];

  constructor(names: string[] = []) {
    this.names = [...names];
  }

  async list(): Promise<string[]> {
    return [...this.names].sort();
  }

  async delete(name: string): Promise<void> {
    const index = this.names.indexOf(name);
    if (index !== -1) this.names.splice(index, 1);
  }
}

/** Screen fed from a fixed list of answers; `null` once they run out. */
export class FakeScreen implements Screen {
  readonly lines: string[] = [];
  readonly prompts: string[] = [];
  closed = false;

  constructor(private readonly answers: string[]) {}

  print(line: string): void {
    this.lines.push(line);
  }

  async prompt(question: string): Promise<string | null> {
    this.prompts.push(question);
    return this.answers.shift() ?? null;
  }

  close(): void {
    this.closed = true;
  }
}

export function createMockPlayer(): SoundPlayer {
  return {
    play: vi.fn(),
    setMute: vi.fn(),
  };
}
