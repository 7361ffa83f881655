/**
 * PreferencesStore -- small key/value store persisted as one JSON file.
 *
 * Holds player preferences (sound settings, last chosen board size)
 * and the hand-off keys the main menu leaves for the game scene.
 * Implements {@link StorageLike} so it can back the SoundManager.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { StorageLike } from './SoundManager';

export interface PreferencesStoreOptions {
  /** Path of the JSON file holding the preferences. */
  filePath: string;
}

function isStringRecord(value: unknown): value is Record<string, string> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every((v) => typeof v === 'string');
}

export class PreferencesStore implements StorageLike {
  readonly filePath: string;
  private values: Record<string, string>;

  constructor(options: PreferencesStoreOptions) {
    this.filePath = options.filePath;
    this.values = this.read();
  }

  getItem(key: string): string | null {
    return Object.prototype.hasOwnProperty.call(this.values, key)
      ? this.values[key]
      : null;
  }

  setItem(key: string, value: string): void {
    this.values[key] = value;
    this.write();
  }

  removeItem(key: string): void {
    if (!Object.prototype.hasOwnProperty.call(this.values, key)) return;
    delete this.values[key];
    this.write();
  }

  /**
   * Read an integer preference, or `fallback` when it is missing
   * or not an integer.
   */
  getInt(key: string, fallback: number): number {
    const raw = this.getItem(key);
    if (raw === null) return fallback;
    const parsed = Number(raw);
    return Number.isInteger(parsed) ? parsed : fallback;
  }

  setInt(key: string, value: number): void {
    this.setItem(key, String(Math.trunc(value)));
  }

  private read(): Record<string, string> {
    if (!existsSync(this.filePath)) return {};

    try {
      const parsed: unknown = JSON.parse(readFileSync(this.filePath, 'utf-8'));
      if (isStringRecord(parsed)) return { ...parsed };
      console.warn(
        `[PreferencesStore] Ignoring malformed preferences file: ${this.filePath}`,
      );
    } catch (e) {
      console.warn(
        `[PreferencesStore] Could not read preferences from ${this.filePath}:`,
        e,
      );
    }
    return {};
  }

  private write(): void {
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(this.filePath, JSON.stringify(this.values, null, 2) + '\n');
    } catch (e) {
      console.error(
        `[PreferencesStore] Failed to write preferences to ${this.filePath}:`,
        e,
      );
    }
  }
}
