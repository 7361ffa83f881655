/**
 * TerminalBellPlayer -- a {@link SoundPlayer} that rings the terminal
 * bell for every sound.
 */
import type { MemorySound, SoundPlayer } from '../core-engine/SoundManager';

const BELL = '\u0007';

export class TerminalBellPlayer implements SoundPlayer {
  private muted = false;

  constructor(private readonly output: NodeJS.WritableStream) {}

  // Every sound is the same bell.
  play(_sound: MemorySound): void {
    if (this.muted) return;
    this.output.write(BELL);
  }

  setMute(muted: boolean): void {
    this.muted = muted;
  }
}
