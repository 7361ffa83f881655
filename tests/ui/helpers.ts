import { Writable } from 'node:stream';

/** Writable that keeps everything written to it. */
export class OutputCollector extends Writable {
  text = '';

  override _write(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    this.text += chunk.toString();
    callback();
  }
}

/** Let pending stream events run. */
export function flushStreams(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
