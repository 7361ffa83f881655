/**
 * Screen -- the text surface scenes draw to and read commands from.
 *
 * Scenes only see the {@link Screen} interface; the app binds it to the
 * process's stdin/stdout through {@link ReadlineScreen}, and tests use
 * an in-memory fake.
 */
import { createInterface } from 'node:readline';
import type { Interface } from 'node:readline';

export interface Screen {
  /** Write one line of output. */
  print(line: string): void;
  /**
   * Show `question` and wait for the next line of input.
   * Resolves `null` once input has ended.
   */
  prompt(question: string): Promise<string | null>;
  /** Release the underlying input. */
  close(): void;
}

/**
 * Line-oriented {@link Screen} over a readable and a writable stream.
 *
 * Lines that arrive while no prompt is waiting are queued, so piped
 * input is consumed in order.
 */
export class ReadlineScreen implements Screen {
  private readonly rl: Interface;
  private readonly queued: string[] = [];
  private waiting: ((line: string | null) => void) | null = null;
  private ended = false;

  constructor(
    input: NodeJS.ReadableStream,
    private readonly output: NodeJS.WritableStream,
  ) {
    this.rl = createInterface({ input, terminal: false });
    this.rl.on('line', (line) => this.deliver(line));
    this.rl.on('close', () => {
      this.ended = true;
      this.deliver(null);
    });
  }

  print(line: string): void {
    this.output.write(`${line}\n`);
  }

  prompt(question: string): Promise<string | null> {
    this.output.write(question);
    const next = this.queued.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.ended) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  close(): void {
    this.rl.close();
  }

  private deliver(line: string | null): void {
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = null;
      waiting(line);
    } else if (line !== null) {
      this.queued.push(line);
    }
  }
}
