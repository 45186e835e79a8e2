import { createInterface } from 'node:readline';
import type { Interface } from 'node:readline';
import type { DecisionSource } from '../games/blackjack/types.js';
import { InputClosedError } from '../util/errors.js';

export const DECISION_QUESTION = 'Do you want to (h)it or (s)tand? ';
export const PLAY_AGAIN_QUESTION = '\nDo you want to play again? (y/n): ';

type Waiter = { resolve: (line: string) => void; reject: (err: Error) => void };

/**
 * Line-oriented prompt over a readable stream. Lines that arrive before a
 * question is asked are queued, so piped input is answered in order. Once the
 * input ends, pending and later questions reject with InputClosedError.
 */
export class TerminalPrompt implements DecisionSource {
  private readonly rl: Interface;
  private readonly output: NodeJS.WritableStream;
  private readonly queued: string[] = [];
  private waiter: Waiter | null = null;
  private ended = false;

  constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
    this.output = output;
    this.rl = createInterface({ input, terminal: false });
    this.rl.on('line', (line) => this.receive(line));
    this.rl.once('close', () => this.end());
  }

  async ask(question: string): Promise<string> {
    this.output.write(question);
    const next = this.queued.shift();
    if (next !== undefined) return next.trim();
    if (this.ended) throw new InputClosedError();
    const line = await new Promise<string>((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
    return line.trim();
  }

  decide(): Promise<string> {
    return this.ask(DECISION_QUESTION);
  }

  async playAgain(): Promise<boolean> {
    const answer = await this.ask(PLAY_AGAIN_QUESTION);
    return answer.toLowerCase() === 'y';
  }

  close(): void {
    this.rl.close();
  }

  private receive(line: string): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter.resolve(line);
    } else {
      this.queued.push(line);
    }
  }

  private end(): void {
    this.ended = true;
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.reject(new InputClosedError());
  }
}
