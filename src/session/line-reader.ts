/**
 * Line Reader
 *
 * Blocking line input for the prompt loop and for confirmations.
 */

import * as readline from 'node:readline/promises';

export interface LineReader {
  /** Resolves with the typed line, or null once input has ended */
  question(prompt: string): Promise<string | null>;
  close(): void;
}

export class TerminalLineReader implements LineReader {
  private rl: readline.Interface;
  private closed = false;
  private whenClosed: Promise<null>;

  constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
    this.rl = readline.createInterface({ input, output });
    this.whenClosed = new Promise((resolve) => {
      this.rl.once('close', () => {
        this.closed = true;
        resolve(null);
      });
    });
  }

  async question(prompt: string): Promise<string | null> {
    if (this.closed) return null;
    const answer = this.rl.question(prompt).catch((error: unknown) => {
      // A question pending when input ends is cancelled
      if (error instanceof Error && error.name === 'AbortError') return null;
      throw error;
    });
    return Promise.race([answer, this.whenClosed]);
  }

  close(): void {
    this.rl.close();
  }
}
