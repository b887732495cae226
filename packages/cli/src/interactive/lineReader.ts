/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as readline from 'node:readline';

/**
 * Source of interactive input lines.
 */
export interface LineReader {
  /**
   * Shows `prompt` and resolves the next line, or undefined once input
   * has ended or the reader was closed.
   */
  question(prompt: string): Promise<string | undefined>;
  /** Registers the handler for Ctrl+C typed at the terminal. */
  onInterrupt(handler: () => void): void;
  close(): void;
}

/**
 * LineReader over node:readline. Lines that arrive while a reply is still
 * printing are buffered, so piped scripts are read in full.
 */
export class ReadlineLineReader implements LineReader {
  private readonly rl: readline.Interface;
  private readonly lines: AsyncIterator<string>;
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout,
  ) {
    this.rl = readline.createInterface({ input, output });
    this.lines = this.rl[Symbol.asyncIterator]();
    this.rl.on('close', () => {
      this.closed = true;
    });
  }

  async question(prompt: string): Promise<string | undefined> {
    // Lines read before the input closed are still delivered.
    if (!this.closed) {
      this.rl.setPrompt(prompt);
      this.rl.prompt();
    }
    const next = await this.lines.next();
    return next.done ? undefined : next.value;
  }

  onInterrupt(handler: () => void): void {
    this.rl.on('SIGINT', handler);
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }
}
