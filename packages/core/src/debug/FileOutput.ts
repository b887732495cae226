/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { Storage } from '../config/storage.js';
import { ConfigurationManager } from './ConfigurationManager.js';
import type { LogEntry } from './types.js';

const LOG_FILE_DATE_LENGTH = 10;

/**
 * Appends debug entries as JSONL, by default under ~/.ask/debug.
 */
export class FileOutput {
  private static instance: FileOutput | undefined;
  private readonly fileName: string;
  private writeQueue: LogEntry[] = [];
  private isWriting = false;
  private readonly maxQueueSize = 1000;
  private readonly batchSize = 50;
  private readonly debugRunId: string;

  private constructor() {
    this.debugRunId = process.env['ASK_DEBUG_RUN_ID'] || String(process.pid);
    this.fileName = this.generateLogFileName();
  }

  static getInstance(): FileOutput {
    if (!FileOutput.instance) {
      FileOutput.instance = new FileOutput();
    }
    return FileOutput.instance;
  }

  get runId(): string {
    return this.debugRunId;
  }

  get debugDir(): string {
    return (
      ConfigurationManager.getInstance().getOutputDirectory() ??
      join(Storage.getGlobalAskDir(), 'debug')
    );
  }

  get logFile(): string {
    return join(this.debugDir, this.fileName);
  }

  async write(entry: LogEntry): Promise<void> {
    this.writeQueue.push(entry);
    if (this.writeQueue.length > this.maxQueueSize) {
      this.writeQueue = this.writeQueue.slice(-this.maxQueueSize);
    }
    if (!this.isWriting) {
      await this.flushQueue();
    }
  }

  private async flushQueue(): Promise<void> {
    if (this.isWriting || this.writeQueue.length === 0) {
      return;
    }
    this.isWriting = true;
    let batch: LogEntry[] = [];
    try {
      await fs.mkdir(this.debugDir, { recursive: true, mode: 0o700 });
      while (this.writeQueue.length > 0) {
        batch = this.writeQueue.splice(0, this.batchSize);
        const jsonl = batch.map((entry) => JSON.stringify(entry)).join('\n');
        await fs.appendFile(this.logFile, `${jsonl}\n`, {
          encoding: 'utf8',
          mode: 0o600,
        });
        batch = [];
      }
    } catch (error) {
      console.error('FileOutput: failed to write debug log entries:', error);
      // Requeue the failed batch while there is room for it.
      if (this.writeQueue.length < this.maxQueueSize / 2) {
        this.writeQueue.unshift(...batch);
      }
    } finally {
      this.isWriting = false;
    }
  }

  private generateLogFileName(): string {
    const now = new Date();
    const datePart = now.toISOString().slice(0, LOG_FILE_DATE_LENGTH);
    const timePart = now.toTimeString().slice(0, 8).replace(/:/g, '-');
    return `ask-debug-${this.debugRunId}-${datePart}-${timePart}.jsonl`;
  }
}
