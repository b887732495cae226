/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import createDebug from 'debug';
import type { Debugger } from 'debug';
import { ConfigurationManager } from './ConfigurationManager.js';
import { FileOutput } from './FileOutput.js';
import type { LogEntry } from './types.js';

type LogLevel = 'debug' | 'log' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  log: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

/**
 * Namespaced logger over `debug`. Disabled loggers never evaluate their
 * message functions.
 */
export class DebugLogger {
  private readonly debugInstance: Debugger;
  private readonly _namespace: string;
  private readonly _configManager: ConfigurationManager;
  private readonly _fileOutput: FileOutput;
  private _enabled: boolean;

  constructor(namespace: string) {
    this._namespace = namespace;
    this.debugInstance = createDebug(namespace);
    this._configManager = ConfigurationManager.getInstance();
    this._fileOutput = FileOutput.getInstance();
    this._enabled = this.checkEnabled();
    // `debug` only prints when its own flag is set; ours decides.
    this.debugInstance.enabled = this._enabled;
    this._configManager.subscribe(() => this.onConfigChange());
  }

  get enabled(): boolean {
    return this._enabled;
  }

  set enabled(value: boolean) {
    this._enabled = value;
    this.debugInstance.enabled = value;
  }

  get configManager(): ConfigurationManager {
    return this._configManager;
  }

  get fileOutput(): FileOutput {
    return this._fileOutput;
  }

  log(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('log', messageOrFn, args);
  }

  debug(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('debug', messageOrFn, args);
  }

  warn(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('warn', messageOrFn, args);
  }

  error(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('error', messageOrFn, args);
  }

  private write(
    level: LogLevel,
    messageOrFn: string | (() => string),
    args: unknown[],
  ): void {
    if (!this._enabled || !this.levelAllowed(level)) {
      return;
    }

    let message: string;
    if (typeof messageOrFn === 'function') {
      try {
        message = messageOrFn();
      } catch (_error) {
        message = '[Error evaluating log function]';
      }
    } else {
      message = messageOrFn;
    }

    message = this.redactSensitive(message);

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      namespace: this._namespace,
      level,
      message,
      args: args.length > 0 ? args : undefined,
      runId: this._fileOutput.runId,
      pid: process.pid,
    };

    const target = this._configManager.getOutputTarget();
    if (target.includes('file')) {
      void this._fileOutput.write(entry);
    }
    if (target.includes('stderr')) {
      this.debugInstance(message, ...args);
    }
  }

  private levelAllowed(level: LogLevel): boolean {
    const configured = this._configManager.getEffectiveConfig().level;
    if (!isLogLevel(configured)) {
      return true;
    }
    return LEVEL_ORDER[level] >= LEVEL_ORDER[configured];
  }

  checkEnabled(): boolean {
    const config = this._configManager.getEffectiveConfig();
    if (!config.enabled) {
      return false;
    }
    return config.namespaces.some((pattern) =>
      this.matchesPattern(this._namespace, pattern),
    );
  }

  private matchesPattern(namespace: string, pattern: string): boolean {
    if (pattern === namespace) {
      return true;
    }
    if (pattern.includes('*')) {
      const regexPattern = pattern
        .replace(/[.+?^${}()|[\]\\]/g, '\\$&')
        .replace(/\*/g, '.*');
      return new RegExp(`^${regexPattern}$`).test(namespace);
    }
    return false;
  }

  private redactSensitive(message: string): string {
    let result = message;
    for (const pattern of this._configManager.getRedactPatterns()) {
      const regex = new RegExp(`${pattern}["']?:\\s*["']?([^"'\\s]+)`, 'gi');
      result = result.replace(regex, `${pattern}: [REDACTED]`);
    }
    return result;
  }

  private onConfigChange(): void {
    this.enabled = this.checkEnabled();
  }
}
