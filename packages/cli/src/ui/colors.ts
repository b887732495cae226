/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Chalk, type ChalkInstance } from 'chalk';

export interface Theme {
  prompt: (text: string) => string;
  info: (text: string) => string;
  success: (text: string) => string;
  warning: (text: string) => string;
  error: (text: string) => string;
  dim: (text: string) => string;
}

/**
 * Terminal styles. With colour disabled every style returns its input;
 * otherwise chalk decides how many colours the terminal supports.
 */
export function createTheme(enabled: boolean): Theme {
  const chalk: ChalkInstance = enabled ? new Chalk() : new Chalk({ level: 0 });
  return {
    prompt: (text) => chalk.green(text),
    info: (text) => chalk.cyan(text),
    success: (text) => chalk.green(text),
    warning: (text) => chalk.yellow(text),
    error: (text) => chalk.red(text),
    dim: (text) => chalk.dim(text),
  };
}
