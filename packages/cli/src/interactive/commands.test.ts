/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { parseCommand } from './commands.js';

describe('parseCommand', () => {
  it.each(['exit', 'quit', 'q', 'EXIT', '  Quit  '])('%s exits', (line) => {
    expect(parseCommand(line)).toEqual({ kind: 'exit' });
  });

  it.each([
    ['clear', 'clear'],
    ['models', 'models'],
    ['History', 'history'],
    ['help', 'help'],
  ] as const)('%s is a command', (line, kind) => {
    expect(parseCommand(line)).toEqual({ kind });
  });

  it('reads an optional save name', () => {
    expect(parseCommand('save')).toEqual({ kind: 'save' });
    expect(parseCommand('SAVE  my work')).toEqual({
      kind: 'save',
      name: 'my work',
    });
  });

  it('requires a name for load', () => {
    expect(parseCommand('load 20250102')).toEqual({
      kind: 'load',
      name: '20250102',
    });
    expect(parseCommand('load')).toEqual({
      kind: 'invalid',
      message: 'Usage: load <name>',
    });
  });

  it('treats blank lines as empty', () => {
    expect(parseCommand('')).toEqual({ kind: 'empty' });
    expect(parseCommand(' \t ')).toEqual({ kind: 'empty' });
  });

  it('sends sentences that start with a command word as prompts', () => {
    expect(parseCommand('help me write a regex')).toEqual({
      kind: 'prompt',
      text: 'help me write a regex',
    });
    expect(parseCommand('clear the cache how?')).toEqual({
      kind: 'prompt',
      text: 'clear the cache how?',
    });
  });

  it('does not match object prototype keys', () => {
    expect(parseCommand('constructor')).toEqual({
      kind: 'prompt',
      text: 'constructor',
    });
  });
});
