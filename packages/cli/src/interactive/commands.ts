/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type ChatCommand =
  | { kind: 'exit' }
  | { kind: 'clear' }
  | { kind: 'save'; name?: string }
  | { kind: 'load'; name: string }
  | { kind: 'models' }
  | { kind: 'history' }
  | { kind: 'help' }
  | { kind: 'invalid'; message: string }
  | { kind: 'empty' }
  | { kind: 'prompt'; text: string };

const BARE_COMMANDS = new Map<string, ChatCommand>([
  ['exit', { kind: 'exit' }],
  ['quit', { kind: 'exit' }],
  ['q', { kind: 'exit' }],
  ['clear', { kind: 'clear' }],
  ['models', { kind: 'models' }],
  ['history', { kind: 'history' }],
  ['help', { kind: 'help' }],
]);

export const HELP_LINES = [
  'Commands:',
  '  exit, quit, q     Exit the chat',
  '  clear             Clear conversation history',
  '  save [name]       Save session to file',
  '  load <name>       Load a previous session',
  '  models            List available models',
  '  history           List saved sessions',
  '  help              Show this help',
  '',
  'Tips:',
  '  - Use Ctrl+C to cancel a response',
  '  - Pipe input: cat file.txt | ask "summarize"',
  '  - Set default model: export ASK_MODEL=llama3',
];

/**
 * Classifies one line of interactive input. Command words are matched
 * case-insensitively; commands without arguments must stand alone, so a
 * prompt such as "help me write a regex" is sent to the model.
 */
export function parseCommand(line: string): ChatCommand {
  const trimmed = line.trim();
  if (trimmed === '') {
    return { kind: 'empty' };
  }

  const [first, ...rest] = trimmed.split(/\s+/);
  const word = first.toLowerCase();
  const argument = rest.join(' ');

  const bare = rest.length === 0 ? BARE_COMMANDS.get(word) : undefined;
  if (bare) {
    return bare;
  }
  if (word === 'save') {
    return argument ? { kind: 'save', name: argument } : { kind: 'save' };
  }
  if (word === 'load') {
    return argument
      ? { kind: 'load', name: argument }
      : { kind: 'invalid', message: 'Usage: load <name>' };
  }
  return { kind: 'prompt', text: line };
}
