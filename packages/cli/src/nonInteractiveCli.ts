/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import {
  ChatEventType,
  DebugLogger,
  createTurn,
  type AskConfig,
  type ChatRequest,
  type OllamaClient,
  type Turn,
} from '@ask-cli/core';
import { createTheme } from './ui/colors.js';
import { toAscii } from './utils/ascii.js';

const logger = new DebugLogger('ask:cli');

export interface TextSink {
  write(text: string): unknown;
}

export interface NonInteractiveOptions {
  config: AskConfig;
  client: OllamaClient;
  input: string;
  outputFile?: string;
  stdout?: TextSink;
  stderr?: TextSink;
  signal?: AbortSignal;
}

/**
 * Combines the prompt words with piped input. Either may be empty.
 */
export function buildOneShotInput(prompt: string, stdin: string): string {
  const question = prompt.trim();
  const context = stdin.trim();
  if (question && context) {
    return `${question}\n\nContext:\n${context}`;
  }
  return question || context;
}

/**
 * Sends one prompt and prints (or writes) the reply. Returns the reply
 * text. Request errors propagate to the caller.
 */
export async function runNonInteractive({
  config,
  client,
  input,
  outputFile,
  stdout = process.stdout,
  stderr = process.stderr,
  signal,
}: NonInteractiveOptions): Promise<string> {
  const theme = createTheme(config.getColor());
  const plain = config.getPlain();
  const showThoughts = config.getThink() && config.getColor();
  const display = (text: string) => (plain ? toAscii(text) : text);

  const turns: Turn[] = [];
  const system = config.getSystemPrompt();
  if (system) {
    turns.push(createTurn('system', system));
  }
  turns.push(createTurn('user', input));

  const request: ChatRequest = {
    model: config.getModel(),
    turns,
    ...config.getRequestOptions(),
  };
  logger.debug(() => `One-shot request, ${input.length} chars of input`);

  let reply = '';
  if (config.getStream()) {
    let thinking = false;
    for await (const event of client.chatStream(request, signal)) {
      switch (event.type) {
        case ChatEventType.Thought:
          if (showThoughts) {
            stderr.write(theme.dim(event.value));
            thinking = true;
          }
          break;
        case ChatEventType.Content:
          if (thinking) {
            stderr.write('\n');
            thinking = false;
          }
          reply += event.value;
          if (!outputFile) {
            stdout.write(display(event.value));
          }
          break;
        case ChatEventType.Finished:
          logger.debug(
            () =>
              `Finished (${event.value.doneReason ?? 'done'}): ${event.value.usage.completionTokens} tokens`,
          );
          break;
        default:
          break;
      }
    }
    if (!outputFile) {
      stdout.write('\n');
    }
  } else {
    const result = await client.chat(request, signal);
    if (showThoughts && result.thinking) {
      stderr.write(`${theme.dim(result.thinking)}\n`);
    }
    reply = result.content;
    if (!outputFile) {
      stdout.write(`${display(reply)}\n`);
    }
  }

  if (outputFile) {
    await fs.promises.writeFile(outputFile, reply, 'utf-8');
    stdout.write(`${display(`Written to ${outputFile}`)}\n`);
  }
  return reply;
}
