/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as path from 'node:path';
import {
  CancelledError,
  ChatEventType,
  ConnectionError,
  DebugLogger,
  InvalidSessionNameError,
  NotFoundError,
  ProtocolError,
  SessionFormatError,
  createTurn,
  isNodeError,
  type AskConfig,
  type ChatRequest,
  type ChatSession,
  type OllamaClient,
  type SessionStore,
} from '@ask-cli/core';
import { formatModelList } from '../commands/models.js';
import type { TextSink } from '../nonInteractiveCli.js';
import { createTheme, type Theme } from '../ui/colors.js';
import { describeError } from '../utils/errors.js';
import { HELP_LINES, parseCommand, type ChatCommand } from './commands.js';
import type { LineReader } from './lineReader.js';

const logger = new DebugLogger('ask:interactive');

export enum ChatState {
  Idle = 'idle',
  AwaitingInput = 'awaiting_input',
  Sending = 'sending',
  Streaming = 'streaming',
  Done = 'done',
}

export interface InteractiveChatOptions {
  config: AskConfig;
  client: OllamaClient;
  session: ChatSession;
  store: SessionStore;
  reader: LineReader;
  stdout?: TextSink;
  onStateChange?: (state: ChatState) => void;
}

/**
 * Errors a single exchange or session command may end with. The loop
 * reports them and carries on; anything else is a bug and propagates.
 */
function isRecoverable(error: unknown): boolean {
  return (
    error instanceof ConnectionError ||
    error instanceof ProtocolError ||
    error instanceof CancelledError ||
    error instanceof NotFoundError ||
    error instanceof InvalidSessionNameError ||
    error instanceof SessionFormatError ||
    isNodeError(error)
  );
}

/**
 * The read-send-print loop of `ask` with no prompt. A turn is added to
 * the session only once its reply has arrived in full.
 */
export class InteractiveChat {
  private _state = ChatState.Idle;
  private controller: AbortController | undefined;
  private readonly theme: Theme;
  private readonly stdout: TextSink;

  constructor(private readonly options: InteractiveChatOptions) {
    this.theme = createTheme(options.config.getColor());
    this.stdout = options.stdout ?? process.stdout;
    options.reader.onInterrupt(() => this.interrupt());
  }

  get state(): ChatState {
    return this._state;
  }

  /**
   * Runs until the user exits or input ends. `loadName` restores a saved
   * session first. A session that cannot be found is reported and the
   * chat starts empty; a corrupt one ends the run with its error.
   */
  async run(loadName?: string): Promise<void> {
    this.printBanner();
    if (loadName !== undefined) {
      await this.guard(
        () => this.load(loadName),
        (error) =>
          isRecoverable(error) && !(error instanceof SessionFormatError),
      );
    }
    while (this._state !== ChatState.Done) {
      await this.step();
    }
  }

  /**
   * Ctrl+C. Aborts the request in flight, or ends the chat when waiting
   * at the prompt.
   */
  interrupt(): void {
    if (this.controller) {
      logger.debug('Interrupt: aborting request');
      this.controller.abort();
      return;
    }
    logger.debug('Interrupt at prompt: exiting');
    this.options.reader.close();
  }

  private async step(): Promise<void> {
    this.transition(ChatState.AwaitingInput);
    const line = await this.options.reader.question(this.theme.prompt('>>> '));
    if (line === undefined) {
      this.println(`\n${this.theme.warning('Goodbye!')}`);
      this.transition(ChatState.Done);
      return;
    }
    await this.guard(() => this.execute(parseCommand(line)));
    if (this._state !== ChatState.Done) {
      this.transition(ChatState.Idle);
    }
  }

  private async execute(command: ChatCommand): Promise<void> {
    const { session, store, client } = this.options;
    switch (command.kind) {
      case 'exit':
        this.println(this.theme.warning('Goodbye!'));
        this.transition(ChatState.Done);
        return;
      case 'clear':
        session.clear();
        this.println(this.theme.warning('History cleared.'));
        return;
      case 'save': {
        const info = await session.save(command.name);
        this.println(
          this.theme.success(`Session saved to ${path.basename(info.path)}`),
        );
        return;
      }
      case 'load':
        await this.load(command.name);
        return;
      case 'models': {
        const models = await client.listModels();
        const lines = formatModelList(models, this.theme, {
          defaultModel: session.model,
          plain: false,
        });
        lines.forEach((l) => this.println(l));
        return;
      }
      case 'history': {
        const saved = await store.list();
        if (saved.length === 0) {
          this.println(this.theme.dim('No saved sessions.'));
          return;
        }
        this.println(this.theme.info('Saved sessions:'));
        for (const info of saved) {
          this.println(
            `  ${this.theme.success(info.name)} (${info.messageCount} messages, ${info.savedAt.toLocaleString()})`,
          );
        }
        return;
      }
      case 'help':
        HELP_LINES.forEach((l) => this.println(l));
        return;
      case 'invalid':
        this.println(this.theme.warning(command.message));
        return;
      case 'empty':
        return;
      case 'prompt':
        await this.send(command.text);
        return;
      default: {
        const unhandled: never = command;
        logger.warn(`Unhandled command ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private async load(name: string): Promise<void> {
    const { session } = this.options;
    await session.load(name);
    this.println(
      this.theme.success(
        `Loaded session from ${session.name ?? name} (${session.length} messages)`,
      ),
    );
  }

  private async send(text: string): Promise<void> {
    const { config, session } = this.options;
    const pending = createTurn('user', text);
    const request: ChatRequest = {
      model: session.model,
      turns: session.contextWindow(config.getContextBudget(), pending),
      ...config.getRequestOptions(),
    };
    logger.debug(() => `Sending ${request.turns.length} turns`);

    const controller = new AbortController();
    this.controller = controller;
    this.transition(ChatState.Sending);
    try {
      const reply = config.getStream()
        ? await this.streamReply(request, controller.signal)
        : await this.bufferedReply(request, controller.signal);
      session.append(pending);
      session.append(createTurn('assistant', reply));
    } finally {
      this.controller = undefined;
    }
  }

  private async streamReply(
    request: ChatRequest,
    signal: AbortSignal,
  ): Promise<string> {
    const { client, config } = this.options;
    const showThoughts = config.getThink() && config.getColor();
    let reply = '';
    let thinking = false;
    try {
      for await (const event of client.chatStream(request, signal)) {
        if (this._state === ChatState.Sending) {
          this.transition(ChatState.Streaming);
        }
        if (event.type === ChatEventType.Thought && showThoughts) {
          this.stdout.write(this.theme.dim(event.value));
          thinking = true;
        } else if (event.type === ChatEventType.Content) {
          if (thinking) {
            this.stdout.write('\n');
            thinking = false;
          }
          reply += event.value;
          this.stdout.write(event.value);
        }
      }
    } finally {
      if (reply || thinking) {
        this.stdout.write('\n');
      }
    }
    return reply;
  }

  private async bufferedReply(
    request: ChatRequest,
    signal: AbortSignal,
  ): Promise<string> {
    const { client, config } = this.options;
    const result = await client.chat(request, signal);
    this.transition(ChatState.Streaming);
    if (config.getThink() && config.getColor() && result.thinking) {
      this.println(this.theme.dim(result.thinking));
    }
    this.println(result.content);
    return result.content;
  }

  private async guard(
    action: () => Promise<void>,
    recoverable: (error: unknown) => boolean = isRecoverable,
  ): Promise<void> {
    try {
      await action();
    } catch (error) {
      if (!recoverable(error)) {
        throw error;
      }
      const message = describeError(error);
      this.println(
        error instanceof CancelledError
          ? this.theme.warning(message)
          : this.theme.error(message),
      );
    }
  }

  private printBanner(): void {
    const { config, session } = this.options;
    this.println(this.theme.info(`Interactive chat with ${session.model}`));
    this.println(
      this.theme.dim(
        "Commands: 'exit' to quit, 'clear' to reset, 'save [name]', 'load <name>', 'models', 'history', 'help'",
      ),
    );
    if (config.getJson()) {
      this.println(this.theme.warning('JSON mode enabled'));
    }
    if (config.getThink()) {
      this.println(this.theme.warning('Thinking mode enabled'));
    }
    this.println(this.theme.dim('-'.repeat(50)));
  }

  private println(text: string): void {
    this.stdout.write(`${text}\n`);
  }

  private transition(next: ChatState): void {
    if (this._state === next) {
      return;
    }
    logger.debug(() => `${this._state} -> ${next}`);
    this._state = next;
    this.options.onStateChange?.(next);
  }
}
