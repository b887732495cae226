/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  DebugLogger,
  FatalInputError,
  isNodeError,
  type AskConfig,
  type OllamaClient,
} from '@ask-cli/core';
import { loadCliConfig, parseArguments, type CliConfig } from './config/config.js';
import { loadSettings } from './config/settings.js';
import { formatModelList } from './commands/models.js';
import { InteractiveChat } from './interactive/InteractiveChat.js';
import { ReadlineLineReader } from './interactive/lineReader.js';
import { buildOneShotInput, runNonInteractive } from './nonInteractiveCli.js';
import { createTheme } from './ui/colors.js';
import { toFatalError } from './utils/errors.js';
import { readStdin } from './utils/readStdin.js';

const logger = new DebugLogger('ask:main');

/** Output piped into `head` and the like may close early; that is not a failure. */
function exitQuietlyOnBrokenPipe(): void {
  process.stdout.on('error', (error: unknown) => {
    if (isNodeError(error) && error.code === 'EPIPE') {
      process.exit(0);
    }
    throw error;
  });
}

async function listModels(config: AskConfig, client: OllamaClient): Promise<void> {
  const models = await client.listModels();
  const lines = formatModelList(models, createTheme(config.getColor()), {
    defaultModel: config.getModel(),
    plain: config.getPlain(),
  });
  process.stdout.write(`${lines.join('\n')}\n`);
}

async function runInteractive(cli: CliConfig, client: OllamaClient): Promise<void> {
  const { config } = cli;
  const store = config.createSessionStore();
  const reader = new ReadlineLineReader(process.stdin, process.stdout);
  const chat = new InteractiveChat({
    config,
    client,
    session: config.createSession(store),
    store,
    reader,
  });
  const onSigint = () => chat.interrupt();
  process.on('SIGINT', onSigint);
  try {
    await chat.run(cli.loadSession);
  } finally {
    process.off('SIGINT', onSigint);
    reader.close();
  }
}

async function runOneShot(
  cli: CliConfig,
  client: OllamaClient,
  input: string,
): Promise<void> {
  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.on('SIGINT', onSigint);
  try {
    await runNonInteractive({
      config: cli.config,
      client,
      input,
      outputFile: cli.outputFile,
      signal: controller.signal,
    });
  } finally {
    process.off('SIGINT', onSigint);
  }
}

export async function main(): Promise<void> {
  const settings = loadSettings();
  const argv = await parseArguments();
  const cli = loadCliConfig(argv, settings);
  const { config } = cli;
  const client = config.createClient();
  exitQuietlyOnBrokenPipe();

  try {
    if (cli.listModels) {
      await listModels(config, client);
      return;
    }

    const piped = !process.stdin.isTTY;
    const stdin = piped ? await readStdin() : '';
    const input = buildOneShotInput(cli.prompt, stdin);

    if (!input) {
      if (config.getPlain()) {
        throw new FatalInputError('Error: No prompt provided');
      }
      if (piped) {
        throw new FatalInputError('Error: No input provided via stdin');
      }
      if (cli.outputFile) {
        throw new FatalInputError('Error: --output needs a prompt');
      }
      logger.debug('No prompt: starting interactive chat');
      await runInteractive(cli, client);
      return;
    }

    if (cli.loadSession !== undefined) {
      throw new FatalInputError(
        'Error: --load starts an interactive chat and cannot be combined with a prompt',
      );
    }
    await runOneShot(cli, client, input);
  } catch (error) {
    throw toFatalError(error);
  }
}
