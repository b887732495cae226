/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';
import {
  AskConfig,
  ConfigurationManager,
  DEFAULT_HOST,
  DEFAULT_MODEL,
  DebugLogger,
  FatalInputError,
  type DebugSettings,
} from '@ask-cli/core';
import { expandHome, type Settings } from './settings.js';
import { getCliVersion } from '../utils/version.js';

const logger = new DebugLogger('ask:config');

export interface CliArgs {
  promptWords: string[];
  model: string | undefined;
  system: string | undefined;
  think: boolean;
  json: boolean;
  temperature: number | undefined;
  ctx: number | undefined;
  stream: boolean;
  load: string | undefined;
  output: string | undefined;
  listModels: boolean;
  maxTurns: number | undefined;
  maxTokens: number | undefined;
  plain: boolean;
  debug: boolean;
}

export interface ParseOptions {
  /** Let yargs exit after --help and --version. Off in tests. */
  exitProcess?: boolean;
}

export async function parseArguments(
  args: string[] = hideBin(process.argv),
  options: ParseOptions = {},
): Promise<CliArgs> {
  const yargsInstance = yargs(args)
    .locale('en')
    .scriptName('ask')
    .usage(
      '$0 [options] [prompt...]',
      'Ask a local model anything. With no prompt and no piped input, starts an interactive chat.',
    )
    .option('model', {
      alias: 'm',
      type: 'string',
      description: `Model to use (default: ${DEFAULT_MODEL})`,
    })
    .option('system', {
      alias: 's',
      type: 'string',
      description: 'System prompt',
    })
    .option('think', {
      alias: 't',
      type: 'boolean',
      default: false,
      description: 'Enable thinking/reasoning mode',
    })
    .option('json', {
      type: 'boolean',
      default: false,
      description: 'Force JSON output format',
    })
    .option('temperature', {
      type: 'number',
      description: 'Sampling temperature (0-2)',
    })
    .option('ctx', {
      type: 'number',
      description: 'Context window size (num_ctx)',
    })
    .option('stream', {
      type: 'boolean',
      default: true,
      description: 'Stream the reply as it is generated (--no-stream to buffer)',
    })
    .option('load', {
      type: 'string',
      description: 'Start the interactive chat from a saved session',
    })
    .option('output', {
      alias: 'o',
      type: 'string',
      description: 'Write the reply to a file instead of stdout',
    })
    .option('list-models', {
      type: 'boolean',
      default: false,
      description: 'List available models',
    })
    .option('max-turns', {
      type: 'number',
      description: 'Send at most this many turns of history',
    })
    .option('max-tokens', {
      type: 'number',
      description: 'Send at most this many estimated tokens of history',
    })
    .option('plain', {
      type: 'boolean',
      default: false,
      description: 'Buffered, ASCII-only, colourless output for scripts and agents',
    })
    .option('debug', {
      alias: 'd',
      type: 'boolean',
      default: false,
      description: 'Print ask:* debug logs to stderr',
    })
    .epilog(
      [
        'Examples:',
        '  ask "How do I parse JSON in bash?"',
        '  ask -m llama3 "Explain quantum physics"',
        '  cat file.txt | ask "Summarize this"',
        '  ask --json "List 5 fruits as JSON array"',
        '  ask -t "Think step by step about this problem"',
        '  ask            # interactive mode',
      ].join('\n'),
    )
    .check((argv) => {
      if (argv.load && argv.output) {
        throw new Error('Cannot use both --load and --output together');
      }
      return true;
    })
    .version(getCliVersion())
    .alias('v', 'version')
    .help()
    .alias('h', 'help')
    .strictOptions()
    .exitProcess(options.exitProcess ?? true)
    .fail((message, error) => {
      throw new FatalInputError(message || error.message);
    });

  yargsInstance.wrap(yargsInstance.terminalWidth());
  const result = await yargsInstance.parseAsync();

  const promptWords = result._.map(String).filter((w) => w.trim() !== '');

  return {
    promptWords,
    model: result.model,
    system: result.system,
    think: result.think,
    json: result.json,
    temperature: result.temperature,
    ctx: result.ctx,
    stream: result.stream,
    load: result.load,
    output: result.output,
    listModels: result.listModels,
    maxTurns: result.maxTurns,
    maxTokens: result.maxTokens,
    plain: result.plain,
    debug: result.debug,
  };
}

/** Accepts `host:port` as well as full URLs, like the server itself does. */
export function normalizeHost(host: string): string {
  const trimmed = host.trim();
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)
    ? trimmed
    : `http://${trimmed}`;
}

export interface CliConfig {
  config: AskConfig;
  /** Prompt words joined by spaces; empty when none were given */
  prompt: string;
  loadSession: string | undefined;
  outputFile: string | undefined;
  listModels: boolean;
}

function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value && value.trim() !== '' ? value : undefined;
}

/**
 * Resolves every setting with the precedence flag > environment >
 * settings file > built-in default, and applies the debug settings.
 */
export function loadCliConfig(
  argv: CliArgs,
  settings: Settings,
  env: NodeJS.ProcessEnv = process.env,
): CliConfig {
  const envHost = envValue(env, 'OLLAMA_HOST');
  const envHistory = envValue(env, 'ASK_HISTORY_DIR');

  const config = new AskConfig({
    host: normalizeHost(envHost ?? settings.host ?? DEFAULT_HOST),
    model: argv.model ?? envValue(env, 'ASK_MODEL') ?? settings.model,
    systemPrompt: argv.system ?? settings.systemPrompt,
    temperature: argv.temperature ?? settings.temperature,
    contextWindow: argv.ctx ?? settings.contextWindow,
    think: argv.think || (settings.think ?? false),
    json: argv.json,
    stream: argv.stream && (settings.stream ?? true),
    historyDir: envHistory ? expandHome(envHistory) : settings.historyDir,
    maxSessions: settings.maxSessions,
    contextBudget: {
      maxTurns: argv.maxTurns ?? settings.context?.maxTurns,
      maxTokens: argv.maxTokens ?? settings.context?.maxTokens,
    },
    timeoutMs: settings.timeoutMs,
    color: envValue(env, 'NO_COLOR') === undefined,
    plain: argv.plain,
    debug: argv.debug,
  });

  applyDebugSettings(config, settings);

  logger.debug(
    () =>
      `host=${config.getHost()} model=${config.getModel()} stream=${config.getStream()}`,
  );

  return {
    config,
    prompt: argv.promptWords.join(' '),
    loadSession: argv.load,
    outputFile: argv.output,
    listModels: argv.listModels,
  };
}

function applyDebugSettings(config: AskConfig, settings: Settings): void {
  const manager = ConfigurationManager.getInstance();
  if (settings.debug) {
    const fromSettings: Partial<DebugSettings> = {};
    if (settings.debug.enabled !== undefined) {
      fromSettings.enabled = settings.debug.enabled;
    }
    if (settings.debug.namespaces) {
      fromSettings.namespaces = settings.debug.namespaces;
    }
    if (settings.debug.level) {
      fromSettings.level = settings.debug.level;
    }
    if (settings.debug.output) {
      fromSettings.output = settings.debug.output;
    }
    manager.setSettingsConfig(fromSettings);
  }
  if (config.getDebugMode()) {
    manager.setCliConfig({ enabled: true, namespaces: ['ask:*'] });
  }
}
