/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import stripJsonComments from 'strip-json-comments';
import { z } from 'zod';
import {
  DebugLogger,
  FatalConfigError,
  Storage,
  getErrorMessage,
  isNodeError,
} from '@ask-cli/core';

const logger = new DebugLogger('ask:settings');

export const SettingsSchema = z.object({
  host: z.string().optional(),
  model: z.string().optional(),
  systemPrompt: z.string().optional(),
  temperature: z.number().optional(),
  contextWindow: z.number().optional(),
  think: z.boolean().optional(),
  stream: z.boolean().optional(),
  historyDir: z.string().optional(),
  maxSessions: z.number().optional(),
  timeoutMs: z.number().optional(),
  context: z
    .object({
      maxTurns: z.number().optional(),
      maxTokens: z.number().optional(),
    })
    .optional(),
  debug: z
    .object({
      enabled: z.boolean().optional(),
      namespaces: z.array(z.string()).optional(),
      level: z.enum(['debug', 'log', 'warn', 'error']).optional(),
      output: z
        .object({
          target: z.string(),
          directory: z.string().optional(),
        })
        .optional(),
    })
    .optional(),
});

/**
 * Contents of ~/.ask/settings.json. Every field is optional; range checks
 * happen when the configuration is built.
 */
export type Settings = z.infer<typeof SettingsSchema>;

export function expandHome(p: string): string {
  if (p === '~') {
    return Storage.getHomeDir();
  }
  if (p.startsWith('~/')) {
    return path.join(Storage.getHomeDir(), p.slice(2));
  }
  return p;
}

/**
 * Reads the user settings file. A missing file yields empty settings;
 * a file that does not parse, or holds the wrong types, is fatal.
 */
export function loadSettings(
  settingsPath: string = Storage.getGlobalSettingsPath(),
): Settings {
  let content: string;
  try {
    content = fs.readFileSync(settingsPath, 'utf-8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      logger.debug(() => `No settings file at ${settingsPath}`);
      return {};
    }
    throw new FatalConfigError(
      `Error reading ${settingsPath}: ${getErrorMessage(error)}`,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(stripJsonComments(content));
  } catch (error) {
    throw new FatalConfigError(
      `Error in ${settingsPath}: ${getErrorMessage(error)}\nPlease fix the configuration file and try again.`,
    );
  }

  const parsed = SettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new FatalConfigError(
      `Error in ${settingsPath}:\n${problems}\nPlease fix the configuration file and try again.`,
    );
  }

  const settings = parsed.data;
  if (settings.historyDir) {
    settings.historyDir = expandHome(settings.historyDir);
  }
  logger.debug(() => `Loaded settings from ${settingsPath}`);
  return settings;
}
