/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import { ChatSession, type ContextBudget } from '../core/chatSession.js';
import {
  DEFAULT_HOST,
  DEFAULT_TIMEOUT_MS,
  OllamaClient,
  type RequestOptions,
} from '../core/ollamaClient.js';
import { DEFAULT_MAX_SESSIONS, SessionStore } from '../storage/SessionStore.js';
import { FatalConfigError } from '../utils/errors.js';
import { Storage } from './storage.js';

export const DEFAULT_MODEL = 'gpt-oss:latest';

export interface ConfigParameters {
  host?: string;
  model?: string;
  systemPrompt?: string;
  temperature?: number;
  contextWindow?: number;
  think?: boolean;
  json?: boolean;
  stream?: boolean;
  historyDir?: string;
  maxSessions?: number;
  contextBudget?: ContextBudget;
  timeoutMs?: number;
  color?: boolean;
  plain?: boolean;
  debug?: boolean;
  fetch?: typeof fetch;
}

const positiveInt = z.number().int().positive();

const ConfigParametersSchema = z.object({
  host: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), {
      message: 'must be an http(s) URL',
    }),
  model: z.string().min(1),
  temperature: z.number().min(0).max(2).optional(),
  contextWindow: positiveInt.optional(),
  maxSessions: positiveInt,
  contextBudget: z.object({
    maxTurns: positiveInt.optional(),
    maxTokens: positiveInt.optional(),
  }),
  timeoutMs: positiveInt,
});

/**
 * Settings resolved once at startup and shared by the client, the session
 * and the front-ends. Values never change after construction.
 */
export class AskConfig {
  private readonly host: string;
  private readonly model: string;
  private readonly systemPrompt: string | undefined;
  private readonly temperature: number | undefined;
  private readonly contextWindow: number | undefined;
  private readonly think: boolean;
  private readonly json: boolean;
  private readonly stream: boolean;
  private readonly historyDir: string;
  private readonly maxSessions: number;
  private readonly contextBudget: Readonly<ContextBudget>;
  private readonly timeoutMs: number;
  private readonly color: boolean;
  private readonly plain: boolean;
  private readonly debugMode: boolean;
  private readonly fetchImpl: typeof fetch | undefined;

  constructor(params: ConfigParameters = {}) {
    const candidate = {
      host: (params.host ?? DEFAULT_HOST).replace(/\/+$/, ''),
      model: params.model ?? DEFAULT_MODEL,
      temperature: params.temperature,
      contextWindow: params.contextWindow,
      maxSessions: params.maxSessions ?? DEFAULT_MAX_SESSIONS,
      contextBudget: { ...params.contextBudget },
      timeoutMs: params.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    };
    const parsed = ConfigParametersSchema.safeParse(candidate);
    if (!parsed.success) {
      const problems = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new FatalConfigError(`Invalid configuration: ${problems}`);
    }

    this.host = parsed.data.host;
    this.model = parsed.data.model;
    this.temperature = parsed.data.temperature;
    this.contextWindow = parsed.data.contextWindow;
    this.maxSessions = parsed.data.maxSessions;
    this.contextBudget = Object.freeze(parsed.data.contextBudget);
    this.timeoutMs = parsed.data.timeoutMs;
    this.systemPrompt = params.systemPrompt || undefined;
    this.plain = params.plain ?? false;
    this.think = params.think ?? false;
    this.json = params.json ?? false;
    // The plain front-end is always buffered and colourless.
    this.stream = this.plain ? false : (params.stream ?? true);
    this.color = this.plain ? false : (params.color ?? true);
    this.historyDir = params.historyDir ?? Storage.getDefaultHistoryDir();
    this.debugMode = params.debug ?? false;
    this.fetchImpl = params.fetch;
    Object.freeze(this);
  }

  getHost(): string {
    return this.host;
  }

  getModel(): string {
    return this.model;
  }

  getSystemPrompt(): string | undefined {
    return this.systemPrompt;
  }

  getTemperature(): number | undefined {
    return this.temperature;
  }

  getContextWindow(): number | undefined {
    return this.contextWindow;
  }

  getThink(): boolean {
    return this.think;
  }

  getJson(): boolean {
    return this.json;
  }

  getStream(): boolean {
    return this.stream;
  }

  getHistoryDir(): string {
    return this.historyDir;
  }

  getMaxSessions(): number {
    return this.maxSessions;
  }

  getContextBudget(): Readonly<ContextBudget> {
    return this.contextBudget;
  }

  getTimeoutMs(): number {
    return this.timeoutMs;
  }

  getColor(): boolean {
    return this.color;
  }

  getPlain(): boolean {
    return this.plain;
  }

  getDebugMode(): boolean {
    return this.debugMode;
  }

  /** Per-request options derived from this configuration. */
  getRequestOptions(): RequestOptions {
    return {
      json: this.json,
      think: this.think,
      temperature: this.getTemperature(),
      contextWindow: this.getContextWindow(),
    };
  }

  createClient(): OllamaClient {
    return new OllamaClient({
      host: this.host,
      timeoutMs: this.timeoutMs,
      fetch: this.fetchImpl,
    });
  }

  createSessionStore(): SessionStore {
    return new SessionStore({
      directory: this.historyDir,
      maxSessions: this.maxSessions,
    });
  }

  createSession(store: SessionStore = this.createSessionStore()): ChatSession {
    return new ChatSession({
      model: this.model,
      systemPrompt: this.systemPrompt,
      store,
    });
  }
}
