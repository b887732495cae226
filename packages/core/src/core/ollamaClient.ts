/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import { DebugLogger } from '../debug/index.js';
import {
  CancelledError,
  ConnectionError,
  ProtocolError,
  getErrorMessage,
  isNodeError,
} from '../utils/errors.js';
import { ThinkingSplitter, splitThinking } from './thinkingSplitter.js';
import {
  ChatEventType,
  type ChatEvent,
  type Turn,
  type UsageStats,
} from './turn.js';

const logger = new DebugLogger('ask:client');

export const DEFAULT_HOST = 'http://localhost:11434';
export const DEFAULT_TIMEOUT_MS = 300_000;
const ERROR_DETAIL_LIMIT = 200;

export interface ClientOptions {
  /** Base URL of the inference server, e.g. http://localhost:11434 */
  host: string;
  /** Upper bound for a whole request, streaming included */
  timeoutMs?: number;
  fetch?: typeof fetch;
}

export interface RequestOptions {
  /** Constrain the reply to valid JSON */
  json?: boolean;
  think?: boolean;
  temperature?: number;
  /** Context window size passed to the server as num_ctx */
  contextWindow?: number;
}

export interface ChatRequest extends RequestOptions {
  model: string;
  turns: readonly Turn[];
}

export interface GenerateRequest extends RequestOptions {
  model: string;
  prompt: string;
  system?: string;
}

export interface ChatResult {
  content: string;
  thinking: string;
  model: string;
  doneReason?: string;
  usage: UsageStats;
}

export interface ModelInfo {
  name: string;
  sizeBytes: number;
  modifiedAt?: string;
}

const ServerErrorSchema = z.object({ error: z.string() });

const CountsShape = {
  model: z.string().default(''),
  done: z.boolean().default(false),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
};

const ChatChunkSchema = z
  .object({
    ...CountsShape,
    message: z
      .object({
        role: z.string().optional(),
        content: z.string().default(''),
        thinking: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const GenerateChunkSchema = z
  .object({
    ...CountsShape,
    response: z.string().optional(),
    thinking: z.string().optional(),
  })
  .passthrough();

const TagsResponseSchema = z.object({
  models: z.array(
    z
      .object({
        name: z.string(),
        size: z.number().optional(),
        modified_at: z.string().optional(),
      })
      .passthrough(),
  ),
});

/** One decoded response object, whichever endpoint produced it. */
interface Chunk {
  content: string;
  thinking: string;
  done: boolean;
  model: string;
  doneReason?: string;
  usage: UsageStats;
}

type ChunkDecoder = (value: unknown, endpoint: string) => Chunk;

interface RequestScope {
  signal: AbortSignal;
  cancelled(): boolean;
  timedOut(): boolean;
  dispose(): void;
}

interface WireMessage {
  role: string;
  content: string;
}

interface WireOptions {
  temperature?: number;
  num_ctx?: number;
}

interface WireRequest {
  model: string;
  stream: boolean;
  messages?: WireMessage[];
  prompt?: string;
  system?: string;
  format?: 'json';
  think?: boolean;
  options?: WireOptions;
}

function invalidShape(endpoint: string, error: z.ZodError): ProtocolError {
  const issue = error.issues[0];
  const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
  return new ProtocolError(
    `Unexpected response from ${endpoint}${where}: ${issue?.message ?? 'invalid shape'}`,
    endpoint,
    { cause: error },
  );
}

function usageOf(chunk: {
  prompt_eval_count?: number;
  eval_count?: number;
}): UsageStats {
  return {
    promptTokens: chunk.prompt_eval_count ?? 0,
    completionTokens: chunk.eval_count ?? 0,
  };
}

const decodeChatChunk: ChunkDecoder = (value, endpoint) => {
  const parsed = ChatChunkSchema.safeParse(value);
  if (!parsed.success) {
    throw invalidShape(endpoint, parsed.error);
  }
  const chunk = parsed.data;
  if (!chunk.message && !chunk.done) {
    throw new ProtocolError(
      `Unexpected response from ${endpoint}: no message in chunk`,
      endpoint,
    );
  }
  return {
    content: chunk.message?.content ?? '',
    thinking: chunk.message?.thinking ?? '',
    done: chunk.done,
    model: chunk.model,
    doneReason: chunk.done_reason,
    usage: usageOf(chunk),
  };
};

const decodeGenerateChunk: ChunkDecoder = (value, endpoint) => {
  const parsed = GenerateChunkSchema.safeParse(value);
  if (!parsed.success) {
    throw invalidShape(endpoint, parsed.error);
  }
  const chunk = parsed.data;
  if (chunk.response === undefined && !chunk.done) {
    throw new ProtocolError(
      `Unexpected response from ${endpoint}: no response text in chunk`,
      endpoint,
    );
  }
  return {
    content: chunk.response ?? '',
    thinking: chunk.thinking ?? '',
    done: chunk.done,
    model: chunk.model,
    doneReason: chunk.done_reason,
    usage: usageOf(chunk),
  };
};

/**
 * Client for the chat, generate and tags endpoints of an Ollama-compatible
 * server. Every call is a single request; nothing is retried.
 */
export class OllamaClient {
  private readonly host: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ClientOptions) {
    this.host = options.host.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  getHost(): string {
    return this.host;
  }

  /**
   * Buffered chat: one request, one complete reply.
   */
  async chat(request: ChatRequest, signal?: AbortSignal): Promise<ChatResult> {
    return this.complete(
      '/api/chat',
      this.buildChatBody(request, false),
      decodeChatChunk,
      request.model,
      signal,
    );
  }

  /**
   * Streaming chat: yields reply fragments as they arrive, then Finished.
   */
  chatStream(
    request: ChatRequest,
    signal?: AbortSignal,
  ): AsyncGenerator<ChatEvent> {
    return this.stream(
      '/api/chat',
      this.buildChatBody(request, true),
      decodeChatChunk,
      request.model,
      signal,
    );
  }

  async generate(
    request: GenerateRequest,
    signal?: AbortSignal,
  ): Promise<ChatResult> {
    return this.complete(
      '/api/generate',
      this.buildGenerateBody(request, false),
      decodeGenerateChunk,
      request.model,
      signal,
    );
  }

  generateStream(
    request: GenerateRequest,
    signal?: AbortSignal,
  ): AsyncGenerator<ChatEvent> {
    return this.stream(
      '/api/generate',
      this.buildGenerateBody(request, true),
      decodeGenerateChunk,
      request.model,
      signal,
    );
  }

  /**
   * Lists the models installed on the server, sorted by name.
   */
  async listModels(signal?: AbortSignal): Promise<ModelInfo[]> {
    const endpoint = this.url('/api/tags');
    const scope = this.openScope(signal);
    try {
      const response = await this.send(endpoint, { method: 'GET' }, scope);
      const text = await this.readText(response, endpoint, scope);
      const parsed = TagsResponseSchema.safeParse(this.parseJson(text, endpoint));
      if (!parsed.success) {
        throw invalidShape(endpoint, parsed.error);
      }
      return parsed.data.models
        .map((m) => ({
          name: m.name,
          sizeBytes: m.size ?? 0,
          modifiedAt: m.modified_at,
        }))
        .sort((a, b) => a.name.localeCompare(b.name));
    } finally {
      scope.dispose();
    }
  }

  private url(path: string): string {
    return `${this.host}${path}`;
  }

  private buildOptions(request: RequestOptions): WireOptions | undefined {
    const options: WireOptions = {};
    if (request.temperature !== undefined) {
      options.temperature = request.temperature;
    }
    if (request.contextWindow !== undefined) {
      options.num_ctx = request.contextWindow;
    }
    return Object.keys(options).length > 0 ? options : undefined;
  }

  private applyModes(body: WireRequest, request: RequestOptions): WireRequest {
    if (request.json) {
      body.format = 'json';
    }
    if (request.think) {
      body.think = true;
    }
    const options = this.buildOptions(request);
    if (options) {
      body.options = options;
    }
    return body;
  }

  private buildChatBody(request: ChatRequest, stream: boolean): WireRequest {
    return this.applyModes(
      {
        model: request.model,
        messages: request.turns.map((t) => ({ role: t.role, content: t.content })),
        stream,
      },
      request,
    );
  }

  private buildGenerateBody(
    request: GenerateRequest,
    stream: boolean,
  ): WireRequest {
    const body: WireRequest = {
      model: request.model,
      prompt: request.prompt,
      stream,
    };
    if (request.system) {
      body.system = request.system;
    }
    return this.applyModes(body, request);
  }

  private async complete(
    path: string,
    body: WireRequest,
    decode: ChunkDecoder,
    requestedModel: string,
    signal?: AbortSignal,
  ): Promise<ChatResult> {
    const endpoint = this.url(path);
    const scope = this.openScope(signal);
    try {
      const response = await this.post(endpoint, body, scope);
      const text = await this.readText(response, endpoint, scope);
      const chunk = decode(this.parseJson(text, endpoint), endpoint);
      const split = splitThinking(chunk.content);
      logger.debug(
        () =>
          `Buffered reply from ${endpoint}: ${split.content.length} chars, ${chunk.usage.completionTokens} tokens`,
      );
      return {
        content: split.content,
        thinking: chunk.thinking + split.thought,
        model: chunk.model || requestedModel,
        doneReason: chunk.doneReason,
        usage: chunk.usage,
      };
    } finally {
      scope.dispose();
    }
  }

  private async *stream(
    path: string,
    body: WireRequest,
    decode: ChunkDecoder,
    requestedModel: string,
    signal?: AbortSignal,
  ): AsyncGenerator<ChatEvent> {
    const endpoint = this.url(path);
    const scope = this.openScope(signal);
    try {
      const response = await this.post(endpoint, body, scope);
      const splitter = new ThinkingSplitter();
      for await (const line of this.readLines(response, endpoint, scope)) {
        const chunk = decode(this.parseJson(line, endpoint), endpoint);
        if (chunk.thinking) {
          yield { type: ChatEventType.Thought, value: chunk.thinking };
        }
        for (const segment of splitter.push(chunk.content)) {
          yield segment.kind === 'thought'
            ? { type: ChatEventType.Thought, value: segment.text }
            : { type: ChatEventType.Content, value: segment.text };
        }
        if (chunk.done) {
          for (const segment of splitter.flush()) {
            yield segment.kind === 'thought'
              ? { type: ChatEventType.Thought, value: segment.text }
              : { type: ChatEventType.Content, value: segment.text };
          }
          logger.debug(
            () =>
              `Stream from ${endpoint} finished (${chunk.doneReason ?? 'done'}), ${chunk.usage.completionTokens} tokens`,
          );
          yield {
            type: ChatEventType.Finished,
            value: {
              model: chunk.model || requestedModel,
              doneReason: chunk.doneReason,
              usage: chunk.usage,
            },
          };
          return;
        }
      }
      throw new ProtocolError(
        `Stream from ${endpoint} ended before the reply was complete`,
        endpoint,
      );
    } finally {
      scope.dispose();
    }
  }

  private async post(
    endpoint: string,
    body: WireRequest,
    scope: RequestScope,
  ): Promise<Response> {
    logger.debug(
      () => `POST ${endpoint} model=${body.model} stream=${body.stream}`,
    );
    return this.send(
      endpoint,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
      },
      scope,
    );
  }

  private async send(
    endpoint: string,
    init: RequestInit,
    scope: RequestScope,
  ): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchImpl(endpoint, { ...init, signal: scope.signal });
    } catch (error) {
      throw this.toTransportError(error, endpoint, scope);
    }
    if (!response.ok) {
      const detail = await this.readErrorDetail(response);
      throw new ProtocolError(
        `${endpoint} returned HTTP ${response.status}${detail ? `: ${detail}` : ''}`,
        endpoint,
        { status: response.status },
      );
    }
    return response;
  }

  private async readErrorDetail(response: Response): Promise<string> {
    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      logger.debug(() => `Could not read error body: ${getErrorMessage(error)}`);
      return '';
    }
    try {
      const parsed = ServerErrorSchema.safeParse(JSON.parse(text));
      if (parsed.success) {
        return parsed.data.error;
      }
    } catch {
      // not JSON; fall through to the raw text
    }
    return text.trim().slice(0, ERROR_DETAIL_LIMIT);
  }

  private async readText(
    response: Response,
    endpoint: string,
    scope: RequestScope,
  ): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      throw this.toTransportError(error, endpoint, scope);
    }
  }

  private async *readLines(
    response: Response,
    endpoint: string,
    scope: RequestScope,
  ): AsyncGenerator<string> {
    if (!response.body) {
      throw new ProtocolError(`${endpoint} returned an empty body`, endpoint, {
        status: response.status,
      });
    }
    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let buffer = '';
    let settled = false;
    try {
      for (;;) {
        const chunk = await reader.read().catch((error: unknown) => {
          settled = true;
          throw this.toTransportError(error, endpoint, scope);
        });
        if (scope.signal.aborted) {
          settled = true;
          throw this.toTransportError(scope.signal.reason, endpoint, scope);
        }
        if (chunk.done) {
          break;
        }
        buffer += decoder.decode(chunk.value, { stream: true });
        let newline = buffer.indexOf('\n');
        while (newline !== -1) {
          const line = buffer.slice(0, newline).trim();
          buffer = buffer.slice(newline + 1);
          if (line) {
            yield line;
          }
          newline = buffer.indexOf('\n');
        }
      }
      settled = true;
      const rest = (buffer + decoder.decode()).trim();
      if (rest) {
        yield rest;
      }
    } finally {
      // The consumer stopped early: release the connection.
      if (!settled) {
        await reader.cancel();
      }
      reader.releaseLock();
    }
  }

  private parseJson(text: string, endpoint: string): unknown {
    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (error) {
      throw new ProtocolError(
        `Malformed JSON from ${endpoint}: ${text.slice(0, ERROR_DETAIL_LIMIT)}`,
        endpoint,
        { cause: error },
      );
    }
    const serverError = ServerErrorSchema.safeParse(value);
    if (serverError.success) {
      throw new ProtocolError(
        `${endpoint} reported an error: ${serverError.data.error}`,
        endpoint,
      );
    }
    return value;
  }

  private openScope(external?: AbortSignal): RequestScope {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort(new Error(`timed out after ${this.timeoutMs}ms`));
    }, this.timeoutMs);
    const onAbort = () => controller.abort(external?.reason);
    if (external) {
      if (external.aborted) {
        controller.abort(external.reason);
      } else {
        external.addEventListener('abort', onAbort, { once: true });
      }
    }
    return {
      signal: controller.signal,
      cancelled: () => external?.aborted === true,
      timedOut: () => timedOut,
      dispose: () => {
        clearTimeout(timer);
        external?.removeEventListener('abort', onAbort);
      },
    };
  }

  private toTransportError(
    error: unknown,
    endpoint: string,
    scope: RequestScope,
  ): Error {
    if (error instanceof ProtocolError || error instanceof CancelledError) {
      return error;
    }
    if (scope.cancelled()) {
      return new CancelledError();
    }
    if (scope.timedOut()) {
      return new ConnectionError(
        `Request to ${endpoint} timed out after ${this.timeoutMs}ms`,
        endpoint,
        { code: 'ETIMEDOUT', cause: error },
      );
    }
    const cause = error instanceof Error ? error.cause : undefined;
    const code = isNodeError(cause) ? cause.code : undefined;
    const detail =
      cause instanceof Error ? cause.message : getErrorMessage(error);
    logger.debug(() => `Transport failure for ${endpoint}: ${detail}`);
    return new ConnectionError(
      `Could not connect to ${this.host}: ${detail}`,
      endpoint,
      { code, cause: error },
    );
  }
}
