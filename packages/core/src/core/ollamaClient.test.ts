/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { OllamaClient, type ChatRequest } from './ollamaClient.js';
import { ChatEventType, createTurn, type ChatEvent } from './turn.js';
import {
  CancelledError,
  ConnectionError,
  ProtocolError,
} from '../utils/errors.js';

type FetchArgs = Parameters<typeof fetch>;

const HOST = 'http://ollama.test:11434';
const encoder = new TextEncoder();

function abortError(): DOMException {
  return new DOMException('This operation was aborted', 'AbortError');
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * NDJSON body. Raw strings are sent as-is; with `hang` the stream stays
 * open after the last line until the request is aborted.
 */
function ndjsonResponse(
  lines: Array<unknown>,
  options: { signal?: AbortSignal | null; hang?: boolean } = {},
): Response {
  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const line of lines) {
        const text = typeof line === 'string' ? line : JSON.stringify(line);
        controller.enqueue(encoder.encode(`${text}\n`));
      }
      if (options.hang) {
        options.signal?.addEventListener('abort', () =>
          controller.error(abortError()),
        );
      } else {
        controller.close();
      }
    },
  });
  return new Response(stream, {
    status: 200,
    headers: { 'Content-Type': 'application/x-ndjson' },
  });
}

function bodyOf(args: FetchArgs): Record<string, unknown> {
  return z.record(z.unknown()).parse(JSON.parse(String(args[1]?.body)));
}

/** A deterministic in-process stand-in for the chat endpoint. */
function fakeServer(fragments: string[], thinking: string[] = []) {
  return vi.fn<(...args: FetchArgs) => Promise<Response>>(
    async (...args: FetchArgs) => {
      const body = bodyOf(args);
      if (body['stream'] === false) {
        return jsonResponse({
          model: 'llama3',
          message: {
            role: 'assistant',
            content: fragments.join(''),
            thinking: thinking.join('') || undefined,
          },
          done: true,
          done_reason: 'stop',
          prompt_eval_count: 12,
          eval_count: fragments.length,
        });
      }
      return ndjsonResponse([
        ...thinking.map((t) => ({
          model: 'llama3',
          message: { role: 'assistant', content: '', thinking: t },
          done: false,
        })),
        ...fragments.map((f) => ({
          model: 'llama3',
          message: { role: 'assistant', content: f },
          done: false,
        })),
        {
          model: 'llama3',
          message: { role: 'assistant', content: '' },
          done: true,
          done_reason: 'stop',
          prompt_eval_count: 12,
          eval_count: fragments.length,
        },
      ]);
    },
  );
}

async function collect(stream: AsyncIterable<ChatEvent>): Promise<ChatEvent[]> {
  const events: ChatEvent[] = [];
  for await (const event of stream) {
    events.push(event);
  }
  return events;
}

function contentOf(events: ChatEvent[]): string {
  return events
    .map((e) => (e.type === ChatEventType.Content ? e.value : ''))
    .join('');
}

const request: ChatRequest = {
  model: 'llama3',
  turns: [createTurn('user', '2+2?')],
};

describe('OllamaClient', () => {
  describe('chatStream', () => {
    it('yields content fragments in order and then Finished', async () => {
      const fetchMock = fakeServer(['The ', 'answer ', 'is 4.']);
      const client = new OllamaClient({ host: HOST, fetch: fetchMock });

      const events = await collect(client.chatStream(request));

      expect(events).toEqual([
        { type: ChatEventType.Content, value: 'The ' },
        { type: ChatEventType.Content, value: 'answer ' },
        { type: ChatEventType.Content, value: 'is 4.' },
        {
          type: ChatEventType.Finished,
          value: {
            model: 'llama3',
            doneReason: 'stop',
            usage: { promptTokens: 12, completionTokens: 3 },
          },
        },
      ]);
      expect(fetchMock.mock.calls[0][0]).toBe(`${HOST}/api/chat`);
    });

    it('concatenates to the same text as the buffered reply', async () => {
      const fragments = ['Par', 'is is the ', 'capital', ' of France.'];
      const client = new OllamaClient({
        host: HOST,
        fetch: fakeServer(fragments),
      });

      const streamed = contentOf(await collect(client.chatStream(request)));
      const buffered = await client.chat(request);

      expect(streamed).toBe('Paris is the capital of France.');
      expect(buffered.content).toBe(streamed);
    });

    it('reports the thinking field as thought events', async () => {
      const client = new OllamaClient({
        host: HOST,
        fetch: fakeServer(['4'], ['two ', 'plus two']),
      });

      const events = await collect(
        client.chatStream({ ...request, think: true }),
      );

      expect(events.slice(0, 3)).toEqual([
        { type: ChatEventType.Thought, value: 'two ' },
        { type: ChatEventType.Thought, value: 'plus two' },
        { type: ChatEventType.Content, value: '4' },
      ]);
    });

    it('keeps inline think blocks out of the content', async () => {
      const client = new OllamaClient({
        host: HOST,
        fetch: fakeServer(['<thi', 'nk>add</th', 'ink>', '4']),
      });

      const events = await collect(client.chatStream(request));

      expect(contentOf(events)).toBe('4');
      expect(events).toContainEqual({
        type: ChatEventType.Thought,
        value: 'add',
      });
    });

    it('sends the model, turns and options in the request body', async () => {
      const fetchMock = fakeServer(['{}']);
      const client = new OllamaClient({ host: `${HOST}/`, fetch: fetchMock });

      await collect(
        client.chatStream({
          model: 'qwen3:8b',
          turns: [createTurn('system', 'be brief'), createTurn('user', 'hi')],
          json: true,
          think: true,
          temperature: 0.2,
          contextWindow: 8192,
        }),
      );

      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe(`${HOST}/api/chat`);
      expect(init?.method).toBe('POST');
      expect(bodyOf(fetchMock.mock.calls[0])).toEqual({
        model: 'qwen3:8b',
        messages: [
          { role: 'system', content: 'be brief' },
          { role: 'user', content: 'hi' },
        ],
        stream: true,
        format: 'json',
        think: true,
        options: { temperature: 0.2, num_ctx: 8192 },
      });
    });

    it('omits format, think and options when not requested', async () => {
      const fetchMock = fakeServer(['ok']);
      const client = new OllamaClient({ host: HOST, fetch: fetchMock });

      await client.chat(request);

      expect(bodyOf(fetchMock.mock.calls[0])).toEqual({
        model: 'llama3',
        messages: [{ role: 'user', content: '2+2?' }],
        stream: false,
      });
    });

    it('fails with ProtocolError when a line is not JSON', async () => {
      const client = new OllamaClient({
        host: HOST,
        fetch: async () =>
          ndjsonResponse([
            { model: 'llama3', message: { content: 'a' }, done: false },
            'not json',
          ]),
      });

      await expect(collect(client.chatStream(request))).rejects.toBeInstanceOf(
        ProtocolError,
      );
    });

    it('fails with ProtocolError when the stream ends early', async () => {
      const client = new OllamaClient({
        host: HOST,
        fetch: async () =>
          ndjsonResponse([
            { model: 'llama3', message: { content: 'a' }, done: false },
          ]),
      });

      await expect(collect(client.chatStream(request))).rejects.toThrow(
        `Stream from ${HOST}/api/chat ended before the reply was complete`,
      );
    });

    it('surfaces an error object sent mid-stream', async () => {
      const client = new OllamaClient({
        host: HOST,
        fetch: async () =>
          ndjsonResponse([
            { model: 'llama3', message: { content: 'a' }, done: false },
            { error: 'out of memory' },
          ]),
      });

      await expect(collect(client.chatStream(request))).rejects.toThrow(
        `${HOST}/api/chat reported an error: out of memory`,
      );
    });

    it('stops with CancelledError when the caller aborts mid-stream', async () => {
      const controller = new AbortController();
      const client = new OllamaClient({
        host: HOST,
        fetch: async (_input, init) =>
          ndjsonResponse(
            [{ model: 'llama3', message: { content: 'partial' }, done: false }],
            { signal: init?.signal, hang: true },
          ),
      });

      const received: ChatEvent[] = [];
      const run = async () => {
        for await (const event of client.chatStream(request, controller.signal)) {
          received.push(event);
          controller.abort();
        }
      };

      await expect(run()).rejects.toBeInstanceOf(CancelledError);
      expect(received).toEqual([
        { type: ChatEventType.Content, value: 'partial' },
      ]);
    });
  });

  describe('chat', () => {
    it('returns the reply with inline thinking split out', async () => {
      const client = new OllamaClient({
        host: HOST,
        fetch: fakeServer(['<think>plan</think>', '4']),
      });

      const result = await client.chat(request);

      expect(result).toEqual({
        content: '4',
        thinking: 'plan',
        model: 'llama3',
        doneReason: 'stop',
        usage: { promptTokens: 12, completionTokens: 2 },
      });
    });

    it('maps a refused connection to ConnectionError', async () => {
      const refused = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:11434'), {
        code: 'ECONNREFUSED',
      });
      const client = new OllamaClient({
        host: HOST,
        fetch: async () => {
          throw new TypeError('fetch failed', { cause: refused });
        },
      });

      const error = await client.chat(request).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConnectionError);
      expect(error).toMatchObject({
        code: 'ECONNREFUSED',
        endpoint: `${HOST}/api/chat`,
        message: `Could not connect to ${HOST}: connect ECONNREFUSED 127.0.0.1:11434`,
      });
    });

    it('maps an error status to ProtocolError with the server message', async () => {
      const client = new OllamaClient({
        host: HOST,
        fetch: async () => jsonResponse({ error: "model 'nope' not found" }, 404),
      });

      const error = await client.chat(request).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProtocolError);
      expect(error).toMatchObject({
        status: 404,
        message: `${HOST}/api/chat returned HTTP 404: model 'nope' not found`,
      });
    });

    it('rejects a reply that does not match the expected shape', async () => {
      const client = new OllamaClient({
        host: HOST,
        fetch: async () => jsonResponse({ message: { content: 42 }, done: true }),
      });

      await expect(client.chat(request)).rejects.toBeInstanceOf(ProtocolError);
    });

    it('fails with CancelledError when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const client = new OllamaClient({
        host: HOST,
        fetch: async (_input, init) => {
          if (init?.signal?.aborted) {
            throw abortError();
          }
          return jsonResponse({});
        },
      });

      await expect(client.chat(request, controller.signal)).rejects.toBeInstanceOf(
        CancelledError,
      );
    });

    it('fails with ConnectionError when the request times out', async () => {
      const client = new OllamaClient({
        host: HOST,
        timeoutMs: 20,
        fetch: (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(abortError()));
          }),
      });

      const error = await client.chat(request).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConnectionError);
      expect(error).toMatchObject({ code: 'ETIMEDOUT' });
    });
  });

  describe('generate', () => {
    it('posts the prompt to the generate endpoint', async () => {
      const fetchMock = vi.fn<(...args: FetchArgs) => Promise<Response>>(
        async () =>
          jsonResponse({
            model: 'llama3',
            response: 'Bonjour',
            done: true,
            eval_count: 2,
          }),
      );
      const client = new OllamaClient({ host: HOST, fetch: fetchMock });

      const result = await client.generate({
        model: 'llama3',
        prompt: 'Say hello in French',
        system: 'one word',
      });

      expect(result.content).toBe('Bonjour');
      expect(fetchMock.mock.calls[0][0]).toBe(`${HOST}/api/generate`);
      expect(bodyOf(fetchMock.mock.calls[0])).toEqual({
        model: 'llama3',
        prompt: 'Say hello in French',
        system: 'one word',
        stream: false,
      });
    });

    it('streams response fragments', async () => {
      const client = new OllamaClient({
        host: HOST,
        fetch: async () =>
          ndjsonResponse([
            { model: 'llama3', response: 'Bon', done: false },
            { model: 'llama3', response: 'jour', done: false },
            { model: 'llama3', response: '', done: true, done_reason: 'stop' },
          ]),
      });

      const events = await collect(
        client.generateStream({ model: 'llama3', prompt: 'hello' }),
      );

      expect(contentOf(events)).toBe('Bonjour');
      expect(events.at(-1)?.type).toBe(ChatEventType.Finished);
    });
  });

  describe('listModels', () => {
    it('returns installed models sorted by name', async () => {
      const client = new OllamaClient({
        host: HOST,
        fetch: async () =>
          jsonResponse({
            models: [
              { name: 'qwen3:8b', size: 5_200_000_000, modified_at: '2025-05-01T10:00:00Z' },
              { name: 'llama3:latest', size: 4_700_000_000 },
            ],
          }),
      });

      expect(await client.listModels()).toEqual([
        { name: 'llama3:latest', sizeBytes: 4_700_000_000, modifiedAt: undefined },
        {
          name: 'qwen3:8b',
          sizeBytes: 5_200_000_000,
          modifiedAt: '2025-05-01T10:00:00Z',
        },
      ]);
    });
  });
});
