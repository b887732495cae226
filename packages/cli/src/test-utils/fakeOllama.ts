/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { vi } from 'vitest';
import { z } from 'zod';

export type FetchArgs = Parameters<typeof fetch>;

export interface FakeOllamaOptions {
  /** Reply fragments, streamed one NDJSON line each */
  reply?: string[];
  thinking?: string[];
  models?: Array<{ name: string; size: number; modified_at?: string }>;
  /** Fail every chat request with this HTTP status */
  status?: number;
  /** Keep a streamed reply open after its fragments until the request aborts */
  hang?: boolean;
}

const encoder = new TextEncoder();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function ndjsonResponse(
  lines: unknown[],
  holdUntil?: AbortSignal,
): Response {
  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const line of lines) {
        controller.enqueue(encoder.encode(`${JSON.stringify(line)}\n`));
      }
      if (holdUntil) {
        holdUntil.addEventListener(
          'abort',
          () => controller.error(holdUntil.reason),
          { once: true },
        );
        return;
      }
      controller.close();
    },
  });
  return new Response(stream, {
    status: 200,
    headers: { 'Content-Type': 'application/x-ndjson' },
  });
}

export function requestBody(args: FetchArgs): Record<string, unknown> {
  return z.record(z.unknown()).parse(JSON.parse(String(args[1]?.body)));
}

export function requestUrl(args: FetchArgs): string {
  const [input] = args;
  return input instanceof Request ? input.url : String(input);
}

/**
 * In-process stand-in for the inference server: answers /api/tags and
 * /api/chat, streamed or buffered according to the request body.
 */
export function fakeOllama(options: FakeOllamaOptions = {}) {
  const reply = options.reply ?? ['Hello', ' there'];
  const thinking = options.thinking ?? [];
  return vi.fn<(...args: FetchArgs) => Promise<Response>>(
    async (...args: FetchArgs) => {
      if (requestUrl(args).endsWith('/api/tags')) {
        return jsonResponse({ models: options.models ?? [] });
      }
      if (options.status !== undefined) {
        return jsonResponse({ error: 'model not found' }, options.status);
      }
      const body = requestBody(args);
      const model = String(body['model']);
      if (body['stream'] === false) {
        return jsonResponse({
          model,
          message: {
            role: 'assistant',
            content: reply.join(''),
            thinking: thinking.join('') || undefined,
          },
          done: true,
          done_reason: 'stop',
          prompt_eval_count: 3,
          eval_count: reply.length,
        });
      }
      const fragments = [
        ...thinking.map((t) => ({
          model,
          message: { role: 'assistant', content: '', thinking: t },
          done: false,
        })),
        ...reply.map((f) => ({
          model,
          message: { role: 'assistant', content: f },
          done: false,
        })),
      ];
      const signal = args[1]?.signal;
      if (options.hang && signal) {
        return ndjsonResponse(fragments, signal);
      }
      return ndjsonResponse([
        ...fragments,
        {
          model,
          message: { role: 'assistant', content: '' },
          done: true,
          done_reason: 'stop',
          prompt_eval_count: 3,
          eval_count: reply.length,
        },
      ]);
    },
  );
}

/** Collects everything written to it. */
export class MemorySink {
  text = '';

  write(chunk: string): boolean {
    this.text += chunk;
    return true;
  }
}
