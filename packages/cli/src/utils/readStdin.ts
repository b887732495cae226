/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '@ask-cli/core';

const logger = new DebugLogger('ask:stdin');

export const MAX_STDIN_SIZE = 8 * 1024 * 1024;

/**
 * Reads piped input to the end. Input past MAX_STDIN_SIZE is dropped with
 * a warning.
 */
export async function readStdin(
  stream: NodeJS.ReadableStream = process.stdin,
  maxSize: number = MAX_STDIN_SIZE,
): Promise<string> {
  const chunks: Buffer[] = [];
  let total = 0;
  let truncated = false;

  for await (const chunk of stream) {
    const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    if (total + buffer.length > maxSize) {
      chunks.push(buffer.subarray(0, maxSize - total));
      total = maxSize;
      truncated = true;
      break;
    }
    chunks.push(buffer);
    total += buffer.length;
  }

  if (truncated) {
    process.stderr.write(
      `Warning: stdin input truncated to ${maxSize} bytes.\n`,
    );
  }
  logger.debug(() => `Read ${total} bytes from stdin`);
  return Buffer.concat(chunks).toString('utf-8');
}
