/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { encoding_for_model } from '@dqbd/tiktoken';
import { DebugLogger } from '../debug/index.js';
import type { Turn } from '../core/turn.js';

const logger = new DebugLogger('ask:tokens');

// Role markers and separators the chat template adds around each message.
export const TURN_OVERHEAD_TOKENS = 4;

export type TokenEstimator = (text: string) => number;

let encoder: ReturnType<typeof encoding_for_model> | undefined;
let encoderFailed = false;

export function estimateTokensByLength(text: string): number {
  return Math.ceil(text.length / 3);
}

/**
 * Token count of `text` under the o200k encoding of gpt-4o. Local models
 * use their own vocabularies, so this is an estimate for budgeting only.
 * Special-token markers such as `<|endoftext|>` count as one token each.
 */
export const estimateTokens: TokenEstimator = (text) => {
  if (text.length === 0) {
    return 0;
  }
  if (!encoder && !encoderFailed) {
    try {
      encoder = encoding_for_model('gpt-4o');
    } catch (error) {
      encoderFailed = true;
      logger.warn(() => `tiktoken unavailable, estimating by length: ${error}`);
    }
  }
  if (!encoder) {
    return estimateTokensByLength(text);
  }
  try {
    return encoder.encode(text, 'all').length;
  } catch (error) {
    logger.warn(() => `tiktoken failed, estimating by length: ${error}`);
    return estimateTokensByLength(text);
  }
};

export function estimateTurnTokens(
  turn: Turn,
  estimator: TokenEstimator = estimateTokens,
): number {
  return estimator(turn.content) + TURN_OVERHEAD_TOKENS;
}

export function estimateTurnsTokens(
  turns: readonly Turn[],
  estimator: TokenEstimator = estimateTokens,
): number {
  return turns.reduce((sum, t) => sum + estimateTurnTokens(t, estimator), 0);
}
