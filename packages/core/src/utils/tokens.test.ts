/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import {
  TURN_OVERHEAD_TOKENS,
  estimateTokens,
  estimateTokensByLength,
  estimateTurnsTokens,
} from './tokens.js';
import { createTurn } from '../core/turn.js';

describe('estimateTokens', () => {
  it('is zero for empty text', () => {
    expect(estimateTokens('')).toBe(0);
  });

  it('grows with the text', () => {
    const short = estimateTokens('hello');
    const long = estimateTokens('hello '.repeat(50));

    expect(short).toBeGreaterThan(0);
    expect(long).toBeGreaterThan(short);
  });

  it('counts text that contains special-token markers', () => {
    const plain = estimateTokens('what does  mean?');
    const marked = estimateTokens('what does <|endoftext|> mean?');

    expect(marked).toBeGreaterThan(plain);
  });
});

describe('estimateTokensByLength', () => {
  it('counts three characters per token, rounding up', () => {
    expect(estimateTokensByLength('abcdefg')).toBe(3);
  });
});

describe('estimateTurnsTokens', () => {
  it('adds a fixed overhead per turn', () => {
    const turns = [createTurn('user', 'abcd'), createTurn('assistant', 'ef')];

    expect(estimateTurnsTokens(turns, (text) => text.length)).toBe(
      6 + 2 * TURN_OVERHEAD_TOKENS,
    );
  });
});
