/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { toAscii } from './ascii.js';

describe('toAscii', () => {
  it('drops characters outside 7-bit ASCII', () => {
    expect(toAscii('naïve → “quoted” ✓ ok')).toBe('nave  quoted  ok');
  });

  it('keeps whitespace and control characters', () => {
    expect(toAscii('a\tb\nc')).toBe('a\tb\nc');
  });
});
