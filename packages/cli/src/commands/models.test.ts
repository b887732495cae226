/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { formatModelList } from './models.js';
import { createTheme } from '../ui/colors.js';

const GB = 1024 ** 3;
const theme = createTheme(false);

const models = [
  { name: 'llama3:8b', sizeBytes: 4.7 * GB, modifiedAt: '2025-03-01T10:00:00Z' },
  { name: 'qwen3:8b', sizeBytes: 5.2 * GB },
];

describe('formatModelList', () => {
  it('marks the default model by family', () => {
    expect(
      formatModelList(models, theme, { defaultModel: 'llama3', plain: false }),
    ).toEqual([
      'Available models:',
      '',
      '  llama3:8b (4.7GB, 2025-03-01) (default)',
      '  qwen3:8b (5.2GB)',
    ]);
  });

  it('prints aligned columns in plain mode', () => {
    expect(
      formatModelList(models, theme, { defaultModel: 'llama3', plain: true }),
    ).toEqual([
      `  ${'llama3:8b'.padEnd(35)}   4.7GB`,
      `  ${'qwen3:8b'.padEnd(35)}   5.2GB`,
    ]);
  });

  it('suggests pulling a model when none are installed', () => {
    expect(
      formatModelList([], theme, { defaultModel: 'llama3', plain: false }),
    ).toEqual(['No models found. Pull one with: ollama pull <model>']);
  });
});
