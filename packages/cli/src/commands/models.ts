/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ModelInfo } from '@ask-cli/core';
import type { Theme } from '../ui/colors.js';

const BYTES_PER_GB = 1024 ** 3;

export interface ModelListOptions {
  /** Model marked "(default)"; compared by family, ignoring the tag */
  defaultModel: string;
  plain: boolean;
}

function family(model: string): string {
  return model.split(':')[0];
}

function gigabytes(bytes: number): string {
  return (bytes / BYTES_PER_GB).toFixed(1);
}

/**
 * Renders the installed models, one per line.
 */
export function formatModelList(
  models: readonly ModelInfo[],
  theme: Theme,
  options: ModelListOptions,
): string[] {
  if (models.length === 0) {
    return ['No models found. Pull one with: ollama pull <model>'];
  }
  if (options.plain) {
    return models.map(
      (m) => `  ${m.name.padEnd(35)} ${gigabytes(m.sizeBytes).padStart(5)}GB`,
    );
  }
  return [
    theme.info('Available models:'),
    '',
    ...models.map((m) => {
      const modified = m.modifiedAt ? `, ${m.modifiedAt.slice(0, 10)}` : '';
      const marker =
        family(m.name) === family(options.defaultModel)
          ? theme.warning(' (default)')
          : '';
      return `  ${theme.success(m.name)} (${gigabytes(m.sizeBytes)}GB${modified})${marker}`;
    }),
  ];
}
