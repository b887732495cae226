/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import * as os from 'node:os';
import * as path from 'node:path';
import { Storage } from './storage.js';

describe('Storage', () => {
  it('returns path to ~/.ask/settings.json', () => {
    expect(Storage.getGlobalSettingsPath()).toBe(
      path.join(os.homedir(), '.ask', 'settings.json'),
    );
  });

  it('keeps sessions in ~/.ask_history by default', () => {
    expect(Storage.getDefaultHistoryDir()).toBe(
      path.join(os.homedir(), '.ask_history'),
    );
  });
});
