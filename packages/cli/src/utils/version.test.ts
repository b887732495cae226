/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { getCliVersion } from './version.js';

describe('getCliVersion', () => {
  let dir: string;

  beforeEach(() => {
    vi.stubEnv('CLI_VERSION', '');
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ask-version-'));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('prefers CLI_VERSION', () => {
    vi.stubEnv('CLI_VERSION', '2.0.0-test');

    expect(getCliVersion(dir)).toBe('2.0.0-test');
  });

  it('finds the nearest package.json of this project', () => {
    const nested = path.join(dir, 'src', 'utils');
    fs.mkdirSync(nested, { recursive: true });
    fs.writeFileSync(
      path.join(dir, 'package.json'),
      JSON.stringify({ name: '@ask-cli/cli', version: '3.1.4' }),
    );
    fs.writeFileSync(
      path.join(dir, 'src', 'package.json'),
      JSON.stringify({ name: 'unrelated', version: '0.0.1' }),
    );

    expect(getCliVersion(nested)).toBe('3.1.4');
  });

  it('works from the real module location', () => {
    expect(getCliVersion()).toBe('1.0.0');
  });
});
