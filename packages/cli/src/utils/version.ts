/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const PackageJsonSchema = z.object({
  name: z.string().optional(),
  version: z.string(),
});

const PACKAGE_NAMES = new Set(['@ask-cli/cli', 'ask-cli']);

/**
 * Version from CLI_VERSION, else from the nearest package.json of this
 * project above this module.
 */
export function getCliVersion(
  startDir: string = path.dirname(fileURLToPath(import.meta.url)),
): string {
  const fromEnv = process.env['CLI_VERSION'];
  if (fromEnv) {
    return fromEnv;
  }
  let dir = startDir;
  for (;;) {
    const candidate = path.join(dir, 'package.json');
    if (fs.existsSync(candidate)) {
      const parsed = PackageJsonSchema.safeParse(
        JSON.parse(fs.readFileSync(candidate, 'utf-8')),
      );
      if (parsed.success && PACKAGE_NAMES.has(parsed.data.name ?? '')) {
        return parsed.data.version;
      }
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return 'unknown';
    }
    dir = parent;
  }
}
