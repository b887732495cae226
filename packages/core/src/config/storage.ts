/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as path from 'node:path';
import * as os from 'node:os';

export const ASK_DIR = '.ask';
export const HISTORY_DIR_NAME = '.ask_history';
export const SETTINGS_FILENAME = 'settings.json';

/**
 * Well-known locations under the user's home directory.
 */
export class Storage {
  static getHomeDir(): string {
    return os.homedir() || os.tmpdir();
  }

  static getGlobalAskDir(): string {
    return path.join(Storage.getHomeDir(), ASK_DIR);
  }

  static getGlobalSettingsPath(): string {
    return path.join(Storage.getGlobalAskDir(), SETTINGS_FILENAME);
  }

  static getDefaultHistoryDir(): string {
    return path.join(Storage.getHomeDir(), HISTORY_DIR_NAME);
  }
}
