/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Environment that would leak into colour, debug and config resolution
delete process.env['NO_COLOR'];
delete process.env['ASK_DEBUG'];
delete process.env['ASK_DEBUG_OUTPUT'];
delete process.env['DEBUG'];
delete process.env['ASK_MODEL'];
delete process.env['OLLAMA_HOST'];
delete process.env['ASK_HISTORY_DIR'];
