/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Export config
export * from './config/config.js';
export * from './config/storage.js';

// Export Core Logic
export * from './core/turn.js';
export * from './core/thinkingSplitter.js';
export * from './core/ollamaClient.js';
export * from './core/chatSession.js';

// Export storage
export * from './storage/SessionStore.js';

// Export utilities
export * from './utils/errors.js';
export * from './utils/tokens.js';

// Export debug logging
export * from './debug/index.js';
