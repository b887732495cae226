/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Unset NO_COLOR and debug variables so local and CI runs behave the same
delete process.env['NO_COLOR'];
delete process.env['ASK_DEBUG'];
delete process.env['ASK_DEBUG_OUTPUT'];
