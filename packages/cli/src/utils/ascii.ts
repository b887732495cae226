/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/** Drops every character outside 7-bit ASCII. */
export function toAscii(text: string): string {
  return text.replace(/[^\x00-\x7F]/g, '');
}
