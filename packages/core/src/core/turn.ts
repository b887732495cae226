/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';

export const ROLES = ['system', 'user', 'assistant'] as const;

export type Role = (typeof ROLES)[number];

/**
 * One role-tagged message of a conversation.
 */
export interface Turn {
  readonly role: Role;
  readonly content: string;
}

export const TurnSchema = z.object({
  role: z.enum(ROLES),
  content: z.string(),
});

/**
 * Creates a frozen turn; turns never change once they are part of a session.
 */
export function createTurn(role: Role, content: string): Turn {
  return Object.freeze({ role, content });
}

export enum ChatEventType {
  Content = 'content',
  Thought = 'thought',
  Finished = 'finished',
}

export interface UsageStats {
  promptTokens: number;
  completionTokens: number;
}

export type ChatContentEvent = {
  type: ChatEventType.Content;
  value: string;
};

export type ChatThoughtEvent = {
  type: ChatEventType.Thought;
  value: string;
};

export type ChatFinishedEvent = {
  type: ChatEventType.Finished;
  value: {
    model: string;
    doneReason?: string;
    usage: UsageStats;
  };
};

export type ChatEvent = ChatContentEvent | ChatThoughtEvent | ChatFinishedEvent;
