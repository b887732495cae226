/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../debug/index.js';
import type { SavedSessionInfo, SessionStore } from '../storage/SessionStore.js';
import {
  estimateTokens,
  estimateTurnTokens,
  estimateTurnsTokens,
  type TokenEstimator,
} from '../utils/tokens.js';
import { createTurn, type Turn } from './turn.js';

const logger = new DebugLogger('ask:session');

/**
 * Limits on what is sent to the model. Either bound may be omitted; an
 * empty budget keeps everything.
 */
export interface ContextBudget {
  maxTurns?: number;
  maxTokens?: number;
}

export interface ChatSessionOptions {
  model: string;
  store: SessionStore;
  systemPrompt?: string;
  estimator?: TokenEstimator;
  now?: () => Date;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as YYYYMMDD_HHMMSS. */
export function timestampName(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function isEmptyBudget(budget: ContextBudget): boolean {
  return budget.maxTurns === undefined && budget.maxTokens === undefined;
}

/**
 * Drops the oldest evictable turns of `turns` (in place) until the budget
 * holds or nothing evictable is left. A leading system turn and the
 * trailing `pinnedTail` turns are never evicted.
 */
function evict(
  turns: Turn[],
  budget: ContextBudget,
  estimator: TokenEstimator,
  pinnedTail = 0,
): Turn[] {
  if (isEmptyBudget(budget)) {
    return [];
  }
  const head = turns[0]?.role === 'system' ? 1 : 0;
  let tokens = estimateTurnsTokens(turns, estimator);
  const removed: Turn[] = [];
  const over = () =>
    (budget.maxTurns !== undefined && turns.length > budget.maxTurns) ||
    (budget.maxTokens !== undefined && tokens > budget.maxTokens);

  while (over() && turns.length - head - pinnedTail > 0) {
    const [oldest] = turns.splice(head, 1);
    tokens -= estimateTurnTokens(oldest, estimator);
    removed.push(oldest);
  }
  return removed;
}

/**
 * An in-memory conversation that can be saved to and restored from a
 * {@link SessionStore}.
 */
export class ChatSession {
  private turns: Turn[] = [];
  private _model: string;
  private _name: string | undefined;
  private _createdAt: string;
  private readonly store: SessionStore;
  private readonly estimator: TokenEstimator;
  private readonly now: () => Date;

  constructor(options: ChatSessionOptions) {
    this._model = options.model;
    this.store = options.store;
    this.estimator = options.estimator ?? estimateTokens;
    this.now = options.now ?? (() => new Date());
    this._createdAt = this.now().toISOString();
    if (options.systemPrompt) {
      this.turns.push(createTurn('system', options.systemPrompt));
    }
  }

  get model(): string {
    return this._model;
  }

  set model(value: string) {
    this._model = value;
  }

  /** Name of the session file this conversation was last saved to or loaded from. */
  get name(): string | undefined {
    return this._name;
  }

  get createdAt(): string {
    return this._createdAt;
  }

  get length(): number {
    return this.turns.length;
  }

  append(turn: Turn): void {
    this.turns.push(Object.isFrozen(turn) ? turn : createTurn(turn.role, turn.content));
  }

  getTurns(): Turn[] {
    return [...this.turns];
  }

  async save(name?: string): Promise<SavedSessionInfo> {
    const info = await this.store.save({
      name: name ?? timestampName(this.now()),
      model: this._model,
      createdAt: this._createdAt,
      messages: this.turns,
    });
    this._name = info.name;
    return info;
  }

  /**
   * Replaces this conversation with a saved one. On any failure the
   * current state is left as it was.
   */
  async load(name: string): Promise<void> {
    const record = await this.store.load(name);
    this.turns = record.messages.map((m) => createTurn(m.role, m.content));
    this._model = record.model || this._model;
    this._name = record.name;
    this._createdAt = record.createdAt;
    logger.debug(
      () => `Loaded session '${record.name}' with ${this.turns.length} turns`,
    );
  }

  /**
   * Evicts the oldest turns in place until the conversation fits `budget`.
   * Returns the removed turns, oldest first.
   */
  truncate(budget: ContextBudget): Turn[] {
    const removed = evict(this.turns, budget, this.estimator);
    if (removed.length > 0) {
      logger.debug(() => `Truncated ${removed.length} turns`);
    }
    return removed;
  }

  /**
   * The turns to send for the next request: the same eviction as
   * {@link truncate}, applied to a copy, with `pending` appended and kept.
   */
  contextWindow(budget: ContextBudget, pending?: Turn): Turn[] {
    const window = pending ? [...this.turns, pending] : [...this.turns];
    evict(window, budget, this.estimator, pending ? 1 : 0);
    return window;
  }

  clear(): void {
    this.turns = this.turns[0]?.role === 'system' ? [this.turns[0]] : [];
    this._name = undefined;
    this._createdAt = this.now().toISOString();
  }

  tokenEstimate(): number {
    return estimateTurnsTokens(this.turns, this.estimator);
  }
}
