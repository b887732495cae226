/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { Storage } from '../config/storage.js';
import { TurnSchema, type Turn } from '../core/turn.js';
import { DebugLogger } from '../debug/index.js';
import {
  InvalidSessionNameError,
  NotFoundError,
  SessionFormatError,
  getErrorMessage,
  isNodeError,
} from '../utils/errors.js';

const logger = new DebugLogger('ask:store');

export const DEFAULT_MAX_SESSIONS = 50;
const SESSION_EXTENSION = '.json';
// Coarsest mtime resolution among common file systems.
const MTIME_STEP_MS = 1000;

export const SessionRecordSchema = z.object({
  version: z.literal(1),
  name: z.string().min(1),
  model: z.string(),
  createdAt: z.string(),
  savedAt: z.string(),
  messages: z.array(TurnSchema),
});

/**
 * On-disk form of a saved session.
 */
export type SessionRecord = z.infer<typeof SessionRecordSchema>;

export interface SessionToSave {
  name: string;
  model: string;
  createdAt: string;
  messages: readonly Turn[];
}

export interface SavedSessionInfo {
  name: string;
  path: string;
  /** Time written into the record; file mtimes only order the sessions. */
  savedAt: Date;
  messageCount: number;
}

export interface SessionStoreOptions {
  directory?: string;
  maxSessions?: number;
}

interface StoredFile {
  name: string;
  path: string;
  mtimeMs: number;
}

export function validateSessionName(name: string): string {
  const trimmed = name.trim();
  if (trimmed.length === 0 || trimmed === '.' || trimmed === '..') {
    throw new InvalidSessionNameError(name);
  }
  return trimmed;
}

export function sessionFileName(name: string): string {
  return `${encodeURIComponent(name)}${SESSION_EXTENSION}`;
}

/**
 * Directory of named session files, newest-first, capped at `maxSessions`.
 */
export class SessionStore {
  readonly directory: string;
  readonly maxSessions: number;

  constructor(options: SessionStoreOptions = {}) {
    this.directory = options.directory ?? Storage.getDefaultHistoryDir();
    this.maxSessions = options.maxSessions ?? DEFAULT_MAX_SESSIONS;
    if (!Number.isInteger(this.maxSessions) || this.maxSessions < 1) {
      throw new RangeError(
        `maxSessions must be a positive integer, got ${this.maxSessions}`,
      );
    }
  }

  pathFor(name: string): string {
    return path.join(this.directory, sessionFileName(validateSessionName(name)));
  }

  /**
   * Writes the session atomically, overwriting any session of the same
   * name, then removes the oldest sessions beyond the retention limit.
   */
  async save(session: SessionToSave): Promise<SavedSessionInfo> {
    const name = validateSessionName(session.name);
    const filePath = this.pathFor(name);
    await fs.promises.mkdir(this.directory, { recursive: true });

    const record: SessionRecord = {
      version: 1,
      name,
      model: session.model,
      createdAt: session.createdAt,
      savedAt: new Date().toISOString(),
      messages: session.messages.map((t) => ({
        role: t.role,
        content: t.content,
      })),
    };

    const others = (await this.scan()).filter((f) => f.path !== filePath);
    const tempPath = `${filePath}.tmp`;
    await fs.promises.writeFile(
      tempPath,
      JSON.stringify(record, null, 2),
      'utf-8',
    );
    await fs.promises.rename(tempPath, filePath);

    const newest = others.reduce((max, f) => Math.max(max, f.mtimeMs), 0);
    const stamp = new Date(Math.max(Date.now(), newest + MTIME_STEP_MS));
    await fs.promises.utimes(filePath, stamp, stamp);

    logger.debug(
      () =>
        `Saved session '${name}' (${record.messages.length} messages) to ${filePath}`,
    );

    await this.prune();

    return {
      name,
      path: filePath,
      savedAt: new Date(record.savedAt),
      messageCount: record.messages.length,
    };
  }

  /**
   * Loads by exact name, else the most recently saved session whose name
   * contains `query`.
   */
  async load(query: string): Promise<SessionRecord> {
    const name = validateSessionName(query);
    const exact = this.pathFor(name);
    const raw = await this.readIfExists(exact);
    if (raw !== undefined) {
      return this.parse(raw, exact);
    }

    const needle = name.toLowerCase();
    const match = (await this.scan()).find((f) =>
      f.name.toLowerCase().includes(needle),
    );
    if (!match) {
      throw new NotFoundError(name);
    }
    logger.debug(() => `No exact session '${name}', using '${match.name}'`);
    const partial = await this.readIfExists(match.path);
    if (partial === undefined) {
      throw new NotFoundError(name);
    }
    return this.parse(partial, match.path);
  }

  /**
   * Saved sessions, newest first. Files that fail to parse are left out.
   */
  async list(): Promise<SavedSessionInfo[]> {
    const infos: SavedSessionInfo[] = [];
    for (const file of await this.scan()) {
      const raw = await this.readIfExists(file.path);
      if (raw === undefined) {
        continue;
      }
      try {
        const record = this.parse(raw, file.path);
        infos.push({
          name: record.name,
          path: file.path,
          savedAt: new Date(record.savedAt),
          messageCount: record.messages.length,
        });
      } catch (error) {
        logger.warn(() => `Skipping ${file.path}: ${getErrorMessage(error)}`);
      }
    }
    return infos;
  }

  async exists(name: string): Promise<boolean> {
    try {
      await fs.promises.access(this.pathFor(name));
      return true;
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  async delete(name: string): Promise<boolean> {
    try {
      await fs.promises.unlink(this.pathFor(name));
      logger.debug(() => `Deleted session '${name}'`);
      return true;
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  private parse(raw: string, filePath: string): SessionRecord {
    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch (error) {
      throw new SessionFormatError(
        `Session file ${filePath} is not valid JSON`,
        filePath,
        error,
      );
    }
    const parsed = SessionRecordSchema.safeParse(value);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new SessionFormatError(
        `Session file ${filePath} is malformed: ${issue?.path.join('.') || 'record'} ${issue?.message ?? ''}`.trim(),
        filePath,
        parsed.error,
      );
    }
    return parsed.data;
  }

  private async readIfExists(filePath: string): Promise<string | undefined> {
    try {
      return await fs.promises.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }
  }

  /** Session files, newest first; ties broken by name. */
  private async scan(): Promise<StoredFile[]> {
    let entries: string[];
    try {
      entries = await fs.promises.readdir(this.directory);
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const files: StoredFile[] = [];
    for (const entry of entries) {
      if (!entry.endsWith(SESSION_EXTENSION)) {
        continue;
      }
      const name = decodeName(entry.slice(0, -SESSION_EXTENSION.length));
      if (name === undefined) {
        continue;
      }
      const filePath = path.join(this.directory, entry);
      try {
        const stat = await fs.promises.stat(filePath);
        if (stat.isFile()) {
          files.push({ name, path: filePath, mtimeMs: stat.mtimeMs });
        }
      } catch (error) {
        // Removed by a concurrent prune.
        if (!(isNodeError(error) && error.code === 'ENOENT')) {
          throw error;
        }
      }
    }
    return files.sort(
      (a, b) => b.mtimeMs - a.mtimeMs || a.name.localeCompare(b.name),
    );
  }

  private async prune(): Promise<void> {
    const files = await this.scan();
    for (const stale of files.slice(this.maxSessions)) {
      try {
        await fs.promises.unlink(stale.path);
        logger.debug(() => `Pruned session '${stale.name}'`);
      } catch (error) {
        if (!(isNodeError(error) && error.code === 'ENOENT')) {
          throw error;
        }
      }
    }
  }
}

function decodeName(encoded: string): string | undefined {
  try {
    return decodeURIComponent(encoded);
  } catch {
    logger.debug(() => `Ignoring file with undecodable name: ${encoded}`);
    return undefined;
  }
}
