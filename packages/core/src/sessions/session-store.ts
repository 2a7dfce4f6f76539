/**
 * SessionStore — thread id → SessionRecord, persisted to a single JSON file.
 *
 * Memory and disk are kept in step: every mutation rewrites the whole file
 * before returning (write to `<path>.tmp`, then rename over the original).
 * The file is meant to be readable by a human poking at a stuck thread.
 *
 * Startup never fails because of this file: a missing or corrupt store loads
 * as empty, and individual bad entries are skipped.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { StoreIOError, describeError, shortId } from '../errors.js';
import { fromSessionDict, toSessionDict, type SessionDict, type SessionRecord } from './session-record.js';

/**
 * 'log'   — a failed flush is logged; the in-memory state stays authoritative.
 * 'throw' — same, then a StoreIOError is raised to the caller.
 */
export type FlushFailurePolicy = 'log' | 'throw';

export interface SessionStoreConfig {
  /** Path of the JSON file backing the store */
  path: string;
  /** Default: 'log' */
  onFlushError?: FlushFailurePolicy;
}

export class SessionStore {
  private sessions = new Map<string, SessionRecord>();
  private readonly path: string;
  private readonly onFlushError: FlushFailurePolicy;

  constructor(config: SessionStoreConfig) {
    this.path = config.path;
    this.onFlushError = config.onFlushError ?? 'log';
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  /**
   * Load records from disk, replacing whatever is in memory.
   * Returns the number of records loaded.
   */
  load(): number {
    this.sessions.clear();

    if (!existsSync(this.path)) {
      console.log(`[SessionStore] No store file at ${this.path}, starting empty`);
      return 0;
    }

    let data: unknown;
    try {
      data = JSON.parse(readFileSync(this.path, 'utf-8'));
    } catch (err) {
      console.warn(`[SessionStore] Could not read ${this.path}, starting empty: ${describeError(err)}`);
      return 0;
    }

    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
      console.warn(`[SessionStore] ${this.path} is not a JSON object, starting empty`);
      return 0;
    }

    for (const [threadId, entry] of Object.entries(data)) {
      try {
        this.sessions.set(threadId, fromSessionDict(entry));
      } catch (err) {
        console.warn(`[SessionStore] Skipping invalid record thread=${threadId}: ${describeError(err)}`);
      }
    }

    console.log(`[SessionStore] Restored ${this.sessions.size} session(s) from ${this.path}`);
    return this.sessions.size;
  }

  // ─── CRUD ───────────────────────────────────────────────────────────────────

  /** Records come back as copies; changes go through put() and the update methods. */
  get(threadId: string): SessionRecord | undefined {
    const record = this.sessions.get(threadId);
    return record && copyRecord(record);
  }

  has(threadId: string): boolean {
    return this.sessions.has(threadId);
  }

  put(threadId: string, record: SessionRecord): void {
    this.sessions.set(threadId, copyRecord(record));
    this.flush();
  }

  remove(threadId: string): SessionRecord | undefined {
    const record = this.sessions.get(threadId);
    if (!record) return undefined;
    this.sessions.delete(threadId);
    this.flush();
    return record;
  }

  clear(): void {
    this.sessions.clear();
    this.flush();
  }

  /**
   * Point an existing record at a freshly (re)connected session.
   * No-op for unknown threads.
   */
  updateSessionId(threadId: string, sessionId: string): void {
    const record = this.sessions.get(threadId);
    if (!record) return;
    record.sessionId = sessionId;
    this.flush();
  }

  /**
   * Record the backend's latest resumption token. Empty values are ignored —
   * a resume key is only ever replaced, never cleared.
   */
  updateResumeKey(threadId: string, resumeKey: string | undefined): void {
    const record = this.sessions.get(threadId);
    if (!record || !resumeKey || record.resumeKey === resumeKey) return;
    record.resumeKey = resumeKey;
    console.log(`[SessionStore] Resume key for thread=${threadId} → ${shortId(resumeKey)}`);
    this.flush();
  }

  // ─── Iteration ──────────────────────────────────────────────────────────────

  get size(): number {
    return this.sessions.size;
  }

  keys(): IterableIterator<string> {
    return this.sessions.keys();
  }

  *values(): IterableIterator<SessionRecord> {
    for (const record of this.sessions.values()) {
      yield copyRecord(record);
    }
  }

  *entries(): IterableIterator<[string, SessionRecord]> {
    for (const [threadId, record] of this.sessions) {
      yield [threadId, copyRecord(record)];
    }
  }

  // ─── Internal ────────────────────────────────────────────────────────────────

  private flush(): void {
    const data: Record<string, SessionDict> = {};
    for (const [threadId, record] of this.sessions) {
      data[threadId] = toSessionDict(record);
    }

    const tmpPath = `${this.path}.tmp`;
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      writeFileSync(tmpPath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
      renameSync(tmpPath, this.path);
    } catch (err) {
      console.error(`[SessionStore] Failed to write ${this.path}:`, err);
      if (this.onFlushError === 'throw') {
        throw new StoreIOError(`Failed to write session store ${this.path}`, { cause: err });
      }
    }
  }
}

function copyRecord(record: SessionRecord): SessionRecord {
  return { ...record, capabilities: [...record.capabilities], createdAt: new Date(record.createdAt) };
}
