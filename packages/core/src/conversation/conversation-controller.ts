/**
 * ConversationController — one agent conversation per chat thread.
 *
 * For every inbound thread message:
 *   1. Live connection → continue() (fast path)
 *   2. No live connection → resume() from the stored resume key, or start()
 *      fresh with the record's capabilities; the record is re-pointed at the
 *      new session id
 *   3. The text stream is rendered into the thread by the StreamMultiplexer
 *   4. The backend's resume key is persisted once the turn completes
 *
 * Turns are serialised per thread. Every backend or platform error stops
 * here and becomes a visible message in the thread.
 */

import { CAPABILITY_SETS, TURN_TIMEOUTS_MS } from '../constants.js';
import { SessionNotFoundError, describeError, shortId } from '../errors.js';
import { withDeadline } from '../agent/deadline.js';
import type { AgentConnectionManager, StartedSession } from '../agent/agent-connection-manager.js';
import { createSessionRecord, type ConversationKind, type SessionRecord } from '../sessions/session-record.js';
import type { SessionStore } from '../sessions/session-store.js';
import type { DeliveryReport, Messageable, StreamMultiplexer } from '../streaming/stream-multiplexer.js';
import { KeyedQueue } from './keyed-queue.js';

// ─── Types ────────────────────────────────────────────────────────────────────

/**
 * What to do when resuming from a stored key fails:
 *   'degrade' — start a fresh session without prior context (logged)
 *   'fail'    — report the failure in the thread
 */
export type ResumeFallbackPolicy = 'degrade' | 'fail';

/** How the session serving a turn was obtained. */
export type TurnMode = 'started' | 'continued' | 'resumed' | 'restarted';

export interface TurnOutcome {
  sessionId: string;
  mode: TurnMode;
  delivery: DeliveryReport;
}

export interface ConversationControllerConfig {
  store: SessionStore;
  agents: AgentConnectionManager;
  multiplexer: StreamMultiplexer;
  /** Default: 'degrade' */
  resumeFallback?: ResumeFallbackPolicy;
  /** Streaming deadline per kind (ms). Default: ask 5 min, code 10 min */
  turnTimeoutsMs?: Partial<Record<ConversationKind, number>>;
}

export interface OpenConversationOptions {
  threadId: string;
  kind: ConversationKind;
  creatorId: string;
  instruction: string;
  sink: Messageable;
  /** Prepended to the first message, e.g. a mention of the creator */
  mention?: string;
}

export interface ConversationSummary {
  threadId: string;
  record: SessionRecord;
  /** A connection is currently open for this thread */
  live: boolean;
}

interface AcquiredStream {
  sessionId: string;
  stream: AsyncGenerator<string, void, undefined>;
  mode: TurnMode;
}

// ─── Controller ───────────────────────────────────────────────────────────────

export class ConversationController {
  private readonly store: SessionStore;
  private readonly agents: AgentConnectionManager;
  private readonly multiplexer: StreamMultiplexer;
  private readonly resumeFallback: ResumeFallbackPolicy;
  private readonly turnTimeoutsMs: Record<ConversationKind, number>;
  private readonly queue = new KeyedQueue();

  constructor(config: ConversationControllerConfig) {
    this.store = config.store;
    this.agents = config.agents;
    this.multiplexer = config.multiplexer;
    this.resumeFallback = config.resumeFallback ?? 'degrade';
    this.turnTimeoutsMs = { ...TURN_TIMEOUTS_MS, ...config.turnTimeoutsMs };
  }

  // ─── Public API ─────────────────────────────────────────────────────────────

  /**
   * Bind a new thread to a fresh agent session and stream the first answer
   * into it. Returns undefined when the session could not be started — the
   * thread then has no record.
   */
  async openConversation(opts: OpenConversationOptions): Promise<TurnOutcome | undefined> {
    return this.queue.run(opts.threadId, async () => {
      const capabilities = CAPABILITY_SETS[opts.kind];

      let started: StartedSession;
      try {
        started = await this.agents.start(opts.instruction, capabilities);
      } catch (err) {
        console.error(`[ConversationController] Failed to start session for thread=${opts.threadId}:`, err);
        await this.notify(opts.sink, `❌ ${describeError(err)}`);
        return undefined;
      }

      const { sessionId, stream } = started;
      const record = createSessionRecord({
        sessionId,
        kind: opts.kind,
        creatorId: opts.creatorId,
        capabilities,
      });
      this.persist(opts.threadId, () => this.store.put(opts.threadId, record));

      console.log(
        `[ConversationController] Opened thread=${opts.threadId} session=${shortId(sessionId)} kind=${opts.kind}`,
      );

      const delivery = await this.deliver(opts.threadId, opts.kind, sessionId, stream, opts.sink, opts.mention);
      return { sessionId, mode: 'started', delivery };
    });
  }

  /**
   * Relay a message posted in a bound thread. Messages in threads without a
   * record are ignored (undefined).
   */
  async handleMessage(threadId: string, text: string, sink: Messageable): Promise<TurnOutcome | undefined> {
    if (!this.store.has(threadId)) return undefined;
    return this.queue.run(threadId, () => this.runTurn(threadId, text, sink));
  }

  /**
   * Administrative removal: forget the thread's record and close its
   * connection. Returns the removed record.
   */
  async endConversation(threadId: string): Promise<SessionRecord | undefined> {
    if (!this.store.has(threadId)) return undefined;
    // Queued behind a running turn, so the session it (re)connected is the one closed.
    return this.queue.run(threadId, async () => {
      const record = this.store.get(threadId);
      if (!record) return undefined;

      this.persist(threadId, () => this.store.remove(threadId));
      await this.agents.close(record.sessionId);
      console.log(`[ConversationController] Ended thread=${threadId} session=${shortId(record.sessionId)}`);
      return record;
    });
  }

  isBound(threadId: string): boolean {
    return this.store.has(threadId);
  }

  listConversations(): ConversationSummary[] {
    return Array.from(this.store.entries(), ([threadId, record]) => ({
      threadId,
      record,
      live: this.agents.has(record.sessionId),
    }));
  }

  checkBackend(): Promise<boolean> {
    return this.agents.checkAvailable();
  }

  /** Close every live connection. Records stay on disk for the next start. */
  async shutdown(): Promise<void> {
    await this.agents.closeAll();
  }

  // ─── Turn handling ──────────────────────────────────────────────────────────

  private async runTurn(threadId: string, text: string, sink: Messageable): Promise<TurnOutcome | undefined> {
    // The record may have been removed while this turn was queued.
    const record = this.store.get(threadId);
    if (!record) return undefined;

    console.log(
      `[ConversationController] Thread=${threadId} message (session=${shortId(record.sessionId)}): "${text.slice(0, 80)}"`,
    );

    let acquired: AcquiredStream | undefined;
    try {
      acquired = await this.acquireStream(threadId, record, text);
    } catch (err) {
      console.error(`[ConversationController] Turn failed for thread=${threadId}:`, err);
      await this.notify(sink, `❌ AI response failed: ${describeError(err)}`);
      return undefined;
    }
    if (!acquired) return undefined;

    const delivery = await this.deliver(threadId, record.kind, acquired.sessionId, acquired.stream, sink);
    return { sessionId: acquired.sessionId, mode: acquired.mode, delivery };
  }

  /** Undefined when the thread lost its record while reconnecting. */
  private async acquireStream(
    threadId: string,
    record: SessionRecord,
    text: string,
  ): Promise<AcquiredStream | undefined> {
    if (this.agents.has(record.sessionId)) {
      try {
        const stream = await this.agents.continue(record.sessionId, text);
        return { sessionId: record.sessionId, stream, mode: 'continued' };
      } catch (err) {
        if (!(err instanceof SessionNotFoundError)) throw err;
        console.warn(`[ConversationController] Session ${shortId(record.sessionId)} vanished, reconnecting`);
      }
    }

    // Release a connection whose process has exited.
    await this.agents.close(record.sessionId);

    const acquired = await this.reconnect(threadId, record, text);
    if (!this.store.has(threadId)) {
      console.warn(`[ConversationController] Thread=${threadId} was unbound while reconnecting, closing new session`);
      await this.agents.close(acquired.sessionId);
      return undefined;
    }
    this.persist(threadId, () => this.store.updateSessionId(threadId, acquired.sessionId));
    return acquired;
  }

  private async reconnect(threadId: string, record: SessionRecord, text: string): Promise<AcquiredStream> {
    if (record.resumeKey) {
      try {
        const resumed = await this.agents.resume(record.resumeKey, text, record.capabilities);
        console.log(
          `[ConversationController] Reconnected thread=${threadId} with context (session=${shortId(resumed.sessionId)})`,
        );
        return { ...resumed, mode: 'resumed' };
      } catch (err) {
        if (this.resumeFallback === 'fail') throw err;
        console.warn(
          `[ConversationController] Resume failed for thread=${threadId}, starting without prior context: ${describeError(err)}`,
        );
      }
    }

    const started = await this.agents.start(text, record.capabilities);
    console.log(
      `[ConversationController] Reconnected thread=${threadId} with a fresh session (session=${shortId(started.sessionId)})`,
    );
    return { ...started, mode: record.resumeKey ? 'restarted' : 'started' };
  }

  private async deliver(
    threadId: string,
    kind: ConversationKind,
    sessionId: string,
    stream: AsyncGenerator<string, void, undefined>,
    sink: Messageable,
    prefix?: string,
  ): Promise<DeliveryReport> {
    const bounded = withDeadline(stream, this.turnTimeoutsMs[kind], () => this.agents.close(sessionId));
    const delivery = await this.multiplexer.render(bounded, sink, { prefix });

    const resumeKey = this.agents.resumeKeyFor(sessionId);
    if (resumeKey) {
      this.persist(threadId, () => this.store.updateResumeKey(threadId, resumeKey));
    }
    return delivery;
  }

  // ─── Helpers ────────────────────────────────────────────────────────────────

  /** Store writes that fail leave memory authoritative; the turn goes on. */
  private persist(threadId: string, write: () => void): void {
    try {
      write();
    } catch (err) {
      console.error(`[ConversationController] Could not persist session for thread=${threadId}:`, err);
    }
  }

  private async notify(sink: Messageable, text: string): Promise<void> {
    try {
      await sink.send(text);
    } catch (err) {
      console.warn('[ConversationController] Failed to post notice:', err);
    }
  }
}
