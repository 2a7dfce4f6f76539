/**
 * AgentConnectionManager — owns the live agent connections, keyed by an
 * ephemeral session id.
 *
 * The session id means nothing to the backend. It is regenerated every time a
 * connection is (re)established and only indexes `connections`. What survives
 * a restart is the backend's resume key, captured here when a turn completes
 * and read back by the caller through resumeKeyFor().
 */

import { randomUUID } from 'node:crypto';
import { ConnectionError, SessionNotFoundError, TimeoutError, describeError, shortId } from '../errors.js';
import { DEFAULT_WAIT_TIMEOUT_MS, EMPTY_RESPONSE_PLACEHOLDER } from '../constants.js';
import { collectText } from './deadline.js';
import { TurnTextExtractor } from './turn-text-extractor.js';
import type { AgentBackend, AgentConnection } from './types.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface StartedSession {
  sessionId: string;
  /** Lazy text fragments of the first turn */
  stream: AsyncGenerator<string, void, undefined>;
}

export interface RunOnceResult {
  ok: boolean;
  /** Response text, or an error description when !ok */
  output: string;
}

export interface AgentConnectionManagerConfig {
  backend: AgentBackend;
  /** Session id generator. Default: randomUUID */
  generateId?: () => string;
}

interface LiveConnection {
  sessionId: string;
  connection: AgentConnection;
  openedAt: number;
}

// ─── Manager ──────────────────────────────────────────────────────────────────

export class AgentConnectionManager {
  private connections = new Map<string, LiveConnection>();
  private resumeKeys = new Map<string, string>();
  private readonly backend: AgentBackend;
  private readonly generateId: () => string;

  constructor(config: AgentConnectionManagerConfig) {
    this.backend = config.backend;
    this.generateId = config.generateId ?? randomUUID;
  }

  // ─── Streaming API ──────────────────────────────────────────────────────────

  /**
   * Open a new connection and send the first instruction.
   * @throws ConnectionError — nothing is left open when this throws
   */
  async start(instruction: string, capabilities: readonly string[]): Promise<StartedSession> {
    console.log(`[AgentConnectionManager] Starting session: "${instruction.slice(0, 100)}"`);
    return this.open(instruction, capabilities, undefined);
  }

  /**
   * Like start(), but the backend rebuilds the conversation from `resumeKey`.
   * Falling back to a fresh start on failure is the caller's decision.
   * @throws ConnectionError
   */
  async resume(
    resumeKey: string,
    instruction: string,
    capabilities: readonly string[],
  ): Promise<StartedSession> {
    console.log(
      `[AgentConnectionManager] Resuming session from key=${shortId(resumeKey)}: "${instruction.slice(0, 80)}"`,
    );
    return this.open(instruction, capabilities, resumeKey);
  }

  /**
   * Send a message on a live connection.
   * @throws SessionNotFoundError when `sessionId` is not live
   * @throws ConnectionError when the send fails
   */
  async continue(sessionId: string, message: string): Promise<AsyncGenerator<string, void, undefined>> {
    const live = this.connections.get(sessionId);
    if (!live) {
      throw new SessionNotFoundError(sessionId);
    }
    if (!live.connection.alive) {
      console.warn(`[AgentConnectionManager] Session ${shortId(sessionId)} lost its agent process`);
      await this.close(sessionId);
      throw new SessionNotFoundError(sessionId);
    }

    console.log(`[AgentConnectionManager] Continuing ${shortId(sessionId)}: "${message.slice(0, 80)}"`);

    try {
      await live.connection.send(message);
    } catch (err) {
      throw new ConnectionError(`Failed to continue session: ${describeError(err)}`, { cause: err });
    }

    return this.streamTurn(sessionId, live.connection);
  }

  // ─── Waiting API ────────────────────────────────────────────────────────────

  /**
   * start() and wait for the whole first response.
   * @throws TimeoutError — the connection is closed first
   */
  async startAndWait(
    instruction: string,
    capabilities: readonly string[],
    timeoutMs = DEFAULT_WAIT_TIMEOUT_MS,
  ): Promise<{ sessionId: string; response: string }> {
    const { sessionId, stream } = await this.start(instruction, capabilities);
    const response = await collectText(
      stream,
      timeoutMs,
      () => this.close(sessionId),
      EMPTY_RESPONSE_PLACEHOLDER,
    );
    return { sessionId, response };
  }

  /**
   * continue() and wait for the whole response.
   * @throws TimeoutError — the connection is closed first
   */
  async continueAndWait(
    sessionId: string,
    message: string,
    timeoutMs = DEFAULT_WAIT_TIMEOUT_MS,
  ): Promise<string> {
    const stream = await this.continue(sessionId, message);
    return collectText(stream, timeoutMs, () => this.close(sessionId), EMPTY_RESPONSE_PLACEHOLDER);
  }

  /**
   * Stateless one-shot instruction. The connection never outlives the call.
   */
  async runOnce(
    instruction: string,
    capabilities: readonly string[],
    timeoutMs = DEFAULT_WAIT_TIMEOUT_MS,
  ): Promise<RunOnceResult> {
    let sessionId: string | undefined;
    try {
      const started = await this.start(instruction, capabilities);
      sessionId = started.sessionId;
      const openedId = sessionId;
      const output = await collectText(
        started.stream,
        timeoutMs,
        () => this.close(openedId),
        '✅ Done (no output)',
      );
      return { ok: true, output };
    } catch (err) {
      if (err instanceof TimeoutError) {
        console.warn(`[AgentConnectionManager] One-shot instruction timed out after ${timeoutMs}ms`);
        return { ok: false, output: `⏱️ Timed out after ${Math.round(timeoutMs / 1000)}s` };
      }
      console.error('[AgentConnectionManager] One-shot instruction failed:', err);
      return { ok: false, output: `❌ ${describeError(err)}` };
    } finally {
      if (sessionId) await this.close(sessionId);
    }
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  /** Release a connection. Unknown ids are ignored. */
  async close(sessionId: string): Promise<void> {
    const live = this.connections.get(sessionId);
    this.resumeKeys.delete(sessionId);
    if (!live) return;

    this.connections.delete(sessionId);
    await this.safeClose(live.connection);
    console.log(`[AgentConnectionManager] Closed session ${shortId(sessionId)}`);
  }

  /** Close every live connection (shutdown). Never throws. */
  async closeAll(): Promise<void> {
    const ids = Array.from(this.connections.keys());
    for (const id of ids) {
      await this.close(id);
    }
    console.log(`[AgentConnectionManager] Closed ${ids.length} active session(s)`);
  }

  /** True while the session's connection is open and its process is running. */
  has(sessionId: string): boolean {
    return this.connections.get(sessionId)?.connection.alive ?? false;
  }

  /** Resume key from the most recently completed turn on this connection. */
  resumeKeyFor(sessionId: string): string | undefined {
    return this.resumeKeys.get(sessionId);
  }

  get activeCount(): number {
    return this.connections.size;
  }

  async checkAvailable(): Promise<boolean> {
    try {
      return await this.backend.isAvailable();
    } catch (err) {
      console.error('[AgentConnectionManager] Availability check failed:', err);
      return false;
    }
  }

  // ─── Internal ────────────────────────────────────────────────────────────────

  private async open(
    instruction: string,
    capabilities: readonly string[],
    resumeKey: string | undefined,
  ): Promise<StartedSession> {
    const sessionId = this.generateId();
    const action = resumeKey ? 'resume' : 'start';

    let connection: AgentConnection;
    try {
      connection = await this.backend.connect({ capabilities, resumeKey });
    } catch (err) {
      throw new ConnectionError(`Failed to ${action} session: ${describeError(err)}`, { cause: err });
    }

    try {
      await connection.send(instruction);
    } catch (err) {
      await this.safeClose(connection);
      throw new ConnectionError(`Failed to ${action} session: ${describeError(err)}`, { cause: err });
    }

    this.connections.set(sessionId, { sessionId, connection, openedAt: Date.now() });
    console.log(`[AgentConnectionManager] Session ${shortId(sessionId)} ready (${action})`);

    return { sessionId, stream: this.streamTurn(sessionId, connection) };
  }

  private async *streamTurn(
    sessionId: string,
    connection: AgentConnection,
  ): AsyncGenerator<string, void, undefined> {
    const extractor = new TurnTextExtractor();

    try {
      for await (const signal of connection.receiveTurn()) {
        for (const text of extractor.accept(signal)) {
          yield text;
        }
        if (signal.kind === 'result') {
          if (signal.isError) {
            console.warn(`[AgentConnectionManager] Backend reported an error result for ${shortId(sessionId)}`);
          }
          const key = extractor.capturedResumeKey;
          // A closed session must not resurrect its entry.
          if (key && this.connections.get(sessionId)?.connection === connection) {
            this.resumeKeys.set(sessionId, key);
            console.log(
              `[AgentConnectionManager] Captured resume key ${shortId(key)} for session ${shortId(sessionId)}`,
            );
          }
        }
      }
    } catch (err) {
      // A turn that fails mid-stream leaves the connection unusable; the
      // next message reconnects from the resume key.
      if (this.connections.get(sessionId)?.connection === connection) {
        console.warn(`[AgentConnectionManager] Dropping session ${shortId(sessionId)} after a failed turn`);
        await this.close(sessionId);
      }
      throw err;
    }

    const stats = extractor.turnStats;
    if (stats.fallbacks > 0) {
      console.warn(
        `[AgentConnectionManager] ${stats.fallbacks} message(s) delivered as whole blocks — no text deltas received`,
      );
    }
    console.log(
      `[AgentConnectionManager] Turn stats for ${shortId(sessionId)}: deltas=${stats.deltas} messages=${stats.messages} fallbacks=${stats.fallbacks}`,
    );
  }

  private async safeClose(connection: AgentConnection): Promise<void> {
    try {
      await connection.close();
    } catch (err) {
      console.warn('[AgentConnectionManager] Error while closing connection:', err);
    }
  }
}
