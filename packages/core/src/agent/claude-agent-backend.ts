/**
 * ClaudeAgentBackend — AgentBackend on top of @anthropic-ai/claude-agent-sdk.
 *
 * Each connection is one SDK query() in streaming-input mode: a single CLI
 * subprocess that stays up across turns. User messages are pushed into the
 * prompt channel; SDK output is pumped into a buffered signal channel that
 * receiveTurn() reads up to the next `result`.
 *
 * Partial messages are enabled so the CLI emits `stream_event` text deltas.
 * When it does not, the coarse `assistant` message still carries the text —
 * see TurnTextExtractor.
 */

import { execFile } from 'node:child_process';
import { homedir } from 'node:os';
import { promisify } from 'node:util';
import { query, type Options, type SDKUserMessage } from '@anthropic-ai/claude-agent-sdk';
import { ConnectionError, describeError } from '../errors.js';
import { AsyncChannel } from './async-channel.js';
import type { AgentBackend, AgentConnectOptions, AgentConnection, BackendSignal } from './types.js';

const execFileAsync = promisify(execFile);

// ─── Types ────────────────────────────────────────────────────────────────────

/** The fields of an SDK message the relay reads. */
export interface SdkMessageLike {
  type: string;
  subtype?: string;
  session_id?: string;
  event?: unknown;
  message?: unknown;
}

export type AgentQueryFn = (params: {
  prompt: AsyncIterable<SDKUserMessage>;
  options: Options;
}) => AsyncIterable<SdkMessageLike>;

export interface ClaudeAgentBackendConfig {
  /** Working directory for the agent. Default: the user's home directory */
  workingDir?: string;
  /** Replaces the CLI's default system prompt when set */
  systemPrompt?: string;
  /** CLI used by the availability check. Default: 'claude' */
  cliPath?: string;
  /** Override for tests. Default: the SDK's query() */
  queryFn?: AgentQueryFn;
}

// ─── Signal mapping ───────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Map one SDK message to backend signals.
 *
 * Delta events come in two shapes — the full API event
 * `{ type: 'content_block_delta', delta: { type: 'text_delta', text } }` and a
 * trimmed `{ index, delta: { type: 'text_delta', text } }`. Only `delta.type`
 * is checked so both are accepted.
 */
export function toBackendSignals(message: SdkMessageLike): BackendSignal[] {
  switch (message.type) {
    case 'stream_event': {
      const event = message.event;
      if (!isRecord(event)) return [];
      const delta = event.delta;
      if (isRecord(delta) && delta.type === 'text_delta' && typeof delta.text === 'string' && delta.text) {
        return [{ kind: 'delta', text: delta.text }];
      }
      return [];
    }
    case 'assistant': {
      const inner = message.message;
      const content = isRecord(inner) ? inner.content : undefined;
      if (!Array.isArray(content)) return [{ kind: 'message', texts: [] }];
      const texts: string[] = [];
      for (const block of content) {
        if (isRecord(block) && block.type === 'text' && typeof block.text === 'string') {
          texts.push(block.text);
        }
      }
      return [{ kind: 'message', texts }];
    }
    case 'result': {
      return [{
        kind: 'result',
        resumeKey: message.session_id || undefined,
        isError: message.subtype !== 'success',
      }];
    }
    default:
      return [];
  }
}

// ─── Connection ───────────────────────────────────────────────────────────────

type Readiness =
  | { tag: 'pending'; waiters: Array<{ resolve: () => void; reject: (err: unknown) => void }> }
  | { tag: 'ready' }
  | { tag: 'failed'; error: unknown };

class ClaudeAgentConnection implements AgentConnection {
  private readonly input = new AsyncChannel<SDKUserMessage>();
  private readonly signals = new AsyncChannel<BackendSignal>();
  private readonly abortController = new AbortController();
  private readonly pumping: Promise<void>;
  private readiness: Readiness = { tag: 'pending', waiters: [] };
  private closed = false;
  private exited = false;
  private abandonedTurns = 0;

  constructor(queryFn: AgentQueryFn, options: Options) {
    const output = queryFn({
      prompt: this.input,
      options: { ...options, abortController: this.abortController },
    });
    this.pumping = this.pump(output);
  }

  /**
   * The first send resolves once the CLI has produced its first message, so a
   * backend that cannot start fails here rather than mid-stream.
   */
  async send(text: string): Promise<void> {
    if (this.closed || this.input.isClosed) {
      throw new ConnectionError('Connection is closed');
    }
    this.input.push({
      type: 'user',
      message: { role: 'user', content: text },
      parent_tool_use_id: null,
      session_id: '',
    });
    await this.waitUntilReady();
  }

  /**
   * A turn abandoned by its reader leaves signals behind; they are skipped up
   * to that turn's `result` before the next turn is read.
   */
  async *receiveTurn(): AsyncGenerator<BackendSignal, void, undefined> {
    let completed = false;
    try {
      while (true) {
        const signal = await this.signals.shift();
        if (signal === undefined) {
          if (this.closed) return;
          throw new ConnectionError('Agent process exited before the response completed');
        }
        if (this.abandonedTurns > 0) {
          if (signal.kind === 'result') this.abandonedTurns--;
          continue;
        }
        if (signal.kind === 'result') completed = true;
        yield signal;
        if (completed) return;
      }
    } finally {
      if (!completed && !this.closed) this.abandonedTurns++;
    }
  }

  get alive(): boolean {
    return !this.closed && !this.exited;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.input.close();
    this.abortController.abort();
    await this.pumping;
  }

  private async pump(output: AsyncIterable<SdkMessageLike>): Promise<void> {
    try {
      for await (const message of output) {
        this.settleReadiness(null);
        for (const signal of toBackendSignals(message)) {
          this.signals.push(signal);
        }
      }
      this.exited = true;
      this.settleReadiness(new ConnectionError('Agent process produced no output'));
      this.signals.close();
    } catch (err) {
      this.exited = true;
      if (this.closed) {
        this.signals.close();
        return;
      }
      console.error('[ClaudeAgentBackend] Agent stream failed:', err);
      const error = new ConnectionError(`Agent process failed: ${describeError(err)}`, { cause: err });
      this.settleReadiness(error);
      this.signals.fail(error);
    }
  }

  private settleReadiness(error: unknown): void {
    if (this.readiness.tag !== 'pending') return;
    const { waiters } = this.readiness;
    if (error === null) {
      this.readiness = { tag: 'ready' };
      for (const waiter of waiters) waiter.resolve();
    } else {
      this.readiness = { tag: 'failed', error };
      for (const waiter of waiters) waiter.reject(error);
    }
  }

  private waitUntilReady(): Promise<void> {
    const readiness = this.readiness;
    switch (readiness.tag) {
      case 'ready':
        return Promise.resolve();
      case 'failed':
        return Promise.reject(readiness.error);
      case 'pending':
        return new Promise((resolve, reject) => {
          readiness.waiters.push({ resolve, reject });
        });
    }
  }
}

// ─── Backend ──────────────────────────────────────────────────────────────────

export class ClaudeAgentBackend implements AgentBackend {
  private readonly config: ClaudeAgentBackendConfig;
  private readonly queryFn: AgentQueryFn;

  constructor(config: ClaudeAgentBackendConfig = {}) {
    this.config = config;
    this.queryFn = config.queryFn ?? query;
  }

  async connect(opts: AgentConnectOptions): Promise<AgentConnection> {
    return new ClaudeAgentConnection(this.queryFn, this.buildOptions(opts));
  }

  /** The SDK drives the Claude Code CLI — available iff `claude --version` succeeds. */
  async isAvailable(): Promise<boolean> {
    try {
      await execFileAsync(this.config.cliPath ?? 'claude', ['--version'], { timeout: 10_000 });
      return true;
    } catch (err) {
      console.warn(`[ClaudeAgentBackend] CLI check failed: ${describeError(err)}`);
      return false;
    }
  }

  private buildOptions(opts: AgentConnectOptions): Options {
    const options: Options = {
      cwd: this.config.workingDir ?? homedir(),
      permissionMode: 'acceptEdits',
      includePartialMessages: true,
    };
    if (opts.capabilities.length > 0) {
      options.allowedTools = [...opts.capabilities];
    }
    if (this.config.systemPrompt) {
      options.systemPrompt = this.config.systemPrompt;
    }
    if (opts.resumeKey) {
      options.resume = opts.resumeKey;
    }
    return options;
  }
}
