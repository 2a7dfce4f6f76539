/**
 * StreamMultiplexer — renders an unbounded text stream as a series of chat
 * messages that each stay under the platform's size ceiling.
 *
 * Chat platforms have no streaming primitive, so we:
 *   1. Send a message as soon as there is text, with a trailing cursor
 *   2. Edit it in place as more text arrives (at most once per interval)
 *   3. When the buffer outgrows the ceiling, finalize the head at the last
 *      line break and carry the rest into a new message
 *   4. On completion: one last edit without the cursor
 *
 * Skipped edits are fine — only the final state of each message matters.
 * Delivery failures are logged and never thrown: a broken turn must not take
 * the process down.
 */

import {
  DEFAULT_EDIT_INTERVAL_MS,
  DEFAULT_STREAM_CEILING,
  EMPTY_RESPONSE_PLACEHOLDER,
  STREAM_CURSOR,
} from '../constants.js';
import { DeliveryError, describeError } from '../errors.js';

// ─── Types ────────────────────────────────────────────────────────────────────

/** A message that has been posted and can be rewritten. */
export interface OutgoingMessage {
  edit(content: string): Promise<void>;
}

/** Anything that can receive new messages — a thread, a channel, a DM. */
export interface Messageable {
  send(content: string): Promise<OutgoingMessage>;
}

export interface StreamMultiplexerOptions {
  /** Hard per-message character ceiling. Default: 1900 */
  ceiling?: number;
  /** Minimum spacing between edits of one message (ms). Default: 1500 */
  editIntervalMs?: number;
  /** Appended while a message is still growing. Default: ' ▌' */
  cursor?: string;
  /** Sent when the stream produced no text. Default: '(empty response)' */
  emptyPlaceholder?: string;
  /** Prepended to the very first message only (e.g. a user mention) */
  prefix?: string;
  /** Prefix of the notice appended when the stream fails. Default: '⚠️ ' */
  errorPrefix?: string;
  /** Clock, in ms. Default: Date.now */
  now?: () => number;
}

export interface DeliveryReport {
  /** Messages created on the sink */
  messageCount: number;
  /** Characters of agent text received */
  characters: number;
  /** The stream raised before completing */
  failed: boolean;
  error?: unknown;
}

// ─── Multiplexer ──────────────────────────────────────────────────────────────

export class StreamMultiplexer {
  private readonly ceiling: number;
  private readonly editIntervalMs: number;
  private readonly cursor: string;
  private readonly emptyPlaceholder: string;
  private readonly prefix: string;
  private readonly errorPrefix: string;
  private readonly now: () => number;

  constructor(options: StreamMultiplexerOptions = {}) {
    this.ceiling = options.ceiling ?? DEFAULT_STREAM_CEILING;
    if (this.ceiling < 1) {
      throw new RangeError(`ceiling must be positive, got ${this.ceiling}`);
    }
    this.editIntervalMs = options.editIntervalMs ?? DEFAULT_EDIT_INTERVAL_MS;
    this.cursor = options.cursor ?? STREAM_CURSOR;
    this.emptyPlaceholder = options.emptyPlaceholder ?? EMPTY_RESPONSE_PLACEHOLDER;
    this.prefix = options.prefix ?? '';
    this.errorPrefix = options.errorPrefix ?? '⚠️ ';
    this.now = options.now ?? Date.now;
  }

  /**
   * Render `fragments` into `sink`. Resolves once the final state has been
   * delivered (or delivery has been given up on). Never rejects.
   *
   * `opts.prefix` overrides the configured prefix for this stream.
   */
  async render(
    fragments: AsyncIterable<string>,
    sink: Messageable,
    opts: { prefix?: string } = {},
  ): Promise<DeliveryReport> {
    const prefix = opts.prefix ?? this.prefix;
    const run = new RenderRun(sink, this.ceiling, this.cursor, prefix, this.editIntervalMs, this.now);
    let characters = 0;

    try {
      for await (const fragment of fragments) {
        if (!fragment) continue;
        characters += fragment.length;
        await run.append(fragment);
      }
    } catch (err) {
      console.warn(`[StreamMultiplexer] Stream failed after ${characters} chars: ${describeError(err)}`);
      await run.finish(`\n\n${this.errorPrefix}${describeError(err)}`, this.emptyPlaceholder);
      return { messageCount: run.messageCount, characters, failed: true, error: err };
    }

    await run.finish('', this.emptyPlaceholder);
    return { messageCount: run.messageCount, characters, failed: false };
  }
}

// ─── Per-stream state ─────────────────────────────────────────────────────────

class RenderRun {
  private buffer = '';
  private prefixPending: boolean;
  private message: OutgoingMessage | null = null;
  private lastEditAt = 0;
  /** Set while the last create was refused; cleared once one succeeds */
  private failedCreateAt: number | null = null;
  private created = 0;

  constructor(
    private readonly sink: Messageable,
    private readonly ceiling: number,
    private readonly cursor: string,
    private readonly prefix: string,
    private readonly editIntervalMs: number,
    private readonly now: () => number,
  ) {
    this.prefixPending = prefix.length > 0;
  }

  get messageCount(): number {
    return this.created;
  }

  async append(fragment: string): Promise<void> {
    this.buffer += this.withPrefix(fragment);
    await this.splitOverflow();
    if (!this.buffer) return;

    const live = this.buffer + this.cursor;
    if (!this.message) {
      // A refused create is retried at the edit rate, not once per fragment.
      if (this.failedCreateAt !== null && this.now() - this.failedCreateAt < this.editIntervalMs) return;
      this.message = await this.safeSend(live);
      this.lastEditAt = this.now();
      this.failedCreateAt = this.message ? null : this.lastEditAt;
      return;
    }
    if (this.now() - this.lastEditAt >= this.editIntervalMs) {
      await this.safeEdit(this.message, live);
      this.lastEditAt = this.now();
    }
  }

  /**
   * Final delivery. `suffix` (an error notice) is appended to whatever is
   * still buffered.
   */
  async finish(suffix: string, emptyPlaceholder: string): Promise<void> {
    if (suffix) {
      this.buffer = this.buffer
        ? this.buffer + suffix
        : this.withPrefix(suffix.replace(/^\n+/, ''));
    }
    await this.splitOverflow();

    if (this.message) {
      await this.safeEdit(this.message, this.buffer || emptyPlaceholder);
      this.message = null;
      return;
    }
    if (this.buffer) {
      await this.safeSend(this.buffer);
      return;
    }
    if (this.created === 0) {
      await this.safeSend(this.withPrefix(emptyPlaceholder));
    }
  }

  /** The prefix goes in front of the first text of the first message only. */
  private withPrefix(text: string): string {
    if (!this.prefixPending) return text;
    this.prefixPending = false;
    return this.prefix + text;
  }

  /**
   * While the buffer exceeds the ceiling, finalize its head as a complete
   * message. One fragment may span several messages, hence the loop.
   */
  private async splitOverflow(): Promise<void> {
    while (this.buffer.length > this.ceiling) {
      let cut = this.buffer.lastIndexOf('\n', this.ceiling);
      if (cut <= 0) cut = this.ceiling;

      const head = this.buffer.slice(0, cut);
      if (this.message) {
        await this.safeEdit(this.message, head);
      } else {
        await this.safeSend(head);
      }

      this.buffer = this.buffer.slice(cut).replace(/^\n+/, '');
      this.message = null;
    }
  }

  private async safeSend(content: string): Promise<OutgoingMessage | null> {
    try {
      const message = await this.sink.send(content);
      this.created++;
      return message;
    } catch (err) {
      const error = new DeliveryError(`send failed: ${describeError(err)}`, { cause: err });
      console.warn(`[StreamMultiplexer] ${error.message}`);
      return null;
    }
  }

  private async safeEdit(message: OutgoingMessage, content: string): Promise<void> {
    try {
      await message.edit(content);
    } catch (err) {
      const error = new DeliveryError(`edit failed: ${describeError(err)}`, { cause: err });
      console.warn(`[StreamMultiplexer] ${error.message}`);
    }
  }
}
