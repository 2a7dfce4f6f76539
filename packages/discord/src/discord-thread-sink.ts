/**
 * DiscordThreadSink — the Messageable the StreamMultiplexer writes into,
 * backed by a Discord thread (or any text channel).
 *
 * Also owns the typing indicator for the turn: Discord typing expires after
 * ~8s, so it is re-fired on a keepalive loop until stopTyping().
 */

import type { Messageable, OutgoingMessage } from '@threadrelay/core';

// ─── Types ────────────────────────────────────────────────────────────────────

/** The part of a discord.js text channel the sink uses. */
export interface SendableChannel {
  readonly id: string;
  send(content: string): Promise<EditableMessage>;
  sendTyping(): Promise<void>;
}

export interface EditableMessage {
  edit(content: string): Promise<unknown>;
}

export interface DiscordThreadSinkOptions {
  /** Typing keepalive interval (ms). Default: 7000 */
  typingKeepaliveMs?: number;
  /** Typing stops on its own after this long (ms). Default: 600000 */
  typingMaxDurationMs?: number;
}

// ─── Constants ────────────────────────────────────────────────────────────────

/** Typing keepalive interval — Discord typing expires after ~8s */
const TYPING_KEEPALIVE_MS = 7_000;

/** Maximum typing duration (safety TTL) — the longest turn deadline */
const TYPING_MAX_DURATION_MS = 600_000;

// ─── Sink ─────────────────────────────────────────────────────────────────────

export class DiscordThreadSink implements Messageable {
  private typingInterval: NodeJS.Timeout | null = null;
  private typingStartedAt = 0;
  private consecutiveTypingFailures = 0;
  private readonly typingKeepaliveMs: number;
  private readonly typingMaxDurationMs: number;

  constructor(
    readonly channel: SendableChannel,
    options: DiscordThreadSinkOptions = {},
  ) {
    this.typingKeepaliveMs = options.typingKeepaliveMs ?? TYPING_KEEPALIVE_MS;
    this.typingMaxDurationMs = options.typingMaxDurationMs ?? TYPING_MAX_DURATION_MS;
  }

  async send(content: string): Promise<OutgoingMessage> {
    const message = await this.channel.send(content);
    // A posted message clears Discord's typing state; re-fire it.
    if (this.typingInterval) this.fireTyping();
    return {
      edit: async (next: string) => {
        await message.edit(next);
      },
    };
  }

  // ─── Typing Management ──────────────────────────────────────────────────────

  startTyping(): void {
    if (this.typingInterval) return;
    this.typingStartedAt = Date.now();
    this.consecutiveTypingFailures = 0;

    // Fire immediately
    this.fireTyping();

    // Keepalive loop
    this.typingInterval = setInterval(() => {
      // Safety TTL
      if (Date.now() - this.typingStartedAt > this.typingMaxDurationMs) {
        console.warn(`[DiscordThreadSink] Typing TTL exceeded in ${this.channel.id}, stopping`);
        this.stopTyping();
        return;
      }
      this.fireTyping();
    }, this.typingKeepaliveMs);

    this.typingInterval.unref?.();
  }

  stopTyping(): void {
    if (this.typingInterval) {
      clearInterval(this.typingInterval);
      this.typingInterval = null;
    }
  }

  get isTyping(): boolean {
    return this.typingInterval !== null;
  }

  private fireTyping(): void {
    void this.channel.sendTyping().then(
      () => {
        this.consecutiveTypingFailures = 0;
      },
      (err: unknown) => {
        this.consecutiveTypingFailures++;
        if (this.consecutiveTypingFailures >= 2) {
          console.warn(`[DiscordThreadSink] Typing circuit breaker tripped in ${this.channel.id}:`, err);
          this.stopTyping();
        }
      },
    );
  }
}
