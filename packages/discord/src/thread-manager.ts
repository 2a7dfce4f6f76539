/**
 * ThreadManager — creates the private Discord threads that host agent
 * conversations.
 *
 * /ask and /code each open one thread in the channel the command was used in.
 * Everything posted in that thread afterwards belongs to the conversation.
 */

import {
  ChannelType,
  DiscordAPIError,
  RESTJSONErrorCodes,
  ThreadAutoArchiveDuration,
  type TextBasedChannel,
  type ThreadChannel,
} from 'discord.js';
import { describeError, type ConversationKind } from '@threadrelay/core';

export type CreateThreadResult =
  | { ok: true; thread: ThreadChannel }
  | { ok: false; reason: string };

export interface ThreadManagerConfig {
  /** Default: one day */
  autoArchiveDuration?: ThreadAutoArchiveDuration;
}

const THREAD_EMOJI: Record<ConversationKind, string> = {
  ask: '💬',
  code: '🤖',
};

/** Prompt characters kept in a thread name (Discord caps names at 100) */
const THREAD_NAME_PROMPT_CHARS = 80;

/** Thread title: kind emoji plus the start of the prompt on one line. */
export function threadName(kind: ConversationKind, prompt: string): string {
  const oneLine = prompt.replace(/\s+/g, ' ').trim();
  return `${THREAD_EMOJI[kind]} ${oneLine.slice(0, THREAD_NAME_PROMPT_CHARS) || 'Conversation'}`;
}

export function kindEmoji(kind: ConversationKind): string {
  return THREAD_EMOJI[kind];
}

export class ThreadManager {
  private readonly autoArchiveDuration: ThreadAutoArchiveDuration;

  constructor(config: ThreadManagerConfig = {}) {
    this.autoArchiveDuration = config.autoArchiveDuration ?? ThreadAutoArchiveDuration.OneDay;
  }

  /**
   * Create a private thread for a new conversation under `channel`.
   * Only guild text channels can host private threads.
   */
  async createConversationThread(
    channel: TextBasedChannel | null,
    kind: ConversationKind,
    prompt: string,
    requestedBy: string,
  ): Promise<CreateThreadResult> {
    if (!channel || channel.type !== ChannelType.GuildText) {
      return { ok: false, reason: 'Conversations can only be started in a server text channel' };
    }

    try {
      const thread = await channel.threads.create({
        name: threadName(kind, prompt),
        autoArchiveDuration: this.autoArchiveDuration,
        type: ChannelType.PrivateThread,
        reason: `${kind} conversation requested by ${requestedBy}`,
      });
      console.log(`[ThreadManager] Created ${kind} thread ${thread.id} in channel ${channel.id}`);
      return { ok: true, thread };
    } catch (err) {
      if (err instanceof DiscordAPIError && err.code === RESTJSONErrorCodes.MissingPermissions) {
        console.error(`[ThreadManager] Missing permission to create threads in channel ${channel.id}`);
        return { ok: false, reason: 'The bot is not allowed to create private threads here' };
      }
      console.error('[ThreadManager] Error creating thread:', err);
      return { ok: false, reason: `Could not create a thread: ${describeError(err)}` };
    }
  }
}
