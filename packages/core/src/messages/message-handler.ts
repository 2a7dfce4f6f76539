/**
 * MessageHandler — the non-AI path for ordinary channel messages.
 *
 * Platform adapters convert their native messages into a ChatMessage and hand
 * them here. Slash commands never reach this handler; AI threads are owned by
 * the ConversationController. By default nothing replies.
 */

// ─── Types ────────────────────────────────────────────────────────────────────

export type ChatMessageType = 'text' | 'command' | 'system';

/** Platform-independent view of an inbound message. */
export interface ChatMessage {
  id: string;
  content: string;
  type: ChatMessageType;
  userId: string;
  userName: string;
  channelId: string;
  channelName?: string;
  /** e.g. 'discord' */
  platform: string;
  timestamp: Date;
}

/**
 * A responder returns the reply text, or null to let the next responder
 * (or nobody) answer.
 */
export type MessageResponder = (message: ChatMessage) => Promise<string | null> | string | null;

// ─── Handler ──────────────────────────────────────────────────────────────────

export class MessageHandler {
  private readonly responders: MessageResponder[] = [];

  /** Responders are consulted in registration order. */
  use(responder: MessageResponder): this {
    this.responders.push(responder);
    return this;
  }

  async handleMessage(message: ChatMessage): Promise<string | null> {
    const preview = message.content.length > 50 ? `${message.content.slice(0, 50)}...` : message.content;
    console.debug(
      `[MessageHandler] ${message.platform} message from ${message.userName} in ${message.channelName ?? message.channelId}: "${preview}"`,
    );

    if (message.type !== 'text') return null;

    for (const responder of this.responders) {
      const reply = await responder(message);
      if (reply !== null) return reply;
    }
    return null;
  }
}
