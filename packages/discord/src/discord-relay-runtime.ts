/**
 * DiscordRelayRuntime — the discord.js Client of the relay.
 *
 * Owns the gateway connection and routes events:
 *   - slash commands        → AssistantCommands
 *   - messages in a thread bound to a conversation → ConversationController
 *   - any other message     → MessageHandler (non-AI path)
 */

import {
  Client,
  Events,
  GatewayIntentBits,
  Partials,
  type Interaction,
  type Message,
} from 'discord.js';
import type { ChatMessage, ConversationController, MessageHandler } from '@threadrelay/core';
import type { AssistantCommands } from './assistant-commands.js';
import { DiscordThreadSink } from './discord-thread-sink.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface DiscordRelayRuntimeConfig {
  token: string;
  controller: ConversationController;
  commands: AssistantCommands;
  messageHandler: MessageHandler;
  /** Register commands in this guild only; global registration otherwise */
  guildId?: string;
  /** Ready timeout after login (ms). Default: 30000 */
  readyTimeoutMs?: number;
}

/** Convert a discord.js message into the platform-independent model. */
export function toChatMessage(message: Message): ChatMessage {
  const channel = message.channel;
  return {
    id: message.id,
    content: message.content,
    type: 'text',
    userId: message.author.id,
    userName: message.author.username,
    channelId: message.channelId,
    channelName: 'name' in channel && channel.name ? channel.name : undefined,
    platform: 'discord',
    timestamp: message.createdAt,
  };
}

// ─── Runtime ──────────────────────────────────────────────────────────────────

export class DiscordRelayRuntime {
  private client: Client;
  private config: DiscordRelayRuntimeConfig;
  private botUserId: string | undefined;
  private running = false;

  constructor(config: DiscordRelayRuntimeConfig) {
    this.config = config;

    this.client = new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.DirectMessages,
        GatewayIntentBits.MessageContent,
      ],
      partials: [
        Partials.Channel, // Required for DM events
      ],
    });

    this.setupEventHandlers();
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  async start(): Promise<void> {
    if (this.running) return;

    console.log('[DiscordRelayRuntime] Connecting to Discord...');

    try {
      await this.client.login(this.config.token);
      this.running = true;

      // Wait for ready event
      const readyClient = await new Promise<Client<true>>((resolve, reject) => {
        // If already ready (rare), resolve immediately
        if (this.client.isReady()) {
          resolve(this.client);
          return;
        }
        const timeout = setTimeout(
          () => reject(new Error('Discord login timeout')),
          this.config.readyTimeoutMs ?? 30_000,
        );
        this.client.once(Events.ClientReady, (client) => {
          clearTimeout(timeout);
          resolve(client);
        });
      });
      this.botUserId = readyClient.user.id;
      console.log(`[DiscordRelayRuntime] Discord connected — ${readyClient.user.tag} is online`);
    } catch (err) {
      console.error(
        '[DiscordRelayRuntime] Discord login FAILED — this usually means the bot token is invalid ' +
        'or the Message Content Intent is not enabled.',
        err,
      );
      this.running = false;
      void this.client.destroy().catch((destroyErr: unknown) => {
        console.warn('[DiscordRelayRuntime] Error destroying client after failed login:', destroyErr);
      });
      throw err;
    }

    await this.registerCommands();

    const available = await this.config.controller.checkBackend();
    if (available) {
      console.log('[DiscordRelayRuntime] ✅ Agent CLI available');
    } else {
      console.warn('[DiscordRelayRuntime] ⚠️ Agent CLI not available — /ask and /code will fail to start sessions');
    }
  }

  /** Close every agent connection, then the gateway. Session records stay on disk. */
  async stop(): Promise<void> {
    await this.config.controller.shutdown();
    if (!this.running) return;
    await this.client.destroy();
    this.running = false;
    console.log('[DiscordRelayRuntime] Discord disconnected');
  }

  /** Set once the client is ready */
  getBotUserId(): string | undefined {
    return this.botUserId;
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Get the discord.js Client */
  getClient(): Client {
    return this.client;
  }

  // ─── Command Registration ───────────────────────────────────────────────────

  private async registerCommands(): Promise<void> {
    const application = this.client.application;
    if (!application) {
      console.warn('[DiscordRelayRuntime] No application on ready client, skipping command registration');
      return;
    }

    const definitions = this.config.commands.definitions();
    try {
      if (this.config.guildId) {
        await application.commands.set(definitions, this.config.guildId);
        console.log(
          `[DiscordRelayRuntime] Registered ${definitions.length} commands in guild ${this.config.guildId}`,
        );
      } else {
        await application.commands.set(definitions);
        console.log(`[DiscordRelayRuntime] Registered ${definitions.length} global commands`);
      }
    } catch (err) {
      console.error('[DiscordRelayRuntime] Command registration failed:', err);
    }
  }

  // ─── Event Handlers ─────────────────────────────────────────────────────────

  private setupEventHandlers(): void {
    this.client.on(Events.MessageCreate, async (message: Message) => {
      // Ignore own messages
      if (message.author.id === this.botUserId) return;
      // Ignore other bots
      if (message.author.bot) return;

      try {
        if (message.channel.isThread() && this.config.controller.isBound(message.channel.id)) {
          await this.handleThreadMessage(message);
          return;
        }
        await this.handleOtherMessage(message);
      } catch (err) {
        console.error(`[DiscordRelayRuntime] Failed to handle message ${message.id}:`, err);
      }
    });

    this.client.on(Events.InteractionCreate, async (interaction: Interaction) => {
      if (!interaction.isChatInputCommand()) return;

      console.log(
        `[DiscordRelayRuntime] /${interaction.commandName} from ${interaction.user.tag} (${interaction.user.id}) in ${interaction.channelId}`,
      );

      try {
        const handled = await this.config.commands.handle(interaction);
        if (!handled) {
          await interaction.reply({ content: '❓ Unknown command', ephemeral: true });
        }
      } catch (err) {
        console.error(`[DiscordRelayRuntime] /${interaction.commandName} failed:`, err);
        const content = '❌ Something went wrong. Please try again.';
        try {
          if (interaction.deferred || interaction.replied) {
            await interaction.followUp({ content, ephemeral: true });
          } else {
            await interaction.reply({ content, ephemeral: true });
          }
        } catch (replyErr) {
          console.warn('[DiscordRelayRuntime] Could not report command failure:', replyErr);
        }
      }
    });

    this.client.on(Events.Error, (err) => {
      console.error('[DiscordRelayRuntime] Client error:', err);
    });
  }

  // ─── Message Handlers ───────────────────────────────────────────────────────

  /**
   * Relay a message posted in a conversation thread to its agent session.
   */
  private async handleThreadMessage(message: Message): Promise<void> {
    if (!message.channel.isThread()) return;

    const text = message.content.trim();
    if (!text) return;

    const sink = new DiscordThreadSink(message.channel);
    sink.startTyping();
    try {
      await this.config.controller.handleMessage(message.channel.id, text, sink);
    } finally {
      sink.stopTyping();
    }
  }

  /**
   * Everything that is not part of a conversation goes to the MessageHandler.
   */
  private async handleOtherMessage(message: Message): Promise<void> {
    const reply = await this.config.messageHandler.handleMessage(toChatMessage(message));
    if (reply && message.channel.isSendable()) {
      await message.channel.send(reply);
    }
  }
}
