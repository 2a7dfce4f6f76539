/**
 * AssistantCommands — slash command definitions and handlers.
 *
 *   /ask question   — open a 💬 conversation thread (read-only tools)
 *   /code task      — open a 🤖 conversation thread (file-editing tools)
 *   /sessions       — list bound threads
 *   /agent-status   — check the agent CLI
 *   /end            — end the conversation of the current thread (admins)
 *   /admin shutdown — stop the bot (owner only)
 *   /ping, /info, /serverinfo, /help
 *
 * Opening a conversation:
 *   1. Allowlist check
 *   2. Defer the reply, create a private thread
 *   3. Point the user at the thread
 *   4. Stream the first answer into it through the ConversationController
 */

import {
  EmbedBuilder,
  GuildMember,
  PermissionFlagsBits,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';
import {
  shortId,
  type ConversationController,
  type ConversationKind,
  type ConversationSummary,
  type MessageResponder,
} from '@threadrelay/core';
import type { DiscordAllowlist } from './allowlist.js';
import { DiscordThreadSink } from './discord-thread-sink.js';
import { kindEmoji, type ThreadManager } from './thread-manager.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface AssistantCommandsConfig {
  controller: ConversationController;
  allowlist: DiscordAllowlist;
  threads: ThreadManager;
  assistantName: string;
  ownerId?: string;
  /** Runs the process shutdown for /admin shutdown */
  onShutdown?: () => Promise<void>;
  /** Clock, in ms. Default: Date.now */
  now?: () => number;
}

const EMBED_COLORS = {
  info: 0x5865f2, // Discord blurple
  ok: 0x57f287, // Green
  error: 0xed4245, // Red
} as const;

/** The part of an interaction that owner-only commands need. */
export interface CommandReplyTarget {
  readonly user: { readonly id: string };
  reply(options: { content: string; ephemeral: boolean }): Promise<unknown>;
}

/** Guild facts shown by /serverinfo. */
export interface ServerSummary {
  name: string;
  ownerId: string;
  memberCount: number;
  createdAt: Date;
  channelCount: number;
  emojiCount: number;
  roleCount: number;
  iconUrl: string | null;
}

const KIND_LABEL: Record<ConversationKind, string> = {
  ask: 'ask',
  code: 'coding',
};

// ─── Formatting ───────────────────────────────────────────────────────────────

/** One line per bound thread for /sessions. */
export function formatSessionLines(summaries: readonly ConversationSummary[]): string[] {
  return summaries.map(({ threadId, record, live }) => {
    const state = live ? '🟢' : '⚪';
    return `${state} ${kindEmoji(record.kind)} <#${threadId}> — \`${shortId(record.sessionId)}\` by <@${record.creatorId}>`;
  });
}

export function formatUptime(ms: number): string {
  const total = Math.floor(ms / 1000);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const seconds = total % 60;
  return `${hours}h ${minutes}m ${seconds}s`;
}

export function serverInfoEmbed(server: ServerSummary, now: Date = new Date()): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle(`📋 ${server.name}`)
    .addFields(
      { name: '👑 Owner', value: `<@${server.ownerId}>`, inline: true },
      { name: '👥 Members', value: String(server.memberCount), inline: true },
      { name: '📅 Created', value: server.createdAt.toISOString().slice(0, 10), inline: true },
      { name: '💬 Channels', value: String(server.channelCount), inline: true },
      { name: '😀 Emojis', value: String(server.emojiCount), inline: true },
      { name: '🔖 Roles', value: String(server.roleCount), inline: true },
    )
    .setColor(EMBED_COLORS.ok)
    .setTimestamp(now);
  if (server.iconUrl) embed.setThumbnail(server.iconUrl);
  return embed;
}

/**
 * Non-AI responder: when someone @mentions the bot outside a conversation
 * thread, point them at the slash commands.
 */
export function mentionHint(assistantName: string, getBotUserId: () => string | undefined): MessageResponder {
  return (message) => {
    const botUserId = getBotUserId();
    if (!botUserId) return null;
    const mentioned = message.content.includes(`<@${botUserId}>`) || message.content.includes(`<@!${botUserId}>`);
    if (!mentioned) return null;
    return `👋 I'm ${assistantName}. Start a conversation with \`/ask\` or \`/code\`, then keep talking in the thread it opens.`;
  };
}

/** Role names of the invoking member; empty outside a guild. */
function memberRoleNames(interaction: ChatInputCommandInteraction): string[] {
  const member = interaction.member;
  if (!member) return [];
  if (member instanceof GuildMember) {
    return member.roles.cache.map((role) => role.name);
  }
  // Uncached member: role ids only, resolved through the guild cache
  const names: string[] = [];
  for (const roleId of member.roles) {
    const name = interaction.guild?.roles.cache.get(roleId)?.name;
    if (name) names.push(name);
  }
  return names;
}

// ─── Commands ─────────────────────────────────────────────────────────────────

export class AssistantCommands {
  private readonly config: AssistantCommandsConfig;
  private readonly now: () => number;
  private readonly startedAt: number;

  constructor(config: AssistantCommandsConfig) {
    this.config = config;
    this.now = config.now ?? Date.now;
    this.startedAt = this.now();
  }

  /** Payload for application command registration. */
  definitions(): RESTPostAPIChatInputApplicationCommandsJSONBody[] {
    const name = this.config.assistantName;
    return [
      new SlashCommandBuilder()
        .setName('ask')
        .setDescription(`Ask ${name} a question (opens a conversation thread)`)
        .addStringOption((o) => o.setName('question').setDescription('Your question').setRequired(true)),
      new SlashCommandBuilder()
        .setName('code')
        .setDescription(`Give ${name} a coding task (opens a coding thread)`)
        .addStringOption((o) => o.setName('task').setDescription('What to do').setRequired(true)),
      new SlashCommandBuilder().setName('sessions').setDescription('List active agent conversations'),
      new SlashCommandBuilder().setName('agent-status').setDescription('Check whether the agent CLI is available'),
      new SlashCommandBuilder()
        .setName('end')
        .setDescription('End the agent conversation of this thread')
        .setDefaultMemberPermissions(PermissionFlagsBits.Administrator),
      new SlashCommandBuilder()
        .setName('admin')
        .setDescription('Bot administration')
        .addSubcommand((sub) => sub.setName('shutdown').setDescription('Shut the bot down (owner only)')),
      new SlashCommandBuilder().setName('ping').setDescription('Check bot latency'),
      new SlashCommandBuilder().setName('info').setDescription('Show bot information'),
      new SlashCommandBuilder()
        .setName('serverinfo')
        .setDescription('Show information about this server')
        .setDMPermission(false),
      new SlashCommandBuilder().setName('help').setDescription('List available commands'),
    ].map((builder) => builder.toJSON());
  }

  /**
   * Route a slash command. Returns false for commands this class does not own.
   */
  async handle(interaction: ChatInputCommandInteraction): Promise<boolean> {
    switch (interaction.commandName) {
      case 'ask':
        await this.openConversation(interaction, 'ask', interaction.options.getString('question', true));
        return true;
      case 'code':
        await this.openConversation(interaction, 'code', interaction.options.getString('task', true));
        return true;
      case 'sessions':
        await this.listSessions(interaction);
        return true;
      case 'agent-status':
        await this.agentStatus(interaction);
        return true;
      case 'end':
        await this.endConversation(interaction);
        return true;
      case 'ping':
        await interaction.reply(`🏓 Pong! Latency: ${Math.round(interaction.client.ws.ping)}ms`);
        return true;
      case 'admin':
        if (interaction.options.getSubcommand() !== 'shutdown') return false;
        await this.adminShutdown(interaction);
        return true;
      case 'info':
        await this.info(interaction);
        return true;
      case 'serverinfo':
        await this.serverInfo(interaction);
        return true;
      case 'help':
        await interaction.reply({ embeds: [this.helpEmbed()] });
        return true;
      default:
        return false;
    }
  }

  // ─── Conversation commands ──────────────────────────────────────────────────

  private async openConversation(
    interaction: ChatInputCommandInteraction,
    kind: ConversationKind,
    prompt: string,
  ): Promise<void> {
    const userId = interaction.user.id;
    const match = this.config.allowlist.isAllowed(userId, memberRoleNames(interaction));
    if (!match.allowed) {
      const reason = this.config.allowlist.isEmpty
        ? 'allowlist is empty (only the owner may start conversations — set ALLOW_FROM)'
        : `user ${userId} not in allowlist`;
      console.warn(`[AssistantCommands] /${kind} BLOCKED — ${reason}`);
      await interaction.reply({ content: '❌ You are not allowed to start agent conversations.', ephemeral: true });
      return;
    }

    await interaction.deferReply();

    const created = await this.config.threads.createConversationThread(
      interaction.channel,
      kind,
      prompt,
      interaction.user.tag,
    );
    if (!created.ok) {
      await interaction.editReply(`❌ ${created.reason}`);
      return;
    }

    const { thread } = created;
    await interaction.editReply(
      `✅ Created ${KIND_LABEL[kind]} session: ${thread}\nKeep talking in the thread, no command needed.`,
    );

    const sink = new DiscordThreadSink(thread);
    sink.startTyping();
    try {
      await this.config.controller.openConversation({
        threadId: thread.id,
        kind,
        creatorId: userId,
        instruction: prompt,
        sink,
        // Mentioning the creator also adds them to the private thread
        mention: `<@${userId}> `,
      });
    } finally {
      sink.stopTyping();
    }
  }

  private async listSessions(interaction: ChatInputCommandInteraction): Promise<void> {
    const summaries = this.config.controller.listConversations();
    if (summaries.length === 0) {
      await interaction.reply({ content: '📭 No active agent conversations', ephemeral: true });
      return;
    }

    const embed = new EmbedBuilder()
      .setTitle(`📋 Agent conversations (${summaries.length})`)
      .setDescription(formatSessionLines(summaries).join('\n').slice(0, 4096))
      .setColor(EMBED_COLORS.info);
    await interaction.reply({ embeds: [embed], ephemeral: true });
  }

  private async agentStatus(interaction: ChatInputCommandInteraction): Promise<void> {
    await interaction.deferReply();
    const available = await this.config.controller.checkBackend();

    const embed = available
      ? new EmbedBuilder()
        .setTitle('✅ Agent status')
        .setDescription('The Claude Code CLI is installed and runnable.')
        .setColor(EMBED_COLORS.ok)
      : new EmbedBuilder()
        .setTitle('❌ Agent status')
        .setDescription(
          [
            'The Claude Code CLI is not available.',
            '',
            'Install it with:',
            '```bash',
            'npm install -g @anthropic-ai/claude-code',
            '```',
            'and make sure `claude` is on the PATH (or set CLAUDE_CLI_PATH).',
          ].join('\n'),
        )
        .setColor(EMBED_COLORS.error);
    await interaction.editReply({ embeds: [embed] });
  }

  private async endConversation(interaction: ChatInputCommandInteraction): Promise<void> {
    const isOwner = this.config.ownerId !== undefined && interaction.user.id === this.config.ownerId;
    const isAdmin = interaction.memberPermissions?.has(PermissionFlagsBits.Administrator) ?? false;
    if (!isOwner && !isAdmin) {
      await interaction.reply({ content: '❌ Only administrators can end conversations.', ephemeral: true });
      return;
    }

    const record = await this.config.controller.endConversation(interaction.channelId);
    if (!record) {
      await interaction.reply({ content: '❌ This channel has no agent conversation.', ephemeral: true });
      return;
    }
    await interaction.reply(`🛑 Conversation ended (session \`${shortId(record.sessionId)}\`). New messages here are ignored.`);
  }

  // ─── Admin commands ─────────────────────────────────────────────────────────

  /** /admin shutdown: the owner stops the bot; everyone else is refused. */
  async adminShutdown(interaction: CommandReplyTarget): Promise<void> {
    const userId = interaction.user.id;
    if (this.config.ownerId === undefined || userId !== this.config.ownerId) {
      console.warn(`[AssistantCommands] /admin shutdown BLOCKED — ${userId} is not the bot owner`);
      await interaction.reply({ content: '❌ Only the bot owner can run this command.', ephemeral: true });
      return;
    }
    if (!this.config.onShutdown) {
      await interaction.reply({ content: '❌ Shutdown is not available in this process.', ephemeral: true });
      return;
    }

    console.log(`[AssistantCommands] Shutdown requested by ${userId}`);
    await interaction.reply({ content: '👋 Shutting down...', ephemeral: false });
    await this.config.onShutdown();
  }

  // ─── Basic commands ─────────────────────────────────────────────────────────

  private async serverInfo(interaction: ChatInputCommandInteraction): Promise<void> {
    const guild = interaction.guild;
    if (!guild) {
      await interaction.reply({ content: '❌ This command only works in a server.', ephemeral: true });
      return;
    }

    const embed = serverInfoEmbed(
      {
        name: guild.name,
        ownerId: guild.ownerId,
        memberCount: guild.memberCount,
        createdAt: guild.createdAt,
        channelCount: guild.channels.cache.size,
        emojiCount: guild.emojis.cache.size,
        roleCount: guild.roles.cache.size,
        iconUrl: guild.iconURL(),
      },
      new Date(this.now()),
    );
    await interaction.reply({ embeds: [embed] });
  }

  private async info(interaction: ChatInputCommandInteraction): Promise<void> {
    const client = interaction.client;
    const embed = new EmbedBuilder()
      .setTitle(`🤖 ${this.config.assistantName}`)
      .addFields(
        { name: '📊 Uptime', value: formatUptime(this.now() - this.startedAt), inline: false },
        { name: '🌐 Servers', value: String(client.guilds.cache.size), inline: true },
        { name: '⚡ Latency', value: `${Math.round(client.ws.ping)}ms`, inline: true },
        { name: '💬 Conversations', value: String(this.config.controller.listConversations().length), inline: true },
      )
      .setFooter({ text: `Requested by ${interaction.user.username}` })
      .setColor(EMBED_COLORS.info)
      .setTimestamp(new Date());
    await interaction.reply({ embeds: [embed] });
  }

  private helpEmbed(): EmbedBuilder {
    return new EmbedBuilder()
      .setTitle(`📖 ${this.config.assistantName} help`)
      .addFields(
        {
          name: '🤖 Agent',
          value: [
            '`/ask` — ask a question (opens a conversation thread)',
            '`/code` — run a coding task (opens a coding thread)',
            '`/sessions` — list active conversations',
            '`/agent-status` — check the agent CLI',
            '`/end` — end the conversation of this thread (admins)',
            '`/admin shutdown` — stop the bot (owner)',
          ].join('\n'),
          inline: false,
        },
        {
          name: '🔧 Basics',
          value: [
            '`/ping` — check latency',
            '`/info` — bot information',
            '`/serverinfo` — server information',
            '`/help` — this help',
          ].join('\n'),
          inline: false,
        },
      )
      .setColor(EMBED_COLORS.info);
  }
}
