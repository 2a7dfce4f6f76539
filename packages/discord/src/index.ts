export { loadRelayConfig, type RelayConfig } from './config.js';
export {
  DiscordAllowlist,
  type DiscordAllowlistConfig,
  type AllowlistMatch,
  type AllowlistMatchSource,
} from './allowlist.js';
export {
  DiscordThreadSink,
  type DiscordThreadSinkOptions,
  type SendableChannel,
  type EditableMessage,
} from './discord-thread-sink.js';
export {
  ThreadManager,
  threadName,
  kindEmoji,
  type ThreadManagerConfig,
  type CreateThreadResult,
} from './thread-manager.js';
export {
  AssistantCommands,
  formatSessionLines,
  formatUptime,
  mentionHint,
  serverInfoEmbed,
  type AssistantCommandsConfig,
  type CommandReplyTarget,
  type ServerSummary,
} from './assistant-commands.js';
export { DiscordRelayRuntime, toChatMessage, type DiscordRelayRuntimeConfig } from './discord-relay-runtime.js';
