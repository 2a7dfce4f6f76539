/**
 * Relay entry point.
 *
 * Startup:
 *   1. Load and validate configuration from the environment
 *   2. Load persisted session records (threads stay bound across restarts)
 *   3. Wire backend → connection manager → multiplexer → controller
 *   4. Connect to Discord and register slash commands
 *
 * SIGINT/SIGTERM close every agent connection and the gateway; the session
 * store is left on disk so conversations resume on the next start.
 */

import {
  AgentConnectionManager,
  ClaudeAgentBackend,
  ConversationController,
  MessageHandler,
  SessionStore,
  StreamMultiplexer,
} from '@threadrelay/core';
import { DiscordAllowlist } from './allowlist.js';
import { AssistantCommands, mentionHint } from './assistant-commands.js';
import { loadRelayConfig } from './config.js';
import { DiscordRelayRuntime } from './discord-relay-runtime.js';
import { ThreadManager } from './thread-manager.js';

let runtime: DiscordRelayRuntime | null = null;
let isShuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    return;
  }

  isShuttingDown = true;
  console.log(`[Relay] Received ${signal}, shutting down gracefully...`);

  try {
    if (runtime) {
      await runtime.stop();
    }
    console.log('[Relay] Shutdown complete');
    process.exit(0);
  } catch (err) {
    console.error('[Relay] Error during shutdown:', err);
    process.exit(1);
  }
}

async function main(): Promise<void> {
  const config = loadRelayConfig();
  console.log(`[Relay] Starting ${config.assistantName}`);
  console.log('[Relay] Configuration:', {
    sessionStorePath: config.sessionStorePath,
    agentWorkingDir: config.agentWorkingDir,
    claudeCliPath: config.claudeCliPath,
    guildId: config.guildId ?? '(global commands)',
    allowFrom: config.allowFrom || '(owner only)',
    resumeFallback: config.resumeFallback,
  });

  const store = new SessionStore({ path: config.sessionStorePath });
  store.load();

  const agents = new AgentConnectionManager({
    backend: new ClaudeAgentBackend({
      workingDir: config.agentWorkingDir,
      systemPrompt: config.agentSystemPrompt,
      cliPath: config.claudeCliPath,
    }),
  });

  const controller = new ConversationController({
    store,
    agents,
    multiplexer: new StreamMultiplexer({
      ceiling: config.streamCeiling,
      editIntervalMs: config.streamEditIntervalMs,
    }),
    resumeFallback: config.resumeFallback,
    turnTimeoutsMs: { ask: config.askTimeoutMs, code: config.codeTimeoutMs },
  });

  const commands = new AssistantCommands({
    controller,
    allowlist: new DiscordAllowlist({ allowFrom: config.allowFrom, ownerId: config.ownerId }),
    threads: new ThreadManager(),
    assistantName: config.assistantName,
    ownerId: config.ownerId,
    onShutdown: () => shutdown('/admin shutdown'),
  });

  const messageHandler = new MessageHandler();
  const relay = new DiscordRelayRuntime({
    token: config.discordToken,
    controller,
    commands,
    messageHandler,
    guildId: config.guildId,
  });
  messageHandler.use(mentionHint(config.assistantName, () => relay.getBotUserId()));
  runtime = relay;

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await relay.start();
  console.log('[Relay] Ready');
}

process.on('unhandledRejection', (reason, promise) => {
  console.error('[Relay] Unhandled rejection at:', promise, 'reason:', reason);
});

process.on('uncaughtException', (err) => {
  console.error('[Relay] Uncaught exception:', err);
  process.exit(1);
});

main().catch((err: unknown) => {
  console.error('[Relay] Fatal error during startup:', err);
  process.exit(1);
});
