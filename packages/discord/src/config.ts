import { homedir } from 'node:os';
import { z } from 'zod';
import {
  DEFAULT_EDIT_INTERVAL_MS,
  DEFAULT_STREAM_CEILING,
  PLATFORM_MESSAGE_LIMIT,
  TURN_TIMEOUTS_MS,
  type ResumeFallbackPolicy,
} from '@threadrelay/core';

export interface RelayConfig {
  discordToken: string;
  /** Discord user id allowed to run everything, including /end */
  ownerId?: string;
  /** Register slash commands in this guild only (instant update) */
  guildId?: string;
  /** Comma-separated allowlist for /ask and /code — see DiscordAllowlist */
  allowFrom: string;
  sessionStorePath: string;
  agentWorkingDir: string;
  agentSystemPrompt?: string;
  claudeCliPath: string;
  streamCeiling: number;
  streamEditIntervalMs: number;
  askTimeoutMs: number;
  codeTimeoutMs: number;
  resumeFallback: ResumeFallbackPolicy;
  assistantName: string;
}

// Empty strings count as unset, the way `process.env.X || default` reads them.
const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const snowflake = optionalString.refine((v) => v === undefined || /^\d{15,22}$/.test(v), {
  message: 'must be a Discord id (digits only)',
});

function positiveInt(fallback: number, max = Number.MAX_SAFE_INTEGER) {
  return optionalString
    .pipe(z.coerce.number().int().positive().max(max).optional())
    .transform((v) => v ?? fallback);
}

const envSchema = z.object({
  DISCORD_BOT_TOKEN: z.string({ required_error: 'is required' }).trim().min(1, 'is required'),
  BOT_OWNER_ID: snowflake,
  DISCORD_GUILD_ID: snowflake,
  ALLOW_FROM: optionalString,
  SESSION_STORE_PATH: optionalString,
  AGENT_WORKING_DIR: optionalString,
  AGENT_SYSTEM_PROMPT: optionalString,
  CLAUDE_CLI_PATH: optionalString,
  STREAM_CEILING: positiveInt(DEFAULT_STREAM_CEILING, PLATFORM_MESSAGE_LIMIT - 10),
  STREAM_EDIT_INTERVAL_MS: positiveInt(DEFAULT_EDIT_INTERVAL_MS),
  ASK_TIMEOUT_MS: positiveInt(TURN_TIMEOUTS_MS.ask),
  CODE_TIMEOUT_MS: positiveInt(TURN_TIMEOUTS_MS.code),
  RESUME_FALLBACK: optionalString.pipe(z.enum(['degrade', 'fail']).optional()),
  ASSISTANT_NAME: optionalString,
});

/**
 * Read the relay configuration from environment variables.
 * Throws one error naming every invalid variable.
 */
export function loadRelayConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }

  const e = parsed.data;
  return {
    discordToken: e.DISCORD_BOT_TOKEN,
    ownerId: e.BOT_OWNER_ID,
    guildId: e.DISCORD_GUILD_ID,
    allowFrom: e.ALLOW_FROM ?? '',
    sessionStorePath: e.SESSION_STORE_PATH ?? './data/sessions.json',
    agentWorkingDir: e.AGENT_WORKING_DIR ?? homedir(),
    agentSystemPrompt: e.AGENT_SYSTEM_PROMPT,
    claudeCliPath: e.CLAUDE_CLI_PATH ?? 'claude',
    streamCeiling: e.STREAM_CEILING,
    streamEditIntervalMs: e.STREAM_EDIT_INTERVAL_MS,
    askTimeoutMs: e.ASK_TIMEOUT_MS,
    codeTimeoutMs: e.CODE_TIMEOUT_MS,
    resumeFallback: e.RESUME_FALLBACK ?? 'degrade',
    assistantName: e.ASSISTANT_NAME ?? 'Relay',
  };
}
