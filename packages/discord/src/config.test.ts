import { homedir } from 'node:os';
import { describe, expect, it } from 'vitest';
import { loadRelayConfig } from './config.js';

const TOKEN = 'test-token';

describe('loadRelayConfig', () => {
  it('fills in defaults', () => {
    expect(loadRelayConfig({ DISCORD_BOT_TOKEN: TOKEN })).toEqual({
      discordToken: TOKEN,
      ownerId: undefined,
      guildId: undefined,
      allowFrom: '',
      sessionStorePath: './data/sessions.json',
      agentWorkingDir: homedir(),
      agentSystemPrompt: undefined,
      claudeCliPath: 'claude',
      streamCeiling: 1900,
      streamEditIntervalMs: 1500,
      askTimeoutMs: 300_000,
      codeTimeoutMs: 600_000,
      resumeFallback: 'degrade',
      assistantName: 'Relay',
    });
  });

  it('reads every variable', () => {
    const config = loadRelayConfig({
      DISCORD_BOT_TOKEN: ` ${TOKEN} `,
      BOT_OWNER_ID: '100000000000000001',
      DISCORD_GUILD_ID: '900000000000000009',
      ALLOW_FROM: 'role:Dev,*',
      SESSION_STORE_PATH: '/tmp/relay/sessions.json',
      AGENT_WORKING_DIR: '/srv/work',
      AGENT_SYSTEM_PROMPT: 'Be brief.',
      CLAUDE_CLI_PATH: '/usr/local/bin/claude',
      STREAM_CEILING: '1500',
      STREAM_EDIT_INTERVAL_MS: '800',
      ASK_TIMEOUT_MS: '60000',
      CODE_TIMEOUT_MS: '120000',
      RESUME_FALLBACK: 'fail',
      ASSISTANT_NAME: 'Helper',
    });
    expect(config).toEqual({
      discordToken: TOKEN,
      ownerId: '100000000000000001',
      guildId: '900000000000000009',
      allowFrom: 'role:Dev,*',
      sessionStorePath: '/tmp/relay/sessions.json',
      agentWorkingDir: '/srv/work',
      agentSystemPrompt: 'Be brief.',
      claudeCliPath: '/usr/local/bin/claude',
      streamCeiling: 1500,
      streamEditIntervalMs: 800,
      askTimeoutMs: 60_000,
      codeTimeoutMs: 120_000,
      resumeFallback: 'fail',
      assistantName: 'Helper',
    });
  });

  it('treats empty values as unset', () => {
    const config = loadRelayConfig({ DISCORD_BOT_TOKEN: TOKEN, STREAM_CEILING: '', BOT_OWNER_ID: '   ' });
    expect(config.streamCeiling).toBe(1900);
    expect(config.ownerId).toBeUndefined();
  });

  it('requires the bot token', () => {
    expect(() => loadRelayConfig({})).toThrow('Invalid configuration: DISCORD_BOT_TOKEN is required');
    expect(() => loadRelayConfig({ DISCORD_BOT_TOKEN: '  ' })).toThrow(
      'Invalid configuration: DISCORD_BOT_TOKEN is required',
    );
  });

  it('rejects malformed Discord ids', () => {
    expect(() => loadRelayConfig({ DISCORD_BOT_TOKEN: TOKEN, BOT_OWNER_ID: 'alice' })).toThrow(
      'Invalid configuration: BOT_OWNER_ID must be a Discord id (digits only)',
    );
  });

  it('rejects a ceiling the platform would refuse', () => {
    expect(() => loadRelayConfig({ DISCORD_BOT_TOKEN: TOKEN, STREAM_CEILING: '1995' })).toThrow(
      /^Invalid configuration: STREAM_CEILING /,
    );
  });

  it('lists every invalid variable', () => {
    expect(() =>
      loadRelayConfig({
        DISCORD_BOT_TOKEN: TOKEN,
        ASK_TIMEOUT_MS: 'soon',
        RESUME_FALLBACK: 'retry',
      }),
    ).toThrow(/ASK_TIMEOUT_MS .*; RESUME_FALLBACK /);
  });
});
