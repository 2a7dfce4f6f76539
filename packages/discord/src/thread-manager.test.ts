import { describe, expect, it, vi } from 'vitest';
import { kindEmoji, threadName, ThreadManager } from './thread-manager.js';

describe('threadName', () => {
  it('puts the kind emoji before the prompt on one line', () => {
    expect(threadName('ask', '  How do\n I   deploy? ')).toBe('💬 How do I deploy?');
    expect(threadName('code', 'Fix the login test')).toBe('🤖 Fix the login test');
  });

  it('keeps the first 80 characters of the prompt', () => {
    expect(threadName('code', 'a'.repeat(100))).toBe(`🤖 ${'a'.repeat(80)}`);
  });

  it('falls back to a generic title for a blank prompt', () => {
    expect(threadName('ask', ' \n ')).toBe('💬 Conversation');
  });
});

describe('kindEmoji', () => {
  it('maps each conversation kind', () => {
    expect(kindEmoji('ask')).toBe('💬');
    expect(kindEmoji('code')).toBe('🤖');
  });
});

describe('ThreadManager', () => {
  it('refuses to start a conversation without a guild text channel', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const result = await new ThreadManager().createConversationThread(null, 'ask', 'hi', 'user#0001');
    expect(result).toEqual({ ok: false, reason: 'Conversations can only be started in a server text channel' });
    vi.restoreAllMocks();
  });
});
