/**
 * SessionRecord — the durable binding between one conversation thread and
 * its agent session.
 *
 * `sessionId` is ephemeral: it indexes the AgentConnectionManager's live map
 * and is regenerated on every reconnect. `resumeKey` is what survives a
 * restart — the backend rebuilds the full conversation from it.
 */

import { z } from 'zod';

// ─── Types ────────────────────────────────────────────────────────────────────

/** 'ask' — general dialogue; 'code' — task execution with write tools. */
export type ConversationKind = 'ask' | 'code';

export type BotType = 'claude_agent';

export interface SessionRecord {
  sessionId: string;
  kind: ConversationKind;
  botType: BotType;
  creatorId: string;
  /** Tool names granted at creation, reused on every reconnect */
  capabilities: string[];
  /** Backend-issued resumption token, absent until the first turn completes */
  resumeKey?: string;
  createdAt: Date;
}

/** On-disk shape of a record. */
export interface SessionDict {
  session_id: string;
  conversation_kind: ConversationKind;
  bot_type: BotType;
  creator_id: string;
  granted_capabilities: string[];
  external_resume_key?: string;
  created_at: string;
}

// ─── Serialization ────────────────────────────────────────────────────────────

const sessionDictSchema = z.object({
  session_id: z.string().min(1),
  conversation_kind: z.enum(['ask', 'code']),
  bot_type: z.literal('claude_agent'),
  creator_id: z.string().min(1),
  granted_capabilities: z.array(z.string()).default([]),
  external_resume_key: z.string().min(1).nullish(),
  created_at: z.string().datetime({ offset: true }),
});

export function toSessionDict(record: SessionRecord): SessionDict {
  const dict: SessionDict = {
    session_id: record.sessionId,
    conversation_kind: record.kind,
    bot_type: record.botType,
    creator_id: record.creatorId,
    granted_capabilities: [...record.capabilities],
    created_at: record.createdAt.toISOString(),
  };
  if (record.resumeKey) {
    dict.external_resume_key = record.resumeKey;
  }
  return dict;
}

/**
 * Parse a stored record. Throws a ZodError describing every invalid field.
 */
export function fromSessionDict(data: unknown): SessionRecord {
  const parsed = sessionDictSchema.parse(data);
  const record: SessionRecord = {
    sessionId: parsed.session_id,
    kind: parsed.conversation_kind,
    botType: parsed.bot_type,
    creatorId: parsed.creator_id,
    capabilities: parsed.granted_capabilities,
    createdAt: new Date(parsed.created_at),
  };
  if (parsed.external_resume_key) {
    record.resumeKey = parsed.external_resume_key;
  }
  return record;
}

export function createSessionRecord(opts: {
  sessionId: string;
  kind: ConversationKind;
  creatorId: string;
  capabilities: readonly string[];
  botType?: BotType;
}): SessionRecord {
  return {
    sessionId: opts.sessionId,
    kind: opts.kind,
    botType: opts.botType ?? 'claude_agent',
    creatorId: opts.creatorId,
    capabilities: [...opts.capabilities],
    createdAt: new Date(),
  };
}
