import type { ConversationKind } from './sessions/session-record.js';

/** Discord rejects message content above this many characters. */
export const PLATFORM_MESSAGE_LIMIT = 2000;

/** Default chunk ceiling — leaves headroom below the platform limit for markdown. */
export const DEFAULT_STREAM_CEILING = 1900;

/** Minimum spacing between in-place edits of the same message (ms). */
export const DEFAULT_EDIT_INTERVAL_MS = 1500;

/** Trailing marker shown while a message is still being written. */
export const STREAM_CURSOR = ' ▌';

export const EMPTY_RESPONSE_PLACEHOLDER = '(empty response)';

/**
 * Tools pre-authorised per conversation kind. Headless sessions cannot answer
 * permission prompts, so anything not listed here is unavailable to the agent.
 */
export const CAPABILITY_SETS: Record<ConversationKind, readonly string[]> = {
  ask: ['Bash', 'Read'],
  code: ['Bash', 'Read', 'Edit', 'Write', 'MultiEdit'],
};

/** Streaming deadline per conversation kind (ms). */
export const TURN_TIMEOUTS_MS: Record<ConversationKind, number> = {
  ask: 300_000,
  code: 600_000,
};

/** Default wait for the non-streaming wrappers (ms). */
export const DEFAULT_WAIT_TIMEOUT_MS = 300_000;
