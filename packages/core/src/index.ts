export * from './constants.js';
export * from './errors.js';

export {
  createSessionRecord,
  fromSessionDict,
  toSessionDict,
  type BotType,
  type ConversationKind,
  type SessionDict,
  type SessionRecord,
} from './sessions/session-record.js';
export { SessionStore, type SessionStoreConfig, type FlushFailurePolicy } from './sessions/session-store.js';

export type { AgentBackend, AgentConnection, AgentConnectOptions, BackendSignal } from './agent/types.js';
export { TurnTextExtractor, type ExtractorState, type TurnStats } from './agent/turn-text-extractor.js';
export { withDeadline, collectText } from './agent/deadline.js';
export { AsyncChannel } from './agent/async-channel.js';
export {
  AgentConnectionManager,
  type AgentConnectionManagerConfig,
  type StartedSession,
  type RunOnceResult,
} from './agent/agent-connection-manager.js';
export {
  ClaudeAgentBackend,
  toBackendSignals,
  type ClaudeAgentBackendConfig,
  type AgentQueryFn,
  type SdkMessageLike,
} from './agent/claude-agent-backend.js';

export {
  StreamMultiplexer,
  type StreamMultiplexerOptions,
  type DeliveryReport,
  type Messageable,
  type OutgoingMessage,
} from './streaming/stream-multiplexer.js';

export { KeyedQueue } from './conversation/keyed-queue.js';
export {
  ConversationController,
  type ConversationControllerConfig,
  type ConversationSummary,
  type OpenConversationOptions,
  type ResumeFallbackPolicy,
  type TurnMode,
  type TurnOutcome,
} from './conversation/conversation-controller.js';

export {
  MessageHandler,
  type ChatMessage,
  type ChatMessageType,
  type MessageResponder,
} from './messages/message-handler.js';
