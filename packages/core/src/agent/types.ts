/**
 * The narrow surface the relay needs from an agent backend.
 *
 * A backend hands out long-lived connections. Each connection accepts user
 * messages and reports, per turn, a sequence of signals ending in `result`.
 */

export type BackendSignal =
  /** Token-level text increment */
  | { kind: 'delta'; text: string }
  /** Coarse full-text blocks of one assistant message; marks the message boundary */
  | { kind: 'message'; texts: string[] }
  /** Turn completion, optionally carrying the backend's resumption token */
  | { kind: 'result'; resumeKey?: string; isError: boolean };

export interface AgentConnectOptions {
  /** Tool names the agent may use without prompting */
  capabilities: readonly string[];
  /** Rebuild prior context from this backend-issued token */
  resumeKey?: string;
}

export interface AgentConnection {
  /** Queue a user message; resolves once the backend has accepted it. */
  send(text: string): Promise<void>;
  /** Signals for the current turn. Completes after the `result` signal. */
  receiveTurn(): AsyncIterable<BackendSignal>;
  /** False once closed, or once the backend process behind it has exited. */
  readonly alive: boolean;
  close(): Promise<void>;
}

export interface AgentBackend {
  connect(options: AgentConnectOptions): Promise<AgentConnection>;
  /** Is the backend installed and runnable? */
  isAvailable(): Promise<boolean>;
}
