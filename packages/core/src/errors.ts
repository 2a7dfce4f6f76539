/**
 * Error taxonomy for the relay.
 *
 *   ConnectionError      — agent backend unreachable or the initial send failed
 *   SessionNotFoundError — stale/unknown session id; callers reconnect
 *   TimeoutError         — a bounded wait expired; the connection was closed
 *   DeliveryError        — chat platform send/edit failed
 *   StoreIOError         — the session store could not be written
 */

export class RelayError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConnectionError extends RelayError {}

export class SessionNotFoundError extends RelayError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Session not found: ${shortId(sessionId)}`);
    this.sessionId = sessionId;
  }
}

export class TimeoutError extends RelayError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.timeoutMs = timeoutMs;
  }
}

export class DeliveryError extends RelayError {}

export class StoreIOError extends RelayError {}

/** Render any thrown value as a single line for user-facing notices. */
export function describeError(err: unknown): string {
  if (err instanceof RelayError) return err.message;
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}

/** Session ids are UUIDs — logs only need the head. */
export function shortId(id: string): string {
  return id.length > 12 ? `${id.slice(0, 12)}...` : id;
}
