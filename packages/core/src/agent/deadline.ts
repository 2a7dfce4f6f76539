import { TimeoutError } from '../errors.js';

const EXPIRED = Symbol('expired');

function raceDeadline<T>(promise: Promise<T>, remainingMs: number): Promise<T | typeof EXPIRED> {
  if (remainingMs <= 0) return Promise.resolve(EXPIRED);
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<typeof EXPIRED>((resolve) => {
    timer = setTimeout(() => resolve(EXPIRED), remainingMs);
  });
  return Promise.race([promise, expiry]).finally(() => clearTimeout(timer));
}

/**
 * Re-yield `source` until `timeoutMs` has elapsed since the first pull.
 * On expiry `onExpire` runs (typically closing the connection behind the
 * stream) and a TimeoutError is thrown to the consumer.
 */
export async function* withDeadline<T>(
  source: AsyncIterable<T>,
  timeoutMs: number,
  onExpire: () => Promise<void>,
): AsyncGenerator<T, void, undefined> {
  const iterator = source[Symbol.asyncIterator]();
  const deadline = Date.now() + timeoutMs;
  let finished = false;

  try {
    while (true) {
      const pending = iterator.next();
      const result = await raceDeadline(pending, deadline - Date.now());
      if (result === EXPIRED) {
        finished = true;
        // The abandoned pull settles once the connection is closed.
        pending.catch((err: unknown) => {
          console.debug('[withDeadline] Abandoned read settled with error:', err);
        });
        await onExpire();
        throw new TimeoutError(`No complete response within ${Math.round(timeoutMs / 1000)}s`, timeoutMs);
      }
      if (result.done) {
        finished = true;
        return;
      }
      yield result.value;
    }
  } finally {
    // Consumer stopped early — let the source clean up.
    if (!finished) await iterator.return?.();
  }
}

/**
 * Drain a text stream into one string, bounded by `timeoutMs`.
 */
export async function collectText(
  stream: AsyncIterable<string>,
  timeoutMs: number,
  onExpire: () => Promise<void>,
  emptyPlaceholder: string,
): Promise<string> {
  const parts: string[] = [];
  for await (const chunk of withDeadline(stream, timeoutMs, onExpire)) {
    parts.push(chunk);
  }
  return parts.length > 0 ? parts.join('') : emptyPlaceholder;
}
