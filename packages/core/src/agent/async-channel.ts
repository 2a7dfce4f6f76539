/**
 * AsyncChannel — unbounded push queue with a pull side.
 *
 * Feeds user messages into the SDK's streaming-input prompt, and buffers SDK
 * output between turns so nothing is lost while no turn is being read.
 */

type Waiter<T> = {
  resolve: (value: T | undefined) => void;
  reject: (err: unknown) => void;
};

export class AsyncChannel<T> {
  private buffer: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closed = false;
  private failure: { error: unknown } | null = null;

  push(value: T): void {
    if (this.closed) {
      throw new Error('Cannot push to a closed channel');
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(value);
    } else {
      this.buffer.push(value);
    }
  }

  /** No more values. Buffered values are still delivered. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) waiter.resolve(undefined);
  }

  /** Close with an error, raised to readers once the buffer is drained. */
  fail(error: unknown): void {
    if (this.closed) return;
    this.failure = { error };
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) waiter.reject(error);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Next value, or undefined once closed and drained. */
  shift(): Promise<T | undefined> {
    if (this.buffer.length > 0) {
      return Promise.resolve(this.buffer.shift());
    }
    if (this.failure) return Promise.reject(this.failure.error);
    if (this.closed) return Promise.resolve(undefined);
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    while (true) {
      const value = await this.shift();
      if (value === undefined) return;
      yield value;
    }
  }
}
