/**
 * KeyedQueue — runs tasks one at a time per key, in submission order.
 *
 * Two messages landing in the same thread while a response is still
 * streaming would otherwise interleave their edits. Different keys run
 * concurrently.
 */
export class KeyedQueue {
  private tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    // The tail only sequences; the task's own outcome is returned to the caller.
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });

    return result;
  }

  /** Keys with a running or queued task. */
  get activeKeys(): number {
    return this.tails.size;
  }
}
