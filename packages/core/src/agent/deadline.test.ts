import { describe, expect, it, vi } from 'vitest';
import { TimeoutError } from '../errors.js';
import { collectText, withDeadline } from './deadline.js';

async function* fromArray<T>(items: T[]): AsyncGenerator<T, void, undefined> {
  for (const item of items) {
    yield item;
  }
}

/** Yields `first`, then waits until `release` is called. */
function stalled(first: string): { stream: AsyncGenerator<string, void, undefined>; release: () => void } {
  let release = (): void => {};
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  async function* generate(): AsyncGenerator<string, void, undefined> {
    yield first;
    await gate;
  }
  return { stream: generate(), release };
}

describe('withDeadline', () => {
  it('passes items through when the source finishes in time', async () => {
    const onExpire = vi.fn(async () => {});
    const items: string[] = [];
    for await (const item of withDeadline(fromArray(['a', 'b', 'c']), 1000, onExpire)) {
      items.push(item);
    }
    expect(items).toEqual(['a', 'b', 'c']);
    expect(onExpire).not.toHaveBeenCalled();
  });

  it('runs onExpire and throws TimeoutError when the source stalls', async () => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    const { stream, release } = stalled('partial');
    const onExpire = vi.fn(async () => release());

    const items: string[] = [];
    const consume = async (): Promise<void> => {
      for await (const item of withDeadline(stream, 20, onExpire)) {
        items.push(item);
      }
    };

    await expect(consume()).rejects.toThrow(TimeoutError);
    expect(items).toEqual(['partial']);
    expect(onExpire).toHaveBeenCalledTimes(1);
    vi.restoreAllMocks();
  });

  it('returns the source when the consumer stops early', async () => {
    const source = fromArray(['a', 'b', 'c']);
    for await (const item of withDeadline(source, 1000, async () => {})) {
      if (item === 'a') break;
    }
    await expect(source.next()).resolves.toEqual({ done: true, value: undefined });
  });
});

describe('collectText', () => {
  it('joins the fragments', async () => {
    await expect(collectText(fromArray(['He', 'llo']), 1000, async () => {}, '(empty)')).resolves.toBe('Hello');
  });

  it('returns the placeholder for an empty stream', async () => {
    await expect(collectText(fromArray([]), 1000, async () => {}, '(empty)')).resolves.toBe('(empty)');
  });
});
