import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FakeSink } from '../testing/fake-sink.js';
import { StreamMultiplexer } from './stream-multiplexer.js';

async function* fragments(...parts: string[]): AsyncGenerator<string, void, undefined> {
  for (const part of parts) {
    yield part;
  }
}

async function* failing(parts: string[], error: Error): AsyncGenerator<string, void, undefined> {
  for (const part of parts) {
    yield part;
  }
  throw error;
}

describe('StreamMultiplexer', () => {
  let sink: FakeSink;

  beforeEach(() => {
    sink = new FakeSink();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('delivers a short response as one message without the cursor', async () => {
    const mux = new StreamMultiplexer({ now: () => 0 });

    const report = await mux.render(fragments('Hello', ' world'), sink);

    expect(sink.contents).toEqual(['Hello world']);
    expect(sink.messages[0].edits).toEqual(['Hello world']);
    expect(report).toEqual({ messageCount: 1, characters: 11, failed: false });
  });

  it('sends with the cursor and finalizes without it', async () => {
    const mux = new StreamMultiplexer({ now: () => 0 });

    await mux.render(fragments('Hel', 'lo'), sink);

    expect(sink.sent).toEqual(['Hel ▌']);
    expect(sink.messages[0].edits).toEqual(['Hello']);
  });

  it('throttles edits to one per interval', async () => {
    let clock = 0;
    const mux = new StreamMultiplexer({ editIntervalMs: 1500, now: () => clock });

    async function* timed(): AsyncGenerator<string, void, undefined> {
      clock = 0;
      yield 'a';
      clock = 1000;
      yield 'b';
      clock = 1600;
      yield 'c';
      clock = 1700;
      yield 'd';
    }

    await mux.render(timed(), sink);

    expect(sink.messages).toHaveLength(1);
    expect(sink.messages[0].edits).toEqual(['abc ▌', 'abcd']);
  });

  it('finalizes the head at the last line break when the ceiling is crossed', async () => {
    const mux = new StreamMultiplexer({ ceiling: 1900, now: () => 0 });
    const head = 'x'.repeat(1880);
    const tail = 'y'.repeat(24);

    await mux.render(fragments(head, `\n${tail}`), sink);

    expect(sink.contents).toEqual([head, tail]);
    expect(sink.messages[0].edits).toEqual([head]);
    expect(sink.messages[1].edits).toEqual([tail]);
  });

  it('cuts hard at the ceiling when there is no line break', async () => {
    const mux = new StreamMultiplexer({ ceiling: 10, now: () => 0 });

    const report = await mux.render(fragments('abcdefghijklmnopqrstuvwxy'), sink);

    expect(sink.contents).toEqual(['abcdefghij', 'klmnopqrst', 'uvwxy']);
    expect(report.messageCount).toBe(3);
  });

  it('keeps every finished message within the ceiling', async () => {
    const mux = new StreamMultiplexer({ ceiling: 50, now: () => 0 });
    const lines = Array.from({ length: 40 }, (_, i) => `line ${i}\n`);

    await mux.render(fragments(...lines), sink);

    for (const content of sink.contents) {
      expect(content.length).toBeLessThanOrEqual(50);
    }
    expect(sink.contents.join('\n')).toBe(lines.join(''));
  });

  it('sends the placeholder for an empty stream', async () => {
    const mux = new StreamMultiplexer();

    const report = await mux.render(fragments(), sink);

    expect(sink.contents).toEqual(['(empty response)']);
    expect(report).toEqual({ messageCount: 1, characters: 0, failed: false });
  });

  it('skips empty fragments', async () => {
    const mux = new StreamMultiplexer({ now: () => 0 });

    await mux.render(fragments('', 'ok', ''), sink);

    expect(sink.contents).toEqual(['ok']);
  });

  describe('prefix', () => {
    it('goes on the first message only', async () => {
      const mux = new StreamMultiplexer({ ceiling: 10, prefix: '<@1> ', now: () => 0 });

      await mux.render(fragments('abcdefghijklmno'), sink);

      expect(sink.contents).toEqual(['<@1> abcde', 'fghijklmno']);
    });

    it('is applied to the placeholder of an empty stream', async () => {
      const mux = new StreamMultiplexer({ prefix: '<@1> ' });

      await mux.render(fragments(), sink);

      expect(sink.contents).toEqual(['<@1> (empty response)']);
    });

    it('can be overridden per render', async () => {
      const mux = new StreamMultiplexer({ prefix: '<@1> ', now: () => 0 });

      await mux.render(fragments('hi'), sink, { prefix: '<@2> ' });

      expect(sink.contents).toEqual(['<@2> hi']);
    });
  });

  describe('failures', () => {
    it('appends an error notice when the stream fails', async () => {
      const mux = new StreamMultiplexer({ now: () => 0 });

      const report = await mux.render(failing(['partial'], new Error('socket closed')), sink);

      expect(sink.contents).toEqual(['partial\n\n⚠️ Error: socket closed']);
      expect(report.failed).toBe(true);
      expect(report.characters).toBe(7);
      expect(report.error).toBeInstanceOf(Error);
    });

    it('posts the notice alone when the stream fails before any text', async () => {
      const mux = new StreamMultiplexer({ prefix: '<@1> ' });

      await mux.render(failing([], new Error('boom')), sink);

      expect(sink.contents).toEqual(['<@1> ⚠️ Error: boom']);
    });

    it('never rejects when the platform refuses every send', async () => {
      sink.failSends = Number.POSITIVE_INFINITY;
      const mux = new StreamMultiplexer({ now: () => 0 });

      const report = await mux.render(fragments('Hello', ' world'), sink);

      expect(report).toEqual({ messageCount: 0, characters: 11, failed: false });
      expect(console.warn).toHaveBeenCalled();
    });

    it('retries a refused create at the edit rate, not once per fragment', async () => {
      sink.failSends = Number.POSITIVE_INFINITY;
      const mux = new StreamMultiplexer({ now: () => 0 });

      const report = await mux.render(fragments(...Array.from({ length: 200 }, () => 'x')), sink);

      // First fragment, then the final delivery
      expect(sink.sendAttempts).toBe(2);
      expect(report).toEqual({ messageCount: 0, characters: 200, failed: false });
    });

    it('creates the message once the platform accepts again', async () => {
      sink.failSends = 1;
      let clock = 0;
      const mux = new StreamMultiplexer({ editIntervalMs: 1000, now: () => clock });

      async function* timed(): AsyncGenerator<string, void, undefined> {
        yield 'a';
        clock = 500;
        yield 'b';
        clock = 1000;
        yield 'c';
      }
      await mux.render(timed(), sink);

      expect(sink.sendAttempts).toBe(2);
      expect(sink.sent).toEqual(['abc ▌']);
      expect(sink.contents).toEqual(['abc']);
    });

    it('keeps going when an edit is refused', async () => {
      sink.failEdits = true;
      const mux = new StreamMultiplexer({ now: () => 0 });

      const report = await mux.render(fragments('Hello', ' world'), sink);

      expect(sink.contents).toEqual(['Hello ▌']);
      expect(report.messageCount).toBe(1);
    });
  });

  it('rejects a non-positive ceiling', () => {
    expect(() => new StreamMultiplexer({ ceiling: 0 })).toThrow(RangeError);
  });
});
