import { beforeEach, afterEach, describe, expect, it, vi } from 'vitest';
import { ConnectionError, SessionNotFoundError, TimeoutError } from '../errors.js';
import { FakeAgentBackend, drain, sequentialIds, streamedTurn } from '../testing/fake-agent-backend.js';
import { AgentConnectionManager } from './agent-connection-manager.js';

const ASK = ['Bash', 'Read'];

describe('AgentConnectionManager', () => {
  let backend: FakeAgentBackend;
  let manager: AgentConnectionManager;

  beforeEach(() => {
    backend = new FakeAgentBackend();
    manager = new AgentConnectionManager({ backend, generateId: sequentialIds() });
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('start', () => {
    it('streams the first turn and captures the resume key', async () => {
      backend.enqueue({ turns: [streamedTurn(['He', 'llo', ' there'], 'abc123')] });

      const { sessionId, stream } = await manager.start('hello', ASK);

      expect(sessionId).toBe('s-1');
      expect(manager.has('s-1')).toBe(true);
      expect(await drain(stream)).toEqual(['He', 'llo', ' there']);
      expect(manager.resumeKeyFor('s-1')).toBe('abc123');
      expect(backend.connections[0].sent).toEqual(['hello']);
      expect(backend.connections[0].options).toEqual({ capabilities: ASK, resumeKey: undefined });
    });

    it('uses the coarse message text when no deltas arrive', async () => {
      backend.enqueue({
        turns: [
          [
            { kind: 'message', texts: ['Full answer'] },
            { kind: 'result', resumeKey: 'abc123', isError: false },
          ],
        ],
      });

      const { stream } = await manager.start('hello', ASK);
      expect(await drain(stream)).toEqual(['Full answer']);
    });

    it('wraps a connect failure in ConnectionError', async () => {
      backend.enqueue({ turns: [], failConnect: new Error('spawn claude ENOENT') });

      await expect(manager.start('hello', ASK)).rejects.toThrow(
        new ConnectionError('Failed to start session: Error: spawn claude ENOENT'),
      );
      expect(manager.activeCount).toBe(0);
    });

    it('closes the connection when the first send fails', async () => {
      backend.enqueue({ turns: [], failSend: new Error('broken pipe') });

      await expect(manager.start('hello', ASK)).rejects.toBeInstanceOf(ConnectionError);
      expect(backend.connections[0].closeCalls).toBe(1);
      expect(manager.activeCount).toBe(0);
    });
  });

  describe('resume', () => {
    it('asks the backend to rebuild context from the key', async () => {
      backend.enqueue({ turns: [streamedTurn(['Welcome back'], 'def456')] });

      const { sessionId, stream } = await manager.resume('abc123', 'where were we?', ASK);

      expect(await drain(stream)).toEqual(['Welcome back']);
      expect(backend.connections[0].options).toEqual({ capabilities: ASK, resumeKey: 'abc123' });
      expect(manager.resumeKeyFor(sessionId)).toBe('def456');
    });

    it('reports a resume failure as ConnectionError', async () => {
      backend.enqueue({ turns: [], failSend: new Error('No conversation found') });

      await expect(manager.resume('abc123', 'hi', ASK)).rejects.toThrow(
        'Failed to resume session: Error: No conversation found',
      );
    });
  });

  describe('continue', () => {
    it('sends on the live connection and streams the next turn', async () => {
      backend.enqueue({ turns: [streamedTurn(['one'], 'k1'), streamedTurn(['two'], 'k2')] });

      const { sessionId, stream } = await manager.start('first', ASK);
      await drain(stream);
      const next = await manager.continue(sessionId, 'second');

      expect(await drain(next)).toEqual(['two']);
      expect(backend.connections).toHaveLength(1);
      expect(backend.connections[0].sent).toEqual(['first', 'second']);
      expect(manager.resumeKeyFor(sessionId)).toBe('k2');
    });

    it('throws SessionNotFoundError for an unknown session', async () => {
      await expect(manager.continue('missing', 'hi')).rejects.toBeInstanceOf(SessionNotFoundError);
    });

    it('wraps a send failure in ConnectionError', async () => {
      backend.enqueue({ turns: [streamedTurn(['one'])] });
      const { sessionId, stream } = await manager.start('first', ASK);
      await drain(stream);
      backend.connections[0].failSend = new Error('process exited');

      await expect(manager.continue(sessionId, 'second')).rejects.toThrow(
        'Failed to continue session: Error: process exited',
      );
    });
  });

  describe('lost connections', () => {
    it('stops treating a session as live once its process exits', async () => {
      backend.enqueue({ turns: [streamedTurn(['one'], 'k1')] });
      const { sessionId, stream } = await manager.start('first', ASK);
      await drain(stream);

      backend.connections[0].crash();

      expect(manager.has(sessionId)).toBe(false);
      await expect(manager.continue(sessionId, 'second')).rejects.toBeInstanceOf(SessionNotFoundError);
      expect(backend.connections[0].closed).toBe(true);
      expect(manager.activeCount).toBe(0);
    });

    it('drops the session when a turn fails mid-stream', async () => {
      backend.enqueue({ turns: [streamedTurn(['one'], 'k1'), 'hang'] });
      const { sessionId, stream } = await manager.start('first', ASK);
      await drain(stream);

      const reading = drain(await manager.continue(sessionId, 'second'));
      backend.connections[0].crash();

      await expect(reading).rejects.toThrow('Agent process exited before the response completed');
      expect(manager.has(sessionId)).toBe(false);
      expect(manager.activeCount).toBe(0);
      expect(backend.connections[0].closed).toBe(true);
    });
  });

  describe('close', () => {
    it('is idempotent', async () => {
      backend.enqueue({ turns: [streamedTurn(['one'], 'k1')] });
      const { sessionId, stream } = await manager.start('first', ASK);
      await drain(stream);

      await manager.close(sessionId);
      await manager.close(sessionId);

      expect(backend.connections[0].closeCalls).toBe(1);
      expect(manager.has(sessionId)).toBe(false);
      expect(manager.resumeKeyFor(sessionId)).toBeUndefined();
    });

    it('does not record a resume key for a session closed mid-turn', async () => {
      backend.enqueue({ turns: [streamedTurn(['late'], 'k1')] });
      const { sessionId, stream } = await manager.start('first', ASK);

      await manager.close(sessionId);
      await drain(stream);

      expect(manager.resumeKeyFor(sessionId)).toBeUndefined();
    });

    it('closeAll closes every live connection', async () => {
      backend.enqueue({ turns: [] }).enqueue({ turns: [] });
      await manager.start('a', ASK);
      await manager.start('b', ASK);

      await manager.closeAll();

      expect(manager.activeCount).toBe(0);
      expect(backend.connections.map((c) => c.closeCalls)).toEqual([1, 1]);
    });
  });

  describe('waiting wrappers', () => {
    it('startAndWait returns the whole response', async () => {
      backend.enqueue({ turns: [streamedTurn(['He', 'llo'], 'k1')] });

      await expect(manager.startAndWait('hello', ASK, 1000)).resolves.toEqual({
        sessionId: 's-1',
        response: 'Hello',
      });
    });

    it('startAndWait yields the placeholder for an empty turn', async () => {
      backend.enqueue({ turns: [[{ kind: 'result', isError: false }]] });

      const { response } = await manager.startAndWait('hello', ASK, 1000);
      expect(response).toBe('(empty response)');
    });

    it('continueAndWait closes the connection on timeout', async () => {
      backend.enqueue({ turns: [streamedTurn(['one']), 'hang'] });
      const { sessionId, stream } = await manager.start('first', ASK);
      await drain(stream);

      await expect(manager.continueAndWait(sessionId, 'second', 20)).rejects.toBeInstanceOf(TimeoutError);
      expect(manager.has(sessionId)).toBe(false);
      expect(backend.connections[0].closed).toBe(true);
    });
  });

  describe('runOnce', () => {
    it('returns the output and closes the connection', async () => {
      backend.enqueue({ turns: [streamedTurn(['done'], 'k1')] });

      await expect(manager.runOnce('list files', ASK, 1000)).resolves.toEqual({ ok: true, output: 'done' });
      expect(manager.activeCount).toBe(0);
      expect(backend.connections[0].closeCalls).toBe(1);
    });

    it('reports completion without output', async () => {
      backend.enqueue({ turns: [[{ kind: 'result', isError: false }]] });

      await expect(manager.runOnce('touch x', ASK, 1000)).resolves.toEqual({
        ok: true,
        output: '✅ Done (no output)',
      });
    });

    it('reports a timeout', async () => {
      backend.enqueue({ turns: ['hang'] });

      await expect(manager.runOnce('sleep', ASK, 20)).resolves.toEqual({
        ok: false,
        output: '⏱️ Timed out after 0s',
      });
      expect(manager.activeCount).toBe(0);
    });

    it('reports a start failure', async () => {
      backend.enqueue({ turns: [], failConnect: new Error('boom') });

      await expect(manager.runOnce('anything', ASK, 1000)).resolves.toEqual({
        ok: false,
        output: '❌ Failed to start session: Error: boom',
      });
    });
  });

  describe('checkAvailable', () => {
    it('reports backend availability', async () => {
      await expect(manager.checkAvailable()).resolves.toBe(true);
      backend.available = false;
      await expect(manager.checkAvailable()).resolves.toBe(false);
    });

    it('treats a failing availability check as unavailable', async () => {
      backend.available = new Error('check crashed');
      await expect(manager.checkAvailable()).resolves.toBe(false);
    });
  });
});
