/**
 * TurnTextExtractor — flattens backend signals into text fragments.
 *
 * The backend reports each assistant message twice: as token deltas (when
 * partial messages are enabled) and as one coarse message at the end. Deltas
 * win; the coarse text is only used for a message that produced no delta.
 *
 *   awaiting-delta ──delta──▶ delta-seen
 *         ▲                       │
 *         └──────── message ──────┘   (boundary: state resets either way)
 */

import type { BackendSignal } from './types.js';

export type ExtractorState = { tag: 'awaiting-delta' } | { tag: 'delta-seen' };

export interface TurnStats {
  deltas: number;
  messages: number;
  /** Messages whose text came from the coarse block */
  fallbacks: number;
}

export class TurnTextExtractor {
  private state: ExtractorState = { tag: 'awaiting-delta' };
  private resumeKey: string | undefined;
  private readonly stats: TurnStats = { deltas: 0, messages: 0, fallbacks: 0 };

  /** Text fragments to emit for this signal, in order. */
  accept(signal: BackendSignal): string[] {
    switch (signal.kind) {
      case 'delta': {
        if (!signal.text) return [];
        this.state = { tag: 'delta-seen' };
        this.stats.deltas++;
        return [signal.text];
      }
      case 'message': {
        this.stats.messages++;
        const previous = this.state;
        this.state = { tag: 'awaiting-delta' };
        if (previous.tag === 'delta-seen') return [];
        const texts = signal.texts.filter((t) => t.length > 0);
        if (texts.length > 0) this.stats.fallbacks++;
        return texts;
      }
      case 'result': {
        if (signal.resumeKey) this.resumeKey = signal.resumeKey;
        return [];
      }
    }
  }

  get currentState(): ExtractorState {
    return this.state;
  }

  /** Resume key from the most recent `result` signal, if any. */
  get capturedResumeKey(): string | undefined {
    return this.resumeKey;
  }

  get turnStats(): Readonly<TurnStats> {
    return this.stats;
  }
}
