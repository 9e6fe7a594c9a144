/**
 * Observable State
 *
 * Single-writer store for the externally visible projection of the realtime
 * link. Each change replaces the snapshot with a new frozen object, so a
 * listener (or a React render) always sees both fields from the same update.
 */

import { createLogger } from '../logger.js';
import type { Logger } from '../logger.js';

export interface RealtimeSnapshot {
  /** Latest transcription text */
  readonly text: string;
  /** True only between a handshake ack and the next failure or disconnect */
  readonly connected: boolean;
}

export type SnapshotListener = (snapshot: RealtimeSnapshot, previous: RealtimeSnapshot) => void;

/**
 * Read side shared by the client, the store and the React hook.
 * Both functions are passed around detached, so implementations bind them.
 */
export interface RealtimeStateSource {
  getSnapshot(): RealtimeSnapshot;
  subscribe(listener: SnapshotListener): () => void;
}

export const INITIAL_SNAPSHOT: RealtimeSnapshot = Object.freeze({ text: '', connected: false });

export class ObservableState implements RealtimeStateSource {
  private snapshot: RealtimeSnapshot = INITIAL_SNAPSHOT;
  private listeners: Set<SnapshotListener> = new Set();
  private logger: Logger;

  constructor(logger: Logger = createLogger('State')) {
    this.logger = logger;
  }

  readonly getSnapshot = (): RealtimeSnapshot => this.snapshot;

  readonly subscribe = (listener: SnapshotListener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  /**
   * Apply a partial change. Listeners are notified only when a field
   * actually changes; returns whether it did.
   */
  update(patch: Partial<RealtimeSnapshot>): boolean {
    const previous = this.snapshot;
    const next: RealtimeSnapshot = Object.freeze({ ...previous, ...patch });

    if (next.text === previous.text && next.connected === previous.connected) {
      return false;
    }

    this.snapshot = next;
    for (const listener of this.listeners) {
      try {
        listener(next, previous);
      } catch (error) {
        this.logger.error('Listener error:', error);
      }
    }
    return true;
  }
}
