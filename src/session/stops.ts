/**
 * Stop Queue
 *
 * Buffers adapter stop/end notifications so the session loop can await them one at
 * a time, in arrival order, while the prompt is busy.
 */

import type { StopContext } from './interactive.js';

export type SessionSignal =
  | { kind: 'stopped'; stop: StopContext }
  | { kind: 'ended'; reason: string };

export class StopQueue {
  private pending: SessionSignal[] = [];
  private waiters: Array<(signal: SessionSignal) => void> = [];
  private ended: SessionSignal | null = null;

  push(signal: SessionSignal): void {
    if (this.ended) return;
    if (signal.kind === 'ended') {
      this.ended = signal;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(signal);
    } else {
      this.pending.push(signal);
    }

    // Everyone still waiting learns about the end as well
    if (this.ended) {
      for (const rest of this.waiters.splice(0)) {
        rest(this.ended);
      }
    }
  }

  /**
   * Next signal. Once the session has ended, every call resolves with the end signal.
   */
  next(): Promise<SessionSignal> {
    const queued = this.pending.shift();
    if (queued) return Promise.resolve(queued);
    if (this.ended) return Promise.resolve(this.ended);
    return new Promise((resolve) => this.waiters.push(resolve));
  }
}
