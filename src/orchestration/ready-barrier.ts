/**
 * Ready barrier.
 *
 * Phase advancement waits here until every acting player has signalled
 * ready, or until the timeout fires. Only one wait is outstanding at a time.
 */

import type { PlayerId } from '../engine/types';

export type BarrierOutcome = 'ALL_READY' | 'TIMEOUT' | 'CANCELLED';

export interface BarrierResult {
  outcome: BarrierOutcome;
  /** Players that had not signalled when the barrier opened */
  unready: PlayerId[];
}

interface Waiter {
  resolve: (result: BarrierResult) => void;
  timer: ReturnType<typeof setTimeout> | null;
}

export class ReadyBarrier {
  private readonly required: readonly PlayerId[];
  private readonly ready = new Set<PlayerId>();
  private waiter: Waiter | null = null;

  /**
   * @param timeoutMs - 0 waits indefinitely
   */
  constructor(required: Iterable<PlayerId>, private readonly timeoutMs: number = 0) {
    this.required = [...new Set(required)];
  }

  /**
   * Marks a player ready. Players outside the acting set are ignored.
   * Returns false when the signal had no effect.
   */
  markReady(player: PlayerId): boolean {
    if (!this.required.includes(player) || this.ready.has(player)) {
      return false;
    }
    this.ready.add(player);
    if (this.isComplete()) {
      this.release('ALL_READY');
    }
    return true;
  }

  isReady(player: PlayerId): boolean {
    return this.ready.has(player);
  }

  pending(): PlayerId[] {
    return this.required.filter((p) => !this.ready.has(p));
  }

  isComplete(): boolean {
    return this.pending().length === 0;
  }

  isWaiting(): boolean {
    return this.waiter !== null;
  }

  /**
   * Resolves once everyone is ready, the timeout elapses, or the barrier is
   * cancelled.
   */
  wait(): Promise<BarrierResult> {
    if (this.waiter) {
      return Promise.reject(new Error('Barrier is already being waited on'));
    }
    if (this.isComplete()) {
      return Promise.resolve({ outcome: 'ALL_READY', unready: [] });
    }

    return new Promise<BarrierResult>((resolve) => {
      const timer = this.timeoutMs > 0 ? setTimeout(() => this.release('TIMEOUT'), this.timeoutMs) : null;
      this.waiter = { resolve, timer };
    });
  }

  cancel(): void {
    this.release('CANCELLED');
  }

  private release(outcome: BarrierOutcome): void {
    const waiter = this.waiter;
    if (!waiter) return;

    this.waiter = null;
    if (waiter.timer) {
      clearTimeout(waiter.timer);
    }
    waiter.resolve({ outcome, unready: this.pending() });
  }
}
