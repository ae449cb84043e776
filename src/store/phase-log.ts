/**
 * Phase log: orders accepted in each phase, in the fixed text grammar.
 *
 *   { "Phase 1 move": { "ENG": ["LON_C M NTH_C", ...], ... }, ... }
 *
 * When given a path, the whole log is rewritten after every phase.
 */

import { writeFileSync } from 'fs';
import { formatOrder } from '../engine/orders';
import type { Order, PlayerId } from '../engine/types';
import type { PhaseRecord, PhaseRecorder } from '../orchestration/types';

export type PhaseLogJSON = Record<string, Record<PlayerId, string[]>>;

export class PhaseLog implements PhaseRecorder {
  private entries = new Map<string, Map<PlayerId, string[]>>();

  constructor(private readonly path?: string) {}

  recordPhase(record: PhaseRecord): void {
    this.record(record.label, record.orders);
    if (this.path) {
      this.write(this.path);
    }
  }

  /**
   * Stores a phase's orders, replacing any earlier entry under the label.
   * Players without orders are left out.
   */
  record(label: string, orders: ReadonlyMap<PlayerId, readonly Order[]>): void {
    const formatted = new Map<PlayerId, string[]>();
    for (const [player, list] of orders) {
      if (list.length > 0) {
        formatted.set(player, list.map(formatOrder));
      }
    }
    this.entries.set(label, formatted);
  }

  /**
   * Replaces the log with an earlier one, e.g. when a game resumes.
   */
  restore(json: PhaseLogJSON): void {
    this.entries = new Map();
    for (const [label, orders] of Object.entries(json)) {
      this.entries.set(label, new Map(Object.entries(orders).filter(([, list]) => list.length > 0)));
    }
  }

  get(label: string): Map<PlayerId, string[]> | undefined {
    return this.entries.get(label);
  }

  labels(): string[] {
    return [...this.entries.keys()];
  }

  toJSON(): PhaseLogJSON {
    const json: PhaseLogJSON = {};
    for (const [label, orders] of this.entries) {
      json[label] = Object.fromEntries(orders);
    }
    return json;
  }

  write(path: string): void {
    writeFileSync(path, JSON.stringify(this.toJSON(), null, 2) + '\n');
  }
}
