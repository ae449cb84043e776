/**
 * SQLite game archive.
 *
 * Stores one row per resolved phase (accepted orders, rejections and the
 * resulting snapshot as JSON) and every press message. Rows are validated
 * with zod on the way back out.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { formatOrder } from '../engine/orders';
import { stateToJSON } from '../engine/game';
import type { StateJSON } from '../engine/game';
import type { PhaseKind, PlayerId, RulesConfig } from '../engine/types';
import type { PhaseRecord, PhaseRecorder } from '../orchestration/types';
import type { PressMessage } from '../press/press-board';
import type { PhaseLogJSON } from './phase-log';

const PhaseKindSchema = z.enum(['MOVE', 'RETREAT', 'BUILD']);

const StateJSONSchema = z.object({
  phase: z.object({ count: z.number().int(), kind: PhaseKindSchema }),
  units: z.array(z.object({ player: z.string(), part: z.string() })),
  owners: z.record(z.string(), z.string()),
  dislodged: z.array(
    z.object({
      player: z.string(),
      part: z.string(),
      attackerFrom: z.string(),
      forbidden: z.array(z.string()),
      options: z.array(z.string()),
    })
  ),
  adjustments: z.record(z.string(), z.number()),
  outcome: z
    .discriminatedUnion('kind', [
      z.object({ kind: z.literal('WIN'), winner: z.string(), centers: z.number() }),
      z.object({ kind: z.literal('DRAW'), shares: z.record(z.string(), z.number()) }),
    ])
    .optional(),
});

const OrdersJSONSchema = z.record(z.string(), z.array(z.string()));

const RejectedJSONSchema = z.array(z.object({ player: z.string(), order: z.string(), reason: z.string() }));

export interface ArchivedPhase {
  label: string;
  count: number;
  kind: PhaseKind;
  orders: Record<PlayerId, string[]>;
  rejected: { player: PlayerId; order: string; reason: string }[];
  state: StateJSON;
}

export interface ArchivedGame {
  id: string;
  players: PlayerId[];
  status: 'active' | 'completed';
  resultType: 'win' | 'draw' | null;
  winner: PlayerId | null;
}

interface GameRow {
  id: string;
  players: string;
  status: string;
  result_type: string | null;
  winner: string | null;
}

interface PhaseRow {
  label: string;
  count: number;
  kind: string;
  orders: string;
  rejected: string;
  state: string;
}

interface PressRow {
  sender: string;
  recipient: string;
  phase: string;
  content: string;
}

function parseJson<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, text: string, what: string): T {
  const parsed = schema.safeParse(JSON.parse(text));
  if (!parsed.success) {
    throw new Error(`Archived ${what} is malformed: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
  }
  return parsed.data;
}

export class GameArchive implements PhaseRecorder {
  constructor(private readonly db: Database.Database) {}

  /**
   * Registers a game. Re-registering an existing id is a no-op.
   */
  createGame(gameId: string, players: readonly PlayerId[], rules: RulesConfig): void {
    this.db
      .prepare<[string, string, string]>('INSERT OR IGNORE INTO games (id, players, rules) VALUES (?, ?, ?)')
      .run(gameId, JSON.stringify(players), JSON.stringify(rules));
  }

  recordPhase(record: PhaseRecord): void {
    const orders: Record<PlayerId, string[]> = {};
    for (const [player, list] of record.orders) {
      orders[player] = list.map(formatOrder);
    }
    const rejected = record.rejected.map((r) => ({ player: r.player, order: formatOrder(r.order), reason: r.reason }));
    const { outcome } = record.state;

    const insert = this.db.prepare<[string, string, number, string, string, string, string]>(
      `INSERT OR REPLACE INTO phases (game_id, label, count, kind, orders, rejected, state)
       VALUES (?, ?, ?, ?, ?, ?, ?)`
    );
    const complete = this.db.prepare<[string, string | null, string]>(
      `UPDATE games SET status = 'completed', ended_at = datetime('now'), result_type = ?, winner = ?
       WHERE id = ?`
    );

    this.db.transaction(() => {
      insert.run(
        record.gameId,
        record.label,
        record.phase.count,
        record.phase.kind,
        JSON.stringify(orders),
        JSON.stringify(rejected),
        JSON.stringify(stateToJSON(record.state))
      );
      if (outcome) {
        complete.run(
          outcome.kind === 'WIN' ? 'win' : 'draw',
          outcome.kind === 'WIN' ? outcome.winner : null,
          record.gameId
        );
      }
    })();
  }

  recordPress(gameId: string, message: PressMessage): void {
    this.db
      .prepare<[string, string, string, string, string]>(
        'INSERT INTO press (game_id, sender, recipient, phase, content) VALUES (?, ?, ?, ?, ?)'
      )
      .run(gameId, message.from, message.to, message.phase, message.content);
  }

  getGame(gameId: string): ArchivedGame | undefined {
    const row = this.db
      .prepare<[string], GameRow>('SELECT id, players, status, result_type, winner FROM games WHERE id = ?')
      .get(gameId);
    if (!row) return undefined;

    return {
      id: row.id,
      players: parseJson(z.array(z.string()), row.players, 'player list'),
      status: row.status === 'completed' ? 'completed' : 'active',
      resultType: row.result_type === 'win' || row.result_type === 'draw' ? row.result_type : null,
      winner: row.winner,
    };
  }

  /**
   * Phases in resolution order.
   */
  getPhases(gameId: string): ArchivedPhase[] {
    const rows = this.db
      .prepare<[string], PhaseRow>(
        'SELECT label, count, kind, orders, rejected, state FROM phases WHERE game_id = ? ORDER BY id'
      )
      .all(gameId);

    return rows.map((row) => ({
      label: row.label,
      count: row.count,
      kind: PhaseKindSchema.parse(row.kind),
      orders: parseJson(OrdersJSONSchema, row.orders, 'orders'),
      rejected: parseJson(RejectedJSONSchema, row.rejected, 'rejections'),
      state: parseJson(StateJSONSchema, row.state, 'state'),
    }));
  }

  /**
   * Latest archived snapshot, if any phase was recorded.
   */
  getLatestState(gameId: string): StateJSON | undefined {
    const phases = this.getPhases(gameId);
    return phases.at(-1)?.state;
  }

  /**
   * Accepted orders of every archived phase, in the phase log format.
   */
  getPhaseLog(gameId: string): PhaseLogJSON {
    const log: PhaseLogJSON = {};
    for (const phase of this.getPhases(gameId)) {
      log[phase.label] = phase.orders;
    }
    return log;
  }

  getPress(gameId: string): Omit<PressMessage, 'id'>[] {
    const rows = this.db
      .prepare<[string], PressRow>('SELECT sender, recipient, phase, content FROM press WHERE game_id = ? ORDER BY id')
      .all(gameId);
    return rows.map((row) => ({ from: row.sender, to: row.recipient, phase: row.phase, content: row.content }));
  }
}
