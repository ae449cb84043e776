/**
 * Types for the phase state machine.
 *
 * The orchestration layer owns the authoritative game state, buffers orders
 * until every acting player is ready (or the timeout fires), and reports
 * each resolved phase to listeners and recorders.
 */

import type { PhaseResolution } from '../engine/game';
import type { VoteSummary } from '../engine/votes';
import type {
  GameOutcome,
  GameState,
  Order,
  PhaseInfo,
  PlayerId,
  RejectedOrder,
} from '../engine/types';

/**
 * Unique identifier for a game.
 */
export type GameId = string;

/**
 * Configuration for the phase state machine.
 */
export interface PhaseMachineConfig {
  gameId: GameId;
  /** Milliseconds advance() waits for ready signals; 0 waits indefinitely */
  readyTimeoutMs: number;
}

export const DEFAULT_PHASE_MACHINE_CONFIG: PhaseMachineConfig = {
  gameId: 'local',
  readyTimeoutMs: 0,
};

/**
 * Types of events emitted by the state machine.
 */
export type GameEventType =
  | 'ORDERS_SUBMITTED'
  | 'PLAYER_READY'
  | 'DRAW_VOTE'
  | 'BARRIER_TIMEOUT'
  | 'PHASE_RESOLVED'
  | 'GAME_COMPLETED';

export interface GameEventBase {
  type: GameEventType;
  gameId: GameId;
  timestamp: Date;
}

export interface OrdersSubmittedEvent extends GameEventBase {
  type: 'ORDERS_SUBMITTED';
  player: PlayerId;
  orderCount: number;
}

export interface PlayerReadyEvent extends GameEventBase {
  type: 'PLAYER_READY';
  player: PlayerId;
  /** Acting players still to signal */
  pending: PlayerId[];
}

export interface DrawVoteEvent extends GameEventBase {
  type: 'DRAW_VOTE';
  player: PlayerId;
  vote: boolean;
  summary: VoteSummary;
}

/**
 * The ready barrier gave up waiting; these players fell back to defaults.
 */
export interface BarrierTimeoutEvent extends GameEventBase {
  type: 'BARRIER_TIMEOUT';
  label: string;
  unready: PlayerId[];
}

export interface PhaseResolvedEvent extends GameEventBase {
  type: 'PHASE_RESOLVED';
  /** Label of the phase that was resolved */
  label: string;
  resolution: PhaseResolution;
}

export interface GameCompletedEvent extends GameEventBase {
  type: 'GAME_COMPLETED';
  outcome: GameOutcome;
  finalPhase: PhaseInfo;
}

export type GameEvent =
  | OrdersSubmittedEvent
  | PlayerReadyEvent
  | DrawVoteEvent
  | BarrierTimeoutEvent
  | PhaseResolvedEvent
  | GameCompletedEvent;

export type GameEventCallback = (event: GameEvent) => void;

/**
 * A resolved phase as handed to recorders.
 */
export interface PhaseRecord {
  gameId: GameId;
  label: string;
  phase: PhaseInfo;
  orders: ReadonlyMap<PlayerId, readonly Order[]>;
  rejected: readonly RejectedOrder[];
  /** Snapshot after resolution */
  state: GameState;
}

/**
 * Collaborator notified after every phase (phase log, archive).
 */
export interface PhaseRecorder {
  recordPhase(record: PhaseRecord): void;
}
