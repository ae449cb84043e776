/**
 * Phase state machine.
 *
 * Owns the single authoritative GameState. Orders are buffered per unit until
 * the phase advances; advancement either happens on demand (tick) or once
 * the ready barrier opens (advance). Each resolution replaces the snapshot
 * wholesale, is reported to listeners and handed to every recorder.
 */

import { createInitialState, getPhaseLabel, resolvePhase } from '../engine/game';
import type { PhaseResolution } from '../engine/game';
import type { MapGraph } from '../engine/map';
import type { GameState, Order, PartId, PlayerId, RulesConfig } from '../engine/types';
import { DrawVoteTracker, activePlayers, computeDrawShares } from '../engine/votes';
import type { VoteSummary } from '../engine/votes';
import { ReadyBarrier } from './ready-barrier';
import { DEFAULT_PHASE_MACHINE_CONFIG } from './types';
import type {
  GameEvent,
  GameEventCallback,
  PhaseMachineConfig,
  PhaseRecorder,
} from './types';

export class PhaseStateMachine {
  private readonly config: PhaseMachineConfig;
  private state: GameState;
  private buffer = new Map<PlayerId, Map<PartId, Order>>();
  private barrier: ReadyBarrier;
  private readonly votes: DrawVoteTracker;
  private eventCallbacks: GameEventCallback[] = [];
  private closed = false;

  constructor(
    private readonly map: MapGraph,
    private readonly rules: RulesConfig,
    config: Partial<PhaseMachineConfig> = {},
    private readonly recorders: readonly PhaseRecorder[] = [],
    initialState?: GameState
  ) {
    this.config = { ...DEFAULT_PHASE_MACHINE_CONFIG, ...config };
    this.state = initialState ?? createInitialState(map);
    this.votes = new DrawVoteTracker(rules.voteShown);
    this.barrier = this.createBarrier();
  }

  /**
   * Registers an event listener.
   */
  onEvent(callback: GameEventCallback): () => void {
    this.eventCallbacks.push(callback);
    return () => {
      const idx = this.eventCallbacks.indexOf(callback);
      if (idx !== -1) {
        this.eventCallbacks.splice(idx, 1);
      }
    };
  }

  private emit(event: GameEvent): void {
    for (const callback of this.eventCallbacks) {
      try {
        callback(event);
      } catch (err) {
        console.error('Event callback error:', err);
      }
    }
  }

  getGameId(): string {
    return this.config.gameId;
  }

  getState(): GameState {
    return this.state;
  }

  getPhaseLabel(): string {
    return getPhaseLabel(this.state.phase);
  }

  isOver(): boolean {
    return this.state.outcome !== undefined;
  }

  /**
   * Players expected to act in the current phase.
   */
  actingPlayers(): PlayerId[] {
    const ids = this.state.players.map((p) => p.id);
    switch (this.state.phase.kind) {
      case 'MOVE':
        return ids.filter((id) => this.state.units.some((u) => u.player === id));
      case 'RETREAT':
        return ids.filter((id) => this.state.dislodged.some((d) => d.player === id));
      case 'BUILD':
        return ids.filter((id) => (this.state.adjustments.get(id) ?? 0) !== 0);
    }
  }

  /**
   * Buffers orders for a player. A later order for the same unit replaces
   * the earlier one.
   */
  submitOrders(player: PlayerId, orders: readonly Order[]): void {
    this.assertAccepting(player);

    let pending = this.buffer.get(player);
    if (!pending) {
      pending = new Map();
      this.buffer.set(player, pending);
    }
    for (const order of orders) {
      pending.set(order.unit, order);
    }

    this.emit({
      type: 'ORDERS_SUBMITTED',
      gameId: this.config.gameId,
      timestamp: new Date(),
      player,
      orderCount: orders.length,
    });
  }

  /**
   * Buffered orders in submission order, per player.
   */
  getBufferedOrders(): Map<PlayerId, Order[]> {
    const orders = new Map<PlayerId, Order[]>();
    for (const [player, pending] of this.buffer) {
      orders.set(player, [...pending.values()]);
    }
    return orders;
  }

  setReady(player: PlayerId): void {
    this.assertAccepting(player);
    if (!this.barrier.markReady(player)) return;

    this.emit({
      type: 'PLAYER_READY',
      gameId: this.config.gameId,
      timestamp: new Date(),
      player,
      pending: this.barrier.pending(),
    });
  }

  isReady(player: PlayerId): boolean {
    return this.barrier.isReady(player);
  }

  pendingPlayers(): PlayerId[] {
    return this.barrier.pending();
  }

  /**
   * Records a draw vote; `false` cancels an earlier yes.
   */
  vote(player: PlayerId, flag: boolean): void {
    this.assertAccepting(player);
    this.votes.vote(player, flag);

    this.emit({
      type: 'DRAW_VOTE',
      gameId: this.config.gameId,
      timestamp: new Date(),
      player,
      vote: flag,
      summary: this.getVoteSummary(),
    });
  }

  getVoteSummary(): VoteSummary {
    return this.votes.summary(activePlayers(this.state));
  }

  /**
   * Resolves the current phase with whatever is buffered.
   */
  tick(): PhaseResolution {
    this.assertOpen();
    if (this.state.outcome) {
      throw new Error('Game is over');
    }

    const label = this.getPhaseLabel();
    const resolved = this.state.phase;
    const resolution = resolvePhase(this.state, this.map, this.rules, this.getBufferedOrders());

    let next = resolution.state;
    if (!next.outcome && this.votes.checkVotes(activePlayers(next))) {
      next = { ...next, outcome: { kind: 'DRAW', shares: computeDrawShares(next, this.rules.drawType) } };
    }
    const final: PhaseResolution = { ...resolution, state: next };

    this.state = next;
    this.buffer = new Map();
    this.barrier.cancel();
    this.barrier = this.createBarrier();

    for (const recorder of this.recorders) {
      try {
        recorder.recordPhase({
          gameId: this.config.gameId,
          label,
          phase: resolved,
          orders: final.accepted,
          rejected: final.rejected,
          state: next,
        });
      } catch (err) {
        console.error('Phase recorder error:', err);
      }
    }

    this.emit({
      type: 'PHASE_RESOLVED',
      gameId: this.config.gameId,
      timestamp: new Date(),
      label,
      resolution: final,
    });

    if (next.outcome) {
      this.emit({
        type: 'GAME_COMPLETED',
        gameId: this.config.gameId,
        timestamp: new Date(),
        outcome: next.outcome,
        finalPhase: resolved,
      });
    }

    return final;
  }

  /**
   * Waits for the ready barrier, then resolves the phase. Unready players
   * lose their buffered orders when the timeout forces the phase: their
   * units hold, retreat to disbandment, or take the default adjustments.
   *
   * Resolves to null when the wait was cancelled by close() or by a tick().
   */
  async advance(): Promise<PhaseResolution | null> {
    this.assertOpen();
    if (this.state.outcome) {
      throw new Error('Game is over');
    }

    const barrier = this.barrier;
    const result = await barrier.wait();
    if (result.outcome === 'CANCELLED' || barrier !== this.barrier || this.closed) {
      return null;
    }

    if (result.outcome === 'TIMEOUT') {
      for (const player of result.unready) {
        this.buffer.delete(player);
      }
      this.emit({
        type: 'BARRIER_TIMEOUT',
        gameId: this.config.gameId,
        timestamp: new Date(),
        label: this.getPhaseLabel(),
        unready: result.unready,
      });
    }

    return this.tick();
  }

  /**
   * Stops waiting and detaches listeners. Further input is rejected.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.barrier.cancel();
    this.eventCallbacks = [];
  }

  private createBarrier(): ReadyBarrier {
    return new ReadyBarrier(this.actingPlayers(), this.config.readyTimeoutMs);
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('Phase machine is closed');
    }
  }

  private assertAccepting(player: PlayerId): void {
    this.assertOpen();
    if (this.state.outcome) {
      throw new Error('Game is over');
    }
    if (!this.state.players.some((p) => p.id === player)) {
      throw new Error(`Unknown player: ${player}`);
    }
  }
}
