/**
 * Draw votes and draw shares.
 */

import type { DrawType, GameState, PlayerId } from './types';

export type VoteSummary =
  | { shown: true; yes: number; active: number; votes: Record<PlayerId, boolean> }
  | { shown: false; yes: number; active: number };

/**
 * One draw flag per player. A vote stands until it is withdrawn, replaced by
 * a new vote, or the tracker is reset.
 */
export class DrawVoteTracker {
  private readonly votes = new Map<PlayerId, boolean>();

  constructor(private readonly voteShown: boolean = true) {}

  vote(player: PlayerId, flag: boolean): void {
    this.votes.set(player, flag);
  }

  withdraw(player: PlayerId): void {
    this.votes.delete(player);
  }

  hasVoted(player: PlayerId): boolean {
    return this.votes.has(player);
  }

  /**
   * True only when every active player currently votes yes.
   */
  checkVotes(active: readonly PlayerId[]): boolean {
    return active.length > 0 && active.every((p) => this.votes.get(p) === true);
  }

  summary(active: readonly PlayerId[]): VoteSummary {
    const yes = active.filter((p) => this.votes.get(p) === true).length;
    if (!this.voteShown) {
      return { shown: false, yes, active: active.length };
    }
    const votes: Record<PlayerId, boolean> = {};
    for (const player of active) {
      votes[player] = this.votes.get(player) === true;
    }
    return { shown: true, yes, active: active.length, votes };
  }

  reset(): void {
    this.votes.clear();
  }
}

function centerCount(state: Pick<GameState, 'owners'>, player: PlayerId): number {
  let count = 0;
  for (const owner of state.owners.values()) {
    if (owner === player) count++;
  }
  return count;
}

/**
 * A player with no units and no centres is out of the game.
 */
export function isEliminated(state: Pick<GameState, 'owners' | 'units'>, player: PlayerId): boolean {
  return centerCount(state, player) === 0 && !state.units.some((u) => u.player === player);
}

export function activePlayers(state: Pick<GameState, 'owners' | 'units' | 'players'>): PlayerId[] {
  return state.players.map((p) => p.id).filter((id) => !isEliminated(state, id));
}

/**
 * Share of the draw for each active player. `DSS` splits equally; `SoS`
 * splits in proportion to centre counts, equally when nobody holds one.
 */
export function computeDrawShares(
  state: Pick<GameState, 'owners' | 'units' | 'players'>,
  drawType: DrawType
): Map<PlayerId, number> {
  const active = activePlayers(state);
  const shares = new Map<PlayerId, number>();
  if (active.length === 0) return shares;

  const total = active.reduce((sum, p) => sum + centerCount(state, p), 0);
  for (const player of active) {
    const share =
      drawType === 'SoS' && total > 0 ? centerCount(state, player) / total : 1 / active.length;
    shares.set(player, share);
  }
  return shares;
}
