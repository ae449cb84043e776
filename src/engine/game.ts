/**
 * Game state and phase resolution.
 *
 * Every function here is pure: a phase is resolved from a snapshot and an
 * order set into a new snapshot. Sequencing, buffering and I/O live in the
 * phase state machine.
 */

import { adjudicateMoves } from './adjudicator';
import { calculateAdjustments, getBuildableParts, isBuildPhase, resolveBuilds } from './builds';
import type { MapGraph } from './map';
import { resolveRetreats } from './retreats';
import type {
  DislodgedUnit,
  GameOutcome,
  GameState,
  Order,
  OrderResolution,
  PartId,
  PhaseInfo,
  PlayerId,
  RejectedOrder,
  RulesConfig,
  TerritoryId,
  Unit,
} from './types';
import { validateOrders } from './validator';

/**
 * Create the opening state from the map's starting units and home centres.
 */
export function createInitialState(map: MapGraph): GameState {
  return {
    phase: { count: 1, kind: 'MOVE' },
    units: map.initialUnits(),
    owners: map.initialOwners(),
    players: map.playerIds().map((id) => ({ id, homeCenters: map.homeCenters(id) })),
    dislodged: [],
    adjustments: new Map(),
  };
}

export function getPhaseLabel(phase: PhaseInfo): string {
  return `Phase ${phase.count} ${phase.kind.toLowerCase()}`;
}

/**
 * Kind of the phase with the given count when it opens a new cycle.
 */
export function phaseKindFor(count: number, rules: Pick<RulesConfig, 'buildTime'>): 'MOVE' | 'BUILD' {
  return isBuildPhase(count, rules.buildTime) ? 'BUILD' : 'MOVE';
}

/**
 * Units standing in a supply centre take it over.
 */
export function captureCenters(
  map: MapGraph,
  owners: ReadonlyMap<TerritoryId, PlayerId>,
  units: readonly Unit[]
): Map<TerritoryId, PlayerId> {
  const next = new Map(owners);
  for (const unit of units) {
    const territory = map.territory(map.territoryOf(unit.part));
    if (territory.center) {
      next.set(territory.id, unit.player);
    }
  }
  return next;
}

export function getCenterCounts(state: Pick<GameState, 'owners' | 'players'>): Map<PlayerId, number> {
  const counts = new Map<PlayerId, number>();
  for (const player of state.players) {
    counts.set(player.id, 0);
  }
  for (const owner of state.owners.values()) {
    counts.set(owner, (counts.get(owner) ?? 0) + 1);
  }
  return counts;
}

export function getUnitCounts(state: Pick<GameState, 'units' | 'players'>): Map<PlayerId, number> {
  const counts = new Map<PlayerId, number>();
  for (const player of state.players) {
    counts.set(player.id, 0);
  }
  for (const unit of state.units) {
    counts.set(unit.player, (counts.get(unit.player) ?? 0) + 1);
  }
  return counts;
}

/**
 * A player reaching the centre threshold wins. With several, the highest
 * count wins, then the earlier player.
 */
export function checkVictory(
  state: Pick<GameState, 'owners' | 'players'>,
  rules: Pick<RulesConfig, 'winCondition'>
): GameOutcome | null {
  let best: { winner: PlayerId; centers: number } | null = null;
  for (const [player, count] of getCenterCounts(state)) {
    if (count >= rules.winCondition && (!best || count > best.centers)) {
      best = { winner: player, centers: count };
    }
  }
  return best ? { kind: 'WIN', ...best } : null;
}

export interface PhaseResolution {
  state: GameState;
  accepted: Map<PlayerId, Order[]>;
  rejected: RejectedOrder[];
  results: Map<PartId, OrderResolution>;
  /** Units removed from the board this phase */
  disbanded: Unit[];
  standoffs: TerritoryId[];
  paradoxes: PartId[];
}

/**
 * Close a move cycle: capture centres, check for a winner, and open the
 * next move or build phase.
 */
function closeCycle(
  state: GameState,
  map: MapGraph,
  rules: RulesConfig,
  units: Unit[]
): GameState {
  const owners = captureCenters(map, state.owners, units);
  const count = state.phase.count + 1;
  const kind = phaseKindFor(count, rules);
  const base = { ...state, units, owners, dislodged: [] };
  const outcome = checkVictory(base, rules);

  return {
    ...base,
    phase: { count, kind },
    adjustments: kind === 'BUILD' ? calculateAdjustments({ owners, units }, map) : new Map(),
    ...(outcome ? { outcome } : {}),
  };
}

/**
 * Validate and resolve the current phase.
 */
export function resolvePhase(
  state: GameState,
  map: MapGraph,
  rules: RulesConfig,
  submitted: ReadonlyMap<PlayerId, readonly Order[]>
): PhaseResolution {
  if (state.outcome) {
    throw new Error('Game is over');
  }

  const { kind } = state.phase;
  const buildable = new Map<PlayerId, PartId[]>();
  if (kind === 'BUILD') {
    for (const player of state.players) {
      buildable.set(player.id, getBuildableParts(state, map, rules, player.id));
    }
  }

  const { accepted, rejected } = validateOrders(
    { map, phase: kind, units: state.units, dislodged: state.dislodged, buildable },
    submitted
  );

  switch (kind) {
    case 'MOVE': {
      const outcome = adjudicateMoves({ map, units: state.units, orders: accepted });
      const next: GameState =
        outcome.dislodged.length > 0
          ? {
              ...state,
              phase: { count: state.phase.count, kind: 'RETREAT' },
              units: outcome.units,
              dislodged: outcome.dislodged,
            }
          : closeCycle(state, map, rules, outcome.units);
      return {
        state: next,
        accepted,
        rejected,
        results: outcome.results,
        disbanded: [],
        standoffs: outcome.standoffs,
        paradoxes: outcome.paradoxes,
      };
    }

    case 'RETREAT': {
      const outcome = resolveRetreats(map, state.units, state.dislodged, accepted);
      return {
        state: closeCycle(state, map, rules, outcome.units),
        accepted,
        rejected,
        results: outcome.results,
        disbanded: outcome.disbanded,
        standoffs: [],
        paradoxes: [],
      };
    }

    case 'BUILD': {
      const outcome = resolveBuilds(state, map, rules, accepted);
      const count = state.phase.count + 1;
      return {
        state: {
          ...state,
          phase: { count, kind: phaseKindFor(count, rules) },
          units: outcome.units,
          adjustments: new Map(),
        },
        accepted: withoutRejected(accepted, outcome.rejected),
        rejected: [...rejected, ...outcome.rejected],
        results: outcome.results,
        disbanded: outcome.disbanded,
        standoffs: [],
        paradoxes: [],
      };
    }
  }
}

function withoutRejected(
  accepted: ReadonlyMap<PlayerId, readonly Order[]>,
  rejected: readonly RejectedOrder[]
): Map<PlayerId, Order[]> {
  const dropped = new Set(rejected.map((r) => r.order));
  const kept = new Map<PlayerId, Order[]>();
  for (const [player, orders] of accepted) {
    kept.set(player, orders.filter((o) => !dropped.has(o)));
  }
  return kept;
}

export interface StateJSON {
  phase: PhaseInfo;
  units: Unit[];
  owners: Record<TerritoryId, PlayerId>;
  dislodged: DislodgedUnit[];
  adjustments: Record<PlayerId, number>;
  outcome?: { kind: 'WIN'; winner: PlayerId; centers: number } | { kind: 'DRAW'; shares: Record<PlayerId, number> };
}

/**
 * Plain JSON form of a snapshot, for logs and the archive.
 */
export function stateToJSON(state: GameState): StateJSON {
  const json: StateJSON = {
    phase: { ...state.phase },
    units: state.units.map((u) => ({ ...u })),
    owners: Object.fromEntries(state.owners),
    dislodged: state.dislodged.map((d) => ({ ...d, forbidden: [...d.forbidden], options: [...d.options] })),
    adjustments: Object.fromEntries(state.adjustments),
  };
  if (state.outcome) {
    json.outcome =
      state.outcome.kind === 'WIN'
        ? { ...state.outcome }
        : { kind: 'DRAW', shares: Object.fromEntries(state.outcome.shares) };
  }
  return json;
}

/**
 * Rebuilds a snapshot from its JSON form. Players come from the map.
 */
export function stateFromJSON(json: StateJSON, map: MapGraph): GameState {
  const state: GameState = {
    phase: { ...json.phase },
    units: json.units.map((u) => ({ ...u })),
    owners: new Map(Object.entries(json.owners)),
    players: map.playerIds().map((id) => ({ id, homeCenters: map.homeCenters(id) })),
    dislodged: json.dislodged.map((d) => ({ ...d, forbidden: [...d.forbidden], options: [...d.options] })),
    adjustments: new Map(Object.entries(json.adjustments)),
  };
  if (!json.outcome) {
    return state;
  }
  const outcome: GameOutcome =
    json.outcome.kind === 'WIN'
      ? { ...json.outcome }
      : { kind: 'DRAW', shares: new Map(Object.entries(json.outcome.shares)) };
  return { ...state, outcome };
}
