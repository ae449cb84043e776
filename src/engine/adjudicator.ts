/**
 * Move phase adjudicator.
 *
 * Resolves all simultaneous move phase orders into the next occupancy.
 * Support strength and support cuts are fixed by order intent, so each round
 * is a single pass of dependency propagation over the moves. Convoys are
 * handled by an outer fixed point: every convoy starts intact, and fleets
 * dislodged in a round are treated as disrupted in the next one until no new
 * fleet is dislodged.
 *
 * Paradox policy: a convoyed move whose route was broken by a fleet that the
 * final outcome does not dislodge fails, and is reported in `paradoxes`.
 */

import { findConvoyRoute, matchingConvoys } from './convoy';
import type { MapGraph } from './map';
import { isMovePhaseOrder } from './orders';
import { getRetreatOptions } from './retreats';
import type {
  ConvoyOrder,
  DislodgedUnit,
  MoveOrder,
  MovePhaseOrder,
  Order,
  OrderResolution,
  PartId,
  PlayerId,
  TerritoryId,
  Unit,
} from './types';

export interface MoveInput {
  map: MapGraph;
  units: readonly Unit[];
  /** Validated orders; units without one hold */
  orders: ReadonlyMap<PlayerId, readonly Order[]>;
}

export interface MoveOutcome {
  /** Units that kept a part, at their new positions */
  units: Unit[];
  dislodged: DislodgedUnit[];
  standoffs: TerritoryId[];
  results: Map<PartId, OrderResolution>;
  /** Convoyed armies whose move failed under the paradox policy */
  paradoxes: PartId[];
}

interface Entry {
  unit: Unit;
  territory: TerritoryId;
  order: MovePhaseOrder;
}

interface Movement {
  part: PartId;
  player: PlayerId;
  order: MoveOrder;
  from: TerritoryId;
  to: TerritoryId;
  convoyed: boolean;
  /** Fleets whose convoy orders carry this move */
  fleets: PartId[];
}

interface Board {
  map: MapGraph;
  entries: Map<PartId, Entry>;
  occupant: Map<TerritoryId, PartId>;
  moves: Movement[];
}

interface Round {
  broken: Set<PartId>;
  effective: Map<PartId, Movement>;
  cut: Set<PartId>;
  unmatched: Set<PartId>;
  success: Map<PartId, boolean>;
  /** Dislodged part -> attacking part */
  dislodged: Map<PartId, PartId>;
  standoffs: Set<TerritoryId>;
}

type Decision = 'SUCCESS' | 'FAIL' | 'UNKNOWN';

function buildBoard({ map, units, orders }: MoveInput): Board {
  const ordered = new Map<PartId, { player: PlayerId; order: MovePhaseOrder }>();
  for (const [player, list] of orders) {
    for (const order of list) {
      if (isMovePhaseOrder(order) && !ordered.has(order.unit)) {
        ordered.set(order.unit, { player, order });
      }
    }
  }

  const entries = new Map<PartId, Entry>();
  const occupant = new Map<TerritoryId, PartId>();
  for (const unit of units) {
    const given = ordered.get(unit.part);
    const order: MovePhaseOrder =
      given && given.player === unit.player ? given.order : { type: 'HOLD', unit: unit.part };
    const territory = map.territoryOf(unit.part);
    entries.set(unit.part, { unit, territory, order });
    occupant.set(territory, unit.part);
  }

  const convoys: ConvoyOrder[] = [];
  for (const entry of entries.values()) {
    if (entry.order.type === 'CONVOY') convoys.push(entry.order);
  }

  const moves: Movement[] = [];
  for (const entry of entries.values()) {
    const order = entry.order;
    if (order.type !== 'MOVE') continue;
    const convoyed = order.viaConvoy === true || !map.areAdjacent(order.unit, order.destination);
    moves.push({
      part: order.unit,
      player: entry.unit.player,
      order,
      from: entry.territory,
      to: map.territoryOf(order.destination),
      convoyed,
      fleets: convoyed ? matchingConvoys(map, convoys, order.unit, order.destination).map((c) => c.unit) : [],
    });
  }

  return { map, entries, occupant, moves };
}

function resolveRound(board: Board, disrupted: ReadonlySet<PartId>): Round {
  const { map, entries, occupant } = board;

  // Moves with a broken convoy route stay put and have no effect elsewhere
  const broken = new Set<PartId>();
  const effective = new Map<PartId, Movement>();
  for (const move of board.moves) {
    if (move.convoyed) {
      const fleets = move.fleets.filter((f) => !disrupted.has(f));
      if (!findConvoyRoute(map, move.part, move.order.destination, fleets)) {
        broken.add(move.part);
        continue;
      }
    }
    effective.set(move.part, move);
  }

  // Supports: matched against the supported unit's order, cut by intent
  const cut = new Set<PartId>();
  const unmatched = new Set<PartId>();
  const moveSupport = new Map<PartId, number>();
  const holdSupport = new Map<PartId, number>();

  for (const entry of entries.values()) {
    const order = entry.order;
    if (order.type !== 'SUPPORT_HOLD' && order.type !== 'SUPPORT_MOVE') continue;

    const target = entries.get(order.supportedUnit);
    const beneficiary = target ? target.unit.player : entry.unit.player;
    const against = order.type === 'SUPPORT_MOVE' ? map.territoryOf(order.destination) : null;

    for (const move of effective.values()) {
      if (move.to === entry.territory && move.player !== beneficiary && move.from !== against) {
        cut.add(order.unit);
        break;
      }
    }

    let matches = false;
    if (target && order.type === 'SUPPORT_HOLD') {
      matches = target.order.type !== 'MOVE';
    } else if (target && target.order.type === 'MOVE') {
      matches = map.territoryOf(target.order.destination) === against;
    }
    if (!matches) {
      unmatched.add(order.unit);
      continue;
    }
    if (cut.has(order.unit)) continue;

    const tally = order.type === 'SUPPORT_HOLD' ? holdSupport : moveSupport;
    tally.set(order.supportedUnit, (tally.get(order.supportedUnit) ?? 0) + 1);
  }

  const attack = new Map<PartId, number>();
  const entrants = new Map<TerritoryId, Movement[]>();
  for (const move of effective.values()) {
    attack.set(move.part, 1 + (moveSupport.get(move.part) ?? 0));
    const list = entrants.get(move.to) ?? [];
    list.push(move);
    entrants.set(move.to, list);
  }
  const strength = (move: Movement): number => attack.get(move.part) ?? 1;

  const defenderMove = (territory: TerritoryId): Movement | undefined => {
    const part = occupant.get(territory);
    return part === undefined ? undefined : effective.get(part);
  };

  const isHeadToHead = (a: Movement, b: Movement): boolean =>
    b.to === a.from && a.to === b.from && !a.convoyed && !b.convoyed;

  const success = new Map<PartId, boolean>();

  const decide = (move: Movement): Decision => {
    let pending = false;

    // Must strictly beat every other entrant, except one already
    // dislodged in a head-to-head battle it lost
    for (const rival of entrants.get(move.to) ?? []) {
      if (rival === move || strength(rival) < strength(move)) continue;
      const opponent = defenderMove(rival.to);
      if (opponent && isHeadToHead(rival, opponent)) {
        const outcome = success.get(opponent.part);
        if (outcome === true) continue;
        if (outcome === undefined) {
          pending = true;
          continue;
        }
      }
      return 'FAIL';
    }

    const defenderPart = occupant.get(move.to);
    const defender = defenderPart === undefined ? undefined : entries.get(defenderPart);
    if (!defender) {
      return pending ? 'UNKNOWN' : 'SUCCESS';
    }

    const own = defender.unit.player === move.player;
    const leaving = effective.get(defender.unit.part);
    let outcome: Decision;

    if (!leaving) {
      const hold = defender.order.type === 'MOVE' ? 1 : 1 + (holdSupport.get(defender.unit.part) ?? 0);
      outcome = !own && strength(move) > hold ? 'SUCCESS' : 'FAIL';
    } else if (isHeadToHead(move, leaving)) {
      outcome = !own && strength(move) > strength(leaving) ? 'SUCCESS' : 'FAIL';
    } else {
      const vacated = success.get(leaving.part);
      if (vacated === undefined) {
        outcome = 'UNKNOWN';
      } else if (vacated) {
        outcome = 'SUCCESS';
      } else {
        outcome = !own && strength(move) > 1 ? 'SUCCESS' : 'FAIL';
      }
    }

    if (outcome === 'FAIL') return 'FAIL';
    return pending ? 'UNKNOWN' : outcome;
  };

  let changed = true;
  while (changed) {
    changed = false;
    for (const move of effective.values()) {
      if (success.has(move.part)) continue;
      const decision = decide(move);
      if (decision !== 'UNKNOWN') {
        success.set(move.part, decision === 'SUCCESS');
        changed = true;
      }
    }
  }

  // Whatever is still open waits only on itself: a rotation
  for (const move of effective.values()) {
    if (!success.has(move.part)) success.set(move.part, true);
  }

  const arrivals = new Map<TerritoryId, PartId>();
  for (const move of effective.values()) {
    if (success.get(move.part)) arrivals.set(move.to, move.part);
  }

  const dislodged = new Map<PartId, PartId>();
  for (const entry of entries.values()) {
    if (success.get(entry.unit.part)) continue;
    const attacker = arrivals.get(entry.territory);
    if (attacker !== undefined) dislodged.set(entry.unit.part, attacker);
  }

  const standoffs = new Set<TerritoryId>();
  for (const [territory, list] of entrants) {
    if (list.length < 2 || arrivals.has(territory)) continue;
    const best = Math.max(...list.map(strength));
    if (list.filter((m) => strength(m) === best).length >= 2) {
      standoffs.add(territory);
    }
  }

  return { broken, effective, cut, unmatched, success, dislodged, standoffs };
}

function findParadoxes(board: Board, round: Round): PartId[] {
  return board.moves
    .filter((move) => {
      if (!round.broken.has(move.part)) return false;
      const standing = move.fleets.filter((f) => !round.dislodged.has(f));
      return findConvoyRoute(board.map, move.part, move.order.destination, standing) !== null;
    })
    .map((move) => move.part);
}

function describe(board: Board, round: Round, entry: Entry, paradoxes: ReadonlySet<PartId>): OrderResolution {
  const { order } = entry;
  const part = entry.unit.part;
  const dislodgedBy = round.dislodged.get(part);
  const base: OrderResolution = {
    order,
    player: entry.unit.player,
    success: false,
    dislodged: dislodgedBy !== undefined,
    dislodgedFrom: dislodgedBy,
  };

  switch (order.type) {
    case 'HOLD':
      return dislodgedBy === undefined ? { ...base, success: true } : { ...base, reason: 'Dislodged' };

    case 'MOVE': {
      if (round.success.get(part)) return { ...base, success: true };
      let reason = 'Move failed (bounce or overpowered)';
      if (paradoxes.has(part)) {
        reason = 'Convoy paradox: move fails';
      } else if (round.broken.has(part)) {
        reason = 'Convoy was disrupted';
      } else if (round.standoffs.has(board.map.territoryOf(order.destination))) {
        reason = 'Bounced in a standoff';
      }
      return { ...base, reason };
    }

    case 'SUPPORT_HOLD':
    case 'SUPPORT_MOVE':
      if (round.unmatched.has(part)) {
        return { ...base, reason: 'Supported unit did not make the supported order' };
      }
      if (round.cut.has(part)) {
        return { ...base, reason: 'Support was cut' };
      }
      return dislodgedBy === undefined ? { ...base, success: true } : { ...base, reason: 'Dislodged' };

    case 'CONVOY': {
      if (dislodgedBy !== undefined) {
        return { ...base, reason: 'Convoying fleet was dislodged' };
      }
      const carried = round.success.get(order.convoyedUnit) === true;
      return carried ? { ...base, success: true } : { ...base, reason: 'Convoyed army did not move' };
    }
  }
}

/**
 * Adjudicate a move phase.
 */
export function adjudicateMoves(input: MoveInput): MoveOutcome {
  const board = buildBoard(input);

  const disrupted = new Set<PartId>();
  let round = resolveRound(board, disrupted);
  for (;;) {
    const fresh = [...round.dislodged.keys()].filter(
      (part) => board.entries.get(part)?.order.type === 'CONVOY' && !disrupted.has(part)
    );
    if (fresh.length === 0) break;
    for (const part of fresh) disrupted.add(part);
    round = resolveRound(board, disrupted);
  }

  const paradoxes = findParadoxes(board, round);
  const paradoxSet = new Set(paradoxes);

  const units: Unit[] = [];
  const results = new Map<PartId, OrderResolution>();
  for (const entry of board.entries.values()) {
    results.set(entry.unit.part, describe(board, round, entry, paradoxSet));
    if (round.dislodged.has(entry.unit.part)) continue;
    const { order } = entry;
    const moved = order.type === 'MOVE' && round.success.get(order.unit) === true;
    units.push({ player: entry.unit.player, part: moved ? order.destination : entry.unit.part });
  }

  const occupied = new Set(units.map((u) => input.map.territoryOf(u.part)));
  const dislodged: DislodgedUnit[] = [];
  for (const [part, attacker] of round.dislodged) {
    const entry = board.entries.get(part);
    if (!entry) continue;
    const forbidden = [
      ...input.map.partsOf(input.map.territoryOf(attacker)),
      ...[...round.standoffs].flatMap((t) => input.map.partsOf(t)),
    ];
    dislodged.push({
      player: entry.unit.player,
      part,
      attackerFrom: attacker,
      forbidden,
      options: getRetreatOptions(input.map, part, forbidden, occupied),
    });
  }

  return {
    units,
    dislodged,
    standoffs: [...round.standoffs],
    results,
    paradoxes,
  };
}
