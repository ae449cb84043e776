/**
 * Build phase: adjustment counts, eligible build parts and resolution.
 */

import type { MapGraph } from './map';
import type {
  GameState,
  Order,
  OrderResolution,
  PartId,
  PlayerId,
  RejectedOrder,
  RulesConfig,
  TerritoryId,
  Unit,
} from './types';

export function isBuildPhase(count: number, buildTime: number): boolean {
  return buildTime > 0 && count % buildTime === 0;
}

function ownedCenters(state: Pick<GameState, 'owners'>, player: PlayerId): TerritoryId[] {
  const owned: TerritoryId[] = [];
  for (const [territory, owner] of state.owners) {
    if (owner === player) owned.push(territory);
  }
  return owned;
}

/**
 * Players that appear in the game: map order first, then anyone else that
 * owns a centre or a unit.
 */
function knownPlayers(state: Pick<GameState, 'owners' | 'units'>, map: MapGraph): PlayerId[] {
  const players = [...map.playerIds()];
  for (const owner of state.owners.values()) {
    if (!players.includes(owner)) players.push(owner);
  }
  for (const unit of state.units) {
    if (!players.includes(unit.player)) players.push(unit.player);
  }
  return players;
}

/**
 * Centres minus units for every player. Positive means builds are due,
 * negative means disbands.
 */
export function calculateAdjustments(
  state: Pick<GameState, 'owners' | 'units'>,
  map: MapGraph
): Map<PlayerId, number> {
  const adjustments = new Map<PlayerId, number>();
  for (const player of knownPlayers(state, map)) {
    const centers = ownedCenters(state, player).length;
    const units = state.units.filter((u) => u.player === player).length;
    adjustments.set(player, centers - units);
  }
  return adjustments;
}

/**
 * Parts a player may build in: every part of an owned, unoccupied centre,
 * restricted to the player's home centres under the `initCenters` rule.
 */
export function getBuildableParts(
  state: Pick<GameState, 'owners' | 'units'>,
  map: MapGraph,
  rules: Pick<RulesConfig, 'buildRule'>,
  player: PlayerId
): PartId[] {
  const occupied = new Set(state.units.map((u) => map.territoryOf(u.part)));
  const homes = new Set(map.homeCenters(player));

  return ownedCenters(state, player)
    .filter((t) => map.hasTerritory(t) && !occupied.has(t))
    .filter((t) => rules.buildRule === 'allCenters' || homes.has(t))
    .flatMap((t) => map.partsOf(t));
}

export interface BuildOutcome {
  units: Unit[];
  built: Unit[];
  disbanded: Unit[];
  results: Map<PartId, OrderResolution>;
  rejected: RejectedOrder[];
}

/**
 * Resolve build and disband orders. Builds are accepted in submission order
 * up to the number due; missing disbands are chosen by policy: units off the
 * player's own centres first, then by part id.
 */
export function resolveBuilds(
  state: Pick<GameState, 'owners' | 'units'>,
  map: MapGraph,
  rules: Pick<RulesConfig, 'buildRule'>,
  orders: ReadonlyMap<PlayerId, readonly Order[]>
): BuildOutcome {
  const adjustments = calculateAdjustments(state, map);
  const results = new Map<PartId, OrderResolution>();
  const rejected: RejectedOrder[] = [];
  const built: Unit[] = [];
  const disbanded: Unit[] = [];

  for (const [player, due] of adjustments) {
    const submitted = orders.get(player) ?? [];
    const reject = (order: Order, reason: string): void => {
      rejected.push({ player, order, reason });
    };

    if (due > 0) {
      const eligible = getBuildableParts(state, map, rules, player);
      const used = new Set<TerritoryId>();
      for (const order of submitted) {
        if (order.type !== 'BUILD') {
          reject(order, `${player} has builds due, not disbands`);
        } else if (!eligible.includes(order.unit)) {
          reject(order, `${order.unit} is not an eligible build location for ${player}`);
        } else if (used.has(map.territoryOf(order.unit))) {
          reject(order, `Already building in ${map.territoryOf(order.unit)}`);
        } else if (used.size >= due) {
          reject(order, 'Build limit reached');
        } else {
          used.add(map.territoryOf(order.unit));
          built.push({ player, part: order.unit });
          results.set(order.unit, { order, player, success: true });
        }
      }
      continue;
    }

    if (due < 0) {
      const owned = state.units.filter((u) => u.player === player);
      const chosen = new Set<PartId>();
      for (const order of submitted) {
        if (order.type !== 'DISBAND') {
          reject(order, `${player} has disbands due, not builds`);
        } else if (!owned.some((u) => u.part === order.unit)) {
          reject(order, `${player} has no unit at ${order.unit}`);
        } else if (chosen.has(order.unit)) {
          reject(order, `Duplicate order for ${order.unit}`);
        } else if (chosen.size >= -due) {
          reject(order, 'Disband limit reached');
        } else {
          chosen.add(order.unit);
          results.set(order.unit, { order, player, success: true });
        }
      }

      const homes = new Set(ownedCenters(state, player));
      const remaining = owned
        .filter((u) => !chosen.has(u.part))
        .sort((a, b) => {
          const onA = homes.has(map.territoryOf(a.part)) ? 1 : 0;
          const onB = homes.has(map.territoryOf(b.part)) ? 1 : 0;
          if (onA !== onB) return onA - onB;
          return a.part < b.part ? -1 : a.part > b.part ? 1 : 0;
        });
      for (const unit of remaining) {
        if (chosen.size >= -due) break;
        chosen.add(unit.part);
        results.set(unit.part, {
          order: { type: 'DISBAND', unit: unit.part },
          player,
          success: true,
          reason: 'Disbanded by default',
        });
      }

      for (const unit of owned) {
        if (chosen.has(unit.part)) disbanded.push(unit);
      }
      continue;
    }

    for (const order of submitted) {
      reject(order, `${player} has no adjustments due`);
    }
  }

  const gone = new Set(disbanded.map((u) => u.part));
  const units = [...state.units.filter((u) => !gone.has(u.part)), ...built];

  return { units, built, disbanded, results, rejected };
}
