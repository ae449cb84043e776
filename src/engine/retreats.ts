/**
 * Retreat phase resolution.
 */

import type { MapGraph } from './map';
import type {
  DislodgedUnit,
  Order,
  OrderResolution,
  PartId,
  PlayerId,
  TerritoryId,
  Unit,
} from './types';

/**
 * Legal retreat destinations: neighbours of the part outside its own
 * territory, not forbidden and not in an occupied territory.
 */
export function getRetreatOptions(
  map: MapGraph,
  part: PartId,
  forbidden: readonly PartId[],
  occupied: ReadonlySet<TerritoryId>
): PartId[] {
  const home = map.territoryOf(part);
  return map.neighbors(part).filter((n) => {
    const territory = map.territoryOf(n);
    return territory !== home && !occupied.has(territory) && !forbidden.includes(n);
  });
}

export interface RetreatOutcome {
  units: Unit[];
  /** Dislodged units removed from the board */
  disbanded: Unit[];
  results: Map<PartId, OrderResolution>;
}

/**
 * Resolve retreat and disband orders for the dislodged units. A unit without
 * a legal retreat is disbanded, as are all units retreating into the same
 * territory.
 */
export function resolveRetreats(
  map: MapGraph,
  units: readonly Unit[],
  dislodged: readonly DislodgedUnit[],
  orders: ReadonlyMap<PlayerId, readonly Order[]>
): RetreatOutcome {
  const occupied = new Set(units.map((u) => map.territoryOf(u.part)));
  const results = new Map<PartId, OrderResolution>();
  const disbanded: Unit[] = [];
  const moving: Array<{ unit: DislodgedUnit; order: Order; destination: PartId }> = [];

  for (const unit of dislodged) {
    const order = (orders.get(unit.player) ?? []).find(
      (o) => o.unit === unit.part && (o.type === 'RETREAT' || o.type === 'DISBAND')
    );

    if (!order) {
      results.set(unit.part, {
        order: { type: 'DISBAND', unit: unit.part },
        player: unit.player,
        success: true,
        reason: 'No retreat ordered',
      });
      disbanded.push({ player: unit.player, part: unit.part });
      continue;
    }

    if (order.type !== 'RETREAT') {
      results.set(unit.part, { order, player: unit.player, success: true });
      disbanded.push({ player: unit.player, part: unit.part });
      continue;
    }

    const legal = getRetreatOptions(map, unit.part, unit.forbidden, occupied);
    if (!legal.includes(order.destination)) {
      results.set(unit.part, {
        order,
        player: unit.player,
        success: false,
        reason: `${order.destination} is not a legal retreat; unit disbanded`,
      });
      disbanded.push({ player: unit.player, part: unit.part });
      continue;
    }

    moving.push({ unit, order, destination: order.destination });
  }

  const arrivals = new Map<TerritoryId, number>();
  for (const { destination } of moving) {
    const territory = map.territoryOf(destination);
    arrivals.set(territory, (arrivals.get(territory) ?? 0) + 1);
  }

  const next: Unit[] = [...units];
  for (const { unit, order, destination } of moving) {
    if ((arrivals.get(map.territoryOf(destination)) ?? 0) > 1) {
      results.set(unit.part, {
        order,
        player: unit.player,
        success: false,
        reason: 'Bounced with another retreat; unit disbanded',
      });
      disbanded.push({ player: unit.player, part: unit.part });
      continue;
    }
    results.set(unit.part, { order, player: unit.player, success: true });
    next.push({ player: unit.player, part: destination });
  }

  return { units: next, disbanded, results };
}
