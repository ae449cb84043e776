/**
 * Convoy routes.
 */

import type { MapGraph } from './map';
import type { ConvoyOrder, PartId } from './types';

/**
 * Convoy orders that carry the army at `from` to the territory of
 * `destination`.
 */
export function matchingConvoys(
  map: MapGraph,
  convoys: readonly ConvoyOrder[],
  from: PartId,
  destination: PartId
): ConvoyOrder[] {
  const target = map.territoryOf(destination);
  return convoys.filter(
    (c) => c.convoyedUnit === from && map.hasPart(c.destination) && map.territoryOf(c.destination) === target
  );
}

/**
 * Breadth-first search for a chain of convoying fleets from the army's
 * territory to the destination territory. Returns the fleets' parts in
 * order, or null when no chain exists.
 */
export function findConvoyRoute(
  map: MapGraph,
  from: PartId,
  destination: PartId,
  fleets: readonly PartId[]
): PartId[] | null {
  const source = map.territoryOf(from);
  const target = map.territoryOf(destination);
  const usable = fleets.filter((f) => map.hasPart(f) && map.isSea(f));

  const previous = new Map<PartId, PartId | null>();
  const queue: PartId[] = [];
  for (const fleet of usable) {
    if (map.canReach(fleet, source)) {
      previous.set(fleet, null);
      queue.push(fleet);
    }
  }

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;

    if (map.canReach(current, target)) {
      const route: PartId[] = [];
      let step: PartId | null | undefined = current;
      while (step) {
        route.unshift(step);
        step = previous.get(step);
      }
      return route;
    }

    for (const next of usable) {
      if (!previous.has(next) && map.areAdjacent(current, next)) {
        previous.set(next, current);
        queue.push(next);
      }
    }
  }

  return null;
}
