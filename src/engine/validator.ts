/**
 * Order validation.
 *
 * Structural legality only: who may order what, and whether the named parts
 * can be reached. Strength, cutting and convoy disruption are left to the
 * adjudicator. A rejected order never affects any other order; the unit it
 * was meant for falls back to the phase default.
 */

import { findConvoyRoute, matchingConvoys } from './convoy';
import type { MapGraph } from './map';
import { ordersAllowedIn } from './orders';
import type {
  ConvoyOrder,
  DislodgedUnit,
  MoveOrder,
  Order,
  PartId,
  PhaseKind,
  PlayerId,
  RejectedOrder,
  Unit,
} from './types';

export interface ValidationContext {
  map: MapGraph;
  phase: PhaseKind;
  units: readonly Unit[];
  /** RETREAT phase: units that must retreat or disband */
  dislodged?: readonly DislodgedUnit[];
  /** BUILD phase: parts each player may build in */
  buildable?: ReadonlyMap<PlayerId, readonly PartId[]>;
  /** MOVE phase: accepted convoy orders, used for convoy routes */
  convoys?: readonly ConvoyOrder[];
}

export interface ValidationResult {
  accepted: Map<PlayerId, Order[]>;
  rejected: RejectedOrder[];
}

const ORDER_LABELS: Record<Order['type'], string> = {
  HOLD: 'Hold',
  MOVE: 'Move',
  SUPPORT_HOLD: 'Support',
  SUPPORT_MOVE: 'Support',
  CONVOY: 'Convoy',
  RETREAT: 'Retreat',
  BUILD: 'Build',
  DISBAND: 'Disband',
};

function unitAt(part: PartId, ctx: ValidationContext): Unit | undefined {
  return ctx.units.find((u) => u.part === part);
}

function unitName(map: MapGraph, part: PartId): string {
  return map.isCoast(part) ? 'A fleet' : 'An army';
}

/**
 * Validate one order. Returns a rejection reason, or null when legal.
 */
export function validateOrder(order: Order, player: PlayerId, ctx: ValidationContext): string | null {
  if (!ordersAllowedIn(ctx.phase).includes(order.type)) {
    return `${ORDER_LABELS[order.type]} orders are not allowed in a ${ctx.phase.toLowerCase()} phase`;
  }
  if (!ctx.map.hasPart(order.unit)) {
    return `Unknown part: ${order.unit}`;
  }

  switch (ctx.phase) {
    case 'MOVE':
      return validateMovePhase(order, player, ctx);
    case 'RETREAT':
      return validateRetreatPhase(order, player, ctx);
    case 'BUILD':
      return validateBuildPhase(order, player, ctx);
  }
}

function validateMovePhase(order: Order, player: PlayerId, ctx: ValidationContext): string | null {
  const unit = unitAt(order.unit, ctx);
  if (!unit) {
    return `No unit at ${order.unit}`;
  }
  if (unit.player !== player) {
    return `${player} does not control the unit at ${order.unit}`;
  }

  switch (order.type) {
    case 'HOLD':
      return null;
    case 'MOVE':
      return validateMove(order, ctx);
    case 'SUPPORT_HOLD':
      return validateSupportHold(order.unit, order.supportedUnit, ctx);
    case 'SUPPORT_MOVE':
      return validateSupportMove(order.unit, order.supportedUnit, order.destination, ctx);
    case 'CONVOY':
      return validateConvoy(order, ctx);
    default:
      return `${ORDER_LABELS[order.type]} orders are not allowed in a move phase`;
  }
}

function validateMove(order: MoveOrder, ctx: ValidationContext): string | null {
  const { map } = ctx;
  if (!map.hasPart(order.destination)) {
    return `Unknown destination: ${order.destination}`;
  }
  if (map.territoryOf(order.destination) === map.territoryOf(order.unit)) {
    return 'A unit cannot move within its own territory';
  }
  const from = map.part(order.unit);
  const to = map.part(order.destination);
  if (from.kind !== to.kind) {
    return `${unitName(map, order.unit)} cannot move to a ${to.kind.toLowerCase()} part`;
  }

  const adjacent = map.areAdjacent(order.unit, order.destination);
  if (adjacent && !order.viaConvoy) {
    return null;
  }

  if (from.kind === 'COAST') {
    return order.viaConvoy
      ? 'Only armies can be convoyed'
      : `${order.unit} is not adjacent to ${order.destination}`;
  }

  const convoys = matchingConvoys(map, ctx.convoys ?? [], order.unit, order.destination);
  const route = findConvoyRoute(map, order.unit, order.destination, convoys.map((c) => c.unit));
  if (route) {
    return null;
  }
  return adjacent
    ? `No convoy route from ${order.unit} to ${order.destination}`
    : `${order.unit} is not adjacent to ${order.destination} and no convoy route exists`;
}

function validateSupportHold(supporter: PartId, supported: PartId, ctx: ValidationContext): string | null {
  const { map } = ctx;
  if (!map.hasPart(supported) || !unitAt(supported, ctx)) {
    return `No unit at ${supported} to support`;
  }
  if (supported === supporter) {
    return 'A unit cannot support itself';
  }
  const territory = map.territoryOf(supported);
  if (!map.canReach(supporter, territory)) {
    return `${supporter} cannot reach ${territory}`;
  }
  return null;
}

function validateSupportMove(
  supporter: PartId,
  supported: PartId,
  destination: PartId,
  ctx: ValidationContext
): string | null {
  const { map } = ctx;
  if (!map.hasPart(supported) || !unitAt(supported, ctx)) {
    return `No unit at ${supported} to support`;
  }
  if (supported === supporter) {
    return 'A unit cannot support itself';
  }
  if (!map.hasPart(destination)) {
    return `Unknown destination: ${destination}`;
  }
  const territory = map.territoryOf(destination);
  if (territory === map.territoryOf(supporter)) {
    return 'A unit cannot support a move into its own territory';
  }
  if (territory === map.territoryOf(supported)) {
    return 'A unit cannot move within its own territory';
  }
  if (!map.canReach(supporter, territory)) {
    return `${supporter} cannot reach ${territory}`;
  }
  return null;
}

function validateConvoy(order: ConvoyOrder, ctx: ValidationContext): string | null {
  const { map } = ctx;
  if (!map.isSea(order.unit)) {
    return 'Only fleets at sea can convoy';
  }
  if (!map.hasPart(order.convoyedUnit) || !unitAt(order.convoyedUnit, ctx)) {
    return `No unit at ${order.convoyedUnit} to convoy`;
  }
  if (map.isCoast(order.convoyedUnit)) {
    return 'Only armies can be convoyed';
  }
  if (!map.hasPart(order.destination)) {
    return `Unknown destination: ${order.destination}`;
  }
  if (map.isCoast(order.destination)) {
    return 'Convoy destination must be a land part';
  }
  if (map.territoryOf(order.destination) === map.territoryOf(order.convoyedUnit)) {
    return 'A unit cannot move within its own territory';
  }
  return null;
}

function validateRetreatPhase(order: Order, player: PlayerId, ctx: ValidationContext): string | null {
  const entry = (ctx.dislodged ?? []).find((d) => d.part === order.unit);
  if (!entry) {
    return `No dislodged unit at ${order.unit}`;
  }
  if (entry.player !== player) {
    return `${player} does not control the unit at ${order.unit}`;
  }
  if (order.type === 'RETREAT' && !entry.options.includes(order.destination)) {
    return `${order.destination} is not a legal retreat for ${order.unit}`;
  }
  return null;
}

function validateBuildPhase(order: Order, player: PlayerId, ctx: ValidationContext): string | null {
  if (order.type === 'BUILD') {
    const parts = ctx.buildable?.get(player) ?? [];
    if (!parts.includes(order.unit)) {
      return `${order.unit} is not an eligible build location for ${player}`;
    }
    return null;
  }

  const unit = unitAt(order.unit, ctx);
  if (!unit) {
    return `No unit at ${order.unit}`;
  }
  if (unit.player !== player) {
    return `${player} does not control the unit at ${order.unit}`;
  }
  return null;
}

/**
 * Validate every submitted order. Only a player's first order for a unit
 * counts; another player's order for the same unit is judged on its own.
 * Convoy orders are checked before moves so that moves can use them.
 */
export function validateOrders(
  ctx: ValidationContext,
  submitted: ReadonlyMap<PlayerId, readonly Order[]>
): ValidationResult {
  const rejected: RejectedOrder[] = [];
  const candidates: Array<{ player: PlayerId; order: Order; seq: number }> = [];
  let seq = 0;
  for (const [player, orders] of submitted) {
    const seen = new Set<PartId>();
    for (const order of orders) {
      if (seen.has(order.unit)) {
        rejected.push({ player, order, reason: `Duplicate order for ${order.unit}` });
        continue;
      }
      seen.add(order.unit);
      candidates.push({ player, order, seq: seq++ });
    }
  }

  const kept: Array<{ player: PlayerId; order: Order; seq: number }> = [];
  const check = (candidate: { player: PlayerId; order: Order; seq: number }, context: ValidationContext): void => {
    const reason = validateOrder(candidate.order, candidate.player, context);
    if (reason) {
      rejected.push({ player: candidate.player, order: candidate.order, reason });
    } else {
      kept.push(candidate);
    }
  };

  for (const candidate of candidates) {
    if (candidate.order.type !== 'MOVE') check(candidate, ctx);
  }

  const convoys = kept.flatMap((k) => (k.order.type === 'CONVOY' ? [k.order] : []));
  const moveCtx: ValidationContext = { ...ctx, convoys };
  for (const candidate of candidates) {
    if (candidate.order.type === 'MOVE') check(candidate, moveCtx);
  }

  kept.sort((a, b) => a.seq - b.seq);
  const accepted = new Map<PlayerId, Order[]>();
  for (const { player, order } of kept) {
    const list = accepted.get(player) ?? [];
    list.push(order);
    accepted.set(player, list);
  }

  return { accepted, rejected };
}
