/**
 * Order constructors and the fixed log grammar.
 */

import type {
  BuildOrder,
  ConvoyOrder,
  DisbandOrder,
  HoldOrder,
  MoveOrder,
  MovePhaseOrder,
  Order,
  OrderType,
  PartId,
  PhaseKind,
  RetreatOrder,
  SupportHoldOrder,
  SupportMoveOrder,
} from './types';

export function hold(unit: PartId): HoldOrder {
  return { type: 'HOLD', unit };
}

export function move(unit: PartId, destination: PartId, viaConvoy?: boolean): MoveOrder {
  return viaConvoy ? { type: 'MOVE', unit, destination, viaConvoy } : { type: 'MOVE', unit, destination };
}

export function supportHold(unit: PartId, supportedUnit: PartId): SupportHoldOrder {
  return { type: 'SUPPORT_HOLD', unit, supportedUnit };
}

export function supportMove(unit: PartId, supportedUnit: PartId, destination: PartId): SupportMoveOrder {
  return { type: 'SUPPORT_MOVE', unit, supportedUnit, destination };
}

export function convoy(unit: PartId, convoyedUnit: PartId, destination: PartId): ConvoyOrder {
  return { type: 'CONVOY', unit, convoyedUnit, destination };
}

export function retreat(unit: PartId, destination: PartId): RetreatOrder {
  return { type: 'RETREAT', unit, destination };
}

export function build(unit: PartId): BuildOrder {
  return { type: 'BUILD', unit };
}

export function disband(unit: PartId): DisbandOrder {
  return { type: 'DISBAND', unit };
}

const ALLOWED: Record<PhaseKind, readonly OrderType[]> = {
  MOVE: ['HOLD', 'MOVE', 'SUPPORT_HOLD', 'SUPPORT_MOVE', 'CONVOY'],
  RETREAT: ['RETREAT', 'DISBAND'],
  BUILD: ['BUILD', 'DISBAND'],
};

export function ordersAllowedIn(kind: PhaseKind): readonly OrderType[] {
  return ALLOWED[kind];
}

/**
 * Formats an order in the log grammar.
 */
export function formatOrder(order: Order): string {
  switch (order.type) {
    case 'HOLD':
      return `${order.unit} H`;
    case 'MOVE':
      return `${order.unit} ${order.viaConvoy ? 'V' : 'M'} ${order.destination}`;
    case 'SUPPORT_HOLD':
      return `${order.unit} S ${order.supportedUnit}`;
    case 'SUPPORT_MOVE':
      return `${order.unit} S ${order.destination} from ${order.supportedUnit}`;
    case 'CONVOY':
      return `${order.unit} C ${order.destination} from ${order.convoyedUnit}`;
    case 'RETREAT':
      return `${order.unit} R ${order.destination}`;
    case 'BUILD':
      return `${order.unit} B`;
    case 'DISBAND':
      return `${order.unit} D`;
  }
}

export function isMovePhaseOrder(order: Order): order is MovePhaseOrder {
  return ALLOWED.MOVE.includes(order.type);
}
