/**
 * Rules engine
 *
 * Map graph, orders, validation, move adjudication, retreats, builds and
 * draw votes. Everything here is synchronous and free of I/O.
 */

// Types
export type {
  PlayerId,
  TerritoryId,
  PartId,
  PartKind,
  Territory,
  Part,
  TerritoryDefinition,
  MapDefinition,
  BuildRule,
  DrawType,
  RulesConfig,
  Unit,
  OrderType,
  HoldOrder,
  MoveOrder,
  SupportHoldOrder,
  SupportMoveOrder,
  ConvoyOrder,
  RetreatOrder,
  BuildOrder,
  DisbandOrder,
  MovePhaseOrder,
  Order,
  PhaseKind,
  PhaseInfo,
  RejectedOrder,
  OrderResolution,
  DislodgedUnit,
  PlayerState,
  GameOutcome,
  GameState,
} from './types';

// Map
export { MapGraph } from './map';

// Orders
export {
  hold,
  move,
  supportHold,
  supportMove,
  convoy,
  retreat,
  build,
  disband,
  ordersAllowedIn,
  formatOrder,
  isMovePhaseOrder,
} from './orders';

// Validation
export type { ValidationContext, ValidationResult } from './validator';
export { validateOrder, validateOrders } from './validator';

// Adjudication
export type { MoveInput, MoveOutcome } from './adjudicator';
export { adjudicateMoves } from './adjudicator';
export { findConvoyRoute } from './convoy';

export type { RetreatOutcome } from './retreats';
export { getRetreatOptions, resolveRetreats } from './retreats';

export type { BuildOutcome } from './builds';
export { isBuildPhase, calculateAdjustments, getBuildableParts, resolveBuilds } from './builds';

// Draw votes
export type { VoteSummary } from './votes';
export { DrawVoteTracker, isEliminated, activePlayers, computeDrawShares } from './votes';

// Game state
export type { PhaseResolution, StateJSON } from './game';
export {
  createInitialState,
  getPhaseLabel,
  phaseKindFor,
  captureCenters,
  getCenterCounts,
  getUnitCounts,
  checkVictory,
  resolvePhase,
  stateFromJSON,
  stateToJSON,
} from './game';
