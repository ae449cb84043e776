/**
 * Core types for the rules engine.
 */

export type PlayerId = string;
export type TerritoryId = string;
export type PartId = string;

/**
 * A land part holds an army; a coast part holds a fleet.
 */
export type PartKind = 'LAND' | 'COAST';

export interface Territory {
  id: TerritoryId;
  index: number;
  /** Indices into the map's part arena */
  parts: readonly number[];
  center: boolean;
  /** Player whose starting centre this is, if any */
  homePlayer: PlayerId | null;
}

export interface Part {
  id: PartId;
  index: number;
  kind: PartKind;
  /** Index into the map's territory arena */
  territory: number;
  neighbors: readonly number[];
}

/**
 * Raw territory entry as found in a map description.
 */
export interface TerritoryDefinition {
  parts: Record<PartId, string[]>;
  center: boolean;
  initPlayer: PlayerId | null;
  initPart: PartId | null;
}

export type MapDefinition = Record<TerritoryId, TerritoryDefinition>;

export type BuildRule = 'initCenters' | 'allCenters';

export type DrawType = 'DSS' | 'SoS';

export interface RulesConfig {
  winCondition: number;
  buildRule: BuildRule;
  buildTime: number;
  voteShown: boolean;
  drawType: DrawType;
}

export interface Unit {
  player: PlayerId;
  part: PartId;
}

export type OrderType =
  | 'HOLD'
  | 'MOVE'
  | 'SUPPORT_HOLD'
  | 'SUPPORT_MOVE'
  | 'CONVOY'
  | 'RETREAT'
  | 'BUILD'
  | 'DISBAND';

export interface HoldOrder {
  type: 'HOLD';
  unit: PartId;
}

export interface MoveOrder {
  type: 'MOVE';
  unit: PartId;
  destination: PartId;
  viaConvoy?: boolean;
}

export interface SupportHoldOrder {
  type: 'SUPPORT_HOLD';
  unit: PartId;
  supportedUnit: PartId;
}

export interface SupportMoveOrder {
  type: 'SUPPORT_MOVE';
  unit: PartId;
  supportedUnit: PartId;
  destination: PartId;
}

export interface ConvoyOrder {
  type: 'CONVOY';
  unit: PartId;
  convoyedUnit: PartId;
  destination: PartId;
}

export interface RetreatOrder {
  type: 'RETREAT';
  unit: PartId;
  destination: PartId;
}

export interface BuildOrder {
  type: 'BUILD';
  unit: PartId;
}

export interface DisbandOrder {
  type: 'DISBAND';
  unit: PartId;
}

export type MovePhaseOrder =
  | HoldOrder
  | MoveOrder
  | SupportHoldOrder
  | SupportMoveOrder
  | ConvoyOrder;

export type Order = MovePhaseOrder | RetreatOrder | BuildOrder | DisbandOrder;

export type PhaseKind = 'MOVE' | 'RETREAT' | 'BUILD';

export interface PhaseInfo {
  /** Retreat phases share the count of the move phase they follow */
  count: number;
  kind: PhaseKind;
}

export interface RejectedOrder {
  player: PlayerId;
  order: Order;
  reason: string;
}

export interface OrderResolution {
  order: Order;
  player: PlayerId;
  success: boolean;
  reason?: string;
  dislodged?: boolean;
  dislodgedFrom?: PartId;
}

export interface DislodgedUnit {
  player: PlayerId;
  part: PartId;
  /** Part the successful attack came from */
  attackerFrom: PartId;
  /** Parts this unit may not retreat to */
  forbidden: readonly PartId[];
  /** Legal retreat destinations, computed after the move resolved */
  options: readonly PartId[];
}

export interface PlayerState {
  id: PlayerId;
  homeCenters: readonly TerritoryId[];
}

export type GameOutcome =
  | { kind: 'WIN'; winner: PlayerId; centers: number }
  | { kind: 'DRAW'; shares: ReadonlyMap<PlayerId, number> };

/**
 * Authoritative snapshot. Replaced as a whole at each phase resolution.
 */
export interface GameState {
  readonly phase: PhaseInfo;
  readonly units: readonly Unit[];
  /** Supply-centre owners; territories missing from the map are unowned */
  readonly owners: ReadonlyMap<TerritoryId, PlayerId>;
  readonly players: readonly PlayerState[];
  /** Units awaiting a retreat order (RETREAT phase only) */
  readonly dislodged: readonly DislodgedUnit[];
  /** centres − units per player (BUILD phase only) */
  readonly adjustments: ReadonlyMap<PlayerId, number>;
  readonly outcome?: GameOutcome;
}
