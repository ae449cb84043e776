/**
 * Shared test fixtures: the bundled sample map and rules.
 */

import { fileURLToPath } from 'url';
import { loadMapFile, loadRulesFile } from '../config/loader';
import { MapGraph } from '../engine/map';
import type { GameState, PlayerId, RulesConfig, TerritoryId, Unit } from '../engine/types';

export const NORTH_SEA_MAP_PATH = fileURLToPath(new URL('../../maps/north-sea.json', import.meta.url));
export const RULES_PATH = fileURLToPath(new URL('../../maps/rules.json', import.meta.url));

export function northSea(): MapGraph {
  return new MapGraph(loadMapFile(NORTH_SEA_MAP_PATH));
}

export function sampleRules(overrides: Partial<RulesConfig> = {}): RulesConfig {
  return { ...loadRulesFile(RULES_PATH), ...overrides };
}

export function unit(player: PlayerId, part: string): Unit {
  return { player, part };
}

/**
 * Build a snapshot with the given units and centre owners.
 */
export function makeState(
  map: MapGraph,
  units: Unit[],
  owners: Array<[TerritoryId, PlayerId]>,
  phase: GameState['phase'] = { count: 1, kind: 'MOVE' }
): GameState {
  return {
    phase,
    units,
    owners: new Map(owners),
    players: map.playerIds().map((id) => ({ id, homeCenters: map.homeCenters(id) })),
    dislodged: [],
    adjustments: new Map(),
  };
}
