/**
 * Map and rules description loaders.
 *
 * Parsing is strict about structure and lenient about the spelling of flags.
 * Every problem found is reported at once in the error's details.
 */

import { readFileSync } from 'fs';
import type { MapDefinition, RulesConfig, TerritoryDefinition } from '../engine/types';
import { GameSetupError } from './errors';
import {
  MapFileSchema,
  NeighborListSchema,
  RESERVED_TERRITORY_KEYS,
  RulesFileSchema,
  TerritoryMetaSchema,
  describeIssues,
} from './schemas';

const PART_SUFFIX = /_(L|[NSEW]?C)$/;

/**
 * Validates a parsed map description and returns a typed definition.
 */
export function parseMapDefinition(raw: unknown): MapDefinition {
  const parsed = MapFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new GameSetupError('MAP_INVALID', 'Map description has the wrong shape', describeIssues(parsed.error));
  }

  const problems: string[] = [];
  const definition: MapDefinition = {};

  for (const [territoryId, entry] of Object.entries(parsed.data)) {
    const meta = TerritoryMetaSchema.safeParse(entry);
    if (!meta.success) {
      problems.push(...describeIssues(meta.error, [territoryId]));
      continue;
    }

    const parts: Record<string, string[]> = {};
    for (const [key, value] of Object.entries(entry)) {
      if (RESERVED_TERRITORY_KEYS.has(key)) continue;

      if (!key.startsWith(`${territoryId}_`) || !PART_SUFFIX.test(key)) {
        problems.push(`${territoryId}.${key}: part ids are <territory>_L or <territory>_C/_NC/_SC/_EC/_WC`);
        continue;
      }
      const neighbors = NeighborListSchema.safeParse(value);
      if (!neighbors.success) {
        problems.push(...describeIssues(neighbors.error, [territoryId, key]));
        continue;
      }
      parts[key] = neighbors.data;
    }

    if (Object.keys(parts).length === 0) {
      problems.push(`${territoryId}: territory has no parts`);
    }

    const { center, initPlayer, initPart } = meta.data;
    if (initPart !== null && !(initPart in parts)) {
      problems.push(`${territoryId}.initPart: ${initPart} is not a part of ${territoryId}`);
    }
    if (initPart !== null && initPlayer === null) {
      problems.push(`${territoryId}.initPart: a starting unit needs an initPlayer`);
    }

    const territory: TerritoryDefinition = { parts, center, initPlayer, initPart };
    definition[territoryId] = territory;
  }

  if (problems.length > 0) {
    throw new GameSetupError('MAP_INVALID', 'Map description is invalid', problems);
  }
  if (Object.keys(definition).length === 0) {
    throw new GameSetupError('MAP_INVALID', 'Map description has no territories');
  }

  return definition;
}

/**
 * Validates a parsed rules description.
 */
export function parseRulesConfig(raw: unknown): RulesConfig {
  const parsed = RulesFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new GameSetupError('RULES_INVALID', 'Rules description is invalid', describeIssues(parsed.error));
  }
  return { ...parsed.data };
}

function readJson(path: string, code: 'MAP_UNREADABLE' | 'RULES_UNREADABLE'): unknown {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new GameSetupError(code, `Failed to open ${path}`, [reason]);
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new GameSetupError(code, `Failed to parse ${path}`, [reason]);
  }
}

export function loadMapFile(path: string): MapDefinition {
  return parseMapDefinition(readJson(path, 'MAP_UNREADABLE'));
}

export function loadRulesFile(path: string): RulesConfig {
  return parseRulesConfig(readJson(path, 'RULES_UNREADABLE'));
}

/**
 * Serializes a definition back to the on-disk map format.
 */
export function serializeMapDefinition(definition: MapDefinition): Record<string, Record<string, unknown>> {
  const out: Record<string, Record<string, unknown>> = {};
  for (const [territoryId, territory] of Object.entries(definition)) {
    out[territoryId] = {
      ...territory.parts,
      center: territory.center ? 1 : 0,
      initPlayer: territory.initPlayer,
      initPart: territory.initPart,
    };
  }
  return out;
}

export function serializeRulesConfig(rules: RulesConfig): Record<string, unknown> {
  return {
    winCondition: rules.winCondition,
    buildRule: rules.buildRule,
    buildTime: rules.buildTime,
    voteShown: rules.voteShown ? 1 : 0,
    drawType: rules.drawType,
  };
}
