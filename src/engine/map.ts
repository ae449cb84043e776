/**
 * Map graph.
 *
 * Territories and parts live in two index-addressed arenas; parts refer to
 * their territory and neighbours by index. The graph is frozen after
 * construction and exposes lookups only.
 *
 * Adjacency lists in a map description may name a part ("NTH_C") or a whole
 * territory ("NTH"). A territory name resolves to that territory's parts of
 * the same kind as the listing part, so "LON_L": ["YOR"] means YOR_L and
 * "LON_C": ["YOR"] means YOR_C. Adjacency is undirected.
 */

import { GameSetupError } from '../config/errors';
import type {
  MapDefinition,
  Part,
  PartId,
  PartKind,
  PlayerId,
  Territory,
  TerritoryId,
  Unit,
} from './types';

function kindOf(partId: PartId): PartKind {
  return partId.endsWith('C') ? 'COAST' : 'LAND';
}

export class MapGraph {
  readonly definition: MapDefinition;
  private readonly territoryArena: readonly Territory[];
  private readonly partArena: readonly Part[];
  private readonly territoryIndex: ReadonlyMap<TerritoryId, number>;
  private readonly partIndex: ReadonlyMap<PartId, number>;
  private readonly neighborIds: readonly (readonly PartId[])[];
  private readonly playerList: readonly PlayerId[];

  constructor(definition: MapDefinition) {
    this.definition = definition;

    const territories: Territory[] = [];
    const parts: Array<Omit<Part, 'neighbors'>> = [];
    const territoryIndex = new Map<TerritoryId, number>();
    const partIndex = new Map<PartId, number>();
    const players: PlayerId[] = [];

    for (const [territoryId, entry] of Object.entries(definition)) {
      const index = territories.length;
      const partIndices: number[] = [];
      for (const partId of Object.keys(entry.parts)) {
        const partIdx = parts.length;
        parts.push({ id: partId, index: partIdx, kind: kindOf(partId), territory: index });
        partIndex.set(partId, partIdx);
        partIndices.push(partIdx);
      }
      territories.push(Object.freeze({
        id: territoryId,
        index,
        parts: Object.freeze(partIndices),
        center: entry.center,
        homePlayer: entry.initPlayer,
      }));
      territoryIndex.set(territoryId, index);

      if (entry.initPlayer !== null && !players.includes(entry.initPlayer)) {
        players.push(entry.initPlayer);
      }
    }

    // Resolve adjacency, symmetrically
    const edges: Array<Set<number>> = parts.map(() => new Set<number>());
    const problems: string[] = [];

    for (const entry of Object.values(definition)) {
      for (const [partId, neighborNames] of Object.entries(entry.parts)) {
        const from = partIndex.get(partId);
        if (from === undefined) continue;
        const kind = parts[from].kind;

        for (const name of neighborNames) {
          const targets = this.resolveNeighbor(name, kind, parts, territories, partIndex, territoryIndex);
          if (typeof targets === 'string') {
            problems.push(`${partId}: ${targets}`);
            continue;
          }
          for (const to of targets) {
            if (to === from) continue;
            edges[from].add(to);
            edges[to].add(from);
          }
        }
      }
    }

    if (problems.length > 0) {
      throw new GameSetupError('MAP_INVALID', 'Map adjacency is invalid', problems);
    }

    this.partArena = Object.freeze(
      parts.map((p, i) => Object.freeze({ ...p, neighbors: Object.freeze([...edges[i]].sort((a, b) => a - b)) }))
    );
    this.territoryArena = Object.freeze(territories);
    this.territoryIndex = territoryIndex;
    this.partIndex = partIndex;
    this.neighborIds = Object.freeze(
      this.partArena.map((p) => Object.freeze(p.neighbors.map((n) => this.partArena[n].id)))
    );
    this.playerList = Object.freeze(players);
    Object.freeze(this);
  }

  private resolveNeighbor(
    name: string,
    kind: PartKind,
    parts: ReadonlyArray<Omit<Part, 'neighbors'>>,
    territories: readonly Territory[],
    partIndex: ReadonlyMap<PartId, number>,
    territoryIndex: ReadonlyMap<TerritoryId, number>
  ): number[] | string {
    const direct = partIndex.get(name);
    if (direct !== undefined) {
      if (parts[direct].kind !== kind) {
        return `${name} is a ${parts[direct].kind.toLowerCase()} part; adjacency joins parts of the same kind`;
      }
      return [direct];
    }

    const territory = territoryIndex.get(name);
    if (territory === undefined) {
      return `unknown neighbour ${name}`;
    }
    const matching = territories[territory].parts.filter((p) => parts[p].kind === kind);
    if (matching.length === 0) {
      return `${name} has no ${kind.toLowerCase()} part`;
    }
    // split coasts must be named explicitly
    if (matching.length > 1) {
      return `${name} has several ${kind.toLowerCase()} parts; name one of ${matching.map((p) => parts[p].id).join(', ')}`;
    }
    return matching;
  }

  territories(): readonly Territory[] {
    return this.territoryArena;
  }

  parts(): readonly Part[] {
    return this.partArena;
  }

  hasPart(partId: PartId): boolean {
    return this.partIndex.has(partId);
  }

  hasTerritory(territoryId: TerritoryId): boolean {
    return this.territoryIndex.has(territoryId);
  }

  findPart(partId: PartId): Part | undefined {
    const index = this.partIndex.get(partId);
    return index === undefined ? undefined : this.partArena[index];
  }

  part(partId: PartId): Part {
    const found = this.findPart(partId);
    if (!found) {
      throw new Error(`Unknown part: ${partId}`);
    }
    return found;
  }

  territory(territoryId: TerritoryId): Territory {
    const index = this.territoryIndex.get(territoryId);
    if (index === undefined) {
      throw new Error(`Unknown territory: ${territoryId}`);
    }
    return this.territoryArena[index];
  }

  neighbors(partId: PartId): readonly PartId[] {
    return this.neighborIds[this.part(partId).index];
  }

  isCoast(partId: PartId): boolean {
    return this.part(partId).kind === 'COAST';
  }

  /**
   * A fleet-capable sea part: a coast part of a territory without land.
   */
  isSea(partId: PartId): boolean {
    const part = this.part(partId);
    if (part.kind !== 'COAST') return false;
    return this.territoryArena[part.territory].parts.every((p) => this.partArena[p].kind === 'COAST');
  }

  territoryOf(partId: PartId): TerritoryId {
    return this.territoryArena[this.part(partId).territory].id;
  }

  partsOf(territoryId: TerritoryId): PartId[] {
    return this.territory(territoryId).parts.map((p) => this.partArena[p].id);
  }

  areAdjacent(a: PartId, b: PartId): boolean {
    const target = this.part(b).index;
    return this.part(a).neighbors.includes(target);
  }

  /**
   * True when some neighbour of the part lies in the territory.
   */
  canReach(partId: PartId, territoryId: TerritoryId): boolean {
    const territory = this.territory(territoryId).index;
    return this.part(partId).neighbors.some((n) => this.partArena[n].territory === territory);
  }

  centers(): TerritoryId[] {
    return this.territoryArena.filter((t) => t.center).map((t) => t.id);
  }

  homeCenters(player: PlayerId): TerritoryId[] {
    return this.territoryArena.filter((t) => t.center && t.homePlayer === player).map((t) => t.id);
  }

  /**
   * Players in order of first appearance in the map description.
   */
  playerIds(): readonly PlayerId[] {
    return this.playerList;
  }

  initialUnits(): Unit[] {
    const units: Unit[] = [];
    for (const entry of Object.values(this.definition)) {
      if (entry.initPlayer !== null && entry.initPart !== null) {
        units.push({ player: entry.initPlayer, part: entry.initPart });
      }
    }
    return units;
  }

  initialOwners(): Map<TerritoryId, PlayerId> {
    const owners = new Map<TerritoryId, PlayerId>();
    for (const territory of this.territoryArena) {
      if (territory.center && territory.homePlayer !== null) {
        owners.set(territory.id, territory.homePlayer);
      }
    }
    return owners;
  }
}
