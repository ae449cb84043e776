/**
 * Text produced by the command-line front end.
 */

import { serializeMapDefinition, serializeRulesConfig } from '../config/loader';
import { getPhaseLabel } from '../engine/game';
import type { PhaseResolution } from '../engine/game';
import type { MapGraph } from '../engine/map';
import { formatOrder } from '../engine/orders';
import type { GameOutcome, GameState, MapDefinition, RulesConfig, TerritoryId, Unit } from '../engine/types';
import type { VoteSummary } from '../engine/votes';
import { formatPressLine } from '../press/press-board';
import type { PressMessage } from '../press/press-board';

/**
 * Phase banner: the label, then what each affected player owes.
 *
 *   Phase 3 build
 *   ENG build 2
 *   GER disband 1
 */
export function formatPhaseBanner(state: GameState): string[] {
  const lines = [getPhaseLabel(state.phase)];

  if (state.phase.kind === 'BUILD') {
    for (const player of state.players) {
      const delta = state.adjustments.get(player.id) ?? 0;
      if (delta > 0) lines.push(`${player.id} build ${delta}`);
      if (delta < 0) lines.push(`${player.id} disband ${-delta}`);
    }
  }

  if (state.phase.kind === 'RETREAT') {
    for (const unit of state.dislodged) {
      const options = unit.options.length > 0 ? unit.options.join(', ') : 'none';
      lines.push(`${unit.player} retreat ${unit.part}: ${options}`);
    }
  }

  return lines;
}

export function formatOutcome(outcome: GameOutcome): string {
  if (outcome.kind === 'WIN') {
    return `${outcome.winner} wins with ${outcome.centers} centres`;
  }
  const shares = [...outcome.shares].map(([player, share]) => `${player} ${share.toFixed(3)}`);
  return `Draw: ${shares.join(', ')}`;
}

/**
 * What happened in a resolved phase, apart from the next banner.
 */
export function formatResolution(resolution: PhaseResolution): string[] {
  const lines: string[] = [];
  for (const rejected of resolution.rejected) {
    lines.push(`${rejected.player} ${formatOrder(rejected.order)} rejected: ${rejected.reason}`);
  }
  for (const territory of resolution.standoffs) {
    lines.push(`Standoff in ${territory}`);
  }
  for (const part of resolution.paradoxes) {
    lines.push(`Convoy paradox: ${part} does not move`);
  }
  for (const unit of resolution.state.dislodged) {
    lines.push(`${unit.player} ${unit.part} dislodged from ${unit.attackerFrom}`);
  }
  for (const unit of resolution.disbanded) {
    lines.push(`${unit.player} ${unit.part} disbanded`);
  }
  return lines;
}

export function formatVoteSummary(summary: VoteSummary): string {
  const tally = `Draw votes: ${summary.yes}/${summary.active}`;
  if (!summary.shown) {
    return tally;
  }
  const flags = Object.entries(summary.votes).map(([player, vote]) => `${player} ${vote ? 'yes' : 'no'}`);
  return `${tally} (${flags.join(', ')})`;
}

export function formatPressLines(messages: readonly PressMessage[]): string[] {
  return messages.map(formatPressLine);
}

/**
 * The map description with the current units in place of the starting ones.
 */
export function formatMapJSON(map: MapGraph, definition: MapDefinition, state: GameState): string {
  const occupants = new Map<TerritoryId, Unit>(state.units.map((u) => [map.territoryOf(u.part), u]));
  const current: MapDefinition = {};
  for (const [territoryId, territory] of Object.entries(definition)) {
    const unit = occupants.get(territoryId);
    current[territoryId] = { ...territory, initPlayer: unit?.player ?? null, initPart: unit?.part ?? null };
  }
  return JSON.stringify(serializeMapDefinition(current), null, 2);
}

export function formatRulesJSON(rules: RulesConfig): string {
  return JSON.stringify(serializeRulesConfig(rules), null, 2);
}
