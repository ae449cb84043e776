/**
 * Tests for retreats.ts — retreat options and retreat resolution.
 */

import { describe, it, expect } from 'vitest';
import { getRetreatOptions, resolveRetreats } from '../retreats';
import { disband, retreat } from '../orders';
import type { DislodgedUnit, Order } from '../types';
import { northSea, unit } from '../../test/fixtures';

const map = northSea();

function dislodgedAt(player: string, part: string, forbidden: string[], options: string[]): DislodgedUnit {
  return { player, part, attackerFrom: forbidden[0] ?? part, forbidden, options };
}

describe('getRetreatOptions', () => {
  it('should exclude forbidden parts and occupied territories', () => {
    expect(getRetreatOptions(map, 'BEL_L', ['PIC_L', 'PIC_C'], new Set(['BUR']))).toEqual(['HOL_L', 'RUH_L']);
  });

  it('should return nothing when every neighbour is blocked', () => {
    expect(getRetreatOptions(map, 'BER_L', ['KIE_L'], new Set(['MUN']))).toEqual([]);
  });
});

describe('resolveRetreats', () => {
  const attackers = [unit('FRA', 'BEL_L'), unit('FRA', 'MUN_L')];

  it('should move a unit with a legal retreat', () => {
    const dislodged = [dislodgedAt('GER', 'BEL_L', ['PIC_L', 'PIC_C'], ['HOL_L', 'RUH_L'])];
    const outcome = resolveRetreats(map, attackers, dislodged, new Map([['GER', [retreat('BEL_L', 'HOL_L')]]]));

    expect(outcome.units).toEqual([...attackers, { player: 'GER', part: 'HOL_L' }]);
    expect(outcome.disbanded).toEqual([]);
    expect(outcome.results.get('BEL_L')?.success).toBe(true);
  });

  it('should disband every unit retreating into the same territory', () => {
    const dislodged = [
      dislodgedAt('GER', 'BEL_L', ['PIC_L', 'PIC_C'], ['HOL_L', 'RUH_L']),
      dislodgedAt('GER', 'MUN_L', ['BUR_L'], ['RUH_L', 'KIE_L', 'BER_L']),
    ];
    const orders = new Map<string, Order[]>([['GER', [retreat('BEL_L', 'RUH_L'), retreat('MUN_L', 'RUH_L')]]]);
    const outcome = resolveRetreats(map, attackers, dislodged, orders);

    expect(outcome.units).toEqual(attackers);
    expect(outcome.disbanded).toEqual([unit('GER', 'BEL_L'), unit('GER', 'MUN_L')]);
    expect(outcome.results.get('MUN_L')?.reason).toBe('Bounced with another retreat; unit disbanded');
  });

  it('should disband units without an order', () => {
    const dislodged = [dislodgedAt('GER', 'BEL_L', ['PIC_L', 'PIC_C'], ['HOL_L', 'RUH_L'])];
    const outcome = resolveRetreats(map, attackers, dislodged, new Map());

    expect(outcome.disbanded).toEqual([unit('GER', 'BEL_L')]);
    expect(outcome.results.get('BEL_L')).toEqual({
      order: disband('BEL_L'),
      player: 'GER',
      success: true,
      reason: 'No retreat ordered',
    });
  });

  it('should disband units with an illegal retreat', () => {
    const dislodged = [dislodgedAt('GER', 'BEL_L', ['PIC_L', 'PIC_C'], ['HOL_L', 'RUH_L'])];
    const outcome = resolveRetreats(map, attackers, dislodged, new Map([['GER', [retreat('BEL_L', 'PIC_L')]]]));

    expect(outcome.disbanded).toEqual([unit('GER', 'BEL_L')]);
    expect(outcome.results.get('BEL_L')?.reason).toBe('PIC_L is not a legal retreat; unit disbanded');
  });

  it('should honour an explicit disband', () => {
    const dislodged = [dislodgedAt('GER', 'BEL_L', ['PIC_L', 'PIC_C'], ['HOL_L', 'RUH_L'])];
    const outcome = resolveRetreats(map, attackers, dislodged, new Map([['GER', [disband('BEL_L')]]]));

    expect(outcome.disbanded).toEqual([unit('GER', 'BEL_L')]);
    expect(outcome.results.get('BEL_L')).toEqual({ order: disband('BEL_L'), player: 'GER', success: true });
  });

  it('should ignore orders given by another player', () => {
    const dislodged = [dislodgedAt('GER', 'BEL_L', ['PIC_L', 'PIC_C'], ['HOL_L', 'RUH_L'])];
    const outcome = resolveRetreats(map, attackers, dislodged, new Map([['FRA', [retreat('BEL_L', 'HOL_L')]]]));

    expect(outcome.disbanded).toEqual([unit('GER', 'BEL_L')]);
  });
});
