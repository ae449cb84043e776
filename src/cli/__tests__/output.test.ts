/**
 * Tests for output.ts
 */

import { describe, it, expect } from 'vitest';
import { loadMapFile, serializeMapDefinition } from '../../config/loader';
import { createInitialState } from '../../engine/game';
import type { PhaseResolution } from '../../engine/game';
import { move } from '../../engine/orders';
import type { GameState } from '../../engine/types';
import {
  formatMapJSON,
  formatOutcome,
  formatPhaseBanner,
  formatPressLines,
  formatResolution,
  formatRulesJSON,
  formatVoteSummary,
} from '../output';
import { NORTH_SEA_MAP_PATH, makeState, northSea, sampleRules, unit } from '../../test/fixtures';

const map = northSea();

describe('formatPhaseBanner', () => {
  it('should print only the label in a move phase', () => {
    expect(formatPhaseBanner(createInitialState(map))).toEqual(['Phase 1 move']);
  });

  it('should list builds and disbands', () => {
    const state: GameState = {
      ...makeState(map, [], [], { count: 3, kind: 'BUILD' }),
      adjustments: new Map([
        ['ENG', 2],
        ['FRA', 0],
        ['GER', -1],
      ]),
    };
    expect(formatPhaseBanner(state)).toEqual(['Phase 3 build', 'ENG build 2', 'GER disband 1']);
  });

  it('should list retreat options, or none', () => {
    const state: GameState = {
      ...makeState(map, [], [], { count: 4, kind: 'RETREAT' }),
      dislodged: [
        { player: 'GER', part: 'BEL_L', attackerFrom: 'PIC_L', forbidden: ['PIC_L'], options: ['HOL_L', 'RUH_L'] },
        { player: 'ENG', part: 'NTH_C', attackerFrom: 'HEL_C', forbidden: ['HEL_C'], options: [] },
      ],
    };
    expect(formatPhaseBanner(state)).toEqual([
      'Phase 4 retreat',
      'GER retreat BEL_L: HOL_L, RUH_L',
      'ENG retreat NTH_C: none',
    ]);
  });
});

describe('formatOutcome', () => {
  it('should name the winner', () => {
    expect(formatOutcome({ kind: 'WIN', winner: 'FRA', centers: 7 })).toBe('FRA wins with 7 centres');
  });

  it('should print draw shares to three places', () => {
    const shares = new Map([
      ['ENG', 0.5],
      ['GER', 0.25],
      ['FRA', 0.25],
    ]);
    expect(formatOutcome({ kind: 'DRAW', shares })).toBe('Draw: ENG 0.500, GER 0.250, FRA 0.250');
  });
});

describe('formatResolution', () => {
  it('should report rejections, standoffs, paradoxes, dislodgements and disbands', () => {
    const state: GameState = {
      ...makeState(map, [], [], { count: 1, kind: 'RETREAT' }),
      dislodged: [{ player: 'GER', part: 'BEL_L', attackerFrom: 'PIC_L', forbidden: [], options: [] }],
    };
    const resolution: PhaseResolution = {
      state,
      accepted: new Map(),
      rejected: [{ player: 'ENG', order: move('LON_C', 'BEL_C'), reason: 'LON_C is not adjacent to BEL_C' }],
      results: new Map(),
      disbanded: [unit('FRA', 'PIC_C')],
      standoffs: ['BUR'],
      paradoxes: ['LON_L'],
    };

    expect(formatResolution(resolution)).toEqual([
      'ENG LON_C M BEL_C rejected: LON_C is not adjacent to BEL_C',
      'Standoff in BUR',
      'Convoy paradox: LON_L does not move',
      'GER BEL_L dislodged from PIC_L',
      'FRA PIC_C disbanded',
    ]);
  });
});

describe('formatVoteSummary', () => {
  it('should show who voted when votes are public', () => {
    expect(formatVoteSummary({ shown: true, yes: 1, active: 2, votes: { ENG: true, FRA: false } })).toBe(
      'Draw votes: 1/2 (ENG yes, FRA no)'
    );
  });

  it('should show only the tally when votes are hidden', () => {
    expect(formatVoteSummary({ shown: false, yes: 2, active: 3 })).toBe('Draw votes: 2/3');
  });
});

describe('formatPressLines', () => {
  it('should print sender and channel', () => {
    expect(
      formatPressLines([
        { id: 1, from: 'ENG', to: 'public', content: 'Hello all', phase: 'Phase 1 move' },
        { id: 2, from: 'FRA', to: 'ENG', content: 'Stay out of the channel', phase: 'Phase 1 move' },
      ])
    ).toEqual(['ENG/public: Hello all', 'FRA/ENG: Stay out of the channel']);
  });
});

describe('formatMapJSON', () => {
  const definition = loadMapFile(NORTH_SEA_MAP_PATH);

  it('should reproduce the description at the start of the game', () => {
    expect(JSON.parse(formatMapJSON(map, definition, createInitialState(map)))).toEqual(
      serializeMapDefinition(definition)
    );
  });

  it('should place units where they currently stand', () => {
    const state = makeState(map, [unit('ENG', 'NTH_C')], []);
    const json: unknown = JSON.parse(formatMapJSON(map, definition, state));

    expect(json).toMatchObject({
      NTH: { center: 0, initPlayer: 'ENG', initPart: 'NTH_C' },
      LON: { center: 1, initPlayer: null, initPart: null },
    });
  });
});

describe('formatRulesJSON', () => {
  it('should write rules in the file format', () => {
    expect(JSON.parse(formatRulesJSON(sampleRules()))).toEqual({
      winCondition: 7,
      buildRule: 'initCenters',
      buildTime: 3,
      voteShown: 1,
      drawType: 'DSS',
    });
  });
});
