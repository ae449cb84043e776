/**
 * Tests for session.ts — command dispatch and the phase loop.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { loadMapFile } from '../../config/loader';
import { move } from '../../engine/orders';
import type { RulesConfig } from '../../engine/types';
import { PhaseStateMachine } from '../../orchestration/phase-machine';
import { PressBoard } from '../../press/press-board';
import { CliSession } from '../session';
import { NORTH_SEA_MAP_PATH, northSea, sampleRules } from '../../test/fixtures';

const map = northSea();
const definition = loadMapFile(NORTH_SEA_MAP_PATH);

/** Lets the phase loop pick up a released barrier. */
const flush = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

function isJSON(line: string): boolean {
  return line.startsWith('{');
}

describe('CliSession', () => {
  let out: string[];
  let err: string[];
  let machine: PhaseStateMachine;
  let press: PressBoard;
  let session: CliSession;

  function startSession(rules: RulesConfig = sampleRules()): void {
    machine = new PhaseStateMachine(map, rules, { gameId: 'cli-test' });
    press = new PressBoard(map.playerIds());
    session = new CliSession({
      machine,
      map,
      definition,
      rules,
      press,
      io: { out: (line) => out.push(line), err: (line) => err.push(line) },
    });
    session.start();
  }

  function readyAll(): void {
    for (const player of ['ENG', 'FRA', 'GER']) {
      session.handleLine(`--ready ${player}`);
    }
  }

  beforeEach(() => {
    out = [];
    err = [];
    startSession();
  });

  afterEach(() => {
    session.close();
  });

  // -------------------------------------------------------------------------
  // Commands
  // -------------------------------------------------------------------------
  describe('handleLine', () => {
    it('should print the opening banner', () => {
      expect(out).toEqual(['Phase 1 move']);
    });

    it('should buffer orders for the machine', () => {
      session.handleLine('--order ENG LON_C M NTH_C');
      expect(machine.getBufferedOrders().get('ENG')).toEqual([move('LON_C', 'NTH_C')]);
      expect(err).toEqual([]);
    });

    it('should report parse problems and rejected input on the error stream', () => {
      session.handleLine('--order ENG LON_C X NTH_C');
      session.handleLine('--order AUS LON_C H');
      session.handleLine('--warp');

      expect(err[1]).toBe('Error: Unknown player: AUS');
      expect(err[2]).toBe('Unknown command: --warp');
      expect(err).toHaveLength(3);
    });

    it('should ignore blank lines', () => {
      session.handleLine('   ');
      expect(err).toEqual([]);
      expect(out).toEqual(['Phase 1 move']);
    });

    it('should record draw votes and show the tally', () => {
      session.handleLine('--draw ENG 1');
      session.handleLine('--draw');
      expect(out.at(-1)).toBe('Draw votes: 1/3 (ENG yes, FRA no, GER no)');
    });

    it('should send and read press', () => {
      session.handleLine('--press ENG FRA meet in  the channel');
      session.handleLine('--press GER public Hello all');
      session.handleLine('--press FRA');
      session.handleLine('--press public');

      expect(out.slice(1)).toEqual(['ENG/FRA: meet in the channel', 'GER/public: Hello all']);
      expect(press.all()[0].phase).toBe('Phase 1 move');
    });

    it('should print rules and the phase banner on request', () => {
      session.handleLine('--rules');
      session.handleLine('--phase');

      expect(JSON.parse(out[1])).toMatchObject({ winCondition: 7, buildTime: 3 });
      expect(out[2]).toBe('Phase 1 move');
    });
  });

  // -------------------------------------------------------------------------
  // Phase loop
  // -------------------------------------------------------------------------
  describe('phase loop', () => {
    it('should resolve once every player is ready', async () => {
      session.handleLine('--order ENG LON_C M NTH_C');
      session.handleLine('--order ENG EDI_C M BEL_C');
      readyAll();
      await flush();

      const text = out.filter((line) => !isJSON(line));
      expect(text).toEqual([
        'Phase 1 move',
        'ENG EDI_C M BEL_C rejected: EDI_C is not adjacent to BEL_C',
        'Phase 2 move',
      ]);
      const json: unknown = JSON.parse(out[2]);
      expect(json).toMatchObject({ NTH: { initPlayer: 'ENG', initPart: 'NTH_C' } });
    });

    it('should hold back input that arrives while the phase resolves', async () => {
      session.handleLine('--order ENG LON_C M NTH_C');
      readyAll();
      session.handleLine('--order ENG NTH_C M HOL_C');
      await flush();

      expect(machine.getPhaseLabel()).toBe('Phase 2 move');
      expect(machine.getBufferedOrders().get('ENG')).toEqual([move('NTH_C', 'HOL_C')]);
      expect(err).toEqual([]);
    });

    it('should wait for held-back input before closing', async () => {
      session.handleLine('--order ENG LON_C M NTH_C');
      readyAll();
      session.handleLine('--order ENG NTH_C M HOL_C');
      session.closeWhenIdle();
      await session.finished();

      expect(machine.getBufferedOrders().get('ENG')).toEqual([move('NTH_C', 'HOL_C')]);
      expect(err).toEqual([]);
    });

    it('should print the winner and finish', async () => {
      session.close();
      out = [];
      startSession(sampleRules({ winCondition: 3 }));

      readyAll();
      await session.finished();

      expect(out.filter((line) => !isJSON(line))).toEqual(['Phase 1 move', 'ENG wins with 3 centres']);
      expect(machine.isOver()).toBe(true);
    });

    it('should stop when closed', async () => {
      session.close();
      await session.finished();
      expect(out).toEqual(['Phase 1 move']);
      expect(err).toEqual([]);
    });
  });
});
