/**
 * Tests for commands.ts
 */

import { describe, it, expect } from 'vitest';
import { build, convoy, disband, hold, move, retreat, supportHold, supportMove } from '../../engine/orders';
import { parseCommand, parseOrder, USAGE } from '../commands';

describe('parseOrder', () => {
  it('should accept standalone codes on either side of the part', () => {
    expect(parseOrder(['H', 'LON_C'])).toEqual(hold('LON_C'));
    expect(parseOrder(['LON_C', 'H'])).toEqual(hold('LON_C'));
    expect(parseOrder(['b', 'PAR_L'])).toEqual(build('PAR_L'));
    expect(parseOrder(['KIE_C', 'D'])).toEqual(disband('KIE_C'));
  });

  it('should parse three-token orders', () => {
    expect(parseOrder(['LON_C', 'M', 'NTH_C'])).toEqual(move('LON_C', 'NTH_C'));
    expect(parseOrder(['LON_L', 'v', 'BEL_L'])).toEqual(move('LON_L', 'BEL_L', true));
    expect(parseOrder(['BEL_L', 'R', 'HOL_L'])).toEqual(retreat('BEL_L', 'HOL_L'));
    expect(parseOrder(['EDI_C', 'S', 'LON_C'])).toEqual(supportHold('EDI_C', 'LON_C'));
  });

  it('should parse support and convoy with a source', () => {
    expect(parseOrder(['PAR_L', 'S', 'PIC_L', 'from', 'BRE_L'])).toEqual(supportMove('PAR_L', 'BRE_L', 'PIC_L'));
    expect(parseOrder(['NTH_C', 'C', 'BEL_L', 'FROM', 'LON_L'])).toEqual(convoy('NTH_C', 'LON_L', 'BEL_L'));
  });

  it('should return null for anything else', () => {
    expect(parseOrder([])).toBeNull();
    expect(parseOrder(['LON_C', 'Q'])).toBeNull();
    expect(parseOrder(['LON_C', 'X', 'NTH_C'])).toBeNull();
    expect(parseOrder(['NTH_C', 'C', 'BEL_L', 'to', 'LON_L'])).toBeNull();
    expect(parseOrder(['LON_C', 'M', 'NTH_C', 'from', 'EDI_C'])).toBeNull();
  });
});

describe('parseCommand', () => {
  it('should parse orders with or without the program name', () => {
    expect(parseCommand('--order ENG LON_C M NTH_C')).toEqual({
      ok: true,
      command: { kind: 'order', player: 'ENG', order: move('LON_C', 'NTH_C') },
    });
    expect(parseCommand('  diplomacy --order FRA PAR_L B ')).toEqual({
      ok: true,
      command: { kind: 'order', player: 'FRA', order: build('PAR_L') },
    });
  });

  it('should report usage for a malformed order', () => {
    expect(parseCommand('--order ENG LON_C X NTH_C')).toEqual({ ok: false, error: USAGE['--order'] });
    expect(parseCommand('--order')).toEqual({ ok: false, error: USAGE['--order'] });
  });

  it('should parse draw votes and the tally request', () => {
    expect(parseCommand('--draw ENG 1')).toEqual({ ok: true, command: { kind: 'draw', player: 'ENG', vote: true } });
    expect(parseCommand('--draw GER 0')).toEqual({ ok: true, command: { kind: 'draw', player: 'GER', vote: false } });
    expect(parseCommand('--draw')).toEqual({ ok: true, command: { kind: 'votes' } });
    expect(parseCommand('--draw ENG yes')).toEqual({ ok: false, error: USAGE['--draw'] });
  });

  it('should join press words with single spaces', () => {
    expect(parseCommand('--press ENG FRA meet   in the channel')).toEqual({
      ok: true,
      command: { kind: 'press-send', from: 'ENG', to: 'FRA', message: 'meet in the channel' },
    });
    expect(parseCommand('--press public')).toEqual({ ok: true, command: { kind: 'press-read', channel: 'public' } });
    expect(parseCommand('--press ENG FRA')).toEqual({ ok: false, error: USAGE['--press'] });
  });

  it('should parse the remaining flags', () => {
    expect(parseCommand('--ready GER')).toEqual({ ok: true, command: { kind: 'ready', player: 'GER' } });
    expect(parseCommand('--ready')).toEqual({ ok: false, error: USAGE['--ready'] });
    expect(parseCommand('--map')).toEqual({ ok: true, command: { kind: 'map' } });
    expect(parseCommand('--rules')).toEqual({ ok: true, command: { kind: 'rules' } });
    expect(parseCommand('--phase')).toEqual({ ok: true, command: { kind: 'phase' } });
  });

  it('should reject empty and unknown commands', () => {
    expect(parseCommand('   ')).toEqual({ ok: false, error: 'Empty command' });
    expect(parseCommand('diplomacy')).toEqual({ ok: false, error: 'Empty command' });
    expect(parseCommand('--bogus ENG')).toEqual({ ok: false, error: 'Unknown command: --bogus' });
  });
});
