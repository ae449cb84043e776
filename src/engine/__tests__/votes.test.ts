/**
 * Tests for votes.ts — draw votes, elimination and draw shares.
 */

import { describe, it, expect } from 'vitest';
import { DrawVoteTracker, activePlayers, computeDrawShares, isEliminated } from '../votes';
import { makeState, northSea, unit } from '../../test/fixtures';

const map = northSea();
const players = ['ENG', 'FRA', 'GER'];

describe('DrawVoteTracker', () => {
  it('should declare a draw only when every active player votes yes', () => {
    const tracker = new DrawVoteTracker();
    tracker.vote('ENG', true);
    tracker.vote('FRA', true);
    expect(tracker.checkVotes(players)).toBe(false);

    tracker.vote('GER', true);
    expect(tracker.checkVotes(players)).toBe(true);
  });

  it('should let a single no vote block the draw', () => {
    const tracker = new DrawVoteTracker();
    for (const player of players) tracker.vote(player, true);
    tracker.vote('FRA', false);
    expect(tracker.checkVotes(players)).toBe(false);
  });

  it('should forget withdrawn votes', () => {
    const tracker = new DrawVoteTracker();
    for (const player of players) tracker.vote(player, true);
    tracker.withdraw('GER');
    expect(tracker.hasVoted('GER')).toBe(false);
    expect(tracker.checkVotes(players)).toBe(false);
  });

  it('should ignore votes from players outside the active set', () => {
    const tracker = new DrawVoteTracker();
    tracker.vote('ENG', true);
    tracker.vote('FRA', true);
    tracker.vote('GER', false);
    expect(tracker.checkVotes(['ENG', 'FRA'])).toBe(true);
  });

  it('should never declare a draw with nobody active', () => {
    expect(new DrawVoteTracker().checkVotes([])).toBe(false);
  });

  it('should show per-player flags when votes are shown', () => {
    const tracker = new DrawVoteTracker(true);
    tracker.vote('ENG', true);
    expect(tracker.summary(players)).toEqual({
      shown: true,
      yes: 1,
      active: 3,
      votes: { ENG: true, FRA: false, GER: false },
    });
  });

  it('should show only the count when votes are hidden', () => {
    const tracker = new DrawVoteTracker(false);
    tracker.vote('ENG', true);
    tracker.vote('FRA', true);
    expect(tracker.summary(players)).toEqual({ shown: false, yes: 2, active: 3 });
  });

  it('should clear every vote on reset', () => {
    const tracker = new DrawVoteTracker();
    tracker.vote('ENG', true);
    tracker.reset();
    expect(tracker.hasVoted('ENG')).toBe(false);
  });
});

describe('elimination', () => {
  const state = makeState(map, [unit('ENG', 'LON_C'), unit('FRA', 'PAR_L')], [['LON', 'ENG'], ['BER', 'FRA']]);

  it('should treat a player without units and centres as eliminated', () => {
    expect(isEliminated(state, 'GER')).toBe(true);
    expect(isEliminated(state, 'FRA')).toBe(false);
  });

  it('should list active players in map order', () => {
    expect(activePlayers(state)).toEqual(['ENG', 'FRA']);
  });
});

describe('computeDrawShares', () => {
  const state = makeState(
    map,
    [unit('ENG', 'LON_C'), unit('FRA', 'PAR_L')],
    [
      ['LON', 'ENG'],
      ['EDI', 'ENG'],
      ['LVP', 'ENG'],
      ['PAR', 'FRA'],
    ]
  );

  it('should split equally under DSS', () => {
    expect([...computeDrawShares(state, 'DSS')]).toEqual([
      ['ENG', 0.5],
      ['FRA', 0.5],
    ]);
  });

  it('should split by centre count under SoS', () => {
    expect([...computeDrawShares(state, 'SoS')]).toEqual([
      ['ENG', 0.75],
      ['FRA', 0.25],
    ]);
  });

  it('should split equally under SoS when nobody holds a centre', () => {
    const bare = makeState(map, [unit('ENG', 'NTH_C'), unit('GER', 'HEL_C')], []);
    expect([...computeDrawShares(bare, 'SoS')]).toEqual([
      ['ENG', 0.5],
      ['GER', 0.5],
    ]);
  });
});
