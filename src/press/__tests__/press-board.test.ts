/**
 * Tests for press-board.ts
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PressBoard, PUBLIC_CHANNEL, formatPressLine } from '../press-board';
import type { PressMessage } from '../press-board';

describe('PressBoard', () => {
  let board: PressBoard;

  beforeEach(() => {
    board = new PressBoard(['ENG', 'FRA', 'GER']);
  });

  it('should store messages with increasing ids', () => {
    const first = board.send('ENG', 'FRA', 'Channel is yours', 'Phase 1 move');
    const second = board.send('GER', PUBLIC_CHANNEL, '  Peace in the north  ', 'Phase 1 move');

    expect(first).toEqual({ id: 1, from: 'ENG', to: 'FRA', content: 'Channel is yours', phase: 'Phase 1 move' });
    expect(second.id).toBe(2);
    expect(second.content).toBe('Peace in the north');
  });

  it('should reject unknown players and empty messages', () => {
    expect(() => board.send('ITA', 'FRA', 'hi', 'Phase 1 move')).toThrow('Unknown sender: ITA');
    expect(() => board.send('ENG', 'ITA', 'hi', 'Phase 1 move')).toThrow('Unknown recipient: ITA');
    expect(() => board.send('ENG', 'FRA', '   ', 'Phase 1 move')).toThrow('Press message is empty');
  });

  it('should read a channel', () => {
    board.send('ENG', 'FRA', 'a', 'Phase 1 move');
    board.send('GER', 'public', 'b', 'Phase 1 move');
    board.send('GER', 'FRA', 'c', 'Phase 1 move');

    expect(board.read('FRA').map((m) => m.content)).toEqual(['a', 'c']);
    expect(board.read('public').map((m) => m.content)).toEqual(['b']);
    expect(() => board.read('ITA')).toThrow('Unknown recipient: ITA');
  });

  it('should give each player their own view', () => {
    board.send('ENG', 'FRA', 'a', 'Phase 1 move');
    board.send('GER', 'public', 'b', 'Phase 1 move');
    board.send('FRA', 'GER', 'c', 'Phase 1 move');

    expect(board.viewFor('ENG').map((m) => m.content)).toEqual(['a', 'b']);
    expect(board.viewFor('GER').map((m) => m.content)).toEqual(['b', 'c']);
  });

  it('should notify listeners until they unsubscribe', () => {
    const received: PressMessage[] = [];
    const off = board.onMessage((m) => received.push(m));
    board.send('ENG', 'public', 'one', 'Phase 1 move');
    off();
    board.send('ENG', 'public', 'two', 'Phase 1 move');

    expect(received.map((m) => m.content)).toEqual(['one']);
  });

  it('should keep the message when a listener throws', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    board.onMessage(() => {
      throw new Error('listener failed');
    });
    board.send('ENG', 'public', 'still here', 'Phase 1 move');

    expect(board.all()).toHaveLength(1);
    expect(errorSpy).toHaveBeenCalledOnce();
    errorSpy.mockRestore();
  });

  it('should format press lines', () => {
    const message = board.send('FRA', 'public', 'hello', 'Phase 2 move');
    expect(formatPressLine(message)).toBe('FRA/public: hello');
  });
});
