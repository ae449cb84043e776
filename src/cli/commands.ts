/**
 * Line-oriented command grammar.
 *
 *   [diplomacy] --order <player> <part> M|V|R <dest>
 *   [diplomacy] --order <player> H|B|D <part>        (or <part> H|B|D)
 *   [diplomacy] --order <player> <part> S <target> [from <from>]
 *   [diplomacy] --order <player> <part> C <to> from <from>
 *   [diplomacy] --draw <player> 1|0                  (--draw alone shows the tally)
 *   [diplomacy] --press <from> <to|public> <message...>
 *   [diplomacy] --press <player|public>
 *   [diplomacy] --ready <player>
 *   [diplomacy] --map | --rules | --phase
 *
 * Parsing is purely syntactic; whether an order is legal is the validator's
 * call.
 */

import { build, convoy, disband, hold, move, retreat, supportHold, supportMove } from '../engine/orders';
import type { Order, PlayerId } from '../engine/types';

export type Command =
  | { kind: 'order'; player: PlayerId; order: Order }
  | { kind: 'draw'; player: PlayerId; vote: boolean }
  | { kind: 'votes' }
  | { kind: 'press-send'; from: PlayerId; to: string; message: string }
  | { kind: 'press-read'; channel: string }
  | { kind: 'ready'; player: PlayerId }
  | { kind: 'map' }
  | { kind: 'rules' }
  | { kind: 'phase' };

export type ParseResult = { ok: true; command: Command } | { ok: false; error: string };

export const USAGE: Record<string, string> = {
  '--order': 'Usage: --order <player> <part> M|V|R <dest> | H|B|D <part> | <part> S <target> [from <from>] | <part> C <to> from <from>',
  '--draw': 'Usage: --draw <player> 1|0',
  '--press': 'Usage: --press <from> <to|public> <message> | --press <player|public>',
  '--ready': 'Usage: --ready <player>',
};

function fail(error: string): ParseResult {
  return { ok: false, error };
}

function ok(command: Command): ParseResult {
  return { ok: true, command };
}

const STANDALONE_CODES = new Set(['H', 'B', 'D']);

/**
 * Parses the order tokens that follow the player name.
 */
export function parseOrder(tokens: readonly string[]): Order | null {
  if (tokens.length === 2) {
    const [first, second] = tokens;
    const code = STANDALONE_CODES.has(first.toUpperCase()) ? first.toUpperCase() : second.toUpperCase();
    const part = code === first.toUpperCase() ? second : first;
    switch (code) {
      case 'H':
        return hold(part);
      case 'B':
        return build(part);
      case 'D':
        return disband(part);
      default:
        return null;
    }
  }

  const [unit, rawCode, target, keyword, from] = tokens;
  const code = rawCode?.toUpperCase();

  if (tokens.length === 3) {
    switch (code) {
      case 'M':
        return move(unit, target);
      case 'V':
        return move(unit, target, true);
      case 'R':
        return retreat(unit, target);
      case 'S':
        return supportHold(unit, target);
      default:
        return null;
    }
  }

  if (tokens.length === 5 && keyword.toLowerCase() === 'from') {
    switch (code) {
      case 'S':
        return supportMove(unit, from, target);
      case 'C':
        return convoy(unit, from, target);
      default:
        return null;
    }
  }

  return null;
}

export function parseCommand(line: string): ParseResult {
  const tokens = line.trim().split(/\s+/).filter((t) => t.length > 0);
  if (tokens[0] === 'diplomacy') {
    tokens.shift();
  }
  if (tokens.length === 0) {
    return fail('Empty command');
  }

  const [flag, ...args] = tokens;
  switch (flag) {
    case '--order': {
      const [player, ...rest] = args;
      const order = player ? parseOrder(rest) : null;
      return player && order ? ok({ kind: 'order', player, order }) : fail(USAGE['--order']);
    }

    case '--draw': {
      if (args.length === 0) return ok({ kind: 'votes' });
      const [player, flagValue] = args;
      if (args.length !== 2 || (flagValue !== '1' && flagValue !== '0')) {
        return fail(USAGE['--draw']);
      }
      return ok({ kind: 'draw', player, vote: flagValue === '1' });
    }

    case '--press': {
      if (args.length === 1) return ok({ kind: 'press-read', channel: args[0] });
      if (args.length < 3) return fail(USAGE['--press']);
      const [from, to, ...words] = args;
      return ok({ kind: 'press-send', from, to, message: words.join(' ') });
    }

    case '--ready':
      return args.length === 1 ? ok({ kind: 'ready', player: args[0] }) : fail(USAGE['--ready']);

    case '--map':
      return ok({ kind: 'map' });
    case '--rules':
      return ok({ kind: 'rules' });
    case '--phase':
      return ok({ kind: 'phase' });

    default:
      return fail(`Unknown command: ${flag}`);
  }
}
