/**
 * One-line rendering of game log entries.
 */

import type { GameLogEntry } from './game-logger';

/** HH:MM:SS of an ISO timestamp, in UTC. */
function formatTimestamp(ts: string): string {
  return ts.length >= 19 ? ts.slice(11, 19) : ts;
}

export function formatLogEntry(entry: GameLogEntry): string {
  const time = formatTimestamp(entry.timestamp);
  const event = entry.event;

  switch (event.type) {
    case 'game_started':
      return `${time} [START] Game: ${event.gameId} (${event.players.join(', ')})`;
    case 'game_ended':
      return `${time} [END] ${event.phase}: ${event.draw ? 'draw' : `winner ${event.winner ?? 'none'}`}`;
    case 'phase_started':
      return `${time} [PHASE] ${event.phase} - acting: ${event.acting.join(', ') || 'none'}`;
    case 'phase_resolved':
      return `${time} [RESOLVED] ${event.phase} -> ${event.next} (standoffs: ${event.standoffs.length}, dislodged: ${event.dislodged.length})`;
    case 'orders_submitted':
      return `${time} [ORDERS] ${event.player}: ${event.orderCount}`;
    case 'order_rejected':
      return `${time} [REJECTED] ${event.player} ${event.order}: ${event.reason}`;
    case 'draw_vote':
      return `${time} [VOTE] ${event.player}: ${event.vote ? 'yes' : 'no'}`;
    case 'press_sent':
      return `${time} [PRESS] ${event.from} -> ${event.to}: "${event.preview}"`;
    case 'error':
      return `${time} [ERROR] ${event.error} (${event.context ?? 'no context'})`;
    case 'warning':
      return `${time} [WARN] ${event.message}`;
    case 'debug':
      return `${time} [DEBUG] ${event.message}`;
  }
}
