#!/usr/bin/env npx tsx
/**
 * CLI tool to view game logs.
 *
 * Usage:
 *   npx tsx src/logging/view-logs.ts                       # List all game logs
 *   npx tsx src/logging/view-logs.ts <gameId>              # View logs for a game
 *   npx tsx src/logging/view-logs.ts <gameId> --errors     # View only errors
 *   npx tsx src/logging/view-logs.ts <gameId> --tail 20    # View last 20 entries
 *   npx tsx src/logging/view-logs.ts <gameId> --type order_rejected,draw_vote
 *
 * DIPLOMACY_LOG_DIR selects the log directory.
 */

import { loadEnvConfig } from '../config/env';
import { filterLogsByType, getGameErrors, listGameLogs, readGameLogs, readRecentGameLogs } from './game-logger';
import type { GameLogEntry, GameLogEvent } from './game-logger';
import { formatLogEntry } from './log-format';

const EVENT_TYPES: ReadonlyArray<GameLogEvent['type']> = [
  'game_started',
  'game_ended',
  'phase_started',
  'phase_resolved',
  'orders_submitted',
  'order_rejected',
  'draw_vote',
  'press_sent',
  'error',
  'warning',
  'debug',
];

function parseTypes(raw: string | undefined): GameLogEvent['type'][] {
  const names = (raw ?? '').split(',');
  return EVENT_TYPES.filter((type) => names.includes(type));
}

function main(): void {
  const { DIPLOMACY_LOG_DIR: logsDir } = loadEnvConfig();
  const args = process.argv.slice(2);

  // No args - list all game logs
  if (args.length === 0) {
    const logs = listGameLogs(logsDir);
    if (logs.length === 0) {
      console.log(`No game logs found in ${logsDir}/`);
      return;
    }
    console.log('Available game logs:');
    console.log('─'.repeat(60));
    for (const log of logs) {
      const sizeKB = (log.size / 1024).toFixed(1);
      console.log(`  ${log.gameId} (${sizeKB} KB)`);
    }
    console.log('─'.repeat(60));
    return;
  }

  const gameId = args[0];
  const tailIdx = args.indexOf('--tail');
  const typeIdx = args.indexOf('--type');

  let logs: GameLogEntry[];

  if (args.includes('--errors')) {
    logs = getGameErrors(gameId, logsDir);
    console.log(`Errors for game ${gameId}:`);
  } else if (tailIdx !== -1) {
    const count = parseInt(args[tailIdx + 1] || '20', 10);
    logs = readRecentGameLogs(gameId, count, logsDir);
    console.log(`Last ${count} entries for game ${gameId}:`);
  } else {
    logs = readGameLogs(gameId, logsDir);
    console.log(`All logs for game ${gameId}:`);
  }

  if (typeIdx !== -1) {
    const types = parseTypes(args[typeIdx + 1]);
    logs = filterLogsByType(logs, types);
    console.log(`Filtered by type: ${types.join(', ')}`);
  }

  if (logs.length === 0) {
    console.log('No log entries found.');
    return;
  }

  console.log('─'.repeat(60));
  for (const entry of logs) {
    console.log(formatLogEntry(entry));
  }
  console.log('─'.repeat(60));
  console.log(`Total: ${logs.length} entries`);
}

main();
