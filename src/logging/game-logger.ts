/**
 * Game Logger - structured event log for a running game.
 *
 * Writes JSONL logs to logs/games/{gameId}.jsonl: phase transitions,
 * submitted and rejected orders, draw votes, press, and errors.
 */

import { existsSync, mkdirSync, appendFileSync, readFileSync, readdirSync, statSync } from 'fs';
import { join, dirname, basename } from 'path';
import { getPhaseLabel } from '../engine/game';
import { formatOrder } from '../engine/orders';
import type { GameEventCallback } from '../orchestration/types';

/**
 * Log event types.
 */
export type GameLogEvent =
  | { type: 'game_started'; gameId: string; players: string[] }
  | { type: 'game_ended'; gameId: string; winner?: string; draw?: boolean; phase: string }
  | { type: 'phase_started'; phase: string; acting: string[] }
  | { type: 'phase_resolved'; phase: string; next: string; standoffs: string[]; dislodged: string[] }
  | { type: 'orders_submitted'; player: string; orderCount: number }
  | { type: 'order_rejected'; player: string; order: string; reason: string }
  | { type: 'draw_vote'; player: string; vote: boolean }
  | { type: 'press_sent'; from: string; to: string; preview: string }
  | { type: 'error'; error: string; context?: string; stack?: string }
  | { type: 'warning'; message: string; context?: string }
  | { type: 'debug'; message: string; data?: unknown };

/**
 * Full log entry with metadata.
 */
export interface GameLogEntry {
  timestamp: string;
  gameId: string;
  event: GameLogEvent;
}

const LOG_EVENT_TYPES: ReadonlySet<string> = new Set([
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
]);

function defaultLogsDir(): string {
  return join(process.cwd(), 'logs', 'games');
}

/**
 * Game logger for a single game instance.
 */
export class GameLogger {
  private gameId: string;
  private logPath: string;
  private enabled: boolean;

  constructor(gameId: string, logsDir?: string) {
    this.gameId = gameId;
    this.logPath = join(logsDir || defaultLogsDir(), `${gameId}.jsonl`);
    this.enabled = true;

    const dir = dirname(this.logPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  /**
   * Appends an event to the game log file.
   */
  log(event: GameLogEvent): void {
    if (!this.enabled) return;

    const entry: GameLogEntry = {
      timestamp: new Date().toISOString(),
      gameId: this.gameId,
      event,
    };

    try {
      appendFileSync(this.logPath, JSON.stringify(entry) + '\n');
    } catch (error) {
      console.error(`[GameLogger] Failed to write log: ${error}`);
    }
  }

  gameStarted(players: string[]): void {
    this.log({ type: 'game_started', gameId: this.gameId, players });
  }

  gameEnded(phase: string, winner?: string, draw?: boolean): void {
    this.log({ type: 'game_ended', gameId: this.gameId, winner, draw, phase });
  }

  phaseStarted(phase: string, acting: string[]): void {
    this.log({ type: 'phase_started', phase, acting });
  }

  phaseResolved(phase: string, next: string, standoffs: string[], dislodged: string[]): void {
    this.log({ type: 'phase_resolved', phase, next, standoffs, dislodged });
  }

  ordersSubmitted(player: string, orderCount: number): void {
    this.log({ type: 'orders_submitted', player, orderCount });
  }

  orderRejected(player: string, order: string, reason: string): void {
    this.log({ type: 'order_rejected', player, order, reason });
  }

  drawVote(player: string, vote: boolean): void {
    this.log({ type: 'draw_vote', player, vote });
  }

  pressSent(from: string, to: string, preview: string): void {
    this.log({ type: 'press_sent', from, to, preview });
  }

  error(error: string, context?: string, stack?: string): void {
    this.log({ type: 'error', error, context, stack });
  }

  warning(message: string, context?: string): void {
    this.log({ type: 'warning', message, context });
  }

  debug(message: string, data?: unknown): void {
    this.log({ type: 'debug', message, data });
  }

  getLogPath(): string {
    return this.logPath;
  }

  /**
   * Disables logging (for tests).
   */
  disable(): void {
    this.enabled = false;
  }

  enable(): void {
    this.enabled = true;
  }
}

/**
 * Registry of active game loggers.
 */
const loggers = new Map<string, GameLogger>();

/**
 * Gets or creates a logger for a game.
 */
export function getGameLogger(gameId: string, logsDir?: string): GameLogger {
  let logger = loggers.get(gameId);
  if (!logger) {
    logger = new GameLogger(gameId, logsDir);
    loggers.set(gameId, logger);
  }
  return logger;
}

export function removeGameLogger(gameId: string): void {
  loggers.delete(gameId);
}

export function getActiveGameIds(): string[] {
  return Array.from(loggers.keys());
}

function isGameLogEntry(value: unknown): value is GameLogEntry {
  if (typeof value !== 'object' || value === null) return false;
  if (!('timestamp' in value) || !('gameId' in value) || !('event' in value)) return false;
  const { event } = value;
  return (
    typeof event === 'object' &&
    event !== null &&
    'type' in event &&
    typeof event.type === 'string' &&
    LOG_EVENT_TYPES.has(event.type)
  );
}

function parseLine(line: string): GameLogEntry | null {
  try {
    const parsed: unknown = JSON.parse(line);
    return isGameLogEntry(parsed) ? parsed : null;
  } catch {
    // torn final line from an interrupted write
    return null;
  }
}

/**
 * Reads all log entries from a game log file. Unreadable lines are skipped.
 */
export function readGameLogs(gameId: string, logsDir?: string): GameLogEntry[] {
  const logPath = join(logsDir || defaultLogsDir(), `${gameId}.jsonl`);

  if (!existsSync(logPath)) {
    return [];
  }

  const content = readFileSync(logPath, 'utf-8');
  return content
    .split('\n')
    .filter((line) => line.trim().length > 0)
    .map(parseLine)
    .filter((entry): entry is GameLogEntry => entry !== null);
}

export function readRecentGameLogs(gameId: string, count: number = 50, logsDir?: string): GameLogEntry[] {
  return readGameLogs(gameId, logsDir).slice(-count);
}

/**
 * Lists all available game log files.
 */
export function listGameLogs(logsDir?: string): { gameId: string; path: string; size: number }[] {
  const baseDir = logsDir || defaultLogsDir();

  if (!existsSync(baseDir)) {
    return [];
  }

  return readdirSync(baseDir)
    .filter((f) => f.endsWith('.jsonl'))
    .sort()
    .map((f) => {
      const fullPath = join(baseDir, f);
      return {
        gameId: basename(f, '.jsonl'),
        path: fullPath,
        size: statSync(fullPath).size,
      };
    });
}

export function filterLogsByType(logs: GameLogEntry[], types: GameLogEvent['type'][]): GameLogEntry[] {
  return logs.filter((entry) => types.includes(entry.event.type));
}

export function getGameErrors(gameId: string, logsDir?: string): GameLogEntry[] {
  return filterLogsByType(readGameLogs(gameId, logsDir), ['error']);
}

/**
 * Listener that mirrors state machine events into the game log.
 */
export function createEventLogger(logger: GameLogger): GameEventCallback {
  return (event) => {
    switch (event.type) {
      case 'ORDERS_SUBMITTED':
        logger.ordersSubmitted(event.player, event.orderCount);
        break;
      case 'DRAW_VOTE':
        logger.drawVote(event.player, event.vote);
        break;
      case 'BARRIER_TIMEOUT':
        logger.warning(`Ready timeout; defaulting ${event.unready.join(', ')}`, event.label);
        break;
      case 'PHASE_RESOLVED': {
        const { resolution } = event;
        for (const rejected of resolution.rejected) {
          logger.orderRejected(rejected.player, formatOrder(rejected.order), rejected.reason);
        }
        logger.phaseResolved(
          event.label,
          getPhaseLabel(resolution.state.phase),
          resolution.standoffs,
          resolution.state.dislodged.map((d) => d.part)
        );
        break;
      }
      case 'GAME_COMPLETED':
        logger.gameEnded(
          getPhaseLabel(event.finalPhase),
          event.outcome.kind === 'WIN' ? event.outcome.winner : undefined,
          event.outcome.kind === 'DRAW'
        );
        break;
      case 'PLAYER_READY':
        logger.debug(`${event.player} ready`, { pending: event.pending });
        break;
    }
  };
}
