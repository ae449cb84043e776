#!/usr/bin/env node
/**
 * Diplomacy command-line front end.
 *
 * Usage:
 *   npx tsx src/cli/index.ts [command]
 *
 * Reads commands from stdin, one per line (see commands.ts for the grammar).
 * A command given on the command line runs first.
 *
 * Environment:
 *   DIPLOMACY_MAP               Map description (default map.json)
 *   DIPLOMACY_RULES             Rules description (default rules.json)
 *   DIPLOMACY_LOG               Phase log (default log.json)
 *   DIPLOMACY_LOG_DIR           JSONL event logs (default logs/games)
 *   DIPLOMACY_DB                SQLite archive; resumes the game when set
 *   DIPLOMACY_READY_TIMEOUT_MS  Ready timeout, 0 to wait forever
 *   DIPLOMACY_GAME_ID           Game id for logs and the archive
 *
 * Example:
 *   DIPLOMACY_MAP=maps/north-sea.json DIPLOMACY_RULES=maps/rules.json npx tsx src/cli/index.ts
 */

import * as readline from 'readline';
import { loadEnvConfig } from '../config/env';
import { isGameSetupError } from '../config/errors';
import { loadMapFile, loadRulesFile } from '../config/loader';
import { closeDb, openDb } from '../db';
import { stateFromJSON } from '../engine/game';
import { MapGraph } from '../engine/map';
import type { GameState } from '../engine/types';
import { getGameLogger } from '../logging/game-logger';
import { PhaseStateMachine } from '../orchestration/phase-machine';
import type { PhaseRecorder } from '../orchestration/types';
import { PressBoard } from '../press/press-board';
import { GameArchive } from '../store/game-archive';
import { PhaseLog } from '../store/phase-log';
import { CliSession } from './session';

async function main(): Promise<void> {
  const env = loadEnvConfig();
  const definition = loadMapFile(env.DIPLOMACY_MAP);
  const rules = loadRulesFile(env.DIPLOMACY_RULES);
  const map = new MapGraph(definition);
  const gameId = env.DIPLOMACY_GAME_ID;

  const phaseLog = new PhaseLog(env.DIPLOMACY_LOG);
  const recorders: PhaseRecorder[] = [phaseLog];
  const press = new PressBoard(map.playerIds());
  let resumed: GameState | undefined;

  if (env.DIPLOMACY_DB) {
    const archive = new GameArchive(openDb(env.DIPLOMACY_DB));
    archive.createGame(gameId, map.playerIds(), rules);

    const latest = archive.getLatestState(gameId);
    if (latest) {
      resumed = stateFromJSON(latest, map);
      phaseLog.restore(archive.getPhaseLog(gameId));
      press.load(archive.getPress(gameId).map((m, i) => ({ ...m, id: i + 1 })));
    }

    recorders.push(archive);
    press.onMessage((m) => archive.recordPress(gameId, m));
  }

  const machine = new PhaseStateMachine(
    map,
    rules,
    { gameId, readyTimeoutMs: env.DIPLOMACY_READY_TIMEOUT_MS },
    recorders,
    resumed
  );

  const session = new CliSession({
    machine,
    map,
    definition,
    rules,
    press,
    io: {
      out: (line) => console.log(line),
      err: (line) => console.error(line),
    },
    logger: getGameLogger(gameId, env.DIPLOMACY_LOG_DIR),
  });

  session.start();

  const initial = process.argv.slice(2).join(' ');
  if (initial.length > 0) {
    session.handleLine(initial);
  }

  const rl = readline.createInterface({ input: process.stdin, terminal: false });
  rl.on('line', (line) => session.handleLine(line));
  rl.on('close', () => session.closeWhenIdle());

  await session.finished();
  rl.close();
  closeDb();
}

main().catch((error: unknown) => {
  if (isGameSetupError(error)) {
    console.error(error.toDiagnostic());
  } else {
    console.error('Fatal error:', error);
  }
  process.exit(1);
});
