/**
 * Command-line session.
 *
 * Feeds parsed commands to the state machine and the press board, prints
 * what they produce, and keeps advancing phases as the ready barrier opens.
 */

import type { MapGraph } from '../engine/map';
import type { MapDefinition, RulesConfig } from '../engine/types';
import type { GameLogger } from '../logging/game-logger';
import { createEventLogger } from '../logging/game-logger';
import type { PhaseStateMachine } from '../orchestration/phase-machine';
import type { PressBoard } from '../press/press-board';
import { parseCommand } from './commands';
import type { Command } from './commands';
import {
  formatMapJSON,
  formatOutcome,
  formatPhaseBanner,
  formatPressLines,
  formatResolution,
  formatRulesJSON,
  formatVoteSummary,
} from './output';

export interface SessionIO {
  out(line: string): void;
  err(line: string): void;
}

export interface CliSessionOptions {
  machine: PhaseStateMachine;
  map: MapGraph;
  definition: MapDefinition;
  rules: RulesConfig;
  press: PressBoard;
  io: SessionIO;
  logger?: GameLogger;
}

export class CliSession {
  private readonly machine: PhaseStateMachine;
  private readonly options: CliSessionOptions;
  private loop: Promise<void> | null = null;
  private detach: Array<() => void> = [];
  /** Lines held back while a released phase resolves */
  private queued: string[] | null = null;
  private closeRequested = false;
  private closed = false;

  constructor(options: CliSessionOptions) {
    this.options = options;
    this.machine = options.machine;

    const { logger, press } = options;
    if (logger) {
      this.detach.push(this.machine.onEvent(createEventLogger(logger)));
      this.detach.push(press.onMessage((m) => logger.pressSent(m.from, m.to, m.content.slice(0, 80))));
    }
  }

  /**
   * Prints the opening banner and starts advancing phases.
   */
  start(): void {
    if (this.loop) return;

    const state = this.machine.getState();
    this.options.logger?.gameStarted(state.players.map((p) => p.id));
    this.announcePhase();

    if (state.outcome) {
      this.options.io.out(formatOutcome(state.outcome));
      this.loop = Promise.resolve();
      return;
    }
    this.loop = this.runLoop();
    this.holdIfReleased();
  }

  /**
   * Settles once the game is over or the session is closed.
   */
  finished(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  /**
   * Closes once held-back lines have been replayed.
   */
  closeWhenIdle(): void {
    if (this.queued === null) {
      this.close();
      return;
    }
    this.closeRequested = true;
  }

  close(): void {
    this.closed = true;
    for (const off of this.detach) off();
    this.detach = [];
    this.machine.close();
  }

  /**
   * Handles one input line. Problems are reported on the error stream and
   * never end the session.
   */
  handleLine(line: string): void {
    if (line.trim().length === 0) return;
    if (this.queued) {
      this.queued.push(line);
      return;
    }

    const parsed = parseCommand(line);
    if (!parsed.ok) {
      this.options.io.err(parsed.error);
      return;
    }

    try {
      this.execute(parsed.command);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.options.io.err(`Error: ${message}`);
      this.options.logger?.error(message, line.trim());
    }
  }

  private execute(command: Command): void {
    const { io, press } = this.options;

    switch (command.kind) {
      case 'order':
        this.machine.submitOrders(command.player, [command.order]);
        break;

      case 'draw':
        this.machine.vote(command.player, command.vote);
        break;

      case 'votes':
        io.out(formatVoteSummary(this.machine.getVoteSummary()));
        break;

      case 'press-send':
        press.send(command.from, command.to, command.message, this.machine.getPhaseLabel());
        break;

      case 'press-read':
        for (const line of formatPressLines(press.read(command.channel))) {
          io.out(line);
        }
        break;

      case 'ready':
        this.machine.setReady(command.player);
        this.holdIfReleased();
        break;

      case 'map':
        io.out(formatMapJSON(this.options.map, this.options.definition, this.machine.getState()));
        break;

      case 'rules':
        io.out(formatRulesJSON(this.options.rules));
        break;

      case 'phase':
        this.printBanner();
        break;
    }
  }

  /**
   * Once every acting player is ready the phase resolves on a later turn of
   * the event loop; input arriving before then belongs to the next phase.
   */
  private holdIfReleased(): void {
    if (this.loop && this.queued === null && !this.machine.isOver() && this.machine.pendingPlayers().length === 0) {
      this.queued = [];
    }
  }

  private drain(): void {
    const lines = this.queued ?? [];
    this.queued = null;
    this.holdIfReleased();
    for (const line of lines) {
      this.handleLine(line);
    }
    if (this.closeRequested && this.queued === null) {
      this.close();
    }
  }

  private announcePhase(): void {
    this.options.logger?.phaseStarted(this.machine.getPhaseLabel(), this.machine.actingPlayers());
    this.printBanner();
  }

  private printBanner(): void {
    for (const line of formatPhaseBanner(this.machine.getState())) {
      this.options.io.out(line);
    }
  }

  private async runLoop(): Promise<void> {
    const { io } = this.options;
    try {
      while (!this.closed && !this.machine.isOver()) {
        const resolution = await this.machine.advance();
        if (!resolution) return;

        for (const line of formatResolution(resolution)) {
          io.out(line);
        }
        io.out(formatMapJSON(this.options.map, this.options.definition, resolution.state));
        if (resolution.state.outcome) {
          io.out(formatOutcome(resolution.state.outcome));
          return;
        }
        this.announcePhase();
        this.drain();
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      io.err(`Error: ${message}`);
      this.options.logger?.error(message, 'phase loop', error instanceof Error ? error.stack : undefined);
    } finally {
      this.drain();
    }
  }
}
