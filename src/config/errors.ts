/**
 * Setup errors.
 *
 * Anything that prevents a game from starting (unreadable or invalid map,
 * rules or environment) is a GameSetupError. The CLI reports it and exits
 * with a non-zero status; nothing inside a running game throws one.
 */

export type SetupErrorCode =
  | 'MAP_UNREADABLE'
  | 'MAP_INVALID'
  | 'RULES_UNREADABLE'
  | 'RULES_INVALID'
  | 'ENV_INVALID';

export class GameSetupError extends Error {
  readonly code: SetupErrorCode;
  readonly details: readonly string[];

  constructor(code: SetupErrorCode, message: string, details: readonly string[] = []) {
    super(message);
    this.name = 'GameSetupError';
    this.code = code;
    this.details = details;
  }

  /**
   * Multi-line diagnostic for stderr.
   */
  toDiagnostic(): string {
    const lines = [`${this.code}: ${this.message}`];
    for (const detail of this.details) {
      lines.push(`  - ${detail}`);
    }
    return lines.join('\n');
  }
}

export function isGameSetupError(error: unknown): error is GameSetupError {
  return error instanceof GameSetupError;
}
