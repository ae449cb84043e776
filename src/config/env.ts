/**
 * Environment variable schema for the command-line front end.
 */

import { z } from 'zod';
import { GameSetupError } from './errors';
import { describeIssues } from './schemas';

export const EnvSchema = z.object({
  /** Map description file */
  DIPLOMACY_MAP: z.string().min(1).default('map.json'),

  /** Rules description file */
  DIPLOMACY_RULES: z.string().min(1).default('rules.json'),

  /** Phase log written after every phase */
  DIPLOMACY_LOG: z.string().min(1).default('log.json'),

  /** Directory for the JSONL event log */
  DIPLOMACY_LOG_DIR: z.string().min(1).default('logs/games'),

  /** Optional SQLite archive */
  DIPLOMACY_DB: z.string().min(1).optional(),

  /** Milliseconds to wait for ready signals; 0 waits indefinitely */
  DIPLOMACY_READY_TIMEOUT_MS: z.coerce.number().int().min(0).default(0),

  DIPLOMACY_GAME_ID: z.string().min(1).default('local'),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

/**
 * Validates the environment; throws GameSetupError(ENV_INVALID).
 */
export function loadEnvConfig(env: Record<string, string | undefined> = process.env): EnvConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new GameSetupError('ENV_INVALID', 'Invalid environment configuration', describeIssues(parsed.error));
  }
  return parsed.data;
}
