/**
 * Zod schemas for the map and rules description files.
 *
 * Both files come from hand-edited JSON, so flags are accepted as booleans,
 * 0/1 or "0"/"1", and "None" stands for null.
 */

import { z } from 'zod';

export const FlagSchema = z
  .union([z.boolean(), z.literal(0), z.literal(1), z.literal('0'), z.literal('1')])
  .transform((value) => value === true || value === 1 || value === '1');

export const NullableNameSchema = z
  .union([z.string(), z.null()])
  .optional()
  .transform((value) => (value === undefined || value === null || value === '' || value === 'None' ? null : value));

/** Keys of a territory entry that are not parts */
export const RESERVED_TERRITORY_KEYS: ReadonlySet<string> = new Set(['center', 'initPlayer', 'initPart']);

export const TerritoryIdSchema = z.string().regex(/^[A-Za-z0-9]+$/, 'territory ids are alphanumeric');

export const TerritoryMetaSchema = z.object({
  center: FlagSchema.default(0),
  initPlayer: NullableNameSchema,
  initPart: NullableNameSchema,
});

export const NeighborListSchema = z.array(z.string().min(1));

export const MapFileSchema = z.record(TerritoryIdSchema, z.record(z.string(), z.unknown()));

export const BuildRuleSchema = z.enum(['initCenters', 'allCenters']);

export const DrawTypeSchema = z.enum(['DSS', 'SoS']);

export const RulesFileSchema = z.object({
  winCondition: z.coerce.number().int().positive(),
  buildRule: BuildRuleSchema,
  /** A cadence of 1 would make every phase a build phase */
  buildTime: z.coerce.number().int().min(2),
  voteShown: FlagSchema.default(1),
  drawType: DrawTypeSchema,
});

export type RulesFile = z.infer<typeof RulesFileSchema>;

/**
 * Formats zod issues as "path: message" lines.
 */
export function describeIssues(error: z.ZodError, prefix: readonly (string | number)[] = []): string[] {
  return error.issues.map((issue) => {
    const path = [...prefix, ...issue.path].join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
