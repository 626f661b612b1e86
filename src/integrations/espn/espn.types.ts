import { z } from 'zod';

/** ESPN tags arrive as integers, occasionally as numeric strings. */
const statTagSchema = z.union([
  z.number().int(),
  z
    .string()
    .regex(/^\d+$/)
    .transform((val) => parseInt(val, 10)),
]);

/** An unparseable tag reads as missing. */
const optionalTagSchema = statTagSchema.nullish().catch(null);

/**
 * One entry of a player's `stats` collection. Only the three tags decide
 * whether a block is usable; other fields are passed through untyped.
 */
export const espnStatBlockSchema = z.object({
  /** 0 = season aggregate, >= 1 = week */
  scoringPeriodId: optionalTagSchema,
  /** 0 or 2 = season split, 1 = weekly split */
  statSplitTypeId: optionalTagSchema,
  /** 1 = projection, 0 = actual */
  statSourceId: optionalTagSchema,
  appliedTotal: z.unknown().optional(),
  appliedStats: z.unknown().optional(),
});

export type EspnStatBlock = z.infer<typeof espnStatBlockSchema>;

/**
 * Player metadata is copied into the row as far as it can be read; a bad
 * `stats` value is the only thing that rejects a player.
 */
export const espnPlayerSchema = z.object({
  id: z.union([z.number(), z.string()]).nullish().catch(null),
  fullName: z
    .union([z.string(), z.number().transform((val) => String(val))])
    .nullish()
    .catch(null),
  defaultPositionId: optionalTagSchema,
  proTeamId: optionalTagSchema,
  stats: z.array(z.unknown()).nullish(),
});

/** ESPN default position ids for fantasy-relevant positions */
export const ESPN_POSITIONS: Record<number, string> = {
  1: 'QB',
  2: 'RB',
  3: 'WR',
  4: 'TE',
  5: 'K',
  16: 'D/ST',
};

export const StatSource = {
  ACTUAL: 0,
  PROJECTION: 1,
} as const;

export type StatSourceId = (typeof StatSource)[keyof typeof StatSource];

export const StatSplitType = {
  SEASON: 0,
  WEEKLY: 1,
  SEASON_ALT: 2,
} as const;

export const SEASON_SCORING_PERIOD = 0;
