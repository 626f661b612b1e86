/**
 * Fallback tiers for a player's projected points, in the order they are tried.
 */
export const ProjectionTier = {
  SEASON_PROJECTION: 'season_projection',
  WEEKLY_PROJECTIONS: 'weekly_projections',
  SEASON_ACTUAL: 'season_actual',
  WEEKLY_ACTUALS: 'weekly_actuals',
} as const;

export type ProjectionTierType = (typeof ProjectionTier)[keyof typeof ProjectionTier];

export interface ProjectedPoints {
  points: number | null;
  /** null when every tier came up empty */
  tier: ProjectionTierType | null;
}

/** One CSV row. Column order follows `PROJECTION_COLUMNS`. */
export interface ProjectionRow {
  readonly player_id: number | string | null;
  readonly name: string | null;
  readonly position_id: number | null;
  readonly team_id: number | null;
  readonly season: number;
  readonly proj_points: number | null;
}

export const PROJECTION_COLUMNS: ReadonlyArray<keyof ProjectionRow> = [
  'player_id',
  'name',
  'position_id',
  'team_id',
  'season',
  'proj_points',
];

export interface ExtractionResult {
  rows: ProjectionRow[];
  /** Entries in the payload, including skipped ones */
  playersSeen: number;
  skippedWithoutStats: number;
  skippedDuplicates: number;
  skippedInvalid: number;
  tierCounts: Record<ProjectionTierType | 'none', number>;
}

export interface ExportSummary {
  season: number;
  endpoint: string | null;
  jsonPath: string | null;
  csvPath: string;
  rows: number;
  rowsWithPoints: number;
  playersSeen: number;
  tierCounts: ExtractionResult['tierCounts'];
  positions: Record<string, number>;
}
