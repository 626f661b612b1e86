import {
  EspnStatBlock,
  espnPlayerSchema,
  espnStatBlockSchema,
  SEASON_SCORING_PERIOD,
  StatSource,
  StatSourceId,
  StatSplitType,
} from '../../integrations/espn/espn.types';
import { isRecord } from './payload.utils';
import {
  ExtractionResult,
  ProjectedPoints,
  ProjectionRow,
  ProjectionTier,
  ProjectionTierType,
} from './projections.model';

type AppliedTotalSource = Pick<EspnStatBlock, 'appliedTotal' | 'appliedStats'>;

/**
 * ESPN's fantasy points for one stat block.
 *
 * A numeric `appliedTotal` wins. Otherwise the numeric values of
 * `appliedStats` are summed; a mapping with no numeric values yields null,
 * which is not the same as a total of 0.
 */
export function resolveAppliedTotal(block: AppliedTotalSource): number | null {
  if (typeof block.appliedTotal === 'number' && Number.isFinite(block.appliedTotal)) {
    return block.appliedTotal;
  }

  const applied = block.appliedStats;
  if (!isRecord(applied)) return null;

  let total = 0;
  let found = false;
  for (const value of Object.values(applied)) {
    if (typeof value === 'number' && Number.isFinite(value)) {
      total += value;
      found = true;
    }
  }

  return found ? total : null;
}

interface IndexedBlock {
  position: number;
  block: EspnStatBlock;
}

function statKey(scoringPeriodId: number, statSplitTypeId: number, statSourceId: number): string {
  return `${scoringPeriodId}:${statSplitTypeId}:${statSourceId}`;
}

function byPosition(a: IndexedBlock, b: IndexedBlock): number {
  return a.position - b.position;
}

/**
 * A player's stat blocks keyed by (scoringPeriodId, statSplitTypeId, statSourceId).
 * Blocks missing any of the three tags are left out. Lookups return blocks in
 * their original order.
 */
export class StatBlockIndex {
  private readonly byKey = new Map<string, IndexedBlock[]>();
  private readonly weeklyPeriods = new Set<number>();

  constructor(blocks: EspnStatBlock[]) {
    blocks.forEach((block, position) => {
      const { scoringPeriodId, statSplitTypeId, statSourceId } = block;
      if (scoringPeriodId == null || statSplitTypeId == null || statSourceId == null) return;

      const key = statKey(scoringPeriodId, statSplitTypeId, statSourceId);
      const bucket = this.byKey.get(key);
      if (bucket) {
        bucket.push({ position, block });
      } else {
        this.byKey.set(key, [{ position, block }]);
      }

      if (scoringPeriodId >= 1) this.weeklyPeriods.add(scoringPeriodId);
    });
  }

  /** First season-level block (split 0 or 2) for a source, in collection order */
  seasonBlock(source: StatSourceId): EspnStatBlock | null {
    const candidates = [
      ...this.entries(SEASON_SCORING_PERIOD, StatSplitType.SEASON, source),
      ...this.entries(SEASON_SCORING_PERIOD, StatSplitType.SEASON_ALT, source),
    ].sort(byPosition);

    return candidates.length > 0 ? candidates[0].block : null;
  }

  /** Every weekly-split block with scoringPeriodId >= 1 for a source */
  weeklyBlocks(source: StatSourceId): EspnStatBlock[] {
    const matches: IndexedBlock[] = [];
    for (const period of this.weeklyPeriods) {
      matches.push(...this.entries(period, StatSplitType.WEEKLY, source));
    }
    return matches.sort(byPosition).map((entry) => entry.block);
  }

  private entries(scoringPeriodId: number, statSplitTypeId: number, statSourceId: number): IndexedBlock[] {
    return this.byKey.get(statKey(scoringPeriodId, statSplitTypeId, statSourceId)) ?? [];
  }
}

function seasonTotal(index: StatBlockIndex, source: StatSourceId): number | null {
  const block = index.seasonBlock(source);
  return block ? resolveAppliedTotal(block) : null;
}

function weeklyTotal(index: StatBlockIndex, source: StatSourceId): number | null {
  let total = 0;
  let found = false;
  for (const block of index.weeklyBlocks(source)) {
    const points = resolveAppliedTotal(block);
    if (points !== null) {
      total += points;
      found = true;
    }
  }
  return found ? total : null;
}

const TIERS: ReadonlyArray<{
  tier: ProjectionTierType;
  resolve: (index: StatBlockIndex) => number | null;
}> = [
  { tier: ProjectionTier.SEASON_PROJECTION, resolve: (index) => seasonTotal(index, StatSource.PROJECTION) },
  { tier: ProjectionTier.WEEKLY_PROJECTIONS, resolve: (index) => weeklyTotal(index, StatSource.PROJECTION) },
  { tier: ProjectionTier.SEASON_ACTUAL, resolve: (index) => seasonTotal(index, StatSource.ACTUAL) },
  { tier: ProjectionTier.WEEKLY_ACTUALS, resolve: (index) => weeklyTotal(index, StatSource.ACTUAL) },
];

/**
 * Projected points for one player: the first tier with a usable total wins.
 */
export function resolveProjectedPoints(blocks: EspnStatBlock[]): ProjectedPoints {
  const index = new StatBlockIndex(blocks);

  for (const { tier, resolve } of TIERS) {
    const points = resolve(index);
    if (points !== null) {
      return { points, tier };
    }
  }

  return { points: null, tier: null };
}

/**
 * Validate raw stat entries, dropping anything that is not a stat block.
 */
export function parseStatBlocks(rawStats: unknown[]): EspnStatBlock[] {
  const blocks: EspnStatBlock[] = [];
  for (const raw of rawStats) {
    const parsed = espnStatBlockSchema.safeParse(raw);
    if (parsed.success) blocks.push(parsed.data);
  }
  return blocks;
}

// kona_player_info wraps each player as { player: {...}, ... }
function unwrapPlayer(entry: unknown): unknown {
  if (isRecord(entry) && isRecord(entry.player)) return entry.player;
  return entry;
}

/**
 * Flatten a player list into one row per player that has stats.
 * Players without a stats collection, or with an empty one, are left out;
 * a repeated player id keeps its first occurrence.
 */
export function extractProjectionRows(players: unknown[], season: number): ExtractionResult {
  const result: ExtractionResult = {
    rows: [],
    playersSeen: 0,
    skippedWithoutStats: 0,
    skippedDuplicates: 0,
    skippedInvalid: 0,
    tierCounts: {
      [ProjectionTier.SEASON_PROJECTION]: 0,
      [ProjectionTier.WEEKLY_PROJECTIONS]: 0,
      [ProjectionTier.SEASON_ACTUAL]: 0,
      [ProjectionTier.WEEKLY_ACTUALS]: 0,
      none: 0,
    },
  };
  const seenIds = new Set<string>();

  for (const entry of players) {
    result.playersSeen++;

    const parsed = espnPlayerSchema.safeParse(unwrapPlayer(entry));
    if (!parsed.success) {
      result.skippedInvalid++;
      continue;
    }

    const player = parsed.data;
    if (!player.stats || player.stats.length === 0) {
      result.skippedWithoutStats++;
      continue;
    }

    const playerId = player.id ?? null;
    if (playerId !== null) {
      if (seenIds.has(String(playerId))) {
        result.skippedDuplicates++;
        continue;
      }
      seenIds.add(String(playerId));
    }

    const { points, tier } = resolveProjectedPoints(parseStatBlocks(player.stats));
    result.tierCounts[tier ?? 'none']++;

    const row: ProjectionRow = Object.freeze({
      player_id: playerId,
      name: player.fullName ?? null,
      position_id: player.defaultPositionId ?? null,
      team_id: player.proTeamId ?? null,
      season,
      proj_points: points,
    });
    result.rows.push(row);
  }

  return result;
}
