import {
  extractProjectionRows,
  parseStatBlocks,
  resolveAppliedTotal,
  resolveProjectedPoints,
  StatBlockIndex,
} from '../../../modules/projections/projection-extractor';
import { EspnStatBlock } from '../../../integrations/espn/espn.types';
import { ProjectionTier } from '../../../modules/projections/projections.model';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Build a stat block, defaulting to the season projection tags. */
function makeBlock(overrides: Partial<EspnStatBlock> = {}): EspnStatBlock {
  return {
    scoringPeriodId: 0,
    statSplitTypeId: 0,
    statSourceId: 1,
    ...overrides,
  };
}

function weekly(week: number, statSourceId: number, appliedTotal: number): EspnStatBlock {
  return makeBlock({ scoringPeriodId: week, statSplitTypeId: 1, statSourceId, appliedTotal });
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('projection-extractor', () => {
  describe('resolveAppliedTotal', () => {
    it('uses appliedTotal verbatim', () => {
      expect(resolveAppliedTotal({ appliedTotal: 123.4 })).toBe(123.4);
    });

    it('prefers appliedTotal over appliedStats', () => {
      expect(resolveAppliedTotal({ appliedTotal: 5, appliedStats: { pts: 100 } })).toBe(5);
    });

    it('sums appliedStats when appliedTotal is absent', () => {
      expect(resolveAppliedTotal({ appliedStats: { pts: 4, yds: 10 } })).toBe(14);
    });

    it('ignores non-numeric appliedStats values', () => {
      expect(resolveAppliedTotal({ appliedStats: { pts: 4, note: 'x', yds: null } })).toBe(4);
    });

    it('falls back to appliedStats when appliedTotal is null', () => {
      expect(resolveAppliedTotal({ appliedTotal: null, appliedStats: { pts: 2 } })).toBe(2);
    });

    it('returns null, not 0, for an empty appliedStats mapping', () => {
      expect(resolveAppliedTotal({ appliedStats: {} })).toBeNull();
    });

    it('returns null for appliedStats without numeric values', () => {
      expect(resolveAppliedTotal({ appliedStats: { a: 'x', b: null } })).toBeNull();
    });

    it('keeps a legitimate zero', () => {
      expect(resolveAppliedTotal({ appliedStats: { pts: 0 } })).toBe(0);
      expect(resolveAppliedTotal({ appliedTotal: 0 })).toBe(0);
    });

    it('ignores appliedStats that is not a mapping', () => {
      expect(resolveAppliedTotal({ appliedStats: [1, 2] })).toBeNull();
      expect(resolveAppliedTotal({ appliedTotal: 12, appliedStats: [] })).toBe(12);
    });

    it('returns null when neither field is present', () => {
      expect(resolveAppliedTotal({})).toBeNull();
    });
  });

  describe('StatBlockIndex', () => {
    it('returns the first season block in collection order across splits 0 and 2', () => {
      const split2 = makeBlock({ statSplitTypeId: 2, appliedTotal: 2 });
      const split0 = makeBlock({ statSplitTypeId: 0, appliedTotal: 0.5 });
      const index = new StatBlockIndex([split2, split0]);

      expect(index.seasonBlock(1)).toBe(split2);
    });

    it('returns null when no season block exists for the source', () => {
      const index = new StatBlockIndex([makeBlock({ statSourceId: 0 })]);
      expect(index.seasonBlock(1)).toBeNull();
    });

    it('collects weekly blocks in collection order', () => {
      const w3 = weekly(3, 1, 3);
      const w1 = weekly(1, 1, 1);
      const actual = weekly(2, 0, 9);
      const index = new StatBlockIndex([w3, actual, w1]);

      expect(index.weeklyBlocks(1)).toEqual([w3, w1]);
      expect(index.weeklyBlocks(0)).toEqual([actual]);
    });

    it('leaves out blocks missing a tag', () => {
      const index = new StatBlockIndex([makeBlock({ scoringPeriodId: null, appliedTotal: 7 })]);
      expect(index.seasonBlock(1)).toBeNull();
      expect(index.weeklyBlocks(1)).toEqual([]);
    });
  });

  describe('resolveProjectedPoints', () => {
    it('uses the season projection when present', () => {
      const result = resolveProjectedPoints([
        makeBlock({ appliedTotal: 123.4 }),
        weekly(1, 1, 50),
        makeBlock({ statSourceId: 0, appliedTotal: 99 }),
      ]);
      expect(result).toEqual({ points: 123.4, tier: ProjectionTier.SEASON_PROJECTION });
    });

    it('sums weekly projections when there is no season projection', () => {
      const result = resolveProjectedPoints([weekly(1, 1, 10.0), weekly(2, 1, 12.5), weekly(3, 1, 0.0)]);
      expect(result).toEqual({ points: 22.5, tier: ProjectionTier.WEEKLY_PROJECTIONS });
    });

    it('uses season actuals when there are no projection blocks', () => {
      const result = resolveProjectedPoints([makeBlock({ statSourceId: 0, appliedTotal: 88.0 })]);
      expect(result).toEqual({ points: 88, tier: ProjectionTier.SEASON_ACTUAL });
    });

    it('prefers summed weekly projections over season actuals', () => {
      const result = resolveProjectedPoints([
        makeBlock({ statSourceId: 0, appliedTotal: 88 }),
        weekly(1, 1, 6),
      ]);
      expect(result).toEqual({ points: 6, tier: ProjectionTier.WEEKLY_PROJECTIONS });
    });

    it('sums weekly actuals as the last tier', () => {
      const result = resolveProjectedPoints([weekly(1, 0, 7), weekly(2, 0, 8)]);
      expect(result).toEqual({ points: 15, tier: ProjectionTier.WEEKLY_ACTUALS });
    });

    it('falls through a season projection whose total is unusable', () => {
      const result = resolveProjectedPoints([makeBlock({ appliedStats: {} }), weekly(1, 1, 4)]);
      expect(result).toEqual({ points: 4, tier: ProjectionTier.WEEKLY_PROJECTIONS });
    });

    it('skips weekly projections when none contributes a number', () => {
      const result = resolveProjectedPoints([
        makeBlock({ scoringPeriodId: 1, statSplitTypeId: 1, appliedStats: {} }),
        makeBlock({ statSourceId: 0, appliedTotal: 30 }),
      ]);
      expect(result).toEqual({ points: 30, tier: ProjectionTier.SEASON_ACTUAL });
    });

    it('reports a zero weekly total as zero, not as missing', () => {
      const result = resolveProjectedPoints([weekly(1, 1, 0), makeBlock({ statSourceId: 0, appliedTotal: 30 })]);
      expect(result).toEqual({ points: 0, tier: ProjectionTier.WEEKLY_PROJECTIONS });
    });

    it('ignores weekly-split blocks with scoring period 0', () => {
      const result = resolveProjectedPoints([
        makeBlock({ scoringPeriodId: 0, statSplitTypeId: 1, appliedTotal: 40 }),
      ]);
      expect(result).toEqual({ points: null, tier: null });
    });

    it('returns null when every tier is empty', () => {
      expect(resolveProjectedPoints([])).toEqual({ points: null, tier: null });
    });
  });

  describe('parseStatBlocks', () => {
    it('accepts numeric-string tags and drops non-object entries', () => {
      const blocks = parseStatBlocks([
        { scoringPeriodId: '0', statSplitTypeId: '0', statSourceId: '1', appliedTotal: 12 },
        'garbage',
        42,
      ]);
      expect(blocks).toHaveLength(1);
      expect(blocks[0].statSourceId).toBe(1);
      expect(blocks[0].scoringPeriodId).toBe(0);
    });

    it('keeps blocks whose untagged fields have unexpected types', () => {
      const blocks = parseStatBlocks([
        { seasonId: '2025', scoringPeriodId: 0, statSplitTypeId: 0, statSourceId: 1, appliedTotal: 77 },
        { scoringPeriodId: 0, statSplitTypeId: 0, statSourceId: 1, appliedTotal: 12, appliedStats: [] },
      ]);
      expect(blocks).toHaveLength(2);
      expect(resolveAppliedTotal(blocks[0])).toBe(77);
      expect(resolveAppliedTotal(blocks[1])).toBe(12);
    });

    it('reads an unparseable tag as missing', () => {
      const blocks = parseStatBlocks([
        { scoringPeriodId: 'week-1', statSplitTypeId: 1, statSourceId: 1, appliedTotal: 5 },
      ]);
      expect(blocks).toHaveLength(1);
      expect(blocks[0].scoringPeriodId).toBeNull();
      expect(resolveProjectedPoints(blocks)).toEqual({ points: null, tier: null });
    });
  });

  describe('extractProjectionRows', () => {
    const players = [
      {
        id: 3139477,
        fullName: 'Alpha Passer',
        defaultPositionId: 1,
        proTeamId: 2,
        stats: [{ scoringPeriodId: 0, statSplitTypeId: 0, statSourceId: 1, appliedTotal: 123.4 }],
      },
      {
        id: 4241389,
        fullName: 'Bravo Runner',
        defaultPositionId: 2,
        proTeamId: 25,
        stats: [
          { scoringPeriodId: 1, statSplitTypeId: 1, statSourceId: 1, appliedTotal: 10.0 },
          { scoringPeriodId: 2, statSplitTypeId: 1, statSourceId: 1, appliedTotal: 12.5 },
          { scoringPeriodId: 3, statSplitTypeId: 1, statSourceId: 1, appliedTotal: 0.0 },
        ],
      },
      { id: 15847, fullName: 'Charlie Kicker', defaultPositionId: 5, proTeamId: 9 },
    ];

    it('emits one row per player with stats', () => {
      const result = extractProjectionRows(players, 2025);

      expect(result.rows).toEqual([
        {
          player_id: 3139477,
          name: 'Alpha Passer',
          position_id: 1,
          team_id: 2,
          season: 2025,
          proj_points: 123.4,
        },
        {
          player_id: 4241389,
          name: 'Bravo Runner',
          position_id: 2,
          team_id: 25,
          season: 2025,
          proj_points: 22.5,
        },
      ]);
      expect(result.playersSeen).toBe(3);
      expect(result.skippedWithoutStats).toBe(1);
    });

    it('excludes a player whose stats collection is empty', () => {
      const result = extractProjectionRows([{ id: 1, fullName: 'Empty', stats: [] }], 2025);
      expect(result.rows).toEqual([]);
      expect(result.skippedWithoutStats).toBe(1);
    });

    it('emits a null proj_points row when stats exist but no tier resolves', () => {
      const result = extractProjectionRows(
        [{ id: 7, fullName: 'No Points', stats: [{ scoringPeriodId: 0, statSplitTypeId: 0, statSourceId: 1 }] }],
        2024
      );
      expect(result.rows).toEqual([
        { player_id: 7, name: 'No Points', position_id: null, team_id: null, season: 2024, proj_points: null },
      ]);
      expect(result.tierCounts.none).toBe(1);
    });

    it('unwraps kona_player_info entries', () => {
      const result = extractProjectionRows(
        [{ id: 99, onTeamId: 0, player: players[0] }],
        2025
      );
      expect(result.rows).toHaveLength(1);
      expect(result.rows[0].player_id).toBe(3139477);
    });

    it('keeps only the first occurrence of a player id', () => {
      const result = extractProjectionRows([players[0], players[0], players[1]], 2025);
      expect(result.rows.map((row) => row.player_id)).toEqual([3139477, 4241389]);
      expect(result.skippedDuplicates).toBe(1);
    });

    it('skips entries that are not player objects', () => {
      const result = extractProjectionRows(['nope', null, players[0]], 2025);
      expect(result.rows).toHaveLength(1);
      expect(result.skippedInvalid).toBe(2);
    });

    it('counts the tier used for each row', () => {
      const result = extractProjectionRows(players, 2025);
      expect(result.tierCounts).toEqual({
        season_projection: 1,
        weekly_projections: 1,
        season_actual: 0,
        weekly_actuals: 0,
        none: 0,
      });
    });

    it('keeps rows and totals for records with extra and mistyped fields', () => {
      const result = extractProjectionRows(
        [
          {
            id: 2,
            fullName: 'Delta Receiver',
            defaultPositionId: '3',
            proTeamId: 'TBD',
            externalId: 'abc-123',
            eligibleSlots: [4, 5],
            stats: [
              {
                id: '002025',
                seasonId: '2025',
                externalId: '2025',
                scoringPeriodId: 0,
                statSplitTypeId: 0,
                statSourceId: 1,
                appliedTotal: 77,
                appliedAverage: 4.5,
                stats: { 53: 80 },
              },
            ],
          },
          {
            id: 3,
            fullName: 404,
            stats: [{ scoringPeriodId: '2', statSplitTypeId: '1', statSourceId: '0', appliedTotal: 9, appliedStats: [] }],
          },
        ],
        2025
      );

      expect(result.skippedInvalid).toBe(0);
      expect(result.rows).toEqual([
        { player_id: 2, name: 'Delta Receiver', position_id: 3, team_id: null, season: 2025, proj_points: 77 },
        { player_id: 3, name: '404', position_id: null, team_id: null, season: 2025, proj_points: 9 },
      ]);
      expect(result.tierCounts.season_projection).toBe(1);
      expect(result.tierCounts.weekly_actuals).toBe(1);
    });

    it('rejects a player whose stats value is not a list', () => {
      const result = extractProjectionRows([{ id: 5, fullName: 'Echo', stats: { bad: true } }], 2025);
      expect(result.rows).toEqual([]);
      expect(result.skippedInvalid).toBe(1);
    });

    it('freezes the rows', () => {
      const result = extractProjectionRows(players, 2025);
      expect(Object.isFrozen(result.rows[0])).toBe(true);
    });
  });
});
