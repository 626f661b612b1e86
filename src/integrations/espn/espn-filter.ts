/**
 * Filter body sent in the `X-Fantasy-Filter` header of the primary players request.
 */
export interface EspnPlayerFilter {
  players: {
    filterStatus: { value: string[] };
    filterSlotIds: { value: number[] };
    filterStatsForSourceIds: { value: number[] };
    filterStatsForTopScoringPeriodIds: { value: number; additionalValue: string[] };
    sortAppliedStatTotal: { sortAsc: boolean; sortPriority: number; value: string };
    sortDraftRanks: { sortPriority: number; sortAsc: boolean; value: string };
    sortPercOwned: { sortPriority: number; sortAsc: boolean };
    limit: number;
    offset: number;
  };
}

// Lineup slots covering offense, kickers, D/ST and flex variants
const PLAYER_SLOT_IDS = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15, 16, 17, 18, 19, 23, 24];

export const DEFAULT_PLAYER_LIMIT = 5000;

/**
 * Stats-window selector ids: `<source><split><season>`, e.g. `102025` is the
 * 2025 season projection and `002024` the 2024 season actuals.
 */
export function statsWindowIds(season: number): string[] {
  return [`00${season}`, `10${season}`, `00${season - 1}`, `02${season}`];
}

export function buildPlayerFilter(
  season: number,
  options: { limit?: number; offset?: number } = {}
): EspnPlayerFilter {
  return {
    players: {
      filterStatus: { value: ['FREEAGENT', 'WAIVERS', 'ONTEAM'] },
      filterSlotIds: { value: PLAYER_SLOT_IDS },
      filterStatsForSourceIds: { value: [0, 1] },
      filterStatsForTopScoringPeriodIds: { value: 2, additionalValue: statsWindowIds(season) },
      sortAppliedStatTotal: { sortAsc: false, sortPriority: 3, value: `10${season}` },
      sortDraftRanks: { sortPriority: 2, sortAsc: true, value: 'PPR' },
      sortPercOwned: { sortPriority: 4, sortAsc: false },
      limit: options.limit ?? DEFAULT_PLAYER_LIMIT,
      offset: options.offset ?? 0,
    },
  };
}
