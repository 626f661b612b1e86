import { RawProjectionsResponse } from './projections-provider.types';

/**
 * Projections provider interface
 *
 * The export service depends only on this contract, so tests (and any other
 * source of player projections) can stand in for the ESPN client.
 */
export interface IProjectionsProvider {
  /** Provider identifier (e.g., 'espn') */
  readonly providerId: string;

  /**
   * Download the raw player projections payload for a season
   * @param season - NFL season year
   * @returns The first acceptable response body, unparsed
   */
  fetchPlayerProjections(season: number): Promise<RawProjectionsResponse>;
}
