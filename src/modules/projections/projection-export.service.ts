import { promises as fs } from 'fs';
import { logger } from '../../config/logger.config';
import { ESPN_POSITIONS } from '../../integrations/espn/espn.types';
import { IProjectionsProvider } from '../../integrations/shared/projections-provider.interface';
import { writeOutputFile } from '../../shared/output-files';
import { ContentValidationException, ValidationException } from '../../utils/exceptions';
import { parseDownloadedPayload, parseSavedPayload, stripBom, toPlayerList } from './payload.utils';
import { extractProjectionRows } from './projection-extractor';
import { formatProjectionCsv } from './projections-csv';
import { ExportSummary, ExtractionResult } from './projections.model';

export interface ProjectionExportOptions {
  season: number;
  jsonPath: string;
  csvPath: string;
}

function countPositions(result: ExtractionResult): Record<string, number> {
  const positions: Record<string, number> = {};
  for (const row of result.rows) {
    const label = row.position_id !== null ? ESPN_POSITIONS[row.position_id] ?? 'OTHER' : 'UNKNOWN';
    positions[label] = (positions[label] ?? 0) + 1;
  }
  return positions;
}

async function writeCsv(
  result: ExtractionResult,
  meta: { season: number; csvPath: string; jsonPath: string | null; endpoint: string | null }
): Promise<ExportSummary> {
  await writeOutputFile(meta.csvPath, formatProjectionCsv(result.rows));

  const rowsWithPoints = result.rows.filter((row) => row.proj_points !== null).length;
  logger.info(`Wrote ${meta.csvPath} with ${result.rows.length} rows; ${rowsWithPoints} have proj_points`, {
    playersSeen: result.playersSeen,
    skippedWithoutStats: result.skippedWithoutStats,
    skippedDuplicates: result.skippedDuplicates,
    skippedInvalid: result.skippedInvalid,
    tierCounts: result.tierCounts,
  });

  return {
    season: meta.season,
    endpoint: meta.endpoint,
    jsonPath: meta.jsonPath,
    csvPath: meta.csvPath,
    rows: result.rows.length,
    rowsWithPoints,
    playersSeen: result.playersSeen,
    tierCounts: result.tierCounts,
    positions: countPositions(result),
  };
}

/**
 * Downloads a season's projections, saves the raw body, and writes the
 * flattened CSV. Nothing is written unless the body parses as a player list.
 */
export class ProjectionExportService {
  constructor(private readonly provider: IProjectionsProvider) {}

  async exportSeason(options: ProjectionExportOptions): Promise<ExportSummary> {
    const { season, jsonPath, csvPath } = options;
    logger.info('Fetching player projections', { provider: this.provider.providerId, season });

    const response = await this.provider.fetchPlayerProjections(season);
    const body = stripBom(response.body);

    const players = toPlayerList(parseDownloadedPayload(body), body);
    logger.info(`Parsed ${players.length} players from ${response.endpoint}`);

    await writeOutputFile(jsonPath, body);
    logger.info(`Saved raw response to ${jsonPath}`);

    return writeCsv(extractProjectionRows(players, season), {
      season,
      csvPath,
      jsonPath,
      endpoint: response.endpoint,
    });
  }
}

/**
 * Re-export a previously saved payload (JSON or NDJSON) without any network access.
 */
export async function convertSavedProjections(
  inputPath: string,
  csvPath: string,
  season: number
): Promise<ExportSummary> {
  let content: string;
  try {
    content = await fs.readFile(inputPath, 'utf8');
  } catch (error) {
    throw new ValidationException(
      `Cannot read ${inputPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  const players = toPlayerList(parseSavedPayload(content), content);

  if (players.length === 0) {
    logger.warn(`No players found in ${inputPath}`);
  }

  return writeCsv(extractProjectionRows(players, season), {
    season,
    csvPath,
    jsonPath: null,
    endpoint: null,
  });
}

export function describeContentError(error: ContentValidationException): string {
  return error.snippet ? `${error.message}\n--- content ---\n${error.snippet}` : error.message;
}
