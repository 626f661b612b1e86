import { DEFAULT_SEASON, ExportConfig, loadExportConfig } from '../../config/env.config';
import { logger } from '../../config/logger.config';
import { EspnApiClient } from '../../integrations/espn/espn-api-client';
import { IProjectionsProvider } from '../../integrations/shared/projections-provider.interface';
import { DebugArtifactWriter } from '../../shared/debug-artifacts';
import {
  AppException,
  ContentValidationException,
  ExitCode,
  ExitCodeType,
  exitCodeFor,
  ValidationException,
} from '../../utils/exceptions';
import { parseCliArgs, parseOptionalInteger } from '../../utils/parsing.utils';
import {
  convertSavedProjections,
  describeContentError,
  ProjectionExportService,
} from './projection-export.service';

export type ProviderFactory = (config: ExportConfig) => IProjectionsProvider;

export const EXPORT_USAGE =
  'export-espn-projections [--season=YYYY] [--json=PATH] [--csv=PATH] [--swid=VALUE] [--espn-s2=VALUE] [--debug-dir=PATH] [--no-debug]';

export const CONVERT_USAGE = 'convert-projections-json <input.json> <output.csv> [season]';

export const createEspnProvider: ProviderFactory = (config) =>
  new EspnApiClient(
    { swid: config.swid, espnS2: config.espnS2 },
    new DebugArtifactWriter(config.debugDir)
  );

function reportFailure(error: unknown): ExitCodeType {
  if (error instanceof ContentValidationException) {
    logger.error(describeContentError(error), { errorCode: error.errorCode });
  } else if (error instanceof AppException) {
    logger.error(error.message, { errorCode: error.errorCode });
  } else {
    logger.error(`Unexpected error: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
  }
  return exitCodeFor(error);
}

/**
 * Fetch, save and flatten one season of ESPN projections.
 * @returns the process exit code
 */
export async function runExportCommand(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  createProvider: ProviderFactory = createEspnProvider
): Promise<ExitCodeType> {
  try {
    const { options } = parseCliArgs(argv);
    if (options.help !== undefined) {
      logger.info(`Usage: ${EXPORT_USAGE}`);
      return ExitCode.SUCCESS;
    }

    // Credentials are checked here, before any provider exists
    const config = loadExportConfig(options, env);
    const service = new ProjectionExportService(createProvider(config));
    await service.exportSeason({
      season: config.season,
      jsonPath: config.jsonPath,
      csvPath: config.csvPath,
    });
    return ExitCode.SUCCESS;
  } catch (error) {
    return reportFailure(error);
  }
}

/**
 * Flatten a saved payload into CSV.
 * @returns the process exit code
 */
export async function runConvertCommand(argv: string[]): Promise<ExitCodeType> {
  try {
    const { positionals } = parseCliArgs(argv);
    if (positionals.length < 2) {
      throw new ValidationException(`Usage: ${CONVERT_USAGE}`);
    }

    const [inputPath, csvPath, seasonArg] = positionals;
    const season = parseOptionalInteger(seasonArg, 'season', DEFAULT_SEASON);
    await convertSavedProjections(inputPath, csvPath, season);
    return ExitCode.SUCCESS;
  } catch (error) {
    return reportFailure(error);
  }
}
