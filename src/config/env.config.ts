import path from 'path';
import { z } from 'zod';
import { CliArgs } from '../utils/parsing.utils';
import { InvalidCredentialsException, ValidationException } from '../utils/exceptions';

export const DEFAULT_SEASON = 2025;

/** Directory (beside the JSON output) that receives debug artifacts. */
export const DEFAULT_DEBUG_DIR_NAME = 'espn_debug';

const CREDENTIAL_KEYS = new Set(['swid', 'espnS2']);

// Raw values arrive as strings from argv or the environment
const exportConfigSchema = z.object({
  season: z
    .string()
    .regex(/^\d{4}$/, 'season must be a four-digit year')
    .default(String(DEFAULT_SEASON))
    .transform((val) => parseInt(val, 10)),
  jsonPath: z.string().min(1).optional(),
  csvPath: z.string().min(1).optional(),

  // Session cookies, treated as opaque strings
  swid: z
    .string({ required_error: 'SWID is required (--swid or ESPN_SWID)' })
    .min(1, 'SWID is required (--swid or ESPN_SWID)'),
  espnS2: z
    .string({ required_error: 'espn_s2 is required (--espn-s2 or ESPN_S2)' })
    .min(1, 'espn_s2 is required (--espn-s2 or ESPN_S2)'),

  debugDir: z.string().min(1).optional(),
  debug: z.boolean().default(true),
});

export interface ExportConfig {
  season: number;
  jsonPath: string;
  csvPath: string;
  swid: string;
  espnS2: string;
  /** null disables debug artifacts */
  debugDir: string | null;
}

function pick(option: string | undefined, envValue: string | undefined): string | undefined {
  if (option !== undefined) return option;
  return envValue === '' ? undefined : envValue;
}

/**
 * Resolve export settings from command-line options, falling back to the
 * environment. Missing credentials raise InvalidCredentialsException so the
 * run stops before any request is made.
 */
export function loadExportConfig(options: CliArgs, env: NodeJS.ProcessEnv = process.env): ExportConfig {
  const result = exportConfigSchema.safeParse({
    season: pick(options.season, env.ESPN_SEASON),
    jsonPath: pick(options.json, env.PROJECTIONS_JSON_PATH),
    csvPath: pick(options.csv, env.PROJECTIONS_CSV_PATH),
    swid: pick(options.swid, env.ESPN_SWID),
    espnS2: pick(options['espn-s2'], env.ESPN_S2),
    debugDir: pick(options['debug-dir'], env.PROJECTIONS_DEBUG_DIR),
    debug: options['no-debug'] === undefined,
  });

  if (!result.success) {
    const credentialIssue = result.error.issues.find((issue) =>
      CREDENTIAL_KEYS.has(String(issue.path[0]))
    );
    if (credentialIssue) {
      throw new InvalidCredentialsException(credentialIssue.message);
    }
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ValidationException(`Invalid export configuration: ${details}`);
  }

  const parsed = result.data;
  const jsonPath = parsed.jsonPath ?? `espn_projections_${parsed.season}.json`;
  const csvPath = parsed.csvPath ?? `espn_projections_${parsed.season}.csv`;

  let debugDir: string | null = null;
  if (parsed.debug) {
    debugDir = parsed.debugDir ?? path.join(path.dirname(jsonPath), DEFAULT_DEBUG_DIR_NAME);
  }

  return {
    season: parsed.season,
    jsonPath,
    csvPath,
    swid: parsed.swid,
    espnS2: parsed.espnS2,
    debugDir,
  };
}
