import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { logger } from '../../config/logger.config';
import { DebugArtifactWriter, disabledDebugWriter } from '../../shared/debug-artifacts';
import { ContentErrors, ExternalApiException, snippetOf } from '../../utils/exceptions';
import { IProjectionsProvider } from '../shared/projections-provider.interface';
import { ProviderEndpoint, RawProjectionsResponse } from '../shared/projections-provider.types';
import { buildPlayerFilter, EspnPlayerFilter } from './espn-filter';

export const ESPN_READS_BASE_URL = 'https://lm-api-reads.fantasy.espn.com/apis/v3/games/ffl';
export const ESPN_SITE_URL = 'https://fantasy.espn.com';

const API_NAME = 'ESPN';

export interface EspnCredentials {
  swid: string;
  espnS2: string;
}

const BASE_HEADERS: Record<string, string> = {
  Accept: 'application/json',
  'Accept-Language': 'en-US,en;q=0.9',
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  Referer: `${ESPN_SITE_URL}/football/players/projections`,
  Origin: ESPN_SITE_URL,
  'X-Fantasy-Source': 'kona',
  'X-Fantasy-Platform': 'kona-PROD-web',
  'X-Fantasy-Client': 'fantasy-web',
};

/**
 * Candidate endpoints in the order they are tried. Only the primary players
 * endpoint understands the filter header.
 */
export function buildEndpoints(season: number, filter: EspnPlayerFilter): ProviderEndpoint[] {
  const seasonUrl = `${ESPN_READS_BASE_URL}/seasons/${season}`;
  return [
    {
      name: 'players',
      url: `${seasonUrl}/players?view=kona_player_info`,
      headers: { 'X-Fantasy-Filter': JSON.stringify(filter) },
    },
    {
      name: 'league-defaults',
      url: `${seasonUrl}/segments/0/leaguedefaults/3?view=kona_player_info`,
      headers: {},
    },
    {
      name: 'season',
      url: `${seasonUrl}?view=kona_player_info`,
      headers: {},
    },
  ];
}

export function isJsonContentType(contentType: string | null): boolean {
  return contentType !== null && contentType.toLowerCase().includes('json');
}

function headerValue(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return null;
}

function bodyText(data: unknown): string | null {
  if (data === null || data === undefined) return null;
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return JSON.stringify(data);
}

export class EspnApiClient implements IProjectionsProvider {
  readonly providerId = 'espn';
  private readonly client: AxiosInstance;

  constructor(
    private readonly credentials: EspnCredentials,
    private readonly debug: DebugArtifactWriter = disabledDebugWriter,
    client?: AxiosInstance
  ) {
    this.client =
      client ??
      axios.create({
        timeout: 60000,
        maxRedirects: 0,
        // statuses are classified per endpoint in tryEndpoint
        validateStatus: () => true,
        responseType: 'text',
        transformResponse: [(data: unknown) => data],
      });
  }

  /**
   * Try each candidate endpoint in order and return the first response that
   * is successful and JSON-typed.
   *
   * A successful response without a JSON content type is kept as a fallback;
   * once every endpoint has been tried it is returned only if it carried no
   * content type at all.
   */
  async fetchPlayerProjections(season: number): Promise<RawProjectionsResponse> {
    const filter = buildPlayerFilter(season);
    await this.debug.write('filter.json', filter);

    const endpoints = buildEndpoints(season, filter);
    let fallback: RawProjectionsResponse | null = null;

    for (const endpoint of endpoints) {
      const response = await this.tryEndpoint(endpoint);
      if (!response) continue;

      if (isJsonContentType(response.contentType)) {
        logger.info('ESPN projections downloaded', {
          endpoint: endpoint.name,
          status: response.status,
          bytes: Buffer.byteLength(response.body, 'utf8'),
        });
        return response;
      }

      logger.warn('ESPN response is not JSON-typed, trying next endpoint', {
        endpoint: endpoint.name,
        contentType: response.contentType,
      });
      fallback = response;
    }

    if (!fallback) {
      throw ExternalApiException.exhausted(
        API_NAME,
        'fetchPlayerProjections',
        endpoints.map((endpoint) => endpoint.name)
      );
    }

    if (fallback.contentType !== null) {
      throw ContentErrors.nonJsonContentType(fallback.contentType, fallback.body);
    }

    return fallback;
  }

  private requestHeaders(endpoint: ProviderEndpoint): Record<string, string> {
    return {
      ...BASE_HEADERS,
      Cookie: `SWID=${this.credentials.swid}; espn_s2=${this.credentials.espnS2}`,
      ...endpoint.headers,
    };
  }

  /**
   * Returns null when this endpoint should be skipped.
   */
  private async tryEndpoint(endpoint: ProviderEndpoint): Promise<RawProjectionsResponse | null> {
    logger.debug('Requesting ESPN endpoint', { endpoint: endpoint.name, url: endpoint.url });

    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.get<unknown>(endpoint.url, {
        headers: this.requestHeaders(endpoint),
      });
    } catch (error) {
      logger.warn('ESPN request failed', {
        endpoint: endpoint.name,
        errorMessage: error instanceof Error ? error.message : String(error),
        errorCode: axios.isAxiosError(error) ? error.code : undefined,
        status: axios.isAxiosError(error) ? error.response?.status : undefined,
      });
      if (axios.isAxiosError(error) && error.response) {
        await this.writeErrorArtifacts(endpoint, error.response);
      }
      return null;
    }

    await this.debug.write(`${endpoint.name}-response-headers.json`, {
      status: response.status,
      headers: response.headers,
    });

    if (response.status >= 300 && response.status < 400) {
      logger.warn('ESPN endpoint redirected, not following', {
        endpoint: endpoint.name,
        status: response.status,
        location: headerValue(response.headers['location']),
      });
      return null;
    }

    if (response.status >= 400) {
      logger.warn('ESPN endpoint returned an error status', {
        endpoint: endpoint.name,
        status: response.status,
      });
      await this.writeErrorArtifacts(endpoint, response);
      return null;
    }

    const body = bodyText(response.data);
    if (body === null) {
      logger.warn('ESPN endpoint returned no body', { endpoint: endpoint.name });
      return null;
    }

    await this.debug.write('response-snippet.txt', snippetOf(body));

    return {
      endpoint: endpoint.name,
      url: endpoint.url,
      status: response.status,
      contentType: headerValue(response.headers['content-type']),
      body,
    };
  }

  private async writeErrorArtifacts(
    endpoint: ProviderEndpoint,
    response: AxiosResponse<unknown>
  ): Promise<void> {
    await this.debug.write(`${endpoint.name}-error-headers.json`, {
      status: response.status,
      headers: response.headers,
    });
    await this.debug.write(`${endpoint.name}-error-body.txt`, bodyText(response.data) ?? '');
  }
}
