import { ContentErrors, ContentValidationException, ErrorCode } from '../../utils/exceptions';

const BYTE_ORDER_MARK = '\uFEFF';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function stripBom(text: string): string {
  return text.startsWith(BYTE_ORDER_MARK) ? text.slice(BYTE_ORDER_MARK.length) : text;
}

/**
 * Parse a downloaded body, rejecting empty content, content that does not
 * open with `[` or `{`, and invalid JSON.
 */
export function parseDownloadedPayload(body: string): unknown {
  const text = stripBom(body).trim();

  if (text.length === 0) {
    throw ContentErrors.empty();
  }
  if (!text.startsWith('[') && !text.startsWith('{')) {
    throw ContentErrors.notJsonShaped(text);
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw ContentErrors.parseFailed(error, text);
  }
}

/**
 * Parse a saved payload: a JSON document, or NDJSON with one object per line.
 */
export function parseSavedPayload(content: string): unknown {
  try {
    return parseDownloadedPayload(content);
  } catch (error) {
    if (!(error instanceof ContentValidationException) || error.errorCode !== ErrorCode.JSON_PARSE_ERROR) {
      throw error;
    }

    const lines = stripBom(content)
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);

    try {
      return lines.map((line): unknown => JSON.parse(line));
    } catch {
      throw error;
    }
  }
}

/**
 * Accept a bare player array or an object carrying a `players` array.
 */
export function toPlayerList(payload: unknown, source: string): unknown[] {
  if (Array.isArray(payload)) return payload;
  if (isRecord(payload) && Array.isArray(payload.players)) return payload.players;
  throw ContentErrors.notAPlayerList(source);
}
