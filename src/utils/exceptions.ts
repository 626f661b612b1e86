/**
 * Error codes let callers (and log readers) distinguish failure classes
 * without parsing messages.
 */
export const ErrorCode = {
  // Generic errors
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  MISSING_CREDENTIALS: 'MISSING_CREDENTIALS',

  // Upstream errors
  ENDPOINTS_EXHAUSTED: 'ENDPOINTS_EXHAUSTED',

  // Content errors
  NON_JSON_CONTENT: 'NON_JSON_CONTENT',
  EMPTY_CONTENT: 'EMPTY_CONTENT',
  MALFORMED_CONTENT: 'MALFORMED_CONTENT',
  JSON_PARSE_ERROR: 'JSON_PARSE_ERROR',
  NOT_A_PLAYER_LIST: 'NOT_A_PLAYER_LIST',

  // Output errors
  FILE_WRITE_ERROR: 'FILE_WRITE_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Process exit codes, one per failure class. */
export const ExitCode = {
  SUCCESS: 0,
  UNKNOWN: 1,
  CONFIGURATION: 2,
  UPSTREAM: 3,
  CONTENT: 4,
  OUTPUT: 5,
} as const;

export type ExitCodeType = (typeof ExitCode)[keyof typeof ExitCode];

/** Length of the content excerpt attached to content errors. */
export const SNIPPET_LENGTH = 300;

export function snippetOf(content: string): string {
  return content.length > SNIPPET_LENGTH ? `${content.slice(0, SNIPPET_LENGTH)}...` : content;
}

/**
 * Base class for application exceptions
 */
export class AppException extends Error {
  constructor(
    message: string,
    public readonly exitCode: ExitCodeType,
    public readonly errorCode: ErrorCodeType = ErrorCode.UNKNOWN_ERROR
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Thrown when arguments or environment values fail validation
 */
export class ValidationException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.VALIDATION_ERROR) {
    super(message, ExitCode.CONFIGURATION, errorCode);
  }
}

/**
 * Thrown when a session credential is missing. Raised before any request is made.
 */
export class InvalidCredentialsException extends AppException {
  constructor(message: string) {
    super(message, ExitCode.CONFIGURATION, ErrorCode.MISSING_CREDENTIALS);
  }
}

/**
 * Thrown when an external API call fails (e.g., every ESPN endpoint was tried).
 * Carries the API and operation for log context.
 */
export class ExternalApiException extends AppException {
  public readonly apiName: string;
  public readonly operation: string;

  constructor(
    apiName: string,
    operation: string,
    message: string,
    errorCode: ErrorCodeType = ErrorCode.ENDPOINTS_EXHAUSTED
  ) {
    super(`[${apiName}] ${operation}: ${message}`, ExitCode.UPSTREAM, errorCode);
    this.apiName = apiName;
    this.operation = operation;
  }

  /**
   * Creates an ExternalApiException once every candidate endpoint has failed.
   */
  static exhausted(apiName: string, operation: string, attempted: string[]): ExternalApiException {
    return new ExternalApiException(
      apiName,
      operation,
      `no usable response from ${attempted.length} endpoint(s): ${attempted.join(', ')}`
    );
  }
}

/**
 * Thrown when downloaded or saved content is not a usable JSON player payload.
 * Always fatal; carries an excerpt of the offending content.
 */
export class ContentValidationException extends AppException {
  constructor(
    message: string,
    errorCode: ErrorCodeType,
    public readonly snippet: string
  ) {
    super(message, ExitCode.CONTENT, errorCode);
  }
}

/**
 * Thrown when an output file cannot be written.
 */
export class OutputWriteException extends AppException {
  public readonly originalError: Error;
  public readonly path: string;

  constructor(path: string, error: unknown) {
    super(
      `Failed to write ${path}: ${error instanceof Error ? error.message : String(error)}`,
      ExitCode.OUTPUT,
      ErrorCode.FILE_WRITE_ERROR
    );
    this.path = path;
    this.originalError = error instanceof Error ? error : new Error(String(error));
  }
}

// Factory functions for content failures
export const ContentErrors = {
  nonJsonContentType: (contentType: string, body: string) =>
    new ContentValidationException(
      `Response content type is not JSON: ${contentType}`,
      ErrorCode.NON_JSON_CONTENT,
      snippetOf(body)
    ),
  empty: () => new ContentValidationException('Content is empty', ErrorCode.EMPTY_CONTENT, ''),
  notJsonShaped: (body: string) =>
    new ContentValidationException(
      'Content does not start with "[" or "{"',
      ErrorCode.MALFORMED_CONTENT,
      snippetOf(body)
    ),
  parseFailed: (error: unknown, body: string) =>
    new ContentValidationException(
      `JSON parse failed: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.JSON_PARSE_ERROR,
      snippetOf(body)
    ),
  notAPlayerList: (body: string) =>
    new ContentValidationException(
      'Payload is neither a player array nor an object with a "players" array',
      ErrorCode.NOT_A_PLAYER_LIST,
      snippetOf(body)
    ),
};

/**
 * Maps any thrown value to the process exit code.
 */
export function exitCodeFor(error: unknown): ExitCodeType {
  return error instanceof AppException ? error.exitCode : ExitCode.UNKNOWN;
}
