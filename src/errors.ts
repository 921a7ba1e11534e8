/** Base class for every error the command server raises on purpose. */
export class CommandServerError extends Error {
  readonly code: string;
  override readonly cause?: Error;

  constructor(message: string, code: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.cause = cause;
  }
}

/** Missing or malformed input: unknown command, bad field, bad sort key. */
export class ValidationError extends CommandServerError {
  constructor(message: string, cause?: Error) {
    super(message, 'VALIDATION_ERROR', cause);
  }
}

/** Issue key or epic name that does not resolve in Jira. */
export class NotFoundError extends CommandServerError {
  constructor(message: string, cause?: Error) {
    super(message, 'NOT_FOUND', cause);
  }
}

/** Epic name that resolves to more than one epic. */
export class AmbiguityError extends CommandServerError {
  constructor(message: string, cause?: Error) {
    super(message, 'AMBIGUOUS', cause);
  }
}

/** Failed call to the Jira REST API. Status 0 means no HTTP response arrived. */
export class JiraApiError extends CommandServerError {
  readonly statusCode: number;
  readonly responseBody: string;

  constructor(statusCode: number, responseBody: string, cause?: Error) {
    super(
      statusCode > 0
        ? `Jira API error (${statusCode}): ${responseBody}`
        : `Jira request failed: ${responseBody}`,
      'JIRA_API_ERROR',
      cause
    );
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

/** Invalid or incomplete process configuration. */
export class ConfigError extends CommandServerError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
  }
}

/** Errors caused by the caller's request rather than by Jira or the server. */
export function isClientError(error: unknown): boolean {
  return (
    error instanceof ValidationError ||
    error instanceof NotFoundError ||
    error instanceof AmbiguityError
  );
}

/** Coerce an unknown thrown value into an Error instance. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
