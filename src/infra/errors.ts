export class IssueCompassError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = "IssueCompassError";
  }
}

export class ConfigurationError extends IssueCompassError {
  constructor(message: string, cause?: Error) {
    super(message, "CONFIGURATION_ERROR", cause);
    this.name = "ConfigurationError";
  }
}

/** Missing or malformed command-line input. Always fatal. */
export class UsageError extends IssueCompassError {
  constructor(message: string) {
    super(message, "USAGE_ERROR");
    this.name = "UsageError";
  }
}

/** The repository could not be reached at startup (bad token, unknown repo, offline). */
export class ConnectionError extends IssueCompassError {
  constructor(
    message: string,
    public readonly repository: string,
    cause?: Error
  ) {
    super(message, "CONNECTION_ERROR", cause);
    this.name = "ConnectionError";
  }
}

export class RateLimitError extends IssueCompassError {
  constructor(
    message: string,
    /** Seconds to wait before the quota resets */
    public readonly retryAfter?: number
  ) {
    super(message, "RATE_LIMIT_ERROR");
    this.name = "RateLimitError";
  }
}

export class ApiRequestError extends IssueCompassError {
  constructor(
    message: string,
    public readonly status: number,
    public readonly url: string
  ) {
    super(message, "API_REQUEST_ERROR");
    this.name = "ApiRequestError";
  }
}

export class NetworkError extends IssueCompassError {
  constructor(message: string, cause?: Error) {
    super(message, "NETWORK_ERROR", cause);
    this.name = "NetworkError";
  }
}

export class InvalidTimestampError extends IssueCompassError {
  constructor(
    public readonly value: string,
    public readonly issueNumber?: number
  ) {
    super(
      issueNumber !== undefined
        ? `Issue #${issueNumber} has an invalid creation timestamp: "${value}"`
        : `Invalid timestamp: "${value}"`,
      "INVALID_TIMESTAMP"
    );
    this.name = "InvalidTimestampError";
  }
}

export function isIssueCompassError(error: unknown): error is IssueCompassError {
  return error instanceof IssueCompassError;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
