import { describe, it, expect } from "vitest";
import {
  ApiRequestError,
  ConfigurationError,
  ConnectionError,
  InvalidTimestampError,
  IssueCompassError,
  NetworkError,
  RateLimitError,
  UsageError,
  isIssueCompassError,
  toError,
} from "../../src/infra/errors.js";

describe("errors", () => {
  it("should give every error a code and name", () => {
    const cases: Array<[IssueCompassError, string, string]> = [
      [new ConfigurationError("bad"), "CONFIGURATION_ERROR", "ConfigurationError"],
      [new UsageError("bad"), "USAGE_ERROR", "UsageError"],
      [new ConnectionError("bad", "o/r"), "CONNECTION_ERROR", "ConnectionError"],
      [new RateLimitError("bad", 5), "RATE_LIMIT_ERROR", "RateLimitError"],
      [new ApiRequestError("bad", 500, "https://x"), "API_REQUEST_ERROR", "ApiRequestError"],
      [new NetworkError("bad"), "NETWORK_ERROR", "NetworkError"],
      [new InvalidTimestampError("bad"), "INVALID_TIMESTAMP", "InvalidTimestampError"],
    ];

    for (const [error, code, name] of cases) {
      expect(error).toBeInstanceOf(IssueCompassError);
      expect(error.code).toBe(code);
      expect(error.name).toBe(name);
      expect(isIssueCompassError(error)).toBe(true);
    }
  });

  it("should keep the cause", () => {
    const cause = new Error("ECONNRESET");

    expect(new NetworkError("request failed", cause).cause).toBe(cause);
  });

  it("should describe invalid timestamps with and without an issue number", () => {
    expect(new InvalidTimestampError("soon", 12).message).toBe(
      'Issue #12 has an invalid creation timestamp: "soon"'
    );
    expect(new InvalidTimestampError("soon").message).toBe('Invalid timestamp: "soon"');
  });

  it("should normalise unknown values to errors", () => {
    const error = new Error("x");

    expect(toError(error)).toBe(error);
    expect(toError("text").message).toBe("text");
    expect(isIssueCompassError(error)).toBe(false);
  });
});
