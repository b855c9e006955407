import { describe, expect, it } from "vitest";
import {
  AIError,
  ConfigError,
  InputValidationError,
  MemoryLimitExceededError,
  ProviderError,
  ProviderUnavailableError,
  RateLimitError,
  StreamingError,
  ToolExecutionError,
  ToolSecurityError,
} from "./errors.js";

describe("Error types", () => {
  it("AIError has correct properties", () => {
    const err = new AIError("test error", "TEST_CODE");
    expect(err.message).toBe("test error");
    expect(err.code).toBe("TEST_CODE");
    expect(err.name).toBe("AIError");
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(AIError);
  });

  it("AIError supports cause and walks the chain", () => {
    const cause = new Error("root cause");
    const err = new AIError("wrapper", "WRAP", cause);
    expect(err.cause).toBe(cause);
    expect(err.chain()).toEqual([
      { name: "AIError", message: "wrapper" },
      { name: "Error", message: "root cause" },
    ]);
  });

  it("AIError serializes to JSON", () => {
    const err = new ConfigError("bad config");
    expect(err.toJSON()).toEqual({
      name: "ConfigError",
      code: "CONFIG_ERROR",
      message: "bad config",
      chain: [{ name: "ConfigError", message: "bad config" }],
    });
  });

  it("InputValidationError names the missing parameter", () => {
    const err = InputValidationError.requiredParameter("provider");
    expect(err.message).toBe("Missing required parameter: provider");
    expect(err.parameter).toBe("provider");
    expect(err.code).toBe("INPUT_VALIDATION");
  });

  it("MemoryLimitExceededError carries count, limit and roundtrip", () => {
    const err = new MemoryLimitExceededError(7, 5, 3);
    expect(err.currentMessageCount).toBe(7);
    expect(err.maxMessages).toBe(5);
    expect(err.roundtripCount).toBe(3);
    expect(err.code).toBe("MEMORY_LIMIT_EXCEEDED");
    expect(err.message).toBe(
      "Message limit exceeded: 7 messages (max: 5) after 3 tool roundtrips. " +
        "Consider increasing maxMessages or reducing tool call frequency.",
    );
  });

  it("StreamingError.malformed prefixes the reason", () => {
    const err = StreamingError.malformed("bad retry", "retry: x");
    expect(err.message).toBe("Malformed SSE: bad retry");
    expect(err.lastData).toBe("retry: x");
    expect(err.name).toBe("StreamingError");
  });

  it("ToolExecutionError factories", () => {
    expect(ToolExecutionError.notFound("ghost").message).toBe(
      "Tool not found: ghost",
    );
    expect(ToolExecutionError.timeout("slow", {}, 250).message).toBe(
      'Tool "slow" execution timed out after 250ms',
    );
    const wrapped = ToolExecutionError.fromError("calc", { a: 1 }, new Error("Boom"));
    expect(wrapped.message).toBe('Tool "calc" execution failed: Boom');
    expect(wrapped.args).toEqual({ a: 1 });
  });

  it("ToolSecurityError records the violation reason", () => {
    const err = ToolSecurityError.explicitlyDenied("rm");
    expect(err.reason).toBe("explicitly_denied");
    expect(err.toolName).toBe("rm");
    expect(err.message).toBe("Tool 'rm' is explicitly denied by security policy.");
  });

  it("ProviderError classifies error responses by status", () => {
    const auth = ProviderError.fromResponse({
      provider: "acme",
      statusCode: 401,
      responseBody: JSON.stringify({ error: { message: "bad key" } }),
    });
    expect(auth).toBeInstanceOf(ProviderError);
    expect(auth.code).toBe("AUTHENTICATION");
    expect(auth.message).toBe("acme returned 401: bad key");

    const unavailable = ProviderError.fromResponse({
      provider: "acme",
      statusCode: 503,
      responseBody: "upstream overloaded",
    });
    expect(unavailable).toBeInstanceOf(ProviderUnavailableError);
    expect(unavailable.message).toBe("acme returned 503: upstream overloaded");

    const other = ProviderError.fromResponse({ provider: "acme", statusCode: 400, responseBody: "" });
    expect(other.code).toBe("PROVIDER_ERROR");
    expect(other.message).toBe("acme returned 400: Unknown provider error");
  });

  it("RateLimitError prefers the header hint over the body", () => {
    const fromBody = ProviderError.fromResponse({
      provider: "acme",
      statusCode: 429,
      responseBody: JSON.stringify({ message: "slow down", retry_after: 2 }),
    });
    expect(fromBody).toBeInstanceOf(RateLimitError);
    expect(fromBody.code).toBe("RATE_LIMITED");
    expect(fromBody.retryAfterMs).toBe(2000);

    const fromHeader = ProviderError.fromResponse({
      provider: "acme",
      statusCode: 429,
      responseBody: JSON.stringify({ error: { retry_after: 2 } }),
      retryAfterMs: 500,
    });
    expect(fromHeader.retryAfterMs).toBe(500);
  });

  it("ProviderError.connectionFailed keeps the network error as its cause", () => {
    const cause = new TypeError("fetch failed");
    const err = ProviderError.connectionFailed("acme", cause);
    expect(err).toBeInstanceOf(ProviderUnavailableError);
    expect(err.statusCode).toBeUndefined();
    expect(err.message).toBe("Could not reach acme: fetch failed");
    expect(err.cause).toBe(cause);
  });
});
