export class AIError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "AIError";
  }

  /**
   * Walk the cause chain, starting with this error.
   */
  chain(): Array<{ name: string; message: string }> {
    const links: Array<{ name: string; message: string }> = [];
    let current: unknown = this;
    while (current instanceof Error) {
      links.push({ name: current.name, message: current.message });
      current = current.cause;
    }
    return links;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      chain: this.chain(),
    };
  }
}

export class ConfigError extends AIError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", cause);
    this.name = "ConfigError";
  }
}

export class InputValidationError extends AIError {
  constructor(
    message: string,
    public readonly parameter?: string,
  ) {
    super(message, "INPUT_VALIDATION");
    this.name = "InputValidationError";
  }

  static requiredParameter(parameter: string): InputValidationError {
    return new InputValidationError(
      `Missing required parameter: ${parameter}`,
      parameter,
    );
  }
}

/**
 * Raised when a conversation grows past its message ceiling during tool
 * roundtrips. Never retried: the same conversation would exceed it again.
 */
export class MemoryLimitExceededError extends AIError {
  constructor(
    public readonly currentMessageCount: number,
    public readonly maxMessages: number,
    public readonly roundtripCount: number,
  ) {
    super(
      `Message limit exceeded: ${currentMessageCount} messages (max: ${maxMessages}) ` +
        `after ${roundtripCount} tool roundtrips. ` +
        "Consider increasing maxMessages or reducing tool call frequency.",
      "MEMORY_LIMIT_EXCEEDED",
    );
    this.name = "MemoryLimitExceededError";
  }
}

export interface ProviderErrorDetails {
  provider: string;
  model?: string;
  statusCode?: number;
  responseBody?: string;
  requestId?: string;
  /** Server-suggested wait before retrying. */
  retryAfterMs?: number;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseBody(body: string): Record<string, unknown> | undefined {
  try {
    const parsed: unknown = JSON.parse(body);
    return isObject(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

/** Pull the human-readable message out of an error response body. */
function responseMessage(body: string): string {
  const parsed = parseBody(body);
  const error = parsed?.error;
  if (isObject(error) && typeof error.message === "string") return error.message;
  if (typeof parsed?.message === "string") return parsed.message;
  if (typeof error === "string") return error;
  return parsed === undefined && body.trim() !== "" ? body.trim() : "Unknown provider error";
}

function bodyRetryAfterMs(body: string): number | undefined {
  const parsed = parseBody(body);
  const error = parsed?.error;
  const value =
    parsed?.retry_after ?? (isObject(error) ? error.retry_after : undefined) ?? parsed?.retryAfter;
  const seconds = typeof value === "string" ? Number(value) : value;
  return typeof seconds === "number" && Number.isFinite(seconds) && seconds >= 0
    ? seconds * 1000
    : undefined;
}

/**
 * A provider call failed: a non-2xx response, an unreachable endpoint, or a
 * response the engine cannot act on.
 */
export class ProviderError extends AIError {
  readonly provider: string;
  readonly model?: string;
  readonly statusCode?: number;
  readonly responseBody?: string;
  readonly requestId?: string;
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    details: ProviderErrorDetails,
    code = "PROVIDER_ERROR",
    cause?: unknown,
  ) {
    super(message, code, cause);
    this.name = "ProviderError";
    this.provider = details.provider;
    this.model = details.model;
    this.statusCode = details.statusCode;
    this.responseBody = details.responseBody;
    this.requestId = details.requestId;
    this.retryAfterMs = details.retryAfterMs;
  }

  /**
   * Classify an HTTP error response. A retry hint in the body is used when
   * the response carried no Retry-After header.
   */
  static fromResponse(
    details: ProviderErrorDetails & { statusCode: number; responseBody: string },
  ): ProviderError {
    const message = `${details.provider} returned ${details.statusCode}: ${responseMessage(details.responseBody)}`;
    const withHint = {
      ...details,
      retryAfterMs: details.retryAfterMs ?? bodyRetryAfterMs(details.responseBody),
    };

    switch (details.statusCode) {
      case 401:
      case 403:
        return new ProviderError(message, withHint, "AUTHENTICATION");
      case 402:
        return new ProviderError(message, withHint, "QUOTA_EXCEEDED");
      case 404:
        return new ProviderError(message, withHint, "MODEL_NOT_FOUND");
      case 429:
        return new RateLimitError(message, withHint);
      case 500:
      case 502:
      case 503:
      case 504:
        return new ProviderUnavailableError(message, withHint);
      default:
        return new ProviderError(message, withHint);
    }
  }

  static connectionFailed(provider: string, cause: unknown, model?: string): ProviderUnavailableError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new ProviderUnavailableError(
      `Could not reach ${provider}: ${reason}`,
      { provider, model },
      cause,
    );
  }

  static invalidResponse(provider: string, reason: string, model?: string): ProviderError {
    return new ProviderError(
      `Invalid response from ${provider}: ${reason}`,
      { provider, model },
      "PROVIDER_INVALID_RESPONSE",
    );
  }
}

export class RateLimitError extends ProviderError {
  constructor(message: string, details: ProviderErrorDetails) {
    super(message, details, "RATE_LIMITED");
    this.name = "RateLimitError";
  }
}

/** Server-side failure or no connection at all (`statusCode` unset). */
export class ProviderUnavailableError extends ProviderError {
  constructor(message: string, details: ProviderErrorDetails, cause?: unknown) {
    super(message, details, "PROVIDER_UNAVAILABLE", cause);
    this.name = "ProviderUnavailableError";
  }
}

export class StreamingError extends AIError {
  constructor(
    message: string,
    public readonly lastData?: string,
    cause?: unknown,
  ) {
    super(message, "STREAMING_ERROR", cause);
    this.name = "StreamingError";
  }

  static malformed(reason: string, lastData?: string, cause?: unknown): StreamingError {
    return new StreamingError(`Malformed SSE: ${reason}`, lastData, cause);
  }
}

export class ToolExecutionError extends AIError {
  constructor(
    message: string,
    public readonly toolName: string,
    public readonly args: Record<string, unknown> = {},
    cause?: unknown,
  ) {
    super(message, "TOOL_EXECUTION", cause);
    this.name = "ToolExecutionError";
  }

  static fromError(
    toolName: string,
    args: Record<string, unknown>,
    err: unknown,
  ): ToolExecutionError {
    const reason = err instanceof Error ? err.message : String(err);
    return new ToolExecutionError(
      `Tool "${toolName}" execution failed: ${reason}`,
      toolName,
      args,
      err,
    );
  }

  static notFound(toolName: string): ToolExecutionError {
    return new ToolExecutionError(`Tool not found: ${toolName}`, toolName);
  }

  static invalidArguments(
    toolName: string,
    args: Record<string, unknown>,
    reason: string,
  ): ToolExecutionError {
    return new ToolExecutionError(
      `Invalid arguments for tool "${toolName}": ${reason}`,
      toolName,
      args,
    );
  }

  static timeout(
    toolName: string,
    args: Record<string, unknown>,
    timeoutMs: number,
  ): ToolExecutionError {
    return new ToolExecutionError(
      `Tool "${toolName}" execution timed out after ${timeoutMs}ms`,
      toolName,
      args,
    );
  }

  static notExecutable(toolName: string): ToolExecutionError {
    return new ToolExecutionError(
      `Tool "${toolName}" is not executable (no handler provided)`,
      toolName,
    );
  }
}

export type ToolSecurityReason =
  | "explicitly_denied"
  | "not_in_allowed_list"
  | "confirmation_denied";

export class ToolSecurityError extends AIError {
  constructor(
    message: string,
    public readonly toolName: string,
    public readonly reason: ToolSecurityReason,
    public readonly args: Record<string, unknown> = {},
  ) {
    super(message, "TOOL_SECURITY");
    this.name = "ToolSecurityError";
  }

  static explicitlyDenied(
    toolName: string,
    args: Record<string, unknown> = {},
  ): ToolSecurityError {
    return new ToolSecurityError(
      `Tool '${toolName}' is explicitly denied by security policy.`,
      toolName,
      "explicitly_denied",
      args,
    );
  }

  static notAllowed(
    toolName: string,
    args: Record<string, unknown> = {},
  ): ToolSecurityError {
    return new ToolSecurityError(
      `Tool '${toolName}' is not in the allowed tools list.`,
      toolName,
      "not_in_allowed_list",
      args,
    );
  }

  static confirmationDenied(
    toolName: string,
    args: Record<string, unknown> = {},
  ): ToolSecurityError {
    return new ToolSecurityError(
      `Tool '${toolName}' execution was denied by confirmation callback.`,
      toolName,
      "confirmation_denied",
      args,
    );
  }
}
