import type { EngineConfig, RetryConfig } from "../config/types.js";
import { ProviderError, StreamingError } from "../infra/errors.js";
import { createLogger } from "../infra/logger.js";
import type { AppLogger } from "../infra/logger.js";
import { parseRetryAfter, withRetry } from "./retry.js";
import { fromReadableStream, SSEStream } from "./stream-parser.js";
import type { SSEStreamOptions } from "./stream-parser.js";

/** Who a request is for; carried into every ProviderError. */
export interface RequestContext {
  provider: string;
  model?: string;
}

export type TransportConfig = Pick<EngineConfig, "retry" | "strictStreamParsing">;

/**
 * HTTP plumbing shared by provider adapters. Blocking requests are retried
 * per the retry policy; streaming requests are sent once.
 */
export class HttpTransport {
  private readonly retry: RetryConfig;
  private readonly strictStreamParsing: boolean;
  private readonly log: AppLogger;

  constructor(config: TransportConfig, logger?: AppLogger) {
    this.retry = config.retry;
    this.strictStreamParsing = config.strictStreamParsing;
    this.log = logger ?? createLogger("transport");
  }

  async send(url: string, init: RequestInit, context: RequestContext): Promise<Response> {
    return withRetry(
      () => this.request(url, init, context),
      this.retry,
      (err, retry, delayMs) => {
        this.log.warn(
          `${context.provider} request failed (${err.message}); retry ${retry}/${this.retry.maxRetries} in ${delayMs}ms`,
        );
      },
    );
  }

  /**
   * Open an event stream. Parsing is strict when the config says so, unless
   * `options` overrides it.
   */
  async stream(
    url: string,
    init: RequestInit,
    context: RequestContext,
    options: SSEStreamOptions = {},
  ): Promise<SSEStream> {
    const response = await this.request(url, init, context);
    if (!response.body) {
      throw new StreamingError("No response body for streaming");
    }
    return new SSEStream(fromReadableStream(response.body), {
      strictParsing: options.strictParsing ?? this.strictStreamParsing,
      maxBufferSize: options.maxBufferSize,
    });
  }

  private async request(
    url: string,
    init: RequestInit,
    context: RequestContext,
  ): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(url, init);
    } catch (err) {
      if (init.signal?.aborted) throw err;
      throw ProviderError.connectionFailed(context.provider, err, context.model);
    }
    if (response.ok) return response;

    const retryAfter = response.headers.get("retry-after");
    throw ProviderError.fromResponse({
      provider: context.provider,
      model: context.model,
      statusCode: response.status,
      responseBody: await response.text(),
      requestId: response.headers.get("x-request-id") ?? undefined,
      retryAfterMs: retryAfter === null ? undefined : parseRetryAfter(retryAfter),
    });
  }
}
