import { z } from "zod";

export const LoggingSchema = z.object({
  level: z
    .enum(["silly", "trace", "debug", "info", "warn", "error", "fatal"])
    .default("info"),
  redactSecrets: z.boolean().default(true),
});

/** Backoff for blocking provider requests. Streams are never retried. */
export const RetrySchema = z.object({
  maxRetries: z.number().int().min(0).default(3),
  initialDelayMs: z.number().int().min(0).default(1000),
  maxDelayMs: z.number().int().min(0).default(8000),
  backoffMultiplier: z.number().min(1).default(2),
  retryableStatusCodes: z.array(z.number().int().min(100).max(599)).default([429, 502, 503, 504]),
});

export const EngineConfigSchema = z.object({
  /** Tool-execution cycles allowed per invocation. */
  maxToolRoundtrips: z.number().int().min(0).default(5),
  /** Conversation size limit; values below 1 are raised to 1 at run time. */
  maxMessages: z.number().int().default(100),
  /** Fraction of maxMessages at which the memory warning fires. */
  memoryWarningRatio: z.number().min(0).max(1).default(0.8),
  /** Default parsing mode for streams opened through the engine's transport. */
  strictStreamParsing: z.boolean().default(false),
  retry: RetrySchema.default({}),
  logging: LoggingSchema.default({}),
});
