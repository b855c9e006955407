import type { EngineConfig } from "./types.js";

export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
  maxToolRoundtrips: 5,
  maxMessages: 100,
  memoryWarningRatio: 0.8,
  strictStreamParsing: false,
  retry: Object.freeze({
    maxRetries: 3,
    initialDelayMs: 1000,
    maxDelayMs: 8000,
    backoffMultiplier: 2,
    retryableStatusCodes: [429, 502, 503, 504],
  }),
  logging: Object.freeze({
    level: "info",
    redactSecrets: true,
  }),
});
