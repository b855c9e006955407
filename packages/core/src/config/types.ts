import type { z } from "zod";
import type { EngineConfigSchema, LoggingSchema, RetrySchema } from "./schema.js";

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
/** What callers may pass in: every field is optional and defaulted. */
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingSchema>;
export type RetryConfig = z.infer<typeof RetrySchema>;
