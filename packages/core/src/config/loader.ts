import { readFile } from "node:fs/promises";
import JSON5 from "json5";
import { ConfigError } from "../infra/errors.js";
import { EngineConfigSchema } from "./schema.js";
import type { EngineConfig } from "./types.js";

/**
 * Validate a raw config value and fill in defaults.
 */
export function parseEngineConfig(raw: unknown): EngineConfig {
  const result = EngineConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const messages = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(
      `Config validation failed:\n${messages.map((m) => `  - ${m}`).join("\n")}`,
    );
  }
  return result.data;
}

/**
 * Load and validate engine config from a JSON or JSON5 file.
 */
export async function loadEngineConfig(filePath: string): Promise<EngineConfig> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Config file not found: ${filePath}`, err);
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file is not valid JSON or JSON5: ${filePath}`, err);
  }

  return parseEngineConfig(parsed);
}
