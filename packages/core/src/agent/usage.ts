import type { Usage } from "./types.js";

export const ZERO_USAGE: Usage = Object.freeze({
  promptTokens: 0,
  completionTokens: 0,
  totalTokens: 0,
});

export function addUsage(a: Usage, b: Usage): Usage {
  return {
    promptTokens: a.promptTokens + b.promptTokens,
    completionTokens: a.completionTokens + b.completionTokens,
    totalTokens: a.totalTokens + b.totalTokens,
  };
}

export function sumUsage(values: Iterable<Usage>): Usage {
  let total = ZERO_USAGE;
  for (const usage of values) {
    total = addUsage(total, usage);
  }
  return total;
}

/**
 * Normalize a provider usage block. Accepts both the chat-completions
 * spelling (prompt/completion) and the input/output spelling; the total
 * falls back to prompt + completion when the provider omits it.
 */
export function usageFromProvider(raw: Record<string, unknown>): Usage {
  const promptTokens = tokenCount(raw.prompt_tokens ?? raw.input_tokens);
  const completionTokens = tokenCount(raw.completion_tokens ?? raw.output_tokens);
  const total = raw.total_tokens;

  return {
    promptTokens,
    completionTokens,
    totalTokens:
      total === undefined || total === null
        ? promptTokens + completionTokens
        : tokenCount(total),
  };
}

function tokenCount(value: unknown): number {
  const n = typeof value === "string" ? Number.parseInt(value, 10) : value;
  if (typeof n !== "number" || !Number.isFinite(n) || n < 0) return 0;
  return Math.trunc(n);
}
