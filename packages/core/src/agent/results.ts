import type { FinishReason, TextResult } from "./types.js";

const FINISH_REASON_ALIASES = new Map<string, FinishReason>([
  ["stop", "stop"],
  ["end_turn", "stop"],
  ["complete", "stop"],
  ["length", "length"],
  ["max_tokens", "length"],
  ["tool_calls", "tool_calls"],
  ["tool_use", "tool_calls"],
  ["function_call", "tool_calls"],
  ["content_filter", "content_filter"],
  ["safety", "content_filter"],
]);

/**
 * Map a provider's finish reason onto the shared set. Unknown values map
 * to undefined rather than guessing.
 */
export function parseFinishReason(value: string | null | undefined): FinishReason | undefined {
  if (value === null || value === undefined) return undefined;
  return FINISH_REASON_ALIASES.get(value.toLowerCase());
}

export function hasToolCalls(result: TextResult): boolean {
  return result.toolCalls.length > 0;
}

export function isComplete(result: TextResult): boolean {
  return result.finishReason === "stop";
}

export function isTruncated(result: TextResult): boolean {
  return result.finishReason === "length";
}
