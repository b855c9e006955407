import type { FinishReason, SSEEvent, TextChunk, TextResult, Usage } from "./types.js";

export function firstChunk(delta: string): TextChunk {
  return { text: delta, delta, isComplete: false };
}

export function continueChunk(text: string, delta: string): TextChunk {
  return { text, delta, isComplete: false };
}

export function finalChunk(
  text: string,
  delta: string,
  finishReason?: FinishReason,
  usage?: Usage,
): TextChunk {
  return {
    text,
    delta,
    isComplete: true,
    ...(finishReason !== undefined && { finishReason }),
    ...(usage !== undefined && { usage }),
  };
}

/** What a provider adapter pulls out of one SSE event. */
export interface TextDelta {
  delta?: string;
  finishReason?: FinishReason;
  usage?: Usage;
}

/**
 * `"done"` ends the stream (a `[DONE]` sentinel and the like); `null` skips
 * the event.
 */
export type DeltaExtractor = (event: SSEEvent) => TextDelta | "done" | null;

/**
 * Turn parsed SSE events into accumulated text chunks. The chunk carrying
 * the finish reason is marked complete; when the finish reason arrives
 * without text, a trailing empty final chunk is emitted once the events
 * run out.
 */
export async function* reconcileTextChunks(
  events: AsyncIterable<SSEEvent>,
  extract: DeltaExtractor,
): AsyncGenerator<TextChunk, void, undefined> {
  let text = "";
  let finishReason: FinishReason | undefined;
  let usage: Usage | undefined;
  let isFirst = true;
  let finalYielded = false;

  for await (const event of events) {
    const extracted = extract(event);
    if (extracted === "done") break;
    if (extracted === null) continue;

    if (extracted.usage) usage = extracted.usage;
    if (extracted.finishReason) finishReason = extracted.finishReason;

    const delta = extracted.delta ?? "";
    if (delta === "") continue;

    text += delta;
    if (isFirst) {
      isFirst = false;
      yield firstChunk(delta);
    } else if (finishReason !== undefined) {
      finalYielded = true;
      yield finalChunk(text, delta, finishReason, usage);
    } else {
      yield continueChunk(text, delta);
    }
  }

  if (!finalYielded && finishReason !== undefined && !isFirst) {
    yield finalChunk(text, "", finishReason, usage);
  }
}

/**
 * Drain a chunk stream into a single result.
 */
export async function collectText(chunks: AsyncIterable<TextChunk>): Promise<TextResult> {
  let last: TextChunk | undefined;
  for await (const chunk of chunks) {
    last = chunk;
  }

  const finishReason = last?.finishReason;
  const usage = last?.usage;
  return {
    text: last?.text ?? "",
    toolCalls: [],
    ...(finishReason !== undefined && { finishReason }),
    ...(usage !== undefined && { usage }),
  };
}
