import type { Tool } from "./tools.js";
import type { Message, TextChunk, TextResult, ToolChoice } from "./types.js";

/**
 * Provider abstraction. An adapter maps the shared message model onto one
 * vendor's wire format; the engine only ever sees this interface.
 */

export interface GenerationOptions {
  model?: string;
  system?: string;
  maxTokens?: number;
  temperature?: number;
  topP?: number;
  stopSequences?: readonly string[];
  tools?: readonly Tool[];
  toolChoice?: ToolChoice;
}

export interface TextProvider {
  readonly name: string;
  /** One blocking completion call. */
  generateText(messages: readonly Message[], options: GenerationOptions): Promise<TextResult>;
  /**
   * Lazily streamed completion. Chunks carry the accumulated text; only the
   * final chunk has a finish reason and usage.
   */
  streamText(messages: readonly Message[], options: GenerationOptions): AsyncIterable<TextChunk>;
}
