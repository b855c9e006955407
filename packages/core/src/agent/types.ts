/**
 * Core types for the conversation engine.
 */

export type MessageRole = "system" | "user" | "assistant" | "tool";

export type ContentPart =
  | { type: "text"; text: string }
  | { type: "image"; url?: string; data?: string; mimeType?: string };

export interface SystemMessage {
  readonly role: "system";
  readonly content: string;
  readonly timestamp?: number;
}

export interface UserMessage {
  readonly role: "user";
  readonly content: string | readonly ContentPart[];
  readonly timestamp?: number;
}

export interface AssistantMessage {
  readonly role: "assistant";
  readonly content: string;
  readonly toolCalls?: readonly ToolCall[];
  readonly timestamp?: number;
}

export interface ToolMessage {
  readonly role: "tool";
  readonly toolCallId: string;
  readonly content: string;
  readonly timestamp?: number;
}

export type Message = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

export interface ToolCall {
  readonly id: string;
  readonly name: string;
  readonly arguments: Record<string, unknown>;
}

export type FinishReason = "stop" | "length" | "tool_calls" | "content_filter";

export interface Usage {
  readonly promptTokens: number;
  readonly completionTokens: number;
  readonly totalTokens: number;
}

/** What a provider returns for a single completion call. */
export interface TextResult {
  readonly text: string;
  readonly finishReason?: FinishReason;
  readonly usage?: Usage;
  readonly toolCalls: readonly ToolCall[];
  readonly rawResponse?: Record<string, unknown>;
}

/** The terminal artifact of one engine invocation. */
export interface GenerateTextResult extends TextResult {
  readonly usage: Usage;
  /** Usage of each call that was followed by another call, in order. */
  readonly roundtripUsage: readonly Usage[];
}

export interface TextChunk {
  /** Text accumulated so far, including this chunk. */
  readonly text: string;
  readonly delta: string;
  readonly isComplete: boolean;
  readonly finishReason?: FinishReason;
  readonly usage?: Usage;
}

export type ToolChoice = "auto" | "none" | "required" | { type: "tool"; name: string };

export interface SSEEvent {
  readonly event?: string;
  /** Raw string, or the decoded value when the payload was JSON. */
  readonly data: unknown;
  readonly id?: string;
  readonly retry?: number;
}
