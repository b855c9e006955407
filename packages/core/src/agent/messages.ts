import { InputValidationError } from "../infra/errors.js";
import type {
  AssistantMessage,
  ContentPart,
  Message,
  SystemMessage,
  ToolCall,
  ToolMessage,
  UserMessage,
} from "./types.js";

export function systemMessage(content: string): SystemMessage {
  const message: SystemMessage = { role: "system", content };
  return Object.freeze(message);
}

export function userMessage(content: string | readonly ContentPart[]): UserMessage {
  const message: UserMessage = { role: "user", content };
  return Object.freeze(message);
}

export function assistantMessage(
  content: string,
  toolCalls?: readonly ToolCall[],
): AssistantMessage {
  const message: AssistantMessage =
    toolCalls && toolCalls.length > 0
      ? { role: "assistant", content, toolCalls: Object.freeze([...toolCalls]) }
      : { role: "assistant", content };
  return Object.freeze(message);
}

export function toolMessage(toolCallId: string, content: string): ToolMessage {
  const message: ToolMessage = { role: "tool", toolCallId, content };
  return Object.freeze(message);
}

/**
 * Convert a message to the plain record shape shared by chat-completion
 * style APIs. Provider adapters start from this and rename fields as needed.
 */
export function serializeMessage(message: Message): Record<string, unknown> {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      if (message.toolCalls && message.toolCalls.length > 0) {
        return {
          role: "assistant",
          content: message.content,
          tool_calls: message.toolCalls.map((tc) => ({
            id: tc.id,
            name: tc.name,
            arguments: tc.arguments,
          })),
        };
      }
      return { role: "assistant", content: message.content };
    case "tool":
      return {
        role: "tool",
        content: message.content,
        tool_call_id: message.toolCallId,
      };
    default: {
      const unreachable: never = message;
      throw new InputValidationError(
        `Unknown message role: ${JSON.stringify(unreachable)}`,
      );
    }
  }
}

/**
 * Check that every tool message answers a tool call issued by an earlier
 * assistant message in the same list.
 */
export function validateConversation(messages: readonly Message[]): void {
  const issued = new Set<string>();

  messages.forEach((message, index) => {
    if (message.role === "assistant") {
      for (const call of message.toolCalls ?? []) {
        issued.add(call.id);
      }
    } else if (message.role === "tool" && !issued.has(message.toolCallId)) {
      throw new InputValidationError(
        `Tool message at index ${index} references unknown tool call id "${message.toolCallId}"`,
        "messages",
      );
    }
  });
}

/**
 * Decode tool-call arguments that arrived as a JSON string on the wire.
 */
export function parseToolArguments(raw: string): Record<string, unknown> {
  if (raw.trim() === "") return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new InputValidationError(`Invalid tool arguments: ${raw}`, "arguments");
  }

  if (!isRecord(parsed)) {
    throw new InputValidationError(
      `Tool arguments must be a JSON object: ${raw}`,
      "arguments",
    );
  }
  return parsed;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
