import { describe, expect, it } from "vitest";
import { InputValidationError } from "../infra/errors.js";
import {
  assistantMessage,
  parseToolArguments,
  serializeMessage,
  systemMessage,
  toolMessage,
  userMessage,
  validateConversation,
} from "./messages.js";

describe("message constructors", () => {
  it("builds frozen messages for each role", () => {
    const system = systemMessage("Be brief.");
    expect(system).toEqual({ role: "system", content: "Be brief." });
    expect(Object.isFrozen(system)).toBe(true);
    expect(userMessage("Hi")).toEqual({ role: "user", content: "Hi" });
    expect(toolMessage("c1", "42")).toEqual({ role: "tool", toolCallId: "c1", content: "42" });
  });

  it("only attaches tool calls to an assistant message when there are some", () => {
    expect(assistantMessage("done", [])).toEqual({ role: "assistant", content: "done" });
    expect(assistantMessage("", [{ id: "c1", name: "lookup", arguments: {} }])).toEqual({
      role: "assistant",
      content: "",
      toolCalls: [{ id: "c1", name: "lookup", arguments: {} }],
    });
  });
});

describe("serializeMessage", () => {
  it("uses snake_case keys for tool fields", () => {
    expect(serializeMessage(toolMessage("c1", "ok"))).toEqual({
      role: "tool",
      content: "ok",
      tool_call_id: "c1",
    });
    expect(
      serializeMessage(assistantMessage("", [{ id: "c1", name: "lookup", arguments: { q: 1 } }])),
    ).toEqual({
      role: "assistant",
      content: "",
      tool_calls: [{ id: "c1", name: "lookup", arguments: { q: 1 } }],
    });
  });
});

describe("validateConversation", () => {
  it("accepts tool messages that answer an earlier call", () => {
    expect(() =>
      validateConversation([
        userMessage("Hi"),
        assistantMessage("", [{ id: "c1", name: "lookup", arguments: {} }]),
        toolMessage("c1", "found"),
      ]),
    ).not.toThrow();
  });

  it("rejects a tool message that comes before its call", () => {
    expect(() =>
      validateConversation([
        toolMessage("c1", "found"),
        assistantMessage("", [{ id: "c1", name: "lookup", arguments: {} }]),
      ]),
    ).toThrow('Tool message at index 0 references unknown tool call id "c1"');
  });
});

describe("parseToolArguments", () => {
  it("parses a JSON object and treats blank input as empty", () => {
    expect(parseToolArguments('{"city":"Oslo"}')).toEqual({ city: "Oslo" });
    expect(parseToolArguments("  ")).toEqual({});
  });

  it("rejects invalid JSON and non-objects", () => {
    expect(() => parseToolArguments("{oops")).toThrow("Invalid tool arguments: {oops");
    expect(() => parseToolArguments("[1,2]")).toThrow(InputValidationError);
  });
});
