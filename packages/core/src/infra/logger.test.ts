import { describe, expect, it } from "vitest";
import { createLogger, redactSensitive } from "./logger.js";

describe("redactSensitive", () => {
  it("redacts token and apiKey fields", () => {
    expect(redactSensitive({ token: "test-secret", apiKey: "test-key" })).toEqual({
      token: "[REDACTED]",
      apiKey: "[REDACTED]",
    });
  });

  it("redacts nested fields inside tool arguments", () => {
    const result = redactSensitive({
      toolName: "send_mail",
      arguments: { to: "a@example.com", auth: { password: "hunter2" } },
    });
    expect(result).toEqual({
      toolName: "send_mail",
      arguments: { to: "a@example.com", auth: { password: "[REDACTED]" } },
    });
  });

  it("walks arrays", () => {
    expect(redactSensitive([{ secret: "x" }, "plain"])).toEqual([
      { secret: "[REDACTED]" },
      "plain",
    ]);
  });

  it("leaves non-string sensitive values alone", () => {
    expect(redactSensitive({ token: 12345, password: null })).toEqual({
      token: 12345,
      password: null,
    });
  });

  it("passes primitives through", () => {
    expect(redactSensitive("hello")).toBe("hello");
    expect(redactSensitive(42)).toBe(42);
    expect(redactSensitive(undefined)).toBeUndefined();
  });
});

describe("createLogger", () => {
  it("creates a prefixed logger", () => {
    const logger = createLogger("engine");
    expect(logger.settings.name).toBe("conduit:engine");
    expect(typeof logger.warn).toBe("function");
  });

  it("maps the level to tslog's numeric minLevel", () => {
    expect(createLogger("test", { level: "debug" }).settings.minLevel).toBe(2);
    expect(createLogger("test", { level: "fatal" }).settings.minLevel).toBe(6);
  });

  it("masks keys only when redaction is on", () => {
    expect(createLogger("test").settings.maskValuesOfKeys).toContain("apiKey");
    expect(createLogger("test", { redact: false }).settings.maskValuesOfKeys).not.toContain(
      "apiKey",
    );
  });
});
