import { AIError, ToolExecutionError } from "../infra/errors.js";
import { createLogger, redactSensitive } from "../infra/logger.js";
import type { AppLogger } from "../infra/logger.js";
import type { ToolExecutionPolicy } from "./tool-policy.js";
import type { Tool, ToolRegistry } from "./tools.js";
import type { ToolCall } from "./types.js";

export type ToolResult =
  | {
      readonly success: true;
      readonly toolCallId: string;
      readonly value: unknown;
    }
  | {
      readonly success: false;
      readonly toolCallId: string;
      readonly error: string;
      readonly cause?: unknown;
    };

function failure(toolCallId: string, err: unknown, cause: unknown = err): ToolResult {
  return {
    success: false,
    toolCallId,
    error: err instanceof Error ? err.message : String(err),
    cause,
  };
}

/**
 * Render a result as the content of a tool message.
 */
export function toolResultContent(result: ToolResult): string {
  if (!result.success) {
    return `Error: ${result.error}`;
  }

  const { value } = result;
  if (typeof value === "string") return value;
  if (value === undefined) return "";
  try {
    return JSON.stringify(value) ?? "";
  } catch {
    // Circular structures and BigInt
    return String(value);
  }
}

function withTimeout<T>(
  work: Promise<T>,
  ms: number | null,
  onTimeout: () => Error,
): Promise<T> {
  if (ms === null) return work;

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Runs tool calls under an optional execution policy. Never throws: every
 * outcome, including policy violations and timeouts, comes back as a
 * ToolResult.
 */
export class ToolExecutor {
  private readonly log: AppLogger;

  constructor(
    private policy?: ToolExecutionPolicy,
    logger?: AppLogger,
  ) {
    this.log = logger ?? createLogger("tools");
  }

  getPolicy(): ToolExecutionPolicy | undefined {
    return this.policy;
  }

  setPolicy(policy: ToolExecutionPolicy | undefined): void {
    this.policy = policy;
  }

  async execute(tool: Tool, call: ToolCall): Promise<ToolResult> {
    const policy = this.policy;

    try {
      let args = call.arguments;
      let timeoutMs: number | null = null;

      if (policy) {
        const decision = await policy.validate(call);
        if (!decision.allowed) {
          const { violation } = decision;
          this.log.warn(`Tool call rejected by policy: ${violation.message}`, {
            toolName: call.name,
            reason: violation.reason,
          });
          return failure(call.id, violation);
        }
        args = decision.args;
        timeoutMs = policy.getTimeout();
      }

      this.log.debug(`Executing tool ${call.name}`, redactSensitive(args));
      const value = await withTimeout(tool.invoke(args), timeoutMs, () =>
        ToolExecutionError.timeout(call.name, args, timeoutMs ?? 0),
      );
      return { success: true, toolCallId: call.id, value };
    } catch (err) {
      if (err instanceof AIError) return failure(call.id, err);
      // The model sees the tool's own message; the wrapper keeps name and arguments.
      return failure(call.id, err, ToolExecutionError.fromError(call.name, call.arguments, err));
    }
  }

  /**
   * Execute calls one after another, in order. Calls naming a tool the
   * registry does not hold fail with "Tool not found".
   */
  async executeAll(registry: ToolRegistry, calls: readonly ToolCall[]): Promise<ToolResult[]> {
    const results: ToolResult[] = [];
    for (const call of calls) {
      const tool = registry.get(call.name);
      if (!tool) {
        results.push(failure(call.id, ToolExecutionError.notFound(call.name)));
        continue;
      }
      results.push(await this.execute(tool, call));
    }
    return results;
  }
}
