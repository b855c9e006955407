import type { z } from "zod";
import { ToolExecutionError } from "../infra/errors.js";

/**
 * A function the model may call. Tools without a handler are
 * declaration-only: they are advertised to the provider, but the engine
 * never executes them.
 */
export interface Tool {
  readonly name: string;
  readonly description: string;
  /** JSON Schema of the arguments object, sent to the provider as-is. */
  readonly parameters: Record<string, unknown>;
  isExecutable(): boolean;
  invoke(args: Record<string, unknown>): Promise<unknown>;
}

interface BaseToolDefinition {
  name: string;
  description: string;
  parameters?: Record<string, unknown>;
}

export interface SchemaToolDefinition<S extends z.ZodTypeAny> extends BaseToolDefinition {
  /** Arguments are validated against this schema before the handler runs. */
  schema: S;
  execute?: (args: z.infer<S>) => unknown;
}

export interface PlainToolDefinition extends BaseToolDefinition {
  schema?: undefined;
  execute?: (args: Record<string, unknown>) => unknown;
}

type ToolHandler = (args: Record<string, unknown>) => Promise<unknown>;

const EMPTY_PARAMETERS: Record<string, unknown> = Object.freeze({
  type: "object",
  properties: {},
});

class FunctionTool implements Tool {
  constructor(
    readonly name: string,
    readonly description: string,
    readonly parameters: Record<string, unknown>,
    private readonly handler: ToolHandler | undefined,
  ) {}

  isExecutable(): boolean {
    return this.handler !== undefined;
  }

  async invoke(args: Record<string, unknown>): Promise<unknown> {
    if (!this.handler) {
      throw ToolExecutionError.notExecutable(this.name);
    }
    return this.handler(args);
  }
}

function validatingHandler<S extends z.ZodTypeAny>(
  name: string,
  schema: S,
  execute: (args: z.infer<S>) => unknown,
): ToolHandler {
  return async (args) => {
    const parsed = schema.safeParse(args);
    if (!parsed.success) {
      const reason = parsed.error.issues
        .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
        .join("; ");
      throw ToolExecutionError.invalidArguments(name, args, reason);
    }
    return execute(parsed.data);
  };
}

export function defineTool<S extends z.ZodTypeAny>(definition: SchemaToolDefinition<S>): Tool;
export function defineTool(definition: PlainToolDefinition): Tool;
export function defineTool(
  definition: SchemaToolDefinition<z.ZodTypeAny> | PlainToolDefinition,
): Tool {
  const { name, description, parameters = EMPTY_PARAMETERS } = definition;

  let handler: ToolHandler | undefined;
  if (definition.schema !== undefined) {
    if (definition.execute) {
      handler = validatingHandler(name, definition.schema, definition.execute);
    }
  } else if (definition.execute) {
    const execute = definition.execute;
    handler = async (args) => execute(args);
  }

  return new FunctionTool(name, description, parameters, handler);
}

/**
 * Name-keyed tool collection. Insertion order is preserved, so `list()`
 * matches the order tools were registered in.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();

  static from(tools: Iterable<Tool>): ToolRegistry {
    const registry = new ToolRegistry();
    for (const tool of tools) {
      registry.register(tool);
    }
    return registry;
  }

  register(tool: Tool): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
  }

  /** Register, replacing any tool with the same name. */
  set(tool: Tool): void {
    this.tools.set(tool.name, tool);
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  remove(name: string): boolean {
    return this.tools.delete(name);
  }

  list(): Tool[] {
    return Array.from(this.tools.values());
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  size(): number {
    return this.tools.size;
  }

  clear(): void {
    this.tools.clear();
  }
}
